import { spawn } from "node:child_process";
import { constants } from "node:fs";
import { access } from "node:fs/promises";
import { AppError, CommandNotFoundError, errorMessage } from "../errors";
import type { ExtensionRegistry } from "../extensions/extension-registry";
import { createLogger } from "../logger";
import type { ProjectRegistry } from "../projects/project-registry";
import type { ProjectEntry } from "../projects/project-types";
import { VERSION } from "../version";
import {
	type DispatchContext,
	type ExitStatus,
	type ExtensionProcess,
	SIGNAL_EXIT_CODE,
	type SignalSource,
	type SpawnFn,
} from "./dispatch-types";

const log = createLogger("command-dispatcher");

export const ENV_CURRENT_PROJECT = "SWITCHYARD_CURRENT_PROJECT";
export const ENV_CURRENT_PROJECT_PATH = "SWITCHYARD_CURRENT_PROJECT_PATH";
export const ENV_CONFIG_PATH = "SWITCHYARD_CONFIG_PATH";
export const ENV_VERSION = "SWITCHYARD_VERSION";
export const ENV_EXTENSION_DIR = "SWITCHYARD_EXTENSION_DIR";
export const ENV_EXTENSION_NAME = "SWITCHYARD_EXTENSION_NAME";
export const ENV_COMMAND_NAME = "SWITCHYARD_COMMAND_NAME";

/** Signals relayed to a running extension instead of ending this process. */
export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ["SIGTERM", "SIGHUP"];

/**
 * Caught but not relayed: the terminal already delivers these to the
 * child's process group, and a second copy would reach it twice.
 */
export const HELD_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT"];

export interface CommandDispatcherDeps {
	spawn: SpawnFn;
	signals: SignalSource;
	/** Rejects when `path` cannot be executed */
	checkExecutable: (path: string) => Promise<void>;
}

export interface CommandDispatcherOptions {
	configPath: string;
	version?: string;
}

const DEFAULT_DEPS: CommandDispatcherDeps = {
	spawn: (command, args, options) => spawn(command, args, options),
	signals: {
		on: (signal, listener) => {
			process.on(signal, listener);
		},
		off: (signal, listener) => {
			process.off(signal, listener);
		},
	},
	checkExecutable: (path) =>
		access(path, process.platform === "win32" ? constants.F_OK : constants.X_OK),
};

export interface ExtensionEnvInput {
	project: ProjectEntry | null;
	configPath: string;
	version: string;
	extensionDir: string;
	extensionName: string;
	commandName?: string;
}

/**
 * Environment handed to an extension: the parent's, plus the switchyard
 * variables. Project variables are removed when no project is active so a
 * stale value inherited from an outer invocation never leaks through.
 */
export function buildExtensionEnv(
	base: NodeJS.ProcessEnv,
	input: ExtensionEnvInput,
): NodeJS.ProcessEnv {
	const env: NodeJS.ProcessEnv = { ...base };
	if (input.project) {
		env[ENV_CURRENT_PROJECT] = input.project.id;
		env[ENV_CURRENT_PROJECT_PATH] = input.project.path;
	} else {
		delete env[ENV_CURRENT_PROJECT];
		delete env[ENV_CURRENT_PROJECT_PATH];
	}
	env[ENV_CONFIG_PATH] = input.configPath;
	env[ENV_VERSION] = input.version;
	env[ENV_EXTENSION_DIR] = input.extensionDir;
	env[ENV_EXTENSION_NAME] = input.extensionName;
	if (input.commandName !== undefined) {
		env[ENV_COMMAND_NAME] = input.commandName;
	} else {
		delete env[ENV_COMMAND_NAME];
	}
	return env;
}

/**
 * Runs an extension as a subcommand: stdio is inherited, termination
 * signals are relayed, and the child's exit is mapped to an ExitStatus.
 */
export class CommandDispatcher {
	private readonly deps: CommandDispatcherDeps;
	private readonly configPath: string;
	private readonly version: string;

	constructor(
		private readonly extensions: ExtensionRegistry,
		private readonly projects: ProjectRegistry | undefined,
		options: CommandDispatcherOptions,
		deps?: Partial<CommandDispatcherDeps>,
	) {
		this.deps = { ...DEFAULT_DEPS, ...deps };
		this.configPath = options.configPath;
		this.version = options.version ?? VERSION;
	}

	/**
	 * `args[0]` is the command name. Commands the manifest does not declare
	 * still run: the entry point receives the raw arguments and decides.
	 * Fails SPAWN_FAILED when the process cannot be started at all.
	 */
	async invoke(
		extensionName: string,
		args: readonly string[],
		context: DispatchContext = {},
	): Promise<ExitStatus> {
		const [commandName] = args;
		const extension = await this.extensions.inspect(extensionName);
		let entryPoint = extension.binaryPath;
		if (commandName !== undefined) {
			try {
				entryPoint = await this.extensions.resolveCommand(extensionName, commandName);
			} catch (err: unknown) {
				if (!(err instanceof CommandNotFoundError)) {
					throw err;
				}
				log.debug(
					{ extension: extensionName, command: commandName },
					"undeclared command, passing arguments to entry point",
				);
				entryPoint = err.entryPoint;
			}
		}

		try {
			await this.deps.checkExecutable(entryPoint);
		} catch (err: unknown) {
			throw new AppError(
				"SPAWN_FAILED",
				`Cannot execute ${entryPoint}: ${errorMessage(err)}`,
				{ cause: err, context: { path: entryPoint, extension: extensionName } },
			);
		}

		const cwd = context.cwd ?? process.cwd();
		const project = context.project !== undefined ? context.project : await this.detectProject(cwd);
		const env = buildExtensionEnv(context.env ?? process.env, {
			project,
			configPath: this.configPath,
			version: this.version,
			extensionDir: extension.installDir,
			extensionName,
			commandName,
		});

		return this.run(entryPoint, [...args], { cwd, env, extensionName });
	}

	private async detectProject(cwd: string): Promise<ProjectEntry | null> {
		if (!this.projects) {
			return null;
		}
		try {
			return (await this.projects.current(cwd)) ?? null;
		} catch (err: unknown) {
			if (err instanceof AppError && err.code === "CONFIG_NOT_FOUND") {
				log.debug({ cwd }, "no configuration yet, running without project context");
				return null;
			}
			throw err;
		}
	}

	private run(
		entryPoint: string,
		args: string[],
		options: { cwd: string; env: NodeJS.ProcessEnv; extensionName: string },
	): Promise<ExitStatus> {
		return new Promise<ExitStatus>((resolve, reject) => {
			let child: ExtensionProcess;
			try {
				child = this.deps.spawn(entryPoint, args, {
					cwd: options.cwd,
					env: options.env,
					stdio: "inherit",
				});
			} catch (err: unknown) {
				reject(this.spawnFailed(entryPoint, options.extensionName, err));
				return;
			}

			const relay = new Map<NodeJS.Signals, () => void>();
			for (const signal of FORWARDED_SIGNALS) {
				const listener = () => {
					log.debug({ signal, extension: options.extensionName }, "forwarding signal");
					child.kill(signal);
				};
				relay.set(signal, listener);
				this.deps.signals.on(signal, listener);
			}
			for (const signal of HELD_SIGNALS) {
				const listener = () => {
					log.debug({ signal, extension: options.extensionName }, "waiting for extension to exit");
				};
				relay.set(signal, listener);
				this.deps.signals.on(signal, listener);
			}

			let settled = false;
			const settle = (outcome: () => void) => {
				if (settled) {
					return;
				}
				settled = true;
				for (const [signal, listener] of relay) {
					this.deps.signals.off(signal, listener);
				}
				outcome();
			};

			child.once("error", (err) => {
				settle(() => reject(this.spawnFailed(entryPoint, options.extensionName, err)));
			});
			child.once("exit", (code, signal) => {
				settle(() => {
					if (signal) {
						resolve({ kind: "signaled", signal, code: SIGNAL_EXIT_CODE });
					} else {
						resolve({ kind: "exited", code: code ?? SIGNAL_EXIT_CODE });
					}
				});
			});
		});
	}

	private spawnFailed(entryPoint: string, extensionName: string, err: unknown): AppError {
		return new AppError(
			"SPAWN_FAILED",
			`Failed to start extension '${extensionName}' (${entryPoint}): ${errorMessage(err)}`,
			{ cause: err, context: { path: entryPoint, extension: extensionName } },
		);
	}
}
