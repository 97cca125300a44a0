import { readdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { AppError, CommandNotFoundError, errnoCode, errorMessage } from "../errors";
import { createLogger } from "../logger";
import type {
	CommandOwner,
	InstalledExtension,
	ScanResult,
	ScanWarning,
} from "./extension-types";
import { extensionNameSchema, loadManifest, MANIFEST_FILENAME } from "./manifest-schema";
import { currentTarget, entryPointPath, type TargetTriple } from "./platform-resolver";

const log = createLogger("extension-registry");

export interface ExtensionRegistryOptions {
	extensionsDir: string;
	target?: TargetTriple;
}

function notFound(name: string, reason: string): AppError {
	return new AppError("EXTENSION_NOT_FOUND", `Extension '${name}' ${reason}`, {
		context: { extension: name },
	});
}

/**
 * Index of installed extensions, rebuilt from disk on every call since other
 * processes may install or remove extensions at any time.
 */
export class ExtensionRegistry {
	private readonly extensionsDir: string;
	private readonly target: TargetTriple;

	constructor(options: ExtensionRegistryOptions) {
		this.extensionsDir = resolve(options.extensionsDir);
		this.target = options.target ?? currentTarget();
	}

	/**
	 * Every loadable extension under `extensionsDir`. Broken ones are left
	 * out and reported in `warnings`; dot-entries (the store, staging links)
	 * are never considered.
	 */
	async scan(extensionsDir: string = this.extensionsDir): Promise<ScanResult> {
		const extensions = new Map<string, InstalledExtension>();
		const warnings: ScanWarning[] = [];

		let names: string[];
		try {
			names = await readdir(extensionsDir);
		} catch (err: unknown) {
			if (errnoCode(err) === "ENOENT") {
				return { extensions, warnings };
			}
			throw new AppError(
				"IO_ERROR",
				`Cannot read extensions directory ${extensionsDir}: ${errorMessage(err)}`,
				{ cause: err, context: { path: extensionsDir } },
			);
		}

		for (const name of names.sort()) {
			if (name.startsWith(".")) {
				continue;
			}
			const installDir = join(extensionsDir, name);
			try {
				const extension = await this.load(name, installDir);
				if (!extension) {
					// Listed but unreachable: a link whose target is gone.
					throw notFound(name, `points at a missing directory: ${installDir}`);
				}
				extensions.set(name, extension);
			} catch (err: unknown) {
				if (!(err instanceof AppError)) {
					throw err;
				}
				warnings.push({ name, path: installDir, reason: err.message });
				log.warn({ extension: name, reason: err.message }, "skipping broken extension");
			}
		}
		return { extensions, warnings };
	}

	/**
	 * Load one extension, failing with the reason it cannot be used. Names
	 * outside the extension name syntax (`.store`, paths) are never installed.
	 */
	async inspect(name: string): Promise<InstalledExtension> {
		if (!extensionNameSchema.safeParse(name).success) {
			throw notFound(name, "is not installed");
		}
		const extension = await this.load(name, join(this.extensionsDir, name));
		if (!extension) {
			throw notFound(name, "is not installed");
		}
		return extension;
	}

	/** Exact name, else the single installed name starting with `input`. */
	async resolveName(input: string): Promise<string> {
		const { extensions } = await this.scan();
		if (extensions.has(input)) {
			return input;
		}
		const candidates = [...extensions.keys()].filter((name) => name.startsWith(input));
		const [only] = candidates;
		if (candidates.length === 1 && only !== undefined) {
			return only;
		}
		if (candidates.length > 1) {
			throw notFound(input, `is ambiguous: ${candidates.join(", ")}`);
		}
		throw notFound(input, "is not installed");
	}

	/**
	 * Entry point for `extensionName commandName`. Fails with a
	 * CommandNotFoundError carrying the entry point when the manifest does not
	 * declare the command, so the caller can fall back to it.
	 */
	async resolveCommand(extensionName: string, commandName: string): Promise<string> {
		const extension = await this.inspect(extensionName);
		const declared = extension.manifest.commands.some((command) => command.name === commandName);
		if (!declared) {
			throw new CommandNotFoundError(extensionName, commandName, extension.binaryPath);
		}
		return extension.binaryPath;
	}

	async listCommands(): Promise<CommandOwner[]> {
		const { extensions } = await this.scan();
		const owners: CommandOwner[] = [];
		for (const extension of extensions.values()) {
			for (const command of extension.manifest.commands) {
				owners.push({ command: command.name, extension: extension.name, help: command.help });
			}
		}
		return owners.sort(
			(a, b) => a.command.localeCompare(b.command) || a.extension.localeCompare(b.extension),
		);
	}

	/** Undefined when nothing is installed under that name. */
	private async load(name: string, installDir: string): Promise<InstalledExtension | undefined> {
		try {
			if (!(await stat(installDir)).isDirectory()) {
				throw notFound(name, `is not a directory: ${installDir}`);
			}
		} catch (err: unknown) {
			if (err instanceof AppError) {
				throw err;
			}
			if (errnoCode(err) === "ENOENT") {
				return undefined;
			}
			throw notFound(name, `cannot be read: ${errorMessage(err)}`);
		}

		const manifest = await loadManifest(join(installDir, MANIFEST_FILENAME), name);
		const binaryPath = join(installDir, entryPointPath(name, this.target));
		let isFile = false;
		try {
			isFile = (await stat(binaryPath)).isFile();
		} catch (err: unknown) {
			if (errnoCode(err) !== "ENOENT") {
				throw notFound(name, `entry point cannot be read: ${errorMessage(err)}`);
			}
		}
		if (!isFile) {
			throw notFound(name, `is missing its entry point ${binaryPath}`);
		}
		return { name, installDir, binaryPath, manifest };
	}
}
