import { mkdirSync, readFileSync, realpathSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigStore } from "@core/config/config-store";
import {
	buildExtensionEnv,
	CommandDispatcher,
	type CommandDispatcherDeps,
} from "@core/dispatch/command-dispatcher";
import { ExtensionRegistry } from "@core/extensions/extension-registry";
import { ProjectRegistry } from "@core/projects/project-registry";
import type { ProjectEntry } from "@core/projects/project-types";
import { MOCK_ENTRY_A } from "@tests/fixtures/configs";
import { manifestFor, writeExtensionTree } from "@tests/helpers/extension-builders";
import {
	createFakeSpawn,
	FakeExtensionProcess,
	FakeSignalSource,
} from "@tests/helpers/process-fakes";
import {
	createInitializedStore,
	createTempWorkspace,
	type TempWorkspace,
} from "@tests/helpers/temp-workspace";

const CONFIG_PATH = "/home/test/.config/switchyard/config.json";

describe("CommandDispatcher", () => {
	let workspace: TempWorkspace;
	let extensionsDir: string;
	let entryPoint: string;
	let extensions: ExtensionRegistry;
	let signals: FakeSignalSource;

	function createDispatcher(
		deps: Partial<CommandDispatcherDeps>,
		projects?: ProjectRegistry,
	): CommandDispatcher {
		return new CommandDispatcher(
			extensions,
			projects,
			{ configPath: CONFIG_PATH, version: "9.9.9" },
			{ signals, checkExecutable: async () => {}, ...deps },
		);
	}

	beforeEach(() => {
		workspace = createTempWorkspace();
		extensionsDir = join(workspace.root, "extensions");
		entryPoint = writeExtensionTree(
			join(extensionsDir, "hooks"),
			manifestFor("hooks", "1.0.0", [
				{ name: "run", help: "Run the hooks" },
				{ name: "list", help: "List hooks" },
			]),
		);
		extensions = new ExtensionRegistry({
			extensionsDir,
			target: "x86_64-unknown-linux-gnu",
		});
		signals = new FakeSignalSource();
	});

	afterEach(() => {
		workspace.cleanup();
	});

	it("spawns the entry point with the arguments and the switchyard environment", async () => {
		const child = new FakeExtensionProcess({ code: 3, signal: null });
		const spawn = createFakeSpawn(child);
		const dispatcher = createDispatcher({ spawn });

		const status = await dispatcher.invoke("hooks", ["run", "--fast"], {
			cwd: workspace.root,
			project: MOCK_ENTRY_A,
			env: { PATH: "/usr/bin" },
		});

		expect(status).toEqual({ kind: "exited", code: 3 });
		expect(spawn).toHaveBeenCalledTimes(1);
		const [command, args, options] = spawn.mock.calls[0] ?? [];
		expect(command).toBe(entryPoint);
		expect(args).toEqual(["run", "--fast"]);
		expect(options).toEqual({
			cwd: workspace.root,
			stdio: "inherit",
			env: {
				PATH: "/usr/bin",
				SWITCHYARD_CURRENT_PROJECT: MOCK_ENTRY_A.id,
				SWITCHYARD_CURRENT_PROJECT_PATH: MOCK_ENTRY_A.path,
				SWITCHYARD_CONFIG_PATH: CONFIG_PATH,
				SWITCHYARD_VERSION: "9.9.9",
				SWITCHYARD_EXTENSION_DIR: join(extensionsDir, "hooks"),
				SWITCHYARD_EXTENSION_NAME: "hooks",
				SWITCHYARD_COMMAND_NAME: "run",
			},
		});
	});

	it("passes undeclared commands to the entry point unchanged", async () => {
		const spawn = createFakeSpawn(new FakeExtensionProcess({ code: 0, signal: null }));
		const dispatcher = createDispatcher({ spawn });

		const status = await dispatcher.invoke("hooks", ["status", "-v"], {
			cwd: workspace.root,
			project: null,
			env: {},
		});

		expect(status).toEqual({ kind: "exited", code: 0 });
		expect(spawn.mock.calls[0]?.[0]).toBe(entryPoint);
		expect(spawn.mock.calls[0]?.[1]).toEqual(["status", "-v"]);
		expect(spawn.mock.calls[0]?.[2].env.SWITCHYARD_COMMAND_NAME).toBe("status");
	});

	it("drops inherited project and command variables when they do not apply", async () => {
		const spawn = createFakeSpawn(new FakeExtensionProcess({ code: 0, signal: null }));
		const dispatcher = createDispatcher({ spawn });

		await dispatcher.invoke("hooks", [], {
			cwd: workspace.root,
			project: null,
			env: {
				SWITCHYARD_CURRENT_PROJECT: "stale-id",
				SWITCHYARD_CURRENT_PROJECT_PATH: "/stale/path",
				SWITCHYARD_COMMAND_NAME: "stale",
			},
		});

		const env = spawn.mock.calls[0]?.[2].env ?? {};
		expect(spawn.mock.calls[0]?.[1]).toEqual([]);
		expect(env).not.toHaveProperty("SWITCHYARD_CURRENT_PROJECT");
		expect(env).not.toHaveProperty("SWITCHYARD_CURRENT_PROJECT_PATH");
		expect(env).not.toHaveProperty("SWITCHYARD_COMMAND_NAME");
		expect(env.SWITCHYARD_EXTENSION_NAME).toBe("hooks");
	});

	it("reports a signal death as signaled with exit code 255", async () => {
		const spawn = createFakeSpawn(new FakeExtensionProcess({ code: null, signal: "SIGTERM" }));
		const dispatcher = createDispatcher({ spawn });

		const status = await dispatcher.invoke("hooks", ["run"], { cwd: workspace.root, project: null });

		expect(status).toEqual({ kind: "signaled", signal: "SIGTERM", code: 255 });
	});

	it("relays termination signals to the child and unregisters afterwards", async () => {
		const child = new FakeExtensionProcess();
		const spawn = createFakeSpawn(child);
		const dispatcher = createDispatcher({ spawn });

		const pending = dispatcher.invoke("hooks", ["run"], { cwd: workspace.root, project: null });
		await vi.waitFor(() => expect(spawn).toHaveBeenCalled());
		expect(signals.listenerCount()).toBe(3);

		signals.raise("SIGTERM");

		expect(await pending).toEqual({ kind: "signaled", signal: "SIGTERM", code: 255 });
		expect(child.kill).toHaveBeenCalledWith("SIGTERM");
		expect(signals.listenerCount()).toBe(0);
	});

	it("holds SIGINT without sending it to the child again", async () => {
		const child = new FakeExtensionProcess();
		const spawn = createFakeSpawn(child);
		const dispatcher = createDispatcher({ spawn });

		const pending = dispatcher.invoke("hooks", ["run"], { cwd: workspace.root, project: null });
		await vi.waitFor(() => expect(spawn).toHaveBeenCalled());

		signals.raise("SIGINT");
		expect(child.kill).not.toHaveBeenCalled();

		child.emit("exit", 130, null);
		expect(await pending).toEqual({ kind: "exited", code: 130 });
		expect(signals.listenerCount()).toBe(0);
	});

	it("fails EXTENSION_NOT_FOUND for a name that points into the store", async () => {
		const spawn = createFakeSpawn(new FakeExtensionProcess({ code: 0, signal: null }));
		const dispatcher = createDispatcher({ spawn });

		await expect(
			dispatcher.invoke(".store", ["run"], { cwd: workspace.root, project: null }),
		).rejects.toMatchObject({ code: "EXTENSION_NOT_FOUND" });
		expect(spawn).not.toHaveBeenCalled();
	});

	describe("spawn failures", () => {
		it("fails SPAWN_FAILED without spawning when the entry point is not executable", async () => {
			const spawn = createFakeSpawn(new FakeExtensionProcess({ code: 0, signal: null }));
			const dispatcher = createDispatcher({
				spawn,
				checkExecutable: async () => {
					throw new Error("EACCES: permission denied");
				},
			});

			await expect(
				dispatcher.invoke("hooks", ["run"], { cwd: workspace.root, project: null }),
			).rejects.toMatchObject({
				code: "SPAWN_FAILED",
				message: `Cannot execute ${entryPoint}: EACCES: permission denied`,
			});
			expect(spawn).not.toHaveBeenCalled();
		});

		it("fails SPAWN_FAILED when the child emits an error", async () => {
			const child = new FakeExtensionProcess();
			const spawn = vi.fn(() => {
				child.fail(new Error("spawn ENOEXEC"));
				return child;
			});
			const dispatcher = createDispatcher({ spawn });

			await expect(
				dispatcher.invoke("hooks", ["run"], { cwd: workspace.root, project: null }),
			).rejects.toMatchObject({
				code: "SPAWN_FAILED",
				message: `Failed to start extension 'hooks' (${entryPoint}): spawn ENOEXEC`,
				context: { path: entryPoint, extension: "hooks" },
			});
			expect(signals.listenerCount()).toBe(0);
		});

		it("fails SPAWN_FAILED when spawning throws", async () => {
			const dispatcher = createDispatcher({
				spawn: () => {
					throw new Error("EMFILE");
				},
			});

			await expect(
				dispatcher.invoke("hooks", ["run"], { cwd: workspace.root, project: null }),
			).rejects.toMatchObject({
				code: "SPAWN_FAILED",
				message: `Failed to start extension 'hooks' (${entryPoint}): EMFILE`,
			});
			expect(signals.listenerCount()).toBe(0);
		});

		it("fails EXTENSION_NOT_FOUND for an unknown extension", async () => {
			const spawn = createFakeSpawn(new FakeExtensionProcess({ code: 0, signal: null }));
			const dispatcher = createDispatcher({ spawn });

			await expect(dispatcher.invoke("deploy", ["run"], { project: null })).rejects.toMatchObject({
				code: "EXTENSION_NOT_FOUND",
			});
			expect(spawn).not.toHaveBeenCalled();
		});
	});

	describe("project detection", () => {
		it("exports the project containing the working directory", async () => {
			const root = realpathSync(workspace.root);
			const projectPath = join(root, "project-alpha");
			mkdirSync(join(projectPath, "src"), { recursive: true });
			const store = await createInitializedStore(workspace);
			const projects = new ProjectRegistry(store, { machineId: "test-machine" });
			const project = await projects.add(projectPath);
			const spawn = createFakeSpawn(new FakeExtensionProcess({ code: 0, signal: null }));
			const dispatcher = createDispatcher({ spawn }, projects);

			await dispatcher.invoke("hooks", ["run"], { cwd: join(projectPath, "src"), env: {} });

			const env = spawn.mock.calls[0]?.[2].env ?? {};
			expect(env.SWITCHYARD_CURRENT_PROJECT).toBe(project.id);
			expect(env.SWITCHYARD_CURRENT_PROJECT_PATH).toBe(projectPath);
		});

		it("runs without a project before any configuration exists", async () => {
			const store = new ConfigStore({ filePath: workspace.configPath });
			const projects = new ProjectRegistry(store, { machineId: "test-machine" });
			const spawn = createFakeSpawn(new FakeExtensionProcess({ code: 0, signal: null }));
			const dispatcher = createDispatcher({ spawn }, projects);

			const status = await dispatcher.invoke("hooks", ["run"], { cwd: workspace.root, env: {} });

			expect(status).toEqual({ kind: "exited", code: 0 });
			expect(spawn.mock.calls[0]?.[2].env).not.toHaveProperty("SWITCHYARD_CURRENT_PROJECT");
		});
	});

	it.skipIf(process.platform === "win32")(
		"runs a real entry point and returns its exit code",
		async () => {
			const output = join(workspace.root, "seen.txt");
			writeExtensionTree(
				join(extensionsDir, "echoer"),
				manifestFor("echoer", "1.0.0", [{ name: "run", help: "Echo" }]),
				[
					"#!/bin/sh",
					'printf \'%s\\n\' "$SWITCHYARD_EXTENSION_NAME" "$SWITCHYARD_COMMAND_NAME" "$*" > "$OUT"',
					"exit 3",
					"",
				].join("\n"),
			);
			const dispatcher = new CommandDispatcher(extensions, undefined, {
				configPath: CONFIG_PATH,
			});

			const status = await dispatcher.invoke("echoer", ["run", "--fast"], {
				cwd: workspace.root,
				env: { PATH: process.env.PATH, OUT: output },
			});

			expect(status).toEqual({ kind: "exited", code: 3 });
			expect(readFileSync(output, "utf-8")).toBe("echoer\nrun\nrun --fast\n");
		},
	);
});

describe("buildExtensionEnv", () => {
	const project: ProjectEntry = MOCK_ENTRY_A;

	it("overrides inherited switchyard variables and keeps the rest", () => {
		const env = buildExtensionEnv(
			{ HOME: "/home/test", SWITCHYARD_EXTENSION_NAME: "outer" },
			{
				project,
				configPath: CONFIG_PATH,
				version: "1.2.3",
				extensionDir: "/ext/hooks",
				extensionName: "hooks",
				commandName: "run",
			},
		);

		expect(env).toEqual({
			HOME: "/home/test",
			SWITCHYARD_CURRENT_PROJECT: project.id,
			SWITCHYARD_CURRENT_PROJECT_PATH: project.path,
			SWITCHYARD_CONFIG_PATH: CONFIG_PATH,
			SWITCHYARD_VERSION: "1.2.3",
			SWITCHYARD_EXTENSION_DIR: "/ext/hooks",
			SWITCHYARD_EXTENSION_NAME: "hooks",
			SWITCHYARD_COMMAND_NAME: "run",
		});
	});

	it("does not modify the base environment", () => {
		const base = { SWITCHYARD_CURRENT_PROJECT: "outer" };

		buildExtensionEnv(base, {
			project: null,
			configPath: CONFIG_PATH,
			version: "1.2.3",
			extensionDir: "/ext/hooks",
			extensionName: "hooks",
		});

		expect(base).toEqual({ SWITCHYARD_CURRENT_PROJECT: "outer" });
	});
});
