import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigStore } from "@core/config/config-store";

export interface TempWorkspace {
	root: string;
	configPath: string;
	cleanup: () => void;
}

export function createTempWorkspace(prefix = "switchyard-test-"): TempWorkspace {
	const root = mkdtempSync(join(tmpdir(), prefix));
	return {
		root,
		configPath: join(root, "config", "config.json"),
		cleanup: () => rmSync(root, { recursive: true, force: true }),
	};
}

/** ConfigStore over a freshly initialized document in the workspace. */
export async function createInitializedStore(
	workspace: TempWorkspace,
): Promise<ConfigStore> {
	const store = new ConfigStore({
		filePath: workspace.configPath,
		lock: { timeoutMs: 500, staleMs: 10_000, retryMs: 5 },
	});
	await store.initialize({
		githubUsername: "test-user",
		projectsRootDir: workspace.root,
	});
	return store;
}
