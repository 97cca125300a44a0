import { homedir, hostname } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { loadRuntimeConfig, resolveMachineId } from "@core/runtime-config";

describe("loadRuntimeConfig", () => {
	it("falls back to defaults under the home directory", () => {
		const config = loadRuntimeConfig({ HOSTNAME: "build-host" });

		expect(config).toEqual({
			configPath: join(homedir(), ".config", "switchyard", "config.json"),
			extensionsDir: join(homedir(), ".config", "switchyard", "extensions"),
			releaseBaseUrl: "https://github.com/switchyard-extensions",
			fetchTimeoutMs: 30_000,
			fetchRetries: 3,
			machineId: "build-host",
		});
	});

	it("reads overrides from the environment", () => {
		const config = loadRuntimeConfig({
			SWITCHYARD_CONFIG_PATH: "/tmp/sy/config.json",
			SWITCHYARD_EXTENSIONS_DIR: "/tmp/sy/ext",
			SWITCHYARD_RELEASE_BASE_URL: "https://releases.test/extensions",
			SWITCHYARD_FETCH_TIMEOUT_MS: "5000",
			SWITCHYARD_FETCH_RETRIES: "0",
			SWITCHYARD_MACHINE_ID: "laptop",
		});

		expect(config).toMatchObject({
			configPath: "/tmp/sy/config.json",
			extensionsDir: "/tmp/sy/ext",
			releaseBaseUrl: "https://releases.test/extensions",
			fetchTimeoutMs: 5000,
			fetchRetries: 0,
			machineId: "laptop",
		});
	});

	it.each([
		["SWITCHYARD_FETCH_RETRIES", "eleven"],
		["SWITCHYARD_FETCH_TIMEOUT_MS", "-1"],
		["SWITCHYARD_RELEASE_BASE_URL", "not a url"],
		["SWITCHYARD_LOG_LEVEL", "loud"],
	])("rejects an invalid %s", (variable, value) => {
		let error: unknown;
		try {
			loadRuntimeConfig({ [variable]: value });
		} catch (err: unknown) {
			error = err;
		}

		expect(error).toMatchObject({ code: "CONFIG_INVALID", context: { variable } });
		expect(error instanceof Error ? error.message : "").toMatch(
			new RegExp(`^Invalid value for ${variable}: `),
		);
	});
});

describe("resolveMachineId", () => {
	it("prefers the explicit override, then the hostname variables", () => {
		expect(
			resolveMachineId({ SWITCHYARD_MACHINE_ID: " desk ", HOSTNAME: "h", COMPUTERNAME: "c" }),
		).toBe("desk");
		expect(resolveMachineId({ HOSTNAME: "  ", COMPUTERNAME: "WORKSTATION" })).toBe("WORKSTATION");
	});

	it("falls back to the operating system hostname", () => {
		expect(resolveMachineId({})).toBe(hostname());
	});
});
