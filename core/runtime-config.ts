import { hostname, homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { AppError } from "./errors";

const DEFAULT_HOME_DIR = join(homedir(), ".config", "switchyard");
const DEFAULT_RELEASE_BASE_URL = "https://github.com/switchyard-extensions";

const logLevelSchema = z.enum([
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
]);

const envSchema = z.object({
	SWITCHYARD_CONFIG_PATH: z.string().min(1).optional(),
	SWITCHYARD_EXTENSIONS_DIR: z.string().min(1).optional(),
	SWITCHYARD_RELEASE_BASE_URL: z.string().url().optional(),
	SWITCHYARD_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
	SWITCHYARD_FETCH_RETRIES: z.coerce.number().int().min(0).max(10).optional(),
	SWITCHYARD_MACHINE_ID: z.string().min(1).optional(),
	SWITCHYARD_LOG_LEVEL: logLevelSchema.optional(),
	HOSTNAME: z.string().optional(),
	COMPUTERNAME: z.string().optional(),
});

export interface RuntimeConfig {
	configPath: string;
	extensionsDir: string;
	releaseBaseUrl: string;
	fetchTimeoutMs: number;
	fetchRetries: number;
	machineId: string;
}

/**
 * Machine identifier used to key per-machine access statistics.
 * Falls back from explicit override to the usual hostname variables.
 */
export function resolveMachineId(env: NodeJS.ProcessEnv = process.env): string {
	const candidates = [
		env.SWITCHYARD_MACHINE_ID,
		env.HOSTNAME,
		env.COMPUTERNAME,
	];
	for (const candidate of candidates) {
		if (candidate && candidate.trim().length > 0) {
			return candidate.trim();
		}
	}
	return hostname();
}

export function loadRuntimeConfig(
	env: NodeJS.ProcessEnv = process.env,
): RuntimeConfig {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const variable = issue ? String(issue.path[0]) : "environment";
		throw new AppError(
			"CONFIG_INVALID",
			`Invalid value for ${variable}: ${issue?.message ?? "unknown error"}`,
			{ context: { variable } },
		);
	}

	const vars = parsed.data;
	return {
		configPath: vars.SWITCHYARD_CONFIG_PATH ?? join(DEFAULT_HOME_DIR, "config.json"),
		extensionsDir:
			vars.SWITCHYARD_EXTENSIONS_DIR ?? join(DEFAULT_HOME_DIR, "extensions"),
		releaseBaseUrl: vars.SWITCHYARD_RELEASE_BASE_URL ?? DEFAULT_RELEASE_BASE_URL,
		fetchTimeoutMs: vars.SWITCHYARD_FETCH_TIMEOUT_MS ?? 30_000,
		fetchRetries: vars.SWITCHYARD_FETCH_RETRIES ?? 3,
		machineId: resolveMachineId(env),
	};
}
