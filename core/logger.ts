import pino, { type Logger } from "pino";

const DEFAULT_LEVEL = "warn";

let root: Logger | null = null;

function levelFromEnv(value: string | undefined): string {
	if (value === "silent" || (value !== undefined && value in pino.levels.values)) {
		return value;
	}
	return DEFAULT_LEVEL;
}

/**
 * Root logger. Writes synchronously to stderr: the tool runs as a
 * short-lived process and stdout belongs to the extension it hands off to.
 */
export function getRootLogger(): Logger {
	if (!root) {
		root = pino(
			{
				name: "switchyard",
				level: levelFromEnv(process.env.SWITCHYARD_LOG_LEVEL),
			},
			pino.destination({ dest: 2, sync: true }),
		);
	}
	return root;
}

export function createLogger(scope: string): Logger {
	return getRootLogger().child({ scope });
}
