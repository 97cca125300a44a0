import { z } from "zod";
import { AppError, SchemaError } from "../errors";
import {
	type Config,
	DEFAULT_EDITOR,
	DEFAULT_RECENT_PROJECTS_LIMIT,
	githubUsernameSchema,
	settingsSchema,
} from "./config-schema";
import { validateWith } from "./schema-validator";

/** Value type behind each dotted configuration key. */
export interface ConfigValues {
	version: string;
	github_username: string;
	projects_root_dir: string;
	editor: string;
	"settings.auto_open_editor": boolean;
	"settings.show_git_status": boolean;
	"settings.recent_projects_limit": number;
}

export type ConfigKey = keyof ConfigValues;
/** `version` is owned by migrations. */
export type SettableConfigKey = Exclude<ConfigKey, "version">;
export type ResettableConfigKey = Exclude<SettableConfigKey, "github_username" | "projects_root_dir">;

export type ConfigValueKind = "string" | "path" | "boolean" | "integer";

export const CONFIG_KEYS: readonly ConfigKey[] = [
	"version",
	"github_username",
	"projects_root_dir",
	"editor",
	"settings.auto_open_editor",
	"settings.show_git_status",
	"settings.recent_projects_limit",
];

export const RESETTABLE_CONFIG_KEYS: readonly ResettableConfigKey[] = [
	"editor",
	"settings.auto_open_editor",
	"settings.show_git_status",
	"settings.recent_projects_limit",
];

interface KeyAccessor<V> {
	kind: ConfigValueKind;
	read: (config: Config) => V;
}

interface KeySetter<V> {
	schema: z.ZodType<V, z.ZodTypeDef, unknown>;
	/** Turn command-line text into a candidate value for `schema` */
	parse: (raw: string) => unknown;
	write: (config: Config, value: V) => void;
}

const TRUE_WORDS = new Set(["true", "1", "yes", "on"]);
const FALSE_WORDS = new Set(["false", "0", "no", "off"]);

function parseBoolean(raw: string): unknown {
	const word = raw.trim().toLowerCase();
	if (TRUE_WORDS.has(word)) return true;
	if (FALSE_WORDS.has(word)) return false;
	return raw;
}

function parseInteger(raw: string): unknown {
	return /^\s*\d+\s*$/.test(raw) ? Number.parseInt(raw, 10) : raw;
}

const keep = (raw: string): unknown => raw;

const ACCESSORS: { [K in ConfigKey]: KeyAccessor<ConfigValues[K]> } = {
	version: { kind: "string", read: (config) => config.version },
	github_username: { kind: "string", read: (config) => config.github_username },
	projects_root_dir: { kind: "path", read: (config) => config.projects_root_dir },
	editor: { kind: "string", read: (config) => config.editor },
	"settings.auto_open_editor": {
		kind: "boolean",
		read: (config) => config.settings.auto_open_editor,
	},
	"settings.show_git_status": {
		kind: "boolean",
		read: (config) => config.settings.show_git_status,
	},
	"settings.recent_projects_limit": {
		kind: "integer",
		read: (config) => config.settings.recent_projects_limit,
	},
};

const SETTERS: { [K in SettableConfigKey]: KeySetter<ConfigValues[K]> } = {
	github_username: {
		schema: githubUsernameSchema,
		parse: keep,
		write: (config, value) => {
			config.github_username = value;
		},
	},
	projects_root_dir: {
		schema: z.string().min(1),
		parse: keep,
		write: (config, value) => {
			config.projects_root_dir = value;
		},
	},
	editor: {
		schema: z.string().min(1),
		parse: keep,
		write: (config, value) => {
			config.editor = value;
		},
	},
	"settings.auto_open_editor": {
		schema: settingsSchema.shape.auto_open_editor.removeDefault(),
		parse: parseBoolean,
		write: (config, value) => {
			config.settings.auto_open_editor = value;
		},
	},
	"settings.show_git_status": {
		schema: settingsSchema.shape.show_git_status.removeDefault(),
		parse: parseBoolean,
		write: (config, value) => {
			config.settings.show_git_status = value;
		},
	},
	"settings.recent_projects_limit": {
		schema: settingsSchema.shape.recent_projects_limit.removeDefault(),
		parse: parseInteger,
		write: (config, value) => {
			config.settings.recent_projects_limit = value;
		},
	},
};

const DEFAULTS: { [K in ResettableConfigKey]: ConfigValues[K] } = {
	editor: DEFAULT_EDITOR,
	"settings.auto_open_editor": false,
	"settings.show_git_status": true,
	"settings.recent_projects_limit": DEFAULT_RECENT_PROJECTS_LIMIT,
};

function unknownKey(key: string): AppError {
	return new AppError(
		"INVALID_CONFIG_KEY",
		`Unknown configuration key '${key}'. Known keys: ${CONFIG_KEYS.join(", ")}`,
		{ context: { key } },
	);
}

export function isConfigKey(key: string): key is ConfigKey {
	return CONFIG_KEYS.some((known) => known === key);
}

export function assertConfigKey(key: string): ConfigKey {
	if (!isConfigKey(key)) {
		throw unknownKey(key);
	}
	return key;
}

export function assertSettableKey(key: string): SettableConfigKey {
	const known = assertConfigKey(key);
	if (known === "version") {
		throw new AppError("INVALID_CONFIG_KEY", "Configuration key 'version' is read-only", {
			context: { key },
		});
	}
	return known;
}

export function assertResettableKey(key: string): ResettableConfigKey {
	const settable = assertSettableKey(key);
	if (settable === "github_username" || settable === "projects_root_dir") {
		throw new AppError("INVALID_CONFIG_KEY", `Configuration key '${key}' has no default`, {
			context: { key },
		});
	}
	return settable;
}

export function configValueKind(key: ConfigKey): ConfigValueKind {
	return ACCESSORS[key].kind;
}

export function readConfigKey<K extends ConfigKey>(config: Config, key: K): ConfigValues[K] {
	const accessor: KeyAccessor<ConfigValues[K]> = ACCESSORS[key];
	return accessor.read(config);
}

/** Validate `input` for `key` and assign it. Fails SCHEMA_INVALID with the key as field path. */
export function writeConfigKey<K extends SettableConfigKey>(
	config: Config,
	key: K,
	input: unknown,
): ConfigValues[K] {
	const setter: KeySetter<ConfigValues[K]> = SETTERS[key];
	const result = validateWith(setter.schema, input);
	if (!result.ok) {
		throw new SchemaError(
			result.error.issues.map((issue) => ({
				...issue,
				fieldPath: issue.fieldPath ? `${key}.${issue.fieldPath}` : key,
			})),
		);
	}
	setter.write(config, result.value);
	return result.value;
}

/** Parse command-line text for `key`, then validate and assign it. */
export function writeConfigKeyFromText<K extends SettableConfigKey>(
	config: Config,
	key: K,
	raw: string,
): ConfigValues[K] {
	const setter: KeySetter<ConfigValues[K]> = SETTERS[key];
	return writeConfigKey(config, key, setter.parse(raw));
}

export function resetConfigKey<K extends ResettableConfigKey>(config: Config, key: K): ConfigValues[K] {
	const value = DEFAULTS[key];
	return writeConfigKey(config, key, value);
}
