import { access } from "node:fs/promises";
import { AppError, errnoCode } from "../errors";
import { createLogger } from "../logger";
import { DEFAULT_LOCK_OPTIONS, withFileLock } from "../store/file-lock";
import { JsonStore } from "../store/json-store";
import type { FileLockOptions } from "../store/store-types";
import {
	assertSettableKey,
	CONFIG_KEYS,
	type ConfigKey,
	type ConfigValueKind,
	type ConfigValues,
	configValueKind,
	RESETTABLE_CONFIG_KEYS,
	type ResettableConfigKey,
	readConfigKey,
	resetConfigKey,
	type SettableConfigKey,
	writeConfigKey,
	writeConfigKeyFromText,
} from "./config-keys";
import { migrateDocument } from "./config-migrations";
import { type Config, CURRENT_CONFIG_VERSION, DEFAULT_EDITOR } from "./config-schema";
import { assertValidConfig } from "./schema-validator";

const log = createLogger("config-store");

export interface ConfigStoreOptions {
	filePath: string;
	lock?: FileLockOptions;
}

export interface InitializeOptions {
	githubUsername: string;
	projectsRootDir: string;
	editor?: string;
	/** Replace an existing document instead of failing ALREADY_EXISTS */
	overwrite?: boolean;
}

export interface ConfigKeyValue {
	key: ConfigKey;
	kind: ConfigValueKind;
	value: ConfigValues[ConfigKey];
}

export function createDefaultConfig(options: InitializeOptions): Config {
	return assertValidConfig({
		version: CURRENT_CONFIG_VERSION,
		github_username: options.githubUsername,
		projects_root_dir: options.projectsRootDir,
		editor: options.editor ?? DEFAULT_EDITOR,
		settings: {},
		projects: {},
		machine_metadata: {},
	});
}

/**
 * Explicit handle on the configuration file. Holds no document between
 * calls: every operation goes back to disk, so concurrent invocations
 * observe each other's completed saves.
 */
export class ConfigStore {
	private readonly store: JsonStore<Config>;
	private readonly lockOptions: FileLockOptions;

	constructor(options: ConfigStoreOptions) {
		this.store = new JsonStore<Config>({ filePath: options.filePath }, (raw) =>
			this.migrate(raw),
		);
		this.lockOptions = options.lock ?? DEFAULT_LOCK_OPTIONS;
	}

	get path(): string {
		return this.store.filePath;
	}

	/** Fails CONFIG_NOT_FOUND, PARSE_ERROR, SCHEMA_INVALID or UNSUPPORTED_CONFIG_VERSION. */
	async load(): Promise<Config> {
		try {
			return await this.store.read();
		} catch (err: unknown) {
			if (err instanceof AppError && err.code === "NOT_FOUND") {
				throw new AppError(
					"CONFIG_NOT_FOUND",
					`Configuration file not found: ${this.path}. Initialize it first.`,
					{ cause: err, context: { path: this.path } },
				);
			}
			throw err;
		}
	}

	/** Validates before writing, so an invalid document never reaches disk. */
	async save(config: Config): Promise<void> {
		const validated = assertValidConfig(config);
		await this.store.write(validated);
	}

	/** Upgrade a raw document to the current version and validate it. */
	migrate(document: unknown): Config {
		const { document: migrated, applied } = migrateDocument(document);
		if (applied.length > 0) {
			log.info({ path: this.path, applied }, "configuration migrated in memory");
		}
		return assertValidConfig(migrated);
	}

	/**
	 * Load the latest document, apply `mutator`, revalidate and save, under an
	 * advisory lock. If `mutator` throws nothing is written.
	 */
	async update<T>(mutator: (config: Config) => T | Promise<T>): Promise<T> {
		return withFileLock(
			`${this.path}.lock`,
			async () => {
				const config = await this.load();
				const result = await mutator(config);
				await this.save(config);
				return result;
			},
			this.lockOptions,
		);
	}

	async exists(): Promise<boolean> {
		try {
			await access(this.path);
			return true;
		} catch (err: unknown) {
			if (errnoCode(err) === "ENOENT") {
				return false;
			}
			throw err;
		}
	}

	/** First-run creation of a default document. */
	async initialize(options: InitializeOptions): Promise<Config> {
		if (!options.overwrite && (await this.exists())) {
			throw new AppError("ALREADY_EXISTS", `Configuration already exists: ${this.path}`, {
				context: { path: this.path },
			});
		}
		const config = createDefaultConfig(options);
		await this.save(config);
		return config;
	}

	async get<K extends ConfigKey>(key: K): Promise<ConfigValues[K]> {
		return readConfigKey(await this.load(), key);
	}

	/** Every recognized key with its current value, in display order. */
	async list(): Promise<ConfigKeyValue[]> {
		const config = await this.load();
		return CONFIG_KEYS.map((key) => ({
			key,
			kind: configValueKind(key),
			value: readConfigKey(config, key),
		}));
	}

	/** Validate and persist one value. Fails SCHEMA_INVALID naming `key`. */
	async set<K extends SettableConfigKey>(key: K, value: ConfigValues[K]): Promise<ConfigValues[K]> {
		return this.update((config) => writeConfigKey(config, key, value));
	}

	/**
	 * `set` for command-line input: booleans accept true/false, yes/no, on/off
	 * and 1/0, integers are decimal. Fails INVALID_CONFIG_KEY for an unknown or
	 * read-only key.
	 */
	async setFromText(key: string, raw: string): Promise<ConfigValues[SettableConfigKey]> {
		const settable = assertSettableKey(key);
		return this.update((config) => writeConfigKeyFromText(config, settable, raw));
	}

	/**
	 * Restore defaults for `keys`, or for every key that has one. Projects,
	 * machine statistics and the identity fields are kept.
	 */
	async reset(keys: readonly ResettableConfigKey[] = RESETTABLE_CONFIG_KEYS): Promise<void> {
		await this.update((config) => {
			for (const key of keys) {
				resetConfigKey(config, key);
			}
		});
	}
}
