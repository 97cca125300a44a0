import { ConfigStore } from "./config/config-store";
import { CommandDispatcher } from "./dispatch/command-dispatcher";
import { HttpArtifactFetcher } from "./extensions/artifact-fetcher";
import { ExtensionInstaller } from "./extensions/extension-installer";
import { ExtensionRegistry } from "./extensions/extension-registry";
import { ProjectRegistry } from "./projects/project-registry";
import { loadRuntimeConfig, type RuntimeConfig } from "./runtime-config";
import { VERSION } from "./version";

export * from "./config/config-schema";
export { compareVersions, migrateDocument, MIGRATIONS } from "./config/config-migrations";
export {
	assertConfigKey,
	assertResettableKey,
	assertSettableKey,
	CONFIG_KEYS,
	configValueKind,
	isConfigKey,
	readConfigKey,
	RESETTABLE_CONFIG_KEYS,
} from "./config/config-keys";
export type {
	ConfigKey,
	ConfigValueKind,
	ConfigValues,
	ResettableConfigKey,
	SettableConfigKey,
} from "./config/config-keys";
export { ConfigStore, createDefaultConfig } from "./config/config-store";
export type { ConfigKeyValue, ConfigStoreOptions, InitializeOptions } from "./config/config-store";
export { assertValidConfig, validate, validateWith } from "./config/schema-validator";
export type { ValidationResult } from "./config/schema-validator";
export {
	buildExtensionEnv,
	CommandDispatcher,
	FORWARDED_SIGNALS,
	HELD_SIGNALS,
} from "./dispatch/command-dispatcher";
export type { CommandDispatcherDeps } from "./dispatch/command-dispatcher";
export { SIGNAL_EXIT_CODE } from "./dispatch/dispatch-types";
export type { DispatchContext, ExitStatus } from "./dispatch/dispatch-types";
export {
	AppError,
	CommandNotFoundError,
	exitCodeForError,
	isAppError,
	SchemaError,
} from "./errors";
export type { AppErrorCode, SchemaIssue } from "./errors";
export { HttpArtifactFetcher } from "./extensions/artifact-fetcher";
export type { ArtifactFetcher } from "./extensions/artifact-fetcher";
export { ExtensionInstaller } from "./extensions/extension-installer";
export { ExtensionRegistry } from "./extensions/extension-registry";
export type {
	AssetDescriptor,
	CommandOwner,
	InstalledExtension,
	InstallResult,
	InstallSource,
	ScanResult,
	ScanWarning,
} from "./extensions/extension-types";
export type { ExtensionCommand, ExtensionManifest } from "./extensions/manifest-schema";
export type { ArtifactFormat, TargetTriple } from "./extensions/platform-resolver";
export { loadManifest, parseManifest } from "./extensions/manifest-schema";
export { currentTarget, resolveTarget, SUPPORTED_TARGETS } from "./extensions/platform-resolver";
export { createLogger } from "./logger";
export { normalizeTags, ProjectRegistry } from "./projects/project-registry";
export type {
	AccessInfo,
	AddProjectOptions,
	ProjectFilter,
	ProjectMetadataPatch,
	ProjectSort,
	TagCount,
} from "./projects/project-types";
export { loadRuntimeConfig, resolveMachineId } from "./runtime-config";
export type { RuntimeConfig } from "./runtime-config";
export { VERSION };

export interface Core {
	config: RuntimeConfig;
	configStore: ConfigStore;
	projects: ProjectRegistry;
	extensions: ExtensionRegistry;
	installer: ExtensionInstaller;
	dispatcher: CommandDispatcher;
}

/** Wire every component from the runtime configuration. */
export function createCore(config: RuntimeConfig = loadRuntimeConfig()): Core {
	const configStore = new ConfigStore({ filePath: config.configPath });
	const projects = new ProjectRegistry(configStore, { machineId: config.machineId });
	const extensions = new ExtensionRegistry({ extensionsDir: config.extensionsDir });
	const installer = new ExtensionInstaller({
		extensionsDir: config.extensionsDir,
		releaseBaseUrl: config.releaseBaseUrl,
		fetcher: new HttpArtifactFetcher({
			timeoutMs: config.fetchTimeoutMs,
			retries: config.fetchRetries,
			userAgent: `switchyard/${VERSION}`,
		}),
	});
	const dispatcher = new CommandDispatcher(extensions, projects, {
		configPath: config.configPath,
	});
	return { config, configStore, projects, extensions, installer, dispatcher };
}
