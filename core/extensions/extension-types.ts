import type { ExtensionManifest } from "./manifest-schema";
import type { ArtifactFormat, TargetTriple } from "./platform-resolver";

export type { ExtensionCommand, ExtensionManifest } from "./manifest-schema";
export type { ArtifactFormat, TargetTriple } from "./platform-resolver";

/** Where a release artifact lives and what it is called. */
export interface AssetDescriptor {
	url: string;
	expectedFilename: string;
	format: ArtifactFormat;
	target: TargetTriple;
	/** `<url>.sha256`; a 404 there means no checksum is published */
	checksumUrl: string;
	/** Release-level `manifest.json`; fetched only for raw binaries */
	manifestUrl: string;
}

export type InstallSource =
	| { kind: "remote"; version: string; format?: ArtifactFormat }
	| { kind: "local"; path: string };

export interface InstallResult {
	name: string;
	version: string;
	/** `extensionsDir/<name>`, the path the dispatcher resolves */
	installDir: string;
	/** The versioned directory `installDir` points at */
	storeDir: string;
	binaryPath: string;
	manifest: ExtensionManifest;
}

/** Derived from disk on every scan; never persisted. */
export interface InstalledExtension {
	name: string;
	installDir: string;
	binaryPath: string;
	manifest: ExtensionManifest;
}

export interface ScanWarning {
	name: string;
	path: string;
	reason: string;
}

export interface ScanResult {
	extensions: Map<string, InstalledExtension>;
	warnings: ScanWarning[];
}

/** Which extension owns a command, for listing. */
export interface CommandOwner {
	command: string;
	extension: string;
	help: string;
}
