import { createHash, randomUUID } from "node:crypto";
import {
	chmod,
	cp,
	lstat,
	mkdir,
	mkdtemp,
	readdir,
	readlink,
	rename,
	rm,
	stat,
	symlink,
	writeFile,
} from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import { AppError, errnoCode, errorMessage } from "../errors";
import { createLogger } from "../logger";
import { withFileLock } from "../store/file-lock";
import type { FileLockOptions } from "../store/store-types";
import type { ArtifactFetcher } from "./artifact-fetcher";
import { archiveKindOf, extractArchive, locateContentRoot } from "./archive-extractor";
import type { AssetDescriptor, InstallResult, InstallSource } from "./extension-types";
import { ExtensionRegistry } from "./extension-registry";
import {
	type ExtensionManifest,
	extensionNameSchema,
	loadManifest,
	MANIFEST_FILENAME,
} from "./manifest-schema";
import {
	type ArtifactFormat,
	artifactFilename,
	currentTarget,
	defaultFormat,
	entryPointPath,
	isWindowsTarget,
	type TargetTriple,
} from "./platform-resolver";

const log = createLogger("extension-installer");

/** Hidden directory under the extensions dir holding versioned installs. */
export const STORE_DIRNAME = ".store";

const SHA256_PATTERN = /^[0-9a-f]{64}$/i;

/** Guards the swap and sweep of one extension; held only for local renames. */
const INSTALL_LOCK_OPTIONS: FileLockOptions = {
	timeoutMs: 10_000,
	staleMs: 30_000,
	retryMs: 25,
};

export interface ExtensionInstallerOptions {
	extensionsDir: string;
	releaseBaseUrl: string;
	fetcher: ArtifactFetcher;
	/** Defaults to the running host */
	target?: TargetTriple;
	/** Lock held while an install or uninstall swaps store entries */
	lock?: FileLockOptions;
}

function shortId(): string {
	return randomUUID().slice(0, 8);
}

function normalizeVersion(version: string): string {
	return version.startsWith("v") ? version.slice(1) : version;
}

function assertExtensionName(name: string): void {
	if (!extensionNameSchema.safeParse(name).success) {
		throw new AppError("INVALID_PATH", `Invalid extension name: '${name}'`, {
			context: { extension: name },
		});
	}
}

async function lstatOrUndefined(path: string) {
	try {
		return await lstat(path);
	} catch (err: unknown) {
		if (errnoCode(err) === "ENOENT") {
			return undefined;
		}
		throw err;
	}
}

/**
 * Fetches, verifies and unpacks extensions, then swaps them into place.
 *
 * Layout: `<extensionsDir>/<name>` is a symlink to
 * `<extensionsDir>/.store/<name>@<version>-<id>/`. A new install is staged in
 * full under `.store` and becomes visible through a single rename of the
 * link, so readers see either the previous or the new version. On Windows
 * targets the directory itself is renamed aside and the new one renamed in.
 *
 * The swap runs under a per-name lock file in the store, after which every
 * other `<name>@*` store entry is removed. Concurrent installs of one name
 * therefore leave a single store directory behind.
 */
export class ExtensionInstaller {
	private readonly extensionsDir: string;
	private readonly releaseBaseUrl: string;
	private readonly fetcher: ArtifactFetcher;
	private readonly target: TargetTriple;
	private readonly lockOptions: FileLockOptions;
	private readonly registry: ExtensionRegistry;

	constructor(options: ExtensionInstallerOptions) {
		this.extensionsDir = resolve(options.extensionsDir);
		this.releaseBaseUrl = options.releaseBaseUrl.replace(/\/+$/, "");
		this.fetcher = options.fetcher;
		this.target = options.target ?? currentTarget();
		this.lockOptions = options.lock ?? INSTALL_LOCK_OPTIONS;
		this.registry = new ExtensionRegistry({
			extensionsDir: this.extensionsDir,
			target: this.target,
		});
	}

	get storeDir(): string {
		return join(this.extensionsDir, STORE_DIRNAME);
	}

	installPath(name: string): string {
		return join(this.extensionsDir, name);
	}

	resolveAsset(
		name: string,
		version: string,
		target: TargetTriple = this.target,
		format: ArtifactFormat = defaultFormat(target),
	): AssetDescriptor {
		const tag = `v${normalizeVersion(version)}`;
		const releaseUrl = `${this.releaseBaseUrl}/${name}/releases/download/${tag}`;
		const expectedFilename = artifactFilename(name, target, format);
		const url = `${releaseUrl}/${expectedFilename}`;
		return {
			url,
			expectedFilename,
			format,
			target,
			checksumUrl: `${url}.sha256`,
			manifestUrl: `${releaseUrl}/${MANIFEST_FILENAME}`,
		};
	}

	/**
	 * Install or replace `name`. On any failure the previously installed
	 * version stays active and staged files are removed. Fails
	 * COMMAND_CONFLICT when another installed extension declares one of the
	 * new manifest's commands.
	 */
	async install(name: string, source: InstallSource): Promise<InstallResult> {
		assertExtensionName(name);
		await mkdir(this.storeDir, { recursive: true });
		const workDir = await mkdtemp(join(this.storeDir, `.staging-${name}-`));

		try {
			const contentDir = join(workDir, "content");
			await mkdir(contentDir);
			if (source.kind === "remote") {
				await this.stageRemote(name, source.version, source.format, workDir, contentDir);
			} else {
				await this.stageLocal(source.path, contentDir);
			}

			const root = await locateContentRoot(contentDir);
			const manifest = await loadManifest(join(root, MANIFEST_FILENAME), name);
			if (source.kind === "remote" && manifest.version !== normalizeVersion(source.version)) {
				throw new AppError(
					"MANIFEST_INVALID",
					`Release ${source.version} of '${name}' carries manifest version ${manifest.version}`,
					{ context: { extension: name } },
				);
			}
			await this.prepareEntryPoint(name, root);
			await this.checkCommandConflicts(name, manifest);

			const { installDir, versionDir } = await withFileLock(
				this.lockPath(name),
				() => this.commit(name, root, manifest.version),
				this.lockOptions,
			);

			log.info({ extension: name, version: manifest.version }, "extension installed");
			return {
				name,
				version: manifest.version,
				installDir,
				storeDir: isWindowsTarget(this.target) ? installDir : versionDir,
				binaryPath: join(installDir, entryPointPath(name, this.target)),
				manifest,
			};
		} finally {
			await rm(workDir, { recursive: true, force: true });
		}
	}

	/** Remote install of another version over an existing one. */
	async update(name: string, version: string): Promise<InstallResult> {
		assertExtensionName(name);
		if (!(await lstatOrUndefined(this.installPath(name)))) {
			throw new AppError("EXTENSION_NOT_FOUND", `Extension not installed: ${name}`, {
				context: { extension: name },
			});
		}
		return this.install(name, { kind: "remote", version });
	}

	async uninstall(name: string): Promise<void> {
		assertExtensionName(name);
		const installDir = this.installPath(name);
		await withFileLock(
			this.lockPath(name),
			async () => {
				const info = await lstatOrUndefined(installDir);
				if (!info) {
					throw new AppError("EXTENSION_NOT_FOUND", `Extension not installed: ${name}`, {
						context: { extension: name },
					});
				}
				await rm(installDir, { recursive: !info.isSymbolicLink(), force: true });
				await this.sweep(name, undefined);
			},
			this.lockOptions,
		);
		log.info({ extension: name }, "extension uninstalled");
	}

	private lockPath(name: string): string {
		return join(this.storeDir, `.${name}.lock`);
	}

	/** Move the verified tree into the store, point `<name>` at it, drop older entries. */
	private async commit(
		name: string,
		root: string,
		version: string,
	): Promise<{ installDir: string; versionDir: string }> {
		const versionDir = join(this.storeDir, `${name}@${version}-${shortId()}`);
		await rename(root, versionDir);
		let installDir: string;
		try {
			installDir = await this.activate(name, versionDir);
		} catch (err: unknown) {
			await rm(versionDir, { recursive: true, force: true });
			throw err;
		}
		await this.sweep(name, await this.activeStoreEntry(name));
		return { installDir, versionDir };
	}

	private async stageRemote(
		name: string,
		version: string,
		format: ArtifactFormat | undefined,
		workDir: string,
		contentDir: string,
	): Promise<void> {
		const asset = this.resolveAsset(name, version, this.target, format);
		const data = await this.fetcher.fetch(asset.url);
		if (data === null) {
			throw new AppError("DOWNLOAD_FAILED", `No release asset at ${asset.url}`, {
				context: { url: asset.url, extension: name },
			});
		}
		if (data.length === 0) {
			throw new AppError("DOWNLOAD_FAILED", `Downloaded artifact is empty: ${asset.url}`, {
				context: { url: asset.url, extension: name },
			});
		}
		await this.verifyChecksum(asset, data);

		if (asset.format === "binary") {
			await this.stageBinary(name, asset, data, contentDir);
			return;
		}
		const archivePath = join(workDir, asset.expectedFilename);
		await writeFile(archivePath, data);
		await extractArchive(archivePath, asset.format, contentDir);
	}

	private async stageBinary(
		name: string,
		asset: AssetDescriptor,
		data: Buffer,
		contentDir: string,
	): Promise<void> {
		const manifestUrl = asset.manifestUrl;
		const manifest = await this.fetcher.fetch(manifestUrl);
		if (manifest === null) {
			throw new AppError("DOWNLOAD_FAILED", `No manifest published at ${manifestUrl}`, {
				context: { url: manifestUrl, extension: name },
			});
		}
		await mkdir(join(contentDir, "bin"));
		await writeFile(join(contentDir, entryPointPath(name, asset.target)), data);
		await writeFile(join(contentDir, MANIFEST_FILENAME), manifest);
	}

	private async stageLocal(sourcePath: string, contentDir: string): Promise<void> {
		const absolute = resolve(sourcePath);
		let isDirectory: boolean;
		try {
			isDirectory = (await stat(absolute)).isDirectory();
		} catch (err: unknown) {
			throw new AppError("INVALID_PATH", `Cannot read install source ${absolute}: ${errorMessage(err)}`, {
				cause: err,
				context: { path: absolute },
			});
		}

		if (isDirectory) {
			await cp(absolute, contentDir, { recursive: true });
			return;
		}
		const kind = archiveKindOf(basename(absolute));
		if (!kind) {
			throw new AppError(
				"INVALID_PATH",
				`Install source must be a directory or a .tar.gz, .tgz or .zip archive: ${absolute}`,
				{ context: { path: absolute } },
			);
		}
		await extractArchive(absolute, kind, contentDir);
	}

	private async verifyChecksum(asset: AssetDescriptor, data: Buffer): Promise<void> {
		const published = await this.fetcher.fetch(asset.checksumUrl);
		if (published === null) {
			log.debug({ url: asset.url }, "no checksum published");
			return;
		}
		const expected = published.toString("utf-8").trim().split(/\s+/)[0] ?? "";
		if (!SHA256_PATTERN.test(expected)) {
			throw new AppError("CHECKSUM_MISMATCH", `Malformed checksum file: ${asset.checksumUrl}`, {
				context: { url: asset.checksumUrl },
			});
		}
		const actual = createHash("sha256").update(data).digest("hex");
		if (actual !== expected.toLowerCase()) {
			throw new AppError(
				"CHECKSUM_MISMATCH",
				`Checksum mismatch for ${asset.url}: expected ${expected.toLowerCase()}, got ${actual}`,
				{ context: { url: asset.url } },
			);
		}
	}

	private async prepareEntryPoint(name: string, root: string): Promise<void> {
		const entryPoint = join(root, entryPointPath(name, this.target));
		let isFile = false;
		try {
			isFile = (await stat(entryPoint)).isFile();
		} catch (err: unknown) {
			if (errnoCode(err) !== "ENOENT") {
				throw err;
			}
		}
		if (!isFile) {
			throw new AppError(
				"EXTRACT_FAILED",
				`Entry point ${entryPointPath(name, this.target)} not found in artifact for '${name}'`,
				{ context: { extension: name, path: entryPoint } },
			);
		}

		if (process.platform === "win32") {
			return;
		}
		try {
			await chmod(entryPoint, 0o755);
		} catch (err: unknown) {
			throw new AppError(
				"PERMISSION_DENIED",
				`Cannot mark ${entryPoint} executable: ${errorMessage(err)}`,
				{ cause: err, context: { path: entryPoint } },
			);
		}
	}

	/** Point `<name>` at `versionDir` in one rename; returns the install path. */
	private async activate(name: string, versionDir: string): Promise<string> {
		const installDir = this.installPath(name);
		const existing = await lstatOrUndefined(installDir);

		if (isWindowsTarget(this.target)) {
			let aside: string | undefined;
			if (existing) {
				aside = join(this.storeDir, `${name}@replaced-${shortId()}`);
				await rename(installDir, aside);
			}
			try {
				await rename(versionDir, installDir);
			} catch (err: unknown) {
				if (aside) {
					await this.restore(aside, installDir);
				}
				throw err;
			}
			return installDir;
		}

		let aside: string | undefined;
		if (existing && !existing.isSymbolicLink()) {
			// A plain directory from a manual copy; a link cannot be renamed over it.
			aside = join(this.storeDir, `${name}@replaced-${shortId()}`);
			await rename(installDir, aside);
		}

		const tmpLink = join(this.extensionsDir, `.${name}.link-${shortId()}`);
		try {
			await symlink(join(STORE_DIRNAME, basename(versionDir)), tmpLink, "dir");
			await rename(tmpLink, installDir);
		} catch (err: unknown) {
			await rm(tmpLink, { force: true });
			if (aside) {
				await this.restore(aside, installDir);
			}
			throw err;
		}
		return installDir;
	}

	private async restore(aside: string, installDir: string): Promise<void> {
		try {
			await rename(aside, installDir);
		} catch (err: unknown) {
			log.warn(
				{ aside, installDir, err: errorMessage(err) },
				"could not restore the previous install",
			);
		}
	}

	/** Store entry the `<name>` link points at; undefined for a plain directory. */
	private async activeStoreEntry(name: string): Promise<string | undefined> {
		const info = await lstatOrUndefined(this.installPath(name));
		if (!info?.isSymbolicLink()) {
			return undefined;
		}
		return basename(await readlink(this.installPath(name)));
	}

	/** Remove every `<name>@*` store entry except `keep`. */
	private async sweep(name: string, keep: string | undefined): Promise<void> {
		const prefix = `${name}@`;
		for (const entry of await readdir(this.storeDir)) {
			if (entry.startsWith(prefix) && entry !== keep) {
				await this.discard(join(this.storeDir, entry));
			}
		}
	}

	/** Best-effort removal of a replaced install. */
	private async discard(dir: string): Promise<void> {
		try {
			await rm(dir, { recursive: true, force: true });
		} catch (err: unknown) {
			log.warn({ dir, err: errorMessage(err) }, "could not remove replaced install");
		}
	}

	private async checkCommandConflicts(name: string, manifest: ExtensionManifest): Promise<void> {
		const declared = new Set(manifest.commands.map((command) => command.name));
		const owners = await this.registry.listCommands();
		const clash = owners.find((owner) => owner.extension !== name && declared.has(owner.command));
		if (clash) {
			throw new AppError(
				"COMMAND_CONFLICT",
				`Command '${clash.command}' is already provided by extension '${clash.extension}'`,
				{ context: { command: clash.command, extension: clash.extension } },
			);
		}
	}
}
