import { mkdir, readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import AdmZip from "adm-zip";
import { extract } from "tar";
import { AppError, errorMessage } from "../errors";
import { MANIFEST_FILENAME } from "./manifest-schema";

export type ArchiveKind = "tar.gz" | "zip";

/** Archive kind from a file name, or undefined for anything else. */
export function archiveKindOf(fileName: string): ArchiveKind | undefined {
	const lower = fileName.toLowerCase();
	if (lower.endsWith(".tar.gz") || lower.endsWith(".tgz")) {
		return "tar.gz";
	}
	if (lower.endsWith(".zip")) {
		return "zip";
	}
	return undefined;
}

/**
 * Unpack `archivePath` into `destDir`. Entries escaping the destination
 * are dropped by both libraries.
 */
export async function extractArchive(
	archivePath: string,
	kind: ArchiveKind,
	destDir: string,
): Promise<void> {
	await mkdir(destDir, { recursive: true });
	try {
		if (kind === "zip") {
			const zip = new AdmZip(archivePath);
			zip.extractAllTo(destDir, true, true);
		} else {
			await extract({ file: archivePath, cwd: destDir, strict: true });
		}
	} catch (err: unknown) {
		throw new AppError("EXTRACT_FAILED", `Cannot extract ${archivePath}: ${errorMessage(err)}`, {
			cause: err,
			context: { path: archivePath },
		});
	}
}

/**
 * Directory holding the extension's files. Release archives often wrap
 * everything in one top-level folder; step into it when the root itself
 * has no manifest.
 */
export async function locateContentRoot(dir: string): Promise<string> {
	const entries = await readdir(dir);
	if (entries.includes(MANIFEST_FILENAME) || entries.length !== 1) {
		return dir;
	}
	const [only] = entries;
	if (only === undefined) {
		return dir;
	}
	const candidate = join(dir, only);
	return (await stat(candidate)).isDirectory() ? candidate : dir;
}
