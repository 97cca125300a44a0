import { randomUUID } from "node:crypto";
import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { AppError, errnoCode, errorMessage } from "../errors";
import { createLogger } from "../logger";
import type { StoreConfig } from "./store-types";

const log = createLogger("json-store");

/**
 * Single JSON document on disk. Reads decode through the supplied function;
 * writes are atomic (temp file in the same directory, fsync, rename).
 */
export class JsonStore<T> {
	private readonly config: StoreConfig;
	private readonly decode: (raw: unknown) => T;

	constructor(config: StoreConfig, decode: (raw: unknown) => T) {
		this.config = config;
		this.decode = decode;
	}

	get filePath(): string {
		return this.config.filePath;
	}

	/** Read and decode. Fails NOT_FOUND, PARSE_ERROR or IO_ERROR. */
	async read(): Promise<T> {
		const filePath = this.config.filePath;
		let raw: string;
		try {
			raw = await readFile(filePath, "utf-8");
		} catch (err: unknown) {
			if (errnoCode(err) === "ENOENT") {
				throw new AppError("NOT_FOUND", `File not found: ${filePath}`, {
					cause: err,
					context: { path: filePath },
				});
			}
			throw new AppError("IO_ERROR", `Could not read ${filePath}: ${errorMessage(err)}`, {
				cause: err,
				context: { path: filePath },
			});
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (err: unknown) {
			throw new AppError("PARSE_ERROR", `Malformed JSON in ${filePath}: ${errorMessage(err)}`, {
				cause: err,
				context: { path: filePath },
			});
		}
		return this.decode(parsed);
	}

	/** Persist atomically. A concurrent reader sees either the old or the new document. */
	async write(data: T): Promise<void> {
		const filePath = this.config.filePath;
		try {
			await this.atomicWrite(data);
		} catch (err: unknown) {
			if (err instanceof AppError) {
				throw err;
			}
			throw new AppError("IO_ERROR", `Could not write ${filePath}: ${errorMessage(err)}`, {
				cause: err,
				context: { path: filePath },
			});
		}
	}

	private async atomicWrite(data: T): Promise<void> {
		const filePath = this.config.filePath;
		const dir = dirname(filePath);
		await mkdir(dir, { recursive: true });

		// Unique per writer so two processes never share a temp file.
		const tmpPath = `${filePath}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
		const handle = await open(tmpPath, "w", this.config.fileMode ?? 0o644);
		try {
			try {
				await handle.writeFile(`${JSON.stringify(data, null, 2)}\n`, "utf-8");
				await handle.sync();
			} finally {
				await handle.close();
			}
			await rename(tmpPath, filePath);
		} catch (err: unknown) {
			await rm(tmpPath, { force: true });
			throw err;
		}
		await this.syncDirectory(dir);
	}

	/** Make the rename itself durable. Not supported for directories on Windows. */
	private async syncDirectory(dir: string): Promise<void> {
		if (process.platform === "win32") {
			return;
		}
		try {
			const handle = await open(dir, "r");
			try {
				await handle.sync();
			} finally {
				await handle.close();
			}
		} catch (err: unknown) {
			log.debug({ dir, err: errorMessage(err) }, "directory fsync skipped");
		}
	}
}
