import { mkdir, open, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { errnoCode, errorMessage } from "../errors";
import { createLogger } from "../logger";
import type { FileLockOptions } from "./store-types";

const log = createLogger("file-lock");

export const DEFAULT_LOCK_OPTIONS: FileLockOptions = {
	timeoutMs: 2_000,
	staleMs: 10_000,
	retryMs: 25,
};

/**
 * Advisory lock around a critical section. Narrows the lost-update window
 * between concurrent invocations; when the lock cannot be taken the section
 * still runs, since the atomic write keeps the file itself consistent.
 */
export async function withFileLock<T>(
	lockPath: string,
	fn: () => Promise<T>,
	options: FileLockOptions = DEFAULT_LOCK_OPTIONS,
): Promise<T> {
	const acquired = await acquireLock(lockPath, options);
	try {
		return await fn();
	} finally {
		if (acquired) {
			await rm(lockPath, { force: true });
		}
	}
}

async function acquireLock(
	lockPath: string,
	options: FileLockOptions,
): Promise<boolean> {
	await mkdir(dirname(lockPath), { recursive: true });
	const startedAt = Date.now();

	for (;;) {
		try {
			const handle = await open(lockPath, "wx");
			try {
				await handle.writeFile(`${process.pid}\n`, "utf-8");
			} finally {
				await handle.close();
			}
			return true;
		} catch (err: unknown) {
			if (errnoCode(err) !== "EEXIST") {
				log.warn({ lockPath, err: errorMessage(err) }, "lock unavailable, continuing without it");
				return false;
			}
		}

		if (await isStale(lockPath, options.staleMs)) {
			log.warn({ lockPath }, "removing stale lock");
			await rm(lockPath, { force: true });
			continue;
		}

		if (Date.now() - startedAt >= options.timeoutMs) {
			log.warn({ lockPath, timeoutMs: options.timeoutMs }, "lock wait timed out, continuing without it");
			return false;
		}
		await sleep(options.retryMs);
	}
}

async function isStale(lockPath: string, staleMs: number): Promise<boolean> {
	try {
		const info = await stat(lockPath);
		return Date.now() - info.mtimeMs > staleMs;
	} catch (err: unknown) {
		// Released between our open and stat; the next attempt will take it.
		if (errnoCode(err) === "ENOENT") {
			return false;
		}
		throw err;
	}
}
