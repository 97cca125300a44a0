import { setTimeout as sleep } from "node:timers/promises";
import { AppError, errorMessage } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("artifact-fetcher");

/**
 * Source of release artifacts. Resolves `null` when the server reports the
 * artifact does not exist, so optional assets (checksums) can be probed.
 */
export interface ArtifactFetcher {
	fetch(url: string): Promise<Buffer | null>;
}

export interface HttpArtifactFetcherOptions {
	timeoutMs: number;
	/** Extra attempts after the first */
	retries: number;
	/** First back-off delay; doubles per attempt */
	backoffMs?: number;
	fetchImpl?: typeof fetch;
	userAgent?: string;
}

class RetryableError extends Error {}

/**
 * GET over HTTPS with a per-attempt timeout. Network errors, timeouts and
 * 5xx responses are retried with exponential back-off; a 404 is not.
 */
export class HttpArtifactFetcher implements ArtifactFetcher {
	private readonly timeoutMs: number;
	private readonly retries: number;
	private readonly backoffMs: number;
	private readonly fetchImpl: typeof fetch;
	private readonly userAgent: string;

	constructor(options: HttpArtifactFetcherOptions) {
		this.timeoutMs = options.timeoutMs;
		this.retries = options.retries;
		this.backoffMs = options.backoffMs ?? 500;
		this.fetchImpl = options.fetchImpl ?? fetch;
		this.userAgent = options.userAgent ?? "switchyard";
	}

	async fetch(url: string): Promise<Buffer | null> {
		let lastError = "no attempt made";
		for (let attempt = 0; attempt <= this.retries; attempt++) {
			if (attempt > 0) {
				await sleep(this.backoffMs * 2 ** (attempt - 1));
			}
			log.debug({ url, attempt }, "fetching artifact");
			try {
				return await this.attempt(url);
			} catch (err: unknown) {
				if (!(err instanceof RetryableError)) {
					throw err;
				}
				lastError = err.message;
				log.debug({ url, attempt, err: lastError }, "fetch attempt failed");
			}
		}
		throw new AppError(
			"DOWNLOAD_FAILED",
			`Download failed after ${this.retries + 1} attempts: ${url} (${lastError})`,
			{ context: { url } },
		);
	}

	private async attempt(url: string): Promise<Buffer | null> {
		let response: Response;
		try {
			response = await this.fetchImpl(url, {
				headers: { "User-Agent": this.userAgent },
				redirect: "follow",
				signal: AbortSignal.timeout(this.timeoutMs),
			});
		} catch (err: unknown) {
			throw new RetryableError(errorMessage(err));
		}

		if (response.status === 404) {
			return null;
		}
		if (response.status >= 500) {
			throw new RetryableError(`HTTP ${response.status}`);
		}
		if (!response.ok) {
			throw new AppError("DOWNLOAD_FAILED", `Download failed: ${url} (HTTP ${response.status})`, {
				context: { url, status: response.status },
			});
		}

		try {
			return Buffer.from(await response.arrayBuffer());
		} catch (err: unknown) {
			throw new RetryableError(errorMessage(err));
		}
	}
}
