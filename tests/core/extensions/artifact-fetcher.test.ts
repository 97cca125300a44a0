import { describe, expect, it, vi } from "vitest";
import { HttpArtifactFetcher } from "@core/extensions/artifact-fetcher";

const URL_UNDER_TEST = "https://releases.test/hooks/releases/download/v1.0.0/hooks.tar.gz";

function createFetcher(responses: Array<Response | Error>, retries = 2) {
	const fetchImpl = vi.fn<typeof fetch>(async () => {
		const next = responses.shift();
		if (!next) {
			throw new Error("unexpected request");
		}
		if (next instanceof Error) {
			throw next;
		}
		return next;
	});
	const fetcher = new HttpArtifactFetcher({
		timeoutMs: 1_000,
		retries,
		backoffMs: 1,
		fetchImpl,
	});
	return { fetcher, fetchImpl };
}

describe("HttpArtifactFetcher", () => {
	it("returns the body of a successful response", async () => {
		const { fetcher, fetchImpl } = createFetcher([new Response("payload")]);

		const body = await fetcher.fetch(URL_UNDER_TEST);

		expect(body?.toString("utf-8")).toBe("payload");
		expect(fetchImpl).toHaveBeenCalledTimes(1);
		expect(fetchImpl.mock.calls[0]?.[0]).toBe(URL_UNDER_TEST);
	});

	it("returns null for 404 without retrying", async () => {
		const { fetcher, fetchImpl } = createFetcher([new Response("", { status: 404 })]);

		expect(await fetcher.fetch(URL_UNDER_TEST)).toBeNull();
		expect(fetchImpl).toHaveBeenCalledTimes(1);
	});

	it("retries network errors and server errors", async () => {
		const { fetcher, fetchImpl } = createFetcher([
			new TypeError("fetch failed"),
			new Response("", { status: 503 }),
			new Response("third time"),
		]);

		const body = await fetcher.fetch(URL_UNDER_TEST);

		expect(body?.toString("utf-8")).toBe("third time");
		expect(fetchImpl).toHaveBeenCalledTimes(3);
	});

	it("gives up after the configured retries", async () => {
		const { fetcher, fetchImpl } = createFetcher(
			[new Response("", { status: 500 }), new Response("", { status: 502 })],
			1,
		);

		await expect(fetcher.fetch(URL_UNDER_TEST)).rejects.toMatchObject({
			code: "DOWNLOAD_FAILED",
			message: `Download failed after 2 attempts: ${URL_UNDER_TEST} (HTTP 502)`,
			context: { url: URL_UNDER_TEST },
		});
		expect(fetchImpl).toHaveBeenCalledTimes(2);
	});

	it("fails immediately on other client errors", async () => {
		const { fetcher, fetchImpl } = createFetcher([new Response("", { status: 403 })]);

		await expect(fetcher.fetch(URL_UNDER_TEST)).rejects.toMatchObject({
			code: "DOWNLOAD_FAILED",
			message: `Download failed: ${URL_UNDER_TEST} (HTTP 403)`,
		});
		expect(fetchImpl).toHaveBeenCalledTimes(1);
	});
});
