import { describe, expect, it, vi } from "vitest";
import { USER_AGENT } from "../src/constants.js";
import {
	describeRequestError,
	isTransient,
	request,
	RequestFailure,
	type RetryPolicy,
} from "../src/http.js";
import { createSilentLogger, Label } from "../src/logger.js";

const TARGET = "https://service.test/api/thing";
const policy: RetryPolicy = { retries: 2, delayMs: 1, timeoutMs: 50 };

function scriptedFetch(...steps: (() => Response)[]) {
	const fetchMock = vi.fn<typeof fetch>();
	for (const step of steps) {
		fetchMock.mockImplementationOnce(async () => step());
	}
	return fetchMock;
}

const ok = () => new Response("fine", { status: 200 });
const status = (code: number, statusText: string, headers?: Record<string, string>) => () =>
	new Response("nope", { status: code, statusText, headers });

const context = (fetchMock: typeof fetch) => ({
	logger: createSilentLogger(),
	label: Label.HTTP,
	fetch: fetchMock,
});

describe("isTransient", () => {
	it("retries network, rate limit and server failures only", () => {
		expect(
			Object.values(RequestFailure).filter((failure) => isTransient(failure)),
		).toEqual([
			RequestFailure.NETWORK,
			RequestFailure.RATE_LIMITED,
			RequestFailure.SERVER_ERROR,
		]);
	});
});

describe("request", () => {
	it("sends the user agent with the caller's headers", async () => {
		const fetchMock = scriptedFetch(ok);
		const result = await request(TARGET, { headers: { Accept: "application/json" } }, policy, context(fetchMock));
		expect(result.isOk() && (await result.unwrap().text())).toBe("fine");
		expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
			"User-Agent": USER_AGENT,
			Accept: "application/json",
		});
	});

	it("retries a server error", async () => {
		const fetchMock = scriptedFetch(status(503, "Service Unavailable"), ok);
		const result = await request(TARGET, {}, policy, context(fetchMock));
		expect(result.isOk()).toBe(true);
		expect(fetchMock).toHaveBeenCalledTimes(2);
	});

	it("retries a network failure", async () => {
		const fetchMock = vi.fn<typeof fetch>();
		fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
		fetchMock.mockResolvedValueOnce(ok());
		const result = await request(TARGET, {}, policy, context(fetchMock));
		expect(result.isOk()).toBe(true);
		expect(fetchMock).toHaveBeenCalledTimes(2);
	});

	it("gives up after the last retry", async () => {
		const failing = status(500, "Internal Server Error");
		const fetchMock = scriptedFetch(failing, failing, failing);
		const result = await request(TARGET, {}, policy, context(fetchMock));
		expect(fetchMock).toHaveBeenCalledTimes(3);
		expect(result.isErr() && result.unwrapErr()).toEqual({
			failure: RequestFailure.SERVER_ERROR,
			status: 500,
			message: "500 Internal Server Error",
			body: "nope",
			retryAfterMs: undefined,
		});
	});

	it("does not retry a client error", async () => {
		const fetchMock = scriptedFetch(status(404, "Not Found"));
		const result = await request(TARGET, {}, policy, context(fetchMock));
		expect(fetchMock).toHaveBeenCalledTimes(1);
		expect(result.isErr() && result.unwrapErr().failure).toBe(RequestFailure.CLIENT_ERROR);
	});

	it("waits out a short Retry-After", async () => {
		const fetchMock = scriptedFetch(status(429, "Too Many Requests", { "Retry-After": "0" }), ok);
		const result = await request(TARGET, {}, policy, context(fetchMock));
		expect(result.isOk()).toBe(true);
		expect(fetchMock).toHaveBeenCalledTimes(2);
	});

	it("stops when Retry-After exceeds the maximum delay", async () => {
		const fetchMock = scriptedFetch(status(429, "Too Many Requests", { "Retry-After": "120" }));
		const result = await request(TARGET, {}, { ...policy, maxDelayMs: 1000 }, context(fetchMock));
		expect(fetchMock).toHaveBeenCalledTimes(1);
		expect(result.isErr() && result.unwrapErr()).toMatchObject({
			failure: RequestFailure.RATE_LIMITED,
			retryAfterMs: 120_000,
		});
	});

	it("reports a timeout without retrying", async () => {
		const fetchMock = vi.fn<typeof fetch>();
		fetchMock.mockRejectedValue(
			Object.assign(new Error("The operation was aborted due to timeout"), {
				name: "TimeoutError",
			}),
		);
		const result = await request(TARGET, {}, policy, context(fetchMock));
		expect(fetchMock).toHaveBeenCalledTimes(1);
		expect(result.isErr() && result.unwrapErr()).toEqual({
			failure: RequestFailure.TIMEOUT,
			message: "timed out after 0.05s",
		});
	});
});

describe("describeRequestError", () => {
	it("appends the body when there is one", () => {
		expect(
			describeRequestError({
				failure: RequestFailure.CLIENT_ERROR,
				message: "400 Bad Request",
				body: "missing name",
			}),
		).toBe("400 Bad Request - missing name");
		expect(
			describeRequestError({ failure: RequestFailure.NETWORK, message: "fetch failed" }),
		).toBe("fetch failed");
	});
});
