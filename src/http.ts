import { USER_AGENT } from "./constants.js";
import { errorMessage } from "./errors.js";
import type { Label, Logger } from "./logger.js";
import { Result, resultOf, resultOfErr } from "./Result.js";
import { wait } from "./utils.js";

export enum RequestFailure {
	TIMEOUT = "TIMEOUT",
	NETWORK = "NETWORK",
	RATE_LIMITED = "RATE_LIMITED",
	SERVER_ERROR = "SERVER_ERROR",
	CLIENT_ERROR = "CLIENT_ERROR",
}

export interface RequestError {
	failure: RequestFailure;
	message: string;
	status?: number;
	body?: string;
	retryAfterMs?: number;
}

export type HttpInit = Omit<RequestInit, "headers" | "signal"> & {
	headers?: Record<string, string>;
};

export interface RetryPolicy {
	/**
	 * Extra attempts after the first one, only spent on transient failures.
	 */
	retries: number;
	delayMs: number;
	timeoutMs: number;
	maxDelayMs?: number;
}

export interface HttpContext {
	logger: Logger;
	label: Label;
	fetch?: typeof fetch;
}

const DEFAULT_MAX_DELAY_MS = 30_000;

export function isTransient(failure: RequestFailure): boolean {
	return (
		failure === RequestFailure.NETWORK ||
		failure === RequestFailure.RATE_LIMITED ||
		failure === RequestFailure.SERVER_ERROR
	);
}

function parseRetryAfter(header: string | null): number | undefined {
	if (!header) return undefined;
	const seconds = Number(header);
	if (!Number.isNaN(seconds)) return seconds * 1000;
	const date = Date.parse(header);
	return Number.isNaN(date) ? undefined : Math.max(date - Date.now(), 0);
}

function isTimeoutError(e: unknown): boolean {
	return (
		e instanceof Error &&
		(e.name === "TimeoutError" || e.name === "AbortError")
	);
}

async function readSnippet(response: Response): Promise<string> {
	try {
		const text = await response.text();
		return text.length > 200 ? `${text.slice(0, 200)}...` : text;
	} catch (e) {
		return `<unreadable body: ${errorMessage(e)}>`;
	}
}

async function requestOnce(
	url: string,
	init: HttpInit,
	timeoutMs: number,
	fetchImpl: typeof fetch,
): Promise<Response | RequestError> {
	let response: Response;
	try {
		response = await fetchImpl(url, {
			...init,
			headers: { "User-Agent": USER_AGENT, ...init.headers },
			signal: AbortSignal.timeout(timeoutMs),
		});
	} catch (e) {
		if (isTimeoutError(e)) {
			return {
				failure: RequestFailure.TIMEOUT,
				message: `timed out after ${timeoutMs / 1000}s`,
			};
		}
		return { failure: RequestFailure.NETWORK, message: errorMessage(e) };
	}
	if (response.ok) return response;

	const retryAfterMs = parseRetryAfter(response.headers.get("Retry-After"));
	const body = await readSnippet(response);
	const message = `${response.status} ${response.statusText}`.trim();
	if (response.status === 429) {
		return {
			failure: RequestFailure.RATE_LIMITED,
			status: response.status,
			message,
			body,
			retryAfterMs,
		};
	}
	return {
		failure:
			response.status >= 500
				? RequestFailure.SERVER_ERROR
				: RequestFailure.CLIENT_ERROR,
		status: response.status,
		message,
		body,
		retryAfterMs,
	};
}

/**
 * Performs a request with a per-attempt timeout. Transient failures are
 * retried with exponential backoff, honouring Retry-After. Anything else is
 * returned on the first attempt.
 */
export async function request(
	url: string,
	init: HttpInit,
	policy: RetryPolicy,
	context: HttpContext,
): Promise<Result<Response, RequestError>> {
	const { logger, label } = context;
	const fetchImpl = context.fetch ?? globalThis.fetch;
	const retries = Math.max(policy.retries, 0);
	const maxDelayMs = policy.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
	const method = init.method ?? "GET";
	const target = new URL(url);
	const description = `${method} ${target.origin}${target.pathname}`;

	let error: RequestError | undefined;
	for (let i = 0; i <= retries; i++) {
		const progress = `${i + 1}/${retries + 1}`;
		const result = await requestOnce(url, init, policy.timeoutMs, fetchImpl);
		if (result instanceof Response) {
			if (i > 0) {
				logger.verbose({
					label,
					message: `${description} succeeded on attempt ${progress}`,
				});
			}
			return resultOf(result);
		}
		error = result;
		if (!isTransient(error.failure)) break;
		if (error.retryAfterMs !== undefined && error.retryAfterMs > maxDelayMs) {
			logger.warn({
				label,
				message: `${description} stopped after attempt ${progress}, Retry-After of ${error.retryAfterMs / 1000}s is too long: ${error.message}`,
			});
			break;
		}
		const delayMs = Math.min(
			Math.max(policy.delayMs * 2 ** i, error.retryAfterMs ?? 0),
			maxDelayMs,
		);
		logger.verbose({
			label,
			message: `${description} attempt ${progress} failed${i < retries ? `, retrying in ${delayMs / 1000}s` : ""}: ${error.failure} - ${error.message}`,
		});
		if (i >= retries) break;
		await wait(delayMs);
	}
	return resultOfErr(
		error ?? { failure: RequestFailure.NETWORK, message: "no attempt made" },
	);
}

export function describeRequestError(error: RequestError): string {
	return error.body
		? `${error.message} - ${error.body}`
		: error.message;
}
