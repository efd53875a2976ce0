import type { Logger } from "./logger.js";

export class UpseedError extends Error {
	constructor(message?: string, options?: ErrorOptions) {
		super(message, options);
		delete this.stack;
	}
}

export class ConfigError extends UpseedError {}

/**
 * The release's content type could not be determined with enough
 * confidence. The caller has to supply an explicit category.
 */
export class ClassificationError extends UpseedError {}

/**
 * Every configured identification service was unreachable.
 */
export class ResolutionError extends UpseedError {}

/**
 * Malformed or invariant-violating torrent data.
 */
export class CodecError extends UpseedError {}

export type TargetStage = "preflight" | "build" | "submit";

export class TargetError extends UpseedError {
	readonly tracker: string;
	readonly stage: TargetStage;
	readonly status?: number;

	constructor(
		tracker: string,
		stage: TargetStage,
		message: string,
		options?: { status?: number; cause?: unknown },
	) {
		super(message, { cause: options?.cause });
		this.tracker = tracker;
		this.stage = stage;
		this.status = options?.status;
	}

	get reason(): string {
		return `${this.stage}: ${this.message}`;
	}
}

export function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}

export function exitOnUpseedErrors(e: unknown, logger?: Logger): never {
	if (e instanceof UpseedError) {
		if (logger) {
			logger.error(e.message);
		} else {
			console.error(e.message);
		}
		process.exit(1);
	}
	throw e;
}
