import { distance } from "fastest-levenshtein";
import { ContentType, IdentifierKind, ServiceStatus } from "../constants.js";
import { type RequestError, RequestFailure } from "../http.js";
import type { Result } from "../Result.js";
import { normalizeTitle } from "../utils.js";

export interface IdentityQuery {
	contentType: ContentType;
	title: string;
	year?: number;
	season?: number;
	episode?: number;
	author?: string;
}

export interface BookDetails {
	title: string;
	authors: string[];
	year?: number;
	coverId?: number;
}

export interface IdentityCandidate {
	service: string;
	kind: IdentifierKind;
	id: string;
	title: string;
	year?: number;
	/**
	 * How well this candidate matches the query, 0 to 1.
	 */
	confidence: number;
	book?: BookDetails;
}

export interface ServiceFailure {
	status: ServiceStatus.TIMEOUT | ServiceStatus.UNREACHABLE;
	message: string;
}

export type ServiceResult = Result<IdentityCandidate[], ServiceFailure>;

/**
 * A metadata lookup service. Implementations never throw for network or
 * service errors, they return a {@link ServiceFailure}.
 */
export interface IdentificationService {
	readonly name: string;
	supports(contentType: ContentType): boolean;
	search(query: IdentityQuery): Promise<ServiceResult>;
	/**
	 * Identifiers of other kinds linked to one this service resolved, such
	 * as the IMDb id of a TMDB movie.
	 */
	expand?(
		identifier: { kind: IdentifierKind; id: string; title: string; confidence: number },
		query: IdentityQuery,
	): Promise<ServiceResult>;
}

export function toServiceFailure(error: RequestError): ServiceFailure {
	return {
		status:
			error.failure === RequestFailure.TIMEOUT
				? ServiceStatus.TIMEOUT
				: ServiceStatus.UNREACHABLE,
		message: error.status
			? `${error.message}${error.body ? ` - ${error.body}` : ""}`
			: error.message,
	};
}

export function titleSimilarity(a: string, b: string): number {
	const left = normalizeTitle(a);
	const right = normalizeTitle(b);
	const maxLength = Math.max(left.length, right.length);
	if (maxLength === 0) return 0;
	return 1 - distance(left, right) / maxLength;
}

function yearFactor(queryYear?: number, candidateYear?: number): number {
	if (queryYear === undefined || candidateYear === undefined) return 0.85;
	const diff = Math.abs(queryYear - candidateYear);
	return diff === 0 ? 1 : diff === 1 ? 0.9 : 0.6;
}

/**
 * Confidence of a search result: title similarity scaled by how well the
 * years agree. Rounded to three decimals.
 */
export function scoreCandidate(
	query: { title: string; year?: number },
	candidate: { title: string; year?: number },
): number {
	const score =
		titleSimilarity(query.title, candidate.title) *
		yearFactor(query.year, candidate.year);
	return Math.round(score * 1000) / 1000;
}

export function parseYear(date: string | undefined | null): number | undefined {
	const year = date ? parseInt(date.slice(0, 4)) : NaN;
	return Number.isNaN(year) ? undefined : year;
}
