import { z } from "zod";
import { ContentType, IdentifierKind, ServiceStatus } from "../constants.js";
import { errorMessage } from "../errors.js";
import { request, type RetryPolicy } from "../http.js";
import { Label, type Logger } from "../logger.js";
import { isVideoContentType } from "../release.js";
import { type Result, resultOf, resultOfErr } from "../Result.js";
import {
	type IdentificationService,
	type IdentityCandidate,
	type IdentityQuery,
	parseYear,
	scoreCandidate,
	type ServiceFailure,
	type ServiceResult,
	toServiceFailure,
} from "./IdentificationService.js";

const MAX_RESULTS = 5;

const SEARCH_RESPONSE_SCHEMA = z.object({
	results: z.array(
		z.object({
			id: z.number().int(),
			title: z.string().optional(),
			name: z.string().optional(),
			release_date: z.string().nullish(),
			first_air_date: z.string().nullish(),
		}),
	),
});

const EXTERNAL_IDS_SCHEMA = z.object({
	imdb_id: z.string().nullish(),
	tvdb_id: z.number().int().nullish(),
});

export interface TMDBOptions {
	apiKey: string;
	policy: RetryPolicy;
	logger: Logger;
	baseUrl?: string;
	fetch?: typeof fetch;
}

function mediaPath(contentType: ContentType): "movie" | "tv" {
	return contentType === ContentType.MOVIE ? "movie" : "tv";
}

/**
 * The Movie Database v3 API. Searches movies and shows and links TMDB ids
 * to their IMDb and TVDB ids.
 */
export class TMDB implements IdentificationService {
	readonly name = "tmdb";
	private readonly baseUrl: string;

	constructor(private readonly options: TMDBOptions) {
		this.baseUrl = (options.baseUrl ?? "https://api.themoviedb.org/3").replace(
			/\/+$/,
			"",
		);
	}

	supports(contentType: ContentType): boolean {
		return isVideoContentType(contentType);
	}

	private async getJson(
		path: string,
		params: Record<string, string>,
	): Promise<Result<unknown, ServiceFailure>> {
		const url = new URL(`${this.baseUrl}${path}`);
		url.search = new URLSearchParams({
			...params,
			api_key: this.options.apiKey,
		}).toString();
		const res = await request(
			url.toString(),
			{ headers: { Accept: "application/json" } },
			this.options.policy,
			{ logger: this.options.logger, label: Label.TMDB, fetch: this.options.fetch },
		);
		if (res.isErr()) return resultOfErr(toServiceFailure(res.unwrapErr()));
		try {
			return resultOf(await res.unwrap().json());
		} catch (e) {
			return resultOfErr({
				status: ServiceStatus.UNREACHABLE,
				message: `invalid JSON from ${path}: ${errorMessage(e)}`,
			});
		}
	}

	async search(query: IdentityQuery): Promise<ServiceResult> {
		const kind = mediaPath(query.contentType);
		const params: Record<string, string> = { query: query.title };
		if (query.year !== undefined) {
			params[kind === "movie" ? "year" : "first_air_date_year"] = String(
				query.year,
			);
		}
		const res = await this.getJson(`/search/${kind}`, params);
		if (res.isErr()) return resultOfErr(res.unwrapErr());
		const parsed = SEARCH_RESPONSE_SCHEMA.safeParse(res.unwrap());
		if (!parsed.success) {
			return resultOfErr({
				status: ServiceStatus.UNREACHABLE,
				message: `unexpected search response: ${parsed.error.issues[0]?.message}`,
			});
		}
		const candidates: IdentityCandidate[] = parsed.data.results
			.slice(0, MAX_RESULTS)
			.map((result) => {
				const title = result.title ?? result.name ?? "";
				const year = parseYear(result.release_date ?? result.first_air_date);
				return {
					service: this.name,
					kind: IdentifierKind.TMDB,
					id: String(result.id),
					title,
					year,
					confidence: scoreCandidate(query, { title, year }),
				};
			});
		this.options.logger.verbose({
			label: Label.TMDB,
			message: `${candidates.length} result(s) for ${kind} "${query.title}"${query.year ? ` (${query.year})` : ""}`,
		});
		return resultOf(candidates);
	}

	async expand(
		identifier: { kind: IdentifierKind; id: string; title: string; confidence: number },
		query: IdentityQuery,
	): Promise<ServiceResult> {
		if (identifier.kind !== IdentifierKind.TMDB) return resultOf([]);
		const kind = mediaPath(query.contentType);
		const res = await this.getJson(`/${kind}/${identifier.id}/external_ids`, {});
		if (res.isErr()) return resultOfErr(res.unwrapErr());
		const parsed = EXTERNAL_IDS_SCHEMA.safeParse(res.unwrap());
		if (!parsed.success) {
			return resultOfErr({
				status: ServiceStatus.UNREACHABLE,
				message: `unexpected external_ids response: ${parsed.error.issues[0]?.message}`,
			});
		}
		const { imdb_id, tvdb_id } = parsed.data;
		const linked: IdentityCandidate[] = [];
		if (imdb_id) {
			linked.push({
				service: this.name,
				kind: IdentifierKind.IMDB,
				id: imdb_id.replace(/^tt/, ""),
				title: identifier.title,
				confidence: identifier.confidence,
			});
		}
		if (tvdb_id) {
			linked.push({
				service: this.name,
				kind: IdentifierKind.TVDB,
				id: String(tvdb_id),
				title: identifier.title,
				confidence: identifier.confidence,
			});
		}
		return resultOf(linked);
	}
}
