import { z } from "zod";
import { ContentType, IdentifierKind, ServiceStatus } from "../constants.js";
import { errorMessage } from "../errors.js";
import { request, type RetryPolicy } from "../http.js";
import { Label, type Logger } from "../logger.js";
import { resultOf, resultOfErr } from "../Result.js";
import { normalizeTitle } from "../utils.js";
import {
	type IdentificationService,
	type IdentityCandidate,
	type IdentityQuery,
	scoreCandidate,
	type ServiceResult,
	toServiceFailure,
} from "./IdentificationService.js";

const SEARCH_LIMIT = 5;
const AUTHOR_MISMATCH_FACTOR = 0.8;

const SEARCH_RESPONSE_SCHEMA = z.object({
	docs: z.array(
		z.object({
			key: z.string(),
			title: z.string(),
			author_name: z.array(z.string()).optional(),
			first_publish_year: z.number().int().optional(),
			cover_i: z.number().int().optional(),
		}),
	),
});

export interface OpenLibraryOptions {
	policy: RetryPolicy;
	logger: Logger;
	baseUrl?: string;
	fetch?: typeof fetch;
}

export class OpenLibrary implements IdentificationService {
	readonly name = "openlibrary";
	private readonly baseUrl: string;

	constructor(private readonly options: OpenLibraryOptions) {
		this.baseUrl = (options.baseUrl ?? "https://openlibrary.org").replace(
			/\/+$/,
			"",
		);
	}

	supports(contentType: ContentType): boolean {
		return contentType === ContentType.EBOOK;
	}

	async search(query: IdentityQuery): Promise<ServiceResult> {
		const url = new URL(`${this.baseUrl}/search.json`);
		url.searchParams.set("title", query.title);
		if (query.author) url.searchParams.set("author", query.author);
		url.searchParams.set("limit", String(SEARCH_LIMIT));

		const res = await request(
			url.toString(),
			{ headers: { Accept: "application/json" } },
			this.options.policy,
			{
				logger: this.options.logger,
				label: Label.OPEN_LIBRARY,
				fetch: this.options.fetch,
			},
		);
		if (res.isErr()) return resultOfErr(toServiceFailure(res.unwrapErr()));

		let json: unknown;
		try {
			json = await res.unwrap().json();
		} catch (e) {
			return resultOfErr({
				status: ServiceStatus.UNREACHABLE,
				message: `invalid JSON: ${errorMessage(e)}`,
			});
		}
		const parsed = SEARCH_RESPONSE_SCHEMA.safeParse(json);
		if (!parsed.success) {
			return resultOfErr({
				status: ServiceStatus.UNREACHABLE,
				message: `unexpected search response: ${parsed.error.issues[0]?.message}`,
			});
		}

		const wantedAuthor = query.author ? normalizeTitle(query.author) : undefined;
		const candidates: IdentityCandidate[] = parsed.data.docs.map((doc) => {
			const authors = doc.author_name ?? [];
			const score = scoreCandidate(query, {
				title: doc.title,
				year: doc.first_publish_year,
			});
			const authorMatches =
				!wantedAuthor ||
				authors.some((author) => normalizeTitle(author) === wantedAuthor);
			return {
				service: this.name,
				kind: IdentifierKind.OPEN_LIBRARY,
				id: doc.key.replace(/^\/works\//, ""),
				title: doc.title,
				year: doc.first_publish_year,
				confidence: authorMatches
					? score
					: Math.round(score * AUTHOR_MISMATCH_FACTOR * 1000) / 1000,
				book: {
					title: doc.title,
					authors,
					year: doc.first_publish_year,
					coverId: doc.cover_i,
				},
			};
		});
		return resultOf(candidates);
	}
}
