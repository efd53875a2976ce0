import { z } from "zod";
import type { TrackerConfig } from "../configSchema.js";
import { errorMessage, TargetError, type TargetStage } from "../errors.js";
import { request } from "../http.js";
import { Label } from "../logger.js";
import { isVideoContentType } from "../release.js";
import { type Result, resultOf, resultOfErr } from "../Result.js";
import {
	episodeTag,
	isStandardDefinition,
	toTargetError,
	torrentBlob,
} from "./common.js";
import type {
	CatalogEntry,
	CatalogQuery,
	PreflightQuery,
	PreflightResult,
	SubmitReceipt,
	Tracker,
	TrackerContext,
	UploadPayload,
} from "./Tracker.js";

const PREFLIGHT_PAGE_SIZE = 10;
const CATALOG_PAGE_SIZE = 25;

const FILTER_RESPONSE_SCHEMA = z.object({
	data: z.array(
		z.object({
			attributes: z.object({
				name: z.string(),
				size: z.number().optional(),
				download_link: z.string().optional(),
			}),
		}),
	),
});

const UPLOAD_RESPONSE_SCHEMA = z.object({
	success: z.boolean(),
	data: z.unknown().optional(),
	message: z.string().optional(),
});

type FilterResult = z.infer<typeof FILTER_RESPONSE_SCHEMA>["data"][number];

/**
 * UNIT3D's name filter treats spaces as wildcards.
 */
export function searchTerm(name: string): string {
	return name.replace(/[._]/g, " ").replace(/\s+/g, " ").trim();
}

function flag(value: boolean): string {
	return value ? "1" : "0";
}

function matchesEpisode(name: string, tag: string | undefined): boolean {
	return !tag || name.toUpperCase().includes(tag);
}

/**
 * A UNIT3D tracker's JSON API: torrents/filter for duplicates and catalog
 * search, torrents/upload for submissions.
 */
export default class Unit3d implements Tracker {
	readonly name: string;
	private readonly baseUrl: string;

	constructor(
		readonly config: TrackerConfig,
		private readonly context: TrackerContext,
	) {
		this.name = config.name;
		this.baseUrl = config.url.replace(/\/+$/, "");
	}

	private get httpContext() {
		return {
			logger: this.context.logger,
			label: Label.UNIT3D,
			fetch: this.context.fetch,
		};
	}

	private async filter(
		params: Record<string, string>,
		stage: TargetStage,
	): Promise<Result<FilterResult[], TargetError | "conflict">> {
		const url = new URL(`${this.baseUrl}/api/torrents/filter`);
		url.search = new URLSearchParams({
			...params,
			api_token: this.config.apiKey,
		}).toString();
		const res = await request(
			url.toString(),
			{ headers: { Accept: "application/json" } },
			this.context.policy,
			this.httpContext,
		);
		if (res.isErr()) {
			const error = res.unwrapErr();
			if (error.status === 409) return resultOfErr("conflict");
			return resultOfErr(toTargetError(this.name, stage, error));
		}
		let body: unknown;
		try {
			body = await res.unwrap().json();
		} catch (e) {
			return resultOfErr(
				new TargetError(this.name, stage, `invalid JSON: ${errorMessage(e)}`),
			);
		}
		const parsed = FILTER_RESPONSE_SCHEMA.safeParse(body);
		if (!parsed.success) {
			return resultOfErr(
				new TargetError(
					this.name,
					stage,
					`unexpected filter response: ${parsed.error.issues[0]?.message}`,
				),
			);
		}
		return resultOf(parsed.data.data);
	}

	async preflight(
		query: PreflightQuery,
	): Promise<Result<PreflightResult, TargetError>> {
		const { release, contentType, identity, uploadName } = query;
		const params: Record<string, string> = {
			name: searchTerm(uploadName),
			perPage: String(PREFLIGHT_PAGE_SIZE),
		};
		const { tmdb, imdb, tvdb } = identity.identifiers;
		if (tmdb) params.tmdbId = tmdb.id;
		if (imdb) params.imdbId = imdb.id;
		if (tvdb) params.tvdbId = tvdb.id;
		const { season, episode } = release.parsed;
		const tag = isVideoContentType(contentType)
			? episodeTag(season, episode)
			: undefined;
		if (tag) {
			params.seasonNumber = String(season);
			params.episodeNumber = String(episode);
		}

		const res = await this.filter(params, "preflight");
		if (res.isErr()) {
			const error = res.unwrapErr();
			if (error === "conflict") {
				return resultOf({ duplicate: true, checked: true, matches: [] });
			}
			return resultOfErr(error);
		}
		const matches = res
			.unwrap()
			.map((result) => result.attributes.name)
			.filter((name) => matchesEpisode(name, tag));
		this.context.logger.verbose({
			label: Label.UNIT3D,
			message: `${this.name}: ${matches.length} existing upload(s) for ${uploadName}`,
		});
		return resultOf({ duplicate: matches.length > 0, checked: true, matches });
	}

	async submit(
		payload: UploadPayload,
	): Promise<Result<SubmitReceipt, TargetError>> {
		const form = new FormData();
		form.append(
			"torrent",
			torrentBlob(payload.torrent.encode()),
			`${payload.torrentFilename}.torrent`,
		);
		form.append("name", payload.name);
		form.append("description", payload.description);
		form.append("mediainfo", payload.mediainfo ?? "");
		if (payload.nfo) {
			form.append(
				"nfo",
				new Blob([new Uint8Array(payload.nfo.content)]),
				payload.nfo.filename,
			);
		}
		form.append("category_id", String(payload.categoryId));
		if (payload.typeId !== undefined) form.append("type_id", String(payload.typeId));
		if (payload.resolutionId !== undefined) {
			form.append("resolution_id", String(payload.resolutionId));
		}
		form.append("tmdb", payload.identifiers.tmdb ?? "0");
		form.append("imdb", payload.identifiers.imdb ?? "0");
		form.append("tvdb", payload.identifiers.tvdb ?? "0");
		form.append("mal", "0");
		form.append("igdb", "0");
		if (payload.season !== undefined) {
			form.append("season_number", String(payload.season));
			form.append("episode_number", String(payload.episode ?? 0));
		}
		form.append("anonymous", flag(payload.anonymous));
		form.append("personal_release", "0");
		form.append("stream", "0");
		form.append("sd", flag(isStandardDefinition(payload.resolution)));

		const url = new URL(`${this.baseUrl}/api/torrents/upload`);
		url.searchParams.set("api_token", this.config.apiKey);
		const res = await request(
			url.toString(),
			{ method: "POST", body: form, headers: { Accept: "application/json" } },
			{ ...this.context.policy, retries: 0 },
			this.httpContext,
		);
		if (res.isErr()) return resultOfErr(toTargetError(this.name, "submit", res.unwrapErr()));

		let body: unknown;
		try {
			body = await res.unwrap().json();
		} catch (e) {
			return resultOfErr(
				new TargetError(this.name, "submit", `invalid JSON: ${errorMessage(e)}`),
			);
		}
		const parsed = UPLOAD_RESPONSE_SCHEMA.safeParse(body);
		if (!parsed.success || !parsed.data.success) {
			return resultOfErr(
				new TargetError(
					this.name,
					"submit",
					parsed.success
						? parsed.data.message ?? "upload rejected"
						: "unexpected upload response",
				),
			);
		}
		const { data, message } = parsed.data;
		return resultOf({
			message: message ?? "uploaded",
			url: typeof data === "string" ? data : undefined,
		});
	}

	async searchCatalog(
		query: CatalogQuery,
	): Promise<Result<CatalogEntry[], TargetError>> {
		const res = await this.filter(
			{ name: searchTerm(query.name), perPage: String(CATALOG_PAGE_SIZE) },
			"preflight",
		);
		if (res.isErr()) {
			const error = res.unwrapErr();
			return error === "conflict" ? resultOf([]) : resultOfErr(error);
		}
		const tag = episodeTag(query.season, query.episode);
		return resultOf(
			res
				.unwrap()
				.filter((result) => matchesEpisode(result.attributes.name, tag))
				.flatMap(({ attributes }) =>
					attributes.download_link
						? [
								{
									tracker: this.name,
									name: attributes.name,
									downloadUrl: attributes.download_link,
									size: attributes.size,
								},
							]
						: [],
				),
		);
	}

	async downloadTorrent(
		entry: CatalogEntry,
	): Promise<Result<Buffer, TargetError>> {
		const res = await request(
			entry.downloadUrl,
			{},
			this.context.policy,
			this.httpContext,
		);
		if (res.isErr()) {
			return resultOfErr(toTargetError(this.name, "preflight", res.unwrapErr()));
		}
		return resultOf(Buffer.from(await res.unwrap().arrayBuffer()));
	}
}
