import type { TrackerConfig } from "../configSchema.js";
import { ContentType, Resolution, TrackerKind } from "../constants.js";
import type { TargetError } from "../errors.js";
import type { RetryPolicy } from "../http.js";
import type { Logger } from "../logger.js";
import type { Metafile } from "../parseTorrent.js";
import type { Release } from "../release.js";
import type { IdentitySet } from "../resolve.js";
import type { Result } from "../Result.js";
import TorrentLeech from "./TorrentLeech.js";
import Unit3d from "./Unit3d.js";

export interface PreflightQuery {
	release: Release;
	contentType: ContentType;
	identity: IdentitySet;
	uploadName: string;
}

export interface PreflightResult {
	duplicate: boolean;
	/**
	 * False when the tracker has no way to search before uploading.
	 */
	checked: boolean;
	matches: string[];
}

export interface UploadPayload {
	name: string;
	contentType: ContentType;
	description: string;
	mediainfo?: string;
	nfo?: { filename: string; content: Buffer };
	torrent: Metafile;
	torrentFilename: string;
	categoryId: number;
	typeId?: number;
	resolution?: Resolution;
	resolutionId?: number;
	identifiers: { tmdb?: string; imdb?: string; tvdb?: string };
	season?: number;
	episode?: number;
	anonymous: boolean;
}

export interface SubmitReceipt {
	message: string;
	url?: string;
}

export interface CatalogQuery {
	name: string;
	season?: number;
	episode?: number;
}

export interface CatalogEntry {
	tracker: string;
	name: string;
	downloadUrl: string;
	size?: number;
}

export interface TrackerContext {
	logger: Logger;
	policy: RetryPolicy;
	fetch?: typeof fetch;
}

export interface Tracker {
	readonly name: string;
	readonly config: TrackerConfig;
	preflight(query: PreflightQuery): Promise<Result<PreflightResult, TargetError>>;
	/**
	 * Never retried: an upload that timed out may still have gone through.
	 */
	submit(payload: UploadPayload): Promise<Result<SubmitReceipt, TargetError>>;
	searchCatalog?(query: CatalogQuery): Promise<Result<CatalogEntry[], TargetError>>;
	downloadTorrent?(entry: CatalogEntry): Promise<Result<Buffer, TargetError>>;
}

export function createTracker(
	config: TrackerConfig,
	context: TrackerContext,
): Tracker {
	switch (config.kind) {
		case TrackerKind.UNIT3D:
			return new Unit3d(config, context);
		case TrackerKind.TORRENTLEECH:
			return new TorrentLeech(config, context);
	}
}
