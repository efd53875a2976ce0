import type { ResolutionTable, TrackerConfig } from "../configSchema.js";
import { ContentType, Resolution, TrackerKind } from "../constants.js";
import { TargetError, type TargetStage } from "../errors.js";
import { describeRequestError, type RequestError } from "../http.js";
import type { ContentOverride } from "../release.js";

export interface CategoryChoice {
	categoryId: number;
	typeId?: number;
}

/**
 * Resolution ids every stock UNIT3D install ships with.
 */
export const UNIT3D_RESOLUTIONS: ResolutionTable = {
	[Resolution.R4320P]: 1,
	[Resolution.R2160P]: 2,
	[Resolution.R1440P]: 3,
	[Resolution.R1080P]: 3,
	[Resolution.R1080I]: 4,
	[Resolution.R720P]: 5,
	[Resolution.R576P]: 6,
	[Resolution.R576I]: 7,
	[Resolution.R480P]: 8,
	[Resolution.R480I]: 9,
	[Resolution.OTHER]: 10,
};

/**
 * The category a release goes to on this tracker. A numeric override wins,
 * borrowing the type from the table when the override has none.
 */
export function categoryFor(
	tracker: TrackerConfig,
	contentType: ContentType,
	override?: ContentOverride,
): CategoryChoice | undefined {
	const mapping = tracker.categories[contentType];
	if (override?.categoryId !== undefined) {
		return {
			categoryId: override.categoryId,
			typeId: override.typeId ?? mapping?.typeId,
		};
	}
	return mapping;
}

export function resolutionIdFor(
	tracker: TrackerConfig,
	resolution: Resolution | undefined,
): number | undefined {
	const table =
		tracker.resolutions ??
		(tracker.kind === TrackerKind.UNIT3D ? UNIT3D_RESOLUTIONS : undefined);
	if (!table) return undefined;
	return table[resolution ?? Resolution.OTHER] ?? table[Resolution.OTHER];
}

export function isStandardDefinition(resolution: Resolution | undefined): boolean {
	return (
		resolution === Resolution.R576P ||
		resolution === Resolution.R576I ||
		resolution === Resolution.R480P ||
		resolution === Resolution.R480I
	);
}

export function episodeTag(season?: number, episode?: number): string | undefined {
	if (season === undefined || episode === undefined) return undefined;
	return `S${String(season).padStart(2, "0")}E${String(episode).padStart(2, "0")}`;
}

export function toTargetError(
	tracker: string,
	stage: TargetStage,
	error: RequestError,
): TargetError {
	const description = describeRequestError(error);
	return new TargetError(
		tracker,
		stage,
		error.status !== undefined ? `HTTP ${description}` : description,
		{ status: error.status },
	);
}

export function torrentBlob(torrent: Buffer): Blob {
	return new Blob([new Uint8Array(torrent)], {
		type: "application/x-bittorrent",
	});
}
