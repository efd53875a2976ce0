import { vi } from "vitest";
import type { TrackerConfig } from "../../src/configSchema.js";
import { ContentType, TrackerKind } from "../../src/constants.js";
import type { TargetError } from "../../src/errors.js";
import { type Result, resultOf } from "../../src/Result.js";
import type {
	PreflightQuery,
	PreflightResult,
	SubmitReceipt,
	Tracker,
	UploadPayload,
} from "../../src/trackers/Tracker.js";
import { metafileFactory } from "./metafile.js";

export const trackerConfigFactory = (
	overrides: Partial<TrackerConfig> = {},
): TrackerConfig => {
	const name = overrides.name ?? "alpha";
	return {
		name,
		kind: TrackerKind.UNIT3D,
		url: `https://${name}.test`,
		apiKey: "test-secret",
		announceUrl: `https://${name}.test/announce/test-passkey`,
		requirePrivate: true,
		anonymous: false,
		categories: {
			[ContentType.MOVIE]: { categoryId: 1, typeId: 2 },
			[ContentType.TV]: { categoryId: 2, typeId: 2 },
		},
		...overrides,
	};
};

export const payloadFactory = (overrides: Partial<UploadPayload> = {}): UploadPayload => ({
	name: "Some.Movie.2020.1080p.BluRay.x264-GROUP",
	contentType: ContentType.MOVIE,
	description: "description",
	torrent: metafileFactory(),
	torrentFilename: "[alpha] Some.Movie.2020.1080p.BluRay.x264-GROUP",
	categoryId: 1,
	typeId: 2,
	identifiers: {},
	anonymous: false,
	...overrides,
});

/**
 * A tracker that finds no duplicates and accepts every upload until told
 * otherwise.
 */
export class FakeTracker implements Tracker {
	readonly name: string;
	readonly preflight = vi.fn(
		async (query: PreflightQuery): Promise<Result<PreflightResult, TargetError>> =>
			resultOf({ duplicate: false, checked: query.uploadName.length > 0, matches: [] }),
	);
	readonly submit = vi.fn(
		async (payload: UploadPayload): Promise<Result<SubmitReceipt, TargetError>> =>
			resultOf({
				message: `uploaded ${payload.name}`,
				url: `https://${this.name}.test/torrents/1`,
			}),
	);

	constructor(readonly config: TrackerConfig) {
		this.name = config.name;
	}
}
