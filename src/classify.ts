import { extname } from "path";
import {
	ALBUM_ART_REGEX,
	AUDIO_EXTENSIONS,
	BOOK_EXTENSIONS,
	BOXSET_REGEX,
	ContentType,
	DISC_FOLDER_REGEX,
	DISC_STRUCTURE_REGEX,
	VIDEO_DISC_EXTENSIONS,
	VIDEO_EXTENSIONS,
} from "./constants.js";
import type { CategoryTable } from "./configSchema.js";
import { errorMessage } from "./errors.js";
import { Label, type Logger } from "./logger.js";
import type { Release, ReleaseFile } from "./release.js";
import { comparing } from "./utils.js";

export interface MediaTracks {
	video: number;
	audio: number;
	subtitle: number;
}

/**
 * Inspects a media file's tracks. Implemented by an external prober.
 */
export interface MediaProbe {
	probe(file: string): Promise<MediaTracks>;
}

export interface ClassificationSignal {
	contentType: ContentType;
	confidence: number;
	signal: string;
}

export type Classification =
	| ({ ambiguous: false } & ClassificationSignal)
	| { ambiguous: true; confidence: number; candidates: ClassificationSignal[] };

export interface ClassifyOptions {
	threshold: number;
	logger: Logger;
	probe?: MediaProbe;
	/**
	 * Category tables of the selected trackers, used to turn a numeric
	 * category/type override back into a content type.
	 */
	categoryTables?: CategoryTable[];
}

function bytesWithExt(files: ReleaseFile[], exts: string[]): number {
	return files
		.filter((file) => exts.includes(extname(file.name).toLowerCase()))
		.reduce((sum, file) => sum + file.length, 0);
}

/**
 * Content type for a numeric override, looked up in the tracker tables.
 * Pairs nobody maps are custom uploads and get no video treatment.
 */
export function contentTypeForCategory(
	categoryId: number | undefined,
	typeId: number | undefined,
	tables: CategoryTable[],
): ContentType {
	if (categoryId === undefined) return ContentType.OTHER;
	for (const table of tables) {
		for (const contentType of Object.values(ContentType)) {
			const mapping = table[contentType];
			if (
				mapping &&
				mapping.categoryId === categoryId &&
				(typeId === undefined ||
					mapping.typeId === undefined ||
					mapping.typeId === typeId)
			) {
				return contentType;
			}
		}
	}
	return ContentType.OTHER;
}

export function namingSignals(release: Release): ClassificationSignal[] {
	const { files, parsed, length } = release;
	const videoBytes =
		bytesWithExt(files, VIDEO_EXTENSIONS) +
		bytesWithExt(files, VIDEO_DISC_EXTENSIONS);
	const audioBytes = bytesWithExt(files, AUDIO_EXTENSIONS);
	const bookBytes = bytesWithExt(files, BOOK_EXTENSIONS);
	const hasDiscStructure = files.some((file) =>
		DISC_STRUCTURE_REGEX.test(file.path),
	);
	const discFolders = new Set(
		files
			.map((file) => file.path.split("/"))
			.filter((segments) => segments.length > 1)
			.map((segments) => segments[0])
			.filter((segment) => DISC_FOLDER_REGEX.test(segment)),
	);
	const isVideo = videoBytes > 0 || hasDiscStructure;
	const signals: ClassificationSignal[] = [];

	if (parsed.episode !== undefined && isVideo) {
		signals.push({
			contentType: ContentType.TV,
			confidence: 0.9,
			signal: `episode marker S${parsed.season}E${parsed.episode}`,
		});
	}
	if (parsed.episode === undefined && parsed.season !== undefined && isVideo) {
		signals.push({
			contentType: ContentType.BOXSET,
			confidence: 0.85,
			signal: `season marker S${parsed.season}${discFolders.size > 1 ? ` across ${discFolders.size} discs` : ""}`,
		});
	}
	if (parsed.episode === undefined && BOXSET_REGEX.test(release.name) && isVideo) {
		signals.push({
			contentType: ContentType.BOXSET,
			confidence: 0.85,
			signal: "boxset keyword",
		});
	}
	if (bookBytes * 2 > length) {
		signals.push({
			contentType: ContentType.EBOOK,
			confidence: 0.95,
			signal: "e-book files",
		});
	}
	if (audioBytes * 2 > length) {
		const hasArt = files.some((file) => ALBUM_ART_REGEX.test(file.name));
		signals.push({
			contentType: ContentType.MUSIC,
			confidence: hasArt ? 0.9 : 0.75,
			signal: hasArt ? "audio files with album art" : "audio files",
		});
	}
	if (isVideo && parsed.year !== undefined && parsed.season === undefined) {
		signals.push({
			contentType: ContentType.MOVIE,
			confidence: 0.8,
			signal: `${hasDiscStructure ? "disc structure" : "video files"} with year ${parsed.year}`,
		});
	}
	return signals.sort(comparing((s) => -s.confidence));
}

function probeSignal(tracks: MediaTracks): ClassificationSignal | undefined {
	if (tracks.video > 0) {
		return {
			contentType: ContentType.MOVIE,
			confidence: 0.7,
			signal: `${tracks.video} video track(s)`,
		};
	}
	if (tracks.audio > 0) {
		return {
			contentType: ContentType.MUSIC,
			confidence: 0.7,
			signal: `audio only (${tracks.audio} track(s))`,
		};
	}
	return undefined;
}

function largestMediaFile(release: Release): ReleaseFile | undefined {
	const mediaExts = [...VIDEO_EXTENSIONS, ...VIDEO_DISC_EXTENSIONS, ...AUDIO_EXTENSIONS];
	return release.files
		.filter((file) => mediaExts.includes(extname(file.name).toLowerCase()))
		.sort(comparing((file) => -file.length))[0];
}

/**
 * Decides the release's content type. An override wins outright, then
 * naming and file structure, then the media tracks of the largest file.
 */
export async function classify(
	release: Release,
	options: ClassifyOptions,
): Promise<Classification> {
	const { logger, threshold } = options;
	const override = release.override;
	if (override?.contentType) {
		return {
			ambiguous: false,
			contentType: override.contentType,
			confidence: 1,
			signal: "override",
		};
	}
	if (
		override &&
		(override.categoryId !== undefined || override.typeId !== undefined)
	) {
		const contentType = contentTypeForCategory(
			override.categoryId,
			override.typeId,
			options.categoryTables ?? [],
		);
		return {
			ambiguous: false,
			contentType,
			confidence: 1,
			signal: `category override ${override.categoryId ?? "?"}/${override.typeId ?? "?"}`,
		};
	}

	const signals = namingSignals(release);
	const best = signals[0];
	if (best && best.confidence >= threshold) {
		logger.verbose({
			label: Label.CLASSIFY,
			message: `${release.name} is ${best.contentType} (${best.signal}, ${best.confidence})`,
		});
		return { ambiguous: false, ...best };
	}

	const mediaFile = largestMediaFile(release);
	if (options.probe && mediaFile) {
		try {
			const tracks = await options.probe.probe(mediaFile.absolutePath);
			const signal = probeSignal(tracks);
			if (signal) signals.push(signal);
			if (signal && signal.confidence >= threshold) {
				logger.verbose({
					label: Label.CLASSIFY,
					message: `${release.name} is ${signal.contentType} (${signal.signal}, ${signal.confidence})`,
				});
				return { ambiguous: false, ...signal };
			}
		} catch (e) {
			logger.verbose({
				label: Label.CLASSIFY,
				message: `Could not probe ${mediaFile.path}: ${errorMessage(e)}`,
			});
		}
	}

	const candidates = signals.sort(comparing((s) => -s.confidence));
	return {
		ambiguous: true,
		confidence: candidates[0]?.confidence ?? 0,
		candidates,
	};
}
