import { execFile } from "child_process";
import { readFile } from "fs/promises";
import { basename, dirname, extname } from "path";
import { promisify } from "util";
import { z } from "zod";
import type { MediaProbe, MediaTracks } from "./classify.js";
import { ContentType, VIDEO_DISC_EXTENSIONS, VIDEO_EXTENSIONS } from "./constants.js";
import { generateDescription } from "./description.js";
import { errorMessage, TargetError } from "./errors.js";
import { Label, type Logger } from "./logger.js";
import { withTrackerFields } from "./parseTorrent.js";
import { requiresVideoArtifacts, type Release, type ReleaseFile } from "./release.js";
import type { IdentitySet } from "./resolve.js";
import { type Result, resultOf, resultOfErr } from "./Result.js";
import { createTorrent, saveTorrentFile } from "./torrent.js";
import { categoryFor, resolutionIdFor } from "./trackers/common.js";
import type { Tracker, UploadPayload } from "./trackers/Tracker.js";
import { comparing } from "./utils.js";

const execFileAsync = promisify(execFile);

const SCREENSHOT_COUNT = 4;
const MAX_TOOL_OUTPUT = 16 * 1024 * 1024;

/**
 * External media tooling. Screenshots and samples are optional: they need
 * an image host, which is somebody else's job.
 */
export interface MediaTools {
	mediainfo(file: string): Promise<string>;
	screenshots?(file: string, count: number): Promise<string[]>;
	sample?(file: string): Promise<string>;
}

export interface BuildRequest {
	release: Release;
	contentType: ContentType;
	identity: IdentitySet;
	uploadName: string;
	trackers: Tracker[];
}

export type BuiltPayloads = Map<string, Result<UploadPayload, TargetError>>;

export interface ArtifactBuilder {
	build(request: BuildRequest): Promise<BuiltPayloads>;
}

const FFPROBE_SCHEMA = z.object({
	streams: z.array(
		z.object({
			codec_type: z.string().optional(),
			disposition: z.object({ attached_pic: z.number().optional() }).optional(),
		}),
	),
});

/**
 * mediainfo and ffprobe run as child processes.
 */
export class CommandLineMediaTools implements MediaTools, MediaProbe {
	constructor(
		private readonly options: {
			mediainfoPath: string;
			ffprobePath: string;
			timeoutMs: number;
			logger: Logger;
		},
	) {}

	private async run(command: string, args: string[]): Promise<string> {
		this.options.logger.verbose({
			label: Label.TOOLS,
			message: `Running ${command} ${args.join(" ")}`,
		});
		const { stdout } = await execFileAsync(command, args, {
			timeout: this.options.timeoutMs,
			maxBuffer: MAX_TOOL_OUTPUT,
		});
		return stdout;
	}

	async mediainfo(file: string): Promise<string> {
		const output = await this.run(this.options.mediainfoPath, [file]);
		// keep local directory names out of the upload
		return output.split(`${dirname(file)}/`).join("").trim();
	}

	async probe(file: string): Promise<MediaTracks> {
		const output = await this.run(this.options.ffprobePath, [
			"-v",
			"error",
			"-show_streams",
			"-of",
			"json",
			file,
		]);
		const { streams } = FFPROBE_SCHEMA.parse(JSON.parse(output));
		const count = (type: string) =>
			streams.filter(
				(stream) =>
					stream.codec_type === type && !stream.disposition?.attached_pic,
			).length;
		return { video: count("video"), audio: count("audio"), subtitle: count("subtitle") };
	}
}

export function largestVideoFile(release: Release): ReleaseFile | undefined {
	const exts = [...VIDEO_EXTENSIONS, ...VIDEO_DISC_EXTENSIONS];
	return release.files
		.filter((file) => exts.includes(extname(file.name).toLowerCase()))
		.sort(comparing((file) => -file.length))[0];
}

interface SharedArtifacts {
	mediainfo?: string;
	screenshots: string[];
	sampleUrl?: string;
	nfo?: { filename: string; content: Buffer };
}

export interface ReleaseArtifactBuilderOptions {
	outputDir: string;
	logger: Logger;
	tools?: MediaTools;
	/**
	 * Seconds since the epoch written to every torrent.
	 */
	creationDate?: number;
}

/**
 * Hashes a release once and derives every tracker's payload from that one
 * torrent. Video artifacts are only produced for video content types.
 */
export class ReleaseArtifactBuilder implements ArtifactBuilder {
	constructor(private readonly options: ReleaseArtifactBuilderOptions) {}

	private async optional<T>(
		what: string,
		fn: () => Promise<T>,
	): Promise<T | undefined> {
		try {
			return await fn();
		} catch (e) {
			this.options.logger.warn({
				label: Label.BUILD,
				message: `Could not produce ${what}: ${errorMessage(e)}`,
			});
			return undefined;
		}
	}

	private async sharedArtifacts(
		release: Release,
		contentType: ContentType,
	): Promise<SharedArtifacts> {
		const { tools } = this.options;
		const { nfoPath } = release;
		const nfo = nfoPath
			? await this.optional("nfo", async () => ({
					filename: basename(nfoPath),
					content: await readFile(nfoPath),
				}))
			: undefined;
		const video = largestVideoFile(release);
		if (!requiresVideoArtifacts(contentType) || !tools || !video) {
			return { screenshots: [], nfo };
		}
		const takeScreenshots = tools.screenshots?.bind(tools);
		const cutSample = tools.sample?.bind(tools);
		const [mediainfo, screenshots, sampleUrl] = await Promise.all([
			this.optional("mediainfo", () => tools.mediainfo(video.absolutePath)),
			takeScreenshots
				? this.optional("screenshots", () =>
						takeScreenshots(video.absolutePath, SCREENSHOT_COUNT),
					)
				: undefined,
			cutSample
				? this.optional("sample", () => cutSample(video.absolutePath))
				: undefined,
		]);
		return {
			mediainfo,
			screenshots: screenshots ?? [],
			sampleUrl: sampleUrl || undefined,
			nfo,
		};
	}

	async build(request: BuildRequest): Promise<BuiltPayloads> {
		const { release, contentType, identity, uploadName, trackers } = request;
		const { logger, outputDir } = this.options;
		logger.info({
			label: Label.BUILD,
			message: `Hashing ${release.name} (${release.files.length} file(s))`,
		});
		const base = await createTorrent(release, {
			creationDate: this.options.creationDate,
		});
		const shared = await this.sharedArtifacts(release, contentType);
		const { season, episode, resolution } = release.parsed;
		const { tmdb, imdb, tvdb } = identity.identifiers;

		const payloads: BuiltPayloads = new Map();
		for (const tracker of trackers) {
			const { config } = tracker;
			const category = categoryFor(config, contentType, release.override);
			if (!category) {
				payloads.set(
					tracker.name,
					resultOfErr(
						new TargetError(tracker.name, "build", `no category mapping for ${contentType}`),
					),
				);
				continue;
			}
			try {
				const torrent = withTrackerFields(base, {
					announce: config.announceUrl,
					source: config.source,
					private: config.requirePrivate,
				});
				const torrentFilename = `[${tracker.name}] ${uploadName}`;
				const savedTo = await saveTorrentFile(torrent, outputDir, torrentFilename);
				logger.verbose({
					label: Label.BUILD,
					message: `Saved ${tracker.name} torrent ${torrent.infoHash} to ${savedTo}`,
				});
				const isEpisodic =
					contentType === ContentType.TV || contentType === ContentType.BOXSET;
				payloads.set(
					tracker.name,
					resultOf({
						name: uploadName,
						contentType,
						description: generateDescription({
							contentType,
							identity,
							screenshots: shared.screenshots,
							sampleUrl: shared.sampleUrl,
							customDescription: config.customDescription,
						}),
						mediainfo: shared.mediainfo,
						nfo: shared.nfo,
						torrent,
						torrentFilename,
						categoryId: category.categoryId,
						typeId: category.typeId,
						resolution,
						resolutionId: requiresVideoArtifacts(contentType)
							? resolutionIdFor(config, resolution)
							: undefined,
						identifiers: { tmdb: tmdb?.id, imdb: imdb?.id, tvdb: tvdb?.id },
						season: isEpisodic ? season : undefined,
						episode: isEpisodic ? episode : undefined,
						anonymous: config.anonymous,
					}),
				);
			} catch (e) {
				payloads.set(
					tracker.name,
					resultOfErr(
						new TargetError(tracker.name, "build", errorMessage(e), { cause: e }),
					),
				);
			}
		}
		return payloads;
	}
}
