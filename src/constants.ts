import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageDotJson: { name: string; version: string } = require("../package.json");

export const PROGRAM_NAME = packageDotJson.name;
export const PROGRAM_VERSION = packageDotJson.version;
export const USER_AGENT = `upseed/${PROGRAM_VERSION}`;
export const LOGS_FOLDER = "logs";
export const TORRENT_OUTPUT_FOLDER = "torrents";

export const EPISODE_REGEX = /\bS(?<season>\d{1,3})[_.\s-]?E(?<episode>\d{1,4})\b/i;
export const SEASON_REGEX = /\bS(?:eason)?[_.\s]?(?<season>\d{1,3})\b(?![_.\s-]*E\d)/i;
export const BOXSET_REGEX = /\b(?:box[_.\s-]?set|complete|collection)\b/i;
export const YEAR_REGEX = /\b(?<year>(?:19|20)\d{2})\b(?![pix])/i;
export const RESOLUTION_REGEX = /\b(?<res>\d{3,4}[pi])\b/i;
export const DISC_FOLDER_REGEX = /^(?:disc|disk|cd|dvd)[_.\s-]?\d+$/i;
export const DISC_STRUCTURE_REGEX = /(?:^|\/)(?:BDMV|VIDEO_TS)(?:\/|$)/i;
export const ALBUM_ART_REGEX = /^(?:cover|folder|front)\.(?:jpe?g|png)$/i;
export const MEDIA_EXTENSION_REGEX = /\.(?:mkv|mp4|m4b|avi|mov|flv|wmv|ts)$/i;
export const BOOK_AUTHOR_REGEX = /^(?<author>[^-]+?)\s+-\s+(?<title>.+)$/;

export const VIDEO_EXTENSIONS = [
	".mkv",
	".mp4",
	".avi",
	".ts",
	".m4v",
	".mov",
	".wmv",
	".flv",
	".mpg",
	".mpeg",
	".m2v",
	".ogv",
	".webm",
];
export const VIDEO_DISC_EXTENSIONS = [".m2ts", ".ifo", ".vob", ".bup"];
export const AUDIO_EXTENSIONS = [
	".wav",
	".aiff",
	".alac",
	".flac",
	".ape",
	".mp3",
	".aac",
	".m4a",
	".m4b",
	".ogg",
	".opus",
	".wma",
];
export const BOOK_EXTENSIONS = [
	".epub",
	".mobi",
	".azw",
	".azw3",
	".pdf",
	".djvu",
	".cbr",
	".cbz",
];
export const NFO_EXTENSION = ".nfo";

/**
 * Files dropped from a video release when extras are stripped. The NFO is
 * still read for the upload payload even though it isn't part of the
 * torrent.
 */
export const EXTRAS_KEYWORDS = ["sample", "proof", "screens", "screenshots"];
export const EXTRAS_EXTENSIONS = [
	".txt",
	".jpg",
	".jpeg",
	".png",
	".nfo",
	".srr",
	".doc",
];

export enum ContentType {
	MOVIE = "movie",
	TV = "tv",
	BOXSET = "boxset",
	MUSIC = "music",
	EBOOK = "ebook",
	OTHER = "other",
}

export const VIDEO_CONTENT_TYPES: readonly ContentType[] = [
	ContentType.MOVIE,
	ContentType.TV,
	ContentType.BOXSET,
];

export enum IdentifierKind {
	TMDB = "tmdb",
	IMDB = "imdb",
	TVDB = "tvdb",
	OPEN_LIBRARY = "openlibrary",
}

export const VIDEO_IDENTIFIER_KINDS: readonly IdentifierKind[] = [
	IdentifierKind.TMDB,
	IdentifierKind.IMDB,
	IdentifierKind.TVDB,
];

export enum ServiceStatus {
	OK = "ok",
	EMPTY = "empty",
	TIMEOUT = "timeout",
	UNREACHABLE = "unreachable",
}

export enum Resolution {
	R4320P = "4320p",
	R2160P = "2160p",
	R1440P = "1440p",
	R1080P = "1080p",
	R1080I = "1080i",
	R720P = "720p",
	R576P = "576p",
	R576I = "576i",
	R480P = "480p",
	R480I = "480i",
	OTHER = "other",
}

export enum TrackerKind {
	UNIT3D = "unit3d",
	TORRENTLEECH = "torrentleech",
}

export enum JobState {
	CLASSIFYING = "classifying",
	RESOLVING = "resolving",
	PREFLIGHT = "preflight",
	BUILDING = "building",
	SUBMITTING = "submitting",
	DONE = "done",
	FAILED = "failed",
}

export enum OutcomeKind {
	PENDING = "Pending",
	SUCCEEDED = "Succeeded",
	FAILED = "Failed",
	SKIPPED = "Skipped",
}

export enum OverallOutcome {
	SUCCEEDED = "Succeeded",
	PARTIAL_FAILURE = "PartialFailure",
	FAILED = "Failed",
	SKIPPED = "Skipped",
}

export enum MatchKind {
	EXACT = "exact",
	HEURISTIC = "heuristic",
}

export enum Action {
	SAVE = "save",
	INJECT = "inject",
}

export enum InjectionResult {
	SUCCESS = "INJECTED",
	FAILURE = "FAILURE",
	ALREADY_EXISTS = "ALREADY_EXISTS",
}

export enum SaveResult {
	SAVED = "SAVED",
}

export type ActionResult = InjectionResult | SaveResult;

const KiB = 1024;
const MiB = 1024 * KiB;
const GiB = 1024 * MiB;

/**
 * Upper bound of total size (inclusive) to piece length. Sizes above the last
 * bound use {@link MAX_PIECE_LENGTH}.
 */
export const PIECE_LENGTH_TABLE: readonly [number, number][] = [
	[64 * MiB, 32 * KiB],
	[128 * MiB, 64 * KiB],
	[256 * MiB, 128 * KiB],
	[512 * MiB, 256 * KiB],
	[1 * GiB, 512 * KiB],
	[2 * GiB, 1 * MiB],
	[4 * GiB, 2 * MiB],
	[8 * GiB, 4 * MiB],
	[16 * GiB, 8 * MiB],
	[32 * GiB, 16 * MiB],
	[64 * GiB, 32 * MiB],
];
export const MAX_PIECE_LENGTH = 64 * MiB;
export const PIECE_HASH_LENGTH = 20;
