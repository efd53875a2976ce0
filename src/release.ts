import { readdir, stat } from "fs/promises";
import { basename, dirname, extname, join, posix, resolve } from "path";
import {
	BOOK_AUTHOR_REGEX,
	BOOK_EXTENSIONS,
	BOXSET_REGEX,
	ContentType,
	EPISODE_REGEX,
	EXTRAS_EXTENSIONS,
	EXTRAS_KEYWORDS,
	MEDIA_EXTENSION_REGEX,
	NFO_EXTENSION,
	Resolution,
	RESOLUTION_REGEX,
	SEASON_REGEX,
	VIDEO_CONTENT_TYPES,
	YEAR_REGEX,
} from "./constants.js";
import { UpseedError } from "./errors.js";
import type { TorrentFile } from "./parseTorrent.js";
import { exists, stripExtension } from "./utils.js";

export interface ReleaseFile {
	name: string;
	/**
	 * Relative to the release root, posix separators. For a single-file
	 * release this is the file name.
	 */
	path: string;
	length: number;
	absolutePath: string;
}

/**
 * A caller supplied classification. A content type wins outright, a
 * category/type pair is the numbering of the selected trackers.
 */
export interface ContentOverride {
	contentType?: ContentType;
	categoryId?: number;
	typeId?: number;
}

export interface ReleaseName {
	title: string;
	year?: number;
	season?: number;
	episode?: number;
	resolution?: Resolution;
	author?: string;
}

export interface Release {
	/**
	 * Absolute path of the file or directory being released.
	 */
	root: string;
	/**
	 * Name of the root on disk, which is also the torrent name.
	 */
	name: string;
	files: ReleaseFile[];
	length: number;
	isDirectory: boolean;
	nfoPath?: string;
	override?: ContentOverride;
	parsed: ReleaseName;
}

export function isVideoContentType(contentType: ContentType): boolean {
	return VIDEO_CONTENT_TYPES.includes(contentType);
}

/**
 * Whether screenshots, samples and mediainfo are produced for this type.
 */
export function requiresVideoArtifacts(contentType: ContentType): boolean {
	return isVideoContentType(contentType);
}

export function isExtra(file: { name: string; path: string }): boolean {
	const lowerPath = file.path.toLowerCase();
	return (
		EXTRAS_EXTENSIONS.includes(extname(file.name).toLowerCase()) ||
		EXTRAS_KEYWORDS.some((keyword) =>
			lowerPath.split("/").some((segment) => segment.includes(keyword)),
		)
	);
}

/**
 * Turns a file or folder name into a tracker friendly release name:
 * dot separated, no media extension, group attached with a dash.
 */
export function generateReleaseName(base: string): string {
	return base
		.replace(MEDIA_EXTENSION_REGEX, "")
		.replace(/[^A-Za-z0-9+-]/g, ".")
		.replace(/\.{2,}/g, ".")
		.replace(/-\./g, "-")
		.replace(/\.-/g, "-")
		.replace(/^\.+|\.+$/g, "");
}

function cleanTitle(title: string): string {
	return title
		.replace(/[._]/g, " ")
		.replace(/[([{]\s*[)\]}]/g, "")
		.replace(/[([{]\s*$/, "")
		.replace(/\s{2,}/g, " ")
		.replace(/[\s-]+$/, "")
		.trim();
}

function parseResolution(name: string): Resolution | undefined {
	const res = name.match(RESOLUTION_REGEX)?.groups?.res?.toLowerCase();
	if (!res) return undefined;
	const known = Object.values(Resolution).find((r) => r === res);
	return known ?? Resolution.OTHER;
}

function findYear(name: string): { year: number; index: number } | undefined {
	const yearRegex = new RegExp(YEAR_REGEX.source, "gi");
	for (const match of name.matchAll(yearRegex)) {
		if (match.index !== undefined && match.index > 0) {
			return { year: parseInt(match[0]), index: match.index };
		}
	}
	return undefined;
}

/**
 * A year only belongs to a series title when it comes before the episode
 * or season marker.
 */
function yearBefore(
	yearMatch: { year: number; index: number } | undefined,
	markerIndex: number,
): { year: number; index: number } | undefined {
	return yearMatch && yearMatch.index < markerIndex ? yearMatch : undefined;
}

export function parseReleaseName(name: string): ReleaseName {
	const ext = extname(name).toLowerCase();
	const base = BOOK_EXTENSIONS.includes(ext)
		? stripExtension(name)
		: name.replace(MEDIA_EXTENSION_REGEX, "");
	const resolution = parseResolution(base);
	const yearMatch = findYear(base);

	const episodeMatch = base.match(EPISODE_REGEX);
	if (episodeMatch?.groups && episodeMatch.index !== undefined) {
		const year = yearBefore(yearMatch, episodeMatch.index);
		return {
			title: cleanTitle(base.slice(0, year?.index ?? episodeMatch.index)),
			season: parseInt(episodeMatch.groups.season),
			episode: parseInt(episodeMatch.groups.episode),
			year: year?.year,
			resolution,
		};
	}
	const seasonMatch = base.match(SEASON_REGEX);
	if (seasonMatch?.groups && seasonMatch.index !== undefined) {
		const year = yearBefore(yearMatch, seasonMatch.index);
		return {
			title: cleanTitle(base.slice(0, year?.index ?? seasonMatch.index)),
			season: parseInt(seasonMatch.groups.season),
			year: year?.year,
			resolution,
		};
	}
	const boxsetMatch = base.match(BOXSET_REGEX);
	if (boxsetMatch?.index !== undefined && boxsetMatch.index > 0) {
		return {
			title: cleanTitle(base.slice(0, boxsetMatch.index)),
			year: yearMatch?.year,
			resolution,
		};
	}
	const bookMatch = BOOK_EXTENSIONS.includes(ext)
		? base.match(BOOK_AUTHOR_REGEX)
		: null;
	if (bookMatch?.groups) {
		const title = yearMatch
			? bookMatch.groups.title.replace(String(yearMatch.year), "")
			: bookMatch.groups.title;
		return {
			title: cleanTitle(title),
			author: bookMatch.groups.author.trim(),
			year: yearMatch?.year,
		};
	}
	if (yearMatch) {
		return {
			title: cleanTitle(base.slice(0, yearMatch.index)),
			year: yearMatch.year,
			resolution,
		};
	}
	return { title: cleanTitle(base), resolution };
}

async function walk(
	root: string,
	relative: string,
	files: ReleaseFile[],
): Promise<void> {
	const entries = await readdir(join(root, relative), { withFileTypes: true });
	for (const entry of entries) {
		const relPath = relative ? posix.join(relative, entry.name) : entry.name;
		if (entry.isDirectory()) {
			await walk(root, relPath, files);
		} else if (entry.isFile()) {
			const absolutePath = join(root, relPath);
			const { size } = await stat(absolutePath);
			files.push({ name: entry.name, path: relPath, length: size, absolutePath });
		}
	}
}

function byPath(a: { path: string }, b: { path: string }): number {
	return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

async function findNfo(
	root: string,
	isDirectory: boolean,
	allFiles: ReleaseFile[],
): Promise<string | undefined> {
	if (isDirectory) {
		return allFiles.find(
			(file) => extname(file.name).toLowerCase() === NFO_EXTENSION,
		)?.absolutePath;
	}
	const sibling = join(dirname(root), `${stripExtension(root)}${NFO_EXTENSION}`);
	return (await exists(sibling)) ? sibling : undefined;
}

export async function createReleaseFromPath(
	path: string,
	options: { override?: ContentOverride } = {},
): Promise<Release> {
	const root = resolve(path);
	let rootStats;
	try {
		rootStats = await stat(root);
	} catch {
		throw new UpseedError(`${root} does not exist`);
	}
	const name = basename(root);
	const isDirectory = rootStats.isDirectory();

	const allFiles: ReleaseFile[] = [];
	if (isDirectory) {
		await walk(root, "", allFiles);
	} else {
		allFiles.push({ name, path: name, length: rootStats.size, absolutePath: root });
	}
	allFiles.sort(byPath);

	if (allFiles.length === 0) {
		throw new UpseedError(`${root} contains no files to release`);
	}

	return {
		root,
		name,
		files: allFiles,
		length: totalLength(allFiles),
		isDirectory,
		nfoPath: await findNfo(root, isDirectory, allFiles),
		override: options.override,
		parsed: parseReleaseName(name),
	};
}

function totalLength(files: ReleaseFile[]): number {
	return files.reduce((sum, file) => sum + file.length, 0);
}

/**
 * Drops samples, proofs and text files. Only meant for video releases,
 * where they are never the content itself.
 */
export function withoutExtras(release: Release): Release {
	if (!release.isDirectory) return release;
	const files = release.files.filter((file) => !isExtra(file));
	if (files.length === 0) {
		throw new UpseedError(`${release.root} contains no files to release`);
	}
	return { ...release, files, length: totalLength(files) };
}

/**
 * The release's files as the torrent will list them, comparable with
 * {@link TorrentFile} paths from a decoded metafile.
 */
export function releaseTorrentFiles(release: Release): TorrentFile[] {
	return release.files.map((file) => ({
		name: file.name,
		length: file.length,
		path: release.isDirectory ? posix.join(release.name, file.path) : file.name,
	}));
}
