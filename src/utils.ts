import chalk, { type ChalkInstance } from "chalk";
import { access, constants } from "fs/promises";
import path from "path";
import { Result, resultOf, resultOfErr } from "./Result.js";

// ================================== TYPES ==================================

type Truthy<T> = T extends false | "" | 0 | null | undefined ? never : T; // from lodash

export function isTruthy<T>(value: T): value is Truthy<T> {
	return Boolean(value);
}

// ==================================== OS ====================================

export async function exists(srcPath: string): Promise<boolean> {
	try {
		await access(srcPath, constants.F_OK);
		return true;
	} catch {
		return false;
	}
}

export function stripExtension(filename: string): string {
	return path.basename(filename, path.extname(filename));
}

// =================================== TIME ===================================

export function wait(n: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, n));
}

// ================================= LOGGING =================================

export function humanReadableSize(
	bytes: number,
	options?: { binary: boolean },
) {
	if (bytes === 0) return "0 B";
	const k = options?.binary ? 1024 : 1000;
	const sizes = options?.binary
		? ["B", "KiB", "MiB", "GiB", "TiB"]
		: ["B", "kB", "MB", "GB", "TB"];
	// engineering notation: (coefficient) * 1000 ^ (exponent)
	const exponent = Math.floor(Math.log(Math.abs(bytes)) / Math.log(k));
	const coefficient = bytes / Math.pow(k, exponent);
	return `${parseFloat(coefficient.toFixed(2))} ${sizes[exponent]}`;
}

export function getLogString(
	torrent: { name: string; infoHash?: string },
	color: ChalkInstance = chalk.reset,
) {
	return torrent.infoHash
		? `${color(torrent.name)} ${chalk.dim(`[${sanitizeInfoHash(torrent.infoHash)}]`)}`
		: color(torrent.name);
}

export function formatAsList(
	strings: string[],
	options: {
		sort: boolean;
		style?: Intl.ListFormatStyle;
		type?: Intl.ListFormatType;
	},
) {
	if (options.sort) strings.sort((a, b) => a.localeCompare(b));
	return new Intl.ListFormat("en", {
		style: options.style ?? "long",
		type: options.type ?? "conjunction",
	}).format(strings);
}

/**
 * This cannot be done at the log level because of too many false positives.
 * The caller will need to extract the infoHash from their specific syntax.
 * @param infoHash The infoHash to sanitize
 */
export function sanitizeInfoHash(infoHash: string): string {
	return `${infoHash.slice(0, 8)}...`;
}

// ================================== TITLES ==================================

/**
 * Lowercases and collapses separators so titles from release names and
 * from metadata services compare on their words only.
 */
export function normalizeTitle(title: string): string {
	return title
		.normalize("NFKD")
		.replace(/[\u0300-\u036f]/g, "")
		.toLowerCase()
		.replace(/&/g, "and")
		.replace(/[^\p{L}\p{N}]+/gu, " ")
		.trim();
}

// =================================== URLS ===================================

export function sanitizeUrl(url: string | URL): string {
	if (typeof url === "string") {
		url = new URL(url);
	}
	return url.origin + url.pathname;
}

export function extractCredentialsFromUrl(
	url: string,
	basePath?: string,
): Result<{ username: string; password: string; href: string }, "invalid URL"> {
	try {
		const { origin, pathname, username, password } = new URL(url);
		return resultOf({
			username: decodeURIComponent(username),
			password: decodeURIComponent(password),
			href: basePath
				? origin + path.posix.join(pathname, basePath)
				: pathname === "/"
					? origin
					: origin + pathname,
		});
	} catch {
		return resultOfErr("invalid URL");
	}
}

// ================================ FUNCTIONAL ================================

/**
 * Makes comparators for `Array.prototype.sort`.
 * Second getter will be used if the first is a tie, etc.
 * Booleans are treated as 0 and 1,
 * Ascending by default, use - or ! for descending.
 * @param getters
 */
export function comparing<T>(
	...getters: ((e: T) => number | boolean | string)[]
) {
	return function compare(a: T, b: T) {
		for (const getter of getters) {
			const x = getter(a);
			const y = getter(b);
			if (x < y) {
				return -1;
			} else if (x > y) {
				return 1;
			}
		}
		return 0;
	};
}

export function extractInt(str: string): number {
	const match = str.match(/\d+/);
	return match ? parseInt(match[0]) : NaN;
}
