import { posix } from "path";
import { z } from "zod";
import { InjectionResult } from "../constants.js";
import { ConfigError, errorMessage } from "../errors.js";
import { Label } from "../logger.js";
import type { Metafile, TorrentFile } from "../parseTorrent.js";
import { type Result, resultOf, resultOfErr } from "../Result.js";
import {
	extractCredentialsFromUrl,
	extractInt,
	getLogString,
	sanitizeInfoHash,
	sanitizeUrl,
} from "../utils.js";
import type {
	AddTorrentOptions,
	ClientContext,
	SeedingTorrent,
	TorrentClient,
} from "./TorrentClient.js";

const X_WWW_FORM_URLENCODED = {
	"Content-Type": "application/x-www-form-urlencoded",
};

const TORRENT_INFO_SCHEMA = z.array(
	z.object({
		hash: z.string(),
		name: z.string(),
		save_path: z.string(),
		category: z.string().optional(),
		total_size: z.number(),
	}),
);

const TORRENT_FILES_SCHEMA = z.array(
	z.object({
		name: z.string(),
		size: z.number(),
	}),
);

type TorrentInfo = z.infer<typeof TORRENT_INFO_SCHEMA>[number];

export default class QBittorrent implements TorrentClient {
	readonly clientHost: string;
	readonly label: string;
	private cookie = "";
	private version = "";
	private versionMajor = 0;
	private readonly url: { username: string; password: string; href: string };

	constructor(
		url: string,
		private readonly context: ClientContext,
	) {
		this.url = extractCredentialsFromUrl(url, "/api/v2").unwrapOrThrow(
			new ConfigError("qBittorrent url must be percent-encoded"),
		);
		this.clientHost = new URL(this.url.href).host;
		this.label = `${Label.QBITTORRENT}@${this.clientHost}`;
	}

	private get fetch(): typeof fetch {
		return this.context.fetch ?? globalThis.fetch;
	}

	async login(): Promise<void> {
		let response: Response;
		const { href, username, password } = this.url;
		try {
			response = await this.fetch(`${href}/auth/login`, {
				method: "POST",
				headers: X_WWW_FORM_URLENCODED,
				body: new URLSearchParams({ username, password }).toString(),
				signal: AbortSignal.timeout(this.context.timeoutMs),
			});
		} catch (e) {
			throw new ConfigError(`qBittorrent login failed: ${errorMessage(e)}`);
		}

		if (response.status !== 200) {
			throw new ConfigError(
				`qBittorrent login failed with code ${response.status}`,
			);
		}

		const cookie = response.headers.getSetCookie()[0];
		if (!cookie) {
			throw new ConfigError(
				"qBittorrent login failed: Invalid username or password",
			);
		}
		this.cookie = cookie.split(";")[0];
		const version = await this.request("/app/version", "", X_WWW_FORM_URLENCODED);
		if (!version) {
			throw new ConfigError("qBittorrent login failed: Unable to retrieve version");
		}
		this.version = version.trim();
		this.versionMajor = extractInt(this.version);
		this.context.logger.info({
			label: Label.QBITTORRENT,
			message: `Logged in to qBittorrent ${this.version} at ${sanitizeUrl(this.url.href)}`,
		});
	}

	async validateConfig(): Promise<void> {
		await this.login();
	}

	private async request(
		path: string,
		body: string | FormData,
		headers: Record<string, string> = {},
		retries = 3,
	): Promise<string | undefined> {
		const bodyStr =
			body instanceof FormData
				? `form with ${[...body.keys()].join(", ")}`
				: body.replace(/(?:hashes?=)([a-z0-9]{40})/i, (match, hash: string) =>
						match.replace(hash, sanitizeInfoHash(hash)),
					);
		this.context.logger.verbose({
			label: Label.QBITTORRENT,
			message: `Making request (${retries}) to ${path} with body ${bodyStr}`,
		});

		let response: Response;
		try {
			response = await this.fetch(`${this.url.href}${path}`, {
				method: "POST",
				headers: { Cookie: this.cookie, ...headers },
				body,
				signal: AbortSignal.timeout(this.context.timeoutMs),
			});
		} catch (e) {
			if (retries > 0) {
				this.context.logger.verbose({
					label: Label.QBITTORRENT,
					message: `Request failed, ${retries} retries remaining: ${errorMessage(e)}`,
				});
				return this.request(path, body, headers, retries - 1);
			}
			this.context.logger.verbose({
				label: Label.QBITTORRENT,
				message: `Request to ${path} failed: ${errorMessage(e)}`,
			});
			return undefined;
		}
		if (response.status === 403 && retries > 0) {
			this.context.logger.verbose({
				label: Label.QBITTORRENT,
				message: "Received 403 from API. Logging in again and retrying",
			});
			await this.login();
			return this.request(path, body, headers, retries - 1);
		}
		if (!response.ok) {
			this.context.logger.verbose({
				label: Label.QBITTORRENT,
				message: `Request to ${path} failed with code ${response.status}`,
			});
			return undefined;
		}
		return response.text();
	}

	private async requestJson<T>(
		path: string,
		body: string,
		schema: z.ZodType<T>,
	): Promise<T | undefined> {
		const responseText = await this.request(path, body, X_WWW_FORM_URLENCODED);
		if (responseText === undefined) return undefined;
		try {
			const parsed = schema.safeParse(JSON.parse(responseText));
			if (parsed.success) return parsed.data;
			this.context.logger.verbose({
				label: Label.QBITTORRENT,
				message: `Unexpected response from ${path}: ${parsed.error.issues[0]?.message}`,
			});
		} catch (e) {
			this.context.logger.verbose({
				label: Label.QBITTORRENT,
				message: `Invalid JSON from ${path}: ${errorMessage(e)}`,
			});
		}
		return undefined;
	}

	async getFiles(infoHash: string): Promise<TorrentFile[] | null> {
		const files = await this.requestJson(
			"/torrents/files",
			`hash=${infoHash}`,
			TORRENT_FILES_SCHEMA,
		);
		if (!files) return null;
		return files.map((file) => ({
			name: posix.basename(file.name),
			path: file.name,
			length: file.size,
		}));
	}

	async getTorrentInfo(hash: string): Promise<TorrentInfo | undefined> {
		const torrents = await this.requestJson(
			"/torrents/info",
			`hashes=${hash}`,
			TORRENT_INFO_SCHEMA,
		);
		return torrents?.find((torrent) => torrent.hash === hash);
	}

	async getSeedingTorrents(): Promise<SeedingTorrent[]> {
		const torrents = await this.requestJson(
			"/torrents/info",
			"filter=completed",
			TORRENT_INFO_SCHEMA,
		);
		if (!torrents) {
			throw new ConfigError(`Failed to list torrents from ${this.label}`);
		}
		const seeding: SeedingTorrent[] = [];
		for (const torrent of torrents) {
			const files = await this.getFiles(torrent.hash);
			if (!files || files.length === 0) {
				this.context.logger.warn({
					label: Label.QBITTORRENT,
					message: `Skipping ${getLogString({ name: torrent.name, infoHash: torrent.hash })}: could not list its files`,
				});
				continue;
			}
			seeding.push({
				infoHash: torrent.hash,
				name: torrent.name,
				savePath: torrent.save_path,
				category: torrent.category || undefined,
				files,
				length: files.reduce((sum, file) => sum + file.length, 0),
			});
		}
		this.context.logger.verbose({
			label: Label.QBITTORRENT,
			message: `Found ${seeding.length} completed torrent(s) in ${this.label}`,
		});
		return seeding;
	}

	async isTorrentInClient(infoHash: string): Promise<Result<boolean, Error>> {
		const torrents = await this.requestJson(
			"/torrents/info",
			`hashes=${infoHash}`,
			TORRENT_INFO_SCHEMA,
		);
		if (!torrents) {
			return resultOfErr(new Error(`Failed to query ${this.label}`));
		}
		return resultOf(torrents.some((torrent) => torrent.hash === infoHash));
	}

	async addTorrent(
		metafile: Metafile,
		options: AddTorrentOptions,
	): Promise<InjectionResult> {
		try {
			if (await this.getTorrentInfo(metafile.infoHash)) {
				return InjectionResult.ALREADY_EXISTS;
			}
			const formData = new FormData();
			formData.append(
				"torrents",
				new Blob([new Uint8Array(metafile.encode())], {
					type: "application/x-bittorrent",
				}),
				`${metafile.getFileSystemSafeName()}.torrent`,
			);
			formData.append("savepath", options.savePath);
			formData.append("autoTMM", "false");
			if (options.category?.length) {
				formData.append("category", options.category);
			}
			formData.append("contentLayout", "Original");
			formData.append("skip_checking", String(options.skipChecking));
			formData.append(
				this.versionMajor >= 5 ? "stopped" : "paused",
				String(options.paused),
			);
			// for some reason the parser parses the last kv pair incorrectly
			// it concats the value and the sentinel
			formData.append("foo", "bar");
			const response = await this.request("/torrents/add", formData);
			if (response === undefined || response.trim() === "Fails.") {
				this.context.logger.error({
					label: Label.QBITTORRENT,
					message: `qBittorrent rejected ${getLogString(metafile)}`,
				});
				return InjectionResult.FAILURE;
			}
			return (await this.getTorrentInfo(metafile.infoHash))
				? InjectionResult.SUCCESS
				: InjectionResult.FAILURE;
		} catch (e) {
			this.context.logger.error({
				label: Label.QBITTORRENT,
				message: `Failed to add ${getLogString(metafile)}: ${errorMessage(e)}`,
			});
			return InjectionResult.FAILURE;
		}
	}
}
