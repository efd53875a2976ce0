import bencode from "bencode";
import { createHash } from "crypto";
import { posix } from "path";
import { PIECE_HASH_LENGTH } from "./constants.js";
import { CodecError, errorMessage } from "./errors.js";

export type BencodeValue = Buffer | number | BencodeValue[] | BencodeDict;
export interface BencodeDict {
	[key: string]: BencodeValue;
}

export interface TorrentFile {
	name: string;
	/**
	 * Relative path including the torrent name as its root folder for
	 * multi-file torrents, just the name for single-file torrents.
	 */
	path: string;
	length: number;
}

/**
 * What the matcher compares. Metafiles and the torrents a client is seeding
 * both have this shape.
 */
export interface TorrentFingerprint {
	infoHash: string;
	name: string;
	length: number;
	files: TorrentFile[];
}

export interface MetafileOptions {
	name: string;
	pieceLength: number;
	/**
	 * Concatenated 20 byte SHA-1 piece hashes.
	 */
	pieces: Buffer;
	/**
	 * Multi-file mode. Paths are segments relative to the torrent root.
	 */
	files?: { path: string[]; length: number }[];
	/**
	 * Single-file mode.
	 */
	length?: number;
	private?: boolean;
	source?: string;
	announce?: string;
	comment?: string;
	createdBy?: string;
	creationDate?: number;
}

function isDict(value: unknown): value is Record<string, unknown> {
	return (
		typeof value === "object" &&
		value !== null &&
		!Array.isArray(value) &&
		!(value instanceof Uint8Array)
	);
}

function toBencodeValue(value: unknown, path: string): BencodeValue {
	if (Buffer.isBuffer(value)) return value;
	if (value instanceof Uint8Array) return Buffer.from(value);
	if (typeof value === "string") return Buffer.from(value);
	if (typeof value === "number") {
		if (!Number.isSafeInteger(value)) {
			throw new CodecError(`${path} must be an integer, got ${value}`);
		}
		return value;
	}
	if (Array.isArray(value)) {
		return value.map((v, i) => toBencodeValue(v, `${path}[${i}]`));
	}
	if (isDict(value)) {
		const dict: BencodeDict = {};
		for (const [key, v] of Object.entries(value)) {
			dict[key] = toBencodeValue(v, `${path}.${key}`);
		}
		return dict;
	}
	throw new CodecError(`${path} has an unencodable ${typeof value} value`);
}

function ensure(condition: unknown, fieldName: string): asserts condition {
	if (!condition) {
		throw new CodecError(
			`Torrent is missing or has an invalid required field: ${fieldName}`,
		);
	}
}

function isBytes(value: BencodeValue | undefined): value is Buffer {
	return Buffer.isBuffer(value);
}

function isInteger(value: BencodeValue | undefined): value is number {
	return typeof value === "number" && Number.isSafeInteger(value);
}

function isByteList(value: BencodeValue | undefined): value is Buffer[] {
	return Array.isArray(value) && value.length > 0 && value.every(isBytes);
}

function sha1(buf: Buffer): string {
	const hash = createHash("sha1");
	hash.update(buf);
	return hash.digest("hex");
}

export function expectedPieceCount(
	totalLength: number,
	pieceLength: number,
): number {
	return Math.ceil(totalLength / pieceLength);
}

export class Metafile implements TorrentFingerprint {
	readonly infoHash: string;
	readonly name: string;
	readonly length: number;
	readonly pieceLength: number;
	readonly pieceCount: number;
	readonly files: TorrentFile[];
	readonly isSingleFileTorrent: boolean;
	readonly isPrivate: boolean;
	readonly source?: string;
	readonly announce?: string;
	readonly raw: BencodeDict;

	constructor(raw: BencodeDict) {
		const info = raw.info;
		ensure(isDict(info), "info");
		const name = info["name.utf-8"] ?? info.name;
		ensure(isBytes(name) && name.length > 0, "info.name");
		const pieceLength = info["piece length"];
		ensure(isInteger(pieceLength) && pieceLength > 0, "info['piece length']");
		const pieces = info.pieces;
		ensure(
			isBytes(pieces) && pieces.length % PIECE_HASH_LENGTH === 0,
			"info.pieces",
		);
		if (info.files !== undefined && info.length !== undefined) {
			throw new CodecError("Torrent has both info.files and info.length");
		}

		this.raw = raw;
		this.name = name.toString();
		this.pieceLength = pieceLength;
		this.pieceCount = pieces.length / PIECE_HASH_LENGTH;

		if (info.files === undefined) {
			const length = info.length;
			ensure(isInteger(length) && length >= 0, "info.length");
			this.files = [{ name: this.name, path: this.name, length }];
			this.length = length;
			this.isSingleFileTorrent = true;
		} else {
			const files = info.files;
			ensure(Array.isArray(files) && files.length > 0, "info.files");
			this.files = files.map((file, i) => {
				ensure(isDict(file), `info.files[${i}]`);
				const length = file.length;
				ensure(isInteger(length) && length >= 0, `info.files[${i}].length`);
				const rawPathSegments = file["path.utf-8"] ?? file.path;
				ensure(isByteList(rawPathSegments), `info.files[${i}].path`);
				const pathSegments = rawPathSegments.map((buf) => {
					const seg = buf.toString();
					// convention for zero-length path segments is to treat them as underscores
					return seg === "" ? "_" : seg;
				});
				return {
					name: pathSegments[pathSegments.length - 1],
					length,
					path: posix.join(this.name, ...pathSegments),
				};
			});
			this.length = this.files.reduce((sum, file) => sum + file.length, 0);
			this.isSingleFileTorrent = false;
		}

		const expected = expectedPieceCount(this.length, this.pieceLength);
		if (this.pieceCount !== expected) {
			throw new CodecError(
				`Torrent has ${this.pieceCount} pieces but ${this.length} bytes at a piece length of ${this.pieceLength} needs ${expected}`,
			);
		}

		const isPrivate = info.private;
		ensure(
			isPrivate === undefined || isPrivate === 0 || isPrivate === 1,
			"info.private",
		);
		this.isPrivate = isPrivate === 1;
		const source = info.source;
		this.source = isBytes(source) ? source.toString() : undefined;
		const announce = raw.announce;
		this.announce = isBytes(announce) ? announce.toString() : undefined;

		this.infoHash = sha1(bencode.encode(info));
	}

	static decode(buf: Buffer): Metafile {
		let decoded: unknown;
		try {
			decoded = bencode.decode(buf);
		} catch (e) {
			throw new CodecError(`Torrent is not valid bencode: ${errorMessage(e)}`);
		}
		if (!isDict(decoded)) {
			throw new CodecError("Torrent must be a bencoded dictionary");
		}
		const raw = toBencodeValue(decoded, "torrent");
		ensure(isDict(raw), "torrent");
		return new Metafile(raw);
	}

	static create(options: MetafileOptions): Metafile {
		if ((options.files === undefined) === (options.length === undefined)) {
			throw new CodecError("A torrent needs exactly one of files or length");
		}
		const info: Record<string, unknown> = {
			name: options.name,
			"piece length": options.pieceLength,
			pieces: options.pieces,
		};
		if (options.files) {
			info.files = options.files.map((file) => ({
				length: file.length,
				path: file.path,
			}));
		} else {
			info.length = options.length;
		}
		if (options.private) info.private = 1;
		if (options.source) info.source = options.source;

		const torrent: Record<string, unknown> = { info };
		if (options.announce) torrent.announce = options.announce;
		if (options.comment) torrent.comment = options.comment;
		if (options.createdBy) torrent["created by"] = options.createdBy;
		if (options.creationDate !== undefined) {
			torrent["creation date"] = options.creationDate;
		}
		const raw = toBencodeValue(torrent, "torrent");
		ensure(isDict(raw), "torrent");
		return new Metafile(raw);
	}

	get pieceHashes(): Buffer[] {
		const info = this.raw.info;
		ensure(isDict(info) && isBytes(info.pieces), "info.pieces");
		const hashes: Buffer[] = [];
		for (let i = 0; i < info.pieces.length; i += PIECE_HASH_LENGTH) {
			hashes.push(info.pieces.subarray(i, i + PIECE_HASH_LENGTH));
		}
		return hashes;
	}

	getFileSystemSafeName(): string {
		return this.name.replace(/[/\\]/g, "");
	}

	encode(): Buffer {
		return bencode.encode(this.raw);
	}
}

/**
 * Derives a torrent for a specific tracker without rehashing. Changing the
 * source tag or private flag changes the info-hash.
 */
export function withTrackerFields(
	metafile: Metafile,
	fields: { announce: string; source?: string; private: boolean },
): Metafile {
	const info = metafile.raw.info;
	ensure(isDict(info), "info");
	const newInfo: BencodeDict = { ...info };
	delete newInfo.source;
	delete newInfo.private;
	if (fields.source) newInfo.source = Buffer.from(fields.source);
	if (fields.private) newInfo.private = 1;
	return new Metafile({
		...metafile.raw,
		announce: Buffer.from(fields.announce),
		info: newInfo,
	});
}
