import { createHash } from "crypto";
import { createReadStream } from "fs";
import { mkdir, readFile, writeFile } from "fs/promises";
import { join } from "path";
import {
	MAX_PIECE_LENGTH,
	PIECE_LENGTH_TABLE,
	PROGRAM_NAME,
	PROGRAM_VERSION,
} from "./constants.js";
import { UpseedError } from "./errors.js";
import { Metafile } from "./parseTorrent.js";
import type { Release, ReleaseFile } from "./release.js";

export interface CreateTorrentOptions {
	pieceLength?: number;
	private?: boolean;
	source?: string;
	announce?: string;
	comment?: string;
	/**
	 * Seconds since the epoch, omitted when undefined.
	 */
	creationDate?: number;
}

/**
 * Piece length for a payload of the given size. Non-decreasing in the size.
 */
export function choosePieceLength(totalSize: number): number {
	for (const [upperBound, pieceLength] of PIECE_LENGTH_TABLE) {
		if (totalSize <= upperBound) return pieceLength;
	}
	return MAX_PIECE_LENGTH;
}

/**
 * SHA-1 of every piece of the files laid end to end, in order. Pieces span
 * file boundaries, the last piece may be short.
 */
export async function hashPieces(
	files: Pick<ReleaseFile, "absolutePath" | "length">[],
	pieceLength: number,
): Promise<Buffer> {
	const hashes: Buffer[] = [];
	const piece = Buffer.alloc(pieceLength);
	let filled = 0;
	let total = 0;
	const expectedTotal = files.reduce((sum, file) => sum + file.length, 0);

	for (const file of files) {
		for await (const chunk of createReadStream(file.absolutePath)) {
			const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
			let offset = 0;
			while (offset < buf.length) {
				const n = Math.min(pieceLength - filled, buf.length - offset);
				buf.copy(piece, filled, offset, offset + n);
				filled += n;
				offset += n;
				if (filled === pieceLength) {
					hashes.push(createHash("sha1").update(piece).digest());
					filled = 0;
				}
			}
			total += buf.length;
		}
	}
	if (filled > 0) {
		hashes.push(createHash("sha1").update(piece.subarray(0, filled)).digest());
	}
	if (total !== expectedTotal) {
		throw new UpseedError(
			`Release files changed while hashing: read ${total} bytes, expected ${expectedTotal}`,
		);
	}
	return Buffer.concat(hashes);
}

export async function createTorrent(
	release: Release,
	options: CreateTorrentOptions = {},
): Promise<Metafile> {
	const pieceLength = options.pieceLength ?? choosePieceLength(release.length);
	const pieces = await hashPieces(release.files, pieceLength);
	return Metafile.create({
		name: release.name,
		pieceLength,
		pieces,
		...(release.isDirectory
			? {
					files: release.files.map((file) => ({
						path: file.path.split("/"),
						length: file.length,
					})),
				}
			: { length: release.length }),
		private: options.private,
		source: options.source,
		announce: options.announce,
		comment: options.comment,
		createdBy: `${PROGRAM_NAME}/${PROGRAM_VERSION}`,
		creationDate: options.creationDate,
	});
}

export async function parseTorrentFromFilename(
	filename: string,
): Promise<Metafile> {
	const data = await readFile(filename);
	return Metafile.decode(data);
}

export async function saveTorrentFile(
	metafile: Metafile,
	dir: string,
	filename: string,
): Promise<string> {
	await mkdir(dir, { recursive: true });
	const fullPath = join(dir, `${filename.replace(/[/\\]/g, "")}.torrent`);
	await writeFile(fullPath, metafile.encode());
	return fullPath;
}
