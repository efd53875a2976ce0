import bencode from "bencode";
import { createHash } from "crypto";
import { describe, expect, it } from "vitest";
import { CodecError } from "../src/errors.js";
import { Metafile, withTrackerFields } from "../src/parseTorrent.js";
import { metafileFactory } from "./factories/metafile.js";

const NAME = "Some.Movie.2020.1080p.BluRay.x264-GROUP";

describe("Metafile", () => {
	it("lists multi-file paths under the torrent name", () => {
		const metafile = metafileFactory({
			files: [
				{ path: ["movie.mkv"], length: 30000 },
				{ path: ["Subs", "english.srt"], length: 2000 },
			],
		});
		expect(metafile.isSingleFileTorrent).toBe(false);
		expect(metafile.length).toBe(32000);
		expect(metafile.pieceCount).toBe(2);
		expect(metafile.files).toEqual([
			{ name: "movie.mkv", path: `${NAME}/movie.mkv`, length: 30000 },
			{ name: "english.srt", path: `${NAME}/Subs/english.srt`, length: 2000 },
		]);
	});

	it("treats a single-file torrent's name as its only path", () => {
		const metafile = metafileFactory({ name: "movie.mkv", length: 20000 });
		expect(metafile.isSingleFileTorrent).toBe(true);
		expect(metafile.files).toEqual([
			{ name: "movie.mkv", path: "movie.mkv", length: 20000 },
		]);
		expect(metafile.pieceHashes).toHaveLength(2);
	});

	it("keeps the info-hash through encode and decode", () => {
		const metafile = metafileFactory({
			private: true,
			source: "TRK",
			announce: "https://tracker.test/announce",
			comment: "a comment",
			creationDate: 1700000000,
		});
		const decoded = Metafile.decode(metafile.encode());
		expect(decoded.infoHash).toBe(metafile.infoHash);
		expect(decoded.infoHash).toMatch(/^[0-9a-f]{40}$/);
		expect(decoded.isPrivate).toBe(true);
		expect(decoded.source).toBe("TRK");
		expect(decoded.announce).toBe("https://tracker.test/announce");
		expect(decoded.encode().equals(metafile.encode())).toBe(true);
	});

	it("gives different payloads different info-hashes", () => {
		expect(metafileFactory({ seed: "a" }).infoHash).not.toBe(
			metafileFactory({ seed: "b" }).infoHash,
		);
	});

	it("prefers name.utf-8 and turns empty path segments into underscores", () => {
		const buf = bencode.encode({
			info: {
				name: "ascii",
				"name.utf-8": "Ünïcode",
				"piece length": 16384,
				pieces: Buffer.alloc(20),
				files: [{ length: 10, path: ["", "file.bin"] }],
			},
		});
		const metafile = Metafile.decode(buf);
		expect(metafile.name).toBe("Ünïcode");
		expect(metafile.files[0].path).toBe("Ünïcode/_/file.bin");
	});

	it("rejects data that is not a bencoded dictionary", () => {
		expect(() => Metafile.decode(Buffer.from("i42e"))).toThrow(
			new CodecError("Torrent must be a bencoded dictionary"),
		);
	});

	it("rejects a torrent without an info dictionary", () => {
		expect(() =>
			Metafile.decode(bencode.encode({ announce: "https://tracker.test" })),
		).toThrow("Torrent is missing or has an invalid required field: info");
	});

	it("rejects an info dictionary without a piece length", () => {
		const buf = bencode.encode({
			info: { name: "x", pieces: Buffer.alloc(20), length: 10 },
		});
		expect(() => Metafile.decode(buf)).toThrow(
			new CodecError(
				"Torrent is missing or has an invalid required field: info['piece length']",
			),
		);
	});

	it("derives the info-hash regardless of key order", () => {
		const pieces = Buffer.alloc(20, 7);
		const forward = bencode.encode({
			info: { length: 10, name: "x", "piece length": 16384, pieces },
		});
		const backward = bencode.encode({
			info: { pieces, "piece length": 16384, name: "x", length: 10 },
		});
		const expected = createHash("sha1")
			.update(bencode.encode({ name: "x", pieces, length: 10, "piece length": 16384 }))
			.digest("hex");
		expect(Metafile.decode(forward).infoHash).toBe(expected);
		expect(Metafile.decode(backward).infoHash).toBe(expected);
	});

	it("rejects a piece count that does not cover the payload", () => {
		expect(() =>
			Metafile.create({
				name: NAME,
				pieceLength: 16384,
				pieces: Buffer.alloc(20),
				length: 40000,
			}),
		).toThrow(
			"Torrent has 1 pieces but 40000 bytes at a piece length of 16384 needs 3",
		);
	});

	it("rejects a torrent with both files and length", () => {
		expect(() =>
			Metafile.create({
				name: NAME,
				pieceLength: 16384,
				pieces: Buffer.alloc(20),
				length: 100,
				files: [{ path: ["a"], length: 100 }],
			}),
		).toThrow("A torrent needs exactly one of files or length");
	});

	it("rejects a private flag other than 0 or 1", () => {
		const buf = bencode.encode({
			info: {
				name: "x",
				"piece length": 16384,
				pieces: Buffer.alloc(20),
				length: 100,
				private: 2,
			},
		});
		expect(() => Metafile.decode(buf)).toThrow(
			"Torrent is missing or has an invalid required field: info.private",
		);
	});
});

describe("withTrackerFields", () => {
	it("sets the tracker's fields and changes the info-hash", () => {
		const original = metafileFactory();
		const derived = withTrackerFields(original, {
			announce: "https://tracker.test/announce",
			source: "TRK",
			private: true,
		});
		expect(derived.announce).toBe("https://tracker.test/announce");
		expect(derived.source).toBe("TRK");
		expect(derived.isPrivate).toBe(true);
		expect(derived.infoHash).not.toBe(original.infoHash);
		expect(derived.pieceHashes).toEqual(original.pieceHashes);
		expect(original.isPrivate).toBe(false);
	});

	it("derives the same info-hash for the same fields", () => {
		const fields = { announce: "https://a.test/announce", source: "A", private: true };
		const once = withTrackerFields(metafileFactory(), fields);
		const twice = withTrackerFields(once, {
			...fields,
			announce: "https://other.test/announce",
		});
		expect(twice.infoHash).toBe(once.infoHash);
	});

	it("drops a previous source tag", () => {
		const tagged = withTrackerFields(metafileFactory(), {
			announce: "https://a.test/announce",
			source: "A",
			private: false,
		});
		const untagged = withTrackerFields(tagged, {
			announce: "https://a.test/announce",
			private: false,
		});
		expect(untagged.source).toBeUndefined();
		expect(untagged.infoHash).toBe(metafileFactory().infoHash);
	});
});
