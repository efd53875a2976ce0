import { createHash } from "crypto";
import { Metafile, type MetafileOptions } from "../../src/parseTorrent.js";

/**
 * Builds a metafile with placeholder piece hashes of the right count. The
 * hashes depend on the seed so different seeds give different info-hashes.
 */
export const metafileFactory = (
	overrides: Partial<MetafileOptions> & { seed?: string } = {},
): Metafile => {
	const { seed = "seed", ...options } = overrides;
	const pieceLength = options.pieceLength ?? 16384;
	const files =
		options.files ??
		(options.length === undefined
			? [{ path: ["movie.mkv"], length: 40000 }]
			: undefined);
	const total =
		files?.reduce((sum, file) => sum + file.length, 0) ?? options.length ?? 0;
	const pieceCount = Math.ceil(total / pieceLength);
	const pieces = Buffer.concat(
		Array.from({ length: pieceCount }, (_, i) =>
			createHash("sha1").update(`${seed}:${i}`).digest(),
		),
	);
	return Metafile.create({
		name: "Some.Movie.2020.1080p.BluRay.x264-GROUP",
		...options,
		pieceLength,
		pieces,
		files,
	});
};
