import { mkdir, mkdtemp, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { parseReleaseName, type Release } from "../../src/release.js";
import { fileFactory } from "./file.js";

export const releaseFactory = (overrides: Partial<Release> = {}): Release => {
	const name = overrides.name ?? "Some.Movie.2020.1080p.BluRay.x264-GROUP";
	const files = overrides.files ?? [
		fileFactory({
			name: "movie.mkv",
			path: "movie.mkv",
			length: 1000,
			absolutePath: `/data/${name}/movie.mkv`,
		}),
	];
	return {
		root: `/data/${name}`,
		name,
		files,
		length: files.reduce((sum, file) => sum + file.length, 0),
		isDirectory: true,
		parsed: parseReleaseName(name),
		...overrides,
	};
};

/**
 * Writes a release to a fresh temporary directory and returns the path of
 * its root. Keys are paths relative to the root, values are the contents.
 */
export async function writeReleaseToDisk(
	name: string,
	files: Record<string, string | Buffer>,
): Promise<string> {
	const base = await mkdtemp(join(tmpdir(), "upseed-tests-"));
	const root = join(base, name);
	for (const [relative, contents] of Object.entries(files)) {
		const path = join(root, relative);
		await mkdir(dirname(path), { recursive: true });
		await writeFile(path, contents);
	}
	return root;
}
