import { mkdir } from "fs/promises";
import { join } from "path";
import { describe, expect, it } from "vitest";
import { Resolution } from "../src/constants.js";
import { UpseedError } from "../src/errors.js";
import {
	createReleaseFromPath,
	generateReleaseName,
	isExtra,
	parseReleaseName,
	releaseTorrentFiles,
	withoutExtras,
} from "../src/release.js";
import { writeReleaseToDisk } from "./factories/release.js";

describe("parseReleaseName", () => {
	it("parses a movie", () => {
		expect(parseReleaseName("Some.Movie.2020.1080p.BluRay.x264-GROUP")).toEqual({
			title: "Some Movie",
			year: 2020,
			resolution: Resolution.R1080P,
		});
	});

	it("parses an episode", () => {
		expect(parseReleaseName("Show.Name.S01E02.720p.WEB-DL.x264-GRP")).toEqual({
			title: "Show Name",
			season: 1,
			episode: 2,
			resolution: Resolution.R720P,
		});
	});

	it("parses a season pack", () => {
		expect(parseReleaseName("Show.Name.S02.1080p.BluRay.x264-GRP")).toEqual({
			title: "Show Name",
			season: 2,
			resolution: Resolution.R1080P,
		});
	});

	it("keeps a year that comes before the episode marker", () => {
		expect(parseReleaseName("Show.2019.S01E05.1080p.WEB.h264-GRP")).toMatchObject({
			title: "Show",
			year: 2019,
			season: 1,
			episode: 5,
		});
	});

	it("parses a boxset keyword", () => {
		expect(parseReleaseName("Show.Complete.Series.1080p")).toEqual({
			title: "Show",
			resolution: Resolution.R1080P,
		});
	});

	it("parses an e-book's author and title", () => {
		expect(parseReleaseName("Author Name - Book Title 2019.epub")).toEqual({
			title: "Book Title",
			author: "Author Name",
			year: 2019,
		});
	});

	it("does not take a leading number for a year", () => {
		expect(parseReleaseName("2012.2009.1080p.BluRay.x264-GRP")).toMatchObject({
			title: "2012",
			year: 2009,
		});
	});

	it("maps an unusual resolution to other", () => {
		expect(parseReleaseName("Clip.540p.WEB").resolution).toBe(Resolution.OTHER);
	});
});

describe("generateReleaseName", () => {
	it("replaces separators with dots and drops the extension", () => {
		expect(generateReleaseName("Some Movie (2020) [1080p].mkv")).toBe(
			"Some.Movie.2020.1080p",
		);
	});

	it("attaches the group with a dash", () => {
		expect(generateReleaseName("Movie - GROUP")).toBe("Movie-GROUP");
	});
});

describe("isExtra", () => {
	it("recognizes samples by folder", () => {
		expect(isExtra({ name: "sample.mkv", path: "Sample/sample.mkv" })).toBe(true);
	});

	it("recognizes extras by extension", () => {
		expect(isExtra({ name: "movie.nfo", path: "movie.nfo" })).toBe(true);
	});

	it("keeps the main feature", () => {
		expect(isExtra({ name: "movie.mkv", path: "movie.mkv" })).toBe(false);
	});
});

describe("createReleaseFromPath", () => {
	const NAME = "Some.Movie.2020.1080p.BluRay.x264-GROUP";
	const CONTENTS = {
		"movie.mkv": "0123456789",
		"movie.nfo": "nfo text",
		"Sample/sample.mkv": "abc",
	};

	it("strips extras but still finds the nfo", async () => {
		const root = await writeReleaseToDisk(NAME, CONTENTS);
		const release = withoutExtras(await createReleaseFromPath(root));
		expect(release.name).toBe(NAME);
		expect(release.isDirectory).toBe(true);
		expect(release.files).toEqual([
			{
				name: "movie.mkv",
				path: "movie.mkv",
				length: 10,
				absolutePath: join(root, "movie.mkv"),
			},
		]);
		expect(release.length).toBe(10);
		expect(release.nfoPath).toBe(join(root, "movie.nfo"));
		expect(release.parsed.title).toBe("Some Movie");
	});

	it("keeps every file sorted by path when extras are kept", async () => {
		const root = await writeReleaseToDisk(NAME, CONTENTS);
		const release = await createReleaseFromPath(root);
		expect(release.files.map((file) => file.path)).toEqual([
			"Sample/sample.mkv",
			"movie.mkv",
			"movie.nfo",
		]);
		expect(release.length).toBe(21);
	});

	it("finds the nfo next to a single file", async () => {
		const dir = await writeReleaseToDisk("single", {
			"Film.2019.720p.mkv": "x",
			"Film.2019.720p.nfo": "n",
		});
		const release = await createReleaseFromPath(join(dir, "Film.2019.720p.mkv"));
		expect(release.isDirectory).toBe(false);
		expect(release.files).toHaveLength(1);
		expect(release.files[0].path).toBe("Film.2019.720p.mkv");
		expect(release.nfoPath).toBe(join(dir, "Film.2019.720p.nfo"));
		expect(releaseTorrentFiles(release)).toEqual([
			{ name: "Film.2019.720p.mkv", path: "Film.2019.720p.mkv", length: 1 },
		]);
	});

	it("fails for a path that does not exist", async () => {
		const dir = await writeReleaseToDisk("empty", { keep: "" });
		const missing = join(dir, "missing");
		await expect(createReleaseFromPath(missing)).rejects.toThrow(
			new UpseedError(`${missing} does not exist`),
		);
	});

	it("fails to strip a directory with only extras", async () => {
		const root = await writeReleaseToDisk("Extras.Only", { "info.txt": "x" });
		const release = await createReleaseFromPath(root);
		expect(() => withoutExtras(release)).toThrow(
			new UpseedError(`${root} contains no files to release`),
		);
	});

	it("fails for an empty directory", async () => {
		const base = await writeReleaseToDisk("Empty.Release", { "keep.txt": "" });
		const root = join(base, "..", "Nothing");
		await mkdir(root);
		await expect(createReleaseFromPath(root)).rejects.toThrow(
			new UpseedError(`${root} contains no files to release`),
		);
	});

	it("keeps the pdf of a book", async () => {
		const root = await writeReleaseToDisk("Some.Author.Some.Book.2019", {
			"book.pdf": "%PDF-1.4",
		});
		const release = await createReleaseFromPath(root);
		expect(release.files.map((file) => file.path)).toEqual(["book.pdf"]);
		expect(release.length).toBe(8);
		expect(withoutExtras(release).files.map((file) => file.path)).toEqual(["book.pdf"]);
	});

	it("lists torrent paths under the release name", async () => {
		const root = await writeReleaseToDisk(NAME, { "movie.mkv": "0123456789" });
		const release = await createReleaseFromPath(root);
		expect(releaseTorrentFiles(release)).toEqual([
			{ name: "movie.mkv", path: `${NAME}/movie.mkv`, length: 10 },
		]);
	});
});
