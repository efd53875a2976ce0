import { describe, expect, it } from "vitest";
import { ContentType, IdentifierKind, PROGRAM_VERSION } from "../src/constants.js";
import { descriptionFooter, generateDescription, identifierLink } from "../src/description.js";
import { emptyIdentitySet } from "../src/resolve.js";
import { identityFactory, resolvedIdentifier } from "./factories/identity.js";

describe("identifierLink", () => {
	it("links movies and shows to different TMDB pages", () => {
		expect(identifierLink(IdentifierKind.TMDB, "1", ContentType.MOVIE)).toBe(
			"https://www.themoviedb.org/movie/1",
		);
		expect(identifierLink(IdentifierKind.TMDB, "1", ContentType.BOXSET)).toBe(
			"https://www.themoviedb.org/tv/1",
		);
	});

	it("puts the tt prefix back on IMDb ids", () => {
		expect(identifierLink(IdentifierKind.IMDB, "0133093", ContentType.MOVIE)).toBe(
			"https://www.imdb.com/title/tt0133093/",
		);
	});
});

describe("generateDescription", () => {
	it("has only the footer when there is nothing to show", () => {
		expect(
			generateDescription({ contentType: ContentType.OTHER, identity: emptyIdentitySet() }),
		).toBe(descriptionFooter());
		expect(descriptionFooter()).toBe(
			`[b][size=12][color=#757575]Created and posted with upseed ${PROGRAM_VERSION}[/color][/size][/b]`,
		);
	});

	it("joins links, screenshots, the sample and the custom text", () => {
		const description = generateDescription({
			contentType: ContentType.MOVIE,
			identity: identityFactory(),
			screenshots: [
				"https://img.test/1.png",
				"https://img.test/2.png",
				"https://img.test/3.png",
			],
			sampleUrl: "https://img.test/sample.mkv",
			customDescription: "  Enjoy  ",
		});
		const cell = (n: number) =>
			`[td][url=https://img.test/${n}.png][img width=720]https://img.test/${n}.png[/img][/url][/td]`;
		expect(description.split("\n\n")).toEqual([
			"[center][url=https://www.themoviedb.org/movie/603]TMDB[/url] | [url=https://www.imdb.com/title/tt0133093/]IMDb[/url][/center]",
			`[center][table]\n[tr]${cell(1)}${cell(2)}[/tr]\n[tr]${cell(3)}[/tr]\n[/table][/center]`,
			"[b][spoiler=Sample: sample.mkv]https://img.test/sample.mkv[/spoiler][/b]",
			"Enjoy",
			descriptionFooter(),
		]);
	});

	it("describes a book", () => {
		const description = generateDescription({
			contentType: ContentType.EBOOK,
			identity: {
				...emptyIdentitySet(),
				identifiers: {
					[IdentifierKind.OPEN_LIBRARY]: resolvedIdentifier(
						IdentifierKind.OPEN_LIBRARY,
						"OL1W",
					),
				},
				book: { title: "Book Title", authors: ["Author Name"], year: 2019, coverId: 42 },
			},
		});
		expect(description).toBe(
			[
				"[center][url=https://openlibrary.org/works/OL1W]Open Library[/url][/center]",
				"[center][img width=300]https://covers.openlibrary.org/b/id/42-L.jpg[/img]\n[b]Book Title[/b] (2019)\nby Author Name[/center]",
				descriptionFooter(),
			].join("\n\n"),
		);
	});
});
