import { posix } from "path";
import { ContentType, IdentifierKind, PROGRAM_NAME, PROGRAM_VERSION } from "./constants.js";
import type { IdentitySet } from "./resolve.js";

export interface DescriptionInput {
	contentType: ContentType;
	identity: IdentitySet;
	screenshots?: string[];
	sampleUrl?: string;
	customDescription?: string;
}

const SCREENSHOTS_PER_ROW = 2;

export function identifierLink(
	kind: IdentifierKind,
	id: string,
	contentType: ContentType,
): string {
	switch (kind) {
		case IdentifierKind.TMDB:
			return `https://www.themoviedb.org/${contentType === ContentType.MOVIE ? "movie" : "tv"}/${id}`;
		case IdentifierKind.IMDB:
			return `https://www.imdb.com/title/tt${id}/`;
		case IdentifierKind.TVDB:
			return `https://thetvdb.com/?tab=series&id=${id}`;
		case IdentifierKind.OPEN_LIBRARY:
			return `https://openlibrary.org/works/${id}`;
	}
}

const LINK_LABELS: Record<IdentifierKind, string> = {
	[IdentifierKind.TMDB]: "TMDB",
	[IdentifierKind.IMDB]: "IMDb",
	[IdentifierKind.TVDB]: "TVDB",
	[IdentifierKind.OPEN_LIBRARY]: "Open Library",
};

function screenshotTable(screenshots: string[]): string {
	const rows: string[] = [];
	for (let i = 0; i < screenshots.length; i += SCREENSHOTS_PER_ROW) {
		const cells = screenshots
			.slice(i, i + SCREENSHOTS_PER_ROW)
			.map((url) => `[td][url=${url}][img width=720]${url}[/img][/url][/td]`);
		rows.push(`[tr]${cells.join("")}[/tr]`);
	}
	return `[center][table]\n${rows.join("\n")}\n[/table][/center]`;
}

function identifierLinks(identity: IdentitySet, contentType: ContentType): string | undefined {
	const links = Object.values(IdentifierKind).flatMap((kind) => {
		const identifier = identity.identifiers[kind];
		return identifier
			? [`[url=${identifierLink(kind, identifier.id, contentType)}]${LINK_LABELS[kind]}[/url]`]
			: [];
	});
	return links.length > 0 ? `[center]${links.join(" | ")}[/center]` : undefined;
}

function bookDetails(identity: IdentitySet): string | undefined {
	const { book } = identity;
	if (!book) return undefined;
	const lines = [
		book.coverId !== undefined
			? `[img width=300]https://covers.openlibrary.org/b/id/${book.coverId}-L.jpg[/img]`
			: undefined,
		`[b]${book.title}[/b]${book.year ? ` (${book.year})` : ""}`,
		book.authors.length > 0 ? `by ${book.authors.join(", ")}` : undefined,
	];
	return `[center]${lines.filter((line) => line !== undefined).join("\n")}[/center]`;
}

export function descriptionFooter(): string {
	return `[b][size=12][color=#757575]Created and posted with ${PROGRAM_NAME} ${PROGRAM_VERSION}[/color][/size][/b]`;
}

/**
 * BBCode description for an upload. Identifiers that were not resolved are
 * left out.
 */
export function generateDescription(input: DescriptionInput): string {
	const sections = [
		identifierLinks(input.identity, input.contentType),
		bookDetails(input.identity),
		input.screenshots?.length ? screenshotTable(input.screenshots) : undefined,
		input.sampleUrl
			? `[b][spoiler=Sample: ${posix.basename(input.sampleUrl)}]${input.sampleUrl}[/spoiler][/b]`
			: undefined,
		input.customDescription?.trim() || undefined,
		descriptionFooter(),
	];
	return sections.filter((section) => section !== undefined).join("\n\n");
}
