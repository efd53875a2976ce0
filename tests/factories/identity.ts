import { IdentifierKind } from "../../src/constants.js";
import type { IdentitySet, ResolvedIdentifier } from "../../src/resolve.js";

export const resolvedIdentifier = (
	kind: IdentifierKind,
	id: string,
	overrides: Partial<ResolvedIdentifier> = {},
): ResolvedIdentifier => ({
	kind,
	id,
	title: "Some Movie",
	year: 2020,
	confidence: 0.9,
	services: ["tmdb"],
	ambiguous: false,
	alternatives: [],
	...overrides,
});

export const identityFactory = (overrides: Partial<IdentitySet> = {}): IdentitySet => ({
	identifiers: {
		[IdentifierKind.TMDB]: resolvedIdentifier(IdentifierKind.TMDB, "603"),
		[IdentifierKind.IMDB]: resolvedIdentifier(IdentifierKind.IMDB, "0133093"),
	},
	unresolved: [],
	provenance: [],
	...overrides,
});
