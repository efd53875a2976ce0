import { distance } from "fastest-levenshtein";
import {
	ContentType,
	IdentifierKind,
	ServiceStatus,
	VIDEO_IDENTIFIER_KINDS,
} from "./constants.js";
import { errorMessage, ResolutionError } from "./errors.js";
import type {
	BookDetails,
	IdentificationService,
	IdentityCandidate,
	IdentityQuery,
	ServiceResult,
} from "./identification/IdentificationService.js";
import { Label, type Logger } from "./logger.js";
import { isVideoContentType, type Release } from "./release.js";
import { resultOfErr } from "./Result.js";
import { comparing, formatAsList, isTruthy, normalizeTitle } from "./utils.js";

export interface ResolvedIdentifier {
	kind: IdentifierKind;
	id: string;
	title: string;
	year?: number;
	confidence: number;
	services: string[];
	/**
	 * More than one distinct id cleared the threshold. The one whose title
	 * is closest to the release title was kept.
	 */
	ambiguous: boolean;
	alternatives: string[];
}

export interface ProvenanceEntry {
	service: string;
	phase: "search" | "expand";
	status: ServiceStatus;
	candidates: number;
	message?: string;
}

export interface IdentitySet {
	identifiers: Partial<Record<IdentifierKind, ResolvedIdentifier>>;
	unresolved: IdentifierKind[];
	query?: IdentityQuery;
	book?: BookDetails;
	provenance: ProvenanceEntry[];
}

export interface ResolverOptions {
	services: IdentificationService[];
	threshold: number;
	logger: Logger;
}

export function emptyIdentitySet(): IdentitySet {
	return { identifiers: {}, unresolved: [], provenance: [] };
}

export function expectedIdentifierKinds(
	contentType: ContentType,
): IdentifierKind[] {
	if (contentType === ContentType.MOVIE) {
		return [IdentifierKind.TMDB, IdentifierKind.IMDB];
	}
	if (isVideoContentType(contentType)) return [...VIDEO_IDENTIFIER_KINDS];
	if (contentType === ContentType.EBOOK) return [IdentifierKind.OPEN_LIBRARY];
	return [];
}

export function buildQuery(
	release: Release,
	contentType: ContentType,
): IdentityQuery {
	const { title, year, season, episode, author } = release.parsed;
	return { contentType, title, year, season, episode, author };
}

interface MergedCandidate {
	id: string;
	title: string;
	year?: number;
	confidence: number;
	services: Set<string>;
	book?: BookDetails;
}

/**
 * Picks the identifier of one kind from every service's candidates.
 * Candidates with the same id merge and keep their best confidence.
 */
export function reconcile(
	kind: IdentifierKind,
	candidates: IdentityCandidate[],
	threshold: number,
	queryTitle: string,
): (ResolvedIdentifier & { book?: BookDetails }) | undefined {
	const merged = new Map<string, MergedCandidate>();
	for (const candidate of candidates) {
		if (candidate.kind !== kind) continue;
		const existing = merged.get(candidate.id);
		if (!existing) {
			merged.set(candidate.id, {
				id: candidate.id,
				title: candidate.title,
				year: candidate.year,
				confidence: candidate.confidence,
				services: new Set([candidate.service]),
				book: candidate.book,
			});
			continue;
		}
		existing.services.add(candidate.service);
		if (candidate.confidence > existing.confidence) {
			existing.confidence = candidate.confidence;
			existing.title = candidate.title;
			existing.year = candidate.year;
			existing.book = candidate.book ?? existing.book;
		}
	}

	const accepted = [...merged.values()].filter(
		(candidate) => candidate.confidence >= threshold,
	);
	if (accepted.length === 0) return undefined;

	const normalizedQuery = normalizeTitle(queryTitle);
	const [winner, ...rest] = accepted.sort(
		comparing(
			(c) => distance(normalizeTitle(c.title), normalizedQuery),
			(c) => -c.confidence,
			(c) => c.id,
		),
	);
	return {
		kind,
		id: winner.id,
		title: winner.title,
		year: winner.year,
		confidence: winner.confidence,
		services: [...winner.services].sort(),
		ambiguous: rest.length > 0,
		alternatives: rest.map((c) => c.id),
		book: winner.book,
	};
}

async function callService(
	service: IdentificationService,
	call: () => Promise<ServiceResult>,
): Promise<ServiceResult> {
	try {
		return await call();
	} catch (e) {
		return resultOfErr({
			status: ServiceStatus.UNREACHABLE,
			message: `${service.name} failed: ${errorMessage(e)}`,
		});
	}
}

/**
 * Resolves external identifiers for a release by querying every applicable
 * service concurrently and reconciling their answers.
 */
export class MetadataResolver {
	constructor(private readonly options: ResolverOptions) {}

	private collect(
		results: { service: IdentificationService; result: ServiceResult }[],
		phase: ProvenanceEntry["phase"],
		candidates: IdentityCandidate[],
		provenance: ProvenanceEntry[],
	): void {
		const { logger } = this.options;
		for (const { service, result } of results) {
			if (result.isOk()) {
				const found = result.unwrap();
				candidates.push(...found);
				provenance.push({
					service: service.name,
					phase,
					status: found.length > 0 ? ServiceStatus.OK : ServiceStatus.EMPTY,
					candidates: found.length,
				});
			} else {
				const failure = result.unwrapErr();
				provenance.push({
					service: service.name,
					phase,
					status: failure.status,
					candidates: 0,
					message: failure.message,
				});
				logger.warn({
					label: Label.RESOLVE,
					message: `${service.name} ${phase} ${failure.status === ServiceStatus.TIMEOUT ? "timed out" : "is unreachable"}: ${failure.message}`,
				});
			}
		}
	}

	async resolve(release: Release, contentType: ContentType): Promise<IdentitySet> {
		const { logger, threshold } = this.options;
		const expected = expectedIdentifierKinds(contentType);
		if (expected.length === 0) return emptyIdentitySet();

		const query = buildQuery(release, contentType);
		const services = this.options.services.filter((service) =>
			service.supports(contentType),
		);
		if (services.length === 0) {
			logger.warn({
				label: Label.RESOLVE,
				message: `No identification service is configured for ${contentType}, continuing without identifiers`,
			});
			return { ...emptyIdentitySet(), query, unresolved: expected };
		}

		const candidates: IdentityCandidate[] = [];
		const provenance: ProvenanceEntry[] = [];
		const searchResults = await Promise.all(
			services.map(async (service) => ({
				service,
				result: await callService(service, () => service.search(query)),
			})),
		);
		this.collect(searchResults, "search", candidates, provenance);

		if (
			isVideoContentType(contentType) &&
			provenance.every((entry) => entry.status === ServiceStatus.UNREACHABLE)
		) {
			throw new ResolutionError(
				`Could not resolve ${release.name}: ${formatAsList(
					services.map((service) => service.name),
					{ sort: true },
				)} ${services.length > 1 ? "are" : "is"} unreachable`,
			);
		}

		const identifiers: IdentitySet["identifiers"] = {};
		let book: BookDetails | undefined;
		const reconcileKinds = (kinds: IdentifierKind[]) => {
			for (const kind of kinds) {
				const resolved = reconcile(kind, candidates, threshold, query.title);
				if (!resolved) continue;
				const { book: resolvedBook, ...identifier } = resolved;
				identifiers[kind] = identifier;
				book ??= resolvedBook;
				if (identifier.ambiguous) {
					logger.warn({
						label: Label.RESOLVE,
						message: `${kind} is ambiguous for ${release.name}: chose ${identifier.id} (${identifier.title}) over ${identifier.alternatives.join(", ")}`,
					});
				}
			}
		};
		reconcileKinds(expected);

		const resolvedSoFar = Object.values(identifiers).filter(isTruthy);
		const expanders = services.flatMap((service) =>
			service.expand ? [{ service, expand: service.expand.bind(service) }] : [],
		);
		if (
			resolvedSoFar.length > 0 &&
			expanders.length > 0 &&
			expected.some((kind) => !identifiers[kind])
		) {
			const expandResults = await Promise.all(
				expanders.flatMap(({ service, expand }) =>
					resolvedSoFar.map(async (identifier) => ({
						service,
						result: await callService(service, () =>
							expand(identifier, query),
						),
					})),
				),
			);
			this.collect(expandResults, "expand", candidates, provenance);
			reconcileKinds(expected.filter((kind) => !identifiers[kind]));
		}

		const unresolved = expected.filter((kind) => !identifiers[kind]);
		logger.verbose({
			label: Label.RESOLVE,
			message: `${release.name}: ${
				Object.values(identifiers)
					.filter(isTruthy)
					.map((identifier) => `${identifier.kind}=${identifier.id} (${identifier.confidence})`)
					.join(", ") || "no identifiers"
			}${unresolved.length > 0 ? `, unresolved ${unresolved.join(", ")}` : ""}`,
		});
		return { identifiers, unresolved, query, book, provenance };
	}
}
