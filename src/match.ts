import { MatchKind } from "./constants.js";
import type { TorrentFingerprint } from "./parseTorrent.js";
import { comparing, humanReadableSize, sanitizeInfoHash } from "./utils.js";

export interface CrossSeedCandidate<
	L extends TorrentFingerprint = TorrentFingerprint,
	R extends TorrentFingerprint = TorrentFingerprint,
> {
	local: L;
	remote: R;
	score: number;
	kind: MatchKind;
	rationale: string;
}

export interface MatchOptions {
	/**
	 * Score given to file layout matches. Exact matches always score 1.
	 */
	heuristicScore: number;
}

/**
 * File paths relative to the torrent's root folder, so a repack with a
 * renamed folder still lines up.
 */
function relativePaths(fingerprint: TorrentFingerprint): string[] {
	const prefix = `${fingerprint.name}/`;
	const paths = fingerprint.files.map((file) => file.path);
	return paths.every((path) => path.startsWith(prefix))
		? paths.map((path) => path.slice(prefix.length))
		: paths;
}

/**
 * Order-insensitive key of (path, length) pairs.
 */
export function fileLayoutKey(fingerprint: TorrentFingerprint): string {
	const paths = relativePaths(fingerprint);
	return fingerprint.files
		.map((file, i) => `${paths[i]}\u0000${file.length}`)
		.sort()
		.join("\u0001");
}

function groupBy<T, K>(items: T[], key: (item: T) => K): Map<K, T[]> {
	const groups = new Map<K, T[]>();
	for (const item of items) {
		const k = key(item);
		const group = groups.get(k);
		if (group) group.push(item);
		else groups.set(k, [item]);
	}
	return groups;
}

/**
 * Pairs every remote torrent with the local torrents it could be seeded
 * from. An identical info-hash is an exact match. Otherwise torrents of
 * the same total size whose files agree on (path, length) are a heuristic
 * match. The result does not depend on the order of either input.
 */
export function matchCrossSeeds<
	L extends TorrentFingerprint,
	R extends TorrentFingerprint & { tracker?: string },
>(local: L[], remote: R[], options: MatchOptions): CrossSeedCandidate<L, R>[] {
	const localByHash = groupBy(local, (torrent) => torrent.infoHash);
	const localBySize = groupBy(local, (torrent) => torrent.length);
	const layoutKeys = new Map<TorrentFingerprint, string>();
	const layoutOf = (fingerprint: TorrentFingerprint): string => {
		let key = layoutKeys.get(fingerprint);
		if (key === undefined) {
			key = fileLayoutKey(fingerprint);
			layoutKeys.set(fingerprint, key);
		}
		return key;
	};

	const candidates = new Map<string, CrossSeedCandidate<L, R>>();
	const add = (candidate: CrossSeedCandidate<L, R>) => {
		const pairKey = `${candidate.local.infoHash}:${candidate.remote.infoHash}`;
		const existing = candidates.get(pairKey);
		// the same torrent listed by several trackers is reported for the first by name
		if (
			!existing ||
			(candidate.remote.tracker ?? "") < (existing.remote.tracker ?? "")
		) {
			candidates.set(pairKey, candidate);
		}
	};

	for (const remoteTorrent of remote) {
		const exact = localByHash.get(remoteTorrent.infoHash);
		if (exact) {
			for (const localTorrent of exact) {
				add({
					local: localTorrent,
					remote: remoteTorrent,
					score: 1,
					kind: MatchKind.EXACT,
					rationale: `identical info-hash ${sanitizeInfoHash(remoteTorrent.infoHash)}`,
				});
			}
			continue;
		}
		const sameSize = localBySize.get(remoteTorrent.length);
		if (!sameSize) continue;
		const remoteLayout = layoutOf(remoteTorrent);
		for (const localTorrent of sameSize) {
			if (localTorrent.files.length !== remoteTorrent.files.length) continue;
			if (layoutOf(localTorrent) !== remoteLayout) continue;
			add({
				local: localTorrent,
				remote: remoteTorrent,
				score: options.heuristicScore,
				kind: MatchKind.HEURISTIC,
				rationale: `same ${remoteTorrent.files.length} file(s) totalling ${humanReadableSize(remoteTorrent.length)}`,
			});
		}
	}

	return [...candidates.values()].sort(
		comparing(
			(candidate) => -candidate.score,
			(candidate) => candidate.local.infoHash,
			(candidate) => candidate.remote.infoHash,
		),
	);
}
