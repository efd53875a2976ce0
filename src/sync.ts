import type { SeedingTorrent, TorrentClient } from "./clients/TorrentClient.js";
import {
	Action,
	type ActionResult,
	InjectionResult,
	MatchKind,
	SaveResult,
} from "./constants.js";
import { CodecError, errorMessage } from "./errors.js";
import { Label, type Logger } from "./logger.js";
import { type CrossSeedCandidate, matchCrossSeeds } from "./match.js";
import { Metafile, type TorrentFile } from "./parseTorrent.js";
import { parseReleaseName } from "./release.js";
import { saveTorrentFile } from "./torrent.js";
import type { CatalogEntry, CatalogQuery, Tracker } from "./trackers/Tracker.js";
import { getLogString } from "./utils.js";

export interface RemoteTorrent {
	infoHash: string;
	name: string;
	length: number;
	files: TorrentFile[];
	tracker: string;
	metafile: Metafile;
}

export type SyncCandidate = CrossSeedCandidate<SeedingTorrent, RemoteTorrent>;

export interface SyncOptions {
	client: TorrentClient;
	trackers: Tracker[];
	action: Action;
	outputDir: string;
	/**
	 * Heuristic candidates below this score are reported but not acted on.
	 */
	minScore: number;
	heuristicScore: number;
	clientCategory?: string;
	logger: Logger;
}

export interface SyncReport {
	localCount: number;
	remoteCount: number;
	candidates: SyncCandidate[];
	actions: { candidate: SyncCandidate; result: ActionResult }[];
	failures: number;
}

export function catalogQueryFor(torrent: { name: string }): CatalogQuery {
	const { title, year, season, episode } = parseReleaseName(torrent.name);
	return { name: year ? `${title} ${year}` : title, season, episode };
}

function toRemoteTorrent(tracker: string, metafile: Metafile): RemoteTorrent {
	return {
		infoHash: metafile.infoHash,
		name: metafile.name,
		length: metafile.length,
		files: metafile.files,
		tracker,
		metafile,
	};
}

async function searchTracker(
	tracker: Tracker,
	local: SeedingTorrent[],
	logger: Logger,
): Promise<CatalogEntry[]> {
	const { searchCatalog } = tracker;
	if (!searchCatalog) return [];
	const entries = new Map<string, CatalogEntry>();
	for (const torrent of local) {
		const result = await searchCatalog.call(tracker, catalogQueryFor(torrent));
		if (result.isErr()) {
			logger.warn({
				label: Label.SYNC,
				message: `${tracker.name} search for ${torrent.name} failed: ${result.unwrapErr().reason}`,
			});
			continue;
		}
		for (const entry of result.unwrap()) entries.set(entry.downloadUrl, entry);
	}
	return [...entries.values()];
}

async function fetchRemoteTorrents(
	tracker: Tracker,
	entries: CatalogEntry[],
	logger: Logger,
): Promise<RemoteTorrent[]> {
	const { downloadTorrent } = tracker;
	if (!downloadTorrent) return [];
	const remote: RemoteTorrent[] = [];
	for (const entry of entries) {
		const result = await downloadTorrent.call(tracker, entry);
		if (result.isErr()) {
			logger.warn({
				label: Label.SYNC,
				message: `Could not download ${entry.name} from ${tracker.name}: ${result.unwrapErr().reason}`,
			});
			continue;
		}
		try {
			remote.push(toRemoteTorrent(tracker.name, Metafile.decode(result.unwrap())));
		} catch (e) {
			if (!(e instanceof CodecError)) throw e;
			logger.warn({
				label: Label.SYNC,
				message: `Skipping ${entry.name} from ${tracker.name}: ${e.message}`,
			});
		}
	}
	return remote;
}

async function performAction(
	candidate: SyncCandidate,
	options: SyncOptions,
): Promise<ActionResult> {
	const { local, remote } = candidate;
	if (options.action === Action.SAVE) {
		await saveTorrentFile(
			remote.metafile,
			options.outputDir,
			`[${remote.tracker}] ${remote.metafile.getFileSystemSafeName()}`,
		);
		return SaveResult.SAVED;
	}
	// a renamed root folder would not be found on disk, let the client check
	const sameRoot = remote.name === local.name;
	return options.client.addTorrent(remote.metafile, {
		savePath: local.savePath,
		category: options.clientCategory ?? local.category,
		skipChecking: sameRoot,
		paused: !sameRoot,
	});
}

/**
 * Searches every tracker's catalog for what the client is seeding, matches
 * the results and saves or injects the heuristic matches.
 */
export async function syncCrossSeeds(options: SyncOptions): Promise<SyncReport> {
	const { client, logger } = options;
	const local = await client.getSeedingTorrents();
	logger.info({
		label: Label.SYNC,
		message: `Searching for ${local.length} seeding torrent(s) from ${client.label}`,
	});

	const remote: RemoteTorrent[] = [];
	for (const tracker of options.trackers) {
		if (!tracker.searchCatalog || !tracker.downloadTorrent) {
			logger.verbose({
				label: Label.SYNC,
				message: `${tracker.name} has no catalog search, skipping`,
			});
			continue;
		}
		const entries = await searchTracker(tracker, local, logger);
		remote.push(...(await fetchRemoteTorrents(tracker, entries, logger)));
	}

	const candidates = matchCrossSeeds(local, remote, {
		heuristicScore: options.heuristicScore,
	});
	const report: SyncReport = {
		localCount: local.length,
		remoteCount: remote.length,
		candidates,
		actions: [],
		failures: 0,
	};
	for (const candidate of candidates) {
		if (candidate.kind === MatchKind.EXACT) continue;
		if (candidate.score < options.minScore) continue;
		let result: ActionResult;
		try {
			result = await performAction(candidate, options);
		} catch (e) {
			report.failures++;
			logger.error({
				label: Label.SYNC,
				message: `Failed to ${options.action} ${getLogString(candidate.remote)}: ${errorMessage(e)}`,
			});
			continue;
		}
		if (result === InjectionResult.FAILURE) report.failures++;
		report.actions.push({ candidate, result });
		logger.info({
			label: Label.SYNC,
			message: `${result}: ${getLogString(candidate.remote)} from ${candidate.remote.tracker} for ${getLogString(candidate.local)}`,
		});
	}
	return report;
}
