import chalk from "chalk";
import { OutcomeKind, OverallOutcome } from "./constants.js";
import type { SyncCandidate, SyncReport } from "./sync.js";
import type { TargetOutcome, UploadJob } from "./upload.js";
import { sanitizeInfoHash } from "./utils.js";

export function formatOutcome(tracker: string, outcome: TargetOutcome): string {
	switch (outcome.kind) {
		case OutcomeKind.SUCCEEDED:
			return `${tracker}: ${chalk.green(outcome.kind)}${outcome.receipt.url ? ` (${outcome.receipt.url})` : ""}`;
		case OutcomeKind.FAILED:
			return `${tracker}: ${chalk.red(outcome.kind)} (${outcome.reason})`;
		case OutcomeKind.SKIPPED:
			return `${tracker}: ${chalk.yellow(outcome.kind)} (${outcome.reason})`;
		case OutcomeKind.PENDING:
			return `${tracker}: ${chalk.dim(outcome.kind)}`;
	}
}

function colorOverall(outcome: OverallOutcome): string {
	switch (outcome) {
		case OverallOutcome.SUCCEEDED:
			return chalk.green(outcome);
		case OverallOutcome.SKIPPED:
			return chalk.yellow(outcome);
		case OverallOutcome.PARTIAL_FAILURE:
		case OverallOutcome.FAILED:
			return chalk.red(outcome);
	}
}

export function formatJobReport(job: UploadJob): string[] {
	return [
		...[...job.outcomes].map(([tracker, outcome]) => formatOutcome(tracker, outcome)),
		`${job.uploadName}: ${colorOverall(job.overall ?? OverallOutcome.FAILED)}`,
	];
}

export function formatCandidate(candidate: SyncCandidate): string {
	const { local, remote } = candidate;
	return `${candidate.score.toFixed(2)} ${candidate.kind} ${local.name} [${sanitizeInfoHash(local.infoHash)}] <-> ${remote.tracker}: ${remote.name} [${sanitizeInfoHash(remote.infoHash)}] (${candidate.rationale})`;
}

export function formatSyncReport(report: SyncReport): string[] {
	return [
		...report.candidates.map(formatCandidate),
		`${report.candidates.length} candidate(s) from ${report.remoteCount} remote torrent(s) for ${report.localCount} seeding torrent(s), ${report.actions.length} action(s), ${report.failures} failure(s)`,
	];
}

/**
 * Non-zero when any target failed.
 */
export function exitCodeFor(outcome: OverallOutcome | undefined): number {
	return outcome === OverallOutcome.FAILED ||
		outcome === OverallOutcome.PARTIAL_FAILURE ||
		outcome === undefined
		? 1
		: 0;
}
