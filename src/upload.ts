import { dirname } from "path";
import type { ArtifactBuilder, BuiltPayloads } from "./artifacts.js";
import type { Classification } from "./classify.js";
import type { TorrentClient } from "./clients/TorrentClient.js";
import {
	ContentType,
	InjectionResult,
	JobState,
	OutcomeKind,
	OverallOutcome,
} from "./constants.js";
import {
	ClassificationError,
	errorMessage,
	ResolutionError,
	TargetError,
	type TargetStage,
} from "./errors.js";
import { Label, type Logger } from "./logger.js";
import {
	generateReleaseName,
	type Release,
	requiresVideoArtifacts,
	withoutExtras,
} from "./release.js";
import {
	emptyIdentitySet,
	expectedIdentifierKinds,
	type IdentitySet,
} from "./resolve.js";
import { type Result, resultOfErr } from "./Result.js";
import { categoryFor } from "./trackers/common.js";
import type { SubmitReceipt, Tracker, UploadPayload } from "./trackers/Tracker.js";
import { formatAsList } from "./utils.js";

export type TargetOutcome =
	| { kind: OutcomeKind.PENDING }
	| { kind: OutcomeKind.SUCCEEDED; receipt: SubmitReceipt }
	| { kind: OutcomeKind.FAILED; reason: string }
	| { kind: OutcomeKind.SKIPPED; reason: string };

export interface UploadJob {
	release: Release;
	state: JobState;
	history: { state: JobState; at: number }[];
	uploadName: string;
	classification?: Classification;
	contentType?: ContentType;
	identity: IdentitySet;
	outcomes: Map<string, TargetOutcome>;
	overall?: OverallOutcome;
}

export interface UploadDependencies {
	classify(release: Release): Promise<Classification>;
	resolver: {
		resolve(release: Release, contentType: ContentType): Promise<IdentitySet>;
	};
	trackers: Tracker[];
	artifacts: ArtifactBuilder;
	client?: TorrentClient;
	logger: Logger;
}

export interface UploadOptions {
	/**
	 * Stop after the duplicate check, building and submitting nothing.
	 */
	preflightOnly?: boolean;
	/**
	 * Add each uploaded torrent to the torrent client, pointing at the
	 * release on disk.
	 */
	seedAfterUpload?: boolean;
	/**
	 * Leave samples, proofs and text files out of video releases. Other
	 * content types keep every file.
	 */
	stripExtras?: boolean;
	clientCategory?: string;
	now?: () => number;
}

const PENDING: TargetOutcome = { kind: OutcomeKind.PENDING };

/**
 * Every target skipped is Skipped, every target succeeded is Succeeded,
 * every target failed is Failed. Any other mix is a PartialFailure.
 */
export function overallOutcome(outcomes: TargetOutcome[]): OverallOutcome {
	const count = (kind: OutcomeKind) =>
		outcomes.filter((outcome) => outcome.kind === kind).length;
	if (count(OutcomeKind.SKIPPED) === outcomes.length) return OverallOutcome.SKIPPED;
	if (count(OutcomeKind.SUCCEEDED) === outcomes.length) {
		return OverallOutcome.SUCCEEDED;
	}
	if (count(OutcomeKind.FAILED) === outcomes.length) return OverallOutcome.FAILED;
	return OverallOutcome.PARTIAL_FAILURE;
}

/**
 * A tracker that throws instead of returning an error still only fails
 * its own target.
 */
async function guarded<T>(
	tracker: string,
	stage: TargetStage,
	call: () => Promise<Result<T, TargetError>>,
): Promise<Result<T, TargetError>> {
	try {
		return await call();
	} catch (e) {
		return resultOfErr(new TargetError(tracker, stage, errorMessage(e), { cause: e }));
	}
}

/**
 * Drives one release through classification, identification, duplicate
 * checks, artifact building and submission. Each tracker target ends with
 * its own outcome; one target failing never affects another.
 */
export class UploadOrchestrator {
	private readonly now: () => number;

	constructor(
		private readonly deps: UploadDependencies,
		private readonly options: UploadOptions = {},
	) {
		this.now = options.now ?? Date.now;
	}

	private transition(job: UploadJob, state: JobState): void {
		job.state = state;
		job.history.push({ state, at: this.now() });
		this.deps.logger.verbose({
			label: Label.UPLOAD,
			message: `${job.release.name}: ${state}`,
		});
	}

	private pendingTrackers(job: UploadJob): Tracker[] {
		return this.deps.trackers.filter(
			(tracker) => job.outcomes.get(tracker.name)?.kind === OutcomeKind.PENDING,
		);
	}

	private settle(job: UploadJob, tracker: string, outcome: TargetOutcome): void {
		job.outcomes.set(tracker, outcome);
		const { logger } = this.deps;
		if (outcome.kind === OutcomeKind.FAILED) {
			logger.error({ label: Label.UPLOAD, message: `${tracker}: ${outcome.reason}` });
		} else if (outcome.kind === OutcomeKind.SKIPPED) {
			logger.info({ label: Label.UPLOAD, message: `${tracker}: skipped (${outcome.reason})` });
		} else if (outcome.kind === OutcomeKind.SUCCEEDED) {
			logger.info({
				label: Label.UPLOAD,
				message: `${tracker}: uploaded${outcome.receipt.url ? ` ${outcome.receipt.url}` : ""}`,
			});
		}
	}

	private finish(job: UploadJob): UploadJob {
		this.transition(job, JobState.DONE);
		job.overall = overallOutcome([...job.outcomes.values()]);
		return job;
	}

	private fail(job: UploadJob, reason: string): UploadJob {
		for (const tracker of this.pendingTrackers(job)) {
			this.settle(job, tracker.name, { kind: OutcomeKind.FAILED, reason });
		}
		this.transition(job, JobState.FAILED);
		job.overall = overallOutcome([...job.outcomes.values()]);
		return job;
	}

	async run(release: Release): Promise<UploadJob> {
		const job: UploadJob = {
			release,
			state: JobState.CLASSIFYING,
			history: [],
			uploadName: generateReleaseName(release.name),
			identity: emptyIdentitySet(),
			outcomes: new Map(this.deps.trackers.map((tracker) => [tracker.name, PENDING])),
		};
		this.transition(job, JobState.CLASSIFYING);

		let classification: Classification;
		try {
			classification = await this.deps.classify(release);
		} catch (e) {
			return this.fail(job, `classify: ${errorMessage(e)}`);
		}
		job.classification = classification;
		if (classification.ambiguous) {
			const error = new ClassificationError(
				`Could not tell what ${release.name} is${
					classification.candidates.length > 0
						? ` (best guess ${classification.candidates[0].contentType} at ${classification.confidence})`
						: ""
				}, pass --content-type or --category`,
			);
			return this.fail(job, error.message);
		}
		const { contentType } = classification;
		job.contentType = contentType;
		if (this.options.stripExtras && requiresVideoArtifacts(contentType)) {
			try {
				job.release = withoutExtras(release);
			} catch (e) {
				return this.fail(job, `classify: ${errorMessage(e)}`);
			}
		}

		if (expectedIdentifierKinds(contentType).length > 0) {
			this.transition(job, JobState.RESOLVING);
			try {
				job.identity = await this.deps.resolver.resolve(job.release, contentType);
			} catch (e) {
				if (e instanceof ResolutionError) return this.fail(job, e.message);
				if (contentType !== ContentType.EBOOK) {
					return this.fail(job, `resolve: ${errorMessage(e)}`);
				}
				this.deps.logger.warn({
					label: Label.UPLOAD,
					message: `Book lookup failed, continuing without it: ${errorMessage(e)}`,
				});
			}
		}

		this.transition(job, JobState.PREFLIGHT);
		await this.preflight(job, contentType);
		if (this.pendingTrackers(job).length === 0) return this.finish(job);
		if (this.options.preflightOnly) {
			for (const tracker of this.pendingTrackers(job)) {
				this.settle(job, tracker.name, {
					kind: OutcomeKind.SKIPPED,
					reason: "preflight only",
				});
			}
			return this.finish(job);
		}

		this.transition(job, JobState.BUILDING);
		const payloads = await this.build(job, contentType);

		this.transition(job, JobState.SUBMITTING);
		await this.submit(job, payloads);
		return this.finish(job);
	}

	private async preflight(job: UploadJob, contentType: ContentType): Promise<void> {
		const { release, identity, uploadName } = job;
		await Promise.all(
			this.pendingTrackers(job).map(async (tracker) => {
				if (!categoryFor(tracker.config, contentType, release.override)) {
					const error = new TargetError(
						tracker.name,
						"preflight",
						`no category mapping for ${contentType}`,
					);
					this.settle(job, tracker.name, { kind: OutcomeKind.FAILED, reason: error.reason });
					return;
				}
				const result = await guarded(tracker.name, "preflight", () =>
					tracker.preflight({ release, contentType, identity, uploadName }),
				);
				if (result.isErr()) {
					this.settle(job, tracker.name, {
						kind: OutcomeKind.FAILED,
						reason: result.unwrapErr().reason,
					});
					return;
				}
				const { duplicate, matches } = result.unwrap();
				if (duplicate) {
					this.settle(job, tracker.name, {
						kind: OutcomeKind.SKIPPED,
						reason: matches.length > 0
							? `duplicate: ${formatAsList(matches.slice(0, 3), { sort: true })}`
							: "duplicate",
					});
				}
			}),
		);
	}

	private async build(
		job: UploadJob,
		contentType: ContentType,
	): Promise<Map<string, UploadPayload>> {
		const trackers = this.pendingTrackers(job);
		const built = new Map<string, UploadPayload>();
		let payloads: BuiltPayloads;
		try {
			payloads = await this.deps.artifacts.build({
				release: job.release,
				contentType,
				identity: job.identity,
				uploadName: job.uploadName,
				trackers,
			});
		} catch (e) {
			for (const tracker of trackers) {
				this.settle(job, tracker.name, {
					kind: OutcomeKind.FAILED,
					reason: `build: ${errorMessage(e)}`,
				});
			}
			return built;
		}
		for (const tracker of trackers) {
			const payload = payloads.get(tracker.name);
			if (!payload) {
				this.settle(job, tracker.name, {
					kind: OutcomeKind.FAILED,
					reason: "build: no payload was built",
				});
			} else if (payload.isErr()) {
				this.settle(job, tracker.name, {
					kind: OutcomeKind.FAILED,
					reason: payload.unwrapErr().reason,
				});
			} else {
				built.set(tracker.name, payload.unwrap());
			}
		}
		return built;
	}

	private async submit(
		job: UploadJob,
		payloads: Map<string, UploadPayload>,
	): Promise<void> {
		await Promise.all(
			this.pendingTrackers(job).map(async (tracker) => {
				const payload = payloads.get(tracker.name);
				if (!payload) return;
				const result = await guarded(tracker.name, "submit", () =>
					tracker.submit(payload),
				);
				if (result.isErr()) {
					this.settle(job, tracker.name, {
						kind: OutcomeKind.FAILED,
						reason: result.unwrapErr().reason,
					});
					return;
				}
				this.settle(job, tracker.name, {
					kind: OutcomeKind.SUCCEEDED,
					receipt: result.unwrap(),
				});
				if (this.options.seedAfterUpload) {
					await this.seed(job, tracker.name, payload);
				}
			}),
		);
	}

	private async seed(
		job: UploadJob,
		tracker: string,
		payload: UploadPayload,
	): Promise<void> {
		const { client, logger } = this.deps;
		if (!client) {
			logger.warn({
				label: Label.UPLOAD,
				message: `No torrent client configured, not seeding ${tracker}'s torrent`,
			});
			return;
		}
		let result: InjectionResult;
		try {
			result = await client.addTorrent(payload.torrent, {
				savePath: dirname(job.release.root),
				category: this.options.clientCategory,
				skipChecking: true,
				paused: false,
			});
		} catch (e) {
			logger.error({
				label: Label.UPLOAD,
				message: `Uploaded to ${tracker} but could not add the torrent to ${client.label}: ${errorMessage(e)}`,
			});
			return;
		}
		if (result === InjectionResult.FAILURE) {
			logger.error({
				label: Label.UPLOAD,
				message: `Uploaded to ${tracker} but could not add the torrent to ${client.label}`,
			});
		} else {
			logger.info({
				label: Label.UPLOAD,
				message: `Seeding ${tracker}'s torrent from ${client.label} (${result})`,
			});
		}
	}
}
