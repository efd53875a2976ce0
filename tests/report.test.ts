import stripAnsi from "strip-ansi";
import { describe, expect, it } from "vitest";
import { JobState, MatchKind, OutcomeKind, OverallOutcome } from "../src/constants.js";
import { exitCodeFor, formatCandidate, formatJobReport, formatOutcome } from "../src/report.js";
import { emptyIdentitySet } from "../src/resolve.js";
import type { SyncCandidate } from "../src/sync.js";
import type { UploadJob } from "../src/upload.js";
import { metafileFactory } from "./factories/metafile.js";
import { releaseFactory } from "./factories/release.js";

describe("formatOutcome", () => {
	it("shows the receipt url of a success", () => {
		expect(
			stripAnsi(
				formatOutcome("alpha", {
					kind: OutcomeKind.SUCCEEDED,
					receipt: { message: "uploaded", url: "https://alpha.test/torrents/1" },
				}),
			),
		).toBe("alpha: Succeeded (https://alpha.test/torrents/1)");
	});

	it("shows the reason of a failure", () => {
		expect(
			stripAnsi(
				formatOutcome("beta", { kind: OutcomeKind.FAILED, reason: "submit: HTTP 500 boom" }),
			),
		).toBe("beta: Failed (submit: HTTP 500 boom)");
	});
});

describe("formatJobReport", () => {
	it("lists every target then the overall outcome", () => {
		const job: UploadJob = {
			release: releaseFactory(),
			state: JobState.DONE,
			history: [],
			uploadName: "Some.Movie.2020.1080p.BluRay.x264-GROUP",
			identity: emptyIdentitySet(),
			outcomes: new Map([
				["alpha", { kind: OutcomeKind.SKIPPED, reason: "duplicate" }],
				["beta", { kind: OutcomeKind.FAILED, reason: "preflight: no category mapping for movie" }],
			]),
			overall: OverallOutcome.PARTIAL_FAILURE,
		};
		expect(formatJobReport(job).map((line) => stripAnsi(line))).toEqual([
			"alpha: Skipped (duplicate)",
			"beta: Failed (preflight: no category mapping for movie)",
			"Some.Movie.2020.1080p.BluRay.x264-GROUP: PartialFailure",
		]);
	});
});

describe("formatCandidate", () => {
	it("names both sides of the pair", () => {
		const metafile = metafileFactory();
		const candidate: SyncCandidate = {
			local: {
				infoHash: "a".repeat(40),
				name: "Local.Name",
				length: 40000,
				files: [],
				savePath: "/downloads",
			},
			remote: {
				infoHash: "b".repeat(40),
				name: "Remote.Name",
				length: 40000,
				files: [],
				tracker: "alpha",
				metafile,
			},
			score: 0.8,
			kind: MatchKind.HEURISTIC,
			rationale: "same 1 file(s) totalling 40 kB",
		};
		expect(formatCandidate(candidate)).toBe(
			"0.80 heuristic Local.Name [aaaaaaaa...] <-> alpha: Remote.Name [bbbbbbbb...] (same 1 file(s) totalling 40 kB)",
		);
	});
});

describe("exitCodeFor", () => {
	it("is zero only when nothing failed", () => {
		expect(exitCodeFor(OverallOutcome.SUCCEEDED)).toBe(0);
		expect(exitCodeFor(OverallOutcome.SKIPPED)).toBe(0);
		expect(exitCodeFor(OverallOutcome.PARTIAL_FAILURE)).toBe(1);
		expect(exitCodeFor(OverallOutcome.FAILED)).toBe(1);
		expect(exitCodeFor(undefined)).toBe(1);
	});
});
