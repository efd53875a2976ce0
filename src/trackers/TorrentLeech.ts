import type { TrackerConfig } from "../configSchema.js";
import { errorMessage, TargetError } from "../errors.js";
import { request } from "../http.js";
import { Label } from "../logger.js";
import { type Result, resultOf, resultOfErr } from "../Result.js";
import { toTargetError, torrentBlob } from "./common.js";
import type {
	PreflightQuery,
	PreflightResult,
	SubmitReceipt,
	Tracker,
	TrackerContext,
	UploadPayload,
} from "./Tracker.js";

const DUPLICATE_MARKER = "Duplicate torrent";

/**
 * TorrentLeech's upload API. There is no search endpoint, so duplicates
 * only show up when the upload is rejected.
 */
export default class TorrentLeech implements Tracker {
	readonly name: string;

	constructor(
		readonly config: TrackerConfig,
		private readonly context: TrackerContext,
	) {
		this.name = config.name;
	}

	async preflight(
		query: PreflightQuery,
	): Promise<Result<PreflightResult, TargetError>> {
		this.context.logger.verbose({
			label: Label.TORRENTLEECH,
			message: `${this.name} has no search API, not checking for duplicates of ${query.uploadName}`,
		});
		return resultOf({ duplicate: false, checked: false, matches: [] });
	}

	async submit(
		payload: UploadPayload,
	): Promise<Result<SubmitReceipt, TargetError>> {
		const nfo = payload.nfo?.content ?? Buffer.from(payload.mediainfo ?? "");
		const form = new FormData();
		form.append("announcekey", this.config.apiKey);
		form.append("category", String(payload.categoryId));
		form.append(
			"nfo",
			new Blob([new Uint8Array(nfo)]),
			payload.nfo?.filename ?? `${payload.name}.nfo`,
		);
		form.append(
			"torrent",
			torrentBlob(payload.torrent.encode()),
			`${payload.torrentFilename}.torrent`,
		);

		const res = await request(
			this.config.url,
			{ method: "POST", body: form },
			{ ...this.context.policy, retries: 0 },
			{
				logger: this.context.logger,
				label: Label.TORRENTLEECH,
				fetch: this.context.fetch,
			},
		);
		if (res.isErr()) {
			return resultOfErr(toTargetError(this.name, "submit", res.unwrapErr()));
		}
		let text: string;
		try {
			text = (await res.unwrap().text()).trim();
		} catch (e) {
			return resultOfErr(
				new TargetError(this.name, "submit", `unreadable response: ${errorMessage(e)}`),
			);
		}
		if (text.includes(DUPLICATE_MARKER)) {
			return resultOfErr(new TargetError(this.name, "submit", "duplicate torrent"));
		}
		return resultOf({
			message: /^\d+$/.test(text) ? `torrent id ${text}` : text || "uploaded",
		});
	}
}
