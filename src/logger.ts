import { join } from "path";
import stripAnsi from "strip-ansi";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import { LOGS_FOLDER } from "./constants.js";

export enum Label {
	CONFIG = "config",
	CLASSIFY = "classify",
	RESOLVE = "resolve",
	TMDB = "tmdb",
	OPEN_LIBRARY = "openlibrary",
	PREFLIGHT = "preflight",
	BUILD = "build",
	SUBMIT = "submit",
	UPLOAD = "upload",
	SYNC = "sync",
	MATCH = "match",
	QBITTORRENT = "qbittorrent",
	UNIT3D = "unit3d",
	TORRENTLEECH = "torrentleech",
	HTTP = "http",
	TOOLS = "tools",
}

export type Logger = winston.Logger;

export interface LoggerOptions {
	appDir?: string;
	verbose?: boolean;
	/**
	 * Values that must never reach a log line: api keys, passwords and
	 * urls carrying credentials.
	 */
	secrets?: string[];
}

const REDACTED_MSG = "[REDACTED]";
const ERROR_PREFIX_REGEX = /^\s*error:\s*/i;
const SUB_SECOND_TS_REGEX = /\.\d{3,}$/;

function redactUrlPassword(message: string, urlStr: string): string {
	let url: URL;
	try {
		url = new URL(urlStr);
	} catch {
		return message;
	}
	if (!url.password) return message;
	const urlDecodedPassword = decodeURIComponent(url.password);
	const urlEncodedPassword = encodeURIComponent(url.password);
	return message
		.split(url.password)
		.join(REDACTED_MSG)
		.split(urlDecodedPassword)
		.join(REDACTED_MSG)
		.split(urlEncodedPassword)
		.join(REDACTED_MSG);
}

export function redactMessage(message: unknown, secrets: string[]): unknown {
	if (typeof message !== "string") {
		return message;
	}
	let ret = message;

	ret = ret.replace(
		/(api_token|apikey|api_key|announcekey|passkey)=[^&\s"']+/gi,
		`$1=${REDACTED_MSG}`,
	);
	ret = ret.replace(/Bearer [^\s"']+/g, `Bearer ${REDACTED_MSG}`);
	ret = ret.replace(
		/\/announce\/([a-zA-Z0-9]{16,})/g,
		`/announce/${REDACTED_MSG}`,
	);
	ret = ret.replace(/\/([a-zA-Z0-9]{16,})\/announce/g, `/${REDACTED_MSG}/announce`);

	for (const secret of secrets) {
		if (secret.includes("://")) {
			ret = redactUrlPassword(ret, secret);
		} else if (secret.length > 0) {
			ret = ret.split(secret).join(REDACTED_MSG);
		}
	}
	return ret;
}

function stripAnsiChars(message: unknown): unknown {
	if (typeof message !== "string") {
		return message;
	}
	return stripAnsi(message);
}

function formatLine(
	info: winston.Logform.TransformableInfo,
	secrets: string[],
	options: { console: boolean },
): string {
	const { level, message, label, stack, cause } = info;
	let timestamp = String(info.timestamp ?? "");
	if (options.console) {
		timestamp = timestamp.replace(SUB_SECOND_TS_REGEX, "");
	}
	const causeStr = cause ? `\n${String(cause)}` : "";
	const msg = !stack
		? `${String(message)}${causeStr}`
		: `${String(stack)}${causeStr}`.replace(ERROR_PREFIX_REGEX, "");
	const redacted = redactMessage(msg, secrets);
	return `${timestamp} ${level}: ${label ? `[${String(label)}] ` : ""}${String(
		options.console ? redacted : stripAnsiChars(redacted),
	)}`;
}

/**
 * Creates the application logger. It is created once by the CLI and handed
 * to every component that logs.
 */
export function initializeLogger(options: LoggerOptions): Logger {
	const secrets = options.secrets ?? [];
	const transports: winston.transport[] = [
		new winston.transports.Console({
			level: options.verbose ? "silly" : "info",
			format: winston.format.combine(
				winston.format.errors({ stack: true }),
				winston.format.splat(),
				winston.format.colorize(),
				winston.format.printf((info) =>
					formatLine(info, secrets, { console: true }),
				),
			),
		}),
	];
	if (options.appDir) {
		const dirname = join(options.appDir, LOGS_FOLDER);
		transports.push(
			new DailyRotateFile({
				filename: "error.%DATE%.log",
				createSymlink: true,
				symlinkName: "error.current.log",
				dirname,
				maxFiles: "14d",
				level: "error",
			}),
			new DailyRotateFile({
				filename: "info.%DATE%.log",
				createSymlink: true,
				symlinkName: "info.current.log",
				dirname,
				maxFiles: "14d",
			}),
			new DailyRotateFile({
				filename: "verbose.%DATE%.log",
				createSymlink: true,
				symlinkName: "verbose.current.log",
				dirname,
				maxFiles: "14d",
				level: "silly",
			}),
		);
	}
	return winston.createLogger({
		level: "info",
		format: winston.format.combine(
			winston.format.timestamp({
				format: "YYYY-MM-DD HH:mm:ss.SSS",
			}),
			winston.format.errors({ stack: true }),
			winston.format.splat(),
			winston.format.printf((info) =>
				formatLine(info, secrets, { console: false }),
			),
		),
		transports,
	});
}

/**
 * A logger that drops everything, for library use and tests.
 */
export function createSilentLogger(): Logger {
	return winston.createLogger({
		silent: true,
		transports: [new winston.transports.Console({ silent: true })],
	});
}

export async function closeLogger(logger: Logger): Promise<void> {
	await new Promise<void>((resolve) => {
		logger.on("finish", () => resolve());
		logger.end();
	});
}
