import { accessSync, constants, copyFileSync, existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import path from "path";
import { fileURLToPath, pathToFileURL } from "url";
import { z } from "zod";
import {
	Action,
	LOGS_FOLDER,
	PROGRAM_NAME,
	TORRENT_OUTPUT_FOLDER,
} from "./constants.js";
import {
	formatConfigIssues,
	RUNTIME_CONFIG_SCHEMA,
	type RuntimeConfig,
	type RuntimeConfigInput,
} from "./configSchema.js";
import { ConfigError, errorMessage } from "./errors.js";
import { Label, type Logger } from "./logger.js";

export type FileConfig = Partial<RuntimeConfigInput>;

export const UNPARSABLE_CONFIG_MESSAGE = `
Your config file is improperly formatted. The location of the error is above, \
but you may have to look backwards to see the root cause.
Make sure that
  - strings (words, URLs, etc) are wrapped in "quotation marks"
  - any arrays (lists of things, even one thing) are wrapped in [square brackets]
  - every entry has a comma after it, including inside arrays
`.trim();

const CONFIG_TEMPLATE_PATH = fileURLToPath(
	new URL("../config.template.cjs", import.meta.url),
);

/**
 * Returns the config directory, $CONFIG_DIR or ~/.upseed, creating it if
 * it doesn't exist yet.
 */
export function appDir(): string {
	const dir =
		process.env.CONFIG_DIR || path.resolve(homedir(), `.${PROGRAM_NAME}`);
	try {
		accessSync(dir, constants.R_OK | constants.W_OK);
	} catch (e) {
		if (!existsSync(dir)) {
			mkdirSync(dir, { recursive: true });
			return dir;
		}
		throw new ConfigError(
			`${PROGRAM_NAME} does not have R/W permissions on your config directory ${dir}: ${errorMessage(e)}`,
		);
	}
	return dir;
}

export function createAppDirHierarchy(): void {
	const appDirPath = appDir();
	mkdirSync(path.join(appDirPath, TORRENT_OUTPUT_FOLDER), { recursive: true });
	mkdirSync(path.join(appDirPath, LOGS_FOLDER), { recursive: true });
}

export function getDefaultRuntimeConfig(dir: string): RuntimeConfigInput {
	return {
		trackers: [],
		torrentClients: [],
		openLibrary: true,
		outputDir: path.join(dir, TORRENT_OUTPUT_FOLDER),
		action: Action.SAVE,
		seedAfterUpload: false,
		stripExtras: true,
		identityThreshold: 0.7,
		classificationThreshold: 0.65,
		heuristicMatchScore: 0.8,
		crossSeedMinScore: 0.8,
		requestTimeout: "30 seconds",
		retries: 2,
		retryDelay: 500,
		toolTimeout: "2 minutes",
		mediainfoPath: "mediainfo",
		ffprobePath: "ffprobe",
		verbose: false,
	};
}

export function generateConfig(): string {
	const dest = path.join(appDir(), "config.js");
	if (existsSync(dest)) {
		throw new ConfigError(`Configuration file already exists at ${dest}`);
	}
	copyFileSync(CONFIG_TEMPLATE_PATH, dest);
	return dest;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Loads config.js from the config directory. A missing file is an empty
 * config, a file that fails to import is an error.
 */
export async function getFileConfig(dir: string): Promise<Record<string, unknown>> {
	const configPath = path.join(dir, "config.js");
	if (!existsSync(configPath)) return {};
	let imported: unknown;
	try {
		imported = await import(pathToFileURL(configPath).href);
	} catch (e) {
		throw new ConfigError(
			`${errorMessage(e)}\n${UNPARSABLE_CONFIG_MESSAGE}`,
		);
	}
	if (!isRecord(imported)) return {};
	const config = imported.default;
	if (!isRecord(config)) {
		throw new ConfigError(`${configPath} must export default an object`);
	}
	return config;
}

function omitUndefined(obj: Record<string, unknown>): Record<string, unknown> {
	return Object.fromEntries(
		Object.entries(obj).filter(([, value]) => value !== undefined),
	);
}

/**
 * Merges defaults, the config file and command line options (in that order
 * of precedence, last wins) and validates the result.
 */
export function resolveRuntimeConfig(
	defaults: RuntimeConfigInput,
	fileConfig: Record<string, unknown>,
	cliOptions: Record<string, unknown>,
	logger?: Logger,
): RuntimeConfig {
	const merged = {
		...defaults,
		...omitUndefined(fileConfig),
		...omitUndefined(cliOptions),
	};
	try {
		return RUNTIME_CONFIG_SCHEMA.parse(merged);
	} catch (e) {
		if (!(e instanceof z.ZodError)) throw e;
		const issues = formatConfigIssues(e);
		for (const issue of issues) {
			logger?.error({ label: Label.CONFIG, message: issue });
		}
		throw new ConfigError(
			`Your configuration is invalid, please see the ${issues.length > 1 ? "errors" : "error"} ${logger ? "above" : "below"} for details.${logger ? "" : `\n${issues.join("\n")}`}`,
		);
	}
}

/**
 * Every configured value that must not show up in logs.
 */
export function collectSecrets(config: RuntimeConfig): string[] {
	return [
		...config.trackers.flatMap((tracker) => [tracker.apiKey, tracker.announceUrl]),
		...config.torrentClients.map((entry) => entry.replace(/^qbittorrent:/, "")),
		...(config.tmdbApiKey ? [config.tmdbApiKey] : []),
	];
}
