#!/usr/bin/env node
import { InvalidArgumentError, Option, program } from "commander";
import { ReleaseArtifactBuilder, CommandLineMediaTools } from "./artifacts.js";
import { classify } from "./classify.js";
import { instantiateClients, type TorrentClient } from "./clients/TorrentClient.js";
import type { RuntimeConfig } from "./configSchema.js";
import {
	appDir,
	collectSecrets,
	createAppDirHierarchy,
	generateConfig,
	getDefaultRuntimeConfig,
	getFileConfig,
	resolveRuntimeConfig,
} from "./configuration.js";
import { Action, ContentType, PROGRAM_NAME, PROGRAM_VERSION } from "./constants.js";
import { ConfigError, exitOnUpseedErrors } from "./errors.js";
import type { RetryPolicy } from "./http.js";
import type { IdentificationService } from "./identification/IdentificationService.js";
import { OpenLibrary } from "./identification/OpenLibrary.js";
import { TMDB } from "./identification/TMDB.js";
import { closeLogger, initializeLogger, type Logger } from "./logger.js";
import { createReleaseFromPath, type ContentOverride } from "./release.js";
import { exitCodeFor, formatJobReport, formatSyncReport } from "./report.js";
import { MetadataResolver } from "./resolve.js";
import { registerSignalHandlers } from "./signalHandlers.js";
import { syncCrossSeeds } from "./sync.js";
import { parseTorrentFromFilename } from "./torrent.js";
import { createTracker, type Tracker } from "./trackers/Tracker.js";
import { UploadOrchestrator } from "./upload.js";
import { formatAsList, humanReadableSize } from "./utils.js";

const dir = appDir();
const fileConfig = await getFileConfig(dir);

interface SharedOptions {
	trackers?: string[];
	verbose?: boolean;
	outputDir?: string;
}

interface UploadCliOptions extends SharedOptions {
	contentType?: ContentType;
	category?: number;
	type?: number;
	categoryType?: { categoryId: number; typeId: number };
	preflightOnly?: boolean;
	seedAfterUpload?: boolean;
	stripExtras?: boolean;
}

interface SyncCliOptions extends SharedOptions {
	action?: Action;
}

function parseId(value: string): number {
	if (!/^\d+$/.test(value)) {
		throw new InvalidArgumentError("Not a non-negative integer.");
	}
	return parseInt(value);
}

/**
 * Four digits: two for the category id, two for the type id.
 */
export function parseCategoryType(value: string): {
	categoryId: number;
	typeId: number;
} {
	if (!/^\d{4}$/.test(value)) {
		throw new InvalidArgumentError("Use four digits, category then type, like 0102.");
	}
	return {
		categoryId: parseInt(value.slice(0, 2)),
		typeId: parseInt(value.slice(2)),
	};
}

function loadRuntime(cliOptions: Record<string, unknown>): {
	config: RuntimeConfig;
	logger: Logger;
} {
	const config = resolveRuntimeConfig(
		getDefaultRuntimeConfig(dir),
		fileConfig,
		cliOptions,
	);
	createAppDirHierarchy();
	const logger = initializeLogger({
		appDir: dir,
		verbose: config.verbose,
		secrets: collectSecrets(config),
	});
	registerSignalHandlers(logger);
	logger.verbose(`${PROGRAM_NAME} v${PROGRAM_VERSION}`);
	return { config, logger };
}

function retryPolicy(config: RuntimeConfig): RetryPolicy {
	return {
		retries: config.retries,
		delayMs: config.retryDelay,
		timeoutMs: config.requestTimeout,
	};
}

function selectTrackers(
	config: RuntimeConfig,
	names: string[] | undefined,
	logger: Logger,
): Tracker[] {
	if (config.trackers.length === 0) {
		throw new ConfigError("No trackers are configured, add one to config.js");
	}
	const unknown = (names ?? []).filter(
		(name) => !config.trackers.some((tracker) => tracker.name === name),
	);
	if (unknown.length > 0) {
		throw new ConfigError(
			`Unknown tracker(s) ${formatAsList(unknown, { sort: true })}, configured: ${formatAsList(
				config.trackers.map((tracker) => tracker.name),
				{ sort: true },
			)}`,
		);
	}
	return config.trackers
		.filter((tracker) => !names || names.includes(tracker.name))
		.map((tracker) =>
			createTracker(tracker, { logger, policy: retryPolicy(config) }),
		);
}

function firstClient(config: RuntimeConfig, logger: Logger): TorrentClient | undefined {
	return instantiateClients(config.torrentClients, {
		logger,
		timeoutMs: config.requestTimeout,
	})[0];
}

function identificationServices(
	config: RuntimeConfig,
	logger: Logger,
): IdentificationService[] {
	const policy = retryPolicy(config);
	const services: IdentificationService[] = [];
	if (config.tmdbApiKey) {
		services.push(new TMDB({ apiKey: config.tmdbApiKey, policy, logger }));
	}
	if (config.openLibrary) services.push(new OpenLibrary({ policy, logger }));
	return services;
}

async function upload(path: string, options: UploadCliOptions): Promise<void> {
	const { config, logger } = loadRuntime({
		verbose: options.verbose,
		outputDir: options.outputDir,
		seedAfterUpload: options.preflightOnly ? false : options.seedAfterUpload,
		stripExtras: options.stripExtras,
	});
	try {
		const trackers = selectTrackers(config, options.trackers, logger);
		const override: ContentOverride | undefined =
			options.contentType ||
			options.categoryType ||
			options.category !== undefined
				? {
						contentType: options.contentType,
						categoryId: options.categoryType?.categoryId ?? options.category,
						typeId: options.categoryType?.typeId ?? options.type,
					}
				: undefined;
		const release = await createReleaseFromPath(path, { override });
		logger.info(
			`Processing ${release.name} (${release.files.length} file(s), ${humanReadableSize(release.length)}) for ${formatAsList(
				trackers.map((tracker) => tracker.name),
				{ sort: true },
			)}`,
		);

		const tools = new CommandLineMediaTools({
			mediainfoPath: config.mediainfoPath,
			ffprobePath: config.ffprobePath,
			timeoutMs: config.toolTimeout,
			logger,
		});
		const client = config.seedAfterUpload ? firstClient(config, logger) : undefined;
		if (client) await client.validateConfig();

		const orchestrator = new UploadOrchestrator(
			{
				classify: (r) =>
					classify(r, {
						threshold: config.classificationThreshold,
						logger,
						probe: tools,
						categoryTables: trackers.map((tracker) => tracker.config.categories),
					}),
				resolver: new MetadataResolver({
					services: identificationServices(config, logger),
					threshold: config.identityThreshold,
					logger,
				}),
				trackers,
				artifacts: new ReleaseArtifactBuilder({
					outputDir: config.outputDir,
					logger,
					tools,
				}),
				client,
				logger,
			},
			{
				preflightOnly: options.preflightOnly,
				seedAfterUpload: config.seedAfterUpload,
				stripExtras: config.stripExtras,
				clientCategory: config.clientCategory,
			},
		);
		const job = await orchestrator.run(release);
		for (const line of formatJobReport(job)) console.log(line);
		process.exitCode = exitCodeFor(job.overall);
	} catch (e) {
		await closeLogger(logger);
		exitOnUpseedErrors(e);
	}
	await closeLogger(logger);
}

async function sync(options: SyncCliOptions): Promise<void> {
	const { config, logger } = loadRuntime({
		verbose: options.verbose,
		outputDir: options.outputDir,
		action: options.action,
	});
	try {
		const client = firstClient(config, logger);
		if (!client) {
			throw new ConfigError("sync needs a torrent client, add one to torrentClients");
		}
		await client.validateConfig();
		const report = await syncCrossSeeds({
			client,
			trackers: selectTrackers(config, options.trackers, logger),
			action: config.action,
			outputDir: config.outputDir,
			minScore: config.crossSeedMinScore,
			heuristicScore: config.heuristicMatchScore,
			clientCategory: config.clientCategory,
			logger,
		});
		for (const line of formatSyncReport(report)) console.log(line);
	} catch (e) {
		await closeLogger(logger);
		exitOnUpseedErrors(e);
	}
	await closeLogger(logger);
}

program.name(PROGRAM_NAME);
program.description("Prepare, check and upload releases to private trackers");
program.version(PROGRAM_VERSION, "-V, --version", "output the current version");

program
	.command("gen-config")
	.description("Generate a config file")
	.action(() => {
		try {
			console.log(`Configuration file created at ${generateConfig()}`);
		} catch (e) {
			exitOnUpseedErrors(e);
		}
	});

program
	.command("inspect")
	.description("Print the contents of a .torrent file")
	.argument("<torrent>", "path to a .torrent file")
	.action(async (torrentPath: string) => {
		try {
			const metafile = await parseTorrentFromFilename(torrentPath);
			console.log(`name:         ${metafile.name}`);
			console.log(`info hash:    ${metafile.infoHash}`);
			console.log(`piece length: ${metafile.pieceLength}`);
			console.log(`pieces:       ${metafile.pieceCount}`);
			console.log(`private:      ${metafile.isPrivate}`);
			if (metafile.source) console.log(`source:       ${metafile.source}`);
			if (metafile.announce) console.log(`announce:     ${metafile.announce}`);
			console.log(`size:         ${humanReadableSize(metafile.length)}`);
			for (const file of metafile.files) {
				console.log(`  ${file.path} (${file.length})`);
			}
		} catch (e) {
			exitOnUpseedErrors(e);
		}
	});

program
	.command("upload")
	.description("Upload a release to one or more trackers")
	.argument("<path>", "file or folder to upload")
	.option("-t, --trackers <names...>", "Trackers to upload to (default: all configured)")
	.addOption(
		new Option("--content-type <type>", "Skip classification and use this content type")
			.choices(Object.values(ContentType)),
	)
	.option("--category <id>", "Tracker category id for a custom upload", parseId)
	.option("--type <id>", "Tracker type id for a custom upload", parseId)
	.option(
		"-c, --category-type <CCTT>",
		"Category and type ids as four digits",
		parseCategoryType,
	)
	.option("--preflight-only", "Only check for duplicates")
	.option("--seed-after-upload", "Add uploaded torrents to the torrent client")
	.option("--no-seed-after-upload", "Don't add uploaded torrents to the torrent client")
	.option("--strip-extras", "Leave samples, proofs and text files out of video torrents")
	.option("--no-strip-extras", "Include every file in the torrent")
	.option("-s, --output-dir <dir>", "Directory to save .torrent files in")
	.option("-v, --verbose", "Log verbose output")
	.action(async (path: string, options: UploadCliOptions) => {
		await upload(path, options);
	});

program
	.command("sync")
	.description("Find cross-seeds for everything the torrent client is seeding")
	.option("-t, --trackers <names...>", "Trackers to search (default: all configured)")
	.addOption(
		new Option("-A, --action <action>", "Save matched torrents or add them to the client")
			.choices(Object.values(Action)),
	)
	.option("-s, --output-dir <dir>", "Directory to save .torrent files in")
	.option("-v, --verbose", "Log verbose output")
	.action(async (options: SyncCliOptions) => {
		await sync(options);
	});

await program.parseAsync();
