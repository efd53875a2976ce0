import { closeLogger, type Logger } from "./logger.js";

let activeLogger: Logger | undefined;

async function exitGracefully() {
	if (activeLogger) await closeLogger(activeLogger);
	process.exit();
}

/**
 * Flushes the log files before exiting on SIGINT and SIGTERM.
 */
export function registerSignalHandlers(logger: Logger): void {
	if (!activeLogger) {
		process.on("SIGINT", exitGracefully);
		process.on("SIGTERM", exitGracefully);
	}
	activeLogger = logger;
}
