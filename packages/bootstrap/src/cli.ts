/**
 * CLI entry point.
 * Exits 0 after both artifacts are written, or with the failing error's exit code.
 */

import "reflect-metadata";
import { pathToFileURL } from "node:url";
import { USAGE, loadConfig, wantsHelp } from "./config/index.js";
import { createBootstrapper } from "./di/index.js";
import { BootstrapError, InvalidArgumentError, MissingRequiredArgumentError } from "./errors/index.js";
import { LoggerImpl, setLogLevel } from "./logger/index.js";
import { formatError } from "./utils/index.js";

export async function main(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
	if (wantsHelp(args)) {
		console.log(USAGE);
		return 0;
	}

	const logger = new LoggerImpl("cli");
	try {
		const config = loadConfig(args, env);
		setLogLevel(config.logLevel);
		const result = await createBootstrapper(config).run();
		logger.info(`Bootstrap complete: ${result.artifacts.join(", ")}`);
		return 0;
	} catch (err) {
		logger.error(formatError(err));
		if (err instanceof MissingRequiredArgumentError || err instanceof InvalidArgumentError) {
			console.error(USAGE);
		}
		return err instanceof BootstrapError ? err.exitCode : 1;
	}
}

function isMainModule(): boolean {
	const scriptPath = process.argv[1];
	if (!scriptPath) {
		return false;
	}
	return import.meta.url === pathToFileURL(scriptPath).href;
}

if (isMainModule()) {
	main(process.argv.slice(2)).then(
		code => {
			process.exitCode = code;
		},
		(err: unknown) => {
			console.error("Bootstrap failed:", err);
			process.exitCode = 1;
		},
	);
}
