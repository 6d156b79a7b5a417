#!/usr/bin/env node

import process from "node:process";
import {
	createLogger,
	describeError,
	getWorkspaceRoot,
	loadEngineConfig,
	loadEnvFiles,
} from "@tickscope/core";
import { resolveCliOptions } from "./cliArgs";
import { startEngine } from "./main";

const USAGE = `Usage:
  npm start -- [options]

Options:
  --profile <name>         Engine profile under config/engine (default: ENGINE_PROFILE or "default")
  --configDir <path>       Custom config directory
  --symbols <list>         Comma-separated EXCHANGE:SYMBOL list, overrides the profile
  --interval <ms>          Snapshot log interval
  --precision <digits>     Digits shown in snapshots (default 4)
  --no-history             Skip the historical warm-up
  --help                   Show this message
`;

const logger = createLogger("engine-cli");

const main = async (): Promise<void> => {
	loadEnvFiles(getWorkspaceRoot());
	const options = resolveCliOptions(process.argv.slice(2));
	if (options.help) {
		console.log(USAGE);
		return;
	}

	const config = loadEngineConfig({
		profile: options.profile,
		configDir: options.configDir,
	});
	const engine = await startEngine(config, {
		instruments: options.instruments,
		intervalMs: options.intervalMs,
		history: options.history,
		precision: options.precision,
	});

	const shutdown = (signal: string): void => {
		logger.info("cli_signal", { signal });
		engine
			.stop()
			.then(() => process.exit(0))
			.catch((error: unknown) => {
				logger.error("cli_shutdown_failed", { error: describeError(error) });
				process.exit(1);
			});
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));
};

main().catch((error: unknown) => {
	logger.error("cli_failed", { error: describeError(error) });
	process.exit(1);
});
