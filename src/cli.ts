#!/usr/bin/env node
// CLI entry: tagharvest [--collect | --extract | --filter] [--headful]

import "dotenv/config";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { loadConfig, parseCliArgs } from "./config/index.js";
import { ConfigError, StageFatalError } from "./errors/index.js";
import { withBrowser } from "./fetcher/index.js";
import { errMessage, logger } from "./logger/index.js";
import { runPipeline } from "./pipeline/index.js";
import type { PipelineDeps } from "./pipeline/index.js";


export const EXIT_OK = 0;
export const EXIT_STAGE_FAILED = 1;
export const EXIT_CONFIG = 2;


const USAGE = `Usage: tagharvest [--collect | --extract | --filter] [--headful]

  (no flag)   run collect → extract → filter/export
  --collect   collect article links for every configured tag
  --extract   extract metadata from the collected links (alias: --parse)
  --filter    filter by year and tags, export JSON and CSV
  --headful   show the browser window

Configuration: config.json (or CONFIG_PATH), then TAGS, YEAR, HEADLESS, DATA_DIR,
DELAY_MS, NAV_TIMEOUT_MS, CHROME_PATH, HTTPS_PROXY; LOG_LEVEL and LOG_FILE for logging.`;


export function exitCodeFor(err: unknown): number {
  if (err instanceof ConfigError) return EXIT_CONFIG;
  return EXIT_STAGE_FAILED;
}


/** Returns the process exit code instead of exiting, so it can be driven from tests */
export async function main(argv: readonly string[], deps: PipelineDeps = { runSession: withBrowser }): Promise<number> {
  try {
    const cli = parseCliArgs(argv);
    if (cli.help) {
      console.log(USAGE);
      return EXIT_OK;
    }
    const config = await loadConfig({ cli });
    await runPipeline(config, cli.stage, deps);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error("config", err.message);
    } else if (err instanceof StageFatalError) {
      logger.error("pipeline", "run aborted", { stage: err.stage, err: err.message });
    } else {
      logger.error("pipeline", "unexpected failure", { err: errMessage(err) });
    }
    return exitCodeFor(err);
  }
}


function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}


if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`${errMessage(err)}\n`);
      process.exitCode = EXIT_STAGE_FAILED;
    }
  );
}
