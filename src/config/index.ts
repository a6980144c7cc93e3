// Configuration loading: defaults → config.json → env → CLI flags, validated with zod and frozen

import { readFile } from "node:fs/promises";
import { isAbsolute, resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors/index.js";
import { logger } from "../logger/index.js";
import { uniqueTagSlugs } from "../types/tags.js";
import { configFilePath } from "./paths.js";
import type { CliOptions, PipelineConfig, Stage } from "./types.js";

export type { CliOptions, PipelineConfig, ScrollConfig, Stage } from "./types.js";
export { dataPaths, configFilePath } from "./paths.js";
export type { DataPaths } from "./paths.js";


export const DEFAULT_CONFIG: PipelineConfig = {
  tags: ["ux-design", "artificial-intelligence"],
  year: 2025,
  headless: true,
  dataDir: "data",
  delayBetweenMs: 2500,
  navigationTimeoutMs: 90_000,
  settleMs: 5000,
  scroll: {
    maxScrolls: 150,
    maxIdleScrolls: 6,
    pauseMs: 2500,
  },
};


const ScrollSchema = z.object({
  maxScrolls: z.number().int().min(1),
  maxIdleScrolls: z.number().int().min(1),
  pauseMs: z.number().int().min(0),
});

const PipelineConfigSchema = z.object({
  tags: z.array(z.string().min(1)).min(1, "at least one tag is required"),
  year: z.number().int().min(1990).max(2100),
  headless: z.boolean(),
  dataDir: z.string().min(1),
  delayBetweenMs: z.number().int().min(0),
  navigationTimeoutMs: z.number().int().min(1000),
  settleMs: z.number().int().min(0),
  scroll: ScrollSchema,
  chromePath: z.string().min(1).optional(),
  proxy: z.string().url().optional(),
});

/** config.json: every key optional, unknown keys rejected */
const FileConfigSchema = PipelineConfigSchema.extend({ scroll: ScrollSchema.partial() }).partial().strict();

type FileConfig = z.infer<typeof FileConfigSchema>;


function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}


/** Read and validate config.json; a missing file is an empty config */
export async function readConfigFile(path: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return {};
    throw new ConfigError(`cannot read ${path}`, { cause: err });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${path} is not valid JSON`, { cause: err });
  }
  const result = FileConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`invalid ${path}: ${formatIssues(result.error)}`);
  }
  return result.data;
}


function parseIntEnv(name: string, value: string | undefined): number | undefined {
  if (value == null || value.trim() === "") return undefined;
  const n = Number(value);
  if (!Number.isInteger(n)) throw new ConfigError(`${name} must be an integer, got "${value}"`);
  return n;
}


function parseBoolEnv(name: string, value: string | undefined): boolean | undefined {
  if (value == null || value.trim() === "") return undefined;
  const v = value.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "no") return false;
  throw new ConfigError(`${name} must be a boolean, got "${value}"`);
}


/** Env overrides; unset variables leave the key alone */
export function readEnvConfig(env: NodeJS.ProcessEnv): FileConfig {
  const out: FileConfig = {};
  const tags = env.TAGS?.split(",").map((t) => t.trim()).filter(Boolean);
  if (tags && tags.length > 0) out.tags = tags;
  const year = parseIntEnv("YEAR", env.YEAR);
  if (year !== undefined) out.year = year;
  const headless = parseBoolEnv("HEADLESS", env.HEADLESS);
  if (headless !== undefined) out.headless = headless;
  const dataDir = env.DATA_DIR?.trim();
  if (dataDir) out.dataDir = dataDir;
  const delay = parseIntEnv("DELAY_MS", env.DELAY_MS);
  if (delay !== undefined) out.delayBetweenMs = delay;
  const navTimeout = parseIntEnv("NAV_TIMEOUT_MS", env.NAV_TIMEOUT_MS);
  if (navTimeout !== undefined) out.navigationTimeoutMs = navTimeout;
  const chrome = env.CHROME_PATH?.trim() || env.CHROMIUM_PATH?.trim();
  if (chrome) out.chromePath = chrome;
  const proxy = env.HTTPS_PROXY?.trim() || env.HTTP_PROXY?.trim();
  if (proxy) out.proxy = proxy;
  return out;
}


function merge(base: PipelineConfig, layer: FileConfig): PipelineConfig {
  const { scroll, ...rest } = layer;
  return { ...base, ...rest, scroll: { ...base.scroll, ...scroll } };
}


function freezeConfig(config: PipelineConfig): Readonly<PipelineConfig> {
  Object.freeze(config.tags);
  Object.freeze(config.scroll);
  return Object.freeze(config);
}


/** Parse argv (without node and script). Stage flags are mutually exclusive */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const stages: Stage[] = [];
  let headful = false;
  let help = false;
  for (const arg of argv) {
    switch (arg) {
      case "--collect":
        stages.push("collect");
        break;
      case "--extract":
      case "--parse":
        stages.push("extract");
        break;
      case "--filter":
        stages.push("filter");
        break;
      case "--headful":
        headful = true;
        break;
      case "-h":
      case "--help":
        help = true;
        break;
      default:
        throw new ConfigError(`unknown argument: ${arg}`);
    }
  }
  const unique = [...new Set(stages)];
  if (unique.length > 1) {
    throw new ConfigError(`choose at most one stage, got ${unique.map((s) => `--${s}`).join(" ")}`);
  }
  return { stage: unique[0] ?? "all", headful, help };
}


export interface LoadConfigOptions {
  cli?: Pick<CliOptions, "headful">;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}


/** Build the run configuration once; the result is frozen */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Readonly<PipelineConfig>> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const path = configFilePath(env, cwd);
  const fromFile = await readConfigFile(path);
  let config = merge(merge(DEFAULT_CONFIG, fromFile), readEnvConfig(env));
  if (options.cli?.headful) config = { ...config, headless: false };

  const result = PipelineConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(`invalid configuration: ${formatIssues(result.error)}`);
  }
  const tags = uniqueTagSlugs(result.data.tags);
  if (tags.length === 0) throw new ConfigError("tags must contain at least one non-empty slug");
  const dataDir = isAbsolute(result.data.dataDir) ? result.data.dataDir : resolve(cwd, result.data.dataDir);
  const final: PipelineConfig = { ...result.data, tags, dataDir, scroll: { ...result.data.scroll } };
  logger.debug("config", "configuration loaded", { path, tags, year: final.year, headless: final.headless, dataDir });
  return freezeConfig(final);
}
