/**
 * Configuration loading.
 *
 * Reads `~/.config/talkguard/config.toml` (or `TALKGUARD_CONFIG`), validates
 * it, fills in defaults and applies environment overrides.
 */

import { existsSync, readFileSync } from "fs";
import { parse as parseToml } from "smol-toml";
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger";
import { expandPath } from "./storage/file-utils";
import { CONFIG_FILE, DATA_DIR } from "./storage/paths";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

const logLevelSchema = z.enum(LOG_LEVELS);

const DETECTOR_PROVIDERS = ["rules", "presidio", "composite"] as const;

const ConfigFileSchema = z.object({
  storage: z
    .object({
      data_dir: z.string().min(1).default(DATA_DIR)
    })
    .default({}),
  detector: z
    .object({
      provider: z.enum(DETECTOR_PROVIDERS).default("rules"),
      presidio_url: z.string().url().default("http://localhost:5002"),
      language: z.string().min(2).default("de"),
      timeout_ms: z.number().int().positive().default(10_000),
      min_confidence: z.number().min(0).max(1).default(0.5),
      categories: z.array(z.string().min(1)).default([])
    })
    .default({}),
  normalizer: z
    .object({
      fuzzy_person_matching: z.boolean().default(false),
      join_punctuation: z.string().default("-.'’")
    })
    .default({}),
  server: z
    .object({
      host: z.string().min(1).default("127.0.0.1"),
      port: z.number().int().min(1).max(65535).default(8430)
    })
    .default({}),
  logging: z
    .object({
      level: logLevelSchema.default("info")
    })
    .default({})
});

export type DetectorProvider = (typeof DETECTOR_PROVIDERS)[number];

export interface DetectorConfig {
  provider: DetectorProvider;
  presidioUrl: string;
  language: string;
  timeoutMs: number;
  minConfidence: number;
  /** Upper-cased category names to keep; empty keeps all */
  categories: string[];
}

export interface NormalizerConfig {
  fuzzyPersonMatching: boolean;
  /** Characters that may join two adjacent spans besides whitespace */
  joinPunctuation: string;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface Config {
  dataDir: string;
  detector: DetectorConfig;
  normalizer: NormalizerConfig;
  server: ServerConfig;
  logLevel: LogLevel;
}

export interface LoadConfigOptions {
  /** Explicit config file path (defaults to TALKGUARD_CONFIG or CONFIG_FILE) */
  path?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: Record<string, string | undefined>;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
  );
}

function readConfigFile(path: string): unknown {
  if (!existsSync(path)) {
    return {};
  }
  try {
    return parseToml(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `Failed to parse ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Parse an already-decoded config object (e.g. from TOML) into a Config.
 */
export function parseConfig(raw: unknown): Config {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  const file = result.data;
  return {
    dataDir: file.storage.data_dir,
    detector: {
      provider: file.detector.provider,
      presidioUrl: file.detector.presidio_url,
      language: file.detector.language,
      timeoutMs: file.detector.timeout_ms,
      minConfidence: file.detector.min_confidence,
      categories: file.detector.categories.map((c) => c.toUpperCase())
    },
    normalizer: {
      fuzzyPersonMatching: file.normalizer.fuzzy_person_matching,
      joinPunctuation: file.normalizer.join_punctuation
    },
    server: { ...file.server },
    logLevel: file.logging.level
  };
}

function applyEnvOverrides(
  config: Config,
  env: Record<string, string | undefined>
): Config {
  const next: Config = {
    ...config,
    detector: { ...config.detector },
    server: { ...config.server }
  };

  if (env.TALKGUARD_DATA_DIR) {
    next.dataDir = env.TALKGUARD_DATA_DIR;
  }
  if (env.PRESIDIO_ANALYZER_URL) {
    next.detector.presidioUrl = env.PRESIDIO_ANALYZER_URL;
  }
  if (env.TALKGUARD_DETECTOR) {
    const provider = z.enum(DETECTOR_PROVIDERS).safeParse(env.TALKGUARD_DETECTOR);
    if (!provider.success) {
      throw new ConfigError(
        `Invalid TALKGUARD_DETECTOR: ${env.TALKGUARD_DETECTOR}`
      );
    }
    next.detector.provider = provider.data;
  }
  if (env.TALKGUARD_LOG_LEVEL) {
    const level = logLevelSchema.safeParse(env.TALKGUARD_LOG_LEVEL);
    if (!level.success) {
      throw new ConfigError(
        `Invalid TALKGUARD_LOG_LEVEL: ${env.TALKGUARD_LOG_LEVEL}`
      );
    }
    next.logLevel = level.data;
  }

  return next;
}

/**
 * Load configuration from disk with defaults and environment overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const path = expandPath(options.path ?? env.TALKGUARD_CONFIG ?? CONFIG_FILE);
  return applyEnvOverrides(parseConfig(readConfigFile(path)), env);
}

/**
 * Default configuration (no file, no environment).
 */
export function defaultConfig(): Config {
  return parseConfig({});
}
