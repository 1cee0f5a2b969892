// Config loader: reads ~/.config/arduino-cli-engine/config.yaml and deep-merges it over defaults.
// On first run (no config file) it writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// The merged object is checked against EngineConfigSchema; anything invalid falls back to defaults.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { EngineConfigSchema, type EngineConfig } from "../types/config.js";
import { EngineError, EngineErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "arduino-cli-engine");
const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

export const CONFIG_PATH_ENV = "ARDUINO_CLI_ENGINE_CONFIG";

export const DEFAULT_CONFIG: EngineConfig = {
  cli: { binary: "arduino-cli", max_attempts: 3, verbose_compile: true },
  workdir: null,
  cache: { dir: null, stale_fallback: true },
  default_fqbn: "arduino:avr:uno",
};

const DEFAULT_CONFIG_YAML = `# arduino-cli engine configuration
# Generated automatically on first run. All values shown are defaults.

cli:
  binary: arduino-cli
  # Attempts per invocation when the toolchain reports a temporary-file failure
  max_attempts: 3
  verbose_compile: true

# Base directory for scratch and build directories (null = current directory)
workdir: null

cache:
  # Durable result records, one JSON file per command (null = ~/.cache/arduino-cli-engine/results)
  dir: null
  # Serve the last successful compile when a live compile hits a temporary-file failure
  stale_fallback: true

default_fqbn: arduino:avr:uno
`;

export interface ConfigResult {
  config: EngineConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? process.env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: cloneDefaults(), configPath, firstRun: true };
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    return { config: parseConfig(parseYaml(raw)), configPath, firstRun: false };
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to load config, using defaults");
    return { config: cloneDefaults(), configPath, firstRun: false };
  }
}

/** Merge a parsed YAML document over the defaults and validate the result. Throws CONFIG_INVALID. */
export function parseConfig(document: unknown): EngineConfig {
  const overrides = isRecord(document) ? document : {};
  const merged = deepMerge(toRecord(DEFAULT_CONFIG), overrides);
  const parsed = EngineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new EngineError(EngineErrorCode.CONFIG_INVALID, "Invalid engine configuration", {
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  return parsed.data;
}

/** Resolved locations derived from config nulls. */
export function resolveWorkdir(config: EngineConfig): string {
  return config.workdir ?? process.cwd();
}

export function resolveCacheDir(config: EngineConfig): string {
  return config.cache.dir ?? join(homedir(), ".cache", "arduino-cli-engine", "results");
}

function cloneDefaults(): EngineConfig {
  return {
    ...DEFAULT_CONFIG,
    cli: { ...DEFAULT_CONFIG.cli },
    cache: { ...DEFAULT_CONFIG.cache },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function toRecord(config: EngineConfig): Record<string, unknown> {
  return { ...config, cli: { ...config.cli }, cache: { ...config.cache } };
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
