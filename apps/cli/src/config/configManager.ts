import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import YAML, { YAMLParseError } from "yaml";
import type { ZodIssue } from "zod";
import { AppConfigSchema, type AppConfig } from "./schema";

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(message: string, readonly issues: readonly ZodIssue[] = []) {
    super(message);
  }
}

function deepFreeze<T>(obj: T): T {
  if (obj !== null && typeof obj === "object" && !Object.isFrozen(obj)) {
    Object.freeze(obj);
    for (const val of Object.values(obj)) deepFreeze(val);
  }
  return obj;
}

let cached: AppConfig | null = null;

const HERE = path.dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = path.resolve(HERE, "..", "..", "..", "..");

export const DEFAULT_CONFIG_PATH = "config/default.yaml";

function resolveConfigPath(preferred: string): string {
  const candidates = [
    path.resolve(process.cwd(), preferred),
    path.join(REPO_ROOT, preferred),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new ConfigError(
    `Unable to locate configuration file. Tried: ${candidates.join(", ")}`
  );
}

/** Validates YAML text; `source` names it in error messages. An empty document means all defaults. */
export function parseConfig(raw: string, source = "<inline>"): AppConfig {
  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      throw new ConfigError(`Malformed YAML in ${source}: ${err.message}`);
    }
    throw err;
  }

  const result = AppConfigSchema.safeParse(doc ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration in ${source}: ${detail}`, result.error.issues);
  }
  return deepFreeze(result.data);
}

/**
 * Loads and caches the configuration. `NUMTOOLS_CONFIG` takes precedence over
 * the default path; relative paths resolve against the working directory,
 * then the repository root.
 */
export function loadConfig(configPath?: string): AppConfig {
  if (cached) return cached;

  const preferred = configPath ?? process.env.NUMTOOLS_CONFIG ?? DEFAULT_CONFIG_PATH;
  const resolved = resolveConfigPath(preferred);
  cached = parseConfig(fs.readFileSync(resolved, "utf-8"), resolved);
  return cached;
}

export function resetConfigCache() {
  cached = null;
}
