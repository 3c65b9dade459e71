import * as fs from "node:fs";
import yaml from "js-yaml";
import { AppConfigSchema } from "./schema.js";
import type { AppConfig } from "./schema.js";

const ENV_PREFIX = "INTENTFLOW_";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced, not merged.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    if (isRecord(srcVal) && isRecord(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

function parseScalar(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  return value;
}

/**
 * Parse env vars with the INTENTFLOW_ prefix into nested config.
 * Example: INTENTFLOW_SERVER_PORT=8080 -> { server: { port: 8080 } }
 */
export function parseEnvOverrides(
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const parts = key.slice(ENV_PREFIX.length).toLowerCase().split("_");
    if (parts.length < 2) continue;

    const section = parts[0];
    const field = parts.slice(1).join("_");
    const existing = result[section];
    const target: Record<string, unknown> = isRecord(existing) ? existing : {};
    target[field] = parseScalar(value);
    result[section] = target;
  }

  return result;
}

/**
 * Load configuration from YAML file, environment variables, and defaults.
 * Priority: env vars > YAML file > schema defaults
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  let fileConfig: Record<string, unknown> = {};

  const resolvedPath = configPath ?? env.INTENTFLOW_CONFIG ?? "config/default.yaml";
  if (fs.existsSync(resolvedPath)) {
    const loaded = yaml.load(fs.readFileSync(resolvedPath, "utf-8"));
    if (loaded !== undefined && loaded !== null && !isRecord(loaded)) {
      throw new Error(`Config file ${resolvedPath} must contain a mapping`);
    }
    fileConfig = loaded ?? {};
  }

  const merged = deepMerge(fileConfig, parseEnvOverrides(env));
  return AppConfigSchema.parse(merged);
}

export type { AppConfig } from "./schema.js";
