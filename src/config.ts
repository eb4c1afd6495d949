import fs from "node:fs";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";

import { isLogLevel } from "./logger.js";
import type { ConverterConfig } from "./types.js";

export const API_KEY_ENV = "LLAMA_CLOUD_API_KEY";
export const BASE_URL_ENV = "LLAMA_CLOUD_BASE_URL";
export const LOG_LEVEL_ENV = "LOG_LEVEL";

/** `.env` at the package root, beside `src/` and `dist/`. */
export const DEFAULT_ENV_PATH = fileURLToPath(new URL("../.env", import.meta.url));

export type LoadConfigOptions = {
  envPath?: string;
  env?: NodeJS.ProcessEnv;
};

function readEnvFile(envPath: string): Record<string, string> {
  if (!fs.existsSync(envPath)) return {};
  return dotenv.parse(fs.readFileSync(envPath));
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build the converter configuration from the `.env` file and the
 * environment. Values already set in the environment win, as with
 * `dotenv.config()`; the environment itself is never modified.
 */
export function loadConfig(options: LoadConfigOptions = {}): ConverterConfig {
  const fileVars = readEnvFile(options.envPath ?? DEFAULT_ENV_PATH);
  const env = options.env ?? process.env;

  const lookup = (key: string) => nonEmpty(env[key]) ?? nonEmpty(fileVars[key]);

  const level = lookup(LOG_LEVEL_ENV)?.toLowerCase();

  return {
    apiKey: lookup(API_KEY_ENV),
    baseUrl: lookup(BASE_URL_ENV),
    logLevel: level && isLogLevel(level) ? level : "info",
  };
}
