/**
 * Configuration from environment variables (a .env file is loaded at process start).
 *
 * Every value is optional. Blank variables count as unset, so a copied .env.example
 * works as is. Invalid values raise ConfigError naming the variable.
 */

import os from "os";
import path from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { AppConfig, LlmProvider } from "./types.js";

export const DEFAULT_DB_PATH = path.join(os.homedir(), ".memory-consolidator", "memory.db");
export const DEFAULT_BASE_URL = "http://localhost:11434/v1";

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  openai: "llama3.1:8b",
  anthropic: "claude-3-5-haiku-latest",
};

const blankToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const envSchema = z.object({
  MEMORY_DB_PATH: optionalText,
  MEMORY_BACKUP_PATH: optionalText,
  MEMORY_SESSION_LOG: optionalText,
  MEMORY_OPEN_QUESTIONS: optionalText,
  MEMORY_PRELOAD_PATH: optionalText,
  MEMORY_BUSY_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(5000)),
  LLM_PROVIDER: z.preprocess(
    (value) => {
      const blank = blankToUndefined(value);
      return typeof blank === "string" ? blank.trim().toLowerCase() : blank;
    },
    z.enum(["openai", "anthropic"]).default("openai"),
  ),
  LLM_BASE_URL: z.preprocess(blankToUndefined, z.string().trim().url().optional()),
  LLM_MODEL: optionalText,
  LLM_API_KEY: optionalText,
  OPENAI_API_KEY: optionalText,
  ANTHROPIC_API_KEY: optionalText,
});

export interface ConfigOverrides {
  dbPath?: string;
  model?: string;
}

/** Expand a leading "~" and resolve against the working directory. */
export function resolvePath(value: string): string {
  if (value === "~") return os.homedir();
  if (value.startsWith("~/")) return path.join(os.homedir(), value.slice(2));
  return path.resolve(value);
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join(".") ?? "environment";
    throw new ConfigError(`Invalid ${variable}: ${issue?.message ?? "unreadable value"}`, { cause: parsed.error });
  }
  const vars = parsed.data;

  const dbPath = resolvePath(overrides.dbPath ?? vars.MEMORY_DB_PATH ?? DEFAULT_DB_PATH);
  const dbDir = path.dirname(dbPath);
  const provider = vars.LLM_PROVIDER;
  const fallbackKey = provider === "anthropic" ? vars.ANTHROPIC_API_KEY : vars.OPENAI_API_KEY;
  const baseUrl = vars.LLM_BASE_URL ?? (provider === "openai" ? DEFAULT_BASE_URL : undefined);
  const apiKey = vars.LLM_API_KEY ?? fallbackKey;

  return {
    dbPath,
    backupPath: resolvePath(vars.MEMORY_BACKUP_PATH ?? path.join(dbDir, "backups")),
    sessionLogPath: resolvePath(vars.MEMORY_SESSION_LOG ?? path.join(dbDir, "Session_Summary_Log.md")),
    openQuestionsPath: resolvePath(vars.MEMORY_OPEN_QUESTIONS ?? path.join(dbDir, "Open_Questions_Blockers.md")),
    preloadPath: resolvePath(vars.MEMORY_PRELOAD_PATH ?? path.join(dbDir, "PRELOAD.md")),
    busyTimeoutMs: vars.MEMORY_BUSY_TIMEOUT_MS,
    llm: {
      provider,
      model: overrides.model ?? vars.LLM_MODEL ?? DEFAULT_MODELS[provider],
      ...(baseUrl ? { baseUrl } : {}),
      ...(apiKey ? { apiKey } : {}),
    },
  };
}
