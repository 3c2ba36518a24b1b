import { z } from "zod";
import type { TasklistConfig } from "./types.js";
import { DEFAULT_CONFIG } from "./types.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z.object({
  TASKLIST_FILE: z.preprocess(blankToUndefined, z.string().default(DEFAULT_CONFIG.storeFile)),
  TASKLIST_HISTORY_LIMIT: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().nonnegative().default(DEFAULT_CONFIG.historyLimit)
  ),
  TASKLIST_AUDIT_FILE: z.preprocess(blankToUndefined, z.string().optional()),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): TasklistConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const name = issue?.path.join(".") ?? "environment";
    throw new ConfigError(`Invalid ${name}: ${issue?.message ?? "invalid value"}`);
  }
  return {
    storeFile: result.data.TASKLIST_FILE,
    historyLimit: result.data.TASKLIST_HISTORY_LIMIT,
    auditFile: result.data.TASKLIST_AUDIT_FILE ?? null,
  };
}
