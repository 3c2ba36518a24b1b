import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { CommandType } from "../types.js";

export interface AuditEntry {
  ts: string;
  command: CommandType;
  input: Record<string, unknown>;
  ok: boolean;
  error?: string;
}

/** JSONL trail of executed commands, one line per command. */
export class AuditLog {
  private dirReady: Promise<unknown> | null = null;

  constructor(
    private readonly path: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Failures go to stderr and never reach the caller. */
  async record(
    command: CommandType,
    input: Record<string, unknown>,
    outcome: { ok: boolean; error?: string }
  ): Promise<void> {
    const entry: AuditEntry = {
      ts: this.now().toISOString(),
      command,
      input,
      ok: outcome.ok,
      error: outcome.error,
    };
    try {
      this.dirReady ??= mkdir(dirname(this.path), { recursive: true });
      await this.dirReady;
      await appendFile(this.path, JSON.stringify(entry) + "\n", "utf-8");
    } catch (err) {
      this.dirReady = null;
      console.error(`[tasklist] audit write to ${this.path} failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
