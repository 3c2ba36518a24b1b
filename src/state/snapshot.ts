import { readFile, writeFile, rename, mkdir, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { TaskRecord } from "../types.js";

export class SnapshotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SnapshotError";
  }
}

const taskRecordSchema = z.object({
  id: z.number().int().nonnegative(),
  title: z.string().min(1),
  due_date: z.string(),
  // Older files stored the priority as typed, e.g. "2".
  priority: z.coerce.number().int().positive(),
  complete: z.boolean(),
});

const snapshotSchema = z.array(taskRecordSchema);

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * The on-disk JSON array of tasks. Opened and closed per call; nothing is held
 * between commands.
 */
export class SnapshotFile {
  constructor(readonly filePath: string) {}

  /** Returns null when the file does not exist. */
  async read(): Promise<TaskRecord[] | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new SnapshotError(`Cannot read ${this.filePath}: ${reason(err)}`, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new SnapshotError(`${this.filePath} is not valid JSON: ${reason(err)}`, { cause: err });
    }

    const result = snapshotSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? issue.path.join(".") || "(root)" : "(root)";
      throw new SnapshotError(`${this.filePath} has an unexpected shape at ${where}: ${issue?.message ?? "invalid"}`);
    }
    return result.data;
  }

  /** Replaces the whole file. */
  async write(records: TaskRecord[]): Promise<void> {
    const tmpPath = `${this.filePath}.tmp.${process.pid}`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(records, null, 2), "utf-8");
      await rename(tmpPath, this.filePath);
    } catch (err) {
      await unlink(tmpPath).catch((cleanupErr: unknown) => {
        if (!isMissingFile(cleanupErr)) {
          console.error(`[tasklist] could not remove ${tmpPath}: ${reason(cleanupErr)}`);
        }
      });
      throw new SnapshotError(`Cannot write ${this.filePath}: ${reason(err)}`, { cause: err });
    }
  }

  /**
   * Merges records into the existing file: entries with a matching id are
   * replaced in place, the rest are appended.
   */
  async upsert(records: TaskRecord[]): Promise<void> {
    const existing = (await this.read()) ?? [];
    const merged = [...existing];
    for (const record of records) {
      const idx = merged.findIndex((r) => r.id === record.id);
      if (idx === -1) merged.push(record);
      else merged[idx] = record;
    }
    await this.write(merged);
  }

  /** Highest id in the file, or -1 when the file is absent or empty. */
  async maxId(): Promise<number> {
    const records = (await this.read()) ?? [];
    return records.reduce((max, r) => Math.max(max, r.id), -1);
  }
}
