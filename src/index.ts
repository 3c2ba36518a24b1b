#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { localDateParser } from "./dates.js";
import { TerminalIO } from "./io.js";
import { runInteractive } from "./cli.js";
import { AuditLog } from "./state/audit.js";
import { SnapshotFile } from "./state/snapshot.js";
import { TaskStore } from "./state/store.js";

try {
  const config = loadConfig();
  const store = await TaskStore.init({
    snapshot: new SnapshotFile(config.storeFile),
    dates: localDateParser,
    historyLimit: config.historyLimit,
  });
  const audit = config.auditFile ? new AuditLog(config.auditFile) : null;
  const io = new TerminalIO();
  try {
    await runInteractive({ store, io, dates: localDateParser, audit });
  } finally {
    io.close();
  }
} catch (err) {
  console.error(`[tasklist] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
