#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config.js";
import { localDateParser } from "./dates.js";
import { createServer } from "./server.js";
import { AuditLog } from "./state/audit.js";
import { SnapshotFile } from "./state/snapshot.js";
import { TaskStore } from "./state/store.js";

const config = loadConfig();
const store = await TaskStore.init({
  snapshot: new SnapshotFile(config.storeFile),
  dates: localDateParser,
  historyLimit: config.historyLimit,
});
const audit = config.auditFile ? new AuditLog(config.auditFile) : null;

// --- Start server ---
const server = createServer({ store, audit });
const transport = new StdioServerTransport();
await server.connect(transport);
console.error(`[tasklist] MCP server started (snapshot: ${config.storeFile})`);
