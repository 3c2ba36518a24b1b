import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import type { ToolResult } from "./types.js";
import { DEFAULT_PRIORITY } from "./types.js";
import type { TaskStore } from "./state/store.js";
import type { AuditLog } from "./state/audit.js";
import { executeAudited } from "./commands.js";

export interface ServerDeps {
  store: TaskStore;
  audit: AuditLog | null;
}

function toContent(result: ToolResult) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
}

const taskIdSchema = z.number().int().nonnegative();

export function createServer({ store, audit }: ServerDeps): McpServer {
  const server = new McpServer({
    name: "tasklist",
    version: "0.1.0",
  });

  // --- view_tasks ---
  server.tool(
    "view_tasks",
    "List tasks in stored order, or sorted by due_date or priority",
    { sortBy: z.string().optional() },
    async ({ sortBy }) => toContent(await executeAudited(store, audit, { type: "view", sortBy }))
  );

  // --- add_task ---
  server.tool(
    "add_task",
    "Add a task; dueDate accepts forms like 2025-01-31, 31-01-2025 or Jan 31 2025",
    {
      title: z.string(),
      dueDate: z.string(),
      priority: z.number().int().positive().optional(),
    },
    async ({ title, dueDate, priority }) =>
      toContent(
        await executeAudited(store, audit, {
          type: "add",
          input: { title, dueDate, priority: priority ?? DEFAULT_PRIORITY },
        })
      )
  );

  // --- complete_task ---
  server.tool(
    "complete_task",
    "Mark a task as complete",
    { taskId: taskIdSchema },
    async ({ taskId }) => toContent(await executeAudited(store, audit, { type: "complete", taskId }))
  );

  // --- remove_task ---
  server.tool(
    "remove_task",
    "Delete a task",
    { taskId: taskIdSchema },
    async ({ taskId }) => toContent(await executeAudited(store, audit, { type: "remove", taskId }))
  );

  // --- save_tasks ---
  server.tool("save_tasks", "Write every task to the snapshot file, replacing its contents", {}, async () =>
    toContent(await executeAudited(store, audit, { type: "save" }))
  );

  // --- load_tasks ---
  server.tool(
    "load_tasks",
    "Replace the task list with the snapshot file; saveUnsaved merges unsaved tasks into the file first",
    { saveUnsaved: z.boolean().optional() },
    async ({ saveUnsaved }) =>
      toContent(
        await executeAudited(store, audit, {
          type: "load",
          confirm: async () => saveUnsaved ?? false,
        })
      )
  );

  // --- undo ---
  server.tool("undo", "Revert the most recent add, complete or remove", {}, async () =>
    toContent(await executeAudited(store, audit, { type: "undo" }))
  );

  return server;
}
