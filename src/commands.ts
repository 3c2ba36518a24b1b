import type { Command, CommandType, ToolResult } from "./types.js";
import { MUTATING_COMMANDS } from "./types.js";
import type { TaskStore } from "./state/store.js";
import type { AuditLog } from "./state/audit.js";

async function dispatch(store: TaskStore, command: Command): Promise<ToolResult> {
  switch (command.type) {
    case "view":
      return store.viewTasks(command.sortBy);
    case "add":
      return store.addTask(command.input);
    case "complete":
      return store.completeTask(command.taskId);
    case "remove":
      return store.removeTask(command.taskId);
    case "save":
      return store.saveTasks();
    case "load":
      return store.loadTasks(command.confirm);
    case "undo":
      return store.undo();
  }
}

/**
 * Runs one command. Mutating commands checkpoint the store first so that undo
 * reverses them; a failed mutation drops its checkpoint again.
 */
export async function execute(store: TaskStore, command: Command): Promise<ToolResult> {
  const mutating = MUTATING_COMMANDS.has(command.type);
  if (mutating) store.checkpoint();
  const result = await dispatch(store, command);
  if (mutating && !result.ok) store.discardCheckpoint();
  return result;
}

function auditInput(command: Command): Record<string, unknown> {
  switch (command.type) {
    case "view":
      return { sortBy: command.sortBy };
    case "add":
      return { title: command.input.title, dueDate: command.input.dueDate, priority: command.input.priority };
    case "complete":
    case "remove":
      return { taskId: command.taskId };
    default:
      return {};
  }
}

export async function withAudit<T extends { ok: boolean; error?: string }>(
  audit: AuditLog | null,
  command: CommandType,
  input: Record<string, unknown>,
  fn: () => Promise<T>
): Promise<T> {
  const result = await fn();
  await audit?.record(command, input, result);
  return result;
}

export function executeAudited(
  store: TaskStore,
  audit: AuditLog | null,
  command: Command
): Promise<ToolResult> {
  return withAudit(audit, command.type, auditInput(command), () => execute(store, command));
}
