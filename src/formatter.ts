import type { ToolResult } from "./types.js";
import type { Task } from "./task.js";
import { formatDisplay } from "./dates.js";

export const MENU_OPTIONS: ReadonlyArray<readonly [string, string]> = [
  ["1", "View tasks"],
  ["2", "Add task"],
  ["3", "Mark task as complete"],
  ["4", "Delete task"],
  ["5", "Save tasks"],
  ["6", "Load tasks"],
  ["7", "Undo"],
  ["8", "Quit"],
];

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const RESET = "\x1b[0m";
const CHECK = "✓";

export function formatMenu(): string {
  const lines = MENU_OPTIONS.map(([key, label]) => `  ${key}. ${label}`);
  return [`${BOLD}Task Manager${RESET}`, ...lines].join("\n");
}

function pad(cells: string[], widths: number[]): string {
  return cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join("  ").trimEnd();
}

/**
 * Completed rows are green, incomplete rows past their due date red. Colour
 * codes wrap whole rows so column alignment is unaffected.
 */
export function formatTaskTable(tasks: readonly Task[], now: Date = new Date()): string {
  if (tasks.length === 0) return "You currently have no tasks.";

  const header = ["ID", "Done", "Due Date", "Title", "Priority"];
  const rows = tasks.map((t) => [
    String(t.id),
    t.complete ? CHECK : "",
    formatDisplay(t.dueDate),
    t.title,
    String(t.priority),
  ]);
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => r[i].length)));

  const body = rows.map((cells, i) => {
    const task = tasks[i];
    const line = pad(cells, widths);
    if (task.complete) return `${GREEN}${line}${RESET}`;
    if (task.dueDate.getTime() < now.getTime()) return `${RED}${line}${RESET}`;
    return line;
  });

  return [pad(header, widths), ...body].join("\n");
}

export function formatResult(result: ToolResult): string {
  if (result.ok) return result.message ?? "Done.";
  return `Error: ${result.error ?? "unknown error"}`;
}
