import type { SortKey } from "./types.js";
import { DEFAULT_PRIORITY } from "./types.js";
import type { TaskStore } from "./state/store.js";
import type { AuditLog } from "./state/audit.js";
import type { LineIO } from "./io.js";
import { DateParseError, type DateParser } from "./dates.js";
import { executeAudited, withAudit } from "./commands.js";
import { formatMenu, formatResult, formatTaskTable } from "./formatter.js";

export interface SessionContext {
  store: TaskStore;
  io: LineIO;
  dates: DateParser;
  audit: AuditLog | null;
  /** Clock used to highlight overdue tasks. */
  now?: () => Date;
}

const SORT_OPTIONS = new Map<string, SortKey>([
  ["1", "due_date"],
  ["2", "priority"],
]);

function isYes(answer: string | null): boolean {
  return answer?.trim().toLowerCase() === "y";
}

/** Re-asks until `accept` returns a value; null when input ends. */
async function askUntil<T>(
  io: LineIO,
  prompt: string,
  accept: (answer: string) => T | undefined,
  complaint: string
): Promise<T | null> {
  for (;;) {
    const answer = await io.ask(prompt);
    if (answer === null) return null;
    const value = accept(answer);
    if (value !== undefined) return value;
    io.print(complaint);
  }
}

function parsePriority(answer: string): number | undefined {
  const text = answer.trim();
  if (!text) return DEFAULT_PRIORITY;
  if (!/^\d+$/.test(text)) return undefined;
  const priority = Number(text);
  return priority >= 1 ? priority : undefined;
}

function showTable(ctx: SessionContext): void {
  ctx.io.print(formatTaskTable(ctx.store.list(), ctx.now?.()));
}

async function viewTasks(ctx: SessionContext): Promise<boolean> {
  const { store, io } = ctx;
  if (store.list().length === 0) {
    io.print("You currently have no tasks.");
    return true;
  }

  let sortBy: string | undefined;
  const sort = await io.ask("Would you like to sort the tasks? (y/n): ");
  if (sort === null) return false;
  if (isYes(sort)) {
    io.print("Sorting options:\n  1. By due date\n  2. By priority");
    const option = await io.ask("Enter the desired sorting option: ");
    if (option === null) return false;
    const key = option.trim();
    sortBy = SORT_OPTIONS.get(key) ?? key;
  }

  const result = await withAudit(ctx.audit, "view", { sortBy }, async () => store.viewTasks(sortBy));
  if (!result.ok) io.print(formatResult(result));
  io.print(formatTaskTable(result.data ?? [], ctx.now?.()));
  return true;
}

async function addTask(ctx: SessionContext): Promise<boolean> {
  const { io, dates } = ctx;
  const title = await askUntil(io, "Enter title: ", (v) => (v.trim() ? v.trim() : undefined), "Title cannot be empty.");
  if (title === null) return false;

  const dueDate = await askUntil(
    io,
    "Enter due date: ",
    (v) => {
      try {
        dates.parse(v);
        return v;
      } catch (err) {
        if (err instanceof DateParseError) return undefined;
        throw err;
      }
    },
    "Date input was invalid."
  );
  if (dueDate === null) return false;

  const priority = await askUntil(
    io,
    "Enter priority (1=high, 2=medium, 3=low): ",
    parsePriority,
    "Priority must be a whole number of 1 or more."
  );
  if (priority === null) return false;

  const result = await executeAudited(ctx.store, ctx.audit, {
    type: "add",
    input: { title, dueDate, priority },
  });
  io.print(formatResult(result));
  return true;
}

async function pickTask(ctx: SessionContext, verb: string): Promise<number | "none" | null> {
  const { store, io } = ctx;
  if (store.list().length === 0) {
    io.print("You currently have no tasks.");
    return "none";
  }
  showTable(ctx);
  const answer = await io.ask(`Enter the ID of the task to ${verb}: `);
  if (answer === null) return null;
  const text = answer.trim();
  if (!/^\d+$/.test(text)) {
    io.print(`Error: "${text}" is not a task ID.`);
    return "none";
  }
  return Number(text);
}

async function completeOrRemove(ctx: SessionContext, type: "complete" | "remove"): Promise<boolean> {
  const taskId = await pickTask(ctx, type === "complete" ? "complete" : "delete");
  if (taskId === null) return false;
  if (taskId === "none") return true;
  const result = await executeAudited(ctx.store, ctx.audit, { type, taskId });
  ctx.io.print(formatResult(result));
  return true;
}

/** Handles one menu selection; false ends the loop. */
export async function handleChoice(choice: string, ctx: SessionContext): Promise<boolean> {
  const { store, io, audit } = ctx;

  switch (choice) {
    case "1":
      return viewTasks(ctx);
    case "2":
      return addTask(ctx);
    case "3":
      return completeOrRemove(ctx, "complete");
    case "4":
      return completeOrRemove(ctx, "remove");
    case "5": {
      const result = await executeAudited(store, audit, { type: "save" });
      io.print(formatResult(result));
      return true;
    }
    case "6": {
      let inputEnded = false;
      const result = await executeAudited(store, audit, {
        type: "load",
        confirm: async (prompt) => {
          const answer = await io.ask(prompt);
          if (answer === null) inputEnded = true;
          return isYes(answer);
        },
      });
      io.print(formatResult(result));
      return !inputEnded;
    }
    case "7": {
      const result = await executeAudited(store, audit, { type: "undo" });
      io.print(formatResult(result));
      return true;
    }
    case "8":
      io.print("Goodbye.");
      return false;
    default:
      io.print("That is not a valid choice.");
      return true;
  }
}

export async function runInteractive(ctx: SessionContext): Promise<void> {
  for (;;) {
    ctx.io.print(formatMenu());
    const choice = await ctx.io.ask("Please select an option: ");
    if (choice === null) return;
    const keepGoing = await handleChoice(choice.trim(), ctx);
    ctx.io.print("");
    if (!keepGoing) return;
  }
}
