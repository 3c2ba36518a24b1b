// --- Enum Types (Union Types) ---

export type SortKey = "due_date" | "priority";

export const SORT_KEYS: readonly SortKey[] = ["due_date", "priority"];

export type CommandType = "view" | "add" | "complete" | "remove" | "save" | "load" | "undo";

// --- Persistence ---

/** One entry of the on-disk snapshot array. */
export interface TaskRecord {
  id: number;
  title: string;
  due_date: string;
  priority: number;
  complete: boolean;
}

// --- Inputs ---

export interface AddTaskInput {
  title: string;
  dueDate: string;
  priority: number;
}

export type Confirm = (prompt: string) => Promise<boolean>;

export type Command =
  | { type: "view"; sortBy?: string }
  | { type: "add"; input: AddTaskInput }
  | { type: "complete"; taskId: number }
  | { type: "remove"; taskId: number }
  | { type: "save" }
  | { type: "load"; confirm: Confirm }
  | { type: "undo" };

export const MUTATING_COMMANDS: ReadonlySet<CommandType> = new Set(["add", "complete", "remove"]);

// --- Results ---

export interface ToolResult<T = unknown> {
  ok: boolean;
  message?: string;
  error?: string;
  data?: T;
}

// --- Config ---

export interface TasklistConfig {
  storeFile: string;
  historyLimit: number;
  auditFile: string | null;
}

export const DEFAULT_CONFIG: TasklistConfig = {
  storeFile: "tasks.json",
  historyLimit: 100,
  auditFile: null,
};

export const DEFAULT_PRIORITY = 1;
