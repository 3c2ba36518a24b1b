import type { AddTaskInput, Confirm, SortKey, ToolResult } from "../types.js";
import { SORT_KEYS } from "../types.js";
import { Task } from "../task.js";
import { DateParseError, type DateParser } from "../dates.js";
import { SnapshotError, type SnapshotFile } from "./snapshot.js";

export interface TaskStoreDeps {
  snapshot: SnapshotFile;
  dates: DateParser;
  /** Maximum undo depth; 0 keeps every entry. */
  historyLimit?: number;
}

interface StoreState {
  tasks: Task[];
  nextId: number;
}

const COMPARATORS: Record<SortKey, (a: Task, b: Task) => number> = {
  due_date: (a, b) => a.dueDate.getTime() - b.dueDate.getTime() || a.priority - b.priority,
  priority: (a, b) => a.priority - b.priority || a.dueDate.getTime() - b.dueDate.getTime(),
};

function isSortKey(value: string): value is SortKey {
  return SORT_KEYS.some((key) => key === value);
}

function recordKey(task: Task): string {
  return JSON.stringify(task.toSerializable());
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TaskStore {
  private tasks: Task[] = [];
  private nextId: number;
  private history: StoreState[] = [];
  /** Serialized form of each task as of the last successful write or load, by id. */
  private written = new Map<number, string>();
  private readonly snapshot: SnapshotFile;
  private readonly dates: DateParser;
  private readonly historyLimit: number;

  private constructor(deps: TaskStoreDeps, nextId: number) {
    this.snapshot = deps.snapshot;
    this.dates = deps.dates;
    this.historyLimit = deps.historyLimit ?? 0;
    this.nextId = nextId;
  }

  /**
   * Starts with an empty list; ids continue after the highest one already on disk
   * so a later load never collides with tasks added in this session.
   */
  static async init(deps: TaskStoreDeps): Promise<TaskStore> {
    let maxId = -1;
    try {
      maxId = await deps.snapshot.maxId();
    } catch (err) {
      if (!(err instanceof SnapshotError)) throw err;
      console.error(`[tasklist] ignoring unreadable snapshot at startup: ${err.message}`);
    }
    return new TaskStore(deps, maxId + 1);
  }

  list(): readonly Task[] {
    return this.tasks;
  }

  getNextId(): number {
    return this.nextId;
  }

  find(id: number): Task | undefined {
    return this.tasks.find((t) => t.id === id);
  }

  unsavedTasks(): Task[] {
    return this.tasks.filter((t) => !t.persisted);
  }

  // --- History ---

  historyDepth(): number {
    return this.history.length;
  }

  checkpoint(): void {
    this.history.push({
      tasks: this.tasks.map((t) => t.clone()),
      nextId: this.nextId,
    });
    if (this.historyLimit > 0 && this.history.length > this.historyLimit) {
      this.history.shift();
    }
  }

  discardCheckpoint(): void {
    this.history.pop();
  }

  undo(): ToolResult {
    const previous = this.history.pop();
    if (!previous) {
      return { ok: false, error: "Nothing to undo." };
    }
    this.tasks = previous.tasks;
    this.nextId = previous.nextId;
    // A save may have happened since the checkpoint was taken.
    for (const task of this.tasks) {
      if (this.written.get(task.id) === recordKey(task)) task.markPersisted();
      else task.markUnsaved();
    }
    return { ok: true, message: "Undo complete." };
  }

  // --- Commands ---

  viewTasks(sortBy?: string): ToolResult<Task[]> {
    const copy = this.tasks.map((t) => t.clone());
    if (sortBy === undefined) {
      return { ok: true, data: copy };
    }
    if (!isSortKey(sortBy)) {
      return {
        ok: false,
        error: `Sort option "${sortBy}" is not valid; showing tasks unsorted.`,
        data: copy,
      };
    }
    // Array.prototype.sort is stable, so equal keys keep their stored order.
    return { ok: true, data: copy.sort(COMPARATORS[sortBy]) };
  }

  addTask(input: AddTaskInput): ToolResult<Task> {
    const title = input.title.trim();
    if (!title) {
      return { ok: false, error: "Title cannot be empty." };
    }
    if (!Number.isInteger(input.priority) || input.priority < 1) {
      return { ok: false, error: "Priority must be a whole number of 1 or more." };
    }

    let dueDate: Date;
    try {
      dueDate = this.dates.parse(input.dueDate);
    } catch (err) {
      if (err instanceof DateParseError) {
        return { ok: false, error: "Date input was invalid." };
      }
      throw err;
    }

    const task = new Task({ id: this.nextId, title, dueDate, priority: input.priority });
    this.tasks.push(task);
    this.nextId++;
    return { ok: true, message: "Task added.", data: task.clone() };
  }

  completeTask(id: number): ToolResult<Task> {
    const task = this.find(id);
    if (!task) {
      return { ok: false, error: `Task ${id} not found.` };
    }
    task.setComplete();
    return { ok: true, message: "Task marked as complete.", data: task.clone() };
  }

  removeTask(id: number): ToolResult<Task> {
    const idx = this.tasks.findIndex((t) => t.id === id);
    if (idx === -1) {
      return { ok: false, error: `Task ${id} not found.` };
    }
    const [removed] = this.tasks.splice(idx, 1);
    return { ok: true, message: "Task successfully deleted.", data: removed };
  }

  async saveTasks(): Promise<ToolResult<{ count: number }>> {
    try {
      await this.snapshot.write(this.tasks.map((t) => t.toSerializable()));
    } catch (err) {
      return { ok: false, error: `Save failed: ${errorMessage(err)}` };
    }
    this.written = new Map(this.tasks.map((t): [number, string] => [t.id, recordKey(t)]));
    for (const task of this.tasks) task.markPersisted();
    return {
      ok: true,
      message: `Tasks saved to ${this.snapshot.filePath}`,
      data: { count: this.tasks.length },
    };
  }

  async loadTasks(confirm: Confirm): Promise<ToolResult<{ count: number }>> {
    const unsaved = this.unsavedTasks();
    if (unsaved.length > 0 && (await confirm("You have unsaved changes. Save before loading? (y/n): "))) {
      try {
        await this.snapshot.upsert(unsaved.map((t) => t.toSerializable()));
      } catch (err) {
        return { ok: false, error: `Save before load failed: ${errorMessage(err)}` };
      }
      for (const task of unsaved) {
        this.written.set(task.id, recordKey(task));
        task.markPersisted();
      }
    }

    let loaded: Task[];
    try {
      const records = await this.snapshot.read();
      if (records === null) {
        return { ok: true, message: "No tasks saved.", data: { count: 0 } };
      }
      loaded = records.map(
        (r) =>
          new Task({
            id: r.id,
            title: r.title,
            dueDate: this.dates.parse(r.due_date),
            priority: r.priority,
            complete: r.complete,
            persisted: true,
          })
      );
    } catch (err) {
      if (err instanceof SnapshotError || err instanceof DateParseError) {
        return { ok: false, error: `Load failed: ${err.message}` };
      }
      throw err;
    }

    this.tasks = loaded;
    this.written = new Map(loaded.map((t): [number, string] => [t.id, recordKey(t)]));
    const maxId = loaded.reduce((max, t) => Math.max(max, t.id), -1);
    this.nextId = Math.max(this.nextId, maxId + 1);
    return {
      ok: true,
      message: `Tasks loaded from ${this.snapshot.filePath}`,
      data: { count: loaded.length },
    };
  }
}
