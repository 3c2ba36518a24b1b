import type { TaskRecord } from "./types.js";
import { formatCanonical, formatDisplay } from "./dates.js";

export interface TaskInit {
  id: number;
  title: string;
  dueDate: Date;
  priority: number;
  complete?: boolean;
  persisted?: boolean;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

export class Task {
  readonly id: number;
  readonly title: string;
  readonly dueDate: Date;
  readonly priority: number;
  private _complete: boolean;
  private _persisted: boolean;

  constructor(init: TaskInit) {
    this.id = init.id;
    this.title = init.title;
    this.dueDate = new Date(init.dueDate.getTime());
    this.priority = init.priority;
    this._complete = init.complete ?? false;
    this._persisted = init.persisted ?? false;
  }

  get complete(): boolean {
    return this._complete;
  }

  /** True while this task matches what was last written to the snapshot. */
  get persisted(): boolean {
    return this._persisted;
  }

  setComplete(): void {
    this._complete = true;
    this._persisted = false;
  }

  markPersisted(): void {
    this._persisted = true;
  }

  markUnsaved(): void {
    this._persisted = false;
  }

  toSerializable(): TaskRecord {
    return {
      id: this.id,
      title: this.title,
      due_date: formatCanonical(this.dueDate),
      priority: this.priority,
      complete: this._complete,
    };
  }

  toJSON(): TaskRecord & { persisted: boolean } {
    return { ...this.toSerializable(), persisted: this._persisted };
  }

  clone(): Task {
    return new Task({
      id: this.id,
      title: this.title,
      dueDate: this.dueDate,
      priority: this.priority,
      complete: this._complete,
      persisted: this._persisted,
    });
  }

  toString(): string {
    return `${capitalize(this.title)} - Due: ${formatDisplay(this.dueDate)} - Priority: ${this.priority}`;
  }
}
