import { stdin, stdout } from "node:process";
import { createInterface, type Interface } from "node:readline";

/** Line-oriented user interaction used by the interactive loop. */
export interface LineIO {
  /** Resolves to null once input has ended. */
  ask(prompt: string): Promise<string | null>;
  print(text: string): void;
  close(): void;
}

export class TerminalIO implements LineIO {
  private readonly rl: Interface;
  private readonly output: NodeJS.WritableStream;
  // Lines that arrived while no question was pending (piped input).
  private readonly pending: string[] = [];
  private waiter: ((line: string | null) => void) | null = null;
  private closed = false;

  constructor(input: NodeJS.ReadableStream = stdin, output: NodeJS.WritableStream = stdout) {
    this.output = output;
    this.rl = createInterface({ input, output });
    this.rl.on("line", (line) => {
      const waiter = this.waiter;
      this.waiter = null;
      if (waiter) waiter(line);
      else this.pending.push(line);
    });
    this.rl.once("close", () => {
      this.closed = true;
      const waiter = this.waiter;
      this.waiter = null;
      waiter?.(null);
    });
  }

  ask(prompt: string): Promise<string | null> {
    this.output.write(prompt);
    const queued = this.pending.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  print(text: string): void {
    this.output.write(text + "\n");
  }

  close(): void {
    this.rl.close();
  }
}
