import type { OutputEcho } from "./types.js";

const DEFAULT_LINE_LIMIT = 200;

/** Keeps the last N lines of a process's combined output. */
export class OutputBuffer {
  private readonly buffered: string[] = [];
  private partial = "";

  constructor(private readonly limit = DEFAULT_LINE_LIMIT) {}

  push(chunk: string): void {
    const pieces = (this.partial + chunk).split(/\r?\n/);
    this.partial = pieces.pop() ?? "";

    for (const line of pieces) {
      this.buffered.push(line);
    }
    if (this.buffered.length > this.limit) {
      this.buffered.splice(0, this.buffered.length - this.limit);
    }
  }

  lines(limit = this.limit): string[] {
    const all = this.partial === "" ? [...this.buffered] : [...this.buffered, this.partial];
    return limit >= all.length ? all : all.slice(all.length - limit);
  }

  clear(): void {
    this.buffered.length = 0;
    this.partial = "";
  }
}

export const terminalEcho: OutputEcho = (stream, chunk) => {
  if (stream === "stdout") {
    process.stdout.write(chunk);
  } else {
    process.stderr.write(chunk);
  }
};
