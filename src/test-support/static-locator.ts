import type { BinaryLocator } from "../preflight/types.js";

/** Resolves only the listed commands, each under /usr/local/bin. */
export class StaticLocator implements BinaryLocator {
  readonly lookups: string[] = [];

  constructor(private readonly available: readonly string[]) {}

  async locate(command: string): Promise<string | null> {
    this.lookups.push(command);
    return this.available.includes(command) ? `/usr/local/bin/${command}` : null;
  }
}
