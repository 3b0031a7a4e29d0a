import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { errorCode, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

export const RUNTIME_STATE_FILE = "runtime-state.json";

const runtimeStateSchema = z.object({
  sidecarInitialized: z.boolean(),
  initializedAt: z.string().optional(),
  recoveries: z.number().int().nonnegative(),
  lastRecoveryAt: z.string().optional(),
});

export type RuntimeState = z.infer<typeof runtimeStateSchema>;

const EMPTY_STATE: RuntimeState = { sidecarInitialized: false, recoveries: 0 };

export interface RuntimeStateReader {
  read(): Promise<RuntimeState>;
}

/**
 * What the orchestrator last did to the sidecar runtime's local state.
 * Read by preflight; written only when a recovery reinitialises the sidecar.
 */
export class RuntimeStateStore implements RuntimeStateReader {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger
  ) {}

  async read(): Promise<RuntimeState> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        return { ...EMPTY_STATE };
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.logger.warn({ filePath: this.filePath, error: errorMessage(err) }, "Ignoring unreadable runtime state");
      return { ...EMPTY_STATE };
    }

    const parsed = runtimeStateSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn({ filePath: this.filePath, issues: parsed.error.issues.length }, "Ignoring invalid runtime state");
      return { ...EMPTY_STATE };
    }
    return parsed.data;
  }

  async recordRecovery(at: Date = new Date()): Promise<RuntimeState> {
    const previous = await this.read();
    const timestamp = at.toISOString();
    const next: RuntimeState = {
      sidecarInitialized: true,
      initializedAt: timestamp,
      recoveries: previous.recoveries + 1,
      lastRecoveryAt: timestamp,
    };
    await this.write(next);
    return next;
  }

  private async write(state: RuntimeState): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await writeFile(tmp, `${JSON.stringify(state, null, 2)}\n`, "utf-8");
    await rename(tmp, this.filePath);
  }
}
