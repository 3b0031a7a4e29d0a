import { formatCommand, type CommandSpec } from "../config.js";
import type { Logger } from "../logger.js";
import { SupervisedProcess } from "../process/supervised-process.js";
import type { ProcessLauncher } from "../process/types.js";
import type { SidecarReset } from "./types.js";

export interface CommandSidecarResetOptions {
  readonly commands: readonly CommandSpec[];
  readonly cwd: string;
  readonly launcher: ProcessLauncher;
  readonly logger: Logger;
  readonly gracePeriodMs: number;
  readonly killTimeoutMs: number;
}

/** Runs the configured reset commands one after another; the first failure stops the sequence. */
export class CommandSidecarReset implements SidecarReset {
  constructor(private readonly options: CommandSidecarResetOptions) {}

  async reset(signal?: AbortSignal): Promise<void> {
    const { commands, cwd, launcher, logger, gracePeriodMs, killTimeoutMs } = this.options;

    for (const spec of commands) {
      const step = new SupervisedProcess({
        spec: { name: "sidecar-reset", command: spec.command, args: spec.args, cwd },
        launcher,
        logger,
        gracePeriodMs,
        killTimeoutMs,
        tailLines: 20,
      });

      step.start();
      try {
        const exit = await step.waitForExit(signal);
        if (exit.code !== 0) {
          if (exit.error) {
            throw new Error(exit.error);
          }
          const tail = step.tail(5).join(" | ");
          throw new Error(
            `${formatCommand(spec)} exited with code ${exit.code ?? "unknown"}${tail ? `: ${tail}` : ""}`
          );
        }
      } finally {
        await step.stop();
      }
    }
  }
}
