import type { EventEmitter } from "node:events";
import type { WatchSources } from "../app/source-watcher.js";
import type { OrchestratorConfig } from "../config.js";
import type { SidecarReset } from "../dependencies/types.js";
import type { HealthProbe } from "../health/types.js";
import type { Logger } from "../logger.js";
import type { BinaryLocator } from "../preflight/types.js";
import type { OutputEcho, ProcessLauncher } from "../process/types.js";

/** Everything a command needs from the outside world; tests replace the optional parts. */
export interface CommandContext {
  readonly config: OrchestratorConfig;
  readonly logger: Logger;
  readonly launcher?: ProcessLauncher;
  readonly probe?: HealthProbe;
  readonly locator?: BinaryLocator;
  readonly watch?: WatchSources;
  readonly echo?: OutputEcho;
  readonly sidecarReset?: SidecarReset;
  readonly signals?: EventEmitter;
  readonly isProcessAlive?: (pid: number) => boolean;
  /** Final summaries go here; defaults to stdout. */
  readonly print?: (text: string) => void;
  /** Failure diagnostics go here; defaults to stderr. */
  readonly printError?: (text: string) => void;
}
