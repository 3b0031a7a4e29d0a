import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { raceCancellation } from "../cancellation.js";
import type { Logger } from "../logger.js";
import { OutputBuffer } from "./output-buffer.js";
import type {
  ChildExit,
  LaunchSpec,
  LaunchedChild,
  OutputEcho,
  OutputStream,
  ProcessHandle,
  ProcessLauncher,
  ProcessStatus,
} from "./types.js";

export interface SupervisedProcessOptions {
  readonly spec: LaunchSpec;
  readonly launcher: ProcessLauncher;
  readonly logger: Logger;
  readonly gracePeriodMs: number;
  readonly killTimeoutMs: number;
  /** Capture file; truncated on the first start, appended on restarts. */
  readonly logFile?: string;
  readonly echo?: OutputEcho;
  readonly tailLines?: number;
}

/**
 * One OS process owned by one supervisor. It can be started again after it
 * has exited, but never runs two children at once.
 */
export class SupervisedProcess implements ProcessHandle {
  private child: LaunchedChild | null = null;
  private exited: Promise<ChildExit> | null = null;
  private stopping: Promise<void> | null = null;
  private logStream: WriteStream | null = null;
  private readonly output: OutputBuffer;
  private readonly logger: Logger;
  private _status: ProcessStatus = "stopped";
  private _exitCode: number | null = null;
  private _startedAt: Date | null = null;
  private _alive = false;
  private _stopRequested = false;
  private launches = 0;

  constructor(private readonly options: SupervisedProcessOptions) {
    this.output = new OutputBuffer(options.tailLines);
    this.logger = options.logger.child({ process: options.spec.name });
  }

  get name(): string {
    return this.options.spec.name;
  }

  get command(): string {
    return this.options.spec.command;
  }

  get args(): readonly string[] {
    return this.options.spec.args;
  }

  get cwd(): string {
    return this.options.spec.cwd;
  }

  get pid(): number | null {
    return this.child?.pid ?? null;
  }

  get startedAt(): Date | null {
    return this._startedAt;
  }

  get status(): ProcessStatus {
    return this._status;
  }

  get exitCode(): number | null {
    return this._exitCode;
  }

  get isAlive(): boolean {
    return this._alive;
  }

  /** True when the current instance is exiting because stop() asked it to. */
  get stopRequested(): boolean {
    return this._stopRequested;
  }

  get launchCount(): number {
    return this.launches;
  }

  tail(limit?: number): string[] {
    return this.output.lines(limit);
  }

  start(): void {
    if (this._alive) {
      throw new Error(`${this.name} is already running (pid ${this.pid ?? "unknown"})`);
    }

    const { spec, launcher } = this.options;
    this._status = "starting";
    this._stopRequested = false;
    this._exitCode = null;
    this.stopping = null;
    this.openLog();

    this.logger.info({ command: spec.command, args: spec.args, cwd: spec.cwd }, "Starting process");

    let child: LaunchedChild;
    try {
      child = launcher.launch(spec);
    } catch (error) {
      this._status = "failed";
      this.closeLog();
      throw error;
    }

    this.child = child;
    this._startedAt = new Date();
    this._alive = true;
    this._status = "running";
    this.launches += 1;

    child.onOutput((stream, chunk) => this.capture(stream, chunk));
    this.exited = new Promise<ChildExit>((resolve) => {
      child.onExit((exit) => {
        this.handleExit(child, exit);
        resolve(exit);
      });
    });
  }

  markHealthy(): void {
    if (this._status === "running") {
      this._status = "healthy";
    }
  }

  /** Resolves when the current instance exits; rejects with CancelledError if the signal fires first. */
  waitForExit(signal?: AbortSignal): Promise<ChildExit> {
    if (!this.exited) {
      return Promise.reject(new Error(`${this.name} has not been started`));
    }
    return raceCancellation(this.exited, signal);
  }

  /** SIGTERM, then SIGKILL after the grace period. Safe to call in any state. */
  stop(): Promise<void> {
    if (!this._alive) {
      return Promise.resolve();
    }
    if (!this.stopping) {
      this._stopRequested = true;
      this.stopping = this.terminate();
    }
    return this.stopping;
  }

  private async terminate(): Promise<void> {
    const child = this.child;
    const exited = this.exited;
    if (!child || !exited) {
      return;
    }

    const { gracePeriodMs, killTimeoutMs } = this.options;
    this.logger.info({ pid: child.pid, gracePeriodMs }, "Stopping process");
    child.kill("SIGTERM");
    if (await settlesWithin(exited, gracePeriodMs)) {
      return;
    }

    this.logger.warn({ pid: child.pid }, "Process ignored SIGTERM, sending SIGKILL");
    child.kill("SIGKILL");
    if (await settlesWithin(exited, killTimeoutMs)) {
      return;
    }

    throw new Error(`${this.name} (pid ${child.pid ?? "unknown"}) did not exit after SIGKILL`);
  }

  private handleExit(child: LaunchedChild, exit: ChildExit): void {
    if (child !== this.child) {
      return;
    }

    this._alive = false;
    this._exitCode = exit.code;
    this._status = this._stopRequested || (exit.code === 0 && !exit.error) ? "stopped" : "failed";
    this.closeLog();

    if (exit.error) {
      this.output.push(`${exit.error}\n`);
      this.logger.error({ error: exit.error }, "Process failed to start");
    } else if (this._stopRequested) {
      this.logger.info({ exitCode: exit.code, signal: exit.signal }, "Process stopped");
    } else {
      this.logger.warn({ exitCode: exit.code, signal: exit.signal }, "Process exited");
    }
  }

  private capture(stream: OutputStream, chunk: string): void {
    this.output.push(chunk);
    if (this.logStream && !this.logStream.writableEnded) {
      this.logStream.write(chunk);
    }
    this.options.echo?.(stream, chunk);
  }

  private openLog(): void {
    const { logFile } = this.options;
    if (!logFile) {
      return;
    }

    mkdirSync(dirname(logFile), { recursive: true });
    const stream = createWriteStream(logFile, { flags: this.launches === 0 ? "w" : "a" });
    stream.on("error", (error) => {
      this.logger.warn({ logFile, error: error.message }, "Failed to write process log");
    });
    this.logStream = stream;
  }

  private closeLog(): void {
    this.logStream?.end();
    this.logStream = null;
  }
}

async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });

  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
