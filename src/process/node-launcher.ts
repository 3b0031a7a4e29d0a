import { spawn, type ChildProcess } from "node:child_process";
import { errorCode } from "../errors.js";
import type { ChildExit, LaunchSpec, LaunchedChild, OutputStream, ProcessLauncher } from "./types.js";

/**
 * Spawns real OS processes. On POSIX each child leads its own process group
 * so signals also reach whatever it forked (the sidecar CLI starts a daemon,
 * `uv run` starts the interpreter).
 */
export class NodeProcessLauncher implements ProcessLauncher {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  launch(spec: LaunchSpec): LaunchedChild {
    const useProcessGroup = this.platform !== "win32";
    const child = spawn(spec.command, [...spec.args], {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ["ignore", "pipe", "pipe"],
      detached: useProcessGroup,
    });

    return new NodeLaunchedChild(child, useProcessGroup);
  }
}

class NodeLaunchedChild implements LaunchedChild {
  private readonly outputListeners: Array<(stream: OutputStream, chunk: string) => void> = [];
  private readonly exitListeners: Array<(exit: ChildExit) => void> = [];
  private settled: ChildExit | null = null;

  constructor(
    private readonly child: ChildProcess,
    private readonly useProcessGroup: boolean
  ) {
    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => this.emitOutput("stdout", chunk));
    child.stderr?.on("data", (chunk: string) => this.emitOutput("stderr", chunk));

    child.on("exit", (code, signal) => this.settle({ code, signal }));
    child.on("error", (err) => this.settle({ code: null, signal: null, error: `Failed to run ${child.spawnfile}: ${err.message}` }));
  }

  get pid(): number | null {
    return this.child.pid ?? null;
  }

  onOutput(listener: (stream: OutputStream, chunk: string) => void): void {
    this.outputListeners.push(listener);
  }

  onExit(listener: (exit: ChildExit) => void): void {
    if (this.settled) {
      listener(this.settled);
      return;
    }
    this.exitListeners.push(listener);
  }

  kill(signal: NodeJS.Signals): void {
    const pid = this.child.pid;
    if (this.settled || pid === undefined) {
      return;
    }

    try {
      if (this.useProcessGroup) {
        process.kill(-pid, signal);
      } else {
        this.child.kill(signal);
      }
    } catch (err) {
      // Already gone between the exit check and the signal.
      if (errorCode(err) !== "ESRCH") {
        throw err;
      }
    }
  }

  private emitOutput(stream: OutputStream, chunk: string): void {
    for (const listener of this.outputListeners) {
      listener(stream, chunk);
    }
  }

  private settle(exit: ChildExit): void {
    if (this.settled) {
      return;
    }
    this.settled = exit;
    for (const listener of this.exitListeners) {
      listener(exit);
    }
  }
}
