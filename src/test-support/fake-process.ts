import { vi } from "vitest";
import type { Logger } from "../logger.js";
import type { ChildExit, LaunchSpec, LaunchedChild, OutputStream, ProcessLauncher } from "../process/types.js";

export interface FakeChildBehaviour {
  /** Keep running after SIGTERM; only SIGKILL ends it. */
  readonly ignoreSigterm?: boolean;
  /** Ignore every signal. */
  readonly unkillable?: boolean;
}

export class FakeChild implements LaunchedChild {
  readonly signals: NodeJS.Signals[] = [];
  private readonly outputListeners: Array<(stream: OutputStream, chunk: string) => void> = [];
  private readonly exitListeners: Array<(exit: ChildExit) => void> = [];
  private settled: ChildExit | null = null;

  constructor(
    readonly spec: LaunchSpec,
    readonly pid: number,
    private readonly behaviour: FakeChildBehaviour = {}
  ) {}

  get exited(): boolean {
    return this.settled !== null;
  }

  get exit(): ChildExit | null {
    return this.settled;
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
    this.signals.push(signal);
    if (this.settled || this.behaviour.unkillable) {
      return;
    }
    if (signal === "SIGTERM" && this.behaviour.ignoreSigterm) {
      return;
    }
    queueMicrotask(() => this.finish({ code: null, signal }));
  }

  write(chunk: string, stream: OutputStream = "stdout"): void {
    for (const listener of this.outputListeners) {
      listener(stream, chunk);
    }
  }

  finish(exit: ChildExit): void {
    if (this.settled) {
      return;
    }
    this.settled = exit;
    for (const listener of this.exitListeners) {
      listener(exit);
    }
  }

  exitWith(code: number): void {
    this.finish({ code, signal: null });
  }
}

export class FakeProcessLauncher implements ProcessLauncher {
  readonly children: FakeChild[] = [];
  private nextPid = 1000;
  private readonly behaviours = new Map<string, FakeChildBehaviour>();
  private readonly launchHooks = new Map<string, (child: FakeChild, launchIndex: number) => void>();

  behave(name: string, behaviour: FakeChildBehaviour): this {
    this.behaviours.set(name, behaviour);
    return this;
  }

  /** Called synchronously for every launch of the named process. */
  onLaunch(name: string, hook: (child: FakeChild, launchIndex: number) => void): this {
    this.launchHooks.set(name, hook);
    return this;
  }

  launch(spec: LaunchSpec): LaunchedChild {
    const child = new FakeChild(spec, this.nextPid++, this.behaviours.get(spec.name));
    const launchIndex = this.launchesOf(spec.name).length;
    this.children.push(child);
    this.launchHooks.get(spec.name)?.(child, launchIndex);
    return child;
  }

  launchesOf(name: string): FakeChild[] {
    return this.children.filter((child) => child.spec.name === name);
  }

  latest(name: string): FakeChild | undefined {
    const launches = this.launchesOf(name);
    return launches[launches.length - 1];
  }

  alive(): FakeChild[] {
    return this.children.filter((child) => !child.exited);
  }
}

export function mockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
    level: "silent",
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}

/** Lets queued microtasks and already-due promise callbacks run. */
export async function flushAsync(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
