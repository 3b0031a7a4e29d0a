export type ProcessStatus = "starting" | "running" | "healthy" | "failed" | "stopped";

export type OutputStream = "stdout" | "stderr";

export interface LaunchSpec {
  readonly name: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly env?: Readonly<Record<string, string>>;
}

export interface ChildExit {
  readonly code: number | null;
  readonly signal: string | null;
  /** Set when the process could not be spawned at all. */
  readonly error?: string;
}

export interface LaunchedChild {
  readonly pid: number | null;
  onOutput(listener: (stream: OutputStream, chunk: string) => void): void;
  onExit(listener: (exit: ChildExit) => void): void;
  kill(signal: NodeJS.Signals): void;
}

export interface ProcessLauncher {
  launch(spec: LaunchSpec): LaunchedChild;
}

export interface ProcessHandle {
  readonly name: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly pid: number | null;
  readonly startedAt: Date | null;
  readonly status: ProcessStatus;
  readonly exitCode: number | null;
  readonly isAlive: boolean;
  tail(limit?: number): string[];
}

export type OutputEcho = (stream: OutputStream, chunk: string) => void;
