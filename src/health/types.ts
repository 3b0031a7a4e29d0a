export interface HealthCheckResult {
  readonly timestamp: Date;
  readonly success: boolean;
  /** Duration of the last probe. */
  readonly latencyMs: number;
  /** Time spent waiting in total. */
  readonly elapsedMs: number;
  readonly attempts: number;
  readonly status?: number;
  readonly error?: string;
}

export interface ProbeOutcome {
  readonly ok: boolean;
  readonly status?: number;
  readonly error?: string;
}

export interface HealthProbe {
  probe(url: string, timeoutMs: number, signal?: AbortSignal): Promise<ProbeOutcome>;
}

export interface HealthWaitRequest {
  readonly url: string;
  readonly intervalMs: number;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
  /** Returns a reason to give up early, e.g. the polled process exited. */
  readonly abortWhen?: () => string | undefined;
  readonly label?: string;
}
