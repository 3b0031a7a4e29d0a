import { sleep, throwIfCancelled } from "../cancellation.js";
import type { Logger } from "../logger.js";
import { FetchHealthProbe } from "./fetch-probe.js";
import type { HealthCheckResult, HealthProbe, HealthWaitRequest } from "./types.js";

const REQUEST_TIMEOUT_MS = 5_000;

export interface HealthGateDeps {
  readonly logger: Logger;
  readonly probe?: HealthProbe;
  readonly now?: () => number;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Fixed-interval readiness polling. Returns the first successful check, or a
 * failed result once the timeout has elapsed. Each probe is bounded by the
 * remaining budget, so a call never outlives its deadline by more than one
 * interval. It never restarts what it polls.
 */
export class HealthGate {
  private readonly logger: Logger;
  private readonly probe: HealthProbe;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(deps: HealthGateDeps) {
    this.logger = deps.logger.child({ component: "health" });
    this.probe = deps.probe ?? new FetchHealthProbe();
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? sleep;
  }

  async waitUntilHealthy(request: HealthWaitRequest): Promise<HealthCheckResult> {
    const { url, intervalMs, timeoutMs, signal, abortWhen } = request;
    const label = request.label ?? url;
    const startedAt = this.now();
    const deadline = startedAt + timeoutMs;
    let attempts = 0;
    let latencyMs = 0;
    let lastStatus: number | undefined;
    let lastError: string | undefined;

    const finish = (success: boolean, error?: string): HealthCheckResult => ({
      timestamp: new Date(),
      success,
      latencyMs,
      elapsedMs: this.now() - startedAt,
      attempts,
      status: lastStatus,
      error,
    });

    this.logger.debug({ target: label, url, intervalMs, timeoutMs }, "Waiting for health");

    for (;;) {
      throwIfCancelled(signal);

      const abortReason = abortWhen?.();
      if (abortReason) {
        this.logger.warn({ target: label, attempts, reason: abortReason }, "Health check abandoned");
        return finish(false, abortReason);
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        const error = lastError ?? `no successful response within ${timeoutMs}ms`;
        this.logger.warn({ target: label, attempts, timeoutMs, error }, "Health check timed out");
        return finish(false, error);
      }

      attempts += 1;
      const probeStartedAt = this.now();
      const outcome = await this.probe.probe(url, Math.min(remaining, REQUEST_TIMEOUT_MS), signal);
      latencyMs = this.now() - probeStartedAt;
      lastStatus = outcome.status;
      throwIfCancelled(signal);

      if (outcome.ok) {
        if (this.now() > deadline) {
          lastError = `responded after the ${timeoutMs}ms deadline`;
          continue;
        }
        this.logger.info({ target: label, attempts, elapsedMs: this.now() - startedAt }, "Healthy");
        return finish(true);
      }

      lastError = outcome.error ?? `HTTP ${outcome.status ?? "error"}`;
      this.logger.debug({ target: label, attempt: attempts, error: lastError }, "Not healthy yet");

      const wait = Math.min(intervalMs, deadline - this.now());
      if (wait > 0) {
        await this.sleep(wait, signal);
      }
    }
  }
}
