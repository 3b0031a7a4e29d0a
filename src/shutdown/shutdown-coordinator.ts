import { ShutdownError } from "../errors.js";
import type { Logger } from "../logger.js";

interface ShutdownStep {
  readonly name: string;
  readonly run: () => Promise<void>;
}

/**
 * Teardown steps registered in startup order and run in reverse, one at a
 * time. A failing step is logged and the rest still run. Calling shutdown()
 * again returns the same run.
 */
export class ShutdownCoordinator {
  private readonly steps: ShutdownStep[] = [];
  private readonly failures: ShutdownError[] = [];
  private running: Promise<readonly ShutdownError[]> | null = null;
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "shutdown" });
  }

  get started(): boolean {
    return this.running !== null;
  }

  get pendingSteps(): string[] {
    return this.steps.map((step) => step.name);
  }

  /** Steps registered after shutdown began run right after the ones in flight. */
  register(name: string, run: () => Promise<void>): void {
    this.steps.push({ name, run });
    if (this.running) {
      this.running = this.running.then(() => this.drain());
    }
  }

  shutdown(): Promise<readonly ShutdownError[]> {
    if (!this.running) {
      this.logger.info({ steps: this.pendingSteps.reverse() }, "Shutting down");
      this.running = this.drain();
    }
    return this.running;
  }

  private async drain(): Promise<readonly ShutdownError[]> {
    for (let step = this.steps.pop(); step; step = this.steps.pop()) {
      try {
        this.logger.debug({ step: step.name }, "Running shutdown step");
        await step.run();
      } catch (err) {
        const failure = new ShutdownError(step.name, err);
        this.failures.push(failure);
        this.logger.warn({ step: step.name, error: failure.message }, "Shutdown step failed");
      }
    }
    return [...this.failures];
  }
}
