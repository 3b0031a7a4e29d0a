import type { EventEmitter } from "node:events";
import { CancelledError } from "../errors.js";
import type { Logger } from "../logger.js";

export interface SignalTrapOptions {
  readonly controller: AbortController;
  readonly logger: Logger;
  readonly emitter?: EventEmitter;
  readonly signals?: readonly NodeJS.Signals[];
}

/**
 * Turns the first SIGINT/SIGTERM into one cancellation of the session
 * controller. Later signals are logged and otherwise ignored so teardown can
 * finish.
 */
export class SignalTrap {
  private readonly emitter: EventEmitter;
  private readonly signals: readonly NodeJS.Signals[];
  private readonly listeners = new Map<NodeJS.Signals, () => void>();
  private _received: NodeJS.Signals | null = null;

  constructor(private readonly options: SignalTrapOptions) {
    this.emitter = options.emitter ?? process;
    this.signals = options.signals ?? ["SIGINT", "SIGTERM"];
  }

  get received(): NodeJS.Signals | null {
    return this._received;
  }

  install(): void {
    for (const signal of this.signals) {
      if (this.listeners.has(signal)) {
        continue;
      }
      const listener = (): void => this.handle(signal);
      this.listeners.set(signal, listener);
      this.emitter.on(signal, listener);
    }
  }

  dispose(): void {
    for (const [signal, listener] of this.listeners) {
      this.emitter.off(signal, listener);
    }
    this.listeners.clear();
  }

  private handle(signal: NodeJS.Signals): void {
    const { controller, logger } = this.options;
    if (this._received) {
      logger.warn({ signal }, "Already shutting down, ignoring signal");
      return;
    }
    this._received = signal;
    logger.warn({ signal }, "Interrupted, shutting down");
    controller.abort(new CancelledError(signal));
  }
}
