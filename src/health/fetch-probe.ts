import { linkedController } from "../cancellation.js";
import { errorMessage } from "../errors.js";
import type { HealthProbe, ProbeOutcome } from "./types.js";

/** Any 2xx or 3xx response counts as healthy. */
export class FetchHealthProbe implements HealthProbe {
  constructor(private readonly fetchImpl: typeof fetch = fetch) {}

  async probe(url: string, timeoutMs: number, signal?: AbortSignal): Promise<ProbeOutcome> {
    const { controller, dispose } = linkedController(signal);
    const timer = setTimeout(() => controller.abort("timeout"), timeoutMs);

    try {
      const response = await this.fetchImpl(url, { signal: controller.signal, redirect: "manual" });
      await response.text();
      return { ok: response.status >= 200 && response.status < 400, status: response.status };
    } catch (err) {
      if (controller.signal.aborted && !signal?.aborted) {
        return { ok: false, error: `no response within ${timeoutMs}ms` };
      }
      return { ok: false, error: describeFetchError(err) };
    } finally {
      clearTimeout(timer);
      dispose();
    }
  }
}

// fetch wraps socket errors as "fetch failed"; the cause names the real problem.
function describeFetchError(err: unknown): string {
  if (err instanceof Error && err.cause instanceof Error) {
    return err.cause.message;
  }
  return errorMessage(err);
}
