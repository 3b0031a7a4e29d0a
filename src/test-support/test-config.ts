import { join } from "node:path";
import { loadConfig, type OrchestratorConfig } from "../config.js";

const FAST_READINESS = { intervalMs: 10, timeoutMs: 200 };

/** Defaults for a temp project with timings short enough for unit tests. */
export function testConfig(projectDir: string): OrchestratorConfig {
  const base = loadConfig(projectDir, {});
  return {
    ...base,
    workflowEngine: { ...base.workflowEngine, readiness: FAST_READINESS },
    sidecar: {
      ...base.sidecar,
      readiness: FAST_READINESS,
      configArtifact: join(projectDir, "sidecar-config.yaml"),
    },
    app: { ...base.app, readiness: { intervalMs: 10, timeoutMs: 300 }, debounceMs: 30 },
    shutdown: { gracePeriodMs: 50, killTimeoutMs: 50 },
  };
}
