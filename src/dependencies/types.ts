export type DependencyName = "workflow-engine" | "sidecar";

export type DependencySetState =
  | "not-started"
  | "starting"
  | "awaiting-ready"
  | "ready"
  | "degraded"
  | "recovering"
  | "failed";

export interface SidecarReset {
  /** Clears and reinitialises the sidecar runtime's local state. */
  reset(signal?: AbortSignal): Promise<void>;
}
