export type BlockerKind = "missing-binary" | "sidecar-degraded" | "missing-project-file";

export interface EnvironmentBlocker {
  readonly kind: BlockerKind;
  /** Binary name or path the blocker is about. */
  readonly subject: string;
  readonly detail: string;
  readonly hint: string;
}

export type PreflightResult =
  | { readonly status: "ready" }
  | { readonly status: "blocked"; readonly blockers: readonly EnvironmentBlocker[] };

export interface BinaryLocator {
  locate(command: string): Promise<string | null>;
}
