export type SessionMode = "run" | "test-unit" | "test-e2e" | "test-all";

export function needsDependencies(mode: SessionMode): boolean {
  return mode !== "test-unit";
}

export function runsTests(mode: SessionMode): boolean {
  return mode !== "run";
}
