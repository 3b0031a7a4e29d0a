export const GENERAL_USAGE = `Usage: appdev <command> [options]

Commands:
  run     Start the workflow engine, the sidecar and the app, with hot reload
  test    Run unit and/or e2e tests against a freshly started stack

Options:
  -h, --help       Show help for a command
  -V, --version    Print the version

Environment:
  APPDEV_LOG_LEVEL           debug, info, warn or error
  APPDEV_<SERVICE>_PORT      Override a port (APP, WORKFLOW_ENGINE, WORKFLOW_ENGINE_UI,
                             SIDECAR_HTTP, SIDECAR_GRPC, SIDECAR_METRICS)`;

export const RUN_USAGE = `Usage: appdev run [options]

Options:
  -p, --path <dir>   Application directory (default: current directory)
  --no-watch         Disable hot reload
  -h, --help         Show this help`;

export const TEST_USAGE = `Usage: appdev test [options]

Options:
  -p, --path <dir>          Application directory (default: current directory)
  -t, --type <mode>         unit, e2e or all (default: all)
  --coverage                Collect coverage across every phase
  --fail-fast               Stop a suite at its first failure (default)
  --no-fail-fast            Run every test in a suite
  -v, --verbose             Verbose test runner output
  -h, --help                Show this help`;

export function usageFor(topic?: "run" | "test"): string {
  if (topic === "run") {
    return RUN_USAGE;
  }
  if (topic === "test") {
    return TEST_USAGE;
  }
  return GENERAL_USAGE;
}
