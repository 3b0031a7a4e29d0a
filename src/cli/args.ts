import { UsageError } from "../errors.js";
import type { TestMode, TestRunOptions } from "../testing/types.js";

export type HelpTopic = "run" | "test";

export type ParsedCommand =
  | { readonly kind: "help"; readonly topic?: HelpTopic }
  | { readonly kind: "version" }
  | { readonly kind: "run"; readonly projectPath: string; readonly hotReload: boolean }
  | { readonly kind: "test"; readonly projectPath: string; readonly options: TestRunOptions };

const TEST_MODES: readonly TestMode[] = ["unit", "e2e", "all"];

/** Splits `--flag=value` and walks the remaining arguments one at a time. */
class ArgCursor {
  private readonly args: string[];
  private index = 0;

  constructor(args: readonly string[]) {
    this.args = args.flatMap((arg) => {
      const eq = arg.indexOf("=");
      return arg.startsWith("--") && eq > 2 ? [arg.slice(0, eq), arg.slice(eq + 1)] : [arg];
    });
  }

  next(): string | undefined {
    return this.args[this.index++];
  }

  value(flag: string): string {
    const value = this.next();
    if (value === undefined || (value.startsWith("-") && value.length > 1)) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  }
}

function isTestMode(value: string): value is TestMode {
  return TEST_MODES.some((mode) => mode === value);
}

export function parseArgs(argv: readonly string[]): ParsedCommand {
  const [command, ...rest] = argv;

  if (command === undefined || command === "-h" || command === "--help" || command === "help") {
    const topic = rest[0];
    return topic === "run" || topic === "test" ? { kind: "help", topic } : { kind: "help" };
  }
  if (command === "-V" || command === "--version") {
    return { kind: "version" };
  }
  if (command === "run") {
    return parseRun(new ArgCursor(rest));
  }
  if (command === "test") {
    return parseTest(new ArgCursor(rest));
  }
  throw new UsageError(`Unknown command: ${command}`);
}

function parseRun(cursor: ArgCursor): ParsedCommand {
  let projectPath = ".";
  let hotReload = true;

  for (let arg = cursor.next(); arg !== undefined; arg = cursor.next()) {
    switch (arg) {
      case "-p":
      case "--path":
        projectPath = cursor.value(arg);
        break;
      case "--no-watch":
        hotReload = false;
        break;
      case "-h":
      case "--help":
        return { kind: "help", topic: "run" };
      default:
        throw unexpected(arg);
    }
  }
  return { kind: "run", projectPath, hotReload };
}

function parseTest(cursor: ArgCursor): ParsedCommand {
  let projectPath = ".";
  let mode: TestMode = "all";
  let coverage = false;
  let failFast = true;
  let verbose = false;

  for (let arg = cursor.next(); arg !== undefined; arg = cursor.next()) {
    switch (arg) {
      case "-p":
      case "--path":
        projectPath = cursor.value(arg);
        break;
      case "-t":
      case "--type": {
        const value = cursor.value(arg);
        if (!isTestMode(value)) {
          throw new UsageError(`${arg} must be one of ${TEST_MODES.join(", ")} (got "${value}")`);
        }
        mode = value;
        break;
      }
      case "--coverage":
        coverage = true;
        break;
      case "--fail-fast":
        failFast = true;
        break;
      case "--no-fail-fast":
        failFast = false;
        break;
      case "-v":
      case "--verbose":
        verbose = true;
        break;
      case "-h":
      case "--help":
        return { kind: "help", topic: "test" };
      default:
        throw unexpected(arg);
    }
  }
  return { kind: "test", projectPath, options: { mode, coverage, failFast, verbose } };
}

function unexpected(arg: string): UsageError {
  return arg.startsWith("-") ? new UsageError(`Unknown option: ${arg}`) : new UsageError(`Unexpected argument: ${arg}`);
}
