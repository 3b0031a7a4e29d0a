import { readFile } from "node:fs/promises";
import { z } from "zod";
import { runCommand } from "../commands/run.js";
import { testCommand } from "../commands/test.js";
import { loadConfig, type OrchestratorConfig } from "../config.js";
import { ConfigurationError, EXIT_CODES, UsageError } from "../errors.js";
import { createLogger } from "../logger.js";
import { parseArgs, type ParsedCommand } from "./args.js";
import { usageFor } from "./usage.js";

export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly env: NodeJS.ProcessEnv;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  env: process.env,
};

const packageSchema = z.object({ version: z.string() });

export async function readVersion(): Promise<string> {
  const raw = await readFile(new URL("../../package.json", import.meta.url), "utf-8");
  return packageSchema.parse(JSON.parse(raw)).version;
}

/** Parses the command line and runs one command; resolves with the process exit code. */
export async function main(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  let parsed: ParsedCommand;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`${err.message}\n\n${usageFor(topicOf(argv))}`);
      return err.exitCode;
    }
    throw err;
  }

  switch (parsed.kind) {
    case "help":
      io.stdout(usageFor(parsed.topic));
      return EXIT_CODES.success;
    case "version":
      io.stdout(await readVersion());
      return EXIT_CODES.success;
    case "run":
    case "test":
      break;
  }

  let config: OrchestratorConfig;
  try {
    config = loadConfig(parsed.projectPath, io.env);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      io.stderr(`Error: ${err.message}`);
      return err.exitCode;
    }
    throw err;
  }

  const logger = createLogger(config);
  const ctx = { config, logger, print: io.stdout, printError: io.stderr };
  return parsed.kind === "run"
    ? runCommand(ctx, { hotReload: parsed.hotReload })
    : testCommand(ctx, parsed.options);
}

function topicOf(argv: readonly string[]): "run" | "test" | undefined {
  const command = argv[0];
  return command === "run" || command === "test" ? command : undefined;
}
