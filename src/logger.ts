import pino from "pino";
import type { OrchestratorConfig } from "./config.js";

export type Logger = pino.Logger;

// Orchestrator logs go to stderr so the app and test output own stdout.
export function createLogger(config: Pick<OrchestratorConfig, "logLevel">): Logger {
  return pino({
    level: config.logLevel,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
        destination: 2,
      },
    },
  });
}
