import { readFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";
import { renderTemplate } from "./template.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface CommandSpec {
  readonly command: string;
  readonly args: readonly string[];
}

export interface ReadinessPolicy {
  readonly intervalMs: number;
  readonly timeoutMs: number;
}

export interface PortMap {
  readonly app: number;
  readonly workflowEngine: number;
  readonly workflowEngineUi: number;
  readonly sidecarHttp: number;
  readonly sidecarGrpc: number;
  readonly sidecarMetrics: number;
}

export interface DependencyConfig {
  readonly launch: CommandSpec;
  readonly env: Readonly<Record<string, string>>;
  readonly healthUrl: string;
  readonly readiness: ReadinessPolicy;
}

export interface SidecarConfig extends DependencyConfig {
  /** File whose presence shows the sidecar runtime was initialised, not merely installed. */
  readonly configArtifact: string;
  readonly resetCommands: readonly CommandSpec[];
}

export interface AppConfig {
  readonly launch: CommandSpec;
  readonly env: Readonly<Record<string, string>>;
  readonly healthUrl: string;
  readonly readiness: ReadinessPolicy;
  readonly requiredFiles: readonly string[];
  readonly debounceMs: number;
  readonly watchIgnore: readonly string[];
}

export interface TestsConfig {
  readonly runner: CommandSpec;
  readonly coverageErase: CommandSpec;
  readonly coverageRunner: CommandSpec;
  readonly coverageReport: CommandSpec;
  readonly unitDir: string;
  readonly e2eDir: string;
  readonly failFastFlag: string;
  readonly verboseFlag: string;
}

export interface ShutdownConfig {
  readonly gracePeriodMs: number;
  readonly killTimeoutMs: number;
}

export interface OrchestratorConfig {
  readonly projectPath: string;
  readonly stateDir: string;
  readonly logLevel: LogLevel;
  readonly outputTailLines: number;
  readonly ports: PortMap;
  readonly workflowEngine: DependencyConfig;
  readonly sidecar: SidecarConfig;
  readonly app: AppConfig;
  readonly tests: TestsConfig;
  readonly shutdown: ShutdownConfig;
}

export const CONFIG_FILE_NAME = "appdev.config.json";
export const STATE_DIR_NAME = ".appdev";

type Defaults = Omit<OrchestratorConfig, "projectPath" | "stateDir">;

const DEFAULTS: Defaults = {
  logLevel: "info",
  outputTailLines: 200,
  ports: {
    app: 8000,
    workflowEngine: 7233,
    workflowEngineUi: 8233,
    sidecarHttp: 3500,
    sidecarGrpc: 50001,
    sidecarMetrics: 3100,
  },
  workflowEngine: {
    launch: {
      command: "temporal",
      args: [
        "server", "start-dev",
        "--db-filename", "{{stateDir}}/workflow-engine.db",
        "--port", "{{ports.workflowEngine}}",
        "--ui-port", "{{ports.workflowEngineUi}}",
      ],
    },
    env: {},
    healthUrl: "http://127.0.0.1:{{ports.workflowEngineUi}}/",
    readiness: { intervalMs: 500, timeoutMs: 30_000 },
  },
  sidecar: {
    launch: {
      command: "dapr",
      args: [
        "run",
        "--app-id", "app",
        "--app-port", "{{ports.app}}",
        "--dapr-http-port", "{{ports.sidecarHttp}}",
        "--dapr-grpc-port", "{{ports.sidecarGrpc}}",
        "--metrics-port", "{{ports.sidecarMetrics}}",
        "--dapr-http-max-request-size", "1024",
        "--resources-path", "components",
      ],
    },
    env: {},
    healthUrl: "http://127.0.0.1:{{ports.sidecarHttp}}/v1.0/healthz/outbound",
    readiness: { intervalMs: 500, timeoutMs: 20_000 },
    configArtifact: "{{home}}/.dapr/config.yaml",
    resetCommands: [
      { command: "dapr", args: ["uninstall"] },
      { command: "dapr", args: ["init", "--slim"] },
    ],
  },
  app: {
    launch: { command: "uv", args: ["run", "main.py"] },
    env: {
      APP_HTTP_PORT: "{{ports.app}}",
      DAPR_HTTP_PORT: "{{ports.sidecarHttp}}",
      DAPR_GRPC_PORT: "{{ports.sidecarGrpc}}",
    },
    healthUrl: "http://127.0.0.1:{{ports.app}}/server/health",
    readiness: { intervalMs: 1_000, timeoutMs: 60_000 },
    requiredFiles: ["main.py"],
    debounceMs: 500,
    watchIgnore: [".appdev", ".git", ".venv", "node_modules", "__pycache__", ".pytest_cache", "*.pyc", "*.log"],
  },
  tests: {
    runner: { command: "uv", args: ["run", "pytest"] },
    coverageErase: { command: "uv", args: ["run", "coverage", "erase"] },
    coverageRunner: { command: "uv", args: ["run", "coverage", "run", "--append", "-m", "pytest"] },
    coverageReport: { command: "uv", args: ["run", "coverage", "report"] },
    unitDir: "tests/unit",
    e2eDir: "tests/e2e",
    failFastFlag: "-x",
    verboseFlag: "-v",
  },
  shutdown: {
    gracePeriodMs: 5_000,
    killTimeoutMs: 5_000,
  },
};

const portSchema = z.number().int().min(1).max(65_535);
const commandSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
});
const readinessSchema = z.object({
  intervalMs: z.number().int().positive(),
  timeoutMs: z.number().int().positive(),
});
const envSchema = z.record(z.string());

const configFileSchema = z.object({
  logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
  outputTailLines: z.number().int().positive().optional(),
  ports: z.object({
    app: portSchema,
    workflowEngine: portSchema,
    workflowEngineUi: portSchema,
    sidecarHttp: portSchema,
    sidecarGrpc: portSchema,
    sidecarMetrics: portSchema,
  }).partial().optional(),
  workflowEngine: z.object({
    launch: commandSchema,
    env: envSchema,
    healthUrl: z.string().min(1),
    readiness: readinessSchema,
  }).partial().optional(),
  sidecar: z.object({
    launch: commandSchema,
    env: envSchema,
    healthUrl: z.string().min(1),
    readiness: readinessSchema,
    configArtifact: z.string().min(1),
    resetCommands: z.array(commandSchema),
  }).partial().optional(),
  app: z.object({
    launch: commandSchema,
    env: envSchema,
    healthUrl: z.string().min(1),
    readiness: readinessSchema,
    requiredFiles: z.array(z.string()),
    debounceMs: z.number().int().nonnegative(),
    watchIgnore: z.array(z.string()),
  }).partial().optional(),
  tests: z.object({
    runner: commandSchema,
    coverageErase: commandSchema,
    coverageRunner: commandSchema,
    coverageReport: commandSchema,
    unitDir: z.string().min(1),
    e2eDir: z.string().min(1),
    failFastFlag: z.string().min(1),
    verboseFlag: z.string().min(1),
  }).partial().optional(),
  shutdown: z.object({
    gracePeriodMs: z.number().int().nonnegative(),
    killTimeoutMs: z.number().int().nonnegative(),
  }).partial().optional(),
});

type ConfigFile = z.infer<typeof configFileSchema>;

const PORT_ENV_VARS: ReadonlyArray<readonly [keyof PortMap, string]> = [
  ["app", "APPDEV_APP_PORT"],
  ["workflowEngine", "APPDEV_WORKFLOW_ENGINE_PORT"],
  ["workflowEngineUi", "APPDEV_WORKFLOW_ENGINE_UI_PORT"],
  ["sidecarHttp", "APPDEV_SIDECAR_HTTP_PORT"],
  ["sidecarGrpc", "APPDEV_SIDECAR_GRPC_PORT"],
  ["sidecarMetrics", "APPDEV_SIDECAR_METRICS_PORT"],
];

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Builds the configuration for one orchestrator invocation: defaults, then
 * the project's appdev.config.json, then environment overrides. Environment
 * values are read here once and never again.
 */
export function loadConfig(
  projectPath: string,
  env: NodeJS.ProcessEnv = process.env,
  configPath?: string
): OrchestratorConfig {
  const root = resolve(projectPath);
  const stateDir = join(root, STATE_DIR_NAME);
  const file = readConfigFile(configPath ?? join(root, CONFIG_FILE_NAME));

  const ports: PortMap = { ...DEFAULTS.ports, ...file.ports, ...readPortOverrides(env) };
  const params = { ports, projectPath: root, stateDir, home: homedir() };

  const workflowEngine = { ...DEFAULTS.workflowEngine, ...file.workflowEngine };
  const sidecar = { ...DEFAULTS.sidecar, ...file.sidecar };
  const app = { ...DEFAULTS.app, ...file.app };
  const tests = { ...DEFAULTS.tests, ...file.tests };

  const config: OrchestratorConfig = {
    projectPath: root,
    stateDir,
    logLevel: readLogLevel(env) ?? file.logLevel ?? DEFAULTS.logLevel,
    outputTailLines: file.outputTailLines ?? DEFAULTS.outputTailLines,
    ports,
    workflowEngine: {
      ...workflowEngine,
      launch: renderCommand(workflowEngine.launch, params, "workflowEngine.launch"),
      env: renderEnv(workflowEngine.env, params, "workflowEngine.env"),
      healthUrl: renderTemplate(workflowEngine.healthUrl, params, "workflowEngine.healthUrl"),
    },
    sidecar: {
      ...sidecar,
      launch: renderCommand(sidecar.launch, params, "sidecar.launch"),
      env: renderEnv(sidecar.env, params, "sidecar.env"),
      healthUrl: renderTemplate(sidecar.healthUrl, params, "sidecar.healthUrl"),
      configArtifact: renderTemplate(sidecar.configArtifact, params, "sidecar.configArtifact"),
      resetCommands: sidecar.resetCommands.map((command, i) => renderCommand(command, params, `sidecar.resetCommands.${i}`)),
    },
    app: {
      ...app,
      launch: renderCommand(app.launch, params, "app.launch"),
      env: renderEnv(app.env, params, "app.env"),
      healthUrl: renderTemplate(app.healthUrl, params, "app.healthUrl"),
    },
    tests: {
      ...tests,
      runner: renderCommand(tests.runner, params, "tests.runner"),
      coverageErase: renderCommand(tests.coverageErase, params, "tests.coverageErase"),
      coverageRunner: renderCommand(tests.coverageRunner, params, "tests.coverageRunner"),
      coverageReport: renderCommand(tests.coverageReport, params, "tests.coverageReport"),
    },
    shutdown: { ...DEFAULTS.shutdown, ...file.shutdown },
  };

  return deepFreeze(config);
}

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(" ");
}

function readConfigFile(filePath: string): ConfigFile {
  if (!existsSync(filePath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Failed to load config from ${filePath}: ${errorMessage(err)}`);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid config in ${filePath}: ${issues}`);
  }

  return parsed.data;
}

function readPortOverrides(env: NodeJS.ProcessEnv): Partial<PortMap> {
  const overrides: Partial<Record<keyof PortMap, number>> = {};

  for (const [key, variable] of PORT_ENV_VARS) {
    const value = env[variable];
    if (value === undefined || value.trim() === "") {
      continue;
    }

    const port = Number(value);
    if (!Number.isInteger(port) || port < 1 || port > 65_535) {
      throw new ConfigurationError(`${variable} must be a port number between 1 and 65535, got "${value}"`);
    }
    overrides[key] = port;
  }

  return overrides;
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel | undefined {
  const value = env.APPDEV_LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find((level) => level === value);
}

function renderCommand(spec: CommandSpec, params: Record<string, unknown>, field: string): CommandSpec {
  return {
    command: renderTemplate(spec.command, params, `${field}.command`),
    args: spec.args.map((arg) => renderTemplate(arg, params, `${field}.args`)),
  };
}

function renderEnv(
  env: Readonly<Record<string, string>>,
  params: Record<string, unknown>,
  field: string
): Record<string, string> {
  const rendered: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    rendered[key] = renderTemplate(value, params, `${field}.${key}`);
  }
  return rendered;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
