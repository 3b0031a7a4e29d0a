import { access, stat } from "node:fs/promises";
import { join } from "node:path";
import { formatCommand, type OrchestratorConfig } from "../config.js";
import { RUNTIME_STATE_FILE, RuntimeStateStore, type RuntimeStateReader } from "../dependencies/runtime-state.js";
import type { Logger } from "../logger.js";
import { needsDependencies, type SessionMode } from "../session/types.js";
import { PathBinaryLocator } from "./binary-locator.js";
import type { BinaryLocator, EnvironmentBlocker, PreflightResult } from "./types.js";

export interface PreflightCheckerDeps {
  readonly config: OrchestratorConfig;
  readonly logger: Logger;
  readonly locator?: BinaryLocator;
  readonly runtimeState?: RuntimeStateReader;
}

interface RequiredBinary {
  readonly command: string;
  readonly role: string;
}

/**
 * Read-only environment checks that run before anything is spawned. Every
 * problem found becomes one blocker; nothing is retried.
 */
export class PreflightChecker {
  private readonly config: OrchestratorConfig;
  private readonly logger: Logger;
  private readonly locator: BinaryLocator;
  private readonly runtimeState: RuntimeStateReader;

  constructor(deps: PreflightCheckerDeps) {
    this.config = deps.config;
    this.logger = deps.logger.child({ component: "preflight" });
    this.locator = deps.locator ?? new PathBinaryLocator();
    this.runtimeState =
      deps.runtimeState ?? new RuntimeStateStore(join(deps.config.stateDir, RUNTIME_STATE_FILE), this.logger);
  }

  async check(mode: SessionMode): Promise<PreflightResult> {
    const blockers: EnvironmentBlocker[] = [];
    const missing = new Set<string>();
    const seen = new Set<string>();

    for (const binary of this.requiredBinaries(mode)) {
      if (seen.has(binary.command)) {
        continue;
      }
      seen.add(binary.command);
      const location = await this.locator.locate(binary.command);
      if (location === null) {
        missing.add(binary.command);
        blockers.push({
          kind: "missing-binary",
          subject: binary.command,
          detail: `${binary.command} (${binary.role}) was not found on PATH`,
          hint: `Install ${binary.command} and make sure it is on PATH`,
        });
      } else {
        this.logger.debug({ command: binary.command, location }, "Found binary");
      }
    }

    const sidecarCommand = this.config.sidecar.launch.command;
    if (needsDependencies(mode) && !missing.has(sidecarCommand)) {
      const blocker = await this.checkSidecarRuntime();
      if (blocker) {
        blockers.push(blocker);
      }
    }

    blockers.push(...(await this.checkProjectLayout(mode)));

    if (blockers.length === 0) {
      this.logger.debug({ mode }, "Preflight passed");
      return { status: "ready" };
    }

    for (const blocker of blockers) {
      this.logger.error({ kind: blocker.kind, subject: blocker.subject, hint: blocker.hint }, blocker.detail);
    }
    return { status: "blocked", blockers };
  }

  private requiredBinaries(mode: SessionMode): RequiredBinary[] {
    const testRunner = { command: this.config.tests.runner.command, role: "test runner" };
    if (!needsDependencies(mode)) {
      return [testRunner];
    }
    return [
      { command: this.config.workflowEngine.launch.command, role: "workflow engine" },
      { command: this.config.sidecar.launch.command, role: "sidecar runtime" },
      { command: this.config.app.launch.command, role: "application runner" },
      testRunner,
    ];
  }

  private async checkSidecarRuntime(): Promise<EnvironmentBlocker | null> {
    const { configArtifact, launch, resetCommands } = this.config.sidecar;
    if (await pathExists(configArtifact)) {
      return null;
    }

    const state = await this.runtimeState.read();
    const detail = state.sidecarInitialized
      ? `${launch.command} was initialised${state.initializedAt ? ` at ${state.initializedAt}` : ""} but ${configArtifact} is gone; the recorded runtime state is stale`
      : `${launch.command} is installed but not initialised: ${configArtifact} is missing`;

    return {
      kind: "sidecar-degraded",
      subject: configArtifact,
      detail,
      hint: resetCommands.length > 0 ? `Run: ${resetCommands.map(formatCommand).join(" && ")}` : `Initialise ${launch.command}`,
    };
  }

  private async checkProjectLayout(mode: SessionMode): Promise<EnvironmentBlocker[]> {
    const { projectPath, app } = this.config;
    if (!(await isDirectory(projectPath))) {
      return [
        {
          kind: "missing-project-file",
          subject: projectPath,
          detail: `Project directory ${projectPath} does not exist`,
          hint: "Pass the application directory with --path",
        },
      ];
    }

    if (!needsDependencies(mode)) {
      return [];
    }

    const blockers: EnvironmentBlocker[] = [];
    for (const file of app.requiredFiles) {
      const fullPath = join(projectPath, file);
      if (!(await pathExists(fullPath))) {
        blockers.push({
          kind: "missing-project-file",
          subject: fullPath,
          detail: `${file} is missing from ${projectPath}`,
          hint: "Run appdev from the application root or pass it with --path",
        });
      }
    }
    return blockers;
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}
