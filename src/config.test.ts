import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

describe("loadConfig", () => {
  let projectDir: string;

  beforeEach(async () => {
    projectDir = await mkdtemp(join(tmpdir(), "appdev-config-"));
  });

  afterEach(async () => {
    await rm(projectDir, { recursive: true, force: true });
  });

  it("returns defaults when no config file exists", () => {
    const config = loadConfig(projectDir, {});
    expect(config.projectPath).toBe(projectDir);
    expect(config.stateDir).toBe(join(projectDir, ".appdev"));
    expect(config.logLevel).toBe("info");
    expect(config.ports.app).toBe(8000);
    expect(config.app.healthUrl).toBe("http://127.0.0.1:8000/server/health");
    expect(config.sidecar.healthUrl).toBe("http://127.0.0.1:3500/v1.0/healthz/outbound");
    expect(config.sidecar.configArtifact).toBe(`${homedir()}/.dapr/config.yaml`);
    expect(config.workflowEngine.launch.args).toEqual([
      "server", "start-dev",
      "--db-filename", join(projectDir, ".appdev") + "/workflow-engine.db",
      "--port", "7233",
      "--ui-port", "8233",
    ]);
  });

  it("applies port overrides from the environment everywhere they are referenced", () => {
    const config = loadConfig(projectDir, { APPDEV_APP_PORT: "9001", APPDEV_SIDECAR_HTTP_PORT: "3600" });
    expect(config.ports.app).toBe(9001);
    expect(config.app.healthUrl).toBe("http://127.0.0.1:9001/server/health");
    expect(config.app.env.APP_HTTP_PORT).toBe("9001");
    expect(config.app.env.DAPR_HTTP_PORT).toBe("3600");
    expect(config.sidecar.launch.args).toContain("9001");
    expect(config.sidecar.healthUrl).toBe("http://127.0.0.1:3600/v1.0/healthz/outbound");
  });

  it("rejects invalid port overrides", () => {
    expect(() => loadConfig(projectDir, { APPDEV_APP_PORT: "http" })).toThrow(ConfigurationError);
    expect(() => loadConfig(projectDir, { APPDEV_APP_PORT: "70000" })).toThrow(/APPDEV_APP_PORT/);
  });

  it("merges sections from appdev.config.json", async () => {
    await writeFile(join(projectDir, "appdev.config.json"), JSON.stringify({
      logLevel: "debug",
      ports: { app: 8100 },
      app: { launch: { command: "python", args: ["-m", "app", "--port", "{{ports.app}}"] }, debounceMs: 50 },
    }));

    const config = loadConfig(projectDir, {});
    expect(config.logLevel).toBe("debug");
    expect(config.app.launch).toEqual({ command: "python", args: ["-m", "app", "--port", "8100"] });
    expect(config.app.debounceMs).toBe(50);
    expect(config.app.requiredFiles).toEqual(["main.py"]);
    expect(config.ports.workflowEngine).toBe(7233);
  });

  it("lets the environment win over the file", async () => {
    await writeFile(join(projectDir, "appdev.config.json"), JSON.stringify({ ports: { app: 8100 }, logLevel: "debug" }));
    const config = loadConfig(projectDir, { APPDEV_APP_PORT: "8200", APPDEV_LOG_LEVEL: "ERROR" });
    expect(config.ports.app).toBe(8200);
    expect(config.logLevel).toBe("error");
  });

  it("reports schema problems with their path", async () => {
    await writeFile(join(projectDir, "appdev.config.json"), JSON.stringify({ ports: { app: "eighty" } }));
    expect(() => loadConfig(projectDir, {})).toThrow(/ports\.app/);
  });

  it("reports malformed JSON", async () => {
    await writeFile(join(projectDir, "appdev.config.json"), "{ not json");
    expect(() => loadConfig(projectDir, {})).toThrow(/Failed to load config/);
  });

  it("rejects a misspelt placeholder instead of rendering it empty", async () => {
    await writeFile(join(projectDir, "appdev.config.json"), JSON.stringify({
      app: { launch: { command: "uv", args: ["run", "main.py", "--port", "{{ports.ap}}"] } },
    }));

    expect(() => loadConfig(projectDir, {})).toThrow(
      new ConfigurationError("Unknown placeholder {{ports.ap}} in app.launch.args")
    );
  });

  it("names the env variable holding an unknown placeholder", async () => {
    await writeFile(join(projectDir, "appdev.config.json"), JSON.stringify({
      sidecar: { env: { DAPR_HOME: "{{homeDir}}/.dapr" } },
    }));

    expect(() => loadConfig(projectDir, {})).toThrow("Unknown placeholder {{homeDir}} in sidecar.env.DAPR_HOME");
  });

  it("returns a frozen value", () => {
    const config = loadConfig(projectDir, {});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.app.launch.args)).toBe(true);
  });
});
