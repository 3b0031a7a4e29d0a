import { describe, it, expect, afterEach, vi } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createIgnoreMatcher, watchSources, type SourceWatcher } from "./source-watcher.js";

describe("createIgnoreMatcher", () => {
  const ignored = createIgnoreMatcher("/project", [".git", "__pycache__", ".appdev", "*.pyc", "*.log"]);

  it("skips listed directories at any depth", () => {
    expect(ignored("/project/.git/HEAD")).toBe(true);
    expect(ignored("/project/app/__pycache__")).toBe(true);
    expect(ignored("/project/.appdev/logs/app.log")).toBe(true);
  });

  it("skips files by suffix", () => {
    expect(ignored("/project/app/models.pyc")).toBe(true);
    expect(ignored("/project/debug.log")).toBe(true);
  });

  it("keeps source files and the root", () => {
    expect(ignored("/project")).toBe(false);
    expect(ignored("/project/main.py")).toBe(false);
    expect(ignored("/project/app/git_helpers.py")).toBe(false);
    expect(ignored("/project/logs.py")).toBe(false);
  });
});

describe("watchSources", () => {
  let dir: string | undefined;
  let watcher: SourceWatcher | undefined;

  afterEach(async () => {
    await watcher?.close();
    if (dir) {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("reports changed source files and skips ignored ones", async () => {
    dir = await mkdtemp(join(tmpdir(), "appdev-watch-"));
    await mkdir(join(dir, "__pycache__"));
    await writeFile(join(dir, "main.py"), "print('v1')\n");
    const onChange = vi.fn();

    watcher = watchSources(dir, { ignore: ["__pycache__"], onChange, onError: vi.fn() });
    await watcher.ready;

    await writeFile(join(dir, "__pycache__", "main.cpython-312.pyc"), "bytes");
    await writeFile(join(dir, "main.py"), "print('v2')\n");

    await vi.waitFor(() => expect(onChange).toHaveBeenCalledWith(join(dir ?? "", "main.py")), { timeout: 3_000 });
    expect(onChange.mock.calls.every(([path]) => !String(path).includes("__pycache__"))).toBe(true);
  });
});
