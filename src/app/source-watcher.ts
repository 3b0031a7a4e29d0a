import { watch } from "chokidar";
import { basename, relative, sep } from "node:path";

export interface SourceWatcher {
  readonly ready: Promise<void>;
  close(): Promise<void>;
}

export interface WatchOptions {
  readonly ignore: readonly string[];
  readonly onChange: (path: string) => void;
  readonly onError: (error: Error) => void;
}

export type WatchSources = (root: string, options: WatchOptions) => SourceWatcher;

/**
 * Patterns are either a path segment to skip anywhere in the tree
 * (".git", "__pycache__") or a "*.ext" suffix.
 */
export function createIgnoreMatcher(root: string, patterns: readonly string[]): (path: string) => boolean {
  const suffixes = patterns.filter((pattern) => pattern.startsWith("*.")).map((pattern) => pattern.slice(1));
  const segments = new Set(patterns.filter((pattern) => !pattern.startsWith("*.")));

  return (path: string): boolean => {
    const rel = relative(root, path);
    if (rel === "" || rel.startsWith("..")) {
      return false;
    }
    if (rel.split(sep).some((segment) => segments.has(segment))) {
      return true;
    }
    const name = basename(rel);
    return suffixes.some((suffix) => name.endsWith(suffix));
  };
}

export const watchSources: WatchSources = (root, options) => {
  const watcher = watch(root, {
    ignoreInitial: true,
    ignored: createIgnoreMatcher(root, options.ignore),
  });

  const ready = new Promise<void>((resolve) => {
    watcher.once("ready", () => resolve());
  });

  watcher.on("all", (event, path) => {
    if (event === "addDir") {
      return;
    }
    options.onChange(path);
  });
  watcher.on("error", (error) => options.onError(error));

  return {
    ready,
    close: () => watcher.close(),
  };
};
