import { access, constants as fsConstants } from "node:fs/promises";
import { delimiter, isAbsolute, join } from "node:path";
import type { BinaryLocator } from "./types.js";

export class PathBinaryLocator implements BinaryLocator {
  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  async locate(command: string): Promise<string | null> {
    const isWindows = this.platform === "win32";
    const mode = isWindows ? fsConstants.F_OK : fsConstants.X_OK;

    if (isAbsolute(command) || command.includes("/")) {
      return (await isAccessible(command, mode)) ? command : null;
    }

    const pathEntries = (this.env.PATH ?? "")
      .split(delimiter)
      .map((entry) => entry.trim())
      .filter(Boolean);

    const extensions = isWindows
      ? (this.env.PATHEXT || ".EXE;.CMD;.BAT;.COM")
          .split(";")
          .map((entry) => entry.trim())
          .filter(Boolean)
      : [""];

    for (const dir of pathEntries) {
      for (const ext of extensions) {
        const candidate = join(dir, `${command}${ext}`);
        if (await isAccessible(candidate, mode)) {
          return candidate;
        }
      }
    }

    return null;
  }
}

async function isAccessible(path: string, mode: number): Promise<boolean> {
  try {
    await access(path, mode);
    return true;
  } catch {
    return false;
  }
}
