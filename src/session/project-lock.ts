import { constants } from "node:fs";
import { mkdir, open, readFile, stat, unlink, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { errorCode, SessionLockedError } from "../errors.js";
import type { Logger } from "../logger.js";

export const LOCK_FILE = "session.lock";

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errorCode(err) === "EPERM";
  }
}

export interface ProjectLockOptions {
  readonly lockPath: string;
  readonly logger: Logger;
  readonly pid?: number;
  readonly isAlive?: (pid: number) => boolean;
  /** How long a lock file without a readable pid counts as held. */
  readonly unownedGraceMs?: number;
  readonly now?: () => number;
}

interface LockOwner {
  readonly pid: number | null;
  readonly modifiedAt: number;
}

const UNOWNED_GRACE_MS = 5_000;
const MAX_ATTEMPTS = 3;

/**
 * One session per project: an O_EXCL lock file holding the owner's pid. A
 * lock whose owner is gone is reclaimed, and so is one that never got a pid
 * written once it is older than the grace period.
 */
export class ProjectLock {
  private handle: FileHandle | null = null;
  private readonly pid: number;
  private readonly isAlive: (pid: number) => boolean;
  private readonly unownedGraceMs: number;
  private readonly now: () => number;

  constructor(private readonly options: ProjectLockOptions) {
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isAlive ?? isProcessAlive;
    this.unownedGraceMs = options.unownedGraceMs ?? UNOWNED_GRACE_MS;
    this.now = options.now ?? Date.now;
  }

  get path(): string {
    return this.options.lockPath;
  }

  get held(): boolean {
    return this.handle !== null;
  }

  async acquire(): Promise<void> {
    if (this.handle) {
      return;
    }
    const { lockPath, logger } = this.options;
    await mkdir(dirname(lockPath), { recursive: true });

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        const handle = await open(lockPath, constants.O_CREAT | constants.O_EXCL | constants.O_WRONLY);
        await handle.writeFile(String(this.pid));
        this.handle = handle;
        logger.debug({ lockPath, pid: this.pid }, "Acquired session lock");
        return;
      } catch (err) {
        if (errorCode(err) !== "EEXIST") {
          throw err;
        }
      }

      const owner = await this.readOwner();
      if (!owner) {
        continue;
      }
      if (!this.isStale(owner)) {
        throw new SessionLockedError(lockPath, owner.pid);
      }

      logger.warn({ lockPath, ownerPid: owner.pid }, "Reclaiming stale session lock");
      await this.removeIfUnchanged(owner);
    }

    throw new SessionLockedError(lockPath, (await this.readOwner())?.pid ?? null);
  }

  async release(): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }
    this.handle = null;
    await handle.close();

    if ((await this.readOwner())?.pid === this.pid) {
      await unlink(this.options.lockPath);
      this.options.logger.debug({ lockPath: this.options.lockPath }, "Released session lock");
    }
  }

  private isStale(owner: LockOwner): boolean {
    if (owner.pid !== null) {
      return !this.isAlive(owner.pid);
    }
    return this.now() - owner.modifiedAt > this.unownedGraceMs;
  }

  /** Leaves the file alone if another session replaced it since `seen` was read. */
  private async removeIfUnchanged(seen: LockOwner): Promise<void> {
    const current = await this.readOwner();
    if (!current || current.pid !== seen.pid || current.modifiedAt !== seen.modifiedAt) {
      return;
    }
    try {
      await unlink(this.options.lockPath);
    } catch (err) {
      if (errorCode(err) !== "ENOENT") {
        throw err;
      }
    }
  }

  /** Null when there is no lock file. */
  private async readOwner(): Promise<LockOwner | null> {
    const { lockPath } = this.options;
    try {
      const [content, info] = await Promise.all([readFile(lockPath, "utf-8"), stat(lockPath)]);
      const pid = Number(content.trim());
      return { pid: Number.isInteger(pid) && pid > 0 ? pid : null, modifiedAt: info.mtimeMs };
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        return null;
      }
      throw err;
    }
  }
}
