import { mkdir, open, readFile, unlink } from "node:fs/promises";
import { dirname } from "node:path";

import { StoreLockedError, StoreUnavailableError } from "@/utils/errors";
import { logger } from "@/utils/logger";

export interface ProcessLock {
  readonly path: string;
  readonly pid: number;
  release(): Promise<void>;
}

export interface ProcessLockOptions {
  pid?: number;
  isProcessAlive?: (pid: number) => boolean;
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to another user.
    return errorCode(error) === "EPERM";
  }
}

async function readOwner(lockPath: string): Promise<number | null> {
  try {
    const content = (await readFile(lockPath, "utf8")).trim();
    return /^\d+$/.test(content) ? Number.parseInt(content, 10) : null;
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return null;
    }
    throw new StoreUnavailableError("load", error);
  }
}

async function removeIfOwned(lockPath: string, pid: number) {
  const owner = await readOwner(lockPath);
  if (owner !== pid) {
    logger.warn("Store lock owned by another process, leaving it in place", { lockPath, owner });
    return;
  }

  try {
    await unlink(lockPath);
  } catch (error) {
    if (errorCode(error) !== "ENOENT") {
      throw error;
    }
  }
}

/**
 * Takes the single-writer lock for the journal at `storePath` by creating
 * `<storePath>.lock` exclusively. A lock left by a dead process is replaced.
 */
export async function acquireProcessLock(storePath: string, options: ProcessLockOptions = {}): Promise<ProcessLock> {
  const pid = options.pid ?? process.pid;
  const alive = options.isProcessAlive ?? isProcessAlive;
  const lockPath = `${storePath}.lock`;

  try {
    await mkdir(dirname(lockPath), { recursive: true });
  } catch (error) {
    throw new StoreUnavailableError("load", error);
  }

  for (let attempt = 0; attempt < 2; attempt += 1) {
    try {
      const handle = await open(lockPath, "wx");
      try {
        await handle.writeFile(`${pid}\n`, "utf8");
        await handle.datasync();
      } finally {
        await handle.close();
      }

      logger.info("Acquired notification store lock", { lockPath, pid });
      return {
        path: lockPath,
        pid,
        release: async () => {
          await removeIfOwned(lockPath, pid);
          logger.info("Released notification store lock", { lockPath, pid });
        },
      };
    } catch (error) {
      if (errorCode(error) !== "EEXIST") {
        throw new StoreUnavailableError("load", error);
      }
    }

    const owner = await readOwner(lockPath);
    if (owner !== null && owner !== pid && alive(owner)) {
      throw new StoreLockedError(lockPath, owner);
    }

    logger.warn("Replacing stale notification store lock", { lockPath, previousOwner: owner });
    try {
      await unlink(lockPath);
    } catch (error) {
      if (errorCode(error) !== "ENOENT") {
        throw new StoreUnavailableError("load", error);
      }
    }
  }

  throw new StoreUnavailableError("load", new Error(`Could not create lock file ${lockPath}`));
}
