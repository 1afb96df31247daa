import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";
import { TddGuardError } from "./errors.js";
import { isErrnoCode } from "./jsonFile.js";

export type LockOptions = {
  // Give up acquiring after this long.
  timeoutMs: number;
  // A lock file that names no owner process is abandoned once it is this old.
  staleMs: number;
  retryMs: number;
};

export function defaultLockOptions(): LockOptions {
  return { timeoutMs: 2000, staleMs: 10000, retryMs: 25 };
}

// Markers left by takers that died mid-takeover are cleared this many levels deep.
const MAX_TAKEOVER_DEPTH = 4;

export function lockPathFor(targetPath: string): string {
  return `${targetPath}.lock`;
}

/**
 * Exclusive marker for taking over one specific lock generation. Tokens
 * are unique, so two waiters can only collide on the marker when they
 * judged the very same lock file abandoned.
 */
export function takeoverMarkerFor(filePath: string, content: string): string {
  const digest = crypto.createHash("sha256").update(content).digest("hex").slice(0, 16);
  return `${filePath}.${digest}.break`;
}

function newToken(): string {
  return `${process.pid}:${crypto.randomBytes(8).toString("hex")}`;
}

function ownerPid(content: string): number | null {
  const m = /^(\d+)/.exec(content.trim());
  return m?.[1] ? Number(m[1]) : null;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: alive, owned by someone else.
    return !isErrnoCode(error, "ESRCH");
  }
}

async function readContent(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) return null;
    throw error;
  }
}

async function isAbandoned(filePath: string, content: string, staleMs: number): Promise<boolean> {
  const pid = ownerPid(content);
  if (pid !== null) return !isProcessAlive(pid);
  try {
    const stat = await fs.stat(filePath);
    return Date.now() - stat.mtimeMs >= staleMs;
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) return false;
    throw error;
  }
}

/** Create `filePath` already holding `content`; false when it exists. */
async function createExclusive(filePath: string, content: string): Promise<boolean> {
  const tmp = `${filePath}.${crypto.randomBytes(6).toString("hex")}.tmp`;
  try {
    await fs.writeFile(tmp, content, "utf8");
    await fs.link(tmp, filePath);
    return true;
  } catch (error) {
    if (isErrnoCode(error, "EEXIST")) return false;
    throw new TddGuardError("STORAGE_WRITE_FAILURE", `cannot create ${filePath}`, { cause: error });
  } finally {
    await fs.rm(tmp, { force: true });
  }
}

/**
 * Remove `filePath` when it still holds `token`. Only a taker that proved
 * the owner dead ever removes someone else's file, so a live owner's
 * content cannot change between the read and the removal.
 */
async function releaseIfOwned(filePath: string, token: string): Promise<void> {
  if ((await readContent(filePath)) === token) await fs.rm(filePath, { force: true });
}

/**
 * Remove `filePath` if its owner is gone. Returns true when it did.
 *
 * The removal happens under the takeover marker for the exact content
 * judged abandoned, after reading that content again. A waiter that
 * judged an older generation finds a different content and leaves it.
 */
async function clearIfAbandoned(filePath: string, staleMs: number, depth = 0): Promise<boolean> {
  const content = await readContent(filePath);
  if (content === null || !(await isAbandoned(filePath, content, staleMs))) return false;

  const marker = takeoverMarkerFor(filePath, content);
  const token = newToken();
  if (!(await createExclusive(marker, token))) {
    if (depth < MAX_TAKEOVER_DEPTH) await clearIfAbandoned(marker, staleMs, depth + 1);
    return false;
  }

  try {
    if ((await readContent(filePath)) !== content) return false;
    await fs.rm(filePath, { force: true });
    return true;
  } finally {
    await releaseIfOwned(marker, token);
  }
}

async function acquire(lockPath: string, options: LockOptions): Promise<string> {
  const token = newToken();
  const deadline = Date.now() + options.timeoutMs;
  for (;;) {
    if (await createExclusive(lockPath, token)) return token;
    if (await clearIfAbandoned(lockPath, options.staleMs)) continue;
    if (Date.now() >= deadline) {
      throw new TddGuardError("LOCK_TIMEOUT", `gave up on ${lockPath} after ${options.timeoutMs}ms`);
    }
    await delay(options.retryMs);
  }
}

/**
 * Run `fn` while holding an exclusive lock file next to `targetPath`.
 *
 * The lock file is created with its owner token in one step (hard link of
 * a written temp file), so it is never seen empty. It is only broken when
 * the process it names has exited, and released only by its owner.
 */
export async function withFileLock<T>(targetPath: string, options: LockOptions, fn: () => Promise<T>): Promise<T> {
  const lockPath = lockPathFor(targetPath);
  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  const token = await acquire(lockPath, options);
  try {
    return await fn();
  } finally {
    await releaseIfOwned(lockPath, token);
  }
}
