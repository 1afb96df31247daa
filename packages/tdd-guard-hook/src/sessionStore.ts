import path from "node:path";
import { Ajv } from "ajv";
import { TddGuardError, asMessage } from "./errors.js";
import { isErrnoCode, readJson, writeJsonAtomic } from "./jsonFile.js";
import { defaultLockOptions, withFileLock, type LockOptions } from "./lock.js";
import { log } from "./log.js";

export type SessionState = {
  // Normalized absolute paths of test files written since the last reset.
  testFilesModified: Set<string>;
  sessionId: string | null;
  startedAt: string | null;
};

// On-disk shape.
export type StoredSession = {
  test_files_modified: string[];
  session_id?: string | null;
  started_at?: string | null;
};

export interface SessionStore {
  /** Never rejects: an absent or unreadable store is an empty session. */
  load(): Promise<SessionState>;
  recordTest(filePath: string): Promise<void>;
  reset(): Promise<void>;
}

export function emptySessionState(): SessionState {
  return { testFilesModified: new Set(), sessionId: null, startedAt: null };
}

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

const storedSessionSchema: Record<string, unknown> = {
  type: "object",
  required: ["test_files_modified"],
  additionalProperties: true,
  properties: {
    test_files_modified: { type: "array", items: { type: "string" } },
    session_id: { type: ["string", "null"] },
    started_at: { type: ["string", "null"] },
  },
};

const validateStoredSession = ajv.compile<StoredSession>(storedSessionSchema);

export function toStoredSession(state: SessionState): StoredSession {
  return {
    test_files_modified: [...state.testFilesModified],
    session_id: state.sessionId,
    started_at: state.startedAt,
  };
}

export function fromStoredSession(doc: StoredSession): SessionState {
  return {
    testFilesModified: new Set(doc.test_files_modified.map((p) => path.resolve(p))),
    sessionId: doc.session_id ?? null,
    startedAt: doc.started_at ?? null,
  };
}

/**
 * Session state kept in one JSON document shared by every hook process.
 *
 * Updates are read-modify-write under an exclusive lock file and land via
 * an atomic rename, so two test writes recorded at the same moment both
 * survive.
 */
export class FileSessionStore implements SessionStore {
  constructor(
    readonly filePath: string,
    private readonly lockOptions: LockOptions = defaultLockOptions(),
  ) {}

  async load(): Promise<SessionState> {
    try {
      return await this.read();
    } catch (error) {
      log.warn(`treating session store as empty: ${asMessage(error)}`);
      return emptySessionState();
    }
  }

  async recordTest(filePath: string): Promise<void> {
    const normalized = path.resolve(filePath);
    await withFileLock(this.filePath, this.lockOptions, async () => {
      const state = await this.load();
      if (state.testFilesModified.has(normalized)) return;
      state.testFilesModified.add(normalized);
      await this.write(state);
      log.debug(`recorded test ${normalized}`);
    });
  }

  /**
   * Overwrite the document with an empty session. Runs under the same lock
   * as `recordTest`, so a record in flight either lands before the reset
   * or after it, never over it. Rejects with LOCK_TIMEOUT while a live
   * process holds the lock.
   */
  async reset(): Promise<void> {
    await withFileLock(this.filePath, this.lockOptions, () => this.write(emptySessionState()));
  }

  private async read(): Promise<SessionState> {
    let doc: unknown;
    try {
      doc = await readJson(this.filePath);
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) return emptySessionState();
      throw new TddGuardError("STORAGE_READ_FAILURE", `cannot read ${this.filePath}`, { cause: error });
    }

    if (!validateStoredSession(doc)) {
      throw new TddGuardError(
        "STORAGE_READ_FAILURE",
        `invalid session document ${this.filePath}: ${ajv.errorsText(validateStoredSession.errors)}`,
      );
    }
    return fromStoredSession(doc);
  }

  private async write(state: SessionState): Promise<void> {
    try {
      await writeJsonAtomic(this.filePath, toStoredSession(state));
    } catch (error) {
      throw new TddGuardError("STORAGE_WRITE_FAILURE", `cannot write ${this.filePath}`, { cause: error });
    }
  }
}

/** Process-local store, for tests and for embedding the engine. */
export class MemorySessionStore implements SessionStore {
  private state: SessionState;

  constructor(recorded: string[] = []) {
    this.state = emptySessionState();
    for (const p of recorded) this.state.testFilesModified.add(path.resolve(p));
  }

  async load(): Promise<SessionState> {
    return { ...this.state, testFilesModified: new Set(this.state.testFilesModified) };
  }

  async recordTest(filePath: string): Promise<void> {
    this.state.testFilesModified.add(path.resolve(filePath));
  }

  async reset(): Promise<void> {
    this.state = emptySessionState();
  }
}
