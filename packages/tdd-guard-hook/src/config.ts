import path from "node:path";
import os from "node:os";
import { Ajv } from "ajv";
import { asMessage } from "./errors.js";
import { exists, readJson } from "./jsonFile.js";
import { defaultLockOptions, type LockOptions } from "./lock.js";
import { log } from "./log.js";
import { defaultRules, type ClassificationRules } from "./rules.js";

export type TddGuardConfig = {
  // Session store document. One per user: every project shares it.
  stateFile: string;
  // JSONL decision log; null turns auditing off.
  auditLog: string | null;
  lock: LockOptions;
  rules: ClassificationRules;
};

type ConfigFile = {
  stateFile?: string;
  auditLog?: string | null;
  lock?: Partial<LockOptions>;
  rules?: Partial<ClassificationRules>;
};

const stringList = { type: "array", items: { type: "string" } };

const configFileSchema: Record<string, unknown> = {
  type: "object",
  additionalProperties: false,
  properties: {
    stateFile: { type: "string", minLength: 1 },
    auditLog: { type: ["string", "null"] },
    lock: {
      type: "object",
      additionalProperties: false,
      properties: {
        timeoutMs: { type: "number", minimum: 0 },
        staleMs: { type: "number", minimum: 0 },
        retryMs: { type: "number", minimum: 1 },
      },
    },
    rules: {
      type: "object",
      additionalProperties: false,
      properties: {
        sourceExtensions: stringList,
        testDirNames: stringList,
        testMarkers: stringList,
        configMarkers: stringList,
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateConfigFile = ajv.compile<ConfigFile>(configFileSchema);

export function defaultDataDir(): string {
  return path.join(os.homedir(), ".claude", "data");
}

export function defaultConfig(): TddGuardConfig {
  return {
    stateFile: path.join(defaultDataDir(), "tdd_session_state.json"),
    auditLog: path.join(defaultDataDir(), "tdd_guard_audit.log"),
    lock: defaultLockOptions(),
    rules: defaultRules(),
  };
}

function expandPath(p: string, projectRoot: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return path.resolve(projectRoot, p);
}

async function findConfigFile(projectRoot: string, env: NodeJS.ProcessEnv): Promise<string | null> {
  const candidatePaths = [
    env.TDD_GUARD_CONFIG,
    path.join(projectRoot, ".claude", "tdd-guard.json"),
    path.join(projectRoot, "tdd-guard.config.json"),
  ].filter((p): p is string => typeof p === "string" && p.length > 0);

  for (const p of candidatePaths) {
    if (await exists(p)) return p;
  }
  return null;
}

async function readConfigFile(filePath: string): Promise<ConfigFile> {
  let doc: unknown;
  try {
    doc = await readJson(filePath);
  } catch (error) {
    log.warn(`ignoring config ${filePath}: ${asMessage(error)}`);
    return {};
  }
  if (!validateConfigFile(doc)) {
    log.warn(`ignoring config ${filePath}: ${ajv.errorsText(validateConfigFile.errors)}`);
    return {};
  }
  return doc;
}

/**
 * Defaults, then the first config file found, then environment overrides.
 * Never rejects: a broken config file is reported on stderr and skipped.
 */
export async function loadConfig(projectRoot: string, env: NodeJS.ProcessEnv = process.env): Promise<TddGuardConfig> {
  const base = defaultConfig();
  const filePath = await findConfigFile(projectRoot, env);
  const fromFile = filePath ? await readConfigFile(filePath) : {};

  const config: TddGuardConfig = {
    stateFile: fromFile.stateFile ? expandPath(fromFile.stateFile, projectRoot) : base.stateFile,
    auditLog:
      fromFile.auditLog === null
        ? null
        : fromFile.auditLog
          ? expandPath(fromFile.auditLog, projectRoot)
          : base.auditLog,
    lock: { ...base.lock, ...fromFile.lock },
    rules: { ...base.rules, ...fromFile.rules },
  };

  if (env.TDD_GUARD_STATE_FILE) config.stateFile = expandPath(env.TDD_GUARD_STATE_FILE, projectRoot);
  if (env.TDD_GUARD_AUDIT_LOG) {
    config.auditLog = env.TDD_GUARD_AUDIT_LOG === "off" ? null : expandPath(env.TDD_GUARD_AUDIT_LOG, projectRoot);
  }

  return config;
}
