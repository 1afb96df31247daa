import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { spawnSync } from "node:child_process";
import { fileURLToPath } from "node:url";

const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
const repoRoot = path.resolve(packageRoot, "..", "..");

type Sandbox = { workspace: string; stateFile: string; auditLog: string };

async function makeSandbox(): Promise<Sandbox> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "tdd-guard-cli-"));
  const workspace = path.join(dir, "project");
  await fs.mkdir(workspace, { recursive: true });
  return {
    workspace,
    stateFile: path.join(dir, "data", "tdd_session_state.json"),
    auditLog: path.join(dir, "data", "audit.log"),
  };
}

function runEntry(entry: string, sandbox: Sandbox, input: string): string {
  const env: NodeJS.ProcessEnv = {
    ...process.env,
    TDD_GUARD_STATE_FILE: sandbox.stateFile,
    TDD_GUARD_AUDIT_LOG: sandbox.auditLog,
  };
  delete env.TDD_GUARD_CONFIG;

  const res = spawnSync(process.execPath, ["--import", "tsx", path.join(packageRoot, "src", entry)], {
    cwd: repoRoot,
    input,
    encoding: "utf8",
    env,
  });
  if (res.error) throw res.error;
  if (!res.stdout) {
    throw new Error(`No stdout from ${entry}. stderr: ${res.stderr}`);
  }
  return res.stdout;
}

function runHook(sandbox: Sandbox, filePath: string): { decision: string; reason?: string } {
  const input = JSON.stringify({
    session_id: "test-session",
    hook_event_name: "PreToolUse",
    tool_name: "Write",
    cwd: sandbox.workspace,
    tool_input: { file_path: filePath, content: "" },
  });
  return JSON.parse(runEntry("cli.ts", sandbox, input));
}

describe("tdd-guard hook CLI", () => {
  it("answers malformed input with a bare allow", async () => {
    const sandbox = await makeSandbox();
    expect(runEntry("cli.ts", sandbox, "this is not json")).toBe('{"decision":"allow"}');
  });

  it("blocks an implementation written before its test", async () => {
    const sandbox = await makeSandbox();
    const impl = path.join(sandbox.workspace, "src", "utils", "math.ts");
    const res = runHook(sandbox, impl);
    expect(res.decision).toBe("block");
    expect(res.reason).toContain(`Suggested test file: ${path.join(sandbox.workspace, "src", "utils", "math.test.ts")}`);
  });

  it("records the test and then allows the implementation", async () => {
    const sandbox = await makeSandbox();
    expect(runHook(sandbox, "src/utils/math.test.ts")).toEqual({ decision: "allow" });
    expect(runHook(sandbox, "src/utils/math.ts")).toEqual({ decision: "allow" });

    const doc = JSON.parse(await fs.readFile(sandbox.stateFile, "utf8"));
    expect(doc.test_files_modified).toEqual([path.join(sandbox.workspace, "src", "utils", "math.test.ts")]);
  });

  it("lets configuration through without creating the store", async () => {
    const sandbox = await makeSandbox();
    expect(runHook(sandbox, "tsconfig.json")).toEqual({ decision: "allow" });
    await expect(fs.access(sandbox.stateFile)).rejects.toThrow();
  });

  it("writes one audit line per decision", async () => {
    const sandbox = await makeSandbox();
    runHook(sandbox, "src/cart.ts");
    const lines = (await fs.readFile(sandbox.auditLog, "utf8")).trim().split("\n");
    expect(lines).toHaveLength(1);
    const record = JSON.parse(lines[0] ?? "{}");
    expect(record).toMatchObject({
      event: "PreToolUse",
      session_id: "test-session",
      file_path: "src/cart.ts",
      role: "IMPLEMENTATION",
      decision: "block",
      matched_test: null,
    });
  });
});

describe("tdd-guard session start CLI", () => {
  it("clears recorded tests so the implementation is blocked again", async () => {
    const sandbox = await makeSandbox();
    runHook(sandbox, "src/cart.test.ts");
    expect(runHook(sandbox, "src/cart.ts").decision).toBe("allow");

    const out = runEntry("sessionStart.ts", sandbox, JSON.stringify({ hook_event_name: "SessionStart", cwd: sandbox.workspace }));
    expect(JSON.parse(out)).toEqual({ status: "reset", message: "TDD session state cleared" });
    expect(JSON.parse(await fs.readFile(sandbox.stateFile, "utf8"))).toEqual({
      test_files_modified: [],
      session_id: null,
      started_at: null,
    });

    expect(runHook(sandbox, "src/cart.ts").decision).toBe("block");
  });

  it("reports an error and keeps the document while another live process holds the lock", async () => {
    const sandbox = await makeSandbox();
    runHook(sandbox, "src/cart.test.ts");
    const before = await fs.readFile(sandbox.stateFile, "utf8");
    await fs.mkdir(path.join(sandbox.workspace, ".claude"), { recursive: true });
    await fs.writeFile(path.join(sandbox.workspace, ".claude", "tdd-guard.json"), JSON.stringify({ lock: { timeoutMs: 100 } }), "utf8");
    await fs.writeFile(`${sandbox.stateFile}.lock`, `${process.pid}:held-by-test-runner`, "utf8");

    const out = runEntry("sessionStart.ts", sandbox, JSON.stringify({ hook_event_name: "SessionStart", cwd: sandbox.workspace }));
    expect(JSON.parse(out).status).toBe("error");
    expect(await fs.readFile(sandbox.stateFile, "utf8")).toBe(before);
  });

  it("creates the store on a first run without input", async () => {
    const sandbox = await makeSandbox();
    const out = runEntry("sessionStart.ts", sandbox, "");
    expect(JSON.parse(out).status).toBe("reset");
    expect(JSON.parse(await fs.readFile(sandbox.stateFile, "utf8")).test_files_modified).toEqual([]);
  });
});
