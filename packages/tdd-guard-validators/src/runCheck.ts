import { spawn } from "node:child_process";

export type CommandResult = {
  // null when the process was killed or never started.
  code: number | null;
  output: string;
  timedOut: boolean;
  // Spawn failed, usually because the executable is not installed.
  failedToStart: boolean;
};

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: { cwd: string; timeoutMs: number },
) => Promise<CommandResult>;

/**
 * What a gating validator needs from an external tool. `passed` is false
 * only when the tool ran and reported problems; a tool that is missing,
 * cannot start or times out counts as passed.
 */
export type CheckResult = {
  passed: boolean;
  rawOutput: string;
};

export type RunCheck = (target: string) => Promise<CheckResult>;

/** Run a command with stdout and stderr merged, killing it at the deadline. */
export const runCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let timedOut = false;
    let settled = false;
    const finish = (result: CommandResult): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });
    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, options.timeoutMs);

    child.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.on("error", (error) => {
      finish({
        code: null,
        output: error.message,
        timedOut,
        failedToStart: true,
      });
    });
    child.on("close", (code) => {
      finish({
        code,
        output: Buffer.concat(chunks).toString("utf8"),
        timedOut,
        failedToStart: false,
      });
    });
  });

export function toCheckResult(result: CommandResult): CheckResult {
  if (result.timedOut || result.failedToStart) return { passed: true, rawOutput: "" };
  return { passed: result.code === 0, rawOutput: result.output.trim() };
}
