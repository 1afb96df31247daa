import path from "node:path";
import { allow, block } from "tdd-guard-hook";
import { isLintableFile } from "./files.js";
import { findProjectRoot } from "./projectRoot.js";
import { toCheckResult, type CommandRunner, type RunCheck } from "./runCheck.js";
import { resolveTargetFile, type Validator } from "./validator.js";

export const LINT_TIMEOUT_MS = 30_000;

// pnpm itself is present but the project has no oxlint.
const LINTER_MISSING = /command "?oxlint"? not found/i;

export function lintCheck(runner: CommandRunner, projectRoot: string): RunCheck {
  return async (filePath) => {
    const result = toCheckResult(
      await runner("pnpm", ["exec", "oxlint", filePath], { cwd: projectRoot, timeoutMs: LINT_TIMEOUT_MS }),
    );
    if (!result.passed && LINTER_MISSING.test(result.rawOutput)) return { passed: true, rawOutput: "" };
    return result;
  };
}

export function extractLintErrors(output: string): string {
  if (!output) return "Lint errors found";
  const lines = output
    .split("\n")
    .filter((l) => l.trim().length > 0)
    .filter((l) => {
      const lower = l.toLowerCase();
      const trimmed = l.trim();
      return lower.includes("error") || lower.includes("warning") || trimmed.startsWith("×") || trimmed.startsWith("⚠");
    });
  if (lines.length > 0) return lines.slice(0, 10).join("\n");
  return output.slice(0, 500);
}

export const lintValidator: Validator = async (request, deps) => {
  const filePath = await resolveTargetFile(request);
  if (!filePath || !isLintableFile(filePath)) return allow();

  const root = await findProjectRoot(path.dirname(filePath), ["package.json"]);
  if (!root) return allow();

  const result = await lintCheck(deps.runner, root)(filePath);
  if (result.passed) return allow();
  return block(`Lint errors found. Fix them before continuing:\n\n${extractLintErrors(result.rawOutput)}`);
};
