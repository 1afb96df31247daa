import path from "node:path";
import { allow, block } from "tdd-guard-hook";
import { isTypeScriptFile } from "./files.js";
import { findProjectRoot } from "./projectRoot.js";
import { toCheckResult, type CommandRunner, type RunCheck } from "./runCheck.js";
import { resolveTargetFile, type Validator } from "./validator.js";

export const TSC_TIMEOUT_MS = 60_000;

export function tscCheck(runner: CommandRunner): RunCheck {
  return async (projectRoot) =>
    toCheckResult(await runner("npx", ["tsc", "--noEmit"], { cwd: projectRoot, timeoutMs: TSC_TIMEOUT_MS }));
}

/**
 * Pick the diagnostics that matter for `filePath` out of a whole-project
 * tsc run: lines naming the file plus their indented continuation lines.
 * Falls back to the first few diagnostics of any file, then to the raw
 * output head.
 */
export function extractTscErrors(output: string, filePath: string): string {
  if (!output) return "Type errors found";

  const lines = output.split("\n");
  const fileName = path.basename(filePath);
  let relevant: string[] = [];
  let inRelevant = false;

  for (const line of lines) {
    if (line.includes(fileName) || line.includes(filePath)) {
      relevant.push(line);
      inRelevant = true;
    } else if (inRelevant && (line.startsWith(" ") || line.trim() === "")) {
      relevant.push(line);
    } else {
      inRelevant = false;
    }
  }

  if (relevant.length === 0) {
    relevant = lines.filter((l) => l.includes("error TS")).slice(0, 5);
  }
  if (relevant.length > 0) return relevant.slice(0, 10).join("\n");
  return output.slice(0, 500);
}

export const tscValidator: Validator = async (request, deps) => {
  const filePath = await resolveTargetFile(request);
  if (!filePath || !isTypeScriptFile(filePath)) return allow();

  const root = await findProjectRoot(path.dirname(filePath), ["tsconfig.json", "package.json"]);
  if (!root) return allow();

  const result = await tscCheck(deps.runner)(root);
  if (result.passed) return allow();
  return block(`TypeScript errors found. Fix them before continuing:\n\n${extractTscErrors(result.rawOutput, filePath)}`);
};
