import path from "node:path";
import { fallback } from "fallback-chain-js";
import { allow, block, exists, log, readJson, resolveWorkingDirectory } from "tdd-guard-hook";
import { findProjectRoot } from "./projectRoot.js";
import { toCheckResult, type CommandRunner, type RunCheck } from "./runCheck.js";
import type { Validator } from "./validator.js";

export const DEFAULT_COVERAGE_THRESHOLD = 80;
export const COVERAGE_TIMEOUT_MS = 120_000;

// Tried in order; the first one that exists in the project wins.
export const COVERAGE_COMMANDS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["pnpm", ["test:coverage"]],
  ["pnpm", ["run", "test:coverage"]],
  ["npm", ["run", "test:coverage"]],
  ["pnpm", ["vitest", "run", "--coverage"]],
  ["npx", ["vitest", "run", "--coverage"]],
];

// Summary lines printed by the common coverage reporters, most specific first.
const COVERAGE_PATTERNS = [
  /All files\s*\|\s*([\d.]+)\s*\|/i,
  /Statements\s*:\s*([\d.]+)%/i,
  /Lines\s*:\s*([\d.]+)%/i,
  /Coverage:\s*([\d.]+)%/i,
  /([\d.]+)%\s*coverage/i,
  /Total.*?([\d.]+)%/i,
];

const COMMAND_UNAVAILABLE = ["not found", "missing script"];

export function parseCoverage(output: string): number | null {
  for (const pattern of COVERAGE_PATTERNS) {
    const m = pattern.exec(output);
    if (!m?.[1]) continue;
    const value = Number(m[1]);
    if (Number.isFinite(value)) return value;
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function summaryLinesPct(doc: unknown): number | null {
  if (!isRecord(doc) || !isRecord(doc.total) || !isRecord(doc.total.lines)) return null;
  const pct = doc.total.lines.pct;
  return typeof pct === "number" ? pct : null;
}

function statementPct(doc: unknown): number | null {
  if (!isRecord(doc)) return null;
  let total = 0;
  let covered = 0;
  for (const file of Object.values(doc)) {
    if (!isRecord(file) || !isRecord(file.s)) continue;
    for (const hits of Object.values(file.s)) {
      total += 1;
      if (typeof hits === "number" && hits > 0) covered += 1;
    }
  }
  return total > 0 ? (covered * 100) / total : null;
}

/**
 * Read the percentage from the istanbul reports a coverage run leaves
 * behind: the summary's line coverage, else statement coverage computed
 * from the full report.
 */
export async function readCoverageReport(projectRoot: string): Promise<number | null> {
  const dir = path.join(projectRoot, "coverage");
  const summary = path.join(dir, "coverage-summary.json");
  const final = path.join(dir, "coverage-final.json");
  try {
    if (await exists(summary)) return summaryLinesPct(await readJson(summary));
    if (await exists(final)) return statementPct(await readJson(final));
  } catch (error) {
    log.warn(`unreadable coverage report in ${dir}`, error);
  }
  return null;
}

export async function resolveThreshold(env: NodeJS.ProcessEnv): Promise<number> {
  return fallback([
    () => {
      const raw = env.COVERAGE_THRESHOLD?.trim() ?? "";
      if (!/^-?\d+$/.test(raw)) throw new Error("no COVERAGE_THRESHOLD");
      return Number.parseInt(raw, 10);
    },
    () => DEFAULT_COVERAGE_THRESHOLD,
  ]);
}

/**
 * Run the first coverage command the project supports. Commands whose
 * tool or script is missing are skipped; when none is left the check
 * fails with a note and no percentage.
 */
export function coverageCheck(runner: CommandRunner): RunCheck {
  return async (projectRoot) => {
    for (const [command, args] of COVERAGE_COMMANDS) {
      const res = await runner(command, args, { cwd: projectRoot, timeoutMs: COVERAGE_TIMEOUT_MS });
      if (res.timedOut) return { passed: false, rawOutput: "Coverage check timed out" };
      if (res.failedToStart) continue;
      const lower = res.output.toLowerCase();
      if (res.code !== 0 && COMMAND_UNAVAILABLE.some((s) => lower.includes(s))) continue;
      return toCheckResult(res);
    }
    return { passed: false, rawOutput: "No coverage command found" };
  };
}

// An unreadable package.json does not stop the measurement.
async function hasTestScript(projectRoot: string): Promise<boolean> {
  const pkgPath = path.join(projectRoot, "package.json");
  if (!(await exists(pkgPath))) return true;
  let pkg: unknown;
  try {
    pkg = await readJson(pkgPath);
  } catch (error) {
    log.warn(`cannot read ${pkgPath}, measuring coverage anyway`, error);
    return true;
  }
  if (!isRecord(pkg) || !isRecord(pkg.scripts)) return false;
  return Object.keys(pkg.scripts).some((name) => name.includes("test"));
}

export async function measureCoverage(projectRoot: string, runner: CommandRunner): Promise<number | null> {
  const result = await coverageCheck(runner)(projectRoot);
  const parsed = parseCoverage(result.rawOutput);
  if (parsed !== null) return parsed;
  return result.passed ? readCoverageReport(projectRoot) : null;
}

export const coverageValidator: Validator = async (request, deps) => {
  const cwd = await resolveWorkingDirectory(request);
  const root = (await findProjectRoot(cwd, ["package.json"])) ?? cwd;
  if (!(await hasTestScript(root))) return allow();

  const threshold = await resolveThreshold(deps.env);
  const coverage = await measureCoverage(root, deps.runner);

  if (coverage === null) {
    return allow("Could not determine test coverage. Consider adding coverage reporting.");
  }
  if (coverage >= threshold) {
    return allow(`Coverage: ${coverage.toFixed(1)}% (threshold: ${threshold}%)`);
  }
  return block(
    `Coverage too low: ${coverage.toFixed(1)}% (required: ${threshold}%)\n\n` +
      "Add tests to reach the coverage threshold before finishing this task.",
  );
};
