import { candidateTestPaths, findMatchingTest, normalizePath } from "./candidates.js";
import { classifyFile } from "./classify.js";
import { asMessage } from "./errors.js";
import { log } from "./log.js";
import { defaultRules, type ClassificationRules, type FileRole } from "./rules.js";
import type { SessionStore } from "./sessionStore.js";

export type HookDecision = {
  decision: "allow" | "block";
  reason?: string;
};

export type EnforcementContext = {
  store: SessionStore;
  // Base for relative paths in the request.
  cwd: string;
  rules?: ClassificationRules;
};

export type EnforcementOutcome = {
  // null when evaluation failed before the path was classified.
  role: FileRole | null;
  decision: HookDecision;
  matchedTest: string | null;
};

export function allow(reason?: string): HookDecision {
  return reason ? { decision: "allow", reason } : { decision: "allow" };
}

export function block(reason: string): HookDecision {
  return { decision: "block", reason };
}

export function testFirstReason(suggestedTest: string): string {
  return [
    "TDD violation: write the test first.",
    "",
    "No test for this file has been written in this session.",
    "",
    `Suggested test file: ${suggestedTest}`,
    "",
    "Create or update that test, then write the implementation.",
  ].join("\n");
}

/**
 * Decide one write intent.
 *
 * Tests are always allowed and recorded. Configuration and non-source
 * files pass untouched. An implementation file passes only when a test
 * matching one of its candidate locations was recorded this session.
 */
export async function evaluateWrite(filePath: string, ctx: EnforcementContext): Promise<EnforcementOutcome> {
  const role = classifyFile(filePath, ctx.rules ?? defaultRules());

  if (role === "TEST") {
    const normalized = normalizePath(filePath, ctx.cwd);
    try {
      await ctx.store.recordTest(normalized);
    } catch (error) {
      // The test write itself is still allowed.
      log.warn(`test not recorded: ${asMessage(error)}`);
    }
    return { role, decision: allow(), matchedTest: normalized };
  }

  if (role !== "IMPLEMENTATION") {
    return { role, decision: allow(), matchedTest: null };
  }

  const candidates = candidateTestPaths(filePath);
  const state = await ctx.store.load();
  const matched = findMatchingTest(candidates, state.testFilesModified, ctx.cwd);
  if (matched) {
    log.debug(`${filePath} satisfied by ${matched}`);
    return { role, decision: allow(), matchedTest: matched };
  }

  return { role, decision: block(testFirstReason(candidates[0] ?? filePath)), matchedTest: null };
}

/**
 * Fail-open boundary around `evaluateWrite`: whatever goes wrong inside,
 * the caller gets an allow. Only a confident "implementation without a
 * test" produces a block.
 */
export async function enforce(filePath: string, ctx: EnforcementContext): Promise<EnforcementOutcome> {
  try {
    return await evaluateWrite(filePath, ctx);
  } catch (error) {
    log.error(`enforcement failed for ${filePath}, allowing: ${asMessage(error)}`);
    return { role: null, decision: allow(), matchedTest: null };
  }
}
