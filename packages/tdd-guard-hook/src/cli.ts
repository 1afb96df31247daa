#!/usr/bin/env node
import { appendAudit } from "./audit.js";
import { loadConfig } from "./config.js";
import { allow, type HookDecision } from "./enforcer.js";
import { asMessage } from "./errors.js";
import { log } from "./log.js";
import { formatDecision, handleHookInput, readAllStdin } from "./protocol.js";
import { FileSessionStore } from "./sessionStore.js";

/**
 * TDD Guard PreToolUse hook.
 *
 * Register it for Write / Edit / MultiEdit. It records test files as they
 * are written and blocks writes to implementation files whose test has not
 * been touched since the session started.
 *
 * stdout carries exactly one JSON decision; logs go to stderr.
 */

let responded = false;

function respond(decision: HookDecision): void {
  if (responded) return;
  responded = true;
  process.stdout.write(formatDecision(decision));
}

async function main(): Promise<void> {
  const raw = await readAllStdin();
  let auditLog: string | null = null;

  const decision = await handleHookInput(raw, {
    loadContext: async (cwd) => {
      const config = await loadConfig(cwd);
      auditLog = config.auditLog;
      return { store: new FileSessionStore(config.stateFile, config.lock), cwd, rules: config.rules };
    },
    onOutcome: async (filePath, outcome, request) => {
      await appendAudit(auditLog, {
        event: request.hook_event_name ?? "PreToolUse",
        session_id: request.session_id,
        file_path: filePath,
        role: outcome.role,
        decision: outcome.decision.decision,
        matched_test: outcome.matchedTest,
      });
    },
  });

  respond(decision);
}

main().catch((err: unknown) => {
  log.error(`hook crashed, allowing: ${asMessage(err)}`);
  respond(allow());
});
