import { appendAudit } from "./audit.js";
import { loadConfig } from "./config.js";
import { asMessage } from "./errors.js";
import { parseHookRequest, resolveWorkingDirectory } from "./protocol.js";
import { FileSessionStore } from "./sessionStore.js";

export type ResetStatus = { status: "reset" | "error"; message: string };

/**
 * Forget every test recorded so far, so each session has to write its own
 * tests before its implementation. Idempotent.
 *
 * The request is optional; it only tells us where the project (and so its
 * config file) is.
 */
export async function resetSession(raw: string, env: NodeJS.ProcessEnv = process.env): Promise<ResetStatus> {
  const request = parseHookRequest(raw);
  const cwd = request ? await resolveWorkingDirectory(request) : process.cwd();
  const config = await loadConfig(cwd, env);

  try {
    await new FileSessionStore(config.stateFile, config.lock).reset();
  } catch (error) {
    return { status: "error", message: `TDD session state not cleared: ${asMessage(error)}` };
  }

  await appendAudit(config.auditLog, { event: "SessionStart", session_id: request?.session_id ?? null });
  return { status: "reset", message: "TDD session state cleared" };
}
