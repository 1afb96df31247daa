import { z } from "zod";
import { fallback } from "fallback-chain-js";
import { asMessage } from "./errors.js";
import { allow, enforce, type EnforcementContext, type EnforcementOutcome, type HookDecision } from "./enforcer.js";
import { log } from "./log.js";

/**
 * Agent hooks receive one JSON document on stdin and answer with one JSON
 * document on stdout:
 *
 *   in:  { "hook_event_name": "PreToolUse", "cwd": "...", "tool_input": { "file_path": "..." }, ... }
 *   out: { "decision": "allow" } | { "decision": "block", "reason": "..." }
 *
 * Fields we do not read are passed through untouched.
 */
export const hookRequestSchema = z
  .object({
    hook_event_name: z.string().optional(),
    session_id: z.string().optional(),
    cwd: z.string().optional(),
    tool_name: z.string().optional(),
    tool_input: z.object({}).passthrough().optional(),
  })
  .passthrough();

export type HookRequest = z.infer<typeof hookRequestSchema>;

// Write/Edit/MultiEdit send `file_path`; some tools send `path`.
const TARGET_PATH_KEYS = ["file_path", "path"] as const;

export async function readAllStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  return Buffer.concat(chunks).toString("utf8").trim();
}

/** null for empty input, invalid JSON or a document of the wrong shape. */
export function parseHookRequest(raw: string): HookRequest | null {
  if (!raw.trim()) return null;
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = hookRequestSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
}

export async function resolveTargetPath(request: HookRequest): Promise<string | null> {
  const input: Record<string, unknown> = request.tool_input ?? {};
  try {
    return await fallback(
      TARGET_PATH_KEYS.map((k) => () => {
        const v = input[k];
        if (typeof v !== "string" || v.trim().length === 0) throw new Error(`no tool_input.${k}`);
        return v;
      }),
    );
  } catch {
    return null;
  }
}

export async function resolveWorkingDirectory(request: HookRequest): Promise<string> {
  return fallback([
    () => {
      if (typeof request.cwd === "string" && request.cwd.trim().length > 0) return request.cwd;
      throw new Error("no cwd");
    },
    () => process.cwd(),
  ]);
}

export function formatDecision(decision: HookDecision): string {
  return JSON.stringify(decision.reason ? { decision: decision.decision, reason: decision.reason } : { decision: decision.decision });
}

export type HookHandlerDeps = {
  loadContext: (cwd: string) => Promise<EnforcementContext>;
  onOutcome?: (filePath: string, outcome: EnforcementOutcome, request: HookRequest) => Promise<void>;
};

/**
 * Turn one raw request into one decision. Never rejects: a missing or
 * malformed request, a request without a target path, and any failure
 * while building the context all come back as allow.
 */
export async function handleHookInput(raw: string, deps: HookHandlerDeps): Promise<HookDecision> {
  const request = parseHookRequest(raw);
  if (!request) {
    log.debug("malformed hook request, allowing");
    return allow();
  }

  const filePath = await resolveTargetPath(request);
  if (!filePath) return allow();

  let outcome: EnforcementOutcome;
  try {
    const cwd = await resolveWorkingDirectory(request);
    const ctx = await deps.loadContext(cwd);
    outcome = await enforce(filePath, ctx);
  } catch (error) {
    log.error(`cannot evaluate ${filePath}, allowing: ${asMessage(error)}`);
    return allow();
  }

  if (deps.onOutcome) {
    try {
      await deps.onOutcome(filePath, outcome, request);
    } catch (error) {
      log.warn(`outcome listener failed: ${asMessage(error)}`);
    }
  }

  return outcome.decision;
}
