import path from "node:path";
import fs from "node:fs/promises";
import { asMessage } from "./errors.js";
import { log } from "./log.js";

/**
 * Append one JSON line to the decision log. Auditing is best-effort: a
 * failure here is reported on stderr and never reaches the hook response.
 */
export async function appendAudit(auditPath: string | null, record: Record<string, unknown>): Promise<void> {
  if (!auditPath) return;
  try {
    await fs.mkdir(path.dirname(auditPath), { recursive: true });
    await fs.appendFile(auditPath, JSON.stringify({ ts: new Date().toISOString(), ...record }) + "\n", "utf8");
  } catch (error) {
    log.warn(`audit log not written: ${asMessage(error)}`);
  }
}
