#!/usr/bin/env node
import { allow, asMessage, formatDecision, log, readAllStdin, type HookDecision } from "tdd-guard-hook";
import { runValidator } from "./registry.js";

// Usage: tdd-guard-validate <tsc|lint|coverage|storybook|methodology>
//    or: tdd-guard-validate --validator <name>

let responded = false;

function respond(decision: HookDecision): void {
  if (responded) return;
  responded = true;
  process.stdout.write(formatDecision(decision));
}

function getArgValue(flag: string): string | null {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return null;
  const next = process.argv[idx + 1];
  if (!next || next.startsWith("--")) return null;
  return next;
}

async function main(): Promise<void> {
  const name = getArgValue("--validator") ?? process.argv[2] ?? "";
  const raw = await readAllStdin();
  respond(await runValidator(name, raw));
}

main().catch((error: unknown) => {
  log.error(`validator crashed, allowing: ${asMessage(error)}`);
  respond(allow());
});
