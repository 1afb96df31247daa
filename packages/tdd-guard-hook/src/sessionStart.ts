#!/usr/bin/env node
import { resetSession } from "./lifecycle.js";
import { asMessage } from "./errors.js";
import { log } from "./log.js";
import { readAllStdin } from "./protocol.js";

/**
 * TDD Guard SessionStart hook. Prints one JSON status line:
 *   {"status":"reset","message":"TDD session state cleared"}
 */

async function main(): Promise<void> {
  const raw = await readAllStdin();
  const result = await resetSession(raw);
  if (result.status === "error") log.error(result.message);
  process.stdout.write(JSON.stringify(result));
}

main().catch((err: unknown) => {
  log.error(`session start crashed: ${asMessage(err)}`);
  process.stdout.write(JSON.stringify({ status: "error", message: asMessage(err) }));
});
