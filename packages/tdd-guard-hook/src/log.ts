/**
 * Hooks talk to the host over stdout, so every diagnostic goes to stderr.
 */

const PREFIX = "[tdd-guard]";

function debugEnabled(): boolean {
  const v = process.env.TDD_GUARD_DEBUG;
  return typeof v === "string" && v.length > 0 && v !== "0" && v !== "false";
}

export const log = {
  debug(message: string, ...details: unknown[]): void {
    if (debugEnabled()) console.error(PREFIX, message, ...details);
  },
  warn(message: string, ...details: unknown[]): void {
    console.error(PREFIX, `warning: ${message}`, ...details);
  },
  error(message: string, ...details: unknown[]): void {
    console.error(PREFIX, `error: ${message}`, ...details);
  },
};
