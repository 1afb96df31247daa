import path from "node:path";
import { resolveTargetPath, resolveWorkingDirectory, type HookDecision, type HookRequest } from "tdd-guard-hook";
import { runCommand, type CommandRunner } from "./runCheck.js";

export type ValidatorDeps = {
  runner: CommandRunner;
  env: NodeJS.ProcessEnv;
};

export type Validator = (request: HookRequest, deps: ValidatorDeps) => Promise<HookDecision>;

export function defaultValidatorDeps(): ValidatorDeps {
  return { runner: runCommand, env: process.env };
}

/** Absolute path of the file the tool call targets, or null when it names none. */
export async function resolveTargetFile(request: HookRequest): Promise<string | null> {
  const filePath = await resolveTargetPath(request);
  if (!filePath) return null;
  return path.resolve(await resolveWorkingDirectory(request), filePath);
}
