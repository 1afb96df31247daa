import { allow, asMessage, log, parseHookRequest, type HookDecision, type HookRequest } from "tdd-guard-hook";
import { coverageValidator } from "./coverage.js";
import { lintValidator } from "./lint.js";
import { methodologyValidator } from "./methodology.js";
import { storybookValidator } from "./storybook.js";
import { tscValidator } from "./tsc.js";
import { defaultValidatorDeps, type Validator, type ValidatorDeps } from "./validator.js";

type ValidatorEntry = {
  run: Validator;
  // Stop hooks may send nothing usable; such validators run on an empty request.
  needsRequest: boolean;
};

export const VALIDATORS = {
  tsc: { run: tscValidator, needsRequest: true },
  lint: { run: lintValidator, needsRequest: true },
  coverage: { run: coverageValidator, needsRequest: false },
  storybook: { run: storybookValidator, needsRequest: true },
  methodology: { run: methodologyValidator, needsRequest: true },
} satisfies Record<string, ValidatorEntry>;

export type ValidatorName = keyof typeof VALIDATORS;

export function isValidatorName(name: string): name is ValidatorName {
  return Object.prototype.hasOwnProperty.call(VALIDATORS, name);
}

/** Never rejects: unknown names, bad input and validator failures all allow. */
export async function runValidator(
  name: string,
  raw: string,
  deps: ValidatorDeps = defaultValidatorDeps(),
): Promise<HookDecision> {
  if (!isValidatorName(name)) {
    log.warn(`unknown validator "${name}", allowing`);
    return allow();
  }
  const entry: ValidatorEntry = VALIDATORS[name];
  const request: HookRequest | null = parseHookRequest(raw) ?? (entry.needsRequest ? null : {});
  if (!request) return allow();

  try {
    return await entry.run(request, deps);
  } catch (error) {
    log.error(`${name} validator failed, allowing: ${asMessage(error)}`);
    return allow();
  }
}
