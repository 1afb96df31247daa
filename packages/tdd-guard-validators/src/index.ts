export {
  COVERAGE_COMMANDS,
  DEFAULT_COVERAGE_THRESHOLD,
  coverageCheck,
  coverageValidator,
  measureCoverage,
  parseCoverage,
  readCoverageReport,
  resolveThreshold,
} from "./coverage.js";
export {
  fileStem,
  isBuildOutput,
  isLintableFile,
  isMethodologyComponentFile,
  isStoryComponentFile,
  isStoryFile,
  isTypeScriptFile,
} from "./files.js";
export { extractLintErrors, lintCheck, lintValidator } from "./lint.js";
export { hasPlayFunction, methodologyValidator, reviewComponent, unitTestCandidates } from "./methodology.js";
export { findProjectRoot } from "./projectRoot.js";
export { VALIDATORS, isValidatorName, runValidator, type ValidatorName } from "./registry.js";
export { runCommand, toCheckResult, type CheckResult, type CommandResult, type CommandRunner, type RunCheck } from "./runCheck.js";
export { findStoryFile, storyCandidates, storybookValidator } from "./storybook.js";
export { extractTscErrors, tscCheck, tscValidator } from "./tsc.js";
export { defaultValidatorDeps, resolveTargetFile, type Validator, type ValidatorDeps } from "./validator.js";
