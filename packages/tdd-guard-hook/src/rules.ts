export type FileRole = "TEST" | "IMPLEMENTATION" | "CONFIG" | "IGNORED";

export type ClassificationRules = {
  // Lower-cased extensions (with the dot) eligible for TEST / IMPLEMENTATION.
  sourceExtensions: string[];
  // A directory segment equal to one of these marks the file as a test.
  testDirNames: string[];
  // Substrings of the lower-cased file name that mark a test.
  testMarkers: string[];
  // Substrings of the lower-cased file name that mark configuration.
  configMarkers: string[];
};

export function defaultRules(): ClassificationRules {
  return {
    sourceExtensions: [".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs", ".vue", ".svelte"],

    testDirNames: ["__tests__", "tests"],

    testMarkers: [".test.", ".spec.", "_test.", "_spec.", "test_", "spec_"],

    configMarkers: [
      "config.",
      ".config.",
      "rc.",
      ".d.ts",
      "vite.config",
      "vitest.config",
      "jest.config",
      "tsconfig",
      "eslint",
      "prettier",
    ],
  };
}
