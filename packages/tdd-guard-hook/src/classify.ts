import { defaultRules, type ClassificationRules, type FileRole } from "./rules.js";

/**
 * Split a path on either separator, so Windows-style paths sent by the host
 * classify the same way as POSIX ones.
 */
export function pathSegments(filePath: string): string[] {
  return filePath.split(/[\\/]+/).filter((s) => s.length > 0);
}

export function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot > 0 ? fileName.slice(dot).toLowerCase() : "";
}

function containsAny(value: string, markers: string[]): boolean {
  return markers.some((marker) => value.includes(marker));
}

/**
 * Assign a role to a path. Pure: the path does not have to exist.
 *
 * Order matters: the extension gate runs first, then test detection, then
 * configuration markers. A `config.test.ts` is therefore a test.
 */
export function classifyFile(filePath: string, rules: ClassificationRules = defaultRules()): FileRole {
  const segments = pathSegments(filePath.trim());
  const fileName = segments[segments.length - 1] ?? "";
  if (!fileName) return "IGNORED";

  if (!rules.sourceExtensions.includes(fileExtension(fileName))) return "IGNORED";

  const dirs = segments.slice(0, -1);
  const name = fileName.toLowerCase();

  if (dirs.some((d) => rules.testDirNames.includes(d)) || containsAny(name, rules.testMarkers)) {
    return "TEST";
  }

  if (containsAny(name, rules.configMarkers)) return "CONFIG";

  return "IMPLEMENTATION";
}
