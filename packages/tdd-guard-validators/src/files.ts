import path from "node:path";
import { minimatch } from "minimatch";
import { fileExtension, pathSegments } from "tdd-guard-hook";

const BUILD_OUTPUT_GLOBS = ["**/node_modules/**", "**/dist/**", "**/build/**", "**/.next/**", "**/out/**"];

export const TYPESCRIPT_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts"];
export const LINTABLE_EXTENSIONS = [".ts", ".tsx", ".js", ".jsx", ".mjs", ".cjs"];

// Directories whose files are UI components.
export const COMPONENT_DIRS = ["components", "atoms", "molecules", "organisms", "features", "ui"];

// Directories that hold React-adjacent code but no components.
const NON_COMPONENT_DIRS = ["hooks", "utils", "lib", "types", "api", "services", "providers"];

const STORY_EXCLUDED_MARKERS = [".test.", ".spec.", ".stories.", "index.", "types.", ".d."];
const METHODOLOGY_EXCLUDED_MARKERS = [".test.", ".spec.", ".stories.", "index.", "types."];

function toMatchable(filePath: string): string {
  return filePath.replace(/\\/g, "/").replace(/^[A-Za-z]:/, "").replace(/^\/+/, "");
}

export function isBuildOutput(filePath: string): boolean {
  const value = toMatchable(filePath);
  return BUILD_OUTPUT_GLOBS.some((pat) => minimatch(value, pat, { dot: true }));
}

function directorySegments(filePath: string): string[] {
  return pathSegments(filePath).slice(0, -1);
}

export function isTypeScriptFile(filePath: string): boolean {
  const name = path.basename(filePath).toLowerCase();
  if (name.endsWith(".d.ts")) return false;
  return TYPESCRIPT_EXTENSIONS.includes(fileExtension(name)) && !isBuildOutput(filePath);
}

export function isLintableFile(filePath: string): boolean {
  return LINTABLE_EXTENSIONS.includes(fileExtension(path.basename(filePath))) && !isBuildOutput(filePath);
}

export function isStoryFile(filePath: string): boolean {
  return path.basename(filePath).toLowerCase().includes(".stories.");
}

/** A .tsx/.jsx file that should come with a Storybook story. */
export function isStoryComponentFile(filePath: string): boolean {
  const name = path.basename(filePath);
  if (![".tsx", ".jsx"].includes(fileExtension(name))) return false;
  if (STORY_EXCLUDED_MARKERS.some((m) => name.toLowerCase().includes(m))) return false;

  const dirs = directorySegments(filePath);
  if (dirs.some((d) => NON_COMPONENT_DIRS.includes(d))) return false;
  if (dirs.some((d) => COMPONENT_DIRS.includes(d))) return true;

  // PascalCase file names are components by convention.
  return /^\p{Lu}/u.test(name);
}

/** A component file under a component directory, for the methodology review. */
export function isMethodologyComponentFile(filePath: string): boolean {
  const name = path.basename(filePath);
  if (![".tsx", ".jsx", ".vue"].includes(fileExtension(name))) return false;
  if (METHODOLOGY_EXCLUDED_MARKERS.some((m) => name.toLowerCase().includes(m))) return false;
  return directorySegments(filePath).some((d) => COMPONENT_DIRS.includes(d));
}

/** Name without its final extension: `Button.tsx` -> `Button`. */
export function fileStem(filePath: string): string {
  const name = path.basename(filePath);
  const ext = fileExtension(name);
  return ext ? name.slice(0, -ext.length) : name;
}
