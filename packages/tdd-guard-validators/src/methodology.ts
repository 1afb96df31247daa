import path from "node:path";
import fs from "node:fs/promises";
import { allow, exists } from "tdd-guard-hook";
import { fileStem, isMethodologyComponentFile, isStoryFile } from "./files.js";
import { resolveTargetFile, type Validator } from "./validator.js";

const PLAY_PATTERNS = [/play:\s*async/, /play:\s*\(/, /play\s*=\s*async/];

export function hasPlayFunction(storySource: string): boolean {
  return PLAY_PATTERNS.some((p) => p.test(storySource));
}

async function firstExisting(candidates: string[]): Promise<string | null> {
  for (const candidate of candidates) {
    if (await exists(candidate)) return candidate;
  }
  return null;
}

export function unitTestCandidates(componentPath: string): string[] {
  const dir = path.dirname(componentPath);
  const stem = fileStem(componentPath);
  return [
    path.join(dir, `${stem}.test.tsx`),
    path.join(dir, `${stem}.test.ts`),
    path.join(dir, `${stem}.spec.tsx`),
    path.join(dir, `${stem}.spec.ts`),
    path.join(dir, "__tests__", `${stem}.test.tsx`),
    path.join(dir, "__tests__", `${stem}.test.ts`),
  ];
}

function methodologyStoryCandidates(componentPath: string): string[] {
  const dir = path.dirname(componentPath);
  const stem = fileStem(componentPath);
  return [
    path.join(dir, `${stem}.stories.tsx`),
    path.join(dir, `${stem}.stories.ts`),
    path.join(dir, "__stories__", `${stem}.stories.tsx`),
  ];
}

/**
 * What a component is missing from the expected testing pattern: a unit
 * test beside it, and a story whose play functions drive interactions.
 */
export async function reviewComponent(componentPath: string): Promise<string[]> {
  const issues: string[] = [];
  const dir = path.dirname(componentPath);
  const stem = fileStem(componentPath);

  if (!(await firstExisting(unitTestCandidates(componentPath)))) {
    issues.push(`Unit test missing: ${path.join(dir, `${stem}.test.tsx`)}`);
  }

  const story = await firstExisting(methodologyStoryCandidates(componentPath));
  if (!story) {
    issues.push(`Story file missing: ${path.join(dir, `${stem}.stories.tsx`)}`);
  } else if (!hasPlayFunction(await fs.readFile(story, "utf8"))) {
    issues.push(`Story file lacks play functions for interaction tests: ${story}`);
  }

  return issues;
}

const PLAY_FUNCTION_ADVICE = [
  "Storybook interaction tests missing.",
  "",
  "Add play functions to the stories so they exercise real user interactions:",
  "",
  "export const ClickInteraction: Story = {",
  "  play: async ({ canvasElement }) => {",
  "    const canvas = within(canvasElement);",
  '    await userEvent.click(canvas.getByRole("button"));',
  "  },",
  "};",
].join("\n");

// Advisory only: every outcome is an allow.
export const methodologyValidator: Validator = async (request) => {
  const filePath = await resolveTargetFile(request);
  if (!filePath) return allow();

  if (isStoryFile(filePath)) {
    if (!(await exists(filePath))) return allow();
    return hasPlayFunction(await fs.readFile(filePath, "utf8")) ? allow() : allow(PLAY_FUNCTION_ADVICE);
  }

  if (!isMethodologyComponentFile(filePath)) return allow();
  const issues = await reviewComponent(filePath);
  if (issues.length === 0) return allow();
  return allow(
    [
      "Test methodology check:",
      "",
      ...issues.map((issue) => `- ${issue}`),
      "",
      "Expected pattern:",
      "1. Unit tests (.test.tsx) for rendering, props and variants",
      "2. Storybook play functions for user interactions and state changes",
    ].join("\n"),
  );
};
