import path from "node:path";
import { allow, exists } from "tdd-guard-hook";
import { fileStem, isStoryComponentFile } from "./files.js";
import { resolveTargetFile, type Validator } from "./validator.js";

export function storyCandidates(componentPath: string): string[] {
  const dir = path.dirname(componentPath);
  const stem = fileStem(componentPath);
  const ext = path.extname(componentPath);
  return [
    ...new Set([
      path.join(dir, `${stem}.stories${ext}`),
      path.join(dir, `${stem}.stories.tsx`),
      path.join(dir, `${stem}.stories.ts`),
      path.join(dir, "__stories__", `${stem}.stories${ext}`),
      path.join(dir, "stories", `${stem}.stories${ext}`),
    ]),
  ];
}

export async function findStoryFile(componentPath: string): Promise<string | null> {
  for (const candidate of storyCandidates(componentPath)) {
    if (await exists(candidate)) return candidate;
  }
  return null;
}

// Advisory only: a missing story never blocks the write.
export const storybookValidator: Validator = async (request) => {
  const filePath = await resolveTargetFile(request);
  if (!filePath || !isStoryComponentFile(filePath)) return allow();
  if (await findStoryFile(filePath)) return allow();

  const suggested = path.join(path.dirname(filePath), `${fileStem(filePath)}.stories.tsx`);
  return allow(
    `UI component without a Storybook story.\n\nConsider creating: ${suggested}\n\n` +
      "Stories document component variants and enable visual testing.",
  );
};
