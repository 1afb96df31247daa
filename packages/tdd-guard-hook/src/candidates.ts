import path from "node:path";

const SOURCE_SEGMENT = "src";
const MIRROR_SEGMENT = "tests";
const TESTS_SUBDIR = "__tests__";

/**
 * Plausible locations of the test for an implementation file, most
 * conventional first. Nothing here touches the filesystem.
 *
 *   src/utils/math.ts ->
 *     src/utils/math.test.ts, src/utils/math.spec.ts,
 *     src/utils/math_test.ts, src/utils/math_spec.ts,
 *     src/utils/__tests__/math.test.ts, src/utils/__tests__/math.spec.ts,
 *     src/utils/__tests__/math.ts,
 *     tests/utils/math.test.ts, tests/utils/math.spec.ts
 */
export function candidateTestPaths(implPath: string): string[] {
  const dir = path.dirname(implPath);
  const ext = path.extname(implPath);
  const stem = path.basename(implPath, ext);

  const out = [
    path.join(dir, `${stem}.test${ext}`),
    path.join(dir, `${stem}.spec${ext}`),
    path.join(dir, `${stem}_test${ext}`),
    path.join(dir, `${stem}_spec${ext}`),
    path.join(dir, TESTS_SUBDIR, `${stem}.test${ext}`),
    path.join(dir, TESTS_SUBDIR, `${stem}.spec${ext}`),
    path.join(dir, TESTS_SUBDIR, `${stem}${ext}`),
  ];

  const parts = dir.split(path.sep);
  const srcIdx = parts.indexOf(SOURCE_SEGMENT);
  if (srcIdx !== -1) {
    const mirrored = [...parts];
    mirrored[srcIdx] = MIRROR_SEGMENT;
    const mirrorDir = mirrored.join(path.sep);
    out.push(path.join(mirrorDir, `${stem}.test${ext}`), path.join(mirrorDir, `${stem}.spec${ext}`));
  }

  return out;
}

export function normalizePath(filePath: string, cwd: string): string {
  return path.resolve(cwd, filePath);
}

/**
 * Return the recorded test that satisfies one of the candidates, or null.
 *
 * An exact match on the normalized path wins. Failing that, any recorded
 * test whose file name equals a candidate's file name (ignoring case) is
 * accepted, wherever it lives in the tree.
 */
export function findMatchingTest(candidates: string[], recorded: ReadonlySet<string>, cwd: string): string | null {
  for (const candidate of candidates) {
    const normalized = normalizePath(candidate, cwd);
    if (recorded.has(normalized)) return normalized;
  }

  const wanted = new Set(candidates.map((c) => path.basename(c).toLowerCase()));
  for (const test of recorded) {
    if (wanted.has(path.basename(test).toLowerCase())) return test;
  }

  return null;
}
