import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import {
  fileStem,
  isBuildOutput,
  isLintableFile,
  isMethodologyComponentFile,
  isStoryComponentFile,
  isStoryFile,
  isTypeScriptFile,
} from "../src/files.js";
import { findProjectRoot } from "../src/projectRoot.js";

describe("isTypeScriptFile", () => {
  it.each([
    ["src/a.ts", true],
    ["src/App.tsx", true],
    ["src/esm.mts", true],
    ["src/cjs.cts", true],
    ["src/types.d.ts", false],
    ["src/a.js", false],
    ["node_modules/pkg/index.ts", false],
    ["/repo/dist/a.ts", false],
    ["/repo/.next/server/page.ts", false],
    ["C:\\repo\\build\\a.ts", false],
  ])("%s -> %s", (p, expected) => {
    expect(isTypeScriptFile(p)).toBe(expected);
  });
});

describe("isLintableFile", () => {
  it.each([
    ["src/a.ts", true],
    ["src/a.jsx", true],
    ["scripts/run.mjs", true],
    ["scripts/run.cjs", true],
    ["src/a.vue", false],
    ["README.md", false],
    ["/repo/out/a.js", false],
  ])("%s -> %s", (p, expected) => {
    expect(isLintableFile(p)).toBe(expected);
  });
});

describe("isBuildOutput", () => {
  it("matches output directories at any depth but not look-alike names", () => {
    expect(isBuildOutput("/repo/packages/web/dist/index.js")).toBe(true);
    expect(isBuildOutput("/repo/src/distance.ts")).toBe(false);
    expect(isBuildOutput("/repo/src/builder/a.ts")).toBe(false);
  });
});

describe("isStoryComponentFile", () => {
  it.each([
    ["src/components/Button.tsx", true],
    ["src/ui/card.jsx", true],
    ["src/Modal.tsx", true],
    ["src/helper.tsx", false],
    ["src/hooks/UseThing.tsx", false],
    ["src/ui/lib/Thing.tsx", false],
    ["src/components/Button.stories.tsx", false],
    ["src/components/Button.test.tsx", false],
    ["src/components/index.tsx", false],
    ["src/components/Button.ts", false],
  ])("%s -> %s", (p, expected) => {
    expect(isStoryComponentFile(p)).toBe(expected);
  });
});

describe("isMethodologyComponentFile", () => {
  it.each([
    ["src/components/Button.tsx", true],
    ["src/atoms/icon.vue", true],
    ["src/Modal.tsx", false],
    ["src/components/Button.spec.tsx", false],
    ["src/components/types.tsx", false],
  ])("%s -> %s", (p, expected) => {
    expect(isMethodologyComponentFile(p)).toBe(expected);
  });
});

describe("isStoryFile and fileStem", () => {
  it("recognizes story files case-insensitively", () => {
    expect(isStoryFile("src/Button.stories.tsx")).toBe(true);
    expect(isStoryFile("src/Button.Stories.tsx")).toBe(true);
    expect(isStoryFile("src/Button.tsx")).toBe(false);
  });

  it("drops only the last extension", () => {
    expect(fileStem("/a/Button.tsx")).toBe("Button");
    expect(fileStem("/a/Button.stories.tsx")).toBe("Button.stories");
    expect(fileStem("/a/Makefile")).toBe("Makefile");
  });
});

describe("findProjectRoot", () => {
  it("walks up to the nearest directory holding a marker", async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "tdd-guard-root-"));
    const nested = path.join(root, "packages", "web", "src");
    await fs.mkdir(nested, { recursive: true });
    await fs.writeFile(path.join(root, "package.json"), "{}", "utf8");
    await fs.writeFile(path.join(root, "packages", "web", "tsconfig.json"), "{}", "utf8");

    expect(await findProjectRoot(nested, ["tsconfig.json", "package.json"])).toBe(path.join(root, "packages", "web"));
    expect(await findProjectRoot(nested, ["package.json"])).toBe(root);
  });

  it("returns null when no ancestor holds a marker", async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "tdd-guard-root-"));
    expect(await findProjectRoot(root, ["tdd-guard-marker-that-does-not-exist.json"])).toBeNull();
  });
});
