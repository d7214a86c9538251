import { describe, it, expect, beforeAll } from "vitest";
import { rmSync, symlinkSync } from "node:fs";
import { execFileSync, spawnSync } from "node:child_process";
import { join, relative } from "node:path";
import { discoverFiles, isSourceFile } from "../src/file-discovery.js";
import type { Warning } from "../src/types.js";
import { makeTempDir, writeFiles } from "./helpers.js";

describe("discoverFiles", () => {
  let root: string;
  let outside: string;

  beforeAll(() => {
    root = makeTempDir("docsmith-discover-");
    outside = makeTempDir("docsmith-outside-");
    writeFiles(root, {
      "src/index.ts": "export {};\n",
      "src/app.py": "def main():\n    pass\n",
      "src/types.d.ts": "declare const x: number;\n",
      "src/app.test.ts": "export {};\n",
      "cmd/main.go": "package main\n",
      "README.md": "# readme\n",
      "node_modules/dep/index.js": "module.exports = 1;\n",
      "dist/index.js": "export {};\n",
    });
    writeFiles(outside, { "secret.ts": "export const s = 1;\n" });
    symlinkSync(outside, join(root, "linked"));
  });

  const rel = (files: string[]) => files.map((f) => relative(root, f));

  it("finds source files sorted and skips build and dependency directories", () => {
    const files = discoverFiles(root, []);
    expect(rel(files)).toEqual(["cmd/main.go", "src/app.py", "src/app.test.ts", "src/index.ts"]);
  });

  it("applies exclude patterns", () => {
    const files = discoverFiles(root, ["**/*.test.ts", "cmd/**"]);
    expect(rel(files)).toEqual(["src/app.py", "src/index.ts"]);
  });

  it("does not follow symlinks out of the directory", () => {
    const warnings: Warning[] = [];
    const files = discoverFiles(root, [], warnings);
    expect(rel(files)).not.toContain("linked/secret.ts");
    expect(warnings.some((w) => w.module === "file-discovery" && w.message.includes("points outside"))).toBe(true);
  });
});

const hasGit = spawnSync("git", ["--version"]).status === 0;

describe("discoverFiles in a git work tree", () => {
  it.runIf(hasGit)("leaves out files deleted from the working tree but still in the index", () => {
    const repo = makeTempDir("docsmith-git-");
    writeFiles(repo, { "src/kept.ts": "export {};\n", "src/removed.ts": "export {};\n" });
    execFileSync("git", ["init", "-q"], { cwd: repo });
    execFileSync("git", ["add", "."], { cwd: repo });
    rmSync(join(repo, "src/removed.ts"));

    const files = discoverFiles(repo, []);

    expect(files.map((f) => relative(repo, f))).toEqual(["src/kept.ts"]);
  });
});

describe("isSourceFile", () => {
  it("accepts known source extensions", () => {
    for (const name of ["a.ts", "a.tsx", "a.py", "a.java", "a.cs", "a.cpp", "a.go", "a.rs", "a.mjs"]) {
      expect(isSourceFile(name)).toBe(true);
    }
  });

  it("rejects declaration files and non-source files", () => {
    for (const name of ["a.d.ts", "a.md", "a.json", "Makefile"]) {
      expect(isSourceFile(name)).toBe(false);
    }
  });
});
