// src/file-discovery.ts — Code inventory for a directory
// Honors .gitignore via git ls-files when available, user excludes via picomatch,
// and never follows symlinks out of the scanned directory.

import { existsSync, readdirSync, statSync, realpathSync } from "node:fs";
import { resolve, relative, join, sep } from "node:path";
import { execSync } from "node:child_process";
import picomatch from "picomatch";
import {
  type Warning,
  DEFAULT_EXCLUDE_DIRS,
  SOURCE_EXTENSIONS,
  DTS_EXTENSION,
} from "./types.js";

const EXCLUDED_DIRS: readonly string[] = DEFAULT_EXCLUDE_DIRS;

/**
 * Discover all source files under a directory, sorted lexicographically.
 * Uses git ls-files when available, falls back to a filesystem walk.
 */
export function discoverFiles(
  directory: string,
  excludePatterns: string[],
  warnings: Warning[] = [],
): string[] {
  const absDir = resolve(directory);

  const gitFiles = tryGitLsFiles(absDir);
  if (gitFiles !== null) {
    return filterAndSort(gitFiles, absDir, excludePatterns);
  }

  const visited = new Set<number>(); // inodes, for symlink cycles
  const files: string[] = [];
  walkDirectory(absDir, absDir, files, visited, warnings);
  return filterAndSort(files, absDir, excludePatterns);
}

export function isSourceFile(name: string): boolean {
  return SOURCE_EXTENSIONS.test(name) && !DTS_EXTENSION.test(name);
}

/**
 * Returns null if git is not available or the directory is not in a work tree.
 */
function tryGitLsFiles(directory: string): string[] | null {
  try {
    const output = execSync(
      "git ls-files --cached --others --exclude-standard",
      {
        cwd: directory,
        encoding: "utf-8",
        timeout: 5000,
        stdio: ["pipe", "pipe", "pipe"],
      },
    );

    const files: string[] = [];
    for (const line of output.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed || !isSourceFile(trimmed)) continue;
      const parts = trimmed.split("/");
      if (parts.some((p) => EXCLUDED_DIRS.includes(p))) continue;
      const abs = resolve(directory, trimmed);
      // --cached still lists files deleted from the working tree
      if (!existsSync(abs)) continue;
      files.push(abs);
    }
    return files;
  } catch {
    // not a git work tree (or no git binary); the walk covers it
    return null;
  }
}

function walkDirectory(
  dir: string,
  rootDir: string,
  results: string[],
  visitedInodes: Set<number>,
  warnings: Warning[],
): void {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot read directory: ${msg}`,
      file: dir,
    });
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (EXCLUDED_DIRS.includes(entry.name)) continue;
      walkDirectory(fullPath, rootDir, results, visitedInodes, warnings);
    } else if (entry.isSymbolicLink()) {
      try {
        const realPath = realpathSync(fullPath);
        const stat = statSync(realPath);

        if (realPath !== rootDir && !realPath.startsWith(rootDir + sep)) {
          warnings.push({
            level: "info",
            module: "file-discovery",
            message: `Symlink ${relative(rootDir, fullPath)} points outside the code directory — skipped`,
            file: fullPath,
          });
          continue;
        }

        if (stat.isDirectory()) {
          if (visitedInodes.has(stat.ino)) {
            warnings.push({
              level: "info",
              module: "file-discovery",
              message: `Symlink cycle detected at ${relative(rootDir, fullPath)} — skipped`,
              file: fullPath,
            });
            continue;
          }
          visitedInodes.add(stat.ino);
          if (!EXCLUDED_DIRS.includes(entry.name)) {
            walkDirectory(fullPath, rootDir, results, visitedInodes, warnings);
          }
        } else if (stat.isFile() && isSourceFile(entry.name)) {
          results.push(fullPath);
        }
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        warnings.push({
          level: "warn",
          module: "file-discovery",
          message: `Cannot resolve symlink: ${msg}`,
          file: fullPath,
        });
      }
    } else if (entry.isFile() && isSourceFile(entry.name)) {
      results.push(fullPath);
    }
  }
}

function filterAndSort(
  files: string[],
  rootDir: string,
  excludePatterns: string[],
): string[] {
  if (excludePatterns.length === 0) {
    return files.sort();
  }

  const isExcluded = picomatch(excludePatterns, { dot: true });
  return files
    .filter((f) => !isExcluded(relative(rootDir, f)))
    .sort();
}
