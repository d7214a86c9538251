// src/code-summarizer.ts — Code Context Summarizer
// Bounded, deterministic structure summary of a code inventory for prompts.

import { readFile, stat } from "node:fs/promises";
import { relative, sep } from "node:path";
import { outlineSource } from "./ast-parser.js";
import { MIN_SUMMARY_BUDGET, ValidationError } from "./types.js";

export interface SummaryOptions {
  /** Maximum output size in characters, truncation marker included. */
  budget: number;
  maxFileBytes: number;
}

export interface CodeSummary {
  text: string;
  includedFiles: string[];
  omittedFiles: string[];
  truncated: boolean;
}

export const TRUNCATION_PREFIX = "[truncated:";

/**
 * Summarize files in lexicographic path order. The output is the longest
 * prefix of file entries that fits the budget, plus a truncation marker
 * when entries were left out.
 */
export async function summarizeCode(
  files: readonly string[],
  rootDir: string,
  options: SummaryOptions,
): Promise<CodeSummary> {
  const { budget, maxFileBytes } = options;
  if (!Number.isInteger(budget) || budget < MIN_SUMMARY_BUDGET) {
    throw new ValidationError(
      `Summary budget must be an integer of at least ${MIN_SUMMARY_BUDGET} characters (got ${budget})`,
    );
  }

  const ordered = [...files].sort();
  const relPaths = ordered.map((f) => toPosix(relative(rootDir, f)));

  // Entries past the point where the bare prefix exceeds the budget can never fit
  const entries: string[] = [];
  let cumulative = 0;
  for (let i = 0; i < ordered.length && cumulative <= budget; i++) {
    const entry = await renderEntry(ordered[i], relPaths[i], maxFileBytes);
    entries.push(entry);
    cumulative += entry.length;
  }

  const total = ordered.length;
  const k = longestFittingPrefix(entries, total, budget);
  const truncated = k < total;
  const text = entries.slice(0, k).join("") + (truncated ? truncationMarker(total - k, total, budget) : "");

  return {
    text,
    includedFiles: relPaths.slice(0, k),
    omittedFiles: relPaths.slice(k),
    truncated,
  };
}

export function truncationMarker(omitted: number, total: number, budget: number): string {
  return `${TRUNCATION_PREFIX} ${omitted} of ${total} files omitted to fit a ${budget}-character budget]\n`;
}

function longestFittingPrefix(entries: string[], total: number, budget: number): number {
  const prefixLengths = [0];
  for (const e of entries) prefixLengths.push(prefixLengths[prefixLengths.length - 1] + e.length);

  for (let k = entries.length; k >= 0; k--) {
    const markerLength = k < total ? truncationMarker(total - k, total, budget).length : 0;
    if (prefixLengths[k] + markerLength <= budget) return k;
  }
  return 0;
}

async function renderEntry(file: string, relPath: string, maxFileBytes: number): Promise<string> {
  let size: number;
  let content: string;
  try {
    size = (await stat(file)).size;
    if (size > maxFileBytes) {
      return `### ${relPath} (skipped: file larger than ${maxFileBytes} bytes)\n`;
    }
    content = await readFile(file, "utf-8");
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return `### ${relPath} (unreadable: ${msg})\n`;
  }

  if (content.includes("\u0000")) {
    return `### ${relPath} (skipped: binary file)\n`;
  }

  const outline = outlineSource(relPath, content);
  const lines = [`### ${relPath} (${outline.lineCount} lines)`];
  for (const decl of outline.declarations) lines.push(`- ${decl}`);
  return lines.join("\n") + "\n";
}

function toPosix(p: string): string {
  return p.split(sep).join("/");
}
