// src/output-writer.ts — Persist a finalized package as timestamped markdown files

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { PACKAGE_SUMMARY_TITLE } from "./finalizer.js";
import {
  DOCUMENT_TITLES,
  remediationHint,
  type DocumentType,
  type PackageResult,
  type PersistedPaths,
} from "./types.js";

/**
 * Local-time run stamp, `YYYYMMDD_HHMMSS`.
 */
export function formatRunTimestamp(d: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return (
    `${d.getFullYear()}${p(d.getMonth() + 1)}${p(d.getDate())}_` +
    `${p(d.getHours())}${p(d.getMinutes())}${p(d.getSeconds())}`
  );
}

export function documentFileName(type: DocumentType, stamp: string): string {
  return `${type}_${stamp}.md`;
}

export function summaryFileName(stamp: string): string {
  return `PACKAGE_SUMMARY_${stamp}.md`;
}

export function runLogFileName(stamp: string): string {
  return `run_log_${stamp}.txt`;
}

export function runLogPath(outputDir: string, stamp: string): string {
  return resolve(outputDir, runLogFileName(stamp));
}

/**
 * Write every document, plus the summary file when the package has a summary.
 * The run log is written by RunLog itself.
 */
export async function writePackage(
  pkg: PackageResult,
  outputDir: string,
  stamp: string,
): Promise<Omit<PersistedPaths, "runLog">> {
  const dir = resolve(outputDir);
  await mkdir(dir, { recursive: true });

  const documents: PersistedPaths["documents"] = {};
  for (const doc of pkg.documents) {
    const path = join(dir, documentFileName(doc.documentType, stamp));
    await writeFileSafe(path, doc.body);
    documents[doc.documentType] = path;
  }

  if (pkg.summary === undefined) return { documents };

  const summaryPath = join(dir, summaryFileName(stamp));
  await writeFileSafe(summaryPath, renderSummaryFile(pkg, stamp));
  return { documents, summary: summaryPath };
}

export function renderSummaryFile(pkg: PackageResult, stamp: string): string {
  const lines: string[] = [(pkg.summary ?? `# ${PACKAGE_SUMMARY_TITLE}\n`).trimEnd(), "", "## Documents", ""];
  for (const doc of pkg.documents) {
    const reviewed = doc.securityReviewed ? ", security reviewed" : "";
    lines.push(
      `- ${DOCUMENT_TITLES[doc.documentType]}: \`${documentFileName(doc.documentType, stamp)}\`${reviewed}`,
    );
  }

  if (pkg.failures.length > 0) {
    lines.push("", "## Failed Documents", "");
    for (const f of pkg.failures) {
      lines.push(`- ${f.documentType} (${f.kind}): ${f.message}. Hint: ${f.hint || remediationHint(f.kind)}`);
    }
  }

  return lines.join("\n") + "\n";
}

async function writeFileSafe(filePath: string, content: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, "utf-8");
}
