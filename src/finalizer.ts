// src/finalizer.ts — Markdown normalization and package assembly

import type { Role } from "./llm/role-registry.js";
import { assessDocumentQuality } from "./output-validator.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { RunLog } from "./run-log.js";
import {
  DOCUMENT_TITLES,
  describeFailure,
  type DocumentFailure,
  type DocumentType,
  type DraftDocument,
  type PackageResult,
  type RequirementSet,
} from "./types.js";

export type DocumentOutcome =
  | { ok: true; draft: DraftDocument }
  | { ok: false; failure: DocumentFailure };

export const PACKAGE_SUMMARY_TITLE = "Documentation Package Summary";

const OUTER_FENCE = /^```(?:markdown|md)[ \t]*\n([\s\S]*?)\n?```$/i;
const CODE_FENCE = /^\s*(```|~~~)/;
const HEADING = /^#{1,6}\s/;
const PREVIEW_CHARS = 1500;

/**
 * Deterministic markdown cleanup. Fenced code blocks keep their blank lines.
 */
export function normalizeMarkdown(body: string, title: string): string {
  let text = body.replace(/\r\n?/g, "\n");
  const fenced = OUTER_FENCE.exec(text.trim());
  if (fenced) text = fenced[1];

  const out: string[] = [];
  let inFence = false;
  const last = () => out[out.length - 1];

  for (const raw of text.split("\n")) {
    const line = raw.replace(/\s+$/, "");

    if (CODE_FENCE.test(line)) {
      inFence = !inFence;
      out.push(line);
      continue;
    }
    if (inFence) {
      out.push(line);
      continue;
    }
    if (line === "") {
      if (out.length > 0 && last() !== "") out.push("");
      continue;
    }
    if (HEADING.test(line)) {
      if (out.length > 0 && last() !== "") out.push("");
      out.push(line, "");
      continue;
    }
    out.push(line);
  }

  if (out.length === 0 || !/^#\s/.test(out[0])) {
    out.unshift(`# ${title}`, "");
  }
  while (out.length > 0 && out[out.length - 1] === "") out.pop();

  return out.join("\n") + "\n";
}

export interface FinalizeOptions {
  requestText: string;
  runLog?: RunLog;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Wait for every outcome, then order, normalize and summarize the package.
 * A failed summary call leaves `summary` absent and does not fail the package.
 */
export async function finalizePackage(
  targets: readonly DocumentType[],
  outcomes: Iterable<DocumentOutcome | Promise<DocumentOutcome>>,
  requirements: RequirementSet,
  editorRole: Role,
  options: FinalizeOptions,
): Promise<PackageResult> {
  const logger = options.logger ?? silentLogger;
  const settled = await Promise.all(outcomes);

  const documents: DraftDocument[] = [];
  const failures: DocumentFailure[] = [];

  for (const type of targets) {
    const outcome = settled.find((o) =>
      o.ok ? o.draft.documentType === type : o.failure.documentType === type,
    );
    if (!outcome) continue;
    if (!outcome.ok) {
      failures.push(outcome.failure);
      continue;
    }
    const body = normalizeMarkdown(outcome.draft.body, DOCUMENT_TITLES[type]);
    documents.push(
      Object.freeze({
        ...outcome.draft,
        body,
        metadata: Object.freeze({ ...outcome.draft.metadata, quality: assessDocumentQuality(body) }),
      }),
    );
  }

  const result: PackageResult = { documents, failures };
  if (documents.length > 1) {
    const summary = await summarizePackage(documents, requirements, editorRole, options, logger);
    if (summary !== undefined) result.summary = summary;
  }
  return result;
}

async function summarizePackage(
  documents: readonly DraftDocument[],
  requirements: RequirementSet,
  role: Role,
  options: FinalizeOptions,
  logger: Logger,
): Promise<string | undefined> {
  const started = options.runLog?.now();
  const previews = documents.map(
    (d) => `<document type="${d.documentType}">\n${d.body.slice(0, PREVIEW_CHARS)}\n</document>`,
  );
  const payload = [
    `<request>\n${options.requestText}\n</request>`,
    `Domain: ${requirements.domainHint ?? "unspecified"}`,
    ...previews,
  ].join("\n\n");

  try {
    const result = await role.invoke(
      `Write the overview for this package of ${documents.length} documents. Output ONLY Markdown.`,
      payload,
      options.signal,
    );
    options.runLog?.record("package-summary", "ok", `${result.text.length} chars`, started);
    return normalizeMarkdown(result.text, PACKAGE_SUMMARY_TITLE);
  } catch (err) {
    const detail = describeFailure(err);
    options.runLog?.record("package-summary", "failed", detail, started);
    logger.warn("finalizer", `Package summary skipped: ${detail}`);
    return undefined;
  }
}
