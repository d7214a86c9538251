// src/document-drafter.ts — Document Drafter

import type { Role } from "./llm/role-registry.js";
import { buildDraftInstruction, buildDraftPayload } from "./llm/template-selector.js";
import type { RunLog } from "./run-log.js";
import {
  describeFailure,
  type DocumentType,
  type DraftDocument,
  type RequirementSet,
} from "./types.js";

export interface DraftOptions {
  requestText: string;
  codeSummary?: string;
  runLog?: RunLog;
  signal?: AbortSignal;
  clock?: () => Date;
}

/**
 * Draft one document with the technical-writer role. The response becomes
 * the body verbatim; quality is judged later and never rejects a draft.
 */
export async function draftDocument(
  type: DocumentType,
  requirements: RequirementSet,
  role: Role,
  options: DraftOptions,
): Promise<DraftDocument> {
  const clock = options.clock ?? (() => new Date());
  const startedAt = clock();

  try {
    const result = await role.invoke(
      buildDraftInstruction(type),
      buildDraftPayload(options.requestText, requirements, options.codeSummary),
      options.signal,
    );
    const completedAt = clock();
    options.runLog?.record(
      `draft:${type}`,
      "ok",
      `${result.text.length} chars, tokens=${result.inputTokens}/${result.outputTokens}`,
      startedAt,
    );

    return Object.freeze({
      documentType: type,
      body: result.text,
      metadata: Object.freeze({
        startedAt: startedAt.toISOString(),
        completedAt: completedAt.toISOString(),
        model: result.model,
        inputTokens: result.inputTokens,
        outputTokens: result.outputTokens,
      }),
      securityReviewed: false,
    });
  } catch (err) {
    options.runLog?.record(`draft:${type}`, "failed", describeFailure(err), startedAt);
    throw err;
  }
}
