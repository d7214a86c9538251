// src/security-annotator.ts — Security Annotator
// Eligibility is a fixed rule over document type and domain; request text is never consulted.

import type { Role } from "./llm/role-registry.js";
import { formatRequirements } from "./llm/template-selector.js";
import type { RunLog } from "./run-log.js";
import {
  DOCUMENT_TITLES,
  REGULATED_DOMAINS,
  REGULATED_DOMAIN_TYPES,
  SECURITY_SENSITIVE_TYPES,
  describeFailure,
  type DocumentType,
  type DomainHint,
  type DraftDocument,
  type RequirementSet,
} from "./types.js";

export const SECURITY_REVIEW_HEADING = "## Security & Compliance Review";

export function isSecurityReviewEligible(type: DocumentType, domainHint: DomainHint | null): boolean {
  if (SECURITY_SENSITIVE_TYPES.includes(type)) return true;
  return (
    domainHint !== null &&
    REGULATED_DOMAINS.includes(domainHint) &&
    REGULATED_DOMAIN_TYPES.includes(type)
  );
}

export interface AnnotateOptions {
  runLog?: RunLog;
  signal?: AbortSignal;
}

/**
 * Invoke the security-reviewer role once and return a new draft with the
 * review appended under its own heading.
 */
export async function annotateSecurity(
  draft: DraftDocument,
  requirements: RequirementSet,
  role: Role,
  options: AnnotateOptions = {},
): Promise<DraftDocument> {
  const started = options.runLog?.now();
  const instruction = `Review this ${DOCUMENT_TITLES[draft.documentType]} draft for the ${
    requirements.domainHint ?? "unspecified"
  } domain. Write only the review section body.`;
  const payload = `${formatRequirements(requirements)}\n\n<draft>\n${draft.body}\n</draft>`;

  try {
    const result = await role.invoke(instruction, payload, options.signal);
    options.runLog?.record(
      `security-review:${draft.documentType}`,
      "ok",
      `${result.text.length} chars, tokens=${result.inputTokens}/${result.outputTokens}`,
      started,
    );

    return Object.freeze({
      ...draft,
      body: `${draft.body}\n\n${SECURITY_REVIEW_HEADING}\n\n${result.text}`,
      metadata: Object.freeze({
        ...draft.metadata,
        inputTokens: draft.metadata.inputTokens + result.inputTokens,
        outputTokens: draft.metadata.outputTokens + result.outputTokens,
      }),
      securityReviewed: true,
    });
  } catch (err) {
    options.runLog?.record(`security-review:${draft.documentType}`, "failed", describeFailure(err), started);
    throw err;
  }
}
