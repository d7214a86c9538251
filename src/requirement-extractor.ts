// src/requirement-extractor.ts — Requirement Extractor
// One requirement-analyst call per invocation; the result is frozen and shared by every drafting task.

import { relative, sep } from "node:path";
import type { Role } from "./llm/role-registry.js";
import { parseRequirementResponse } from "./llm/response-parser.js";
import { sanitize } from "./llm/template-selector.js";
import { normalizeDocumentTypes } from "./document-types.js";
import type { RunLog } from "./run-log.js";
import {
  DOCUMENT_TYPES,
  DOMAIN_HINTS,
  describeFailure,
  type AcceptedRequest,
  type DomainHint,
  type RequirementSet,
} from "./types.js";

export const DEFAULT_CLARIFICATION_QUESTION =
  "Which documents do you need, and for what kind of application?";

const MAX_INVENTORY_LINES = 200;

const EXTRACTION_INSTRUCTION = `Analyze the documentation request below and reply with ONE JSON object of this exact shape:
{
  "features": ["feature or capability the system needs", ...],
  "domain": one of ${DOMAIN_HINTS.map((d) => `"${d}"`).join(", ")}, or null,
  "document_types": documents to produce, any of ${DOCUMENT_TYPES.map((t) => `"${t}"`).join(", ")},
  "needs_clarification": true only if the request cannot be worked with,
  "questions": ["question for the requester", ...]
}
Use the code inventory and detected stack, when present, as evidence of what the system does.
Treat the clarification answers, when present, as part of the request.`;

export interface ExtractOptions {
  /** Accumulated clarification answers, oldest first. */
  answers?: readonly string[];
  runLog?: RunLog;
  signal?: AbortSignal;
}

/**
 * Invoke the requirement-analyst role once and build a RequirementSet.
 * Upstream failures propagate unchanged.
 */
export async function extractRequirements(
  accepted: AcceptedRequest,
  role: Role,
  options: ExtractOptions = {},
): Promise<RequirementSet> {
  const { answers = [], runLog, signal } = options;
  const started = runLog?.now();
  const payload = buildExtractionPayload(accepted, answers);

  try {
    const result = await role.invoke(EXTRACTION_INSTRUCTION, payload, signal);
    const requirements = toRequirementSet(
      parseRequirementResponse(result.text),
      accepted.request.forcedDocumentType !== undefined,
    );
    runLog?.record(
      "extract-requirements",
      "ok",
      `features=${requirements.extractedFeatures.length} domain=${requirements.domainHint ?? "none"} ` +
        `types=[${requirements.recommendedDocumentTypes.join(", ")}] ` +
        `clarification=${requirements.clarificationNeeded ? "needed" : "no"} ` +
        `tokens=${result.inputTokens}/${result.outputTokens}`,
      started,
    );
    return requirements;
  } catch (err) {
    runLog?.record("extract-requirements", "failed", describeFailure(err), started);
    throw err;
  }
}

export function buildExtractionPayload(accepted: AcceptedRequest, answers: readonly string[]): string {
  const parts = [`<request>\n${accepted.request.text}\n</request>`];

  if (accepted.codeInventory.length > 0) {
    const root = accepted.codeRoot ?? process.cwd();
    const names = accepted.codeInventory
      .slice(0, MAX_INVENTORY_LINES)
      .map((f) => `- ${relative(root, f).split(sep).join("/")}`);
    const rest = accepted.codeInventory.length - names.length;
    if (rest > 0) names.push(`- ... and ${rest} more files`);
    parts.push(`<code-inventory>\n${names.join("\n")}\n</code-inventory>`);
  }

  const stack = accepted.detectedStack;
  if (stack && (stack.technologies.length > 0 || stack.languages.length > 0)) {
    const lines = [
      `Technologies: ${stack.technologies.join(", ") || "none detected"}`,
      `Languages: ${stack.languages.join(", ") || "none detected"}`,
    ];
    if (stack.suggestedDocumentTypes.length > 0) {
      lines.push(`Suggested documents: ${stack.suggestedDocumentTypes.join(", ")}`);
    }
    parts.push(`<detected-stack>\n${lines.join("\n")}\n</detected-stack>`);
  }

  if (answers.length > 0) {
    const lines = answers.map((a, i) => `${i + 1}. ${sanitize(a, 2000)}`);
    parts.push(`<clarification-answers>\n${lines.join("\n")}\n</clarification-answers>`);
  }

  return parts.join("\n\n");
}

export function normalizeDomain(raw: string | null | undefined): DomainHint | null {
  if (!raw) return null;
  const key = raw.trim().toLowerCase().replace(/[\s_]+/g, "-");
  const candidate = key === "ecommerce" ? "e-commerce" : key;
  return DOMAIN_HINTS.find((d) => d === candidate) ?? null;
}

function toRequirementSet(
  response: ReturnType<typeof parseRequirementResponse>,
  hasForcedType: boolean,
): RequirementSet {
  const features = [...new Set(response.features.map((f) => f.trim()).filter(Boolean))];
  const types = normalizeDocumentTypes(response.document_types);
  const clarificationNeeded =
    response.needs_clarification || (types.length === 0 && !hasForcedType);

  const questions = response.questions.map((q) => q.trim()).filter(Boolean);
  if (clarificationNeeded && questions.length === 0) {
    questions.push(DEFAULT_CLARIFICATION_QUESTION);
  }

  return Object.freeze({
    extractedFeatures: Object.freeze(features),
    domainHint: normalizeDomain(response.domain),
    recommendedDocumentTypes: Object.freeze(types),
    clarificationNeeded,
    openQuestions: Object.freeze(questions),
  });
}
