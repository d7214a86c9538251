// src/llm/template-selector.ts — Pick instructions per document type and build prompt payloads

import { DOCUMENT_TEMPLATES, type DocumentTemplate } from "../templates/documents.js";
import {
  DOCUMENT_TITLES,
  type DocumentType,
  type RequirementSet,
} from "../types.js";

export function getDocumentTemplate(type: DocumentType): DocumentTemplate {
  return DOCUMENT_TEMPLATES[type];
}

// Values interpolated into prompts stay on one line
export function sanitize(s: string, maxLen = 500): string {
  return s.replace(/\s*\n\s*/g, " ").replace(/`/g, "'").slice(0, maxLen);
}

/**
 * Instruction for drafting one document type.
 */
export function buildDraftInstruction(type: DocumentType): string {
  const template = getDocumentTemplate(type);
  const sections = template.sections.map((s, i) => `${i + 1}. ${s}`).join("\n");
  return `${template.formatInstructions}

Title the document "# ${DOCUMENT_TITLES[type]}".
Sections, in this order:
${sections}

Output ONLY the Markdown document.`;
}

export function formatRequirements(requirements: RequirementSet): string {
  const lines: string[] = ["<requirements>"];
  lines.push(`Domain: ${requirements.domainHint ?? "unspecified"}`);
  if (requirements.extractedFeatures.length > 0) {
    lines.push("Features:");
    for (const f of requirements.extractedFeatures) lines.push(`- ${sanitize(f)}`);
  } else {
    lines.push("Features: none stated; infer the standard ones for the domain");
  }
  if (requirements.openQuestions.length > 0) {
    lines.push("Unresolved questions (state assumptions for these):");
    for (const q of requirements.openQuestions) lines.push(`- ${sanitize(q)}`);
  }
  lines.push("</requirements>");
  return lines.join("\n");
}

/**
 * Payload for the technical writer: request, requirements and optional code summary.
 */
export function buildDraftPayload(
  requestText: string,
  requirements: RequirementSet,
  codeSummary?: string,
): string {
  const parts = [
    `<request>\n${requestText}\n</request>`,
    formatRequirements(requirements),
  ];
  if (codeSummary) {
    parts.push(`<code-structure>\n${codeSummary}</code-structure>`);
  }
  return parts.join("\n\n");
}
