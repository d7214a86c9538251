// src/document-types.ts — Document type registry with aliases

import { DOCUMENT_TYPES, ValidationError, type DocumentType } from "./types.js";

const DOC_TYPE_ALIASES: Record<DocumentType, string[]> = {
  BRD: ["BRD", "BUSINESS", "BUSINESS_REQUIREMENTS"],
  FRD: ["FRD", "FNRD", "FUNCTIONAL", "FUNCTIONAL_REQUIREMENTS"],
  NFRD: ["NFRD", "NON_FUNCTIONAL", "NONFUNCTIONAL", "NON_FUNCTIONAL_REQUIREMENTS"],
  CLOUD: ["CLOUD", "DEPLOYMENT", "IMPLEMENTATION", "INFRASTRUCTURE", "CLOUD_DEPLOYMENT", "CLOUD_IMPLEMENTATION"],
  SECURITY: ["SECURITY", "COMPLIANCE", "SECURITY_COMPLIANCE"],
  API: ["API", "API_DOCUMENTATION", "REST_API"],
};

const ALIAS_LOOKUP = new Map<string, DocumentType>(
  DOCUMENT_TYPES.flatMap((type) => DOC_TYPE_ALIASES[type].map((alias) => [alias, type] as const)),
);

/**
 * Map a free-form type name ("non-functional", "Security Document", "rest api")
 * to a DocumentType. Exact alias match only; returns null for anything else.
 */
export function normalizeDocumentType(raw: string): DocumentType | null {
  const key = raw
    .trim()
    .toUpperCase()
    .replace(/[\s-]+/g, "_")
    .replace(/_(DOCUMENT|DOC)S?$/, "");
  return ALIAS_LOOKUP.get(key) ?? null;
}

/**
 * Like normalizeDocumentType, but rejects unknown names.
 */
export function parseDocumentType(raw: string): DocumentType {
  const type = normalizeDocumentType(raw);
  if (!type) {
    throw new ValidationError(
      `Unknown document type "${raw}". Expected one of: ${DOCUMENT_TYPES.join(", ")}`,
    );
  }
  return type;
}

export function isDocumentType(value: unknown): value is DocumentType {
  return typeof value === "string" && (DOCUMENT_TYPES as readonly string[]).includes(value);
}

/**
 * Normalize a list of names: unknown names dropped, first occurrence wins.
 */
export function normalizeDocumentTypes(raw: readonly string[]): DocumentType[] {
  const out: DocumentType[] = [];
  for (const name of raw) {
    const type = normalizeDocumentType(name);
    if (type && !out.includes(type)) out.push(type);
  }
  return out;
}
