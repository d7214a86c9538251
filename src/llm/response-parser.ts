// src/llm/response-parser.ts — Untyped service text into typed contracts

import { z } from "zod";
import { UpstreamError } from "../types.js";

export const RequirementResponseSchema = z.object({
  features: z.array(z.string()).default([]),
  domain: z.string().nullable().optional(),
  document_types: z.array(z.string()).default([]),
  needs_clarification: z.boolean().default(false),
  questions: z.array(z.string()).default([]),
});

export type RequirementResponse = z.infer<typeof RequirementResponseSchema>;

const FENCED_JSON = /```(?:json)?\s*\n([\s\S]*?)\n?```/i;

/**
 * Find a JSON object in model output: the whole text, a fenced block,
 * or the first balanced {...} span. Returns null when none parses.
 */
export function extractJsonObject(text: string): unknown {
  const candidates: string[] = [text.trim()];
  const fenced = FENCED_JSON.exec(text);
  if (fenced) candidates.push(fenced[1].trim());
  const balanced = firstBalancedObject(text);
  if (balanced) candidates.push(balanced);

  for (const candidate of candidates) {
    try {
      const value: unknown = JSON.parse(candidate);
      if (value !== null && typeof value === "object" && !Array.isArray(value)) return value;
    } catch {
      // next candidate
    }
  }
  return null;
}

function firstBalancedObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

export function parseRequirementResponse(text: string): RequirementResponse {
  const json = extractJsonObject(text);
  if (json === null) {
    throw new UpstreamError("MalformedResponse", "Requirement analysis did not contain a JSON object");
  }
  const parsed = RequirementResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "response";
    throw new UpstreamError("MalformedResponse", `Requirement analysis has invalid ${where}: ${issue.message}`);
  }
  return parsed.data;
}
