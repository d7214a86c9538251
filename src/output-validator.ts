// src/output-validator.ts — Advisory quality assessment of generated documents
// Heuristic only: the result is attached to metadata and never changes a body or an outcome.

import type { QualityAssessment } from "./types.js";

const PLACEHOLDERS = ["TODO", "TBD", "[Insert", "[Add", "PLACEHOLDER"];
const ERROR_INDICATORS = ["Error:", "Failed:", "not available", "Exception:", "Traceback"];

const HEADING = /^#{1,6}\s+\S/gm;

type Confidence = QualityAssessment["confidence"];
const RANK: Record<Confidence, number> = { low: 0, medium: 1, high: 2 };

function lower(current: Confidence, to: Confidence): Confidence {
  return RANK[to] < RANK[current] ? to : current;
}

export function assessDocumentQuality(body: string): QualityAssessment {
  const issues: string[] = [];
  let confidence: Confidence = "high";

  const wordCount = body.split(/\s+/).filter(Boolean).length;
  const headingCount = body.match(HEADING)?.length ?? 0;
  const hasSections = headingCount > 0;
  const lineCount = body.split("\n").length;

  if (wordCount < 500) {
    confidence = lower(confidence, "low");
    issues.push("Document too short (< 500 words)");
  } else if (wordCount < 1000) {
    confidence = lower(confidence, "medium");
    issues.push("Document relatively short (< 1000 words)");
  }

  if (!hasSections) {
    confidence = lower(confidence, "low");
    issues.push("Missing markdown sections");
  }

  if (ERROR_INDICATORS.some((e) => body.includes(e))) {
    confidence = lower(confidence, "low");
    issues.push("Document contains error messages");
  }

  if (PLACEHOLDERS.some((p) => body.includes(p))) {
    confidence = lower(confidence, "medium");
    issues.push("Document contains placeholder text");
  }

  const factors = [
    wordCount >= 1000,
    hasSections,
    headingCount >= 3,
    /requirement|specification/i.test(body),
    lineCount >= 20,
  ];
  const completenessScore = factors.filter(Boolean).length / factors.length;

  if (completenessScore < 0.5) {
    confidence = lower(confidence, "low");
    issues.push(`Low completeness score: ${completenessScore.toFixed(2)}`);
  }

  return { confidence, wordCount, hasSections, completenessScore, issues };
}
