import { describe, it, expect } from "vitest";
import {
  SECURITY_REVIEW_HEADING,
  annotateSecurity,
  isSecurityReviewEligible,
} from "../src/security-annotator.js";
import { RoleRegistry } from "../src/llm/role-registry.js";
import {
  DOCUMENT_TYPES,
  UpstreamError,
  type DomainHint,
  type DraftDocument,
  type RequirementSet,
} from "../src/types.js";
import { ScriptedInvoker } from "./helpers.js";

const requirements: RequirementSet = {
  extractedFeatures: ["Payments"],
  domainHint: "banking",
  recommendedDocumentTypes: ["FRD"],
  clarificationNeeded: false,
  openQuestions: [],
};

const draft: DraftDocument = {
  documentType: "FRD",
  body: "# Functional Requirements Document\n\nFR-1 Transfers.",
  metadata: {
    startedAt: "2024-01-01T00:00:00.000Z",
    completedAt: "2024-01-01T00:00:01.000Z",
    model: "test-model",
    inputTokens: 10,
    outputTokens: 20,
  },
  securityReviewed: false,
};

describe("isSecurityReviewEligible", () => {
  const domains: (DomainHint | null)[] = [null, "banking", "healthcare", "trading", "e-commerce", "web"];

  it("reviews SECURITY always and FRD only in regulated domains", () => {
    for (const type of DOCUMENT_TYPES) {
      for (const domain of domains) {
        const regulated = domain === "banking" || domain === "healthcare" || domain === "trading";
        const expected = type === "SECURITY" || (type === "FRD" && regulated);
        expect(isSecurityReviewEligible(type, domain), `${type} in ${domain}`).toBe(expected);
      }
    }
  });

  it("never reviews a BRD", () => {
    for (const domain of domains) expect(isSecurityReviewEligible("BRD", domain)).toBe(false);
  });
});

describe("annotateSecurity", () => {
  it("appends the review under its own heading and returns a new draft", async () => {
    const invoker = new ScriptedInvoker({ "security-reviewer": () => "Use mutual TLS." });
    const role = new RoleRegistry(invoker, { maxOutputTokens: 1000 }).getOrCreate("security-reviewer");

    const reviewed = await annotateSecurity(draft, requirements, role);

    expect(reviewed.body).toBe(
      "# Functional Requirements Document\n\nFR-1 Transfers.\n\n## Security & Compliance Review\n\nUse mutual TLS.",
    );
    expect(reviewed.securityReviewed).toBe(true);
    expect(reviewed.metadata.inputTokens).toBe(20);
    expect(reviewed.metadata.outputTokens).toBe(40);
    expect(draft.securityReviewed).toBe(false);
    expect(draft.body.includes(SECURITY_REVIEW_HEADING)).toBe(false);
    expect(invoker.calls[0].payload).toContain("<draft>\n# Functional Requirements Document");
  });

  it("propagates a failed review", async () => {
    const invoker = new ScriptedInvoker({
      "security-reviewer": () => {
        throw new UpstreamError("Timeout", "Request timed out after 100ms");
      },
    });
    const role = new RoleRegistry(invoker, { maxOutputTokens: 1000 }).getOrCreate("security-reviewer");
    await expect(annotateSecurity(draft, requirements, role)).rejects.toThrow("Request timed out after 100ms");
  });
});
