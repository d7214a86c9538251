import { describe, it, expect } from "vitest";
import { assessDocumentQuality } from "../src/output-validator.js";

function longDocument(extra = ""): string {
  const paragraph = Array.from({ length: 50 }, () => "alpha").join(" ");
  const lines = ["# Title", "", "## Requirements", "", "### Details", ""];
  for (let i = 0; i < 25; i++) lines.push(paragraph);
  if (extra) lines.push(extra);
  return lines.join("\n");
}

describe("assessDocumentQuality", () => {
  it("rates a complete document high", () => {
    const quality = assessDocumentQuality(longDocument());
    expect(quality.confidence).toBe("high");
    expect(quality.hasSections).toBe(true);
    expect(quality.completenessScore).toBe(1);
    expect(quality.issues).toEqual([]);
  });

  it("rates a short document low", () => {
    const quality = assessDocumentQuality("# T\n\nHello world");
    expect(quality.wordCount).toBe(4);
    expect(quality.confidence).toBe("low");
    expect(quality.issues).toContain("Document too short (< 500 words)");
  });

  it("flags placeholder text as medium confidence", () => {
    const quality = assessDocumentQuality(longDocument("Pricing: TBD"));
    expect(quality.confidence).toBe("medium");
    expect(quality.issues).toEqual(["Document contains placeholder text"]);
  });

  it("flags error text as low confidence", () => {
    const quality = assessDocumentQuality(longDocument("Error: upstream unavailable"));
    expect(quality.confidence).toBe("low");
    expect(quality.issues).toEqual(["Document contains error messages"]);
  });

  it("notices missing sections", () => {
    const quality = assessDocumentQuality("Just a paragraph of text.");
    expect(quality.hasSections).toBe(false);
    expect(quality.issues).toContain("Missing markdown sections");
  });
});
