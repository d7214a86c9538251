import { describe, it, expect } from "vitest";
import { existsSync } from "node:fs";
import { generate } from "../src/index.js";
import { ScriptedInvoker, draftedType, makeTempDir, requirementsJson } from "./helpers.js";

describe("generate", () => {
  it("merges config overrides over the defaults and persists the package", async () => {
    const dir = makeTempDir("docsmith-generate-");
    const invoker = new ScriptedInvoker({
      "requirement-analyst": () => requirementsJson({ types: ["CLOUD"] }),
      "technical-writer": (call) => `Deployment notes for ${draftedType(call)}.`,
    });

    const result = await generate(
      { text: "Cloud rollout for a ticketing service", interactive: false },
      { invoker, config: { output: { dir }, llm: { maxOutputTokens: 512 } } },
    );

    expect(result.state).toBe("Persisted");
    expect(invoker.calls.every((c) => c.maxOutputTokens === 512)).toBe(true);
    expect(result.package?.documents[0].body).toBe("# Cloud Implementation Guide\n\nDeployment notes for CLOUD.\n");
    const path = result.paths?.documents.CLOUD;
    expect(path !== undefined && existsSync(path)).toBe(true);
  });

  it("returns a validation failure instead of throwing for an invalid merged config", async () => {
    const invoker = new ScriptedInvoker({ "requirement-analyst": () => requirementsJson({ types: ["BRD"] }) });

    const result = await generate(
      { text: "Docs for a shop", interactive: false },
      { invoker, config: { output: { dir: makeTempDir("docsmith-generate-") }, maxConcurrency: 0 } },
    );

    expect(result.state).toBe("Failed");
    expect(result.error?.kind).toBe("ValidationError");
    expect(invoker.calls).toHaveLength(0);
  });
});
