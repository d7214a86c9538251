import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { DEFAULTS } from "../src/config.js";
import type { InvocationResult, RoleInvocation, RoleInvoker } from "../src/llm/client.js";
import type { RoleName } from "../src/templates/roles.js";
import {
  DOCUMENT_TITLES,
  DOCUMENT_TYPES,
  type DocumentType,
  type ResolvedConfig,
} from "../src/types.js";

export type Responder = (call: RoleInvocation) => string | Promise<string>;

/**
 * In-process stand-in for the text-generation service. Each role answers from
 * its script; a responder that throws simulates a failed call.
 */
export class ScriptedInvoker implements RoleInvoker {
  readonly calls: RoleInvocation[] = [];

  constructor(private readonly script: Partial<Record<RoleName, Responder>>) {}

  async invoke(call: RoleInvocation): Promise<InvocationResult> {
    this.calls.push(call);
    const responder = this.script[call.role];
    if (!responder) throw new Error(`No scripted response for role "${call.role}"`);
    const text = await responder(call);
    return { text, model: "test-model", inputTokens: 10, outputTokens: 20 };
  }

  callsFor(role: RoleName): RoleInvocation[] {
    return this.calls.filter((c) => c.role === role);
  }
}

/** Which document a technical-writer call is drafting. */
export function draftedType(call: RoleInvocation): DocumentType {
  const type = DOCUMENT_TYPES.find((t) => call.instruction.includes(`"# ${DOCUMENT_TITLES[t]}"`));
  if (!type) throw new Error("Call is not a drafting call");
  return type;
}

export function requirementsJson(fields: {
  features?: string[];
  domain?: string | null;
  types?: string[];
  clarify?: boolean;
  questions?: string[];
}): string {
  return JSON.stringify({
    features: fields.features ?? ["User accounts"],
    domain: fields.domain ?? null,
    document_types: fields.types ?? [],
    needs_clarification: fields.clarify ?? false,
    questions: fields.questions ?? [],
  });
}

export function testConfig(outputDir: string, overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
  return {
    ...DEFAULTS,
    llm: { ...DEFAULTS.llm, apiKey: "test-secret" },
    output: { dir: outputDir },
    ...overrides,
  };
}

export const fixedClock = () => new Date(2024, 0, 2, 3, 4, 5);
export const FIXED_STAMP = "20240102_030405";

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const abs = join(root, rel);
    mkdirSync(dirname(abs), { recursive: true });
    writeFileSync(abs, content);
  }
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
