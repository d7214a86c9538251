import { describe, it, expect } from "vitest";
import { join } from "node:path";
import {
  CONFIG_FILE_NAME,
  DEFAULTS,
  parseCliArgs,
  resolveConfig,
  toPublicConfig,
  validateResolvedConfig,
  type ParsedArgs,
} from "../src/config.js";
import { ValidationError, type Warning } from "../src/types.js";
import { makeTempDir, writeFiles } from "./helpers.js";

const baseArgs: ParsedArgs = { interactive: false, quiet: false, verbose: false, help: false, version: false };

function resolveIn(
  files: Record<string, string>,
  env: NodeJS.ProcessEnv = {},
  args: Partial<ParsedArgs> = {},
): { config: ReturnType<typeof resolveConfig>; warnings: Warning[]; cwd: string } {
  const cwd = makeTempDir("docsmith-config-");
  writeFiles(cwd, files);
  const warnings: Warning[] = [];
  const config = resolveConfig({ ...baseArgs, ...args }, warnings, { env, cwd });
  return { config, warnings, cwd };
}

describe("resolveConfig", () => {
  it("falls back to the defaults", () => {
    const { config, warnings } = resolveIn({});
    expect(config).toEqual(DEFAULTS);
    expect(config.llm.apiKey).toBeUndefined();
    expect(warnings).toEqual([]);
  });

  it("layers file, environment and CLI values", () => {
    const { config } = resolveIn(
      {
        [CONFIG_FILE_NAME]: JSON.stringify({
          llm: { provider: "openai", model: "file-model", retries: 2 },
          output: { dir: "file-out" },
          maxConcurrency: 2,
        }),
      },
      { DOCSMITH_MODEL: "env-model", OPENAI_API_KEY: "test-secret", DOCSMITH_OUTPUT_DIR: "env-out" },
      { model: "cli-model" },
    );

    expect(config.llm.provider).toBe("openai");
    expect(config.llm.model).toBe("cli-model");
    expect(config.llm.retries).toBe(2);
    expect(config.llm.apiKey).toBe("test-secret");
    expect(config.output.dir).toBe("env-out");
    expect(config.maxConcurrency).toBe(2);
  });

  it("prefers DOCSMITH_API_KEY over the provider's own variable", () => {
    const { config } = resolveIn({}, { DOCSMITH_API_KEY: "test-secret", ANTHROPIC_API_KEY: "other-secret" });
    expect(config.llm.apiKey).toBe("test-secret");
  });

  it("reads the docsmith key of package.json", () => {
    const { config } = resolveIn({
      "package.json": JSON.stringify({ name: "app", docsmith: { maxConcurrency: 5, code: { summaryBudget: 4000 } } }),
    });
    expect(config.maxConcurrency).toBe(5);
    expect(config.code.summaryBudget).toBe(4000);
    expect(config.code.maxFileBytes).toBe(DEFAULTS.code.maxFileBytes);
  });

  it("ignores an invalid config file with a warning", () => {
    const { config, warnings, cwd } = resolveIn({ [CONFIG_FILE_NAME]: JSON.stringify({ maxConcurrency: 0 }) });

    expect(config.maxConcurrency).toBe(3);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toContain(`Ignoring invalid config file ${join(cwd, CONFIG_FILE_NAME)}: maxConcurrency:`);
  });

  it("warns about unparsable and missing config files", () => {
    expect(resolveIn({ [CONFIG_FILE_NAME]: "{ not json" }).warnings[0].message).toMatch(
      /^Failed to parse config file /,
    );
    expect(resolveIn({}, {}, { config: "missing.json" }).warnings).toEqual([
      { level: "warn", module: "config", message: "Config file not found: missing.json" },
    ]);
  });

  it("uses a key found in the config file but warns about it", () => {
    const { config, warnings } = resolveIn({
      "custom.json": JSON.stringify({ llm: { apiKey: "test-secret" } }),
    }, {}, { config: "custom.json" });

    expect(config.llm.apiKey).toBe("test-secret");
    expect(warnings.map((w) => w.message)).toEqual([
      "API keys should not be stored in config files. Use the DOCSMITH_API_KEY environment variable instead.",
    ]);
  });

  it("turns bad environment values into warnings", () => {
    const { config, warnings } = resolveIn({}, { DOCSMITH_TEMPERATURE: "hot", DOCSMITH_PROVIDER: "mystery" });

    expect(config.llm.temperature).toBeUndefined();
    expect(config.llm.provider).toBe("anthropic");
    expect(warnings.map((w) => w.message)).toEqual([
      'Ignoring DOCSMITH_PROVIDER="mystery"; expected one of: anthropic, openai, azure-openai',
      'Ignoring invalid DOCSMITH_TEMPERATURE="hot"',
    ]);
  });

  it("rejects bad CLI values", () => {
    expect(() => resolveIn({}, {}, { provider: "mystery" })).toThrow(ValidationError);
    expect(() => resolveIn({}, {}, { maxConcurrency: 0 })).toThrow(
      "--max-concurrency must be a positive integer (got 0)",
    );
  });
});

describe("validateResolvedConfig", () => {
  it("accepts the defaults", () => {
    expect(() => validateResolvedConfig(DEFAULTS)).not.toThrow();
  });

  it("names every out-of-range setting", () => {
    const bad = { ...DEFAULTS, maxConcurrency: 0, code: { ...DEFAULTS.code, summaryBudget: 50 } };
    expect(() => validateResolvedConfig(bad)).toThrow(ValidationError);
    expect(() => validateResolvedConfig(bad)).toThrow(/code\.summaryBudget: .*; maxConcurrency: /);
  });
});

describe("toPublicConfig", () => {
  it("drops the API key", () => {
    const pub = toPublicConfig({ ...DEFAULTS, llm: { ...DEFAULTS.llm, apiKey: "test-secret" } });
    expect("apiKey" in pub.llm).toBe(false);
    expect(JSON.stringify(pub)).not.toContain("test-secret");
  });
});

describe("parseCliArgs", () => {
  it("joins positional words into the request and maps short flags", async () => {
    const args = await parseCliArgs(["Create", "a", "BRD", "-c", "./src", "-t", "frd", "-i", "--max-concurrency", "2"]);

    expect(args).toMatchObject({
      request: "Create a BRD",
      codeDir: "./src",
      docType: "frd",
      interactive: true,
      maxConcurrency: 2,
      quiet: false,
    });
  });

  it("collects every file after --files", async () => {
    const args = await parseCliArgs(["--files", "a.ts", "lib/b.ts", "--quiet", "the request"]);

    expect(args.files).toEqual(["a.ts", "lib/b.ts"]);
    expect(args.quiet).toBe(true);
    expect(args.request).toBe("the request");
  });

  it("accepts a comma-separated --files value", async () => {
    expect((await parseCliArgs(["--files=a.ts,b.ts", "docs"])).files).toEqual(["a.ts", "b.ts"]);
  });

  it("keeps the last value of a repeated flag", async () => {
    expect((await parseCliArgs(["x", "-o", "first", "-o", "second"])).output).toBe("second");
  });

  it("leaves the request undefined when only flags are given", async () => {
    const args = await parseCliArgs(["--help"]);
    expect(args.request).toBeUndefined();
    expect(args.help).toBe(true);
  });
});
