// src/config.ts — Config Resolver
// Precedence: defaults ← config file ← environment ← CLI flags.
// API keys are read from the environment; one found in a config file is used but warned about.

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import { z } from "zod";
import {
  MIN_SUMMARY_BUDGET,
  ValidationError,
  type LLMProvider,
  type PublicConfig,
  type ResolvedConfig,
  type Warning,
} from "./types.js";

export const CONFIG_FILE_NAME = "docsmith.config.json";
const PACKAGE_JSON_KEY = "docsmith";

const PROVIDERS = ["anthropic", "openai", "azure-openai"] as const satisfies readonly LLMProvider[];

const PROVIDER_KEY_ENV: Record<LLMProvider, string> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  "azure-openai": "AZURE_OPENAI_API_KEY",
};

export interface ParsedArgs {
  /** Positional words joined into the request text. */
  request?: string;
  codeDir?: string;
  files?: string[];
  docType?: string;
  interactive: boolean;
  output?: string;
  config?: string;
  provider?: string;
  model?: string;
  maxConcurrency?: number;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export const DEFAULTS: ResolvedConfig = {
  llm: {
    provider: "anthropic",
    model: "claude-sonnet-4-20250514",
    apiVersion: "2024-06-01",
    maxOutputTokens: 4096,
    requestTimeoutMs: 120_000,
    retries: 0,
    retryDelayMs: 2000,
  },
  output: {
    dir: "outputs",
  },
  code: {
    exclude: [],
    summaryBudget: 12_000,
    maxFileBytes: 5 * 1024 * 1024,
  },
  maxConcurrency: 3,
  maxClarificationRounds: 3,
  verbose: false,
  quiet: false,
};

const LlmSchema = z.object({
  provider: z.enum(PROVIDERS),
  model: z.string().min(1),
  apiKey: z.string().min(1),
  endpoint: z.string().url(),
  deployment: z.string().min(1),
  apiVersion: z.string().min(1),
  maxOutputTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
  requestTimeoutMs: z.number().int().positive(),
  retries: z.number().int().min(0).max(5),
  retryDelayMs: z.number().int().min(0),
});

const OutputSchema = z.object({ dir: z.string().min(1) });

const CodeSchema = z.object({
  exclude: z.array(z.string()),
  summaryBudget: z.number().int().min(MIN_SUMMARY_BUDGET),
  maxFileBytes: z.number().int().positive(),
});

const ConfigFileSchema = z.object({
  llm: LlmSchema.partial().optional(),
  output: OutputSchema.partial().optional(),
  code: CodeSchema.partial().optional(),
  maxConcurrency: z.number().int().min(1).optional(),
  maxClarificationRounds: z.number().int().min(1).optional(),
});

// Same bounds as the config file; only the key, endpoint, deployment and temperature may be absent
const ResolvedConfigSchema = z.object({
  llm: LlmSchema.partial({ apiKey: true, endpoint: true, deployment: true, temperature: true }),
  output: OutputSchema,
  code: CodeSchema,
  maxConcurrency: z.number().int().min(1),
  maxClarificationRounds: z.number().int().min(1),
  verbose: z.boolean(),
  quiet: z.boolean(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ResolveOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Resolve config from CLI args, environment, config file, and defaults.
 * Bad CLI values throw ValidationError; bad file or environment values become warnings.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  options: ResolveOptions = {},
): ResolvedConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const file = loadConfigFile(args.config, cwd, warnings) ?? {};

  const provider =
    cliProvider(args.provider) ?? envProvider(env, warnings) ?? file.llm?.provider ?? DEFAULTS.llm.provider;

  const llm: ResolvedConfig["llm"] = {
    ...DEFAULTS.llm,
    ...file.llm,
    provider,
    model: args.model ?? env.DOCSMITH_MODEL ?? file.llm?.model ?? DEFAULTS.llm.model,
    endpoint: env.DOCSMITH_ENDPOINT ?? file.llm?.endpoint,
    deployment: env.DOCSMITH_DEPLOYMENT ?? file.llm?.deployment,
    maxOutputTokens:
      envNumber(env, "DOCSMITH_MAX_OUTPUT_TOKENS", warnings, (n) => Number.isInteger(n) && n > 0) ??
      file.llm?.maxOutputTokens ??
      DEFAULTS.llm.maxOutputTokens,
    temperature:
      envNumber(env, "DOCSMITH_TEMPERATURE", warnings, (n) => n >= 0 && n <= 2) ?? file.llm?.temperature,
    apiKey: env.DOCSMITH_API_KEY || env[PROVIDER_KEY_ENV[provider]] || file.llm?.apiKey,
  };

  let maxConcurrency = file.maxConcurrency ?? DEFAULTS.maxConcurrency;
  if (args.maxConcurrency !== undefined) {
    if (!Number.isInteger(args.maxConcurrency) || args.maxConcurrency < 1) {
      throw new ValidationError(`--max-concurrency must be a positive integer (got ${args.maxConcurrency})`);
    }
    maxConcurrency = args.maxConcurrency;
  }

  return {
    llm,
    output: {
      dir: args.output ?? env.DOCSMITH_OUTPUT_DIR ?? file.output?.dir ?? DEFAULTS.output.dir,
    },
    code: {
      ...DEFAULTS.code,
      ...file.code,
    },
    maxConcurrency,
    maxClarificationRounds: file.maxClarificationRounds ?? DEFAULTS.maxClarificationRounds,
    verbose: args.verbose,
    quiet: args.quiet,
  };
}

/**
 * Check a fully merged config, however it was built. Throws ValidationError
 * naming every out-of-range setting.
 */
export function validateResolvedConfig(config: ResolvedConfig): void {
  const parsed = ResolvedConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ValidationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
}

export function toPublicConfig(config: ResolvedConfig): PublicConfig {
  const { apiKey: _omitted, ...llm } = config.llm;
  return { ...config, llm };
}

function cliProvider(raw: string | undefined): LLMProvider | undefined {
  if (raw === undefined) return undefined;
  const provider = PROVIDERS.find((p) => p === raw);
  if (!provider) {
    throw new ValidationError(`Unknown provider "${raw}". Expected one of: ${PROVIDERS.join(", ")}`);
  }
  return provider;
}

function envProvider(env: NodeJS.ProcessEnv, warnings: Warning[]): LLMProvider | undefined {
  const raw = env.DOCSMITH_PROVIDER;
  if (!raw) return undefined;
  const provider = PROVIDERS.find((p) => p === raw);
  if (!provider) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Ignoring DOCSMITH_PROVIDER="${raw}"; expected one of: ${PROVIDERS.join(", ")}`,
    });
  }
  return provider;
}

function envNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  warnings: Warning[],
  valid: (n: number) => boolean,
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n) || !valid(n)) {
    warnings.push({ level: "warn", module: "config", message: `Ignoring invalid ${name}="${raw}"` });
    return undefined;
  }
  return n;
}

function loadConfigFile(
  configPath: string | undefined,
  cwd: string,
  warnings: Warning[],
): ConfigFile | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, readJson(absPath, warnings), warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILE_NAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, readJson(jsonConfig, warnings), warnings);
  }

  // "docsmith" key in package.json
  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    const pkg = readJson(pkgJson, warnings);
    if (pkg !== null && typeof pkg === "object" && PACKAGE_JSON_KEY in pkg) {
      return parseConfigFile(`${pkgJson}#${PACKAGE_JSON_KEY}`, pkg[PACKAGE_JSON_KEY], warnings);
    }
  }

  return null;
}

function readJson(filePath: string, warnings: Warning[]): unknown {
  try {
    return JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

function parseConfigFile(source: string, raw: unknown, warnings: Warning[]): ConfigFile | null {
  if (raw === null) return null;

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Ignoring invalid config file ${source}: ${issues}`,
    });
    return null;
  }

  if (parsed.data.llm?.apiKey) {
    warnings.push({
      level: "warn",
      module: "config",
      message:
        "API keys should not be stored in config files. Use the DOCSMITH_API_KEY environment variable instead.",
    });
  }

  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

// ─── CLI arguments ──────────────────────────────────────────────────────────

const FILE_FLAGS = new Set(["--files", "-f"]);

/**
 * `--files a b c` takes every following non-flag token; mri alone would keep only the first.
 */
function collectFileArgs(argv: string[]): { rest: string[]; files?: string[] } {
  const rest: string[] = [];
  let files: string[] | undefined;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const inline = /^--files=(.*)$/.exec(token);
    if (inline) {
      files = [...(files ?? []), ...inline[1].split(",").filter(Boolean)];
      continue;
    }
    if (!FILE_FLAGS.has(token)) {
      rest.push(token);
      continue;
    }
    files ??= [];
    while (i + 1 < argv.length && !argv[i + 1].startsWith("-")) {
      files.push(argv[++i]);
    }
  }
  return { rest, files };
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const { rest, files } = collectFileArgs(argv);
  const args = mri<Record<string, unknown>>(rest, {
    alias: { c: "code-dir", t: "doc-type", i: "interactive", o: "output", q: "quiet", v: "verbose", h: "help" },
    boolean: ["interactive", "quiet", "verbose", "help", "version"],
    string: ["code-dir", "doc-type", "output", "config", "provider", "model", "max-concurrency"],
  });

  const maxConcurrency = str(args["max-concurrency"]);
  const request = args._.join(" ").trim();

  return {
    request: request || undefined,
    codeDir: str(args["code-dir"]),
    files,
    docType: str(args["doc-type"]),
    interactive: args.interactive === true,
    output: str(args.output),
    config: str(args.config),
    provider: str(args.provider),
    model: str(args.model),
    maxConcurrency: maxConcurrency !== undefined ? Number(maxConcurrency) : undefined,
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    help: args.help === true,
    version: args.version === true,
  };
}

// mri yields an array when a flag repeats; the last value wins
function str(value: unknown): string | undefined {
  const v = Array.isArray(value) ? value[value.length - 1] : value;
  return typeof v === "string" && v !== "" ? v : undefined;
}
