#!/usr/bin/env node
// CLI entry point for docsmith

import { createInterface, type Interface } from "node:readline/promises";
import { parseCliArgs, resolveConfig } from "../config.js";
import { parseDocumentType } from "../document-types.js";
import { HttpRoleInvoker } from "../llm/client.js";
import { createLogger, logWarnings, type Logger } from "../logger.js";
import { runWorkflow, type ClarificationPrompter } from "../pipeline.js";
import {
  CancelledError,
  DOCUMENT_TYPES,
  DocsmithError,
  ENGINE_VERSION,
  describeFailure,
  type DocumentType,
  type ResolvedConfig,
  type Warning,
  type WorkflowResult,
} from "../types.js";

const HELP_TEXT = `
docsmith v${ENGINE_VERSION}

Usage:
  docsmith "<request>" [options]

Arguments:
  request                  What to document, in plain language
                           (e.g. "BRD and FRD for a retail banking app")

Options:
  --code-dir, -c <dir>     Scan a source directory for context
  --files, -f <paths...>   Use these source files for context (instead of --code-dir)
  --doc-type, -t <type>    Generate only this document: ${DOCUMENT_TYPES.join(", ")}
                           (aliases such as "functional" or "rest api" are accepted)
  --interactive, -i        Ask follow-up questions when the request is ambiguous
  --output, -o <dir>       Output directory (default: outputs)
  --config <path>          Path to config file (default: docsmith.config.json)
  --provider <name>        anthropic, openai or azure-openai
  --model <name>           Model (or Azure deployment) name
  --max-concurrency <n>    Documents drafted at once (default: 3)
  --quiet, -q              Errors only
  --verbose, -v            Print state transitions and timing
  --help, -h               Show this help text
  --version                Print the version

Environment Variables:
  DOCSMITH_API_KEY         Service API key (or ANTHROPIC_API_KEY / OPENAI_API_KEY /
                           AZURE_OPENAI_API_KEY for the selected provider)
  DOCSMITH_PROVIDER, DOCSMITH_ENDPOINT, DOCSMITH_MODEL, DOCSMITH_DEPLOYMENT,
  DOCSMITH_OUTPUT_DIR, DOCSMITH_MAX_OUTPUT_TOKENS, DOCSMITH_TEMPERATURE

Examples:
  docsmith "Create a BRD for an e-commerce checkout"
  docsmith "API documentation for this service" -c ./src -t api
  docsmith "Requirements for a clinic booking system" -i -o ./docs
`.trim();

async function main(): Promise<number> {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help) {
    process.stdout.write(HELP_TEXT + "\n");
    return 0;
  }
  if (args.version) {
    process.stdout.write(ENGINE_VERSION + "\n");
    return 0;
  }

  const logger = createLogger(args.quiet ? "quiet" : args.verbose ? "verbose" : "normal");

  if (!args.request) {
    logger.error("Missing request text. Run docsmith --help for usage.");
    return 1;
  }

  const warnings: Warning[] = [];
  let config: ResolvedConfig;
  let forcedDocumentType: DocumentType | undefined;
  try {
    config = resolveConfig(args, warnings);
    forcedDocumentType = args.docType ? parseDocumentType(args.docType) : undefined;
  } catch (err) {
    if (err instanceof DocsmithError) {
      logger.error(describeFailure(err));
      return 1;
    }
    throw err;
  }
  logWarnings(logger, warnings);
  logger.debug(`Provider: ${config.llm.provider}, model: ${config.llm.model}, output: ${config.output.dir}`);

  const controller = new AbortController();
  const onInterrupt = () => {
    if (controller.signal.aborted) return;
    logger.warn("cli", "Interrupted; cancelling run (completed steps stay in the run log)");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  const rl = args.interactive ? createInterface({ input: process.stdin, output: process.stderr }) : undefined;
  rl?.on("SIGINT", onInterrupt);

  try {
    const result = await runWorkflow(
      {
        text: args.request,
        codeDirectory: args.codeDir,
        codeFiles: args.files,
        forcedDocumentType,
        interactive: args.interactive,
      },
      {
        config,
        invoker: new HttpRoleInvoker(config.llm),
        prompter: rl ? readlinePrompter(rl, controller.signal) : undefined,
        logger,
        signal: controller.signal,
      },
    );
    report(result, logger);
    return result.state === "Persisted" ? 0 : 1;
  } finally {
    rl?.close();
    process.removeListener("SIGINT", onInterrupt);
  }
}

function readlinePrompter(rl: Interface, signal: AbortSignal): ClarificationPrompter {
  return {
    async ask(questions, round) {
      const lines = [``, `Clarification needed (round ${round}):`];
      questions.forEach((q, i) => lines.push(`  ${i + 1}. ${q}`));
      lines.push(`Answer below, or type "proceed" to continue with defaults.`);
      process.stderr.write(lines.join("\n") + "\n");
      try {
        return await rl.question("> ", { signal });
      } catch (err) {
        if (signal.aborted) throw new CancelledError();
        throw err;
      }
    },
  };
}

function report(result: WorkflowResult, logger: Logger): void {
  if (result.state === "Failed") {
    if (result.paths) logger.info(`Run log: ${result.paths.runLog}`);
    return;
  }

  for (const doc of result.package?.documents ?? []) {
    const path = result.paths?.documents[doc.documentType];
    const quality = doc.metadata.quality;
    logger.info(`Written ${doc.documentType}: ${path ?? "(not written)"}`);
    if (quality) {
      logger.debug(
        `  ${quality.wordCount} words, confidence ${quality.confidence}, completeness ${quality.completenessScore.toFixed(2)}` +
          (quality.issues.length > 0 ? ` (${quality.issues.join("; ")})` : ""),
      );
    }
  }
  if (result.paths?.summary) logger.info(`Written summary: ${result.paths.summary}`);
  if (result.paths) logger.info(`Run log: ${result.paths.runLog}`);

  if (result.status === "degraded") {
    for (const f of result.package?.failures ?? []) {
      logger.warn("cli", `${f.documentType} not generated: [${f.kind}] ${f.message} — hint: ${f.hint}`);
    }
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    process.stderr.write(`[error] ${describeFailure(err)}\n`);
    process.exit(1);
  },
);
