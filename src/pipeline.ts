// src/pipeline.ts — Workflow Orchestrator
// Accepted → ExtractingRequirements → (ClarificationPending) → Drafting → Finalizing → Persisted,
// with Failed reachable from every non-terminal state.

import pLimit from "p-limit";
import { acceptRequest } from "./request.js";
import { summarizeCode, type CodeSummary } from "./code-summarizer.js";
import { extractRequirements } from "./requirement-extractor.js";
import { draftDocument } from "./document-drafter.js";
import { annotateSecurity, isSecurityReviewEligible } from "./security-annotator.js";
import { finalizePackage, type DocumentOutcome } from "./finalizer.js";
import { formatRunTimestamp, runLogPath, writePackage } from "./output-writer.js";
import { RunLog } from "./run-log.js";
import { RoleRegistry } from "./llm/role-registry.js";
import type { RoleInvoker } from "./llm/client.js";
import { toPublicConfig, validateResolvedConfig } from "./config.js";
import { logWarnings, silentLogger, type Logger } from "./logger.js";
import {
  CancelledError,
  ClarificationTimeoutError,
  DEFAULT_DOCUMENT_TYPES,
  DocsmithError,
  ENGINE_VERSION,
  describeFailure,
  type AcceptedRequest,
  type DocumentRequest,
  type DocumentType,
  type PackageResult,
  type RequirementSet,
  type ResolvedConfig,
  type Warning,
  type WorkflowResult,
  type WorkflowState,
} from "./types.js";

export interface ClarificationPrompter {
  /** Show the open questions and return the requester's answer. */
  ask(questions: readonly string[], round: number): Promise<string>;
}

export interface WorkflowDeps {
  config: ResolvedConfig;
  invoker: RoleInvoker;
  prompter?: ClarificationPrompter;
  logger?: Logger;
  signal?: AbortSignal;
  clock?: () => Date;
  /** Collects non-fatal warnings (file discovery, ...). */
  warnings?: Warning[];
}

const PROCEED_ANSWER = /^(proceed|continue|skip)$/i;

/**
 * Run one request end to end. Run-level failures come back as a `Failed`
 * result; only programming and filesystem errors are thrown.
 */
export async function runWorkflow(
  request: DocumentRequest,
  deps: WorkflowDeps,
): Promise<WorkflowResult> {
  const { config, invoker, prompter, signal } = deps;
  const logger = deps.logger ?? silentLogger;
  const clock = deps.clock ?? (() => new Date());
  const warnings = deps.warnings ?? [];

  const stamp = formatRunTimestamp(clock());
  const runLog = new RunLog(clock);
  const stateHistory: WorkflowState[] = [];
  const registry = new RoleRegistry(invoker, {
    maxOutputTokens: config.llm.maxOutputTokens,
    temperature: config.llm.temperature,
  });
  const runStart = performance.now();

  const enter = (state: WorkflowState) => {
    stateHistory.push(state);
    runLog.record("state", "info", state);
    logger.debug(`State: ${state} (+${Math.round(performance.now() - runStart)}ms)`);
  };

  let requirements: RequirementSet | undefined;
  let pkg: PackageResult | undefined;
  const logFile = runLogPath(config.output.dir, stamp);

  try {
    await runLog.attach(
      logFile,
      `docsmith ${ENGINE_VERSION} run ${stamp}\nconfig: ${JSON.stringify(toPublicConfig(config))}\n\n`,
    );

    // ─── Accepted ───────────────────────────────────────────────────────────
    validateResolvedConfig(config);
    const accepted = acceptRequest(request, {
      exclude: config.code.exclude,
      warnings,
      now: clock,
    });
    enter("Accepted");
    runLog.record(
      "accept",
      "ok",
      `request=${accepted.request.text.length} chars, code files=${accepted.codeInventory.length}` +
        (request.forcedDocumentType ? `, forced type=${request.forcedDocumentType}` : ""),
    );
    for (const w of warnings) runLog.record(`warning:${w.module}`, "info", w.message);
    logWarnings(logger, warnings);
    registry.initialize();

    // ─── ExtractingRequirements ─────────────────────────────────────────────
    throwIfCancelled(signal);
    enter("ExtractingRequirements");
    logger.info("Analyzing requirements...");
    const analyst = registry.getOrCreate("requirement-analyst");
    const [extracted, codeSummary] = await Promise.all([
      extractRequirements(accepted, analyst, { runLog, signal }),
      summarizeInventory(accepted, config, runLog, logger),
    ]);
    requirements = extracted;

    // ─── ClarificationPending ───────────────────────────────────────────────
    const answers: string[] = [];
    let rounds = 0;
    while (requirements.clarificationNeeded) {
      if (!request.interactive || !prompter) {
        runLog.record("clarification", "info", "Clarification needed but not interactive; proceeding with defaults");
        break;
      }
      if (rounds >= config.maxClarificationRounds) {
        throw new ClarificationTimeoutError(rounds, requirements.openQuestions);
      }

      enter("ClarificationPending");
      const answer = (await prompter.ask(requirements.openQuestions, rounds + 1)).trim();
      rounds++;
      throwIfCancelled(signal);

      if (answer === "") {
        runLog.record(`clarification:${rounds}`, "info", "Empty answer; asking again");
        continue;
      }
      if (PROCEED_ANSWER.test(answer)) {
        runLog.record(`clarification:${rounds}`, "info", "Proceeding with defaults at the requester's choice");
        break;
      }

      answers.push(answer);
      runLog.record(`clarification:${rounds}`, "info", `Answer: ${answer}`);
      enter("ExtractingRequirements");
      requirements = await extractRequirements(accepted, analyst, { answers, runLog, signal });
    }

    // ─── Drafting ───────────────────────────────────────────────────────────
    throwIfCancelled(signal);
    const targets = resolveTargets(request.forcedDocumentType, requirements);
    enter("Drafting");
    runLog.record("targets", "info", targets.join(", "));
    logger.info(`Drafting ${targets.length} document(s): ${targets.join(", ")}`);

    const shared = requirements;
    const writer = registry.getOrCreate("technical-writer");
    const reviewer = registry.getOrCreate("security-reviewer");
    const limit = pLimit(config.maxConcurrency);
    const errors = new Map<DocumentType, DocsmithError>();

    const runTask = async (type: DocumentType): Promise<DocumentOutcome> => {
      try {
        if (signal?.aborted) {
          runLog.record(`draft:${type}`, "skipped", "Run cancelled before this document started");
          throw new CancelledError();
        }
        let draft = await draftDocument(type, shared, writer, {
          requestText: accepted.request.text,
          codeSummary: codeSummary?.text,
          runLog,
          signal,
          clock,
        });
        if (isSecurityReviewEligible(type, shared.domainHint)) {
          draft = await annotateSecurity(draft, shared, reviewer, { runLog, signal });
        } else {
          runLog.record(`security-review:${type}`, "skipped", "Not eligible for security review");
        }
        logger.debug(`${type} done (+${Math.round(performance.now() - runStart)}ms)`);
        return { ok: true, draft };
      } catch (err) {
        if (!(err instanceof DocsmithError)) throw err;
        errors.set(type, err);
        logger.warn("pipeline", `${type} failed: ${describeFailure(err)}`);
        return {
          ok: false,
          failure: { documentType: type, kind: err.kind, message: err.message, hint: err.hint },
        };
      }
    };

    const outcomes = await Promise.all(targets.map((type) => limit(() => runTask(type))));

    const firstError = targets.map((t) => errors.get(t)).find((e) => e !== undefined);
    const fatal = firstError && (request.forcedDocumentType !== undefined || errors.size === targets.length);
    if (signal?.aborted || fatal) {
      // Keep what was drafted so library callers can still see it
      pkg = {
        documents: outcomes.flatMap((o) => (o.ok ? [o.draft] : [])),
        failures: outcomes.flatMap((o) => (o.ok ? [] : [o.failure])),
      };
      throwIfCancelled(signal);
      if (firstError) throw firstError;
    }

    // ─── Finalizing ─────────────────────────────────────────────────────────
    enter("Finalizing");
    pkg = await finalizePackage(targets, outcomes, shared, registry.getOrCreate("package-editor"), {
      requestText: accepted.request.text,
      runLog,
      logger,
      signal,
    });
    throwIfCancelled(signal);

    // ─── Persisted ──────────────────────────────────────────────────────────
    const written = await writePackage(pkg, config.output.dir, stamp);
    const status = pkg.failures.length > 0 ? "degraded" : "success";
    runLog.record(
      "persist",
      "ok",
      [...Object.values(written.documents), ...(written.summary ? [written.summary] : [])].join(", "),
    );
    enter("Persisted");
    await runLog.close(status);
    logger.debug(`Total run time: ${Math.round(performance.now() - runStart)}ms`);

    return {
      state: "Persisted",
      status,
      stateHistory,
      requirements,
      package: pkg,
      paths: { ...written, runLog: logFile },
      runLog: [...runLog.entries],
    };
  } catch (err) {
    if (!(err instanceof DocsmithError)) {
      if (!runLog.isClosed) {
        runLog.record("workflow", "failed", describeFailure(err));
        await runLog.close("failed: internal error").catch((closeErr: unknown) => {
          logger.error(`Could not write run log: ${closeErr instanceof Error ? closeErr.message : String(closeErr)}`);
        });
      }
      throw err;
    }

    stateHistory.push("Failed");
    runLog.record("workflow", "failed", describeFailure(err));
    logger.error(describeFailure(err));
    await runLog.close(`failed: ${err.kind}`);

    return {
      state: "Failed",
      status: "failed",
      stateHistory,
      requirements,
      package: pkg,
      paths: { documents: {}, runLog: logFile },
      error: err,
      runLog: [...runLog.entries],
    };
  } finally {
    registry.dispose();
  }
}

/**
 * Forced type, else the recommended types, else the default set.
 */
export function resolveTargets(
  forced: DocumentType | undefined,
  requirements: RequirementSet,
): DocumentType[] {
  if (forced) return [forced];
  if (requirements.recommendedDocumentTypes.length > 0) return [...requirements.recommendedDocumentTypes];
  return [...DEFAULT_DOCUMENT_TYPES];
}

async function summarizeInventory(
  accepted: AcceptedRequest,
  config: ResolvedConfig,
  runLog: RunLog,
  logger: Logger,
): Promise<CodeSummary | undefined> {
  if (accepted.codeInventory.length === 0) {
    runLog.record("summarize-code", "skipped", "No code given");
    return undefined;
  }

  const started = runLog.now();
  try {
    const summary = await summarizeCode(accepted.codeInventory, accepted.codeRoot ?? process.cwd(), {
      budget: config.code.summaryBudget,
      maxFileBytes: config.code.maxFileBytes,
    });
    const detail =
      `${summary.includedFiles.length} of ${accepted.codeInventory.length} files, ${summary.text.length} chars` +
      (summary.truncated ? " (truncated)" : "");
    runLog.record("summarize-code", "ok", detail, started);
    logger.debug(`Code summary: ${detail}`);
    return Object.freeze(summary);
  } catch (err) {
    runLog.record("summarize-code", "failed", describeFailure(err), started);
    throw err;
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new CancelledError();
}
