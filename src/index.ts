// src/index.ts — Library API
// One entry point: generate(). Lower-level pieces are re-exported for callers that compose their own run.

import type { DocumentRequest, ResolvedConfig, WorkflowResult } from "./types.js";
import { DEFAULTS } from "./config.js";
import { HttpRoleInvoker, type RoleInvoker } from "./llm/client.js";
import { runWorkflow, type ClarificationPrompter } from "./pipeline.js";
import type { Logger } from "./logger.js";

// Re-export all public types
export type {
  DocumentType,
  DomainHint,
  DocumentRequest,
  AcceptedRequest,
  DetectedStack,
  RequirementSet,
  DraftDocument,
  DocumentFailure,
  GenerationMetadata,
  QualityAssessment,
  PackageResult,
  PersistedPaths,
  RunLogRecord,
  StepStatus,
  WorkflowState,
  WorkflowResult,
  ResolvedConfig,
  PublicConfig,
  LLMProvider,
  FailureKind,
  UpstreamErrorKind,
  Warning,
} from "./types.js";
export type { RoleInvoker, RoleInvocation, InvocationResult } from "./llm/client.js";
export type { ClarificationPrompter, WorkflowDeps } from "./pipeline.js";
export type { Logger, LogLevel } from "./logger.js";
export type { RoleName, RoleDefinition } from "./templates/roles.js";

export {
  DOCUMENT_TYPES,
  DOCUMENT_TITLES,
  ENGINE_VERSION,
  DocsmithError,
  ValidationError,
  ClarificationTimeoutError,
  CancelledError,
  UpstreamError,
  describeFailure,
  remediationHint,
} from "./types.js";
export { runWorkflow, resolveTargets } from "./pipeline.js";
export { HttpRoleInvoker } from "./llm/client.js";
export { Role, RoleRegistry } from "./llm/role-registry.js";
export { resolveConfig, toPublicConfig, validateResolvedConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export { acceptRequest } from "./request.js";
export { detectStack } from "./stack-detector.js";
export { summarizeCode } from "./code-summarizer.js";
export { extractRequirements } from "./requirement-extractor.js";
export { draftDocument } from "./document-drafter.js";
export { annotateSecurity, isSecurityReviewEligible } from "./security-annotator.js";
export { normalizeMarkdown, finalizePackage } from "./finalizer.js";
export { assessDocumentQuality } from "./output-validator.js";
export { normalizeDocumentType, parseDocumentType } from "./document-types.js";

export interface GenerateOptions {
  /** Partial overrides merged over the built-in defaults, one level deep. */
  config?: {
    [K in keyof ResolvedConfig]?: ResolvedConfig[K] extends object ? Partial<ResolvedConfig[K]> : ResolvedConfig[K];
  };
  /** Defaults to an HTTP invoker built from `config.llm`. */
  invoker?: RoleInvoker;
  prompter?: ClarificationPrompter;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Generate a documentation package for one request and persist it.
 * Never throws for run-level failures; inspect `result.state`.
 */
export async function generate(
  request: DocumentRequest,
  options: GenerateOptions = {},
): Promise<WorkflowResult> {
  const overrides = options.config ?? {};
  const config: ResolvedConfig = {
    ...DEFAULTS,
    ...overrides,
    llm: { ...DEFAULTS.llm, ...overrides.llm },
    output: { ...DEFAULTS.output, ...overrides.output },
    code: { ...DEFAULTS.code, ...overrides.code },
  };

  return runWorkflow(request, {
    config,
    invoker: options.invoker ?? new HttpRoleInvoker(config.llm),
    prompter: options.prompter,
    logger: options.logger,
    signal: options.signal,
  });
}
