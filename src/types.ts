// src/types.ts — ALL shared types for the document-generation workflow

// ─── Document types ─────────────────────────────────────────────────────────

export const DOCUMENT_TYPES = ["BRD", "FRD", "NFRD", "CLOUD", "SECURITY", "API"] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export const DOCUMENT_TITLES: Record<DocumentType, string> = {
  BRD: "Business Requirements Document",
  FRD: "Functional Requirements Document",
  NFRD: "Non-Functional Requirements Document",
  CLOUD: "Cloud Implementation Guide",
  SECURITY: "Security & Compliance Document",
  API: "API Documentation",
};

export const DOMAIN_HINTS = [
  "e-commerce",
  "trading",
  "banking",
  "healthcare",
  "crm",
  "api",
  "mobile",
  "web",
] as const;

export type DomainHint = (typeof DOMAIN_HINTS)[number];

// Security review eligibility: a fixed rule, never inferred from request text
export const SECURITY_SENSITIVE_TYPES: readonly DocumentType[] = ["SECURITY"];
export const REGULATED_DOMAINS: readonly DomainHint[] = ["banking", "healthcare", "trading"];
export const REGULATED_DOMAIN_TYPES: readonly DocumentType[] = ["FRD"];

// Used when clarification is skipped and nothing was recommended
export const DEFAULT_DOCUMENT_TYPES: readonly DocumentType[] = ["BRD"];

// ─── Request ────────────────────────────────────────────────────────────────

export interface DocumentRequest {
  text: string;
  codeDirectory?: string;
  codeFiles?: string[];
  forcedDocumentType?: DocumentType;
  interactive: boolean;
}

export interface AcceptedRequest {
  readonly request: Readonly<DocumentRequest>;
  /** Absolute file paths, lexicographically sorted. Empty when no code was given. */
  readonly codeInventory: readonly string[];
  /** Directory the inventory is reported relative to. */
  readonly codeRoot?: string;
  /** Present when code was given. */
  readonly detectedStack?: DetectedStack;
  readonly acceptedAt: Date;
}

export interface DetectedStack {
  /** From marker files at the top of the code directory (package.json, Dockerfile, ...). */
  readonly technologies: readonly string[];
  /** From the inventory's file extensions. */
  readonly languages: readonly string[];
  readonly suggestedDocumentTypes: readonly DocumentType[];
}

// ─── Requirements ───────────────────────────────────────────────────────────

export interface RequirementSet {
  readonly extractedFeatures: readonly string[];
  readonly domainHint: DomainHint | null;
  readonly recommendedDocumentTypes: readonly DocumentType[];
  readonly clarificationNeeded: boolean;
  readonly openQuestions: readonly string[];
}

// ─── Documents ──────────────────────────────────────────────────────────────

export interface QualityAssessment {
  confidence: "high" | "medium" | "low";
  wordCount: number;
  hasSections: boolean;
  completenessScore: number;
  issues: string[];
}

export interface GenerationMetadata {
  startedAt: string;
  completedAt: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  quality?: QualityAssessment;
}

export interface DraftDocument {
  readonly documentType: DocumentType;
  readonly body: string;
  readonly metadata: GenerationMetadata;
  readonly securityReviewed: boolean;
}

export interface DocumentFailure {
  documentType: DocumentType;
  kind: FailureKind;
  message: string;
  hint: string;
}

export interface PackageResult {
  documents: DraftDocument[];
  failures: DocumentFailure[];
  /** Present only when more than one document was generated. */
  summary?: string;
}

// ─── Run log ────────────────────────────────────────────────────────────────

export type StepStatus = "ok" | "failed" | "skipped" | "info";

export interface RunLogRecord {
  step: string;
  startedAt: string;
  endedAt: string;
  status: StepStatus;
  detail: string;
}

// ─── Workflow ───────────────────────────────────────────────────────────────

export type WorkflowState =
  | "Accepted"
  | "ExtractingRequirements"
  | "ClarificationPending"
  | "Drafting"
  | "Finalizing"
  | "Persisted"
  | "Failed";

export interface PersistedPaths {
  documents: Partial<Record<DocumentType, string>>;
  summary?: string;
  runLog: string;
}

export interface WorkflowResult {
  state: "Persisted" | "Failed";
  /** "degraded" when at least one, but not every, document type failed. */
  status: "success" | "degraded" | "failed";
  stateHistory: WorkflowState[];
  requirements?: RequirementSet;
  package?: PackageResult;
  paths?: PersistedPaths;
  error?: DocsmithError;
  runLog: RunLogRecord[];
}

// ─── Config ─────────────────────────────────────────────────────────────────

export type LLMProvider = "anthropic" | "openai" | "azure-openai";

export interface ResolvedConfig {
  llm: {
    provider: LLMProvider;
    model: string;
    apiKey?: string;
    endpoint?: string;
    /** Azure deployment name; falls back to model. */
    deployment?: string;
    apiVersion: string;
    maxOutputTokens: number;
    /** Overrides every role's own temperature when set. */
    temperature?: number;
    requestTimeoutMs: number;
    retries: number;
    retryDelayMs: number;
  };
  output: {
    dir: string;
  };
  code: {
    exclude: string[];
    summaryBudget: number;
    maxFileBytes: number;
  };
  maxConcurrency: number;
  maxClarificationRounds: number;
  verbose: boolean;
  quiet: boolean;
}

// The API key never leaves the process in logs or files
export type PublicConfig = Omit<ResolvedConfig, "llm"> & {
  llm: Omit<ResolvedConfig["llm"], "apiKey">;
};

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Errors ─────────────────────────────────────────────────────────────────

export type UpstreamErrorKind =
  | "AuthError"
  | "RateLimited"
  | "ModelUnavailable"
  | "Timeout"
  | "MalformedResponse";

export type FailureKind =
  | "ValidationError"
  | "ClarificationTimeout"
  | "Cancelled"
  | UpstreamErrorKind;

const REMEDIATION_HINTS: Record<FailureKind, string> = {
  ValidationError: "check the request text, paths and --doc-type value (see --help)",
  ClarificationTimeout: "rerun with a more specific request or answer 'proceed' to use defaults",
  Cancelled: "rerun the request; completed steps are recorded in the run log",
  AuthError: "check DOCSMITH_API_KEY and the endpoint/deployment settings",
  RateLimited: "check service quota, wait and retry, or lower --max-concurrency",
  ModelUnavailable: "check the model or deployment name and the service status",
  Timeout: "retry later or raise llm.requestTimeoutMs in the config file",
  MalformedResponse: "retry; if it persists try a different model",
};

export function remediationHint(kind: FailureKind): string {
  return REMEDIATION_HINTS[kind];
}

export abstract class DocsmithError extends Error {
  abstract readonly kind: FailureKind;

  get hint(): string {
    return remediationHint(this.kind);
  }
}

export class ValidationError extends DocsmithError {
  readonly kind = "ValidationError";

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ClarificationTimeoutError extends DocsmithError {
  readonly kind = "ClarificationTimeout";

  constructor(
    public readonly rounds: number,
    public readonly openQuestions: readonly string[],
  ) {
    super(`Requirements still ambiguous after ${rounds} clarification round(s)`);
    this.name = "ClarificationTimeoutError";
  }
}

export class CancelledError extends DocsmithError {
  readonly kind = "Cancelled";

  constructor(message = "Run cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export class UpstreamError extends DocsmithError {
  constructor(
    public readonly kind: UpstreamErrorKind,
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = "UpstreamError";
  }
}

/**
 * One-line, classified description of a failure for console and run log.
 */
export function describeFailure(err: unknown): string {
  if (err instanceof DocsmithError) {
    return `[${err.kind}] ${err.message} — hint: ${err.hint}`;
  }
  const msg = err instanceof Error ? err.message : String(err);
  return `[Internal] ${msg}`;
}

// ─── Constants ──────────────────────────────────────────────────────────────

export const ENGINE_VERSION = "0.1.0";

export const DEFAULT_EXCLUDE_DIRS = [
  "node_modules",
  "dist",
  "build",
  "out",
  "coverage",
  ".git",
  ".venv",
  "venv",
  "__pycache__",
  "target",
  "bin",
  "obj",
  "vendor",
] as const;

export const SOURCE_EXTENSIONS = /\.(py|java|js|jsx|mjs|cjs|ts|tsx|cs|cpp|c|h|go|rs)$/;
export const DTS_EXTENSION = /\.d\.(ts|tsx|mts|cts)$/;

export const MIN_SUMMARY_BUDGET = 200;
