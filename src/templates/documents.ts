import type { DocumentType } from "../types.js";

export interface DocumentTemplate {
  /** Ordered section headings the draft should carry. */
  sections: string[];
  formatInstructions: string;
}

export const brdTemplate: DocumentTemplate = {
  sections: [
    "Executive Summary",
    "Business Objectives",
    "Stakeholders",
    "Scope (In / Out)",
    "Business Requirements",
    "Assumptions and Constraints",
    "Success Criteria and KPIs",
    "Risks",
  ],
  formatInstructions: `Write a Business Requirements Document. Audience: business sponsors and product owners.
Number every business requirement (BR-1, BR-2, ...) in a table with columns ID, Requirement, Priority (Must/Should/Could), Rationale.
Keep implementation detail out; describe outcomes, not technology.`,
};

export const frdTemplate: DocumentTemplate = {
  sections: [
    "Introduction",
    "System Overview",
    "User Roles",
    "Functional Requirements",
    "Use Cases",
    "Data Requirements",
    "Interfaces",
    "Acceptance Criteria",
  ],
  formatInstructions: `Write a Functional Requirements Document. Audience: engineers, testers and product owners.
Number every functional requirement (FR-1, FR-2, ...) in a table with columns ID, Requirement, Actor, Priority.
Give each main use case a short flow (preconditions, main steps, alternate steps, postconditions).
Acceptance criteria must be testable statements.`,
};

export const nfrdTemplate: DocumentTemplate = {
  sections: [
    "Introduction",
    "Performance",
    "Scalability",
    "Availability and Reliability",
    "Security",
    "Usability and Accessibility",
    "Maintainability",
    "Compliance",
    "Monitoring and Observability",
  ],
  formatInstructions: `Write a Non-Functional Requirements Document. Audience: architects and operations.
Number every requirement (NFR-1, NFR-2, ...) and give each a measurable target (latency percentiles, throughput, uptime, recovery objectives).`,
};

export const cloudTemplate: DocumentTemplate = {
  sections: [
    "Overview",
    "Target Architecture",
    "Environments",
    "Compute, Storage and Networking",
    "Deployment Pipeline",
    "Scaling Strategy",
    "Backup and Disaster Recovery",
    "Cost Considerations",
    "Operational Runbook",
  ],
  formatInstructions: `Write a Cloud Implementation Guide. Audience: platform and DevOps engineers.
Stay provider-neutral unless the request names a cloud provider; when it does, use that provider's service names.
Describe the deployment pipeline as ordered stages.`,
};

export const securityTemplate: DocumentTemplate = {
  sections: [
    "Overview",
    "Assets and Data Classification",
    "Threat Model",
    "Authentication and Authorization",
    "Data Protection",
    "Logging and Auditing",
    "Regulatory Compliance",
    "Incident Response",
    "Security Requirements",
  ],
  formatInstructions: `Write a Security & Compliance Document. Audience: security officers and auditors.
Number every security requirement (SEC-1, SEC-2, ...) and map each to the threat or regulation it addresses.`,
};

export const apiTemplate: DocumentTemplate = {
  sections: [
    "Overview",
    "Authentication",
    "Conventions",
    "Endpoints",
    "Data Models",
    "Errors",
    "Rate Limits",
    "Versioning",
  ],
  formatInstructions: `Write API Documentation. Audience: client developers.
For each endpoint give method, path, description, request parameters, an example request body and an example response in fenced JSON blocks.
When a code structure is supplied, derive endpoints and models from it.`,
};

export const DOCUMENT_TEMPLATES: Record<DocumentType, DocumentTemplate> = {
  BRD: brdTemplate,
  FRD: frdTemplate,
  NFRD: nfrdTemplate,
  CLOUD: cloudTemplate,
  SECURITY: securityTemplate,
  API: apiTemplate,
};
