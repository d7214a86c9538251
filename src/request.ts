// src/request.ts — Request acceptance
// Everything here is synchronous and runs before any service call.

import { existsSync, statSync } from "node:fs";
import { dirname, resolve, sep } from "node:path";
import { discoverFiles } from "./file-discovery.js";
import { isDocumentType } from "./document-types.js";
import { detectStack } from "./stack-detector.js";
import {
  ValidationError,
  type AcceptedRequest,
  type DocumentRequest,
  type Warning,
} from "./types.js";

export interface AcceptOptions {
  exclude?: string[];
  warnings?: Warning[];
  now?: () => Date;
}

/**
 * Validate a request and build its code inventory.
 * Throws ValidationError on bad input; never touches the network.
 */
export function acceptRequest(
  request: DocumentRequest,
  options: AcceptOptions = {},
): AcceptedRequest {
  const { exclude = [], warnings = [], now = () => new Date() } = options;

  if (!request.text || !request.text.trim()) {
    throw new ValidationError("Request text is empty");
  }
  if (request.codeDirectory && request.codeFiles) {
    throw new ValidationError("Use either a code directory or an explicit file list, not both");
  }
  if (request.forcedDocumentType !== undefined && !isDocumentType(request.forcedDocumentType)) {
    throw new ValidationError(`Unknown document type "${String(request.forcedDocumentType)}"`);
  }

  let codeInventory: string[] = [];
  let codeRoot: string | undefined;

  if (request.codeFiles) {
    codeInventory = acceptFileList(request.codeFiles);
    codeRoot = commonDirectory(codeInventory);
  } else if (request.codeDirectory) {
    codeRoot = resolve(request.codeDirectory);
    codeInventory = acceptDirectory(codeRoot, exclude, warnings);
  }

  const frozen: Readonly<DocumentRequest> = Object.freeze({
    ...request,
    text: request.text.trim(),
    codeFiles: request.codeFiles ? [...request.codeFiles] : undefined,
  });

  return Object.freeze({
    request: frozen,
    codeInventory: Object.freeze(codeInventory),
    codeRoot,
    detectedStack:
      codeInventory.length > 0
        ? detectStack(request.codeDirectory ? codeRoot : undefined, codeInventory, warnings)
        : undefined,
    acceptedAt: now(),
  });
}

function acceptFileList(files: string[]): string[] {
  if (files.length === 0) {
    throw new ValidationError("--files specified but no files provided");
  }

  const missing: string[] = [];
  const notFiles: string[] = [];
  const resolved = new Set<string>();

  for (const f of files) {
    const abs = resolve(f);
    if (!existsSync(abs)) {
      missing.push(f);
    } else if (!statSync(abs).isFile()) {
      notFiles.push(f);
    } else {
      resolved.add(abs);
    }
  }

  if (missing.length > 0) {
    throw new ValidationError(`Files not found: ${missing.join(", ")}`);
  }
  if (notFiles.length > 0) {
    throw new ValidationError(`Not regular files: ${notFiles.join(", ")}`);
  }

  return [...resolved].sort();
}

function acceptDirectory(dir: string, exclude: string[], warnings: Warning[]): string[] {
  if (!existsSync(dir)) {
    throw new ValidationError(`Code directory not found: ${dir}`);
  }
  if (!statSync(dir).isDirectory()) {
    throw new ValidationError(`Code path is not a directory: ${dir}`);
  }

  const files = discoverFiles(dir, exclude, warnings);
  if (files.length === 0) {
    throw new ValidationError(`No source files found in ${dir}`);
  }
  return files;
}

/**
 * Deepest directory containing every path.
 */
export function commonDirectory(paths: readonly string[]): string {
  if (paths.length === 0) return process.cwd();

  let common = dirname(paths[0]).split(sep);
  for (const p of paths.slice(1)) {
    const parts = dirname(p).split(sep);
    let i = 0;
    while (i < common.length && i < parts.length && common[i] === parts[i]) i++;
    common = common.slice(0, i);
  }
  return common.join(sep) || sep;
}
