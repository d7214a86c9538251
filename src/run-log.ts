// src/run-log.ts — Append-only audit log of workflow steps
// Records are kept in memory and, once a file is attached, appended to it as they arrive.

import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { RunLogRecord, StepStatus } from "./types.js";

const MAX_DETAIL = 1000;

export class RunLog {
  private readonly records: RunLogRecord[] = [];
  private filePath: string | undefined;
  private writes: Promise<void> = Promise.resolve();
  private writeError: unknown;
  private closed = false;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  get entries(): readonly RunLogRecord[] {
    return this.records;
  }

  get path(): string | undefined {
    return this.filePath;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  now(): Date {
    return this.clock();
  }

  /**
   * Append one record. `startedAt` defaults to now for instantaneous steps.
   */
  record(step: string, status: StepStatus, detail: string, startedAt?: Date): RunLogRecord {
    if (this.closed) {
      throw new Error(`Run log is closed; cannot record step "${step}"`);
    }
    const end = this.clock();
    const entry: RunLogRecord = Object.freeze({
      step,
      startedAt: (startedAt ?? end).toISOString(),
      endedAt: end.toISOString(),
      status,
      detail: truncate(detail),
    });
    this.records.push(entry);
    this.enqueue(formatRecord(entry));
    return entry;
  }

  /**
   * Write the header and every record so far to `filePath`, then keep appending.
   */
  attach(filePath: string, header: string): Promise<void> {
    if (this.filePath) {
      throw new Error(`Run log already attached to ${this.filePath}`);
    }
    this.filePath = filePath;
    const existing = this.records.map(formatRecord).join("");
    this.writes = this.writes.then(async () => {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, header + existing, "utf-8");
    });
    return this.flush();
  }

  /**
   * Write the outcome line and wait for every pending append.
   */
  async close(outcome: string): Promise<void> {
    if (this.closed) return this.flush();
    this.closed = true;
    this.enqueue(`--- outcome: ${outcome} ---\n`);
    return this.flush();
  }

  async flush(): Promise<void> {
    await this.writes;
    if (this.writeError !== undefined) {
      const err = this.writeError;
      this.writeError = undefined;
      throw err;
    }
  }

  private enqueue(text: string): void {
    const filePath = this.filePath;
    if (!filePath) return;
    this.writes = this.writes
      .then(() => appendFile(filePath, text, "utf-8"))
      .catch((err: unknown) => {
        this.writeError ??= err;
      });
  }
}

export function formatRecord(r: RunLogRecord): string {
  const ms = Date.parse(r.endedAt) - Date.parse(r.startedAt);
  const detail = r.detail ? `: ${r.detail.replace(/\n/g, "\n    ")}` : "";
  return `${r.startedAt} ${r.status.toUpperCase().padEnd(7)} ${r.step} (${ms}ms)${detail}\n`;
}

function truncate(detail: string): string {
  return detail.length > MAX_DETAIL ? `${detail.slice(0, MAX_DETAIL)}… [truncated]` : detail;
}
