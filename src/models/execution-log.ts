/**
 * ExecutionLogEntry Model
 * Append-only audit record of one run: opened at run start, finalized once at run end
 */

import { v4 as uuidv4 } from 'uuid';
import { ErrorCategory, type FailureReason } from '../lib/error-handler';
import type { MigrationProcess } from './migration-process';

export type RunOutcome = 'running' | 'completed' | 'failed' | 'cancelled';

export interface RejectedRowSample {
  container: string;
  /** 1-based position of the row in its container */
  rowNumber: number;
  column: string | null;
  reason: string;
}

export interface RunCounts {
  rowsRead: number;
  rowsWritten: number;
  rowsRejected: number;
  batchesWritten: number;
}

export interface ExecutionLogEntry extends RunCounts {
  id: string;
  processId: string;
  processName: string;
  processVersion: number;
  strictness: MigrationProcess['strictness'];
  startedAt: Date;
  finishedAt: Date | null;
  outcome: RunOutcome;
  failureReason: FailureReason | null;
  rejectedSamples: RejectedRowSample[];
}

export interface ExecutionLogFinalization {
  counts: RunCounts;
  outcome: Exclude<RunOutcome, 'running'>;
  failureReason?: FailureReason | null;
  rejectedSamples?: RejectedRowSample[];
  /** Samples kept; defaults to REJECTED_SAMPLE_LIMIT */
  sampleLimit?: number;
}

export const REJECTED_SAMPLE_LIMIT = 50;

export function emptyCounts(): RunCounts {
  return { rowsRead: 0, rowsWritten: 0, rowsRejected: 0, batchesWritten: 0 };
}

export class ExecutionLogModel {
  static start(process: MigrationProcess, now: Date = new Date()): ExecutionLogEntry {
    return {
      id: uuidv4(),
      processId: process.id,
      processName: process.name,
      processVersion: process.version,
      strictness: process.strictness,
      startedAt: now,
      finishedAt: null,
      outcome: 'running',
      failureReason: null,
      rejectedSamples: [],
      ...emptyCounts()
    };
  }

  static finalize(entry: ExecutionLogEntry, result: ExecutionLogFinalization, now: Date = new Date()): ExecutionLogEntry {
    if (entry.outcome !== 'running' || entry.finishedAt !== null) {
      throw new Error(`Execution log ${entry.id} is already finalized`);
    }

    const validation = ExecutionLogModel.validateCounts(result.counts, entry.strictness === 'strict' && result.outcome === 'completed');
    if (!validation.isValid) {
      throw new Error(`Execution log ${entry.id}: ${validation.errors.join(', ')}`);
    }

    if (result.outcome !== 'completed' && !result.failureReason) {
      throw new Error(`Execution log ${entry.id}: a ${result.outcome} run needs a failure reason`);
    }

    return Object.freeze({
      ...entry,
      ...result.counts,
      finishedAt: now,
      outcome: result.outcome,
      failureReason: result.failureReason ?? null,
      rejectedSamples: (result.rejectedSamples ?? []).slice(0, result.sampleLimit ?? REJECTED_SAMPLE_LIMIT)
    });
  }

  /**
   * written + rejected never exceeds read; a completed strict run accounts for every row
   */
  static validateCounts(counts: RunCounts, requireEquality: boolean = false): { isValid: boolean; errors: string[] } {
    const errors: string[] = [];

    for (const [name, value] of Object.entries(counts)) {
      if (!Number.isInteger(value) || value < 0) {
        errors.push(`${name} must be a non-negative integer`);
      }
    }

    if (counts.rowsWritten + counts.rowsRejected > counts.rowsRead) {
      errors.push(`rows written (${counts.rowsWritten}) + rejected (${counts.rowsRejected}) exceed rows read (${counts.rowsRead})`);
    }

    if (requireEquality && counts.rowsWritten + counts.rowsRejected !== counts.rowsRead) {
      errors.push('strict runs must account for every row read');
    }

    return { isValid: errors.length === 0, errors };
  }

  /**
   * Rebuild a stored failure reason; unknown categories read as system failures
   */
  static restoreReason(raw: unknown): FailureReason | null {
    if (typeof raw !== 'object' || raw === null) {
      return null;
    }
    const record: object = raw;
    const field = (key: string): unknown => (key in record ? Reflect.get(record, key) : undefined);
    const code = field('code');
    const message = field('message');
    if (typeof code !== 'string' || typeof message !== 'string') {
      return null;
    }

    const storedCategory = field('category');
    const category = Object.values(ErrorCategory).find(value => value === storedCategory) ?? ErrorCategory.SYSTEM;
    const context = field('context');

    return {
      code,
      message,
      category,
      retryable: field('retryable') === true,
      context: typeof context === 'object' && context !== null ? Object.fromEntries(Object.entries(context)) : {}
    };
  }

  static restoreSamples(raw: unknown): RejectedRowSample[] {
    if (!Array.isArray(raw)) {
      return [];
    }
    const samples: RejectedRowSample[] = [];
    for (const item of raw) {
      if (typeof item !== 'object' || item === null) {
        continue;
      }
      const record: object = item;
      const field = (key: string): unknown => (key in record ? Reflect.get(record, key) : undefined);
      const container = field('container');
      const rowNumber = field('rowNumber');
      const column = field('column');
      const reason = field('reason');
      if (typeof container === 'string' && typeof rowNumber === 'number' && typeof reason === 'string') {
        samples.push({ container, rowNumber, column: typeof column === 'string' ? column : null, reason });
      }
    }
    return samples;
  }

  static durationMs(entry: ExecutionLogEntry): number | null {
    return entry.finishedAt ? entry.finishedAt.getTime() - entry.startedAt.getTime() : null;
  }

  /**
   * One-line summary for CLI output and logs
   */
  static summarize(entry: ExecutionLogEntry): string {
    const base = `${entry.processName} [${entry.outcome}] read=${entry.rowsRead} written=${entry.rowsWritten} rejected=${entry.rowsRejected}`;
    return entry.failureReason ? `${base} reason=${entry.failureReason.code}: ${entry.failureReason.message}` : base;
  }
}
