/**
 * Unit Tests: ExecutionLogEntry Model
 * Count invariants, single finalization and restoring stored reasons
 */

import { BatchTransportError, ErrorCategory } from '../../../src/lib/error-handler';
import { DataSourceModel } from '../../../src/models/data-source';
import { ExecutionLogModel, type RejectedRowSample } from '../../../src/models/execution-log';
import { MigrationProcessModel, type MigrationProcess } from '../../../src/models/migration-process';

const STARTED = new Date('2024-03-01T10:00:00Z');
const FINISHED = new Date('2024-03-01T10:00:05Z');

function newProcess(strictness: MigrationProcess['strictness'] = 'lenient'): MigrationProcess {
  return {
    ...MigrationProcessModel.create({
      name: 'ventas',
      source: DataSourceModel.create({ kind: 'local-file', path: 'ventas.csv' }),
      strictness
    }),
    version: 4
  };
}

function sample(rowNumber: number): RejectedRowSample {
  return { container: 'ventas', rowNumber, column: 'monto', reason: 'not a number' };
}

describe('ExecutionLogModel', () => {
  test('start opens a running entry bound to the process version', () => {
    const entry = ExecutionLogModel.start(newProcess(), STARTED);

    expect(entry).toMatchObject({
      processName: 'ventas',
      processVersion: 4,
      strictness: 'lenient',
      startedAt: STARTED,
      finishedAt: null,
      outcome: 'running',
      rowsRead: 0,
      rowsWritten: 0,
      rowsRejected: 0,
      batchesWritten: 0
    });
  });

  test('finalize records counts, caps samples and freezes the entry', () => {
    const entry = ExecutionLogModel.start(newProcess(), STARTED);
    const finished = ExecutionLogModel.finalize(
      entry,
      {
        counts: { rowsRead: 10, rowsWritten: 7, rowsRejected: 3, batchesWritten: 2 },
        outcome: 'completed',
        rejectedSamples: [sample(1), sample(4), sample(9)],
        sampleLimit: 2
      },
      FINISHED
    );

    expect(finished).toMatchObject({ outcome: 'completed', rowsWritten: 7, finishedAt: FINISHED, failureReason: null });
    expect(finished.rejectedSamples).toEqual([sample(1), sample(4)]);
    expect(Object.isFrozen(finished)).toBe(true);
    expect(ExecutionLogModel.durationMs(finished)).toBe(5000);
    expect(ExecutionLogModel.durationMs(entry)).toBeNull();
  });

  test('an entry is finalized only once', () => {
    const entry = ExecutionLogModel.start(newProcess(), STARTED);
    const counts = { rowsRead: 1, rowsWritten: 1, rowsRejected: 0, batchesWritten: 1 };
    const finished = ExecutionLogModel.finalize(entry, { counts, outcome: 'completed' });

    expect(() => ExecutionLogModel.finalize(finished, { counts, outcome: 'completed' }))
      .toThrow(`Execution log ${entry.id} is already finalized`);
  });

  test('written plus rejected may not exceed read', () => {
    const entry = ExecutionLogModel.start(newProcess(), STARTED);

    expect(() => ExecutionLogModel.finalize(entry, {
      counts: { rowsRead: 5, rowsWritten: 5, rowsRejected: 1, batchesWritten: 1 },
      outcome: 'completed'
    })).toThrow(`Execution log ${entry.id}: rows written (5) + rejected (1) exceed rows read (5)`);
  });

  test('completed strict runs account for every row read', () => {
    const entry = ExecutionLogModel.start(newProcess('strict'), STARTED);

    expect(() => ExecutionLogModel.finalize(entry, {
      counts: { rowsRead: 5, rowsWritten: 4, rowsRejected: 0, batchesWritten: 1 },
      outcome: 'completed'
    })).toThrow(`Execution log ${entry.id}: strict runs must account for every row read`);
  });

  test('unsuccessful runs need a reason', () => {
    const entry = ExecutionLogModel.start(newProcess(), STARTED);
    const counts = { rowsRead: 5, rowsWritten: 0, rowsRejected: 0, batchesWritten: 0 };

    expect(() => ExecutionLogModel.finalize(entry, { counts, outcome: 'failed' }))
      .toThrow(`Execution log ${entry.id}: a failed run needs a failure reason`);

    const failed = ExecutionLogModel.finalize(entry, {
      counts,
      outcome: 'failed',
      failureReason: new BatchTransportError('reset').toReason()
    });
    expect(ExecutionLogModel.summarize(failed)).toBe('ventas [failed] read=5 written=0 rejected=0 reason=BatchTransportError: reset');
  });

  test('validateCounts rejects negative and fractional counts', () => {
    expect(ExecutionLogModel.validateCounts({ rowsRead: -1, rowsWritten: 0, rowsRejected: 0.5, batchesWritten: 0 }).errors).toEqual([
      'rowsRead must be a non-negative integer',
      'rowsRejected must be a non-negative integer',
      'rows written (0) + rejected (0.5) exceed rows read (-1)'
    ]);
  });

  test('restoreReason tolerates unknown categories and bad shapes', () => {
    expect(ExecutionLogModel.restoreReason({ code: 'X', message: 'm', category: 'cosmic', retryable: true, context: { a: 1 } }))
      .toEqual({ code: 'X', message: 'm', category: ErrorCategory.SYSTEM, retryable: true, context: { a: 1 } });
    expect(ExecutionLogModel.restoreReason({ code: 'X' })).toBeNull();
    expect(ExecutionLogModel.restoreReason(null)).toBeNull();
  });

  test('restoreSamples keeps well-formed samples only', () => {
    expect(ExecutionLogModel.restoreSamples([
      { container: 'c', rowNumber: 2, column: null, reason: 'r' },
      { container: 'c', rowNumber: '3', reason: 'r' },
      7
    ])).toEqual([{ container: 'c', rowNumber: 2, column: null, reason: 'r' }]);
    expect(ExecutionLogModel.restoreSamples('[]')).toEqual([]);
  });
});
