/**
 * MigrationExecutor Service
 *
 * Runs a validated process: reads each container through its SourceConnector,
 * transforms rows per ColumnConfig, writes batches through the business-data
 * store and records the run in the audit log.
 *
 * Runs are single-flight per process id and share a bounded run pool.
 * Cancellation is observed between batches only.
 */

import {
  AlreadyRunningError,
  BatchTransportError,
  ConfigurationInvalidError,
  ErrorHandler,
  MigrationBaseError,
  ProcessNotFoundError,
  ProcessStateError,
  RowCoercionError,
  RunCancelledError,
  RunInterruptedError,
  classifyError
} from '../lib/error-handler';
import { Semaphore } from '../lib/concurrency';
import type { Logger } from '../lib/logger';
import type { ConnectorFactory } from '../connectors';
import { inBatches, type SourceConnector, type SourceRow } from '../connectors/source-connector';
import type { ResolvedStores } from '../database/destination-stores';
import type { ColumnConfig } from '../models/column-config';
import {
  ExecutionLogModel,
  emptyCounts,
  type ExecutionLogEntry,
  type RejectedRowSample,
  type RunCounts
} from '../models/execution-log';
import { MigrationProcessModel, type MigrationProcess } from '../models/migration-process';
import { ProcessRegistryEntryModel } from '../models/process-registry-entry';
import { summarizeValidation, validateColumnConfigs } from './column-config-validator';
import { RowTransformer, type DestinationRow } from './row-transformer';

export interface ExecutorSettings {
  batchSize: number;
  /** Retries after the first attempt of a batch write */
  maxRetryAttempts: number;
  retryBaseDelayMs: number;
  maxRetryDelayMs: number;
  maxConcurrentRuns: number;
  parallelBatchLimit: number;
  rejectedSampleLimit: number;
}

export interface MigrationExecutorDependencies {
  stores: ResolvedStores;
  connectorFor: ConnectorFactory;
  errorHandler: ErrorHandler;
  logger: Logger;
  settings: ExecutorSettings;
  clock?: () => Date;
}

export interface RunResult {
  process: MigrationProcess;
  entry: ExecutionLogEntry;
}

interface ActiveRun {
  processId: string;
  cancelRequested: boolean;
}

/**
 * Mutable state of one run; finalized into the ExecutionLogEntry
 */
interface RunProgress {
  counts: RunCounts;
  samples: RejectedRowSample[];
}

export class MigrationExecutor {
  private readonly stores: ResolvedStores;
  private readonly connectorFor: ConnectorFactory;
  private readonly errorHandler: ErrorHandler;
  private readonly logger: Logger;
  private readonly settings: ExecutorSettings;
  private readonly clock: () => Date;
  private readonly runSlots: Semaphore;
  private readonly active = new Map<string, ActiveRun>();

  constructor(deps: MigrationExecutorDependencies) {
    this.stores = deps.stores;
    this.connectorFor = deps.connectorFor;
    this.errorHandler = deps.errorHandler;
    this.logger = deps.logger;
    this.settings = deps.settings;
    this.clock = deps.clock ?? (() => new Date());
    this.runSlots = new Semaphore(deps.settings.maxConcurrentRuns);
  }

  isRunning(processId: string): boolean {
    return this.active.has(processId);
  }

  activeRuns(): string[] {
    return Array.from(this.active.keys());
  }

  /**
   * Request cancellation; takes effect before the next batch. Returns false when
   * the process has no run in progress.
   */
  cancel(processId: string): boolean {
    const run = this.active.get(processId);
    if (!run) {
      return false;
    }
    run.cancelRequested = true;
    this.logger.info('Cancellation requested', { process_id: processId });
    return true;
  }

  /**
   * Release a process left En_Ejecucion by a run that did not finish here: it
   * becomes Fallido and its open log entries are closed as failed.
   */
  async recoverStale(processId: string): Promise<MigrationProcess> {
    if (this.active.has(processId)) {
      throw new AlreadyRunningError(processId);
    }

    const process = await this.stores.processes.findById(processId);
    if (!process) {
      throw new ProcessNotFoundError(processId);
    }
    if (process.status !== 'En_Ejecucion') {
      throw new ProcessStateError(`Process '${process.name}' is ${process.status}; only En_Ejecucion processes can be recovered`, {
        processId,
        status: process.status
      });
    }

    const now = this.clock();
    const failed = MigrationProcessModel.fail(process, now);
    if (!await this.stores.processes.updateRunState(failed, 'En_Ejecucion')) {
      throw new ProcessStateError(`Process '${process.name}' changed while it was being recovered`, { processId });
    }

    const open = (await this.stores.executionLogs.listForProcess(processId))
      .filter(entry => entry.outcome === 'running');
    for (const entry of open) {
      await this.stores.executionLogs.finalize(ExecutionLogModel.finalize(
        entry,
        {
          counts: {
            rowsRead: entry.rowsRead,
            rowsWritten: entry.rowsWritten,
            rowsRejected: entry.rowsRejected,
            batchesWritten: entry.batchesWritten
          },
          outcome: 'failed',
          failureReason: new RunInterruptedError(processId, { execution_id: entry.id }).toReason(),
          rejectedSamples: entry.rejectedSamples,
          sampleLimit: this.settings.rejectedSampleLimit
        },
        now
      ));
    }

    this.logger.warn('Stale run recovered', { process_id: processId, name: process.name, closed_entries: open.length });
    const recovered = await this.stores.processes.findById(processId) ?? failed;
    await this.mirror(recovered);
    return recovered;
  }

  /**
   * Execute one run of a Listo process. Failures before the run starts reject;
   * once started, the run always resolves with its finalized log entry.
   */
  async run(processId: string): Promise<RunResult> {
    // claimed before the first await so concurrent callers see it
    if (this.active.has(processId)) {
      throw new AlreadyRunningError(processId);
    }
    const run: ActiveRun = { processId, cancelRequested: false };
    this.active.set(processId, run);

    try {
      return await this.runSlots.use(() => this.execute(run));
    } finally {
      this.active.delete(processId);
    }
  }

  private async execute(run: ActiveRun): Promise<RunResult> {
    const process = await this.loadRunnable(run.processId);

    const startedAt = this.clock();
    const running = MigrationProcessModel.transition(process, 'En_Ejecucion', startedAt);
    const claimed = await this.stores.processes.updateRunState(running, 'Listo');
    if (!claimed) {
      throw new AlreadyRunningError(run.processId);
    }

    const entry = ExecutionLogModel.start(running, startedAt);
    try {
      await this.stores.executionLogs.open(entry);
    } catch (error) {
      // without an audit entry the run never starts
      await this.stores.processes.updateRunState(MigrationProcessModel.fail(running, this.clock()), 'En_Ejecucion');
      throw this.errorHandler.handleError(error, { process_id: running.id, stage: 'open execution log' });
    }
    this.logger.setMigrationId(entry.id);
    this.logger.info('Migration run started', {
      process_id: running.id,
      process: running.name,
      execution_id: entry.id,
      strictness: running.strictness,
      order_independent: running.orderIndependent
    });

    const progress: RunProgress = { counts: emptyCounts(), samples: [] };

    try {
      const connector = this.connectorFor(running.source);
      try {
        for (const { container, columns } of MigrationProcessModel.containers(running)) {
          await this.transferContainer(run, running, entry, connector, container, columns, progress, startedAt);
        }
      } finally {
        await connector.close();
      }

      return await this.finish(running, entry, progress, null);
    } catch (error) {
      return await this.finish(running, entry, progress, this.errorHandler.handleError(error, { process_id: running.id }));
    } finally {
      this.logger.clearContext();
    }
  }

  /**
   * The stored process, checked for lifecycle, status and a valid configuration
   */
  private async loadRunnable(processId: string): Promise<MigrationProcess> {
    const process = await this.stores.processes.findById(processId);
    if (!process) {
      throw new ProcessNotFoundError(processId);
    }
    if (process.status === 'En_Ejecucion') {
      throw new AlreadyRunningError(processId);
    }
    if (process.lifecycle !== 'Activo') {
      throw new ProcessStateError(`Process '${process.name}' is ${process.lifecycle} and cannot run`, {
        processId,
        lifecycle: process.lifecycle
      });
    }
    if (process.status !== 'Listo') {
      throw new ProcessStateError(`Process '${process.name}' is ${process.status}; only Listo processes can run`, {
        processId,
        status: process.status
      });
    }

    const validation = validateColumnConfigs(process.columns);
    if (!validation.valid) {
      throw new ConfigurationInvalidError(`Process '${process.name}' has an invalid column configuration`, {
        processId,
        ...summarizeValidation(validation)
      });
    }
    if (validation.columns.length === 0) {
      throw new ConfigurationInvalidError(`Process '${process.name}' has no selected columns`, { processId });
    }

    return process;
  }

  private async transferContainer(
    run: ActiveRun,
    process: MigrationProcess,
    entry: ExecutionLogEntry,
    connector: SourceConnector,
    container: string,
    columns: ColumnConfig[],
    progress: RunProgress,
    runTimestamp: Date
  ): Promise<void> {
    const transformer = new RowTransformer(columns, runTimestamp);
    const table = MigrationProcessModel.destinationTableFor(process, container);

    await this.stores.batches.ensureTable({
      table,
      columns: transformer.columns.map(column => ({ name: column.target, sqlType: column.sqlType, nullable: column.nullable }))
    });

    const parallel = process.orderIndependent ? this.settings.parallelBatchLimit : 1;
    const slots = new Semaphore(parallel);
    const pending: Array<Promise<void>> = [];
    const failures: MigrationBaseError[] = [];
    let batchNumber = 0;
    let rowNumber = 0;

    try {
      for await (const batch of inBatches(connector.fetchRows(container, transformer.sourceNames), this.settings.batchSize)) {
        if (failures.length > 0) {
          break;
        }
        if (run.cancelRequested) {
          throw new RunCancelledError(process.id, { container, batches_written: progress.counts.batchesWritten });
        }

        batchNumber++;
        const rows = this.transformBatch(batch, rowNumber, transformer, process, container, progress);
        rowNumber += batch.length;
        if (rows.length === 0) {
          continue;
        }

        const release = await slots.acquire();
        if (failures.length > 0) {
          release();
          break;
        }

        const write = this.writeBatch(table, transformer.targetNames, rows, entry.id, batchNumber)
          .then(
            written => {
              progress.counts.rowsWritten += written;
              progress.counts.batchesWritten++;
            },
            (error: unknown) => {
              failures.push(classifyError(error));
            }
          )
          .finally(release);
        pending.push(write);

        if (parallel === 1) {
          await write;
        }
      }
    } finally {
      // in-flight batches always settle before the run is finalized
      await Promise.all(pending);
    }

    if (failures.length > 0) {
      throw failures[0];
    }

    this.logger.info('Container transferred', { container, table, batches: batchNumber, rows: rowNumber });
  }

  /**
   * Transform one batch. Lenient runs drop failing rows; strict runs reject the
   * whole batch and end the run.
   */
  private transformBatch(
    batch: SourceRow[],
    offset: number,
    transformer: RowTransformer,
    process: MigrationProcess,
    container: string,
    progress: RunProgress
  ): DestinationRow[] {
    const rows: DestinationRow[] = [];
    progress.counts.rowsRead += batch.length;

    for (let index = 0; index < batch.length; index++) {
      try {
        rows.push(transformer.transform(batch[index]));
      } catch (error) {
        if (!(error instanceof RowCoercionError)) {
          throw error;
        }

        this.recordRejection(progress, {
          container,
          rowNumber: offset + index + 1,
          column: error.column,
          reason: error.message
        });

        if (process.strictness === 'strict') {
          progress.counts.rowsRejected += batch.length;
          throw new RowCoercionError(`Batch aborted at row ${offset + index + 1}: ${error.message}`, error.column, error.value, {
            container,
            row_number: offset + index + 1
          });
        }
        progress.counts.rowsRejected++;
      }
    }

    return rows;
  }

  private recordRejection(progress: RunProgress, sample: RejectedRowSample): void {
    if (progress.samples.length < this.settings.rejectedSampleLimit) {
      progress.samples.push(sample);
    }
    this.logger.debug('Row rejected', { container: sample.container, row_number: sample.rowNumber, column: sample.column });
  }

  /**
   * Whole-batch write, retried with backoff; exhaustion surfaces BatchTransportError
   */
  private async writeBatch(
    table: string,
    columns: string[],
    rows: DestinationRow[],
    executionId: string,
    batchNumber: number
  ): Promise<number> {
    const written = await this.errorHandler.withRetry(
      () => this.stores.batches.writeBatch({ table, columns, rows, executionId }),
      `write batch ${batchNumber} to ${table}`,
      {
        maxAttempts: this.settings.maxRetryAttempts + 1,
        delayMs: this.settings.retryBaseDelayMs,
        maxDelayMs: this.settings.maxRetryDelayMs,
        shouldRetry: error => error instanceof BatchTransportError
      }
    );

    this.logger.debug('Batch written', { table, batch: batchNumber, rows: written });
    return written;
  }

  /**
   * Persist the terminal status and finalize the log entry; a failure reason
   * marks the run Fallido
   */
  private async finish(
    running: MigrationProcess,
    entry: ExecutionLogEntry,
    progress: RunProgress,
    failure: MigrationBaseError | null
  ): Promise<RunResult> {
    const finishedAt = this.clock();
    const finalProcess = failure
      ? MigrationProcessModel.fail(running, finishedAt)
      : MigrationProcessModel.complete(running, finishedAt);

    const finalEntry = ExecutionLogModel.finalize(
      entry,
      {
        counts: { ...progress.counts },
        outcome: failure ? (failure instanceof RunCancelledError ? 'cancelled' : 'failed') : 'completed',
        failureReason: failure ? failure.toReason() : null,
        rejectedSamples: progress.samples,
        sampleLimit: this.settings.rejectedSampleLimit
      },
      finishedAt
    );

    // the log entry is finalized even when the status write fails
    const bookkeepingErrors: unknown[] = [];
    let stored: MigrationProcess | null = null;
    try {
      const applied = await this.stores.processes.updateRunState(finalProcess, 'En_Ejecucion');
      if (!applied) {
        this.logger.warn('Process status changed during the run; terminal status not recorded', {
          process_id: finalProcess.id,
          status: finalProcess.status
        });
      }
      stored = await this.stores.processes.findById(finalProcess.id);
    } catch (error) {
      bookkeepingErrors.push(error);
    }
    try {
      await this.stores.executionLogs.finalize(finalEntry);
    } catch (error) {
      bookkeepingErrors.push(error);
    }

    if (bookkeepingErrors.length > 0) {
      for (const extra of bookkeepingErrors.slice(1)) {
        this.logger.error('Run bookkeeping failed', extra instanceof Error ? extra : undefined, { execution_id: finalEntry.id });
      }
      throw this.errorHandler.handleError(bookkeepingErrors[0], {
        process_id: finalProcess.id,
        execution_id: finalEntry.id,
        stage: 'finalize run'
      });
    }

    const result = stored ?? finalProcess;
    await this.mirror(result);

    const summary = ExecutionLogModel.summarize(finalEntry);
    if (failure) {
      this.logger.warn(`Migration run ended: ${summary}`, { execution_id: finalEntry.id });
    } else {
      this.logger.info(`Migration run completed: ${summary}`, { execution_id: finalEntry.id });
    }

    return { process: result, entry: finalEntry };
  }

  /**
   * The registry is a secondary copy; a failed upsert is logged and does not change the run outcome
   */
  private async mirror(process: MigrationProcess): Promise<void> {
    try {
      await this.stores.registry.upsert(ProcessRegistryEntryModel.fromProcess(process));
    } catch (error) {
      this.logger.error(
        'Process registry update failed',
        error instanceof Error ? error : undefined,
        { process_id: process.id, name: process.name }
      );
    }
  }
}
