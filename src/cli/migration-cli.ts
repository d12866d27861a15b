#!/usr/bin/env node

/**
 * Tabular Migrator CLI
 *
 * Operator entry point over the process manager, the executor and the router.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import inquirer from 'inquirer';
import { createApp, initializeApp, type MigrationApp } from '../app';
import { getConfigForLogging, loadConfig, loadEnvironment } from '../config/migration-config';
import { MigrationBaseError } from '../lib/error-handler';
import type { DataSourceCreateInput } from '../models/data-source';
import { ExecutionLogModel, type ExecutionLogEntry } from '../models/execution-log';
import type { MigrationProcess } from '../models/migration-process';
import type { ProcessValidationResult } from '../services/column-config-validator';
import type { RouteDescription } from '../services/data-transfer-router';
import type { InferredColumnType } from '../services/schema-inference-engine';
import type { ColumnPatch } from '../services/process-manager';

const VERSION = '1.0.0';

interface CreateOptions {
  file?: string;
  shareUrl?: string;
  displayName?: string;
  connection?: string;
  database?: string;
  table?: string;
  strict?: boolean;
  orderIndependent?: boolean;
  destinationTable?: string;
  description?: string;
  observations?: string;
}

interface ColumnOptions {
  rename?: string;
  type?: string;
  nullable?: boolean;
  notNull?: boolean;
  default?: string;
  nullDefault?: boolean;
  include?: boolean;
  exclude?: boolean;
}

// ===== OUTPUT FORMATTING =====

export function formatStatus(status: string): string {
  const colors: Record<string, (text: string) => string> = {
    Completado: chalk.green,
    completed: chalk.green,
    Listo: chalk.cyan,
    En_Ejecucion: chalk.blue,
    running: chalk.blue,
    Fallido: chalk.red,
    failed: chalk.red,
    cancelled: chalk.yellow,
    Configurado: chalk.yellow,
    Borrador: chalk.gray
  };
  return (colors[status] || chalk.white)(status);
}

export function formatConfidence(confidence: number): string {
  const color = confidence >= 0.95 ? chalk.green : confidence >= 0.8 ? chalk.yellow : chalk.red;
  return color(`${(confidence * 100).toFixed(0)}%`);
}

export function sourceFromOptions(options: CreateOptions): DataSourceCreateInput {
  const chosen = [options.file, options.shareUrl, options.connection].filter(value => value !== undefined);
  if (chosen.length !== 1) {
    throw new Error('Choose exactly one source: --file, --share-url or --connection');
  }

  if (options.file !== undefined) {
    return { kind: 'local-file', path: options.file, displayName: options.displayName };
  }
  if (options.shareUrl !== undefined) {
    return { kind: 'cloud-share', shareUrl: options.shareUrl, displayName: options.displayName ?? options.shareUrl };
  }
  return { kind: 'relational', connectionRef: options.connection ?? '', database: options.database, table: options.table };
}

export function columnPatchFromOptions(options: ColumnOptions): ColumnPatch {
  if (options.nullable && options.notNull) {
    throw new Error('--nullable and --not-null cannot be combined');
  }
  if (options.include && options.exclude) {
    throw new Error('--include and --exclude cannot be combined');
  }

  const patch: ColumnPatch = {};
  if (options.rename !== undefined) patch.rename = options.rename;
  if (options.type !== undefined) patch.sqlType = options.type;
  if (options.nullable) patch.nullable = true;
  if (options.notNull) patch.nullable = false;
  if (options.nullDefault) patch.defaultValue = null;
  else if (options.default !== undefined) patch.defaultValue = options.default;
  if (options.include) patch.selected = true;
  if (options.exclude) patch.selected = false;
  return patch;
}

export function validationLines(result: ProcessValidationResult): string[] {
  const lines: string[] = [];
  for (const column of result.columns) {
    const label = `${column.container}.${column.originalName} -> ${column.normalizedName || '(empty)'}`;
    if (column.valid) {
      lines.push(`${chalk.green('ok')}   ${label}`);
      continue;
    }
    for (const issue of column.issues) {
      lines.push(`${chalk.red(issue.code)} ${label}: ${issue.message}`);
    }
  }
  lines.push(result.valid ? chalk.green('Configuration is valid') : chalk.red('Configuration is invalid'));
  return lines;
}

export function runLines(entry: ExecutionLogEntry): string[] {
  const lines = [
    `Outcome:  ${formatStatus(entry.outcome)}`,
    `Read:     ${entry.rowsRead}`,
    `Written:  ${entry.rowsWritten}`,
    `Rejected: ${entry.rowsRejected}`,
    `Batches:  ${entry.batchesWritten}`
  ];

  const duration = ExecutionLogModel.durationMs(entry);
  if (duration !== null) {
    lines.push(`Duration: ${duration}ms`);
  }
  if (entry.failureReason) {
    lines.push(`Reason:   ${chalk.red(entry.failureReason.code)} ${entry.failureReason.message}`);
  }
  for (const sample of entry.rejectedSamples.slice(0, 10)) {
    lines.push(chalk.gray(`  row ${sample.rowNumber} of ${sample.container}${sample.column ? ` [${sample.column}]` : ''}: ${sample.reason}`));
  }
  return lines;
}

function inferenceTable(container: string, columns: InferredColumnType[]): string {
  const table = new Table({ head: ['Column', 'Type', 'Confidence', 'Nullable', 'Default', 'Warnings'] });
  for (const column of columns) {
    table.push([
      column.name,
      column.sqlType,
      formatConfidence(column.confidence),
      column.nullable ? 'yes' : 'no',
      column.suggestedDefault === null ? 'NULL' : column.suggestedDefault === '' ? "''" : column.suggestedDefault,
      column.warnings.map(warning => warning.code).join(', ')
    ]);
  }
  return `${chalk.bold(container)}\n${table.toString()}`;
}

function routesTable(routes: RouteDescription[]): string {
  const table = new Table({ head: ['Entity', 'Role', 'Connections'] });
  for (const route of routes) {
    table.push([route.entityType, route.role, route.connectionIds.join(', ')]);
  }
  return table.toString();
}

function processesTable(processes: MigrationProcess[]): string {
  const table = new Table({ head: ['Name', 'Status', 'Lifecycle', 'Version', 'Last run'] });
  for (const item of processes) {
    table.push([
      item.name,
      formatStatus(item.status),
      item.lifecycle,
      String(item.version),
      item.lastRun ? item.lastRun.toISOString() : '-'
    ]);
  }
  return table.toString();
}

function historyTable(entries: ExecutionLogEntry[]): string {
  const table = new Table({ head: ['Started', 'Outcome', 'Read', 'Written', 'Rejected', 'Reason'] });
  for (const entry of entries) {
    table.push([
      entry.startedAt.toISOString(),
      formatStatus(entry.outcome),
      String(entry.rowsRead),
      String(entry.rowsWritten),
      String(entry.rowsRejected),
      entry.failureReason ? entry.failureReason.code : '-'
    ]);
  }
  return table.toString();
}

export function describeError(error: unknown): string {
  if (error instanceof MigrationBaseError) {
    const guidance = error.context.guidance;
    const base = `${chalk.red(error.errorCode)}: ${error.message}`;
    return typeof guidance === 'string' ? `${base}\n${chalk.gray(guidance)}` : base;
  }
  return chalk.red(error instanceof Error ? error.message : String(error));
}

// ===== CLI =====

async function defaultAppFactory(): Promise<MigrationApp> {
  loadEnvironment();
  const app = createApp(loadConfig());
  app.logger.debug('Configuration loaded', getConfigForLogging(app.config));
  await initializeApp(app);
  return app;
}

export class MigrationCli {
  readonly program: Command;
  private app: MigrationApp | null = null;

  constructor(private readonly appFactory: () => Promise<MigrationApp> = defaultAppFactory) {
    this.program = this.buildProgram();
  }

  async run(argv: string[]): Promise<void> {
    try {
      await this.program.parseAsync(argv);
    } finally {
      await this.shutdown();
    }
  }

  /**
   * Ask every active run to stop at its next batch boundary
   */
  cancelRuns(): string[] {
    if (!this.app) {
      return [];
    }
    const executor = this.app.executor;
    return executor.activeRuns().filter(processId => executor.cancel(processId));
  }

  async shutdown(): Promise<void> {
    if (this.app) {
      const app = this.app;
      this.app = null;
      await app.close();
    }
  }

  private async getApp(): Promise<MigrationApp> {
    if (!this.app) {
      this.app = await this.appFactory();
    }
    return this.app;
  }

  /**
   * Run one command body, printing failures instead of stack traces
   */
  private async handle(body: (app: MigrationApp) => Promise<void>): Promise<void> {
    try {
      await body(await this.getApp());
    } catch (error) {
      console.error(describeError(error));
      process.exitCode = 1;
    }
  }

  private buildProgram(): Command {
    const program = new Command();

    program
      .name('tabular-migrator')
      .description('Migrate spreadsheet, shared-link and relational tables into a destination database')
      .version(VERSION);

    program
      .command('processes')
      .description('List migration processes')
      .option('-a, --all', 'Include deleted processes')
      .action((options: { all?: boolean }) => this.handle(async app => {
        console.log(processesTable(await app.processes.listProcesses(options.all === true)));
      }));

    program
      .command('create <name>')
      .description('Register a migration process')
      .option('--file <path>', 'Local .xlsx, .xls, .csv or .txt file')
      .option('--share-url <url>', 'Cloud share link to a workbook')
      .option('--display-name <name>', 'Display name of the source')
      .option('--connection <id>', 'Relational source connection id')
      .option('--database <name>', 'Database on the relational connection')
      .option('--table <name>', 'Default schema.table of the relational source')
      .option('--strict', 'Abort a batch on the first row that fails coercion')
      .option('--order-independent', 'Allow batches to be written in parallel')
      .option('--destination-table <name>', 'Destination table name')
      .option('--description <text>', 'Free-text description')
      .option('--observations <text>', 'Free-text observations')
      .action((name: string, options: CreateOptions) => this.handle(async app => {
        const updated = await app.processes.createProcess({
          name,
          source: sourceFromOptions(options),
          description: options.description,
          observations: options.observations,
          strictness: options.strict ? 'strict' : 'lenient',
          orderIndependent: options.orderIndependent === true,
          destinationTable: options.destinationTable
        });
        console.log(chalk.green(`Created process ${updated.name} (${updated.id})`));
      }));

    program
      .command('containers <process>')
      .description('List sheets or tables of the process source')
      .action((reference: string) => this.handle(async app => {
        const spinner = ora('Reading source...').start();
        const containers = await app.processes.listContainers(reference).finally(() => spinner.stop());
        containers.forEach(container => console.log(container));
      }));

    program
      .command('infer <process> <container>')
      .description('Suggest column types for a container')
      .option('--apply', 'Store the suggestions in the process configuration')
      .option('-c, --columns <names>', 'Comma-separated columns to apply')
      .action((reference: string, container: string, options: { apply?: boolean; columns?: string }) => this.handle(async app => {
        const spinner = ora(`Sampling ${container}...`).start();
        const inferred = await app.processes.inferContainer(reference, container).finally(() => spinner.stop());
        console.log(inferenceTable(container, inferred));

        if (options.apply) {
          const names = options.columns ? options.columns.split(',').map(name => name.trim()).filter(Boolean) : undefined;
          const updated = await app.processes.applyInference(reference, container, names);
          console.log(chalk.green(`Applied suggestions; ${updated.name} is ${updated.status}`));
        }
      }));

    program
      .command('set-column <process> <container> <column>')
      .description('Edit one column configuration')
      .option('--rename <name>', 'Destination column name')
      .option('--type <sqlType>', 'SQL type, e.g. INT or NVARCHAR(50)')
      .option('--nullable', 'Allow NULL')
      .option('--not-null', 'Require a value')
      .option('--default <value>', "Default value; '' for an empty string")
      .option('--null-default', 'Use NULL as the default')
      .option('--include', 'Select the column')
      .option('--exclude', 'Deselect the column')
      .action((reference: string, container: string, column: string, options: ColumnOptions) => this.handle(async app => {
        const updated = await app.processes.updateColumn(reference, container, column, columnPatchFromOptions(options));
        console.log(`${updated.name} is ${formatStatus(updated.status)}`);
      }));

    program
      .command('validate-rename <original> <newName> [existing...]')
      .description('Check a column rename against the names already in use')
      .action((original: string, newName: string, existing: string[] | undefined) => this.handle(async app => {
        const response = app.processes.validateRename({ original_name: original, new_name: newName, existing_names: existing ?? [] });
        console.log(JSON.stringify(response, null, 2));
        if (!response.valid) {
          process.exitCode = 1;
        }
      }));

    program
      .command('validate <process>')
      .description('Validate the column configuration')
      .action((reference: string) => this.handle(async app => {
        const result = await app.processes.validate(reference);
        validationLines(result).forEach(line => console.log(line));
        if (!result.valid) {
          process.exitCode = 1;
        }
      }));

    program
      .command('ready <process>')
      .description('Validate and mark the process ready to run')
      .action((reference: string) => this.handle(async app => {
        const updated = await app.processes.markReady(reference);
        console.log(`${updated.name} is ${formatStatus(updated.status)}`);
      }));

    program
      .command('run <process>')
      .description('Execute a ready process')
      .action((reference: string) => this.handle(async app => {
        const target = await app.processes.getProcess(reference);
        const spinner = ora(`Running ${target.name}...`).start();
        const result = await app.executor.run(target.id).finally(() => spinner.stop());

        console.log(ExecutionLogModel.summarize(result.entry));
        runLines(result.entry).forEach(line => console.log(line));
        if (result.entry.outcome !== 'completed') {
          process.exitCode = 1;
        }
      }));

    program
      .command('recover <process>')
      .description('Mark a process left running by an interrupted run as Fallido')
      .action((reference: string) => this.handle(async app => {
        const target = await app.processes.getProcess(reference);
        const recovered = await app.executor.recoverStale(target.id);
        console.log(`${recovered.name} is ${formatStatus(recovered.status)}`);
      }));

    program
      .command('history <process>')
      .description('Show recent runs')
      .option('-n, --limit <count>', 'Number of runs', value => parseInt(value, 10), 20)
      .action((reference: string, options: { limit: number }) => this.handle(async app => {
        console.log(historyTable(await app.processes.listRuns(reference, options.limit)));
      }));

    program
      .command('activate <process>')
      .description('Allow the process to run')
      .action((reference: string) => this.handle(async app => {
        const updated = await app.processes.activate(reference);
        console.log(`${updated.name} is ${updated.lifecycle}`);
      }));

    program
      .command('deactivate <process>')
      .description('Prevent the process from running')
      .action((reference: string) => this.handle(async app => {
        const updated = await app.processes.deactivate(reference);
        console.log(`${updated.name} is ${updated.lifecycle}`);
      }));

    program
      .command('delete <process>')
      .description('Logically delete a process')
      .option('-y, --yes', 'Skip confirmation')
      .action((reference: string, options: { yes?: boolean }) => this.handle(async app => {
        if (!options.yes) {
          const answers = await inquirer.prompt<{ confirmed: boolean }>([
            { type: 'confirm', name: 'confirmed', message: `Delete process ${reference}?`, default: false }
          ]);
          if (!answers.confirmed) {
            console.log('Aborted');
            return;
          }
        }
        const updated = await app.processes.softDelete(reference);
        console.log(chalk.yellow(`${updated.name} deleted`));
      }));

    program
      .command('revalidate <process>')
      .description('Re-check the shared link of a cloud source')
      .action((reference: string) => this.handle(async app => {
        const updated = await app.processes.revalidateSource(reference);
        console.log(chalk.green(`Link valid for ${updated.name}`));
      }));

    program
      .command('check-routing')
      .description('Show which connection each entity type writes to')
      .action(() => this.handle(async app => {
        console.log(routesTable(app.router.describe()));
      }));

    return program;
  }
}

if (require.main === module) {
  const cli = new MigrationCli();

  process.on('SIGINT', () => {
    const cancelled = cli.cancelRuns();
    console.log(`\nCancelling ${cancelled.length} run(s) at the next batch boundary...`);
  });

  cli.run(process.argv).catch(error => {
    console.error(describeError(error));
    process.exit(1);
  });
}
