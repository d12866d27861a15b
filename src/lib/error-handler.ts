/**
 * Error Taxonomy and Retry Handling
 *
 * Every failure the pipeline surfaces is a MigrationBaseError subclass carrying a
 * stable error code, a category and the recovery strategy callers should apply.
 * ErrorHandler.withRetry is the single retry loop used for idempotent work
 * (metadata reads and whole-batch writes).
 */

import { Logger, LogLevel, type LogEntry } from './logger';

// ===== ERROR CLASSIFICATION =====

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  SOURCE = 'source',
  NETWORK = 'network',
  VALIDATION = 'validation',
  ROUTING = 'routing',
  CONCURRENCY = 'concurrency',
  TRANSPORT = 'transport',
  CONFIGURATION = 'configuration',
  SYSTEM = 'system'
}

export enum RecoveryStrategy {
  RETRY = 'retry',
  SKIP = 'skip',
  FAIL_FAST = 'fail_fast',
  MANUAL_INTERVENTION = 'manual_intervention'
}

export type ErrorContext = Record<string, unknown>;

// ===== BASE ERROR =====

export class MigrationBaseError extends Error {
  public readonly errorCode: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly recoveryStrategy: RecoveryStrategy;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    errorCode: string,
    category: ErrorCategory,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    recoveryStrategy: RecoveryStrategy = RecoveryStrategy.RETRY,
    context: ErrorContext = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.category = category;
    this.severity = severity;
    this.recoveryStrategy = recoveryStrategy;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get retryable(): boolean {
    return this.recoveryStrategy === RecoveryStrategy.RETRY;
  }

  /**
   * Structured reason persisted with execution log entries and shown to users
   */
  toReason(): FailureReason {
    return {
      code: this.errorCode,
      message: this.message,
      category: this.category,
      retryable: this.retryable,
      context: this.context
    };
  }

  toLogFormat(): LogEntry {
    return {
      timestamp: this.timestamp,
      level: this.severity === ErrorSeverity.LOW ? LogLevel.WARN : LogLevel.ERROR,
      message: this.message,
      context: {
        error_code: this.errorCode,
        category: this.category,
        severity: this.severity,
        recovery_strategy: this.recoveryStrategy,
        ...this.context
      }
    };
  }
}

export interface FailureReason {
  code: string;
  message: string;
  category: ErrorCategory;
  retryable: boolean;
  context: ErrorContext;
}

// ===== CONNECTOR ERRORS =====

export class SourceUnreachableError extends MigrationBaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'SourceUnreachable', ErrorCategory.SOURCE, ErrorSeverity.HIGH, RecoveryStrategy.RETRY, {
      guidance: 'Check that the file or link still exists and that the host is reachable',
      ...context
    });
  }
}

export class ShareExpiredError extends MigrationBaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'ShareExpired', ErrorCategory.SOURCE, ErrorSeverity.HIGH, RecoveryStrategy.MANUAL_INTERVENTION, {
      guidance: 'The shared link was revoked or expired; generate a new share link',
      ...context
    });
  }
}

export class AuthenticationError extends MigrationBaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'AuthenticationError', ErrorCategory.SOURCE, ErrorSeverity.HIGH, RecoveryStrategy.MANUAL_INTERVENTION, {
      guidance: 'Verify the user name and password of the source connection',
      ...context
    });
  }
}

export class ConnectTimeoutError extends MigrationBaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'ConnectTimeout', ErrorCategory.NETWORK, ErrorSeverity.MEDIUM, RecoveryStrategy.RETRY, {
      guidance: 'The database did not answer in time; check host, port and firewall rules',
      ...context
    });
  }
}

// ===== VALIDATION ERRORS =====

export class DuplicateColumnNameError extends MigrationBaseError {
  constructor(public readonly normalized: string, context: ErrorContext = {}) {
    super(
      `Column name '${normalized}' is already used in this container`,
      'DuplicateColumnName',
      ErrorCategory.VALIDATION,
      ErrorSeverity.LOW,
      RecoveryStrategy.MANUAL_INTERVENTION,
      { normalized, ...context }
    );
  }
}

export class InvalidDefaultValueError extends MigrationBaseError {
  constructor(
    public readonly value: string | null,
    public readonly expected: string,
    context: ErrorContext = {}
  ) {
    super(
      value === null || value === ''
        ? `A default value is required; expected ${expected}`
        : `Default value '${value}' is not valid; expected ${expected}`,
      'InvalidDefaultValue',
      ErrorCategory.VALIDATION,
      ErrorSeverity.LOW,
      RecoveryStrategy.MANUAL_INTERVENTION,
      { value, expected, ...context }
    );
  }
}

export class ConfigurationInvalidError extends MigrationBaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'ConfigurationInvalid', ErrorCategory.VALIDATION, ErrorSeverity.MEDIUM, RecoveryStrategy.MANUAL_INTERVENTION, context);
  }
}

// ===== ROUTING / CONFIGURATION =====

export class RoutingError extends MigrationBaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'RoutingError', ErrorCategory.ROUTING, ErrorSeverity.CRITICAL, RecoveryStrategy.FAIL_FAST, context);
  }
}

export class ConfigurationError extends MigrationBaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'ConfigurationError', ErrorCategory.CONFIGURATION, ErrorSeverity.CRITICAL, RecoveryStrategy.FAIL_FAST, context);
  }
}

// ===== EXECUTION ERRORS =====

export class AlreadyRunningError extends MigrationBaseError {
  constructor(processId: string) {
    super(
      `Process ${processId} already has a run in progress`,
      'AlreadyRunning',
      ErrorCategory.CONCURRENCY,
      ErrorSeverity.LOW,
      RecoveryStrategy.SKIP,
      { processId }
    );
  }
}

export class RunCancelledError extends MigrationBaseError {
  constructor(processId: string, context: ErrorContext = {}) {
    super(
      `Run of process ${processId} was cancelled`,
      'RunCancelled',
      ErrorCategory.CONCURRENCY,
      ErrorSeverity.LOW,
      RecoveryStrategy.SKIP,
      { processId, ...context }
    );
  }
}

export class RunInterruptedError extends MigrationBaseError {
  constructor(processId: string, context: ErrorContext = {}) {
    super(
      `Run of process ${processId} stopped before it was finalized`,
      'RunInterrupted',
      ErrorCategory.CONCURRENCY,
      ErrorSeverity.HIGH,
      RecoveryStrategy.MANUAL_INTERVENTION,
      { processId, ...context }
    );
  }
}

export class ProcessStateError extends MigrationBaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'ProcessStateError', ErrorCategory.VALIDATION, ErrorSeverity.MEDIUM, RecoveryStrategy.MANUAL_INTERVENTION, context);
  }
}

export class ProcessNotFoundError extends MigrationBaseError {
  constructor(reference: string) {
    super(`Migration process '${reference}' not found`, 'ProcessNotFound', ErrorCategory.VALIDATION, ErrorSeverity.MEDIUM, RecoveryStrategy.MANUAL_INTERVENTION, { reference });
  }
}

export class RowCoercionError extends MigrationBaseError {
  constructor(
    message: string,
    public readonly column: string,
    public readonly value: unknown,
    context: ErrorContext = {}
  ) {
    super(message, 'RowCoercionError', ErrorCategory.VALIDATION, ErrorSeverity.LOW, RecoveryStrategy.SKIP, {
      column,
      value: value instanceof Date ? value.toISOString() : value,
      ...context
    });
  }
}

export class BatchTransportError extends MigrationBaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'BatchTransportError', ErrorCategory.TRANSPORT, ErrorSeverity.HIGH, RecoveryStrategy.RETRY, context);
  }
}

/**
 * The destination refused the batch itself (constraint, size, type); retrying cannot help
 */
export class BatchRejectedError extends MigrationBaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'BatchRejected', ErrorCategory.TRANSPORT, ErrorSeverity.HIGH, RecoveryStrategy.MANUAL_INTERVENTION, context);
  }
}

export class SystemError extends MigrationBaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'SystemError', ErrorCategory.SYSTEM, ErrorSeverity.CRITICAL, RecoveryStrategy.FAIL_FAST, context);
  }
}

// ===== RETRY HANDLER =====

export interface RetryOptions {
  maxAttempts?: number;
  delayMs?: number;
  backoffMultiplier?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: Error) => boolean;
}

export interface ErrorHandlerConfig {
  maxRetryAttempts: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
}

export class ErrorHandler {
  private config: ErrorHandlerConfig;
  private logger: Logger;
  private errorCounts: Map<string, number> = new Map();

  constructor(logger: Logger, config?: Partial<ErrorHandlerConfig>) {
    this.logger = logger;
    this.config = {
      maxRetryAttempts: 3,
      retryDelayMs: 1000,
      maxRetryDelayMs: 30000,
      ...config
    };
  }

  /**
   * Classify and log an error, returning it as a MigrationBaseError
   */
  handleError(error: unknown, context: ErrorContext = {}): MigrationBaseError {
    const migrationError = classifyError(error, context);
    this.logger.logMigrationError(migrationError);

    const key = `${migrationError.category}:${migrationError.errorCode}`;
    this.errorCounts.set(key, (this.errorCounts.get(key) ?? 0) + 1);

    return migrationError;
  }

  /**
   * Execute operation with retry logic and exponential backoff.
   * maxAttempts counts the first try.
   */
  async withRetry<T>(
    operation: () => Promise<T>,
    operationName: string,
    options?: RetryOptions
  ): Promise<T> {
    const retryOptions: Required<RetryOptions> = {
      maxAttempts: options?.maxAttempts ?? this.config.maxRetryAttempts,
      delayMs: options?.delayMs ?? this.config.retryDelayMs,
      backoffMultiplier: options?.backoffMultiplier ?? 2,
      maxDelayMs: options?.maxDelayMs ?? this.config.maxRetryDelayMs,
      shouldRetry: options?.shouldRetry ?? defaultShouldRetry
    };

    let attempt = 1;

    for (;;) {
      try {
        const result = await operation();

        if (attempt > 1) {
          this.logger.info(`Operation succeeded after ${attempt - 1} retries`, {
            operation_name: operationName,
            total_attempts: attempt
          });
        }

        return result;
      } catch (error) {
        const migrationError = this.handleError(error, {
          operation_name: operationName,
          attempt,
          max_attempts: retryOptions.maxAttempts
        });

        if (attempt >= retryOptions.maxAttempts || !retryOptions.shouldRetry(migrationError)) {
          throw migrationError;
        }

        const delay = computeBackoffDelay(attempt, retryOptions.delayMs, retryOptions.backoffMultiplier, retryOptions.maxDelayMs);

        this.logger.warn(`Operation failed, retrying in ${delay}ms`, {
          operation_name: operationName,
          attempt,
          max_attempts: retryOptions.maxAttempts,
          error_message: migrationError.message,
          delay_ms: delay
        });

        await sleep(delay);
        attempt++;
      }
    }
  }

  getErrorStatistics(): { errorCounts: Record<string, number>; totalErrors: number } {
    const errorCounts = Object.fromEntries(this.errorCounts.entries());
    const totalErrors = Array.from(this.errorCounts.values()).reduce((sum, count) => sum + count, 0);
    return { errorCounts, totalErrors };
  }
}

// ===== UTILITY FUNCTIONS =====

export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  multiplier: number,
  maxDelayMs: number
): number {
  return Math.min(baseDelayMs * Math.pow(multiplier, attempt - 1), maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Convert any thrown value into the taxonomy. Errors already classified pass through.
 */
export function classifyError(error: unknown, context: ErrorContext = {}): MigrationBaseError {
  if (error instanceof MigrationBaseError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const lower = message.toLowerCase();

  if (lower.includes('timeout') || lower.includes('timed out')) {
    return new ConnectTimeoutError(message, context);
  }

  if (lower.includes('econnrefused') || lower.includes('enotfound') || lower.includes('econnreset') || lower.includes('network')) {
    return new SourceUnreachableError(message, context);
  }

  return new SystemError(message, context);
}

/**
 * System and driver errors carry a string code (ENOENT, 28P01, ...)
 */
export function errorCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function defaultShouldRetry(error: Error): boolean {
  return error instanceof MigrationBaseError ? error.retryable : false;
}
