/**
 * ColumnConfig Model
 * Per-column migration settings and the logical SQL type vocabulary
 */

export const SQL_BASE_TYPES = [
  'BIT',
  'TINYINT',
  'SMALLINT',
  'INT',
  'BIGINT',
  'DECIMAL',
  'FLOAT',
  'MONEY',
  'DATE',
  'DATETIME',
  'NVARCHAR'
] as const;

export type SqlBaseType = typeof SQL_BASE_TYPES[number];

export type SqlTypeFamily = 'boolean' | 'integer' | 'decimal' | 'temporal' | 'text';

export interface ParsedSqlType {
  base: SqlBaseType;
  family: SqlTypeFamily;
  /** Text size; 'MAX' for unbounded, null for non-text types */
  length: number | 'MAX' | null;
}

export const TEXT_LENGTH_BUCKETS = [50, 255] as const;
export const DEFAULT_TEXT_TYPE = 'NVARCHAR(255)';
export const MAX_IDENTIFIER_LENGTH = 128;

/** Default tokens that resolve to the run's timestamp */
export const CURRENT_TIMESTAMP_TOKENS = ['CURRENT_TIMESTAMP', 'GETDATE()', 'NOW()'];

/** Inclusive value range of each integer type */
export const INTEGER_BOUNDS: Record<string, readonly [bigint, bigint]> = {
  TINYINT: [BigInt(0), BigInt(255)],
  SMALLINT: [BigInt(-32768), BigInt(32767)],
  INT: [BigInt(-2147483648), BigInt(2147483647)],
  BIGINT: [BigInt('-9223372036854775808'), BigInt('9223372036854775807')]
};

export interface ColumnConfig {
  container: string;
  originalName: string;
  rename: string;
  sqlType: string;
  confidence: number;
  nullable: boolean;
  /** null is the explicit NULL sentinel; '' is an empty-string default */
  defaultValue: string | null;
  selected: boolean;
}

export interface ColumnConfigCreateInput {
  container: string;
  originalName: string;
  rename?: string;
  sqlType?: string;
  confidence?: number;
  nullable?: boolean;
  defaultValue?: string | null;
  selected?: boolean;
}

const FAMILY_BY_BASE: Record<SqlBaseType, SqlTypeFamily> = {
  BIT: 'boolean',
  TINYINT: 'integer',
  SMALLINT: 'integer',
  INT: 'integer',
  BIGINT: 'integer',
  DECIMAL: 'decimal',
  FLOAT: 'decimal',
  MONEY: 'decimal',
  DATE: 'temporal',
  DATETIME: 'temporal',
  NVARCHAR: 'text'
};

function isSqlBaseType(value: string): value is SqlBaseType {
  return SQL_BASE_TYPES.some(base => base === value);
}

/**
 * Parse "INT", "NVARCHAR(50)", "nvarchar(max)" and the like. Returns null for unknown types.
 */
export function parseSqlType(sqlType: string): ParsedSqlType | null {
  const match = /^\s*([A-Za-z0-9]+)\s*(?:\(\s*([A-Za-z0-9]+)\s*(?:,\s*\d+\s*)?\))?\s*$/.exec(sqlType);
  if (!match) {
    return null;
  }

  const base = match[1].toUpperCase();
  if (!isSqlBaseType(base)) {
    return null;
  }

  const family = FAMILY_BY_BASE[base];
  const argument = match[2];

  if (family !== 'text') {
    // DECIMAL(18,2) style precision is accepted and ignored
    if (argument !== undefined && base !== 'DECIMAL') {
      return null;
    }
    return { base, family, length: null };
  }

  if (argument === undefined) {
    return { base, family, length: 255 };
  }

  if (argument.toUpperCase() === 'MAX') {
    return { base, family, length: 'MAX' };
  }

  const length = Number(argument);
  if (!Number.isInteger(length) || length < 1 || length > 4000) {
    return null;
  }

  return { base, family, length };
}

export function textTypeForLength(maxLength: number): string {
  for (const bucket of TEXT_LENGTH_BUCKETS) {
    if (maxLength <= bucket) {
      return `NVARCHAR(${bucket})`;
    }
  }
  return 'NVARCHAR(MAX)';
}

export function isCurrentTimestampToken(value: string): boolean {
  return CURRENT_TIMESTAMP_TOKENS.includes(value.trim().toUpperCase());
}

export function columnKey(container: string, originalName: string): string {
  return `${container}::${originalName}`;
}

export class ColumnConfigModel {
  static create(input: ColumnConfigCreateInput): ColumnConfig {
    if (!input.container) {
      throw new Error('container is required');
    }
    if (!input.originalName) {
      throw new Error('originalName is required');
    }

    const confidence = input.confidence ?? 0;
    if (confidence < 0 || confidence > 1) {
      throw new Error(`confidence must be between 0 and 1, got ${confidence}`);
    }

    return {
      container: input.container,
      originalName: input.originalName,
      rename: input.rename ?? input.originalName,
      sqlType: input.sqlType ?? DEFAULT_TEXT_TYPE,
      confidence,
      nullable: input.nullable ?? true,
      defaultValue: ColumnConfigModel.normalizeDefaultInput(input.defaultValue ?? null),
      selected: input.selected ?? true
    };
  }

  /**
   * A blank user entry becomes the NULL sentinel; the literal '' means empty string.
   */
  static normalizeDefaultInput(value: string | null): string | null {
    if (value === null) {
      return null;
    }
    const trimmed = value.trim();
    if (trimmed === '') {
      return null;
    }
    if (trimmed === "''") {
      return '';
    }
    return trimmed;
  }

  /**
   * Changing the type never keeps a default that was validated against the old type;
   * callers re-run validation before the process can become ready again.
   */
  static withSqlType(config: ColumnConfig, sqlType: string, confidence?: number): ColumnConfig {
    return {
      ...config,
      sqlType,
      confidence: confidence ?? config.confidence
    };
  }

  /**
   * Rebuild column configs read back from storage
   */
  static restoreList(raw: unknown): ColumnConfig[] {
    if (!Array.isArray(raw)) {
      throw new Error('Stored column configuration must be an array');
    }
    return raw.map((item: unknown, index) => {
      if (typeof item !== 'object' || item === null) {
        throw new Error(`Stored column ${index} is not an object`);
      }
      const record: object = item;
      const field = (key: string): unknown => (key in record ? Reflect.get(record, key) : undefined);
      const container = field('container');
      const originalName = field('originalName');
      const rename = field('rename');
      const sqlType = field('sqlType');
      const confidence = field('confidence');
      const nullable = field('nullable');
      const defaultValue = field('defaultValue');
      const selected = field('selected');

      if (typeof container !== 'string' || typeof originalName !== 'string' || typeof sqlType !== 'string') {
        throw new Error(`Stored column ${index} is missing container, originalName or sqlType`);
      }

      return {
        container,
        originalName,
        rename: typeof rename === 'string' ? rename : originalName,
        sqlType,
        confidence: typeof confidence === 'number' ? confidence : 0,
        nullable: typeof nullable === 'boolean' ? nullable : true,
        defaultValue: typeof defaultValue === 'string' ? defaultValue : null,
        selected: typeof selected === 'boolean' ? selected : true
      };
    });
  }

  static key(config: ColumnConfig): string {
    return columnKey(config.container, config.originalName);
  }
}
