/**
 * Row transformation: column selection, rename, type coercion and default substitution.
 * Every failure surfaces as a RowCoercionError naming the source column.
 */

import { ConfigurationInvalidError, RowCoercionError } from '../lib/error-handler';
import {
  INTEGER_BOUNDS,
  isCurrentTimestampToken,
  parseSqlType,
  type ColumnConfig,
  type ParsedSqlType
} from '../models/column-config';
import { isEmptyValue, type SourceRow, type SourceValue } from '../connectors/source-connector';
import { parseDateText } from '../utils/date-parser';
import { normalizeIdentifier } from './column-config-validator';

export type DestinationValue = string | number | boolean | Date | null;

export type DestinationRow = Record<string, DestinationValue>;

export interface PreparedColumn {
  source: string;
  target: string;
  sqlType: string;
  parsedType: ParsedSqlType;
  nullable: boolean;
  defaultValue: string | null;
}

const TRUE_WORDS = ['1', 'true', 'si', 'sí', 'yes', 'y', 's'];
const FALSE_WORDS = ['0', 'false', 'no', 'n'];

const INTEGER_TEXT = /^[+-]?\d+(?:\.0+)?$/;
const DECIMAL_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;
const FLOAT_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function describe(value: SourceValue): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

function fail(column: string, value: SourceValue, expected: string): never {
  throw new RowCoercionError(`Value '${describe(value)}' in column '${column}' is not a valid ${expected}`, column, value);
}

function coerceInteger(value: SourceValue, type: ParsedSqlType, column: string): number | string {
  let digits: string;
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || !Number.isSafeInteger(value)) {
      fail(column, value, type.base);
    }
    digits = String(value);
  } else if (typeof value === 'string' && INTEGER_TEXT.test(value.trim())) {
    digits = value.trim().replace(/\.0+$/, '');
  } else {
    fail(column, value, type.base);
  }

  const parsed = BigInt(digits);
  const [min, max] = INTEGER_BOUNDS[type.base];
  if (parsed < min || parsed > max) {
    throw new RowCoercionError(`Value ${digits} in column '${column}' is outside the ${type.base} range`, column, value);
  }

  // BIGINT beyond the safe range stays textual
  return Number.isSafeInteger(Number(parsed)) ? Number(parsed) : parsed.toString();
}

/**
 * Exact decimal kept as a canonical string: no plus sign, no bare leading or trailing dot
 */
export function canonicalDecimal(text: string): string {
  let value = text.trim().replace(/^\+/, '');
  const negative = value.startsWith('-');
  if (negative) {
    value = value.slice(1);
  }
  if (value.startsWith('.')) {
    value = `0${value}`;
  }
  if (value.endsWith('.')) {
    value = value.slice(0, -1);
  }
  value = value.replace(/^0+(?=\d)/, '');
  return negative && /[1-9]/.test(value) ? `-${value}` : value;
}

function coerceDecimal(value: SourceValue, type: ParsedSqlType, column: string): string | number {
  if (type.base === 'FLOAT') {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value;
    }
    if (typeof value === 'string' && FLOAT_TEXT.test(value.trim())) {
      return Number(value.trim());
    }
    fail(column, value, type.base);
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    return canonicalDecimal(String(value));
  }
  if (typeof value === 'string' && DECIMAL_TEXT.test(value.trim())) {
    return canonicalDecimal(value);
  }
  fail(column, value, type.base);
}

function coerceBoolean(value: SourceValue, column: string): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number' && (value === 0 || value === 1)) {
    return value === 1;
  }
  if (typeof value === 'string') {
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.includes(word)) {
      return true;
    }
    if (FALSE_WORDS.includes(word)) {
      return false;
    }
  }
  fail(column, value, 'BIT');
}

function coerceTemporal(value: SourceValue, type: ParsedSqlType, column: string, runTimestamp: Date): Date {
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value;
  }
  if (typeof value === 'string') {
    if (isCurrentTimestampToken(value)) {
      return runTimestamp;
    }
    const parsed = parseDateText(value);
    if (parsed) {
      return parsed.date;
    }
  }
  fail(column, value, type.base);
}

function coerceText(value: SourceValue, type: ParsedSqlType, column: string): string {
  const text = value instanceof Date ? value.toISOString() : String(value);
  if (typeof type.length === 'number' && text.length > type.length) {
    throw new RowCoercionError(
      `Value in column '${column}' has ${text.length} characters; ${type.base}(${type.length}) allows ${type.length}`,
      column,
      text.slice(0, 50)
    );
  }
  return text;
}

/**
 * Coerce one non-empty source value to the column's logical type
 */
export function coerceValue(value: SourceValue, type: ParsedSqlType, column: string, runTimestamp: Date): DestinationValue {
  switch (type.family) {
    case 'integer':
      return coerceInteger(value, type, column);
    case 'decimal':
      return coerceDecimal(value, type, column);
    case 'boolean':
      return coerceBoolean(value, column);
    case 'temporal':
      return coerceTemporal(value, type, column, runTimestamp);
    case 'text':
      return coerceText(value, type, column);
  }
}

export function prepareColumns(columns: ColumnConfig[]): PreparedColumn[] {
  return columns
    .filter(column => column.selected)
    .map(column => {
      const parsedType = parseSqlType(column.sqlType);
      if (!parsedType) {
        throw new ConfigurationInvalidError(`Column '${column.originalName}' has unsupported SQL type '${column.sqlType}'`, {
          container: column.container,
          column: column.originalName
        });
      }
      return {
        source: column.originalName,
        target: normalizeIdentifier(column.rename || column.originalName),
        sqlType: column.sqlType,
        parsedType,
        nullable: column.nullable,
        defaultValue: column.defaultValue
      };
    });
}

export class RowTransformer {
  readonly columns: PreparedColumn[];

  constructor(columns: ColumnConfig[], private readonly runTimestamp: Date) {
    this.columns = prepareColumns(columns);
  }

  get targetNames(): string[] {
    return this.columns.map(column => column.target);
  }

  get sourceNames(): string[] {
    return this.columns.map(column => column.source);
  }

  /**
   * Build the destination row or throw RowCoercionError
   */
  transform(row: SourceRow): DestinationRow {
    const output: DestinationRow = {};

    for (const column of this.columns) {
      output[column.target] = this.resolveValue(column, row[column.source]);
    }

    return output;
  }

  private resolveValue(column: PreparedColumn, value: SourceValue | undefined): DestinationValue {
    if (value !== undefined && !isEmptyValue(value)) {
      return coerceValue(value, column.parsedType, column.source, this.runTimestamp);
    }

    if (column.defaultValue !== null) {
      if (column.defaultValue === '' && column.parsedType.family === 'text') {
        return '';
      }
      return coerceValue(column.defaultValue, column.parsedType, column.source, this.runTimestamp);
    }

    if (column.nullable) {
      return null;
    }

    throw new RowCoercionError(`Column '${column.source}' requires a value and has no default`, column.source, null);
  }
}
