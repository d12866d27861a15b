/**
 * ColumnConfigValidator Service
 *
 * Pure checks that gate a process before it may run: rename normalization and
 * uniqueness per container, known SQL type, and nullable/default consistency.
 */

import {
  DuplicateColumnNameError,
  InvalidDefaultValueError,
  type FailureReason
} from '../lib/error-handler';
import {
  INTEGER_BOUNDS,
  MAX_IDENTIFIER_LENGTH,
  isCurrentTimestampToken,
  parseSqlType,
  type ColumnConfig,
  type ParsedSqlType
} from '../models/column-config';
import { parseDateText } from '../utils/date-parser';

export type ColumnIssueCode =
  | 'DuplicateColumnName'
  | 'EmptyColumnName'
  | 'InvalidSqlType'
  | 'InvalidDefaultValue';

export interface ColumnIssue {
  code: ColumnIssueCode;
  message: string;
  /** Conflicting normalized name for DuplicateColumnName */
  normalized?: string;
  /** Offending value and expected grammar for InvalidDefaultValue */
  value?: string | null;
  expected?: string;
}

export interface ColumnValidationResult {
  container: string;
  originalName: string;
  normalizedName: string;
  valid: boolean;
  issues: ColumnIssue[];
}

export interface ProcessValidationResult {
  valid: boolean;
  columns: ColumnValidationResult[];
}

export interface RenameValidationRequest {
  original_name: string;
  new_name: string;
  existing_names: string[];
}

export interface RenameValidationResponse {
  valid: boolean;
  normalized: string;
  error: string | null;
}

export interface DefaultValidation {
  valid: boolean;
  expected: string;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?\d+(\.\d+)?$/;
const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;
const BIT_VALUES = ['0', '1', 'true', 'false'];

export const DEFAULT_GRAMMARS: Record<ParsedSqlType['family'], string> = {
  integer: 'an optionally signed whole number within the type range (e.g. 0, -12)',
  decimal: 'an optionally signed number with optional fraction (e.g. 0.00)',
  boolean: '{0,1,true,false}',
  temporal: 'CURRENT_TIMESTAMP or a calendar date starting with YYYY-MM-DD',
  text: 'any text within the column size'
};

/**
 * Normalize a rename into a safe identifier.
 * normalizeIdentifier(normalizeIdentifier(x)) === normalizeIdentifier(x)
 */
export function normalizeIdentifier(name: string, maxLength: number = MAX_IDENTIFIER_LENGTH): string {
  const normalized = name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9_]/g, '')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, maxLength);

  // truncation can expose a trailing separator
  return normalized.replace(/_+$/g, '');
}

function withinIntegerRange(value: string, base: string): boolean {
  if (!INTEGER_PATTERN.test(value)) {
    return false;
  }
  const [min, max] = INTEGER_BOUNDS[base];
  const parsed = BigInt(value);
  return parsed >= min && parsed <= max;
}

function isTemporalDefault(value: string): boolean {
  return isCurrentTimestampToken(value) || (ISO_DATE_PREFIX.test(value) && parseDateText(value) !== null);
}

/**
 * Type-specific grammar check for a default value. Empty values and the NULL
 * sentinel are reported invalid here; callers decide whether nullability allows them.
 */
export function validateDefaultValue(value: string | null, sqlType: string): DefaultValidation {
  const parsed = parseSqlType(sqlType);
  if (!parsed) {
    return { valid: false, expected: `a known SQL type (got ${sqlType})` };
  }

  const expected = DEFAULT_GRAMMARS[parsed.family];

  if (value === null) {
    return { valid: false, expected };
  }

  switch (parsed.family) {
    case 'integer':
      return { valid: withinIntegerRange(value, parsed.base), expected };
    case 'decimal':
      return { valid: DECIMAL_PATTERN.test(value), expected };
    case 'boolean':
      return { valid: BIT_VALUES.includes(value.toLowerCase()), expected };
    case 'temporal':
      return { valid: isTemporalDefault(value), expected };
    case 'text':
      return {
        valid: parsed.length === 'MAX' || parsed.length === null || value.length <= parsed.length,
        expected: parsed.length === 'MAX' ? expected : `text of at most ${parsed.length} characters`
      };
  }
}

function validateColumnDefault(column: ColumnConfig): ColumnIssue | null {
  const isEmpty = column.defaultValue === null;

  if (isEmpty) {
    if (column.nullable) {
      return null;
    }
    const { expected } = validateDefaultValue(null, column.sqlType);
    const error = new InvalidDefaultValueError(null, expected);
    return { code: 'InvalidDefaultValue', message: error.message, value: null, expected };
  }

  // '' is an explicit empty-string default: text only, and never standing in for a required value
  const check = validateDefaultValue(column.defaultValue, column.sqlType);
  const emptyAllowed = column.defaultValue !== '' ||
    (column.nullable && parseSqlType(column.sqlType)?.family === 'text');

  if (check.valid && emptyAllowed) {
    return null;
  }

  const error = new InvalidDefaultValueError(column.defaultValue, check.expected);
  return { code: 'InvalidDefaultValue', message: error.message, value: column.defaultValue, expected: check.expected };
}

/**
 * Validate every selected column of a process. Unselected columns are not checked.
 */
export function validateColumnConfigs(columns: ColumnConfig[]): ProcessValidationResult {
  const selected = columns.filter(column => column.selected);
  const seen = new Map<string, string>(); // container::lower(normalized) -> originalName
  const results: ColumnValidationResult[] = [];

  for (const column of selected) {
    const issues: ColumnIssue[] = [];
    const normalizedName = normalizeIdentifier(column.rename || column.originalName);

    if (!normalizedName) {
      issues.push({
        code: 'EmptyColumnName',
        message: `Column '${column.originalName}' has no usable name after normalization`
      });
    } else {
      const key = `${column.container}::${normalizedName.toLowerCase()}`;
      const firstOwner = seen.get(key);
      if (firstOwner !== undefined) {
        const error = new DuplicateColumnNameError(normalizedName, { container: column.container, conflictsWith: firstOwner });
        issues.push({ code: 'DuplicateColumnName', message: error.message, normalized: normalizedName });
      } else {
        seen.set(key, column.originalName);
      }
    }

    if (!parseSqlType(column.sqlType)) {
      issues.push({ code: 'InvalidSqlType', message: `SQL type '${column.sqlType}' is not supported` });
    } else {
      const defaultIssue = validateColumnDefault(column);
      if (defaultIssue) {
        issues.push(defaultIssue);
      }
    }

    results.push({
      container: column.container,
      originalName: column.originalName,
      normalizedName,
      valid: issues.length === 0,
      issues
    });
  }

  return {
    valid: results.every(result => result.valid),
    columns: results
  };
}

/**
 * Single rename check used while a user edits a column name
 */
export function validateRename(request: RenameValidationRequest): RenameValidationResponse {
  const normalized = normalizeIdentifier(request.new_name || request.original_name);

  if (!normalized) {
    return { valid: false, normalized: '', error: 'The name is empty after removing unsupported characters' };
  }

  const existing = new Set(
    request.existing_names
      .map(name => normalizeIdentifier(name).toLowerCase())
      .filter(name => name.length > 0)
  );

  if (existing.has(normalized.toLowerCase())) {
    return { valid: false, normalized, error: new DuplicateColumnNameError(normalized).message };
  }

  return { valid: true, normalized, error: null };
}

/**
 * Compact failure reason for a rejected configuration, stored in logs and shown to users
 */
export function summarizeValidation(result: ProcessValidationResult): FailureReason['context'] {
  return {
    invalidColumns: result.columns
      .filter(column => !column.valid)
      .map(column => ({
        container: column.container,
        column: column.originalName,
        issues: column.issues.map(issue => issue.code)
      }))
  };
}
