/**
 * SchemaInferenceEngine Service
 *
 * Suggests a logical SQL type, confidence and nullability for each sampled column.
 * Classification is priority ordered: BIT, integer, decimal, date, text.
 * Results are suggestions only; callers apply them to a ColumnConfig explicitly.
 */

import { DEFAULT_TEXT_TYPE, textTypeForLength } from '../models/column-config';
import { isEmptyValue, type ColumnSample, type SourceValue } from '../connectors/source-connector';
import { hasTimeOfDay, parseDateText } from '../utils/date-parser';

export const INFERENCE_LOW_CONFIDENCE = 'InferenceLowConfidence';

export interface InferenceOptions {
  /** Fraction of non-empty samples a class needs to win; 1.0 means all */
  matchThreshold: number;
  /** Results below this confidence carry an InferenceLowConfidence warning */
  lowConfidenceThreshold: number;
  /** Samples inspected per column */
  sampleSize: number;
}

export interface InferenceWarning {
  code: typeof INFERENCE_LOW_CONFIDENCE | 'EmptyColumn' | 'MixedTypes';
  message: string;
}

export interface InferredColumnType {
  name: string;
  sqlType: string;
  confidence: number;
  nullable: boolean;
  suggestedDefault: string | null;
  sampleCount: number;
  nonEmptyCount: number;
  warnings: InferenceWarning[];
}

export interface InferenceRequest {
  container: string;
  columns: string[];
}

export interface InferenceResponse {
  types: Record<string, { sql_type: string; confidence: number; nullable: boolean }>;
}

const DEFAULT_OPTIONS: InferenceOptions = {
  matchThreshold: 1.0,
  lowConfidenceThreshold: 0.8,
  sampleSize: 100
};

const BIT_LITERALS = ['0', '1', 'true', 'false'];

const INTEGER_TEXT = /^[+-]?\d+$/;
const DECIMAL_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const INT64_MIN = BigInt('-9223372036854775808');
const INT64_MAX = BigInt('9223372036854775807');

interface IntegerRange {
  base: 'TINYINT' | 'SMALLINT' | 'INT' | 'BIGINT';
  min: bigint;
  max: bigint;
}

const INTEGER_RANGES: IntegerRange[] = [
  { base: 'TINYINT', min: BigInt(0), max: BigInt(255) },
  { base: 'SMALLINT', min: BigInt(-32768), max: BigInt(32767) },
  { base: 'INT', min: BigInt(-2147483648), max: BigInt(2147483647) },
  { base: 'BIGINT', min: INT64_MIN, max: INT64_MAX }
];

const SUGGESTED_DEFAULTS: Record<string, string> = {
  BIT: '0',
  TINYINT: '0',
  SMALLINT: '0',
  INT: '0',
  BIGINT: '0',
  DECIMAL: '0.0',
  FLOAT: '0.0',
  DATE: 'CURRENT_TIMESTAMP',
  DATETIME: 'CURRENT_TIMESTAMP'
};

interface IntegerMatch {
  value: bigint;
  /** Parsed from text rather than a typed numeric cell */
  fromText: boolean;
}

function asText(value: SourceValue): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value).trim();
}

function matchBit(value: SourceValue): boolean {
  if (typeof value === 'boolean') {
    return true;
  }
  if (value instanceof Date) {
    return false;
  }
  return BIT_LITERALS.includes(asText(value).toLowerCase());
}

function matchInteger(value: SourceValue): IntegerMatch | null {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || !Number.isSafeInteger(value)) {
      return null;
    }
    return { value: BigInt(value), fromText: false };
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (!INTEGER_TEXT.test(text)) {
    return null;
  }

  const parsed = BigInt(text);
  if (parsed < INT64_MIN || parsed > INT64_MAX) {
    return null;
  }
  return { value: parsed, fromText: true };
}

function matchDecimal(value: SourceValue): { exponent: boolean } | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { exponent: String(value).toLowerCase().includes('e') } : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const text = value.trim();
  if (!DECIMAL_TEXT.test(text)) {
    return null;
  }
  return { exponent: /e/i.test(text) };
}

/**
 * Returns whether the value is a date and whether it carries a time of day
 */
export function matchDate(value: SourceValue): { hasTime: boolean } | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : { hasTime: hasTimeOfDay(value) };
  }
  if (typeof value !== 'string') {
    return null;
  }
  const parsed = parseDateText(value);
  return parsed ? { hasTime: parsed.hasTime } : null;
}

function narrowestInteger(matches: IntegerMatch[]): string {
  let min = matches[0].value;
  let max = matches[0].value;
  for (const match of matches) {
    if (match.value < min) min = match.value;
    if (match.value > max) max = match.value;
  }

  // text digits carry no declared width, so they start at INT
  const floor = matches.some(match => match.fromText) ? 2 : 0;

  for (const range of INTEGER_RANGES.slice(floor)) {
    if (min >= range.min && max <= range.max) {
      return range.base;
    }
  }
  return 'BIGINT';
}

export class SchemaInferenceEngine {
  private options: InferenceOptions;

  constructor(options?: Partial<InferenceOptions>) {
    this.options = { ...DEFAULT_OPTIONS, ...options };

    if (this.options.matchThreshold <= 0 || this.options.matchThreshold > 1) {
      throw new Error(`matchThreshold must be in (0, 1], got ${this.options.matchThreshold}`);
    }
    if (this.options.sampleSize < 1) {
      throw new Error(`sampleSize must be at least 1, got ${this.options.sampleSize}`);
    }
  }

  get sampleSize(): number {
    return this.options.sampleSize;
  }

  /**
   * Infer the type of one column from its samples
   */
  inferColumn(name: string, samples: SourceValue[]): InferredColumnType {
    const inspected = samples.slice(0, this.options.sampleSize);
    const nonEmpty = inspected.filter(value => !isEmptyValue(value));
    const nullable = nonEmpty.length < inspected.length;

    if (nonEmpty.length === 0) {
      return {
        name,
        sqlType: DEFAULT_TEXT_TYPE,
        confidence: 0,
        nullable: true,
        suggestedDefault: null,
        sampleCount: inspected.length,
        nonEmptyCount: 0,
        warnings: [
          { code: 'EmptyColumn', message: `Column '${name}' has no non-empty samples` },
          { code: INFERENCE_LOW_CONFIDENCE, message: `No evidence to infer a type for '${name}'` }
        ]
      };
    }

    const { sqlType, matched } = this.classify(nonEmpty);
    const confidence = matched / nonEmpty.length;
    const warnings: InferenceWarning[] = [];

    if (confidence < 1) {
      warnings.push({
        code: 'MixedTypes',
        message: `${nonEmpty.length - matched} of ${nonEmpty.length} samples do not fit ${sqlType}`
      });
    }
    if (confidence < this.options.lowConfidenceThreshold) {
      warnings.push({
        code: INFERENCE_LOW_CONFIDENCE,
        message: `Confidence ${confidence.toFixed(2)} for '${name}' is below ${this.options.lowConfidenceThreshold}`
      });
    }

    return {
      name,
      sqlType,
      confidence,
      nullable,
      suggestedDefault: SUGGESTED_DEFAULTS[sqlType] ?? '',
      sampleCount: inspected.length,
      nonEmptyCount: nonEmpty.length,
      warnings
    };
  }

  inferColumns(columns: ColumnSample[]): InferredColumnType[] {
    return columns.map(column => this.inferColumn(column.name, column.samples));
  }

  /**
   * Boundary contract: restrict to the requested columns, in request order.
   * Requested columns absent from the container are reported as empty.
   */
  respond(request: InferenceRequest, schema: ColumnSample[]): InferenceResponse {
    const byName = new Map(schema.map(column => [column.name, column.samples]));
    const types: InferenceResponse['types'] = {};

    for (const name of request.columns) {
      const result = this.inferColumn(name, byName.get(name) ?? []);
      types[name] = {
        sql_type: result.sqlType,
        confidence: result.confidence,
        nullable: result.nullable
      };
    }

    return { types };
  }

  private wins(matched: number, total: number): boolean {
    return matched / total >= this.options.matchThreshold;
  }

  private classify(values: SourceValue[]): { sqlType: string; matched: number } {
    const total = values.length;

    const bits = values.filter(matchBit).length;
    if (this.wins(bits, total)) {
      return { sqlType: 'BIT', matched: bits };
    }

    const integers: IntegerMatch[] = [];
    for (const value of values) {
      const match = matchInteger(value);
      if (match) {
        integers.push(match);
      }
    }
    if (integers.length > 0 && this.wins(integers.length, total)) {
      return { sqlType: narrowestInteger(integers), matched: integers.length };
    }

    let decimals = 0;
    let exponent = false;
    for (const value of values) {
      const match = matchDecimal(value);
      if (match) {
        decimals++;
        exponent = exponent || match.exponent;
      }
    }
    if (this.wins(decimals, total)) {
      return { sqlType: exponent ? 'FLOAT' : 'DECIMAL', matched: decimals };
    }

    let dates = 0;
    let withTime = false;
    for (const value of values) {
      const match = matchDate(value);
      if (match) {
        dates++;
        withTime = withTime || match.hasTime;
      }
    }
    if (this.wins(dates, total)) {
      return { sqlType: withTime ? 'DATETIME' : 'DATE', matched: dates };
    }

    const maxLength = Math.max(...values.map(value => asText(value).length));
    return { sqlType: textTypeForLength(maxLength), matched: total };
  }
}
