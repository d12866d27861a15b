/**
 * Workbook parsing shared by the local-file and cloud-share connectors.
 * CSV and text files are read without value parsing so strings stay strings.
 */

import * as XLSX from 'xlsx';
import { SourceUnreachableError } from '../lib/error-handler';
import { toSourceValue, type SourceValue } from './source-connector';

export interface ParsedSheet {
  name: string;
  columns: string[];
  rows: SourceValue[][];
}

const TEXT_EXTENSIONS = ['.csv', '.txt'];

export function isTextFile(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return TEXT_EXTENSIONS.some(ext => lower.endsWith(ext));
}

export function parseWorkbook(data: Buffer, fileName: string): XLSX.WorkBook {
  try {
    if (isTextFile(fileName)) {
      return XLSX.read(data.toString('utf8').replace(/^\uFEFF/, ''), { type: 'string', raw: true });
    }
    // serials stay numbers; readSheet turns date-formatted ones into UTC dates
    return XLSX.read(data, { type: 'buffer', cellDates: false, cellNF: true });
  } catch (error) {
    throw new SourceUnreachableError(
      `Could not parse '${fileName}': ${error instanceof Error ? error.message : String(error)}`,
      { file: fileName }
    );
  }
}

/**
 * Header cells become column names; blanks get a positional name and repeats a numeric suffix
 */
export function headerNames(headerRow: unknown[]): string[] {
  const seen = new Map<string, number>();

  return headerRow.map((cell, index) => {
    const raw = cell === null || cell === undefined ? '' : String(cell).trim();
    const base = raw.length > 0 ? raw : `Column_${index + 1}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}_${count + 1}`;
  });
}

interface SerialDateParts {
  y: number;
  m: number;
  d: number;
  H: number;
  M: number;
  S: number;
}

/**
 * Date serial to a UTC Date, whole seconds, independent of the host timezone
 */
export function serialToDate(serial: number, date1904: boolean = false): Date | null {
  const parts: SerialDateParts | null = XLSX.SSF.parse_date_code(serial, { date1904 });
  if (!parts) {
    return null;
  }
  return new Date(Date.UTC(parts.y, parts.m - 1, parts.d, parts.H, parts.M, parts.S));
}

function cellValue(cell: XLSX.CellObject | undefined, date1904: boolean): unknown {
  if (!cell || cell.t === 'z' || cell.t === 'e') {
    return null;
  }
  if (cell.t === 'n' && typeof cell.v === 'number' && typeof cell.z === 'string' && XLSX.SSF.is_date(cell.z)) {
    return serialToDate(cell.v, date1904) ?? cell.v;
  }
  return cell.v ?? null;
}

/**
 * First row is the header; fully blank rows are dropped
 */
export function readSheet(workbook: XLSX.WorkBook, sheetName: string, fileName: string): ParsedSheet {
  const sheet = workbook.Sheets[sheetName];
  if (!sheet) {
    throw new SourceUnreachableError(`Sheet '${sheetName}' not found in '${fileName}'`, {
      file: fileName,
      container: sheetName,
      available: workbook.SheetNames
    });
  }

  const ref = sheet['!ref'];
  if (!ref) {
    return { name: sheetName, columns: [], rows: [] };
  }

  const date1904 = workbook.Workbook?.WBProps?.date1904 === true;
  const range = XLSX.utils.decode_range(ref);
  const matrix: unknown[][] = [];

  for (let r = range.s.r; r <= range.e.r; r++) {
    const values: unknown[] = [];
    for (let c = range.s.c; c <= range.e.c; c++) {
      const cell: XLSX.CellObject | undefined = sheet[XLSX.utils.encode_cell({ r, c })];
      values.push(cellValue(cell, date1904));
    }
    if (values.some(value => value !== null)) {
      matrix.push(values);
    }
  }

  if (matrix.length === 0) {
    return { name: sheetName, columns: [], rows: [] };
  }

  const columns = headerNames(matrix[0]);
  const rows = matrix.slice(1).map(row => columns.map((_, index) => toSourceValue(row[index])));

  return { name: sheetName, columns, rows };
}

export function sheetRecords(sheet: ParsedSheet): Array<Record<string, SourceValue>> {
  return sheet.rows.map(row => {
    const record: Record<string, SourceValue> = {};
    sheet.columns.forEach((column, index) => {
      record[column] = row[index];
    });
    return record;
  });
}
