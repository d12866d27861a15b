/**
 * Unit Tests: ColumnConfig Model
 * SQL type parsing, text sizing, defaults and restoring stored configs
 */

import {
  ColumnConfigModel,
  columnKey,
  isCurrentTimestampToken,
  parseSqlType,
  textTypeForLength
} from '../../../src/models/column-config';

describe('parseSqlType', () => {
  test('parses plain base types case-insensitively', () => {
    expect(parseSqlType('INT')).toEqual({ base: 'INT', family: 'integer', length: null });
    expect(parseSqlType('datetime')).toEqual({ base: 'DATETIME', family: 'temporal', length: null });
    expect(parseSqlType(' bit ')).toEqual({ base: 'BIT', family: 'boolean', length: null });
  });

  test('reads text lengths', () => {
    expect(parseSqlType('NVARCHAR(50)')).toEqual({ base: 'NVARCHAR', family: 'text', length: 50 });
    expect(parseSqlType('nvarchar(max)')).toEqual({ base: 'NVARCHAR', family: 'text', length: 'MAX' });
    expect(parseSqlType('NVARCHAR')).toEqual({ base: 'NVARCHAR', family: 'text', length: 255 });
  });

  test('accepts DECIMAL precision and ignores it', () => {
    expect(parseSqlType('DECIMAL(18,2)')).toEqual({ base: 'DECIMAL', family: 'decimal', length: null });
  });

  test('rejects unknown types and misplaced arguments', () => {
    expect(parseSqlType('VARCHAR(10)')).toBeNull();
    expect(parseSqlType('INT(4)')).toBeNull();
    expect(parseSqlType('NVARCHAR(5000)')).toBeNull();
    expect(parseSqlType('NVARCHAR(0)')).toBeNull();
    expect(parseSqlType('')).toBeNull();
  });
});

describe('textTypeForLength', () => {
  test('picks the smallest bucket that fits', () => {
    expect(textTypeForLength(12)).toBe('NVARCHAR(50)');
    expect(textTypeForLength(50)).toBe('NVARCHAR(50)');
    expect(textTypeForLength(51)).toBe('NVARCHAR(255)');
    expect(textTypeForLength(300)).toBe('NVARCHAR(MAX)');
  });
});

describe('isCurrentTimestampToken', () => {
  test('matches the timestamp tokens regardless of case', () => {
    expect(isCurrentTimestampToken('current_timestamp')).toBe(true);
    expect(isCurrentTimestampToken(' GETDATE() ')).toBe(true);
    expect(isCurrentTimestampToken('NOW()')).toBe(true);
    expect(isCurrentTimestampToken('2024-01-01')).toBe(false);
  });
});

describe('ColumnConfigModel', () => {
  test('create fills defaults', () => {
    expect(ColumnConfigModel.create({ container: 'Hoja1', originalName: 'Edad' })).toEqual({
      container: 'Hoja1',
      originalName: 'Edad',
      rename: 'Edad',
      sqlType: 'NVARCHAR(255)',
      confidence: 0,
      nullable: true,
      defaultValue: null,
      selected: true
    });
  });

  test('create rejects missing names and out-of-range confidence', () => {
    expect(() => ColumnConfigModel.create({ container: '', originalName: 'a' })).toThrow('container is required');
    expect(() => ColumnConfigModel.create({ container: 'c', originalName: '' })).toThrow('originalName is required');
    expect(() => ColumnConfigModel.create({ container: 'c', originalName: 'a', confidence: 1.5 }))
      .toThrow('confidence must be between 0 and 1, got 1.5');
  });

  test('normalizeDefaultInput separates NULL from the empty string', () => {
    expect(ColumnConfigModel.normalizeDefaultInput(null)).toBeNull();
    expect(ColumnConfigModel.normalizeDefaultInput('   ')).toBeNull();
    expect(ColumnConfigModel.normalizeDefaultInput("''")).toBe('');
    expect(ColumnConfigModel.normalizeDefaultInput(' 5 ')).toBe('5');
  });

  test('withSqlType keeps every other setting', () => {
    const column = ColumnConfigModel.create({ container: 'c', originalName: 'a', sqlType: 'INT', confidence: 0.9, defaultValue: '0' });
    expect(ColumnConfigModel.withSqlType(column, 'BIGINT')).toEqual({ ...column, sqlType: 'BIGINT' });
    expect(ColumnConfigModel.withSqlType(column, 'BIGINT', 1).confidence).toBe(1);
  });

  test('restoreList fills absent optional fields', () => {
    const restored = ColumnConfigModel.restoreList([
      { container: 'c', originalName: 'a', sqlType: 'INT' },
      { container: 'c', originalName: 'b', sqlType: 'BIT', rename: 'flag', nullable: false, defaultValue: '0', selected: false, confidence: 1 }
    ]);

    expect(restored).toEqual([
      { container: 'c', originalName: 'a', rename: 'a', sqlType: 'INT', confidence: 0, nullable: true, defaultValue: null, selected: true },
      { container: 'c', originalName: 'b', rename: 'flag', sqlType: 'BIT', confidence: 1, nullable: false, defaultValue: '0', selected: false }
    ]);
  });

  test('restoreList rejects malformed input', () => {
    expect(() => ColumnConfigModel.restoreList({})).toThrow('Stored column configuration must be an array');
    expect(() => ColumnConfigModel.restoreList([42])).toThrow('Stored column 0 is not an object');
    expect(() => ColumnConfigModel.restoreList([{ container: 'c' }])).toThrow('Stored column 0 is missing container, originalName or sqlType');
  });

  test('key combines container and original name', () => {
    const column = ColumnConfigModel.create({ container: 'Hoja1', originalName: 'Edad' });
    expect(ColumnConfigModel.key(column)).toBe(columnKey('Hoja1', 'Edad'));
    expect(columnKey('Hoja1', 'Edad')).toBe('Hoja1::Edad');
  });
});
