/**
 * Unit Tests: SchemaInferenceEngine
 * Priority-ordered classification, confidence and nullability from samples
 */

import { SchemaInferenceEngine } from '../../../src/services/schema-inference-engine';

describe('SchemaInferenceEngine', () => {
  const engine = new SchemaInferenceEngine();

  test('text digits with a blank infer a nullable INT', () => {
    expect(engine.inferColumn('Edad', ['34', '29', '', '41'])).toEqual({
      name: 'Edad',
      sqlType: 'INT',
      confidence: 1,
      nullable: true,
      suggestedDefault: '0',
      sampleCount: 4,
      nonEmptyCount: 3,
      warnings: []
    });
  });

  test('typed numeric cells use the narrowest integer range', () => {
    expect(engine.inferColumn('a', [1, 200, 3]).sqlType).toBe('TINYINT');
    expect(engine.inferColumn('a', [1, -5]).sqlType).toBe('SMALLINT');
    expect(engine.inferColumn('a', [1, 70000]).sqlType).toBe('INT');
    expect(engine.inferColumn('a', ['9999999999']).sqlType).toBe('BIGINT');
  });

  test('BIT wins over integers when every value is a bit literal', () => {
    const result = engine.inferColumn('Activo', ['1', '0', 'TRUE', true]);
    expect(result.sqlType).toBe('BIT');
    expect(result.nullable).toBe(false);
    expect(result.suggestedDefault).toBe('0');
  });

  test('decimals and exponents', () => {
    expect(engine.inferColumn('p', ['1.5', '2', '3.25'])).toMatchObject({ sqlType: 'DECIMAL', suggestedDefault: '0.0' });
    expect(engine.inferColumn('p', ['1e5', '2.5'])).toMatchObject({ sqlType: 'FLOAT', suggestedDefault: '0.0' });
  });

  test('dates with and without time of day', () => {
    expect(engine.inferColumn('f', ['2024-01-05', '05/02/2024'])).toMatchObject({
      sqlType: 'DATE',
      suggestedDefault: 'CURRENT_TIMESTAMP'
    });
    expect(engine.inferColumn('f', ['2024-01-05 10:30', new Date('2024-01-06T00:00:00Z')]).sqlType).toBe('DATETIME');
  });

  test('anything else is text sized by the longest sample', () => {
    expect(engine.inferColumn('n', ['abc', 'hello world'])).toMatchObject({
      sqlType: 'NVARCHAR(50)',
      confidence: 1,
      suggestedDefault: ''
    });
    expect(engine.inferColumn('n', ['x'.repeat(60)]).sqlType).toBe('NVARCHAR(255)');
  });

  test('mixed values fall through to text at the default threshold', () => {
    expect(engine.inferColumn('c', ['1', '2', '3', 'x'])).toMatchObject({ sqlType: 'NVARCHAR(50)', confidence: 1 });
  });

  test('a lower threshold lets the majority class win with a confidence warning', () => {
    const lenient = new SchemaInferenceEngine({ matchThreshold: 0.75 });
    const result = lenient.inferColumn('c', ['1', '2', '3', 'x']);

    expect(result.sqlType).toBe('INT');
    expect(result.confidence).toBe(0.75);
    expect(result.warnings).toEqual([
      { code: 'MixedTypes', message: '1 of 4 samples do not fit INT' },
      { code: 'InferenceLowConfidence', message: "Confidence 0.75 for 'c' is below 0.8" }
    ]);
  });

  test('an all-empty column is low-confidence text', () => {
    const result = engine.inferColumn('Vacia', [' ', null, '']);

    expect(result).toMatchObject({
      sqlType: 'NVARCHAR(255)',
      confidence: 0,
      nullable: true,
      suggestedDefault: null,
      sampleCount: 3,
      nonEmptyCount: 0
    });
    expect(result.warnings.map(warning => warning.code)).toEqual(['EmptyColumn', 'InferenceLowConfidence']);
  });

  test('inspects only the configured sample size', () => {
    const small = new SchemaInferenceEngine({ sampleSize: 2 });
    expect(small.inferColumn('c', ['1', '2', 'x'])).toMatchObject({ sqlType: 'INT', sampleCount: 2 });
  });

  test('rejects invalid options', () => {
    expect(() => new SchemaInferenceEngine({ matchThreshold: 0 })).toThrow('matchThreshold must be in (0, 1], got 0');
    expect(() => new SchemaInferenceEngine({ sampleSize: 0 })).toThrow('sampleSize must be at least 1, got 0');
  });

  test('respond answers in request order and reports unknown columns as empty', () => {
    const response = engine.respond(
      { container: 'Hoja1', columns: ['Nombre', 'Edad', 'Falta'] },
      [
        { name: 'Edad', samples: ['34', '29', '', '41'] },
        { name: 'Nombre', samples: ['Ana', 'Luis'] }
      ]
    );

    expect(Object.keys(response.types)).toEqual(['Nombre', 'Edad', 'Falta']);
    expect(response.types).toEqual({
      Nombre: { sql_type: 'NVARCHAR(50)', confidence: 1, nullable: false },
      Edad: { sql_type: 'INT', confidence: 1, nullable: true },
      Falta: { sql_type: 'NVARCHAR(255)', confidence: 0, nullable: true }
    });
  });
});
