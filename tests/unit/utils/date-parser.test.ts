/**
 * Unit Tests: date text recognition
 */

import { hasTimeOfDay, parseDateText } from '../../../src/utils/date-parser';

describe('parseDateText', () => {
  test('ISO dates are read as UTC midnight', () => {
    expect(parseDateText('2024-02-29')).toEqual({ date: new Date('2024-02-29T00:00:00Z'), hasTime: false });
  });

  test('ISO timestamps honour their offset and fractional seconds', () => {
    expect(parseDateText('2024-01-05T10:30:00+02:00')).toEqual({ date: new Date('2024-01-05T08:30:00Z'), hasTime: true });
    expect(parseDateText('2024-01-05T10:30:00.1234Z')?.date.getUTCMilliseconds()).toBe(123);
  });

  test('day-first dates with an optional time', () => {
    expect(parseDateText('5/2/2024')).toEqual({ date: new Date(Date.UTC(2024, 1, 5)), hasTime: false });
    expect(parseDateText(' 31.12.2024 23:59 ')).toEqual({ date: new Date(Date.UTC(2024, 11, 31, 23, 59)), hasTime: true });
  });

  test('rejects impossible calendar dates and times', () => {
    expect(parseDateText('2023-02-29')).toBeNull();
    expect(parseDateText('31/04/2024')).toBeNull();
    expect(parseDateText('2024-01-05 25:00')).toBeNull();
    expect(parseDateText('hello')).toBeNull();
  });
});

describe('hasTimeOfDay', () => {
  test('is false only at UTC midnight', () => {
    expect(hasTimeOfDay(new Date('2024-01-05T00:00:00Z'))).toBe(false);
    expect(hasTimeOfDay(new Date('2024-01-05T00:00:00.001Z'))).toBe(true);
  });
});
