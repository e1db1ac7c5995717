import { describe, expect, it } from 'vitest';
import { classify, extractDelta, normalizeCategory } from './classifier';
import { ClassificationError, InvalidValueError } from '../errors';
import { CounterKind, type CellValue, type ReportRow } from '../types';

function row(category: string, distance: CellValue = null, runtime: CellValue = null): ReportRow {
  return { index: 0, sheetRow: 2, assetId: 'X-1', category, distance, runtime, status: null };
}

describe('classify', () => {
  it.each([
    ['Camión', CounterKind.DISTANCE],
    ['Camiones', CounterKind.DISTANCE],
    ['FLOTA LIVIANA', CounterKind.DISTANCE],
    ['Vehículo utilitario', CounterKind.DISTANCE],
    ['Excavadora', CounterKind.RUNTIME],
    ['Maquinarias', CounterKind.RUNTIME],
    ['Motoniveladora', CounterKind.RUNTIME],
    ['Autoelevador', CounterKind.RUNTIME],
    ['Motobomba', CounterKind.RUNTIME],
    ['Camión grúa', CounterKind.DISTANCE],
    ['Camión tractor', CounterKind.DISTANCE],
    ['Motos', CounterKind.DISTANCE],
  ])('%s counts as %s', (category, kind) => {
    expect(classify(row(category))).toBe(kind);
  });

  it('matches whole words only', () => {
    expect(() => classify(row('Automatización'), null)).toThrow(
      new ClassificationError('Unrecognized category "Automatización"')
    );
  });

  it('uses run time for blank and unknown categories by default', () => {
    expect(classify(row(''))).toBe(CounterKind.RUNTIME);
    expect(classify(row('Equipo especial'))).toBe(CounterKind.RUNTIME);
  });

  it('uses the configured default kind', () => {
    expect(classify(row('Equipo especial'), CounterKind.DISTANCE)).toBe(CounterKind.DISTANCE);
  });

  it('rejects unknown categories when there is no default', () => {
    expect(() => classify(row('Equipo especial'), null)).toThrow(
      new ClassificationError('Unrecognized category "Equipo especial"')
    );
    expect(() => classify(row('  '), null)).toThrow(new ClassificationError('Missing category'));
    expect(classify(row('Camión'), null)).toBe(CounterKind.DISTANCE);
  });
});

describe('normalizeCategory', () => {
  it('drops accents, case and surrounding space', () => {
    expect(normalizeCategory('  Grúa Pluma ')).toBe('grua pluma');
  });
});

describe('extractDelta', () => {
  it('reads kilometres as numbers or decimal text', () => {
    expect(extractDelta(row('Camión', 120), CounterKind.DISTANCE)).toBe(120);
    expect(extractDelta(row('Camión', '35,5'), CounterKind.DISTANCE)).toBe(35.5);
    expect(extractDelta(row('Camión', ' 12.25 '), CounterKind.DISTANCE)).toBe(12.25);
    expect(extractDelta(row('Camión', 0), CounterKind.DISTANCE)).toBe(0);
  });

  it('reads run time as H:MM, H:MM:SS or plain hours', () => {
    expect(extractDelta(row('Excavadora', null, '8:30'), CounterKind.RUNTIME)).toBe(8.5);
    expect(extractDelta(row('Excavadora', null, '1:15:36'), CounterKind.RUNTIME)).toBeCloseTo(1.26);
    expect(extractDelta(row('Excavadora', null, 8.5), CounterKind.RUNTIME)).toBe(8.5);
    expect(extractDelta(row('Excavadora', null, '3'), CounterKind.RUNTIME)).toBe(3);
  });

  it('reads the column that matches the kind', () => {
    const both = row('Camión', 40, '2:00');
    expect(extractDelta(both, CounterKind.DISTANCE)).toBe(40);
    expect(extractDelta(both, CounterKind.RUNTIME)).toBe(2);
  });

  it('rejects missing, negative and non numeric values', () => {
    expect(() => extractDelta(row('Camión'), CounterKind.DISTANCE)).toThrow(
      new InvalidValueError('invalid value: missing distance')
    );
    expect(() => extractDelta(row('Camión', -5), CounterKind.DISTANCE)).toThrow(
      new InvalidValueError('invalid value: distance -5 is negative')
    );
    expect(() => extractDelta(row('Excavadora', null, 'n/a'), CounterKind.RUNTIME)).toThrow(
      new InvalidValueError('invalid value: runtime "n/a" is not a number')
    );
    expect(() => extractDelta(row('Camión', true), CounterKind.DISTANCE)).toThrow(InvalidValueError);
  });
});
