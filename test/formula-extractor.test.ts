import { describe, expect, it } from 'vitest';
import { extractFormulas } from '@/lib/excel/formula-extractor';
import { SheetGrid } from '@/lib/excel/sheet';

const sheet = SheetGrid.fromRows('Sheet1', [
  [1, null],
  [2, '=SUM(A1:A10)'],
  ['=A1+(', { formula: 'A1*2', value: 2 }],
]);

describe('extractFormulas', () => {
  it('emits one record per formula cell in row-major order', () => {
    const { records } = extractFormulas(sheet);

    expect(records.map((record) => record.address)).toEqual(['B2', 'A3', 'B3']);
  });

  it('records position, text and references', () => {
    const [sum] = extractFormulas(sheet).records;

    expect(sum).toEqual({
      sheet: 'Sheet1',
      position: { row: 2, column: 2 },
      address: 'B2',
      formula: '=SUM(A1:A10)',
      references: [
        {
          kind: 'range',
          sheet: 'Sheet1',
          address: 'A1:A10',
          start: { row: 1, column: 1 },
          end: { row: 10, column: 1 },
        },
      ],
      readableFormula: '=SUM(A1:A10)',
      table: null,
      cachedValue: { kind: 'empty' },
    });
  });

  it('keeps the cached value of a formula cell', () => {
    const record = extractFormulas(sheet).records[2];

    expect(record.formula).toBe('=A1*2');
    expect(record.cachedValue).toEqual({ kind: 'number', value: 2 });
  });

  it('keeps unparseable formulas without references and warns', () => {
    const { records, warnings } = extractFormulas(sheet);

    expect(records[1].formula).toBe('=A1+(');
    expect(records[1].references).toEqual([]);
    expect(warnings).toEqual([
      {
        kind: 'FormulaParseWarning',
        sheet: 'Sheet1',
        position: { row: 3, column: 1 },
        message: 'Could not parse references in A3 (=A1+(): Unbalanced parenthesis at offset 5',
      },
    ]);
  });

  it('limits extraction to bounds', () => {
    const { records } = extractFormulas(sheet, { top: 1, left: 1, bottom: 2, right: 2 });

    expect(records.map((record) => record.address)).toEqual(['B2']);
  });

  it('returns nothing for a blank sheet', () => {
    expect(extractFormulas(SheetGrid.fromRows('Empty', []))).toEqual({ records: [], warnings: [] });
  });
});
