import { describe, expect, it } from 'vitest';
import { buildHeaderLabels, classifyHeaderRow, makeUnique, synthesizeHeaders } from '@/lib/excel/header-detector';
import { type RawValue, toCellValue } from '@/lib/excel/sheet';
import type { CellValue } from '@/lib/types';

const row = (...values: RawValue[]): CellValue[] => values.map(toCellValue);

describe('classifyHeaderRow', () => {
  it('detects an all-text row over a numeric row as a header', () => {
    const result = classifyHeaderRow([row('Item', 'Qty', 'Price'), row('Apples', 3, 1.5)]);

    expect(result.hasHeader).toBe(true);
    expect(result.confidence).toBe(95);
    expect(result.uncertain).toBe(false);
  });

  it('counts a date below as numeric evidence', () => {
    const result = classifyHeaderRow([row('When', 'Who'), row(new Date(Date.UTC(2024, 0, 5)), 'Ana')]);

    expect(result.hasHeader).toBe(true);
    expect(result.uncertain).toBe(false);
  });

  it('lowers confidence when a header cell is empty', () => {
    const result = classifyHeaderRow([row('Name', null), row('x', 1)]);

    expect(result).toMatchObject({ hasHeader: true, confidence: 85, uncertain: false });
  });

  it('treats a row without text as data', () => {
    const result = classifyHeaderRow([row(1, 2), row(3, 4)]);

    expect(result).toMatchObject({ hasHeader: false, confidence: 90, uncertain: false });
  });

  it('treats an empty first row as having no header', () => {
    const result = classifyHeaderRow([row(null, null), row(1, 2)]);

    expect(result).toMatchObject({ hasHeader: false, confidence: 100 });
  });

  it('resolves an all-text sample toward a header and flags it', () => {
    const result = classifyHeaderRow([row('North', 'South'), row('East', 'West')]);

    expect(result).toMatchObject({ hasHeader: true, confidence: 50, uncertain: true });
  });

  it('raises confidence when numbers appear further down', () => {
    const result = classifyHeaderRow([row('Region', 'Lead'), row('East', 'Kim'), row(10, 20)]);

    expect(result).toMatchObject({ hasHeader: true, confidence: 60, uncertain: true });
  });

  it('resolves a mixed first row toward a header', () => {
    const result = classifyHeaderRow([row('Total', 42), row('x', 1)]);

    expect(result).toMatchObject({ hasHeader: true, confidence: 30, uncertain: true });
    expect(result.reasons).toEqual(['Mixed first row (1 of 2 cells are text)']);
  });
});

describe('header labels', () => {
  it('synthesizes positional names', () => {
    expect(synthesizeHeaders(3)).toEqual(['Column1', 'Column2', 'Column3']);
  });

  it('fills blanks and suffixes duplicates with their column', () => {
    const labels = buildHeaderLabels([...row('Amount', 'Amount', null), ' Amount ']);

    expect(labels).toEqual(['Amount', 'Amount_2', 'Column3', 'Amount_4']);
  });

  it('renders non-text header cells as text', () => {
    expect(buildHeaderLabels(row(2024, true))).toEqual(['2024', 'TRUE']);
  });

  it('keeps suffixed labels unique against existing ones', () => {
    expect(makeUnique(['A', 'A', 'A_2'])).toEqual(['A', 'A_2', 'A_2_3']);
  });

  it('suffixes labels that cannot be object keys', () => {
    expect(makeUnique(['__proto__', 'Qty'])).toEqual(['__proto___1', 'Qty']);
  });
});
