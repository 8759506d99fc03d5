/**
 * Formula reference tokenizer
 * Finds the cell and range references an A1-style formula depends on.
 * Literals, function names, named ranges and structured table references are
 * recognized and skipped.
 */

import { FormulaSyntaxError } from '@/lib/errors';
import type { CellReference, FormulaReference, RangeReference } from '@/lib/types';
import { cellAddress, columnLetter, columnNumber, MAX_COLUMN, MAX_ROW } from '@/lib/utils';

// ============================================================================
// Types
// ============================================================================

/** A reference together with the span of formula text it was read from */
export interface ReferenceToken {
  /** Offset of the first character, including any sheet qualifier */
  start: number;
  /** Offset just past the last character */
  end: number;
  reference: FormulaReference;
}

// ============================================================================
// Patterns
// ============================================================================

/** A reference must not run straight into a name, call, qualifier or structured reference */
const BOUNDARY = '(?![\\p{L}\\p{N}_.(\\[!])';

const CELL_RANGE_PATTERN = new RegExp(`\\$?([A-Z]{1,3})\\$?(\\d+):\\$?([A-Z]{1,3})\\$?(\\d+)${BOUNDARY}`, 'iuy');
const COLUMN_RANGE_PATTERN = new RegExp(`\\$?([A-Z]{1,3}):\\$?([A-Z]{1,3})${BOUNDARY}`, 'iuy');
const ROW_RANGE_PATTERN = new RegExp(`\\$?(\\d+):\\$?(\\d+)${BOUNDARY}`, 'uy');
const CELL_PATTERN = new RegExp(`\\$?([A-Z]{1,3})\\$?(\\d+)${BOUNDARY}`, 'iuy');

const WORD_PATTERN = /[\p{L}\p{N}_.\\]+/uy;
const NUMBER_PATTERN = /\d+(?:\.\d*)?(?:E[+-]?\d+)?/iy;
const ERROR_LITERAL_PATTERN = /#(?:NULL!|DIV\/0!|VALUE!|REF!|NAME\?|NUM!|N\/A|GETTING_DATA|SPILL!|CALC!)/iy;
const EXTERNAL_PREFIX_PATTERN = /\[[^\]'\[]+\](?=[\p{L}_\\])/uy;

// ============================================================================
// Tokenizer
// ============================================================================

/**
 * Tokenize a formula and return every reference in source order.
 * Unqualified references resolve to `currentSheet`.
 * Throws FormulaSyntaxError on malformed reference syntax.
 */
export function tokenizeReferences(formula: string, currentSheet: string): ReferenceToken[] {
  return new ReferenceScanner(formula, currentSheet).scan();
}

/**
 * References a formula depends on, deduplicated in first-seen order
 */
export function parseFormulaReferences(formula: string, currentSheet: string): FormulaReference[] {
  const seen = new Set<string>();
  const references: FormulaReference[] = [];

  for (const { reference } of tokenizeReferences(formula, currentSheet)) {
    const key = `${reference.sheet}!${reference.address}`;
    if (seen.has(key)) continue;
    seen.add(key);
    references.push(reference);
  }

  return references;
}

class ReferenceScanner {
  private readonly tokens: ReferenceToken[] = [];
  private position: number;
  private depth = 0;

  constructor(
    private readonly text: string,
    private readonly currentSheet: string
  ) {
    this.position = text.startsWith('=') ? 1 : 0;
  }

  scan(): ReferenceToken[] {
    const { text } = this;

    while (this.position < text.length) {
      const start = this.position;
      const ch = text[start];

      if (ch === '"') {
        this.position = this.skipString(start);
      } else if (ch === "'") {
        this.readQuotedQualifier(start);
      } else if (ch === '{') {
        this.position = this.skipArrayConstant(start);
      } else if (ch === '#') {
        this.position = start + (matchAt(ERROR_LITERAL_PATTERN, text, start)?.[0].length ?? 1);
      } else if (ch === '(') {
        this.depth++;
        this.position++;
      } else if (ch === ')') {
        if (this.depth === 0) {
          throw new FormulaSyntaxError('Unbalanced parenthesis', start);
        }
        this.depth--;
        this.position++;
      } else if (ch === '[') {
        this.readBracket(start);
      } else if (ch === ']') {
        throw new FormulaSyntaxError('Unbalanced bracket', start);
      } else if (ch === '$' || isWordStart(ch) || isDigit(ch)) {
        this.readWord(start);
      } else {
        this.position++;
      }
    }

    if (this.depth !== 0) {
      throw new FormulaSyntaxError('Unbalanced parenthesis', text.length);
    }

    return this.tokens;
  }

  /**
   * A bare reference, a sheet qualifier, a function name, a table name or a number
   */
  private readWord(start: number): void {
    const { text } = this;

    const reference = this.matchReference(start, this.currentSheet);
    if (reference) {
      this.tokens.push({ start, end: reference.end, reference: reference.value });
      this.position = reference.end;
      return;
    }

    if (isDigit(text[start])) {
      this.position = start + (matchAt(NUMBER_PATTERN, text, start)?.[0].length ?? 1);
      return;
    }

    const word = matchAt(WORD_PATTERN, text, start)?.[0];
    if (!word) {
      // Lone '$'
      this.position = start + 1;
      return;
    }

    const next = start + word.length;
    if (text[next] === '!') {
      this.readQualifiedReference(start, word, next + 1);
    } else if (text[next] === '[') {
      // Structured reference: Table1[Column], Table1[[#Headers],[Column]]
      this.position = this.skipBrackets(next);
    } else {
      // Function names leave '(' for the main loop; named ranges are skipped
      this.position = next;
    }
  }

  /**
   * 'My Sheet'!A1 or '[Book.xlsx]Sheet 1'!A1
   */
  private readQuotedQualifier(start: number): void {
    const { text } = this;
    let sheet = '';
    let index = start + 1;

    for (;;) {
      if (index >= text.length) {
        throw new FormulaSyntaxError('Unterminated quoted sheet name', start);
      }
      if (text[index] === "'") {
        if (text[index + 1] === "'") {
          sheet += "'";
          index += 2;
          continue;
        }
        break;
      }
      sheet += text[index];
      index++;
    }

    if (text[index + 1] !== '!') {
      throw new FormulaSyntaxError('Quoted sheet name without "!"', start);
    }
    this.readQualifiedReference(start, sheet, index + 2);
  }

  /**
   * External workbook prefix ([1]Sheet1!A1) or an unqualified structured
   * reference ([@Qty], [[#This Row],[Qty]])
   */
  private readBracket(start: number): void {
    const { text } = this;
    const prefix = matchAt(EXTERNAL_PREFIX_PATTERN, text, start)?.[0];

    if (prefix) {
      const word = matchAt(WORD_PATTERN, text, start + prefix.length)?.[0] ?? '';
      const next = start + prefix.length + word.length;
      if (text[next] === '!') {
        this.readQualifiedReference(start, prefix + word, next + 1);
        return;
      }
    }

    this.position = this.skipBrackets(start);
  }

  /**
   * Read the reference following a `Sheet!` qualifier
   */
  private readQualifiedReference(start: number, sheet: string, offset: number): void {
    const { text } = this;

    const reference = this.matchReference(offset, sheet);
    if (reference) {
      this.tokens.push({ start, end: reference.end, reference: reference.value });
      this.position = reference.end;
      return;
    }

    // Sheet-scoped name (Sheet1!Rate) or Sheet1!#REF!
    const word = matchAt(WORD_PATTERN, text, offset)?.[0];
    if (word && isWordStart(word[0])) {
      this.position = offset + word.length;
      return;
    }
    if (text[offset] === '#') {
      this.position = offset;
      return;
    }

    throw new FormulaSyntaxError('Sheet qualifier without a reference', start);
  }

  /**
   * Try range, whole-column, whole-row and single-cell forms at `offset`
   */
  private matchReference(offset: number, sheet: string): { value: FormulaReference; end: number } | null {
    const { text } = this;

    const range = matchAt(CELL_RANGE_PATTERN, text, offset);
    if (range) {
      const [match, c1, r1, c2, r2] = range;
      const value = cellRange(sheet, c1, r1, c2, r2);
      if (value) return { value, end: offset + match.length };
    }

    const columns = matchAt(COLUMN_RANGE_PATTERN, text, offset);
    if (columns) {
      const [match, c1, c2] = columns;
      const value = columnRange(sheet, c1, c2);
      if (value) return { value, end: offset + match.length };
    }

    const rows = matchAt(ROW_RANGE_PATTERN, text, offset);
    if (rows) {
      const [match, r1, r2] = rows;
      const value = rowRange(sheet, r1, r2);
      if (value) return { value, end: offset + match.length };
    }

    const cell = matchAt(CELL_PATTERN, text, offset);
    if (cell) {
      const [match, c, r] = cell;
      const value = cellReference(sheet, c, r);
      if (value) return { value, end: offset + match.length };
    }

    return null;
  }

  private skipString(start: number): number {
    const { text } = this;
    let index = start + 1;

    while (index < text.length) {
      if (text[index] === '"') {
        if (text[index + 1] === '"') {
          index += 2;
          continue;
        }
        return index + 1;
      }
      index++;
    }

    throw new FormulaSyntaxError('Unterminated string literal', start);
  }

  private skipArrayConstant(start: number): number {
    const { text } = this;
    let index = start + 1;

    while (index < text.length) {
      if (text[index] === '"') {
        index = this.skipString(index);
        continue;
      }
      if (text[index] === '}') {
        return index + 1;
      }
      index++;
    }

    throw new FormulaSyntaxError('Unbalanced bracket', start);
  }

  /** Skip a bracketed group; `'` escapes the next character inside it */
  private skipBrackets(start: number): number {
    const { text } = this;
    let depth = 0;
    let index = start;

    while (index < text.length) {
      const ch = text[index];
      if (ch === "'") {
        index += 2;
        continue;
      }
      if (ch === '[') depth++;
      if (ch === ']') {
        depth--;
        if (depth === 0) return index + 1;
      }
      index++;
    }

    throw new FormulaSyntaxError('Unbalanced bracket', start);
  }
}

// ============================================================================
// Reference Construction
// ============================================================================

function toColumn(letters: string): number | null {
  const column = columnNumber(letters);
  return column >= 1 && column <= MAX_COLUMN ? column : null;
}

function toRow(digits: string): number | null {
  const row = Number(digits);
  return row >= 1 && row <= MAX_ROW ? row : null;
}

function cellReference(sheet: string, letters: string, digits: string): CellReference | null {
  const column = toColumn(letters);
  const row = toRow(digits);
  if (column === null || row === null) return null;
  return { kind: 'cell', sheet, address: cellAddress({ row, column }), row, column };
}

function cellRange(sheet: string, c1: string, r1: string, c2: string, r2: string): RangeReference | null {
  const left = toColumn(c1);
  const top = toRow(r1);
  const right = toColumn(c2);
  const bottom = toRow(r2);
  if (left === null || top === null || right === null || bottom === null) return null;

  const start = { row: Math.min(top, bottom), column: Math.min(left, right) };
  const end = { row: Math.max(top, bottom), column: Math.max(left, right) };
  return {
    kind: 'range',
    sheet,
    address: `${cellAddress(start)}:${cellAddress(end)}`,
    start,
    end,
  };
}

function columnRange(sheet: string, c1: string, c2: string): RangeReference | null {
  const a = toColumn(c1);
  const b = toColumn(c2);
  if (a === null || b === null) return null;

  const first = Math.min(a, b);
  const last = Math.max(a, b);
  return {
    kind: 'range',
    sheet,
    address: `${columnLetter(first)}:${columnLetter(last)}`,
    start: { row: null, column: first },
    end: { row: null, column: last },
  };
}

function rowRange(sheet: string, r1: string, r2: string): RangeReference | null {
  const a = toRow(r1);
  const b = toRow(r2);
  if (a === null || b === null) return null;

  const first = Math.min(a, b);
  const last = Math.max(a, b);
  return {
    kind: 'range',
    sheet,
    address: `${first}:${last}`,
    start: { row: first, column: null },
    end: { row: last, column: null },
  };
}

// ============================================================================
// Helpers
// ============================================================================

function matchAt(pattern: RegExp, text: string, offset: number): RegExpExecArray | null {
  pattern.lastIndex = offset;
  return pattern.exec(text);
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isWordStart(ch: string | undefined): boolean {
  return ch !== undefined && /[\p{L}_\\]/u.test(ch);
}
