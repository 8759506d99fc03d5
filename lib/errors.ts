/**
 * Error types for workbook extraction
 *
 * Fatal conditions are thrown as the classes below. Non-fatal conditions
 * (detection, formula parsing, unencodable values) are attached to the
 * extraction result as warnings instead.
 */

import type { CellPosition } from '@/lib/types';

// ============================================================================
// Load Errors
// ============================================================================

export enum LoadErrorReason {
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  FILE_UNREADABLE = 'FILE_UNREADABLE',
  FILE_CORRUPTED = 'FILE_CORRUPTED',
}

const LOAD_ERROR_MESSAGES: Record<LoadErrorReason, (filePath: string) => string> = {
  [LoadErrorReason.UNSUPPORTED_FORMAT]: (filePath) =>
    `Unsupported file format: ${filePath}. Only .xlsx and .xls workbooks can be extracted.`,
  [LoadErrorReason.FILE_NOT_FOUND]: (filePath) => `File ${filePath} could not be found.`,
  [LoadErrorReason.FILE_UNREADABLE]: (filePath) => `File ${filePath} could not be read.`,
  [LoadErrorReason.FILE_CORRUPTED]: (filePath) =>
    `File ${filePath} is corrupted, encrypted, or not a spreadsheet of its declared format.`,
};

/** The workbook could not be opened; aborts that workbook only */
export class LoadError extends Error {
  readonly reason: LoadErrorReason;
  readonly filePath: string;

  constructor(reason: LoadErrorReason, filePath: string, options?: { cause?: unknown }) {
    super(LOAD_ERROR_MESSAGES[reason](filePath), options);
    this.name = 'LoadError';
    this.reason = reason;
    this.filePath = filePath;
  }
}

/** Raised from the file extension alone, before any parsing */
export class UnsupportedFormatError extends LoadError {
  readonly extension: string;

  constructor(filePath: string, extension: string) {
    super(LoadErrorReason.UNSUPPORTED_FORMAT, filePath);
    this.name = 'UnsupportedFormatError';
    this.extension = extension;
  }
}

// ============================================================================
// Formula Errors
// ============================================================================

/** Reference syntax inside a formula could not be tokenized */
export class FormulaSyntaxError extends Error {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} at offset ${offset}`);
    this.name = 'FormulaSyntaxError';
    this.offset = offset;
  }
}

// ============================================================================
// Exchange Errors
// ============================================================================

/** A cell value has no encoding in the exchange format */
export class SerializationError extends Error {
  readonly sheet: string;
  readonly position: CellPosition;

  constructor(message: string, sheet: string, position: CellPosition) {
    super(message);
    this.name = 'SerializationError';
    this.sheet = sheet;
    this.position = position;
  }
}

/** An exchange document failed validation */
export class ExchangeFormatError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid exchange document: ${issues[0] ?? 'unknown issue'}`);
    this.name = 'ExchangeFormatError';
    this.issues = issues;
  }
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
