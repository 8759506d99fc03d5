/**
 * Extraction pipeline
 * Runs extraction, output files, persistence and documentation for a batch
 * of workbooks. A workbook that fails to load is reported and skipped.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '@/lib/config';
import { ExtractionDatabase, type SaveSummary } from '@/lib/db';
import { errorMessage, LoadError } from '@/lib/errors';
import { extractWorkbookFile } from '@/lib/excel';
import { serializeExtraction, toJson, type ExchangeDocument } from '@/lib/exchange';
import { type CompletionClient, DocumentationGenerator, OpenAICompletionClient } from '@/lib/llm';

// ============================================================================
// Types
// ============================================================================

export interface PipelineOptions {
  config: AppConfig;
  /** Write to DuckDB when a database path is configured (default true) */
  persist?: boolean;
  /** Generate documentation when an API key is configured (default true) */
  document?: boolean;
  /** Overrides the client built from the configuration */
  completionClient?: CompletionClient;
  /** Overrides the database opened from the configuration */
  database?: ExtractionDatabase;
  signal?: AbortSignal;
}

export interface FileOutcome {
  filePath: string;
  status: 'ok' | 'failed';
  tables: number;
  formulas: number;
  warnings: number;
  extractionPath?: string;
  documentationPath?: string;
  persisted?: SaveSummary;
  /** Load failure, or failures of the output/persistence/documentation steps */
  errors: string[];
}

export interface PipelineSummary {
  files: FileOutcome[];
  succeeded: number;
  failed: number;
}

// ============================================================================
// Main Pipeline
// ============================================================================

/**
 * Process each workbook in turn
 */
export async function runPipeline(filePaths: string[], options: PipelineOptions): Promise<PipelineSummary> {
  const { config } = options;
  await mkdir(config.outputDir, { recursive: true });

  const database = await openDatabase(options);
  const generator = createGenerator(options);

  const files: FileOutcome[] = [];
  try {
    for (const filePath of filePaths) {
      options.signal?.throwIfAborted();
      files.push(await processFile(filePath, { config, database, generator, signal: options.signal }));
    }
  } finally {
    // Injected databases stay open for the caller
    if (database && !options.database) {
      await database.close();
    }
  }

  const failed = files.filter((file) => file.status === 'failed').length;
  console.log(`[Pipeline] Done: ${files.length - failed} succeeded, ${failed} failed`);

  return { files, succeeded: files.length - failed, failed };
}

interface FileContext {
  config: AppConfig;
  database: ExtractionDatabase | null;
  generator: DocumentationGenerator | null;
  signal?: AbortSignal;
}

async function processFile(filePath: string, context: FileContext): Promise<FileOutcome> {
  const outcome: FileOutcome = { filePath, status: 'ok', tables: 0, formulas: 0, warnings: 0, errors: [] };
  console.log(`[Pipeline] Processing ${filePath}`);

  let document: ExchangeDocument;
  try {
    const result = await extractWorkbookFile(filePath, { signal: context.signal });
    document = serializeExtraction(result);
  } catch (error) {
    if (!(error instanceof LoadError)) throw error;
    console.error(`[Pipeline] ${error.message}`);
    return { ...outcome, status: 'failed', errors: [error.message] };
  }

  for (const sheet of document.sheets) {
    outcome.tables += sheet.tables.length;
    outcome.formulas += sheet.formulas.length;
    outcome.warnings += sheet.warnings.length;
  }

  const stem = path.parse(filePath).name;
  const extractionPath = path.join(context.config.outputDir, `${stem}_extraction.json`);
  if (await writeOutput(extractionPath, toJson(document), outcome)) {
    outcome.extractionPath = extractionPath;
  }

  if (context.database) {
    try {
      outcome.persisted = await context.database.saveWorkbook(document);
    } catch (error) {
      console.error('[Pipeline] Persistence failed:', error);
      outcome.errors.push(`Persistence failed: ${errorMessage(error)}`);
    }
  }

  if (context.generator) {
    const documentation = await context.generator.generate(document);
    const documentationPath = path.join(context.config.outputDir, `${stem}_documentation.txt`);
    if (await writeOutput(documentationPath, documentation.text, outcome)) {
      outcome.documentationPath = documentationPath;
    }

    for (const sheet of documentation.sheets) {
      if (sheet.error) {
        outcome.errors.push(`Documentation for "${sheet.sheet}" failed: ${sheet.error}`);
      }
    }
  }

  return outcome;
}

/**
 * Write an output file; a failure is recorded on the outcome instead of
 * aborting the batch
 */
async function writeOutput(filePath: string, content: string, outcome: FileOutcome): Promise<boolean> {
  try {
    await writeFile(filePath, content, 'utf8');
  } catch (error) {
    console.error(`[Pipeline] Writing ${filePath} failed:`, error);
    outcome.errors.push(`Writing ${filePath} failed: ${errorMessage(error)}`);
    return false;
  }

  console.log(`[Pipeline] Wrote ${filePath}`);
  return true;
}

// ============================================================================
// Collaborators
// ============================================================================

async function openDatabase(options: PipelineOptions): Promise<ExtractionDatabase | null> {
  if (options.persist === false) return null;

  if (options.database) {
    await options.database.initialize();
    return options.database;
  }

  const databasePath = options.config.databasePath;
  if (!databasePath) {
    console.log('[Pipeline] DUCKDB_PATH not set; skipping persistence');
    return null;
  }

  if (databasePath !== ':memory:') {
    await mkdir(path.dirname(databasePath), { recursive: true });
  }
  const database = new ExtractionDatabase(databasePath);
  await database.initialize();
  return database;
}

function createGenerator(options: PipelineOptions): DocumentationGenerator | null {
  if (options.document === false) return null;

  if (options.completionClient) {
    return new DocumentationGenerator(options.completionClient);
  }

  const { llm } = options.config;
  if (!llm.apiKey) {
    console.log('[Pipeline] GROQ_API_KEY not set; skipping documentation');
    return null;
  }

  return new DocumentationGenerator(
    new OpenAICompletionClient({ apiKey: llm.apiKey, baseURL: llm.baseURL, model: llm.model })
  );
}
