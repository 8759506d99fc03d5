import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import * as XLSX from 'xlsx';
import { main } from '@/lib/cli';
import { type AppConfig, DEFAULT_MODEL, GROQ_BASE_URL } from '@/lib/config';
import { ExtractionDatabase } from '@/lib/db';
import { parseExchangeJson } from '@/lib/exchange';
import type { CompletionClient, CompletionResult } from '@/lib/llm';
import { runPipeline } from '@/lib/pipeline';

class FakeCompletionClient implements CompletionClient {
  calls = 0;

  async complete(): Promise<CompletionResult> {
    this.calls++;
    return { text: 'Totals per order.' };
  }
}

function writeWorkbook(filePath: string): Promise<void> {
  const worksheet = XLSX.utils.aoa_to_sheet([
    ['Qty', 'Price', 'Total'],
    [2, 3, { t: 'n', v: 6, f: 'A2*B2' }],
    [4, 5, { t: 'n', v: 20, f: 'A3*B3' }],
  ]);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, 'Orders');
  return writeFile(filePath, XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));
}

let dir: string;

beforeAll(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  dir = await mkdtemp(path.join(os.tmpdir(), 'pipeline-'));
  await writeWorkbook(path.join(dir, 'orders.xlsx'));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

function config(outputDir: string): AppConfig {
  return {
    outputDir,
    databasePath: null,
    llm: { apiKey: null, model: DEFAULT_MODEL, baseURL: GROQ_BASE_URL },
  };
}

describe('runPipeline', () => {
  it('extracts, persists and documents each workbook and skips failures', async () => {
    const outputDir = path.join(dir, 'out');
    const database = new ExtractionDatabase();
    const client = new FakeCompletionClient();
    const missing = path.join(dir, 'missing.xlsx');

    const summary = await runPipeline([path.join(dir, 'orders.xlsx'), missing], {
      config: config(outputDir),
      database,
      completionClient: client,
    });

    expect(summary.succeeded).toBe(1);
    expect(summary.failed).toBe(1);

    const [orders, failed] = summary.files;
    expect(orders).toMatchObject({
      status: 'ok',
      tables: 1,
      formulas: 2,
      warnings: 0,
      persisted: { tables: 1, rows: 2, formulas: 2 },
      errors: [],
    });
    expect(failed).toEqual({
      filePath: missing,
      status: 'failed',
      tables: 0,
      formulas: 0,
      warnings: 0,
      errors: [`File ${missing} could not be found.`],
    });

    const document = parseExchangeJson(await readFile(path.join(outputDir, 'orders_extraction.json'), 'utf8'));
    expect(document.workbook).toBe('orders.xlsx');
    expect(document.sheets[0].formulas.map((f) => f.readableFormula)).toEqual(['=[Qty]*[Price]', '=[Qty]*[Price]']);

    const report = await readFile(path.join(outputDir, 'orders_documentation.txt'), 'utf8');
    expect(report).toContain('SHEET: Orders\nFormulas: 2 (1 unique patterns)');
    expect(client.calls).toBe(1);

    // Injected databases stay open
    expect(await database.countRecords('orders.xlsx')).toEqual({ tables: 1, rows: 2, formulas: 2 });
    await database.close();
  });

  it('records an output write failure and continues with the batch', async () => {
    const outputDir = path.join(dir, 'blocked');
    const target = path.join(outputDir, 'orders_extraction.json');
    await mkdir(target, { recursive: true });

    const summary = await runPipeline([path.join(dir, 'orders.xlsx'), path.join(dir, 'missing.xlsx')], {
      config: config(outputDir),
    });

    expect(summary.files).toHaveLength(2);
    const [orders] = summary.files;
    expect(orders.status).toBe('ok');
    expect(orders.extractionPath).toBeUndefined();
    expect(orders.errors).toHaveLength(1);
    expect(orders.errors[0]).toMatch(`Writing ${target} failed: EISDIR`);
  });

  it('skips persistence and documentation when not configured', async () => {
    const summary = await runPipeline([path.join(dir, 'orders.xlsx')], { config: config(path.join(dir, 'plain')) });

    expect(summary.files[0].persisted).toBeUndefined();
    expect(summary.files[0].documentationPath).toBeUndefined();
    expect(summary.files[0].extractionPath).toBe(path.join(dir, 'plain', 'orders_extraction.json'));
  });

  it('stops when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      runPipeline([path.join(dir, 'orders.xlsx')], { config: config(path.join(dir, 'cancel')), signal: controller.signal })
    ).rejects.toThrow();
  });
});

describe('main', () => {
  it('prints usage', async () => {
    expect(await main(['--help'], {})).toBe(0);
  });

  it('rejects unknown commands and options', async () => {
    expect(await main(['convert', 'a.xlsx'], {})).toBe(2);
    expect(await main(['extract', 'a.xlsx', '--bogus'], {})).toBe(2);
  });

  it('exits with 1 when a workbook fails', async () => {
    const out = path.join(dir, 'cli');

    expect(await main(['extract', path.join(dir, 'orders.xlsx'), '--out', out], {})).toBe(0);
    expect(await main(['extract', path.join(dir, 'nope.xlsx'), '--out', out, '--no-docs'], {})).toBe(1);
  });
});
