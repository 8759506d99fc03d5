import { describe, expect, it } from 'vitest';
import { DEFAULT_MODEL, GROQ_BASE_URL, loadConfig } from '@/lib/config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      outputDir: 'outputs',
      databasePath: null,
      llm: { apiKey: null, model: DEFAULT_MODEL, baseURL: GROQ_BASE_URL },
    });
  });

  it('reads and trims variables', () => {
    expect(
      loadConfig({
        OUTPUT_DIR: ' out ',
        DUCKDB_PATH: 'data/extract.duckdb',
        GROQ_API_KEY: 'test-secret',
        GROQ_MODEL: 'test-model',
        LLM_BASE_URL: 'http://localhost:8080/v1',
      })
    ).toEqual({
      outputDir: 'out',
      databasePath: 'data/extract.duckdb',
      llm: { apiKey: 'test-secret', model: 'test-model', baseURL: 'http://localhost:8080/v1' },
    });
  });

  it('treats blank variables as unset', () => {
    expect(loadConfig({ DUCKDB_PATH: '  ', GROQ_API_KEY: '' })).toMatchObject({
      databasePath: null,
      llm: { apiKey: null },
    });
  });

  it('rejects an invalid base URL', () => {
    expect(() => loadConfig({ LLM_BASE_URL: 'not a url' })).toThrow('Invalid configuration: LLM_BASE_URL');
  });
});
