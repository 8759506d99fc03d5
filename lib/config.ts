/**
 * Application configuration
 * Read once from the environment at startup and passed into the pipeline.
 * The extraction core takes no configuration.
 */

import { z } from 'zod';

// ============================================================================
// Configuration
// ============================================================================

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';
export const DEFAULT_MODEL = 'openai/gpt-oss-120b';

/** Unset and blank variables both count as absent */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  OUTPUT_DIR: optionalString.transform((value) => value ?? 'outputs'),
  DUCKDB_PATH: optionalString,
  GROQ_API_KEY: optionalString,
  GROQ_MODEL: optionalString.transform((value) => value ?? DEFAULT_MODEL),
  LLM_BASE_URL: optionalString.pipe(z.string().url().optional()).transform((value) => value ?? GROQ_BASE_URL),
});

export interface AppConfig {
  /** Directory for `<stem>_extraction.json` and `<stem>_documentation.txt` */
  outputDir: string;
  /** DuckDB database file; persistence is skipped when unset */
  databasePath: string | null;
  llm: {
    /** Documentation generation is skipped when unset */
    apiKey: string | null;
    model: string;
    baseURL: string;
  };
}

/**
 * Build the configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const validation = envSchema.safeParse(env);
  if (!validation.success) {
    const issue = validation.error.errors[0];
    throw new Error(`Invalid configuration: ${issue.path.join('.')} ${issue.message}`);
  }

  const parsed = validation.data;
  return {
    outputDir: parsed.OUTPUT_DIR,
    databasePath: parsed.DUCKDB_PATH ?? null,
    llm: {
      apiKey: parsed.GROQ_API_KEY ?? null,
      model: parsed.GROQ_MODEL,
      baseURL: parsed.LLM_BASE_URL,
    },
  };
}
