/**
 * Command-line interface
 *
 *   tsx scripts/extract.ts extract <files...> [--out dir] [--no-persist] [--no-docs]
 */

import { parseArgs } from 'node:util';
import { loadConfig } from '@/lib/config';
import { errorMessage } from '@/lib/errors';
import { runPipeline, type PipelineSummary } from '@/lib/pipeline';

const USAGE = `Usage: extract <files...> [options]

Extract tables and formulas from .xlsx / .xls workbooks.

Options:
  -o, --out <dir>   Output directory (default: $OUTPUT_DIR or "outputs")
      --no-persist  Skip writing to DuckDB
      --no-docs     Skip LLM documentation
  -h, --help        Show this help`;

/**
 * Parse arguments, run the pipeline and return the process exit code
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  const [command, ...files] = positionals;

  if (values.help) {
    console.log(USAGE);
    return 0;
  }
  if (command !== 'extract' || files.length === 0) {
    console.error(USAGE);
    return 2;
  }

  const config = loadConfig(env);
  if (values.out) {
    config.outputDir = values.out;
  }

  const summary = await runPipeline(files, {
    config,
    persist: !values['no-persist'],
    document: !values['no-docs'],
  });

  printSummary(summary);
  return summary.failed > 0 ? 1 : 0;
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      'no-persist': { type: 'boolean', default: false },
      'no-docs': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

function printSummary(summary: PipelineSummary): void {
  for (const file of summary.files) {
    if (file.status === 'failed') {
      console.log(`✗ ${file.filePath}: ${file.errors.join('; ')}`);
      continue;
    }

    console.log(
      `✓ ${file.filePath}: ${file.tables} table(s), ${file.formulas} formula(s), ${file.warnings} warning(s)`
    );
    for (const error of file.errors) {
      console.log(`  ! ${error}`);
    }
  }
}
