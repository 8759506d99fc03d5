/**
 * Entry point for `npm run extract`
 */

import { main } from '@/lib/cli';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[CLI] Fatal error:', error);
    process.exitCode = 1;
  }
);
