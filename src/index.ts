#!/usr/bin/env node
/**
 * cdkeygen: offline generator for random alphanumeric CD keys.
 *
 *   cdkeygen --count 100 --length 25 --out keys.txt
 *   cdkeygen --count 50 --pattern XXXXX-XXXXX-XXXXX --out keys.csv --format csv
 *   cdkeygen --interactive
 *   cdkeygen --gui
 */

import { runCli } from './cli/run';
import { logger } from './utils/logger';

export { KeyGenService, createGenerationConfig, formatProgress } from './services/keygen.service';
export { ExportService, parseFormat } from './services/export.service';
export { buildAlphabet, DEFAULT_ALPHABET_FULL, DEFAULT_ALPHABET_NO_AMBIGUOUS } from './utils/alphabet';
export { applyGrouping } from './utils/grouping';
export { CAPACITY_CEILING, estimateCapacity, keyspaceLength } from './utils/keyspace';
export * from './utils/errors';
export type { GenerationConfig, GenerationProgress, GenerationSink, OutputFormat } from './types';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

if (require.main === module) {
  main().catch((error) => {
    logger.fatal({ err: error }, 'cdkeygen crashed');
    process.exitCode = 1;
  });
}
