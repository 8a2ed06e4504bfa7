import type { GenerationSink } from '../types';
import { formatProgress } from '../services/keygen.service';
import type { CliIo } from './io';

/**
 * Print generator progress and advisories as plain console lines.
 */
export function cliSink(io: CliIo): GenerationSink {
  return {
    progress: (event) => io.out(formatProgress(event)),
    advisory: (message) => io.err(message),
  };
}
