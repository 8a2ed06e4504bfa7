import { parseArgs } from 'util';
import { z } from 'zod';
import type { GenerationConfig, OutputFormat } from '../types';
import { createGenerationConfig } from '../services/keygen.service';
import { parseFormat } from '../services/export.service';
import { InvalidConfigError } from '../utils/errors';
import { formatIssues } from '../utils/validation';

export type CliMode = 'usage' | 'help' | 'version' | 'generate' | 'interactive' | 'gui';

export interface CliOptions {
  mode: CliMode;
  generation: GenerationConfig;
  out?: string;
  format: OutputFormat;
  preview: number;
  port?: number;
}

export const DEFAULT_PREVIEW = 10;

const OPTIONS = {
  count: { type: 'string' },
  length: { type: 'string' },
  pattern: { type: 'string' },
  groupsize: { type: 'string' },
  sep: { type: 'string' },
  alphabet: { type: 'string' },
  'allow-ambiguous': { type: 'boolean' },
  'no-unique': { type: 'boolean' },
  lowercase: { type: 'boolean' },
  out: { type: 'string' },
  format: { type: 'string' },
  preview: { type: 'string' },
  interactive: { type: 'boolean' },
  gui: { type: 'boolean' },
  port: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
} as const;

const intFlag = (flag: string) =>
  z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, `--${flag} must be an integer`)
    .transform(Number);

const flagsSchema = z.object({
  count: intFlag('count').optional(),
  length: intFlag('length').optional(),
  groupsize: intFlag('groupsize')
    .pipe(z.number().min(0, '--groupsize must be >= 0'))
    .optional(),
  preview: intFlag('preview').optional(),
  port: intFlag('port')
    .pipe(z.number().min(1, '--port must be between 1 and 65535').max(65535, '--port must be between 1 and 65535'))
    .optional(),
});

export const USAGE = [
  'cdkeygen (CLI Mode)',
  '',
  'Examples:',
  '  cdkeygen --count 100 --length 25 --out keys.txt',
  '  cdkeygen --count 50 --pattern "XXXXX-XXXXX-XXXXX" --out keys.txt',
  '  cdkeygen --count 100 --length 25 --groupsize 5 --sep - --out keys.csv --format csv',
  '  cdkeygen --interactive   (interactive CLI menu)',
  '  cdkeygen --gui           (local web form)',
  '',
  'Run with --help for all options.',
].join('\n');

export const HELP = [
  'Usage: cdkeygen [options]',
  '',
  'Generate lots of unique CD keys.',
  '',
  'Generation:',
  '  --count <n>          How many keys to generate.',
  '  --length <n>         Key length (ignored when --pattern is used).',
  '  --pattern <tpl>      Pattern using X as random chars, e.g. "XXXXX-XXXXX-XXXXX".',
  '  --groupsize <n>      Auto-group size (e.g. 5 => AAAAA-BBBBB-...). Ignored with --pattern.',
  "  --sep <str>          Separator for grouping (default '-').",
  '  --alphabet <chars>   Custom alphabet characters.',
  '  --allow-ambiguous    Allow ambiguous chars (0,O,1,I,L).',
  '  --no-unique          Allow duplicates.',
  '  --lowercase          Keep the alphabet case instead of upper-casing keys.',
  '',
  'Output:',
  '  --out <path>         Output file path (e.g. keys.txt).',
  '  --format <fmt>       txt, csv or json (default txt).',
  `  --preview <n>        How many keys to print (default ${DEFAULT_PREVIEW}).`,
  '',
  'Modes:',
  '  --interactive        Interactive CLI menu.',
  '  --gui                Serve the web form on localhost.',
  '  --port <n>           Port for --gui.',
  '  -h, --help           Show this help.',
  '  -v, --version        Show the version.',
].join('\n');

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (error) {
    // node reports unknown flags and missing values as TypeErrors
    throw new InvalidConfigError(error instanceof Error ? error.message : String(error));
  }
}

function pickMode(values: {
  help?: boolean;
  version?: boolean;
  interactive?: boolean;
  gui?: boolean;
  count?: string;
  length?: string;
  pattern?: string;
  out?: string;
}): CliMode {
  if (values.help) return 'help';
  if (values.version) return 'version';
  if (values.interactive) return 'interactive';
  if (values.gui) return 'gui';
  if (
    values.count === undefined &&
    values.length === undefined &&
    values.pattern === undefined &&
    values.out === undefined
  ) {
    return 'usage';
  }
  return 'generate';
}

/**
 * Parse command-line arguments into a mode and a full generation config.
 *
 * The generation config is only validated later by the generator, so
 * `--count 0` parses here and fails with InvalidConfigError on generate.
 *
 * @throws InvalidConfigError for unknown flags or malformed numbers
 * @throws UnsupportedFormatError for an unknown --format
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const values = readFlags(argv);
  const flags = flagsSchema.safeParse(values);
  if (!flags.success) {
    throw new InvalidConfigError(formatIssues(flags.error));
  }

  const generation = createGenerationConfig({
    count: flags.data.count,
    length: flags.data.length,
    pattern: values.pattern,
    alphabet: values.alphabet || undefined,
    avoidAmbiguous: !values['allow-ambiguous'],
    unique: !values['no-unique'],
    groupSize: flags.data.groupsize,
    separator: values.sep,
    uppercase: !values.lowercase,
  });

  return {
    mode: pickMode(values),
    generation,
    out: values.out,
    format: parseFormat(values.format ?? 'txt'),
    preview: flags.data.preview ?? DEFAULT_PREVIEW,
    port: flags.data.port,
  };
}
