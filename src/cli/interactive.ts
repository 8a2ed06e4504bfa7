import type { OutputFormat } from '../types';
import { KeyGenService, createGenerationConfig } from '../services/keygen.service';
import { ExportService, formatLabel, parseFormat } from '../services/export.service';
import { UnsupportedFormatError } from '../utils/errors';
import type { CliIo } from './io';
import type { Prompter } from './prompter';
import { cliSink } from './sink';

const DEFAULTS = {
  count: 100,
  length: 25,
  groupSize: 5,
  separator: '-',
  out: 'keys.txt',
  format: 'txt',
  preview: 10,
};

async function askInt(prompter: Prompter, io: CliIo, question: string, fallback: number, min = 1): Promise<number> {
  for (;;) {
    const raw = (await prompter.ask(`${question} [${fallback}]: `)).trim();
    if (!raw) return fallback;
    if (!/^[+-]?\d+$/.test(raw)) {
      io.out('  Please enter a number.');
      continue;
    }
    const value = Number(raw);
    if (value < min) {
      io.out(`  Must be >= ${min}`);
      continue;
    }
    return value;
  }
}

async function askString(prompter: Prompter, question: string, fallback = ''): Promise<string> {
  const raw = (await prompter.ask(`${question} [${fallback}]: `)).trim();
  return raw || fallback;
}

/**
 * Interactive menu: ask for every setting, generate, save, preview.
 * Unique keys are always on here.
 */
export async function runInteractive(prompter: Prompter, io: CliIo): Promise<number> {
  io.out('cdkeygen (Interactive CLI Menu)');
  io.out('');

  const count = await askInt(prompter, io, 'How many keys to generate?', DEFAULTS.count);

  const pattern = await askString(
    prompter,
    'Use pattern? (leave blank for no, or enter like XXXXX-XXXXX-XXXXX)'
  );
  let length = DEFAULTS.length;
  let groupSize = 0;
  if (!pattern) {
    length = await askInt(prompter, io, 'Key length?', DEFAULTS.length);
    groupSize = await askInt(prompter, io, 'Group size (0 = no grouping)?', DEFAULTS.groupSize, 0);
  }
  const separator = await askString(prompter, 'Group separator?', DEFAULTS.separator);

  const allowAmbiguous = (await askString(prompter, 'Allow ambiguous chars (0,O,1,I,L)? (y/n)', 'n'))
    .toLowerCase()
    .startsWith('y');
  const alphabet = await askString(prompter, 'Custom alphabet? (leave blank to use default)');

  const out = await askString(prompter, 'Output file path (e.g. keys.txt)', DEFAULTS.out);
  let format: OutputFormat;
  try {
    format = parseFormat(await askString(prompter, 'Format (txt/csv/json)', DEFAULTS.format));
  } catch (error) {
    if (!(error instanceof UnsupportedFormatError)) throw error;
    io.out('Invalid format; defaulting to txt.');
    format = 'text';
  }

  const cfg = createGenerationConfig({
    count,
    length,
    pattern: pattern || undefined,
    groupSize,
    separator,
    avoidAmbiguous: !allowAmbiguous,
    unique: true,
    alphabet: alphabet || undefined,
  });

  io.out('');
  io.out(`Generating ${cfg.count} key(s)...`);
  const keys = KeyGenService.getInstance().generateKeys(cfg, cliSink(io));
  ExportService.getInstance().saveKeys(keys, out, format);
  io.out(`Done. Saved: ${out} (${formatLabel(format)})`);

  io.out('');
  io.out('Preview:');
  for (const key of keys.slice(0, DEFAULTS.preview)) {
    io.out(`  ${key}`);
  }

  return 0;
}
