import { config } from '../config';
import { KeyGenService } from '../services/keygen.service';
import { ExportService, formatLabel } from '../services/export.service';
import { ServerAddress, startServer } from '../server';
import { isKeygenError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { CliOptions, HELP, USAGE, parseCliArgs } from './args';
import { runInteractive } from './interactive';
import { CliIo, consoleIo } from './io';
import { Prompter, createLinePrompter } from './prompter';
import { cliSink } from './sink';

const log = createChildLogger('cli');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliDeps {
  io?: CliIo;
  /** Defaults to a prompter over stdin/stdout. */
  prompter?: Prompter;
  startServer?: (address: ServerAddress) => Promise<unknown>;
}

function runGenerate(options: CliOptions, io: CliIo): number {
  const cfg = options.generation;

  io.out(`Generating ${cfg.count} key(s)...`);
  const keys = KeyGenService.getInstance().generateKeys(cfg, cliSink(io));
  io.out('Done.');

  const preview = Math.max(0, Math.min(options.preview, keys.length));
  if (preview > 0) {
    io.out('');
    io.out('Preview:');
    for (const key of keys.slice(0, preview)) {
      io.out(`  ${key}`);
    }
  }

  io.out('');
  if (options.out) {
    ExportService.getInstance().saveKeys(keys, options.out, options.format);
    io.out(`Saved: ${options.out} (${formatLabel(options.format)})`);
  } else {
    io.out('Tip: use --out keys.txt to save them to a file.');
  }

  return EXIT_OK;
}

/**
 * Print a failure and pick the exit code: 2 for bad input, 1 for
 * write failures and anything unexpected.
 */
export function reportError(error: unknown, io: CliIo): number {
  if (isKeygenError(error)) {
    io.err(`Error: ${error.message}`);
    return error.code === 'IO_FAILURE' ? EXIT_FAILURE : EXIT_USAGE;
  }

  log.error({ err: error }, 'Unexpected failure');
  io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
  return EXIT_FAILURE;
}

/**
 * Entry point shared by the bin script and the tests.
 * Resolves with the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIo;

  try {
    const options = parseCliArgs(argv);

    switch (options.mode) {
      case 'help':
        io.out(HELP);
        return EXIT_OK;

      case 'version':
        io.out(config.version);
        return EXIT_OK;

      case 'usage':
        io.out(USAGE);
        return EXIT_OK;

      case 'interactive': {
        const prompter = deps.prompter ?? createLinePrompter(process.stdin, process.stdout);
        try {
          return await runInteractive(prompter, io);
        } finally {
          prompter.close();
        }
      }

      case 'gui': {
        const address = { host: config.web.host, port: options.port ?? config.web.port };
        await (deps.startServer ?? startServer)(address);
        io.out(`Open http://${address.host}:${address.port} in your browser. Press Ctrl+C to stop.`);
        return EXIT_OK;
      }

      case 'generate':
        return runGenerate(options, io);
    }
  } catch (error) {
    return reportError(error, io);
  }
}
