import fs from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import type { OutputFormat } from '../types';
import { IOFailureError, UnsupportedFormatError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('export-service');

const FORMAT_ALIASES = new Map<string, OutputFormat>([
  ['txt', 'text'],
  ['text', 'text'],
  ['csv', 'csv'],
  ['json', 'json'],
]);

export const FILE_EXTENSIONS: Record<OutputFormat, string> = {
  text: 'txt',
  csv: 'csv',
  json: 'json',
};

export const CONTENT_TYPES: Record<OutputFormat, string> = {
  text: 'text/plain; charset=utf-8',
  csv: 'text/csv; charset=utf-8',
  json: 'application/json; charset=utf-8',
};

export const CSV_HEADER = 'cd_key';
export const JSON_KEY = 'cd_keys';

/**
 * Resolve a user-supplied format token. Case and surrounding whitespace
 * are ignored; `txt` is an alias of `text`.
 *
 * @throws UnsupportedFormatError
 */
export function parseFormat(token: string): OutputFormat {
  const format = FORMAT_ALIASES.get(token.trim().toLowerCase());
  if (!format) {
    throw new UnsupportedFormatError(token);
  }
  return format;
}

export function formatLabel(format: OutputFormat): string {
  return FILE_EXTENSIONS[format].toUpperCase();
}

export class ExportService {
  private static instance: ExportService;

  static getInstance(): ExportService {
    if (!ExportService.instance) {
      ExportService.instance = new ExportService();
    }
    return ExportService.instance;
  }

  /**
   * Render keys as a complete file body.
   */
  serialize(keys: readonly string[], format: OutputFormat): string {
    switch (format) {
      case 'text':
        return keys.map((key) => `${key}\n`).join('');
      case 'csv':
        return stringify([[CSV_HEADER], ...keys.map((key) => [key])], {
          record_delimiter: 'windows',
        });
      case 'json':
        return JSON.stringify({ [JSON_KEY]: keys }, null, 2);
    }
  }

  /**
   * Write keys to `outPath`, creating missing parent directories.
   *
   * @throws UnsupportedFormatError for an unknown format token
   * @throws IOFailureError when the directory or file cannot be written
   */
  saveKeys(keys: readonly string[], outPath: string, format: string): void {
    const resolved = parseFormat(format);
    const body = this.serialize(keys, resolved);

    try {
      fs.mkdirSync(path.dirname(path.resolve(outPath)), { recursive: true });
      fs.writeFileSync(outPath, body, 'utf-8');
    } catch (error) {
      log.error({ outPath, error }, 'Failed to save keys');
      throw new IOFailureError(outPath, error);
    }

    log.info({ outPath, format: resolved, count: keys.length }, 'Keys saved');
  }
}
