/**
 * Export Service Tests
 *
 * Serialization to text, CSV and JSON, and writing to disk.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parse } from 'csv-parse/sync';
import { ExportService, formatLabel, parseFormat } from './export.service';
import { IOFailureError, UnsupportedFormatError } from '../utils/errors';

describe('parseFormat', () => {
  it('should accept the canonical tokens', () => {
    expect(parseFormat('text')).toBe('text');
    expect(parseFormat('csv')).toBe('csv');
    expect(parseFormat('json')).toBe('json');
  });

  it('should accept txt and ignore case and whitespace', () => {
    expect(parseFormat('TXT ')).toBe('text');
    expect(parseFormat(' Json')).toBe('json');
  });

  it('should reject anything else', () => {
    expect(() => parseFormat('xml')).toThrow(UnsupportedFormatError);
    expect(() => parseFormat('')).toThrow(UnsupportedFormatError);
    expect(() => parseFormat('constructor')).toThrow(UnsupportedFormatError);
  });

  it('should label formats by file extension', () => {
    expect(formatLabel('text')).toBe('TXT');
    expect(formatLabel('json')).toBe('JSON');
  });
});

describe('ExportService', () => {
  const service = ExportService.getInstance();
  const keys = ['ABCDE-FGHJK', 'MNPQR-STUVW', 'XYZ23-45678'];
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'cdkeygen-export-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('serialize', () => {
    it('should write one newline-terminated key per line as text', () => {
      expect(service.serialize(keys, 'text')).toBe('ABCDE-FGHJK\nMNPQR-STUVW\nXYZ23-45678\n');
    });

    it('should write an empty body for no keys', () => {
      expect(service.serialize([], 'text')).toBe('');
    });

    it('should write a cd_key header and CRLF rows as CSV', () => {
      expect(service.serialize(['AB', 'CD'], 'csv')).toBe('cd_key\r\nAB\r\nCD\r\n');
    });

    it('should quote CSV fields that contain commas or quotes', () => {
      expect(service.serialize(['A,B', 'C"D'], 'csv')).toBe('cd_key\r\n"A,B"\r\n"C""D"\r\n');
    });

    it('should pretty-print JSON with two-space indentation', () => {
      expect(service.serialize(['AB', 'CD'], 'json')).toBe('{\n  "cd_keys": [\n    "AB",\n    "CD"\n  ]\n}');
    });
  });

  describe('saveKeys', () => {
    it('should round-trip keys through JSON in order', () => {
      // Arrange
      const outPath = join(tempDir, 'keys.json');

      // Act
      service.saveKeys(keys, outPath, 'json');

      // Assert
      const saved: unknown = JSON.parse(readFileSync(outPath, 'utf-8'));
      expect(saved).toEqual({ cd_keys: keys });
    });

    it('should round-trip keys through CSV in order', () => {
      const outPath = join(tempDir, 'keys.csv');

      service.saveKeys(keys, outPath, 'csv');

      const rows: string[][] = parse(readFileSync(outPath, 'utf-8'));
      expect(rows[0]).toEqual(['cd_key']);
      expect(rows.slice(1).map((row) => row[0])).toEqual(keys);
    });

    it('should write text files', () => {
      const outPath = join(tempDir, 'keys.txt');

      service.saveKeys(keys, outPath, 'txt');

      expect(readFileSync(outPath, 'utf-8').split('\n')).toEqual([...keys, '']);
    });

    it('should create missing parent directories', () => {
      const outPath = join(tempDir, 'nested', 'deeper', 'keys.txt');

      service.saveKeys(keys, outPath, 'text');

      expect(existsSync(outPath)).toBe(true);
    });

    it('should reject an unknown format before touching disk', () => {
      const outPath = join(tempDir, 'keys.xml');

      expect(() => service.saveKeys(keys, outPath, 'xml')).toThrow(UnsupportedFormatError);
      expect(existsSync(outPath)).toBe(false);
    });

    it('should wrap write failures in IOFailureError', () => {
      // a regular file where a directory is expected
      const blocker = join(tempDir, 'blocker');
      writeFileSync(blocker, 'not a directory');
      const outPath = join(blocker, 'keys.txt');

      let caught: unknown;
      try {
        service.saveKeys(keys, outPath, 'text');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(IOFailureError);
      expect(caught instanceof IOFailureError && caught.path).toBe(outPath);
      expect(caught instanceof IOFailureError && caught.code).toBe('IO_FAILURE');
    });
  });
});
