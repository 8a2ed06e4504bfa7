/**
 * Interactive Menu Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runInteractive } from './interactive';
import { captureIo, scriptedPrompter } from './test-utils';

describe('runInteractive', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'cdkeygen-interactive-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should generate grouped keys and save them as CSV', async () => {
    // Arrange
    const outPath = join(tempDir, 'keys.csv');
    const prompter = scriptedPrompter(['3', '', '8', '4', '', 'n', '', outPath, 'csv']);
    const io = captureIo();

    // Act
    const code = await runInteractive(prompter, io);

    // Assert
    expect(code).toBe(0);
    expect(prompter.questions).toEqual([
      'How many keys to generate? [100]: ',
      'Use pattern? (leave blank for no, or enter like XXXXX-XXXXX-XXXXX) []: ',
      'Key length? [25]: ',
      'Group size (0 = no grouping)? [5]: ',
      'Group separator? [-]: ',
      'Allow ambiguous chars (0,O,1,I,L)? (y/n) [n]: ',
      'Custom alphabet? (leave blank to use default) []: ',
      'Output file path (e.g. keys.txt) [keys.txt]: ',
      'Format (txt/csv/json) [txt]: ',
    ]);
    expect(io.stdout.slice(0, 5)).toEqual([
      'cdkeygen (Interactive CLI Menu)',
      '',
      '',
      'Generating 3 key(s)...',
      `Done. Saved: ${outPath} (CSV)`,
    ]);

    const previewed = io.stdout.slice(7);
    expect(io.stdout[6]).toBe('Preview:');
    expect(previewed).toHaveLength(3);

    const rows = readFileSync(outPath, 'utf-8').split('\r\n');
    expect(rows[0]).toBe('cd_key');
    expect(rows.slice(1, 4)).toEqual(previewed.map((line) => line.trim()));
    for (const key of rows.slice(1, 4)) {
      expect(key).toMatch(/^[ABCDEFGHJKMNPQRSTUVWXYZ2-9]{4}-[ABCDEFGHJKMNPQRSTUVWXYZ2-9]{4}$/);
    }
  });

  it('should skip length and grouping questions when a pattern is given', async () => {
    const outPath = join(tempDir, 'keys.txt');
    const prompter = scriptedPrompter(['2', 'XX-XX', '', 'y', '', outPath, 'txt']);
    const io = captureIo();

    await runInteractive(prompter, io);

    expect(prompter.questions).toHaveLength(7);
    expect(prompter.questions[2]).toBe('Group separator? [-]: ');
    const lines = readFileSync(outPath, 'utf-8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    for (const key of lines.slice(0, 2)) {
      expect(key).toMatch(/^[A-Z0-9]{2}-[A-Z0-9]{2}$/);
    }
  });

  it('should fall back to txt on an unknown format', async () => {
    const outPath = join(tempDir, 'keys.out');
    const prompter = scriptedPrompter(['2', '', '6', '0', '', '', '', outPath, 'xml']);
    const io = captureIo();

    await runInteractive(prompter, io);

    expect(io.stdout).toContain('Invalid format; defaulting to txt.');
    expect(io.stdout).toContain(`Done. Saved: ${outPath} (TXT)`);
    const lines = readFileSync(outPath, 'utf-8').split('\n');
    expect(lines.slice(0, 2).every((key) => /^[A-Z2-9]{6}$/.test(key))).toBe(true);
  });

  it('should re-ask until a valid number is entered', async () => {
    const outPath = join(tempDir, 'keys.txt');
    const prompter = scriptedPrompter(['abc', '0', '2', '', '6', '', '', '', '', outPath, '']);
    const io = captureIo();

    await runInteractive(prompter, io);

    expect(prompter.questions.slice(0, 3)).toEqual([
      'How many keys to generate? [100]: ',
      'How many keys to generate? [100]: ',
      'How many keys to generate? [100]: ',
    ]);
    expect(io.stdout).toContain('  Please enter a number.');
    expect(io.stdout).toContain('  Must be >= 1');
    expect(io.stdout).toContain('Generating 2 key(s)...');
  });

  it('should use a custom alphabet', async () => {
    const outPath = join(tempDir, 'keys.json');
    const prompter = scriptedPrompter(['4', '', '5', '0', '', 'y', 'xyz', outPath, 'json']);
    const io = captureIo();

    await runInteractive(prompter, io);

    const saved: { cd_keys: string[] } = JSON.parse(readFileSync(outPath, 'utf-8'));
    expect(saved.cd_keys).toHaveLength(4);
    for (const key of saved.cd_keys) {
      expect(key).toMatch(/^[XYZ]{5}$/);
    }
  });
});
