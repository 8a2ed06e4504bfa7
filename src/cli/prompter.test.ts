import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { createLinePrompter } from './prompter';

describe('createLinePrompter', () => {
  it('should answer questions from piped lines in order', async () => {
    // Arrange
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = createLinePrompter(input, output);

    // Act - all input arrives before the first question
    input.end('first\nsecond\n');
    const answers = [
      await prompter.ask('Q1? '),
      await prompter.ask('Q2? '),
      await prompter.ask('Q3? '),
      await prompter.ask('Q4? '),
    ];
    prompter.close();

    // Assert
    expect(answers).toEqual(['first', 'second', '', '']);
    expect(String(output.read())).toBe('Q1? Q2? Q3? Q4? ');
  });
});
