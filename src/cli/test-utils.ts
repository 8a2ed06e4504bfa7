/**
 * CLI Test Utilities
 *
 * In-memory replacements for the console and for stdin prompts.
 */

import type { CliIo } from './io';
import type { Prompter } from './prompter';

export interface CapturedIo extends CliIo {
  stdout: string[];
  stderr: string[];
}

export function captureIo(): CapturedIo {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => {
      stdout.push(...line.split('\n'));
    },
    err: (line) => {
      stderr.push(...line.split('\n'));
    },
  };
}

export interface ScriptedPrompter extends Prompter {
  questions: string[];
  closed: boolean;
}

/**
 * Answers questions from `answers` in order, then with '' like closed stdin.
 */
export function scriptedPrompter(answers: string[]): ScriptedPrompter {
  const queue = [...answers];
  const prompter: ScriptedPrompter = {
    questions: [],
    closed: false,
    async ask(question) {
      prompter.questions.push(question);
      return queue.shift() ?? '';
    },
    close() {
      prompter.closed = true;
    },
  };
  return prompter;
}
