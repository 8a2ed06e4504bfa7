import readline from 'readline';

/**
 * Line-oriented question/answer channel for the interactive menu.
 */
export interface Prompter {
  /** Resolves with the answer, or '' once input has ended. */
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * Prompter over a pair of streams, usually stdin/stdout.
 *
 * Lines are pulled through the interface's async iterator, which buffers
 * answers that arrive before their question is asked (piped input).
 */
export function createLinePrompter(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): Prompter {
  const rl = readline.createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  let ended = false;

  return {
    async ask(question: string): Promise<string> {
      output.write(question);
      if (ended) return '';
      const next = await lines.next();
      if (next.done) {
        ended = true;
        return '';
      }
      return next.value;
    },
    close(): void {
      rl.close();
    },
  };
}
