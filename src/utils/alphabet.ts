import { InvalidAlphabetError } from './errors';

// Uppercase letters + digits without 0 O 1 I L
export const DEFAULT_ALPHABET_NO_AMBIGUOUS = 'ABCDEFGHJKMNPQRSTUVWXYZ23456789';
export const DEFAULT_ALPHABET_FULL = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export const AMBIGUOUS_CHARS = new Set(['0', 'O', '1', 'I', 'L']);

export const MIN_ALPHABET_SIZE = 2;

/**
 * Build the sampling alphabet.
 *
 * Uses `custom` when it is non-empty, otherwise one of the built-in sets.
 * Characters are deduplicated in first-occurrence order, whitespace is
 * dropped, and 0 O 1 I L are removed whenever `avoidAmbiguous` is set,
 * including from a custom source.
 *
 * @throws InvalidAlphabetError when fewer than two characters remain
 */
export function buildAlphabet(custom: string | undefined, avoidAmbiguous: boolean): string {
  const source = custom
    ? custom
    : avoidAmbiguous
      ? DEFAULT_ALPHABET_NO_AMBIGUOUS
      : DEFAULT_ALPHABET_FULL;

  const chars = [...new Set(Array.from(source))].filter(
    (ch) => !/\s/u.test(ch) && !(avoidAmbiguous && AMBIGUOUS_CHARS.has(ch))
  );

  if (chars.length < MIN_ALPHABET_SIZE) {
    throw new InvalidAlphabetError();
  }
  return chars.join('');
}
