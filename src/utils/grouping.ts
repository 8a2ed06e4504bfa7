/**
 * Split `raw` into consecutive chunks of `groupSize` characters joined by
 * `separator`. The last chunk may be shorter. `groupSize <= 0` returns
 * `raw` unchanged.
 *
 * @example
 * ```typescript
 * applyGrouping('ABCDEFGHIJ', 3, '-'); // 'ABC-DEF-GHI-J'
 * ```
 */
export function applyGrouping(raw: string, groupSize: number, separator: string): string {
  if (groupSize <= 0) {
    return raw;
  }

  const chars = Array.from(raw);
  const parts: string[] = [];
  for (let i = 0; i < chars.length; i += groupSize) {
    parts.push(chars.slice(i, i + groupSize).join(''));
  }
  return parts.join(separator);
}
