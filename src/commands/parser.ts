/**
 * Line tokenizer and argument parsers for the command language.
 */

import { ParseError } from '../errors.js';

/** Split a line into whitespace-separated tokens. */
export function tokenize(line: string): string[] {
  return line.trim().split(/\s+/).filter((t) => t.length > 0);
}

/**
 * Find the longest keyword that prefixes `tokens` (case-insensitive).
 * Keywords are given as space-separated words, e.g. "show all".
 */
export function matchKeyword(
  tokens: readonly string[],
  keywords: Iterable<string>
): { keyword: string; args: string[] } | null {
  let best: string[] | null = null;

  for (const keyword of keywords) {
    const words = keyword.split(' ');
    if (words.length > tokens.length) continue;
    if (best && words.length <= best.length) continue;

    const matches = words.every((word, i) => tokens[i].toLowerCase() === word);
    if (matches) best = words;
  }

  if (!best) return null;
  return { keyword: best.join(' '), args: tokens.slice(best.length) };
}

export function parseInteger(raw: string, label: string): number {
  if (!/^-?\d+$/.test(raw)) {
    throw new ParseError(`${label} must be a whole number`, { value: raw });
  }
  return Number(raw);
}
