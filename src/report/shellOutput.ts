import type { ParsedArgs } from '../parse/parsedArgs';

/** Quote for sh: wrap in single quotes, close-escape-reopen around embedded quotes. */
export function shellQuote(s: string): string {
  return `'${s.replace(/'/g, `'\\''`)}'`;
}

/**
 * getopt(1)-style normalized command line: recognized options in order, long options by their
 * full name, then `--` and the positionals. Options that accept a value are always followed by
 * one (`''` when an optional value was not given).
 *
 * Unknown options and missing values are left out; callers report them separately.
 */
export function formatShell(parsed: ParsedArgs): string {
  const words: string[] = [];
  for (const o of parsed.options) {
    words.push(o.spelling === 'short' ? `-${o.name}` : `--${o.name}`);
    if (o.requirement !== 'none') words.push(shellQuote(o.value ?? ''));
  }
  words.push('--');
  for (const p of parsed.positionals) words.push(shellQuote(p.text));
  return ` ${words.join(' ')}\n`;
}
