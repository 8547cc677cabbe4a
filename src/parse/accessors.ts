import type { MissingValue, ParsedArgs, ParsedOption, UnknownOption } from './parsedArgs';

/** All recognized options, optionally only those with `id`, in command-line order. */
export function optionsAll(parsed: ParsedArgs, id?: string): ParsedOption[] {
  return id === undefined ? [...parsed.options] : parsed.options.filter((o) => o.id === id);
}

/** Like `optionsAll`, newest first. */
export function optionsAllReversed(parsed: ParsedArgs, id?: string): ParsedOption[] {
  return optionsAll(parsed, id).reverse();
}

export function optionsFirst(parsed: ParsedArgs, id: string): ParsedOption | undefined {
  return parsed.options.find((o) => o.id === id);
}

/** Most recent occurrence, for "last one wins" options. */
export function optionsLast(parsed: ParsedArgs, id: string): ParsedOption | undefined {
  for (let i = parsed.options.length - 1; i >= 0; i--) {
    if (parsed.options[i].id === id) return parsed.options[i];
  }
  return undefined;
}

export function optionExists(parsed: ParsedArgs, id: string): boolean {
  return parsed.options.some((o) => o.id === id);
}

/** Values of every occurrence of `id` that carried one, in command-line order. */
export function optionValues(parsed: ParsedArgs, id: string): string[] {
  const out: string[] = [];
  for (const o of parsed.options) {
    if (o.id === id && o.value !== undefined) out.push(o.value);
  }
  return out;
}

export function optionValueFirst(parsed: ParsedArgs, id: string): string | undefined {
  return optionValues(parsed, id)[0];
}

export function optionValueLast(parsed: ParsedArgs, id: string): string | undefined {
  const values = optionValues(parsed, id);
  return values[values.length - 1];
}

export function unknownOptions(parsed: ParsedArgs): UnknownOption[] {
  return [...parsed.unknown];
}

export function missingValues(parsed: ParsedArgs): MissingValue[] {
  return [...parsed.missingValues];
}

export function positionals(parsed: ParsedArgs): string[] {
  return parsed.positionals.map((p) => p.text);
}

/** Options that were given `=value` although they take none. */
export function unexpectedValues(parsed: ParsedArgs): ParsedOption[] {
  return parsed.options.filter((o) => o.presence === 'unexpected');
}

export function hasProblems(parsed: ParsedArgs): boolean {
  return parsed.unknown.length > 0 || parsed.missingValues.length > 0 || unexpectedValues(parsed).length > 0;
}
