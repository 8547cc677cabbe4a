import type { MissingValue, ParsedArgs, ParsedOption, UnknownOption } from '../parse/parsedArgs';

export type Diagnostic = {
  /** Raw argument position the problem was found at. */
  index: number;
  message: string;
};

function quoteList(names: readonly string[]): string {
  return names.map((n) => `'${n}'`).join(' ');
}

function unknownMessage(prog: string, u: UnknownOption): string {
  if (u.reason === 'ambiguous') {
    const possibilities = u.candidates && u.candidates.length > 0 ? `; possibilities: ${quoteList(u.candidates)}` : '';
    return `${prog}: option '${u.text}' is ambiguous${possibilities}`;
  }
  return u.spelling === 'long' ? `${prog}: unrecognized option '${u.text}'` : `${prog}: invalid option -- '${u.name}'`;
}

function missingMessage(prog: string, m: MissingValue): string {
  return m.spelling === 'long'
    ? `${prog}: option '--${m.name}' requires an argument`
    : `${prog}: option requires an argument -- '${m.name}'`;
}

function unexpectedMessage(prog: string, o: ParsedOption): string {
  return `${prog}: option '--${o.name}' doesn't allow an argument`;
}

/**
 * GNU getopt wording for every problem in a parse result, ordered by argument position.
 * Within one short-option cluster unknown characters come before a missing value, which is
 * the order they occur in.
 */
export function describeProblems(parsed: ParsedArgs, programName: string): Diagnostic[] {
  const out: Diagnostic[] = [
    ...parsed.unknown.map((u) => ({ index: u.index, message: unknownMessage(programName, u) })),
    ...parsed.missingValues.map((m) => ({ index: m.index, message: missingMessage(programName, m) })),
    ...parsed.options
      .filter((o) => o.presence === 'unexpected')
      .map((o) => ({ index: o.index, message: unexpectedMessage(programName, o) })),
  ];
  // Array#sort is stable, so records sharing an index keep the order above.
  out.sort((a, b) => a.index - b.index);
  return out;
}
