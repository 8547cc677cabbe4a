import type { LookupResult, OptionDefinition, SpecTable } from '../spec/optionSpec';
import { lookupLong, lookupShort } from '../spec/specTable';
import type {
  MissingValue,
  OptionSpelling,
  ParsedArgs,
  ParsedOption,
  PositionalArg,
  UnknownOption,
  ValuePresence,
} from './parsedArgs';

export type ParseOptions = {
  /** POSIX ordering: the first positional ends option parsing (default false). */
  stopAtFirstPositional?: boolean;
  /** Accept unambiguous prefixes of long names (default true). */
  prefixMatching?: boolean;
  /** Process at most this many arguments (default all). */
  argLimit?: number;
};

const TERMINATOR = '--';

type Context = {
  table: SpecTable;
  args: readonly string[];
  limit: number;
  prefixMatching: boolean;
  options: ParsedOption[];
  unknown: UnknownOption[];
  missingValues: MissingValue[];
};

/** Where an option occurrence was found and how it was spelled. */
type Occurrence = {
  definition: OptionDefinition;
  spelling: OptionSpelling;
  name: string;
  typed: string;
  text: string;
  index: number;
};

function looksLikeOption(token: string): boolean {
  return token.length > 1 && token.startsWith('-');
}

function isEmptyForbidden(def: OptionDefinition, value: string): boolean {
  return def.nonEmpty === true && value === '';
}

function resolveLimit(total: number, argLimit: number | undefined): number {
  if (argLimit === undefined || !Number.isFinite(argLimit)) return total;
  return Math.max(0, Math.min(total, Math.trunc(argLimit)));
}

function recordOption(
  ctx: Context,
  occ: Occurrence,
  presence: ValuePresence,
  value?: string,
  valueIndex?: number,
): void {
  const opt: ParsedOption = {
    id: occ.definition.id,
    spelling: occ.spelling,
    name: occ.name,
    typed: occ.typed,
    requirement: occ.definition.value,
    presence,
    index: occ.index,
  };
  if (value !== undefined) opt.value = value;
  if (valueIndex !== undefined) opt.valueIndex = valueIndex;
  ctx.options.push(opt);
}

function recordMissing(ctx: Context, occ: Occurrence): void {
  ctx.missingValues.push({
    id: occ.definition.id,
    spelling: occ.spelling,
    name: occ.name,
    text: occ.text,
    index: occ.index,
  });
}

function recordUnknown(
  ctx: Context,
  spelling: OptionSpelling,
  name: string,
  text: string,
  index: number,
  found: Exclude<LookupResult, { kind: 'match' }>,
): void {
  const rec: UnknownOption = { spelling, name, text, index, reason: found.kind };
  if (found.kind === 'ambiguous') rec.candidates = Object.freeze([...found.candidates]);
  ctx.unknown.push(rec);
}

/**
 * A required value with nothing attached: take the next whole argument unless it is missing,
 * past the limit, or starts with `-` (a lone `-` included). Returns the index to continue from.
 */
function takeSeparateValue(ctx: Context, occ: Occurrence): number {
  const next = occ.index + 1;
  const token = next < ctx.limit ? ctx.args[next] : undefined;
  if (token === undefined || token.startsWith('-')) {
    recordMissing(ctx, occ);
    return next;
  }
  if (isEmptyForbidden(occ.definition, token)) recordMissing(ctx, occ);
  else recordOption(ctx, occ, 'separate', token, next);
  return next + 1;
}

function parseLongOption(ctx: Context, index: number): number {
  const body = ctx.args[index].slice(2);
  const eq = body.indexOf('=');
  const typed = eq < 0 ? body : body.slice(0, eq);
  const inline = eq < 0 ? undefined : body.slice(eq + 1);
  const text = `--${typed}`;

  const found = lookupLong(ctx.table, typed, { prefixMatching: ctx.prefixMatching });
  if (found.kind !== 'match') {
    recordUnknown(ctx, 'long', typed, text, index, found);
    return index + 1;
  }

  const def = found.definition;
  const occ: Occurrence = { definition: def, spelling: 'long', name: found.name, typed, text, index };

  switch (def.value) {
    case 'none':
      if (inline === undefined) recordOption(ctx, occ, 'none');
      else recordOption(ctx, occ, 'unexpected', inline);
      return index + 1;
    case 'optional':
      // Long options take an optional value only through `=`.
      if (inline === undefined || isEmptyForbidden(def, inline)) recordOption(ctx, occ, 'none');
      else recordOption(ctx, occ, 'attached', inline);
      return index + 1;
    case 'required':
      if (inline === undefined) return takeSeparateValue(ctx, occ);
      if (isEmptyForbidden(def, inline)) recordMissing(ctx, occ);
      else recordOption(ctx, occ, 'attached', inline);
      return index + 1;
  }
}

function parseShortCluster(ctx: Context, index: number): number {
  const chars = Array.from(ctx.args[index].slice(1));

  for (let k = 0; k < chars.length; k++) {
    const c = chars[k];
    const found = lookupShort(ctx.table, c);
    if (found.kind !== 'match') {
      recordUnknown(ctx, 'short', c, `-${c}`, index, found);
      continue;
    }

    const def = found.definition;
    const occ: Occurrence = { definition: def, spelling: 'short', name: c, typed: c, text: `-${c}`, index };
    if (def.value === 'none') {
      recordOption(ctx, occ, 'none');
      continue;
    }

    // The first character that takes a value ends the cluster.
    const rest = chars.slice(k + 1).join('');
    if (rest !== '') {
      recordOption(ctx, occ, 'attached', rest);
      return index + 1;
    }
    if (def.value === 'optional') {
      recordOption(ctx, occ, 'none');
      return index + 1;
    }
    return takeSeparateValue(ctx, occ);
  }

  return index + 1;
}

function freezeAll<T extends object>(list: T[]): readonly T[] {
  for (const item of list) Object.freeze(item);
  return Object.freeze(list);
}

/**
 * Classify a raw argument list against a specification table.
 *
 * Single left-to-right pass. Never throws on user input: unknown options, missing values and
 * unexpected values all end up as records in the result.
 */
export function parseArgs(table: SpecTable, args: readonly string[], options: ParseOptions = {}): ParsedArgs {
  const ctx: Context = {
    table,
    args,
    limit: resolveLimit(args.length, options.argLimit),
    prefixMatching: options.prefixMatching !== false,
    options: [],
    unknown: [],
    missingValues: [],
  };
  const positionals: PositionalArg[] = [];
  let terminatorIndex: number | undefined;
  let optionsDone = false;

  let i = 0;
  while (i < ctx.limit) {
    const token = args[i];

    if (optionsDone) {
      positionals.push({ text: token, index: i });
      i++;
    } else if (token === TERMINATOR) {
      terminatorIndex = i;
      optionsDone = true;
      i++;
    } else if (token.startsWith('--')) {
      i = parseLongOption(ctx, i);
    } else if (looksLikeOption(token)) {
      i = parseShortCluster(ctx, i);
    } else {
      positionals.push({ text: token, index: i });
      if (options.stopAtFirstPositional) optionsDone = true;
      i++;
    }
  }

  const result: ParsedArgs = {
    options: freezeAll(ctx.options),
    unknown: freezeAll(ctx.unknown),
    missingValues: freezeAll(ctx.missingValues),
    positionals: freezeAll(positionals),
    ...(terminatorIndex === undefined ? {} : { terminatorIndex }),
    argLimitExceeded: ctx.limit < args.length,
  };
  return Object.freeze(result);
}
