/**
 * Option specification model.
 *
 * A specification is an ordered list of definitions. Several definitions may share an `id`,
 * which is how `-h` and `--help` become the same logical option.
 */

export type ValueRequirement = 'none' | 'optional' | 'required';

export const VALUE_REQUIREMENTS: readonly ValueRequirement[] = ['none', 'optional', 'required'];

export type OptionDefinition = {
  /** Caller's identifier, reported back on every parsed occurrence. */
  id: string;
  /** Single character, entered as `-f`. */
  short?: string;
  /** Two or more characters, entered as `--file`. */
  long?: string;
  value: ValueRequirement;
  /** Treat an empty value (`--file=`, `-f ""`) as no value at all. */
  nonEmpty?: boolean;
};

export type SpecTable = {
  readonly definitions: readonly OptionDefinition[];
  /** Short spelling -> every definition binding it, in table order. */
  readonly shortIndex: ReadonlyMap<string, readonly OptionDefinition[]>;
  /** Long spelling -> every definition binding it, in table order. */
  readonly longIndex: ReadonlyMap<string, readonly OptionDefinition[]>;
};

export type LookupResult =
  | { kind: 'match'; definition: OptionDefinition; name: string }
  | { kind: 'ambiguous'; candidates: string[] }
  | { kind: 'unknown' };

export class OptionSpecError extends Error {
  /** Position of the offending definition in the list given to `createSpecTable`. */
  readonly index: number;

  constructor(index: number, message: string) {
    super(`Invalid option definition #${index}: ${message}`);
    this.name = 'OptionSpecError';
    this.index = index;
  }
}
