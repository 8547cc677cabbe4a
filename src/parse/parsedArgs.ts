import type { ValueRequirement } from '../spec/optionSpec';

export type OptionSpelling = 'short' | 'long';

/**
 * How an option's value arrived:
 * - none: no value
 * - attached: in the same token (`-fvalue`, `--file=value`)
 * - separate: taken from the next argument (`-f value`, `--file value`)
 * - unexpected: given with `=` to an option that takes no value
 */
export type ValuePresence = 'none' | 'attached' | 'separate' | 'unexpected';

export type ParsedOption = {
  id: string;
  spelling: OptionSpelling;
  /** Defined spelling: the full long name even when the user abbreviated it. */
  name: string;
  /** Spelling as typed, without dashes. */
  typed: string;
  requirement: ValueRequirement;
  value?: string;
  presence: ValuePresence;
  /** Position of the option's token in the raw arguments. */
  index: number;
  /** Position of the value token when `presence` is `separate`. */
  valueIndex?: number;
};

export type UnknownReason = 'unknown' | 'ambiguous';

export type UnknownOption = {
  spelling: OptionSpelling;
  /** Name without dashes (`x`, `foo`). */
  name: string;
  /** Literal option text with its dashes, never its `=value` (`-x`, `--foo`). */
  text: string;
  index: number;
  reason: UnknownReason;
  /** Long names an ambiguous prefix matched, as `--name`, in table order. */
  candidates?: readonly string[];
};

export type MissingValue = {
  id: string;
  spelling: OptionSpelling;
  name: string;
  text: string;
  index: number;
};

export type PositionalArg = {
  text: string;
  index: number;
};

export type ParsedArgs = {
  readonly options: readonly ParsedOption[];
  readonly unknown: readonly UnknownOption[];
  readonly missingValues: readonly MissingValue[];
  readonly positionals: readonly PositionalArg[];
  /** Position of the `--` that ended option parsing, when there was one. */
  readonly terminatorIndex?: number;
  /** True when `argLimit` left arguments unprocessed. */
  readonly argLimitExceeded: boolean;
};
