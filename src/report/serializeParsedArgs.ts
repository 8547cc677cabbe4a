import type { ParsedArgs } from '../parse/parsedArgs';
import { stableStringify } from './deterministicJson';

export const RESULT_SCHEMA = 'optscan-result-v1';

export type SerializeOptions = {
  /** Pretty-print indentation (default 2). */
  space?: number;
};

/**
 * Serialize a parse result to deterministic JSON. Every sequence keeps command-line order.
 */
export function serializeParsedArgs(parsed: ParsedArgs, options: SerializeOptions = {}): string {
  return stableStringify({ schema: RESULT_SCHEMA, ...parsed }, options.space ?? 2);
}
