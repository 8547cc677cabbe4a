import { parseArgs } from '../../parse/parseArgs';
import { createSpecTable } from '../../spec/specTable';
import { describeProblems } from '../diagnostics';

describe('diagnostics', () => {
  const table = createSpecTable([
    { id: 'file', short: 'f', long: 'file', value: 'required' },
    { id: 'foo', long: 'foo', value: 'none' },
    { id: 'verbose', long: 'verbose', value: 'none' },
  ]);

  test('uses getopt wording, ordered by argument position', () => {
    const parsed = parseArgs(table, ['-xf', '--fo=1', '--nope', '--f', '--verbose=yes', '--file']);
    const problems = describeProblems(parsed, 'prog');

    expect(problems.map((p) => p.index)).toEqual([0, 0, 1, 2, 3, 4, 5]);
    expect(problems.map((p) => p.message)).toEqual([
      "prog: invalid option -- 'x'",
      "prog: option requires an argument -- 'f'",
      "prog: option '--foo' doesn't allow an argument",
      "prog: unrecognized option '--nope'",
      "prog: option '--f' is ambiguous; possibilities: '--file' '--foo'",
      "prog: option '--verbose' doesn't allow an argument",
      "prog: option '--file' requires an argument",
    ]);
  });

  test('reports nothing for a clean command line', () => {
    const parsed = parseArgs(table, ['--file', 'a.txt', '--foo', 'rest']);
    expect(describeProblems(parsed, 'prog')).toEqual([]);
  });

  test('names a conflicting duplicate spelling as its only possibility', () => {
    const dup = createSpecTable([
      { id: 'a', long: 'mode', value: 'none' },
      { id: 'b', long: 'mode', value: 'required' },
    ]);
    const parsed = parseArgs(dup, ['--mode']);
    expect(describeProblems(parsed, 'tool').map((p) => p.message)).toEqual([
      "tool: option '--mode' is ambiguous; possibilities: '--mode'",
    ]);
  });
});
