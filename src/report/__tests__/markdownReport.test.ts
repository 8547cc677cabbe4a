import { parseArgs } from '../../parse/parseArgs';
import { createSpecTable } from '../../spec/specTable';
import { reportToMarkdown } from '../markdownReport';

describe('markdownReport', () => {
  test('renders stable sections even when empty', () => {
    const md = reportToMarkdown(parseArgs(createSpecTable([]), []));

    expect(md).toBe(
      [
        '# Parse report',
        '',
        '- Options: **0**',
        '- Positionals: **0**',
        '- Unknown options: **0**',
        '- Missing values: **0**',
        '- Unexpected values: **0**',
        '',
        '## Options',
        '',
        '| # | Id | Option | Value | Presence |',
        '|---:|---|---|---|---|',
        '| | (none) | | | |',
        '',
        '## Positionals',
        '',
        '| # | Argument |',
        '|---:|---|',
        '| | (none) |',
        '',
      ].join('\n'),
    );
  });

  test('escapes pipes and lists problems in their own sections', () => {
    const table = createSpecTable([
      { id: 'file', short: 'f', long: 'file', value: 'required' },
      { id: 'fast', long: 'fast', value: 'none' },
    ]);
    const md = reportToMarkdown(parseArgs(table, ['-f', 'a|b', '--fa', '--f', '-q', 'x', '--', '--file']));

    expect(md).toContain('- Option parsing ended by `--` at #6');
    expect(md).toContain('| 0 | file | `-f` | `a\\|b` | separate |');
    expect(md).toContain('| 2 | fast | `--fa` |  | none |');
    expect(md).toContain('## Unknown options');
    expect(md).toContain('| 3 | `--f` | ambiguous | `--file`, `--fast` |');
    expect(md).toContain('| 4 | `-q` | unknown |  |');
    expect(md).not.toContain('## Missing values');
    expect(md).toContain('| 5 | `x` |');
    expect(md).toContain('| 7 | `--file` |');
  });

  test('shows missing values and empty strings', () => {
    const table = createSpecTable([
      { id: 'level', long: 'level', value: 'optional' },
      { id: 'out', short: 'o', value: 'required' },
    ]);
    const md = reportToMarkdown(parseArgs(table, ['--level=', '', '-o']));

    expect(md).toContain('| 0 | level | `--level` | (empty) | attached |');
    expect(md).toContain('| 1 | (empty) |');
    expect(md).toContain('## Missing values');
    expect(md).toContain('| 2 | out | `-o` |');
  });

  test('widens the code fence around backticks', () => {
    const table = createSpecTable([{ id: 'cmd', short: 'c', value: 'required' }]);
    const md = reportToMarkdown(parseArgs(table, ['-c', 'echo `id`', 'a``b', '`x']));

    expect(md).toContain('| 0 | cmd | `-c` | `` echo `id` `` | separate |');
    expect(md).toContain('| 2 | ```a``b``` |');
    expect(md).toContain('| 3 | `` `x `` |');
  });
});
