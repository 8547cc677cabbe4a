import type { ParsedArgs } from '../parse/parsedArgs';

function cell(s: string): string {
  return s.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

// The fence is one backtick longer than the longest run inside; a leading or trailing backtick
// needs a space between it and the fence.
function code(s: string): string {
  if (s === '') return '(empty)';
  const text = cell(s);
  const longest = Math.max(0, ...(text.match(/`+/g) ?? []).map((run) => run.length));
  const fence = '`'.repeat(longest + 1);
  const pad = text.startsWith('`') || text.endsWith('`') ? ' ' : '';
  return `${fence}${pad}${text}${pad}${fence}`;
}

export function reportToMarkdown(parsed: ParsedArgs): string {
  const lines: string[] = [];
  const unexpected = parsed.options.filter((o) => o.presence === 'unexpected');

  lines.push(`# Parse report`);
  lines.push('');
  lines.push(`- Options: **${parsed.options.length}**`);
  lines.push(`- Positionals: **${parsed.positionals.length}**`);
  lines.push(`- Unknown options: **${parsed.unknown.length}**`);
  lines.push(`- Missing values: **${parsed.missingValues.length}**`);
  lines.push(`- Unexpected values: **${unexpected.length}**`);
  if (parsed.terminatorIndex !== undefined) lines.push(`- Option parsing ended by \`--\` at #${parsed.terminatorIndex}`);
  if (parsed.argLimitExceeded) lines.push(`- Argument limit exceeded`);
  lines.push('');

  lines.push(`## Options`);
  lines.push('');
  lines.push(`| # | Id | Option | Value | Presence |`);
  lines.push(`|---:|---|---|---|---|`);
  for (const o of parsed.options) {
    const spelled = o.spelling === 'short' ? `-${o.typed}` : `--${o.typed}`;
    const value = o.value === undefined ? '' : code(o.value);
    lines.push(`| ${o.index} | ${cell(o.id)} | ${code(spelled)} | ${value} | ${o.presence} |`);
  }
  if (parsed.options.length === 0) lines.push(`| | (none) | | | |`);
  lines.push('');

  if (parsed.unknown.length > 0) {
    lines.push(`## Unknown options`);
    lines.push('');
    lines.push(`| # | Option | Reason | Candidates |`);
    lines.push(`|---:|---|---|---|`);
    for (const u of parsed.unknown) {
      const candidates = (u.candidates ?? []).map(code).join(', ');
      lines.push(`| ${u.index} | ${code(u.text)} | ${u.reason} | ${candidates} |`);
    }
    lines.push('');
  }

  if (parsed.missingValues.length > 0) {
    lines.push(`## Missing values`);
    lines.push('');
    lines.push(`| # | Id | Option |`);
    lines.push(`|---:|---|---|`);
    for (const m of parsed.missingValues) lines.push(`| ${m.index} | ${cell(m.id)} | ${code(m.text)} |`);
    lines.push('');
  }

  lines.push(`## Positionals`);
  lines.push('');
  lines.push(`| # | Argument |`);
  lines.push(`|---:|---|`);
  for (const p of parsed.positionals) lines.push(`| ${p.index} | ${code(p.text)} |`);
  if (parsed.positionals.length === 0) lines.push(`| | (none) |`);
  lines.push('');
  return lines.join('\n');
}
