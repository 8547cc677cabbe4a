import fs from 'node:fs/promises';
import path from 'node:path';

import type { ParsedArgs } from '../parse/parsedArgs';
import { reportToMarkdown } from './markdownReport';
import { serializeParsedArgs } from './serializeParsedArgs';
import { formatShell } from './shellOutput';

export type OutputFormat = 'shell' | 'json' | 'md';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['shell', 'json', 'md'];

export function isOutputFormat(s: string): s is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === s);
}

export function formatParsedArgs(parsed: ParsedArgs, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return serializeParsedArgs(parsed);
    case 'md':
      return reportToMarkdown(parsed);
    case 'shell':
      return formatShell(parsed);
  }
}

export async function writeReportFile(outFile: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(outFile), { recursive: true });
  await fs.writeFile(outFile, content, 'utf8');
}
