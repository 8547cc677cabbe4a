#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { VERSION } from './index';
import type { OptionDefinition, SpecTable } from './spec/optionSpec';
import { createSpecTable } from './spec/specTable';
import { parseLongopts, parseOptstring } from './spec/optstring';
import { loadSpecFile } from './spec/loadSpecFile';
import { parseArgs, type ParseOptions } from './parse/parseArgs';
import { hasProblems } from './parse/accessors';
import { describeProblems } from './report/diagnostics';
import { OUTPUT_FORMATS, type OutputFormat, formatParsedArgs, isOutputFormat, writeReportFile } from './report/writeReport';

export type ScanOptions = {
  /** Arguments to classify (what follows `--` on optscan's own command line). */
  args: string[];
  optstring?: string;
  longoptions: string[];
  specFile?: string;
  format: OutputFormat;
  posix: boolean;
  exact: boolean;
  argLimit?: number;
  /** Program name used in diagnostics. */
  name: string;
  quiet: boolean;
  out?: string;
  verbose: boolean;
};

export type ScanOutcome = {
  /** 0 clean, 1 problems in the parsed arguments or arguments past the limit, 2 invalid option specification. */
  exitCode: number;
  /** Formatted result; empty when it went to `out` or the specification was invalid. */
  stdout: string;
  stderr: string[];
};

type BuiltSpec = {
  table: SpecTable;
  parseOptions: ParseOptions;
};

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

async function buildSpec(opts: ScanOptions): Promise<BuiltSpec> {
  const definitions: OptionDefinition[] = [];
  let stopAtFirstPositional = opts.posix;
  let prefixMatching = !opts.exact;

  if (opts.specFile) {
    const file = await loadSpecFile(opts.specFile);
    definitions.push(...file.options);
    if (file.stopAtFirstPositional) stopAtFirstPositional = true;
    if (file.prefixMatching === false) prefixMatching = false;
  }
  if (opts.optstring !== undefined) {
    const compiled = parseOptstring(opts.optstring);
    definitions.push(...compiled.definitions);
    if (compiled.stopAtFirstPositional) stopAtFirstPositional = true;
  }
  for (const list of opts.longoptions) definitions.push(...parseLongopts(list));

  return {
    table: createSpecTable(definitions),
    parseOptions: { stopAtFirstPositional, prefixMatching, argLimit: opts.argLimit },
  };
}

export async function runScan(opts: ScanOptions): Promise<ScanOutcome> {
  const stderr: string[] = [];

  let spec: BuiltSpec;
  try {
    spec = await buildSpec(opts);
  } catch (e) {
    stderr.push(`${opts.name}: ${errorMessage(e)}`);
    return { exitCode: 2, stdout: '', stderr };
  }

  const parsed = parseArgs(spec.table, opts.args, spec.parseOptions);
  if (!opts.quiet) {
    for (const d of describeProblems(parsed, opts.name)) stderr.push(d.message);
    if (parsed.argLimitExceeded) {
      stderr.push(`${opts.name}: too many arguments, only the first ${opts.argLimit ?? 0} were processed`);
    }
  }

  const content = formatParsedArgs(parsed, opts.format);
  let stdout = content;
  if (opts.out) {
    await writeReportFile(opts.out, content);
    stdout = '';
  }

  if (opts.verbose) {
    stderr.push(
      `Parsed ${opts.args.length} argument(s): ${parsed.options.length} option(s), ${parsed.positionals.length} positional(s), ` +
        `${parsed.unknown.length} unknown, ${parsed.missingValues.length} missing value(s).` +
        (opts.out ? ` Wrote: ${opts.out}` : ''),
    );
  }

  return { exitCode: hasProblems(parsed) || parsed.argLimitExceeded ? 1 : 0, stdout, stderr };
}

type RawCliOptions = {
  options?: string;
  longoptions: string[];
  spec?: string;
  format: string;
  posix: boolean;
  exact: boolean;
  argLimit?: number;
  name: string;
  quiet: boolean;
  out?: string;
  verbose: boolean;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseLimit(v: string): number {
  const n = Number(v);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Expected a non-negative integer.');
  return n;
}

export async function main(argv: string[]): Promise<number> {
  const program = new Command();
  let exitCode = 0;

  program
    .name('optscan')
    .description('Classify an argument list the way getopt_long does and print the normalized result')
    .version(VERSION)
    .exitOverride()
    .option('-o, --options <optstring>', 'Short options in getopt(3) syntax: a, b: (required), c:: (optional)')
    .option('-l, --longoptions <list>', 'Long options: name, name: (required), name:: (optional); repeatable', collect, [])
    .option('-s, --spec <file>', 'JSON option specification file')
    .addOption(new Option('-f, --format <fmt>', 'Output format').choices(OUTPUT_FORMATS).default('shell'))
    .option('--posix', 'Stop option parsing at the first positional argument', false)
    .option('--exact', 'Require long options to be written in full', false)
    .option('--arg-limit <n>', 'Process at most n arguments', parseLimit)
    .option('-n, --name <prog>', 'Program name used in messages', 'optscan')
    .option('-q, --quiet', 'Do not report problems on stderr', false)
    .option('--out <file>', 'Write the result to a file instead of stdout')
    .option('-v, --verbose', 'Verbose logging', false)
    .argument('[args...]', 'Arguments to parse, given after --')
    .action(async (args: string[]) => {
      const raw = program.opts<RawCliOptions>();
      const format = raw.format;
      if (!isOutputFormat(format)) {
        // eslint-disable-next-line no-console
        console.error(`Unsupported format: ${format}`);
        exitCode = 2;
        return;
      }

      const outcome = await runScan({
        args,
        optstring: raw.options,
        longoptions: raw.longoptions,
        specFile: raw.spec,
        format,
        posix: raw.posix,
        exact: raw.exact,
        argLimit: raw.argLimit,
        name: raw.name,
        quiet: raw.quiet,
        out: raw.out,
        verbose: raw.verbose,
      });

      // eslint-disable-next-line no-console
      for (const line of outcome.stderr) console.error(line);
      if (outcome.stdout) process.stdout.write(outcome.stdout);
      exitCode = outcome.exitCode;
    });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e) {
    // Commander has already printed its own message; --help and --version exit cleanly.
    if (e instanceof CommanderError) return e.exitCode === 0 ? 0 : 2;
    // eslint-disable-next-line no-console
    console.error(errorMessage(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(errorMessage(e));
      process.exitCode = 2;
    },
  );
}
