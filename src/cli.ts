#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { VERSION } from './version';
import { extractModulesFromDumps } from './core/extractModules';
import { buildDumpInventory, writeDumpInventoryFile } from './dump/dumpScanner';
import { writeModulesJsonFile } from './output/modulesJson';
import { printDumpTree, printModules } from './output/printModules';
import { reportFormatForPath, writeReportFile } from './report/writeReport';
import { parseBoolish, parseIntish, parseOptionalString, parseStringList } from './cli/options';

export type ExtractCliOptions = {
  source: string;
  out?: string;
  include: string[];
  exclude: string[];
  maxFiles?: number;
  report?: string;
  failOnUnparsed: boolean;
  dumpRaw: boolean;
  dumpParsed: boolean;
  verbose: boolean;
};

/**
 * Exit codes: 0 ok, 1 no dump files found, 3 some dump failed under --fail-on-unparsed.
 * `main` adds 2 for usage errors and unexpected failures.
 */
export async function runExtract(opts: ExtractCliOptions): Promise<number> {
  const result = await extractModulesFromDumps({
    sourceRoot: opts.source,
    includeGlobs: opts.include,
    excludeGlobs: opts.exclude,
    maxFiles: opts.maxFiles,
    onDump: opts.dumpRaw
      ? (dump) => {
          // eslint-disable-next-line no-console
          console.error(printDumpTree(dump));
        }
      : undefined,
  });

  if (result.report.filesScanned === 0) {
    // eslint-disable-next-line no-console
    console.error(`No dump files matched your search criteria under ${opts.source}`);
    return 1;
  }

  if (opts.dumpParsed) {
    // eslint-disable-next-line no-console
    console.error(printModules(result.modules));
  }

  if (!opts.out && !opts.report && !opts.dumpParsed) {
    // eslint-disable-next-line no-console
    console.error('Warning: no output options specified, run with --help to see options');
  }

  if (opts.out) await writeModulesJsonFile(opts.out, result.modules);
  if (opts.report) await writeReportFile(opts.report, result.report, reportFormatForPath(opts.report));

  if (opts.verbose) {
    // eslint-disable-next-line no-console
    console.log(
      `Parsed ${result.modules.length} of ${result.report.filesScanned} dump(s) (failed: ${result.failedCount}).` +
        (opts.out ? ` Wrote: ${opts.out}` : ''),
    );
    if (opts.report) {
      // eslint-disable-next-line no-console
      console.log(`Wrote report: ${opts.report}`);
    }
  }

  if (opts.failOnUnparsed && result.failedCount > 0) return 3;
  return 0;
}

export async function main(argv: string[]): Promise<number> {
  const program = new Command();
  let exitCode = 0;

  program
    .name('decl-graph')
    .description('Extract declarations and their use-relationships from per-module interface dumps')
    .version(VERSION)
    .enablePositionalOptions()
    .exitOverride()
    .option('--source <path>', 'Root directory searched for dump files (required)')
    .option('--out <file>', 'Parsed modules JSON output path', '')
    .option('--include <glob...>', 'Dump file globs relative to --source (default **/*.dump.json)', [])
    .option('--exclude <glob...>', 'Repeatable exclude globs (relative to --source)', [])
    .option('--max-files <n>', 'Safety cap for huge trees (default no cap)', (v) => v, undefined)
    .option('--report <file>', 'Optional report path (.json for JSON, Markdown otherwise)', '')
    .option('--fail-on-unparsed [bool]', 'Exit 3 if any dump failed to load or parse (default false)', (v) => v, undefined)
    .option('--ddump-raw [bool]', 'Debug dump the lexical tree of every dump to stderr', (v) => v, undefined)
    .option('--ddump-parsed [bool]', 'Debug dump the parsed modules to stderr', (v) => v, undefined)
    .option('-v, --verbose', 'Verbose logging', false);

  program
    .command('scan')
    .description('List the dump files a run would parse, as a deterministic inventory JSON.')
    .requiredOption('--source <path>', 'Root directory to scan')
    .requiredOption('--out <file>', 'Output JSON file')
    .option('--include <glob...>', 'Dump file globs', [])
    .option('--exclude <glob...>', 'Additional exclude glob(s).', [])
    .option('--max-files <n>', 'Safety cap (default no cap)', (v) => v, undefined)
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (raw: Record<string, unknown>) => {
      const out = parseOptionalString(raw.out) ?? 'inventory.json';
      const inv = await buildDumpInventory({
        sourceRoot: String(raw.source),
        includeGlobs: parseStringList(raw.include),
        excludeGlobs: parseStringList(raw.exclude),
        maxFiles: parseIntish(raw.maxFiles),
      });
      await writeDumpInventoryFile(out, inv);
      if (raw.verbose) {
        // eslint-disable-next-line no-console
        console.log(`Found ${inv.files.length} dump file(s). Wrote: ${out}`);
      }
    });

  program.action(async (raw: Record<string, unknown>) => {
    const source = parseOptionalString(raw.source);
    if (!source) {
      // eslint-disable-next-line no-console
      console.error('Missing required option: --source <path>');
      exitCode = 2;
      return;
    }
    exitCode = await runExtract({
      source,
      out: parseOptionalString(raw.out),
      include: parseStringList(raw.include),
      exclude: parseStringList(raw.exclude),
      maxFiles: parseIntish(raw.maxFiles),
      report: parseOptionalString(raw.report),
      failOnUnparsed: parseBoolish(raw.failOnUnparsed, false),
      dumpRaw: parseBoolish(raw.ddumpRaw, false),
      dumpParsed: parseBoolish(raw.ddumpParsed, false),
      verbose: Boolean(raw.verbose),
    });
  });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e: unknown) {
    // commander has already printed its own usage error; --help and --version end here too
    if (e instanceof CommanderError) return e.exitCode === 0 ? 0 : 2;
    // eslint-disable-next-line no-console
    console.error(e instanceof Error ? e.message : String(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(e);
      process.exitCode = 2;
    });
}
