import path from 'node:path';

import { loadDumpFile, DumpFormatError } from '../dump/loadDump';
import { scanDumpFiles } from '../dump/dumpScanner';
import type { Module } from '../model/module';
import { parseModuleDump } from '../parse/parseModule';
import { createEmptyReport, failureCount, finalizeReport, type ParseReport } from '../report/parseReport';
import { addFinding, countModule } from '../report/reportBuilder';
import type { ModuleDump } from '../tree/tree';
import { VERSION } from '../version';

export type ExtractModulesOptions = {
  sourceRoot: string;
  includeGlobs?: string[];
  excludeGlobs?: string[];
  /** Optional safety cap; if set, results are truncated deterministically after sorting. */
  maxFiles?: number;
  /** Called for every dump that loaded, before it is parsed (debug dumps hook in here). */
  onDump?: (dump: ModuleDump, file: string) => void;
};

export type ExtractModulesResult = {
  modules: Module[];
  report: ParseReport;
  /** Dumps that were unreadable or did not parse into a module. */
  failedCount: number;
};

/**
 * Library entrypoint: find, load and parse every dump below a directory.
 *
 * - Does not write files and never logs.
 * - A broken dump becomes a report finding; the rest of the batch still runs.
 */
export async function extractModulesFromDumps(opts: ExtractModulesOptions): Promise<ExtractModulesResult> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const report = createEmptyReport({ toolName: 'decl-graph', toolVersion: VERSION, sourceRoot });

  const files = await scanDumpFiles({
    sourceRoot,
    includeGlobs: opts.includeGlobs,
    excludeGlobs: opts.excludeGlobs,
    maxFiles: opts.maxFiles,
  });
  report.filesScanned = files.length;

  const modules: Module[] = [];
  for (const file of files) {
    let dump: ModuleDump;
    try {
      dump = await loadDumpFile(path.join(sourceRoot, file));
    } catch (e: unknown) {
      if (!(e instanceof DumpFormatError)) throw e;
      addFinding(report, { kind: 'invalidDump', severity: 'error', message: [e.reason, ...e.details].join('; '), file });
      continue;
    }

    opts.onDump?.(dump, file);

    const module = parseModuleDump(dump);
    if (!module) {
      addFinding(report, {
        kind: 'moduleParseFailed',
        severity: 'warning',
        message: 'No single module root parsed',
        file,
        module: dump.moduleName,
      });
      continue;
    }
    countModule(report, module);
    modules.push(module);
  }

  finalizeReport(report);
  return { modules, report, failedCount: failureCount(report) };
}
