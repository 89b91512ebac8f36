import { stableStringify } from '../output/deterministicJson';

export type ReportSeverity = 'warning' | 'error';

export type ReportFindingKind = 'invalidDump' | 'moduleParseFailed';

export type ReportFinding = {
  kind: ReportFindingKind;
  severity: ReportSeverity;
  message: string;
  /** Dump file (posix, relative to the source root) the finding is about. */
  file?: string;
  /** Module name, when the dump was readable. */
  module?: string;
};

export type ParseReport = {
  schema: 'parse-report-v1';
  tool: { name: string; version: string };
  sourceRoot: string;
  startedAtIso: string;
  finishedAtIso: string;
  filesScanned: number;
  modulesParsed: number;
  counts: {
    declsByKind: Record<string, number>;
    constructorsByBody: Record<string, number>;
  };
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  sourceRoot: string;
  startedAtIso?: string;
}): ParseReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'parse-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    sourceRoot: args.sourceRoot,
    startedAtIso: now,
    finishedAtIso: now,
    filesScanned: 0,
    modulesParsed: 0,
    counts: { declsByKind: {}, constructorsByBody: {} },
    findings: [],
  };
}

export function finalizeReport(report: ParseReport, finishedAtIso?: string): ParseReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

export function serializeReport(report: ParseReport): string {
  return stableStringify(report);
}

/** Findings that mean a dump produced no module. */
export function failureCount(report: ParseReport): number {
  return report.findings.filter((f) => f.kind === 'invalidDump' || f.kind === 'moduleParseFailed').length;
}
