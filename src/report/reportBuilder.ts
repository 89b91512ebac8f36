import type { Module } from '../model/module';
import type { ParseReport, ReportFinding } from './parseReport';

export function addFinding(report: ParseReport, finding: ReportFinding): void {
  report.findings.push(finding);
}

export function incCount(map: Record<string, number>, key: string, amount = 1): void {
  map[key] = (map[key] ?? 0) + amount;
}

export function countModule(report: ParseReport, module: Module): void {
  report.modulesParsed++;
  for (const decl of module.decls) {
    incCount(report.counts.declsByKind, decl.kind);
    if (decl.kind !== 'data') continue;
    for (const con of decl.data.cons) incCount(report.counts.constructorsByBody, con.body.kind);
  }
}
