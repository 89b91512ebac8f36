import type { ParseReport, ReportFinding } from './parseReport';
import { failureCount } from './parseReport';

function fmtWhere(f: ReportFinding): string {
  if (f.file && f.module) return `${f.file} (${f.module})`;
  return f.file ?? f.module ?? '';
}

function escapeCell(s: string): string {
  return s.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function countByKind(findings: ReportFinding[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const f of findings) out[f.kind] = (out[f.kind] ?? 0) + 1;
  return out;
}

function countTable(lines: string[], counts: Record<string, number>): void {
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const keys = Object.keys(counts).sort((a, b) => a.localeCompare(b));
  for (const k of keys) lines.push(`| ${k} | ${counts[k]} |`);
  if (keys.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');
}

export function reportToMarkdown(report: ParseReport): string {
  const lines: string[] = [];

  lines.push(`# Parse report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Source root: \`${report.sourceRoot}\``);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Files scanned: **${report.filesScanned}**`);
  lines.push(`- Modules parsed: **${report.modulesParsed}**`);
  lines.push(`- Findings: **${report.findings.length}** (failed: **${failureCount(report)}**)`);
  lines.push('');

  lines.push(`## Counts`);
  lines.push('');
  lines.push(`### Declarations by kind`);
  lines.push('');
  countTable(lines, report.counts.declsByKind);
  lines.push(`### Constructors by body`);
  lines.push('');
  countTable(lines, report.counts.constructorsByBody);

  lines.push(`## Findings summary`);
  lines.push('');
  countTable(lines, countByKind(report.findings));

  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Kind | Where | Message |`);
  lines.push(`|---|---|---|---|`);
  const all = [...report.findings];
  all.sort((a, b) => {
    const ak = a.kind.localeCompare(b.kind);
    if (ak !== 0) return ak;
    const aw = fmtWhere(a).localeCompare(fmtWhere(b));
    if (aw !== 0) return aw;
    return a.message.localeCompare(b.message);
  });
  for (const f of all) {
    lines.push(`| ${f.severity} | ${f.kind} | ${escapeCell(fmtWhere(f))} | ${escapeCell(f.message)} |`);
  }
  if (all.length === 0) lines.push(`| (none) | (none) |  |  |`);
  lines.push('');
  return lines.join('\n');
}
