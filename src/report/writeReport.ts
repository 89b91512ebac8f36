import fs from 'node:fs/promises';
import path from 'node:path';
import { type ParseReport, serializeReport } from './parseReport';
import { reportToMarkdown } from './markdownReport';

export type ReportFormat = 'json' | 'md';

export function reportFormatForPath(outFile: string): ReportFormat {
  return path.extname(outFile).toLowerCase() === '.json' ? 'json' : 'md';
}

export async function writeReportFile(outFile: string, report: ParseReport, format: ReportFormat = 'md'): Promise<void> {
  await fs.mkdir(path.dirname(outFile), { recursive: true });
  const content = format === 'json' ? serializeReport(report) : reportToMarkdown(report);
  await fs.writeFile(outFile, content, 'utf8');
}
