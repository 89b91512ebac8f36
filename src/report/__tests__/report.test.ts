import { SymbolKey } from '../../model/symbolKey';
import type { Module } from '../../model/module';
import { createEmptyReport, failureCount, finalizeReport, serializeReport } from '../parseReport';
import { addFinding, countModule, incCount } from '../reportBuilder';
import { reportFormatForPath } from '../writeReport';

const k = SymbolKey.of;

describe('parse report', () => {
  test('counts declarations and constructor bodies', () => {
    const report = createEmptyReport({ toolName: 'decl-graph', toolVersion: 'test', sourceRoot: '/src' });
    const module: Module = {
      name: 'M',
      path: 'M.src',
      imports: [],
      decls: [
        {
          kind: 'data',
          data: {
            key: k(1),
            name: 'T',
            cons: [
              { key: k(2), name: 'A', body: { kind: 'naked', uses: [] } },
              { key: k(3), name: 'B', body: { kind: 'naked', uses: [] } },
              { key: k(4), name: 'C', body: { kind: 'record', fields: [] } },
            ],
          },
        },
      ],
    };
    countModule(report, module);

    expect(report.modulesParsed).toBe(1);
    expect(report.counts.declsByKind).toEqual({ data: 1 });
    expect(report.counts.constructorsByBody).toEqual({ naked: 2, record: 1 });
  });

  test('counts unreadable and unparsed dumps as failures', () => {
    const report = createEmptyReport({ toolName: 'decl-graph', toolVersion: 'test', sourceRoot: '/src' });
    addFinding(report, { kind: 'moduleParseFailed', severity: 'warning', message: 'No single module root parsed', module: 'M' });
    addFinding(report, { kind: 'invalidDump', severity: 'error', message: 'x', file: 'a.dump.json' });
    expect(failureCount(report)).toBe(2);
  });

  test('serializes deterministically', () => {
    const report = createEmptyReport({
      toolName: 'decl-graph',
      toolVersion: 'test',
      sourceRoot: '/src',
      startedAtIso: '2024-01-01T00:00:00.000Z',
    });
    finalizeReport(report, '2024-01-01T00:00:01.000Z');
    const json = serializeReport(report);
    expect(json.startsWith('{\n  "counts"')).toBe(true);
    expect(JSON.parse(json).finishedAtIso).toBe('2024-01-01T00:00:01.000Z');
  });

  test('incCount starts from zero', () => {
    const m: Record<string, number> = {};
    incCount(m, 'x');
    incCount(m, 'x', 2);
    expect(m).toEqual({ x: 3 });
  });

  test('report format follows the file extension', () => {
    expect(reportFormatForPath('out/report.JSON')).toBe('json');
    expect(reportFormatForPath('out/report.md')).toBe('md');
    expect(reportFormatForPath('out/report')).toBe('md');
  });
});
