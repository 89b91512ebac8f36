import { reportToMarkdown } from '../markdownReport';
import { createEmptyReport } from '../parseReport';

describe('markdownReport', () => {
  test('renders stable sections even when empty', () => {
    const r = createEmptyReport({ toolName: 'decl-graph', toolVersion: '0.0.0', sourceRoot: '/x' });
    const md = reportToMarkdown(r);

    expect(md).toContain('# Parse report');
    expect(md).toContain('- Findings: **0** (failed: **0**)');
    expect(md).toContain('### Declarations by kind');
    expect(md).toContain('### Constructors by body');
    expect(md).toContain('| (none) | 0 |');
    expect(md).toContain('## All findings');
    expect(md).toContain('| (none) | (none) |  |  |');
  });

  test('escapes pipes and sorts findings deterministically', () => {
    const r = createEmptyReport({ toolName: 'decl-graph', toolVersion: '0.0.0', sourceRoot: '/x' });
    r.findings.push(
      { kind: 'moduleParseFailed', severity: 'warning', message: 'No single module root parsed', file: 'b.dump.json', module: 'B' },
      { kind: 'invalidDump', severity: 'error', message: 'Dump is not valid JSON', file: 'c.dump.json' },
      { kind: 'invalidDump', severity: 'error', message: 'bad|json', file: 'a.dump.json' },
    );
    const md = reportToMarkdown(r);

    expect(md).toContain('| error | invalidDump | a.dump.json | bad\\|json |');
    expect(md).toContain('| warning | moduleParseFailed | b.dump.json (B) | No single module root parsed |');
    expect(md).toContain('- Findings: **3** (failed: **3**)');

    const idxA = md.indexOf('| error | invalidDump | a.dump.json |');
    const idxC = md.indexOf('| error | invalidDump | c.dump.json |');
    const idxFailed = md.indexOf('| warning | moduleParseFailed |');
    expect(idxA).toBeGreaterThan(0);
    expect(idxC).toBeGreaterThan(idxA);
    expect(idxFailed).toBeGreaterThan(idxC);
  });
});
