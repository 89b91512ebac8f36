import { extractModulesFromDumps } from '../extractModules';
import { key } from '../../__tests__/helpers/dumpBuilders';
import { mkDumpDir, rootlessDump, treeModuleDump } from '../../__tests__/helpers/rawDumps';

describe('extractModulesFromDumps', () => {
  test('parses every dump and reports the ones that fail', async () => {
    const dir = mkDumpDir({
      'a/Tree.dump.json': JSON.stringify(treeModuleDump()),
      'b/Broken.dump.json': JSON.stringify(rootlessDump()),
      'c/Garbage.dump.json': '{ not json',
    });

    const seen: string[] = [];
    const result = await extractModulesFromDumps({ sourceRoot: dir, onDump: (_dump, file) => seen.push(file) });

    expect(seen).toEqual(['a/Tree.dump.json', 'b/Broken.dump.json']);
    expect(result.modules).toEqual([
      {
        name: 'Data.Tree',
        path: 'src/Data/Tree.src',
        imports: ['Data.List'],
        decls: [
          {
            kind: 'data',
            data: {
              key: key(1),
              name: 'Tree',
              cons: [
                { key: key(2), name: 'Leaf', body: { kind: 'naked', uses: [] } },
                { key: key(3), name: 'Node', body: { kind: 'record', fields: [{ key: key(4), name: 'val', uses: [key(10)] }] } },
              ],
            },
          },
        ],
      },
    ]);

    expect(result.failedCount).toBe(2);
    expect(result.report.filesScanned).toBe(3);
    expect(result.report.modulesParsed).toBe(1);
    expect(result.report.findings.map((f) => [f.kind, f.file])).toEqual([
      ['moduleParseFailed', 'b/Broken.dump.json'],
      ['invalidDump', 'c/Garbage.dump.json'],
    ]);
    expect(result.report.findings[0]?.module).toBe('Broken');
  });

  test('an empty directory yields nothing and no findings', async () => {
    const result = await extractModulesFromDumps({ sourceRoot: mkDumpDir({}) });
    expect(result.modules).toEqual([]);
    expect(result.report.filesScanned).toBe(0);
    expect(result.failedCount).toBe(0);
  });
});
