import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { buildDumpInventory, scanDumpFiles, writeDumpInventoryFile } from '../dumpScanner';

function mkTree(files: string[]): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'decl-graph-scan-'));
  for (const rel of files) {
    const abs = path.join(dir, rel);
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.writeFileSync(abs, '{}', 'utf8');
  }
  return dir;
}

describe('scanDumpFiles', () => {
  const files = [
    'b/Two.dump.json',
    'a/One.dump.json',
    'a/notes.json',
    'node_modules/pkg/Dep.dump.json',
    'gen/Skip.dump.json',
  ];

  test('finds dump files sorted, skipping default excludes', async () => {
    const dir = mkTree(files);
    expect(await scanDumpFiles({ sourceRoot: dir })).toEqual(['a/One.dump.json', 'b/Two.dump.json', 'gen/Skip.dump.json']);
  });

  test('applies extra excludes, custom includes and the file cap', async () => {
    const dir = mkTree(files);
    expect(await scanDumpFiles({ sourceRoot: dir, excludeGlobs: ['gen/**'] })).toEqual(['a/One.dump.json', 'b/Two.dump.json']);
    expect(await scanDumpFiles({ sourceRoot: dir, includeGlobs: ['a/*.json'] })).toEqual(['a/notes.json', 'a/One.dump.json']);
    expect(await scanDumpFiles({ sourceRoot: dir, maxFiles: 1 })).toEqual(['a/One.dump.json']);
  });

  test('writes an inventory file', async () => {
    const dir = mkTree(['x/M.dump.json']);
    const inv = await buildDumpInventory({ sourceRoot: dir });
    const out = path.join(dir, 'out', 'inventory.json');
    await writeDumpInventoryFile(out, inv);

    const written = JSON.parse(fs.readFileSync(out, 'utf8')) as { schema: string; files: string[] };
    expect(written.schema).toBe('dump-inventory-v1');
    expect(written.files).toEqual(['x/M.dump.json']);
  });
});
