import type { Module } from '../../model/module';
import { printDumpTree, printModules } from '../printModules';
import { MODULE_ROOT, importNode, key, moduleDump, nameId, node, structTerm, varTerm } from '../../__tests__/helpers/dumpBuilders';

describe('printModules', () => {
  test('prints imports, data types and constructor bodies', () => {
    const m: Module = {
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
    };

    expect(printModules([m])).toBe(
      [
        'module Data.Tree (src/Data/Tree.src)',
        '  import Data.List',
        '  data Tree #1',
        '    Leaf #2: -',
        '    Node #3 {',
        '      val #4: #10',
        '    }',
        '',
      ].join('\n'),
    );
  });
});

describe('printDumpTree', () => {
  test('prints the type table and the annotated forest', () => {
    const dump = moduleDump(
      [
        node({
          annotations: [MODULE_ROOT],
          children: [importNode('Data.List'), node({ types: [1], identifiers: [nameId(5, 'x', ['Use'], 0)] })],
        }),
      ],
      [varTerm(10, 'a'), structTerm(0)],
    );

    expect(printDumpTree(dump)).toBe(
      [
        'module Test.Module (src/Test/Module.src)',
        '  type table',
        '    0: var a #10',
        '    1: struct [0]',
        '  node [Module/Module]',
        '    node [ImportDecl/ImportDecl]',
        '      node []',
        '        id: module Data.List <IEThing Import>',
        '    node []',
        '      types: 1',
        '      id: x #5 <Use> :: 0',
        '',
      ].join('\n'),
    );
  });
});
