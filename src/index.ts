// Public library surface.

export { VERSION } from './version';

export * from './model/symbolKey';
export * from './model/module';
export * from './tree/tree';
export * from './tree/vocabulary';

export * from './parse/treeParser';
export * from './parse/resolve';
export * from './parse/astParser';
export * from './parse/grammar';
export * from './parse/parseModule';

export * from './dump/dumpJson';
export * from './dump/loadDump';
export * from './dump/dumpScanner';

export * from './output/deterministicJson';
export * from './output/modulesJson';
export * from './output/printModules';

export * from './report/parseReport';
export * from './report/reportBuilder';
export * from './report/markdownReport';
export * from './report/writeReport';

export * from './core/extractModules';
