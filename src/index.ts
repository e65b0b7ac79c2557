export * from './schema';
export * from './errors';
export * from './visitor';
export * from './builder';
export * from './analysis';
export * from './dump';
export * from './read_dump';
export * from './unparse';
export { Memoizer } from './memoize';
export { DfsIter, IterKind, IterResult, preOrder } from './tree_iterator';
export type { ScanEntry } from './ast_util';
export { scanEntries, childNodes, treeEquals } from './ast_util';
export { SlotAllocator, Scope } from './scope';
export { formatNumber, parseNumber, isIdentifier, KEYWORDS } from './util';
