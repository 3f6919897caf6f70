export { KeyedTable, type KeyedTableOptions } from './keyed-table.js';
export { TableRepository, type TableOptions } from './table-repository.js';
export { FolderTableRepository, type FolderTableOptions } from './folder-table-repository.js';
export { SingleRepository, type SingleOptions } from './single-repository.js';
export {
  defineTable,
  defineFolderTable,
  defineSingle,
  type KeyedTableDefinition,
  type TableDefinition,
  type FolderTableDefinition,
  type SingleDefinition,
} from './define.js';
export { ref, intRef, refTarget, referencesOf } from './refs.js';
