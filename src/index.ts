// Core data model
export type {
  SyntaxTree,
  Item,
  DictItem,
  RowItem,
  TableItem,
  OtherItem,
  TableEntry,
  Scope,
  SymbolicRef,
  ObjectId,
  CellPart,
  Cell,
  DictCell,
  MetaDict,
  ObjectKey,
  FlatDataset,
  FlatRow,
} from './model';

export {
  isSymbolicRef,
} from './model';

// Errors and diagnostics
export type { SchemaViolation } from './errors';
export {
  MorkStructureError,
  LookupError,
  MissingNamespaceError,
  RowNotFoundError,
  MultipleMetaDictError,
  InterpretError,
  SyntaxTreeValidationError,
} from './errors';

export type { Diagnostic, DiagnosticCode, DiagnosticSink } from './diagnostics';
export { consoleDiagnosticSink, DiagnosticLog } from './diagnostics';

// Escaping
export { unescape } from './escape';

// Stores
export type { DictionarySeed, ReadonlyDictionaryStore } from './dictionaryStore';
export { DictionaryStore, defaultDictionarySeed } from './dictionaryStore';

export type { ObjectEntry, ReadonlyObjectStore } from './objectStore';
export { ObjectStore, MorkRow, MorkTable } from './objectStore';

// Resolution and builders
export type { ResolvedId } from './resolver';
export { ReferenceResolver, COLUMN_NAMESPACE, VALUE_NAMESPACE } from './resolver';
export { applyDict } from './dictBuilder';
export { RowBuilder } from './rowBuilder';
export { TableBuilder } from './tableBuilder';

export type { BuildOptions } from './databaseBuilder';
export { MorkDatabase, buildDatabase } from './databaseBuilder';

// Untyped input
export { syntaxTreeSchema } from './syntaxTreeSchema';
export { parseSyntaxTree, loadDatabase } from './syntaxTree';

// Field conversion
export type { FieldConverter, ConverterTable } from './fieldConverters';
export { applyFieldConverters } from './fieldConverters';

// Flat view
export { toFlatDataset, flatDatasetToObject, tableName } from './dataset';
