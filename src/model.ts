/**
 * Core data model types for mork-db.
 *
 * The syntax tree is produced by an external Mork parser and is never mutated here.
 */

// === Syntax Tree Types ===

export interface SyntaxTree {
  readonly items: readonly Item[];
}

export type Item = DictItem | RowItem | TableItem | OtherItem;

/** A namespace given literally, or indirectly through a dictionary alias. */
export type Scope = string | SymbolicRef;

/**
 * An alias that must be looked up in a dictionary to obtain its literal text.
 * Written `^80` or `^80:c` in a Mork file.
 */
export interface SymbolicRef {
  readonly type: 'ref';
  readonly id: string;
  readonly scope?: Scope;
}

export interface ObjectId {
  readonly type: 'id';
  readonly id: string;
  readonly scope?: Scope;
}

export type CellPart = string | SymbolicRef;

export interface Cell {
  readonly column: CellPart;
  readonly value: CellPart;
  readonly cut?: boolean;
}

export interface DictCell {
  readonly column: string;
  readonly value: string;
  readonly cut?: boolean;
}

export interface MetaDict {
  readonly cells: readonly DictCell[];
}

export interface DictItem {
  readonly type: 'dict';
  readonly cells: readonly DictCell[];
  readonly meta: readonly MetaDict[];
}

export interface RowItem {
  readonly type: 'row';
  readonly id: ObjectId;
  readonly cells: readonly Cell[];
  readonly truncated?: boolean;
  readonly cut?: boolean;
  readonly meta?: readonly Cell[];
}

export type TableEntry = ObjectId | RowItem;

export interface TableItem {
  readonly type: 'table';
  readonly id: ObjectId;
  readonly rows: readonly TableEntry[];
  readonly truncated?: boolean;
  readonly meta?: readonly Cell[];
}

/** Top-level items this builder does not interpret, such as groups. */
export interface OtherItem {
  readonly type: 'other';
  readonly kind: string;
}

// === Database Key Types ===

export interface ObjectKey {
  readonly namespace: string;
  readonly id: string;
}

// === Flat Data Types ===

export interface FlatDataset {
  readonly tables: ReadonlyMap<string, readonly FlatRow[]>;
}

export type FlatRow = Readonly<Record<string, string>>;

// === Helpers ===

export function isSymbolicRef(part: CellPart | Scope | undefined): part is SymbolicRef {
  return typeof part === 'object' && part.type === 'ref';
}
