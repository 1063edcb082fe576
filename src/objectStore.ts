import type { ObjectKey } from "./model";
import { RowNotFoundError } from "./errors";

export type ObjectEntry<T> = readonly [namespace: string, id: string, value: T];

export interface ReadonlyObjectStore<T> {
	readonly size: number;
	get(namespace: string, id: string): T | undefined;
	has(namespace: string, id: string): boolean;
	namespaces(): IterableIterator<string>;
	entries(): IterableIterator<ObjectEntry<T>>;
}

/**
 * Entities keyed by (namespace, id). Setting an existing key replaces the entity.
 */
export class ObjectStore<T> implements ReadonlyObjectStore<T> {
	private readonly _store = new Map<string, Map<string, T>>();
	private _size = 0;

	get size(): number {
		return this._size;
	}

	get(namespace: string, id: string): T | undefined {
		return this._store.get(namespace)?.get(id);
	}

	has(namespace: string, id: string): boolean {
		return this._store.get(namespace)?.has(id) ?? false;
	}

	set(namespace: string, id: string, value: T): void {
		let byId = this._store.get(namespace);
		if (!byId) {
			byId = new Map();
			this._store.set(namespace, byId);
		}
		if (!byId.has(id)) {
			this._size++;
		}
		byId.set(id, value);
	}

	namespaces(): IterableIterator<string> {
		return this._store.keys();
	}

	*entries(): IterableIterator<ObjectEntry<T>> {
		for (const [namespace, byId] of this._store) {
			for (const [id, value] of byId) {
				yield [namespace, id, value];
			}
		}
	}
}

/**
 * A row: column name → value.
 *
 * Rows are owned by the row store; `rewrite` is the one mutation allowed
 * after the database is built, used by field converters.
 */
export class MorkRow {
	private readonly _cells: Map<string, string>;

	constructor(cells: Iterable<readonly [string, string]> = []) {
		this._cells = new Map(cells);
	}

	get(column: string): string | undefined {
		return this._cells.get(column);
	}

	columnNames(): string[] {
		return [...this._cells.keys()];
	}

	entries(): IterableIterator<[string, string]> {
		return this._cells.entries();
	}

	rewrite(column: string, value: string): void {
		if (!this._cells.has(column)) {
			throw new Error(`row has no column "${column}"`);
		}
		this._cells.set(column, value);
	}

	toRecord(): Record<string, string> {
		return Object.fromEntries(this._cells);
	}
}

/**
 * A table: an ordered list of row keys. Rows are resolved through the row store,
 * so a rewritten row is seen by every table that lists it.
 */
export class MorkTable {
	constructor(
		readonly rowKeys: readonly ObjectKey[],
		private readonly _rows: ReadonlyObjectStore<MorkRow>
	) { }

	get length(): number {
		return this.rowKeys.length;
	}

	*rows(): IterableIterator<MorkRow> {
		for (const key of this.rowKeys) {
			const row = this._rows.get(key.namespace, key.id);
			if (!row) {
				throw new RowNotFoundError(key.namespace, key.id);
			}
			yield row;
		}
	}

	columnNames(): Set<string> {
		const columns = new Set<string>();
		for (const row of this.rows()) {
			for (const column of row.columnNames()) {
				columns.add(column);
			}
		}
		return columns;
	}
}
