import type { Cell, CellPart, ObjectId, Scope, SymbolicRef } from "./model";
import { isSymbolicRef } from "./model";
import type { ReadonlyDictionaryStore } from "./dictionaryStore";
import { unescape } from "./escape";

/** Column aliases and indirect scopes are looked up here unless they name a namespace. */
export const COLUMN_NAMESPACE = "c";
/** Symbolic cell values are looked up here unless they name a namespace. */
export const VALUE_NAMESPACE = "a";

export interface ResolvedId {
	readonly id: string;
	/** Undefined when the identifier carries no scope; callers supply their own default. */
	readonly namespace: string | undefined;
}

/**
 * Resolves identifiers and cells against the dictionaries defined so far.
 * Undefined aliases throw `LookupError`.
 */
export class ReferenceResolver {
	constructor(private readonly _dicts: ReadonlyDictionaryStore) { }

	resolveId(objectId: ObjectId | SymbolicRef): ResolvedId {
		return {
			id: objectId.id,
			namespace: this.resolveScope(objectId.scope),
		};
	}

	/**
	 * A symbolic scope means "whatever this alias currently stands for in dictionary c".
	 */
	resolveScope(scope: Scope | undefined): string | undefined {
		if (isSymbolicRef(scope)) {
			return this.deref(scope);
		}
		return scope;
	}

	deref(ref: SymbolicRef, defaultNamespace: string = COLUMN_NAMESPACE): string {
		const { id, namespace } = this.resolveId(ref);
		return this._dicts.get(namespace ?? defaultNamespace, id);
	}

	resolveCell(cell: Cell): [column: string, value: string] {
		return [
			this.resolvePart(cell.column, COLUMN_NAMESPACE),
			this.resolvePart(cell.value, VALUE_NAMESPACE),
		];
	}

	private resolvePart(part: CellPart, defaultNamespace: string): string {
		if (isSymbolicRef(part)) {
			return this.deref(part, defaultNamespace);
		}
		return unescape(part);
	}
}
