import type { Item, SyntaxTree } from "./model";
import { DictionaryStore, type DictionarySeed, type ReadonlyDictionaryStore } from "./dictionaryStore";
import { ObjectStore, type MorkRow, type MorkTable, type ObjectEntry, type ReadonlyObjectStore } from "./objectStore";
import { ReferenceResolver } from "./resolver";
import { RowBuilder } from "./rowBuilder";
import { TableBuilder } from "./tableBuilder";
import { applyDict } from "./dictBuilder";
import { consoleDiagnosticSink, DiagnosticLog, type Diagnostic, type DiagnosticSink } from "./diagnostics";
import { InterpretError, MorkStructureError } from "./errors";

export interface BuildOptions {
	/** Receives each diagnostic as it is raised. Defaults to console warnings; `null` silences them. */
	onDiagnostic?: DiagnosticSink | null;
	/** Namespaces and aliases that exist before the first dict item. */
	dictionarySeed?: DictionarySeed;
}

/**
 * The logical database resolved from a Mork syntax tree.
 *
 * Built once by `fromSyntaxTree`; afterwards only `MorkRow.rewrite` may change it.
 */
export class MorkDatabase {
	private constructor(
		readonly dictionaries: ReadonlyDictionaryStore,
		readonly rows: ReadonlyObjectStore<MorkRow>,
		readonly tables: ReadonlyObjectStore<MorkTable>,
		readonly diagnostics: readonly Diagnostic[]
	) { }

	/**
	 * Resolve every top-level item in source order.
	 * Throws `InterpretError` on the first structurally corrupt item.
	 */
	static fromSyntaxTree(tree: SyntaxTree, options: BuildOptions = {}): MorkDatabase {
		const dicts = DictionaryStore.create(options.dictionarySeed);
		const rows = new ObjectStore<MorkRow>();
		const tables = new ObjectStore<MorkTable>();
		const log = new DiagnosticLog(options.onDiagnostic === undefined ? consoleDiagnosticSink : options.onDiagnostic);

		const resolver = new ReferenceResolver(dicts);
		const rowBuilder = new RowBuilder(resolver, rows, log);
		const tableBuilder = new TableBuilder(resolver, rowBuilder, rows, tables, log);

		const applyItem = (item: Item): void => {
			switch (item.type) {
				case "dict":
					applyDict(item, dicts, log);
					return;
				case "row":
					rowBuilder.build(item);
					return;
				case "table":
					tableBuilder.build(item);
					return;
				case "other":
					log.report({ code: "unknown-item", message: `skipping item of type ${item.kind}` });
					return;
				default: {
					const unreachable: never = item;
					throw new Error(`Unknown item: ${JSON.stringify(unreachable)}`);
				}
			}
		};

		tree.items.forEach((item, index) => {
			try {
				applyItem(item);
			} catch (e) {
				if (e instanceof MorkStructureError) {
					throw new InterpretError(index, e);
				}
				throw e;
			}
		});

		return new MorkDatabase(dicts, rows, tables, log.entries);
	}

	getRow(namespace: string, id: string): MorkRow | undefined {
		return this.rows.get(namespace, id);
	}

	getTable(namespace: string, id: string): MorkTable | undefined {
		return this.tables.get(namespace, id);
	}

	allRows(): IterableIterator<ObjectEntry<MorkRow>> {
		return this.rows.entries();
	}

	allTables(): IterableIterator<ObjectEntry<MorkTable>> {
		return this.tables.entries();
	}
}

export function buildDatabase(tree: SyntaxTree, options?: BuildOptions): MorkDatabase {
	return MorkDatabase.fromSyntaxTree(tree, options);
}
