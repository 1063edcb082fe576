import type { ObjectKey, TableItem } from "./model";
import type { ReferenceResolver } from "./resolver";
import type { DiagnosticLog } from "./diagnostics";
import type { RowBuilder } from "./rowBuilder";
import { MorkTable, type MorkRow, type ObjectStore } from "./objectStore";
import { MissingNamespaceError, RowNotFoundError } from "./errors";

export class TableBuilder {
	constructor(
		private readonly _resolver: ReferenceResolver,
		private readonly _rowBuilder: RowBuilder,
		private readonly _rows: ObjectStore<MorkRow>,
		private readonly _tables: ObjectStore<MorkTable>,
		private readonly _log: DiagnosticLog
	) { }

	/**
	 * Build a table and store it, replacing any table already stored under its key.
	 *
	 * Tables never inherit a namespace. Rows listed by id must already have been built.
	 */
	build(node: TableItem): ObjectKey {
		const resolved = this._resolver.resolveId(node.id);
		const namespace = resolved.namespace;
		if (namespace === undefined) {
			throw new MissingNamespaceError("table", resolved.id);
		}

		const rowKeys: ObjectKey[] = [];
		for (const entry of node.rows) {
			if (entry.type === "row") {
				rowKeys.push(this._rowBuilder.build(entry, namespace));
				continue;
			}

			const rowId = this._resolver.resolveId(entry);
			const rowKey: ObjectKey = { namespace: rowId.namespace ?? namespace, id: rowId.id };
			if (!this._rows.has(rowKey.namespace, rowKey.id)) {
				throw new RowNotFoundError(rowKey.namespace, rowKey.id);
			}
			rowKeys.push(rowKey);
		}

		const key: ObjectKey = { namespace, id: resolved.id };
		if (node.truncated) {
			this._log.report({ code: "table-truncated", message: "ignoring table's 'truncated' attribute", ...key });
		}
		if (node.meta?.length) {
			this._log.report({ code: "table-meta", message: "ignoring meta-table", ...key });
		}

		this._tables.set(namespace, resolved.id, new MorkTable(rowKeys, this._rows));
		return key;
	}
}
