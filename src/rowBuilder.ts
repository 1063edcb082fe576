import type { ObjectKey, RowItem } from "./model";
import type { ReferenceResolver } from "./resolver";
import type { DiagnosticLog } from "./diagnostics";
import { MorkRow, type ObjectStore } from "./objectStore";
import { MissingNamespaceError } from "./errors";

export class RowBuilder {
	constructor(
		private readonly _resolver: ReferenceResolver,
		private readonly _rows: ObjectStore<MorkRow>,
		private readonly _log: DiagnosticLog
	) { }

	/**
	 * Build a row and store it, replacing any row already stored under its key.
	 * `defaultNamespace` is the enclosing table's namespace for inline rows.
	 */
	build(node: RowItem, defaultNamespace?: string): ObjectKey {
		const cells: [string, string][] = [];
		for (const cell of node.cells) {
			cells.push(this._resolver.resolveCell(cell));
		}

		const resolved = this._resolver.resolveId(node.id);
		const namespace = resolved.namespace ?? defaultNamespace;
		if (namespace === undefined) {
			throw new MissingNamespaceError("row", resolved.id);
		}
		const key: ObjectKey = { namespace, id: resolved.id };

		// Cuts and truncation are edit history; the latest values stand.
		if (node.cells.some((cell) => cell.cut)) {
			this._log.report({ code: "cell-cut", message: "ignoring cell's 'cut' attribute", ...key });
		}
		if (node.truncated) {
			this._log.report({ code: "row-truncated", message: "ignoring row's 'truncated' attribute", ...key });
		}
		if (node.cut) {
			this._log.report({ code: "row-cut", message: "ignoring row's 'cut' attribute", ...key });
		}
		if (node.meta?.length) {
			this._log.report({ code: "row-meta", message: "ignoring meta-row", ...key });
		}

		this._rows.set(namespace, resolved.id, new MorkRow(cells));
		return key;
	}
}
