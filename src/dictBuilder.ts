import type { DictItem } from "./model";
import type { DictionaryStore } from "./dictionaryStore";
import type { DiagnosticLog } from "./diagnostics";
import { VALUE_NAMESPACE } from "./resolver";
import { unescape } from "./escape";
import { MultipleMetaDictError } from "./errors";

/** Meta-dict column that redirects a dict into another namespace, as in `< <(a=c)> ... >`. */
const NAMESPACE_COLUMN = "a";

/**
 * Merge a dict item into the dictionary store and return the namespace it went to.
 */
export function applyDict(node: DictItem, dicts: DictionaryStore, log: DiagnosticLog): string {
	if (node.meta.length > 1) {
		throw new MultipleMetaDictError(node.meta.length);
	}

	let namespace = VALUE_NAMESPACE;
	const metaCell = node.meta[0]?.cells.find((cell) => cell.column === NAMESPACE_COLUMN);
	if (metaCell) {
		namespace = metaCell.value;
	}

	const entries: [string, string][] = [];
	for (const cell of node.cells) {
		entries.push([cell.column, unescape(cell.value)]);
		if (cell.cut) {
			log.report({ code: "cell-cut", message: "ignoring cell's 'cut' attribute", namespace, id: cell.column });
		}
	}

	dicts.merge(namespace, entries);
	return namespace;
}
