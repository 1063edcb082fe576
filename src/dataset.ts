import type { FlatDataset, FlatRow } from "./model";
import type { MorkDatabase } from "./databaseBuilder";

/**
 * Name used for a table in a flat dataset.
 */
export function tableName(namespace: string, id: string): string {
	return `${namespace}/${id}`;
}

/**
 * Project every table into plain rows, in table-store order.
 * Rows shared by several tables appear under each of them.
 */
export function toFlatDataset(db: MorkDatabase): FlatDataset {
	const tables = new Map<string, FlatRow[]>();
	for (const [namespace, id, table] of db.allTables()) {
		const rows: FlatRow[] = [];
		for (const row of table.rows()) {
			rows.push(row.toRecord());
		}
		tables.set(tableName(namespace, id), rows);
	}
	return { tables };
}

/**
 * Plain-object form of a flat dataset, ready for `JSON.stringify`.
 */
export function flatDatasetToObject(dataset: FlatDataset): Record<string, FlatRow[]> {
	return Object.fromEntries([...dataset.tables].map(([name, rows]): [string, FlatRow[]] => [name, [...rows]]));
}
