import type { MorkDatabase } from "./databaseBuilder";

/**
 * Turns a stored field value into its display form, e.g. a hex timestamp into a date.
 */
export type FieldConverter = (value: string, column: string) => string;

/** Row namespace → column → converter. */
export type ConverterTable = ReadonlyMap<string, ReadonlyMap<string, FieldConverter>>;

/**
 * Rewrite every converted field of every row in place.
 * Tables reference rows by key, so they see the converted values too.
 *
 * @returns the number of fields rewritten
 */
export function applyFieldConverters(db: MorkDatabase, converters: ConverterTable): number {
	let rewritten = 0;

	for (const [namespace, , row] of db.allRows()) {
		const rowConverters = converters.get(namespace);
		if (!rowConverters) continue;

		for (const [column, value] of [...row.entries()]) {
			const convert = rowConverters.get(column);
			if (convert) {
				row.rewrite(column, convert(value, column));
				rewritten++;
			}
		}
	}

	return rewritten;
}
