import Ajv from "ajv";
import type { Item, SyntaxTree } from "./model";
import { syntaxTreeSchema } from "./syntaxTreeSchema";
import { SyntaxTreeValidationError } from "./errors";
import { MorkDatabase, type BuildOptions } from "./databaseBuilder";

/** An item whose `type` is none of the kinds in `Item`. */
interface UnknownItem {
	readonly type: string;
}

interface RawSyntaxTree {
	readonly items: readonly (Item | UnknownItem)[];
}

const KNOWN_ITEM_TYPES: ReadonlySet<string> = new Set(["dict", "row", "table", "other"]);

const ajv = new Ajv({ allErrors: true });
const validateSyntaxTree = ajv.compile<RawSyntaxTree>(syntaxTreeSchema);

function isKnownItem(item: Item | UnknownItem): item is Item {
	return KNOWN_ITEM_TYPES.has(item.type);
}

/**
 * Check untyped input (typically `JSON.parse` output from an external Mork parser)
 * against `syntaxTreeSchema`. Items of unknown kinds become `OtherItem`s.
 */
export function parseSyntaxTree(input: unknown): SyntaxTree {
	if (validateSyntaxTree(input)) {
		return {
			items: input.items.map((item): Item => (isKnownItem(item) ? item : { type: "other", kind: item.type })),
		};
	}
	const violations = (validateSyntaxTree.errors ?? []).map((error) => ({
		path: error.instancePath,
		message: error.message ?? error.keyword,
	}));
	throw new SyntaxTreeValidationError(violations);
}

/**
 * Validate untyped input and build the database from it.
 */
export function loadDatabase(input: unknown, options?: BuildOptions): MorkDatabase {
	return MorkDatabase.fromSyntaxTree(parseSyntaxTree(input), options);
}
