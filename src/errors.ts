/**
 * Structural corruption in a Mork syntax tree.
 *
 * Any of these aborts the whole build: a partially resolved database could
 * attribute data to the wrong row or column.
 */
export class MorkStructureError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "MorkStructureError";
	}
}

export class LookupError extends MorkStructureError {
	constructor(
		readonly namespace: string,
		readonly alias: string | undefined
	) {
		super(
			alias === undefined
				? `undefined namespace "${namespace}"`
				: `undefined alias "${alias}" in namespace "${namespace}"`
		);
		this.name = "LookupError";
	}
}

export class MissingNamespaceError extends MorkStructureError {
	constructor(
		readonly kind: "row" | "table",
		readonly id: string
	) {
		super(`no namespace determined for ${kind} "${id}"`);
		this.name = "MissingNamespaceError";
	}
}

export class RowNotFoundError extends MorkStructureError {
	constructor(
		readonly namespace: string,
		readonly id: string
	) {
		super(`row not found: "${id}" in namespace "${namespace}"`);
		this.name = "RowNotFoundError";
	}
}

export class MultipleMetaDictError extends MorkStructureError {
	constructor(readonly count: number) {
		super(`multiple meta-dicts in one dict (${count})`);
		this.name = "MultipleMetaDictError";
	}
}

/**
 * Raised by the database builder when an item cannot be interpreted.
 * The original structural error is kept as `cause`.
 */
export class InterpretError extends Error {
	constructor(
		readonly itemIndex: number,
		override readonly cause: MorkStructureError
	) {
		super(`cannot interpret file: item ${itemIndex}: ${cause.message}`, { cause });
		this.name = "InterpretError";
	}
}

export interface SchemaViolation {
	readonly path: string;
	readonly message: string;
}

export class SyntaxTreeValidationError extends Error {
	constructor(readonly violations: readonly SchemaViolation[]) {
		super(formatViolations(violations));
		this.name = "SyntaxTreeValidationError";
	}
}

function formatViolations(violations: readonly SchemaViolation[]): string {
	const lines = violations.map((v) => `  ${v.path || "/"}: ${v.message}`);
	return ["invalid syntax tree:", ...lines].join("\n");
}
