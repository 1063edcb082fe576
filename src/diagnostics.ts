/**
 * Codes for Mork features that are recognized but deliberately not applied.
 */
export type DiagnosticCode =
	| "cell-cut"
	| "row-truncated"
	| "row-cut"
	| "row-meta"
	| "table-truncated"
	| "table-meta"
	| "unknown-item";

export interface Diagnostic {
	readonly code: DiagnosticCode;
	readonly message: string;
	readonly namespace?: string;
	readonly id?: string;
}

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

export const consoleDiagnosticSink: DiagnosticSink = (diagnostic) => {
	console.warn(`warning: ${diagnostic.message}`);
};

/**
 * Collects diagnostics for the finished database and forwards each one to a sink.
 */
export class DiagnosticLog {
	private readonly _entries: Diagnostic[] = [];

	constructor(private readonly _sink: DiagnosticSink | null) { }

	get entries(): readonly Diagnostic[] {
		return this._entries;
	}

	report(diagnostic: Diagnostic): void {
		this._entries.push(diagnostic);
		this._sink?.(diagnostic);
	}
}
