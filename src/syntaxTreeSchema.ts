/**
 * JSON Schema (draft-07) for a Mork syntax tree handed over as plain JSON.
 * Exported so parsers written elsewhere can validate their own output.
 */
export const syntaxTreeSchema = {
	$schema: "http://json-schema.org/draft-07/schema#",
	type: "object",
	properties: {
		items: { type: "array", items: { $ref: "#/definitions/Item" } },
	},
	required: ["items"],
	additionalProperties: false,
	definitions: {
		Scope: {
			oneOf: [{ type: "string" }, { $ref: "#/definitions/SymbolicRef" }],
		},
		SymbolicRef: {
			type: "object",
			properties: {
				type: { const: "ref" },
				id: { type: "string" },
				scope: { $ref: "#/definitions/Scope" },
			},
			required: ["type", "id"],
			additionalProperties: false,
		},
		ObjectId: {
			type: "object",
			properties: {
				type: { const: "id" },
				id: { type: "string" },
				scope: { $ref: "#/definitions/Scope" },
			},
			required: ["type", "id"],
			additionalProperties: false,
		},
		CellPart: {
			oneOf: [{ type: "string" }, { $ref: "#/definitions/SymbolicRef" }],
		},
		Cell: {
			type: "object",
			properties: {
				column: { $ref: "#/definitions/CellPart" },
				value: { $ref: "#/definitions/CellPart" },
				cut: { type: "boolean" },
			},
			required: ["column", "value"],
			additionalProperties: false,
		},
		DictCell: {
			type: "object",
			properties: {
				column: { type: "string" },
				value: { type: "string" },
				cut: { type: "boolean" },
			},
			required: ["column", "value"],
			additionalProperties: false,
		},
		DictItem: {
			type: "object",
			properties: {
				type: { const: "dict" },
				cells: { type: "array", items: { $ref: "#/definitions/DictCell" } },
				meta: {
					type: "array",
					items: {
						type: "object",
						properties: {
							cells: { type: "array", items: { $ref: "#/definitions/DictCell" } },
						},
						required: ["cells"],
						additionalProperties: false,
					},
				},
			},
			required: ["type", "cells", "meta"],
			additionalProperties: false,
		},
		RowItem: {
			type: "object",
			properties: {
				type: { const: "row" },
				id: { $ref: "#/definitions/ObjectId" },
				cells: { type: "array", items: { $ref: "#/definitions/Cell" } },
				truncated: { type: "boolean" },
				cut: { type: "boolean" },
				meta: { type: "array", items: { $ref: "#/definitions/Cell" } },
			},
			required: ["type", "id", "cells"],
			additionalProperties: false,
		},
		TableItem: {
			type: "object",
			properties: {
				type: { const: "table" },
				id: { $ref: "#/definitions/ObjectId" },
				rows: {
					type: "array",
					items: {
						oneOf: [{ $ref: "#/definitions/ObjectId" }, { $ref: "#/definitions/RowItem" }],
					},
				},
				truncated: { type: "boolean" },
				meta: { type: "array", items: { $ref: "#/definitions/Cell" } },
			},
			required: ["type", "id", "rows"],
			additionalProperties: false,
		},
		OtherItem: {
			type: "object",
			properties: {
				type: { const: "other" },
				kind: { type: "string" },
			},
			required: ["type", "kind"],
			additionalProperties: false,
		},
		/** Item kinds this version does not know; they are skipped, not rejected. */
		UnknownItem: {
			type: "object",
			properties: {
				type: { type: "string", not: { enum: ["dict", "row", "table", "other"] } },
			},
			required: ["type"],
		},
		Item: {
			oneOf: [
				{ $ref: "#/definitions/DictItem" },
				{ $ref: "#/definitions/RowItem" },
				{ $ref: "#/definitions/TableItem" },
				{ $ref: "#/definitions/OtherItem" },
				{ $ref: "#/definitions/UnknownItem" },
			],
		},
	},
} as const;
