import { describe, test, expect } from "vitest";
import { MorkRow, MorkTable, ObjectStore } from "./objectStore";
import { RowNotFoundError } from "./errors";

describe("ObjectStore", () => {
	test("stores entities per namespace", () => {
		const store = new ObjectStore<string>();

		store.set("ns1", "1", "one");
		store.set("ns2", "1", "other one");

		expect(store.get("ns1", "1")).toBe("one");
		expect(store.get("ns2", "1")).toBe("other one");
		expect(store.get("ns3", "1")).toBeUndefined();
		expect(store.has("ns1", "2")).toBe(false);
		expect(store.size).toBe(2);
	});

	test("setting an existing key replaces the entity", () => {
		const store = new ObjectStore<string>();

		store.set("ns", "1", "old");
		store.set("ns", "1", "new");

		expect(store.get("ns", "1")).toBe("new");
		expect(store.size).toBe(1);
	});

	test("enumerates (namespace, id, entity) triples in insertion order", () => {
		const store = new ObjectStore<number>();
		store.set("b", "2", 2);
		store.set("a", "1", 1);
		store.set("b", "3", 3);

		expect([...store.entries()]).toEqual([
			["b", "2", 2],
			["b", "3", 3],
			["a", "1", 1],
		]);
		expect([...store.namespaces()]).toEqual(["b", "a"]);
	});
});

describe("MorkRow", () => {
	test("exposes its cells", () => {
		const row = new MorkRow([["name", "Alice"], ["email", "alice@example.com"]]);

		expect(row.get("name")).toBe("Alice");
		expect(row.get("missing")).toBeUndefined();
		expect(row.columnNames()).toEqual(["name", "email"]);
		expect(row.toRecord()).toEqual({ name: "Alice", email: "alice@example.com" });
	});

	test("rewrite changes an existing column", () => {
		const row = new MorkRow([["size", "1F"]]);

		row.rewrite("size", "31");

		expect([...row.entries()]).toEqual([["size", "31"]]);
	});

	test("rewrite refuses unknown columns", () => {
		const row = new MorkRow([["size", "1F"]]);

		expect(() => row.rewrite("flags", "0")).toThrow('row has no column "flags"');
	});
});

describe("MorkTable", () => {
	test("resolves its rows through the row store", () => {
		const rows = new ObjectStore<MorkRow>();
		rows.set("ns", "1", new MorkRow([["a", "1"]]));
		rows.set("ns", "2", new MorkRow([["b", "2"]]));

		const table = new MorkTable([{ namespace: "ns", id: "2" }, { namespace: "ns", id: "1" }], rows);

		expect(table.length).toBe(2);
		expect([...table.rows()].map((row) => row.toRecord())).toEqual([{ b: "2" }, { a: "1" }]);
		expect([...table.columnNames()]).toEqual(["b", "a"]);
	});

	test("fails when a key has no row", () => {
		const rows = new ObjectStore<MorkRow>();
		const table = new MorkTable([{ namespace: "ns", id: "9" }], rows);

		expect(() => [...table.rows()]).toThrow(RowNotFoundError);
	});
});
