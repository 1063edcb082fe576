import { describe, test, expect } from "vitest";
import { DictionaryStore } from "./dictionaryStore";
import { ReferenceResolver } from "./resolver";
import { LookupError } from "./errors";
import type { SymbolicRef } from "./model";

function ref(id: string, scope?: string | SymbolicRef): SymbolicRef {
	return scope === undefined ? { type: "ref", id } : { type: "ref", id, scope };
}

describe("ReferenceResolver", () => {
	function setup(): { dicts: DictionaryStore; resolver: ReferenceResolver } {
		const dicts = DictionaryStore.create();
		dicts.merge("a", [["80", "literal value"], ["5", "value five"]]);
		dicts.merge("c", [["80", "subject"], ["5", "history"], ["6", "m"]]);
		return { dicts, resolver: new ReferenceResolver(dicts) };
	}

	describe("resolveId", () => {
		test("uses a literal scope as the namespace", () => {
			const { resolver } = setup();

			expect(resolver.resolveId({ type: "id", id: "1", scope: "ns:msg" })).toEqual({
				id: "1",
				namespace: "ns:msg",
			});
		});

		test("reports an absent namespace when there is no scope", () => {
			const { resolver } = setup();

			expect(resolver.resolveId({ type: "id", id: "1" })).toEqual({ id: "1", namespace: undefined });
		});

		test("looks up a symbolic scope in dictionary c", () => {
			const { resolver } = setup();

			expect(resolver.resolveId({ type: "id", id: "3", scope: ref("5") })).toEqual({
				id: "3",
				namespace: "history",
			});
		});

		test("a symbolic scope may name its own dictionary", () => {
			const { dicts, resolver } = setup();
			dicts.merge("m", [["1", "ns:addrbk"]]);

			expect(resolver.resolveId({ type: "id", id: "3", scope: ref("1", "m") }).namespace).toBe("ns:addrbk");
		});

		test("nested symbolic scopes resolve recursively", () => {
			const { dicts, resolver } = setup();
			dicts.merge("m", [["1", "ns:addrbk"]]);

			// ^1:^6: alias 1 is read from the dictionary that alias 6 names in c ("m")
			expect(resolver.resolveId({ type: "id", id: "3", scope: ref("1", ref("6")) }).namespace).toBe("ns:addrbk");
		});

		test("fails on an undefined scope alias", () => {
			const { resolver } = setup();

			expect(() => resolver.resolveId({ type: "id", id: "3", scope: ref("99") })).toThrow(LookupError);
		});
	});

	describe("resolveCell", () => {
		test("decodes literal columns and values", () => {
			const { resolver } = setup();

			expect(resolver.resolveCell({ column: "name", value: "a\\)b$21" })).toEqual(["name", "a)b!"]);
		});

		test("symbolic columns default to dictionary c", () => {
			const { resolver } = setup();

			expect(resolver.resolveCell({ column: ref("80"), value: "x" })).toEqual(["subject", "x"]);
		});

		test("symbolic values default to dictionary a", () => {
			const { resolver } = setup();

			expect(resolver.resolveCell({ column: "name", value: ref("80") })).toEqual(["name", "literal value"]);
		});

		test("an explicit namespace on a value reference wins", () => {
			const { resolver } = setup();

			expect(resolver.resolveCell({ column: "name", value: ref("80", "c") })).toEqual(["name", "subject"]);
		});

		test("seeded aliases resolve before any dict item", () => {
			const resolver = new ReferenceResolver(DictionaryStore.create());

			expect(resolver.resolveCell({ column: ref("41"), value: ref("28") })).toEqual(["A", "("]);
		});

		test("fails on an undefined value alias", () => {
			const { resolver } = setup();

			expect(() => resolver.resolveCell({ column: "name", value: ref("99") })).toThrow(
				'undefined alias "99" in namespace "a"'
			);
		});
	});
});
