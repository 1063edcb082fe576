import { LookupError } from "./errors";

/**
 * Which namespaces exist before any dict item is read, and how many
 * single-character aliases every dictionary starts with.
 */
export interface DictionarySeed {
	readonly namespaces: readonly string[];
	readonly size: number;
}

export const defaultDictionarySeed: DictionarySeed = {
	namespaces: ["a", "c"],
	size: 0x80,
};

export interface ReadonlyDictionaryStore {
	get(namespace: string, alias: string): string;
	has(namespace: string): boolean;
	namespaces(): IterableIterator<string>;
	entries(namespace: string): ReadonlyMap<string, string>;
}

/**
 * Namespace → alias → literal text.
 * Later merges overlay earlier ones alias by alias; nothing is ever removed.
 */
export class DictionaryStore implements ReadonlyDictionaryStore {
	private readonly _dicts = new Map<string, Map<string, string>>();

	private constructor(private readonly _seedSize: number) { }

	static create(seed: DictionarySeed = defaultDictionarySeed): DictionaryStore {
		const store = new DictionaryStore(seed.size);
		for (const namespace of seed.namespaces) {
			store._dicts.set(namespace, store.createSeeded());
		}
		return store;
	}

	get(namespace: string, alias: string): string {
		const dict = this._dicts.get(namespace);
		if (!dict) {
			throw new LookupError(namespace, undefined);
		}
		const value = dict.get(alias);
		if (value === undefined) {
			throw new LookupError(namespace, alias);
		}
		return value;
	}

	has(namespace: string): boolean {
		return this._dicts.has(namespace);
	}

	namespaces(): IterableIterator<string> {
		return this._dicts.keys();
	}

	entries(namespace: string): ReadonlyMap<string, string> {
		const dict = this._dicts.get(namespace);
		if (!dict) {
			throw new LookupError(namespace, undefined);
		}
		return dict;
	}

	merge(namespace: string, entries: Iterable<readonly [string, string]>): void {
		let dict = this._dicts.get(namespace);
		if (!dict) {
			dict = this.createSeeded();
			this._dicts.set(namespace, dict);
		}
		for (const [alias, value] of entries) {
			dict.set(alias, value);
		}
	}

	private createSeeded(): Map<string, string> {
		const dict = new Map<string, string>();
		for (let code = 0; code < this._seedSize; code++) {
			dict.set(seedAlias(code), String.fromCharCode(code));
		}
		return dict;
	}
}

function seedAlias(code: number): string {
	return code.toString(16).toUpperCase().padStart(2, "0");
}
