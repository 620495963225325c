/**
 * DefaultMap is a map that fills itself in: looking up a missing key stores
 * and returns the value produced by the `defaulter`.
 *
 * Keys are compared by the value returned from `identify`, which allows
 * structured keys (such as `{ sort, id }` records) to be compared by content
 * rather than by reference.
 */
export class DefaultMap<K, V> {
	private map = new Map<unknown, { key: K, value: V }>();

	constructor(
		private defaulter: (k: K) => V,
		private identify: (k: K) => unknown = k => k,
	) { }

	get(key: K): V {
		const id = this.identify(key);
		const existing = this.map.get(id);
		if (existing !== undefined) {
			return existing.value;
		}

		const value = this.defaulter(key);
		this.map.set(id, { key, value });
		return value;
	}

	has(key: K): boolean {
		return this.map.has(this.identify(key));
	}

	get size(): number {
		return this.map.size;
	}

	clear(): void {
		this.map.clear();
	}

	*[Symbol.iterator](): Generator<[K, V]> {
		for (const { key, value } of this.map.values()) {
			yield [key, value];
		}
	}
}

/// `unreachable` marks the end of an exhaustive case analysis.
export function unreachable(value: never, where: string): never {
	throw new Error(where + ": unreachable `" + JSON.stringify(value) + "`");
}
