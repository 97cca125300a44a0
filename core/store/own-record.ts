/**
 * Keyed access to records decoded from JSON. Keys are user data (project ids,
 * machine ids), so lookups must not reach `Object.prototype` members such as
 * `constructor` or `toString`.
 */
export function ownEntry<T>(record: Record<string, T>, key: string): T | undefined {
	return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function hasEntry(record: Record<string, unknown>, key: string): boolean {
	return Object.hasOwn(record, key);
}

/** Assign as an own property; a plain assignment to `__proto__` would replace the prototype. */
export function setEntry<T>(record: Record<string, T>, key: string, value: T): void {
	Object.defineProperty(record, key, {
		value,
		enumerable: true,
		writable: true,
		configurable: true,
	});
}
