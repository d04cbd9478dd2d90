export function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isString(value: unknown): value is string {
	return typeof value === "string";
}

export function isNonEmptyString(value: unknown): value is string {
	return typeof value === "string" && value.length > 0;
}

export function isFiniteNumber(value: unknown): value is number {
	return typeof value === "number" && Number.isFinite(value);
}

/** Walks nested objects; undefined as soon as a step is not an object */
export function pick(value: unknown, ...keys: string[]): unknown {
	let current = value;
	for (const key of keys) {
		if (!isObject(current)) return undefined;
		current = current[key];
	}
	return current;
}

export function pickString(value: unknown, ...keys: string[]): string | undefined {
	const found = pick(value, ...keys);
	return isString(found) ? found : undefined;
}

export function pickNumber(value: unknown, ...keys: string[]): number | undefined {
	const found = pick(value, ...keys);
	return isFiniteNumber(found) ? found : undefined;
}

export function pickArray(value: unknown, ...keys: string[]): unknown[] | undefined {
	const found = pick(value, ...keys);
	return Array.isArray(found) ? found : undefined;
}
