export function equalBytes(a: Uint8Array, b: Uint8Array): boolean {
	if (a.byteLength !== b.byteLength) {
		return false
	}

	for (let i = 0; i < a.byteLength; i++) {
		if (a[i] !== b[i]) {
			return false
		}
	}

	return true
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" &&
	value !== null &&
	!Array.isArray(value) &&
	!(value instanceof Uint8Array) &&
	!(value instanceof Date)

/**
 * Structural equality over the values a record can hold: primitives,
 * `Uint8Array`, `Date`, arrays and plain objects. Object key order is ignored.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
	// undefined, null, boolean, number, string
	if (a === b) {
		return true
	}

	if (a instanceof Uint8Array && b instanceof Uint8Array) {
		return equalBytes(a, b)
	}

	if (a instanceof Date && b instanceof Date) {
		return a.getTime() === b.getTime()
	}

	if (Array.isArray(a) && Array.isArray(b)) {
		if (a.length !== b.length) {
			return false
		}

		for (let i = 0; i < a.length; i++) {
			if (!deepEqual(a[i], b[i])) {
				return false
			}
		}

		return true
	}

	if (isPlainObject(a) && isPlainObject(b)) {
		const aKeys = Object.keys(a).sort()
		const bKeys = Object.keys(b).sort()

		if (aKeys.length !== bKeys.length) {
			return false
		}

		for (let i = 0; i < aKeys.length; i++) {
			const key = aKeys[i]
			if (key !== bKeys[i] || !deepEqual(a[key], b[key])) {
				return false
			}
		}

		return true
	}

	return false
}
