export class AssertError extends Error {
	public static code = "ASSERTION_FAILED"
	public readonly code = AssertError.code

	constructor(message: string, public readonly context?: Record<string, unknown>) {
		super(message)
	}
}

/** Throws an `AssertError` if `condition` is falsy. Reserve this for internal invariants, not user input. */
export function assert(
	condition: unknown,
	message = "assertion failed",
	context?: Record<string, unknown>,
): asserts condition {
	if (!condition) {
		throw new AssertError(message, context)
	}
}
