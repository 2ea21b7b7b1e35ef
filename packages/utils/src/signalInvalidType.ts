// Call this from the final `else` of an exhaustive if-chain over a tagged union.
// It only type-checks if every variant has been handled.
export function signalInvalidType(value: never): never {
	throw new TypeError(`internal error - invalid type ${JSON.stringify(value)}`)
}
