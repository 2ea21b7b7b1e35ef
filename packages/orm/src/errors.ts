export class DecodeError extends Error {
	public static code = "DECODE_ERROR"
	public readonly code = DecodeError.code

	constructor(public readonly key: string, expected: string, options?: { cause?: unknown }) {
		super(`invalid value for ${key} (expected ${expected})`, options)
	}
}

export class UnknownFieldError extends Error {
	public static code = "UNKNOWN_FIELD"
	public readonly code = UnknownFieldError.code

	constructor(public readonly table: string, public readonly key: string) {
		super(`unknown data member key ${table}/${key}`)
	}
}

export class NoRowsAffectedError extends Error {
	public static code = "NO_ROWS_AFFECTED"
	public readonly code = NoRowsAffectedError.code

	constructor(public readonly operation: "update" | "delete", public readonly table: string) {
		super(`${operation} on ${table} matched no rows`)
	}
}

export class NotifierDisposedError extends Error {
	public static code = "NOTIFIER_DISPOSED"
	public readonly code = NotifierDisposedError.code

	constructor(public readonly table: string) {
		super(`notifier for ${table} has been disposed`)
	}
}
