import type { Duration } from "./Duration.js"
import type { RawRecord, ScalarType, Serializable } from "./types.js"

// A member is one named column of an entity: its key, its current in-memory
// value, and whether it joins the first member in the primary key.
// The `kind` tag selects how the value is encoded for the store.

type BaseMember<Kind extends string, T> = {
	readonly kind: Kind
	readonly key: string
	value: T
	readonly primary: boolean
}

export type ScalarTypeValue<Type extends ScalarType> = Type extends "string" ? string : number

export type IntegerMember = BaseMember<"scalar", number> & { readonly type: "integer" }
export type FloatMember = BaseMember<"scalar", number> & { readonly type: "float" }
export type TextMember = BaseMember<"scalar", string> & { readonly type: "string" }
export type ScalarMember = IntegerMember | FloatMember | TextMember

export type EnumMember<T = unknown> = BaseMember<"enum", T> & {
	/** every possible value, in ordinal order */
	readonly values: readonly T[]
}

export type BooleanMember = BaseMember<"boolean", boolean>
export type BytesMember = BaseMember<"bytes", Uint8Array>
export type DateTimeMember = BaseMember<"datetime", Date>
export type DurationMember = BaseMember<"duration", Duration>

export type ListMember<Type extends ScalarType = ScalarType> = BaseMember<"list", ScalarTypeValue<Type>[]> & {
	readonly element: Type
}

export type ObjectListMember<T extends Serializable = Serializable> = BaseMember<"object-list", T[]> & {
	readonly revive: (map: RawRecord) => Promise<T>
}

export type ObjectMember<T extends Serializable = Serializable> = BaseMember<"object", T> & {
	readonly revive: (map: RawRecord) => Promise<T>
}

export type Member =
	| ScalarMember
	| EnumMember
	| BooleanMember
	| BytesMember
	| DateTimeMember
	| DurationMember
	| ListMember
	| ObjectListMember
	| ObjectMember

export type MemberKind = Member["kind"]

/**
 * Member builders. Each takes the column name, the initial value and,
 * last, whether the column is part of a composite primary key. The first
 * member of an entity is always part of the primary key regardless.
 */
export const column = {
	integer: (key: string, value: number, primary = false): IntegerMember => ({
		kind: "scalar",
		type: "integer",
		key,
		value,
		primary,
	}),

	float: (key: string, value: number, primary = false): FloatMember => ({
		kind: "scalar",
		type: "float",
		key,
		value,
		primary,
	}),

	text: (key: string, value: string, primary = false): TextMember => ({
		kind: "scalar",
		type: "string",
		key,
		value,
		primary,
	}),

	/**
	 * Stored as the index of `value` in `values`, so `values` must list every
	 * possible value in a fixed order. Appending is safe; reordering is not.
	 */
	enumeration: <T>(values: readonly T[], key: string, value: T, primary = false): EnumMember<T> => ({
		kind: "enum",
		values,
		key,
		value,
		primary,
	}),

	boolean: (key: string, value: boolean, primary = false): BooleanMember => ({
		kind: "boolean",
		key,
		value,
		primary,
	}),

	bytes: (key: string, value: Uint8Array, primary = false): BytesMember => ({ kind: "bytes", key, value, primary }),

	datetime: (key: string, value: Date, primary = false): DateTimeMember => ({
		kind: "datetime",
		key,
		value,
		primary,
	}),

	duration: (key: string, value: Duration, primary = false): DurationMember => ({
		kind: "duration",
		key,
		value,
		primary,
	}),

	list: <Type extends ScalarType>(
		element: Type,
		key: string,
		value: ScalarTypeValue<Type>[],
		primary = false,
	): ListMember<Type> => ({ kind: "list", element, key, value, primary }),

	/** `create` must return a blank instance of the element type; it is used to rebuild each element. */
	objectList: <T extends Serializable<T>>(
		create: () => T,
		key: string,
		value: T[],
		primary = false,
	): ObjectListMember<T> => ({
		kind: "object-list",
		revive: (map) => create().fromMap(map),
		key,
		value,
		primary,
	}),

	/** `create` must return a blank instance of the nested type. */
	object: <T extends Serializable<T>>(create: () => T, key: string, value: T, primary = false): ObjectMember<T> => ({
		kind: "object",
		revive: (map) => create().fromMap(map),
		key,
		value,
		primary,
	}),
}
