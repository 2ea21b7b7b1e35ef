import { deepEqual, equalBytes, hashText, signalInvalidType } from "@tablemap/utils"

import { DecodeError } from "./errors.js"
import { Duration } from "./Duration.js"
import type { ListMember, Member, ObjectListMember, ObjectMember, ScalarMember } from "./members.js"
import type { ColumnType, DatabaseMap, RawRecord, ScalarType, ScalarValue, Serializable, WireValue } from "./types.js"

const scalarColumnTypes = {
	integer: "INTEGER",
	float: "REAL",
	string: "TEXT",
} satisfies Record<ScalarType, ColumnType>

export function getColumnType(member: Member): ColumnType {
	if (member.kind === "scalar") {
		return scalarColumnTypes[member.type]
	} else if (member.kind === "enum" || member.kind === "boolean") {
		return "INTEGER"
	} else if (member.kind === "bytes") {
		return "BLOB"
	} else if (member.kind === "datetime") {
		return "TEXT"
	} else if (member.kind === "duration") {
		// durations are stored as microseconds, which overflow 32 bits after about half an hour
		return "BIGINT"
	} else if (member.kind === "list" || member.kind === "object-list" || member.kind === "object") {
		return "TEXT"
	} else {
		signalInvalidType(member)
	}
}

// Encoding

export function encodeMember(member: Member): WireValue {
	if (member.kind === "scalar") {
		return encodeScalarValue(member.key, member.type, member.value)
	} else if (member.kind === "enum") {
		const index = member.values.indexOf(member.value)
		if (index === -1) {
			throw new TypeError(`${member.key} must be one of its declared enum values`)
		}

		return index
	} else if (member.kind === "boolean") {
		if (typeof member.value !== "boolean") {
			throw new TypeError(`${member.key} must be a boolean`)
		}

		return member.value ? 1 : 0
	} else if (member.kind === "bytes") {
		if (!(member.value instanceof Uint8Array)) {
			throw new TypeError(`${member.key} must be a Uint8Array`)
		}

		return member.value
	} else if (member.kind === "datetime") {
		if (!(member.value instanceof Date) || Number.isNaN(member.value.getTime())) {
			throw new TypeError(`${member.key} must be a valid Date`)
		}

		return member.value.toISOString()
	} else if (member.kind === "duration") {
		if (!(member.value instanceof Duration)) {
			throw new TypeError(`${member.key} must be a Duration`)
		}

		return member.value.microseconds
	} else if (member.kind === "list") {
		return JSON.stringify(member.value.map((value) => encodeScalarValue(member.key, member.element, value)))
	} else if (member.kind === "object-list") {
		return JSON.stringify(member.value.map((value, index) => toJSONMap(`${member.key}[${index}]`, value.toMap())))
	} else if (member.kind === "object") {
		return JSON.stringify(toJSONMap(member.key, member.value.toMap()))
	} else {
		signalInvalidType(member)
	}
}

function encodeScalarValue(key: string, type: ScalarType, value: ScalarValue): ScalarValue {
	if (type === "integer") {
		if (typeof value === "number" && Number.isSafeInteger(value)) {
			return value
		} else {
			throw new TypeError(`${key} must be a safely representable integer`)
		}
	} else if (type === "float") {
		// NaN and the infinities have no JSON encoding, and sqlite stores NaN as NULL
		if (typeof value === "number" && Number.isFinite(value)) {
			return value
		} else {
			throw new TypeError(`${key} must be a finite number`)
		}
	} else if (type === "string") {
		if (typeof value === "string") {
			return value
		} else {
			throw new TypeError(`${key} must be a string`)
		}
	} else {
		signalInvalidType(type)
	}
}

// Nested maps are written as JSON, which has no binary type,
// so bytes become an array of octets.
const toJSONMap = (key: string, map: DatabaseMap) =>
	Object.fromEntries(Object.entries(map).map(([name, value]) => [name, toJSONValue(`${key}.${name}`, value)]))

function toJSONValue(key: string, value: WireValue): number | string | number[] | null {
	if (value instanceof Uint8Array) {
		return Array.from(value)
	} else if (typeof value === "number" && !Number.isFinite(value)) {
		throw new TypeError(`${key} must be a finite number`)
	} else {
		return value
	}
}

// Decoding

export async function decodeMember(member: Member, value: unknown): Promise<void> {
	if (member.kind === "scalar") {
		decodeScalarMember(member, value)
	} else if (member.kind === "enum") {
		if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0 && value < member.values.length) {
			member.value = member.values[value]
		} else {
			throw new DecodeError(member.key, `an ordinal below ${member.values.length}`)
		}
	} else if (member.kind === "boolean") {
		// any integer other than zero reads back as true
		if (typeof value === "number" && Number.isSafeInteger(value)) {
			member.value = value !== 0
		} else {
			throw new DecodeError(member.key, "an integer")
		}
	} else if (member.kind === "bytes") {
		member.value = decodeBytes(member.key, value)
	} else if (member.kind === "datetime") {
		const date = typeof value === "string" ? new Date(value) : null
		if (date === null || Number.isNaN(date.getTime())) {
			throw new DecodeError(member.key, "an ISO-8601 date string")
		}

		member.value = date
	} else if (member.kind === "duration") {
		if (typeof value === "number" && Number.isSafeInteger(value)) {
			member.value = new Duration(value)
		} else if (typeof value === "bigint" && Number.isSafeInteger(Number(value))) {
			member.value = new Duration(Number(value))
		} else {
			throw new DecodeError(member.key, "an integer number of microseconds")
		}
	} else if (member.kind === "list") {
		member.value = decodeList(member, value)
	} else if (member.kind === "object-list") {
		member.value = await decodeObjectList(member, value)
	} else if (member.kind === "object") {
		member.value = await decodeObject(member, value)
	} else {
		signalInvalidType(member)
	}
}

function decodeScalarMember(member: ScalarMember, value: unknown) {
	if (member.type === "integer") {
		if (typeof value === "number" && Number.isSafeInteger(value)) {
			member.value = value
		} else {
			throw new DecodeError(member.key, "an integer")
		}
	} else if (member.type === "float") {
		if (typeof value === "number") {
			member.value = value
		} else {
			throw new DecodeError(member.key, "a number")
		}
	} else if (member.type === "string") {
		if (typeof value === "string") {
			member.value = value
		} else {
			throw new DecodeError(member.key, "a string")
		}
	} else {
		signalInvalidType(member)
	}
}

const isOctet = (value: unknown) => typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 255

function decodeBytes(key: string, value: unknown): Uint8Array {
	if (value instanceof Uint8Array) {
		// stores may hand back a Buffer (or a view into a larger one), so always copy
		return Uint8Array.from(value)
	} else if (Array.isArray(value) && value.every(isOctet)) {
		return Uint8Array.from(value)
	} else {
		throw new DecodeError(key, "a Uint8Array")
	}
}

function parseJSON(key: string, value: unknown): unknown {
	if (typeof value !== "string") {
		throw new DecodeError(key, "a JSON string")
	}

	try {
		return JSON.parse(value)
	} catch (err) {
		throw new DecodeError(key, "a JSON string", { cause: err })
	}
}

const isRecord = (value: unknown): value is RawRecord =>
	typeof value === "object" && value !== null && !Array.isArray(value)

const isScalarValue = (type: ScalarType, value: unknown): value is ScalarValue =>
	type === "string"
		? typeof value === "string"
		: type === "integer"
		? typeof value === "number" && Number.isSafeInteger(value)
		: typeof value === "number"

function decodeList(member: ListMember, value: unknown): ScalarValue[] {
	const elements = parseJSON(member.key, value)
	if (!Array.isArray(elements)) {
		throw new DecodeError(member.key, "a JSON array")
	}

	const list: ScalarValue[] = []
	for (const element of elements) {
		if (!isScalarValue(member.element, element)) {
			throw new DecodeError(member.key, `a JSON array of ${member.element} values`)
		}

		list.push(element)
	}

	return list
}

async function decodeObjectList(member: ObjectListMember, value: unknown): Promise<Serializable[]> {
	const elements = parseJSON(member.key, value)
	if (!Array.isArray(elements)) {
		throw new DecodeError(member.key, "a JSON array")
	}

	const list: Serializable[] = []
	for (const element of elements) {
		if (!isRecord(element)) {
			throw new DecodeError(member.key, "a JSON array of objects")
		}

		list.push(await member.revive(element))
	}

	return list
}

async function decodeObject(member: ObjectMember, value: unknown): Promise<Serializable> {
	const map = parseJSON(member.key, value)
	if (!isRecord(map)) {
		throw new DecodeError(member.key, "a JSON object")
	}

	return await member.revive(map)
}

// Equality and hashing

/** Two members are equal if they have the same key, kind, key role, column type and value. */
export function memberEquals(a: Member, b: Member): boolean {
	if (a.key !== b.key || a.kind !== b.kind || a.primary !== b.primary) {
		return false
	} else if (getColumnType(a) !== getColumnType(b)) {
		return false
	}

	if (a.kind === "bytes" && b.kind === "bytes") {
		return equalBytes(a.value, b.value)
	} else if (a.kind === "datetime" && b.kind === "datetime") {
		return a.value.getTime() === b.value.getTime()
	} else if (a.kind === "duration" && b.kind === "duration") {
		return a.value.equals(b.value)
	} else if (a.kind === "list" && b.kind === "list") {
		return deepEqual(a.value, b.value)
	} else if (a.kind === "object" || a.kind === "object-list") {
		// nested values have no equality of their own, so compare what would be stored
		return encodeMember(a) === encodeMember(b)
	} else {
		return a.value === b.value
	}
}

export function hashMember(member: Member): Uint8Array {
	const value = encodeMember(member)
	const encoded = value instanceof Uint8Array ? Array.from(value) : value
	return hashText(JSON.stringify([member.key, member.kind, member.primary, getColumnType(member), encoded]))
}
