import type { WireValue } from "@tablemap/orm"

// this is the type of a value as bound to a sqlite statement.
// better-sqlite3 binds Buffers but rejects other Uint8Array views,
// so bytes are wrapped (without copying) on the way in
export type SqlitePrimitiveValue = string | number | bigint | Buffer | null

const toBuffer = (data: Uint8Array) => Buffer.from(data.buffer, data.byteOffset, data.byteLength)

export function encodeParam(value: WireValue): SqlitePrimitiveValue {
	if (value instanceof Uint8Array) {
		return Buffer.isBuffer(value) ? value : toBuffer(value)
	} else {
		return value
	}
}

export const encodeParams = (values: WireValue[]): SqlitePrimitiveValue[] => values.map(encodeParam)
