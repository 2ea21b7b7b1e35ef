export type Awaitable<T> = T | Promise<T>

// These are the types of values as they cross the store boundary.
// The store does not need to know anything about dates, durations, enums or
// nested objects; every member kind reduces to one of these.

export type WireValue = number | string | Uint8Array | null

/** A record as written to the store: one entry per column. */
export type DatabaseMap = Record<string, WireValue>

/**
 * A record as read back from the store. Stores are free to return richer
 * values (e.g. a `Buffer` for a BLOB), and nested maps parsed from JSON hold
 * arbitrary JSON values, so decoding validates everything it reads.
 */
export type RawRecord = Readonly<Record<string, unknown>>

export type PrimaryKeyValue = number | string | Uint8Array

export type ScalarType = "integer" | "float" | "string"

export type ScalarValue = number | string

export type ColumnType = "INTEGER" | "REAL" | "TEXT" | "BLOB" | "BIGINT"

export type QueryOptions = { columns?: string[] }

export type WhereClause = { where: string; args: WireValue[] }

/**
 * The relational store the access layer runs against. Implementations own
 * their own atomicity; nothing here is transactional.
 */
export interface Database {
	/** Append a row and return the row identifier assigned by the store. */
	insert(table: string, record: DatabaseMap): Awaitable<number>

	/** Return every row of `table`, optionally projected onto `columns`. */
	query(table: string, options?: QueryOptions): Awaitable<RawRecord[]>

	/** Overwrite the matching rows with `record`; returns the number of rows changed. */
	update(table: string, record: DatabaseMap, clause: WhereClause): Awaitable<number>

	/** Delete the matching rows, or every row without a clause; returns the number of rows deleted. */
	delete(table: string, clause?: WhereClause): Awaitable<number>
}

/**
 * Anything that can be nested inside another record as a JSON column.
 * `fromMap` is called on a blank instance and resolves to a new, populated one.
 */
export interface Serializable<Self = unknown> {
	toMap(): DatabaseMap
	fromMap(map: RawRecord): Promise<Self>
}
