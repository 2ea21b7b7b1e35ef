import { deepEqual } from "@tablemap/utils"

import type { Database, DatabaseMap, QueryOptions, RawRecord, WhereClause } from "@tablemap/orm"

export type Call =
	| { method: "insert"; table: string; record: DatabaseMap }
	| { method: "query"; table: string; options?: QueryOptions }
	| { method: "update"; table: string; record: DatabaseMap; clause: WhereClause }
	| { method: "delete"; table: string; clause?: WhereClause }

/**
 * An in-process store for tests. It records every call and understands
 * exactly the where clauses the access layer produces: `key = ?` terms
 * joined by `AND`. It does not enforce primary key constraints.
 */
export class MemoryDatabase implements Database {
	public readonly calls: Call[] = []
	public readonly tables = new Map<string, DatabaseMap[]>()

	#rowId = 0

	public insert(table: string, record: DatabaseMap) {
		this.calls.push({ method: "insert", table, record })
		this.#rows(table).push({ ...record })
		return ++this.#rowId
	}

	public query(table: string, options?: QueryOptions): RawRecord[] {
		this.calls.push({ method: "query", table, options })
		const columns = options?.columns
		return this.#rows(table).map((row) =>
			columns === undefined ? { ...row } : Object.fromEntries(columns.map((key) => [key, row[key]])),
		)
	}

	public update(table: string, record: DatabaseMap, clause: WhereClause) {
		this.calls.push({ method: "update", table, record, clause })
		const rows = this.#rows(table).filter(MemoryDatabase.match(clause))
		for (const row of rows) {
			Object.assign(row, record)
		}

		return rows.length
	}

	public delete(table: string, clause?: WhereClause) {
		this.calls.push({ method: "delete", table, clause })
		const rows = this.#rows(table)
		const remaining = clause === undefined ? [] : rows.filter((row) => !MemoryDatabase.match(clause)(row))
		this.tables.set(table, remaining)
		return rows.length - remaining.length
	}

	#rows(table: string): DatabaseMap[] {
		let rows = this.tables.get(table)
		if (rows === undefined) {
			rows = []
			this.tables.set(table, rows)
		}

		return rows
	}

	private static match({ where, args }: WhereClause) {
		const keys = where.split(" AND ").map((term) => {
			const match = /^(\S+) = \?$/.exec(term)
			if (match === null) {
				throw new Error(`unsupported where term: ${term}`)
			}

			return match[1]
		})

		if (keys.length !== args.length) {
			throw new Error("where clause and arguments do not line up")
		}

		return (row: DatabaseMap) => keys.every((key, index) => deepEqual(row[key], args[index]))
	}
}
