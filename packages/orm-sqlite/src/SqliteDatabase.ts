import Database, * as sqlite from "better-sqlite3"

import type { Logger } from "@libp2p/interface"
import { logger } from "@libp2p/logger"

import type {
	Database as Store,
	DatabaseMap,
	Entity,
	QueryOptions,
	RawRecord,
	WhereClause,
} from "@tablemap/orm"

import { encodeParams } from "./encoding.js"
import { Method, Query, quote } from "./utils.js"

export interface SqliteDatabaseInit {
	/** Path to the database file, or `null` for a transient in-memory database. */
	path: string | null
}

/**
 * A store backed by better-sqlite3. Prepared statements are cached by their
 * SQL text, so repeated operations on a table only compile once.
 * Constraint violations and other driver errors propagate unchanged.
 */
export class SqliteDatabase implements Store {
	public readonly db: sqlite.Database

	protected readonly log: Logger = logger("tablemap:orm-sqlite")

	readonly #queries = new Map<string, Query>()
	readonly #methods = new Map<string, Method>()

	constructor({ path }: SqliteDatabaseInit) {
		this.db = new Database(path ?? ":memory:")
		this.log("opened %s", path ?? ":memory:")
	}

	public close() {
		this.log("closing")
		this.#queries.clear()
		this.#methods.clear()
		this.db.close()
	}

	/** Create the entity's table unless it already exists. */
	public createTable<T extends Entity<T>>(entity: T) {
		const sql = `CREATE TABLE IF NOT EXISTS ${entity.describeTable()}`
		this.log("creating table %s", entity.table)
		this.db.exec(sql)
	}

	public dropTable<T extends Entity<T>>(entity: T) {
		this.log("dropping table %s", entity.table)
		this.db.exec(`DROP TABLE IF EXISTS ${quote(entity.table)}`)

		// statements prepared against the old table are no longer valid
		this.#queries.clear()
		this.#methods.clear()
	}

	public insert(table: string, record: DatabaseMap): number {
		const columns = Object.keys(record)
		const params = columns.map(() => "?").join(", ")
		const sql = `INSERT INTO ${quote(table)} (${columns.map(quote).join(", ")}) VALUES (${params})`

		const { lastInsertRowid } = this.#method(sql).run(encodeParams(Object.values(record)))
		this.log.trace("inserted row %d into %s", lastInsertRowid, table)
		return lastInsertRowid
	}

	public query(table: string, { columns }: QueryOptions = {}): RawRecord[] {
		const select = columns === undefined ? "*" : columns.map(quote).join(", ")
		return this.#query(`SELECT ${select} FROM ${quote(table)}`).all([])
	}

	public update(table: string, record: DatabaseMap, { where, args }: WhereClause): number {
		const assignments = Object.keys(record).map((key) => `${quote(key)} = ?`)
		const sql = `UPDATE ${quote(table)} SET ${assignments.join(", ")} WHERE ${where}`

		const { changes } = this.#method(sql).run(encodeParams([...Object.values(record), ...args]))
		this.log.trace("updated %d rows in %s", changes, table)
		return changes
	}

	public delete(table: string, clause?: WhereClause): number {
		if (clause === undefined) {
			return this.#method(`DELETE FROM ${quote(table)}`).run([]).changes
		}

		const sql = `DELETE FROM ${quote(table)} WHERE ${clause.where}`
		const { changes } = this.#method(sql).run(encodeParams(clause.args))
		this.log.trace("deleted %d rows from %s", changes, table)
		return changes
	}

	#query(sql: string): Query {
		let query = this.#queries.get(sql)
		if (query === undefined) {
			query = new Query(this.db, sql)
			this.#queries.set(sql, query)
		}

		return query
	}

	#method(sql: string): Method {
		let method = this.#methods.get(sql)
		if (method === undefined) {
			method = new Method(this.db, sql)
			this.#methods.set(sql, method)
		}

		return method
	}
}
