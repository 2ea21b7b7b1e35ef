import type { Logger } from "@libp2p/interface"
import { logger } from "@libp2p/logger"

import { encodeMember } from "./encoding.js"
import type { Entity } from "./Entity.js"
import { NoRowsAffectedError } from "./errors.js"
import type { Awaitable, Database, PrimaryKeyValue, QueryOptions, WhereClause } from "./types.js"
import { isPrimaryKey } from "./utils.js"

/**
 * Data access object: maps entity operations onto the store for a single table.
 * The prototype entity supplies the table name, the factory used to rebuild
 * rows, and the primary key layout.
 */
export class Dao<T extends Entity<T>> {
	protected readonly log: Logger

	/**
	 * @param entity any instance of the entity type; only its shape is used
	 * @param db the store, or a promise that resolves to it once it is open
	 */
	constructor(private readonly entity: T, private readonly db: Awaitable<Database>) {
		this.log = logger(`tablemap:orm:dao:${entity.table}`)
	}

	public get table(): string {
		return this.entity.table
	}

	/** Insert a new row and return the row id assigned by the store. */
	public async create(obj: T): Promise<number> {
		const db = await this.db
		const id = await db.insert(this.table, obj.toMap())
		this.log("inserted row %d", id)
		return id
	}

	/** Get every row of the table, in the order the store returns them. */
	public async get({ columns }: QueryOptions = {}): Promise<T[]> {
		const db = await this.db
		const records = await db.query(this.table, { columns })
		this.log.trace("got %d rows", records.length)

		const objects: T[] = []
		for (const record of records) {
			objects.push(await this.entity.fromMap(record))
		}

		return objects
	}

	/** Overwrite the row with the same primary key as `obj`. */
	public async update(obj: T): Promise<number> {
		const db = await this.db
		const clause = Dao.getPrimaryKeyClause(obj)
		this.log.trace("updating where %s %o", clause.where, clause.args)

		const count = await db.update(this.table, obj.toMap(), clause)
		if (count === 0) {
			throw new NoRowsAffectedError("update", this.table)
		}

		return count
	}

	/**
	 * Delete rows. Given an entity, this matches every member of its primary key
	 * against the entity's current values. Given a bare value, it matches only
	 * the first member, which deletes every row sharing that value under a
	 * composite key.
	 */
	public async delete(target: T | PrimaryKeyValue): Promise<number> {
		if (typeof target === "number" && !Number.isFinite(target)) {
			throw new TypeError(`${this.entity.idColumn} must be a finite number`)
		}

		const db = await this.db
		const clause: WhereClause = isPrimaryKey(target)
			? { where: `${this.entity.idColumn} = ?`, args: [target] }
			: Dao.getPrimaryKeyClause(target)

		this.log.trace("deleting where %s %o", clause.where, clause.args)
		const count = await db.delete(this.table, clause)
		if (count === 0) {
			throw new NoRowsAffectedError("delete", this.table)
		}

		this.log("deleted %d rows", count)
		return count
	}

	/** Delete every row of the table. */
	public async deleteAll(): Promise<number> {
		const db = await this.db
		const count = await db.delete(this.table)
		this.log("deleted all %d rows", count)
		return count
	}

	/** `k1 = ? AND k2 = ? ...` over the primary key, with the encoded key values as arguments */
	public static getPrimaryKeyClause<T extends Entity<T>>(obj: T): WhereClause {
		const primaryKey = obj.primaryKey
		return {
			where: primaryKey.map(({ key }) => `${key} = ?`).join(" AND "),
			args: primaryKey.map(encodeMember),
		}
	}
}
