import type sqlite from "better-sqlite3"

import type { SqlitePrimitiveValue } from "./encoding.js"

export const quote = (name: string) => `"${name.replaceAll('"', '""')}"`

export class Query<R = Record<string, unknown>> {
	private readonly statement: sqlite.Statement<SqlitePrimitiveValue[], R>

	constructor(db: sqlite.Database, public readonly sql: string) {
		this.statement = db.prepare<SqlitePrimitiveValue[], R>(sql)
	}

	public all(params: SqlitePrimitiveValue[]): R[] {
		return this.statement.all(...params)
	}
}

export class Method {
	private readonly statement: sqlite.Statement<SqlitePrimitiveValue[]>

	constructor(db: sqlite.Database, public readonly sql: string) {
		this.statement = db.prepare<SqlitePrimitiveValue[]>(sql)
	}

	/** Returns the rowid of the last inserted row and the number of rows changed. */
	public run(params: SqlitePrimitiveValue[]): { lastInsertRowid: number; changes: number } {
		const { lastInsertRowid, changes } = this.statement.run(...params)
		return { lastInsertRowid: Number(lastInsertRowid), changes }
	}
}
