import type { Dao } from "./Dao.js"
import type { Entity } from "./Entity.js"
import type { PrimaryKeyValue } from "./types.js"

// The repository is what business logic talks to: plain collection
// operations over one entity type, with the store behind a Dao.

export class Repository<T extends Entity<T>> {
	constructor(private readonly dao: Dao<T>) {}

	public get table(): string {
		return this.dao.table
	}

	public get(): Promise<T[]> {
		return this.dao.get()
	}

	public create(obj: T): Promise<number> {
		return this.dao.create(obj)
	}

	public update(obj: T): Promise<number> {
		return this.dao.update(obj)
	}

	/** `target` is either an entity or the value of its first member. */
	public delete(target: T | PrimaryKeyValue): Promise<number> {
		return this.dao.delete(target)
	}

	public deleteAll(): Promise<number> {
		return this.dao.deleteAll()
	}
}
