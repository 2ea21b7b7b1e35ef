import { assert, combineHashes } from "@tablemap/utils"

import { decodeMember, encodeMember, getColumnType, hashMember, memberEquals } from "./encoding.js"
import { UnknownFieldError } from "./errors.js"
import type { Member } from "./members.js"
import { isValidName } from "./names.js"
import type { DatabaseMap, RawRecord, Serializable } from "./types.js"

/**
 * The bridge between a model class and its table. Subclasses register their
 * members with `define()` in the constructor, in column order, and pass a
 * factory that returns a blank instance of the subclass:
 *
 * ```ts
 * class Album extends Entity<Album> {
 * 	readonly #name: TextMember
 *
 * 	constructor(name = "") {
 * 		super(() => new Album())
 * 		this.#name = this.define(column.text("name", name))
 * 	}
 *
 * 	get name() {
 * 		return this.#name.value
 * 	}
 * }
 * ```
 *
 * The list of members is fixed once the constructor returns; their values are not.
 */
export abstract class Entity<T extends Entity<T>> implements Serializable<T> {
	public readonly members: Member[] = []

	readonly #create: () => T

	protected constructor(create: () => T) {
		this.#create = create
	}

	protected define<M extends Member>(member: M): M {
		assert(isValidName(this.table), `invalid table name ${this.table}`)
		assert(isValidName(member.key), `invalid data member key ${this.table}/${member.key}`)
		assert(
			this.members.every(({ key }) => key !== member.key),
			`duplicate data member key ${this.table}/${member.key}`,
		)

		this.members.push(member)
		return member
	}

	/**
	 * The table name defaults to the name of the subclass. Override this if the
	 * class name is not stable, e.g. when the build minifies class names.
	 */
	public get table(): string {
		return this.constructor.name
	}

	/** The first member and every member flagged `primary`, in member order. */
	public get primaryKey(): Member[] {
		assert(this.members.length > 0, `${this.table} has no data members`)
		return this.members.filter((member, index) => index === 0 || member.primary)
	}

	public get idColumn(): string {
		const [first] = this.primaryKey
		return first.key
	}

	/** Describe the table as `Name (col TYPE,...,PRIMARY KEY (col,...))`. */
	public describeTable(): string {
		const columns = this.members.map((member) => `${member.key} ${getColumnType(member)},`)
		const primaryKey = this.primaryKey.map(({ key }) => key).join(",")
		return `${this.table} (${columns.join("")}PRIMARY KEY (${primaryKey}))`
	}

	public toMap(): DatabaseMap {
		const map: DatabaseMap = {}
		for (const member of this.members) {
			map[member.key] = encodeMember(member)
		}

		return map
	}

	/** Build a new T from a record retrieved from the store. Keys the entity doesn't know about are ignored. */
	public async fromMap(map: RawRecord): Promise<T> {
		const entity = this.#create()
		for (const member of entity.members) {
			if (!Object.hasOwn(map, member.key)) {
				throw new UnknownFieldError(entity.table, member.key)
			}

			await decodeMember(member, map[member.key])
		}

		return entity
	}

	public equals(other: unknown): boolean {
		if (!(other instanceof Entity) || other.constructor !== this.constructor) {
			return false
		} else if (other.members.length !== this.members.length) {
			return false
		}

		return this.members.every((member, index) => memberEquals(member, other.members[index]))
	}

	/**
	 * A hex digest of the table name and every member. Equal entities have
	 * equal hashes, so this can key a `Map` or `Set` of structurally distinct entities.
	 */
	public hash(): string {
		return combineHashes(this.table, this.members.map(hashMember))
	}
}
