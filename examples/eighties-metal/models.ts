import {
	column,
	DecodeError,
	Duration,
	Entity,
	type BooleanMember,
	type BytesMember,
	type DateTimeMember,
	type DurationMember,
	type EnumMember,
	type ListMember,
	type ObjectListMember,
	type ObjectMember,
	type RawRecord,
	type Serializable,
	type TextMember,
} from "@tablemap/orm"

export const subGenres = ["death", "thrash", "speed", "hair", "doom", "sludge"] as const
export type SubGenre = (typeof subGenres)[number]

export class Album extends Entity<Album> {
	readonly #name: TextMember
	readonly #release: DateTimeMember
	readonly #length: DurationMember

	constructor(name = "", release = new Date(0), length = Duration.zero) {
		super(() => new Album())
		this.#name = this.define(column.text("name", name))
		this.#release = this.define(column.datetime("release", release))
		this.#length = this.define(column.duration("length", length))
	}

	get name() {
		return this.#name.value
	}

	get release() {
		return this.#release.value
	}

	get length() {
		return this.#length.value
	}
}

/**
 * A nested value that implements `Serializable` by hand. Extending `Entity`
 * with two datetime members would work just as well.
 */
export class ActivePeriod implements Serializable<ActivePeriod> {
	/** `end` is null while the band is still active. */
	constructor(public readonly start = new Date(0), public readonly end: Date | null = null) {}

	public toMap() {
		return { start: this.start.toISOString(), end: this.end?.toISOString() ?? null }
	}

	public async fromMap({ start, end }: RawRecord): Promise<ActivePeriod> {
		if (typeof start !== "string") {
			throw new DecodeError("start", "an ISO-8601 date string")
		} else if (end !== null && typeof end !== "string") {
			throw new DecodeError("end", "an ISO-8601 date string or null")
		}

		return new ActivePeriod(new Date(start), end === null ? null : new Date(end))
	}
}

export type EightiesMetalInit = {
	name: string
	album?: Album
	genre?: SubGenre
	defunct?: boolean
	formed?: Date
	active?: ActivePeriod[]
	bandMembers?: string[]
	studioAlbumYears?: number[]
	logo?: Uint8Array
}

export class EightiesMetal extends Entity<EightiesMetal> {
	readonly #name: TextMember
	readonly #album: ObjectMember<Album>
	readonly #genre: EnumMember<SubGenre>
	readonly #defunct: BooleanMember
	readonly #formed: DateTimeMember
	readonly #active: ObjectListMember<ActivePeriod>
	readonly #bandMembers: ListMember<"string">
	readonly #studioAlbumYears: ListMember<"integer">
	readonly #logo: BytesMember

	constructor(init: EightiesMetalInit = { name: "" }) {
		super(() => new EightiesMetal())

		// the first member is the primary key
		this.#name = this.define(column.text("name", init.name))
		this.#album = this.define(column.object(() => new Album(), "album", init.album ?? new Album()))
		this.#genre = this.define(column.enumeration(subGenres, "type", init.genre ?? "thrash"))
		this.#defunct = this.define(column.boolean("defunct", init.defunct ?? false))
		this.#formed = this.define(column.datetime("formed", init.formed ?? new Date(0)))
		this.#active = this.define(column.objectList(() => new ActivePeriod(), "active", init.active ?? []))
		this.#bandMembers = this.define(column.list("string", "members", init.bandMembers ?? []))
		this.#studioAlbumYears = this.define(column.list("integer", "studioAlbumYears", init.studioAlbumYears ?? []))
		this.#logo = this.define(column.bytes("logo", init.logo ?? new Uint8Array()))
	}

	get name() {
		return this.#name.value
	}

	get album() {
		return this.#album.value
	}

	get genre() {
		return this.#genre.value
	}

	set genre(genre: SubGenre) {
		this.#genre.value = genre
	}

	get defunct() {
		return this.#defunct.value
	}

	get formed() {
		return this.#formed.value
	}

	get active() {
		return this.#active.value
	}

	get bandMembers() {
		return this.#bandMembers.value
	}

	get studioAlbumYears() {
		return this.#studioAlbumYears.value
	}

	get logo() {
		return this.#logo.value
	}
}
