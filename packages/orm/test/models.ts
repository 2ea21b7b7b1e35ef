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
	type FloatMember,
	type IntegerMember,
	type ListMember,
	type ObjectListMember,
	type ObjectMember,
	type RawRecord,
	type Serializable,
	type TextMember,
} from "@tablemap/orm"

export const genres = ["death", "thrash", "speed", "hair", "doom", "sludge"] as const
export type Genre = (typeof genres)[number]

/** A nested value that is not an entity itself. */
export class DateRange implements Serializable<DateRange> {
	constructor(public readonly start = new Date(0), public readonly end = new Date(0)) {}

	public toMap() {
		return { start: this.start.toISOString(), end: this.end.toISOString() }
	}

	public async fromMap(map: RawRecord): Promise<DateRange> {
		const { start, end } = map
		if (typeof start !== "string" || typeof end !== "string") {
			throw new DecodeError("range", "start and end strings")
		}

		return new DateRange(new Date(start), new Date(end))
	}
}

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

export type BandInit = {
	name?: string
	album?: Album
	genre?: Genre
	defunct?: boolean
	formed?: Date
	active?: DateRange[]
	bandMembers?: string[]
	studioAlbumYears?: number[]
	logo?: Uint8Array
}

export class Band extends Entity<Band> {
	readonly #name: TextMember
	readonly #album: ObjectMember<Album>
	readonly #genre: EnumMember<Genre>
	readonly #defunct: BooleanMember
	readonly #formed: DateTimeMember
	readonly #active: ObjectListMember<DateRange>
	readonly #bandMembers: ListMember<"string">
	readonly #studioAlbumYears: ListMember<"integer">
	readonly #logo: BytesMember

	constructor(init: BandInit = {}) {
		super(() => new Band())
		this.#name = this.define(column.text("name", init.name ?? ""))
		this.#album = this.define(column.object(() => new Album(), "album", init.album ?? new Album()))
		this.#genre = this.define(column.enumeration(genres, "genre", init.genre ?? "thrash"))
		this.#defunct = this.define(column.boolean("defunct", init.defunct ?? false))
		this.#formed = this.define(column.datetime("formed", init.formed ?? new Date(0)))
		this.#active = this.define(column.objectList(() => new DateRange(), "active", init.active ?? []))
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

	set genre(genre: Genre) {
		this.#genre.value = genre
	}

	get defunct() {
		return this.#defunct.value
	}

	set defunct(defunct: boolean) {
		this.#defunct.value = defunct
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

/** A composite primary key: (name, year). */
export class Chart extends Entity<Chart> {
	readonly #name: TextMember
	readonly #year: IntegerMember
	readonly #value: IntegerMember

	constructor(name = "", year = 0, value = 0) {
		super(() => new Chart())
		this.#name = this.define(column.text("name", name, true))
		this.#year = this.define(column.integer("year", year, true))
		this.#value = this.define(column.integer("value", value))
	}

	get name() {
		return this.#name.value
	}

	get year() {
		return this.#year.value
	}

	get value() {
		return this.#value.value
	}

	set value(value: number) {
		this.#value.value = value
	}
}

/** Scalars only, with a table name that doesn't follow the class name. */
export class Note extends Entity<Note> {
	readonly #id: IntegerMember
	readonly #title: TextMember
	readonly #rating: FloatMember

	constructor(id = 0, title = "", rating = 0) {
		super(() => new Note())
		this.#id = this.define(column.integer("id", id))
		this.#title = this.define(column.text("title", title))
		this.#rating = this.define(column.float("rating", rating))
	}

	get table() {
		return "notes"
	}

	get id() {
		return this.#id.value
	}

	get title() {
		return this.#title.value
	}

	set title(title: string) {
		this.#title.value = title
	}

	get rating() {
		return this.#rating.value
	}
}

export const showNoMercy = () =>
	new Album("Show No Mercy", new Date("1983-12-01T00:00:00.000Z"), Duration.from({ minutes: 35, seconds: 2 }))

export const slayer = () =>
	new Band({
		name: "Slayer",
		album: showNoMercy(),
		genre: "thrash",
		defunct: false,
		formed: new Date("1981-01-01T00:00:00.000Z"),
		active: [new DateRange(new Date("1981-01-01T00:00:00.000Z"), new Date("2019-11-30T00:00:00.000Z"))],
		bandMembers: ["Tom Araya", "Jeff Hanneman", "Kerry King", "Dave Lombardo"],
		studioAlbumYears: [1983, 1985, 1986, 1988],
		logo: new Uint8Array([0x89, 0x50, 0x4e, 0x47]),
	})
