import { Dao, Duration, Notifier } from "@tablemap/orm"
import { SqliteDatabase } from "@tablemap/orm-sqlite"

import { ActivePeriod, Album, EightiesMetal } from "./models.js"

// usage: npm run example [path/to/db.sqlite]
const db = new SqliteDatabase({ path: process.argv[2] ?? null })
db.createTable(new EightiesMetal())

const bands = new Notifier(new Dao(new EightiesMetal(), db))

bands.subscribe((results) => {
	console.log(`[eighties-metal] ${results.length} bands`)
	for (const band of results) {
		const status = band.defunct ? "defunct" : "active"
		const years = band.studioAlbumYears.join(", ")
		console.log(`  ${band.name} (${band.genre}, ${status}): "${band.album.name}", ${band.album.length} [${years}]`)
	}
})

const slayer = new EightiesMetal({
	name: "Slayer",
	album: new Album("Show No Mercy", new Date("1983-12-01"), Duration.from({ minutes: 35, seconds: 2 })),
	genre: "thrash",
	defunct: true,
	formed: new Date("1981-01-01"),
	active: [new ActivePeriod(new Date("1981-01-01"), new Date("2019-11-30"))],
	bandMembers: ["Tom Araya", "Jeff Hanneman", "Kerry King", "Dave Lombardo"],
	studioAlbumYears: [1983, 1985, 1986, 1988, 1990, 1994, 1996, 1998, 2001, 2006, 2009, 2015],
	logo: new TextEncoder().encode("slayer"),
})

const metallica = new EightiesMetal({
	name: "Metallica",
	album: new Album("Kill 'Em All", new Date("1983-07-25"), Duration.from({ minutes: 51, seconds: 20 })),
	formed: new Date("1981-10-28"),
	active: [new ActivePeriod(new Date("1981-10-28"))],
	bandMembers: ["Cliff Burton", "Kirk Hammett", "James Hetfield", "Lars Ulrich"],
	studioAlbumYears: [1983, 1984, 1986, 1988, 1991, 1996, 1997, 2003, 2008, 2016, 2023],
	logo: new TextEncoder().encode("metallica"),
})

const megadeth = new EightiesMetal({
	name: "Megadeth",
	album: new Album(
		"Killing Is My Business... and Business Is Good!",
		new Date("1985-06-12"),
		Duration.from({ minutes: 31, seconds: 9 }),
	),
	formed: new Date("1983-06-01"),
	active: [new ActivePeriod(new Date("1983-06-01"), new Date("2002-04-03")), new ActivePeriod(new Date("2004-01-01"))],
	bandMembers: ["Dave Mustaine", "David Ellefson", "Chris Poland", "Gar Samuelson"],
	studioAlbumYears: [1985, 1986, 1988, 1990, 1992, 1994, 1997, 1999, 2001, 2004, 2007, 2009, 2011, 2013, 2016, 2022],
	logo: new TextEncoder().encode("megadeth"),
})

try {
	await bands.deleteAll()
	for (const band of [slayer, metallica, megadeth]) {
		await bands.create(band)
	}

	megadeth.genre = "speed"
	await bands.update(megadeth)
	await bands.delete("Metallica")
} finally {
	bands.dispose()
	db.close()
}
