import fs from "node:fs"

import { assert } from "@tablemap/utils"

// Table and column names are written into schema and where-clause text
// unquoted, so they must be plain identifiers that sqlite does not parse as
// keywords. Keywords that sqlite also accepts as identifiers (e.g. "key",
// "release") are allowed.

export const namePattern = /^[a-zA-Z_][a-zA-Z0-9_]*$/

const reservedWords = loadReservedWords()

function loadReservedWords(): Set<string> {
	const words: unknown = JSON.parse(fs.readFileSync(new URL("./reservedWords.json", import.meta.url), "utf-8"))
	assert(
		Array.isArray(words) && words.every((word): word is string => typeof word === "string"),
		"reservedWords.json must be an array of strings",
	)

	return new Set(words)
}

export const isValidName = (name: string) => namePattern.test(name) && !reservedWords.has(name.toUpperCase())
