import test from "ava"

import { assert, AssertError, combineHashes, hashText } from "@tablemap/utils"

test("hash text deterministically", (t) => {
	t.is(hashText("name").byteLength, 32)
	t.deepEqual(hashText("name"), hashText("name"))
	t.notDeepEqual(hashText("name"), hashText("Name"))
})

test("combine hashes in order", (t) => {
	const a = hashText("a")
	const b = hashText("b")

	t.regex(combineHashes("table", [a, b]), /^[0-9a-f]{64}$/)
	t.is(combineHashes("table", [a, b]), combineHashes("table", [a, b]))
	t.not(combineHashes("table", [a, b]), combineHashes("table", [b, a]))
	t.not(combineHashes("table", [a, b]), combineHashes("other", [a, b]))
})

test("assert throws an AssertError", (t) => {
	t.notThrows(() => assert(true))
	const error = t.throws(() => assert(false, "expected a row", { table: "Album" }), { instanceOf: AssertError })
	t.is(error?.message, "expected a row")
	t.is(error?.code, "ASSERTION_FAILED")
	t.deepEqual(error?.context, { table: "Album" })
})
