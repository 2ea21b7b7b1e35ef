import type { PrimaryKeyValue } from "./types.js"

export const isPrimaryKey = (value: unknown): value is PrimaryKeyValue =>
	typeof value === "number" || typeof value === "string" || value instanceof Uint8Array
