export * from "./SqliteDatabase.js"
export type { SqlitePrimitiveValue } from "./encoding.js"
