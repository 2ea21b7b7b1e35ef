export * from "./types.js"
export * from "./errors.js"
export * from "./members.js"
export * from "./Duration.js"
export * from "./Entity.js"
export * from "./Dao.js"
export * from "./Repository.js"
export * from "./Notifier.js"

export { encodeMember, decodeMember, getColumnType, memberEquals, hashMember } from "./encoding.js"
export { isPrimaryKey } from "./utils.js"
export { isValidName, namePattern } from "./names.js"
