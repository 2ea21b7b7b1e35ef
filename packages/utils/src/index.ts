export * from "./assert.js"
export * from "./deepEqual.js"
export * from "./hash.js"
export * from "./signalInvalidType.js"
