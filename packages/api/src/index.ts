export * from './type.js'
export { fromBinary, toBinary } from './binary.js'
export { type StructFieldJson, type TypeJson, fromJson, toJson } from './json.js'
