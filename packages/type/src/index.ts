export { TypeCode } from '@spanjs/api/type'

export * from './array.js'
export * from './data-kind.js'
export * from './host.js'
export * from './host-type.js'
export * from './print.js'
export * from './scalar.js'
export * from './struct.js'
export * from './type.js'
export * from './wire.js'
