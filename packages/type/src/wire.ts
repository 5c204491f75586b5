import * as api from '@spanjs/api'
import * as Spanner from '@spanjs/api/type'
import { loggers } from '@spanjs/debug'

import { ArrayType } from './array.js'
import { fromTypeCode } from './scalar.js'
import { type StructField, StructType } from './struct.js'
import type { TypeDescriptor } from './type.js'

let dbg = loggers.type.extend('wire')

/**
 * Rebuilds a type from its wire record.
 *
 * Returns `null` when the record, or any record nested in it, has a code this
 * client does not know, or lacks the element type or struct type its code
 * requires. Callers usually fall back to the untyped value container.
 */
export function fromWire(wire: Spanner.Type): TypeDescriptor | null {
	switch (wire.code) {
		case Spanner.TypeCode.ARRAY: {
			if (!wire.arrayElementType) {
				dbg.log('ARRAY type without arrayElementType')
				return null
			}

			let elementType = fromWire(wire.arrayElementType)
			return elementType ? new ArrayType(elementType) : null
		}
		case Spanner.TypeCode.STRUCT: {
			if (!wire.structType) {
				dbg.log('STRUCT type without structType')
				return null
			}

			let fields: StructField[] = []
			for (let field of wire.structType.fields) {
				if (!field.type) {
					dbg.log('struct field %s without type', field.name)
					return null
				}

				let type = fromWire(field.type)
				if (!type) {
					return null
				}

				fields.push([field.name, type])
			}

			return new StructType(fields)
		}
	}

	let type = fromTypeCode(wire.code)
	if (!type) {
		dbg.log('unknown type code %d', wire.code)
	}

	return type
}

export function toBinary(type: TypeDescriptor): Uint8Array {
	return api.toBinary(type.encode())
}

export function fromBinary(bytes: Uint8Array): TypeDescriptor | null {
	return fromWire(api.fromBinary(bytes))
}

export function toJson(type: TypeDescriptor): api.TypeJson {
	return api.toJson(type.encode())
}

export function fromJson(json: unknown): TypeDescriptor | null {
	return fromWire(api.fromJson(json))
}
