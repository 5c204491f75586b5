import { expect, test } from 'vitest'
import { InvalidArgumentError } from '@spanjs/error'

import { fromBinary, toBinary } from './binary.js'
import { type Type, TypeCode } from './type.js'

let structOfA: Type = {
	code: TypeCode.STRUCT,
	structType: { fields: [{ name: 'a', type: { code: TypeCode.INT64 } }] },
}

test('encodes a scalar code as a varint', () => {
	expect(Array.from(toBinary({ code: TypeCode.INT64 }))).toEqual([0x08, 0x02])
})

test('omits the default code', () => {
	expect(toBinary({ code: TypeCode.TYPE_CODE_UNSPECIFIED }).length).toBe(0)
})

test('encodes the array element type as an embedded message', () => {
	let bytes = toBinary({ code: TypeCode.ARRAY, arrayElementType: { code: TypeCode.BOOL } })

	expect(Array.from(bytes)).toEqual([0x08, 0x08, 0x12, 0x02, 0x08, 0x01])
})

test('encodes struct fields', () => {
	expect(Array.from(toBinary(structOfA))).toEqual([
		0x08, 0x09, 0x1a, 0x09, 0x0a, 0x07, 0x0a, 0x01, 0x61, 0x12, 0x02, 0x08, 0x02,
	])
})

test('decodes struct fields', () => {
	let bytes = new Uint8Array([0x08, 0x09, 0x1a, 0x09, 0x0a, 0x07, 0x0a, 0x01, 0x61, 0x12, 0x02, 0x08, 0x02])

	expect(fromBinary(bytes)).toEqual(structOfA)
})

test('keeps struct field order in both directions', () => {
	let type: Type = {
		code: TypeCode.STRUCT,
		structType: {
			fields: [
				{ name: 'b', type: { code: TypeCode.STRING } },
				{ name: 'a', type: { code: TypeCode.INT64 } },
				{ name: 'b', type: { code: TypeCode.BOOL } },
			],
		},
	}

	let decoded = fromBinary(toBinary(type))

	expect(decoded.structType?.fields.map((f) => f.name)).toEqual(['b', 'a', 'b'])
	expect(decoded).toEqual(type)
})

test('skips unknown fields', () => {
	// type_annotation = 2 after the code
	let bytes = new Uint8Array([0x08, 0x02, 0x20, 0x02])

	expect(fromBinary(bytes)).toEqual({ code: TypeCode.INT64 })
})

test('keeps codes it does not know', () => {
	expect(fromBinary(new Uint8Array([0x08, 0x0a]))).toEqual({ code: 10 })
})

test('rejects an array without its element type', () => {
	expect(() => fromBinary(new Uint8Array([0x08, 0x08]))).toThrow(InvalidArgumentError)
	expect(() => fromBinary(new Uint8Array([0x08, 0x08]))).toThrow('ARRAY type is missing arrayElementType at $')
})

test('rejects an embedded message cut short by the end of input', () => {
	let truncated = toBinary(structOfA).subarray(0, 6)

	expect(() => fromBinary(truncated)).toThrow('Embedded message at offset 4 declares 9 bytes but only 2 remain')
})

test('rejects an embedded message that overruns its parent', () => {
	// the element type holds 2 bytes, the message inside it claims 3
	let bytes = new Uint8Array([0x08, 0x08, 0x12, 0x02, 0x12, 0x03, 0x08, 0x01, 0x00])

	expect(() => fromBinary(bytes)).toThrow('Embedded message at offset 6 declares 3 bytes but only 0 remain')
})

test('rejects a truncated field name', () => {
	let bytes = new Uint8Array([0x1a, 0x04, 0x0a, 0x02, 0x0a, 0x05])

	expect(() => fromBinary(bytes)).toThrow(InvalidArgumentError)
})
