import { expect, test } from 'vitest'
import { TypeCode } from '@spanjs/api/type'
import { InvalidOperationError } from '@spanjs/error'

import { arrayOf } from './array.js'
import { GenericDataKind } from './data-kind.js'
import { Types } from './scalar.js'
import { structOf } from './struct.js'

test('arrays are fresh instances', () => {
	expect(arrayOf(Types.Int64)).not.toBe(arrayOf(Types.Int64))
	expect(arrayOf(Types.Int64).equals(arrayOf(Types.Int64))).toBe(true)
	expect(arrayOf(Types.Int64).hashCode()).toBe(arrayOf(Types.Int64).hashCode())
})

test('element types are compared recursively', () => {
	expect(arrayOf(arrayOf(Types.Bool)).equals(arrayOf(arrayOf(Types.Bool)))).toBe(true)
	expect(arrayOf(arrayOf(Types.Bool)).equals(arrayOf(Types.Bool))).toBe(false)
	expect(arrayOf(Types.String.withSize(5)).equals(arrayOf(Types.String))).toBe(false)
	expect(arrayOf(Types.Int64).equals(Types.Int64)).toBe(false)
})

test('encodes the element type', () => {
	let type = arrayOf(structOf([['x', Types.Bool]]))

	expect(type.encode()).toEqual({
		code: TypeCode.ARRAY,
		arrayElementType: {
			code: TypeCode.STRUCT,
			structType: { fields: [{ name: 'x', type: { code: TypeCode.BOOL } }] },
		},
	})
})

test('maps to a list of the element host type', () => {
	expect(arrayOf(arrayOf(Types.Date)).defaultHostType).toEqual({
		kind: 'list',
		element: { kind: 'list', element: { kind: 'datetime' } },
	})
	expect(arrayOf(Types.Int64).genericDataKind).toBe(GenericDataKind.Object)
})

test('size cannot be set', () => {
	expect(() => arrayOf(Types.String).withSize(1)).toThrow('Size may only be set on types String and Bytes')
	expect(() => arrayOf(Types.String).withSize(1)).toThrow(InvalidOperationError)
})
