import { expect, test } from 'vitest'
import { TypeCode } from '@spanjs/api/type'
import { InvalidArgumentError, InvalidOperationError } from '@spanjs/error'

import { GenericDataKind } from './data-kind.js'
import { ScalarType, Types, fromTypeCode, scalar } from './scalar.js'

test('scalar() returns the canonical instance', () => {
	for (let type of Object.values(Types)) {
		expect(scalar(type.code)).toBe(type)
		expect(scalar(type.code)).toBe(scalar(type.code))
	}
})

test('scalar() maps unknown codes to Unspecified', () => {
	expect(scalar(42)).toBe(Types.Unspecified)
})

test('scalar() rejects ARRAY and STRUCT', () => {
	expect(() => scalar(TypeCode.ARRAY)).toThrow(InvalidArgumentError)
	expect(() => scalar(TypeCode.STRUCT)).toThrow(
		'Type code STRUCT is not a scalar code. Use arrayOf() or structOf() instead.'
	)
})

test('fromTypeCode() returns null for unknown codes', () => {
	expect(fromTypeCode(TypeCode.DATE)).toBe(Types.Date)
	expect(fromTypeCode(42)).toBeNull()
	expect(fromTypeCode(TypeCode.ARRAY)).toBeNull()
})

test('withSize() matches a directly sized type', () => {
	let sized = Types.String.withSize(10)

	expect(sized.size).toBe(10)
	expect(sized.code).toBe(TypeCode.STRING)
	expect(sized.equals(new ScalarType(TypeCode.STRING, 10))).toBe(true)
	expect(sized.hashCode()).toBe(new ScalarType(TypeCode.STRING, 10).hashCode())
})

test('withSize() returns a fresh instance', () => {
	let a = Types.Bytes.withSize(16)
	let b = Types.Bytes.withSize(16)

	expect(a).not.toBe(b)
	expect(a.equals(b)).toBe(true)
	expect(Types.Bytes.size).toBeUndefined()
})

test('withSize() is only valid on String and Bytes', () => {
	expect(() => Types.Int64.withSize(1)).toThrow(InvalidOperationError)
	expect(() => Types.Int64.withSize(1)).toThrow('Size may only be set on types String and Bytes')
})

test('size must be nonnegative', () => {
	expect(() => Types.String.withSize(-1)).toThrow(InvalidArgumentError)
	expect(() => new ScalarType(TypeCode.BYTES, -1)).toThrow('Size must be a nonnegative integer, got -1.')
	expect(Types.String.withSize(0).size).toBe(0)
})

test('size on other kinds is rejected', () => {
	expect(() => new ScalarType(TypeCode.INT64, 8)).toThrow(InvalidArgumentError)
})

test('constructor rejects ARRAY and STRUCT codes', () => {
	expect(() => new ScalarType(TypeCode.ARRAY)).toThrow(InvalidArgumentError)
})

test('sized and unsized types differ', () => {
	expect(Types.String.equals(Types.String.withSize(10))).toBe(false)
	expect(Types.String.withSize(10).equals(Types.String.withSize(11))).toBe(false)
	expect(Types.String.withSize(10).equals(Types.Bytes.withSize(10))).toBe(false)
})

test('hash folds size and code', () => {
	expect(Types.Int64.hashCode()).toBe(794)
	expect(Types.Bool.hashCode()).not.toBe(Types.Int64.hashCode())
})

test('maps to generic data kinds', () => {
	expect(Types.Bool.genericDataKind).toBe(GenericDataKind.Boolean)
	expect(Types.Int64.genericDataKind).toBe(GenericDataKind.Int64)
	expect(Types.Float64.genericDataKind).toBe(GenericDataKind.Double)
	expect(Types.Timestamp.genericDataKind).toBe(GenericDataKind.DateTime)
	expect(Types.Date.genericDataKind).toBe(GenericDataKind.Date)
	expect(Types.String.genericDataKind).toBe(GenericDataKind.String)
	expect(Types.Bytes.genericDataKind).toBe(GenericDataKind.Binary)
	expect(Types.Unspecified.genericDataKind).toBe(GenericDataKind.Object)
})

test('maps to default host types', () => {
	expect(Types.Bool.defaultHostType).toEqual({ kind: 'boolean' })
	expect(Types.Int64.defaultHostType).toEqual({ kind: 'integer', bits: 64, signed: true })
	expect(Types.Float64.defaultHostType).toEqual({ kind: 'float', bits: 64 })
	expect(Types.Timestamp.defaultHostType).toEqual({ kind: 'datetime' })
	expect(Types.Date.defaultHostType).toEqual({ kind: 'datetime' })
	expect(Types.String.defaultHostType).toEqual({ kind: 'string' })
	expect(Types.Bytes.defaultHostType).toEqual({ kind: 'bytes' })
	expect(Types.Unspecified.defaultHostType).toEqual({ kind: 'wire-value' })
})

test('encodes to a bare code', () => {
	expect(Types.Timestamp.encode()).toEqual({ code: TypeCode.TIMESTAMP })
	expect(Types.String.withSize(3).encode()).toEqual({ code: TypeCode.STRING })
})
