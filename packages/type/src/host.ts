import { loggers } from '@spanjs/debug'

import { arrayOf } from './array.js'
import { type HostType, HostTypes, listOf } from './host-type.js'
import { type ScalarType, Types } from './scalar.js'
import { structOf } from './struct.js'
import type { TypeDescriptor } from './type.js'

let dbg = loggers.type.extend('host')

function isByteSequence(host: HostType): boolean {
	if (host.kind === 'bytes') {
		return true
	}

	return host.kind === 'list' && host.element.kind === 'integer' && host.element.bits === 8 && !host.element.signed
}

/**
 * Best column type for a host type, used when no type is given explicitly.
 *
 * Lossy and order-sensitive: the checks run in the order below and the first
 * match wins.
 *
 * 1. boolean → BOOL
 * 2. bytes, or a list of unsigned 8-bit integers → BYTES
 * 3. datetime → TIMESTAMP
 * 4. float of any width, decimal → FLOAT64
 * 5. integer of any width, signed or unsigned → INT64
 * 6. string → STRING
 *
 * Anything else is UNSPECIFIED.
 */
export function fromHostType(host: HostType): ScalarType {
	if (host.kind === 'boolean') {
		return Types.Bool
	}

	if (isByteSequence(host)) {
		return Types.Bytes
	}

	if (host.kind === 'datetime') {
		return Types.Timestamp
	}

	if (host.kind === 'float' || host.kind === 'decimal') {
		return Types.Float64
	}

	if (host.kind === 'integer') {
		return Types.Int64
	}

	if (host.kind === 'string') {
		return Types.String
	}

	dbg.log('no column type for host type %s, using UNSPECIFIED', host.kind)
	return Types.Unspecified
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== 'object' || value === null) {
		return false
	}

	let proto: unknown = Object.getPrototypeOf(value)
	return proto === Object.prototype || proto === null
}

/**
 * Host type of a runtime value. Integral numbers are integers, other numbers
 * doubles; a list takes the type of its first non-null element. A list that
 * contains itself has an element of unknown type.
 */
export function hostTypeOf(value: unknown): HostType {
	return classify(value, new Set())
}

// `ancestors` holds the containers on the current path only, so a value
// shared by two siblings is classified twice rather than taken for a cycle.
function classify(value: unknown, ancestors: Set<object>): HostType {
	switch (typeof value) {
		case 'boolean':
			return HostTypes.boolean
		case 'number':
			return Number.isInteger(value) ? HostTypes.int64 : HostTypes.float64
		case 'bigint':
			return HostTypes.int64
		case 'string':
			return HostTypes.string
	}

	if (value instanceof Uint8Array) {
		return HostTypes.bytes
	}

	if (value instanceof Date) {
		return HostTypes.datetime
	}

	if (Array.isArray(value)) {
		if (ancestors.has(value)) {
			dbg.log('cyclic list, element type is unknown')
			return HostTypes.unknown
		}

		let first: unknown = value.find((item: unknown) => item !== null && item !== undefined)
		if (first === undefined) {
			return listOf(HostTypes.unknown)
		}

		ancestors.add(value)
		let element = classify(first, ancestors)
		ancestors.delete(value)

		return listOf(element)
	}

	if (isPlainObject(value)) {
		return HostTypes.record
	}

	return HostTypes.unknown
}

/**
 * Column type for a runtime value. Arrays become ARRAY of their first
 * non-null element's type, plain objects become STRUCT in key order, and
 * everything else goes through {@link fromHostType}. A reference back to an
 * enclosing array or object is UNSPECIFIED.
 */
export function inferType(value: unknown): TypeDescriptor {
	return infer(value, new Set())
}

function infer(value: unknown, ancestors: Set<object>): TypeDescriptor {
	if (Array.isArray(value) || isPlainObject(value)) {
		if (ancestors.has(value)) {
			dbg.log('cyclic value, using UNSPECIFIED')
			return Types.Unspecified
		}
	}

	if (Array.isArray(value)) {
		let first: unknown = value.find((item: unknown) => item !== null && item !== undefined)
		if (first === undefined) {
			return arrayOf(Types.Unspecified)
		}

		ancestors.add(value)
		let element = infer(first, ancestors)
		ancestors.delete(value)

		return arrayOf(element)
	}

	if (isPlainObject(value)) {
		ancestors.add(value)
		let fields: [string, TypeDescriptor][] = []
		for (let [name, item] of Object.entries(value)) {
			fields.push([name, infer(item, ancestors)])
		}
		ancestors.delete(value)

		return structOf(fields)
	}

	return fromHostType(hostTypeOf(value))
}
