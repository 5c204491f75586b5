import * as Spanner from '@spanjs/api/type'
import { InvalidArgumentError, InvalidOperationError } from '@spanjs/error'

import { GenericDataKind } from './data-kind.js'
import { combineHash } from './hash.js'
import { type HostType, HostTypes } from './host-type.js'
import { typeToString } from './print.js'
import type { Type } from './type.js'

export type ScalarTypeCode = Exclude<Spanner.TypeCode, Spanner.TypeCode.ARRAY | Spanner.TypeCode.STRUCT>

const scalarTypeCodes: ReadonlySet<number> = new Set([
	Spanner.TypeCode.TYPE_CODE_UNSPECIFIED,
	Spanner.TypeCode.BOOL,
	Spanner.TypeCode.INT64,
	Spanner.TypeCode.FLOAT64,
	Spanner.TypeCode.TIMESTAMP,
	Spanner.TypeCode.DATE,
	Spanner.TypeCode.STRING,
	Spanner.TypeCode.BYTES,
])

export function isScalarTypeCode(code: number): code is ScalarTypeCode {
	return scalarTypeCodes.has(code)
}

function isSizeable(code: Spanner.TypeCode): boolean {
	return code === Spanner.TypeCode.STRING || code === Spanner.TypeCode.BYTES
}

export class ScalarType implements Type {
	readonly code: ScalarTypeCode
	readonly size: number | undefined
	#typeInstance?: Spanner.Type

	constructor(code: number, size?: number) {
		if (!isScalarTypeCode(code)) {
			throw new InvalidArgumentError(
				`Type code ${Spanner.TypeCode[code] ?? code} is not a scalar code. Use arrayOf() or structOf() instead.`,
				'code'
			)
		}

		if (size !== undefined) {
			if (!Number.isInteger(size) || size < 0) {
				throw new InvalidArgumentError(`Size must be a nonnegative integer, got ${size}.`, 'size')
			}

			if (!isSizeable(code)) {
				throw new InvalidArgumentError(`Size may only be set on types String and Bytes`, 'size')
			}
		}

		this.code = code
		this.size = size
	}

	get genericDataKind(): GenericDataKind {
		switch (this.code) {
			case Spanner.TypeCode.BOOL:
				return GenericDataKind.Boolean
			case Spanner.TypeCode.INT64:
				return GenericDataKind.Int64
			case Spanner.TypeCode.FLOAT64:
				return GenericDataKind.Double
			case Spanner.TypeCode.TIMESTAMP:
				return GenericDataKind.DateTime
			case Spanner.TypeCode.DATE:
				return GenericDataKind.Date
			case Spanner.TypeCode.STRING:
				return GenericDataKind.String
			case Spanner.TypeCode.BYTES:
				return GenericDataKind.Binary
			default:
				return GenericDataKind.Object
		}
	}

	get defaultHostType(): HostType {
		switch (this.code) {
			case Spanner.TypeCode.BOOL:
				return HostTypes.boolean
			case Spanner.TypeCode.INT64:
				return HostTypes.int64
			case Spanner.TypeCode.FLOAT64:
				return HostTypes.float64
			case Spanner.TypeCode.TIMESTAMP:
			case Spanner.TypeCode.DATE:
				return HostTypes.datetime
			case Spanner.TypeCode.STRING:
				return HostTypes.string
			case Spanner.TypeCode.BYTES:
				return HostTypes.bytes
			default:
				return HostTypes.wireValue
		}
	}

	/**
	 * Returns a copy of this type limited to `size` characters (STRING) or
	 * bytes (BYTES).
	 *
	 * @throws {InvalidOperationError} for any other type.
	 * @throws {InvalidArgumentError} when `size` is negative.
	 */
	withSize(size: number): ScalarType {
		if (!isSizeable(this.code)) {
			throw new InvalidOperationError(`Size may only be set on types String and Bytes`)
		}

		return new ScalarType(this.code, size)
	}

	encode(): Spanner.Type {
		if (!this.#typeInstance) {
			this.#typeInstance = Object.freeze({ code: this.code })
		}

		return this.#typeInstance
	}

	equals(other: unknown): boolean {
		return other instanceof ScalarType && other.code === this.code && other.size === this.size
	}

	hashCode(): number {
		return combineHash(0, this.size ?? 0, this.code, 0)
	}

	toString(): string {
		return typeToString(this)
	}
}

/**
 * Canonical instances of the unsized scalar types.
 */
export const Types = Object.freeze({
	Unspecified: new ScalarType(Spanner.TypeCode.TYPE_CODE_UNSPECIFIED),
	Bool: new ScalarType(Spanner.TypeCode.BOOL),
	Int64: new ScalarType(Spanner.TypeCode.INT64),
	Float64: new ScalarType(Spanner.TypeCode.FLOAT64),
	Timestamp: new ScalarType(Spanner.TypeCode.TIMESTAMP),
	Date: new ScalarType(Spanner.TypeCode.DATE),
	String: new ScalarType(Spanner.TypeCode.STRING),
	Bytes: new ScalarType(Spanner.TypeCode.BYTES),
})

const scalarTypes: ReadonlyMap<number, ScalarType> = new Map(
	Object.values(Types).map((type): [number, ScalarType] => [type.code, type])
)

/**
 * Returns the canonical instance for a scalar code, or `null` when the code
 * is not a scalar code this client knows.
 */
export function fromTypeCode(code: number): ScalarType | null {
	return scalarTypes.get(code) ?? null
}

/**
 * Returns the canonical instance for a scalar code. Unrecognized codes map to
 * `Types.Unspecified`.
 *
 * @throws {InvalidArgumentError} for ARRAY and STRUCT.
 */
export function scalar(code: number): ScalarType {
	if (code === Spanner.TypeCode.ARRAY || code === Spanner.TypeCode.STRUCT) {
		throw new InvalidArgumentError(
			`Type code ${Spanner.TypeCode[code]} is not a scalar code. Use arrayOf() or structOf() instead.`,
			'code'
		)
	}

	return scalarTypes.get(code) ?? Types.Unspecified
}
