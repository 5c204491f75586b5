import * as Spanner from '@spanjs/api/type'
import { InvalidOperationError } from '@spanjs/error'

import { GenericDataKind } from './data-kind.js'
import { combineHash, stringHash } from './hash.js'
import { type HostType, HostTypes } from './host-type.js'
import { typeToString } from './print.js'
import type { Type, TypeDescriptor } from './type.js'

export type StructField = readonly [name: string, type: TypeDescriptor]

/**
 * A struct type. `fields` keeps the declared order, which is the order of
 * values in a row, including repeated names. Lookup by name sees the last
 * field declared with that name.
 *
 * Equality compares members by name only: two structs declaring the same
 * members in a different order are equal, though they encode differently.
 */
export class StructType implements Type {
	readonly fields: readonly StructField[]
	#members = new Map<string, TypeDescriptor>()
	#indices = new Map<string, number>()
	#typeInstance?: Spanner.Type

	constructor(fields: Iterable<StructField>) {
		let list: StructField[] = []

		for (let [name, type] of fields) {
			this.#members.set(name, type)
			this.#indices.set(name, list.length)
			list.push(Object.freeze([name, type] as const))
		}

		this.fields = Object.freeze(list)
	}

	get code(): Spanner.TypeCode.STRUCT {
		return Spanner.TypeCode.STRUCT
	}

	get genericDataKind(): GenericDataKind {
		return GenericDataKind.Object
	}

	get defaultHostType(): HostType {
		return HostTypes.record
	}

	/** Field names in declared order. */
	get names(): string[] {
		return this.fields.map(([name]) => name)
	}

	/** Number of distinct field names. */
	get memberCount(): number {
		return this.#members.size
	}

	get(name: string): TypeDescriptor | undefined {
		return this.#members.get(name)
	}

	has(name: string): boolean {
		return this.#members.has(name)
	}

	/**
	 * Position of the field in a row, or -1. For repeated names this is the
	 * last position.
	 */
	indexOf(name: string): number {
		return this.#indices.get(name) ?? -1
	}

	withSize(_size: number): never {
		throw new InvalidOperationError(`Size may only be set on types String and Bytes`)
	}

	encode(): Spanner.Type {
		if (!this.#typeInstance) {
			let fields: Spanner.StructType_Field[] = []
			for (let [name, type] of this.fields) {
				fields.push(Object.freeze({ name, type: type.encode() }))
			}

			Object.freeze(fields)
			this.#typeInstance = Object.freeze({ code: Spanner.TypeCode.STRUCT, structType: Object.freeze({ fields }) })
		}

		return this.#typeInstance
	}

	equals(other: unknown): boolean {
		if (!(other instanceof StructType) || other.#members.size !== this.#members.size) {
			return false
		}

		for (let [name, type] of this.#members) {
			if (!type.equals(other.#members.get(name))) {
				return false
			}
		}

		return true
	}

	hashCode(): number {
		// Sum is order-independent, matching equals().
		let members = 0
		for (let [name, type] of this.#members) {
			members = (members + combineHash(stringHash(name), type.hashCode())) | 0
		}

		return combineHash(this.#members.size, 0, this.code, members)
	}

	toString(): string {
		return typeToString(this)
	}

	*[Symbol.iterator](): Iterator<StructField> {
		yield* this.fields
	}
}

function isFieldIterable(fields: object): fields is Iterable<StructField> {
	return Symbol.iterator in fields
}

/**
 * A struct with the given fields, in the given order. A plain object is read
 * in `Object.entries` order (integer-like keys first).
 */
export function structOf(fields: Iterable<StructField> | Readonly<Record<string, TypeDescriptor>>): StructType {
	if (isFieldIterable(fields)) {
		return new StructType(fields)
	}

	return new StructType(Object.entries(fields))
}
