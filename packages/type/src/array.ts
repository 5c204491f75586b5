import * as Spanner from '@spanjs/api/type'
import { InvalidOperationError } from '@spanjs/error'

import { GenericDataKind } from './data-kind.js'
import { combineHash } from './hash.js'
import { type HostType, listOf } from './host-type.js'
import { typeToString } from './print.js'
import type { Type, TypeDescriptor } from './type.js'

export class ArrayType implements Type {
	readonly elementType: TypeDescriptor
	#typeInstance?: Spanner.Type

	constructor(elementType: TypeDescriptor) {
		this.elementType = elementType
	}

	get code(): Spanner.TypeCode.ARRAY {
		return Spanner.TypeCode.ARRAY
	}

	get genericDataKind(): GenericDataKind {
		return GenericDataKind.Object
	}

	get defaultHostType(): HostType {
		return listOf(this.elementType.defaultHostType)
	}

	withSize(_size: number): never {
		throw new InvalidOperationError(`Size may only be set on types String and Bytes`)
	}

	encode(): Spanner.Type {
		if (!this.#typeInstance) {
			this.#typeInstance = Object.freeze({ code: Spanner.TypeCode.ARRAY, arrayElementType: this.elementType.encode() })
		}

		return this.#typeInstance
	}

	equals(other: unknown): boolean {
		return other instanceof ArrayType && this.elementType.equals(other.elementType)
	}

	hashCode(): number {
		return combineHash(0, 0, this.code, this.elementType.hashCode())
	}

	toString(): string {
		return typeToString(this)
	}
}

/**
 * An array whose every element has type `elementType`. Arrays of arrays and
 * arrays of structs are allowed.
 */
export function arrayOf(elementType: TypeDescriptor): ArrayType {
	return new ArrayType(elementType)
}
