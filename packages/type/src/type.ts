import type * as Spanner from '@spanjs/api/type'

import type { ArrayType } from './array.js'
import type { GenericDataKind } from './data-kind.js'
import type { HostType } from './host-type.js'
import type { ScalarType } from './scalar.js'
import type { StructType } from './struct.js'

/**
 * A column or value type. Instances are immutable.
 */
export interface Type {
	readonly code: Spanner.TypeCode
	/** Maximum length in characters (STRING) or bytes (BYTES). */
	readonly size?: number | undefined
	/** Database-agnostic category of the type. */
	readonly genericDataKind: GenericDataKind
	/** The representation a row decoder produces for values of this type. */
	readonly defaultHostType: HostType

	withSize(size: number): TypeDescriptor
	encode(): Spanner.Type
	equals(other: unknown): boolean
	hashCode(): number
	toString(): string
}

export type TypeDescriptor = ScalarType | ArrayType | StructType
