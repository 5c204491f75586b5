export type IntegerBits = 8 | 16 | 32 | 64

/**
 * Host (JavaScript) representation of a value.
 *
 * `wire-value` is the untyped protobuf value container a decoder falls back
 * to when it does not know the column type.
 */
export type HostType =
	| { readonly kind: 'boolean' }
	| { readonly kind: 'integer'; readonly bits: IntegerBits; readonly signed: boolean }
	| { readonly kind: 'float'; readonly bits: 32 | 64 }
	| { readonly kind: 'decimal' }
	| { readonly kind: 'datetime' }
	| { readonly kind: 'string' }
	| { readonly kind: 'bytes' }
	| { readonly kind: 'list'; readonly element: HostType }
	| { readonly kind: 'record' }
	| { readonly kind: 'wire-value' }
	| { readonly kind: 'unknown' }

export const HostTypes = {
	boolean: { kind: 'boolean' },
	int8: { kind: 'integer', bits: 8, signed: true },
	uint8: { kind: 'integer', bits: 8, signed: false },
	int16: { kind: 'integer', bits: 16, signed: true },
	uint16: { kind: 'integer', bits: 16, signed: false },
	int32: { kind: 'integer', bits: 32, signed: true },
	uint32: { kind: 'integer', bits: 32, signed: false },
	int64: { kind: 'integer', bits: 64, signed: true },
	uint64: { kind: 'integer', bits: 64, signed: false },
	float32: { kind: 'float', bits: 32 },
	float64: { kind: 'float', bits: 64 },
	decimal: { kind: 'decimal' },
	datetime: { kind: 'datetime' },
	string: { kind: 'string' },
	bytes: { kind: 'bytes' },
	record: { kind: 'record' },
	wireValue: { kind: 'wire-value' },
	unknown: { kind: 'unknown' },
} as const satisfies Record<string, HostType>

export function listOf(element: HostType): HostType {
	return { kind: 'list', element }
}
