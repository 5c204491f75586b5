import * as Spanner from '@spanjs/api/type'

import type { TypeDescriptor } from './type.js'

/**
 * Formats a type the way DDL spells it: `ARRAY<STRUCT<id INT64, name STRING(MAX)>>`.
 */
export function typeToString(type: TypeDescriptor): string {
	switch (type.code) {
		case Spanner.TypeCode.ARRAY:
			return `ARRAY<${typeToString(type.elementType)}>`
		case Spanner.TypeCode.STRUCT:
			return `STRUCT<${type.fields.map(([name, field]) => `${name} ${typeToString(field)}`).join(', ')}>`
		case Spanner.TypeCode.STRING:
			return `STRING(${type.size ?? 'MAX'})`
		case Spanner.TypeCode.BYTES:
			return `BYTES(${type.size ?? 'MAX'})`
		case Spanner.TypeCode.TYPE_CODE_UNSPECIFIED:
			return 'UNSPECIFIED'
		default:
			return Spanner.TypeCode[type.code]
	}
}
