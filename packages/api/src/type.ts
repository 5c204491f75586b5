import { InvalidArgumentError } from '@spanjs/error'

/**
 * `google.spanner.v1.TypeCode`.
 */
export enum TypeCode {
	TYPE_CODE_UNSPECIFIED = 0,
	BOOL = 1,
	INT64 = 2,
	FLOAT64 = 3,
	TIMESTAMP = 4,
	DATE = 5,
	STRING = 6,
	BYTES = 7,
	ARRAY = 8,
	STRUCT = 9,
}

/**
 * `google.spanner.v1.Type`. `arrayElementType` is set iff `code` is ARRAY,
 * `structType` iff `code` is STRUCT.
 */
export interface Type {
	/** A {@link TypeCode}, or a code added to the protocol after this client was built. */
	code: TypeCode | number
	arrayElementType?: Type
	structType?: StructType
}

/**
 * `google.spanner.v1.StructType`. Field order matches the order of values in
 * a row.
 */
export interface StructType {
	fields: StructType_Field[]
}

export interface StructType_Field {
	name: string
	type?: Type
}

/**
 * Throws {@link InvalidArgumentError} when a record is missing the nested
 * part its code requires.
 */
export function validate(type: Type, path = '$'): void {
	switch (type.code) {
		case TypeCode.ARRAY:
			if (!type.arrayElementType) {
				throw new InvalidArgumentError(`ARRAY type is missing arrayElementType at ${path}`, 'arrayElementType')
			}

			validate(type.arrayElementType, `${path}.arrayElementType`)
			return
		case TypeCode.STRUCT:
			if (!type.structType) {
				throw new InvalidArgumentError(`STRUCT type is missing structType at ${path}`, 'structType')
			}

			type.structType.fields.forEach((field, i) => {
				if (!field.type) {
					throw new InvalidArgumentError(`Struct field "${field.name}" is missing its type at ${path}.fields[${i}]`, 'type')
				}

				validate(field.type, `${path}.fields[${i}].type`)
			})
			return
	}
}
