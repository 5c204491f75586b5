import { InvalidArgumentError } from '@spanjs/error'

import { type StructType_Field, type Type, TypeCode, validate } from './type.js'

/**
 * Proto3 JSON form of {@link Type}, as served by the REST endpoints.
 */
export interface TypeJson {
	code?: string | number
	arrayElementType?: TypeJson
	structType?: { fields?: StructFieldJson[] }
}

export interface StructFieldJson {
	name?: string
	type?: TypeJson
}

const typeCodeByName = new Map<string, TypeCode>()
for (let [name, code] of Object.entries(TypeCode)) {
	if (typeof code === 'number') {
		typeCodeByName.set(name, code)
	}
}

export function toJson(type: Type): TypeJson {
	// Codes this build does not know are written as numbers.
	let name: string | undefined = TypeCode[type.code]
	let json: TypeJson = { code: name ?? type.code }

	if (type.arrayElementType) {
		json.arrayElementType = toJson(type.arrayElementType)
	}

	if (type.structType) {
		json.structType = {
			fields: type.structType.fields.map((field) => {
				let f: StructFieldJson = { name: field.name }
				if (field.type) {
					f.type = toJson(field.type)
				}

				return f
			}),
		}
	}

	return json
}

const INT32_MIN = -0x80000000
const INT32_MAX = 0x7fffffff

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readCode(value: unknown, path: string): TypeCode {
	if (value === undefined || value === null) {
		return TypeCode.TYPE_CODE_UNSPECIFIED
	}

	if (typeof value === 'number' && Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX) {
		return value
	}

	if (typeof value === 'string') {
		let code = typeCodeByName.get(value)
		if (code !== undefined) {
			return code
		}
	}

	throw new InvalidArgumentError(`Invalid type code ${JSON.stringify(value)} at ${path}.code`, 'code')
}

function readType(json: unknown, path: string): Type {
	if (!isRecord(json)) {
		throw new InvalidArgumentError(`Expected an object at ${path}`)
	}

	let type: Type = { code: readCode(json['code'], path) }

	if (json['arrayElementType'] != null) {
		type.arrayElementType = readType(json['arrayElementType'], `${path}.arrayElementType`)
	}

	let structType = json['structType']
	if (structType != null) {
		if (!isRecord(structType)) {
			throw new InvalidArgumentError(`Expected an object at ${path}.structType`)
		}

		let fields: unknown = structType['fields'] ?? []
		if (!Array.isArray(fields)) {
			throw new InvalidArgumentError(`Expected an array at ${path}.structType.fields`)
		}

		type.structType = { fields: fields.map((field: unknown, i) => readField(field, `${path}.structType.fields[${i}]`)) }
	}

	return type
}

function readField(json: unknown, path: string): StructType_Field {
	if (!isRecord(json)) {
		throw new InvalidArgumentError(`Expected an object at ${path}`)
	}

	let name = json['name'] ?? ''
	if (typeof name !== 'string') {
		throw new InvalidArgumentError(`Expected a string at ${path}.name`, 'name')
	}

	let field: StructType_Field = { name }
	if (json['type'] != null) {
		field.type = readType(json['type'], `${path}.type`)
	}

	return field
}

/**
 * Parses the proto3 JSON form of a type record. Accepts enum names or
 * numbers for `code`.
 */
export function fromJson(json: unknown): Type {
	let type = readType(json, '$')
	validate(type)

	return type
}
