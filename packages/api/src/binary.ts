import { BinaryReader, BinaryWriter, WireType } from '@bufbuild/protobuf/wire'
import { loggers } from '@spanjs/debug'
import { InvalidArgumentError } from '@spanjs/error'

import { type StructType, type StructType_Field, type Type, TypeCode, validate } from './type.js'

let dbg = loggers.codec.extend('binary')

function writeType(w: BinaryWriter, msg: Type): void {
	if (msg.code !== TypeCode.TYPE_CODE_UNSPECIFIED) {
		w.tag(1, WireType.Varint).int32(msg.code)
	}

	if (msg.arrayElementType) {
		w.tag(2, WireType.LengthDelimited).fork()
		writeType(w, msg.arrayElementType)
		w.join()
	}

	if (msg.structType) {
		w.tag(3, WireType.LengthDelimited).fork()
		writeStructType(w, msg.structType)
		w.join()
	}
}

function writeStructType(w: BinaryWriter, msg: StructType): void {
	for (let field of msg.fields) {
		w.tag(1, WireType.LengthDelimited).fork()
		writeField(w, field)
		w.join()
	}
}

function writeField(w: BinaryWriter, msg: StructType_Field): void {
	if (msg.name !== '') {
		w.tag(1, WireType.LengthDelimited).string(msg.name)
	}

	if (msg.type) {
		w.tag(2, WireType.LengthDelimited).fork()
		writeType(w, msg.type)
		w.join()
	}
}

// Reads the length prefix of an embedded message and returns where it ends.
// The embedded message must fit inside the enclosing one.
function embeddedEnd(r: BinaryReader, parentEnd: number): number {
	let length = r.uint32()
	if (length > parentEnd - r.pos) {
		throw new InvalidArgumentError(
			`Embedded message at offset ${r.pos} declares ${length} bytes but only ${Math.max(parentEnd - r.pos, 0)} remain`
		)
	}

	return r.pos + length
}

function skipUnknown(r: BinaryReader, message: string, fieldNo: number, wireType: WireType): void {
	dbg.log('skipping unknown field %d (wire type %d) of %s', fieldNo, wireType, message)
	r.skip(wireType, fieldNo)
}

function readType(r: BinaryReader, end: number): Type {
	let msg: Type = { code: TypeCode.TYPE_CODE_UNSPECIFIED }

	while (r.pos < end) {
		let [fieldNo, wireType] = r.tag()

		if (fieldNo === 1 && wireType === WireType.Varint) {
			msg.code = r.int32()
		} else if (fieldNo === 2 && wireType === WireType.LengthDelimited) {
			msg.arrayElementType = readType(r, embeddedEnd(r, end))
		} else if (fieldNo === 3 && wireType === WireType.LengthDelimited) {
			msg.structType = readStructType(r, embeddedEnd(r, end))
		} else {
			skipUnknown(r, 'google.spanner.v1.Type', fieldNo, wireType)
		}
	}

	return msg
}

function readStructType(r: BinaryReader, end: number): StructType {
	let msg: StructType = { fields: [] }

	while (r.pos < end) {
		let [fieldNo, wireType] = r.tag()

		if (fieldNo === 1 && wireType === WireType.LengthDelimited) {
			msg.fields.push(readField(r, embeddedEnd(r, end)))
		} else {
			skipUnknown(r, 'google.spanner.v1.StructType', fieldNo, wireType)
		}
	}

	return msg
}

function readField(r: BinaryReader, end: number): StructType_Field {
	let msg: StructType_Field = { name: '' }

	while (r.pos < end) {
		let [fieldNo, wireType] = r.tag()

		if (fieldNo === 1 && wireType === WireType.LengthDelimited) {
			msg.name = r.string()
		} else if (fieldNo === 2 && wireType === WireType.LengthDelimited) {
			msg.type = readType(r, embeddedEnd(r, end))
		} else {
			skipUnknown(r, 'google.spanner.v1.StructType.Field', fieldNo, wireType)
		}
	}

	return msg
}

/**
 * Serializes a type record with the protobuf binary encoding.
 */
export function toBinary(type: Type): Uint8Array {
	let w = new BinaryWriter()
	writeType(w, type)

	return w.finish()
}

/**
 * Parses a protobuf-encoded type record. Malformed records are rejected with
 * {@link InvalidArgumentError}.
 */
export function fromBinary(bytes: Uint8Array): Type {
	let r = new BinaryReader(bytes)
	let type: Type
	try {
		type = readType(r, r.len)
	} catch (error) {
		if (error instanceof InvalidArgumentError) {
			throw error
		}

		let reason = error instanceof Error ? error.message : String(error)
		throw new InvalidArgumentError(`Malformed google.spanner.v1.Type: ${reason}`)
	}

	validate(type)

	return type
}
