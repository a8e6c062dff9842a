/**
 * GVAS Writer: Umkehrung von GvasReader
 *
 * Die Größe jeder Property wird nicht übernommen, sondern gemessen: Payload in
 * einen eigenen ArchiveWriter schreiben, Länge → size-Feld, dann anhängen.
 */

import { writeFileSync } from "node:fs";
import { DEFAULT_MAX_DEPTH } from "../config.js";
import { DepthLimitError, EncodeError } from "../errors.js";
import { ArchiveWriter } from "./archive.js";
import { encodeCharacterRecord } from "./character-record.js";
import { encodeGroupRecord } from "./group-record.js";
import { BYTE_NO_ENUM, GVAS_HEADER_MAGIC, PLAIN_ELEMENT_TYPES, SCOPE_END } from "./reader.js";
import { FIXED_STRUCTS, GENERIC_STRUCT, PropertyType, RAW, isSoftObjectPath, isStructValue } from "./types.js";
import type {
	ArrayProperty,
	ArrayValue,
	ElementValue,
	GvasHeader,
	MapProperty,
	PlainValue,
	Property,
	PropertyBag,
	RawProperty,
	SaveTree,
	ScalarKind,
	SetProperty,
	StructArrayHeader,
	StructValue
} from "./types.js";

export interface GvasWriteOptions {
	maxDepth?: number;
}

export function writeScalar(w: ArchiveWriter, kind: ScalarKind, value: number): void {
	switch (kind) {
		case "f64":
			w.writeDouble(value);
			break;
		case "f32":
			w.writeFloat(value);
			break;
		case "i32":
			w.writeInt32(value);
			break;
		case "u8":
			w.writeUInt8(value);
			break;
	}
}

function describe(value: ElementValue): string {
	if (typeof value === "bigint") return `${value}n`;
	if (typeof value === "object") return isStructValue(value) ? `struct ${value.kind}` : "soft object path";
	return JSON.stringify(value);
}

export class GvasWriter {
	private maxDepth: number;

	constructor(options: GvasWriteOptions = {}) {
		this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
	}

	public write(tree: SaveTree): Buffer {
		if (!tree || !tree.header || !(tree.properties instanceof Map) || !Buffer.isBuffer(tree.trailer)) {
			throw new EncodeError("Save tree needs header, properties and trailer", "");
		}
		const w = new ArchiveWriter();
		this.writeHeader(w, tree.header);
		this.writeScope(w, tree.properties, "", 0);
		w.writeBytes(tree.trailer);
		return w.toBuffer();
	}

	private writeHeader(w: ArchiveWriter, header: GvasHeader): void {
		w.writeInt32(GVAS_HEADER_MAGIC);
		w.writeInt32(header.saveGameVersion);
		w.writeInt32(header.packageVersionUe4);
		w.writeInt32(header.packageVersionUe5);
		w.writeUInt16(header.engineMajor);
		w.writeUInt16(header.engineMinor);
		w.writeUInt16(header.enginePatch);
		w.writeUInt32(header.engineChangelist);
		w.writeFString(header.engineBranch);
		w.writeInt32(header.customVersionFormat);
		w.writeUInt32(header.customVersions.length);
		for (const cv of header.customVersions) {
			w.writeGuid(cv.id, "header.customVersions");
			w.writeInt32(cv.version);
		}
		w.writeFString(header.saveGameClassName);
	}

	/** Properties + "None" */
	public writeScope(w: ArchiveWriter, bag: PropertyBag, path: string, depth: number): void {
		if (depth > this.maxDepth) {
			throw new DepthLimitError(`Nesting deeper than ${this.maxDepth} at ${path || "<root>"}`, w.length);
		}
		for (const [name, property] of bag) {
			if (name === "" || name === SCOPE_END) {
				throw new EncodeError(`Property name ${JSON.stringify(name)} is reserved`, `${path}.${name}`);
			}
			this.writeProperty(w, name, property, `${path}.${name}`, depth);
		}
		w.writeFString(SCOPE_END);
	}

	private writeProperty(w: ArchiveWriter, name: string, property: Property, path: string, depth: number): void {
		const meta = new ArchiveWriter();
		const body = new ArchiveWriter();
		try {
			this.writePropertyBody(meta, body, property, path, depth);
		} catch (err) {
			// Buffer.write* meldet Werte außerhalb des Bereichs als RangeError
			if (err instanceof RangeError) throw new EncodeError(err.message, path, { cause: err });
			throw err;
		}
		w.writeFString(name);
		w.writeFString(property.type === RAW ? property.typeTag : property.type);
		w.writeSize(body.length);
		w.writeBytes(meta.toBuffer());
		w.writeBytes(body.toBuffer());
	}

	/** meta: alles vor der Payload (inkl. GUID), body: was `size` zählt */
	private writePropertyBody(meta: ArchiveWriter, body: ArchiveWriter, property: Property, path: string, depth: number): void {
		switch (property.type) {
			case PropertyType.Int:
				meta.writeOptionalGuid(property.id, path);
				body.writeInt32(property.value);
				break;
			case PropertyType.UInt16:
				meta.writeOptionalGuid(property.id, path);
				body.writeUInt16(property.value);
				break;
			case PropertyType.UInt32:
				meta.writeOptionalGuid(property.id, path);
				body.writeUInt32(property.value);
				break;
			case PropertyType.Float:
				meta.writeOptionalGuid(property.id, path);
				body.writeFloat(property.value);
				break;
			case PropertyType.Double:
				meta.writeOptionalGuid(property.id, path);
				body.writeDouble(property.value);
				break;
			case PropertyType.Int64:
				meta.writeOptionalGuid(property.id, path);
				body.writeInt64(property.value);
				break;
			case PropertyType.UInt64:
				meta.writeOptionalGuid(property.id, path);
				body.writeUInt64(property.value);
				break;
			case PropertyType.Str:
			case PropertyType.Name:
			case PropertyType.Object:
				meta.writeOptionalGuid(property.id, path);
				body.writeFString(property.value);
				break;
			case PropertyType.Bool:
				// Wert vor der GUID, size bleibt 0
				meta.writeUInt8(property.value ? 1 : 0);
				meta.writeOptionalGuid(property.id, path);
				break;
			case PropertyType.Enum:
				meta.writeFString(property.enumType);
				meta.writeOptionalGuid(property.id, path);
				body.writeFString(property.value);
				break;
			case PropertyType.Byte:
				meta.writeFString(property.enumType);
				meta.writeOptionalGuid(property.id, path);
				if (property.enumType === BYTE_NO_ENUM) {
					if (typeof property.value !== "number") {
						throw new EncodeError("ByteProperty without enum needs a numeric value", path);
					}
					body.writeUInt8(property.value);
				} else {
					body.writeFString(String(property.value));
				}
				break;
			case PropertyType.SoftObject:
				meta.writeOptionalGuid(property.id, path);
				body.writeFString(property.value.path);
				body.writeFString(property.value.subPath);
				break;
			case PropertyType.Struct:
				meta.writeFString(property.structType);
				meta.writeGuid(property.structId, path);
				meta.writeOptionalGuid(property.id, path);
				this.writeStructValue(body, property.structType, property.value, path, depth);
				break;
			case PropertyType.Array:
				meta.writeFString(property.arrayType);
				meta.writeOptionalGuid(property.id, path);
				this.writeArrayValue(body, property, path, depth);
				break;
			case PropertyType.Map:
				meta.writeFString(property.keyType);
				meta.writeFString(property.valueType);
				meta.writeOptionalGuid(property.id, path);
				this.writeMapValue(body, property, path, depth);
				break;
			case PropertyType.Set:
				meta.writeFString(property.setType);
				meta.writeOptionalGuid(property.id, path);
				this.writeSetValue(body, property, path, depth);
				break;
			case RAW:
				this.writeRawHeader(meta, property, path);
				meta.writeOptionalGuid(property.id, path);
				body.writeBytes(property.raw);
				break;
		}
	}

	private writeRawHeader(meta: ArchiveWriter, property: RawProperty, path: string): void {
		const header = property.header;
		switch (header.kind) {
			case "array":
				meta.writeFString(header.arrayType);
				break;
			case "map":
				meta.writeFString(header.keyType);
				meta.writeFString(header.valueType);
				break;
			case "struct":
				meta.writeFString(header.structType);
				meta.writeGuid(header.structId, path);
				break;
			case "set":
				meta.writeFString(header.setType);
				break;
			case "plain":
				break;
		}
	}

	public writeStructValue(w: ArchiveWriter, structType: string, value: StructValue, path: string, depth: number): void {
		const layout = FIXED_STRUCTS.get(structType);
		if (!layout) {
			if (value.kind !== "properties") {
				throw new EncodeError(`Struct ${structType || "<generic>"} needs properties, got ${value.kind}`, path);
			}
			this.writeScope(w, value.properties, path, depth + 1);
			return;
		}
		const mismatch = (): never => {
			throw new EncodeError(`Struct ${structType} needs a ${layout.kind} value, got ${value.kind}`, path);
		};
		switch (layout.kind) {
			case "vector":
				if (value.kind !== "vector") return mismatch();
				writeScalar(w, layout.scalar, value.x);
				writeScalar(w, layout.scalar, value.y);
				writeScalar(w, layout.scalar, value.z);
				return;
			case "vector4":
				if (value.kind !== "vector4") return mismatch();
				writeScalar(w, layout.scalar, value.x);
				writeScalar(w, layout.scalar, value.y);
				writeScalar(w, layout.scalar, value.z);
				writeScalar(w, layout.scalar, value.w);
				return;
			case "vector2":
				if (value.kind !== "vector2") return mismatch();
				writeScalar(w, layout.scalar, value.x);
				writeScalar(w, layout.scalar, value.y);
				return;
			case "color":
				if (value.kind !== "color") return mismatch();
				if (layout.scalar === "u8") {
					// FColor: BGRA
					w.writeUInt8(value.b);
					w.writeUInt8(value.g);
					w.writeUInt8(value.r);
					w.writeUInt8(value.a);
				} else {
					w.writeFloat(value.r);
					w.writeFloat(value.g);
					w.writeFloat(value.b);
					w.writeFloat(value.a);
				}
				return;
			case "ticks":
				if (value.kind !== "ticks") return mismatch();
				if (layout.signed) w.writeInt64(value.value);
				else w.writeUInt64(value.value);
				return;
			case "guid":
				if (value.kind !== "guid") return mismatch();
				w.writeGuid(value.value, path);
				return;
			case "box":
				if (value.kind !== "box") return mismatch();
				w.writeDouble(value.min.x);
				w.writeDouble(value.min.y);
				w.writeDouble(value.min.z);
				w.writeDouble(value.max.x);
				w.writeDouble(value.max.y);
				w.writeDouble(value.max.z);
				w.writeUInt8(value.valid);
				return;
		}
	}

	private writePlainValue(w: ArchiveWriter, typeTag: string, value: PlainValue, path: string): void {
		const mismatch = (): never => {
			throw new EncodeError(`${describe(value)} is not a valid ${typeTag} element`, path);
		};
		switch (typeTag) {
			case PropertyType.Enum:
			case PropertyType.Name:
			case PropertyType.Str:
			case PropertyType.Object:
				if (typeof value !== "string") return mismatch();
				w.writeFString(value);
				return;
			case "Guid":
				if (typeof value !== "string") return mismatch();
				w.writeGuid(value, path);
				return;
			case PropertyType.SoftObject:
				if (typeof value !== "object" || !isSoftObjectPath(value)) return mismatch();
				w.writeFString(value.path);
				w.writeFString(value.subPath);
				return;
			case PropertyType.Int:
			case PropertyType.UInt16:
			case PropertyType.UInt32:
			case PropertyType.Float:
			case PropertyType.Double:
				if (typeof value !== "number") return mismatch();
				if (typeTag === PropertyType.Int) w.writeInt32(value);
				else if (typeTag === PropertyType.UInt16) w.writeUInt16(value);
				else if (typeTag === PropertyType.UInt32) w.writeUInt32(value);
				else if (typeTag === PropertyType.Float) w.writeFloat(value);
				else w.writeDouble(value);
				return;
			case PropertyType.Int64:
				if (typeof value !== "bigint") return mismatch();
				w.writeInt64(value);
				return;
			case PropertyType.UInt64:
				if (typeof value !== "bigint") return mismatch();
				w.writeUInt64(value);
				return;
			case PropertyType.Bool:
				if (typeof value !== "boolean") return mismatch();
				w.writeUInt8(value ? 1 : 0);
				return;
			default:
				throw new EncodeError(`Unsupported element type ${typeTag}`, path);
		}
	}

	private writeElement(w: ArchiveWriter, typeTag: string, structType: string, value: ElementValue, path: string, depth: number): void {
		if (typeTag === PropertyType.Struct) {
			if (!isStructValue(value)) {
				throw new EncodeError(`${describe(value)} is not a struct value`, path);
			}
			this.writeStructValue(w, structType, value, path, depth);
			return;
		}
		if (isStructValue(value)) {
			throw new EncodeError(`struct ${value.kind} is not a valid ${typeTag} element`, path);
		}
		this.writePlainValue(w, typeTag, value, path);
	}

	private writeArrayValue(w: ArchiveWriter, property: ArrayProperty, path: string, depth: number): void {
		const value: ArrayValue = property.value;
		switch (value.kind) {
			case "bytes":
				w.writeUInt32(value.bytes.length);
				w.writeBytes(value.bytes);
				return;
			case "raw":
				w.writeUInt32(value.count);
				w.writeBytes(value.bytes);
				return;
			case "character": {
				const bytes = encodeCharacterRecord(value.record, (inner, properties) => this.writeScope(inner, properties, path, depth + 1), path);
				w.writeUInt32(bytes.length);
				w.writeBytes(bytes);
				return;
			}
			case "group": {
				const bytes = encodeGroupRecord(value.record, path);
				w.writeUInt32(bytes.length);
				w.writeBytes(bytes);
				return;
			}
			case "structs":
				w.writeUInt32(value.values.length);
				this.writeStructArray(w, value.header, value.values, path, depth);
				return;
			case "elements":
				if (!PLAIN_ELEMENT_TYPES.has(property.arrayType)) {
					throw new EncodeError(`Unsupported array element type ${property.arrayType}`, path);
				}
				w.writeUInt32(value.values.length);
				for (const element of value.values) this.writePlainValue(w, property.arrayType, element, path);
				return;
		}
	}

	/** Elemente zuerst in einen eigenen Puffer, ihre Länge steht im Header */
	private writeStructArray(w: ArchiveWriter, header: StructArrayHeader, values: StructValue[], path: string, depth: number): void {
		const elements = new ArchiveWriter();
		for (const value of values) this.writeStructValue(elements, header.structType, value, path, depth);
		w.writeFString(header.propName);
		w.writeFString(header.propType);
		w.writeSize(elements.length);
		w.writeFString(header.structType);
		w.writeGuid(header.structId, path);
		w.writeOptionalGuid(header.extraId, path);
		w.writeBytes(elements.toBuffer());
	}

	private writeMapValue(w: ArchiveWriter, property: MapProperty, path: string, depth: number): void {
		const keyStructType = property.keyType === PropertyType.Struct ? property.keyStructType : GENERIC_STRUCT;
		const valueStructType = property.valueType === PropertyType.Struct ? property.valueStructType : GENERIC_STRUCT;
		w.writeUInt32(property.reserved);
		w.writeUInt32(property.entries.length);
		for (const entry of property.entries) {
			this.writeElement(w, property.keyType, keyStructType, entry.key, `${path}.Key`, depth);
			this.writeElement(w, property.valueType, valueStructType, entry.value, `${path}.Value`, depth);
		}
	}

	private writeSetValue(w: ArchiveWriter, property: SetProperty, path: string, depth: number): void {
		w.writeUInt32(property.reserved);
		w.writeUInt32(property.elements.length);
		for (const element of property.elements) {
			this.writeElement(w, property.setType, GENERIC_STRUCT, element, `${path}.Value`, depth);
		}
	}
}

export function writeGvas(tree: SaveTree, options?: GvasWriteOptions): Buffer {
	return new GvasWriter(options).write(tree);
}

export function writeGvasFile(outputPath: string, tree: SaveTree, options?: GvasWriteOptions): void {
	writeFileSync(outputPath, writeGvas(tree, options));
}
