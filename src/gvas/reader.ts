/**
 * GVAS Reader: Header + rekursive Property-Scopes bis "None"
 *
 * Die Pfad-Policy entscheidet pro Property über Raw-Capture, Struct-Hints
 * für Map-Keys/-Values und die Sub-Codecs (Gruppen, Charaktere).
 */

import { readFileSync } from "node:fs";
import { DEFAULT_MAX_DEPTH } from "../config.js";
import { DepthLimitError, MalformedTreeError, SubCodecError } from "../errors.js";
import { debug, warn } from "../logger.js";
import { ArchiveReader } from "./archive.js";
import { decodeCharacterRecord } from "./character-record.js";
import { decodeGroupRecord } from "./group-record.js";
import { DomainDecoder, defaultPolicy } from "./policy.js";
import type { PathPolicy } from "./policy.js";
import { FIXED_STRUCTS, GENERIC_STRUCT, PropertyType, RAW, isStructValue } from "./types.js";
import type {
	ArrayProperty,
	ArrayValue,
	BigIntProperty,
	CustomVersion,
	ElementValue,
	GvasHeader,
	MapEntry,
	MapProperty,
	NumberProperty,
	PlainValue,
	Property,
	PropertyBag,
	RawHeader,
	RawProperty,
	SaveTree,
	ScalarKind,
	SetProperty,
	StringProperty,
	StructValue
} from "./types.js";

/** "GVAS" als i32 */
export const GVAS_HEADER_MAGIC = 0x53415647;
export const SCOPE_END = "None";
/** ByteProperty ohne Enum: Wert ist ein u8 */
export const BYTE_NO_ENUM = "None";

/** Elementtypen, die in Arrays/Maps/Sets als Skalar gelesen werden */
export const PLAIN_ELEMENT_TYPES: ReadonlySet<string> = new Set<string>([
	PropertyType.Enum,
	PropertyType.Name,
	PropertyType.Str,
	PropertyType.Object,
	PropertyType.SoftObject,
	PropertyType.Int,
	PropertyType.UInt16,
	PropertyType.UInt32,
	PropertyType.Int64,
	PropertyType.UInt64,
	PropertyType.Float,
	PropertyType.Double,
	PropertyType.Bool,
	"Guid"
]);

/** Tags mit Metadaten vor bzw. Wert vor der GUID: werden auch auf Skip-Pfaden dekodiert */
const NEVER_SKIPPED: ReadonlySet<string> = new Set<string>([PropertyType.Bool, PropertyType.Enum, PropertyType.Byte]);

export interface GvasReadOptions {
	policy?: PathPolicy;
	maxDepth?: number;
}

export function readScalar(r: ArchiveReader, kind: ScalarKind): number {
	switch (kind) {
		case "f64":
			return r.readDouble();
		case "f32":
			return r.readFloat();
		case "i32":
			return r.readInt32();
		case "u8":
			return r.readUInt8();
	}
}

export function isElementType(typeTag: string): boolean {
	return typeTag === PropertyType.Struct || PLAIN_ELEMENT_TYPES.has(typeTag);
}

export class GvasReader {
	private data: Buffer;
	private policy: PathPolicy;
	private maxDepth: number;

	constructor(pathOrBuffer: string | Buffer, options: GvasReadOptions = {}) {
		this.data = Buffer.isBuffer(pathOrBuffer) ? pathOrBuffer : readFileSync(pathOrBuffer);
		this.policy = options.policy ?? defaultPolicy;
		this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
	}

	public read(): SaveTree {
		const r = new ArchiveReader(this.data);
		const header = this.readHeader(r);
		const properties = this.readScope(r, "", 0);
		return { header, properties, trailer: r.readRest() };
	}

	private readHeader(r: ArchiveReader): GvasHeader {
		const magic = r.readInt32();
		if (magic !== GVAS_HEADER_MAGIC) {
			throw new MalformedTreeError(`Bad GVAS magic: 0x${(magic >>> 0).toString(16).toUpperCase().padStart(8, "0")}`, 0);
		}
		const saveGameVersion = r.readInt32();
		const packageVersionUe4 = r.readInt32();
		const packageVersionUe5 = r.readInt32();
		const engineMajor = r.readUInt16();
		const engineMinor = r.readUInt16();
		const enginePatch = r.readUInt16();
		const engineChangelist = r.readUInt32();
		const engineBranch = r.readFString();
		const customVersionFormat = r.readInt32();
		const count = r.readUInt32();
		const customVersions: CustomVersion[] = [];
		for (let i = 0; i < count; i++) {
			customVersions.push({ id: r.readGuid(), version: r.readInt32() });
		}
		const saveGameClassName = r.readFString();
		return {
			saveGameVersion,
			packageVersionUe4,
			packageVersionUe5,
			engineMajor,
			engineMinor,
			enginePatch,
			engineChangelist,
			engineBranch,
			customVersionFormat,
			customVersions,
			saveGameClassName
		};
	}

	/** Liest Properties bis "None" oder leerem Namen */
	public readScope(r: ArchiveReader, path: string, depth: number): PropertyBag {
		if (depth > this.maxDepth) {
			throw new DepthLimitError(`Nesting deeper than ${this.maxDepth} at ${path || "<root>"}`, r.position);
		}
		const bag: PropertyBag = new Map();
		for (;;) {
			const nameOffset = r.position;
			const name = r.readFString();
			if (name === SCOPE_END || name === "") break;
			const typeTag = r.readFString();
			const size = r.readSize();
			const property = this.readProperty(r, typeTag, size, `${path}.${name}`, depth);
			if (bag.has(name)) {
				throw new MalformedTreeError(`Duplicate property ${name} in ${path || "<root>"}`, nameOffset);
			}
			bag.set(name, property);
		}
		return bag;
	}

	private checkSize(r: ArchiveReader, start: number, size: number, path: string): void {
		const read = r.position - start;
		if (read !== size) {
			throw new MalformedTreeError(`Size mismatch at ${path}: declared ${size}, read ${read}`, start);
		}
	}

	private readProperty(r: ArchiveReader, typeTag: string, size: number, path: string, depth: number): Property {
		if (!NEVER_SKIPPED.has(typeTag) && this.policy.isSkipped(path)) {
			return this.readRawProperty(r, typeTag, size);
		}
		switch (typeTag) {
			case PropertyType.Int:
				return this.numberProperty(r, PropertyType.Int, size, path, () => r.readInt32());
			case PropertyType.UInt16:
				return this.numberProperty(r, PropertyType.UInt16, size, path, () => r.readUInt16());
			case PropertyType.UInt32:
				return this.numberProperty(r, PropertyType.UInt32, size, path, () => r.readUInt32());
			case PropertyType.Float:
				return this.numberProperty(r, PropertyType.Float, size, path, () => r.readFloat());
			case PropertyType.Double:
				return this.numberProperty(r, PropertyType.Double, size, path, () => r.readDouble());
			case PropertyType.Int64:
				return this.bigIntProperty(r, PropertyType.Int64, size, path, () => r.readInt64());
			case PropertyType.UInt64:
				return this.bigIntProperty(r, PropertyType.UInt64, size, path, () => r.readUInt64());
			case PropertyType.Str:
				return this.stringProperty(r, PropertyType.Str, size, path);
			case PropertyType.Name:
				return this.stringProperty(r, PropertyType.Name, size, path);
			case PropertyType.Object:
				return this.stringProperty(r, PropertyType.Object, size, path);
			case PropertyType.Bool: {
				// Wert steht vor der optionalen GUID, size ist 0
				const value = r.readUInt8() !== 0;
				return { type: PropertyType.Bool, value, id: r.readOptionalGuid() };
			}
			case PropertyType.Enum: {
				const enumType = r.readFString();
				const id = r.readOptionalGuid();
				const start = r.position;
				const value = r.readFString();
				this.checkSize(r, start, size, path);
				return { type: PropertyType.Enum, enumType, id, value };
			}
			case PropertyType.Byte: {
				const enumType = r.readFString();
				const id = r.readOptionalGuid();
				const start = r.position;
				const value = enumType === BYTE_NO_ENUM ? r.readUInt8() : r.readFString();
				this.checkSize(r, start, size, path);
				return { type: PropertyType.Byte, enumType, id, value };
			}
			case PropertyType.SoftObject: {
				const id = r.readOptionalGuid();
				const start = r.position;
				const value = { path: r.readFString(), subPath: r.readFString() };
				this.checkSize(r, start, size, path);
				return { type: PropertyType.SoftObject, id, value };
			}
			case PropertyType.Struct: {
				const structType = r.readFString();
				const structId = r.readGuid();
				const id = r.readOptionalGuid();
				const start = r.position;
				const value = this.readStructValue(r, structType, path, depth);
				this.checkSize(r, start, size, path);
				return { type: PropertyType.Struct, structType, structId, id, value };
			}
			case PropertyType.Array:
				return this.readArrayProperty(r, size, path, depth);
			case PropertyType.Map:
				return this.readMapProperty(r, size, path, depth);
			case PropertyType.Set:
				return this.readSetProperty(r, size, path, depth);
			default:
				debug(`Raw capture of ${typeTag} at ${path} (${size} bytes)`);
				return this.readRawProperty(r, typeTag, size);
		}
	}

	private numberProperty(r: ArchiveReader, type: NumberProperty["type"], size: number, path: string, read: () => number): NumberProperty {
		const id = r.readOptionalGuid();
		const start = r.position;
		const value = read();
		this.checkSize(r, start, size, path);
		return { type, id, value };
	}

	private bigIntProperty(r: ArchiveReader, type: BigIntProperty["type"], size: number, path: string, read: () => bigint): BigIntProperty {
		const id = r.readOptionalGuid();
		const start = r.position;
		const value = read();
		this.checkSize(r, start, size, path);
		return { type, id, value };
	}

	private stringProperty(r: ArchiveReader, type: StringProperty["type"], size: number, path: string): StringProperty {
		const id = r.readOptionalGuid();
		const start = r.position;
		const value = r.readFString();
		this.checkSize(r, start, size, path);
		return { type, id, value };
	}

	/** Metadaten je nach Tag, GUID, dann `size` Bytes unverändert */
	private readRawProperty(r: ArchiveReader, typeTag: string, size: number): RawProperty {
		let header: RawHeader;
		switch (typeTag) {
			case PropertyType.Array:
				header = { kind: "array", arrayType: r.readFString() };
				break;
			case PropertyType.Map:
				header = { kind: "map", keyType: r.readFString(), valueType: r.readFString() };
				break;
			case PropertyType.Struct:
				header = { kind: "struct", structType: r.readFString(), structId: r.readGuid() };
				break;
			case PropertyType.Set:
				header = { kind: "set", setType: r.readFString() };
				break;
			default:
				header = { kind: "plain" };
		}
		const id = r.readOptionalGuid();
		return { type: RAW, typeTag, header, id, raw: r.readBytes(size) };
	}

	public readStructValue(r: ArchiveReader, structType: string, path: string, depth: number): StructValue {
		const layout = FIXED_STRUCTS.get(structType);
		if (!layout) {
			return { kind: "properties", properties: this.readScope(r, path, depth + 1) };
		}
		switch (layout.kind) {
			case "vector":
				return { kind: "vector", x: readScalar(r, layout.scalar), y: readScalar(r, layout.scalar), z: readScalar(r, layout.scalar) };
			case "vector4":
				return {
					kind: "vector4",
					x: readScalar(r, layout.scalar),
					y: readScalar(r, layout.scalar),
					z: readScalar(r, layout.scalar),
					w: readScalar(r, layout.scalar)
				};
			case "vector2":
				return { kind: "vector2", x: readScalar(r, layout.scalar), y: readScalar(r, layout.scalar) };
			case "color": {
				if (layout.scalar === "u8") {
					// FColor: BGRA
					const b = r.readUInt8();
					const g = r.readUInt8();
					const red = r.readUInt8();
					const a = r.readUInt8();
					return { kind: "color", r: red, g, b, a };
				}
				return { kind: "color", r: r.readFloat(), g: r.readFloat(), b: r.readFloat(), a: r.readFloat() };
			}
			case "ticks":
				return { kind: "ticks", value: layout.signed ? r.readInt64() : r.readUInt64() };
			case "guid":
				return { kind: "guid", value: r.readGuid() };
			case "box":
				return {
					kind: "box",
					min: { x: r.readDouble(), y: r.readDouble(), z: r.readDouble() },
					max: { x: r.readDouble(), y: r.readDouble(), z: r.readDouble() },
					valid: r.readUInt8()
				};
		}
	}

	private readPlainValue(r: ArchiveReader, typeTag: string): PlainValue {
		switch (typeTag) {
			case PropertyType.Enum:
			case PropertyType.Name:
			case PropertyType.Str:
			case PropertyType.Object:
				return r.readFString();
			case "Guid":
				return r.readGuid();
			case PropertyType.SoftObject:
				return { path: r.readFString(), subPath: r.readFString() };
			case PropertyType.Int:
				return r.readInt32();
			case PropertyType.UInt16:
				return r.readUInt16();
			case PropertyType.UInt32:
				return r.readUInt32();
			case PropertyType.Int64:
				return r.readInt64();
			case PropertyType.UInt64:
				return r.readUInt64();
			case PropertyType.Float:
				return r.readFloat();
			case PropertyType.Double:
				return r.readDouble();
			case PropertyType.Bool:
				return r.readUInt8() !== 0;
			default:
				return r.fail(`Unsupported element type ${typeTag}`);
		}
	}

	private readElement(r: ArchiveReader, typeTag: string, structType: string, path: string, depth: number): ElementValue {
		if (typeTag === PropertyType.Struct) {
			return this.readStructValue(r, structType, path, depth);
		}
		return this.readPlainValue(r, typeTag);
	}

	private readArrayProperty(r: ArchiveReader, size: number, path: string, depth: number): ArrayProperty {
		const arrayType = r.readFString();
		const id = r.readOptionalGuid();
		const start = r.position;
		let value: ArrayValue;
		if (arrayType === PropertyType.Byte && this.policy.domainDecoder(path) === DomainDecoder.CharacterRecord) {
			value = this.readCharacterArray(r, path, depth);
		} else {
			value = this.readArrayValue(r, arrayType, size, path, depth);
		}
		this.checkSize(r, start, size, path);
		return { type: PropertyType.Array, arrayType, id, value };
	}

	private readArrayValue(r: ArchiveReader, arrayType: string, size: number, path: string, depth: number): ArrayValue {
		const count = r.readUInt32();
		if (arrayType === PropertyType.Struct) {
			return this.readStructArray(r, count, path, depth);
		}
		if (arrayType === PropertyType.Byte) {
			if (size === count + 4) return { kind: "bytes", bytes: r.readBytes(count) };
			debug(`ByteProperty array at ${path} is not a plain blob, keeping raw`);
			return { kind: "raw", count, bytes: r.readBytes(size - 4) };
		}
		if (!PLAIN_ELEMENT_TYPES.has(arrayType)) {
			debug(`Raw capture of ${arrayType} array at ${path}`);
			return { kind: "raw", count, bytes: r.readBytes(size - 4) };
		}
		const values: PlainValue[] = [];
		for (let i = 0; i < count; i++) values.push(this.readPlainValue(r, arrayType));
		return { kind: "elements", values };
	}

	private readStructArray(r: ArchiveReader, count: number, path: string, depth: number): ArrayValue {
		const propName = r.readFString();
		const propType = r.readFString();
		const byteLength = r.readSize();
		const structType = r.readFString();
		const structId = r.readGuid();
		const extraId = r.readOptionalGuid();
		const start = r.position;
		const values: StructValue[] = [];
		for (let i = 0; i < count; i++) values.push(this.readStructValue(r, structType, path, depth));
		this.checkSize(r, start, byteLength, `${path}[]`);
		return { kind: "structs", header: { propName, propType, structType, structId, extraId }, values };
	}

	private readCharacterArray(r: ArchiveReader, path: string, depth: number): ArrayValue {
		const count = r.readUInt32();
		const bytes = r.readBytes(count);
		try {
			const record = decodeCharacterRecord(bytes, (inner) => this.readScope(inner, path, depth + 1));
			return { kind: "character", record };
		} catch (err) {
			if (err instanceof SubCodecError) {
				warn(`${path}: ${err.message}; keeping raw bytes`);
				return { kind: "bytes", bytes };
			}
			throw err;
		}
	}

	private readMapProperty(r: ArchiveReader, size: number, path: string, depth: number): MapProperty | RawProperty {
		const keyType = r.readFString();
		const valueType = r.readFString();
		const id = r.readOptionalGuid();
		if (!isElementType(keyType) || !isElementType(valueType)) {
			debug(`Raw capture of map ${keyType} → ${valueType} at ${path}`);
			return { type: RAW, typeTag: PropertyType.Map, header: { kind: "map", keyType, valueType }, id, raw: r.readBytes(size) };
		}
		const start = r.position;
		const keyPath = `${path}.Key`;
		const valuePath = `${path}.Value`;
		const keyStructType = keyType === PropertyType.Struct ? this.policy.structHint(keyPath) : GENERIC_STRUCT;
		const valueStructType = valueType === PropertyType.Struct ? this.policy.structHint(valuePath) : GENERIC_STRUCT;
		const reserved = r.readUInt32();
		const count = r.readUInt32();
		const entries: MapEntry[] = [];
		for (let i = 0; i < count; i++) {
			const key = this.readElement(r, keyType, keyStructType, keyPath, depth);
			const value = this.readElement(r, valueType, valueStructType, valuePath, depth);
			entries.push({ key, value });
		}
		this.checkSize(r, start, size, path);
		const map: MapProperty = { type: PropertyType.Map, keyType, valueType, keyStructType, valueStructType, id, reserved, entries };
		if (this.policy.domainDecoder(path) === DomainDecoder.GroupRecords) {
			decodeGroupEntries(map, path);
		}
		return map;
	}

	private readSetProperty(r: ArchiveReader, size: number, path: string, depth: number): SetProperty | RawProperty {
		const setType = r.readFString();
		const id = r.readOptionalGuid();
		if (!isElementType(setType)) {
			debug(`Raw capture of ${setType} set at ${path}`);
			return { type: RAW, typeTag: PropertyType.Set, header: { kind: "set", setType }, id, raw: r.readBytes(size) };
		}
		const start = r.position;
		const reserved = r.readUInt32();
		const count = r.readUInt32();
		const elements: ElementValue[] = [];
		for (let i = 0; i < count; i++) {
			elements.push(this.readElement(r, setType, GENERIC_STRUCT, `${path}.Value`, depth));
		}
		this.checkSize(r, start, size, path);
		return { type: PropertyType.Set, setType, id, reserved, elements };
	}
}

/**
 * RawData der Einträge mit GroupType → GroupRecord. Fehler lassen den Eintrag
 * als Byte-Array stehen.
 */
function decodeGroupEntries(map: MapProperty, path: string): void {
	for (const entry of map.entries) {
		const value = entry.value;
		if (!isStructValue(value) || value.kind !== "properties") continue;
		const groupType = value.properties.get("GroupType");
		const rawData = value.properties.get("RawData");
		if (groupType?.type !== PropertyType.Enum || rawData?.type !== PropertyType.Array || rawData.value.kind !== "bytes") continue;
		try {
			rawData.value = { kind: "group", record: decodeGroupRecord(groupType.value, rawData.value.bytes) };
		} catch (err) {
			if (err instanceof SubCodecError) {
				warn(`${path}: ${err.message}; keeping raw bytes`);
				continue;
			}
			throw err;
		}
	}
}

export function readGvas(pathOrBuffer: string | Buffer, options?: GvasReadOptions): SaveTree {
	return new GvasReader(pathOrBuffer, options).read();
}
