/**
 * XML → Property-Baum (Gegenstück zu xml-writer.ts)
 */

import { readFileSync } from "node:fs";
import { XMLParser } from "fast-xml-parser";
import { XmlFormatError } from "../errors.js";
import { decodeBase64 } from "../gvas/archive.js";
import { BYTE_NO_ENUM } from "../gvas/reader.js";
import { PropertyType, RAW } from "../gvas/types.js";
import type {
	ArrayValue,
	CharacterHandle,
	CharacterRecord,
	CustomVersion,
	ElementValue,
	GroupRecord,
	GvasHeader,
	MapEntry,
	PlainValue,
	Property,
	PropertyBag,
	RawHeader,
	SaveTree,
	StructValue
} from "../gvas/types.js";
import { isSaveType } from "../sav/types.js";
import type { SaveType } from "../sav/types.js";

interface XmlNode {
	tag: string;
	attrs: Map<string, string>;
	children: Map<string, XmlNode[]>;
}

function parseXml(xml: string): unknown {
	const parser = new XMLParser({
		ignoreAttributes: false,
		attributeNamePrefix: "@_",
		ignoreDeclaration: true,
		// jedes Element als Array, damit Reihenfolge und Einzahl gleich behandelt werden
		isArray: (_tagName, _jPath, _isLeafNode, isAttribute) => !isAttribute
	});
	return parser.parse(xml);
}

function toNode(tag: string, raw: unknown): XmlNode {
	const node: XmlNode = { tag, attrs: new Map(), children: new Map() };
	// leere Elemente ohne Attribute kommen als ""
	if (typeof raw !== "object" || raw === null) return node;
	const entries: [string, unknown][] = Object.entries(raw);
	for (const [key, value] of entries) {
		if (key.startsWith("@_")) {
			node.attrs.set(key.slice(2), String(value));
		} else if (key !== "#text") {
			const list = Array.isArray(value) ? value : [value];
			node.children.set(
				key,
				list.map((v: unknown) => toNode(key, v))
			);
		}
	}
	return node;
}

function fail(node: XmlNode, message: string): never {
	throw new XmlFormatError(`<${node.tag}>: ${message}`);
}

function optStr(node: XmlNode, key: string): string | null {
	const encoded = node.attrs.get(`${key}64`);
	if (encoded !== undefined) {
		try {
			return decodeBase64(encoded).toString("utf16le");
		} catch {
			return fail(node, `invalid base64 in ${key}64`);
		}
	}
	return node.attrs.get(key) ?? null;
}

function str(node: XmlNode, key: string): string {
	const value = optStr(node, key);
	return value === null ? fail(node, `missing attribute ${key}`) : value;
}

function num(node: XmlNode, key: string): number {
	const raw = str(node, key);
	const value = Number(raw);
	if (raw.trim() === "" || (Number.isNaN(value) && raw !== "NaN")) fail(node, `${key}="${raw}" is not a number`);
	return value;
}

function big(node: XmlNode, key: string): bigint {
	const raw = str(node, key);
	try {
		return BigInt(raw);
	} catch {
		return fail(node, `${key}="${raw}" is not an integer`);
	}
}

function bool(node: XmlNode, key: string): boolean {
	const raw = str(node, key);
	if (raw === "true") return true;
	if (raw === "false") return false;
	return fail(node, `${key}="${raw}" is not a boolean`);
}

function bytes(node: XmlNode, key: string): Buffer {
	const raw = str(node, key);
	try {
		return decodeBase64(raw);
	} catch {
		return fail(node, `${key} is not valid base64`);
	}
}

function children(node: XmlNode, tag: string): XmlNode[] {
	return node.children.get(tag) ?? [];
}

function child(node: XmlNode, tag: string): XmlNode {
	const list = children(node, tag);
	if (list.length !== 1) fail(node, `expected one <${tag}>, found ${list.length}`);
	return list[0];
}

/** Einziges Kind-Element, egal welcher Tag (Struct-Werte) */
function onlyChild(node: XmlNode): XmlNode {
	const all = [...node.children.values()].flat();
	if (all.length !== 1) fail(node, `expected exactly one child element, found ${all.length}`);
	return all[0];
}

export function parseSaveXml(xml: string): { tree: SaveTree; saveType: SaveType | null } {
	const root = toNode("document", parseXml(xml));
	const gvas = child(root, "gvas");
	const saveTypeAttr = optStr(gvas, "saveType");
	let saveType: SaveType | null = null;
	if (saveTypeAttr !== null) {
		const n = num(gvas, "saveType");
		if (!isSaveType(n)) fail(gvas, `unknown saveType ${saveTypeAttr}`);
		saveType = n;
	}
	const tree: SaveTree = {
		header: parseHeader(child(gvas, "header")),
		properties: parseBag(child(gvas, "properties")),
		trailer: bytes(child(gvas, "trailer"), "data")
	};
	return { tree, saveType };
}

export function readSaveXml(path: string): { tree: SaveTree; saveType: SaveType | null } {
	return parseSaveXml(readFileSync(path, "utf8"));
}

function parseHeader(node: XmlNode): GvasHeader {
	const customVersions: CustomVersion[] = children(node, "customVersion").map((cv) => ({ id: str(cv, "id"), version: num(cv, "version") }));
	return {
		saveGameVersion: num(node, "saveGameVersion"),
		packageVersionUe4: num(node, "packageVersionUe4"),
		packageVersionUe5: num(node, "packageVersionUe5"),
		engineMajor: num(node, "engineMajor"),
		engineMinor: num(node, "engineMinor"),
		enginePatch: num(node, "enginePatch"),
		engineChangelist: num(node, "engineChangelist"),
		engineBranch: str(node, "engineBranch"),
		customVersionFormat: num(node, "customVersionFormat"),
		customVersions,
		saveGameClassName: str(node, "saveGameClassName")
	};
}

function parseBag(node: XmlNode): PropertyBag {
	const bag: PropertyBag = new Map();
	for (const p of children(node, "property")) {
		const name = str(p, "name");
		if (bag.has(name)) fail(p, `duplicate property ${name}`);
		bag.set(name, parseProperty(p));
	}
	return bag;
}

function parseRawHeader(node: XmlNode, kind: string): RawHeader {
	switch (kind) {
		case "array":
			return { kind: "array", arrayType: str(node, "arrayType") };
		case "map":
			return { kind: "map", keyType: str(node, "keyType"), valueType: str(node, "valueType") };
		case "struct":
			return { kind: "struct", structType: str(node, "structType"), structId: str(node, "structId") };
		case "set":
			return { kind: "set", setType: str(node, "setType") };
		case "plain":
			return { kind: "plain" };
		default:
			return fail(node, `unknown opaque kind ${kind}`);
	}
}

function parseProperty(node: XmlNode): Property {
	const type = str(node, "type");
	const id = optStr(node, "id");
	const opaque = optStr(node, "opaque");
	if (opaque !== null) {
		return { type: RAW, typeTag: type, header: parseRawHeader(node, opaque), id, raw: bytes(node, "data") };
	}
	switch (type) {
		case PropertyType.Int:
			return { type: PropertyType.Int, id, value: num(node, "value") };
		case PropertyType.UInt16:
			return { type: PropertyType.UInt16, id, value: num(node, "value") };
		case PropertyType.UInt32:
			return { type: PropertyType.UInt32, id, value: num(node, "value") };
		case PropertyType.Float:
			return { type: PropertyType.Float, id, value: num(node, "value") };
		case PropertyType.Double:
			return { type: PropertyType.Double, id, value: num(node, "value") };
		case PropertyType.Int64:
			return { type: PropertyType.Int64, id, value: big(node, "value") };
		case PropertyType.UInt64:
			return { type: PropertyType.UInt64, id, value: big(node, "value") };
		case PropertyType.Str:
			return { type: PropertyType.Str, id, value: str(node, "value") };
		case PropertyType.Name:
			return { type: PropertyType.Name, id, value: str(node, "value") };
		case PropertyType.Object:
			return { type: PropertyType.Object, id, value: str(node, "value") };
		case PropertyType.Bool:
			return { type: PropertyType.Bool, id, value: bool(node, "value") };
		case PropertyType.Enum:
			return { type: PropertyType.Enum, id, enumType: str(node, "enumType"), value: str(node, "value") };
		case PropertyType.Byte: {
			const enumType = str(node, "enumType");
			return { type: PropertyType.Byte, id, enumType, value: enumType === BYTE_NO_ENUM ? num(node, "value") : str(node, "value") };
		}
		case PropertyType.SoftObject:
			return { type: PropertyType.SoftObject, id, value: { path: str(node, "path"), subPath: str(node, "subPath") } };
		case PropertyType.Struct:
			return { type: PropertyType.Struct, id, structType: str(node, "structType"), structId: str(node, "structId"), value: parseStruct(onlyChild(node)) };
		case PropertyType.Array: {
			const arrayType = str(node, "arrayType");
			return { type: PropertyType.Array, id, arrayType, value: parseArrayValue(onlyChild(node), arrayType) };
		}
		case PropertyType.Map: {
			const keyType = str(node, "keyType");
			const valueType = str(node, "valueType");
			const entries: MapEntry[] = children(node, "entry").map((entry) => ({
				key: parseElement(child(entry, "key"), keyType),
				value: parseElement(child(entry, "value"), valueType)
			}));
			return {
				type: PropertyType.Map,
				id,
				keyType,
				valueType,
				keyStructType: str(node, "keyStructType"),
				valueStructType: str(node, "valueStructType"),
				reserved: num(node, "reserved"),
				entries
			};
		}
		case PropertyType.Set: {
			const setType = str(node, "setType");
			const elements = children(node, "e").map((e) => parseElement(e, setType));
			return { type: PropertyType.Set, id, setType, reserved: num(node, "reserved"), elements };
		}
		default:
			return fail(node, `unsupported property type ${type} (opaque properties need an "opaque" attribute)`);
	}
}

function parseArrayValue(node: XmlNode, arrayType: string): ArrayValue {
	switch (node.tag) {
		case "elements":
			return { kind: "elements", values: children(node, "e").map((e) => parsePlain(e, arrayType)) };
		case "bytes":
			return { kind: "bytes", bytes: bytes(node, "data") };
		case "raw":
			return { kind: "raw", count: num(node, "count"), bytes: bytes(node, "data") };
		case "structs": {
			const tags = [...node.children.keys()];
			if (tags.length > 1) fail(node, `mixed struct elements: ${tags.join(", ")}`);
			return {
				kind: "structs",
				header: {
					propName: str(node, "propName"),
					propType: str(node, "propType"),
					structType: str(node, "structType"),
					structId: str(node, "structId"),
					extraId: optStr(node, "extraId")
				},
				values: [...node.children.values()].flat().map(parseStruct)
			};
		}
		case "character":
			return { kind: "character", record: parseCharacter(node) };
		case "group":
			return { kind: "group", record: parseGroup(node) };
		default:
			return fail(node, "unknown array value");
	}
}

function parseElement(node: XmlNode, typeTag: string): ElementValue {
	if (typeTag === PropertyType.Struct) return parseStruct(onlyChild(node));
	return parsePlain(node, typeTag);
}

function parsePlain(node: XmlNode, typeTag: string): PlainValue {
	switch (typeTag) {
		case PropertyType.Enum:
		case PropertyType.Name:
		case PropertyType.Str:
		case PropertyType.Object:
		case "Guid":
			return str(node, "value");
		case PropertyType.SoftObject:
			return { path: str(node, "path"), subPath: str(node, "subPath") };
		case PropertyType.Int:
		case PropertyType.UInt16:
		case PropertyType.UInt32:
		case PropertyType.Float:
		case PropertyType.Double:
			return num(node, "value");
		case PropertyType.Int64:
		case PropertyType.UInt64:
			return big(node, "value");
		case PropertyType.Bool:
			return bool(node, "value");
		default:
			return fail(node, `unsupported element type ${typeTag}`);
	}
}

function parseStruct(node: XmlNode): StructValue {
	switch (node.tag) {
		case "vector":
			return { kind: "vector", x: num(node, "x"), y: num(node, "y"), z: num(node, "z") };
		case "vector4":
			return { kind: "vector4", x: num(node, "x"), y: num(node, "y"), z: num(node, "z"), w: num(node, "w") };
		case "vector2":
			return { kind: "vector2", x: num(node, "x"), y: num(node, "y") };
		case "color":
			return { kind: "color", r: num(node, "r"), g: num(node, "g"), b: num(node, "b"), a: num(node, "a") };
		case "ticks":
			return { kind: "ticks", value: big(node, "value") };
		case "guid":
			return { kind: "guid", value: str(node, "value") };
		case "box":
			return {
				kind: "box",
				min: { x: num(node, "minX"), y: num(node, "minY"), z: num(node, "minZ") },
				max: { x: num(node, "maxX"), y: num(node, "maxY"), z: num(node, "maxZ") },
				valid: num(node, "valid")
			};
		case "properties":
			return { kind: "properties", properties: parseBag(node) };
		default:
			return fail(node, "unknown struct value");
	}
}

function parseCharacter(node: XmlNode): CharacterRecord {
	return {
		properties: parseBag(child(node, "properties")),
		reserved: bytes(node, "reserved"),
		groupId: optStr(node, "groupId"),
		trailer: bytes(node, "trailer")
	};
}

function guidList(node: XmlNode, tag: string): string[] {
	return children(node, tag).map((n) => str(n, "value"));
}

function parseGroup(node: XmlNode): GroupRecord {
	const characterHandles: CharacterHandle[] = children(node, "handle").map((h) => ({ guid: str(h, "guid"), instanceId: str(h, "instanceId") }));
	const base = {
		groupType: str(node, "groupType"),
		groupId: str(node, "groupId"),
		groupName: str(node, "groupName"),
		characterHandles,
		trailer: bytes(node, "trailer")
	};
	const kind = str(node, "kind");
	switch (kind) {
		case "guild":
			return {
				kind: "guild",
				...base,
				orgType: num(node, "orgType"),
				reserved: bytes(node, "reserved"),
				baseIds: guidList(node, "baseId"),
				unknown1: num(node, "unknown1"),
				baseCampLevel: num(node, "baseCampLevel"),
				mapObjectInstanceIds: guidList(node, "mapObjectInstanceId"),
				guildName: str(node, "guildName"),
				lastGuildNameModifierPlayerUid: str(node, "lastGuildNameModifierPlayerUid"),
				reserved2: bytes(node, "reserved2"),
				adminPlayerUid: str(node, "adminPlayerUid"),
				players: children(node, "player").map((p) => ({ playerUid: str(p, "playerUid"), lastOnline: big(p, "lastOnline"), playerName: str(p, "playerName") }))
			};
		case "independentGuild":
			return {
				kind: "independentGuild",
				...base,
				orgType: num(node, "orgType"),
				baseCampLevel: num(node, "baseCampLevel"),
				mapObjectInstanceIds: guidList(node, "mapObjectInstanceId"),
				guildName: str(node, "guildName"),
				playerUid: str(node, "playerUid"),
				guildName2: str(node, "guildName2"),
				lastOnline: big(node, "lastOnline"),
				playerName: str(node, "playerName")
			};
		case "organization":
			return { kind: "organization", ...base, orgType: num(node, "orgType"), reserved: bytes(node, "reserved") };
		case "generic":
			return { kind: "generic", ...base };
		default:
			return fail(node, `unknown group kind ${kind}`);
	}
}
