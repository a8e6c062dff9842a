/**
 * Property-Baum → XML
 *
 * Ein <property> pro Property, Struct-Werte als Kind-Element nach `kind`,
 * Bytes als Base64. Strings, die XML nicht verlustfrei trägt (Steuerzeichen,
 * Leerraum am Rand, einzelne Surrogates), stehen als UTF-16LE-Base64 in `<name>64`.
 */

import { encodeBase64 } from "../gvas/archive.js";
import { RAW, PropertyType, isStructValue } from "../gvas/types.js";
import type { CharacterRecord, ElementValue, GroupRecord, Property, PropertyBag, RawHeader, SaveTree, StructValue } from "../gvas/types.js";
import type { SaveType } from "../sav/types.js";

const EOL = "\n";
const TAB = "\t";
const UNSAFE = /[\x00-\x1f\x7f]|[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/;

export function escapeXml(s: string): string {
	return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;").replace(/'/g, "&apos;");
}

export function isXmlSafe(s: string): boolean {
	return !UNSAFE.test(s) && s.trim() === s;
}

/** Attribut-Liste; undefined/null-Werte entfallen */
type AttrValue = string | number | bigint | boolean | null | undefined;

function formatNumber(n: number): string {
	return Object.is(n, -0) ? "-0" : String(n);
}

function attrs(values: Record<string, AttrValue>): string {
	let out = "";
	for (const [key, value] of Object.entries(values)) {
		if (value === undefined || value === null) continue;
		if (typeof value === "string") {
			out += isXmlSafe(value) ? ` ${key}="${escapeXml(value)}"` : ` ${key}64="${encodeBase64(Buffer.from(value, "utf16le"))}"`;
		} else if (typeof value === "number") {
			out += ` ${key}="${formatNumber(value)}"`;
		} else {
			out += ` ${key}="${String(value)}"`;
		}
	}
	return out;
}

function element(indent: number, tag: string, attributes: Record<string, AttrValue>, children: string): string {
	const pad = TAB.repeat(indent);
	if (!children) return `${pad}<${tag}${attrs(attributes)} />${EOL}`;
	return `${pad}<${tag}${attrs(attributes)}>${EOL}${children}${pad}</${tag}>${EOL}`;
}

export function convertSaveToXml(tree: SaveTree, saveType?: SaveType): string {
	const h = tree.header;
	const customVersions = h.customVersions.map((cv) => element(2, "customVersion", { id: cv.id, version: cv.version }, "")).join("");
	let xml = '<?xml version="1.0" encoding="utf-8"?>' + EOL;
	xml += `<gvas${attrs({ saveType })}>${EOL}`;
	xml += element(
		1,
		"header",
		{
			saveGameVersion: h.saveGameVersion,
			packageVersionUe4: h.packageVersionUe4,
			packageVersionUe5: h.packageVersionUe5,
			engineMajor: h.engineMajor,
			engineMinor: h.engineMinor,
			enginePatch: h.enginePatch,
			engineChangelist: h.engineChangelist,
			engineBranch: h.engineBranch,
			customVersionFormat: h.customVersionFormat,
			saveGameClassName: h.saveGameClassName
		},
		customVersions
	);
	xml += element(1, "properties", {}, serializeBag(tree.properties, 2));
	xml += element(1, "trailer", { data: encodeBase64(tree.trailer) }, "");
	xml += "</gvas>" + EOL;
	return xml;
}

function serializeBag(bag: PropertyBag, indent: number): string {
	let xml = "";
	for (const [name, property] of bag) xml += serializeProperty(name, property, indent);
	return xml;
}

function serializeProperty(name: string, p: Property, indent: number): string {
	const inner = indent + 1;
	switch (p.type) {
		case PropertyType.Int:
		case PropertyType.UInt16:
		case PropertyType.UInt32:
		case PropertyType.Float:
		case PropertyType.Double:
		case PropertyType.Int64:
		case PropertyType.UInt64:
		case PropertyType.Str:
		case PropertyType.Name:
		case PropertyType.Object:
		case PropertyType.Bool:
			return element(indent, "property", { name, type: p.type, id: p.id, value: p.value }, "");
		case PropertyType.Enum:
		case PropertyType.Byte:
			return element(indent, "property", { name, type: p.type, id: p.id, enumType: p.enumType, value: p.value }, "");
		case PropertyType.SoftObject:
			return element(indent, "property", { name, type: p.type, id: p.id, path: p.value.path, subPath: p.value.subPath }, "");
		case PropertyType.Struct:
			return element(indent, "property", { name, type: p.type, id: p.id, structType: p.structType, structId: p.structId }, serializeStruct(p.value, inner));
		case PropertyType.Array: {
			const v = p.value;
			let child: string;
			switch (v.kind) {
				case "elements":
					child = element(inner, "elements", {}, v.values.map((e) => serializeElement("e", e, inner + 1)).join(""));
					break;
				case "bytes":
					child = element(inner, "bytes", { data: encodeBase64(v.bytes) }, "");
					break;
				case "raw":
					child = element(inner, "raw", { count: v.count, data: encodeBase64(v.bytes) }, "");
					break;
				case "structs":
					child = element(
						inner,
						"structs",
						{
							propName: v.header.propName,
							propType: v.header.propType,
							structType: v.header.structType,
							structId: v.header.structId,
							extraId: v.header.extraId
						},
						v.values.map((s) => serializeStruct(s, inner + 1)).join("")
					);
					break;
				case "character":
					child = serializeCharacter(v.record, inner);
					break;
				case "group":
					child = serializeGroup(v.record, inner);
					break;
			}
			return element(indent, "property", { name, type: p.type, id: p.id, arrayType: p.arrayType }, child);
		}
		case PropertyType.Map: {
			const entries = p.entries
				.map((entry) => element(inner, "entry", {}, serializeElement("key", entry.key, inner + 1) + serializeElement("value", entry.value, inner + 1)))
				.join("");
			return element(
				indent,
				"property",
				{
					name,
					type: p.type,
					id: p.id,
					keyType: p.keyType,
					valueType: p.valueType,
					keyStructType: p.keyStructType,
					valueStructType: p.valueStructType,
					reserved: p.reserved
				},
				entries
			);
		}
		case PropertyType.Set:
			return element(
				indent,
				"property",
				{ name, type: p.type, id: p.id, setType: p.setType, reserved: p.reserved },
				p.elements.map((e) => serializeElement("e", e, inner)).join("")
			);
		case RAW:
			return element(indent, "property", { name, type: p.typeTag, id: p.id, opaque: p.header.kind, ...rawHeaderAttrs(p.header), data: encodeBase64(p.raw) }, "");
	}
}

function rawHeaderAttrs(header: RawHeader): Record<string, AttrValue> {
	switch (header.kind) {
		case "array":
			return { arrayType: header.arrayType };
		case "map":
			return { keyType: header.keyType, valueType: header.valueType };
		case "struct":
			return { structType: header.structType, structId: header.structId };
		case "set":
			return { setType: header.setType };
		case "plain":
			return {};
	}
}

/** <e>/<key>/<value>: Skalar als Attribut, Struct als Kind */
function serializeElement(tag: string, value: ElementValue, indent: number): string {
	if (isStructValue(value)) return element(indent, tag, {}, serializeStruct(value, indent + 1));
	if (typeof value === "object") return element(indent, tag, { path: value.path, subPath: value.subPath }, "");
	return element(indent, tag, { value }, "");
}

export function serializeStruct(value: StructValue, indent: number): string {
	switch (value.kind) {
		case "vector":
			return element(indent, "vector", { x: value.x, y: value.y, z: value.z }, "");
		case "vector4":
			return element(indent, "vector4", { x: value.x, y: value.y, z: value.z, w: value.w }, "");
		case "vector2":
			return element(indent, "vector2", { x: value.x, y: value.y }, "");
		case "color":
			return element(indent, "color", { r: value.r, g: value.g, b: value.b, a: value.a }, "");
		case "ticks":
			return element(indent, "ticks", { value: value.value }, "");
		case "guid":
			return element(indent, "guid", { value: value.value }, "");
		case "box":
			return element(
				indent,
				"box",
				{ minX: value.min.x, minY: value.min.y, minZ: value.min.z, maxX: value.max.x, maxY: value.max.y, maxZ: value.max.z, valid: value.valid },
				""
			);
		case "properties":
			return element(indent, "properties", {}, serializeBag(value.properties, indent + 1));
	}
}

function serializeCharacter(record: CharacterRecord, indent: number): string {
	return element(
		indent,
		"character",
		{ reserved: encodeBase64(record.reserved), groupId: record.groupId, trailer: encodeBase64(record.trailer) },
		element(indent + 1, "properties", {}, serializeBag(record.properties, indent + 2))
	);
}

function serializeGroup(record: GroupRecord, indent: number): string {
	const inner = indent + 1;
	let children = record.characterHandles.map((h) => element(inner, "handle", { guid: h.guid, instanceId: h.instanceId }, "")).join("");
	const common = { kind: record.kind, groupType: record.groupType, groupId: record.groupId, groupName: record.groupName };
	const trailer = encodeBase64(record.trailer);
	switch (record.kind) {
		case "guild":
			children += record.baseIds.map((id) => element(inner, "baseId", { value: id }, "")).join("");
			children += record.mapObjectInstanceIds.map((id) => element(inner, "mapObjectInstanceId", { value: id }, "")).join("");
			children += record.players
				.map((pl) => element(inner, "player", { playerUid: pl.playerUid, lastOnline: pl.lastOnline, playerName: pl.playerName }, ""))
				.join("");
			return element(
				indent,
				"group",
				{
					...common,
					orgType: record.orgType,
					reserved: encodeBase64(record.reserved),
					unknown1: record.unknown1,
					baseCampLevel: record.baseCampLevel,
					guildName: record.guildName,
					lastGuildNameModifierPlayerUid: record.lastGuildNameModifierPlayerUid,
					reserved2: encodeBase64(record.reserved2),
					adminPlayerUid: record.adminPlayerUid,
					trailer
				},
				children
			);
		case "independentGuild":
			children += record.mapObjectInstanceIds.map((id) => element(inner, "mapObjectInstanceId", { value: id }, "")).join("");
			return element(
				indent,
				"group",
				{
					...common,
					orgType: record.orgType,
					baseCampLevel: record.baseCampLevel,
					guildName: record.guildName,
					playerUid: record.playerUid,
					guildName2: record.guildName2,
					lastOnline: record.lastOnline,
					playerName: record.playerName,
					trailer
				},
				children
			);
		case "organization":
			return element(indent, "group", { ...common, orgType: record.orgType, reserved: encodeBase64(record.reserved), trailer }, children);
		case "generic":
			return element(indent, "group", { ...common, trailer }, children);
	}
}
