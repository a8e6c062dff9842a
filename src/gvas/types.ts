/**
 * GVAS Property-Baum
 *
 * Jede Property ist ein getaggter Knoten (Discriminant `type` = Tag auf dem Draht),
 * nicht modellierte Daten landen als `Raw` mit Original-Metadaten + Payload.
 */

/** Kanonische GUID: 8-4-4-4-12, Kleinbuchstaben */
export type Guid = string;

export const EMPTY_GUID: Guid = "00000000-0000-0000-0000-000000000000";

export enum PropertyType {
	Int = "IntProperty",
	UInt16 = "UInt16Property",
	UInt32 = "UInt32Property",
	Int64 = "Int64Property",
	UInt64 = "UInt64Property",
	Float = "FloatProperty",
	Double = "DoubleProperty",
	Str = "StrProperty",
	Name = "NameProperty",
	Object = "ObjectProperty",
	Bool = "BoolProperty",
	Enum = "EnumProperty",
	Byte = "ByteProperty",
	SoftObject = "SoftObjectProperty",
	Struct = "StructProperty",
	Array = "ArrayProperty",
	Map = "MapProperty",
	Set = "SetProperty"
}

/** Tag für Raw-Knoten im Baum (kommt nie auf dem Draht vor) */
export const RAW = "Raw";

export interface CustomVersion {
	id: Guid;
	version: number;
}

export interface GvasHeader {
	saveGameVersion: number;
	packageVersionUe4: number;
	packageVersionUe5: number;
	engineMajor: number;
	engineMinor: number;
	enginePatch: number;
	engineChangelist: number;
	engineBranch: string;
	customVersionFormat: number;
	customVersions: CustomVersion[];
	saveGameClassName: string;
}

/** Reihenfolge = Reihenfolge auf dem Draht */
export type PropertyBag = Map<string, Property>;

export interface SaveTree {
	header: GvasHeader;
	properties: PropertyBag;
	/** Bytes hinter dem letzten "None" (normalerweise 4 Nullbytes) */
	trailer: Buffer;
}

export interface SoftObjectPath {
	path: string;
	subPath: string;
}

// --- Struct-Werte ---

export interface VectorValue {
	kind: "vector";
	x: number;
	y: number;
	z: number;
}

export interface Vector4Value {
	kind: "vector4";
	x: number;
	y: number;
	z: number;
	w: number;
}

export interface Vector2Value {
	kind: "vector2";
	x: number;
	y: number;
}

export interface ColorValue {
	kind: "color";
	r: number;
	g: number;
	b: number;
	a: number;
}

/** DateTime (u64) / Timespan (i64) in 100ns-Ticks */
export interface TicksValue {
	kind: "ticks";
	value: bigint;
}

export interface GuidValue {
	kind: "guid";
	value: Guid;
}

export interface BoxValue {
	kind: "box";
	min: { x: number; y: number; z: number };
	max: { x: number; y: number; z: number };
	valid: number;
}

export interface PropertiesValue {
	kind: "properties";
	properties: PropertyBag;
}

export type StructValue = VectorValue | Vector4Value | Vector2Value | ColorValue | TicksValue | GuidValue | BoxValue | PropertiesValue;

/** Element in Arrays/Maps/Sets: Skalar oder Struct */
export type PlainValue = string | number | bigint | boolean | SoftObjectPath;
export type ElementValue = PlainValue | StructValue;

// --- Gruppen / Charaktere (dekodierte RawData-Blobs) ---

export interface CharacterHandle {
	guid: Guid;
	instanceId: Guid;
}

export interface GuildMember {
	playerUid: Guid;
	lastOnline: bigint;
	playerName: string;
}

interface GroupRecordBase {
	groupType: string;
	groupId: Guid;
	groupName: string;
	characterHandles: CharacterHandle[];
	/** nicht verstandene Rest-Bytes, unverändert zurückgeschrieben */
	trailer: Buffer;
}

export interface GuildRecord extends GroupRecordBase {
	kind: "guild";
	orgType: number;
	reserved: Buffer;
	baseIds: Guid[];
	unknown1: number;
	baseCampLevel: number;
	mapObjectInstanceIds: Guid[];
	guildName: string;
	lastGuildNameModifierPlayerUid: Guid;
	reserved2: Buffer;
	adminPlayerUid: Guid;
	players: GuildMember[];
}

export interface IndependentGuildRecord extends GroupRecordBase {
	kind: "independentGuild";
	orgType: number;
	baseCampLevel: number;
	mapObjectInstanceIds: Guid[];
	guildName: string;
	playerUid: Guid;
	guildName2: string;
	lastOnline: bigint;
	playerName: string;
}

export interface OrganizationRecord extends GroupRecordBase {
	kind: "organization";
	orgType: number;
	/** 12 Bytes nach orgType, Bedeutung unbekannt */
	reserved: Buffer;
}

/** Gruppentypen ohne eigenes Layout (z.B. Neutral) */
export interface GenericGroupRecord extends GroupRecordBase {
	kind: "generic";
}

export type GroupRecord = GuildRecord | IndependentGuildRecord | OrganizationRecord | GenericGroupRecord;

export interface CharacterRecord {
	properties: PropertyBag;
	/** 4 Bytes vor der Gruppen-GUID */
	reserved: Buffer;
	groupId: Guid | null;
	trailer: Buffer;
}

// --- Array-Werte ---

export interface ElementsArray {
	kind: "elements";
	values: PlainValue[];
}

/** ByteProperty-Array als Blob (size == count + 4) */
export interface BytesArray {
	kind: "bytes";
	bytes: Buffer;
}

export interface StructArrayHeader {
	propName: string;
	propType: string;
	structType: string;
	structId: Guid;
	/** optionale GUID des inneren Tags */
	extraId: Guid | null;
}

export interface StructsArray {
	kind: "structs";
	header: StructArrayHeader;
	values: StructValue[];
}

/** unbekannter Elementtyp: count + Rest unverändert */
export interface RawArray {
	kind: "raw";
	count: number;
	bytes: Buffer;
}

export interface CharacterArray {
	kind: "character";
	record: CharacterRecord;
}

export interface GroupArray {
	kind: "group";
	record: GroupRecord;
}

export type ArrayValue = ElementsArray | BytesArray | StructsArray | RawArray | CharacterArray | GroupArray;

// --- Properties ---

interface PropertyBase {
	/** optionale Property-GUID */
	id: Guid | null;
}

export interface NumberProperty extends PropertyBase {
	type: PropertyType.Int | PropertyType.UInt16 | PropertyType.UInt32 | PropertyType.Float | PropertyType.Double;
	value: number;
}

export interface BigIntProperty extends PropertyBase {
	type: PropertyType.Int64 | PropertyType.UInt64;
	value: bigint;
}

export interface StringProperty extends PropertyBase {
	type: PropertyType.Str | PropertyType.Name | PropertyType.Object;
	value: string;
}

export interface BoolProperty extends PropertyBase {
	type: PropertyType.Bool;
	value: boolean;
}

export interface EnumProperty extends PropertyBase {
	type: PropertyType.Enum;
	enumType: string;
	value: string;
}

/** enumType "None" → u8, sonst Enum-Name als String */
export interface ByteProperty extends PropertyBase {
	type: PropertyType.Byte;
	enumType: string;
	value: number | string;
}

export interface SoftObjectProperty extends PropertyBase {
	type: PropertyType.SoftObject;
	value: SoftObjectPath;
}

export interface StructProperty extends PropertyBase {
	type: PropertyType.Struct;
	structType: string;
	structId: Guid;
	value: StructValue;
}

export interface ArrayProperty extends PropertyBase {
	type: PropertyType.Array;
	arrayType: string;
	value: ArrayValue;
}

export interface MapEntry {
	key: ElementValue;
	value: ElementValue;
}

export interface MapProperty extends PropertyBase {
	type: PropertyType.Map;
	keyType: string;
	valueType: string;
	/** Struct-Typ für StructProperty-Keys/-Values ("" = generische Properties) */
	keyStructType: string;
	valueStructType: string;
	reserved: number;
	entries: MapEntry[];
}

export interface SetProperty extends PropertyBase {
	type: PropertyType.Set;
	setType: string;
	reserved: number;
	elements: ElementValue[];
}

/** Metadaten vor der Payload, je nach Original-Tag */
export type RawHeader =
	| { kind: "array"; arrayType: string }
	| { kind: "map"; keyType: string; valueType: string }
	| { kind: "struct"; structType: string; structId: Guid }
	| { kind: "set"; setType: string }
	| { kind: "plain" };

export interface RawProperty extends PropertyBase {
	type: typeof RAW;
	typeTag: string;
	header: RawHeader;
	raw: Buffer;
}

export type Property =
	| NumberProperty
	| BigIntProperty
	| StringProperty
	| BoolProperty
	| EnumProperty
	| ByteProperty
	| SoftObjectProperty
	| StructProperty
	| ArrayProperty
	| MapProperty
	| SetProperty
	| RawProperty;

// --- feste Struct-Layouts ---

export type ScalarKind = "f64" | "f32" | "i32" | "u8";

export type FixedStructLayout =
	| { kind: "vector" | "vector4" | "vector2"; scalar: "f64" | "f32" | "i32" }
	| { kind: "color"; scalar: "f32" | "u8" }
	| { kind: "ticks"; signed: boolean }
	| { kind: "guid" }
	| { kind: "box" };

/** Alle anderen Struct-Typen sind verschachtelte Property-Scopes */
export const FIXED_STRUCTS: ReadonlyMap<string, FixedStructLayout> = new Map<string, FixedStructLayout>([
	["Vector", { kind: "vector", scalar: "f64" }],
	["Rotator", { kind: "vector", scalar: "f64" }],
	["Vector3f", { kind: "vector", scalar: "f32" }],
	["IntVector", { kind: "vector", scalar: "i32" }],
	["Quat", { kind: "vector4", scalar: "f64" }],
	["Vector4", { kind: "vector4", scalar: "f64" }],
	["Plane", { kind: "vector4", scalar: "f64" }],
	["Vector2D", { kind: "vector2", scalar: "f64" }],
	["Vector2f", { kind: "vector2", scalar: "f32" }],
	["Vector2D_f", { kind: "vector2", scalar: "f32" }],
	["IntPoint", { kind: "vector2", scalar: "i32" }],
	["LinearColor", { kind: "color", scalar: "f32" }],
	["Color", { kind: "color", scalar: "u8" }],
	["DateTime", { kind: "ticks", signed: false }],
	["Timespan", { kind: "ticks", signed: true }],
	["Guid", { kind: "guid" }],
	["Box", { kind: "box" }]
]);

/** Struct-Hint für Map-Keys/-Values und Set-Elemente ohne Layout */
export const GENERIC_STRUCT = "";

export function isStructValue(value: ElementValue): value is StructValue {
	return typeof value === "object" && "kind" in value;
}

export function isSoftObjectPath(value: ElementValue): value is SoftObjectPath {
	return typeof value === "object" && "path" in value && "subPath" in value;
}
