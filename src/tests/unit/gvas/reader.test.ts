import { beforeAll, describe, expect, it, vi } from "vitest";
import { GvasReader, readGvas } from "../../../gvas/reader.js";
import { writeGvas } from "../../../gvas/writer.js";
import { DomainDecoder, PathPolicy } from "../../../gvas/policy.js";
import { EMPTY_GUID, PropertyType, RAW } from "../../../gvas/types.js";
import type { ArchiveWriter } from "../../../gvas/archive.js";
import { DepthLimitError, MalformedTreeError } from "../../../errors.js";
import { setLogLevel } from "../../../logger.js";
import { archive, headerBytes, noId, property, scope } from "../../fixtures/bytes.js";
import { buildWorld, defaultWorld, testHeader } from "../../fixtures/world.js";
import { findProperty, structProperties } from "../../../gvas/walker.js";

const PROP_ID = "12345678-9abc-def0-1234-56789abcdef0";
const KEY_ID = "0000abcd-0000-0000-0000-000000000001";

function structMeta(structType: string) {
	return (m: ArchiveWriter): void => {
		m.writeFString(structType);
		m.writeGuid(EMPTY_GUID);
		m.writeUInt8(0);
	};
}

function tagMeta(...tags: string[]) {
	return (m: ArchiveWriter): void => {
		for (const tag of tags) m.writeFString(tag);
		m.writeUInt8(0);
	};
}

/** Lesen und prüfen, dass der Writer exakt dieselben Bytes erzeugt */
function readAndRewrite(bytes: Buffer, policy?: PathPolicy) {
	const tree = new GvasReader(bytes, { policy }).read();
	expect(writeGvas(tree).equals(bytes)).toBe(true);
	return tree.properties;
}

beforeAll(() => setLogLevel("silent"));

describe("GvasReader header", () => {
	it("reads the header, an empty scope and the trailer", () => {
		const tree = readGvas(archive(() => {}, Buffer.from([0, 0, 0, 0, 9])));
		expect(tree.header).toEqual(testHeader());
		expect(tree.properties.size).toBe(0);
		expect([...tree.trailer]).toEqual([0, 0, 0, 0, 9]);
	});

	it("rejects a wrong magic", () => {
		expect(() => readGvas(Buffer.from("XXXXXXXXXXXXXXXX", "latin1"))).toThrow("Bad GVAS magic: 0x58585858");
	});

	it("accepts an empty name as scope end", () => {
		const bytes = Buffer.concat([headerBytes(), Buffer.from([0, 0, 0, 0])]);
		expect(readGvas(bytes).properties.size).toBe(0);
	});
});

describe("GvasReader scalar properties", () => {
	it("reads numbers, strings and property GUIDs", () => {
		const props = readAndRewrite(
			archive((w) => {
				property(w, "Count", "IntProperty", noId, (b) => b.writeInt32(-5));
				property(w, "Ratio", "FloatProperty", noId, (b) => b.writeFloat(1.5));
				property(w, "Precise", "DoubleProperty", noId, (b) => b.writeDouble(0.1));
				property(w, "Small", "UInt16Property", noId, (b) => b.writeUInt16(65535));
				property(w, "Big", "Int64Property", noId, (b) => b.writeInt64(-9n));
				property(w, "Huge", "UInt64Property", noId, (b) => b.writeUInt64(18446744073709551615n));
				property(w, "Label", "StrProperty", noId, (b) => b.writeFString("abc"));
				property(
					w,
					"Tag",
					"NameProperty",
					(m) => {
						m.writeUInt8(1);
						m.writeGuid(PROP_ID);
					},
					(b) => b.writeFString("x")
				);
			})
		);
		expect(props.get("Count")).toEqual({ type: PropertyType.Int, id: null, value: -5 });
		expect(props.get("Ratio")).toEqual({ type: PropertyType.Float, id: null, value: 1.5 });
		expect(props.get("Precise")).toEqual({ type: PropertyType.Double, id: null, value: 0.1 });
		expect(props.get("Small")).toEqual({ type: PropertyType.UInt16, id: null, value: 65535 });
		expect(props.get("Big")).toEqual({ type: PropertyType.Int64, id: null, value: -9n });
		expect(props.get("Huge")).toEqual({ type: PropertyType.UInt64, id: null, value: 18446744073709551615n });
		expect(props.get("Label")).toEqual({ type: PropertyType.Str, id: null, value: "abc" });
		expect(props.get("Tag")).toEqual({ type: PropertyType.Name, id: PROP_ID, value: "x" });
		expect([...props.keys()]).toEqual(["Count", "Ratio", "Precise", "Small", "Big", "Huge", "Label", "Tag"]);
	});

	it("reads the bool value before the GUID with size 0", () => {
		const bytes = archive((w) => {
			property(
				w,
				"Flag",
				"BoolProperty",
				(m) => {
					m.writeUInt8(1);
					m.writeUInt8(1);
					m.writeGuid(PROP_ID);
				},
				() => {}
			);
			property(w, "Off", "BoolProperty", (m) => m.writeBytes(Buffer.from([0, 0])), () => {});
		});
		const props = readAndRewrite(bytes);
		expect(props.get("Flag")).toEqual({ type: PropertyType.Bool, id: PROP_ID, value: true });
		expect(props.get("Off")).toEqual({ type: PropertyType.Bool, id: null, value: false });
	});

	it("reads enums and both byte forms", () => {
		const props = readAndRewrite(
			archive((w) => {
				property(w, "Mode", "EnumProperty", tagMeta("EMode"), (b) => b.writeFString("EMode::Fast"));
				property(w, "Level", "ByteProperty", tagMeta("None"), (b) => b.writeUInt8(7));
				property(w, "Kind", "ByteProperty", tagMeta("EKind"), (b) => b.writeFString("EKind::B"));
			})
		);
		expect(props.get("Mode")).toEqual({ type: PropertyType.Enum, enumType: "EMode", id: null, value: "EMode::Fast" });
		expect(props.get("Level")).toEqual({ type: PropertyType.Byte, enumType: "None", id: null, value: 7 });
		expect(props.get("Kind")).toEqual({ type: PropertyType.Byte, enumType: "EKind", id: null, value: "EKind::B" });
	});

	it("reads soft object paths", () => {
		const props = readAndRewrite(
			archive((w) =>
				property(w, "Ref", "SoftObjectProperty", noId, (b) => {
					b.writeFString("/Game/Test.Asset");
					b.writeFString("");
				})
			)
		);
		expect(props.get("Ref")).toEqual({ type: PropertyType.SoftObject, id: null, value: { path: "/Game/Test.Asset", subPath: "" } });
	});
});

describe("GvasReader structs", () => {
	it("reads fixed layouts", () => {
		const props = readAndRewrite(
			archive((w) => {
				property(w, "Pos", "StructProperty", structMeta("Vector"), (b) => {
					b.writeDouble(1);
					b.writeDouble(2);
					b.writeDouble(3);
				});
				property(w, "Tint", "StructProperty", structMeta("Color"), (b) => b.writeBytes(Buffer.from([10, 20, 30, 40])));
				property(w, "Cell", "StructProperty", structMeta("IntPoint"), (b) => {
					b.writeInt32(-1);
					b.writeInt32(2);
				});
				property(w, "When", "StructProperty", structMeta("DateTime"), (b) => b.writeUInt64(42n));
				property(w, "Id", "StructProperty", structMeta("Guid"), (b) => b.writeGuid(KEY_ID));
			})
		);
		expect(props.get("Pos")).toEqual({
			type: PropertyType.Struct,
			structType: "Vector",
			structId: EMPTY_GUID,
			id: null,
			value: { kind: "vector", x: 1, y: 2, z: 3 }
		});
		const tint = props.get("Tint");
		expect(tint?.type === PropertyType.Struct && tint.value).toEqual({ kind: "color", r: 30, g: 20, b: 10, a: 40 });
		const cell = props.get("Cell");
		expect(cell?.type === PropertyType.Struct && cell.value).toEqual({ kind: "vector2", x: -1, y: 2 });
		const when = props.get("When");
		expect(when?.type === PropertyType.Struct && when.value).toEqual({ kind: "ticks", value: 42n });
		const id = props.get("Id");
		expect(id?.type === PropertyType.Struct && id.value).toEqual({ kind: "guid", value: KEY_ID });
	});

	it("reads unknown struct types as nested scopes", () => {
		const props = readAndRewrite(
			archive((w) =>
				property(w, "Inner", "StructProperty", structMeta("TestInner"), (b) =>
					b.writeBytes(scope((s) => property(s, "Level", "IntProperty", noId, (v) => v.writeInt32(4))))
				)
			)
		);
		expect(props.get("Inner")).toEqual({
			type: PropertyType.Struct,
			structType: "TestInner",
			structId: EMPTY_GUID,
			id: null,
			value: { kind: "properties", properties: new Map([["Level", { type: PropertyType.Int, id: null, value: 4 }]]) }
		});
	});
});

describe("GvasReader arrays", () => {
	it("reads plain element arrays", () => {
		const props = readAndRewrite(
			archive((w) =>
				property(w, "Nums", "ArrayProperty", tagMeta("IntProperty"), (b) => {
					b.writeUInt32(3);
					b.writeInt32(1);
					b.writeInt32(2);
					b.writeInt32(3);
				})
			)
		);
		expect(props.get("Nums")).toEqual({ type: PropertyType.Array, arrayType: "IntProperty", id: null, value: { kind: "elements", values: [1, 2, 3] } });
	});

	it("keeps byte arrays as blobs when size is count + 4", () => {
		const props = readAndRewrite(
			archive((w) => {
				property(w, "Blob", "ArrayProperty", tagMeta("ByteProperty"), (b) => {
					b.writeUInt32(3);
					b.writeBytes(Buffer.from([9, 8, 7]));
				});
				property(w, "Odd", "ArrayProperty", tagMeta("ByteProperty"), (b) => {
					b.writeUInt32(1);
					b.writeBytes(Buffer.from([5, 6]));
				});
			})
		);
		const blob = props.get("Blob");
		expect(blob?.type === PropertyType.Array && blob.value).toEqual({ kind: "bytes", bytes: Buffer.from([9, 8, 7]) });
		const odd = props.get("Odd");
		expect(odd?.type === PropertyType.Array && odd.value).toEqual({ kind: "raw", count: 1, bytes: Buffer.from([5, 6]) });
	});

	it("keeps arrays of unsupported element types raw", () => {
		const props = readAndRewrite(
			archive((w) =>
				property(w, "Texts", "ArrayProperty", tagMeta("TextProperty"), (b) => {
					b.writeUInt32(2);
					b.writeBytes(Buffer.from([1, 2, 3]));
				})
			)
		);
		const texts = props.get("Texts");
		expect(texts?.type === PropertyType.Array && texts.value).toEqual({ kind: "raw", count: 2, bytes: Buffer.from([1, 2, 3]) });
	});

	it("reads struct arrays with their inner header", () => {
		const props = readAndRewrite(
			archive((w) =>
				property(w, "Points", "ArrayProperty", tagMeta("StructProperty"), (b) => {
					b.writeUInt32(2);
					b.writeFString("Points");
					b.writeFString("StructProperty");
					b.writeSize(32);
					b.writeFString("Vector2D");
					b.writeGuid(EMPTY_GUID);
					b.writeUInt8(0);
					for (const v of [1, 2, 3, 4]) b.writeDouble(v);
				})
			)
		);
		const points = props.get("Points");
		expect(points?.type === PropertyType.Array && points.value).toEqual({
			kind: "structs",
			header: { propName: "Points", propType: "StructProperty", structType: "Vector2D", structId: EMPTY_GUID, extraId: null },
			values: [
				{ kind: "vector2", x: 1, y: 2 },
				{ kind: "vector2", x: 3, y: 4 }
			]
		});
	});

	it("rejects a struct array whose byte length does not match", () => {
		const bytes = archive((w) =>
			property(w, "Points", "ArrayProperty", tagMeta("StructProperty"), (b) => {
				b.writeUInt32(1);
				b.writeFString("Points");
				b.writeFString("StructProperty");
				b.writeSize(20);
				b.writeFString("Vector2D");
				b.writeGuid(EMPTY_GUID);
				b.writeUInt8(0);
				b.writeDouble(1);
				b.writeDouble(2);
			})
		);
		expect(() => readGvas(bytes)).toThrow("Size mismatch at .Points[]: declared 20, read 16");
	});

	it("decodes character records where the policy asks for it", () => {
		const policy = new PathPolicy([{ pattern: "RawData", rule: { action: "domain", decoder: DomainDecoder.CharacterRecord } }]);
		const inner = scope((s) => property(s, "Level", "IntProperty", noId, (v) => v.writeInt32(4)));
		const props = readAndRewrite(
			archive((w) =>
				property(w, "RawData", "ArrayProperty", tagMeta("ByteProperty"), (b) => {
					b.writeUInt32(inner.length);
					b.writeBytes(inner);
				})
			),
			policy
		);
		const raw = props.get("RawData");
		expect(raw?.type === PropertyType.Array && raw.value).toEqual({
			kind: "character",
			record: {
				properties: new Map([["Level", { type: PropertyType.Int, id: null, value: 4 }]]),
				reserved: Buffer.alloc(0),
				groupId: null,
				trailer: Buffer.alloc(0)
			}
		});
	});

	it("keeps undecodable character records as bytes", () => {
		const policy = new PathPolicy([{ pattern: "RawData", rule: { action: "domain", decoder: DomainDecoder.CharacterRecord } }]);
		const props = readAndRewrite(
			archive((w) =>
				property(w, "RawData", "ArrayProperty", tagMeta("ByteProperty"), (b) => {
					b.writeUInt32(3);
					b.writeBytes(Buffer.from([1, 2, 3]));
				})
			),
			policy
		);
		const raw = props.get("RawData");
		expect(raw?.type === PropertyType.Array && raw.value).toEqual({ kind: "bytes", bytes: Buffer.from([1, 2, 3]) });
	});

	it("keeps undecodable group records as bytes", () => {
		const world = buildWorld(defaultWorld());
		const groups = findProperty(world.properties, "worldSaveData.GroupSaveDataMap");
		const rawData = groups?.type === PropertyType.Map ? structProperties(groups.entries[0].value)?.get("RawData") : undefined;
		if (rawData?.type !== PropertyType.Array) throw new Error("fixture without group RawData");
		rawData.value = { kind: "bytes", bytes: Buffer.from([1, 2, 3]) };
		const bytes = writeGvas(world);

		const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
		setLogLevel("warn");
		try {
			const tree = readGvas(bytes);
			const map = findProperty(tree.properties, "worldSaveData.GroupSaveDataMap");
			const decoded = map?.type === PropertyType.Map ? structProperties(map.entries[0].value)?.get("RawData") : undefined;
			expect(decoded?.type === PropertyType.Array && decoded.value).toEqual({ kind: "bytes", bytes: Buffer.from([1, 2, 3]) });
			expect(writeGvas(tree).equals(bytes)).toBe(true);
			expect(warnSpy).toHaveBeenCalledTimes(1);
			expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining(".worldSaveData.GroupSaveDataMap: EPalGroupType::Guild record too short (3 bytes)"));
			expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining("; keeping raw bytes"));
		} finally {
			setLogLevel("silent");
			warnSpy.mockRestore();
		}
	});
});

describe("GvasReader maps and sets", () => {
	it("uses the struct hint for GUID keys", () => {
		const policy = new PathPolicy([{ pattern: "Owners.Key", rule: { action: "structHint", structType: "Guid" } }]);
		const props = readAndRewrite(
			archive((w) =>
				property(w, "Owners", "MapProperty", tagMeta("StructProperty", "IntProperty"), (b) => {
					b.writeUInt32(0);
					b.writeUInt32(1);
					b.writeGuid(KEY_ID);
					b.writeInt32(5);
				})
			),
			policy
		);
		expect(props.get("Owners")).toEqual({
			type: PropertyType.Map,
			keyType: "StructProperty",
			valueType: "IntProperty",
			keyStructType: "Guid",
			valueStructType: "",
			id: null,
			reserved: 0,
			entries: [{ key: { kind: "guid", value: KEY_ID }, value: 5 }]
		});
	});

	it("reads struct values without hint as property scopes", () => {
		const value = scope((s) => property(s, "On", "BoolProperty", (m) => m.writeBytes(Buffer.from([1, 0])), () => {}));
		const props = readAndRewrite(
			archive((w) =>
				property(w, "Flags", "MapProperty", tagMeta("StrProperty", "StructProperty"), (b) => {
					b.writeUInt32(0);
					b.writeUInt32(1);
					b.writeFString("a");
					b.writeBytes(value);
				})
			)
		);
		const flags = props.get("Flags");
		expect(flags?.type === PropertyType.Map && flags.entries).toEqual([
			{ key: "a", value: { kind: "properties", properties: new Map([["On", { type: PropertyType.Bool, id: null, value: true }]]) } }
		]);
	});

	it("captures maps with unsupported element types raw", () => {
		const props = readAndRewrite(
			archive((w) =>
				property(w, "Texts", "MapProperty", tagMeta("TextProperty", "IntProperty"), (b) => b.writeBytes(Buffer.from([0, 0, 0, 0, 7])))
			)
		);
		expect(props.get("Texts")).toEqual({
			type: RAW,
			typeTag: "MapProperty",
			header: { kind: "map", keyType: "TextProperty", valueType: "IntProperty" },
			id: null,
			raw: Buffer.from([0, 0, 0, 0, 7])
		});
	});

	it("reads sets", () => {
		const props = readAndRewrite(
			archive((w) =>
				property(w, "Tags", "SetProperty", tagMeta("NameProperty"), (b) => {
					b.writeUInt32(0);
					b.writeUInt32(2);
					b.writeFString("a");
					b.writeFString("b");
				})
			)
		);
		expect(props.get("Tags")).toEqual({ type: PropertyType.Set, setType: "NameProperty", id: null, reserved: 0, elements: ["a", "b"] });
	});
});

describe("GvasReader raw capture", () => {
	it("keeps unknown property types with their GUID", () => {
		const props = readAndRewrite(
			archive((w) => {
				property(w, "Fixed", "FixedPoint64Property", noId, (b) => b.writeBytes(Buffer.from([1, 2, 3, 4, 5, 6, 7, 8])));
				property(
					w,
					"Title",
					"TextProperty",
					(m) => {
						m.writeUInt8(1);
						m.writeGuid(PROP_ID);
					},
					(b) => b.writeBytes(Buffer.from([0xff, 0, 0, 0, 0]))
				);
			})
		);
		expect(props.get("Fixed")).toEqual({ type: RAW, typeTag: "FixedPoint64Property", header: { kind: "plain" }, id: null, raw: Buffer.from([1, 2, 3, 4, 5, 6, 7, 8]) });
		expect(props.get("Title")).toEqual({ type: RAW, typeTag: "TextProperty", header: { kind: "plain" }, id: PROP_ID, raw: Buffer.from([0xff, 0, 0, 0, 0]) });
	});

	it("skips policy paths but still decodes bool, enum and byte", () => {
		const props = readAndRewrite(
			archive((w) => {
				property(w, "WorldLocation", "StructProperty", structMeta("Vector"), (b) => {
					b.writeDouble(1);
					b.writeDouble(2);
					b.writeDouble(3);
				});
				property(w, "WorkSaveData", "BoolProperty", (m) => m.writeBytes(Buffer.from([1, 0])), () => {});
				property(w, "EffectMap", "ByteProperty", tagMeta("None"), (b) => b.writeUInt8(3));
			})
		);
		const location = props.get("WorldLocation");
		expect(location?.type).toBe(RAW);
		expect(location?.type === RAW && location.header).toEqual({ kind: "struct", structType: "Vector", structId: EMPTY_GUID });
		expect(location?.type === RAW && location.raw.length).toBe(24);
		expect(props.get("WorkSaveData")).toEqual({ type: PropertyType.Bool, id: null, value: true });
		expect(props.get("EffectMap")).toEqual({ type: PropertyType.Byte, enumType: "None", id: null, value: 3 });
	});
});

describe("GvasReader errors", () => {
	it("rejects duplicate names in one scope", () => {
		const bytes = archive((w) => {
			property(w, "Count", "IntProperty", noId, (b) => b.writeInt32(1));
			property(w, "Count", "IntProperty", noId, (b) => b.writeInt32(2));
		});
		expect(() => readGvas(bytes)).toThrow("Duplicate property Count in <root>");
	});

	it("checks the declared size against what was read", () => {
		const bytes = archive((w) => {
			w.writeFString("Count");
			w.writeFString("IntProperty");
			w.writeSize(8);
			w.writeUInt8(0);
			w.writeInt32(1);
			w.writeInt32(2);
		});
		expect(() => readGvas(bytes)).toThrow(MalformedTreeError);
		expect(() => readGvas(bytes)).toThrow("Size mismatch at .Count: declared 8, read 4");
	});

	it("stops at the depth limit", () => {
		const bytes = archive((w) =>
			property(w, "Outer", "StructProperty", structMeta("TestOuter"), (b) =>
				b.writeBytes(
					scope((s) =>
						property(s, "Mid", "StructProperty", structMeta("TestMid"), (m) =>
							m.writeBytes(scope((t) => property(t, "Leaf", "IntProperty", noId, (v) => v.writeInt32(1))))
						)
					)
				)
			)
		);
		expect(() => readGvas(bytes, { maxDepth: 1 })).toThrow(DepthLimitError);
		expect(() => readGvas(bytes, { maxDepth: 1 })).toThrow("Nesting deeper than 1 at .Outer.Mid");
		expect(readGvas(bytes, { maxDepth: 2 }).properties.has("Outer")).toBe(true);
	});

	it("fails on truncated data", () => {
		const bytes = archive((w) => property(w, "Count", "IntProperty", noId, (b) => b.writeInt32(1)));
		expect(() => readGvas(bytes.subarray(0, bytes.length - 12))).toThrow(MalformedTreeError);
	});
});
