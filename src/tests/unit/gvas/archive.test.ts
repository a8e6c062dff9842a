import { describe, expect, it } from "vitest";
import { ArchiveReader, ArchiveWriter, decodeBase64, encodeBase64, formatGuid, isGuid, parseGuid } from "../../../gvas/archive.js";
import { EncodeError, MalformedTreeError } from "../../../errors.js";

function written(build: (w: ArchiveWriter) => void): number[] {
	const w = new ArchiveWriter();
	build(w);
	return [...w.toBuffer()];
}

describe("FString", () => {
	it("writes ASCII with positive length and NUL", () => {
		expect(written((w) => w.writeFString("abc"))).toEqual([4, 0, 0, 0, 0x61, 0x62, 0x63, 0]);
	});

	it("writes the empty string as length 0 without terminator", () => {
		expect(written((w) => w.writeFString(""))).toEqual([0, 0, 0, 0]);
	});

	it("writes non-ASCII as UTF-16LE with negative length", () => {
		expect(written((w) => w.writeFString("ä"))).toEqual([0xfe, 0xff, 0xff, 0xff, 0xe4, 0x00, 0x00, 0x00]);
	});

	it("reads both encodings back", () => {
		const r = new ArchiveReader(Buffer.from([4, 0, 0, 0, 0x61, 0x62, 0x63, 0, 0xfe, 0xff, 0xff, 0xff, 0xe4, 0x00, 0x00, 0x00]));
		expect(r.readFString()).toBe("abc");
		expect(r.readFString()).toBe("ä");
		expect(r.remaining).toBe(0);
	});

	it("reads positive-length strings as latin1", () => {
		expect(new ArchiveReader(Buffer.from([2, 0, 0, 0, 0xe9, 0])).readFString()).toBe("é");
	});

	it("rejects a length past the end of the data", () => {
		const r = new ArchiveReader(Buffer.from([0x10, 0, 0, 0, 0x41]));
		expect(() => r.readFString()).toThrow(MalformedTreeError);
		expect(() => new ArchiveReader(Buffer.from([0x10, 0, 0, 0, 0x41])).readFString()).toThrow("Invalid string length 16 (offset 0)");
	});
});

describe("GUID", () => {
	const raw = Buffer.from([0x00, 0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08, 0x09, 0x0a, 0x0b, 0x0c, 0x0d, 0x0e, 0x0f]);

	it("formats four little-endian words", () => {
		expect(formatGuid(raw)).toBe("03020100-0706-0504-0b0a-09080f0e0d0c");
	});

	it("parses the text form back to the wire bytes", () => {
		expect(parseGuid("03020100-0706-0504-0b0a-09080f0e0d0c").equals(raw)).toBe(true);
		expect(parseGuid("03020100-0706-0504-0B0A-09080F0E0D0C").equals(raw)).toBe(true);
	});

	it("rejects malformed GUIDs with the property path", () => {
		expect(() => parseGuid("not-a-guid", ".Owner")).toThrow(EncodeError);
		expect(() => parseGuid("not-a-guid", ".Owner")).toThrow('Invalid GUID "not-a-guid" at .Owner');
		expect(isGuid("03020100-0706-0504-0b0a-09080f0e0d0c")).toBe(true);
		expect(isGuid("03020100070605040b0a09080f0e0d0c")).toBe(false);
	});

	it("reads an optional GUID", () => {
		const r = new ArchiveReader(Buffer.concat([Buffer.from([0, 1]), raw]));
		expect(r.readOptionalGuid()).toBeNull();
		expect(r.readOptionalGuid()).toBe("03020100-0706-0504-0b0a-09080f0e0d0c");
	});
});

describe("numbers", () => {
	it("reads sizes as u64", () => {
		expect(new ArchiveReader(Buffer.from([8, 0, 0, 0, 0, 0, 0, 0])).readSize()).toBe(8);
	});

	it("rejects sizes beyond the safe integer range", () => {
		expect(() => new ArchiveReader(Buffer.alloc(8, 0xff)).readSize()).toThrow(MalformedTreeError);
	});

	it("reports the offset on truncated data", () => {
		const r = new ArchiveReader(Buffer.from([1, 2, 3]), 1);
		expect(() => r.readInt32()).toThrow("Unexpected end of data reading i32 (4 bytes, 2 left) (offset 1)");
	});

	it("writes little-endian scalars", () => {
		expect(written((w) => w.writeInt32(-2))).toEqual([0xfe, 0xff, 0xff, 0xff]);
		expect(written((w) => w.writeUInt16(0x0102))).toEqual([0x02, 0x01]);
		expect(written((w) => w.writeInt64(-1n))).toEqual([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
	});
});

describe("base64", () => {
	it("round trips bytes", () => {
		const bytes = Buffer.from([0, 255, 1, 2]);
		expect(encodeBase64(bytes)).toBe("AP8BAg==");
		expect(decodeBase64("AP8BAg==").equals(bytes)).toBe(true);
	});

	it("rejects invalid characters instead of dropping them", () => {
		expect(() => decodeBase64("AP8$Ag==")).toThrow(RangeError);
		expect(() => decodeBase64("AP8")).toThrow(RangeError);
	});

	it("accepts the empty payload", () => {
		expect(decodeBase64("").length).toBe(0);
	});
});
