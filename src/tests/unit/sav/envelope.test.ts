import { deflateSync } from "node:zlib";
import { beforeAll, describe, expect, it } from "vitest";
import { compressSav, decompressSav, readSavHeader } from "../../../sav/envelope.js";
import type { OodleDecoder } from "../../../sav/oodle.js";
import { SaveType, parseSaveType } from "../../../sav/types.js";
import { DecompressionError, EnvelopeError } from "../../../errors.js";
import { setLogLevel } from "../../../logger.js";

const gvas = Buffer.concat([Buffer.from("GVAS", "latin1"), Buffer.from([1, 2, 3, 4, 5, 6])]);

function header(uncompressedSize: number, compressedSize: number, magic: string, saveType: number): Buffer {
	const h = Buffer.alloc(12);
	h.writeUInt32LE(uncompressedSize, 0);
	h.writeUInt32LE(compressedSize, 4);
	h.write(magic, 8, "latin1");
	h.writeUInt8(saveType, 11);
	return h;
}

class StubOodle implements OodleDecoder {
	calls: { compData: Buffer; rawSize: number }[] = [];

	constructor(private result: Buffer | null) {}

	decompress(compData: Buffer, rawSize: number): Buffer | null {
		this.calls.push({ compData: Buffer.from(compData), rawSize });
		return this.result;
	}
}

beforeAll(() => setLogLevel("silent"));

describe("compressSav / decompressSav", () => {
	it("writes double zlib with the first pass length in the header", () => {
		const out = compressSav(gvas, SaveType.DoubleZlib);
		expect(out.readUInt32LE(0)).toBe(gvas.length);
		expect(out.readUInt32LE(4)).toBe(deflateSync(gvas).length);
		expect(out.toString("latin1", 8, 11)).toBe("PlZ");
		expect(out[11]).toBe(0x32);

		const { gvas: back, saveType } = decompressSav(out);
		expect(saveType).toBe(SaveType.DoubleZlib);
		expect(back.equals(gvas)).toBe(true);
	});

	it("writes single zlib for 0x30", () => {
		const out = compressSav(gvas, SaveType.Zlib);
		expect(out[11]).toBe(0x30);
		expect(out.subarray(12).equals(deflateSync(gvas))).toBe(true);
		expect(decompressSav(out).gvas.equals(gvas)).toBe(true);
	});

	it("downgrades Oodle to double zlib on write", () => {
		const out = compressSav(gvas, SaveType.Oodle);
		expect(out.toString("latin1", 8, 11)).toBe("PlZ");
		expect(out[11]).toBe(0x32);
	});

	it("rejects unknown save types on write", () => {
		expect(() => compressSav(gvas, 0x40)).toThrow(EnvelopeError);
	});

	it("unwraps a CNK header", () => {
		const payload = deflateSync(gvas);
		const data = Buffer.concat([header(0, 0, "CNK", 0), header(gvas.length, payload.length, "PlZ", 0x30), payload]);
		const h = readSavHeader(data);
		expect(h.wrapped).toBe(true);
		expect(h.dataOffset).toBe(24);
		expect(h.magic).toBe("PlZ");
		expect(decompressSav(data).gvas.equals(gvas)).toBe(true);
	});

	it("drops the CNK wrapper on write", () => {
		const payload = deflateSync(gvas);
		const data = Buffer.concat([header(0, 0, "CNK", 0), header(gvas.length, payload.length, "PlZ", 0x30), payload]);
		const { gvas: inner, saveType } = decompressSav(data);
		const out = compressSav(inner, saveType);
		expect(out.equals(Buffer.concat([header(gvas.length, payload.length, "PlZ", 0x30), payload]))).toBe(true);
		expect(readSavHeader(out).wrapped).toBe(false);
	});

	it("only warns when the announced size differs", () => {
		const payload = deflateSync(gvas);
		const data = Buffer.concat([header(999, payload.length, "PlZ", 0x30), payload]);
		expect(decompressSav(data).gvas.equals(gvas)).toBe(true);
	});
});

describe("envelope errors", () => {
	it("rejects data shorter than a header", () => {
		expect(() => decompressSav(Buffer.from([1, 2, 3]))).toThrow(EnvelopeError);
		expect(() => decompressSav(header(0, 0, "CNK", 0))).toThrow(EnvelopeError);
	});

	it("rejects a wrong magic", () => {
		expect(() => decompressSav(header(1, 1, "XYZ", 0x32))).toThrow('Invalid save magic: "XYZ"');
	});

	it("rejects an unknown save type", () => {
		expect(() => decompressSav(header(1, 1, "PlZ", 0x33))).toThrow("Unknown save type: 0x33");
	});

	it("wraps zlib failures", () => {
		const data = Buffer.concat([header(4, 4, "PlZ", 0x30), Buffer.from([1, 2, 3, 4])]);
		expect(() => decompressSav(data)).toThrow(DecompressionError);
	});
});

describe("Oodle (PlM)", () => {
	it("passes only compressedSize bytes to the decoder", () => {
		const stub = new StubOodle(gvas);
		const data = Buffer.concat([header(gvas.length, 3, "PlM", 0x31), Buffer.from([9, 9, 9, 7, 7])]);
		const out = decompressSav(data, { oodle: stub });
		expect(out.saveType).toBe(SaveType.Oodle);
		expect(out.gvas.equals(gvas)).toBe(true);
		expect(stub.calls).toHaveLength(1);
		expect([...stub.calls[0].compData]).toEqual([9, 9, 9]);
		expect(stub.calls[0].rawSize).toBe(gvas.length);
	});

	it("passes the whole payload when compressedSize is out of range", () => {
		const stub = new StubOodle(gvas);
		const data = Buffer.concat([header(gvas.length, 50, "PlM", 0x31), Buffer.from([9, 9, 9, 7, 7])]);
		decompressSav(data, { oodle: stub });
		expect([...stub.calls[0].compData]).toEqual([9, 9, 9, 7, 7]);
	});

	it("needs a decoder", () => {
		const data = Buffer.concat([header(gvas.length, 1, "PlM", 0x31), Buffer.from([9])]);
		expect(() => decompressSav(data)).toThrow(DecompressionError);
	});

	it("fails when the decoder fails or returns no GVAS archive", () => {
		const data = Buffer.concat([header(gvas.length, 1, "PlM", 0x31), Buffer.from([9])]);
		expect(() => decompressSav(data, { oodle: new StubOodle(null) })).toThrow("Oodle decompression failed");
		expect(() => decompressSav(data, { oodle: new StubOodle(Buffer.from("NOPE")) })).toThrow("Oodle output is not a GVAS archive");
	});
});

describe("parseSaveType", () => {
	it("maps CLI names", () => {
		expect(parseSaveType("plz")).toBe(SaveType.DoubleZlib);
		expect(parseSaveType("ZLIB")).toBe(SaveType.Zlib);
		expect(parseSaveType("oodle")).toBeNull();
	});
});
