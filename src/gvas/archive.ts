/**
 * Primitive des GVAS-Archivs: Little-Endian-Zahlen, FString, GUIDs, Base64
 */

import { EncodeError, MalformedTreeError } from "../errors.js";
import type { Guid } from "./types.js";

const GUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * GUIDs liegen als 4 Little-Endian-u32 auf dem Draht; die Textform schreibt
 * jedes Wort big-endian: raw[3..0]-raw[7,6]-raw[5,4]-raw[11,10]-raw[9,8]raw[15..12]
 */
export function formatGuid(raw: Buffer): Guid {
	if (raw.length !== 16) {
		throw new RangeError(`GUID needs 16 bytes, got ${raw.length}`);
	}
	const hex = [raw.readUInt32LE(0), raw.readUInt32LE(4), raw.readUInt32LE(8), raw.readUInt32LE(12)].map((w) => w.toString(16).padStart(8, "0")).join("");
	return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

export function isGuid(value: string): boolean {
	return GUID_PATTERN.test(value);
}

/** Umkehrung von formatGuid; akzeptiert auch Großbuchstaben */
export function parseGuid(guid: string, path = ""): Buffer {
	const normalized = guid.toLowerCase();
	if (!GUID_PATTERN.test(normalized)) {
		throw new EncodeError(`Invalid GUID ${JSON.stringify(guid)}`, path);
	}
	const hex = normalized.replace(/-/g, "");
	const out = Buffer.alloc(16);
	for (let i = 0; i < 4; i++) {
		out.writeUInt32LE(parseInt(hex.slice(i * 8, i * 8 + 8), 16), i * 4);
	}
	return out;
}

export function encodeBase64(bytes: Buffer): string {
	return bytes.toString("base64");
}

/** Streng: Buffer.from(..., "base64") würde ungültige Zeichen still verwerfen */
export function decodeBase64(text: string): Buffer {
	const compact = text.replace(/\s+/g, "");
	if (!BASE64_PATTERN.test(compact)) {
		throw new RangeError("Invalid base64 payload");
	}
	return Buffer.from(compact, "base64");
}

export function isAscii(value: string): boolean {
	return /^[\x00-\x7f]*$/.test(value);
}

export class ArchiveReader {
	private buffer: Buffer;
	private offset: number;

	constructor(buffer: Buffer, offset = 0) {
		this.buffer = buffer;
		this.offset = offset;
	}

	get position(): number {
		return this.offset;
	}

	get remaining(): number {
		return this.buffer.length - this.offset;
	}

	get length(): number {
		return this.buffer.length;
	}

	fail(message: string): never {
		throw new MalformedTreeError(message, this.offset);
	}

	private ensure(count: number, what: string): void {
		if (count < 0 || this.offset + count > this.buffer.length) {
			this.fail(`Unexpected end of data reading ${what} (${count} bytes, ${this.remaining} left)`);
		}
	}

	readUInt8(): number {
		this.ensure(1, "u8");
		return this.buffer.readUInt8(this.offset++);
	}

	readUInt16(): number {
		this.ensure(2, "u16");
		const v = this.buffer.readUInt16LE(this.offset);
		this.offset += 2;
		return v;
	}

	readInt32(): number {
		this.ensure(4, "i32");
		const v = this.buffer.readInt32LE(this.offset);
		this.offset += 4;
		return v;
	}

	readUInt32(): number {
		this.ensure(4, "u32");
		const v = this.buffer.readUInt32LE(this.offset);
		this.offset += 4;
		return v;
	}

	readInt64(): bigint {
		this.ensure(8, "i64");
		const v = this.buffer.readBigInt64LE(this.offset);
		this.offset += 8;
		return v;
	}

	readUInt64(): bigint {
		this.ensure(8, "u64");
		const v = this.buffer.readBigUInt64LE(this.offset);
		this.offset += 8;
		return v;
	}

	readFloat(): number {
		this.ensure(4, "f32");
		const v = this.buffer.readFloatLE(this.offset);
		this.offset += 4;
		return v;
	}

	readDouble(): number {
		this.ensure(8, "f64");
		const v = this.buffer.readDoubleLE(this.offset);
		this.offset += 8;
		return v;
	}

	/** Kopie, damit der Baum nicht am dekomprimierten Puffer hängt */
	readBytes(count: number): Buffer {
		this.ensure(count, "bytes");
		const out = Buffer.from(this.buffer.subarray(this.offset, this.offset + count));
		this.offset += count;
		return out;
	}

	readRest(): Buffer {
		return this.readBytes(this.remaining);
	}

	/** Property-Größen sind u64; alles > MAX_SAFE_INTEGER ist sowieso kaputt */
	readSize(): number {
		const start = this.offset;
		const size = this.readUInt64();
		if (size > BigInt(Number.MAX_SAFE_INTEGER)) {
			throw new MalformedTreeError(`Property size ${size} out of range`, start);
		}
		return Number(size);
	}

	readFString(): string {
		const start = this.offset;
		const size = this.readInt32();
		if (size === 0) return "";
		if (size > 0) {
			if (size > this.remaining) {
				throw new MalformedTreeError(`Invalid string length ${size}`, start);
			}
			const bytes = this.buffer.subarray(this.offset, this.offset + size);
			this.offset += size;
			const end = bytes[size - 1] === 0 ? size - 1 : size;
			return bytes.toString("latin1", 0, end);
		}
		const units = -size;
		if (units * 2 > this.remaining) {
			throw new MalformedTreeError(`Invalid string length ${size}`, start);
		}
		const bytes = this.buffer.subarray(this.offset, this.offset + units * 2);
		this.offset += units * 2;
		const end = bytes.readUInt16LE(bytes.length - 2) === 0 ? bytes.length - 2 : bytes.length;
		return bytes.toString("utf16le", 0, end);
	}

	readGuid(): Guid {
		this.ensure(16, "GUID");
		const guid = formatGuid(this.buffer.subarray(this.offset, this.offset + 16));
		this.offset += 16;
		return guid;
	}

	readOptionalGuid(): Guid | null {
		return this.readUInt8() !== 0 ? this.readGuid() : null;
	}
}

/** Sammelt Chunks und verbindet sie erst bei toBuffer() */
export class ArchiveWriter {
	private chunks: Buffer[] = [];
	private size = 0;

	get length(): number {
		return this.size;
	}

	writeBytes(bytes: Buffer): void {
		this.chunks.push(bytes);
		this.size += bytes.length;
	}

	private scalar(byteLength: number, write: (buf: Buffer) => void): void {
		const buf = Buffer.alloc(byteLength);
		write(buf);
		this.writeBytes(buf);
	}

	writeUInt8(value: number): void {
		this.scalar(1, (b) => b.writeUInt8(value, 0));
	}

	writeUInt16(value: number): void {
		this.scalar(2, (b) => b.writeUInt16LE(value, 0));
	}

	writeInt32(value: number): void {
		this.scalar(4, (b) => b.writeInt32LE(value, 0));
	}

	writeUInt32(value: number): void {
		this.scalar(4, (b) => b.writeUInt32LE(value, 0));
	}

	writeInt64(value: bigint): void {
		this.scalar(8, (b) => b.writeBigInt64LE(value, 0));
	}

	writeUInt64(value: bigint): void {
		this.scalar(8, (b) => b.writeBigUInt64LE(value, 0));
	}

	writeFloat(value: number): void {
		this.scalar(4, (b) => b.writeFloatLE(value, 0));
	}

	writeDouble(value: number): void {
		this.scalar(8, (b) => b.writeDoubleLE(value, 0));
	}

	writeSize(size: number): void {
		this.writeUInt64(BigInt(size));
	}

	/** ASCII → positive Länge, sonst UTF-16LE mit negativer Länge; jeweils inkl. NUL */
	writeFString(value: string): void {
		if (value.length === 0) {
			this.writeInt32(0);
			return;
		}
		if (isAscii(value)) {
			this.writeInt32(value.length + 1);
			this.writeBytes(Buffer.from(`${value}\0`, "latin1"));
			return;
		}
		this.writeInt32(-(value.length + 1));
		this.writeBytes(Buffer.from(`${value}\0`, "utf16le"));
	}

	writeGuid(guid: Guid, path = ""): void {
		this.writeBytes(parseGuid(guid, path));
	}

	writeOptionalGuid(guid: Guid | null, path = ""): void {
		if (guid === null) {
			this.writeUInt8(0);
			return;
		}
		this.writeUInt8(1);
		this.writeGuid(guid, path);
	}

	toBuffer(): Buffer {
		if (this.chunks.length !== 1) {
			this.chunks = [Buffer.concat(this.chunks, this.size)];
		}
		return this.chunks[0] ?? Buffer.alloc(0);
	}
}
