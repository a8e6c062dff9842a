/**
 * .sav Envelope lesen/schreiben
 *
 * decompressSav: Header (ggf. hinter CNK-Wrapper) → GVAS-Bytes + SaveType
 * compressSav:   GVAS-Bytes → PlZ-Datei (0x32 doppelt, 0x30 einfach)
 */

import { EnvelopeError, DecompressionError } from "../errors.js";
import { warn } from "../logger.js";
import { compressDoubleZlib, compressZlib, decompressDoubleZlib, decompressZlib } from "./compression.js";
import type { OodleDecoder } from "./oodle.js";
import { CNK_HEADER_SIZE, GVAS_MAGIC, MAGIC_CNK, MAGIC_PLM, MAGIC_PLZ, SAV_HEADER_SIZE, SaveType, isSaveType } from "./types.js";
import type { SavHeader } from "./types.js";

export interface DecompressOptions {
	/** nur für PlM (0x31) nötig */
	oodle?: OodleDecoder | null;
}

export interface DecompressedSav {
	gvas: Buffer;
	saveType: SaveType;
	header: SavHeader;
}

function readHeaderAt(data: Buffer, offset: number): { uncompressedSize: number; compressedSize: number; magic: string; saveType: number } {
	return {
		uncompressedSize: data.readUInt32LE(offset),
		compressedSize: data.readUInt32LE(offset + 4),
		magic: data.toString("latin1", offset + 8, offset + 11),
		saveType: data.readUInt8(offset + 11)
	};
}

export function readSavHeader(data: Buffer): SavHeader {
	if (data.length < SAV_HEADER_SIZE) {
		throw new EnvelopeError(`File too short for a save header: ${data.length} bytes`);
	}
	const outer = readHeaderAt(data, 0);
	if (outer.magic === MAGIC_CNK) {
		if (data.length < CNK_HEADER_SIZE) {
			throw new EnvelopeError(`File too short for a CNK header: ${data.length} bytes`);
		}
		const inner = readHeaderAt(data, SAV_HEADER_SIZE);
		return { ...inner, wrapped: true, dataOffset: CNK_HEADER_SIZE };
	}
	return { ...outer, wrapped: false, dataOffset: SAV_HEADER_SIZE };
}

function checkGvasMagic(gvas: Buffer, stage: string): void {
	if (gvas.length < 4 || gvas.toString("latin1", 0, 4) !== GVAS_MAGIC) {
		throw new DecompressionError(`${stage} output is not a GVAS archive`);
	}
}

export function decompressSav(data: Buffer, options: DecompressOptions = {}): DecompressedSav {
	const header = readSavHeader(data);
	if (header.magic !== MAGIC_PLZ && header.magic !== MAGIC_PLM) {
		throw new EnvelopeError(`Invalid save magic: ${JSON.stringify(header.magic)}`);
	}
	if (!isSaveType(header.saveType)) {
		throw new EnvelopeError(`Unknown save type: 0x${header.saveType.toString(16).padStart(2, "0")}`);
	}
	const payload = data.subarray(header.dataOffset);
	const saveType = header.saveType;

	let gvas: Buffer;
	switch (saveType) {
		case SaveType.DoubleZlib:
			gvas = decompressDoubleZlib(payload);
			break;
		case SaveType.Zlib:
			gvas = decompressZlib(payload);
			break;
		case SaveType.Oodle: {
			const oodle = options.oodle;
			if (!oodle) {
				throw new DecompressionError("Oodle-compressed save (PlM) needs an Oodle library: set GVAS_OODLE_LIB or pass --oodle");
			}
			// compressedSize kann fehlen (0) oder größer als der Rest sein → ganzer Rest
			const comp = header.compressedSize > 0 && header.compressedSize <= payload.length ? payload.subarray(0, header.compressedSize) : payload;
			const out = oodle.decompress(comp, header.uncompressedSize);
			if (!out) {
				throw new DecompressionError(`Oodle decompression failed (${comp.length} → ${header.uncompressedSize} bytes)`);
			}
			checkGvasMagic(out, "Oodle");
			gvas = out;
			break;
		}
	}

	if (gvas.length !== header.uncompressedSize) {
		warn(`Save header announces ${header.uncompressedSize} bytes, got ${gvas.length}`);
	}
	return { gvas, saveType, header };
}

function buildHeader(uncompressedSize: number, compressedSize: number, saveType: SaveType): Buffer {
	const header = Buffer.alloc(SAV_HEADER_SIZE);
	header.writeUInt32LE(uncompressedSize, 0);
	header.writeUInt32LE(compressedSize, 4);
	header.write(MAGIC_PLZ, 8, "latin1");
	header.writeUInt8(saveType, 11);
	return header;
}

/**
 * Schreibt immer einen einfachen 12-Byte-PlZ-Header.
 * PlM kann nicht geschrieben werden und wird zu PlZ (0x32); ein CNK-Wrapper
 * aus decompressSav (header.wrapped) wird nicht wieder erzeugt.
 */
export function compressSav(gvas: Buffer, saveType: number): Buffer {
	switch (saveType) {
		case SaveType.Oodle:
			warn("Oodle (PlM) cannot be written, saving as double-zlib PlZ");
			return compressSav(gvas, SaveType.DoubleZlib);
		case SaveType.DoubleZlib: {
			const { first, second } = compressDoubleZlib(gvas);
			return Buffer.concat([buildHeader(gvas.length, first.length, SaveType.DoubleZlib), second]);
		}
		case SaveType.Zlib: {
			const compressed = compressZlib(gvas);
			return Buffer.concat([buildHeader(gvas.length, compressed.length, SaveType.Zlib), compressed]);
		}
		default:
			throw new EnvelopeError(`Cannot write save type 0x${saveType.toString(16).padStart(2, "0")}`);
	}
}
