/**
 * .sav ↔ Property-Baum: Envelope + GVAS in einem Schritt
 */

import { readFileSync, writeFileSync } from "node:fs";
import { decompressSav, compressSav } from "./sav/envelope.js";
import type { OodleDecoder } from "./sav/oodle.js";
import type { SaveType } from "./sav/types.js";
import { GvasReader } from "./gvas/reader.js";
import type { GvasReadOptions } from "./gvas/reader.js";
import { GvasWriter } from "./gvas/writer.js";
import type { GvasWriteOptions } from "./gvas/writer.js";
import type { SaveTree } from "./gvas/types.js";

export interface DecodeOptions extends GvasReadOptions {
	oodle?: OodleDecoder | null;
}

export interface DecodedSave {
	tree: SaveTree;
	saveType: SaveType;
}

export function decodeSave(data: Buffer, options: DecodeOptions = {}): DecodedSave {
	const { gvas, saveType } = decompressSav(data, { oodle: options.oodle });
	const tree = new GvasReader(gvas, options).read();
	return { tree, saveType };
}

/** Oodle-Saves werden als PlZ (0x32) geschrieben */
export function encodeSave(tree: SaveTree, saveType: SaveType, options: GvasWriteOptions = {}): Buffer {
	const gvas = new GvasWriter(options).write(tree);
	return compressSav(gvas, saveType);
}

export interface RoundtripResult {
	saveType: SaveType;
	/** GVAS-Bytes nach decode → encode identisch */
	gvasIdentical: boolean;
	/** Archiv nach decode → encode → decode identisch (Envelope neu komprimiert) */
	stable: boolean;
	originalSize: number;
	reencodedSize: number;
}

export function verifyRoundtrip(data: Buffer, options: DecodeOptions = {}): RoundtripResult {
	const { gvas, saveType } = decompressSav(data, { oodle: options.oodle });
	const tree = new GvasReader(gvas, options).read();
	const rewritten = new GvasWriter(options).write(tree);
	const archive = compressSav(rewritten, saveType);
	const again = decompressSav(archive).gvas;
	return {
		saveType,
		gvasIdentical: gvas.equals(rewritten),
		stable: again.equals(rewritten),
		originalSize: gvas.length,
		reencodedSize: rewritten.length
	};
}

export function readSave(pathOrBuffer: string | Buffer, options?: DecodeOptions): DecodedSave {
	const data = Buffer.isBuffer(pathOrBuffer) ? pathOrBuffer : readFileSync(pathOrBuffer);
	return decodeSave(data, options);
}

export function writeSave(outputPath: string, tree: SaveTree, saveType: SaveType, options?: GvasWriteOptions): void {
	writeFileSync(outputPath, encodeSave(tree, saveType, options));
}
