/**
 * zlib-Stufen der .sav-Envelopes (PlZ): einfach (0x30) oder doppelt (0x32)
 */

import { inflateSync, deflateSync } from "node:zlib";
import { DecompressionError } from "../errors.js";

export function decompressZlib(compressed: Buffer, stage = "zlib"): Buffer {
	try {
		return inflateSync(compressed);
	} catch (err) {
		throw new DecompressionError(`${stage} decompression failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
	}
}

export function compressZlib(data: Buffer): Buffer {
	return deflateSync(data);
}

/** Zwei Durchläufe (0x32) */
export function decompressDoubleZlib(compressed: Buffer): Buffer {
	const first = decompressZlib(compressed, "zlib pass 1");
	return decompressZlib(first, "zlib pass 2");
}

/** `first.length` landet im compressedSize-Feld des Headers */
export function compressDoubleZlib(data: Buffer): { first: Buffer; second: Buffer } {
	const first = deflateSync(data);
	return { first, second: deflateSync(first) };
}
