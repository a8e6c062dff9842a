/**
 * Oodle-Dekompression (PlM-Saves, nur lesen)
 *
 * Ruft OodleLZ_Decompress per koffi aus einer lokalen oo2core-Bibliothek auf
 * (oo2core_9_win64.dll / liboo2corelinux64.so). Die Bibliothek ist nicht
 * redistributierbar, der Pfad kommt aus GVAS_OODLE_LIB oder --oodle.
 * Einen Encoder gibt es nicht: PlM wird beim Schreiben zu PlZ.
 */

import { createRequire } from "node:module";
import { DecompressionError } from "../errors.js";

const require = createRequire(import.meta.url);

/** Alles, was decompressSav von einem Oodle-Decoder braucht */
export interface OodleDecoder {
	decompress(compData: Buffer, rawSize: number): Buffer | null;
}

type Koffi = typeof import("koffi");
type KoffiLibrary = ReturnType<Koffi["load"]>;
type KoffiFunction = ReturnType<KoffiLibrary["func"]>;

const DECOMPRESS_SIGNATURE =
	"int64_t OodleLZ_Decompress(" +
	"void* comp, int64_t compSize, " +
	"void* raw, int64_t rawSize, " +
	"int32_t fuzzSafe, int32_t checkCrc, int32_t verbosity, " +
	"void* decBufBase, int64_t decBufSize, " +
	"void* fpCallback, void* callbackUserData, " +
	"void* decoderMemory, int64_t decoderMemorySize, " +
	"int32_t threadPhase)";

export class OodleDecompressor implements OodleDecoder {
	private decompressFn: KoffiFunction;

	constructor(libraryPath: string) {
		let lib: KoffiLibrary;
		try {
			const koffi: Koffi = require("koffi");
			lib = koffi.load(libraryPath);
		} catch (err) {
			throw new DecompressionError(`Cannot load Oodle library ${libraryPath}`, { cause: err });
		}
		this.decompressFn = lib.func(DECOMPRESS_SIGNATURE);
	}

	/** null bei Fehler (Rückgabewert <= 0) */
	decompress(compData: Buffer, rawSize: number): Buffer | null {
		const rawBuf = Buffer.alloc(rawSize);
		const result: unknown = this.decompressFn(
			compData,
			BigInt(compData.length),
			rawBuf,
			BigInt(rawSize),
			1, // fuzzSafe
			0, // checkCrc
			0, // verbosity
			null,
			0n,
			null,
			null,
			null,
			0n,
			0 // threadPhase
		);
		const written = typeof result === "bigint" ? Number(result) : typeof result === "number" ? result : 0;
		if (written <= 0) return null;
		return written < rawSize ? rawBuf.subarray(0, written) : rawBuf;
	}
}

/** Decoder nur erzeugen, wenn ein Bibliothekspfad konfiguriert ist */
export function loadOodle(libraryPath: string | null): OodleDecoder | null {
	return libraryPath ? new OodleDecompressor(libraryPath) : null;
}
