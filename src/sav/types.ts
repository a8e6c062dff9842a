/**
 * .sav Envelope: 12-Byte-Header vor dem komprimierten GVAS-Archiv
 *
 *   u32 uncompressedSize | u32 compressedSize | 3 Byte Magic | u8 saveType
 *
 * "CNK" ist ein äußerer Wrapper: danach folgt ein zweiter, gleich aufgebauter Header.
 */

export const SAV_HEADER_SIZE = 12;
export const CNK_HEADER_SIZE = 24;

export const MAGIC_PLZ = "PlZ";
export const MAGIC_PLM = "PlM";
export const MAGIC_CNK = "CNK";

/** Erste 4 Bytes jedes dekomprimierten Archivs */
export const GVAS_MAGIC = "GVAS";

export enum SaveType {
	/** einfaches zlib */
	Zlib = 0x30,
	/** Oodle (nur lesen) */
	Oodle = 0x31,
	/** zlib zweimal hintereinander */
	DoubleZlib = 0x32
}

export interface SavHeader {
	uncompressedSize: number;
	compressedSize: number;
	magic: string;
	saveType: number;
	/** true wenn der Header hinter einem CNK-Wrapper stand */
	wrapped: boolean;
	dataOffset: number;
}

export function isSaveType(value: number): value is SaveType {
	return value === SaveType.Zlib || value === SaveType.Oodle || value === SaveType.DoubleZlib;
}

export function saveTypeName(type: SaveType): string {
	switch (type) {
		case SaveType.Zlib:
			return "zlib (0x30)";
		case SaveType.Oodle:
			return "oodle (0x31)";
		case SaveType.DoubleZlib:
			return "double-zlib (0x32)";
	}
}

/** CLI-Namen → SaveType */
export function parseSaveType(name: string): SaveType | null {
	switch (name.toLowerCase()) {
		case "zlib":
		case "0x30":
			return SaveType.Zlib;
		case "plz":
		case "double-zlib":
		case "0x32":
			return SaveType.DoubleZlib;
		default:
			return null;
	}
}
