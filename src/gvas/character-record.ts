/**
 * RawData eines CharacterSaveParameterMap-Eintrags:
 * Property-Scope, danach (ab 24 Rest-Bytes) 4 Bytes + Gruppen-GUID + Rest.
 */

import { MalformedTreeError, SubCodecError } from "../errors.js";
import { ArchiveReader, ArchiveWriter } from "./archive.js";
import type { CharacterRecord, PropertyBag } from "./types.js";

/** Liest einen Scope bis "None" ab der aktuellen Position */
export type ScopeReader = (reader: ArchiveReader) => PropertyBag;
export type ScopeWriter = (writer: ArchiveWriter, properties: PropertyBag) => void;

const GROUP_SUFFIX_SIZE = 24;

export function decodeCharacterRecord(data: Buffer, readScope: ScopeReader): CharacterRecord {
	const r = new ArchiveReader(data);
	try {
		const properties = readScope(r);
		if (r.remaining < GROUP_SUFFIX_SIZE) {
			return { properties, reserved: Buffer.alloc(0), groupId: null, trailer: r.readRest() };
		}
		const reserved = r.readBytes(4);
		const groupId = r.readGuid();
		return { properties, reserved, groupId, trailer: r.readRest() };
	} catch (err) {
		if (err instanceof MalformedTreeError) {
			throw new SubCodecError(`Character record could not be decoded (${data.length} bytes): ${err.message}`, { cause: err });
		}
		throw err;
	}
}

export function encodeCharacterRecord(record: CharacterRecord, writeScope: ScopeWriter, path = ""): Buffer {
	const w = new ArchiveWriter();
	writeScope(w, record.properties);
	if (record.groupId !== null) {
		if (record.reserved.length !== 4) {
			throw new SubCodecError(`Character record reserved field must be 4 bytes, got ${record.reserved.length}`);
		}
		w.writeBytes(record.reserved);
		w.writeGuid(record.groupId, path);
	}
	w.writeBytes(record.trailer);
	return w.toBuffer();
}
