import { ArchiveWriter } from "../../gvas/archive.js";
import type { GvasHeader } from "../../gvas/types.js";
import { testHeader } from "./world.js";

/** GVAS-Header von Hand, unabhängig vom GvasWriter */
export function headerBytes(h: GvasHeader = testHeader()): Buffer {
	const w = new ArchiveWriter();
	w.writeBytes(Buffer.from("GVAS", "latin1"));
	w.writeInt32(h.saveGameVersion);
	w.writeInt32(h.packageVersionUe4);
	w.writeInt32(h.packageVersionUe5);
	w.writeUInt16(h.engineMajor);
	w.writeUInt16(h.engineMinor);
	w.writeUInt16(h.enginePatch);
	w.writeUInt32(h.engineChangelist);
	w.writeFString(h.engineBranch);
	w.writeInt32(h.customVersionFormat);
	w.writeUInt32(h.customVersions.length);
	for (const cv of h.customVersions) {
		w.writeGuid(cv.id);
		w.writeInt32(cv.version);
	}
	w.writeFString(h.saveGameClassName);
	return w.toBuffer();
}

/** name, type, size = Länge von body, dann meta und body */
export function property(w: ArchiveWriter, name: string, type: string, meta: (m: ArchiveWriter) => void, body: (b: ArchiveWriter) => void): void {
	const m = new ArchiveWriter();
	const b = new ArchiveWriter();
	meta(m);
	body(b);
	w.writeFString(name);
	w.writeFString(type);
	w.writeSize(b.length);
	w.writeBytes(m.toBuffer());
	w.writeBytes(b.toBuffer());
}

export function scope(build: (w: ArchiveWriter) => void): Buffer {
	const w = new ArchiveWriter();
	build(w);
	w.writeFString("None");
	return w.toBuffer();
}

/** Header + Scope + Trailer */
export function archive(build: (w: ArchiveWriter) => void, trailer: Buffer = Buffer.alloc(4)): Buffer {
	return Buffer.concat([headerBytes(), scope(build), trailer]);
}

export const noId = (m: ArchiveWriter): void => m.writeUInt8(0);
