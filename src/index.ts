/**
 * GVAS Save Tools
 *
 * Liest und schreibt komprimierte GVAS-Savegames (.sav, PlZ/PlM-Envelope)
 * als typisierten Property-Baum. Opake Blobs (Gilden, Charaktere) werden
 * dekodiert, alles Unbekannte bleibt byte-genau erhalten.
 *
 * @example
 * ```ts
 * import { readSave, writeSave, extractPlayers, swapIdentity } from "gvas-save-tools";
 *
 * const { tree, saveType } = readSave("Level.sav");
 * console.log(extractPlayers(tree).map((p) => p.name));
 *
 * swapIdentity(tree, uidA, uidB);
 * writeSave("Level.swapped.sav", tree, saveType);
 * ```
 */

export { decodeSave, encodeSave, readSave, writeSave, verifyRoundtrip } from "./save.js";
export type { DecodeOptions, DecodedSave, RoundtripResult } from "./save.js";
export { decompressSav, compressSav, readSavHeader } from "./sav/envelope.js";
export type { DecompressOptions, DecompressedSav } from "./sav/envelope.js";
export { SaveType, saveTypeName, parseSaveType } from "./sav/types.js";
export type { SavHeader } from "./sav/types.js";
export { loadOodle, OodleDecompressor } from "./sav/oodle.js";
export type { OodleDecoder } from "./sav/oodle.js";
export { GvasReader, readGvas } from "./gvas/reader.js";
export type { GvasReadOptions } from "./gvas/reader.js";
export { GvasWriter, writeGvas, writeGvasFile } from "./gvas/writer.js";
export type { GvasWriteOptions } from "./gvas/writer.js";
export { PathPolicy, DomainDecoder, defaultPolicy, DEFAULT_POLICY_ENTRIES } from "./gvas/policy.js";
export type { PolicyEntry, PolicyRule } from "./gvas/policy.js";
export { decodeGroupRecord, encodeGroupRecord } from "./gvas/group-record.js";
export { decodeCharacterRecord, encodeCharacterRecord } from "./gvas/character-record.js";
export { walkTree, swapIdentity, findProperty, structProperties, guidOf, DEFAULT_WATCHED_KEYS } from "./gvas/walker.js";
export type { TreeVisitor, SwapOptions } from "./gvas/walker.js";
export { ArchiveReader, ArchiveWriter } from "./gvas/archive.js";
export * from "./gvas/types.js";
export { extractPlayers, swapPlayers, readPlayerInstanceId, patchPlayerSave, listGroups, listGuilds, uidToFilename } from "./world/players.js";
export type { PlayerRef, PlayerSummary, SwapReport } from "./world/players.js";
export { convertSaveToXml } from "./xml/xml-writer.js";
export { parseSaveXml, readSaveXml } from "./xml/xml-reader.js";
export { loadConfig } from "./config.js";
export type { ToolConfig } from "./config.js";
export * from "./errors.js";
