/**
 * RawData-Blob eines GroupSaveDataMap-Eintrags
 *
 * Gemeinsamer Anfang: groupId, groupName, Handles (guid, instanceId).
 * Guild / IndependentGuild / Organization haben danach ein orgType-Byte und eigene Felder.
 * Alles hinter dem verstandenen Teil bleibt als `trailer` erhalten.
 */

import { MalformedTreeError, SubCodecError } from "../errors.js";
import { ArchiveReader, ArchiveWriter } from "./archive.js";
import type { CharacterHandle, GroupRecord, Guid, GuildMember } from "./types.js";

export const GROUP_TYPE_GUILD = "EPalGroupType::Guild";
export const GROUP_TYPE_INDEPENDENT_GUILD = "EPalGroupType::IndependentGuild";
export const GROUP_TYPE_ORGANIZATION = "EPalGroupType::Organization";

const ORGANIZATION_RESERVED_SIZE = 12;

function readGuidList(r: ArchiveReader): Guid[] {
	const count = r.readUInt32();
	const out: Guid[] = [];
	for (let i = 0; i < count; i++) out.push(r.readGuid());
	return out;
}

function writeGuidList(w: ArchiveWriter, ids: readonly Guid[], path: string): void {
	w.writeUInt32(ids.length);
	for (const id of ids) w.writeGuid(id, path);
}

function readFixed(r: ArchiveReader, count: number): Buffer {
	return r.readBytes(count);
}

function writeFixed(w: ArchiveWriter, bytes: Buffer, count: number, field: string): void {
	if (bytes.length !== count) {
		throw new SubCodecError(`Group record field ${field} must be ${count} bytes, got ${bytes.length}`);
	}
	w.writeBytes(bytes);
}

export function decodeGroupRecord(groupType: string, data: Buffer): GroupRecord {
	const r = new ArchiveReader(data);
	try {
		const groupId = r.readGuid();
		const groupName = r.readFString();
		const handleCount = r.readUInt32();
		const characterHandles: CharacterHandle[] = [];
		for (let i = 0; i < handleCount; i++) {
			characterHandles.push({ guid: r.readGuid(), instanceId: r.readGuid() });
		}
		const base = { groupType, groupId, groupName, characterHandles };

		switch (groupType) {
			case GROUP_TYPE_ORGANIZATION: {
				const orgType = r.readUInt8();
				const reserved = readFixed(r, ORGANIZATION_RESERVED_SIZE);
				return { kind: "organization", ...base, orgType, reserved, trailer: r.readRest() };
			}
			case GROUP_TYPE_GUILD: {
				const orgType = r.readUInt8();
				const reserved = readFixed(r, 4);
				const baseIds = readGuidList(r);
				const unknown1 = r.readInt32();
				const baseCampLevel = r.readInt32();
				const mapObjectInstanceIds = readGuidList(r);
				const guildName = r.readFString();
				const lastGuildNameModifierPlayerUid = r.readGuid();
				const reserved2 = readFixed(r, 4);
				const adminPlayerUid = r.readGuid();
				const playerCount = r.readUInt32();
				const players: GuildMember[] = [];
				for (let i = 0; i < playerCount; i++) {
					players.push({ playerUid: r.readGuid(), lastOnline: r.readInt64(), playerName: r.readFString() });
				}
				return {
					kind: "guild",
					...base,
					orgType,
					reserved,
					baseIds,
					unknown1,
					baseCampLevel,
					mapObjectInstanceIds,
					guildName,
					lastGuildNameModifierPlayerUid,
					reserved2,
					adminPlayerUid,
					players,
					trailer: r.readRest()
				};
			}
			case GROUP_TYPE_INDEPENDENT_GUILD: {
				const orgType = r.readUInt8();
				const baseCampLevel = r.readInt32();
				const mapObjectInstanceIds = readGuidList(r);
				const guildName = r.readFString();
				const playerUid = r.readGuid();
				const guildName2 = r.readFString();
				const lastOnline = r.readInt64();
				const playerName = r.readFString();
				return {
					kind: "independentGuild",
					...base,
					orgType,
					baseCampLevel,
					mapObjectInstanceIds,
					guildName,
					playerUid,
					guildName2,
					lastOnline,
					playerName,
					trailer: r.readRest()
				};
			}
			default:
				return { kind: "generic", ...base, trailer: r.readRest() };
		}
	} catch (err) {
		if (err instanceof MalformedTreeError) {
			throw new SubCodecError(`${groupType} record too short (${data.length} bytes): ${err.message}`, { cause: err });
		}
		throw err;
	}
}

export function encodeGroupRecord(record: GroupRecord, path = ""): Buffer {
	const w = new ArchiveWriter();
	w.writeGuid(record.groupId, path);
	w.writeFString(record.groupName);
	w.writeUInt32(record.characterHandles.length);
	for (const handle of record.characterHandles) {
		w.writeGuid(handle.guid, path);
		w.writeGuid(handle.instanceId, path);
	}

	switch (record.kind) {
		case "organization":
			w.writeUInt8(record.orgType);
			writeFixed(w, record.reserved, ORGANIZATION_RESERVED_SIZE, "reserved");
			break;
		case "guild":
			w.writeUInt8(record.orgType);
			writeFixed(w, record.reserved, 4, "reserved");
			writeGuidList(w, record.baseIds, path);
			w.writeInt32(record.unknown1);
			w.writeInt32(record.baseCampLevel);
			writeGuidList(w, record.mapObjectInstanceIds, path);
			w.writeFString(record.guildName);
			w.writeGuid(record.lastGuildNameModifierPlayerUid, path);
			writeFixed(w, record.reserved2, 4, "reserved2");
			w.writeGuid(record.adminPlayerUid, path);
			w.writeUInt32(record.players.length);
			for (const player of record.players) {
				w.writeGuid(player.playerUid, path);
				w.writeInt64(player.lastOnline);
				w.writeFString(player.playerName);
			}
			break;
		case "independentGuild":
			w.writeUInt8(record.orgType);
			w.writeInt32(record.baseCampLevel);
			writeGuidList(w, record.mapObjectInstanceIds, path);
			w.writeFString(record.guildName);
			w.writeGuid(record.playerUid, path);
			w.writeFString(record.guildName2);
			w.writeInt64(record.lastOnline);
			w.writeFString(record.playerName);
			break;
		case "generic":
			break;
	}
	w.writeBytes(record.trailer);
	return w.toBuffer();
}
