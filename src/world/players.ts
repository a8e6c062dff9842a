/**
 * Spieler-Daten aus Level.sav / Players/<uid>.sav
 *
 * Level.sav: worldSaveData.GroupSaveDataMap (Gilden) und
 * worldSaveData.CharacterSaveParameterMap (Spieler + Pals).
 */

import { EMPTY_GUID, PropertyType } from "../gvas/types.js";
import type { GroupRecord, Guid, GuildRecord, MapProperty, Property, PropertyBag, SaveTree } from "../gvas/types.js";
import { findProperty, guidOf, structProperties, swapIdentity } from "../gvas/walker.js";
import { GROUP_TYPE_GUILD } from "../gvas/group-record.js";

export const WORLD_SAVE_DATA = "worldSaveData";
export const GROUP_MAP = "GroupSaveDataMap";
export const CHARACTER_MAP = "CharacterSaveParameterMap";

export interface PlayerRef {
	uid: Guid;
	instanceId: Guid;
}

export interface PlayerSummary {
	uid: Guid;
	name: string;
	level: number;
	guildName: string;
	/** Ticks aus der Gilden-Mitgliederliste, 0n wenn unbekannt */
	lastOnline: bigint;
	palsCount: number;
}

export interface SwapReport {
	characterEntries: number;
	characterHandles: number;
	identityFields: number;
}

function worldMap(tree: SaveTree, name: string): MapProperty | undefined {
	const property = findProperty(tree.properties, [WORLD_SAVE_DATA, name]);
	return property?.type === PropertyType.Map ? property : undefined;
}

/** Dekodierte Gruppen aus GroupSaveDataMap, optional nach GroupType gefiltert */
export function listGroups(tree: SaveTree, groupType?: string): GroupRecord[] {
	const out: GroupRecord[] = [];
	for (const entry of worldMap(tree, GROUP_MAP)?.entries ?? []) {
		const rawData = structProperties(entry.value)?.get("RawData");
		if (rawData?.type !== PropertyType.Array || rawData.value.kind !== "group") continue;
		if (groupType === undefined || rawData.value.record.groupType === groupType) out.push(rawData.value.record);
	}
	return out;
}

export function listGuilds(tree: SaveTree): GuildRecord[] {
	const out: GuildRecord[] = [];
	for (const record of listGroups(tree, GROUP_TYPE_GUILD)) {
		if (record.kind === "guild") out.push(record);
	}
	return out;
}

/** SaveParameter-Scope eines dekodierten Charakters */
function characterParameters(value: PropertyBag | undefined): PropertyBag | undefined {
	const rawData = value?.get("RawData");
	if (rawData?.type !== PropertyType.Array || rawData.value.kind !== "character") return undefined;
	const record = rawData.value.record.properties;
	return structProperties(record.get("SaveParameter")) ?? record;
}

function numberOf(property: Property | undefined): number | undefined {
	if (!property) return undefined;
	if (property.type === PropertyType.Byte || property.type === PropertyType.Int) {
		return typeof property.value === "number" ? property.value : undefined;
	}
	return undefined;
}

function stringOf(property: Property | undefined): string | undefined {
	if (property?.type === PropertyType.Str || property?.type === PropertyType.Name) return property.value;
	return undefined;
}

/** Filename-Form der UID: ohne Bindestriche, Großbuchstaben */
export function uidToFilename(uid: Guid): string {
	return uid.replace(/-/g, "").toUpperCase();
}

export function extractPlayers(tree: SaveTree): PlayerSummary[] {
	const guildInfo = new Map<Guid, { name: string; lastOnline: bigint; guildName: string }>();
	for (const guild of listGuilds(tree)) {
		for (const player of guild.players) {
			guildInfo.set(player.playerUid, { name: player.playerName, lastOnline: player.lastOnline, guildName: guild.guildName });
		}
	}

	const levels = new Map<Guid, number>();
	const nickNames = new Map<Guid, string>();
	const palsCount = new Map<Guid, number>();
	for (const entry of worldMap(tree, CHARACTER_MAP)?.entries ?? []) {
		const uid = guidOf(structProperties(entry.key)?.get("PlayerUId")) ?? "";
		const params = characterParameters(structProperties(entry.value));
		if (!params) continue;
		const isPlayer = params.get("IsPlayer");
		if (isPlayer?.type === PropertyType.Bool && isPlayer.value) {
			levels.set(uid, numberOf(params.get("Level")) ?? 1);
			const nick = stringOf(params.get("NickName"));
			if (nick) nickNames.set(uid, nick);
		} else {
			const owner = guidOf(params.get("OwnerPlayerUId"));
			if (owner && owner !== EMPTY_GUID) palsCount.set(owner, (palsCount.get(owner) ?? 0) + 1);
		}
	}

	const uids: Guid[] = [...guildInfo.keys()];
	for (const uid of levels.keys()) {
		if (!uids.includes(uid)) uids.push(uid);
	}
	return uids.map((uid) => {
		const info = guildInfo.get(uid);
		return {
			uid,
			name: info?.name || nickNames.get(uid) || uidToFilename(uid),
			level: levels.get(uid) ?? 0,
			guildName: info?.guildName ?? "",
			lastOnline: info?.lastOnline ?? 0n,
			palsCount: palsCount.get(uid) ?? 0
		};
	});
}

function setGuid(property: Property | undefined, value: Guid): boolean {
	if (property?.type !== PropertyType.Struct || property.value.kind !== "guid") return false;
	property.value.value = value;
	return true;
}

/**
 * Tauscht zwei Spieler in Level.sav:
 * 1. CharacterSaveParameterMap: PlayerUId nur bei den Einträgen mit passender InstanceId
 * 2. Gilden: Character-Handles per InstanceId
 * 3. swapIdentity für Admin, Mitglieder und Eigentümer-Felder
 */
export function swapPlayers(tree: SaveTree, first: PlayerRef, second: PlayerRef): SwapReport {
	const report: SwapReport = { characterEntries: 0, characterHandles: 0, identityFields: 0 };
	const targetFor = (instanceId: Guid): Guid | null => {
		if (instanceId === first.instanceId) return second.uid;
		if (instanceId === second.instanceId) return first.uid;
		return null;
	};

	for (const entry of worldMap(tree, CHARACTER_MAP)?.entries ?? []) {
		const key = structProperties(entry.key);
		const target = targetFor(guidOf(key?.get("InstanceId")) ?? "");
		if (target !== null && setGuid(key?.get("PlayerUId"), target)) report.characterEntries++;
	}

	for (const guild of listGuilds(tree)) {
		for (const handle of guild.characterHandles) {
			const target = targetFor(handle.instanceId);
			if (target === null) continue;
			handle.guid = target;
			report.characterHandles++;
		}
	}

	report.identityFields = swapIdentity(tree, first.uid, second.uid, { groupHandles: false });
	return report;
}

/** InstanceId aus Players/<uid>.sav (SaveData.IndividualId.InstanceId) */
export function readPlayerInstanceId(playerTree: SaveTree): Guid | undefined {
	return guidOf(findProperty(playerTree.properties, ["SaveData", "IndividualId", "InstanceId"]));
}

/** PlayerUId in SaveData und SaveData.IndividualId umschreiben; Anzahl geänderter Felder */
export function patchPlayerSave(playerTree: SaveTree, oldUid: Guid, newUid: Guid): number {
	let changed = 0;
	for (const path of [["SaveData", "PlayerUId"], ["SaveData", "IndividualId", "PlayerUId"]]) {
		const property = findProperty(playerTree.properties, path);
		if (guidOf(property) === oldUid && setGuid(property, newUid)) changed++;
	}
	return changed;
}
