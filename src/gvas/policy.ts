/**
 * Pfad-Regeln für den GVAS-Reader
 *
 * Pfade sind Punkt-getrennt und beginnen mit "." (".worldSaveData.GroupSaveDataMap.Key").
 * Ein Muster passt, wenn seine Segmente genau den letzten Segmenten des Pfads
 * entsprechen; bei mehreren Treffern gewinnt das längste Muster.
 */

import { GENERIC_STRUCT } from "./types.js";

export enum DomainDecoder {
	GroupRecords = "groupRecords",
	CharacterRecord = "characterRecord"
}

export type PolicyRule =
	| { action: "skip" }
	| { action: "structHint"; structType: string }
	| { action: "domain"; decoder: DomainDecoder };

export interface PolicyEntry {
	pattern: string;
	rule: PolicyRule;
}

/** Große Teilbäume, die nur durchgereicht werden */
export const SKIPPED_PROPERTIES: readonly string[] = [
	"FoliageGridSaveDataMap",
	"MapObjectSpawnerInStageSaveData",
	"WorldLocation",
	"WorldRotation",
	"WorldScale3D",
	"EffectMap",
	"ItemContainerSaveData",
	"CharacterContainerSaveData",
	"DynamicItemSaveData",
	"MapObjectSaveData",
	"WorkSaveData",
	"BaseCampSaveData",
	"EnemyCampSaveData",
	"DungeonSaveData",
	"DungeonPointMarkerSaveData",
	"OilrigSaveData",
	"InvaderSaveData",
	"GameTimeSaveData",
	"WorkerDirectorSaveData",
	"GuildExtraSaveDataMap",
	"CharacterParameterStorageSaveData",
	"SupplySaveData",
	"InLockerCharacterInstanceIDArray"
];

/** Map-Keys, die auf dem Draht eine nackte GUID sind */
export const GUID_KEYED_MAPS: readonly string[] = [
	"GroupSaveDataMap",
	"GuildExtraSaveDataMap",
	"SupplyInfos",
	"RewardSaveDataMap",
	"SpawnerDataMapByLevelObjectInstanceId",
	"BaseCampSaveData",
	"InvaderSaveData"
];

export const DEFAULT_POLICY_ENTRIES: readonly PolicyEntry[] = [
	...SKIPPED_PROPERTIES.map((pattern): PolicyEntry => ({ pattern, rule: { action: "skip" } })),
	...GUID_KEYED_MAPS.map((name): PolicyEntry => ({ pattern: `${name}.Key`, rule: { action: "structHint", structType: "Guid" } })),
	{ pattern: "GroupSaveDataMap", rule: { action: "domain", decoder: DomainDecoder.GroupRecords } },
	{ pattern: "CharacterSaveParameterMap.Value.RawData", rule: { action: "domain", decoder: DomainDecoder.CharacterRecord } }
];

export function pathSegments(path: string): string[] {
	return path.split(".").filter((s) => s.length > 0);
}

interface CompiledEntry {
	segments: string[];
	rule: PolicyRule;
}

export class PathPolicy {
	/** Index nach letztem Segment */
	private byLast = new Map<string, CompiledEntry[]>();

	constructor(entries: readonly PolicyEntry[]) {
		for (const entry of entries) {
			const segments = pathSegments(entry.pattern);
			const last = segments[segments.length - 1];
			if (last === undefined) {
				throw new RangeError(`Empty policy pattern: ${JSON.stringify(entry.pattern)}`);
			}
			const list = this.byLast.get(last) ?? [];
			list.push({ segments, rule: entry.rule });
			// längere Muster zuerst
			list.sort((a, b) => b.segments.length - a.segments.length);
			this.byLast.set(last, list);
		}
	}

	lookup(path: string): PolicyRule | undefined {
		const segments = pathSegments(path);
		const last = segments[segments.length - 1];
		if (last === undefined) return undefined;
		const candidates = this.byLast.get(last);
		if (!candidates) return undefined;
		for (const candidate of candidates) {
			if (candidate.segments.length > segments.length) continue;
			const offset = segments.length - candidate.segments.length;
			if (candidate.segments.every((s, i) => segments[offset + i] === s)) return candidate.rule;
		}
		return undefined;
	}

	isSkipped(path: string): boolean {
		return this.lookup(path)?.action === "skip";
	}

	/** GENERIC_STRUCT wenn keine Regel existiert */
	structHint(path: string): string {
		const rule = this.lookup(path);
		return rule?.action === "structHint" ? rule.structType : GENERIC_STRUCT;
	}

	domainDecoder(path: string): DomainDecoder | null {
		const rule = this.lookup(path);
		return rule?.action === "domain" ? rule.decoder : null;
	}
}

export const defaultPolicy = new PathPolicy(DEFAULT_POLICY_ENTRIES);
