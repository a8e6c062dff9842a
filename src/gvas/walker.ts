/**
 * Traversierung des Property-Baums und Identitäts-Tausch
 */

import { PropertyType, isStructValue } from "./types.js";
import type { CharacterRecord, ElementValue, Guid, GroupRecord, Property, PropertyBag, SaveTree, StructValue } from "./types.js";
import { pathSegments } from "./policy.js";

export interface TreeVisitor {
	property?(name: string, property: Property, path: string): void;
	groupRecord?(record: GroupRecord, path: string): void;
	characterRecord?(record: CharacterRecord, path: string): void;
}

/** Eigentümer-/Bau-/Schloss-Felder, deren Wert beim Tausch mitwandert */
export const DEFAULT_WATCHED_KEYS: readonly string[] = ["OwnerPlayerUId", "owner_player_uid", "build_player_uid", "private_lock_player_uid"];

export interface SwapOptions {
	keys?: readonly string[];
	/** Character-Handles dekodierter Gruppen per Wert tauschen (Default: true) */
	groupHandles?: boolean;
}

function walkStruct(value: StructValue, visitor: TreeVisitor, path: string): void {
	if (value.kind === "properties") walkTree(value.properties, visitor, path);
}

function walkElement(value: ElementValue, visitor: TreeVisitor, path: string): void {
	if (isStructValue(value)) walkStruct(value, visitor, path);
}

/** Tiefensuche, Eltern vor Kindern, Reihenfolge wie auf dem Draht */
export function walkTree(bag: PropertyBag, visitor: TreeVisitor, path = ""): void {
	for (const [name, property] of bag) {
		const propPath = `${path}.${name}`;
		visitor.property?.(name, property, propPath);
		switch (property.type) {
			case PropertyType.Struct:
				walkStruct(property.value, visitor, propPath);
				break;
			case PropertyType.Array: {
				const value = property.value;
				if (value.kind === "structs") {
					for (const element of value.values) walkStruct(element, visitor, propPath);
				} else if (value.kind === "character") {
					visitor.characterRecord?.(value.record, propPath);
					walkTree(value.record.properties, visitor, propPath);
				} else if (value.kind === "group") {
					visitor.groupRecord?.(value.record, propPath);
				}
				break;
			}
			case PropertyType.Map:
				for (const entry of property.entries) {
					walkElement(entry.key, visitor, `${propPath}.Key`);
					walkElement(entry.value, visitor, `${propPath}.Value`);
				}
				break;
			case PropertyType.Set:
				for (const element of property.elements) walkElement(element, visitor, `${propPath}.Value`);
				break;
			default:
				break;
		}
	}
}

function swapped(value: string, a: string, b: string): string | null {
	if (value === a) return b;
	if (value === b) return a;
	return null;
}

/**
 * Tauscht a ↔ b in allen beobachteten Feldern (Str/Name/Object oder Guid-Struct)
 * sowie in den Identitätsfeldern dekodierter Gruppen. Liefert die Anzahl der Änderungen.
 */
export function swapIdentity(target: SaveTree | PropertyBag, first: Guid, second: Guid, options: SwapOptions = {}): number {
	// Baum-GUIDs sind kleingeschrieben (formatGuid)
	const a = first.toLowerCase();
	const b = second.toLowerCase();
	if (a === b) return 0;
	const keys = new Set(options.keys ?? DEFAULT_WATCHED_KEYS);
	const groupHandles = options.groupHandles ?? true;
	const bag = target instanceof Map ? target : target.properties;
	let count = 0;
	const swap = (value: string): string => {
		const next = swapped(value, a, b);
		if (next === null) return value;
		count++;
		return next;
	};

	walkTree(bag, {
		property(name, property) {
			if (!keys.has(name)) return;
			if (property.type === PropertyType.Str || property.type === PropertyType.Name || property.type === PropertyType.Object) {
				property.value = swap(property.value);
			} else if (property.type === PropertyType.Struct && property.value.kind === "guid") {
				property.value.value = swap(property.value.value);
			}
		},
		groupRecord(record) {
			if (groupHandles) {
				for (const handle of record.characterHandles) handle.guid = swap(handle.guid);
			}
			if (record.kind === "guild") {
				record.adminPlayerUid = swap(record.adminPlayerUid);
				for (const player of record.players) player.playerUid = swap(player.playerUid);
			} else if (record.kind === "independentGuild") {
				record.playerUid = swap(record.playerUid);
			}
		}
	});
	return count;
}

/**
 * Punkt-Pfad durch verschachtelte Struct-Properties, z.B. "worldSaveData.GroupSaveDataMap".
 * Raw-Knoten und Nicht-Structs beenden die Suche.
 */
export function findProperty(bag: PropertyBag, path: string | readonly string[]): Property | undefined {
	const segments = typeof path === "string" ? pathSegments(path) : path;
	let scope: PropertyBag | undefined = bag;
	let found: Property | undefined;
	for (const segment of segments) {
		if (!scope) return undefined;
		found = scope.get(segment);
		if (!found) return undefined;
		scope = found.type === PropertyType.Struct && found.value.kind === "properties" ? found.value.properties : undefined;
	}
	return found;
}

/** Properties eines Struct-Scopes (Property oder Map-Element) */
export function structProperties(value: Property | ElementValue | undefined): PropertyBag | undefined {
	if (value === undefined) return undefined;
	if (typeof value === "object" && "type" in value) {
		if (value.type !== PropertyType.Struct) return undefined;
		return value.value.kind === "properties" ? value.value.properties : undefined;
	}
	return isStructValue(value) && value.kind === "properties" ? value.properties : undefined;
}

/** GUID aus Guid-Struct, Str/Name-Property oder nacktem Map-Key */
export function guidOf(value: Property | ElementValue | undefined): Guid | undefined {
	if (value === undefined) return undefined;
	if (typeof value === "string") return value;
	if (typeof value === "object" && "type" in value) {
		if (value.type === PropertyType.Struct && value.value.kind === "guid") return value.value.value;
		if (value.type === PropertyType.Str || value.type === PropertyType.Name) return value.value;
		return undefined;
	}
	return isStructValue(value) && value.kind === "guid" ? value.value : undefined;
}
