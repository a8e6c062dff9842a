#!/usr/bin/env node
/**
 * CLI für GVAS Save Tools
 * Verwendung:
 *   info <file.sav>                         - Envelope + GVAS-Header anzeigen
 *   to-xml <input.sav> [output.xml]         - SAV zu XML
 *   from-xml <input.xml> [output.sav]       - XML zu SAV
 *   players <Level.sav>                     - Spieler auflisten
 *   swap <Level.sav> <uidA> <uidB> [out]    - zwei Spieler tauschen
 *   verify <file.sav|dir>                   - Roundtrip prüfen
 */

import { existsSync, readFileSync, readdirSync, statSync, writeFileSync } from "node:fs";
import { mkdirSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { loadConfig } from "./config.js";
import type { ToolConfig } from "./config.js";
import { describeError } from "./errors.js";
import { closeLogger, debug, error, initLogger, log, setLogLevel, warn } from "./logger.js";
import { loadOodle } from "./sav/oodle.js";
import { readSavHeader } from "./sav/envelope.js";
import { parseSaveType, saveTypeName } from "./sav/types.js";
import { readSave, verifyRoundtrip, writeSave } from "./save.js";
import type { DecodeOptions } from "./save.js";
import { convertSaveToXml } from "./xml/xml-writer.js";
import { readSaveXml } from "./xml/xml-reader.js";
import { extractPlayers, patchPlayerSave, readPlayerInstanceId, swapPlayers, uidToFilename } from "./world/players.js";
import { isGuid } from "./gvas/archive.js";

const HELP = `
GVAS Save Tools - SAV ↔ XML Konverter & Spieler-Tausch

Verwendung:
  info <file.sav>                              - Envelope + GVAS-Header anzeigen
  to-xml <input.sav> [output.xml]              - SAV zu XML konvertieren
  from-xml <input.xml> [output.sav]            - XML zu SAV konvertieren
  from-xml ... --type plz|zlib                 - Save-Typ (default: aus XML, sonst plz)
  players <Level.sav>                          - Spieler auflisten
  swap <Level.sav> <uidA> <uidB> [output.sav]  - zwei Spieler tauschen
  swap ... --instances <idA>,<idB>             - InstanceIds statt Players/<uid>.sav
  verify <file.sav|dir>                        - decode → encode Roundtrip prüfen

Optionen:
  --oodle <path>     oo2core-Bibliothek für PlM-Saves (oder GVAS_OODLE_LIB)
  --max-depth <n>    maximale Verschachtelung (default: 128)
  --verbose          Debug-Ausgaben

Beispiele:
  node dist/cli.js info Level.sav
  node dist/cli.js to-xml Level.sav Level.xml
  node dist/cli.js from-xml Level.xml Level.sav
  node dist/cli.js swap Level.sav 00000001-0000-0000-0000-000000000000 00000002-0000-0000-0000-000000000000
`;

const VALUE_FLAGS = new Set(["--oodle", "--max-depth", "--type", "--instances", "--log"]);

const argv = process.argv.slice(2);
const positional: string[] = [];
const flags = new Map<string, string>();
for (let i = 0; i < argv.length; i++) {
	const arg = argv[i];
	if (VALUE_FLAGS.has(arg)) {
		flags.set(arg, argv[++i] ?? "");
	} else if (arg.startsWith("--") || arg === "-h") {
		flags.set(arg, "");
	} else {
		positional.push(arg);
	}
}
const [command, inputPath] = positional;

if (!command || flags.has("--help") || flags.has("-h") || command === "help") {
	console.log(HELP);
	process.exit(command ? 0 : 1);
}

if (!inputPath) {
	console.error(HELP);
	process.exit(1);
}

function configFromFlags(): Readonly<ToolConfig> {
	const overrides: Partial<ToolConfig> = {};
	const oodle = flags.get("--oodle");
	if (oodle) overrides.oodleLibraryPath = oodle;
	const depth = flags.get("--max-depth");
	if (depth !== undefined) {
		const n = Number(depth);
		if (!Number.isInteger(n) || n <= 0) throw new Error(`--max-depth erwartet eine positive Ganzzahl, nicht "${depth}"`);
		overrides.maxDepth = n;
	}
	const logFile = flags.get("--log");
	if (logFile) overrides.logFile = logFile;
	if (flags.has("--verbose")) overrides.logLevel = "debug";
	return loadConfig(process.env, overrides);
}

function requireFile(path: string): void {
	if (!existsSync(path)) {
		console.error(`Fehler: Datei nicht gefunden: ${path}`);
		process.exit(1);
	}
}

function collectSavFiles(dir: string): string[] {
	const files: string[] = [];
	for (const entry of readdirSync(dir, { withFileTypes: true })) {
		const full = join(dir, entry.name);
		if (entry.isDirectory()) files.push(...collectSavFiles(full));
		else if (entry.name.toLowerCase().endsWith(".sav")) files.push(full);
	}
	return files;
}

function formatLastOnline(ticks: bigint): string {
	return ticks === 0n ? "-" : ticks.toString();
}

try {
	const config = configFromFlags();
	setLogLevel(config.logLevel);
	if (config.logFile) initLogger(config.logFile);
	const options: DecodeOptions = { maxDepth: config.maxDepth, oodle: loadOodle(config.oodleLibraryPath) };
	debug(`Konfiguration: maxDepth=${config.maxDepth}, oodle=${config.oodleLibraryPath ?? "-"}`);

	if (command === "info") {
		requireFile(inputPath);
		const header = readSavHeader(readFileSync(inputPath));
		const { tree, saveType } = readSave(inputPath, options);
		const h = tree.header;
		console.log(`Datei:        ${inputPath}`);
		console.log(`Envelope:     ${header.magic} ${saveTypeName(saveType)}${header.wrapped ? " (CNK)" : ""}`);
		console.log(`Größe:        ${header.compressedSize} B komprimiert, ${header.uncompressedSize} B GVAS`);
		console.log(`Engine:       ${h.engineMajor}.${h.engineMinor}.${h.enginePatch}-${h.engineChangelist} ${h.engineBranch}`);
		console.log(`SaveGame:     ${h.saveGameClassName} (v${h.saveGameVersion}, ${h.customVersions.length} Custom Versions)`);
		console.log(`Properties:   ${[...tree.properties.keys()].join(", ")}`);
		if (tree.trailer.length) console.log(`Trailer:      ${tree.trailer.length} B`);
	} else if (command === "to-xml") {
		requireFile(inputPath);
		const output = positional[2] ?? inputPath.replace(/\.sav$/i, "") + ".xml";
		log(`Konvertiere ${inputPath} → ${output}...`);
		const { tree, saveType } = readSave(inputPath, options);
		writeFileSync(output, convertSaveToXml(tree, saveType), "utf8");
		console.log(`Fertig: ${output} erstellt`);
	} else if (command === "from-xml") {
		requireFile(inputPath);
		const output = positional[2] ?? inputPath.replace(/\.xml$/i, "") + ".sav";
		const { tree, saveType: xmlType } = readSaveXml(inputPath);
		const typeFlag = flags.get("--type");
		const forced = typeFlag === undefined ? null : parseSaveType(typeFlag);
		if (typeFlag !== undefined && forced === null) throw new Error(`Unbekannter Save-Typ: ${typeFlag} (plz oder zlib)`);
		const saveType = forced ?? xmlType ?? parseSaveType("plz");
		if (saveType === null) throw new Error("Kein Save-Typ");
		log(`Konvertiere ${inputPath} → ${output} (${saveTypeName(saveType)})...`);
		writeSave(output, tree, saveType, { maxDepth: config.maxDepth });
		console.log(`Fertig: ${output} erstellt`);
	} else if (command === "players") {
		requireFile(inputPath);
		const { tree } = readSave(inputPath, options);
		const players = extractPlayers(tree);
		console.log(`${players.length} Spieler in ${inputPath}`);
		for (const p of players) {
			console.log(`  ${p.uid}  Lv ${String(p.level).padStart(2)}  ${p.name}  [${p.guildName || "-"}]  Pals: ${p.palsCount}  zuletzt: ${formatLastOnline(p.lastOnline)}`);
		}
	} else if (command === "swap") {
		requireFile(inputPath);
		const [, , uidA, uidB, outArg] = positional;
		if (!uidA || !uidB || !isGuid(uidA) || !isGuid(uidB)) throw new Error("swap erwartet zwei Spieler-UIDs (GUID-Format)");
		const a = uidA.toLowerCase();
		const b = uidB.toLowerCase();
		const output = outArg ?? inputPath;
		const playersDir = join(dirname(inputPath), "Players");
		const playerFile = (uid: string) => join(playersDir, `${uidToFilename(uid)}.sav`);

		let instanceA: string;
		let instanceB: string;
		const instances = flags.get("--instances");
		if (instances) {
			const parts = instances.split(",").map((s) => s.trim().toLowerCase());
			if (parts.length !== 2 || !parts.every(isGuid)) throw new Error("--instances erwartet <idA>,<idB>");
			[instanceA, instanceB] = parts;
		} else {
			const read = (uid: string): string => {
				const file = playerFile(uid);
				if (!existsSync(file)) throw new Error(`Player-Save nicht gefunden: ${file} (--instances angeben)`);
				const id = readPlayerInstanceId(readSave(file, options).tree);
				if (!id) throw new Error(`Keine InstanceId in ${file}`);
				return id;
			};
			instanceA = read(a);
			instanceB = read(b);
		}

		log(`Tausche ${a} ↔ ${b} in ${inputPath}...`);
		const { tree, saveType } = readSave(inputPath, options);
		const report = swapPlayers(tree, { uid: a, instanceId: instanceA }, { uid: b, instanceId: instanceB });
		writeSave(output, tree, saveType, { maxDepth: config.maxDepth });
		console.log(`  Charaktere: ${report.characterEntries}, Handles: ${report.characterHandles}, Felder: ${report.identityFields}`);

		// Player-Saves mittauschen: A's Daten landen unter B's Dateiname und umgekehrt
		if (existsSync(playerFile(a)) && existsSync(playerFile(b))) {
			const targetDir = join(dirname(output), "Players");
			mkdirSync(targetDir, { recursive: true });
			const saveA = readSave(playerFile(a), options);
			const saveB = readSave(playerFile(b), options);
			const changedA = patchPlayerSave(saveA.tree, a, b);
			const changedB = patchPlayerSave(saveB.tree, b, a);
			writeSave(join(targetDir, `${uidToFilename(b)}.sav`), saveA.tree, saveA.saveType, { maxDepth: config.maxDepth });
			writeSave(join(targetDir, `${uidToFilename(a)}.sav`), saveB.tree, saveB.saveType, { maxDepth: config.maxDepth });
			console.log(`  Player-Saves: ${changedA + changedB} Felder angepasst`);
		} else {
			warn("Player-Saves nicht gefunden, nur Level.sav geändert");
		}
		console.log(`Fertig: ${output} erstellt`);
	} else if (command === "verify") {
		requireFile(inputPath);
		const files = statSync(inputPath).isDirectory() ? collectSavFiles(inputPath) : [inputPath];
		let ok = 0;
		for (const file of files) {
			try {
				const result = verifyRoundtrip(readFileSync(file), options);
				if (result.gvasIdentical && result.stable) {
					console.log(`  OK   ${basename(file)} (${saveTypeName(result.saveType)})`);
					ok++;
				} else {
					console.log(`  DIFF ${basename(file)} (orig ${result.originalSize} B, roundtrip ${result.reencodedSize} B)`);
				}
			} catch (err) {
				console.log(`  FAIL ${basename(file)}: ${describeError(err)}`);
			}
		}
		console.log(`\n${ok} identisch von ${files.length} Dateien`);
		if (ok !== files.length) process.exitCode = 1;
	} else {
		console.error(`Unbekannter Befehl: ${command}`);
		process.exit(1);
	}
} catch (err) {
	error(`Fehler: ${describeError(err)}`);
	process.exitCode = 1;
} finally {
	closeLogger();
}
