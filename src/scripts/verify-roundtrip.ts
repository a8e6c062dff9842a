#!/usr/bin/env node
/**
 * Verifikation gegen echte Saves
 * Alle .sav unter <dir> (default: ./Example): decode → encode → decode, Byte-Vergleich der GVAS-Daten.
 * --xml: zusätzlich über XML (SAV → XML → SAV)
 * --oodle <path>: für PlM-Saves
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { join, relative } from "node:path";
import { loadConfig } from "../config.js";
import { describeError } from "../errors.js";
import { loadOodle } from "../sav/oodle.js";
import { decompressSav } from "../sav/envelope.js";
import { saveTypeName } from "../sav/types.js";
import { decodeSave, verifyRoundtrip } from "../save.js";
import type { DecodeOptions } from "../save.js";
import { writeGvas } from "../gvas/writer.js";
import { convertSaveToXml } from "../xml/xml-writer.js";
import { parseSaveXml } from "../xml/xml-reader.js";

function collectSavFiles(dir: string): string[] {
	const files: string[] = [];
	for (const entry of readdirSync(dir, { withFileTypes: true })) {
		const full = join(dir, entry.name);
		if (entry.isDirectory()) files.push(...collectSavFiles(full));
		else if (entry.name.toLowerCase().endsWith(".sav")) files.push(full);
	}
	return files;
}

function verifyBinary(root: string, files: string[], options: DecodeOptions): boolean {
	console.log("\n=== SAV Roundtrip (decode → encode → decode) ===\n");
	let ok = 0;
	for (const file of files) {
		const rel = relative(root, file);
		try {
			const result = verifyRoundtrip(readFileSync(file), options);
			if (result.gvasIdentical && result.stable) {
				console.log(`  OK  ${rel} (${saveTypeName(result.saveType)})`);
				ok++;
			} else {
				console.log(`  DIFF ${rel} (orig ${result.originalSize} B, roundtrip ${result.reencodedSize} B)`);
			}
		} catch (err) {
			console.log(`  FAIL ${rel}: ${describeError(err)}`);
		}
	}
	console.log(`\nSAV: ${ok} identisch, ${files.length - ok} abweichend von ${files.length} Dateien`);
	return ok === files.length;
}

/** SAV → XML → SAV: GVAS-Bytes müssen identisch bleiben */
function verifyXml(root: string, files: string[], options: DecodeOptions): boolean {
	console.log("\n=== XML Roundtrip (SAV → XML → SAV) ===\n");
	let ok = 0;
	for (const file of files) {
		const rel = relative(root, file);
		try {
			const data = readFileSync(file);
			const { gvas } = decompressSav(data, { oodle: options.oodle });
			const { tree, saveType } = decodeSave(data, options);
			const parsed = parseSaveXml(convertSaveToXml(tree, saveType));
			const again = writeGvas(parsed.tree, options);
			if (gvas.equals(again)) {
				console.log(`  OK  ${rel}`);
				ok++;
			} else {
				console.log(`  DIFF ${rel} (orig ${gvas.length} B, xml ${again.length} B)`);
			}
		} catch (err) {
			console.log(`  FAIL ${rel}: ${describeError(err)}`);
		}
	}
	console.log(`\nXML: ${ok} identisch von ${files.length} Dateien`);
	return ok === files.length;
}

function main(): number {
	const args = process.argv.slice(2);
	const oodleIdx = args.indexOf("--oodle");
	const oodlePath = oodleIdx >= 0 ? args[oodleIdx + 1] : undefined;
	const dir = args.find((a, i) => !a.startsWith("--") && (oodleIdx < 0 || i !== oodleIdx + 1)) ?? join(process.cwd(), "Example");
	const config = loadConfig(process.env, oodlePath ? { oodleLibraryPath: oodlePath } : {});
	const options: DecodeOptions = { maxDepth: config.maxDepth, oodle: loadOodle(config.oodleLibraryPath) };

	console.log("GVAS Save Tools – Verifikation");
	console.log("Pfad:", dir);
	if (!existsSync(dir)) {
		console.error(`${dir} nicht gefunden`);
		return 1;
	}
	const files = collectSavFiles(dir);
	if (!files.length) {
		console.error(`Keine .sav-Dateien in ${dir}`);
		return 1;
	}

	const binOk = verifyBinary(dir, files, options);
	const xmlOk = args.includes("--xml") ? verifyXml(dir, files, options) : true;

	console.log("\n--- Ergebnis ---");
	console.log("SAV Roundtrip:", binOk ? "PASS" : "FAIL");
	if (args.includes("--xml")) console.log("XML Roundtrip:", xmlOk ? "PASS" : "FAIL");
	return binOk && xmlOk ? 0 : 1;
}

process.exitCode = main();
