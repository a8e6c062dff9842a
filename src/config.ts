/**
 * Laufzeit-Konfiguration aus Umgebungsvariablen, CLI-Flags überschreiben per `overrides`.
 */

import { isLogLevel, warn } from "./logger.js";
import type { LogLevel } from "./logger.js";

export interface ToolConfig {
	/** oo2core-Bibliothek für PlM-Saves (Oodle), sonst null */
	oodleLibraryPath: string | null;
	maxDepth: number;
	logFile: string | null;
	logLevel: LogLevel;
}

export const DEFAULT_MAX_DEPTH = 128;

const defaults: ToolConfig = {
	oodleLibraryPath: null,
	maxDepth: DEFAULT_MAX_DEPTH,
	logFile: null,
	logLevel: "info"
};

function nonEmpty(value: string | undefined): string | null {
	const trimmed = value?.trim();
	return trimmed ? trimmed : null;
}

function parseDepth(value: string | undefined): number {
	const raw = nonEmpty(value);
	if (raw === null) return defaults.maxDepth;
	const n = Number(raw);
	if (!Number.isInteger(n) || n <= 0) {
		warn(`GVAS_MAX_DEPTH ignoriert: "${raw}" ist keine positive Ganzzahl`);
		return defaults.maxDepth;
	}
	return n;
}

function parseLevel(value: string | undefined): LogLevel {
	const raw = nonEmpty(value)?.toLowerCase() ?? null;
	if (raw === null) return defaults.logLevel;
	if (!isLogLevel(raw)) {
		warn(`GVAS_LOG_LEVEL ignoriert: "${raw}"`);
		return defaults.logLevel;
	}
	return raw;
}

function pick<T>(override: T | undefined, fallback: T): T {
	return override === undefined ? fallback : override;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: Partial<ToolConfig> = {}): Readonly<ToolConfig> {
	return Object.freeze({
		oodleLibraryPath: pick(overrides.oodleLibraryPath, nonEmpty(env.GVAS_OODLE_LIB)),
		maxDepth: pick(overrides.maxDepth, parseDepth(env.GVAS_MAX_DEPTH)),
		logFile: pick(overrides.logFile, nonEmpty(env.GVAS_LOG_FILE)),
		logLevel: pick(overrides.logLevel, parseLevel(env.GVAS_LOG_LEVEL))
	});
}
