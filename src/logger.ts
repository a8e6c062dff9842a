import { createWriteStream, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { WriteStream } from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

let stream: WriteStream | null = null;
let level: LogLevel = "info";

function ts(): string {
	return new Date().toISOString().slice(11, 23);
}

export function isLogLevel(value: string): value is LogLevel {
	return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/** Zusätzliche Log-Datei (append), Konsole bleibt aktiv */
export function initLogger(path: string): void {
	closeLogger();
	mkdirSync(dirname(path), { recursive: true });
	stream = createWriteStream(path, { flags: "a" });
	stream.write(`=== gvas-save-tools started ${new Date().toISOString()} ===\n`);
}

export function closeLogger(): void {
	stream?.end();
	stream = null;
}

export function setLogLevel(next: LogLevel): void {
	level = next;
}

function enabled(at: LogLevel): boolean {
	return LEVEL_ORDER[at] >= LEVEL_ORDER[level];
}

function write(tag: string, msg: string): void {
	stream?.write(`${ts()} [${tag}] ${msg}\n`);
}

export function debug(msg: string): void {
	if (!enabled("debug")) return;
	console.debug(`${ts()} [DEBUG] ${msg}`);
	write("DEBUG", msg);
}

export function log(msg: string): void {
	if (!enabled("info")) return;
	console.log(`${ts()} ${msg}`);
	write("INFO", msg);
}

export function warn(msg: string): void {
	if (!enabled("warn")) return;
	console.warn(`${ts()} [WARN] ${msg}`);
	write("WARN", msg);
}

export function error(msg: string, err?: unknown): void {
	if (!enabled("error")) return;
	const detail = err ? ` ${err instanceof Error ? err.stack || err.message : String(err)}` : "";
	console.error(`${ts()} [ERROR] ${msg}${detail}`);
	write("ERROR", `${msg}${detail}`);
}
