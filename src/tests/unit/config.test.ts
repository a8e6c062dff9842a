import { beforeAll, describe, expect, it } from "vitest";
import { DEFAULT_MAX_DEPTH, loadConfig } from "../../config.js";
import { setLogLevel } from "../../logger.js";

beforeAll(() => setLogLevel("silent"));

describe("loadConfig", () => {
	it("uses defaults without environment", () => {
		expect(loadConfig({})).toEqual({ oodleLibraryPath: null, maxDepth: DEFAULT_MAX_DEPTH, logFile: null, logLevel: "info" });
	});

	it("reads the environment", () => {
		const config = loadConfig({
			GVAS_OODLE_LIB: " /opt/oodle/liboo2corelinux64.so ",
			GVAS_MAX_DEPTH: "64",
			GVAS_LOG_FILE: "logs/run.log",
			GVAS_LOG_LEVEL: "DEBUG"
		});
		expect(config).toEqual({ oodleLibraryPath: "/opt/oodle/liboo2corelinux64.so", maxDepth: 64, logFile: "logs/run.log", logLevel: "debug" });
		expect(Object.isFrozen(config)).toBe(true);
	});

	it("falls back on invalid values", () => {
		const config = loadConfig({ GVAS_MAX_DEPTH: "-3", GVAS_LOG_LEVEL: "loud", GVAS_OODLE_LIB: "   " });
		expect(config.maxDepth).toBe(DEFAULT_MAX_DEPTH);
		expect(config.logLevel).toBe("info");
		expect(config.oodleLibraryPath).toBeNull();
	});

	it("lets overrides win", () => {
		const config = loadConfig({ GVAS_MAX_DEPTH: "64", GVAS_OODLE_LIB: "/opt/oodle.so" }, { maxDepth: 8, oodleLibraryPath: null });
		expect(config.maxDepth).toBe(8);
		expect(config.oodleLibraryPath).toBeNull();
	});
});
