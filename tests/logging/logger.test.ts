import { describe, it, expect, vi } from "vitest";
import { ConsoleLogger, isLogThreshold, silentLogger } from "../../src/logging/logger";

function sink() {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("ConsoleLogger", () => {
	it("drops messages below the threshold", () => {
		const out = sink();
		const logger = new ConsoleLogger("warn", out);
		logger.debug("d");
		logger.info("i");
		logger.warn("w");
		logger.error("e");
		expect(out.debug).not.toHaveBeenCalled();
		expect(out.info).not.toHaveBeenCalled();
		expect(out.warn).toHaveBeenCalledWith("[stemmer] warn: w");
		expect(out.error).toHaveBeenCalledWith("[stemmer] error: e");
	});

	it("appends the context as JSON", () => {
		const out = sink();
		new ConsoleLogger("debug", out).debug("Stemmer created", { language: "english" });
		expect(out.debug).toHaveBeenCalledWith(
			'[stemmer] debug: Stemmer created {"language":"english"}',
		);
	});

	it("writes nothing when silent", () => {
		const out = sink();
		const logger = new ConsoleLogger("silent", out);
		logger.error("e");
		expect(out.error).not.toHaveBeenCalled();
	});
});

describe("silentLogger", () => {
	it("accepts every level", () => {
		expect(() => silentLogger.error("e", { a: 1 })).not.toThrow();
	});
});

describe("isLogThreshold", () => {
	it("accepts known levels only", () => {
		expect(isLogThreshold("debug")).toBe(true);
		expect(isLogThreshold("silent")).toBe(true);
		expect(isLogThreshold("verbose")).toBe(false);
	});
});
