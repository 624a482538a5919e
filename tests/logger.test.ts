import { describe, expect, it } from "vitest";
import { configureLogger, getLogger, previewResult, resolveLogLevel } from "../src/logger";

describe("previewResult", () => {
    it("renders results for the tool log and caps their length", () => {
        expect(previewResult({ ok: true })).toBe('{"ok":true}');
        expect(previewResult("z".repeat(150))).toBe(`${"z".repeat(97)}...`);
    });

    it("falls back to plain text for values JSON cannot encode", () => {
        const cyclic: Record<string, unknown> = {};
        cyclic.self = cyclic;
        expect(previewResult(10n)).toBe("10");
        expect(previewResult(cyclic)).toBe("[object Object]");
    });
});

describe("log levels", () => {
    it("keeps test runs silent", () => {
        expect(resolveLogLevel("debug", { VITEST: "true" })).toBe("silent");
        expect(resolveLogLevel("debug", { NODE_ENV: "test" })).toBe("silent");
        expect(resolveLogLevel("debug", {})).toBe("debug");
    });

    it("applies the configured level to module loggers created before and after", () => {
        const early = getLogger("logger-test.early");
        try {
            configureLogger("warn", {});
            expect(early.level).toBe("warn");
            expect(getLogger("logger-test.late").level).toBe("warn");
            expect(getLogger("logger-test.early")).toBe(early);
        } finally {
            configureLogger("info");
        }
        expect(early.level).toBe("silent");
    });
});
