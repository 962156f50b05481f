import { describe, expect, it } from "vitest";

import { ConfigError, DEFAULT_SCAN_CONFIG, resolveScanConfig, scanConfigFromEnv, withScanConfigDefaults } from "../src/index";

describe("scan config", () => {
    it("fills every field from the defaults", () => {
        expect(resolveScanConfig()).toEqual(DEFAULT_SCAN_CONFIG);
        expect(resolveScanConfig({ maxExpansions: 5 })).toEqual({ ...DEFAULT_SCAN_CONFIG, maxExpansions: 5 });
    });

    it("treats explicitly undefined fields as unset", () => {
        expect(withScanConfigDefaults({ hopDurationMs: undefined }).hopDurationMs).toBe(20);
    });

    it("rejects an overlap that is not shorter than the chunk", () => {
        expect(() => resolveScanConfig({ chunkDurationMs: 6000, chunkOverlapMs: 6000 })).toThrow(
            "invalid scan config: chunkOverlapMs: chunkOverlapMs must be less than chunkDurationMs"
        );
    });

    it("collects every invalid field", () => {
        try {
            resolveScanConfig({ hopDurationMs: 0, maxExpansions: 1.5, confidenceThreshold: -0.1 });
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigError);
            const issues = err instanceof ConfigError ? err.issues : [];
            expect(issues).toHaveLength(3);
            expect(issues.map((i) => i.split(":")[0])).toEqual(["hopDurationMs", "maxExpansions", "confidenceThreshold"]);
        }
    });
});

describe("scanConfigFromEnv", () => {
    it("reads GAP_SCAN_* variables and ignores empty ones", () => {
        const config = scanConfigFromEnv({
            GAP_SCAN_CHUNK_DURATION_MS: "10000",
            GAP_SCAN_CHUNK_OVERLAP_MS: " 4000 ",
            GAP_SCAN_ONSET_SNR_THRESHOLD_DB: "9.5",
            GAP_SCAN_MAX_EXPANSIONS: "",
            GAP_SCAN_LOG_LEVEL: "debug",
        });
        expect(config).toEqual({
            ...DEFAULT_SCAN_CONFIG,
            chunkDurationMs: 10000,
            chunkOverlapMs: 4000,
            onsetSnrThresholdDb: 9.5,
            logLevel: "debug",
        });
    });

    it("reports malformed variables by name", () => {
        expect(() => scanConfigFromEnv({ GAP_SCAN_HOP_DURATION_MS: "fast", GAP_SCAN_LOG_LEVEL: "loud" })).toThrow(
            new ConfigError("invalid scan environment", [
                "GAP_SCAN_HOP_DURATION_MS: must be a number",
                "GAP_SCAN_LOG_LEVEL: expected one of debug, info, warn, error, silent",
            ])
        );
    });

    it("validates the resolved values", () => {
        expect(() => scanConfigFromEnv({ GAP_SCAN_CHUNK_OVERLAP_MS: "12000" })).toThrow(ConfigError);
    });
});
