import { describe, it, expect } from "vitest";
import {
    formatOutputName,
    isForecastOutputName,
    offsetMinutesBetween,
    parseBundleGenerationTimestamp,
    parseOffsetLabel,
    parseOutputTimestamp,
    parseTimestamp,
    timestampStub,
} from "../src/domain/naming.js";
import { utc } from "./helpers.js";

describe("filename codec", () => {
    it("parses the embedded timestamp of a primary file", () => {
        expect(parseTimestamp("A_20250926200000.raw")).toEqual(
            utc(2025, 9, 26, 20, 0, 0),
        );
        expect(
            parseTimestamp("T_PABV23_C_OKPR_20250926195530.hdf"),
        ).toEqual(utc(2025, 9, 26, 19, 55, 30));
    });

    it("rejects names without a valid timestamp", () => {
        expect(parseTimestamp("index.html")).toBeNull();
        expect(parseTimestamp("A_20251326200000.raw")).toBeNull();
        expect(parseTimestamp("A_20250926250000.raw")).toBeNull();
    });

    it("parses the generation time from a bundle name", () => {
        expect(
            parseBundleGenerationTimestamp(
                "T_PABV23_C_OKPR_20250928.2225.ft60s10.tar",
            ),
        ).toEqual(utc(2025, 9, 28, 22, 25));
        expect(
            parseBundleGenerationTimestamp(
                "T_PABV23_C_OKPR_20250928.1830.ft60s10.tar",
            ),
        ).toEqual(utc(2025, 9, 28, 18, 30));
        expect(parseBundleGenerationTimestamp("invalid_filename.tar")).toBeNull();
    });

    it("reads the _ftNN offset label of a bundle member", () => {
        expect(parseOffsetLabel("T_PABV23_C_OKPR_20250928223500_ft10.hdf")).toBe(10);
        expect(parseOffsetLabel("/tmp/x/T_20250928222500_ft00.hdf")).toBe(0);
        expect(parseOffsetLabel("T_20250928222500_ftxx.hdf")).toBeNull();
        expect(parseOffsetLabel("T_20250928222500.hdf")).toBeNull();
    });

    it("formats output names for each family", () => {
        const ts = utc(2025, 9, 26, 20, 20);
        expect(timestampStub(ts)).toBe("20250926_2020");
        expect(formatOutputName(ts, "overlay")).toBe(
            "radar_20250926_2020_overlay.png",
        );
        expect(
            formatOutputName(ts, "overlay2x", { forecast: true, offsetMinutes: 10 }),
        ).toBe("radar_20250926_2020_forecast_fct10_overlay2x.png");
        expect(
            formatOutputName(ts, "overlay", { forecast: true, offsetMinutes: 5 }),
        ).toBe("radar_20250926_2020_forecast_fct05_overlay.png");
        expect(formatOutputName(ts, "overlay", { forecast: true })).toBe(
            "radar_20250926_2020_forecast_overlay.png",
        );
        expect(formatOutputName(ts, "overlay_extended")).toBe(
            "radar_20250926_2020_overlay_extended.png",
        );
    });

    it("groups output names by their minute stamp", () => {
        expect(
            parseOutputTimestamp("radar_20250926_2020_forecast_fct10_overlay2x.png"),
        ).toEqual(utc(2025, 9, 26, 20, 20));
        expect(parseOutputTimestamp("radar_20250926_2020_overlay.png")).toEqual(
            utc(2025, 9, 26, 20, 20),
        );
        expect(
            parseOutputTimestamp("background_radar_20250926_2020_300.png"),
        ).toBeNull();
        expect(
            isForecastOutputName("radar_20250926_2020_forecast_fct10_overlay.png"),
        ).toBe(true);
        expect(isForecastOutputName("radar_20250926_2020_overlay.png")).toBe(false);
    });

    it("rounds member offsets to whole minutes", () => {
        const generation = utc(2025, 9, 28, 22, 25);
        expect(offsetMinutesBetween(generation, utc(2025, 9, 28, 22, 35, 20))).toBe(10);
        expect(offsetMinutesBetween(generation, utc(2025, 9, 28, 22, 35, 40))).toBe(11);
        expect(offsetMinutesBetween(generation, utc(2025, 9, 28, 22, 20))).toBe(-5);
    });
});
