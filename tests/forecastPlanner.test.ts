import { describe, it, expect } from "vitest";
import { planForecastMembers } from "../src/application/forecastPlanner.js";
import { utc } from "./helpers.js";

describe("planForecastMembers", () => {
    const generation = utc(2025, 9, 28, 22, 25);

    it("orders members by offset and reports what it skipped", () => {
        const members = [
            "/tmp/b/T_PABV23_C_OKPR_20250928223500_ft10.hdf",
            "/tmp/b/T_PABV23_C_OKPR_20250928222000_ft00.hdf",
            "/tmp/b/T_PABV23_C_OKPR_20250928224500_ft15.hdf",
            "/tmp/b/T_PABV23_C_OKPR_20250928222500_ft00.hdf",
            "/tmp/b/readme.hdf",
            "/tmp/b/T_PABV23_C_OKPR_20250928223000.hdf",
        ];

        const plan = planForecastMembers(members, generation);

        expect(plan.candidates).toEqual([
            {
                offsetMinutes: 0,
                memberPath: "/tmp/b/T_PABV23_C_OKPR_20250928222500_ft00.hdf",
            },
            {
                offsetMinutes: 10,
                memberPath: "/tmp/b/T_PABV23_C_OKPR_20250928223500_ft10.hdf",
            },
            {
                offsetMinutes: 20,
                memberPath: "/tmp/b/T_PABV23_C_OKPR_20250928224500_ft15.hdf",
            },
        ]);
        expect(plan.skipped).toEqual([
            {
                memberPath: "/tmp/b/T_PABV23_C_OKPR_20250928222000_ft00.hdf",
                reason: "negative-offset",
            },
            { memberPath: "/tmp/b/readme.hdf", reason: "no-timestamp" },
            {
                memberPath: "/tmp/b/T_PABV23_C_OKPR_20250928223000.hdf",
                reason: "no-label",
            },
        ]);
        expect(plan.mismatched).toEqual([
            {
                memberPath: "/tmp/b/T_PABV23_C_OKPR_20250928224500_ft15.hdf",
                label: 15,
                computed: 20,
            },
        ]);
    });

    it("drops a member seconds before the generation time", () => {
        const early = "/tmp/b/T_PABV23_C_OKPR_20250928222445_ft00.hdf";
        const plan = planForecastMembers([early], generation);
        expect(plan.candidates).toEqual([]);
        expect(plan.skipped).toEqual([
            { memberPath: early, reason: "negative-offset" },
        ]);
    });

    it("returns an empty plan for an empty bundle", () => {
        expect(planForecastMembers([], generation)).toEqual({
            candidates: [],
            skipped: [],
            mismatched: [],
        });
    });
});
