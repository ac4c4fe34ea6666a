import path from "node:path";
import type { ForecastCandidate } from "../domain/models.js";
import {
    offsetMinutesBetween,
    parseOffsetLabel,
    parseTimestamp,
} from "../domain/naming.js";
import { logger } from "../logger.js";
import { toIso } from "../util/time.js";

export type ForecastSkipReason = "no-timestamp" | "no-label" | "negative-offset";

export interface ForecastPlan {
    candidates: ForecastCandidate[];
    skipped: Array<{ memberPath: string; reason: ForecastSkipReason }>;
    /** Members whose `_ftNN` label disagrees with the computed offset. */
    mismatched: Array<{ memberPath: string; label: number; computed: number }>;
}

/**
 * Offsets of bundle members relative to the bundle's generation time `G`:
 * `round((M - G) / 1 min)` from each member's own timestamp `M`. Members before
 * `G` are dropped, even when they would round to zero. A disagreeing label is
 * reported, and the computed offset wins. Candidates come back in ascending
 * offset order.
 */
export function planForecastMembers(
    members: readonly string[],
    generation: Date,
): ForecastPlan {
    const plan: ForecastPlan = { candidates: [], skipped: [], mismatched: [] };

    for (const memberPath of members) {
        const name = path.basename(memberPath);
        const ts = parseTimestamp(name);
        if (!ts) {
            logger.debug("Skipping forecast member without timestamp", {
                component: "ForecastPlanner",
                member: name,
            });
            plan.skipped.push({ memberPath, reason: "no-timestamp" });
            continue;
        }

        const label = parseOffsetLabel(name);
        if (label === null) {
            logger.warn("Cannot derive forecast offset label", {
                component: "ForecastPlanner",
                member: name,
            });
            plan.skipped.push({ memberPath, reason: "no-label" });
            continue;
        }

        if (ts < generation) {
            logger.debug("Skipping forecast member before generation time", {
                component: "ForecastPlanner",
                member: name,
                memberAtIso: toIso(ts),
                generationAtIso: toIso(generation),
            });
            plan.skipped.push({ memberPath, reason: "negative-offset" });
            continue;
        }

        const computed = offsetMinutesBetween(generation, ts);
        if (computed !== label) {
            logger.warn("Forecast offset label mismatch; using computed offset", {
                component: "ForecastPlanner",
                member: name,
                label,
                computed,
            });
            plan.mismatched.push({ memberPath, label, computed });
        }
        plan.candidates.push({ offsetMinutes: computed, memberPath });
    }

    plan.candidates.sort((a, b) => a.offsetMinutes - b.offsetMinutes);
    return plan;
}
