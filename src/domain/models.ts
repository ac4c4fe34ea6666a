export type OutputFamily = "primary" | "forecast" | "derived";

export type SchedulerMode = "normal" | "quick";

/** Variant name -> absolute path of the produced file. */
export type ArtifactSet = Record<string, string>;

export interface ConversionRequest {
    family: OutputFamily;
    inputPath: string;
    /** Timestamp the outputs are filed under (bundle generation time for forecasts). */
    timestamp: Date;
    offsetMinutes?: number;
    outputs: ArtifactSet;
}

export interface QuickPollState {
    active: boolean;
    attempts: number;
    lastAttempt: Date | null;
}

export interface SchedulerSnapshot {
    mode: SchedulerMode;
    nextPublish: Date;
    quick: QuickPollState;
    trackedFiles: ReadonlyMap<string, Date>;
    completedBundles: ReadonlySet<string>;
}

export interface ForecastCandidate {
    offsetMinutes: number;
    memberPath: string;
}
