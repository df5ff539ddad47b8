// packages/shared-types/src/index.ts
//
// Contract types shared by the coverage runner and its helpers.
// NO runtime logic, only types.

/* ------------------------------------------------------------------ */
/*  Report rows                                                        */
/* ------------------------------------------------------------------ */

export type RowStatus = "pending" | "success" | "failure" | "skipped";

export type ColumnKey =
    | "sequence"
    | "locator"
    | "status"
    | "reason"
    | "decoderCount"
    | "referenceCount"
    | "countDelta"
    | "maxErr"
    | "psnr"
    | "precision"
    | "remark";

/** Header position of every required column, resolved once per report. */
export type ColumnIndex = Record<ColumnKey, number>;

/** The part of a row the selection policy looks at. */
export type RowState = {
    position: number;
    locator: string;
    status: RowStatus;
    precision: string;
};

/* ------------------------------------------------------------------ */
/*  Run modes                                                          */
/* ------------------------------------------------------------------ */

export type RunMode = "resume" | "retest-all" | "retest-failed" | "retest-imprecise";

/* ------------------------------------------------------------------ */
/*  Comparison results                                                 */
/* ------------------------------------------------------------------ */

export type ComparisonRun = {
    exitCode: number;
    /** stdout, a newline, then stderr. */
    output: string;
    timedOut: boolean;
};

export type Metrics = {
    decoderCount: number;
    referenceCount: number;
    delta: number;
    maxErr: string;
    psnr: string;
    precision: string;
};

export type MetricsOutcome = {
    kind: "metrics";
    metrics: Metrics;
    remark: string;
};

export type FailureOutcome = {
    kind: "failure";
    reason: string;
};

export type SampleOutcome = MetricsOutcome | FailureOutcome;

/* ------------------------------------------------------------------ */
/*  Exemptions                                                         */
/* ------------------------------------------------------------------ */

export type ExemptionKind = "hard_skip" | "tolerance";

export type ExemptionRule = {
    kind: ExemptionKind;
    /** 1-based row position in the report table. */
    index?: number;
    /** Last path segment of the sample locator. */
    basename?: string;
    reason: string;
};

/* ------------------------------------------------------------------ */
/*  Codec profiles                                                     */
/* ------------------------------------------------------------------ */

export type CodecProfile = {
    name: string;
    report: string;
    envVar: string;
    command: string;
    args: string[];
    cwd?: string;
    timeoutSec: number;
    failureKeywords: string[];
    exemptions: ExemptionRule[];
};

export type RunTally = {
    processed: number;
    success: number;
    failure: number;
};
