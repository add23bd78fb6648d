// Type definitions shared across the refine report modules

/** Numeric per-read columns tracked by the aggregator. */
export const NUMERIC_FIELDS = [
    "fivelen",
    "threelen",
    "polyAlen",
    "insertlen",
] as const;

/** Categorical per-read columns tracked by the aggregator. */
export const CATEGORICAL_FIELDS = ["strand", "primer"] as const;

/** Name of a tracked numeric column. */
export type NumericField = (typeof NUMERIC_FIELDS)[number];

/** Name of a tracked categorical column. */
export type CategoricalField = (typeof CATEGORICAL_FIELDS)[number];

/** The four statistics reported for every numeric column. */
export type StatName = "min" | "mean" | "std" | "max";

/**
 * One row of a per-read `refine` report, parsed and typed.
 */
export interface PerReadRecord {
    /** Length of the detected 5' primer in base pairs. */
    fivelen: number;
    /** Length of the detected 3' primer in base pairs. */
    threelen: number;
    /** Length of the poly(A) tail in base pairs. */
    polyAlen: number;
    /** Length of the insert in base pairs. */
    insertlen: number;
    /** Strand label, usually "+" or "-". */
    strand: string;
    /** Identifier of the primer pair detected on the read. */
    primer: string;
}

/** Raw row as decoded from a header-keyed table. */
export type RawReadRow = Readonly<Record<string, string | number | undefined>>;

/** Label to occurrence count. */
export type LabelCounts = Record<string, number>;

/** Finalized statistics for one numeric column. */
export interface FieldSummary {
    min: number;
    mean: number;
    std: number;
    max: number;
}

/**
 * Finalized aggregate for one sample, flattened using the
 * `<stat>_<field>` and `<field>_counts` naming convention.
 */
export type SampleAggregate = {
    readonly [K in `${StatName}_${NumericField}`]: number;
} & {
    readonly [K in `${CategoricalField}_counts`]: LabelCounts;
};

/** Opaque per-sample summary payload, passed through untouched. */
export type SampleSummary = Readonly<Record<string, unknown>>;

/** Union of summary and aggregate fields for one sample. */
export type MergedRecord = Record<string, unknown>;

/** Per-sample summaries keyed by sample name. */
export type SummaryMap = ReadonlyMap<string, SampleSummary>;

/** Per-sample aggregates keyed by sample name. */
export type AggregateMap = ReadonlyMap<string, SampleAggregate>;

/** Warning raised when the summary and per-read sources disagree on samples. */
export interface KeySetMismatchWarning {
    kind: "KeySetMismatch";
    /** Samples that only have a summary. */
    onlyInSummaries: string[];
    /** Samples that only have a per-read aggregate. */
    onlyInAggregates: string[];
    /** Sorted union of both lists. */
    symmetricDifference: string[];
}

/** Warning raised when sample names cannot be used as a join key. */
export interface IncompatibleSampleNamingWarning {
    kind: "IncompatibleSampleNaming";
}

/** Warning raised when two files of the same kind resolve to one sample name. */
export interface DuplicateSampleWarning {
    kind: "DuplicateSample";
    sample: string;
    source: "summary" | "reads";
    /** The file that was replaced. */
    previousPath: string;
    /** The file that is kept. */
    path: string;
}

/** Non-fatal condition reported through the logger. */
export type ReconcileWarning =
    | KeySetMismatchWarning
    | IncompatibleSampleNamingWarning
    | DuplicateSampleWarning;

/**
 * A sample whose data could not be loaded.
 * Scoped to one file so the rest of the batch still completes.
 */
export interface SampleFailure {
    sample: string;
    source: "summary" | "reads";
    path: string;
    /** Error name, e.g. "MalformedRecordError". */
    errorType: string;
    message: string;
    /** 1-based data row of a malformed per-read row. */
    row?: number;
}

/** Files contributing to one sample. */
export interface SampleSources {
    summary?: string;
    reads?: string;
}

/** Result of reconciling summaries with aggregates. */
export interface ReconcileResult {
    /** Merged records keyed by sample name. */
    data: Map<string, MergedRecord>;
    warnings: ReconcileWarning[];
}
