// Joins per-sample summaries with per-read aggregates on sample name

import type {
    AggregateMap,
    IncompatibleSampleNamingWarning,
    MergedRecord,
    ReconcileResult,
    ReconcileWarning,
    SummaryMap,
} from "./types";

/** Options for the reconciliation precondition. */
export interface ReconcileOptions {
    /** Whether sample names are the raw file names rather than cleaned names. */
    useFilenameAsSampleName: boolean;
}

/**
 * Checks that sample names from the JSON and CSV files can be joined.
 * Raw file names differ between the two sources, so they never match.
 *
 * @param useFilenameAsSampleName - The naming policy in effect for both sources.
 * @returns A naming warning when the policy breaks the join key, otherwise undefined.
 */
export function checkSampleNaming(
    useFilenameAsSampleName: boolean,
): IncompatibleSampleNamingWarning | undefined {
    return useFilenameAsSampleName
        ? { kind: "IncompatibleSampleNaming" }
        : undefined;
}

/**
 * Merges summaries and aggregates into one record per sample.
 *
 * Every sample present in either map appears in the output. Aggregate fields
 * overlay summary fields with the same name. A single KeySetMismatch warning is
 * emitted when the two key sets differ.
 *
 * @param summaries - Summary payloads keyed by sample name.
 * @param aggregates - Per-read aggregates keyed by sample name.
 * @returns The merged records, sorted by sample name, and any warnings.
 */
export function mergeSampleData(
    summaries: SummaryMap,
    aggregates: AggregateMap,
): ReconcileResult {
    const names = [
        ...new Set([...summaries.keys(), ...aggregates.keys()]),
    ].sort();

    const data = new Map<string, MergedRecord>();
    const onlyInSummaries: string[] = [];
    const onlyInAggregates: string[] = [];

    for (const name of names) {
        const summary = summaries.get(name);
        const aggregate = aggregates.get(name);

        if (summary === undefined) onlyInAggregates.push(name);
        if (aggregate === undefined) onlyInSummaries.push(name);

        data.set(name, { ...summary, ...aggregate });
    }

    const warnings: ReconcileWarning[] = [];
    if (onlyInSummaries.length > 0 || onlyInAggregates.length > 0) {
        warnings.push({
            kind: "KeySetMismatch",
            onlyInSummaries,
            onlyInAggregates,
            symmetricDifference: [...onlyInSummaries, ...onlyInAggregates].sort(),
        });
    }

    return { data, warnings };
}

/**
 * Runs the naming precondition and merges the two sources.
 *
 * When the naming policy is incompatible the merge still runs, but the key-set
 * warning is dropped: with an unusable join key every sample would be reported.
 *
 * @param summaries - Summary payloads keyed by sample name.
 * @param aggregates - Per-read aggregates keyed by sample name.
 * @param options - The naming policy shared by both sources.
 * @returns The merged records and the warnings to report.
 */
export function reconcile(
    summaries: SummaryMap,
    aggregates: AggregateMap,
    options: ReconcileOptions,
): ReconcileResult {
    const namingWarning = checkSampleNaming(options.useFilenameAsSampleName);
    const merged = mergeSampleData(summaries, aggregates);

    if (namingWarning) {
        return { data: merged.data, warnings: [namingWarning] };
    }
    return merged;
}

/**
 * Builds the log message for a warning.
 *
 * @param warning - The warning to describe.
 * @returns A single-line message.
 */
export function formatWarning(warning: ReconcileWarning): string {
    switch (warning.kind) {
        case "IncompatibleSampleNaming":
            return (
                "Iso-Seq refine: sample names are taken from raw file names, so JSON and CSV " +
                "files cannot be matched to the same sample; results may be mis-joined. " +
                "Disable the use-filename-as-sample-name option."
            );
        case "KeySetMismatch":
            return (
                "Iso-Seq refine: different sets of JSON and CSV files found " +
                `(JSON only: ${listOrNone(warning.onlyInSummaries)}; ` +
                `CSV only: ${listOrNone(warning.onlyInAggregates)}). ` +
                "Make sure that there is a JSON and a CSV file for each sample"
            );
        case "DuplicateSample":
            return (
                `Iso-Seq refine: duplicate ${warning.source} file for sample ` +
                `"${warning.sample}": ${warning.path} replaces ${warning.previousPath}`
            );
    }
}

/**
 * Joins sample names for a message.
 *
 * @param names - The sample names.
 * @returns A comma-separated list, or "none".
 */
function listOrNone(names: string[]): string {
    return names.length > 0 ? names.join(", ") : "none";
}
