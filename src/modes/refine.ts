// Refine report mode: discovers, loads, reconciles and persists per-sample results

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { type RefineConfig, resolveConfig } from "../lib/config";
import { findRefineFiles } from "../lib/discovery";
import { errorMessage, MalformedRecordError } from "../lib/errors";
import { foldReadStream } from "../lib/read-aggregator";
import { formatWarning, reconcile } from "../lib/reconciler";
import { readReportRows } from "../lib/report-csv";
import {
    GENERAL_STATS_HEADERS,
    REFINE_TABLE_HEADERS,
    type TableColumn,
} from "../lib/report-headers";
import { sampleNameFromPath } from "../lib/sample-names";
import { loadSummaryFile } from "../lib/summary-loader";
import type {
    MergedRecord,
    ReconcileWarning,
    SampleAggregate,
    SampleFailure,
    SampleSources,
    SampleSummary,
} from "../lib/types";

/** Name of the results file written by {@link writeResults}. */
export const RESULTS_FILE_NAME = "isoseq_refine_report.json";

/** Everything produced by one pass over a directory of refine reports. */
export interface RefineReport {
    /** Merged records keyed by sample name, sorted by name. */
    data: Map<string, MergedRecord>;
    /** Non-fatal consistency warnings, in the order they were raised. */
    warnings: ReconcileWarning[];
    /** Files that could not be loaded. */
    failures: SampleFailure[];
    /** Files contributing to each sample. */
    sources: Map<string, SampleSources>;
}

/**
 * Logs a warning at the level matching its severity.
 *
 * @param warning - The warning to log.
 */
function logWarning(warning: ReconcileWarning): void {
    if (warning.kind === "IncompatibleSampleNaming") {
        console.error(formatWarning(warning));
    } else {
        console.warn(formatWarning(warning));
    }
}

/**
 * Builds a failure record for a file that could not be loaded.
 *
 * @param sample - The sample name derived from the file.
 * @param source - Which kind of file failed.
 * @param path - The file path.
 * @param error - The caught error.
 * @returns The failure record.
 */
function toFailure(
    sample: string,
    source: SampleFailure["source"],
    path: string,
    error: unknown,
): SampleFailure {
    const failure: SampleFailure = {
        sample,
        source,
        path,
        errorType: error instanceof Error ? error.name : "Error",
        message: errorMessage(error),
    };
    if (error instanceof MalformedRecordError && error.row !== undefined) {
        failure.row = error.row;
    }
    return failure;
}

/**
 * Records that a file contributes to a sample, returning any file it replaces.
 *
 * @param sources - The per-sample source table.
 * @param sample - The sample name.
 * @param source - Which kind of file this is.
 * @param path - The file path.
 * @returns The previously recorded file of the same kind, if any.
 */
function addSource(
    sources: Map<string, SampleSources>,
    sample: string,
    source: "summary" | "reads",
    path: string,
): string | undefined {
    const entry = sources.get(sample) ?? {};
    const previous = entry[source];
    entry[source] = path;
    sources.set(sample, entry);
    return previous;
}

/**
 * Forgets a file that turned out to contribute nothing to its sample.
 *
 * @param sources - The per-sample source table.
 * @param sample - The sample name.
 * @param source - Which kind of file to forget.
 */
function removeSource(
    sources: Map<string, SampleSources>,
    sample: string,
    source: "summary" | "reads",
): void {
    const entry = sources.get(sample);
    if (!entry) return;
    delete entry[source];
    if (entry.summary === undefined && entry.reads === undefined) {
        sources.delete(sample);
    }
}

/**
 * Loads every refine report under a directory and reconciles them per sample.
 *
 * A file that fails to load is recorded as a failure for its sample and the
 * rest of the batch continues. When two files of the same kind resolve to one
 * sample, the later one in path order replaces the earlier one even if it then
 * fails to load or holds no reads. Warnings and failures are logged as they are
 * collected and also returned.
 *
 * @param dir - The directory to search.
 * @param overrides - Configuration overrides.
 * @returns A promise resolving to the merged data, warnings, failures and sources.
 */
export async function parseRefineLogs(
    dir: string,
    overrides: Partial<RefineConfig> = {},
): Promise<RefineReport> {
    const config = resolveConfig(overrides);

    console.log(`Searching for Iso-Seq refine reports in ${dir}...`);
    const files = await findRefineFiles(dir, config, config.maxFiles);
    if (files.capped) {
        console.warn(
            `Iso-Seq refine: stopped listing after ${config.maxFiles} files; some reports may be missing`,
        );
    }
    console.log(
        `  Got ${files.summaries.length} JSON and ${files.reads.length} CSV files`,
    );

    const warnings: ReconcileWarning[] = [];
    const failures: SampleFailure[] = [];
    const sources = new Map<string, SampleSources>();
    const summaries = new Map<string, SampleSummary>();
    const aggregates = new Map<string, SampleAggregate>();

    /**
     * Records a warning and logs it.
     *
     * @param warning - The warning to record.
     */
    function warn(warning: ReconcileWarning): void {
        warnings.push(warning);
        logWarning(warning);
    }

    /**
     * Records a failure and logs it.
     *
     * @param failure - The failure to record.
     */
    function fail(failure: SampleFailure): void {
        failures.push(failure);
        console.error(
            `Iso-Seq refine: skipping ${failure.source} file for sample "${failure.sample}": ${failure.message}`,
        );
    }

    for (const file of files.summaries) {
        const path = join(dir, file);
        const sample = sampleNameFromPath(file, config);
        const previousPath = addSource(sources, sample, "summary", path);
        if (previousPath !== undefined) {
            summaries.delete(sample);
            warn({
                kind: "DuplicateSample",
                sample,
                source: "summary",
                previousPath,
                path,
            });
        }
        try {
            summaries.set(sample, await loadSummaryFile(path));
        } catch (error) {
            removeSource(sources, sample, "summary");
            fail(toFailure(sample, "summary", path, error));
        }
    }

    for (const file of files.reads) {
        const path = join(dir, file);
        const sample = sampleNameFromPath(file, config);
        const previousPath = addSource(sources, sample, "reads", path);
        if (previousPath !== undefined) {
            aggregates.delete(sample);
            warn({
                kind: "DuplicateSample",
                sample,
                source: "reads",
                previousPath,
                path,
            });
        }
        let aggregate: SampleAggregate | undefined;
        try {
            aggregate = await foldReadStream(readReportRows(path));
        } catch (error) {
            removeSource(sources, sample, "reads");
            fail(toFailure(sample, "reads", path, error));
            continue;
        }
        if (aggregate === undefined) {
            removeSource(sources, sample, "reads");
            console.warn(`Iso-Seq refine: no reads in ${path}, skipping`);
            continue;
        }
        aggregates.set(sample, aggregate);
    }

    const result = reconcile(summaries, aggregates, config);
    for (const warning of result.warnings) {
        warn(warning);
    }

    console.log(`  Got ${result.data.size} samples`);

    return { data: result.data, warnings, failures, sources };
}

/**
 * Writes merged records to `isoseq_refine_report.json` in the output directory.
 *
 * @param data - Merged records keyed by sample name.
 * @param outputDir - The directory to write to; created if missing.
 * @returns A promise resolving to the path of the written file.
 */
export async function writeResults(
    data: ReadonlyMap<string, MergedRecord>,
    outputDir: string,
): Promise<string> {
    await mkdir(outputDir, { recursive: true });
    const path = join(outputDir, RESULTS_FILE_NAME);
    await writeFile(
        path,
        `${JSON.stringify(Object.fromEntries(data), null, 4)}\n`,
        "utf-8",
    );
    return path;
}

/**
 * Keeps only the given columns of each record, dropping samples with none of them.
 *
 * @param data - Merged records keyed by sample name.
 * @param columns - The columns to keep.
 * @returns The narrowed records.
 */
function pickColumns(
    data: ReadonlyMap<string, MergedRecord>,
    columns: readonly TableColumn[],
): Map<string, MergedRecord> {
    const rows = new Map<string, MergedRecord>();
    for (const [sample, record] of data) {
        const row: MergedRecord = {};
        for (const { key } of columns) {
            if (record[key] !== undefined) row[key] = record[key];
        }
        if (Object.keys(row).length > 0) rows.set(sample, row);
    }
    return rows;
}

/**
 * Selects the summary counts for the general statistics table.
 *
 * @param data - Merged records keyed by sample name.
 * @returns Rows holding only the general statistics columns.
 */
export function buildGeneralStatsRows(
    data: ReadonlyMap<string, MergedRecord>,
): Map<string, MergedRecord> {
    return pickColumns(data, GENERAL_STATS_HEADERS);
}

/**
 * Selects the sixteen per-read statistics for the refine table.
 *
 * @param data - Merged records keyed by sample name.
 * @returns Rows holding only the refine table columns.
 */
export function buildRefineTableRows(
    data: ReadonlyMap<string, MergedRecord>,
): Map<string, MergedRecord> {
    return pickColumns(data, REFINE_TABLE_HEADERS);
}
