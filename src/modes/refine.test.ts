// Tests for the refine report mode: loading, reconciling and writing results

import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { formatWarning } from "../lib/reconciler";
import {
    buildGeneralStatsRows,
    buildRefineTableRows,
    parseRefineLogs,
    RESULTS_FILE_NAME,
    writeResults,
} from "./refine";

/** Header written by `isoseq refine` for the per-read report. */
const CSV_HEADER = "id,strand,fivelen,threelen,polyAlen,insertlen,primer";

/** Summary counts for the complete sample. */
const S1_SUMMARY = {
    num_reads_fl: 100,
    num_reads_flnc: 90,
    num_reads_flnc_polya: 80,
};

/**
 * Creates a temporary directory holding the given files.
 *
 * @param files - File contents keyed by relative path.
 * @returns The directory path.
 */
function makeRunDir(files: Record<string, string>): string {
    const dir = mkdtempSync(join(tmpdir(), "refine-test-"));
    for (const [name, content] of Object.entries(files)) {
        const path = join(dir, name);
        mkdirSync(join(path, ".."), { recursive: true });
        writeFileSync(path, content, "utf-8");
    }
    return dir;
}

/** One complete sample, one summary-only sample, one malformed and one empty CSV. */
const RUN_FILES = {
    "s1.report.json": JSON.stringify(S1_SUMMARY),
    "s1.report.csv": [
        CSV_HEADER,
        "m1/1/ccs,+,10,5,20,500,p1",
        "m1/2/ccs,-,12,7,22,520,p1",
        "",
    ].join("\n"),
    "s2.report.json": '{"num_reads_fl": 5}',
    "s3.report.csv": `${CSV_HEADER}\nm3/1/ccs,+,x,5,20,500,p1\n`,
    "s4.report.csv": `${CSV_HEADER}\n`,
};

describe("parseRefineLogs", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "warn").mockImplementation(() => {});
        vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("merges summary and per-read statistics per sample", async () => {
        const dir = makeRunDir(RUN_FILES);
        const report = await parseRefineLogs(dir);

        expect([...report.data.keys()]).toEqual(["s1", "s2"]);
        expect(report.data.get("s1")).toEqual({
            ...S1_SUMMARY,
            min_fivelen: 10,
            mean_fivelen: 11,
            std_fivelen: 1,
            max_fivelen: 12,
            min_threelen: 5,
            mean_threelen: 6,
            std_threelen: 1,
            max_threelen: 7,
            min_polyAlen: 20,
            mean_polyAlen: 21,
            std_polyAlen: 1,
            max_polyAlen: 22,
            min_insertlen: 500,
            mean_insertlen: 510,
            std_insertlen: 10,
            max_insertlen: 520,
            strand_counts: { "+": 1, "-": 1 },
            primer_counts: { p1: 2 },
        });
        expect(report.data.get("s2")).toEqual({ num_reads_fl: 5 });
        expect(console.log).toHaveBeenCalledWith("  Got 2 samples");
    });

    it("reports samples missing a paired file", async () => {
        const dir = makeRunDir(RUN_FILES);
        const report = await parseRefineLogs(dir);

        const mismatch = {
            kind: "KeySetMismatch" as const,
            onlyInSummaries: ["s2"],
            onlyInAggregates: [],
            symmetricDifference: ["s2"],
        };
        expect(report.warnings).toEqual([mismatch]);
        expect(console.warn).toHaveBeenCalledWith(formatWarning(mismatch));
    });

    it("isolates a malformed per-read file to its own sample", async () => {
        const dir = makeRunDir(RUN_FILES);
        const report = await parseRefineLogs(dir);

        expect(report.failures).toEqual([
            {
                sample: "s3",
                source: "reads",
                path: join(dir, "s3.report.csv"),
                errorType: "MalformedRecordError",
                message: 'column "fivelen" is not a finite number: "x" (row 1)',
                row: 1,
            },
        ]);
        expect(console.error).toHaveBeenCalledWith(
            'Iso-Seq refine: skipping reads file for sample "s3": column "fivelen" is not a finite number: "x" (row 1)',
        );
        expect(report.data.has("s3")).toBe(false);
    });

    it("skips a per-read file without reads", async () => {
        const dir = makeRunDir(RUN_FILES);
        const report = await parseRefineLogs(dir);

        expect(report.data.has("s4")).toBe(false);
        expect(console.warn).toHaveBeenCalledWith(
            `Iso-Seq refine: no reads in ${join(dir, "s4.report.csv")}, skipping`,
        );
    });

    it("records the files behind each sample", async () => {
        const dir = makeRunDir(RUN_FILES);
        const report = await parseRefineLogs(dir);

        expect(report.sources).toEqual(
            new Map([
                [
                    "s1",
                    {
                        summary: join(dir, "s1.report.json"),
                        reads: join(dir, "s1.report.csv"),
                    },
                ],
                ["s2", { summary: join(dir, "s2.report.json") }],
            ]),
        );
    });

    it("records a summary that is not a JSON object as a failure", async () => {
        const dir = makeRunDir({ "s5.report.json": "[1, 2]" });
        const report = await parseRefineLogs(dir);

        expect(report.data.size).toBe(0);
        expect(report.failures).toHaveLength(1);
        expect(report.failures[0].source).toBe("summary");
        expect(report.failures[0].errorType).toBe("MalformedRecordError");
    });

    it("flags raw file names as an unusable join key once for the batch", async () => {
        const dir = makeRunDir({
            "s1.report.json": RUN_FILES["s1.report.json"],
            "s1.report.csv": RUN_FILES["s1.report.csv"],
        });
        const report = await parseRefineLogs(dir, {
            useFilenameAsSampleName: true,
        });

        expect([...report.data.keys()]).toEqual([
            "s1.report.csv",
            "s1.report.json",
        ]);
        expect(report.warnings).toEqual([{ kind: "IncompatibleSampleNaming" }]);
        expect(console.error).toHaveBeenCalledTimes(1);
        expect(console.error).toHaveBeenCalledWith(
            formatWarning({ kind: "IncompatibleSampleNaming" }),
        );
    });

    it("warns when two files resolve to the same sample", async () => {
        const dir = makeRunDir({
            "a/s1.report.json": '{"num_reads_fl": 1}',
            "b/s1.report.json": '{"num_reads_fl": 2}',
        });
        const report = await parseRefineLogs(dir);

        expect(report.data.get("s1")).toEqual({ num_reads_fl: 2 });
        expect(report.warnings).toEqual([
            {
                kind: "DuplicateSample",
                sample: "s1",
                source: "summary",
                previousPath: join(dir, "a/s1.report.json"),
                path: join(dir, "b/s1.report.json"),
            },
            {
                kind: "KeySetMismatch",
                onlyInSummaries: ["s1"],
                onlyInAggregates: [],
                symmetricDifference: ["s1"],
            },
        ]);
    });

    it("lets a later per-read file replace an earlier one even when it fails", async () => {
        const dir = makeRunDir({
            "a/s1.report.csv": RUN_FILES["s1.report.csv"],
            "b/s1.report.csv": RUN_FILES["s3.report.csv"],
        });
        const report = await parseRefineLogs(dir);

        expect(report.data.size).toBe(0);
        expect(report.sources.size).toBe(0);
        expect(report.warnings).toEqual([
            {
                kind: "DuplicateSample",
                sample: "s1",
                source: "reads",
                previousPath: join(dir, "a/s1.report.csv"),
                path: join(dir, "b/s1.report.csv"),
            },
        ]);
        expect(report.failures).toHaveLength(1);
        expect(report.failures[0].path).toBe(join(dir, "b/s1.report.csv"));
        expect(report.failures[0].row).toBe(1);
    });

    it("lets a later per-read file without reads replace an earlier one", async () => {
        const dir = makeRunDir({
            "s1.report.json": RUN_FILES["s1.report.json"],
            "a/s1.report.csv": RUN_FILES["s1.report.csv"],
            "b/s1.report.csv": RUN_FILES["s4.report.csv"],
        });
        const report = await parseRefineLogs(dir);

        expect(report.data.get("s1")).toEqual(S1_SUMMARY);
        expect(report.sources.get("s1")).toEqual({
            summary: join(dir, "s1.report.json"),
        });
        expect(report.warnings.map((w) => w.kind)).toEqual([
            "DuplicateSample",
            "KeySetMismatch",
        ]);
    });

    it("rejects an invalid configuration before reading files", async () => {
        const dir = makeRunDir({});
        await expect(parseRefineLogs(dir, { maxFiles: 0 })).rejects.toThrow(
            "max files must be an integer",
        );
    });
});

describe("writeResults", () => {
    it("writes the merged records as JSON", async () => {
        const outputDir = join(
            mkdtempSync(join(tmpdir(), "refine-out-")),
            "nested",
        );
        const data = new Map<string, Record<string, unknown>>([
            ["s1", { num_reads_fl: 100, mean_fivelen: 11 }],
            ["s2", { num_reads_fl: 5 }],
        ]);

        const path = await writeResults(data, outputDir);

        expect(path).toBe(join(outputDir, RESULTS_FILE_NAME));
        expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual({
            s1: { num_reads_fl: 100, mean_fivelen: 11 },
            s2: { num_reads_fl: 5 },
        });
    });
});

describe("table rows", () => {
    const data = new Map<string, Record<string, unknown>>([
        ["s1", { num_reads_fl: 100, num_reads_flnc: 90, min_fivelen: 10 }],
        ["s2", { mean_insertlen: 510, strand_counts: { "+": 1 } }],
    ]);

    it("selects summary counts for the general statistics table", () => {
        expect(buildGeneralStatsRows(data)).toEqual(
            new Map([["s1", { num_reads_fl: 100, num_reads_flnc: 90 }]]),
        );
    });

    it("selects per-read statistics for the refine table", () => {
        expect(buildRefineTableRows(data)).toEqual(
            new Map<string, Record<string, unknown>>([
                ["s1", { min_fivelen: 10 }],
                ["s2", { mean_insertlen: 510 }],
            ]),
        );
    });
});
