// Display metadata for the refine report tables

import { NUMERIC_FIELDS, type NumericField, type StatName } from "./types";

/** How a column's values are formatted for display. */
export type ColumnFormat = "integer" | "decimal";

/** Display metadata for one table column, passed to the table renderer. */
export interface ColumnHeader {
    /** Short column title. */
    title: string;
    /** Longer description shown as help text. */
    description: string;
    /** Name of the colour scale used by the host report. */
    scale: string;
    /** Number format for the column values. */
    format: ColumnFormat;
}

/** A column key with its display metadata. */
export interface TableColumn {
    /** The record field the column reads. */
    key: string;
    /** How the column is displayed. */
    header: ColumnHeader;
}

/** Namespace under which the general statistics columns are registered. */
export const GENERAL_STATS_NAMESPACE = "refine";

/** Title of the general statistics table, qualified by its namespace. */
export const GENERAL_STATS_TITLE = `General statistics (${GENERAL_STATS_NAMESPACE})`;

/** Summary counts shown in the general statistics table. */
export const GENERAL_STATS_HEADERS: readonly TableColumn[] = [
    {
        key: "num_reads_fl",
        header: {
            title: "Full-length",
            description: "Number of CCS where both primers have been detected",
            scale: "GnBu",
            format: "integer",
        },
    },
    {
        key: "num_reads_flnc",
        header: {
            title: "Non-chimeric full-length",
            description:
                "Number of non-chimeric CCS where both primers have been detected",
            scale: "RdYlGn",
            format: "integer",
        },
    },
    {
        key: "num_reads_flnc_polya",
        header: {
            title: "Poly(A) free non-chimeric full-length",
            description:
                "Number of non-chimeric CCS where both primers have been detected and the poly(A) tail has been removed",
            scale: "GnBu",
            format: "integer",
        },
    },
];

/** Human-readable name and max-column scale for each numeric field. */
const FIELD_LABELS: Record<
    NumericField,
    {
        /** Noun phrase used in titles and descriptions. */
        label: string;
        /** Colour scale of the max column. */
        maxScale: string;
    }
> = {
    fivelen: { label: "5' primer length", maxScale: "GnBu" },
    threelen: { label: "3' primer length", maxScale: "RdYlGn" },
    polyAlen: { label: "polyA tail length", maxScale: "RdYlGn" },
    insertlen: { label: "insert length", maxScale: "RdYlGn" },
};

/** Title prefix and description wording per statistic. */
const STAT_WORDING: Record<
    StatName,
    {
        /** Prefix of the column title. */
        title: string;
        /** Prefix of the column description. */
        description: string;
    }
> = {
    min: { title: "Min", description: "The minimum" },
    mean: { title: "Mean", description: "The mean" },
    std: { title: "Std of", description: "The standard deviation of" },
    max: { title: "Max", description: "The maximum" },
};

/** Display order of the statistics for each field. */
const STAT_ORDER: readonly StatName[] = ["min", "mean", "std", "max"];

/**
 * Builds the sixteen per-read statistic columns, four per numeric field.
 *
 * @returns The columns in display order.
 */
function buildRefineTableHeaders(): TableColumn[] {
    const columns: TableColumn[] = [];
    for (const field of NUMERIC_FIELDS) {
        const { label, maxScale } = FIELD_LABELS[field];
        for (const stat of STAT_ORDER) {
            const wording = STAT_WORDING[stat];
            columns.push({
                key: `${stat}_${field}`,
                header: {
                    title: `${wording.title} ${label}`,
                    description: `${wording.description} ${label} in base pair`,
                    scale:
                        stat === "mean"
                            ? "RdYlGn"
                            : stat === "max"
                              ? maxScale
                              : "GnBu",
                    format: "decimal",
                },
            });
        }
    }
    return columns;
}

/** Aggregate statistics shown in the refine table. */
export const REFINE_TABLE_HEADERS: readonly TableColumn[] =
    buildRefineTableHeaders();

/** Identity and help text of the refine table. */
export const REFINE_TABLE_CONFIG = {
    id: "isoseq_refine_table",
    title: "Iso-Seq refine",
    description: "Iso-Seq refine statistics",
    helptext:
        "The .report.csv file contains information about 5' and 3' primer length, " +
        "insert length, poly(A) length, and the pair of primers detected for each CCS. " +
        "The table presents min, max, mean and standard deviation for each parameter.",
} as const;
