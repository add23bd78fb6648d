// Plain-text formatting of the refine report tables

import type { ColumnFormat, TableColumn } from "./report-headers";

/** Placeholder for a missing or non-numeric cell. */
export const MISSING_CELL = "-";

/**
 * Formats a cell value according to its column format.
 *
 * @param value - The record value; anything but a finite number is shown as missing.
 * @param format - The column format.
 * @param decimals - Decimal places for decimal columns.
 * @returns The formatted cell.
 */
export function formatValue(
    value: unknown,
    format: ColumnFormat,
    decimals = 2,
): string {
    if (typeof value !== "number" || !Number.isFinite(value)) {
        return MISSING_CELL;
    }
    if (format === "integer") {
        return Math.round(value).toLocaleString("en-US");
    }
    return value.toFixed(decimals);
}

/**
 * Renders records as an aligned plain-text table: a title line, a header line,
 * a rule, then one line per sample. The sample column is left-aligned and value
 * columns are right-aligned.
 *
 * @param title - The table title.
 * @param columns - The columns to show, in order.
 * @param rows - Records keyed by sample name.
 * @returns The table as a newline-joined string.
 */
export function renderTable(
    title: string,
    columns: readonly TableColumn[],
    rows: ReadonlyMap<string, Readonly<Record<string, unknown>>>,
): string {
    const table: string[][] = [
        ["Sample", ...columns.map((column) => column.header.title)],
    ];
    for (const [sample, record] of rows) {
        table.push([
            sample,
            ...columns.map((column) =>
                formatValue(record[column.key], column.header.format),
            ),
        ]);
    }

    const widths = table[0].map((_, i) =>
        Math.max(...table.map((cells) => cells[i].length)),
    );
    const formatLine = (cells: string[]): string =>
        cells
            .map((cell, i) =>
                i === 0 ? cell.padEnd(widths[i]) : cell.padStart(widths[i]),
            )
            .join("  ");

    const [header, ...body] = table;
    return [
        title,
        formatLine(header),
        widths.map((w) => "-".repeat(w)).join("  "),
        ...body.map(formatLine),
    ].join("\n");
}
