// Streaming reader for refine per-read CSV reports

import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import { MalformedRecordError } from "./errors";

/**
 * Splits one CSV record into fields.
 * Fields may be wrapped in double quotes; a doubled quote inside a quoted field
 * is a literal quote, and a quoted field may span lines.
 *
 * @param line - The record without its terminator.
 * @returns The field values.
 * @throws {MalformedRecordError} If a quoted field is not closed.
 */
export function splitCsvLine(line: string): string[] {
    const fields: string[] = [];
    let current = "";
    let inQuotes = false;

    for (let i = 0; i < line.length; i++) {
        const ch = line[i];
        if (inQuotes) {
            if (ch === '"') {
                if (line[i + 1] === '"') {
                    current += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                current += ch;
            }
        } else if (ch === '"') {
            inQuotes = true;
        } else if (ch === ",") {
            fields.push(current);
            current = "";
        } else {
            current += ch;
        }
    }
    if (inQuotes) {
        throw new MalformedRecordError("unclosed quoted field");
    }
    fields.push(current);
    return fields;
}

/**
 * Reports whether a partial record ends inside a quoted field.
 * Every quote toggles the state, and an escaped quote is two toggles.
 *
 * @param text - The record text read so far.
 * @returns True when more lines are needed to close a quoted field.
 */
function endsInsideQuotes(text: string): boolean {
    let quotes = 0;
    for (const ch of text) {
        if (ch === '"') quotes++;
    }
    return quotes % 2 === 1;
}

/**
 * Streams the data rows of a CSV file as header-keyed objects.
 * The first non-empty record is the header; blank lines between records are
 * skipped. A quoted field may contain line breaks, which are kept as "\n".
 *
 * @param path - The path to the CSV file.
 * @yields One object per data row, keyed by header name.
 * @throws {MalformedRecordError} If a row has a different number of fields than
 * the header, or the file ends inside a quoted field.
 */
export async function* readReportRows(
    path: string,
): AsyncGenerator<Record<string, string>> {
    const input = createReadStream(path, "utf-8");
    const rl = createInterface({
        input,
        crlfDelay: Number.POSITIVE_INFINITY,
    });

    let header: string[] | undefined;
    let rowNumber = 0;
    let pending: string | undefined;

    try {
        for await (const line of rl) {
            if (pending === undefined) {
                if (line.trim().length === 0) continue;
                pending = line;
            } else {
                pending += `\n${line}`;
            }
            if (endsInsideQuotes(pending)) continue;

            const record = pending;
            pending = undefined;

            if (header === undefined) {
                header = splitCsvLine(record.replace(/^\uFEFF/, ""));
                continue;
            }

            rowNumber++;
            const fields = splitCsvLine(record);
            if (fields.length !== header.length) {
                throw new MalformedRecordError(
                    `expected ${header.length} fields, got ${fields.length}`,
                    { source: path, row: rowNumber },
                );
            }

            const row: Record<string, string> = {};
            for (let i = 0; i < header.length; i++) {
                row[header[i]] = fields[i];
            }
            yield row;
        }

        if (pending !== undefined) {
            throw new MalformedRecordError("unclosed quoted field", {
                source: path,
                row: header === undefined ? undefined : rowNumber + 1,
            });
        }
    } finally {
        rl.close();
        input.destroy();
    }
}
