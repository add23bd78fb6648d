// Single-pass aggregation of per-read refine records into per-sample statistics

import { MalformedRecordError } from "./errors";
import { RunningStats } from "./running-stats";
import {
    CATEGORICAL_FIELDS,
    type CategoricalField,
    type LabelCounts,
    NUMERIC_FIELDS,
    type NumericField,
    type PerReadRecord,
    type RawReadRow,
    type SampleAggregate,
} from "./types";

/** Plain decimal or scientific notation, with optional sign and surrounding spaces. */
const DECIMAL_PATTERN = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;

/**
 * Parses one numeric cell, rejecting blanks, non-decimal notations and
 * non-finite values.
 *
 * @param raw - The cell value.
 * @param field - The column name, for error messages.
 * @param rowNumber - The 1-based data row number, if known.
 * @returns The parsed number.
 */
function parseNumericCell(
    raw: string | number | undefined,
    field: NumericField,
    rowNumber: number | undefined,
): number {
    if (raw === undefined) {
        throw new MalformedRecordError(`missing column "${field}"`, {
            row: rowNumber,
        });
    }
    const value =
        typeof raw === "number"
            ? raw
            : DECIMAL_PATTERN.test(raw)
              ? Number.parseFloat(raw)
              : Number.NaN;
    if (!Number.isFinite(value)) {
        throw new MalformedRecordError(
            `column "${field}" is not a finite number: "${raw}"`,
            { row: rowNumber },
        );
    }
    return value;
}

/**
 * Reads one categorical cell, rejecting missing and empty labels.
 *
 * @param raw - The cell value.
 * @param field - The column name, for error messages.
 * @param rowNumber - The 1-based data row number, if known.
 * @returns The label.
 */
function parseLabelCell(
    raw: string | number | undefined,
    field: CategoricalField,
    rowNumber: number | undefined,
): string {
    if (raw === undefined) {
        throw new MalformedRecordError(`missing column "${field}"`, {
            row: rowNumber,
        });
    }
    const label = String(raw);
    if (label.length === 0) {
        throw new MalformedRecordError(`column "${field}" is empty`, {
            row: rowNumber,
        });
    }
    return label;
}

/**
 * Converts a header-keyed row into a typed PerReadRecord.
 * Columns other than the six tracked ones are ignored.
 *
 * @param row - The raw row, or an already typed record.
 * @param rowNumber - The 1-based data row number, used in error messages.
 * @returns The typed record.
 * @throws {MalformedRecordError} If a tracked column is missing or unparseable.
 */
export function parseReadRow(
    row: RawReadRow | PerReadRecord,
    rowNumber?: number,
): PerReadRecord {
    return {
        fivelen: parseNumericCell(row.fivelen, "fivelen", rowNumber),
        threelen: parseNumericCell(row.threelen, "threelen", rowNumber),
        polyAlen: parseNumericCell(row.polyAlen, "polyAlen", rowNumber),
        insertlen: parseNumericCell(row.insertlen, "insertlen", rowNumber),
        strand: parseLabelCell(row.strand, "strand", rowNumber),
        primer: parseLabelCell(row.primer, "primer", rowNumber),
    };
}

/**
 * Running aggregate for one sample. Every tracked field is initialised
 * up front, so an empty aggregator is distinguishable from one that saw zeros.
 */
export class ReadAggregator {
    /** Number of records folded so far. */
    private _count = 0;
    /** One accumulator per numeric column. */
    private readonly numeric: Record<NumericField, RunningStats> = {
        fivelen: new RunningStats(),
        threelen: new RunningStats(),
        polyAlen: new RunningStats(),
        insertlen: new RunningStats(),
    };
    /** One frequency table per categorical column. */
    private readonly categorical: Record<
        CategoricalField,
        Map<string, number>
    > = {
        strand: new Map(),
        primer: new Map(),
    };

    /**
     * The number of records folded so far.
     *
     * @returns The record count.
     */
    get count(): number {
        return this._count;
    }

    /**
     * Folds one record into the running aggregate.
     *
     * @param record - The typed per-read record.
     */
    add(record: PerReadRecord): void {
        this._count++;
        for (const field of NUMERIC_FIELDS) {
            this.numeric[field].add(record[field]);
        }
        for (const field of CATEGORICAL_FIELDS) {
            const counts = this.categorical[field];
            counts.set(record[field], (counts.get(record[field]) ?? 0) + 1);
        }
    }

    /**
     * Combines a partial aggregate of the same sample into this one.
     *
     * @param other - An aggregator that folded a disjoint slice of the rows.
     */
    merge(other: ReadAggregator): void {
        this._count += other._count;
        for (const field of NUMERIC_FIELDS) {
            this.numeric[field].merge(other.numeric[field]);
        }
        for (const field of CATEGORICAL_FIELDS) {
            const counts = this.categorical[field];
            for (const [label, n] of other.categorical[field]) {
                counts.set(label, (counts.get(label) ?? 0) + n);
            }
        }
    }

    /**
     * Finalizes the aggregate.
     *
     * @returns The flattened sample aggregate, or undefined if no records were folded.
     */
    finish(): SampleAggregate | undefined {
        const fivelen = this.numeric.fivelen.toSummary();
        const threelen = this.numeric.threelen.toSummary();
        const polyAlen = this.numeric.polyAlen.toSummary();
        const insertlen = this.numeric.insertlen.toSummary();
        if (!fivelen || !threelen || !polyAlen || !insertlen) {
            return undefined;
        }

        return {
            min_fivelen: fivelen.min,
            mean_fivelen: fivelen.mean,
            std_fivelen: fivelen.std,
            max_fivelen: fivelen.max,
            min_threelen: threelen.min,
            mean_threelen: threelen.mean,
            std_threelen: threelen.std,
            max_threelen: threelen.max,
            min_polyAlen: polyAlen.min,
            mean_polyAlen: polyAlen.mean,
            std_polyAlen: polyAlen.std,
            max_polyAlen: polyAlen.max,
            min_insertlen: insertlen.min,
            mean_insertlen: insertlen.mean,
            std_insertlen: insertlen.std,
            max_insertlen: insertlen.max,
            strand_counts: toLabelCounts(this.categorical.strand),
            primer_counts: toLabelCounts(this.categorical.primer),
        };
    }
}

/**
 * Copies a frequency map into a plain object.
 *
 * @param counts - The label to count map.
 * @returns The same counts as a record.
 */
function toLabelCounts(counts: Map<string, number>): LabelCounts {
    return Object.fromEntries(counts);
}

/**
 * Folds a finite sequence of per-read rows in one pass.
 *
 * @param rows - Raw rows or typed records for one sample.
 * @returns The sample aggregate, or undefined for an empty sequence.
 * @throws {MalformedRecordError} On the first row that fails to parse.
 */
export function foldReads(
    rows: Iterable<RawReadRow | PerReadRecord>,
): SampleAggregate | undefined {
    const aggregator = new ReadAggregator();
    let rowNumber = 0;
    for (const row of rows) {
        rowNumber++;
        aggregator.add(parseReadRow(row, rowNumber));
    }
    return aggregator.finish();
}

/**
 * Folds an asynchronous stream of per-read rows in one pass.
 *
 * @param rows - Raw rows or typed records for one sample.
 * @returns A promise resolving to the sample aggregate, or undefined for an empty stream.
 */
export async function foldReadStream(
    rows: AsyncIterable<RawReadRow | PerReadRecord>,
): Promise<SampleAggregate | undefined> {
    const aggregator = new ReadAggregator();
    let rowNumber = 0;
    for await (const row of rows) {
        rowNumber++;
        aggregator.add(parseReadRow(row, rowNumber));
    }
    return aggregator.finish();
}
