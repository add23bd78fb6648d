// Error types raised while loading refine reports

/** Location details attached to a malformed input error. */
export interface MalformedRecordDetails {
    /** The file the record came from, when known. */
    source?: string;
    /** The 1-based data row number, when the record is a table row. */
    row?: number;
}

/**
 * Raised when a per-read row has an unparseable field or a summary payload is not
 * a JSON object. Fatal to the sample it belongs to only.
 */
export class MalformedRecordError extends Error {
    /** The 1-based data row number, when known. */
    readonly row?: number;

    /**
     * Creates a MalformedRecordError.
     *
     * @param message - Description of what was wrong with the record.
     * @param details - Optional source file and row number.
     */
    constructor(message: string, details: MalformedRecordDetails = {}) {
        const where = [
            details.source,
            details.row === undefined ? undefined : `row ${details.row}`,
        ]
            .filter((part) => part !== undefined)
            .join(", ");
        super(where ? `${message} (${where})` : message);
        this.name = "MalformedRecordError";
        this.row = details.row;
    }
}

/**
 * Formats an unknown thrown value as a message string.
 *
 * @param error - The caught value.
 * @returns The error message.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
