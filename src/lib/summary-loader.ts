// Loader for per-sample refine JSON summaries

import { readFile } from "node:fs/promises";
import { errorMessage, MalformedRecordError } from "./errors";
import type { SampleSummary } from "./types";

/**
 * Narrows a decoded JSON value to a plain object.
 *
 * @param value - The decoded JSON value.
 * @returns True if the value is an object that is neither null nor an array.
 */
function isJsonObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Checks that a decoded summary payload is a JSON object and returns it unchanged.
 *
 * @param payload - The decoded JSON value.
 * @param source - The file the payload was read from, for error messages.
 * @returns The payload typed as a sample summary.
 * @throws {MalformedRecordError} If the payload is not a plain object.
 */
export function validateSummary(
    payload: unknown,
    source?: string,
): SampleSummary {
    if (isJsonObject(payload)) return payload;

    const got =
        payload === null
            ? "null"
            : Array.isArray(payload)
              ? "array"
              : typeof payload;
    throw new MalformedRecordError(
        `summary must be a JSON object, got ${got}`,
        { source },
    );
}

/**
 * Reads a refine `.report.json` file.
 *
 * @param path - The filesystem path to the JSON summary.
 * @returns A promise resolving to the validated summary.
 */
export async function loadSummaryFile(path: string): Promise<SampleSummary> {
    const text = await readFile(path, "utf-8");
    let payload: unknown;
    try {
        payload = JSON.parse(text);
    } catch (error) {
        throw new MalformedRecordError(
            `invalid JSON: ${errorMessage(error)}`,
            { source: path },
        );
    }
    return validateSummary(payload, path);
}
