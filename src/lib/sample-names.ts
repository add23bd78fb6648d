// Derives sample names from report file paths

import { basename } from "node:path";

/** Naming options shared by the JSON and CSV sources. */
export interface SampleNameOptions {
    /** Return the raw file name instead of a cleaned one. */
    useFilenameAsSampleName: boolean;
    /** Extensions to strip from the end of the file name. */
    cleanExtensions: readonly string[];
}

/**
 * Derives a sample name from a file path.
 * The longest matching clean extension is removed once, so `s1.report.json`
 * and `s1.report.csv` both become `s1`.
 *
 * @param path - The path to the report file.
 * @param options - The naming policy.
 * @returns The sample name.
 */
export function sampleNameFromPath(
    path: string,
    options: SampleNameOptions,
): string {
    const name = basename(path);
    if (options.useFilenameAsSampleName) return name;

    const extension = [...options.cleanExtensions]
        .sort((a, b) => b.length - a.length)
        .find((ext) => ext.length > 0 && name.endsWith(ext));

    if (extension === undefined || extension.length === name.length) {
        return name;
    }
    return name.slice(0, name.length - extension.length);
}
