// Finds refine report files under a directory

import { readdir, realpath, stat } from "node:fs/promises";
import { join, relative } from "node:path";
import picomatch from "picomatch";

/** Glob patterns for the two kinds of refine report files. */
export interface RefinePatterns {
    /** Glob matching JSON summaries. */
    summaryPattern: string;
    /** Glob matching per-read CSV reports. */
    readsPattern: string;
}

/** Files found by {@link findRefineFiles}. */
export interface RefineFiles {
    /** Sorted relative paths of JSON summaries. */
    summaries: string[];
    /** Sorted relative paths of per-read CSV reports. */
    reads: string[];
    /** Whether the listing stopped at the file cap. */
    capped: boolean;
}

/**
 * Recursively lists regular files under dir, returning paths relative to root.
 * Symlinked directories are followed once; cycles are skipped.
 *
 * @param dir - The directory to list.
 * @param root - The directory paths are made relative to.
 * @param maxEntries - Maximum number of files to return.
 * @param visited - Real paths of directories already listed.
 * @returns An object with the file list and whether the cap was hit.
 */
async function listFilesRecursive(
    dir: string,
    root: string,
    maxEntries: number,
    visited: Set<string>,
): Promise<{
    /** The list of relative file paths. */
    files: string[];
    /** Whether the listing was capped at the maximum. */
    capped: boolean;
}> {
    const files: string[] = [];

    const dirReal = await realpath(dir);
    if (visited.has(dirReal)) {
        return { files, capped: false };
    }
    visited.add(dirReal);

    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
        if (files.length >= maxEntries) {
            return { files, capped: true };
        }
        const fullPath = join(dir, entry.name);

        let isDirectory = entry.isDirectory();
        let isFile = entry.isFile();
        if (entry.isSymbolicLink()) {
            try {
                const target = await stat(fullPath);
                isDirectory = target.isDirectory();
                isFile = target.isFile();
            } catch {
                // Broken symlink
                continue;
            }
        }

        if (isDirectory) {
            const sub = await listFilesRecursive(
                fullPath,
                root,
                maxEntries - files.length,
                visited,
            );
            files.push(...sub.files);
            if (sub.capped) {
                return { files, capped: true };
            }
        } else if (isFile) {
            files.push(relative(root, fullPath));
        }
    }
    return { files, capped: false };
}

/**
 * Finds JSON summaries and per-read CSV reports under a directory.
 * A file matching both patterns is treated as a summary.
 *
 * @param dir - The directory to search.
 * @param patterns - The globs for each file kind.
 * @param maxFiles - Maximum number of files to list before giving up.
 * @returns A promise resolving to the matched files.
 */
export async function findRefineFiles(
    dir: string,
    patterns: RefinePatterns,
    maxFiles = 10_000,
): Promise<RefineFiles> {
    const isSummary = picomatch(patterns.summaryPattern);
    const isReads = picomatch(patterns.readsPattern);

    const { files, capped } = await listFilesRecursive(
        dir,
        dir,
        maxFiles,
        new Set<string>(),
    );

    const summaries: string[] = [];
    const reads: string[] = [];
    for (const file of files) {
        if (isSummary(file)) {
            summaries.push(file);
        } else if (isReads(file)) {
            reads.push(file);
        }
    }

    return { summaries: summaries.sort(), reads: reads.sort(), capped };
}
