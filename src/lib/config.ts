// Configuration for the refine report, passed explicitly to every consumer

/** Validation bounds for an integer config field. */
export interface ConfigFieldSpec {
    /** Minimum allowed value (inclusive). */
    min: number;
    /** Maximum allowed value (inclusive). */
    max: number;
    /** Default value when the field is omitted. */
    fallback: number;
    /** Human-readable label for error messages. */
    label: string;
}

/**
 * Settings for discovering and joining refine reports.
 */
export interface RefineConfig {
    /** Use raw file names as sample names instead of cleaned names. */
    useFilenameAsSampleName: boolean;
    /** Glob matching JSON summary files, relative to the search directory. */
    summaryPattern: string;
    /** Glob matching per-read CSV files, relative to the search directory. */
    readsPattern: string;
    /** Extensions stripped from file names to derive sample names. */
    cleanExtensions: string[];
    /** Maximum number of files listed while searching. */
    maxFiles: number;
}

/** Bounds for the file listing cap. */
export const MAX_FILES_SPEC: ConfigFieldSpec = {
    min: 1,
    max: 1_000_000,
    fallback: 10_000,
    label: "max files",
};

/** Defaults matching the file names written by `isoseq refine`. */
export const DEFAULT_REFINE_CONFIG: Readonly<RefineConfig> = {
    useFilenameAsSampleName: false,
    summaryPattern: "**/*.report.json",
    readsPattern: "**/*.report.csv",
    cleanExtensions: [".report.json", ".report.csv", ".json", ".csv"],
    maxFiles: MAX_FILES_SPEC.fallback,
};

/**
 * Fills in defaults and validates a partial configuration.
 *
 * @param overrides - Fields to override; undefined fields keep their default.
 * @returns The complete configuration.
 * @throws {Error} If a pattern is empty or maxFiles is out of range.
 */
export function resolveConfig(
    overrides: Partial<RefineConfig> = {},
): RefineConfig {
    const config: RefineConfig = {
        useFilenameAsSampleName:
            overrides.useFilenameAsSampleName ??
            DEFAULT_REFINE_CONFIG.useFilenameAsSampleName,
        summaryPattern:
            overrides.summaryPattern ?? DEFAULT_REFINE_CONFIG.summaryPattern,
        readsPattern:
            overrides.readsPattern ?? DEFAULT_REFINE_CONFIG.readsPattern,
        cleanExtensions: [
            ...(overrides.cleanExtensions ??
                DEFAULT_REFINE_CONFIG.cleanExtensions),
        ],
        maxFiles: overrides.maxFiles ?? DEFAULT_REFINE_CONFIG.maxFiles,
    };

    if (config.summaryPattern.trim() === "") {
        throw new Error("summary pattern must not be empty");
    }
    if (config.readsPattern.trim() === "") {
        throw new Error("reads pattern must not be empty");
    }
    if (
        !Number.isInteger(config.maxFiles) ||
        config.maxFiles < MAX_FILES_SPEC.min ||
        config.maxFiles > MAX_FILES_SPEC.max
    ) {
        throw new Error(
            `${MAX_FILES_SPEC.label} must be an integer between ${MAX_FILES_SPEC.min.toLocaleString("en-US")} and ${MAX_FILES_SPEC.max.toLocaleString("en-US")} (got ${config.maxFiles})`,
        );
    }

    return config;
}
