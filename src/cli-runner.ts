// Argument handling and report printing for the refine-qc command line.
// Returns an exit code instead of exiting so the entry point stays a one-liner.

import { parseArgs } from "node:util";
import { version } from "../package.json";
import { MAX_FILES_SPEC } from "./lib/config";
import { errorMessage } from "./lib/errors";
import { renderTable } from "./lib/format-utils";
import {
    GENERAL_STATS_HEADERS,
    GENERAL_STATS_TITLE,
    REFINE_TABLE_CONFIG,
    REFINE_TABLE_HEADERS,
} from "./lib/report-headers";
import {
    buildGeneralStatsRows,
    buildRefineTableRows,
    parseRefineLogs,
    writeResults,
} from "./modes/refine";

// --- ANSI color helpers ---

/** ANSI escape code prefix. */
const ESC = "\x1b[";

/** Resets all ANSI formatting. */
const RESET = `${ESC}0m`;
/** Bold text. */
const BOLD = `${ESC}1m`;
/** Red text for errors. */
const RED = `${ESC}31m`;
/** Yellow text for notices. */
const YELLOW = `${ESC}33m`;

/**
 * Wraps text with an ANSI color code and reset suffix.
 *
 * @param code - The ANSI escape sequence for the color.
 * @param text - The text to colorize.
 * @returns The colorized string.
 */
export function color(code: string, text: string): string {
    return `${code}${text}${RESET}`;
}

/** ANSI code used for error lines. */
export const ERROR_COLOR = RED;

// --- Argument parsing ---

/** CLI argument definitions for node:util parseArgs. */
const argConfig = {
    options: {
        dir: { type: "string" as const, short: "d" },
        output: { type: "string" as const, short: "o" },
        "fn-as-s-name": { type: "boolean" as const, default: false },
        "summary-pattern": { type: "string" as const },
        "reads-pattern": { type: "string" as const },
        "max-files": { type: "string" as const },
        version: { type: "boolean" as const, short: "v", default: false },
        help: { type: "boolean" as const, short: "h", default: false },
    },
    strict: true,
} as const;

/**
 * Parses command-line arguments against {@link argConfig}.
 *
 * @param argv - The arguments after the script name.
 * @returns The parsed values and positionals.
 */
function parseCliArgs(argv: string[]) {
    return parseArgs({ ...argConfig, args: argv });
}

/**
 * Prints CLI usage information.
 */
function printUsage(): void {
    console.log(`${BOLD}refine-qc${RESET} - per-sample Iso-Seq refine statistics

${BOLD}Usage:${RESET}
  refine-qc --dir <path> [options]

${BOLD}Required:${RESET}
  -d, --dir <path>           Directory containing *.report.json and *.report.csv files

${BOLD}Options:${RESET}
  -o, --output <dir>         Write ${BOLD}isoseq_refine_report.json${RESET} to this directory
  --fn-as-s-name             Use raw file names as sample names (breaks JSON/CSV matching)
  --summary-pattern <glob>   Glob for JSON summaries (default: **/*.report.json)
  --reads-pattern <glob>     Glob for per-read CSV reports (default: **/*.report.csv)
  --max-files <n>            Stop listing after n files (default: ${MAX_FILES_SPEC.fallback})

${BOLD}Other:${RESET}
  -v, --version              Print version and exit
  -h, --help                 Print this help and exit

${BOLD}${REFINE_TABLE_CONFIG.description}:${RESET}
  ${REFINE_TABLE_CONFIG.helptext}`);
}

/**
 * Parses the --max-files argument.
 *
 * @param value - The raw string value from parseArgs.
 * @returns The parsed integer, or undefined when absent.
 * @throws {Error} If the value is not an integer.
 */
export function parseMaxFiles(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const n = value.trim() === "" ? Number.NaN : Number(value);
    if (!Number.isInteger(n)) {
        throw new Error(`--max-files must be an integer (got "${value}")`);
    }
    return n;
}

/**
 * Runs the CLI.
 * Parses arguments, loads the reports, prints both tables and optionally writes results.
 *
 * @param argv - The arguments after the script name.
 * @returns A promise resolving to the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
    let parsed: ReturnType<typeof parseCliArgs>;
    try {
        parsed = parseCliArgs(argv);
    } catch (error) {
        console.error(color(RED, `Error: ${errorMessage(error)}`));
        printUsage();
        return 1;
    }

    const { values } = parsed;

    if (values.version) {
        console.log(version);
        return 0;
    }

    if (values.help) {
        printUsage();
        return 0;
    }

    const dir = values.dir;
    if (!dir) {
        console.error(color(RED, "Error: --dir is required"));
        printUsage();
        return 1;
    }

    let maxFiles: number | undefined;
    try {
        maxFiles = parseMaxFiles(values["max-files"]);
    } catch (error) {
        console.error(color(RED, `Error: ${errorMessage(error)}`));
        return 1;
    }

    const report = await parseRefineLogs(dir, {
        useFilenameAsSampleName: values["fn-as-s-name"],
        summaryPattern: values["summary-pattern"],
        readsPattern: values["reads-pattern"],
        maxFiles,
    });

    if (report.data.size === 0) {
        const reason =
            report.failures.length > 0
                ? `all ${report.failures.length} files failed to load`
                : "no refine reports found";
        console.error(color(RED, `Error: ${reason}`));
        return 1;
    }

    console.log(
        `\n${renderTable(GENERAL_STATS_TITLE, GENERAL_STATS_HEADERS, buildGeneralStatsRows(report.data))}\n`,
    );
    console.log(
        `${renderTable(REFINE_TABLE_CONFIG.title, REFINE_TABLE_HEADERS, buildRefineTableRows(report.data))}\n`,
    );

    if (report.warnings.length > 0 || report.failures.length > 0) {
        console.log(
            color(
                YELLOW,
                `[${report.warnings.length} warning(s), ${report.failures.length} failed file(s)]`,
            ),
        );
    }

    if (values.output) {
        const path = await writeResults(report.data, values.output);
        console.log(`Wrote ${path}`);
    }

    return 0;
}
