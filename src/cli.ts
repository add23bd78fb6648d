// Command-line entry point for the Iso-Seq refine report.
// Loads refine JSON and CSV reports from a directory and prints per-sample tables.

import { color, ERROR_COLOR, runCli } from "./cli-runner";
import { errorMessage } from "./lib/errors";

runCli(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error) => {
        console.error(color(ERROR_COLOR, `Fatal: ${errorMessage(error)}`));
        process.exit(1);
    });
