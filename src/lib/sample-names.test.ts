// Unit tests for sample name derivation

import { describe, expect, it } from "vitest";
import { DEFAULT_REFINE_CONFIG } from "./config";
import { sampleNameFromPath } from "./sample-names";

/** Default naming policy with cleaned names. */
const cleaned = {
    useFilenameAsSampleName: false,
    cleanExtensions: DEFAULT_REFINE_CONFIG.cleanExtensions,
};

describe("sampleNameFromPath", () => {
    it("gives JSON and CSV reports of one sample the same name", () => {
        expect(sampleNameFromPath("run1/s1.report.json", cleaned)).toBe("s1");
        expect(sampleNameFromPath("run1/s1.report.csv", cleaned)).toBe("s1");
    });

    it("strips a plain extension", () => {
        expect(sampleNameFromPath("s2.csv", cleaned)).toBe("s2");
    });

    it("strips only one extension", () => {
        expect(sampleNameFromPath("s3.json.report.json", cleaned)).toBe(
            "s3.json",
        );
    });

    it("keeps names without a known extension", () => {
        expect(sampleNameFromPath("notes.txt", cleaned)).toBe("notes.txt");
    });

    it("keeps a name that is only an extension", () => {
        expect(sampleNameFromPath(".csv", cleaned)).toBe(".csv");
    });

    it("returns the raw file name when configured", () => {
        const raw = { ...cleaned, useFilenameAsSampleName: true };
        expect(sampleNameFromPath("run1/s1.report.json", raw)).toBe(
            "s1.report.json",
        );
        expect(sampleNameFromPath("run1/s1.report.csv", raw)).toBe(
            "s1.report.csv",
        );
    });

    it("uses custom clean extensions", () => {
        expect(
            sampleNameFromPath("s4.refine.tsv", {
                useFilenameAsSampleName: false,
                cleanExtensions: [".tsv", ".refine.tsv"],
            }),
        ).toBe("s4");
    });
});
