import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { loadConfig, loadConfigFromFile } from "../src/config";
import { InvalidArgumentError } from "../src/utils/errors";
import { computeTally } from "../src/utils/votingSystems";
import { castBallots, createElection } from "../src/utils/election";
import { rankedBallot } from "../src/utils/ballots";

describe("loadConfig", () => {
    it("falls back to the defaults", () => {
        expect(loadConfig({})).toEqual({ winPercentage: 50, startingAt: 1 });
        expect(loadConfig({ IRV_WIN_PERCENTAGE: "", BORDA_STARTING_AT: " " })).toEqual({
            winPercentage: 50,
            startingAt: 1,
        });
    });

    it("reads values from the environment", () => {
        expect(loadConfig({ IRV_WIN_PERCENTAGE: "75", BORDA_STARTING_AT: "0" })).toEqual({
            winPercentage: 75,
            startingAt: 0,
        });
    });

    it("rejects out-of-range or non-numeric values", () => {
        expect(() => loadConfig({ IRV_WIN_PERCENTAGE: "40" })).toThrow(InvalidArgumentError);
        expect(() => loadConfig({ IRV_WIN_PERCENTAGE: "lots" })).toThrow(InvalidArgumentError);
        expect(() => loadConfig({ BORDA_STARTING_AT: "2" })).toThrow(InvalidArgumentError);
    });

    it("can be passed to computeTally as counting options", () => {
        const cast = castBallots(createElection<string>(["A", "B"]), [rankedBallot(["A", "B"])]);
        if (!cast.ok) throw new Error(cast.message);
        const result = computeTally(cast.election, "borda", loadConfig({ BORDA_STARTING_AT: "0" }));
        expect(result.counts).toEqual(new Map([["A", 1], ["B", 0]]));
    });
});

describe("loadConfigFromFile", () => {
    const dir = mkdtempSync(join(tmpdir(), "vote-counting-"));
    const envFile = join(dir, ".env");
    writeFileSync(envFile, "IRV_WIN_PERCENTAGE=60\nBORDA_STARTING_AT=0\n");

    it("reads variables from the file", () => {
        expect(loadConfigFromFile(envFile, {})).toEqual({ winPercentage: 60, startingAt: 0 });
    });

    it("lets variables already set win over the file", () => {
        expect(loadConfigFromFile(envFile, { IRV_WIN_PERCENTAGE: "80" })).toEqual({ winPercentage: 80, startingAt: 0 });
    });

    it("leaves process.env untouched", () => {
        const before = process.env.IRV_WIN_PERCENTAGE;
        loadConfigFromFile(envFile);
        expect(process.env.IRV_WIN_PERCENTAGE).toBe(before);
    });

    it("throws when the file cannot be read", () => {
        expect(() => loadConfigFromFile(join(dir, "missing.env"), {})).toThrow(InvalidArgumentError);
    });
});
