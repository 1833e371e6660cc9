import { approvalBallot, pluralityBallot, rankedBallot, scoreBallot } from "../src/utils/ballots";
import { castBallots, createElection } from "../src/utils/election";
import { InvalidArgumentError } from "../src/utils/errors";
import { computeTally, systems } from "../src/utils/votingSystems";
import { Ballot, Election } from "../src/types";

function electionWith(candidates: string[], ballots: Ballot<string>[]): Election<string> {
    const cast = castBallots(createElection(candidates), ballots);
    if (!cast.ok) throw new Error(cast.message);
    return cast.election;
}

describe("computeTally", () => {
    const pluralityElection = electionWith(["A", "B"], [pluralityBallot("A"), pluralityBallot("A"), pluralityBallot("B")]);
    const rankedElection = electionWith(
        ["A", "B", "C"],
        [rankedBallot(["A", "C"]), rankedBallot(["B", "C"]), rankedBallot(["C"]), rankedBallot(["C"])]
    );

    it("registers a system for every key", () => {
        for (const [key, system] of Object.entries(systems)) expect(system.key).toBe(key);
    });

    it("counts every accepted ballot", () => {
        const result = computeTally(pluralityElection, "plurality");
        expect(result.winner).toBe("A");
        expect(result.totalVotes).toBe(3);
    });

    it("passes options through to the counter", () => {
        expect(computeTally(pluralityElection, "quota", { quota: 60 }).winner).toBe("A");
        expect(computeTally(pluralityElection, "quota", { quota: 70 }).winner).toBeNull();
        expect(() => computeTally(rankedElection, "borda", { startingAt: 3 })).toThrow(InvalidArgumentError);
    });

    it("counts ranked elections with each ranked system", () => {
        expect(computeTally(rankedElection, "instant-runoff").winner).toBe("C");
        expect(computeTally(rankedElection, "dowdall").winner).toBe("C");
        expect(computeTally(rankedElection, "borda").winner).toBe("C");
    });

    it("lets ranked systems disagree on the same ballots", () => {
        // C holds every last place as well as half the first places
        expect(computeTally(rankedElection, "coombs").winner).toBeNull();
        expect(computeTally(rankedElection, "plurality-with-runoff").winner).toBeNull();
    });

    it("counts approval and score elections", () => {
        const approvals = electionWith(["A", "B", "C"], [approvalBallot(["A", "B"]), approvalBallot(["B", "C"])]);
        expect(computeTally(approvals, "approval").winner).toBe("B");

        const scored = electionWith(
            ["A", "B"],
            [scoreBallot(new Map([["A", 5], ["B", 4]])), scoreBallot(new Map([["A", 1], ["B", 4]]))]
        );
        expect(computeTally(scored, "score").winner).toBe("B");
        expect(computeTally(scored, "majority-judgement").winner).toBe("B");
    });

    it("rejects a system that counts a different ballot type", () => {
        expect(() => computeTally(pluralityElection, "instant-runoff")).toThrow(InvalidArgumentError);
    });

    it("rejects unknown systems and a quota system without a quota", () => {
        expect(() => computeTally(pluralityElection, "stv")).toThrow(InvalidArgumentError);
        expect(() => computeTally(pluralityElection, "quota")).toThrow(InvalidArgumentError);
    });
});
