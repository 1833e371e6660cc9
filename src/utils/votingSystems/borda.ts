import { VotingSystem, ballotsFor } from "./base";
import { Candidate, CountingOptions, Election, TallyResult, Winner } from "../../types";
import { InvalidArgumentError } from "../errors";
import { allMaxScores, counted, result, winnerOrTie } from "../tally";

function* bordaPoints<C extends Candidate>(ballots: Iterable<readonly C[]>, startingAt: number): Generator<[C, number]> {
    for (const ranking of ballots) {
        const n = ranking.length;
        for (const [i, candidate] of ranking.entries()) yield [candidate, n - i - 1 + startingAt];
    }
}

/**
 * Ranked voting where higher ranks earn more points. On a ballot of n candidates the
 * last choice earns `startingAt` points and each rank above it one more, so
 * `["A", "B"]` gives A two points and B one with the default starting point of 1.
 */
export function tallyBorda<C extends Candidate>(
    ballots: Iterable<readonly C[]>,
    startingAt: number = 1
): TallyResult<C> {
    if (startingAt !== 0 && startingAt !== 1) {
        throw new InvalidArgumentError(`Borda starting point must be 0 or 1, but was ${startingAt}`);
    }
    const seen = { count: 0 };
    const { totals, leaders } = allMaxScores(bordaPoints(counted(ballots, seen), startingAt));
    return result(winnerOrTie(leaders), totals, seen.count);
}

export function borda<C extends Candidate>(ballots: Iterable<readonly C[]>, startingAt?: number): Winner<C> {
    return tallyBorda(ballots, startingAt).winner;
}

export const bordaSystem: VotingSystem = {
    key: "borda",
    ballotType: "ranked",
    compute<C extends Candidate>(election: Election<C>, options: CountingOptions = {}): TallyResult<C> {
        return tallyBorda(ballotsFor(election, "borda", "ranked").map((b) => b.choices), options.startingAt);
    },
};
