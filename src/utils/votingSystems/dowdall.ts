import { VotingSystem, ballotsFor } from "./base";
import { Candidate, Election, TallyResult, Winner } from "../../types";
import { allMaxScores, counted, result, winnerOrTie } from "../tally";

function* harmonicPoints<C extends Candidate>(ballots: Iterable<readonly C[]>): Generator<[C, number]> {
    for (const ranking of ballots) {
        for (const [i, candidate] of ranking.entries()) yield [candidate, 1 / (i + 1)];
    }
}

/**
 * Ranked voting with fractionally decreasing points: the nth choice on a ballot
 * (counting from one) earns 1/n points.
 */
export function tallyDowdall<C extends Candidate>(ballots: Iterable<readonly C[]>): TallyResult<C> {
    const seen = { count: 0 };
    const { totals, leaders } = allMaxScores(harmonicPoints(counted(ballots, seen)));
    return result(winnerOrTie(leaders), totals, seen.count);
}

export function dowdall<C extends Candidate>(ballots: Iterable<readonly C[]>): Winner<C> {
    return tallyDowdall(ballots).winner;
}

export const dowdallSystem: VotingSystem = {
    key: "dowdall",
    ballotType: "ranked",
    compute<C extends Candidate>(election: Election<C>): TallyResult<C> {
        return tallyDowdall(ballotsFor(election, "dowdall", "ranked").map((b) => b.choices));
    },
};
