import { VotingSystem, ballotsFor } from "./base";
import { Candidate, Election, TallyResult, Winner } from "../../types";
import { allMaxScores, counted, result, winnerOrTie } from "../tally";

function* scoreEntries<C extends Candidate>(ballots: Iterable<Iterable<readonly [C, number]>>): Generator<readonly [C, number]> {
    for (const scores of ballots) yield* scores;
}

/**
 * Score voting. Each ballot maps candidates to a numeric score and the highest
 * total wins.
 *
 * Totals are compared rather than averages. The two agree when every ballot scores
 * every candidate; a candidate left off some ballots is not averaged over fewer ballots.
 */
export function tallyScore<C extends Candidate>(ballots: Iterable<Iterable<readonly [C, number]>>): TallyResult<C> {
    const seen = { count: 0 };
    const { totals, leaders } = allMaxScores(scoreEntries(counted(ballots, seen)));
    return result(winnerOrTie(leaders), totals, seen.count);
}

export function score<C extends Candidate>(ballots: Iterable<Iterable<readonly [C, number]>>): Winner<C> {
    return tallyScore(ballots).winner;
}

export const scoreSystem: VotingSystem = {
    key: "score",
    ballotType: "score",
    compute<C extends Candidate>(election: Election<C>): TallyResult<C> {
        return tallyScore(ballotsFor(election, "score", "score").map((b) => b.scores));
    },
};
