import { VotingSystem, ballotsFor } from "./base";
import { Candidate, Election, TallyResult, Winner } from "../../types";
import { allMaxScores, result, winnerOrTie } from "../tally";

function* oneVoteEach<C extends Candidate>(ballots: Iterable<C>): Generator<[C, number]> {
    for (const choice of ballots) yield [choice, 1];
}

/**
 * First-past-the-post: the candidate with the most ballots wins.
 * Each ballot is just the chosen candidate. Ties return every tied candidate.
 */
export function tallyPlurality<C extends Candidate>(ballots: Iterable<C>): TallyResult<C> {
    const { totals, leaders } = allMaxScores(oneVoteEach(ballots));
    let totalVotes = 0;
    for (const n of totals.values()) totalVotes += n;
    return result(winnerOrTie(leaders), totals, totalVotes);
}

export function plurality<C extends Candidate>(ballots: Iterable<C>): Winner<C> {
    return tallyPlurality(ballots).winner;
}

export const fptp: VotingSystem = {
    key: "plurality",
    ballotType: "plurality",
    compute<C extends Candidate>(election: Election<C>): TallyResult<C> {
        return tallyPlurality(ballotsFor(election, "plurality", "plurality").map((b) => b.choice));
    },
};
