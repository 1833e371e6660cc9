import { VotingSystem, ballotsFor } from "./base";
import { Candidate, Election, TallyResult, Winner } from "../../types";
import { allMaxScores, counted, result, winnerOrTie } from "../tally";

function* approvals<C extends Candidate>(ballots: Iterable<Iterable<C>>): Generator<[C, number]> {
    for (const choices of ballots) {
        // each ballot approves of a candidate at most once
        for (const candidate of new Set(choices)) yield [candidate, 1];
    }
}

/**
 * Counts approvals per candidate. Ballots list every candidate the voter approves
 * of, in any order.
 */
export function tallyApproval<C extends Candidate>(ballots: Iterable<Iterable<C>>): TallyResult<C> {
    const seen = { count: 0 };
    const { totals, leaders } = allMaxScores(approvals(counted(ballots, seen)));
    return result(winnerOrTie(leaders), totals, seen.count);
}

export function approval<C extends Candidate>(ballots: Iterable<Iterable<C>>): Winner<C> {
    return tallyApproval(ballots).winner;
}

export const approvalSystem: VotingSystem = {
    key: "approval",
    ballotType: "approval",
    compute<C extends Candidate>(election: Election<C>): TallyResult<C> {
        return tallyApproval(ballotsFor(election, "approval", "approval").map((b) => b.choices));
    },
};
