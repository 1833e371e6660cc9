import { VotingSystem, ballotsFor } from "./base";
import { Candidate, Election, TallyResult, Winner } from "../../types";
import { EmptyInputError } from "../errors";
import { result, winnerOrTie } from "../tally";

export function median(values: readonly number[]): number {
    if (values.length === 0) throw new EmptyInputError("Cannot take the median of zero scores");
    const sorted = [...values].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Score voting judged by each candidate's median score instead of the total.
 * Candidates sharing the highest median all win; there is no further tie-break.
 * The returned counts hold the medians.
 */
export function tallyMajorityJudgement<C extends Candidate>(
    ballots: Iterable<Iterable<readonly [C, number]>>
): TallyResult<C> {
    const scoresByCandidate = new Map<C, number[]>();
    let ballotCount = 0;
    for (const scores of ballots) {
        ballotCount++;
        for (const [candidate, value] of scores) {
            const list = scoresByCandidate.get(candidate);
            if (list) list.push(value);
            else scoresByCandidate.set(candidate, [value]);
        }
    }
    if (scoresByCandidate.size === 0) throw new EmptyInputError("Cannot find a winner among zero scores");

    const medians = new Map<C, number>();
    let top = -Infinity;
    for (const [candidate, values] of scoresByCandidate) {
        const m = median(values);
        medians.set(candidate, m);
        if (m > top) top = m;
    }

    const winners = [...medians].filter(([, m]) => m === top).map(([candidate]) => candidate);
    return result(winnerOrTie(winners), medians, ballotCount);
}

export function majorityJudgement<C extends Candidate>(ballots: Iterable<Iterable<readonly [C, number]>>): Winner<C> {
    return tallyMajorityJudgement(ballots).winner;
}

export const majorityJudgementSystem: VotingSystem = {
    key: "majority-judgement",
    ballotType: "score",
    compute<C extends Candidate>(election: Election<C>): TallyResult<C> {
        return tallyMajorityJudgement(ballotsFor(election, "majority-judgement", "score").map((b) => b.scores));
    },
};
