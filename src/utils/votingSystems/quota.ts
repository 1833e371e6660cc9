import { VotingSystem, ballotsFor } from "./base";
import { Candidate, CountingOptions, Election, TallyResult, Winner } from "../../types";
import { EmptyInputError, InvalidArgumentError } from "../errors";
import { frequencies, result, winnerOrTie } from "../tally";

/**
 * Plurality with a minimum share of the vote. Every candidate whose share is at least
 * the quota wins, so several candidates can win at once and nobody winning is a
 * normal outcome (null).
 *
 * A quota greater than one is read as a percentage, otherwise as a fraction.
 */
export function tallyQuota<C extends Candidate>(ballots: Iterable<C>, q: number): TallyResult<C> {
    if (!(q > 0 && q <= 100)) {
        throw new InvalidArgumentError(`Quota must be greater than 0 and at most 100, but was ${q}`);
    }
    const quotaFraction = q > 1 ? q / 100 : q;

    const counts = frequencies(ballots);
    let total = 0;
    for (const n of counts.values()) total += n;
    if (total === 0) throw new EmptyInputError("Cannot apply a quota to zero ballots");

    const winners = [...counts]
        .filter(([, count]) => count / total >= quotaFraction)
        .map(([candidate]) => candidate);
    return result(winnerOrTie(winners), counts, total);
}

export function quota<C extends Candidate>(ballots: Iterable<C>, q: number): Winner<C> {
    return tallyQuota(ballots, q).winner;
}

export const quotaSystem: VotingSystem = {
    key: "quota",
    ballotType: "plurality",
    compute<C extends Candidate>(election: Election<C>, options: CountingOptions = {}): TallyResult<C> {
        if (options.quota === undefined) throw new InvalidArgumentError("The quota system requires a quota option");
        return tallyQuota(ballotsFor(election, "quota", "plurality").map((b) => b.choice), options.quota);
    },
};
