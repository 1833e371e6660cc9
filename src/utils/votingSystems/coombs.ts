import makeDebug from "debug";
import { VotingSystem, ballotsFor } from "./base";
import { Candidate, Election, TallyResult, TallyRound } from "../../types";
import { extremes, frequencies, replayable, toBreakdown } from "../tally";

const debug = makeDebug("vote-counting:coombs");

/**
 * Coombs' method: like instant runoff, but each round drops the candidate(s) with the
 * most last-place votes instead of the fewest first-place votes.
 * A candidate wins with a strict majority of first choices among the ballots that
 * still name someone in the running. If elimination empties every ballot, nobody wins.
 */
export function tallyCoombs<C extends Candidate>(ballots: Iterable<readonly C[]>): TallyResult<C, C | null> {
    const rankings = replayable(ballots);
    const eliminated = new Set<C>();
    const rounds: TallyRound<C>[] = [];

    for (let round = 1; ; round++) {
        const remaining: C[][] = [];
        for (const ranking of rankings) {
            const left = ranking.filter((c) => !eliminated.has(c));
            if (left.length > 0) remaining.push(left);
        }
        const exhausted = rankings.length - remaining.length;
        const counts = frequencies(remaining.map((r) => r[0]));

        if (remaining.length === 0) {
            debug("round %d: no ballots left, no winner", round);
            rounds.push({ round, counts, eliminated: [], exhausted });
            return { winner: null, counts, totalVotes: 0, breakdown: [], rounds };
        }

        const first = extremes(counts);
        if (first.mostVotes / remaining.length > 0.5) {
            debug("round %d: %s wins with %d of %d ballots", round, String(first.most[0]), first.mostVotes, remaining.length);
            rounds.push({ round, counts, eliminated: [], exhausted });
            return { winner: first.most[0], counts, totalVotes: remaining.length, breakdown: toBreakdown(counts), rounds };
        }

        const last = extremes(frequencies(remaining.map((r) => r[r.length - 1])));
        debug("round %d: eliminating %s with %d last-place votes", round, last.most.map(String).join(", "), last.mostVotes);
        for (const loser of last.most) eliminated.add(loser);
        rounds.push({ round, counts, eliminated: last.most, exhausted });
    }
}

export function coombs<C extends Candidate>(ballots: Iterable<readonly C[]>): C | null {
    return tallyCoombs(ballots).winner;
}

export const coombsSystem: VotingSystem = {
    key: "coombs",
    ballotType: "ranked",
    compute<C extends Candidate>(election: Election<C>): TallyResult<C> {
        return tallyCoombs(ballotsFor(election, "coombs", "ranked").map((b) => b.choices));
    },
};
