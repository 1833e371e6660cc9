import makeDebug from "debug";
import { VotingSystem, ballotsFor } from "./base";
import { Candidate, Election, TallyResult, TallyRound } from "../../types";
import { EmptyInputError } from "../errors";
import { frequencies, replayable, toBreakdown } from "../tally";

const debug = makeDebug("vote-counting:two-round");

/**
 * Two-round system (majority run-off):
 * - Count first preferences; more than 50% wins outright.
 * - Else hold a runoff between everyone tied for first and everyone tied for second,
 *   counting each ballot for its highest-ranked runoff candidate.
 * - The runoff leader needs more than 50% of the runoff ballots, otherwise nobody wins.
 * Empty ballots are abstentions and never count toward a majority.
 */
export function tallyPluralityWithRunoff<C extends Candidate>(ballots: Iterable<readonly C[]>): TallyResult<C, C | null> {
    const rankings = replayable(ballots);
    if (rankings.length === 0) throw new EmptyInputError("Cannot hold a runoff with zero ballots");

    const voting = rankings.filter((r) => r.length > 0);
    const counts = frequencies(voting.map((r) => r[0]));
    const sorted = toBreakdown(counts);
    const abstained = rankings.length - voting.length;

    if (sorted.length === 0) {
        debug("no first choices to count");
        const rounds: TallyRound<C>[] = [{ round: 1, counts, eliminated: [], exhausted: abstained }];
        return { winner: null, counts, totalVotes: 0, breakdown: sorted, rounds };
    }
    const top = sorted[0];
    if (top.count / voting.length > 0.5) {
        debug("%s wins outright with %d of %d votes", String(top.label), top.count, voting.length);
        const rounds: TallyRound<C>[] = [{ round: 1, counts, eliminated: [], exhausted: abstained }];
        return { winner: top.label, counts, totalVotes: voting.length, breakdown: sorted, rounds };
    }

    const tiedFirst = sorted.filter((s) => s.count === top.count);
    const second = sorted.find((s) => s.count < top.count);
    const tiedSecond = second === undefined ? [] : sorted.filter((s) => s.count === second.count);
    const pool = new Set([...tiedFirst, ...tiedSecond].map((s) => s.label));
    const leftOut = sorted.filter((s) => !pool.has(s.label)).map((s) => s.label);
    debug("runoff between %s", [...pool].map(String).join(", "));

    const runoffVotes: C[] = [];
    for (const ranking of rankings) {
        const pick = ranking.find((c) => pool.has(c));
        if (pick !== undefined) runoffVotes.push(pick);
    }
    const runoffCounts = frequencies(runoffVotes);
    const runoffSorted = toBreakdown(runoffCounts);
    const rounds: TallyRound<C>[] = [
        { round: 1, counts, eliminated: leftOut, exhausted: abstained },
        { round: 2, counts: runoffCounts, eliminated: [], exhausted: rankings.length - runoffVotes.length },
    ];

    const runoffTop = runoffSorted[0];
    const winner = runoffTop.count / runoffVotes.length > 0.5 ? runoffTop.label : null;
    debug("runoff result: %s", winner === null ? "no majority" : String(winner));
    return { winner, counts: runoffCounts, totalVotes: runoffVotes.length, breakdown: runoffSorted, rounds };
}

export function pluralityWithRunoff<C extends Candidate>(ballots: Iterable<readonly C[]>): C | null {
    return tallyPluralityWithRunoff(ballots).winner;
}

export const twoRound: VotingSystem = {
    key: "plurality-with-runoff",
    ballotType: "ranked",
    compute<C extends Candidate>(election: Election<C>): TallyResult<C> {
        return tallyPluralityWithRunoff(ballotsFor(election, "plurality-with-runoff", "ranked").map((b) => b.choices));
    },
};
