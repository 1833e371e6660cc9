import { Candidate, TallyResult, Winner } from "../types";
import { EmptyInputError } from "./errors";

export interface ScoreTally<C extends Candidate> {
    totals: Map<C, number>;
    leaders: C[];
    topScore: number;
}

/**
 * Sums (candidate, weight) pairs in a single forward pass, tracking every candidate
 * tied at the running maximum as it goes. The input may be a lazy generator; it is
 * iterated exactly once.
 */
export function allMaxScores<C extends Candidate>(scores: Iterable<readonly [C, number]>): ScoreTally<C> {
    const totals = new Map<C, number>();
    let leaders = new Set<C>();
    let topScore = -Infinity;
    let seen = false;

    for (const [candidate, weight] of scores) {
        const total = (totals.get(candidate) ?? 0) + weight;
        totals.set(candidate, total);
        if (!seen || total > topScore) {
            seen = true;
            topScore = total;
            leaders = new Set([candidate]);
        } else if (total === topScore) {
            leaders.add(candidate);
        }
    }

    if (!seen) throw new EmptyInputError("Cannot find a winner among zero scores");
    return { totals, leaders: [...leaders], topScore };
}

export function winnerOrTie<C extends Candidate>(candidates: readonly C[]): Winner<C> {
    if (candidates.length === 0) return null;
    if (candidates.length === 1) return candidates[0];
    return [...candidates];
}

export function isTie<C extends Candidate>(winner: Winner<C>): winner is C[] {
    return Array.isArray(winner);
}

export function toBreakdown<C extends Candidate>(counts: ReadonlyMap<C, number>) {
    return [...counts.entries()]
        .sort((a, b) => b[1] - a[1])
        .map(([label, count]) => ({ label, count }));
}

export function frequencies<C extends Candidate>(values: Iterable<C>): Map<C, number> {
    const counts = new Map<C, number>();
    for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
    return counts;
}

/** Candidates holding the highest and the lowest count, plus the sum of all counts. */
export function extremes<C extends Candidate>(counts: ReadonlyMap<C, number>) {
    let most: C[] = [];
    let fewest: C[] = [];
    let mostVotes = -Infinity;
    let fewestVotes = Infinity;
    let total = 0;
    for (const [candidate, votes] of counts) {
        total += votes;
        if (votes > mostVotes) {
            most = [candidate];
            mostVotes = votes;
        } else if (votes === mostVotes) {
            most.push(candidate);
        }
        if (votes < fewestVotes) {
            fewest = [candidate];
            fewestVotes = votes;
        } else if (votes === fewestVotes) {
            fewest.push(candidate);
        }
    }
    return { most, mostVotes, fewest, fewestVotes, total };
}

/** Passes items through unchanged, counting them into `seen.count` as they go. */
export function* counted<T>(items: Iterable<T>, seen: { count: number }): Generator<T> {
    for (const item of items) {
        seen.count++;
        yield item;
    }
}

/**
 * Multi-round counters walk the ballots once per round, so a one-shot iterable
 * (a generator, a stream adapter) is read into an array up front.
 */
export function replayable<T>(ballots: Iterable<T>): readonly T[] {
    return Array.isArray(ballots) ? ballots : Array.from(ballots);
}

export function result<C extends Candidate, W extends Winner<C>>(
    winner: W,
    counts: Map<C, number>,
    totalVotes: number
): TallyResult<C, W> {
    return { winner, counts, totalVotes, breakdown: toBreakdown(counts) };
}
