import makeDebug from "debug";
import { VotingSystem, ballotsFor } from "./base";
import { Candidate, CountingOptions, Election, TallyResult, TallyRound } from "../../types";
import { EmptyInputError, InvalidArgumentError } from "../errors";
import { extremes, replayable, toBreakdown } from "../tally";

const debug = makeDebug("vote-counting:irv");

/**
 * Instant-runoff voting (IRV), also called Hare rule or alternative vote.
 * - Count each ballot's highest choice that is still in the running.
 * - If the leader has more than `winPercentage` percent of those votes -> winner.
 * - Else eliminate every candidate tied for fewest votes and count again.
 * - Ballots whose choices are all eliminated drop out of the count.
 * Every round is recorded in `rounds`. The winner is null once every ballot is exhausted.
 */
export function tallyInstantRunoff<C extends Candidate>(
    ballots: Iterable<readonly C[]>,
    winPercentage: number = 50
): TallyResult<C, C | null> {
    if (!(winPercentage >= 50 && winPercentage <= 100)) {
        throw new InvalidArgumentError(`Instant runoff win percentage must be between 50 and 100, but was ${winPercentage}`);
    }
    const rankings = replayable(ballots);
    if (rankings.length === 0) throw new EmptyInputError("Cannot run an instant runoff with zero ballots");

    const eliminated = new Set<C>();
    const rounds: TallyRound<C>[] = [];
    for (let round = 1; ; round++) {
        const counts = new Map<C, number>();
        let exhausted = 0;
        for (const ranking of rankings) {
            const pick = ranking.find((c) => !eliminated.has(c));
            if (pick === undefined) {
                exhausted++;
                continue;
            }
            counts.set(pick, (counts.get(pick) ?? 0) + 1);
        }

        const { most, mostVotes, fewest, total } = extremes(counts);
        const done = (winner: C | null): TallyResult<C, C | null> => {
            rounds.push({ round, counts, eliminated: [], exhausted });
            return { winner, counts, totalVotes: total, breakdown: toBreakdown(counts), rounds };
        };

        if (total === 0) {
            debug("round %d: all %d ballots exhausted, no winner", round, exhausted);
            return done(null);
        }
        // with winPercentage >= 50 only one candidate can clear the bar
        if ((mostVotes / total) * 100 > winPercentage) {
            debug("round %d: %s wins with %d of %d votes", round, String(most[0]), mostVotes, total);
            return done(most[0]);
        }

        debug("round %d: eliminating %s", round, fewest.map(String).join(", "));
        for (const loser of fewest) eliminated.add(loser);
        rounds.push({ round, counts, eliminated: fewest, exhausted });
    }
}

export function instantRunoff<C extends Candidate>(ballots: Iterable<readonly C[]>, winPercentage?: number): C | null {
    return tallyInstantRunoff(ballots, winPercentage).winner;
}

export const irv: VotingSystem = {
    key: "instant-runoff",
    ballotType: "ranked",
    compute<C extends Candidate>(election: Election<C>, options: CountingOptions = {}): TallyResult<C> {
        return tallyInstantRunoff(ballotsFor(election, "instant-runoff", "ranked").map((b) => b.choices), options.winPercentage);
    },
};
