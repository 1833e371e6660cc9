import makeDebug from "debug";
import { v4 as uuidv4 } from "uuid";
import { Ballot, BallotType, Candidate, CastResult, Election } from "../types";
import { ballotCandidates } from "./ballots";

const debug = makeDebug("vote-counting:election");

export function createElection<C extends Candidate>(candidates: Iterable<C>, id: string = uuidv4()): Election<C> {
    const election: Election<C> = {
        id,
        candidates: new Set(candidates),
        ballots: Object.freeze([]),
    };
    return Object.freeze(election);
}

/** Type of the first ballot cast in the election, which every later ballot must share. */
export function electionBallotType<C extends Candidate>(election: Election<C>): BallotType | undefined {
    const { ballots } = election;
    return ballots.length > 0 ? ballots[ballots.length - 1].type : undefined;
}

/**
 * Add a ballot to an election. The election passed in is left untouched; on success
 * a new election holding the ballot is returned.
 */
export function castBallot<C extends Candidate>(election: Election<C>, ballot: Ballot<C>): CastResult<C> {
    const expectedType = electionBallotType(election);
    if (expectedType !== undefined && expectedType !== ballot.type) {
        debug("election %s rejected ballot %s: wrong vote type", election.id, ballot.id);
        return {
            ok: false,
            error: "wrong-vote-type",
            message: `Cannot mix vote types. Election holds ${expectedType} ballots but ballot ${ballot.id} is ${ballot.type}.`,
        };
    }

    if (election.ballots.some((b) => b.id === ballot.id)) {
        debug("election %s rejected ballot %s: duplicate", election.id, ballot.id);
        return { ok: false, error: "duplicate-vote", message: `Ballot ${ballot.id} has already been cast.` };
    }

    const unknown = ballotCandidates(ballot).filter((c) => !election.candidates.has(c));
    if (unknown.length > 0) {
        debug("election %s rejected ballot %s: unknown candidates", election.id, ballot.id);
        return {
            ok: false,
            error: "candidate-not-in-election",
            message: `Ballot ${ballot.id} names candidates not in this election: ${unknown.map(String).join(", ")}`,
        };
    }

    const updated: Election<C> = {
        id: election.id,
        candidates: election.candidates,
        ballots: Object.freeze([ballot, ...election.ballots]),
    };
    return { ok: true, election: Object.freeze(updated) };
}

export type CastManyResult<C extends Candidate> =
    | Extract<CastResult<C>, { ok: true }>
    | (Extract<CastResult<C>, { ok: false }> & { index: number });

/** Cast ballots in order, stopping at the first one that is rejected. */
export function castBallots<C extends Candidate>(election: Election<C>, ballots: Iterable<Ballot<C>>): CastManyResult<C> {
    let current = election;
    let index = 0;
    for (const ballot of ballots) {
        const cast = castBallot(current, ballot);
        if (!cast.ok) return { ...cast, index };
        current = cast.election;
        index++;
    }
    return { ok: true, election: current };
}
