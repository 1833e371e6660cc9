import {
    ApprovalBallot,
    Ballot,
    BallotOf,
    BallotType,
    Candidate,
    PluralityBallot,
    RankedBallot,
    ScoreBallot,
} from "../types";
import { InvalidArgumentError } from "./errors";
import { humanReadableId } from "./id";

export function pluralityBallot<C extends Candidate>(choice: C, id: string = humanReadableId()): PluralityBallot<C> {
    const ballot: PluralityBallot<C> = { type: "plurality", id, choice };
    return Object.freeze(ballot);
}

export function approvalBallot<C extends Candidate>(choices: Iterable<C>, id: string = humanReadableId()): ApprovalBallot<C> {
    const ballot: ApprovalBallot<C> = { type: "approval", id, choices: new Set(choices) };
    return Object.freeze(ballot);
}

/** Choices are given from most to least preferred. */
export function rankedBallot<C extends Candidate>(choices: Iterable<C>, id: string = humanReadableId()): RankedBallot<C> {
    const ballot: RankedBallot<C> = { type: "ranked", id, choices: Object.freeze([...choices]) };
    return Object.freeze(ballot);
}

function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
    return Symbol.iterator in value;
}

function freezeScores<C extends Candidate>(scores: Iterable<readonly [C, number]>, id: string): ScoreBallot<C> {
    const entries = new Map<C, number>();
    for (const [candidate, score] of scores) {
        if (!Number.isFinite(score)) {
            throw new InvalidArgumentError(`Score for ${String(candidate)} must be a finite number, but was ${score}`);
        }
        entries.set(candidate, score);
    }
    const ballot: ScoreBallot<C> = { type: "score", id, scores: entries };
    return Object.freeze(ballot);
}

/** Accepts a Map, any iterable of [candidate, score] entries, or a plain record keyed by candidate name. */
export function scoreBallot<C extends Candidate>(scores: Iterable<readonly [C, number]>, id?: string): ScoreBallot<C>;
export function scoreBallot(scores: Readonly<Record<string, number>>, id?: string): ScoreBallot<string>;
export function scoreBallot(
    scores: Iterable<readonly [Candidate, number]> | Readonly<Record<string, number>>,
    id: string = humanReadableId()
): ScoreBallot {
    if (isIterable<readonly [Candidate, number]>(scores)) return freezeScores(scores, id);
    return freezeScores(Object.entries(scores), id);
}

/** Every candidate a ballot names, in no particular order. */
export function ballotCandidates<C extends Candidate>(ballot: Ballot<C>): C[] {
    switch (ballot.type) {
        case "plurality":
            return [ballot.choice];
        case "approval":
            return [...ballot.choices];
        case "ranked":
            return [...ballot.choices];
        case "score":
            return [...ballot.scores.keys()];
    }
}

export function isBallotOfType<C extends Candidate, T extends BallotType>(type: T) {
    return (ballot: Ballot<C>): ballot is BallotOf<C, T> => ballot.type === type;
}
