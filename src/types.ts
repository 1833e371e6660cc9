// Candidates are compared by Map key equality only. Restricting them to
// primitives keeps a single winner distinguishable from a tie (an array).
export type Candidate = string | number | bigint | boolean | symbol;

export type BallotType = "plurality" | "approval" | "ranked" | "score";

export interface PluralityBallot<C extends Candidate = Candidate> {
    readonly type: "plurality";
    readonly id: string;
    readonly choice: C;
}

export interface ApprovalBallot<C extends Candidate = Candidate> {
    readonly type: "approval";
    readonly id: string;
    readonly choices: ReadonlySet<C>;
}

/** Choices run from most to least preferred; omitted candidates are abstentions. */
export interface RankedBallot<C extends Candidate = Candidate> {
    readonly type: "ranked";
    readonly id: string;
    readonly choices: readonly C[];
}

export interface ScoreBallot<C extends Candidate = Candidate> {
    readonly type: "score";
    readonly id: string;
    readonly scores: ReadonlyMap<C, number>;
}

export type Ballot<C extends Candidate = Candidate> =
    | PluralityBallot<C>
    | ApprovalBallot<C>
    | RankedBallot<C>
    | ScoreBallot<C>;

export type BallotOf<C extends Candidate, T extends BallotType> = Extract<Ballot<C>, { type: T }>;

export interface Election<C extends Candidate = Candidate> {
    readonly id: string;
    readonly candidates: ReadonlySet<C>;
    readonly ballots: readonly Ballot<C>[]; // newest first
}

export type CastError = "wrong-vote-type" | "duplicate-vote" | "candidate-not-in-election";

export type CastResult<C extends Candidate = Candidate> =
    | { ok: true; election: Election<C> }
    | { ok: false; error: CastError; message: string };

export type VotingSystemKey =
    | "plurality"
    | "quota"
    | "plurality-with-runoff"
    | "instant-runoff"
    | "coombs"
    | "borda"
    | "dowdall"
    | "approval"
    | "score"
    | "majority-judgement";

export interface CountingOptions {
    quota?: number; // percentage if > 1, fraction otherwise
    winPercentage?: number;
    startingAt?: number;
}

/** A single candidate, an array of tied candidates, or null when nobody wins. */
export type Winner<C extends Candidate> = C | C[] | null;

export interface TallyRound<C extends Candidate> {
    round: number;
    counts: Map<C, number>;
    eliminated: C[];
    exhausted: number;
}

export interface TallyResult<C extends Candidate, W extends Winner<C> = Winner<C>> {
    winner: W;
    counts: Map<C, number>;
    totalVotes: number;
    breakdown: { label: C; count: number }[];
    rounds?: TallyRound<C>[];
}
