// Shape shared by every voting system module, so an Election can be counted by key.
import { BallotOf, BallotType, Candidate, CountingOptions, Election, TallyResult, VotingSystemKey } from "../../types";
import { isBallotOfType } from "../ballots";
import { electionBallotType } from "../election";
import { InvalidArgumentError } from "../errors";

export interface VotingSystem {
    key: VotingSystemKey;
    ballotType: BallotType;
    // compute counts the election's ballots and returns a TallyResult
    compute<C extends Candidate>(election: Election<C>, options?: CountingOptions): TallyResult<C>;
}

/** The election's ballots, checked to be of the kind the system counts. */
export function ballotsFor<C extends Candidate, T extends BallotType>(
    election: Election<C>,
    key: VotingSystemKey,
    type: T
): BallotOf<C, T>[] {
    const actual = electionBallotType(election);
    if (actual !== undefined && actual !== type) {
        throw new InvalidArgumentError(`The ${key} system counts ${type} ballots, but election ${election.id} holds ${actual} ballots`);
    }
    return election.ballots.filter(isBallotOfType<C, T>(type));
}
