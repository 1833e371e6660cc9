export * from "./types";
export { loadConfig, loadConfigFromFile } from "./config";
export type { CountingConfig } from "./config";
export { EmptyInputError, InvalidArgumentError } from "./utils/errors";
export { humanReadableId } from "./utils/id";
export { allMaxScores, isTie, winnerOrTie } from "./utils/tally";
export { approvalBallot, ballotCandidates, isBallotOfType, pluralityBallot, rankedBallot, scoreBallot } from "./utils/ballots";
export { castBallot, castBallots, createElection, electionBallotType } from "./utils/election";
export type { CastManyResult } from "./utils/election";
export * from "./utils/votingSystems";
