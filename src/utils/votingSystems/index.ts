import { VotingSystem } from "./base";
import { fptp } from "./fptp";
import { quotaSystem } from "./quota";
import { twoRound } from "./tworounds";
import { irv } from "./irv";
import { coombsSystem } from "./coombs";
import { bordaSystem } from "./borda";
import { dowdallSystem } from "./dowdall";
import { approvalSystem } from "./approvals";
import { scoreSystem } from "./score";
import { majorityJudgementSystem } from "./majorityjudgement";
import { Candidate, CountingOptions, Election, TallyResult, VotingSystemKey } from "../../types";
import { InvalidArgumentError } from "../errors";

export const systems: Record<VotingSystemKey, VotingSystem> = {
    plurality: fptp,
    quota: quotaSystem,
    "plurality-with-runoff": twoRound,
    "instant-runoff": irv,
    coombs: coombsSystem,
    borda: bordaSystem,
    dowdall: dowdallSystem,
    approval: approvalSystem,
    score: scoreSystem,
    "majority-judgement": majorityJudgementSystem,
};

function isVotingSystemKey(key: string): key is VotingSystemKey {
    return Object.prototype.hasOwnProperty.call(systems, key);
}

/** Count an election's ballots with the named voting system. */
export function computeTally<C extends Candidate>(
    election: Election<C>,
    system: string,
    options: CountingOptions = {}
): TallyResult<C> {
    if (!isVotingSystemKey(system)) throw new InvalidArgumentError(`Unsupported voting system: ${system}`);
    return systems[system].compute(election, options);
}

export { plurality, tallyPlurality } from "./fptp";
export { quota, tallyQuota } from "./quota";
export { pluralityWithRunoff, tallyPluralityWithRunoff } from "./tworounds";
export { instantRunoff, tallyInstantRunoff } from "./irv";
export { coombs, tallyCoombs } from "./coombs";
export { borda, tallyBorda } from "./borda";
export { dowdall, tallyDowdall } from "./dowdall";
export { approval, tallyApproval } from "./approvals";
export { score, tallyScore } from "./score";
export { majorityJudgement, median, tallyMajorityJudgement } from "./majorityjudgement";
export type { VotingSystem } from "./base";
