import { type GroupPolicy, SubtaskScoringType } from './types';
import { classifyOutcome } from './classify';

// Every testcase has to pass for full credit: the worst outcome wins.
export const policy: GroupPolicy = {
    name: SubtaskScoringType.Minimum,
    reduce: (outcomes) => Math.min(...outcomes),
    classify: (outcome) => classifyOutcome(outcome),
};
