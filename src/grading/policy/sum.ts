import { type GroupPolicy, SubtaskScoringType } from './types';
import { classifyOutcome } from './classify';

// Partial credit: the mean of the outcomes.
export const policy: GroupPolicy = {
    name: SubtaskScoringType.Summation,
    reduce: (outcomes) =>
        outcomes.reduce((prev, curr) => prev + curr, 0) / outcomes.length,
    classify: (outcome) => classifyOutcome(outcome),
};
