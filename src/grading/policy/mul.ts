import { type GroupPolicy, SubtaskScoringType } from './types';
import { classifyOutcome } from './classify';

export const policy: GroupPolicy = {
    name: SubtaskScoringType.Multiple,
    reduce: (outcomes) => outcomes.reduce((prev, curr) => prev * curr, 1),
    classify: (outcome) => classifyOutcome(outcome),
};
