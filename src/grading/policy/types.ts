import type { OutcomeLabel, SubtaskParameter } from '../../interfaces';

export enum SubtaskScoringType {
    Summation = 'sum',
    Minimum = 'min',
    Multiple = 'mul',
}

export interface GroupPolicy {
    name: SubtaskScoringType;
    // folds a subtask's outcomes into its score fraction
    reduce: (outcomes: number[], parameter: SubtaskParameter) => number;
    // coarse label shown to contestants for a single outcome
    classify: (outcome: number, parameter: SubtaskParameter) => OutcomeLabel;
}
