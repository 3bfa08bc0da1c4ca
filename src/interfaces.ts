// A status text: a printf-like template followed by its arguments.
export type StatusText = [string, ...(string | number)[]];

export interface Evaluation {
    codename: string;
    outcome: number; // nominally in [0, 1]
    text: StatusText;
    executionTime: number | null; // in seconds
    executionMemory: number | null; // in bytes
}

export interface SubmissionResult {
    // false when the submission did not compile or was never run
    evaluated(): boolean;
    evaluations: Evaluation[];
}

export interface Testcase {
    codename: string;
    isPublic: boolean;
}

// weight, target (testcase count or codename regex), optional display title
export type SubtaskParameter = [number, number | string, ...unknown[]];

export interface ScoringDataset {
    datasetId: string;
    scoreType: string;
    scoreTypeParameters: unknown;
    testcases: Testcase[];
}

export enum OutcomeLabel {
    Correct = 'Correct',
    PartiallyCorrect = 'Partially correct',
    NotCorrect = 'Not correct',
}

export type TestcaseFeedback = {
    idx: string;
    outcome: OutcomeLabel;
    text: StatusText;
    time: number | null;
    memory: number | null;
    show_in_restricted_feedback: boolean;
};

// What a contestant sees of a testcase that is not public.
export type HiddenTestcaseFeedback = {
    idx: string;
};

export type SubtaskFeedback = {
    idx: number;
    // kept as a fraction so a zero-weight subtask still renders as correct or not
    score_fraction: number;
    max_score: number;
    testcases: TestcaseFeedback[];
    alt_title?: string;
};

export type PublicSubtaskFeedback =
    | SubtaskFeedback
    | {
          idx: number;
          testcases: (TestcaseFeedback | HiddenTestcaseFeedback)[];
      };

export type ScoreResult = {
    score: number;
    subtasks: SubtaskFeedback[];
    publicScore: number;
    publicSubtasks: PublicSubtaskFeedback[];
    rankingDetails: string[];
};

export type MaxScores = {
    maxScore: number;
    maxPublicScore: number;
    headers: string[];
};

export type FeedbackLevel = 'full' | 'restricted';
