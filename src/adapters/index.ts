import type { ScoringDataset, SubmissionResult } from '../interfaces';

// Read side of the persistence layer: datasets and judged submissions.
export interface OutcomeStore {
    getDataset: (datasetId: string) => Promise<ScoringDataset>;
    getSubmissionResult: (
        submissionId: string,
        datasetId: string,
    ) => Promise<SubmissionResult>;
}
