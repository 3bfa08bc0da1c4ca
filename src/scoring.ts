import type { OutcomeStore } from './adapters';
import { createScoreType } from './grading/score-type';
import type { ScoreResult } from './interfaces';
import { logger } from './lib/winston-common';

export type SubmissionScore = ScoreResult & {
    submissionId: string;
    datasetId: string;
    maxScore: number;
    maxPublicScore: number;
};

// Scores one fixed snapshot of a submission's result against a dataset.
export async function scoreSubmission(
    store: OutcomeStore,
    submissionId: string,
    datasetId: string,
): Promise<SubmissionScore> {
    logger.verbose(`Scoring submission ${submissionId} on dataset ${datasetId}`);

    const dataset = await store.getDataset(datasetId);
    const scoreType = createScoreType(
        dataset.scoreType,
        dataset.scoreTypeParameters,
        dataset.testcases,
    );

    const submissionResult = await store.getSubmissionResult(
        submissionId,
        datasetId,
    );
    const result = scoreType.computeScore(submissionResult);
    const { maxScore, maxPublicScore } = scoreType.maxScores();

    logger.info(
        `Submission ${submissionId}: ${result.score} / ${maxScore} (public ${result.publicScore} / ${maxPublicScore})`,
    );

    return { submissionId, datasetId, maxScore, maxPublicScore, ...result };
}
