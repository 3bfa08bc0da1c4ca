import { MongoClient, ObjectId, type Collection, type Db } from 'mongodb';
import type { OutcomeStore } from '../adapters';
import { DataIntegrityError } from '../grading/errors';
import type {
    ScoringDataset,
    StatusText,
    SubmissionResult,
} from '../interfaces';

export interface RawDataset {
    _id: ObjectId;
    scoreType: string;
    scoreTypeParameters: unknown;
    testcases: {
        codename: string;
        isPublic: boolean;
    }[];
}

export interface RawSubmissionResult {
    submissionId: ObjectId;
    datasetId: ObjectId;
    compilationOutcome: 'ok' | 'fail' | null;
    evaluationOutcome: 'ok' | null;
    evaluations: {
        codename: string;
        outcome: number;
        text: StatusText;
        executionTime: number | null;
        executionMemory: number | null;
    }[];
}

const toObjectId = (id: string, what: string): ObjectId => {
    if (!ObjectId.isValid(id)) throw new Error(`Invalid ${what} Id: ${id}`);
    return new ObjectId(id);
};

export default class Mongo implements OutcomeStore {
    #client: MongoClient;
    db: Db;
    dataset: Collection<RawDataset>;
    submissionResult: Collection<RawSubmissionResult>;

    constructor(url: string, name: string, username: string, password: string) {
        this.#client = new MongoClient(
            `mongodb://${username}:${password}@${url}/${name}`,
        );

        this.db = this.#client.db(name);
        this.dataset = this.db.collection<RawDataset>('dataset');
        this.submissionResult =
            this.db.collection<RawSubmissionResult>('submission_result');
    }

    async connect() {
        await this.#client.connect();
    }

    async close() {
        await this.#client.close();
    }

    async getDataset(datasetId: string): Promise<ScoringDataset> {
        const dataset = await this.dataset.findOne({
            _id: toObjectId(datasetId, 'Dataset'),
        });

        if (!dataset)
            throw new DataIntegrityError(`Can not find dataset ${datasetId}`);

        return {
            datasetId: dataset._id.toHexString(),
            scoreType: dataset.scoreType,
            scoreTypeParameters: dataset.scoreTypeParameters,
            testcases: dataset.testcases.map((tc) => ({
                codename: tc.codename,
                isPublic: tc.isPublic,
            })),
        };
    }

    async getSubmissionResult(
        submissionId: string,
        datasetId: string,
    ): Promise<SubmissionResult> {
        const result = await this.submissionResult.findOne({
            submissionId: toObjectId(submissionId, 'Submission'),
            datasetId: toObjectId(datasetId, 'Dataset'),
        });

        if (!result)
            throw new DataIntegrityError(
                `Can not find result of submission ${submissionId} on dataset ${datasetId}`,
            );

        const evaluated = result.evaluationOutcome === 'ok';
        return {
            evaluated: () => evaluated,
            evaluations: result.evaluations.map((ev) => ({ ...ev })),
        };
    }
}
