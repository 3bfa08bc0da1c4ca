import type {
    Evaluation,
    HiddenTestcaseFeedback,
    MaxScores,
    PublicSubtaskFeedback,
    ScoreResult,
    SubmissionResult,
    SubtaskFeedback,
    SubtaskParameter,
    Testcase,
    TestcaseFeedback,
} from '../interfaces';
import { logger } from '../lib/winston-common';
import { formatScore } from '../utils';
import { DataIntegrityError, ScoreTypeConfigError } from './errors';
import { type GroupPolicy, getPolicy } from './policy';

export function parseParameters(raw: unknown): SubtaskParameter[] {
    if (!Array.isArray(raw))
        throw new ScoreTypeConfigError('Score type parameters must be a list');

    return raw.map((p: unknown, idx): SubtaskParameter => {
        const where = `Subtask ${idx + 1}`;
        if (!Array.isArray(p) || p.length < 2)
            throw new ScoreTypeConfigError(
                `${where}: expected [weight, target, title?], got ${JSON.stringify(p)}`,
            );

        const [weight, target, ...rest]: unknown[] = p;
        if (typeof weight !== 'number' || !Number.isFinite(weight) || weight < 0)
            throw new ScoreTypeConfigError(
                `${where}: weight must be a non-negative number`,
            );
        if (typeof target !== 'number' && typeof target !== 'string')
            throw new ScoreTypeConfigError(
                `${where}: target must be a testcase count or a regex`,
            );
        if (rest.length > 0 && typeof rest[rest.length - 1] !== 'string')
            throw new ScoreTypeConfigError(`${where}: title must be a string`);

        return [weight, target, ...rest];
    });
}

const altTitle = (parameter: SubtaskParameter): string | undefined => {
    const last = parameter[parameter.length - 1];
    return parameter.length >= 3 && typeof last === 'string' ? last : undefined;
};

// Matched against the start of the codename.
function compileTarget(target: string): RegExp {
    try {
        return new RegExp(`^(?:${target})`);
    } catch (e) {
        throw new ScoreTypeConfigError(`Invalid testcase regex ${target}: ${e}`);
    }
}

// Resolves each subtask's target into its testcase codenames.
export function retrieveTargetTestcases(
    parameters: SubtaskParameter[],
    codenames: string[],
): string[][] {
    const sorted = [...codenames].sort();
    const targets = parameters.map((p) => p[1]);

    let result: string[][];
    if (targets.every((t): t is number => typeof t === 'number')) {
        if (!targets.every((t) => Number.isInteger(t) && t >= 0))
            throw new ScoreTypeConfigError(
                'Testcase counts must be non-negative integers',
            );
        const total = targets.reduce((prev, curr) => prev + curr, 0);
        if (total !== sorted.length)
            throw new ScoreTypeConfigError(
                `Subtasks cover ${total} testcases, the dataset has ${sorted.length}`,
            );

        let current = 0;
        result = targets.map((count) => {
            const slice = sorted.slice(current, current + count);
            current += count;
            return slice;
        });
    } else if (targets.every((t): t is string => typeof t === 'string')) {
        result = targets.map((t) => {
            const re = compileTarget(t);
            return sorted.filter((codename) => re.test(codename));
        });
    } else {
        throw new ScoreTypeConfigError(
            'Subtask targets must be all testcase counts or all regexes',
        );
    }

    const empty = result.findIndex((t) => t.length === 0);
    if (empty !== -1)
        throw new ScoreTypeConfigError(`Subtask ${empty + 1} has no testcases`);

    return result;
}

export type VisibilityState = {
    previousAllCorrect: boolean;
    testcases: TestcaseFeedback[];
    publicTestcases: (TestcaseFeedback | HiddenTestcaseFeedback)[];
};

/**
 * Builds a subtask's per-testcase feedback, left to right.
 *
 * A testcase's detail is shown in restricted feedback only while no earlier
 * public testcase of the subtask hit the worst outcome. Private testcases
 * never change that state, so restricted feedback does not reveal that a
 * hidden testcase failed.
 */
export function buildTestcaseFeedback(
    evaluations: Evaluation[],
    isPublic: (codename: string) => boolean,
    classify: (outcome: number) => TestcaseFeedback['outcome'],
): Omit<VisibilityState, 'previousAllCorrect'> {
    const worstOutcome = Math.min(...evaluations.map((ev) => ev.outcome));

    const { testcases, publicTestcases } = evaluations.reduce<VisibilityState>(
        (state, ev) => {
            const feedback: TestcaseFeedback = {
                idx: ev.codename,
                outcome: classify(ev.outcome),
                text: ev.text,
                time: ev.executionTime,
                memory: ev.executionMemory,
                show_in_restricted_feedback: state.previousAllCorrect,
            };
            const visible = isPublic(ev.codename);

            return {
                previousAllCorrect:
                    state.previousAllCorrect &&
                    !(visible && ev.outcome <= worstOutcome),
                testcases: [...state.testcases, feedback],
                publicTestcases: [
                    ...state.publicTestcases,
                    visible ? feedback : { idx: ev.codename },
                ],
            };
        },
        { previousAllCorrect: true, testcases: [], publicTestcases: [] },
    );

    return { testcases, publicTestcases };
}

export class ScoreTypeGroup {
    readonly policy: GroupPolicy;
    readonly parameters: SubtaskParameter[];
    readonly targets: string[][];
    #publicTestcases: Map<string, boolean>;

    constructor(policy: GroupPolicy, parameters: unknown, testcases: Testcase[]) {
        this.policy = policy;
        this.parameters = parseParameters(parameters);

        this.#publicTestcases = new Map<string, boolean>(
            testcases.map((tc) => [tc.codename, tc.isPublic]),
        );
        if (this.#publicTestcases.size !== testcases.length)
            throw new ScoreTypeConfigError('Duplicate testcase codenames');

        this.targets = retrieveTargetTestcases(this.parameters, [
            ...this.#publicTestcases.keys(),
        ]);
    }

    isPublic(codename: string): boolean {
        return this.#publicTestcases.get(codename) ?? false;
    }

    maxScores(): MaxScores {
        let maxScore = 0;
        let maxPublicScore = 0;
        const headers: string[] = [];

        this.parameters.forEach((parameter, stIdx) => {
            const [weight] = parameter;
            maxScore += weight;
            if (this.targets[stIdx].every((tc) => this.isPublic(tc)))
                maxPublicScore += weight;

            const title = altTitle(parameter) ?? `Subtask ${stIdx + 1}`;
            headers.push(`${title} (${formatScore(weight)})`);
        });

        return { maxScore, maxPublicScore, headers };
    }

    computeScore(submissionResult: SubmissionResult): ScoreResult {
        // The submission did not even compile.
        if (!submissionResult.evaluated()) {
            return {
                score: 0,
                subtasks: [],
                publicScore: 0,
                publicSubtasks: [],
                rankingDetails: this.parameters.map(() => formatScore(0)),
            };
        }

        const evaluations = new Map<string, Evaluation>(
            submissionResult.evaluations.map((ev) => [ev.codename, ev]),
        );

        let score = 0;
        let publicScore = 0;
        const subtasks: SubtaskFeedback[] = [];
        const publicSubtasks: PublicSubtaskFeedback[] = [];
        const rankingDetails: string[] = [];

        this.parameters.forEach((parameter, stIdx) => {
            const target = this.targets[stIdx];
            const targetEvaluations = target.map((codename) => {
                const ev = evaluations.get(codename);
                if (ev === undefined)
                    throw new DataIntegrityError(
                        `Testcase ${codename} of subtask ${stIdx + 1} has no evaluation`,
                    );
                return ev;
            });

            const { testcases, publicTestcases } = buildTestcaseFeedback(
                targetEvaluations,
                (codename) => this.isPublic(codename),
                (outcome) => this.policy.classify(outcome, parameter),
            );

            const scoreFraction = this.policy.reduce(
                targetEvaluations.map((ev) => ev.outcome),
                parameter,
            );
            const [weight] = parameter;
            const subtaskScore = scoreFraction * weight;
            logger.verbose(
                `Subtask ${stIdx + 1}: fraction ${scoreFraction}, score ${subtaskScore}`,
            );

            score += subtaskScore;
            const subtask: SubtaskFeedback = {
                idx: stIdx + 1,
                score_fraction: scoreFraction,
                max_score: weight,
                testcases,
            };
            const title = altTitle(parameter);
            if (title !== undefined) subtask.alt_title = title;
            subtasks.push(subtask);

            if (target.every((tc) => this.isPublic(tc))) {
                publicScore += subtaskScore;
                publicSubtasks.push(subtask);
            } else {
                publicSubtasks.push({ idx: stIdx + 1, testcases: publicTestcases });
            }

            rankingDetails.push(formatScore(subtaskScore));
        });

        return { score, subtasks, publicScore, publicSubtasks, rankingDetails };
    }
}

export function createScoreType(
    name: string,
    parameters: unknown,
    testcases: Testcase[],
): ScoreTypeGroup {
    const policy = getPolicy(name);
    if (policy === undefined)
        throw new ScoreTypeConfigError(`Unknown score type: ${name}`);
    return new ScoreTypeGroup(policy, parameters, testcases);
}
