import type { Evaluation, ScoreResult } from '../../interfaces';
import { loadTranslation } from '../../locale';
import { renderFeedback } from '../feedback';
import { createScoreType } from '../score-type';

const TIME_LIMIT_GUIDANCE =
    'Time limit exceeded before your program finished. This may be due to ' +
    'an infinite loop/recursion, or your algorithm may be too slow for this subtask';

const evaluations: Evaluation[] = [
    {
        codename: 'A',
        outcome: 1.0,
        text: ['Output is correct'],
        executionTime: 0.25,
        executionMemory: 2 * 1024 * 1024,
    },
    {
        codename: 'B',
        outcome: 0.0,
        text: ['Execution timed out (wall clock limit exceeded)'],
        executionTime: 1.5,
        executionMemory: 1536,
    },
    {
        codename: 'C',
        outcome: 0.0,
        text: ["Output isn't correct"],
        executionTime: null,
        executionMemory: null,
    },
];

const score = (): ScoreResult =>
    createScoreType('min', [[100, 3]], [
        { codename: 'A', isPublic: true },
        { codename: 'B', isPublic: true },
        { codename: 'C', isPublic: false },
    ]).computeScore({ evaluated: () => true, evaluations });

describe('renderFeedback', () => {
    it('renders the public view of a partially public subtask', () => {
        expect(renderFeedback(score().publicSubtasks)).toEqual([
            {
                idx: 1,
                title: 'Subtask 1',
                testcases: [
                    {
                        idx: 'A',
                        outcome: 'Correct',
                        text: 'Output is correct',
                        time: '0.250 s',
                        memory: '2 MiB',
                    },
                    {
                        idx: 'B',
                        outcome: 'Not correct',
                        text: TIME_LIMIT_GUIDANCE,
                        time: '1.500 s',
                        memory: '1.5 KiB',
                    },
                    { idx: 'C' },
                ],
            },
        ]);
    });

    it('renders every detail of the full view at full level', () => {
        const [subtask] = renderFeedback(score().subtasks, { feedbackLevel: 'full' });

        expect(subtask.score).toBe('0 / 100');
        expect(subtask.status).toBe('Not correct');
        expect(subtask.testcases[2]).toEqual({
            idx: 'C',
            outcome: 'Not correct',
            text: "Output isn't correct",
        });
    });

    it('hides testcases after a public failure at restricted level', () => {
        const [subtask] = renderFeedback(score().subtasks, {
            feedbackLevel: 'restricted',
        });

        expect(subtask.testcases.map((tc) => Object.keys(tc).length)).toEqual([
            5, 5, 1,
        ]);
    });

    it('translates labels, texts and units', () => {
        const [subtask] = renderFeedback(score().publicSubtasks, {
            translation: loadTranslation('zh_CN'),
        });

        expect(subtask.title).toBe('子任务 1');
        expect(subtask.testcases[0]).toEqual({
            idx: 'A',
            outcome: '正确',
            text: '输出正确',
            time: '0.250 秒',
            memory: '2 MiB',
        });
        expect(subtask.testcases[1].outcome).toBe('错误');
        expect(subtask.testcases[1].text).toBe(
            '程序在结束前超出了时间限制。可能是出现了死循环或无限递归，也可能是算法对本子任务来说太慢',
        );
    });

    it('uses the alternative title and scores partial subtasks', () => {
        const result = createScoreType(
            'sum',
            [[40, 2, 'Small inputs']],
            [
                { codename: 'x', isPublic: true },
                { codename: 'y', isPublic: true },
            ],
        ).computeScore({
            evaluated: () => true,
            evaluations: [
                { ...evaluations[0], codename: 'x' },
                { ...evaluations[1], codename: 'y' },
            ],
        });

        const [subtask] = renderFeedback(result.publicSubtasks);
        expect(subtask.title).toBe('Small inputs');
        expect(subtask.score).toBe('20 / 40');
        expect(subtask.status).toBe('Partially correct');
    });
});
