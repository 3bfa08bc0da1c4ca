import { sprintf } from 'sprintf-js';
import type {
    FeedbackLevel,
    HiddenTestcaseFeedback,
    PublicSubtaskFeedback,
    TestcaseFeedback,
} from '../interfaces';
import {
    DEFAULT_TRANSLATION,
    type Translation,
    formatDuration,
    formatSize,
} from '../locale';
import { formatScore } from '../utils';
import { classifyOutcome } from './policy/classify';
import { formatStatusText } from './status-text';

export type RenderedTestcase = {
    idx: string;
    outcome?: string;
    text?: string;
    time?: string;
    memory?: string;
};

export type RenderedSubtask = {
    idx: number;
    title: string;
    score?: string;
    status?: string;
    testcases: RenderedTestcase[];
};

export type RenderOptions = {
    translation?: Translation;
    feedbackLevel?: FeedbackLevel;
};

const hasDetail = (
    tc: TestcaseFeedback | HiddenTestcaseFeedback,
): tc is TestcaseFeedback => 'outcome' in tc;

function renderTestcase(
    tc: TestcaseFeedback | HiddenTestcaseFeedback,
    translation: Translation,
    feedbackLevel: FeedbackLevel,
): RenderedTestcase {
    if (!hasDetail(tc)) return { idx: tc.idx };
    if (feedbackLevel === 'restricted' && !tc.show_in_restricted_feedback)
        return { idx: tc.idx };

    const rendered: RenderedTestcase = {
        idx: tc.idx,
        outcome: translation.gettext(tc.outcome),
        text: formatStatusText(tc.text, translation),
    };
    if (tc.time !== null) rendered.time = formatDuration(tc.time, translation);
    if (tc.memory !== null) rendered.memory = formatSize(tc.memory, translation);
    return rendered;
}

// Turns a (full or public) breakdown into display rows.
export function renderFeedback(
    subtasks: PublicSubtaskFeedback[],
    {
        translation = DEFAULT_TRANSLATION,
        feedbackLevel = 'restricted',
    }: RenderOptions = {},
): RenderedSubtask[] {
    return subtasks.map((st) => {
        const cases: (TestcaseFeedback | HiddenTestcaseFeedback)[] = st.testcases;
        const testcases = cases.map((tc) =>
            renderTestcase(tc, translation, feedbackLevel),
        );

        if (!('score_fraction' in st)) {
            return {
                idx: st.idx,
                title: sprintf(translation.gettext('Subtask %d'), st.idx),
                testcases,
            };
        }

        return {
            idx: st.idx,
            title:
                st.alt_title ?? sprintf(translation.gettext('Subtask %d'), st.idx),
            score: `${formatScore(st.score_fraction * st.max_score)} / ${formatScore(st.max_score)}`,
            status: translation.gettext(classifyOutcome(st.score_fraction)),
            testcases,
        };
    });
}
