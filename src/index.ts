export * from './interfaces';
export type { OutcomeStore } from './adapters';
export { DataIntegrityError, ScoreTypeConfigError } from './grading/errors';
export {
    type GroupPolicy,
    SubtaskScoringType,
    getPolicy,
    policies,
} from './grading/policy';
export {
    ScoreTypeGroup,
    buildTestcaseFeedback,
    createScoreType,
    parseParameters,
    retrieveTargetTestcases,
} from './grading/score-type';
export { formatStatusText, getSimpleStatusText } from './grading/status-text';
export {
    type RenderedSubtask,
    type RenderedTestcase,
    type RenderOptions,
    renderFeedback,
} from './grading/feedback';
export {
    CatalogTranslation,
    DEFAULT_TRANSLATION,
    N_,
    type Translation,
    formatDuration,
    formatSize,
    loadTranslation,
} from './locale';
export { type SubmissionScore, scoreSubmission } from './scoring';
export { formatScore } from './utils';
