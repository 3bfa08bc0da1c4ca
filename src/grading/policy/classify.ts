import { OutcomeLabel } from '../../interfaces';

export const classifyOutcome = (outcome: number): OutcomeLabel => {
    if (outcome <= 0.0) return OutcomeLabel.NotCorrect;
    if (outcome >= 1.0) return OutcomeLabel.Correct;
    return OutcomeLabel.PartiallyCorrect;
};
