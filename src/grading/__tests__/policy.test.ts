import { OutcomeLabel, type SubtaskParameter } from '../../interfaces';
import { SubtaskScoringType, getPolicy, policies } from '../policy';

const parameter: SubtaskParameter = [30, 3];

describe('group policies', () => {
    it('registers one policy per scoring type', () => {
        expect(policies.map((p) => p.name).sort()).toEqual(['min', 'mul', 'sum']);
        expect(getPolicy('min')?.name).toBe(SubtaskScoringType.Minimum);
        expect(getPolicy('max')).toBeUndefined();
    });

    it('min takes the worst outcome', () => {
        const min = getPolicy('min');
        expect(min?.reduce([1.0, 0.6, 1.0], parameter)).toBe(0.6);
        expect(min?.reduce([1.0, 1.0], parameter)).toBe(1.0);
        expect(min?.reduce([0.0, 1.0], parameter)).toBe(0.0);
    });

    it('mul multiplies the outcomes', () => {
        expect(getPolicy('mul')?.reduce([0.5, 0.5, 1.0], parameter)).toBe(0.25);
    });

    it('sum averages the outcomes', () => {
        expect(getPolicy('sum')?.reduce([1.0, 0.0, 0.5], parameter)).toBe(0.5);
    });

    it.each(policies)('$name classifies outcomes into three labels', (policy) => {
        expect(policy.classify(0.0, parameter)).toBe(OutcomeLabel.NotCorrect);
        expect(policy.classify(-0.5, parameter)).toBe(OutcomeLabel.NotCorrect);
        expect(policy.classify(0.3, parameter)).toBe(OutcomeLabel.PartiallyCorrect);
        expect(policy.classify(1.0, parameter)).toBe(OutcomeLabel.Correct);
        expect(policy.classify(1.5, parameter)).toBe(OutcomeLabel.Correct);
    });
});
