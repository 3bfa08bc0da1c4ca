import { inspect } from 'util';
import { vsprintf } from 'sprintf-js';
import { logger } from '../lib/winston-common';
import { DEFAULT_TRANSLATION, N_, type Translation } from '../locale';

// Checked in order, the first matching prefix wins.
const SIMPLE_STATUS_TEXTS: [string, string][] = [
    [
        "Evaluation didn't produce file",
        N_(
            'Output file was not produced. Check you are creating the output file ' +
                'with name given in the problem statement. You may wish to use or ' +
                'consult the templates for this problem.',
        ),
    ],
    [
        'Execution timed out',
        N_(
            'Time limit exceeded before your program finished. This may be due to ' +
                'an infinite loop/recursion, or your algorithm may be too slow for ' +
                'this subtask',
        ),
    ],
    [
        'Execution killed',
        N_(
            'Program crashed. Possibly due to accessing or requesting invalid ' +
                'memory (e.g. out-of-bounds array access)',
        ),
    ],
    [
        'Execution failed because the return code was nonzero',
        N_(
            'Your program did not finish successfully (return code nonzero). ' +
                'Possibly due to an Exception or Error being thrown.',
        ),
    ],
];

const PLACEHOLDER = /%(%|[+-]?(?:0|'.)?-?\d*(?:\.\d+)?[b-gijostTuvxX])/g;

export function getSimpleStatusText(template: string): string | undefined {
    return SIMPLE_STATUS_TEXTS.find(([prefix]) => template.startsWith(prefix))?.[1];
}

const countPlaceholders = (template: string): number =>
    Array.from(template.matchAll(PLACEHOLDER)).filter((m) => m[1] !== '%').length;

function fillTemplate(template: string, args: unknown[]): string {
    const expected = countPlaceholders(template);
    if (expected !== args.length)
        throw new TypeError(
            `Template expects ${expected} argument(s), got ${args.length}`,
        );

    const values = args.map((arg) => {
        if (typeof arg !== 'string' && typeof arg !== 'number')
            throw new TypeError(`Unsupported argument type: ${typeof arg}`);
        return arg;
    });

    return vsprintf(template, values);
}

/**
 * Formats a status text (a template followed by its arguments) in the
 * given locale, replacing known execution failures with guidance for the
 * contestant. Never throws: malformed statuses are logged and rendered as
 * the locale's "N/A".
 */
export function formatStatusText(
    status: unknown,
    translation: Translation = DEFAULT_TRANSLATION,
): string {
    try {
        if (!Array.isArray(status))
            throw new TypeError(`Invalid type: ${typeof status}`);

        const [template, ...args]: unknown[] = status;
        if (typeof template !== 'string')
            throw new TypeError(`Invalid template: ${inspect(template)}`);

        const simple = getSimpleStatusText(template);
        if (simple !== undefined) {
            // the guidance replaces the template along with its arguments
            return fillTemplate(translation.gettext(simple), []);
        }

        const text = template !== '' ? translation.gettext(template) : '';
        return fillTemplate(text, args);
    } catch (err) {
        logger.error(
            `Unexpected error when formatting status text: ${inspect(status)}\n${inspect(err)}`,
        );
        return translation.gettext('N/A');
    }
}
