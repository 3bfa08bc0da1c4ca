import { existsSync } from 'fs';
import { join, resolve } from 'path';
import { sprintf } from 'sprintf-js';
import { readJSON } from '../utils';

export interface Translation {
    readonly identifier: string;
    gettext(message: string): string;
}

// Marks a message key for translation without translating it.
export const N_ = (message: string): string => message;

export class CatalogTranslation implements Translation {
    readonly identifier: string;
    #messages: Map<string, string>;

    constructor(identifier: string, messages: Record<string, string>) {
        this.identifier = identifier;
        this.#messages = new Map(Object.entries(messages));
    }

    gettext(message: string): string {
        // the empty msgid is reserved for catalog headers
        if (message === '') return '';
        return this.#messages.get(message) ?? message;
    }
}

export const DEFAULT_TRANSLATION: Translation = new CatalogTranslation('en', {});

export const localesDir = resolve(__dirname, '../../locales');

export function loadTranslation(locale: string, dir = localesDir): Translation {
    if (locale === DEFAULT_TRANSLATION.identifier) return DEFAULT_TRANSLATION;

    if (!/^[A-Za-z]{2,3}(_[A-Za-z0-9]+)?$/.test(locale))
        throw new Error(`Invalid locale identifier: ${locale}`);

    const file = join(dir, `${locale}.json`);
    if (!existsSync(file)) throw new Error(`Unknown locale: ${locale}`);

    const messages: Record<string, string> = {};
    for (const [msgid, msgstr] of Object.entries(readJSON(file))) {
        if (typeof msgstr !== 'string')
            throw new Error(`${file}: message "${msgid}" is not a string`);
        messages[msgid] = msgstr;
    }

    return new CatalogTranslation(locale, messages);
}

export const formatDuration = (
    seconds: number,
    translation: Translation = DEFAULT_TRANSLATION,
): string => sprintf(translation.gettext('%.3f s'), seconds);

const SIZE_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];

export function formatSize(
    bytes: number,
    translation: Translation = DEFAULT_TRANSLATION,
): string {
    let value = bytes;
    let unit = 0;
    // bytes stay whole; larger units keep three significant digits
    const shown = () => (unit === 0 ? value : Number(value.toPrecision(3)));
    while (
        unit < SIZE_UNITS.length - 1 &&
        shown() >= (unit === 0 ? 1024 : 1000)
    ) {
        value /= 1024;
        unit++;
    }

    return sprintf(translation.gettext(`%s ${SIZE_UNITS[unit]}`), shown());
}
