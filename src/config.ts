import commandLineArgs, { type OptionDefinition } from 'command-line-args';
import { resolve } from 'path';
import type { JsonObject, JsonValue } from 'type-fest';
import type { FeedbackLevel } from './interfaces';
import { isJsonObject, readJSON } from './utils';

export type GlobalConfig = {
    mongoDB: {
        url: string;
        name: string;
        username: string;
        password: string;
    };
    locale: string;
    feedbackLevel: FeedbackLevel;
};

export type Options = {
    verbose: boolean;
    submission?: string;
    dataset?: string;
    config: GlobalConfig;
};

const optionDefinitions: OptionDefinition[] = [
    { name: 'verbose', alias: 'v', type: Boolean },
    { name: 'config', alias: 'c', type: String },
    { name: 'submission', alias: 's', type: String },
    { name: 'dataset', alias: 'd', type: String },
    { name: 'locale', alias: 'l', type: String },
];

export const defaultConfigPath = resolve(__dirname, '../config.json');

function requireString(obj: JsonObject, key: string, where: string): string {
    const value = obj[key];
    if (typeof value !== 'string')
        throw new Error(`config: ${where}${key} must be a string`);
    return value;
}

const isFeedbackLevel = (value: JsonValue | undefined): value is FeedbackLevel =>
    value === 'full' || value === 'restricted';

export function validateConfig(cfg: JsonObject): GlobalConfig {
    const mongoDB = cfg.mongoDB;
    if (!isJsonObject(mongoDB))
        throw new Error('config: mongoDB must be an object');

    const feedbackLevel = cfg.feedbackLevel;
    if (!isFeedbackLevel(feedbackLevel))
        throw new Error('config: feedbackLevel must be "full" or "restricted"');

    return {
        mongoDB: {
            url: requireString(mongoDB, 'url', 'mongoDB.'),
            name: requireString(mongoDB, 'name', 'mongoDB.'),
            username: requireString(mongoDB, 'username', 'mongoDB.'),
            password: requireString(mongoDB, 'password', 'mongoDB.'),
        },
        locale: requireString(cfg, 'locale', ''),
        feedbackLevel,
    };
}

export function loadConfig(
    argv: string[] = process.argv.slice(2),
    defaultsPath = defaultConfigPath,
): Options {
    const options = commandLineArgs(optionDefinitions, { argv, partial: true });

    const defaults = readJSON(defaultsPath);
    const userConfig: JsonObject =
        typeof options.config === 'string' ? readJSON(options.config) : {};

    const mongoDB: JsonObject = {
        ...(isJsonObject(defaults.mongoDB) ? defaults.mongoDB : {}),
        ...(isJsonObject(userConfig.mongoDB) ? userConfig.mongoDB : {}),
    };
    const config = validateConfig({ ...defaults, ...userConfig, mongoDB });
    if (typeof options.locale === 'string') config.locale = options.locale;

    return {
        verbose: options.verbose === true,
        submission:
            typeof options.submission === 'string' ? options.submission : undefined,
        dataset: typeof options.dataset === 'string' ? options.dataset : undefined,
        config,
    };
}

export function requireTarget(options: Options): { submission: string; dataset: string } {
    const { submission, dataset } = options;
    if (!submission) throw new Error('Missing option --submission');
    if (!dataset) throw new Error('Missing option --dataset');
    return { submission, dataset };
}
