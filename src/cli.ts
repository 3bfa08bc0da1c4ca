#!/usr/bin/env node
import { inspect } from 'util';
import { loadConfig, requireTarget } from './config';
import { renderFeedback } from './grading/feedback';
import Mongo from './lib/mongo';
import { logger } from './lib/winston-common';
import { loadTranslation } from './locale';
import { scoreSubmission } from './scoring';

const main = async () => {
    const options = loadConfig();
    const { config, verbose } = options;
    if (verbose) logger.level = 'verbose';

    const { submission, dataset } = requireTarget(options);

    const translation = loadTranslation(config.locale);

    const mongo = new Mongo(
        config.mongoDB.url,
        config.mongoDB.name,
        config.mongoDB.username,
        config.mongoDB.password,
    );

    logger.info('Connecting to MongoDB...');
    await mongo.connect();

    try {
        const result = await scoreSubmission(mongo, submission, dataset);
        const feedback = renderFeedback(result.publicSubtasks, {
            translation,
            feedbackLevel: config.feedbackLevel,
        });

        process.stdout.write(`${JSON.stringify({ ...result, feedback }, null, 4)}\n`);
    } finally {
        await mongo.close();
    }
};

main().catch((e) => {
    logger.error('Scorer Error!');
    logger.error(inspect(e));
    process.exitCode = 1;
});
