#!/usr/bin/env tsx

import dotenv from 'dotenv';
import { IdentityCorpus, logError, logger, validateEnvironment } from '@masquerade/shared';
import { setupCorpus } from '../refresh/corpus-refresh.js';

dotenv.config();

/**
 * Refresh the persisted identity corpus.
 *   --if-stale   only refresh when the file is older than CORPUS_MAX_AGE_SECONDS
 *
 * Run it while no masked request batch is in flight.
 */
async function main(): Promise<void> {
    const env = validateEnvironment();
    const onlyIfStale = process.argv.slice(2).includes('--if-stale');

    const corpus = new IdentityCorpus({ filePath: env.CORPUS_PATH });
    const refreshed = await setupCorpus(corpus, {
        force: !onlyIfStale,
        maxAgeSeconds: env.CORPUS_MAX_AGE_SECONDS
    });

    if (refreshed) {
        console.log(`Identity corpus refreshed: ${corpus.size} entries written to ${corpus.filePath}`);
    } else {
        console.log(`Identity corpus at ${corpus.filePath} is fresh; nothing to do`);
    }
}

main().catch((error: unknown) => {
    logError(error, { command: 'refresh-corpus' });
    logger.flush();
    process.exitCode = 1;
});
