import { getEnv, logger, type IdentityCorpus } from '@masquerade/shared';
import { CorpusCollector } from './corpus-collector.js';

export interface SetupCorpusOptions {
    /** Refresh even when the corpus is fresh. */
    force?: boolean;
    /** Defaults to CORPUS_MAX_AGE_SECONDS. */
    maxAgeSeconds?: number;
    collector?: CorpusCollector;
}

/**
 * Download a new corpus, persist it and swap it into `corpus`.
 *
 * Needs exclusive access to the corpus: run it only when no request batch
 * is drawing identities.
 */
export async function refreshCorpus(
    corpus: IdentityCorpus,
    collector: CorpusCollector = new CorpusCollector({ filePath: corpus.filePath })
): Promise<void> {
    const payload = await collector.collect();
    corpus.load(payload);
    corpus.markRefreshed();
    logger.info({ entries: corpus.size, source: collector.sourceUrl }, 'Identity corpus refreshed');
}

/**
 * Refresh when forced or when the persisted corpus is stale.
 * Returns whether a refresh happened.
 */
export async function setupCorpus(corpus: IdentityCorpus, options: SetupCorpusOptions = {}): Promise<boolean> {
    if (!options.force) {
        await corpus.refreshFileTimestamp();
        const maxAgeSeconds = options.maxAgeSeconds ?? getEnv().CORPUS_MAX_AGE_SECONDS;
        if (!corpus.isStale(maxAgeSeconds)) {
            logger.debug({ filePath: corpus.filePath, maxAgeSeconds }, 'Identity corpus is fresh');
            return false;
        }
    }

    await refreshCorpus(corpus, options.collector);
    return true;
}
