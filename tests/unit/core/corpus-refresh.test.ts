import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { CorpusCollector } from '../../../packages/core/src/refresh/corpus-collector.js';
import { refreshCorpus, setupCorpus } from '../../../packages/core/src/refresh/corpus-refresh.js';
import { IdentityCorpus } from '../../../packages/shared/src/identity/identity-corpus.js';
import { CorpusRefreshError } from '../../../packages/shared/src/types/errors.js';
import { createTempDir } from '../../utils/test-helpers.js';

const FRESH_PAYLOAD = '[{"ua":"fresh","pct":1}]';

/**
 * Collector that hands out a fixed payload instead of reaching the network
 */
class StubCollector extends CorpusCollector {
    calls = 0;

    constructor(private readonly outcome: string | Error = FRESH_PAYLOAD) {
        super({ sourceUrl: 'https://stats.example.test/', filePath: 'unused.json' });
    }

    override async collect(): Promise<string> {
        this.calls++;
        if (this.outcome instanceof Error) {
            throw this.outcome;
        }
        return this.outcome;
    }
}

describe('Corpus refresh', () => {
    let dir: string;
    let cleanup: () => Promise<void>;

    beforeEach(async () => {
        ({ dir, cleanup } = await createTempDir());
    });

    afterEach(async () => {
        await cleanup();
    });

    describe('refreshCorpus', () => {
        it('should swap in the collected payload and reset the clock', async () => {
            const corpus = new IdentityCorpus({ filePath: join(dir, 'user-agent.json') });
            corpus.load('[{"ua":"old","pct":1}]');

            await refreshCorpus(corpus, new StubCollector());

            expect(corpus.entries).toEqual([{ identityString: 'fresh', weight: 1 }]);
            expect(corpus.isStale()).toBe(false);
        });

        it('should leave the corpus untouched when collection fails', async () => {
            const corpus = new IdentityCorpus({ filePath: join(dir, 'user-agent.json') });
            corpus.load('[{"ua":"old","pct":1}]');

            await expect(
                refreshCorpus(corpus, new StubCollector(new CorpusRefreshError('down')))
            ).rejects.toBeInstanceOf(CorpusRefreshError);
            expect(corpus.entries).toEqual([{ identityString: 'old', weight: 1 }]);
            expect(corpus.isStale()).toBe(true);
        });
    });

    describe('setupCorpus', () => {
        it('should skip the refresh when the persisted file is fresh', async () => {
            const filePath = join(dir, 'user-agent.json');
            await writeFile(filePath, '[{"ua":"persisted","pct":1}]');
            const corpus = new IdentityCorpus({ filePath });
            const collector = new StubCollector();

            await expect(setupCorpus(corpus, { maxAgeSeconds: 86400, collector })).resolves.toBe(false);
            expect(collector.calls).toBe(0);
        });

        it('should refresh when the file is missing', async () => {
            const corpus = new IdentityCorpus({ filePath: join(dir, 'missing.json') });
            const collector = new StubCollector();

            await expect(setupCorpus(corpus, { maxAgeSeconds: 86400, collector })).resolves.toBe(true);
            expect(collector.calls).toBe(1);
            expect(corpus.entries[0].identityString).toBe('fresh');
        });

        it('should refresh a fresh corpus when forced', async () => {
            const filePath = join(dir, 'user-agent.json');
            await writeFile(filePath, '[{"ua":"persisted","pct":1}]');
            const corpus = new IdentityCorpus({ filePath });
            const collector = new StubCollector();

            await expect(setupCorpus(corpus, { force: true, collector })).resolves.toBe(true);
            expect(collector.calls).toBe(1);
        });

        it('should refresh once the max age has passed', async () => {
            const filePath = join(dir, 'user-agent.json');
            await writeFile(filePath, '[{"ua":"persisted","pct":1}]');
            const corpus = new IdentityCorpus({ filePath, now: () => Date.now() + 2 * 86400 * 1000 });
            const collector = new StubCollector();

            await expect(setupCorpus(corpus, { maxAgeSeconds: 86400, collector })).resolves.toBe(true);
            expect(collector.calls).toBe(1);
        });
    });
});
