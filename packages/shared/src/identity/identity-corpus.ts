import { readFile, stat } from 'fs/promises';
import { z } from 'zod';
import logger from '../utils/logger.js';
import { getEnv } from '../utils/env-validator.js';
import { EmptyCorpusError, FormatError } from '../types/errors.js';
import { defaultRandom, type RandomSource } from './random.js';
import type { IdentityEntry } from './types.js';

export const SECONDS_PER_DAY = 86400;

/**
 * One record of the identity source: `{ "ua": <identity string>, "pct": <weight> }`.
 */
export const IdentityRecordSchema = z.object({
    ua: z.string(),
    pct: z.number().finite().nonnegative()
});

export const IdentitySourceSchema = z.array(IdentityRecordSchema);

export type IdentityRecord = z.infer<typeof IdentityRecordSchema>;

/**
 * Decode a JSON string or an already-parsed value into identity records.
 */
export function decodeIdentitySource(source: unknown): IdentityRecord[] {
    let decoded: unknown = source;
    if (typeof source === 'string') {
        try {
            decoded = JSON.parse(source);
        } catch (error) {
            throw new FormatError('Identity source is not valid JSON', {
                cause: error instanceof Error ? error.message : String(error)
            });
        }
    }

    const result = IdentitySourceSchema.safeParse(decoded);
    if (!result.success) {
        throw new FormatError('Identity source is not a list of { ua, pct } records', {
            issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        });
    }
    return result.data;
}

export interface IdentityCorpusOptions {
    /** Persisted corpus file; defaults to CORPUS_PATH. */
    filePath?: string;
    random?: RandomSource;
    /** Milliseconds since epoch. */
    now?: () => number;
}

/**
 * Weighted pool of real-world identity strings.
 *
 * Construct one per process and pass it to session creation. Loads and
 * reloads replace the whole pool and assume exclusive access: quiesce any
 * in-flight work that draws from the corpus before calling them.
 */
export class IdentityCorpus {
    readonly filePath: string;
    private readonly random: RandomSource;
    private readonly now: () => number;

    private pool: readonly IdentityEntry[] = [];
    private loaded = false;
    private fileModifiedAt: number | null = null;
    private refreshedAt: number | null = null;
    private pendingLoad: Promise<void> | null = null;

    constructor(options: IdentityCorpusOptions = {}) {
        this.filePath = options.filePath ?? getEnv().CORPUS_PATH;
        this.random = options.random ?? defaultRandom;
        this.now = options.now ?? Date.now;
    }

    get size(): number {
        return this.pool.length;
    }

    get entries(): readonly IdentityEntry[] {
        return this.pool;
    }

    get isLoaded(): boolean {
        return this.loaded;
    }

    /**
     * Replace all entries from a `[{ ua, pct }]` source (JSON string or parsed value).
     */
    load(source: unknown): void {
        const records = decodeIdentitySource(source);
        this.pool = Object.freeze(records.map(record => Object.freeze({
            identityString: record.ua,
            weight: record.pct
        })));
        this.loaded = true;
        logger.info({ entries: this.pool.length }, 'Identity corpus loaded');
    }

    /**
     * Load the first line of the persisted corpus file and remember its
     * modification time for staleness checks.
     */
    async loadFile(filePath: string = this.filePath): Promise<void> {
        let content: string;
        let modifiedAt: number;
        try {
            const [raw, info] = await Promise.all([readFile(filePath, 'utf8'), stat(filePath)]);
            content = raw.split('\n', 1)[0];
            modifiedAt = info.mtimeMs;
        } catch (error) {
            throw new FormatError('Identity corpus file could not be read', {
                filePath,
                cause: error instanceof Error ? error.message : String(error)
            });
        }

        this.load(content);
        this.fileModifiedAt = modifiedAt;
    }

    /**
     * Load from the configured file unless something is already loaded.
     * Concurrent first callers share one read.
     */
    async ensureLoaded(): Promise<void> {
        if (this.loaded) {
            return;
        }
        if (!this.pendingLoad) {
            this.pendingLoad = this.loadFile().finally(() => {
                this.pendingLoad = null;
            });
        }
        await this.pendingLoad;
    }

    /**
     * Re-read the persisted file's modification time without loading it.
     * A missing file clears the timestamp.
     */
    async refreshFileTimestamp(): Promise<void> {
        try {
            this.fileModifiedAt = (await stat(this.filePath)).mtimeMs;
        } catch (error) {
            if (isMissingFile(error)) {
                this.fileModifiedAt = null;
                return;
            }
            throw new FormatError('Identity corpus file could not be inspected', {
                filePath: this.filePath,
                cause: error instanceof Error ? error.message : String(error)
            });
        }
    }

    /**
     * Weighted random selection with replacement.
     */
    draw(): IdentityEntry {
        const total = this.pool.reduce((sum, entry) => sum + entry.weight, 0);
        if (this.pool.length === 0 || total <= 0) {
            throw new EmptyCorpusError(undefined, { entries: this.pool.length, totalWeight: total });
        }

        let remaining = this.random.next() * total;
        for (const entry of this.pool) {
            remaining -= entry.weight;
            if (remaining < 0) {
                return entry;
            }
        }

        // Float residue: fall back to the last entry that can be drawn
        for (let i = this.pool.length - 1; i >= 0; i--) {
            if (this.pool[i].weight > 0) {
                return this.pool[i];
            }
        }
        throw new EmptyCorpusError(undefined, { entries: this.pool.length, totalWeight: total });
    }

    /**
     * Whether the newest of the file timestamp and the last refresh is older
     * than `maxAgeSeconds`. A corpus with neither is stale.
     */
    isStale(maxAgeSeconds: number = SECONDS_PER_DAY): boolean {
        const stamps = [this.fileModifiedAt, this.refreshedAt].filter((stamp): stamp is number => stamp !== null);
        if (stamps.length === 0) {
            return true;
        }
        return Math.max(...stamps) < this.now() - maxAgeSeconds * 1000;
    }

    /**
     * Reset the staleness clock without reloading.
     */
    markRefreshed(): void {
        this.refreshedAt = this.now();
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
