/**
 * Injectable randomness so corpus draws and client-hint synthesis can be
 * replayed under a fixed seed.
 */
export interface RandomSource {
    /** Uniform float in [0, 1). */
    next(): number;
}

export const defaultRandom: RandomSource = {
    next: () => Math.random()
};

/**
 * Deterministic mulberry32 generator.
 */
export function createSeededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return {
        next: () => {
            state = (state + 0x6d2b79f5) >>> 0;
            let t = state;
            t = Math.imul(t ^ (t >>> 15), t | 1);
            t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
            return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
        }
    };
}

/** Integer in [min, max], both ends inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
    return min + Math.floor(random.next() * (max - min + 1));
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
    if (items.length === 0) {
        throw new RangeError('Cannot pick from an empty list');
    }
    return items[Math.floor(random.next() * items.length)];
}

/**
 * Fisher-Yates shuffle into a new array.
 */
export function shuffle<T>(random: RandomSource, items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
        const j = Math.floor(random.next() * (i + 1));
        [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
}
