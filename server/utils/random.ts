export type RandomFn = () => number;

/** Default RNG, override in tests for determinism. */
export const defaultRandom: RandomFn = () => Math.random();

/**
 * Fisher-Yates shuffle (pure). Every permutation of `items` is equally likely
 * as long as `random` is uniform on [0, 1).
 */
export function shuffle<T>(items: readonly T[], random: RandomFn = defaultRandom): T[] {
    const copy = [...items];
    for (let i = copy.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [copy[i], copy[j]] = [copy[j], copy[i]];
    }
    return copy;
}

/**
 * Small seeded generator (mulberry32) for reproducible shuffles.
 */
export function seededRandom(seed: number): RandomFn {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}
