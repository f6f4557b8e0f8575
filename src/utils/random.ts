/**
 * A source of uniformly distributed numbers in [0, 1).
 *
 * Scoring takes one of these as an argument rather than calling Math.random,
 * so a check can be replayed by handing it an identically seeded source.
 */
export type RandomSource = () => number;

/**
 * Mulberry32: small, fast 32-bit generator. Two sources built from the same
 * seed yield the same sequence.
 */
export const createSeededRandom = (seed: number): RandomSource => {
    let state = seed >>> 0;

    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
};

export const uniformBetween = (random: RandomSource, min: number, max: number): number => {
    return min + (max - min) * random();
};
