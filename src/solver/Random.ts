// A source of uniformly distributed numbers in [0, 1), same contract as Math.random
export type Random = () => number;

// Seeded PRNG (mulberry32). Identical seeds produce identical sequences.
export function mulberry32(seed: number): Random {
    let a = seed | 0;
    return function () {
        a = (a + 0x6d2b79f5) | 0;
        let t = Math.imul(a ^ (a >>> 15), 1 | a);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function randomSeed(): number {
    return Math.floor(Math.random() * 4294967296) >>> 0;
}

// In-place Fisher-Yates shuffle
export function shuffle<T>(array: T[], random: Random): T[] {
    for (let i = array.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [array[i], array[j]] = [array[j], array[i]];
    }
    return array;
}
