/**
 * RANDOM - Injectable random sources for the visualizer
 */

import type { RandomSource } from './types/visualizer';

export const systemRandom: RandomSource = () => Math.random();

/**
 * Small seeded generator (mulberry32). Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6D2B79F5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/** Uniform sample in [min, max] */
export function sampleRange(random: RandomSource, min: number, max: number): number {
    return min + random() * (max - min);
}
