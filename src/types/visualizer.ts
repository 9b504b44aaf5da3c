/**
 * Visualizer types shared by the animator, its loop and the renderer
 */

/** Returns a value in [0, 1] */
export type RandomSource = () => number;

/** Monotonic milliseconds */
export type Clock = () => number;

/** Fixed delay, or a range a fresh delay is drawn from on every refresh */
export type IntervalSpec = number | { min: number; max: number };

export interface VisualizerConfig {
    barCount: number;
    minBarHeight: number;
    maxBarHeight: number;
    smoothing: number;
    decayFactor: number;
    epsilon: number;
    maxDecayTicks: number;
    refreshInterval: IntervalSpec;
    tickInterval: number;
    decayTickInterval: number;
}

export type VisualizerPhase = 'playing' | 'decaying' | 'settled';

export type FrameListener = (heights: readonly number[]) => void;

export interface BarRect {
    x: number;
    y: number;
    width: number;
    height: number;
}
