/**
 * VISUALIZER ANIMATOR - Pseudo-spectrum bar heights for the radio screen
 *
 * No audio is analysed: while playing, every bar eases toward a random
 * target that is resampled on a fixed (or jittered) interval. On stop the
 * bars fall to the floor within a bounded number of ticks.
 */

import {
    clamp,
    BAR_COUNT,
    MIN_BAR_HEIGHT,
    MAX_BAR_HEIGHT,
    BAR_SMOOTHING,
    BAR_DECAY_FACTOR,
    BAR_SNAP_EPSILON,
    BAR_MAX_DECAY_TICKS,
    BAR_REFRESH_INTERVAL_MS,
    BAR_TICK_INTERVAL_MS,
    BAR_DECAY_TICK_INTERVAL_MS,
} from './constants';
import { sampleRange, systemRandom } from './random';
import type {
    Clock,
    FrameListener,
    IntervalSpec,
    RandomSource,
    VisualizerConfig,
    VisualizerPhase,
} from './types/visualizer';

export const DEFAULT_VISUALIZER_CONFIG: Readonly<VisualizerConfig> = {
    barCount: BAR_COUNT,
    minBarHeight: MIN_BAR_HEIGHT,
    maxBarHeight: MAX_BAR_HEIGHT,
    smoothing: BAR_SMOOTHING,
    decayFactor: BAR_DECAY_FACTOR,
    epsilon: BAR_SNAP_EPSILON,
    maxDecayTicks: BAR_MAX_DECAY_TICKS,
    refreshInterval: BAR_REFRESH_INTERVAL_MS,
    tickInterval: BAR_TICK_INTERVAL_MS,
    decayTickInterval: BAR_DECAY_TICK_INTERVAL_MS,
};

export interface VisualizerAnimatorOptions extends Partial<VisualizerConfig> {
    random?: RandomSource;
    clock?: Clock;
}

export class VisualizerConfigError extends Error {
    constructor(message: string) {
        super(`Invalid visualizer configuration: ${message}`);
        this.name = 'VisualizerConfigError';
    }
}

function isPositive(value: number): boolean {
    return Number.isFinite(value) && value > 0;
}

function validateInterval(name: string, spec: IntervalSpec): void {
    if (typeof spec === 'number') {
        if (!isPositive(spec)) throw new VisualizerConfigError(`${name} must be > 0 (got ${spec})`);
        return;
    }
    if (!isPositive(spec.min) || !isPositive(spec.max) || spec.min > spec.max) {
        throw new VisualizerConfigError(`${name} range must satisfy 0 < min <= max (got ${spec.min}..${spec.max})`);
    }
}

export function validateVisualizerConfig(config: VisualizerConfig): void {
    const { barCount, minBarHeight, maxBarHeight, smoothing, decayFactor, epsilon, maxDecayTicks } = config;

    if (!Number.isInteger(barCount) || barCount <= 0) {
        throw new VisualizerConfigError(`barCount must be a positive integer (got ${barCount})`);
    }
    if (!Number.isFinite(minBarHeight) || !Number.isFinite(maxBarHeight) || minBarHeight >= maxBarHeight) {
        throw new VisualizerConfigError(`minBarHeight must be below maxBarHeight (got ${minBarHeight} >= ${maxBarHeight})`);
    }
    if (!isPositive(smoothing) || smoothing > 1) {
        throw new VisualizerConfigError(`smoothing must be in (0, 1] (got ${smoothing})`);
    }
    if (!Number.isFinite(decayFactor) || decayFactor < 0 || decayFactor >= 1) {
        throw new VisualizerConfigError(`decayFactor must be in [0, 1) (got ${decayFactor})`);
    }
    if (!isPositive(epsilon)) {
        throw new VisualizerConfigError(`epsilon must be > 0 (got ${epsilon})`);
    }
    if (!Number.isInteger(maxDecayTicks) || maxDecayTicks < 1) {
        throw new VisualizerConfigError(`maxDecayTicks must be an integer >= 1 (got ${maxDecayTicks})`);
    }
    validateInterval('refreshInterval', config.refreshInterval);
    validateInterval('tickInterval', config.tickInterval);
    validateInterval('decayTickInterval', config.decayTickInterval);
}

export class VisualizerAnimator {
    readonly config: Readonly<VisualizerConfig>;
    onFrame: FrameListener | null = null;

    private readonly random: RandomSource;
    private readonly clock: Clock;
    private heights: number[];
    private targets: number[];
    private phase: VisualizerPhase = 'settled';
    private lastRefresh = 0;
    private refreshDelay: number;
    private decayTicks = 0;

    constructor(options: VisualizerAnimatorOptions = {}) {
        const { random, clock, ...overrides } = options;
        const config: VisualizerConfig = { ...DEFAULT_VISUALIZER_CONFIG, ...overrides };
        validateVisualizerConfig(config);

        this.config = config;
        this.random = random ?? systemRandom;
        this.clock = clock ?? (() => performance.now());
        this.heights = new Array<number>(config.barCount).fill(config.minBarHeight);
        this.targets = new Array<number>(config.barCount).fill(config.minBarHeight);
        this.refreshDelay = typeof config.refreshInterval === 'number'
            ? config.refreshInterval
            : config.refreshInterval.min;
    }

    get isPlaying(): boolean {
        return this.phase === 'playing';
    }

    /** Stopped and resting on the floor; ticks are no-ops */
    get isSettled(): boolean {
        return this.phase === 'settled';
    }

    getPhase(): VisualizerPhase {
        return this.phase;
    }

    /** Delay the host should wait before the next tick in the current phase */
    getTickInterval(): number {
        return this.phase === 'decaying' ? this.config.decayTickInterval : this.config.tickInterval;
    }

    start(): void {
        if (this.phase === 'playing') return;

        this.phase = 'playing';
        this.decayTicks = 0;
        this.resampleTargets(this.clock());
    }

    stop(): void {
        if (this.phase !== 'playing') return;

        this.phase = 'decaying';
        this.decayTicks = 0;
    }

    /**
     * Advance one frame. Target refresh is paced by `now`, not by the
     * number of ticks, so late or early frames don't change the rhythm.
     */
    tick(now: number): void {
        if (this.phase === 'settled') return;

        if (this.phase === 'playing') {
            if (now - this.lastRefresh >= this.refreshDelay) {
                this.resampleTargets(now);
            }
            this.easeTowardTargets();
        } else {
            this.decayTowardFloor();
        }

        this.onFrame?.(this.currentHeights());
    }

    currentHeights(): readonly number[] {
        return this.heights.slice();
    }

    targetHeights(): readonly number[] {
        return this.targets.slice();
    }

    private resampleTargets(now: number): void {
        const { minBarHeight, maxBarHeight, refreshInterval } = this.config;
        for (let i = 0; i < this.targets.length; i++) {
            this.targets[i] = clamp(sampleRange(this.random, minBarHeight, maxBarHeight), minBarHeight, maxBarHeight);
        }
        if (typeof refreshInterval !== 'number') {
            this.refreshDelay = sampleRange(this.random, refreshInterval.min, refreshInterval.max);
        }
        this.lastRefresh = now;
    }

    private easeTowardTargets(): void {
        const { smoothing, epsilon, minBarHeight, maxBarHeight } = this.config;
        for (let i = 0; i < this.heights.length; i++) {
            const target = this.targets[i];
            const next = clamp(this.heights[i] + (target - this.heights[i]) * smoothing, minBarHeight, maxBarHeight);
            this.heights[i] = Math.abs(target - next) < epsilon ? target : next;
        }
    }

    private decayTowardFloor(): void {
        const { minBarHeight, decayFactor, epsilon, maxDecayTicks } = this.config;
        let resting = true;

        for (let i = 0; i < this.heights.length; i++) {
            const next = minBarHeight + (this.heights[i] - minBarHeight) * decayFactor;
            if (next - minBarHeight < epsilon) {
                this.heights[i] = minBarHeight;
            } else {
                this.heights[i] = next;
                resting = false;
            }
        }

        this.decayTicks++;
        if (resting || this.decayTicks >= maxDecayTicks) {
            this.heights.fill(minBarHeight);
            this.targets.fill(minBarHeight);
            this.phase = 'settled';
        }
    }
}
