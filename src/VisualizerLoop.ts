/**
 * VISUALIZER LOOP - Drives a VisualizerAnimator from the playback state
 *
 * One timer chain per mounted visualizer. Every flip of the playing flag
 * cancels the pending delay and starts a new chain under a fresh
 * generation; callbacks from an older generation exit without ticking.
 */

import type { VisualizerAnimator } from './VisualizerAnimator';
import type { Clock } from './types/visualizer';

type TimerHandle = ReturnType<typeof setTimeout>;

export interface LoopTimers {
    setTimeout(callback: () => void, delay: number): TimerHandle;
    clearTimeout(handle: TimerHandle): void;
}

export interface VisualizerLoopOptions {
    timers?: LoopTimers;
    clock?: Clock;
}

const defaultTimers: LoopTimers = {
    setTimeout: (callback, delay) => setTimeout(callback, delay),
    clearTimeout: handle => clearTimeout(handle),
};

export class VisualizerLoop {
    private readonly timers: LoopTimers;
    private readonly clock: Clock;
    private generation = 0;
    private pending: TimerHandle | null = null;
    private playing = false;
    private disposed = false;

    constructor(private readonly animator: VisualizerAnimator, options: VisualizerLoopOptions = {}) {
        this.timers = options.timers ?? defaultTimers;
        this.clock = options.clock ?? (() => performance.now());
    }

    /** A tick is scheduled */
    get isRunning(): boolean {
        return this.pending !== null;
    }

    setPlaying(playing: boolean): void {
        if (this.disposed || playing === this.playing) return;
        this.playing = playing;

        this.cancel();
        if (playing) {
            this.animator.start();
        } else {
            this.animator.stop();
        }
        this.schedule(++this.generation);
    }

    /** Unmount: nothing runs after this */
    dispose(): void {
        this.disposed = true;
        this.cancel();
        this.generation++;
    }

    private schedule(generation: number): void {
        if (this.animator.isSettled) {
            this.pending = null;
            return;
        }
        this.pending = this.timers.setTimeout(() => {
            if (generation !== this.generation) return;
            this.pending = null;
            try {
                this.animator.tick(this.clock());
            } catch (e) {
                // A throwing frame listener must not end the chain
                console.error('Visualizer tick failed:', e);
            }
            this.schedule(generation);
        }, this.animator.getTickInterval());
    }

    private cancel(): void {
        if (this.pending !== null) {
            this.timers.clearTimeout(this.pending);
            this.pending = null;
        }
    }
}
