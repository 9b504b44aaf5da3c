/**
 * ROTATION ANIMATOR - Spins the station artwork when playback starts
 */

import { clamp, ROTATION_DURATION_MS, ROTATION_REPETITIONS } from './constants';

export interface RotationOptions {
    /** Duration of one turn in ms */
    duration?: number;
    repetitions?: number;
}

export class RotationAnimator {
    readonly duration: number;
    readonly repetitions: number;
    rotation = 0;
    isAnimating = false;
    private startTime = 0;

    constructor(options: RotationOptions = {}) {
        this.duration = options.duration ?? ROTATION_DURATION_MS;
        this.repetitions = options.repetitions ?? ROTATION_REPETITIONS;
    }

    get totalDegrees(): number {
        return 360 * this.repetitions;
    }

    /** Playing restarts the spin from 0; pausing snaps back to 0 */
    setPlaying(playing: boolean, now: number): void {
        this.rotation = 0;
        this.isAnimating = playing;
        if (playing) this.startTime = now;
    }

    /** Rotation in degrees at `now` */
    tick(now: number): number {
        if (!this.isAnimating) return this.rotation;

        const progress = clamp((now - this.startTime) / (this.duration * this.repetitions), 0, 1);
        this.rotation = this.totalDegrees * progress;
        if (progress >= 1) {
            this.isAnimating = false;
            this.rotation = this.totalDegrees;
        }
        return this.rotation;
    }
}
