import { describe, it, expect, beforeEach } from 'vitest';
import { RotationAnimator } from './RotationAnimator';

describe('RotationAnimator', () => {
    let rotation: RotationAnimator;

    beforeEach(() => {
        rotation = new RotationAnimator();
    });

    it('rests at 0 before playback', () => {
        expect(rotation.tick(5000)).toBe(0);
        expect(rotation.isAnimating).toBe(false);
    });

    it('makes two turns over six seconds', () => {
        rotation.setPlaying(true, 1000);
        expect(rotation.tick(1000)).toBe(0);
        expect(rotation.tick(2500)).toBe(180);
        expect(rotation.tick(4000)).toBe(360);
        expect(rotation.isAnimating).toBe(true);
    });

    it('stops at exactly 720 degrees', () => {
        rotation.setPlaying(true, 0);
        expect(rotation.tick(6000)).toBe(720);
        expect(rotation.isAnimating).toBe(false);
        expect(rotation.tick(9000)).toBe(720);
    });

    it('snaps back to 0 on pause', () => {
        rotation.setPlaying(true, 0);
        rotation.tick(2000);
        rotation.setPlaying(false, 2000);
        expect(rotation.rotation).toBe(0);
        expect(rotation.tick(3000)).toBe(0);
    });

    it('restarts from 0 on the next play', () => {
        rotation.setPlaying(true, 0);
        rotation.tick(6000);
        rotation.setPlaying(true, 10000);
        expect(rotation.tick(10000)).toBe(0);
        expect(rotation.tick(11500)).toBe(180);
    });

    it('honours custom duration and repetitions', () => {
        const single = new RotationAnimator({ duration: 1000, repetitions: 1 });
        expect(single.totalDegrees).toBe(360);
        single.setPlaying(true, 0);
        expect(single.tick(500)).toBe(180);
        expect(single.tick(1000)).toBe(360);
    });
});
