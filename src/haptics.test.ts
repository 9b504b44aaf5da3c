import { describe, it, expect, afterEach, vi } from 'vitest';
import { haptic } from 'ios-haptics';
import { triggerHaptic } from './haptics';

vi.mock('ios-haptics', () => ({
    haptic: Object.assign(vi.fn(), { confirm: vi.fn(), error: vi.fn() }),
}));

describe('triggerHaptic', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
        vi.clearAllMocks();
    });

    it('vibrates a short pulse for a selection', () => {
        const vibrate = vi.fn(() => true);
        vi.stubGlobal('navigator', { vibrate });
        triggerHaptic();
        expect(vibrate).toHaveBeenCalledWith(10);
        expect(haptic).not.toHaveBeenCalled();
    });

    it('vibrates a pattern per kind', () => {
        const vibrate = vi.fn(() => true);
        vi.stubGlobal('navigator', { vibrate });
        triggerHaptic('confirm');
        triggerHaptic('error');
        expect(vibrate.mock.calls).toEqual([[[10, 60, 10]], [[30, 40, 30, 40, 30]]]);
    });

    it('falls back to ios-haptics without the Vibration API', () => {
        vi.stubGlobal('navigator', {});
        triggerHaptic('confirm');
        expect(haptic.confirm).toHaveBeenCalledTimes(1);
        expect(haptic).not.toHaveBeenCalled();
    });

    it('warns instead of throwing when haptics fail', () => {
        vi.stubGlobal('navigator', {});
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.mocked(haptic.error).mockImplementationOnce(() => { throw new Error('no switch'); });
        expect(() => triggerHaptic('error')).not.toThrow();
        expect(warn).toHaveBeenCalledWith('Haptics unavailable:', expect.any(Error));
        warn.mockRestore();
    });
});
