/**
 * HAPTICS - Tap feedback on the shell's controls
 *
 * The Vibration API covers Android; iOS Safari 18+ has none, so the
 * ios-haptics switch trick stands in there.
 */

import { haptic } from 'ios-haptics';

export type HapticKind = 'selection' | 'confirm' | 'error';

/** Vibration patterns in ms */
const VIBRATION_PATTERNS: Record<HapticKind, number | number[]> = {
    selection: 10,
    confirm: [10, 60, 10],
    error: [30, 40, 30, 40, 30],
};

const IOS_HAPTICS: Record<HapticKind, () => void> = {
    selection: () => haptic(),
    confirm: () => haptic.confirm(),
    error: () => haptic.error(),
};

export function triggerHaptic(kind: HapticKind = 'selection'): void {
    if (typeof navigator.vibrate === 'function') {
        navigator.vibrate(VIBRATION_PATTERNS[kind]);
        return;
    }
    try {
        IOS_HAPTICS[kind]();
    } catch (e) {
        console.warn('Haptics unavailable:', e);
    }
}
