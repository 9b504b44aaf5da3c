/**
 * CONSTANTS - Centralized configuration values
 */

export * from './constants/visualizer';
export * from './constants/station';
export * from './constants/onboarding';
export * from './constants/settings';

// ============ UTILITY FUNCTIONS ============

/** Clamp value between min and max */
export function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
}
