/**
 * Visualizer and artwork animation constants
 */

// ============ BAR VISUALIZER CONSTANTS ============

/** Number of bars drawn across the visualizer */
export const BAR_COUNT = 50;

/** Resting bar height as a fraction of the canvas height */
export const MIN_BAR_HEIGHT = 0.1;

/** Tallest bar height as a fraction of the canvas height */
export const MAX_BAR_HEIGHT = 1.0;

/** Fraction of the remaining distance to the target closed per playing tick */
export const BAR_SMOOTHING = 0.15;

/** Fraction of the remaining distance to the floor kept per decay tick */
export const BAR_DECAY_FACTOR = BAR_SMOOTHING * 2;

/** Distance below which a bar snaps onto its target */
export const BAR_SNAP_EPSILON = 0.01;

/** Upper bound on decay ticks before every bar is pinned to the floor */
export const BAR_MAX_DECAY_TICKS = 10;

/** Time between target resamples in ms */
export const BAR_REFRESH_INTERVAL_MS = 200;

/** Tick delay while playing (~30 fps) */
export const BAR_TICK_INTERVAL_MS = 33;

/** Tick delay while decaying after a stop */
export const BAR_DECAY_TICK_INTERVAL_MS = 16;

/** Horizontal gap between bars as a fraction of each bar slot */
export const BAR_SPACING_RATIO = 0.15;

// ============ ARTWORK ROTATION CONSTANTS ============

/** Duration of one full artwork turn in ms */
export const ROTATION_DURATION_MS = 3000;

/** Full turns performed each time playback starts */
export const ROTATION_REPETITIONS = 2;

// ============ TUNER CONSTANTS ============

/** Horizontal padding of the tuner scale in CSS pixels */
export const TUNER_PADDING = 16;

/** Minor tick step in MHz */
export const TUNER_MINOR_STEP = 0.2;

/** Minor ticks drawn between two whole-MHz marks */
export const TUNER_MINOR_TICKS = 4;
