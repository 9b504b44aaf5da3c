/**
 * VISUALIZER - Canvas rendering for the radio screen (bars and tuner dial)
 */

import { layoutTuner } from './tuner';
import {
    BAR_SPACING_RATIO,
    STATION_FREQUENCY,
    TUNER_MAX_FREQUENCY,
    TUNER_MIN_FREQUENCY,
    TUNER_PADDING,
} from './constants';
import type { BarRect } from './types/visualizer';

const ACCENT = 'rgb(255, 140, 40)';
const INDICATOR = 'rgb(255, 0, 0)';

let barsCanvas: HTMLCanvasElement | null = null;
let barsCtx: CanvasRenderingContext2D | null = null;
let tunerCanvas: HTMLCanvasElement | null = null;
let tunerCtx: CanvasRenderingContext2D | null = null;

/**
 * Bottom-aligned rectangles for each bar. Each bar owns `width / n` of the
 * row, minus BAR_SPACING_RATIO of it split evenly on both sides.
 */
export function layoutBars(heights: readonly number[], width: number, height: number): BarRect[] {
    if (heights.length === 0) return [];

    const slot = width / heights.length;
    const spacing = slot * BAR_SPACING_RATIO;

    return heights.map((ratio, i) => {
        const barHeight = ratio * height;
        return {
            x: i * slot + spacing / 2,
            y: height - barHeight,
            width: slot - spacing,
            height: barHeight,
        };
    });
}

function context2d(canvas: HTMLCanvasElement): CanvasRenderingContext2D {
    const ctx = canvas.getContext('2d');
    if (!ctx) throw new Error('Canvas 2D context unavailable');
    return ctx;
}

/** Match the backing store to the CSS box */
function fit(canvas: HTMLCanvasElement) {
    const rect = canvas.getBoundingClientRect();
    canvas.width = rect.width;
    canvas.height = rect.height;
}

function resize() {
    if (barsCanvas) fit(barsCanvas);
    if (tunerCanvas) {
        fit(tunerCanvas);
        drawTuner(STATION_FREQUENCY);
    }
}

export function initVisualizer(bars: HTMLCanvasElement, tuner: HTMLCanvasElement) {
    barsCanvas = bars;
    barsCtx = context2d(bars);
    tunerCanvas = tuner;
    tunerCtx = context2d(tuner);
    resize();
    window.addEventListener('resize', resize);
}

export function drawBars(heights: readonly number[]) {
    if (!barsCanvas || !barsCtx) return;
    const { width, height } = barsCanvas;

    barsCtx.clearRect(0, 0, width, height);
    barsCtx.fillStyle = ACCENT;
    for (const bar of layoutBars(heights, width, height)) {
        barsCtx.fillRect(bar.x, bar.y, bar.width, bar.height);
    }
}

export function drawTuner(frequency: number) {
    if (!tunerCanvas || !tunerCtx) return;
    const ctx = tunerCtx;
    const { width, height } = tunerCanvas;
    const mid = height / 2;
    const layout = layoutTuner({
        currentFrequency: frequency,
        minFrequency: TUNER_MIN_FREQUENCY,
        maxFrequency: TUNER_MAX_FREQUENCY,
        width,
    });

    ctx.clearRect(0, 0, width, height);

    // Baseline
    ctx.strokeStyle = 'rgba(255, 255, 255, 0.3)';
    ctx.lineWidth = 2;
    line(ctx, TUNER_PADDING, mid, width - TUNER_PADDING, mid);

    ctx.strokeStyle = '#fff';
    ctx.fillStyle = '#fff';
    ctx.font = '14px sans-serif';
    ctx.textAlign = 'center';
    for (const tick of layout.majorTicks) {
        line(ctx, tick.x, mid - 8, tick.x, mid + 8);
        ctx.fillText(tick.label, tick.x, 14);
    }

    ctx.strokeStyle = 'rgba(255, 255, 255, 0.5)';
    ctx.lineWidth = 1;
    for (const x of layout.minorTicks) {
        line(ctx, x, mid - 4, x, mid + 4);
    }

    ctx.strokeStyle = INDICATOR;
    ctx.fillStyle = INDICATOR;
    ctx.lineWidth = 3;
    line(ctx, layout.indicatorX, mid - 30, layout.indicatorX, mid + 30);
    ctx.beginPath();
    ctx.arc(layout.indicatorX, mid - 30, 6, 0, Math.PI * 2);
    ctx.fill();
}

function line(ctx: CanvasRenderingContext2D, x1: number, y1: number, x2: number, y2: number) {
    ctx.beginPath();
    ctx.moveTo(x1, y1);
    ctx.lineTo(x2, y2);
    ctx.stroke();
}
