/**
 * TUNER - Geometry of the FM dial under the station name
 */

import { clamp, TUNER_MINOR_STEP, TUNER_MINOR_TICKS, TUNER_PADDING } from './constants';

export interface TunerInput {
    currentFrequency: number;
    minFrequency: number;
    maxFrequency: number;
    width: number;
    padding?: number;
}

export interface TunerLayout {
    majorTicks: { x: number; label: string }[];
    minorTicks: number[];
    indicatorX: number;
}

export function layoutTuner(input: TunerInput): TunerLayout {
    const { currentFrequency, minFrequency, maxFrequency, width } = input;
    const padding = input.padding ?? TUNER_PADDING;
    const range = maxFrequency - minFrequency;
    if (!(range > 0)) {
        throw new RangeError(`Tuner range is empty: ${minFrequency}..${maxFrequency}`);
    }

    const spacing = (width - 2 * padding) / range;
    const toX = (frequency: number) => padding + (frequency - minFrequency) * spacing;

    const majorTicks: TunerLayout['majorTicks'] = [];
    const minorTicks: number[] = [];

    for (let whole = Math.ceil(minFrequency); whole <= Math.floor(maxFrequency); whole++) {
        majorTicks.push({ x: toX(whole), label: String(whole) });
        for (let i = 1; i <= TUNER_MINOR_TICKS; i++) {
            const frequency = whole + i * TUNER_MINOR_STEP;
            if (frequency <= maxFrequency) minorTicks.push(toX(frequency));
        }
    }

    return {
        majorTicks,
        minorTicks,
        indicatorX: toX(clamp(currentFrequency, minFrequency, maxFrequency)),
    };
}
