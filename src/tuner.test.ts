import { describe, it, expect } from 'vitest';
import { layoutTuner } from './tuner';

// 100px per MHz between the 16px paddings
const base = { minFrequency: 88, maxFrequency: 90, width: 232, padding: 16 };

describe('layoutTuner', () => {
    it('places a labelled major tick on every whole MHz', () => {
        const layout = layoutTuner({ ...base, currentFrequency: 89 });
        expect(layout.majorTicks).toEqual([
            { x: 16, label: '88' },
            { x: 116, label: '89' },
            { x: 216, label: '90' },
        ]);
    });

    it('places minor ticks every 0.2 MHz up to the maximum', () => {
        const layout = layoutTuner({ ...base, currentFrequency: 89 });
        expect(layout.minorTicks).toHaveLength(8);
        const expected = [36, 56, 76, 96, 136, 156, 176, 196];
        layout.minorTicks.forEach((x, i) => expect(x).toBeCloseTo(expected[i], 6));
    });

    it('positions the indicator on the current frequency', () => {
        expect(layoutTuner({ ...base, currentFrequency: 88.9 }).indicatorX).toBeCloseTo(106, 6);
    });

    it('keeps the indicator on the scale', () => {
        expect(layoutTuner({ ...base, currentFrequency: 95 }).indicatorX).toBe(216);
        expect(layoutTuner({ ...base, currentFrequency: 80 }).indicatorX).toBe(16);
    });

    it('rejects an empty range', () => {
        expect(() => layoutTuner({ ...base, maxFrequency: 88, currentFrequency: 88 })).toThrow(RangeError);
    });
});
