import { describe, expect, it } from 'vitest';
import { Handle } from '../../types';
import { RangeModel } from './RangeModel';
import { GeometryCalculator } from './services/GeometryCalculator';
import { buildTrackFrame } from './track-frame';

describe('buildTrackFrame', () => {
    const geometry = new GeometryCalculator(new RangeModel(0, 100), 20, 20, 0.3);

    it('lays out the track, the selected span and both thumbs', () => {
        const frame = buildTrackFrame(geometry, {
            width: 220,
            height: 20,
            values: { selectedMin: 20, selectedMax: 80 },
            pressedHandle: Handle.Max,
            pressed: true,
            enabled: true,
        });

        expect(frame.track).toEqual({ left: 10, top: 8.5, right: 210, bottom: 11.5 });
        expect(frame.activeRange).toEqual({ left: 50, top: 8.5, right: 170, bottom: 11.5 });
        expect(frame.thumbs).toEqual([
            { handle: Handle.Min, x: 50, left: 40, top: 0, width: 20, height: 20, pressed: false },
            { handle: Handle.Max, x: 170, left: 160, top: 0, width: 20, height: 20, pressed: true },
        ]);
        expect(frame.pressed).toBe(true);
        expect(frame.enabled).toBe(true);
    });

    it('centers thumbs vertically in a taller widget', () => {
        const frame = buildTrackFrame(geometry, {
            width: 220,
            height: 40,
            values: { selectedMin: 0, selectedMax: 100 },
            pressedHandle: null,
            pressed: false,
            enabled: false,
        });

        expect(frame.track.top).toBe(18.5);
        expect(frame.thumbs.map((thumb) => thumb.top)).toEqual([10, 10]);
        expect(frame.thumbs.map((thumb) => thumb.pressed)).toEqual([false, false]);
        expect(frame.enabled).toBe(false);
    });
});
