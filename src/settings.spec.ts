import { describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS, resolveSettings } from './settings';

describe('resolveSettings', () => {
    it('returns the defaults when nothing is saved', () => {
        expect(resolveSettings()).toEqual(DEFAULT_SETTINGS);
        expect(resolveSettings(null)).toEqual(DEFAULT_SETTINGS);
        expect(resolveSettings('touchSlopPx=4')).toEqual(DEFAULT_SETTINGS);
    });

    it('does not hand out the shared defaults object', () => {
        const settings = resolveSettings();
        settings.touchSlopPx = 1;
        expect(DEFAULT_SETTINGS.touchSlopPx).toBe(8);
    });

    it('merges saved fields over the defaults', () => {
        expect(resolveSettings({ touchSlopPx: 4, notifyWhileDragging: true })).toEqual({
            ...DEFAULT_SETTINGS,
            touchSlopPx: 4,
            notifyWhileDragging: true,
        });
    });

    it('keeps the default for fields of the wrong type', () => {
        const settings = resolveSettings({
            touchSlopPx: '12',
            notifyWhileDragging: 1,
            thumbWidthPx: Number.NaN,
            lineHeightRatio: 0.5,
        });

        expect(settings.touchSlopPx).toBe(8);
        expect(settings.notifyWhileDragging).toBe(false);
        expect(settings.thumbWidthPx).toBe(24);
        expect(settings.lineHeightRatio).toBe(0.5);
    });

    it('clamps numbers to their limits and rounds pixel sizes', () => {
        const settings = resolveSettings({
            touchSlopPx: -3,
            thumbWidthPx: 500,
            thumbHeightPx: 17.6,
            lineHeightRatio: 2,
            defaultWidthPx: 0,
        });

        expect(settings).toEqual({
            touchSlopPx: 0,
            notifyWhileDragging: false,
            thumbWidthPx: 128,
            thumbHeightPx: 18,
            lineHeightRatio: 1,
            defaultWidthPx: 1,
        });
    });
});
