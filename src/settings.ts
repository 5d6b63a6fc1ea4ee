import { z } from 'zod';
import { clampNumber } from './seekbar/utils/coordinate-utils';

export interface RangeSeekBarSettings {
    // Displacement (px) past which a press counts as a drag or swipe rather than a tap
    touchSlopPx: number;
    // Fire the change listener on every move instead of only on release
    notifyWhileDragging: boolean;
    // Thumb glyph size (px); padding and hit radius derive from it
    thumbWidthPx: number;
    thumbHeightPx: number;
    // Track line height as a fraction of the thumb half-height
    lineHeightRatio: number;
    // Width reported by onMeasure when the host leaves it unconstrained
    defaultWidthPx: number;
}

export const DEFAULT_SETTINGS: RangeSeekBarSettings = {
    touchSlopPx: 8,
    notifyWhileDragging: false,
    thumbWidthPx: 24,
    thumbHeightPx: 24,
    lineHeightRatio: 0.3,
    defaultWidthPx: 200,
};

const SETTING_LIMITS = {
    touchSlopPx: [0, 64],
    thumbWidthPx: [4, 128],
    thumbHeightPx: [4, 128],
    lineHeightRatio: [0.05, 1],
    defaultWidthPx: [1, 4096],
} as const;

const finiteNumber = z.number().finite();

// An invalid field parses to undefined without failing the object.
export const RangeSeekBarSettingsSchema = z.object({
    touchSlopPx: finiteNumber.optional().catch(undefined),
    notifyWhileDragging: z.boolean().optional().catch(undefined),
    thumbWidthPx: finiteNumber.optional().catch(undefined),
    thumbHeightPx: finiteNumber.optional().catch(undefined),
    lineHeightRatio: finiteNumber.optional().catch(undefined),
    defaultWidthPx: finiteNumber.optional().catch(undefined),
});

/**
 * Merges saved settings over the defaults. Fields that are missing or of the
 * wrong type keep their default; numbers are clamped to their limits.
 */
export function resolveSettings(saved?: unknown): RangeSeekBarSettings {
    const settings: RangeSeekBarSettings = Object.assign({}, DEFAULT_SETTINGS, pickValidFields(saved));
    settings.touchSlopPx = clampSetting('touchSlopPx', settings.touchSlopPx);
    settings.thumbWidthPx = Math.round(clampSetting('thumbWidthPx', settings.thumbWidthPx));
    settings.thumbHeightPx = Math.round(clampSetting('thumbHeightPx', settings.thumbHeightPx));
    settings.lineHeightRatio = clampSetting('lineHeightRatio', settings.lineHeightRatio);
    settings.defaultWidthPx = Math.round(clampSetting('defaultWidthPx', settings.defaultWidthPx));
    return settings;
}

function pickValidFields(saved: unknown): Partial<RangeSeekBarSettings> {
    const parsed = RangeSeekBarSettingsSchema.safeParse(saved);
    if (!parsed.success) return {};
    const picked: Partial<RangeSeekBarSettings> = {};
    const data = parsed.data;
    if (data.touchSlopPx !== undefined) picked.touchSlopPx = data.touchSlopPx;
    if (data.notifyWhileDragging !== undefined) picked.notifyWhileDragging = data.notifyWhileDragging;
    if (data.thumbWidthPx !== undefined) picked.thumbWidthPx = data.thumbWidthPx;
    if (data.thumbHeightPx !== undefined) picked.thumbHeightPx = data.thumbHeightPx;
    if (data.lineHeightRatio !== undefined) picked.lineHeightRatio = data.lineHeightRatio;
    if (data.defaultWidthPx !== undefined) picked.defaultWidthPx = data.defaultWidthPx;
    return picked;
}

function clampSetting(key: keyof typeof SETTING_LIMITS, value: number): number {
    const [lower, upper] = SETTING_LIMITS[key];
    return clampNumber(value, lower, upper);
}
