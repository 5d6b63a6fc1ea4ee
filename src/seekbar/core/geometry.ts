import type { AbsoluteBounds, MeasuredSize, MeasureSpec } from '../../types';
import { clampNumber } from '../utils/coordinate-utils';

export interface ThumbMetrics {
    thumbWidth: number;
    thumbHeight: number;
    thumbHalfWidth: number;
    thumbHalfHeight: number;
    /** Horizontal inset of the track, so a thumb at either end stays fully visible. */
    padding: number;
    lineHeight: number;
}

export function createThumbMetrics(thumbWidth: number, thumbHeight: number, lineHeightRatio: number): ThumbMetrics {
    const thumbHalfWidth = 0.5 * thumbWidth;
    const thumbHalfHeight = 0.5 * thumbHeight;
    return {
        thumbWidth,
        thumbHeight,
        thumbHalfWidth,
        thumbHalfHeight,
        padding: thumbHalfWidth,
        lineHeight: lineHeightRatio * thumbHalfHeight,
    };
}

/**
 * Maps a value to its x coordinate. A zero-width value span pins every value
 * to the left end of the track.
 */
export function valueToScreen(bounds: AbsoluteBounds, padding: number, value: number, width: number): number {
    const span = bounds.absoluteMax - bounds.absoluteMin;
    if (span <= 0) return padding;
    return padding + (value - bounds.absoluteMin) * (width - 2 * padding) / span;
}

/**
 * Maps an x coordinate back to a value, truncating toward the lower value.
 * A track too narrow to hold the thumbs maps everything to `absoluteMin`.
 */
export function screenToValue(bounds: AbsoluteBounds, padding: number, x: number, width: number): number {
    if (width <= 2 * padding) {
        return bounds.absoluteMin;
    }
    const clampedX = clampNumber(x, padding, width - padding);
    const span = bounds.absoluteMax - bounds.absoluteMin;
    return bounds.absoluteMin + Math.trunc(span * (clampedX - padding) / (width - 2 * padding));
}

export function measureSeekBar(
    widthSpec: MeasureSpec,
    heightSpec: MeasureSpec,
    metrics: ThumbMetrics,
    defaultWidthPx: number
): MeasuredSize {
    let width = defaultWidthPx;
    if (widthSpec.mode !== 'unspecified') {
        width = widthSpec.size;
    }
    let height = metrics.thumbHeight;
    if (heightSpec.mode !== 'unspecified') {
        height = Math.min(height, heightSpec.size);
    }
    return { width, height };
}
