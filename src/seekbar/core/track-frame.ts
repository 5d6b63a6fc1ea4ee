import { Handle, type FrameRect, type RangeValues, type ThumbFrame, type TrackFrame } from '../../types';
import type { GeometryCalculator } from './services/GeometryCalculator';

export interface TrackFrameInput {
    width: number;
    height: number;
    values: RangeValues;
    pressedHandle: Handle | null;
    pressed: boolean;
    enabled: boolean;
}

/**
 * Lays out one paint. The active range covers the track between the two
 * thumb centers; thumbs are listed Min first.
 */
export function buildTrackFrame(geometry: GeometryCalculator, input: TrackFrameInput): TrackFrame {
    const { width, height, values, pressedHandle } = input;
    const metrics = geometry.getMetrics();

    const track: FrameRect = {
        left: metrics.padding,
        top: 0.5 * (height - metrics.lineHeight),
        right: width - metrics.padding,
        bottom: 0.5 * (height + metrics.lineHeight),
    };

    const minX = geometry.toScreen(values.selectedMin, width);
    const maxX = geometry.toScreen(values.selectedMax, width);
    const activeRange: FrameRect = { ...track, left: minX, right: maxX };

    const thumbTop = 0.5 * height - metrics.thumbHalfHeight;
    const thumb = (handle: Handle, x: number): ThumbFrame => ({
        handle,
        x,
        left: x - metrics.thumbHalfWidth,
        top: thumbTop,
        width: metrics.thumbWidth,
        height: metrics.thumbHeight,
        pressed: pressedHandle === handle,
    });

    return {
        width,
        height,
        track,
        activeRange,
        thumbs: [thumb(Handle.Min, minX), thumb(Handle.Max, maxX)],
        pressed: input.pressed,
        enabled: input.enabled,
    };
}
