import { Handle, type RangeValues } from '../../types';
import { OVERLAP_TIE_BREAK_FRACTION } from './constants';
import type { GeometryCalculator } from './services/GeometryCalculator';

// Overlapping thumbs resolve against the widget width, not the pair's position.
function resolveOverlap(touchX: number, width: number): Handle {
    return touchX / width > OVERLAP_TIE_BREAK_FRACTION ? Handle.Min : Handle.Max;
}

/**
 * Decides which thumb, if any, a press at `touchX` lands on.
 */
export function evalPressedHandle(
    geometry: GeometryCalculator,
    values: RangeValues,
    touchX: number,
    width: number
): Handle | null {
    const minPressed = geometry.isInThumbRange(touchX, values.selectedMin, width);
    const maxPressed = geometry.isInThumbRange(touchX, values.selectedMax, width);
    if (minPressed && maxPressed) {
        return resolveOverlap(touchX, width);
    }
    if (minPressed) return Handle.Min;
    if (maxPressed) return Handle.Max;
    return null;
}

/**
 * Thumb closest to `touchX`; used to seek when the track itself is tapped.
 */
export function nearestHandle(
    geometry: GeometryCalculator,
    values: RangeValues,
    touchX: number,
    width: number
): Handle {
    const minDistance = Math.abs(touchX - geometry.toScreen(values.selectedMin, width));
    const maxDistance = Math.abs(touchX - geometry.toScreen(values.selectedMax, width));
    if (minDistance < maxDistance) return Handle.Min;
    if (maxDistance < minDistance) return Handle.Max;
    return resolveOverlap(touchX, width);
}
