/**
 * Clamps `value` into `[lower, upper]`. Callers guarantee `lower <= upper`.
 */
export function clampNumber(value: number, lower: number, upper: number): number {
    return Math.min(upper, Math.max(lower, value));
}
