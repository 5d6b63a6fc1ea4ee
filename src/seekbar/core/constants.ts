/**
 * Range used when the host does not supply one
 */
export const DEFAULT_ABSOLUTE_MIN = 0;
export const DEFAULT_ABSOLUTE_MAX = 100;

/**
 * Hit-test tie-break: overlapping thumbs resolve to Min right of this
 * fraction of the widget width, to Max left of it.
 */
export const OVERLAP_TIE_BREAK_FRACTION = 0.5;

/**
 * CSS class names
 */
export const SEEKBAR_ROOT_CLASS = 'range-seekbar';
export const SEEKBAR_TRACK_CLASS = 'range-seekbar-track';
export const SEEKBAR_ACTIVE_RANGE_CLASS = 'range-seekbar-active-range';
export const SEEKBAR_THUMB_CLASS = 'range-seekbar-thumb';
export const SEEKBAR_THUMB_PRESSED_CLASS = 'range-seekbar-thumb-pressed';
export const SEEKBAR_PRESSED_CLASS = 'range-seekbar-pressed';
export const SEEKBAR_DISABLED_CLASS = 'range-seekbar-disabled';
export const SEEKBAR_GESTURE_LOCK_CLASS = 'range-seekbar-gesture-lock';

/**
 * Data attribute carrying the handle identity on thumb elements
 */
export const SEEKBAR_HANDLE_ATTR = 'data-seekbar-handle';
