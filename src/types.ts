/**
 * Thumb identity
 */
export enum Handle {
    Min = 'min',
    Max = 'max',
}

/**
 * Currently selected sub-range
 */
export interface RangeValues {
    selectedMin: number;
    selectedMax: number;
}

export interface AbsoluteBounds {
    absoluteMin: number;
    absoluteMax: number;
}

export type RangeChangeListener = (minValue: number, maxValue: number) => void;

export interface PointerSample {
    pointerId: number;
    /** x in widget-local pixels */
    x: number;
}

/**
 * Input events consumed by the touch tracker, already mapped from the host's
 * native pointer model. `down`/`up` concern the first and last pointer of a
 * gesture, `pointer_down`/`pointer_up` the ones in between.
 */
export type SeekBarInputEvent =
    | { type: 'down'; pointerId: number; x: number }
    | { type: 'move'; pointers: ReadonlyArray<PointerSample> }
    | { type: 'up'; pointerId: number; x: number }
    | { type: 'pointer_down'; pointerId: number; x: number }
    | { type: 'pointer_up'; pointerId: number }
    | { type: 'cancel' };

export type TrackPhase = 'idle' | 'pending' | 'dragging';

export type TrackingLifecycleState = 'tracking_started' | 'tracking_stopped';

export interface TrackingLifecycleEvent {
    state: TrackingLifecycleState;
    handle: Handle | null;
    pointerId: number | null;
}

export type TrackingLifecycleListener = (event: TrackingLifecycleEvent) => void;

/**
 * Ancestor that may steal a gesture (scroll containers and the like).
 */
export interface GestureParent {
    requestDisallowInterceptTouchEvent(disallow: boolean): void;
}

/**
 * What the widget needs from whatever surface displays it.
 */
export interface SeekBarHost {
    getWidth(): number;
    /** Signals that the frame is stale; the host decides when to paint. */
    requestRedraw(): void;
    getGestureParent(): GestureParent | null;
    /** Default handling for presses that miss both thumbs. */
    delegateTouchEvent?(event: SeekBarInputEvent): boolean;
}

export interface FrameRect {
    left: number;
    top: number;
    right: number;
    bottom: number;
}

export interface ThumbFrame {
    handle: Handle;
    /** thumb center */
    x: number;
    left: number;
    top: number;
    width: number;
    height: number;
    pressed: boolean;
}

export interface TrackFrame {
    width: number;
    height: number;
    track: FrameRect;
    activeRange: FrameRect;
    thumbs: ThumbFrame[];
    pressed: boolean;
    enabled: boolean;
}

export interface SeekBarRenderer {
    render(frame: TrackFrame): void;
}

export type MeasureMode = 'unspecified' | 'exactly' | 'at_most';

export interface MeasureSpec {
    mode: MeasureMode;
    size: number;
}

export interface MeasuredSize {
    width: number;
    height: number;
}
