import { RangeSeekBar } from './seekbar/RangeSeekBar';

export default RangeSeekBar;
export { RangeSeekBar };
export { Handle } from './types';
export type {
    AbsoluteBounds,
    FrameRect,
    GestureParent,
    MeasuredSize,
    MeasureMode,
    MeasureSpec,
    PointerSample,
    RangeChangeListener,
    RangeValues,
    SeekBarHost,
    SeekBarInputEvent,
    SeekBarRenderer,
    ThumbFrame,
    TrackFrame,
    TrackingLifecycleEvent,
    TrackingLifecycleListener,
    TrackPhase,
} from './types';
export { DEFAULT_SETTINGS, resolveSettings, type RangeSeekBarSettings } from './settings';
export { RangeStateError, type SavedRangeState } from './seekbar/core/persistence';
export { DomSeekBarRenderer } from './seekbar/visual/DomSeekBarRenderer';
export { mountRangeSeekBar, type MountedRangeSeekBar, type MountRangeSeekBarOptions } from './seekbar/dom/mount';
