import type {
    Handle,
    MeasuredSize,
    MeasureSpec,
    RangeChangeListener,
    SeekBarHost,
    SeekBarInputEvent,
    SeekBarRenderer,
    TrackFrame,
    TrackingLifecycleListener,
    TrackPhase,
} from '../types';
import { resolveSettings, type RangeSeekBarSettings } from '../settings';
import { RangeModel } from './core/RangeModel';
import { GeometryCalculator } from './core/services/GeometryCalculator';
import { measureSeekBar } from './core/geometry';
import { buildTrackFrame } from './core/track-frame';
import { parseRangeState, saveRangeState, type SavedRangeState } from './core/persistence';
import { TrackingLifecycleEmitter } from './core/TrackingLifecycleEmitter';
import { TouchTracker } from './interaction/TouchTracker';

/**
 * Widget that lets users select a minimum and maximum value on a given
 * integer range by dragging two thumbs.
 *
 * The widget draws nothing itself and owns no platform objects: a
 * {@link SeekBarHost} reports the width and schedules redraws, and a
 * {@link SeekBarRenderer} paints the frames produced by {@link buildFrame}.
 */
export class RangeSeekBar {
    private readonly model: RangeModel;
    private readonly geometry: GeometryCalculator;
    private readonly tracker: TouchTracker;
    private readonly settings: RangeSeekBarSettings;
    private readonly lifecycleListeners = new Set<TrackingLifecycleListener>();
    private readonly lifecycleEmitter: TrackingLifecycleEmitter;
    private listener: RangeChangeListener | null = null;
    private notifyWhileDragging: boolean;
    private enabled = true;
    private height: number;

    constructor(
        absoluteMinValue: number,
        absoluteMaxValue: number,
        private readonly host: SeekBarHost,
        settings?: Partial<RangeSeekBarSettings>
    ) {
        this.settings = resolveSettings(settings);
        this.notifyWhileDragging = this.settings.notifyWhileDragging;
        this.model = new RangeModel(absoluteMinValue, absoluteMaxValue, () => this.host.requestRedraw());
        this.geometry = new GeometryCalculator(
            this.model,
            this.settings.thumbWidthPx,
            this.settings.thumbHeightPx,
            this.settings.lineHeightRatio
        );
        this.height = this.settings.thumbHeightPx;
        this.lifecycleEmitter = new TrackingLifecycleEmitter((event) => {
            for (const listener of Array.from(this.lifecycleListeners)) {
                try {
                    listener(event);
                } catch (error) {
                    console.error('[RangeSeekBar] tracking lifecycle listener failed:', error);
                }
            }
        });
        this.tracker = new TouchTracker(this.host, {
            model: this.model,
            geometry: this.geometry,
            getTouchSlopPx: () => this.settings.touchSlopPx,
            isNotifyWhileDragging: () => this.notifyWhileDragging,
            notifyRangeChange: () => this.notifyRangeChange(),
            onLifecycleEvent: (event) => this.lifecycleEmitter.emit(event),
        });
    }

    getAbsoluteMinValue(): number {
        return this.model.absoluteMin;
    }

    getAbsoluteMaxValue(): number {
        return this.model.absoluteMax;
    }

    getSelectedMinValue(): number {
        return this.model.getSelectedMin();
    }

    /**
     * Sets the selected minimum. A value above the current maximum raises the
     * maximum with it.
     *
     * @throws RangeError when the value lies outside the absolute range
     * @throws TypeError when the value is not an integer
     */
    setSelectedMinValue(value: number): void {
        this.model.setSelectedMin(value);
    }

    getSelectedMaxValue(): number {
        return this.model.getSelectedMax();
    }

    /**
     * Sets the selected maximum. A value below the current minimum lowers the
     * minimum with it.
     *
     * @throws RangeError when the value lies outside the absolute range
     * @throws TypeError when the value is not an integer
     */
    setSelectedMaxValue(value: number): void {
        this.model.setSelectedMax(value);
    }

    isNotifyWhileDragging(): boolean {
        return this.notifyWhileDragging;
    }

    /**
     * Should the listener be called on every move while a thumb is dragged?
     * Release always notifies either way.
     */
    setNotifyWhileDragging(flag: boolean): void {
        this.notifyWhileDragging = flag;
    }

    setOnRangeChangeListener(listener: RangeChangeListener | null): void {
        this.listener = listener;
    }

    onTrackingLifecycle(listener: TrackingLifecycleListener): () => void {
        this.lifecycleListeners.add(listener);
        return () => {
            this.lifecycleListeners.delete(listener);
        };
    }

    isEnabled(): boolean {
        return this.enabled;
    }

    setEnabled(enabled: boolean): void {
        if (this.enabled === enabled) return;
        this.enabled = enabled;
        if (!enabled) {
            this.tracker.reset();
        }
        this.host.requestRedraw();
    }

    getTrackPhase(): TrackPhase {
        return this.tracker.getPhase();
    }

    getPressedHandle(): Handle | null {
        return this.tracker.getPressedHandle();
    }

    getActivePointerId(): number | null {
        return this.tracker.getActivePointerId();
    }

    /**
     * Handles thumb selection and movement. Returns whether the event was
     * consumed.
     */
    onTouchEvent(event: SeekBarInputEvent): boolean {
        if (!this.enabled) return false;
        return this.tracker.handle(event);
    }

    onMeasure(widthSpec: MeasureSpec, heightSpec: MeasureSpec): MeasuredSize {
        const measured = measureSeekBar(widthSpec, heightSpec, this.geometry.getMetrics(), this.settings.defaultWidthPx);
        this.height = measured.height;
        return measured;
    }

    setThumbSize(thumbWidth: number, thumbHeight: number): void {
        this.geometry.setThumbSize(thumbWidth, thumbHeight);
        this.host.requestRedraw();
    }

    buildFrame(): TrackFrame {
        return buildTrackFrame(this.geometry, {
            width: this.host.getWidth(),
            height: this.height,
            values: this.model.getValues(),
            pressedHandle: this.tracker.getPressedHandle(),
            pressed: this.tracker.isPressed(),
            enabled: this.enabled,
        });
    }

    draw(renderer: SeekBarRenderer): void {
        renderer.render(this.buildFrame());
    }

    onSaveInstanceState(): SavedRangeState {
        return saveRangeState(this.model);
    }

    /**
     * @throws RangeStateError when `state` is not a saved pair
     * @throws RangeError when the pair does not fit the current bounds
     */
    onRestoreInstanceState(state: unknown): void {
        this.model.restore(parseRangeState(state));
    }

    destroy(): void {
        this.tracker.reset();
        this.listener = null;
        this.lifecycleListeners.clear();
        this.lifecycleEmitter.reset();
    }

    private notifyRangeChange(): void {
        const listener = this.listener;
        if (!listener) return;
        try {
            listener(this.model.getSelectedMin(), this.model.getSelectedMax());
        } catch (error) {
            console.error('[RangeSeekBar] range change listener failed:', error);
        }
    }
}
