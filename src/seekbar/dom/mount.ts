import type { RangeChangeListener, SeekBarInputEvent } from '../../types';
import type { RangeSeekBarSettings } from '../../settings';
import { DEFAULT_ABSOLUTE_MAX, DEFAULT_ABSOLUTE_MIN } from '../core/constants';
import { RangeSeekBar } from '../RangeSeekBar';
import { PointerSessionController } from '../interaction/PointerSessionController';
import { DomSeekBarRenderer } from '../visual/DomSeekBarRenderer';
import { DomSeekBarHost } from './DomSeekBarHost';

export interface MountRangeSeekBarOptions {
    absoluteMin?: number;
    absoluteMax?: number;
    settings?: Partial<RangeSeekBarSettings>;
    onRangeChange?: RangeChangeListener;
}

export interface MountedRangeSeekBar {
    bar: RangeSeekBar;
    renderer: DomSeekBarRenderer;
    host: DomSeekBarHost;
    destroy(): void;
}

/**
 * Creates a range seek bar inside `container` and wires DOM pointer input to it.
 */
export function mountRangeSeekBar(container: HTMLElement, options: MountRangeSeekBarOptions = {}): MountedRangeSeekBar {
    const renderer = new DomSeekBarRenderer(container);
    let bar: RangeSeekBar | null = null;

    const pointer = new PointerSessionController(
        renderer.root,
        (event: SeekBarInputEvent) => bar?.onTouchEvent(event) ?? false
    );
    const host = new DomSeekBarHost(renderer.root, pointer, () => bar?.draw(renderer));

    bar = new RangeSeekBar(
        options.absoluteMin ?? DEFAULT_ABSOLUTE_MIN,
        options.absoluteMax ?? DEFAULT_ABSOLUTE_MAX,
        host,
        options.settings
    );
    bar.onMeasure({ mode: 'unspecified', size: 0 }, { mode: 'unspecified', size: 0 });
    if (options.onRangeChange) {
        bar.setOnRangeChangeListener(options.onRangeChange);
    }
    pointer.attach();
    host.requestRedraw();

    const mounted = bar;
    return {
        bar: mounted,
        renderer,
        host,
        destroy: () => {
            pointer.detach();
            mounted.destroy();
            host.destroy();
            renderer.destroy();
        },
    };
}
