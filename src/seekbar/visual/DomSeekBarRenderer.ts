import { Handle, type FrameRect, type SeekBarRenderer, type TrackFrame } from '../../types';
import {
    SEEKBAR_ACTIVE_RANGE_CLASS,
    SEEKBAR_DISABLED_CLASS,
    SEEKBAR_HANDLE_ATTR,
    SEEKBAR_PRESSED_CLASS,
    SEEKBAR_ROOT_CLASS,
    SEEKBAR_THUMB_CLASS,
    SEEKBAR_THUMB_PRESSED_CLASS,
    SEEKBAR_TRACK_CLASS,
} from '../core/constants';

function px(value: number): string {
    return `${value}px`;
}

function placeRect(el: HTMLElement, rect: FrameRect): void {
    Object.assign(el.style, {
        left: px(rect.left),
        top: px(rect.top),
        width: px(Math.max(0, rect.right - rect.left)),
        height: px(Math.max(0, rect.bottom - rect.top)),
    });
}

/**
 * Paints frames with absolutely positioned elements inside a root element.
 * Colors and glyphs are left to stylesheets keyed on the class names.
 */
export class DomSeekBarRenderer implements SeekBarRenderer {
    readonly root: HTMLElement;
    private readonly trackEl: HTMLElement;
    private readonly activeRangeEl: HTMLElement;
    private readonly thumbEls: Record<Handle, HTMLElement>;

    constructor(container: HTMLElement) {
        const doc = container.ownerDocument;
        this.root = doc.createElement('div');
        this.root.className = SEEKBAR_ROOT_CLASS;
        Object.assign(this.root.style, {
            position: 'relative',
            touchAction: 'none',
            userSelect: 'none',
        });

        this.trackEl = this.createPart(doc, SEEKBAR_TRACK_CLASS);
        this.activeRangeEl = this.createPart(doc, SEEKBAR_ACTIVE_RANGE_CLASS);
        this.thumbEls = {
            [Handle.Min]: this.createThumb(doc, Handle.Min),
            [Handle.Max]: this.createThumb(doc, Handle.Max),
        };
        container.appendChild(this.root);
    }

    render(frame: TrackFrame): void {
        this.root.style.height = px(frame.height);
        this.root.classList.toggle(SEEKBAR_PRESSED_CLASS, frame.pressed);
        this.root.classList.toggle(SEEKBAR_DISABLED_CLASS, !frame.enabled);

        placeRect(this.trackEl, frame.track);
        placeRect(this.activeRangeEl, frame.activeRange);

        for (const thumb of frame.thumbs) {
            const el = this.thumbEls[thumb.handle];
            Object.assign(el.style, {
                left: px(thumb.left),
                top: px(thumb.top),
                width: px(thumb.width),
                height: px(thumb.height),
            });
            el.classList.toggle(SEEKBAR_THUMB_PRESSED_CLASS, thumb.pressed);
        }
    }

    getThumbElement(handle: Handle): HTMLElement {
        return this.thumbEls[handle];
    }

    destroy(): void {
        this.root.remove();
    }

    private createPart(doc: Document, className: string): HTMLElement {
        const el = doc.createElement('div');
        el.className = className;
        el.style.position = 'absolute';
        this.root.appendChild(el);
        return el;
    }

    private createThumb(doc: Document, handle: Handle): HTMLElement {
        const el = this.createPart(doc, SEEKBAR_THUMB_CLASS);
        el.setAttribute(SEEKBAR_HANDLE_ATTR, handle);
        return el;
    }
}
