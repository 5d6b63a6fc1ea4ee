import type { GestureParent, SeekBarHost } from '../../types';
import { SEEKBAR_GESTURE_LOCK_CLASS } from '../core/constants';
import type { PointerSessionController } from '../interaction/PointerSessionController';

/**
 * Host surface backed by a DOM element. Redraw requests are coalesced into
 * one animation frame.
 */
export class DomSeekBarHost implements SeekBarHost {
    private rafId: number | null = null;
    private gestureLocked = false;

    constructor(
        private readonly root: HTMLElement,
        private readonly pointer: PointerSessionController,
        private readonly paint: () => void
    ) {}

    getWidth(): number {
        return this.root.getBoundingClientRect().width;
    }

    requestRedraw(): void {
        if (this.rafId !== null) return;
        this.rafId = requestAnimationFrame(() => {
            this.rafId = null;
            this.paint();
        });
    }

    getGestureParent(): GestureParent | null {
        const parent = this.root.parentElement;
        if (!parent) return null;
        return {
            requestDisallowInterceptTouchEvent: (disallow: boolean) => {
                if (disallow) {
                    this.lockGesture(parent);
                } else {
                    this.unlockGesture(parent);
                }
            },
        };
    }

    isGestureLocked(): boolean {
        return this.gestureLocked;
    }

    destroy(): void {
        if (this.rafId !== null) {
            cancelAnimationFrame(this.rafId);
            this.rafId = null;
        }
        const parent = this.root.parentElement;
        if (parent) this.unlockGesture(parent);
    }

    private lockGesture(parent: HTMLElement): void {
        this.pointer.captureLatestPointer();
        if (this.gestureLocked) return;
        parent.classList.add(SEEKBAR_GESTURE_LOCK_CLASS);
        this.gestureLocked = true;
    }

    private unlockGesture(parent: HTMLElement): void {
        this.pointer.releasePointerCapture();
        if (!this.gestureLocked) return;
        parent.classList.remove(SEEKBAR_GESTURE_LOCK_CLASS);
        this.gestureLocked = false;
    }
}
