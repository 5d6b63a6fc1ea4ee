import type { SeekBarInputEvent } from '../../types';

/**
 * Maps DOM pointer events on the widget root to {@link SeekBarInputEvent}s.
 *
 * The first pointer of a gesture becomes `down`/`up`, any pointer landing while
 * others are down becomes `pointer_down`/`pointer_up`. Window blur and a lost
 * capture of a live pointer cancel the gesture.
 *
 * Moves and releases are read on the window while a session is open, so a
 * pointer lifted outside the widget still ends it.
 */
export class PointerSessionController {
    private listenersAttached = false;
    private sessionListenersAttached = false;
    private readonly activePointers = new Set<number>();
    private capturedPointerId: number | null = null;
    private latestPointerId: number | null = null;

    private readonly onPointerDown = (e: PointerEvent) => this.handlePointerDown(e);
    private readonly onPointerMove = (e: PointerEvent) => this.handlePointerMove(e);
    private readonly onPointerUp = (e: PointerEvent) => this.handlePointerUp(e);
    private readonly onPointerCancel = (e: PointerEvent) => this.handlePointerCancel(e);
    private readonly onLostPointerCapture = (e: PointerEvent) => this.handleLostPointerCapture(e);
    private readonly onWindowBlur = () => this.cancelSession();

    constructor(
        private readonly root: HTMLElement,
        private readonly onInput: (event: SeekBarInputEvent) => boolean
    ) {}

    attach(): void {
        if (this.listenersAttached) return;
        this.root.addEventListener('pointerdown', this.onPointerDown);
        this.root.addEventListener('lostpointercapture', this.onLostPointerCapture);
        this.root.ownerDocument.defaultView?.addEventListener('blur', this.onWindowBlur);
        this.listenersAttached = true;
    }

    detach(): void {
        if (!this.listenersAttached) return;
        this.root.removeEventListener('pointerdown', this.onPointerDown);
        this.root.removeEventListener('lostpointercapture', this.onLostPointerCapture);
        this.root.ownerDocument.defaultView?.removeEventListener('blur', this.onWindowBlur);
        this.detachSessionListeners();
        this.releasePointerCapture();
        this.activePointers.clear();
        this.latestPointerId = null;
        this.listenersAttached = false;
    }

    getActivePointerCount(): number {
        return this.activePointers.size;
    }

    /**
     * Routes the most recently landed pointer to the root, so the drag keeps
     * receiving moves once the pointer leaves the widget.
     */
    captureLatestPointer(): void {
        if (this.latestPointerId === null) return;
        this.releasePointerCapture();
        const pointerId = this.latestPointerId;
        if (typeof this.root.setPointerCapture !== 'function') return;
        try {
            this.root.setPointerCapture(pointerId);
            this.capturedPointerId = pointerId;
        } catch {
            // pointer already gone or capture unsupported; moves still arrive while over the root
        }
    }

    releasePointerCapture(): void {
        if (this.capturedPointerId === null) return;
        const pointerId = this.capturedPointerId;
        this.capturedPointerId = null;
        if (typeof this.root.releasePointerCapture !== 'function') return;
        try {
            this.root.releasePointerCapture(pointerId);
        } catch {
            // capture already released by the browser
        }
    }

    private attachSessionListeners(): void {
        const win = this.root.ownerDocument.defaultView;
        if (this.sessionListenersAttached || !win) return;
        win.addEventListener('pointermove', this.onPointerMove, { passive: false, capture: true });
        win.addEventListener('pointerup', this.onPointerUp, { passive: false, capture: true });
        win.addEventListener('pointercancel', this.onPointerCancel, { passive: false, capture: true });
        this.sessionListenersAttached = true;
    }

    private detachSessionListeners(): void {
        const win = this.root.ownerDocument.defaultView;
        if (!this.sessionListenersAttached || !win) return;
        win.removeEventListener('pointermove', this.onPointerMove, true);
        win.removeEventListener('pointerup', this.onPointerUp, true);
        win.removeEventListener('pointercancel', this.onPointerCancel, true);
        this.sessionListenersAttached = false;
    }

    private toLocalX(clientX: number): number {
        return clientX - this.root.getBoundingClientRect().left;
    }

    private handlePointerDown(e: PointerEvent): void {
        if (e.pointerType === 'mouse' && e.button !== 0) return;
        const x = this.toLocalX(e.clientX);
        const isFirst = this.activePointers.size === 0;
        this.activePointers.add(e.pointerId);
        if (isFirst) this.attachSessionListeners();
        this.latestPointerId = e.pointerId;
        const consumed = this.onInput(isFirst
            ? { type: 'down', pointerId: e.pointerId, x }
            : { type: 'pointer_down', pointerId: e.pointerId, x });
        if (consumed) {
            e.preventDefault();
            e.stopPropagation();
        }
    }

    private handlePointerMove(e: PointerEvent): void {
        if (!this.activePointers.has(e.pointerId)) return;
        const x = this.toLocalX(e.clientX);
        if (this.onInput({ type: 'move', pointers: [{ pointerId: e.pointerId, x }] })) {
            e.preventDefault();
        }
    }

    private handlePointerUp(e: PointerEvent): void {
        if (!this.activePointers.has(e.pointerId)) return;
        const x = this.toLocalX(e.clientX);
        this.activePointers.delete(e.pointerId);
        if (this.latestPointerId === e.pointerId) {
            this.latestPointerId = this.activePointers.size > 0 ? Array.from(this.activePointers)[0] : null;
        }
        if (this.capturedPointerId === e.pointerId && this.activePointers.size > 0) {
            this.captureLatestPointer();
        }
        if (this.activePointers.size === 0) this.detachSessionListeners();
        const consumed = this.onInput(this.activePointers.size === 0
            ? { type: 'up', pointerId: e.pointerId, x }
            : { type: 'pointer_up', pointerId: e.pointerId });
        if (consumed) {
            e.preventDefault();
        }
    }

    private handlePointerCancel(e: PointerEvent): void {
        if (!this.activePointers.has(e.pointerId)) return;
        this.cancelSession();
    }

    private handleLostPointerCapture(e: PointerEvent): void {
        if (e.pointerId !== this.capturedPointerId) return;
        this.capturedPointerId = null;
        if (!this.activePointers.has(e.pointerId)) return;
        this.cancelSession();
    }

    private cancelSession(): void {
        if (this.activePointers.size === 0) return;
        this.activePointers.clear();
        this.latestPointerId = null;
        this.detachSessionListeners();
        this.releasePointerCapture();
        this.onInput({ type: 'cancel' });
    }
}
