import {
    Handle,
    type PointerSample,
    type SeekBarHost,
    type SeekBarInputEvent,
    type TrackingLifecycleEvent,
    type TrackPhase,
} from '../../types';
import type { RangeModel } from '../core/RangeModel';
import type { GeometryCalculator } from '../core/services/GeometryCalculator';
import { evalPressedHandle, nearestHandle } from '../core/hit-test';
import { createTrackingStartedEvent, createTrackingStoppedEvent } from '../core/TrackingLifecycleEmitter';

type TrackedPointer = {
    pointerId: number;
    x: number;
};

type DragSession = {
    activePointerId: number;
    downX: number;
    pressedHandle: Handle | null;
    /** Set once a press with no thumb moves past the touch slop; its release seeks nothing. */
    swiped: boolean;
    /** Pointers currently down, in the order they landed. */
    pointers: TrackedPointer[];
};

type TrackState =
    | { phase: 'idle' }
    | { phase: 'pending'; session: DragSession }
    | { phase: 'dragging'; session: DragSession };

export interface TouchTrackerDeps {
    model: RangeModel;
    geometry: GeometryCalculator;
    getTouchSlopPx: () => number;
    isNotifyWhileDragging: () => boolean;
    notifyRangeChange: () => void;
    onLifecycleEvent?: (event: TrackingLifecycleEvent) => void;
}

/**
 * Turns a stream of pointer events into thumb drags.
 *
 * A press on a thumb drags immediately. A press elsewhere is left to the host;
 * if it is released within the touch slop it seeks the nearest thumb to the
 * tapped position, otherwise it was a swipe and moves nothing. Extra
 * pointers take over tracking when they land, and tracking moves back to a
 * remaining pointer when the tracked one lifts, so the drag survives finger
 * swaps.
 */
export class TouchTracker {
    private state: TrackState = { phase: 'idle' };
    private pressed = false;
    private gestureClaimed = false;

    constructor(
        private readonly host: SeekBarHost,
        private readonly deps: TouchTrackerDeps
    ) {}

    getPhase(): TrackPhase {
        return this.state.phase;
    }

    getPressedHandle(): Handle | null {
        return this.state.phase === 'idle' ? null : this.state.session.pressedHandle;
    }

    getActivePointerId(): number | null {
        return this.state.phase === 'idle' ? null : this.state.session.activePointerId;
    }

    isPressed(): boolean {
        return this.pressed;
    }

    handle(event: SeekBarInputEvent): boolean {
        switch (event.type) {
            case 'down':
                return this.handleDown(event);
            case 'move':
                return this.handleMove(event.pointers);
            case 'up':
                return this.handleUp(event.pointerId, event.x);
            case 'pointer_down':
                return this.handlePointerDown(event.pointerId, event.x);
            case 'pointer_up':
                return this.handlePointerUp(event.pointerId);
            case 'cancel':
                return this.handleCancel();
        }
    }

    /**
     * Ends any gesture in progress without committing anything further.
     */
    reset(): void {
        this.handleCancel();
    }

    private handleDown(event: Extract<SeekBarInputEvent, { type: 'down' }>): boolean {
        // A fresh down means the host lost the end of the previous gesture.
        this.handleCancel();
        const width = this.host.getWidth();
        const pressedHandle = evalPressedHandle(this.deps.geometry, this.deps.model.getValues(), event.x, width);
        const session: DragSession = {
            activePointerId: event.pointerId,
            downX: event.x,
            pressedHandle,
            swiped: false,
            pointers: [{ pointerId: event.pointerId, x: event.x }],
        };

        this.state = { phase: 'pending', session };
        if (pressedHandle === null) {
            return this.host.delegateTouchEvent?.(event) ?? false;
        }
        this.startDrag(session, event.x);
        return true;
    }

    private handleMove(samples: ReadonlyArray<PointerSample>): boolean {
        if (this.state.phase === 'idle') return false;
        const session = this.state.session;
        for (const sample of samples) {
            const pointer = session.pointers.find((p) => p.pointerId === sample.pointerId);
            if (pointer) pointer.x = sample.x;
        }
        const x = this.getActivePointerX(session);
        if (x === null) return true;

        if (session.pressedHandle === null) {
            if (Math.abs(x - session.downX) > this.deps.getTouchSlopPx()) {
                session.swiped = true;
            }
            return true;
        }

        if (this.state.phase === 'dragging') {
            this.trackTouch(session, x);
        } else if (Math.abs(x - session.downX) > this.deps.getTouchSlopPx()) {
            this.startDrag(session, x);
        }

        if (this.deps.isNotifyWhileDragging()) {
            this.deps.notifyRangeChange();
        }
        return true;
    }

    private handleUp(pointerId: number, eventX: number): boolean {
        if (this.state.phase === 'idle') return false;
        const session = this.state.session;
        const pointer = session.pointers.find((p) => p.pointerId === pointerId);
        if (pointer) pointer.x = eventX;
        const x = this.getActivePointerX(session) ?? eventX;

        if (this.state.phase === 'dragging') {
            this.trackTouch(session, x);
            this.stopTracking(session);
            this.setPressed(false);
        } else if (!this.isSwipe(session, x)) {
            // Never confirmed as a drag: treat the release as a tap-seek.
            const width = this.host.getWidth();
            const values = this.deps.model.getValues();
            session.pressedHandle = session.pressedHandle
                ?? evalPressedHandle(this.deps.geometry, values, x, width)
                ?? nearestHandle(this.deps.geometry, values, x, width);
            this.emitLifecycle(createTrackingStartedEvent(session.pressedHandle, session.activePointerId));
            this.trackTouch(session, x);
            this.stopTracking(session);
        }

        this.endSession();
        this.host.requestRedraw();
        this.deps.notifyRangeChange();
        return true;
    }

    private handlePointerDown(pointerId: number, x: number): boolean {
        if (this.state.phase === 'idle') return false;
        const session = this.state.session;
        session.pointers = session.pointers.filter((p) => p.pointerId !== pointerId);
        session.pointers.push({ pointerId, x });
        session.downX = x;
        session.activePointerId = pointerId;
        if (this.state.phase === 'pending' && session.pressedHandle === null) {
            session.pressedHandle = evalPressedHandle(
                this.deps.geometry,
                this.deps.model.getValues(),
                x,
                this.host.getWidth()
            );
        }
        this.host.requestRedraw();
        return true;
    }

    private handlePointerUp(pointerId: number): boolean {
        if (this.state.phase === 'idle') return false;
        const session = this.state.session;
        const index = session.pointers.findIndex((p) => p.pointerId === pointerId);
        if (index === -1) return true;

        if (pointerId === session.activePointerId) {
            const replacement = session.pointers[index === 0 ? 1 : 0];
            if (replacement) {
                session.downX = replacement.x;
                session.activePointerId = replacement.pointerId;
            }
        }
        session.pointers.splice(index, 1);
        this.host.requestRedraw();
        return true;
    }

    private handleCancel(): boolean {
        if (this.state.phase === 'idle') return false;
        if (this.state.phase === 'dragging') {
            this.stopTracking(this.state.session);
            this.setPressed(false);
        }
        this.endSession();
        this.host.requestRedraw();
        return true;
    }

    private startDrag(session: DragSession, x: number): void {
        this.setPressed(true);
        this.host.requestRedraw();
        this.state = { phase: 'dragging', session };
        this.emitLifecycle(createTrackingStartedEvent(session.pressedHandle, session.activePointerId));
        this.trackTouch(session, x);
        this.claimGesture();
    }

    private stopTracking(session: DragSession): void {
        this.state = { phase: 'pending', session };
        this.emitLifecycle(createTrackingStoppedEvent(session.pressedHandle, session.activePointerId));
    }

    private endSession(): void {
        this.state = { phase: 'idle' };
        this.releaseGesture();
    }

    private trackTouch(session: DragSession, x: number): void {
        const value = this.deps.geometry.toValue(x, this.host.getWidth());
        if (session.pressedHandle === Handle.Min) {
            this.deps.model.setSelectedMin(value);
        } else if (session.pressedHandle === Handle.Max) {
            this.deps.model.setSelectedMax(value);
        }
    }

    private isSwipe(session: DragSession, releaseX: number): boolean {
        if (session.pressedHandle !== null) return false;
        return session.swiped || Math.abs(releaseX - session.downX) > this.deps.getTouchSlopPx();
    }

    private getActivePointerX(session: DragSession): number | null {
        const active = session.pointers.find((p) => p.pointerId === session.activePointerId);
        return active ? active.x : null;
    }

    private setPressed(pressed: boolean): void {
        this.pressed = pressed;
    }

    private claimGesture(): void {
        const parent = this.host.getGestureParent();
        if (!parent) return;
        parent.requestDisallowInterceptTouchEvent(true);
        this.gestureClaimed = true;
    }

    private releaseGesture(): void {
        if (!this.gestureClaimed) return;
        this.gestureClaimed = false;
        this.host.getGestureParent()?.requestDisallowInterceptTouchEvent(false);
    }

    private emitLifecycle(event: TrackingLifecycleEvent): void {
        this.deps.onLifecycleEvent?.(event);
    }
}
