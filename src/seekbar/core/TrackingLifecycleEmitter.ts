import type { Handle, TrackingLifecycleEvent } from '../../types';

export function createTrackingStartedEvent(handle: Handle | null, pointerId: number | null): TrackingLifecycleEvent {
    return { state: 'tracking_started', handle, pointerId };
}

export function createTrackingStoppedEvent(handle: Handle | null, pointerId: number | null): TrackingLifecycleEvent {
    return { state: 'tracking_stopped', handle, pointerId };
}

/**
 * Deduplicating emitter that skips consecutive identical lifecycle events.
 */
export class TrackingLifecycleEmitter {
    private lastSignature: string | null = null;

    constructor(
        private readonly sink: (event: TrackingLifecycleEvent) => void
    ) {}

    emit(event: TrackingLifecycleEvent): void {
        const signature = buildSignature(event);
        if (signature === this.lastSignature) return;
        this.lastSignature = signature;
        this.sink({ ...event });
    }

    reset(): void {
        this.lastSignature = null;
    }
}

function buildSignature(event: TrackingLifecycleEvent): string {
    return JSON.stringify({
        state: event.state,
        handle: event.handle ?? null,
        pointerId: event.pointerId ?? null,
    });
}
