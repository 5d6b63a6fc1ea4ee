// @vitest-environment jsdom

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Handle } from '../../types';
import { mountRangeSeekBar, type MountedRangeSeekBar } from './mount';

let frameQueue: Array<{ id: number; callback: FrameRequestCallback }> = [];
let nextFrameId = 1;

function flushFrames(): void {
    const pending = frameQueue;
    frameQueue = [];
    for (const frame of pending) {
        frame.callback(0);
    }
}

function dispatchPointer(target: EventTarget, type: string, pointerId: number, clientX: number): void {
    const event = new Event(type, { bubbles: true, cancelable: true });
    Object.defineProperty(event, 'pointerId', { value: pointerId });
    Object.defineProperty(event, 'pointerType', { value: 'touch' });
    Object.defineProperty(event, 'clientX', { value: clientX });
    Object.defineProperty(event, 'button', { value: 0 });
    target.dispatchEvent(event);
}

function stubWidth(el: HTMLElement, width: number): void {
    Object.defineProperty(el, 'getBoundingClientRect', {
        configurable: true,
        value: () => ({ left: 0, top: 0, right: width, bottom: 20, width, height: 20, x: 0, y: 0 }),
    });
}

describe('mountRangeSeekBar', () => {
    let container: HTMLElement;
    let mounted: MountedRangeSeekBar | null;

    beforeEach(() => {
        frameQueue = [];
        nextFrameId = 1;
        vi.stubGlobal('requestAnimationFrame', (callback: FrameRequestCallback) => {
            const id = nextFrameId++;
            frameQueue.push({ id, callback });
            return id;
        });
        vi.stubGlobal('cancelAnimationFrame', (id: number) => {
            frameQueue = frameQueue.filter((frame) => frame.id !== id);
        });
        container = document.createElement('div');
        document.body.appendChild(container);
        mounted = null;
    });

    afterEach(() => {
        mounted?.destroy();
        vi.unstubAllGlobals();
        document.body.innerHTML = '';
    });

    it('paints the initial frame on the next animation frame', () => {
        mounted = mountRangeSeekBar(container, { settings: { thumbWidthPx: 20, thumbHeightPx: 20 } });
        stubWidth(mounted.renderer.root, 220);
        expect(frameQueue).toHaveLength(1);

        flushFrames();

        expect(mounted.renderer.root.style.height).toBe('20px');
        expect(mounted.renderer.getThumbElement(Handle.Min).style.left).toBe('0px');
        expect(mounted.renderer.getThumbElement(Handle.Max).style.left).toBe('200px');
    });

    it('drags a thumb from DOM pointer events and reports the result', () => {
        const onRangeChange = vi.fn();
        mounted = mountRangeSeekBar(container, {
            settings: { thumbWidthPx: 20, thumbHeightPx: 20 },
            onRangeChange,
        });
        const root = mounted.renderer.root;
        stubWidth(root, 220);
        flushFrames();

        dispatchPointer(root, 'pointerdown', 1, 12);
        expect(container.classList.contains('range-seekbar-gesture-lock')).toBe(true);
        expect(mounted.host.isGestureLocked()).toBe(true);

        dispatchPointer(root, 'pointermove', 1, 110);
        expect(mounted.bar.getSelectedMinValue()).toBe(50);
        expect(frameQueue).toHaveLength(1);

        dispatchPointer(root, 'pointerup', 1, 120);
        expect(onRangeChange).toHaveBeenCalledTimes(1);
        expect(onRangeChange).toHaveBeenCalledWith(55, 100);
        expect(container.classList.contains('range-seekbar-gesture-lock')).toBe(false);

        flushFrames();
        expect(mounted.renderer.getThumbElement(Handle.Min).style.left).toBe('110px');
        expect(root.classList.contains('range-seekbar-pressed')).toBe(false);
    });

    it('starts a fresh drag after a press released outside the widget', () => {
        const onRangeChange = vi.fn();
        mounted = mountRangeSeekBar(container, {
            settings: { thumbWidthPx: 20, thumbHeightPx: 20 },
            onRangeChange,
        });
        const root = mounted.renderer.root;
        stubWidth(root, 220);
        const outside = document.createElement('div');
        document.body.appendChild(outside);

        dispatchPointer(root, 'pointerdown', 1, 60);
        expect(mounted.bar.getTrackPhase()).toBe('pending');
        dispatchPointer(outside, 'pointerup', 1, 300);

        expect(mounted.bar.getTrackPhase()).toBe('idle');
        expect(onRangeChange.mock.calls).toEqual([[0, 100]]);

        dispatchPointer(root, 'pointerdown', 1, 12);
        expect(mounted.bar.getTrackPhase()).toBe('dragging');
        expect(mounted.bar.getPressedHandle()).toBe(Handle.Min);
        expect(container.classList.contains('range-seekbar-gesture-lock')).toBe(true);
    });

    it('uses the given bounds', () => {
        mounted = mountRangeSeekBar(container, { absoluteMin: -5, absoluteMax: 5 });

        expect(mounted.bar.getAbsoluteMinValue()).toBe(-5);
        expect(mounted.bar.getSelectedMaxValue()).toBe(5);
    });

    it('removes the widget and pending frames on destroy', () => {
        const onRangeChange = vi.fn();
        const current = mountRangeSeekBar(container, { onRangeChange });
        const root = current.renderer.root;

        current.destroy();
        dispatchPointer(root, 'pointerdown', 1, 12);

        expect(container.childElementCount).toBe(0);
        expect(frameQueue).toHaveLength(0);
        expect(onRangeChange).not.toHaveBeenCalled();
    });
});
