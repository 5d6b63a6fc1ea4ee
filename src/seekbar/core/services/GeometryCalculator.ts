import type { RangeModel } from '../RangeModel';
import { createThumbMetrics, screenToValue, valueToScreen, type ThumbMetrics } from '../geometry';

export class GeometryCalculator {
    private metrics: ThumbMetrics;

    constructor(
        private readonly model: RangeModel,
        thumbWidth: number,
        thumbHeight: number,
        private readonly lineHeightRatio: number
    ) {
        this.metrics = createThumbMetrics(thumbWidth, thumbHeight, lineHeightRatio);
    }

    getMetrics(): ThumbMetrics {
        return this.metrics;
    }

    setThumbSize(thumbWidth: number, thumbHeight: number): void {
        this.metrics = createThumbMetrics(thumbWidth, thumbHeight, this.lineHeightRatio);
    }

    toScreen(value: number, width: number): number {
        return valueToScreen(this.model.getBounds(), this.metrics.padding, value, width);
    }

    toValue(x: number, width: number): number {
        return screenToValue(this.model.getBounds(), this.metrics.padding, x, width);
    }

    isInThumbRange(touchX: number, thumbValue: number, width: number): boolean {
        return Math.abs(touchX - this.toScreen(thumbValue, width)) <= this.metrics.thumbHalfWidth;
    }
}
