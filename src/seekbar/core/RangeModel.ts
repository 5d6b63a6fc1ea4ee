import type { AbsoluteBounds, RangeValues } from '../../types';
import { DEFAULT_ABSOLUTE_MAX, DEFAULT_ABSOLUTE_MIN } from './constants';

function assertInteger(name: string, value: number): void {
    if (!Number.isInteger(value)) {
        throw new TypeError(`${name} must be an integer, got ${value}`);
    }
}

/**
 * Absolute bounds plus the selected sub-range.
 *
 * Every mutation keeps `absoluteMin <= selectedMin <= selectedMax <= absoluteMax`.
 * Moving one end past the other drags the other end along instead of failing.
 */
export class RangeModel {
    readonly absoluteMin: number;
    readonly absoluteMax: number;
    private selectedMin: number;
    private selectedMax: number;

    constructor(
        absoluteMin: number = DEFAULT_ABSOLUTE_MIN,
        absoluteMax: number = DEFAULT_ABSOLUTE_MAX,
        private readonly onInvalidate: () => void = () => {}
    ) {
        assertInteger('absoluteMin', absoluteMin);
        assertInteger('absoluteMax', absoluteMax);
        if (absoluteMin > absoluteMax) {
            throw new RangeError(`absoluteMin (${absoluteMin}) can't be more than absoluteMax (${absoluteMax})`);
        }
        this.absoluteMin = absoluteMin;
        this.absoluteMax = absoluteMax;
        this.selectedMin = absoluteMin;
        this.selectedMax = absoluteMax;
    }

    getSelectedMin(): number {
        return this.selectedMin;
    }

    getSelectedMax(): number {
        return this.selectedMax;
    }

    getBounds(): AbsoluteBounds {
        return { absoluteMin: this.absoluteMin, absoluteMax: this.absoluteMax };
    }

    getValues(): RangeValues {
        return { selectedMin: this.selectedMin, selectedMax: this.selectedMax };
    }

    setSelectedMin(value: number): void {
        this.assertInBounds(value);
        this.selectedMin = value;
        if (value > this.selectedMax) {
            this.selectedMax = value;
        }
        this.onInvalidate();
    }

    setSelectedMax(value: number): void {
        this.assertInBounds(value);
        this.selectedMax = value;
        if (value < this.selectedMin) {
            this.selectedMin = value;
        }
        this.onInvalidate();
    }

    /**
     * Applies a previously saved pair as a whole. Unlike the setters there is no
     * coupling: an inverted pair is rejected.
     */
    restore(values: RangeValues): void {
        this.assertInBounds(values.selectedMin);
        this.assertInBounds(values.selectedMax);
        if (values.selectedMin > values.selectedMax) {
            throw new RangeError(
                `selectedMin (${values.selectedMin}) can't be more than selectedMax (${values.selectedMax})`
            );
        }
        this.selectedMin = values.selectedMin;
        this.selectedMax = values.selectedMax;
        this.onInvalidate();
    }

    private assertInBounds(value: number): void {
        assertInteger('value', value);
        if (value < this.absoluteMin) {
            throw new RangeError(`Value (${value}) can't be less than ${this.absoluteMin}`);
        }
        if (value > this.absoluteMax) {
            throw new RangeError(`Value (${value}) can't be more than ${this.absoluteMax}`);
        }
    }
}
