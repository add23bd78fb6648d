// Streaming accumulator for min, max, mean and standard deviation

import type { FieldSummary } from "./types";

/**
 * Tracks count, sum, sum of squares, min and max of a stream of values
 * without storing the values themselves.
 */
export class RunningStats {
    /** Running count of values added. */
    private _count = 0;
    /** Running sum of values added. */
    private _sum = 0;
    /** Running sum of squared values for variance calculation. */
    private _sumOfSquares = 0;
    /** Running minimum value seen. */
    private _min = Number.POSITIVE_INFINITY;
    /** Running maximum value seen. */
    private _max = Number.NEGATIVE_INFINITY;

    /**
     * The total number of values added.
     *
     * @returns The count of values accumulated so far.
     */
    get count(): number {
        return this._count;
    }

    /**
     * The sum of all added values.
     *
     * @returns The cumulative sum of all values.
     */
    get sum(): number {
        return this._sum;
    }

    /**
     * Adds a value, updating the running statistics.
     *
     * @param value - The numeric value to add.
     */
    add(value: number): void {
        this._count++;
        this._sum += value;
        this._sumOfSquares += value * value;

        if (value < this._min) this._min = value;
        if (value > this._max) this._max = value;
    }

    /**
     * Folds another accumulator into this one, as if its values had been added here.
     *
     * @param other - The accumulator to combine with this one.
     */
    merge(other: RunningStats): void {
        this._count += other._count;
        this._sum += other._sum;
        this._sumOfSquares += other._sumOfSquares;

        if (other._min < this._min) this._min = other._min;
        if (other._max > this._max) this._max = other._max;
    }

    /**
     * Computes the population statistics from the running accumulators.
     * Variance lost to floating-point cancellation is clamped to zero.
     *
     * @returns The summary, or undefined if no values have been added.
     */
    toSummary(): FieldSummary | undefined {
        if (this._count === 0) return undefined;

        const mean = this._sum / this._count;
        const variance = this._sumOfSquares / this._count - mean * mean;
        const std = variance > 0 ? Math.sqrt(variance) : 0;

        return { min: this._min, mean, std, max: this._max };
    }
}
