import { DEFAULT_AXES, type Axes, type Axis, type AxisKey } from './types';
import { ValidationError } from './errors';

/**
 * Holds the X and Y axes of a board.
 *
 * Changing a range rescales existing items proportionally: {@link setRange}
 * returns the mapping from the old range into the new one, and the board
 * applies it to every item on that axis. The mapping is strictly increasing,
 * so items keep their order along the axis.
 */
export class AxisConfiguration {
    private axes: Axes;

    constructor(initial: Axes = DEFAULT_AXES) {
        this.axes = { x: checkAxis(initial.x, 'x'), y: checkAxis(initial.y, 'y') };
    }

    get(axis: AxisKey): Axis {
        return { ...this.axes[axis] };
    }

    all(): Axes {
        return { x: this.get('x'), y: this.get('y') };
    }

    setName(axis: AxisKey, name: string): void {
        this.axes[axis] = { ...this.axes[axis], name: validateAxisName(name, axis) };
    }

    setLabels(axis: AxisKey, labels: { lowLabel?: string; highLabel?: string }): void {
        const current = this.axes[axis];
        this.axes[axis] = {
            ...current,
            lowLabel: labels.lowLabel?.trim() ?? current.lowLabel,
            highLabel: labels.highLabel?.trim() ?? current.highLabel,
        };
    }

    setRange(axis: AxisKey, min: number, max: number): (value: number) => number {
        validateRange(min, max, axis);
        const { min: oldMin, max: oldMax } = this.axes[axis];
        this.axes[axis] = { ...this.axes[axis], min, max };
        return (value) => rescale(value, oldMin, oldMax, min, max);
    }
}

const ORIENTATION: Record<AxisKey, Axis['orientation']> = { x: 'horizontal', y: 'vertical' };

function checkAxis(axis: Axis, key: AxisKey): Axis {
    if (axis.orientation !== ORIENTATION[key]) {
        throw new ValidationError(`The ${key} axis must be ${ORIENTATION[key]} (got ${axis.orientation})`);
    }
    validateRange(axis.min, axis.max, key);
    return { ...axis, name: validateAxisName(axis.name, key) };
}

/** Returns the trimmed name. */
export function validateAxisName(name: string, axis: AxisKey): string {
    const trimmed = name.trim();
    if (!trimmed) {
        throw new ValidationError(`Axis name for ${axis} must not be empty`);
    }
    return trimmed;
}

export function validateRange(min: number, max: number, axis: AxisKey): void {
    if (!Number.isFinite(min) || !Number.isFinite(max)) {
        throw new ValidationError(`Range for ${axis} axis must be finite numbers`);
    }
    if (min === max) {
        throw new ValidationError(`Range for ${axis} axis is degenerate (min == max == ${min})`);
    }
    if (min > max) {
        throw new ValidationError(`Range for ${axis} axis must have min < max (got ${min} > ${max})`);
    }
}

export function rescale(value: number, oldMin: number, oldMax: number, newMin: number, newMax: number): number {
    const scaled = newMin + ((value - oldMin) * (newMax - newMin)) / (oldMax - oldMin);
    // float error can push the ends a hair outside
    return Math.max(newMin, Math.min(newMax, scaled));
}
