import { clamp, type Axes, type Item, type Position } from './types';

export const CANVAS_MARGIN = 40;
export const MARKER_SIZE = 48;

export interface CanvasSize {
    width: number;
    height: number;
}

export interface PlotArea {
    left: number;
    top: number;
    width: number;
    height: number;
}

export interface Viewport {
    readonly size: CanvasSize;
    readonly plot: PlotArea;
    /** Pixel where the axes cross: the midpoint of both ranges. */
    readonly origin: Position;
    toPixel(value: Position): Position;
    toValue(pixel: Position): Position;
    hitTest(items: Item[], pixel: Position): Item | undefined;
}

/**
 * Maps axis values onto canvas pixels. X grows to the right, Y grows upward,
 * so the top edge of the plot is the Y axis maximum.
 */
export function createViewport(axes: Axes, size: CanvasSize, margin = CANVAS_MARGIN): Viewport {
    const plot: PlotArea = {
        left: margin,
        top: margin,
        width: size.width - margin * 2,
        height: size.height - margin * 2,
    };
    const xSpan = axes.x.max - axes.x.min;
    const ySpan = axes.y.max - axes.y.min;

    const toPixel = (value: Position): Position => ({
        x: plot.left + ((value.x - axes.x.min) * plot.width) / xSpan,
        y: plot.top + ((axes.y.max - value.y) * plot.height) / ySpan,
    });

    const toValue = (pixel: Position): Position => ({
        x: clamp(axes.x.min + ((pixel.x - plot.left) * xSpan) / plot.width, axes.x.min, axes.x.max),
        y: clamp(axes.y.max - ((pixel.y - plot.top) * ySpan) / plot.height, axes.y.min, axes.y.max),
    });

    const hitTest = (items: Item[], pixel: Position): Item | undefined => {
        const radius = MARKER_SIZE / 2;
        // last drawn is on top
        for (let i = items.length - 1; i >= 0; i--) {
            const center = toPixel(items[i].position);
            if (Math.abs(pixel.x - center.x) <= radius && Math.abs(pixel.y - center.y) <= radius) {
                return items[i];
            }
        }
        return undefined;
    };

    return {
        size: { ...size },
        plot,
        origin: { x: plot.left + plot.width / 2, y: plot.top + plot.height / 2 },
        toPixel,
        toValue,
        hitTest,
    };
}
