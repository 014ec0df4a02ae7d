import { describe, it, expect } from 'vitest';
import { createViewport, MARKER_SIZE } from './viewport';
import type { Axes, Item } from './types';

const AXES: Axes = {
    x: { name: 'Power', min: -10, max: 10, orientation: 'horizontal', lowLabel: '', highLabel: '' },
    y: { name: 'Speed', min: -10, max: 10, orientation: 'vertical', lowLabel: '', highLabel: '' },
};

// 800x800 canvas, 40px margin: 720px plot, 36px per axis unit
const viewport = createViewport(AXES, { width: 800, height: 800 });

describe('createViewport', () => {
    it('should inset the plot by the margin', () => {
        expect(viewport.plot).toEqual({ left: 40, top: 40, width: 720, height: 720 });
        expect(viewport.origin).toEqual({ x: 400, y: 400 });
    });

    it('should map values to pixels with Y growing upward', () => {
        expect(viewport.toPixel({ x: -10, y: 10 })).toEqual({ x: 40, y: 40 });
        expect(viewport.toPixel({ x: 10, y: -10 })).toEqual({ x: 760, y: 760 });
        expect(viewport.toPixel({ x: 5, y: 5 })).toEqual({ x: 580, y: 220 });
        expect(viewport.toPixel({ x: -3, y: 8 })).toEqual({ x: 292, y: 112 });
    });

    it('should map pixels back to values', () => {
        expect(viewport.toValue({ x: 580, y: 220 })).toEqual({ x: 5, y: 5 });
        expect(viewport.toValue({ x: 292, y: 112 })).toEqual({ x: -3, y: 8 });
    });

    it('should clamp pixels outside the plot to the axis bounds', () => {
        expect(viewport.toValue({ x: 0, y: 800 })).toEqual({ x: -10, y: -10 });
        expect(viewport.toValue({ x: 790, y: 5 })).toEqual({ x: 10, y: 10 });
    });

    it('should center the axes on the middle of asymmetric ranges', () => {
        const skewed = createViewport(
            { x: { ...AXES.x, min: 0, max: 100 }, y: { ...AXES.y, min: 0, max: 4 } },
            { width: 400, height: 300 },
        );
        expect(skewed.origin).toEqual({ x: 200, y: 150 });
        expect(skewed.toPixel({ x: 50, y: 2 })).toEqual({ x: 200, y: 150 });
    });

    describe('hitTest', () => {
        const items: Item[] = [
            { id: 'a', label: 'A', position: { x: 0, y: 0 } },
            { id: 'b', label: 'B', position: { x: 0.5, y: 0 } },
            { id: 'c', label: 'C', position: { x: 5, y: 5 } },
        ];

        it('should return the topmost marker under the pointer', () => {
            // a at 400,400 and b at 418,400 overlap; b is drawn later
            expect(viewport.hitTest(items, { x: 405, y: 400 })?.id).toBe('b');
            expect(viewport.hitTest(items, { x: 380, y: 400 })?.id).toBe('a');
        });

        it('should cover the whole marker box', () => {
            const half = MARKER_SIZE / 2;
            expect(viewport.hitTest(items, { x: 580 + half, y: 220 - half })?.id).toBe('c');
            expect(viewport.hitTest(items, { x: 580 + half + 1, y: 220 })).toBeUndefined();
        });

        it('should miss empty canvas', () => {
            expect(viewport.hitTest(items, { x: 100, y: 700 })).toBeUndefined();
        });
    });
});
