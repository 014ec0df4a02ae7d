export type AxisKey = 'x' | 'y';

export type Orientation = 'horizontal' | 'vertical';

export interface Position {
    x: number;
    y: number;
}

export interface Axis {
    name: string;
    min: number;
    max: number;
    orientation: Orientation;
    lowLabel: string;  // left for X, bottom for Y
    highLabel: string; // right for X, top for Y
}

export interface Axes {
    x: Axis;
    y: Axis;
}

export interface Item {
    id: string;
    label: string;
    position: Position;
    imageUrl?: string;
}

export interface BoardSnapshot {
    title?: string;
    snap: number;
    axes: Axes;
    items: Item[];
}

export type BoardChange =
    | { kind: 'added' | 'renamed' | 'moved' | 'removed' | 'updated'; id: string }
    | { kind: 'axis'; axis: AxisKey }
    | { kind: 'options' };

export type BoardListener = (change: BoardChange) => void;

export const MAX_ITEMS = 200;

export const DEFAULT_AXES: Axes = {
    x: { name: 'X Axis', min: -100, max: 100, orientation: 'horizontal', lowLabel: 'Left', highLabel: 'Right' },
    y: { name: 'Y Axis', min: -100, max: 100, orientation: 'vertical', lowLabel: 'Bottom', highLabel: 'Top' },
};

export function cloneItem(item: Item): Item {
    return { ...item, position: { ...item.position } };
}

export function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
}
