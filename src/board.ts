import { AxisConfiguration } from './axes';
import { ItemStore, type ItemStoreOptions, type PositionConstraint } from './store';
import { DEFAULT_AXES, clamp, type Axes, type Axis, type AxisKey, type BoardChange, type BoardListener, type BoardSnapshot, type Position } from './types';
import { ValidationError } from './errors';

export interface BoardInit {
    title?: string;
    snap?: number;
    axes?: Axes;
}

/**
 * A pair of axes plus the items placed between them. Listeners see every
 * change, whether it came from the item store or from axis configuration.
 */
export class Board implements PositionConstraint {
    readonly items: ItemStore;
    private readonly axisConfig: AxisConfiguration;
    private readonly listeners = new Set<BoardListener>();
    private title?: string;
    private snap = 0;

    constructor(init: BoardInit = {}, storeOptions: ItemStoreOptions = {}) {
        this.axisConfig = new AxisConfiguration(init.axes ?? DEFAULT_AXES);
        this.title = init.title?.trim() || undefined;
        this.snap = requireSnap(init.snap ?? 0);
        this.items = new ItemStore(this, storeOptions);
        this.items.subscribe((change) => this.emit(change));
    }

    static fromSnapshot(snapshot: BoardSnapshot, storeOptions: ItemStoreOptions = {}): Board {
        const board = new Board({ title: snapshot.title, snap: snapshot.snap, axes: snapshot.axes }, storeOptions);
        for (const item of snapshot.items) {
            board.items.add(item.label, item.position, { id: item.id, imageUrl: item.imageUrl });
        }
        return board;
    }

    constrain(position: Position): Position {
        const { x, y } = this.axisConfig.all();
        return {
            x: clamp(this.snapValue(position.x), x.min, x.max),
            y: clamp(this.snapValue(position.y), y.min, y.max),
        };
    }

    axis(key: AxisKey): Axis {
        return this.axisConfig.get(key);
    }

    axes(): Axes {
        return this.axisConfig.all();
    }

    getTitle(): string | undefined {
        return this.title;
    }

    getSnap(): number {
        return this.snap;
    }

    setAxisName(key: AxisKey, name: string): void {
        this.axisConfig.setName(key, name);
        this.emit({ kind: 'axis', axis: key });
    }

    setAxisLabels(key: AxisKey, labels: { lowLabel?: string; highLabel?: string }): void {
        this.axisConfig.setLabels(key, labels);
        this.emit({ kind: 'axis', axis: key });
    }

    setAxisRange(key: AxisKey, min: number, max: number): void {
        const map = this.axisConfig.setRange(key, min, max);
        this.items.remap((p) => (key === 'x' ? { x: map(p.x), y: p.y } : { x: p.x, y: map(p.y) }));
        this.emit({ kind: 'axis', axis: key });
    }

    setTitle(title: string | undefined): void {
        this.title = title?.trim() || undefined;
        this.emit({ kind: 'options' });
    }

    setSnap(step: number): void {
        this.snap = requireSnap(step);
        this.items.remap((p) => p);
        this.emit({ kind: 'options' });
    }

    subscribe(listener: BoardListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    toSnapshot(): BoardSnapshot {
        const snapshot: BoardSnapshot = { snap: this.snap, axes: this.axes(), items: this.items.list() };
        if (this.title) snapshot.title = this.title;
        return snapshot;
    }

    private snapValue(value: number): number {
        return this.snap > 0 ? Math.round(value / this.snap) * this.snap : value;
    }

    private emit(change: BoardChange): void {
        for (const listener of this.listeners) listener(change);
    }
}

function requireSnap(step: number): number {
    if (!Number.isFinite(step) || step < 0) {
        throw new ValidationError(`Snap step must be a non-negative number (got ${step})`);
    }
    return step;
}
