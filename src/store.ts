import { v4 as uuidv4 } from 'uuid';
import { MAX_ITEMS, cloneItem, type BoardListener, type Item, type Position } from './types';
import { NotFoundError, ValidationError } from './errors';

/** Brings a requested position inside the board (clamp, then snap). */
export interface PositionConstraint {
    constrain(position: Position): Position;
}

export interface ItemStoreOptions {
    generateId?: () => string;
    maxItems?: number;
}

/**
 * Ordered collection of the items on a board. Every mutation goes through
 * the position constraint, so stored positions are always inside the axes.
 */
export class ItemStore {
    private readonly items = new Map<string, Item>();
    private readonly usedIds = new Set<string>();
    private readonly listeners = new Set<BoardListener>();
    private readonly generateId: () => string;
    private readonly maxItems: number;

    constructor(private readonly constraint: PositionConstraint, options: ItemStoreOptions = {}) {
        this.generateId = options.generateId ?? uuidv4;
        this.maxItems = options.maxItems ?? MAX_ITEMS;
    }

    add(label: string, position: Position, extra: { imageUrl?: string; id?: string } = {}): string {
        if (this.items.size >= this.maxItems) {
            throw new ValidationError(`Too many items. Max allowed is ${this.maxItems}.`);
        }
        const id = extra.id ?? this.nextId();
        if (this.usedIds.has(id)) {
            throw new ValidationError(`Duplicate item id: ${id}`);
        }
        const item: Item = {
            id,
            label: requireLabel(label),
            position: this.constraint.constrain(requirePosition(position)),
        };
        if (extra.imageUrl) item.imageUrl = extra.imageUrl;

        this.items.set(id, item);
        this.usedIds.add(id);
        this.emit('added', id);
        return id;
    }

    rename(id: string, label: string): void {
        const item = this.require(id);
        item.label = requireLabel(label);
        this.emit('renamed', id);
    }

    move(id: string, position: Position): Position {
        const item = this.require(id);
        item.position = this.constraint.constrain(requirePosition(position));
        this.emit('moved', id);
        return { ...item.position };
    }

    setImage(id: string, imageUrl: string | undefined): void {
        const item = this.require(id);
        if (imageUrl) {
            item.imageUrl = imageUrl;
        } else {
            delete item.imageUrl;
        }
        this.emit('updated', id);
    }

    remove(id: string): void {
        this.require(id);
        this.items.delete(id);
        this.emit('removed', id);
    }

    get(id: string): Item {
        return cloneItem(this.require(id));
    }

    has(id: string): boolean {
        return this.items.has(id);
    }

    list(): Item[] {
        return Array.from(this.items.values(), cloneItem);
    }

    get size(): number {
        return this.items.size;
    }

    /** Rewrites every position in place, e.g. after an axis range change. */
    remap(transform: (position: Position) => Position): void {
        for (const item of this.items.values()) {
            item.position = this.constraint.constrain(transform(item.position));
        }
    }

    subscribe(listener: BoardListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private nextId(): string {
        let id = this.generateId();
        while (this.usedIds.has(id)) id = this.generateId();
        return id;
    }

    private require(id: string): Item {
        const item = this.items.get(id);
        if (!item) throw new NotFoundError(id);
        return item;
    }

    private emit(kind: 'added' | 'renamed' | 'moved' | 'removed' | 'updated', id: string): void {
        for (const listener of this.listeners) listener({ kind, id });
    }
}

function requireLabel(label: string): string {
    const trimmed = label.trim();
    if (!trimmed) throw new ValidationError('Item label must not be empty');
    return trimmed;
}

function requirePosition(position: Position): Position {
    if (!Number.isFinite(position.x) || !Number.isFinite(position.y)) {
        throw new ValidationError(`Position must be finite numbers (got ${position.x}, ${position.y})`);
    }
    return { x: position.x, y: position.y };
}
