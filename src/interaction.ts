import type { Board } from './board';
import { createViewport, type CanvasSize, type Viewport } from './viewport';
import type { Position } from './types';
import { NotFoundError } from './errors';
import { log } from './logger';

export type PlacementMode = 'prompt' | 'immediate';

export type InteractionState =
    | { kind: 'idle' }
    | { kind: 'dragging'; itemId: string; startPixel: Position; originPixel: Position }
    | { kind: 'placing'; position: Position };

export type PointerAction = 'down' | 'move' | 'up';

export interface InteractionResult {
    state: InteractionState['kind'];
    itemId?: string;
    position?: Position;
    created?: boolean;
}

export interface InteractionOptions {
    size: CanvasSize;
    placement?: PlacementMode;
}

/**
 * Pointer state machine over a board canvas.
 *
 *   idle --down on marker--> dragging --move--> dragging --up--> idle
 *   idle --down on empty---> placing --commitPlacement/cancel--> idle
 *
 * In `immediate` placement mode a down on empty canvas creates the item
 * right away and stays idle.
 */
export class InteractionController {
    private current: InteractionState = { kind: 'idle' };
    private size: CanvasSize;
    private placement: PlacementMode;
    private placedCount = 0;

    constructor(private readonly board: Board, options: InteractionOptions) {
        this.size = { ...options.size };
        this.placement = options.placement ?? 'prompt';
    }

    get state(): InteractionState {
        return this.current;
    }

    setCanvasSize(size: CanvasSize): void {
        this.size = { ...size };
    }

    setPlacementMode(mode: PlacementMode): void {
        this.placement = mode;
    }

    pointer(action: PointerAction, pixel: Position): InteractionResult {
        switch (action) {
            case 'down':
                return this.pointerDown(pixel);
            case 'move':
                return this.pointerMove(pixel);
            case 'up':
                return this.pointerUp(pixel);
        }
    }

    pointerDown(pixel: Position): InteractionResult {
        const viewport = this.viewport();
        if (this.current.kind === 'dragging') {
            // a down without the matching up: treat the old drag as finished
            this.current = { kind: 'idle' };
        }

        const hit = viewport.hitTest(this.board.items.list(), pixel);
        if (hit) {
            this.current = {
                kind: 'dragging',
                itemId: hit.id,
                startPixel: { ...pixel },
                originPixel: viewport.toPixel(hit.position),
            };
            return { state: 'dragging', itemId: hit.id, position: hit.position };
        }

        const position = this.board.constrain(viewport.toValue(pixel));
        if (this.placement === 'immediate') {
            const id = this.board.items.add(this.nextDefaultLabel(), position);
            this.current = { kind: 'idle' };
            return { state: 'idle', itemId: id, position: this.board.items.get(id).position, created: true };
        }
        this.current = { kind: 'placing', position };
        return { state: 'placing', position };
    }

    pointerMove(pixel: Position): InteractionResult {
        const state = this.current;
        if (state.kind !== 'dragging') return this.describe();
        return this.dragTo(state, pixel, 'dragging');
    }

    pointerUp(pixel: Position): InteractionResult {
        const state = this.current;
        if (state.kind !== 'dragging') return this.describe();
        const result = this.dragTo(state, pixel, 'idle');
        this.current = { kind: 'idle' };
        return result;
    }

    commitPlacement(label: string): InteractionResult {
        const state = this.current;
        if (state.kind !== 'placing') return this.describe();
        // a ValidationError here leaves the placement pending
        const id = this.board.items.add(label, state.position);
        this.current = { kind: 'idle' };
        return { state: 'idle', itemId: id, position: this.board.items.get(id).position, created: true };
    }

    cancel(): InteractionResult {
        this.current = { kind: 'idle' };
        return { state: 'idle' };
    }

    private dragTo(
        state: Extract<InteractionState, { kind: 'dragging' }>,
        pixel: Position,
        next: 'dragging' | 'idle',
    ): InteractionResult {
        const target = this.viewport().toValue({
            x: state.originPixel.x + (pixel.x - state.startPixel.x),
            y: state.originPixel.y + (pixel.y - state.startPixel.y),
        });
        try {
            const position = this.board.items.move(state.itemId, target);
            return { state: next, itemId: state.itemId, position };
        } catch (error) {
            if (!(error instanceof NotFoundError)) throw error;
            log('debug', 'stale_drag', { itemId: state.itemId });
            this.current = { kind: 'idle' };
            return { state: 'idle' };
        }
    }

    private describe(): InteractionResult {
        const state = this.current;
        switch (state.kind) {
            case 'idle':
                return { state: 'idle' };
            case 'placing':
                return { state: 'placing', position: state.position };
            case 'dragging':
                return { state: 'dragging', itemId: state.itemId };
        }
    }

    /** `Item N` with N counting up for this board, skipping labels already in use. */
    private nextDefaultLabel(): string {
        const taken = new Set(this.board.items.list().map((item) => item.label));
        let label: string;
        do {
            label = `Item ${++this.placedCount}`;
        } while (taken.has(label));
        return label;
    }

    private viewport(): Viewport {
        return createViewport(this.board.axes(), this.size);
    }
}
