import { Board, type BoardInit } from './board';
import { BoardView, resolveCanvasSize, type ImageLoader } from './drawer';
import { InteractionController, type PlacementMode } from './interaction';
import { openBoard, loadBoard, saveBoard } from './persistence';
import type { ItemStoreOptions } from './store';
import type { CanvasSize } from './viewport';
import type { PersistenceError } from './errors';
import { log } from './logger';

export interface SessionOptions {
    boardFile: string;
    canvasSize?: Partial<CanvasSize>;
    placement?: PlacementMode;
    storeOptions?: ItemStoreOptions;
    loadImage?: ImageLoader;
}

/**
 * The one board a running server works on, with its cached view, pointer
 * controller and save file. Replacing the board rewires all three.
 */
export class BoardSession {
    board: Board;
    view: BoardView;
    interaction: InteractionController;
    boardFile: string;
    canvasSize: CanvasSize;
    placement: PlacementMode;

    private queue: Promise<unknown> = Promise.resolve();

    private constructor(board: Board, private readonly options: SessionOptions) {
        this.boardFile = options.boardFile;
        this.canvasSize = resolveCanvasSize(options.canvasSize);
        this.placement = options.placement ?? 'prompt';
        this.board = board;
        this.view = new BoardView(board, { loadImage: options.loadImage });
        this.interaction = new InteractionController(board, { size: this.canvasSize, placement: this.placement });
    }

    /** Opens the session's board file, falling back to a new board when it cannot be read. */
    static async open(options: SessionOptions): Promise<{ session: BoardSession; loadError?: PersistenceError }> {
        const { board, loadError } = await openBoard(options.boardFile, options.storeOptions);
        return { session: new BoardSession(board, options), loadError };
    }

    static inMemory(options: SessionOptions, board = new Board({}, options.storeOptions)): BoardSession {
        return new BoardSession(board, options);
    }

    setCanvasSize(size: Partial<CanvasSize>): CanvasSize {
        this.canvasSize = resolveCanvasSize({
            width: size.width ?? this.canvasSize.width,
            height: size.height ?? this.canvasSize.height,
        });
        this.interaction.setCanvasSize(this.canvasSize);
        return this.canvasSize;
    }

    setPlacementMode(mode: PlacementMode): void {
        this.placement = mode;
        this.interaction.setPlacementMode(mode);
    }

    replaceBoard(board: Board): void {
        this.view.dispose();
        this.board = board;
        this.view = new BoardView(board, { loadImage: this.options.loadImage });
        this.interaction = new InteractionController(board, { size: this.canvasSize, placement: this.placement });
    }

    newBoard(init: BoardInit = {}): Board {
        const board = new Board(init, this.options.storeOptions);
        this.replaceBoard(board);
        log('info', 'board_new', { path: this.boardFile });
        return board;
    }

    /**
     * Runs `task` after every task queued before it has settled. A failed task
     * rejects its own promise only; the queue carries on.
     */
    exclusive<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(task);
        this.queue = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }

    /** Loads `path` and makes it the file later changes are saved to. */
    async load(path = this.boardFile): Promise<Board> {
        const board = await loadBoard(path, this.options.storeOptions);
        this.replaceBoard(board);
        this.boardFile = path;
        log('info', 'board_loaded', { path, itemCount: board.items.size });
        return board;
    }

    /** Writes the board to `path`. Another path is a one-off copy; autosave keeps its file. */
    async save(path = this.boardFile): Promise<string> {
        await saveBoard(this.board, path);
        return path;
    }

    render(): Promise<Buffer> {
        return this.view.render(this.canvasSize);
    }
}
