import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { Board } from './board';
import type { ItemStoreOptions } from './store';
import type { BoardSnapshot } from './types';
import { ClientError, PersistenceError } from './errors';
import { errorMessage, log } from './logger';

export const FORMAT_VERSION = 1;

const PositionSchema = z.object({
    x: z.number().finite(),
    y: z.number().finite(),
});

const AxisFields = {
    name: z.string().trim().min(1),
    min: z.number().finite(),
    max: z.number().finite(),
    lowLabel: z.string().default(''),
    highLabel: z.string().default(''),
};

/** Image URLs are fetched when the board is drawn, so only http and https are accepted. */
export const ImageUrlSchema = z.string().url().refine(isHttpUrl, { message: 'Image URL must use http or https' });

export function isHttpUrl(value: string): boolean {
    try {
        const { protocol } = new URL(value);
        return protocol === 'http:' || protocol === 'https:';
    } catch {
        return false;
    }
}

const BoardFileSchema = z.object({
    version: z.literal(FORMAT_VERSION),
    title: z.string().optional(),
    snap: z.number().finite().min(0).default(0),
    axes: z.object({
        x: z.object({ ...AxisFields, orientation: z.literal('horizontal') }),
        y: z.object({ ...AxisFields, orientation: z.literal('vertical') }),
    }),
    items: z.array(z.object({
        id: z.string().min(1),
        label: z.string().min(1),
        position: PositionSchema,
        imageUrl: ImageUrlSchema.optional(),
    })),
});

export type BoardFile = z.infer<typeof BoardFileSchema>;

export function serializeBoard(board: Board): string {
    const file: BoardFile = { version: FORMAT_VERSION, ...board.toSnapshot() };
    return JSON.stringify(file, null, 2) + '\n';
}

/**
 * Parses a saved board. Positions outside the saved ranges are clamped;
 * anything that cannot form a valid board (bad JSON, degenerate range,
 * duplicate ids) throws PersistenceError.
 */
export function parseBoard(text: string, path = '<memory>', storeOptions: ItemStoreOptions = {}): Board {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new PersistenceError(`Board file ${path} is not valid JSON: ${errorMessage(error)}`, path, { cause: error });
    }

    const parsed = BoardFileSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        throw new PersistenceError(`Board file ${path} is invalid at ${where}: ${issue.message}`, path, { cause: parsed.error });
    }

    const { version: _version, ...snapshot } = parsed.data;
    try {
        return Board.fromSnapshot(snapshot satisfies BoardSnapshot, storeOptions);
    } catch (error) {
        if (error instanceof ClientError) {
            throw new PersistenceError(`Board file ${path} is inconsistent: ${error.message}`, path, { cause: error });
        }
        throw error;
    }
}

let tmpCounter = 0;

export async function saveBoard(board: Board, path: string): Promise<void> {
    // one temp file per write so overlapping saves never rename each other's file
    const tmp = `${path}.${process.pid}.${++tmpCounter}.tmp`;
    try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(tmp, serializeBoard(board), 'utf-8');
        await rename(tmp, path);
    } catch (error) {
        throw new PersistenceError(`Failed to save board to ${path}: ${errorMessage(error)}`, path, { cause: error });
    }
    log('debug', 'board_saved', { path, itemCount: board.items.size });
}

export async function loadBoard(path: string, storeOptions: ItemStoreOptions = {}): Promise<Board> {
    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (error) {
        throw new PersistenceError(`Failed to read board file ${path}: ${errorMessage(error)}`, path, { cause: error });
    }
    return parseBoard(text, path, storeOptions);
}

export interface OpenedBoard {
    board: Board;
    loadError?: PersistenceError;
}

/**
 * Loads the board at `path`, or starts a new default board when the file is
 * missing or unusable. Never throws for file content.
 */
export async function openBoard(path: string, storeOptions: ItemStoreOptions = {}): Promise<OpenedBoard> {
    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (error) {
        if (isMissingFile(error)) {
            log('info', 'board_new', { path });
            return { board: new Board({}, storeOptions) };
        }
        const loadError = new PersistenceError(`Failed to read board file ${path}: ${errorMessage(error)}`, path, { cause: error });
        log('warn', 'board_load_failed', { path, error: loadError.message });
        return { board: new Board({}, storeOptions), loadError };
    }

    try {
        const board = parseBoard(text, path, storeOptions);
        log('info', 'board_loaded', { path, itemCount: board.items.size });
        return { board };
    } catch (error) {
        if (!(error instanceof PersistenceError)) throw error;
        log('warn', 'board_load_failed', { path, error: error.message });
        return { board: new Board({}, storeOptions), loadError: error };
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
