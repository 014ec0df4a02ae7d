import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { BoardSession } from './session';
import { DEFAULT_AXES, type BoardSnapshot, type Item } from './types';
import { validateAxisName, validateRange } from './axes';
import { ClientError, PersistenceError } from './errors';
import { log } from './logger';
import { ImageUrlSchema } from './persistence';

const AxisKeySchema = z.enum(['x', 'y']);
const IdSchema = z.string().min(1);
const CoordinateSchema = z.number().finite();

// Schema definitions for the tools (synced with TOOLS below)
const AddItemSchema = z.object({
    label: z.string(),
    x: CoordinateSchema,
    y: CoordinateSchema,
    imageUrl: ImageUrlSchema.optional(),
});
const RenameItemSchema = z.object({ id: IdSchema, label: z.string() });
const MoveItemSchema = z.object({ id: IdSchema, x: CoordinateSchema, y: CoordinateSchema });
const RemoveItemSchema = z.object({ id: IdSchema });
const SetItemImageSchema = z.object({ id: IdSchema, imageUrl: ImageUrlSchema.optional() });
const ConfigureAxisSchema = z.object({
    axis: AxisKeySchema,
    name: z.string().optional(),
    min: CoordinateSchema.optional(),
    max: CoordinateSchema.optional(),
    lowLabel: z.string().optional(),
    highLabel: z.string().optional(),
});
const BoardOptionsSchema = z.object({
    title: z.string().optional(),
    snap: z.number().finite().min(0).optional(),
    placement: z.enum(['prompt', 'immediate']).optional(),
});
const RenderSchema = z.object({
    width: z.number().int().optional(),
    height: z.number().int().optional(),
});
const PointerEventSchema = z.object({
    action: z.enum(['down', 'move', 'up']),
    px: CoordinateSchema,
    py: CoordinateSchema,
});
const CommitPlacementSchema = z.object({ label: z.string() });
const NewBoardSchema = z.object({ title: z.string().optional() });
const PathSchema = z.object({ path: z.string().min(1).optional() });

const coordinate = (description: string) => ({ type: 'number', description });

export const TOOLS: Tool[] = [
    {
        name: 'get_board',
        description: 'Return the current board: title, snap step, both axes and all items.',
        inputSchema: { type: 'object', properties: {} },
    },
    {
        name: 'list_items',
        description: 'List the items on the board in order, with their ids and positions in axis units.',
        inputSchema: { type: 'object', properties: {} },
    },
    {
        name: 'add_item',
        description: 'Add an item at a position in axis units. Out-of-range positions are clamped onto the board. Returns the new item id.',
        inputSchema: {
            type: 'object',
            properties: {
                label: { type: 'string', description: 'Item label (must not be empty)' },
                x: coordinate('Position along the X axis'),
                y: coordinate('Position along the Y axis'),
                imageUrl: { type: 'string', description: 'http(s) URL of an image to draw as the marker' },
            },
            required: ['label', 'x', 'y'],
        },
    },
    {
        name: 'rename_item',
        description: 'Change the label of an item.',
        inputSchema: {
            type: 'object',
            properties: { id: { type: 'string' }, label: { type: 'string' } },
            required: ['id', 'label'],
        },
    },
    {
        name: 'move_item',
        description: 'Move an item to a position in axis units (clamped onto the board).',
        inputSchema: {
            type: 'object',
            properties: { id: { type: 'string' }, x: coordinate('Position along the X axis'), y: coordinate('Position along the Y axis') },
            required: ['id', 'x', 'y'],
        },
    },
    {
        name: 'remove_item',
        description: 'Delete an item from the board.',
        inputSchema: { type: 'object', properties: { id: { type: 'string' } }, required: ['id'] },
    },
    {
        name: 'set_item_image',
        description: 'Set or clear (omit imageUrl) the image drawn for an item.',
        inputSchema: {
            type: 'object',
            properties: { id: { type: 'string' }, imageUrl: { type: 'string' } },
            required: ['id'],
        },
    },
    {
        name: 'configure_axis',
        description: 'Rename an axis, set its side captions, or change its range. Changing a range rescales existing items proportionally, so their order along the axis is kept.',
        inputSchema: {
            type: 'object',
            properties: {
                axis: { type: 'string', enum: ['x', 'y'] },
                name: { type: 'string', description: 'Axis name, e.g. "Power"' },
                min: coordinate('Lower bound; must be below max'),
                max: coordinate('Upper bound; must be above min'),
                lowLabel: { type: 'string', description: 'Caption at the low end (left for X, bottom for Y)' },
                highLabel: { type: 'string', description: 'Caption at the high end (right for X, top for Y)' },
            },
            required: ['axis'],
        },
    },
    {
        name: 'set_board_options',
        description: 'Set the board title, the snap step (0 for continuous positions) and what a click on empty canvas does.',
        inputSchema: {
            type: 'object',
            properties: {
                title: { type: 'string' },
                snap: { type: 'number', description: 'Grid step in axis units; 0 disables snapping' },
                placement: { type: 'string', enum: ['prompt', 'immediate'], description: 'prompt: wait for commit_placement; immediate: create "Item N" right away' },
            },
        },
    },
    {
        name: 'render_board',
        description: 'Render the board as a PNG image. Optional width/height also set the canvas used by pointer_event.',
        inputSchema: {
            type: 'object',
            properties: { width: { type: 'integer' }, height: { type: 'integer' } },
        },
    },
    {
        name: 'pointer_event',
        description: 'Send a pointer event in canvas pixels of the last render. Down on a marker starts a drag, move drags it, up drops it. Down on empty canvas starts placing a new item.',
        inputSchema: {
            type: 'object',
            properties: {
                action: { type: 'string', enum: ['down', 'move', 'up'] },
                px: coordinate('Pixel column'),
                py: coordinate('Pixel row'),
            },
            required: ['action', 'px', 'py'],
        },
    },
    {
        name: 'commit_placement',
        description: 'Create the item being placed with the given label.',
        inputSchema: { type: 'object', properties: { label: { type: 'string' } }, required: ['label'] },
    },
    {
        name: 'cancel_interaction',
        description: 'Abandon the current drag or placement.',
        inputSchema: { type: 'object', properties: {} },
    },
    {
        name: 'new_board',
        description: 'Replace the current board with an empty one using the default axes.',
        inputSchema: { type: 'object', properties: { title: { type: 'string' } } },
    },
    {
        name: 'save_board',
        description: 'Save the board as JSON (defaults to the session board file). Another path writes a copy; autosave keeps using the session file.',
        inputSchema: { type: 'object', properties: { path: { type: 'string' } } },
    },
    {
        name: 'load_board',
        description: 'Load a board from a JSON file (defaults to the session board file). Later changes are autosaved to the loaded file.',
        inputSchema: { type: 'object', properties: { path: { type: 'string' } } },
    },
];

type ToolHandler = (session: BoardSession, args: unknown) => Promise<CallToolResult> | CallToolResult;

interface ToolEntry {
    handler: ToolHandler;
    mutates: boolean;
}

function text(value: unknown): CallToolResult {
    return { content: [{ type: 'text', text: typeof value === 'string' ? value : JSON.stringify(value, null, 2) }] };
}

function describeItems(items: Item[]) {
    return items.map(({ id, label, position, imageUrl }) => ({ id, label, x: position.x, y: position.y, ...(imageUrl ? { imageUrl } : {}) }));
}

function describeBoard(snapshot: BoardSnapshot) {
    return { ...snapshot, items: describeItems(snapshot.items) };
}

const HANDLERS: Record<string, ToolEntry> = {
    get_board: {
        mutates: false,
        handler: (session) => text(describeBoard(session.board.toSnapshot())),
    },
    list_items: {
        mutates: false,
        handler: (session) => text(describeItems(session.board.items.list())),
    },
    add_item: {
        mutates: true,
        handler: (session, args) => {
            const { label, x, y, imageUrl } = AddItemSchema.parse(args);
            const id = session.board.items.add(label, { x, y }, { imageUrl });
            return text(describeItems([session.board.items.get(id)])[0]);
        },
    },
    rename_item: {
        mutates: true,
        handler: (session, args) => {
            const { id, label } = RenameItemSchema.parse(args);
            session.board.items.rename(id, label);
            return text(describeItems([session.board.items.get(id)])[0]);
        },
    },
    move_item: {
        mutates: true,
        handler: (session, args) => {
            const { id, x, y } = MoveItemSchema.parse(args);
            session.board.items.move(id, { x, y });
            return text(describeItems([session.board.items.get(id)])[0]);
        },
    },
    remove_item: {
        mutates: true,
        handler: (session, args) => {
            const { id } = RemoveItemSchema.parse(args);
            session.board.items.remove(id);
            return text(`Removed ${id}`);
        },
    },
    set_item_image: {
        mutates: true,
        handler: (session, args) => {
            const { id, imageUrl } = SetItemImageSchema.parse(args);
            session.board.items.setImage(id, imageUrl);
            return text(describeItems([session.board.items.get(id)])[0]);
        },
    },
    configure_axis: {
        mutates: true,
        handler: (session, args) => {
            const { axis, name, min, max, lowLabel, highLabel } = ConfigureAxisSchema.parse(args);
            const board = session.board;
            const current = board.axis(axis);
            const range = { min: min ?? current.min, max: max ?? current.max };
            const rescaling = min !== undefined || max !== undefined;
            // a rejected call must leave the axis untouched, so check before applying
            if (name !== undefined) validateAxisName(name, axis);
            if (rescaling) validateRange(range.min, range.max, axis);

            if (name !== undefined) board.setAxisName(axis, name);
            if (lowLabel !== undefined || highLabel !== undefined) board.setAxisLabels(axis, { lowLabel, highLabel });
            if (rescaling) board.setAxisRange(axis, range.min, range.max);
            return text(board.axis(axis));
        },
    },
    set_board_options: {
        mutates: true,
        handler: (session, args) => {
            const { title, snap, placement } = BoardOptionsSchema.parse(args);
            if (title !== undefined) session.board.setTitle(title);
            if (snap !== undefined) session.board.setSnap(snap);
            if (placement !== undefined) session.setPlacementMode(placement);
            return text({ title: session.board.getTitle() ?? null, snap: session.board.getSnap(), placement: session.placement });
        },
    },
    render_board: {
        mutates: false,
        handler: async (session, args) => {
            const { width, height } = RenderSchema.parse(args ?? {});
            if (width !== undefined || height !== undefined) session.setCanvasSize({ width, height });
            const png = await session.render();
            return {
                content: [{ type: 'image', data: png.toString('base64'), mimeType: 'image/png' }],
            };
        },
    },
    pointer_event: {
        mutates: true,
        handler: (session, args) => {
            const { action, px, py } = PointerEventSchema.parse(args);
            return text(session.interaction.pointer(action, { x: px, y: py }));
        },
    },
    commit_placement: {
        mutates: true,
        handler: (session, args) => {
            const { label } = CommitPlacementSchema.parse(args);
            return text(session.interaction.commitPlacement(label));
        },
    },
    cancel_interaction: {
        mutates: false,
        handler: (session) => text(session.interaction.cancel()),
    },
    new_board: {
        mutates: true,
        handler: (session, args) => {
            const { title } = NewBoardSchema.parse(args ?? {});
            const board = session.newBoard({ title, axes: DEFAULT_AXES });
            return text(describeBoard(board.toSnapshot()));
        },
    },
    save_board: {
        mutates: false,
        handler: async (session, args) => {
            const { path } = PathSchema.parse(args ?? {});
            const saved = await session.save(path);
            return text(`Saved board to ${saved}`);
        },
    },
    load_board: {
        mutates: false,
        handler: async (session, args) => {
            const { path } = PathSchema.parse(args ?? {});
            const board = await session.load(path);
            return text(describeBoard(board.toSnapshot()));
        },
    },
};

/**
 * Runs one tool against the session. Invalid input and client errors come back
 * as `isError` results carrying their message; anything else is logged and
 * reported generically. Mutating tools autosave the board afterwards.
 *
 * Calls run one at a time: the handler and its autosave finish before the next
 * call touches the board.
 */
export async function callTool(session: BoardSession, name: string, args: unknown): Promise<CallToolResult> {
    try {
        const entry = HANDLERS[name];
        if (!entry) {
            throw new ClientError(`Unknown tool: ${name}`);
        }

        return await session.exclusive(async () => {
            log('info', 'tool_call', { tool: name, itemCount: session.board.items.size });
            const result = await entry.handler(session, args ?? {});
            return entry.mutates ? autosave(session, name, result) : result;
        });
    } catch (error) {
        if (error instanceof z.ZodError) {
            log('warn', 'validation_error', { tool: name, error: error.message });
            return {
                content: [{ type: 'text', text: `Validation Error: ${formatZodError(error)}` }],
                isError: true,
            };
        }
        if (error instanceof ClientError) {
            log('warn', 'client_error', { tool: name, error: error.message });
            return {
                content: [{ type: 'text', text: error.message }],
                isError: true,
            };
        }

        // Log full error for server admin
        log('error', 'system_error', { tool: name, error: String(error) });
        console.error(error);

        // Return generic error to client to avoid leaking implementation details
        return {
            content: [{ type: 'text', text: 'An internal error occurred while updating the board.' }],
            isError: true,
        };
    }
}

/**
 * The change has already happened in memory when the save runs, so a failed
 * save is reported next to the successful result instead of as an error.
 */
async function autosave(session: BoardSession, name: string, result: CallToolResult): Promise<CallToolResult> {
    try {
        await session.save();
        return result;
    } catch (error) {
        if (!(error instanceof PersistenceError)) {
            throw error;
        }
        log('warn', 'autosave_failed', { tool: name, path: error.path, error: error.message });
        return {
            ...result,
            content: [...result.content, { type: 'text', text: `Warning: the change was applied but not saved. ${error.message}` }],
        };
    }
}

export function formatZodError(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}
