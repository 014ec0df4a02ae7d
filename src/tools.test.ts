import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { BoardSession } from './session';
import { TOOLS, callTool } from './tools';

function textOf(result: CallToolResult): string {
    const first = result.content[0];
    if (first.type !== 'text') throw new Error(`expected text content, got ${first.type}`);
    return first.text;
}

function jsonOf(result: CallToolResult): unknown {
    return JSON.parse(textOf(result));
}

describe('callTool', () => {
    let dir: string;
    let session: BoardSession;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'quadrant-tools-'));
        let n = 0;
        session = BoardSession.inMemory({
            boardFile: join(dir, 'board.json'),
            storeOptions: { generateId: () => `item-${++n}` },
            loadImage: async () => null,
        });
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should have a handler for every advertised tool', async () => {
        for (const tool of TOOLS) {
            const first = (await callTool(session, tool.name, {})).content[0];
            if (first.type === 'text') expect(first.text).not.toMatch(/^Unknown tool/);
        }
    });

    it('should run the Power/Speed scenario and autosave it', async () => {
        await callTool(session, 'configure_axis', { axis: 'x', name: 'Power', min: -10, max: 10 });
        await callTool(session, 'configure_axis', { axis: 'y', name: 'Speed', min: -10, max: 10 });
        const added = await callTool(session, 'add_item', { label: 'Sword', x: 5, y: 5 });
        expect(jsonOf(added)).toEqual({ id: 'item-1', label: 'Sword', x: 5, y: 5 });

        await callTool(session, 'pointer_event', { action: 'down', px: 580, py: 220 });
        await callTool(session, 'pointer_event', { action: 'move', px: 292, py: 112 });
        const up = await callTool(session, 'pointer_event', { action: 'up', px: 292, py: 112 });
        expect(jsonOf(up)).toEqual({ state: 'idle', itemId: 'item-1', position: { x: -3, y: 8 } });

        expect(jsonOf(await callTool(session, 'list_items', {}))).toEqual([{ id: 'item-1', label: 'Sword', x: -3, y: 8 }]);

        const saved = JSON.parse(await readFile(join(dir, 'board.json'), 'utf-8'));
        expect(saved.items).toEqual([{ id: 'item-1', label: 'Sword', position: { x: -3, y: 8 } }]);
        expect(saved.axes.x.name).toBe('Power');
    });

    it('should clamp an out-of-range add', async () => {
        await callTool(session, 'configure_axis', { axis: 'x', min: -10, max: 10 });
        const result = await callTool(session, 'add_item', { label: 'Far', x: 15, y: 0 });
        expect(jsonOf(result)).toEqual({ id: 'item-1', label: 'Far', x: 10, y: 0 });
    });

    it('should rename, move and remove items', async () => {
        await callTool(session, 'add_item', { label: 'Sword', x: 0, y: 0 });
        expect(jsonOf(await callTool(session, 'rename_item', { id: 'item-1', label: 'Greatsword' })))
            .toEqual({ id: 'item-1', label: 'Greatsword', x: 0, y: 0 });
        expect(jsonOf(await callTool(session, 'move_item', { id: 'item-1', x: -20, y: 30 })))
            .toEqual({ id: 'item-1', label: 'Greatsword', x: -20, y: 30 });
        expect(textOf(await callTool(session, 'remove_item', { id: 'item-1' }))).toBe('Removed item-1');

        const missing = await callTool(session, 'move_item', { id: 'item-1', x: 0, y: 0 });
        expect(missing.isError).toBe(true);
        expect(textOf(missing)).toBe('Item not found: item-1');
    });

    it('should report validation errors inline', async () => {
        const emptyLabel = await callTool(session, 'add_item', { label: '  ', x: 0, y: 0 });
        expect(emptyLabel).toEqual({ content: [{ type: 'text', text: 'Item label must not be empty' }], isError: true });

        const badArgs = await callTool(session, 'add_item', { label: 'A', x: 'left', y: 0 });
        expect(badArgs.isError).toBe(true);
        expect(textOf(badArgs)).toBe('Validation Error: x: Expected number, received string');

        const degenerate = await callTool(session, 'configure_axis', { axis: 'y', min: 2, max: 2 });
        expect(textOf(degenerate)).toBe('Range for y axis is degenerate (min == max == 2)');
    });

    it('should leave the axis untouched when part of configure_axis is invalid', async () => {
        const result = await callTool(session, 'configure_axis', { axis: 'x', name: 'Power', lowLabel: 'Weak', min: 5, max: 5 });
        expect(result).toEqual({ content: [{ type: 'text', text: 'Range for x axis is degenerate (min == max == 5)' }], isError: true });

        const blankName = await callTool(session, 'configure_axis', { axis: 'x', name: '   ', min: 0, max: 10 });
        expect(textOf(blankName)).toBe('Axis name for x must not be empty');

        expect(jsonOf(await callTool(session, 'get_board', {}))).toMatchObject({
            axes: { x: { name: 'X Axis', min: -100, max: 100, lowLabel: 'Left', highLabel: 'Right' } },
        });
    });

    it('should only accept http and https image URLs', async () => {
        const added = await callTool(session, 'add_item', { label: 'Secret', x: 0, y: 0, imageUrl: 'file:///etc/passwd' });
        expect(added).toEqual({
            content: [{ type: 'text', text: 'Validation Error: imageUrl: Image URL must use http or https' }],
            isError: true,
        });

        await callTool(session, 'add_item', { label: 'Sword', x: 0, y: 0 });
        const updated = await callTool(session, 'set_item_image', { id: 'item-1', imageUrl: 'ftp://example.com/sword.png' });
        expect(textOf(updated)).toBe('Validation Error: imageUrl: Image URL must use http or https');

        const accepted = await callTool(session, 'set_item_image', { id: 'item-1', imageUrl: 'https://example.com/sword.png' });
        expect(jsonOf(accepted)).toEqual({ id: 'item-1', label: 'Sword', x: 0, y: 0, imageUrl: 'https://example.com/sword.png' });
    });

    it('should run overlapping calls one after another', async () => {
        const results = await Promise.all(
            Array.from({ length: 20 }, (_, i) => callTool(session, 'add_item', { label: `Item ${i}`, x: i, y: 0 })),
        );
        expect(results.filter((result) => result.isError)).toEqual([]);
        expect(results.map((result) => result.content.length)).toEqual(Array(20).fill(1));

        const saved = JSON.parse(await readFile(join(dir, 'board.json'), 'utf-8'));
        expect(saved.items.map((item: { id: string }) => item.id)).toEqual(Array.from({ length: 20 }, (_, i) => `item-${i + 1}`));
    });

    it('should keep a change and warn when its autosave fails', async () => {
        const blocker = join(dir, 'blocker');
        await writeFile(blocker, 'not a directory', 'utf-8');
        const boardFile = join(blocker, 'board.json');
        const unsaved = BoardSession.inMemory({ boardFile, storeOptions: { generateId: () => 'only' }, loadImage: async () => null });

        const result = await callTool(unsaved, 'add_item', { label: 'Sword', x: 1, y: 1 });
        expect(result.isError).toBeUndefined();
        expect(result.content).toHaveLength(2);
        expect(jsonOf(result)).toEqual({ id: 'only', label: 'Sword', x: 1, y: 1 });

        const warning = result.content[1];
        if (warning.type !== 'text') throw new Error(`expected text content, got ${warning.type}`);
        const prefix = `Warning: the change was applied but not saved. Failed to save board to ${boardFile}: `;
        expect(warning.text.slice(0, prefix.length)).toBe(prefix);
        expect(unsaved.board.items.list()).toEqual([{ id: 'only', label: 'Sword', position: { x: 1, y: 1 } }]);
    });

    it('should reject unknown tools', async () => {
        const result = await callTool(session, 'explode', {});
        expect(result).toEqual({ content: [{ type: 'text', text: 'Unknown tool: explode' }], isError: true });
    });

    it('should rescale items when an axis range changes', async () => {
        await callTool(session, 'add_item', { label: 'A', x: 50, y: 0 });
        const axis = await callTool(session, 'configure_axis', { axis: 'x', min: 0, max: 10, highLabel: 'Strong' });
        expect(jsonOf(axis)).toEqual({ name: 'X Axis', min: 0, max: 10, orientation: 'horizontal', lowLabel: 'Left', highLabel: 'Strong' });
        expect(jsonOf(await callTool(session, 'list_items', {}))).toEqual([{ id: 'item-1', label: 'A', x: 7.5, y: 0 }]);
    });

    it('should place a new item through the pointer and commit_placement', async () => {
        const down = await callTool(session, 'pointer_event', { action: 'down', px: 400, py: 400 });
        expect(jsonOf(down)).toEqual({ state: 'placing', position: { x: 0, y: 0 } });
        const committed = await callTool(session, 'commit_placement', { label: 'Center' });
        expect(jsonOf(committed)).toEqual({ state: 'idle', itemId: 'item-1', position: { x: 0, y: 0 }, created: true });
    });

    it('should switch to immediate placement', async () => {
        const options = await callTool(session, 'set_board_options', { title: 'Snacks', snap: 10, placement: 'immediate' });
        expect(jsonOf(options)).toEqual({ title: 'Snacks', snap: 10, placement: 'immediate' });

        const down = await callTool(session, 'pointer_event', { action: 'down', px: 400, py: 400 });
        expect(jsonOf(down)).toEqual({ state: 'idle', itemId: 'item-1', position: { x: 0, y: 0 }, created: true });
    });

    it('should render the board as a PNG image', async () => {
        await callTool(session, 'add_item', { label: 'Sword', x: 5, y: 5 });
        const result = await callTool(session, 'render_board', { width: 400, height: 300 });
        const image = result.content[0];
        expect(image.type).toBe('image');
        if (image.type !== 'image') return;
        expect(image.mimeType).toBe('image/png');
        const png = Buffer.from(image.data, 'base64');
        expect(png.readUInt32BE(16)).toBe(400);
        expect(png.readUInt32BE(20)).toBe(300);
        expect(session.canvasSize).toEqual({ width: 400, height: 300 });
    });

    it('should save to and load from an explicit path', async () => {
        await callTool(session, 'add_item', { label: 'Keep', x: 1, y: 2 });
        const other = join(dir, 'copy.json');
        expect(textOf(await callTool(session, 'save_board', { path: other }))).toBe(`Saved board to ${other}`);
        expect(session.boardFile).toBe(join(dir, 'board.json'));

        await callTool(session, 'new_board', { title: 'Fresh' });
        expect(jsonOf(await callTool(session, 'list_items', {}))).toEqual([]);
        // the new board autosaves to the session file, not over the copy
        expect(JSON.parse(await readFile(other, 'utf-8')).items).toEqual([{ id: 'item-1', label: 'Keep', position: { x: 1, y: 2 } }]);
        expect(JSON.parse(await readFile(join(dir, 'board.json'), 'utf-8'))).toMatchObject({ title: 'Fresh', items: [] });

        const loaded = await callTool(session, 'load_board', { path: other });
        expect(jsonOf(loaded)).toMatchObject({ items: [{ id: 'item-1', label: 'Keep', x: 1, y: 2 }] });
        expect(session.boardFile).toBe(other);
    });

    it('should surface a corrupt file as a load failure', async () => {
        const broken = join(dir, 'broken.json');
        await writeFile(broken, 'garbage', 'utf-8');
        const result = await callTool(session, 'load_board', { path: broken });
        expect(result.isError).toBe(true);
        expect(textOf(result)).toMatch(/^Board file .*broken\.json is not valid JSON/);
    });
});
