import { createCanvas, loadImage, type Image, type SKRSContext2D } from '@napi-rs/canvas';
import axios from 'axios';
import { lookup } from 'dns/promises';
import { URL } from 'url';
import type { Board } from './board';
import type { BoardSnapshot, Item, Position } from './types';
import { createViewport, MARKER_SIZE, type CanvasSize, type Viewport } from './viewport';
import { ClientError, ValidationError } from './errors';
import { errorMessage, log } from './logger';

// Layout
const LABEL_GAP = 6;             // Space between a marker and its label
const LABEL_MAX_WIDTH = 140;
const TITLE_FONT_SIZE = 22;
const AXIS_FONT_SIZE = 14;
const FONT_FAMILY = 'sans-serif';

// Colors
const BACKGROUND = '#1e1e1e';
const QUADRANT_COLORS = {
    topRight: '#2f4a2f',
    topLeft: '#4a3b2a',
    bottomLeft: '#4a2a2f',
    bottomRight: '#2a344a',
};
const AXIS_COLOR = '#dddddd';
const MARKER_FILL = '#ffbf7f';
const TEXT_COLOR = '#ffffff';

// Security Constants
export const MIN_CANVAS_SIZE = 200;
export const MAX_CANVAS_SIZE = 4000;
const IMAGE_TIMEOUT_MS = 5000;
const MAX_IMAGE_SIZE_BYTES = 5 * 1024 * 1024; // 5MB

export const DEFAULT_CANVAS_SIZE: CanvasSize = { width: 800, height: 800 };

export type ImageLoader = (url: string) => Promise<Image | null>;

export interface RenderOptions extends Partial<CanvasSize> {
    loadImage?: ImageLoader;
}

export async function validateUrl(inputUrl: string): Promise<string> {
    let parsed: URL;
    try {
        parsed = new URL(inputUrl);
    } catch {
        throw new ClientError(`Invalid image URL: ${inputUrl}`);
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        throw new ClientError('Invalid protocol: must be http or https');
    }

    // Resolve hostname to IP to check for private addresses
    const hostname = parsed.hostname.replace(/^\[|\]$/g, '');
    const { address } = await lookup(hostname);

    if (isPrivateAddress(address)) {
        throw new ClientError(`Access to private IP ${address} is forbidden`);
    }

    return inputUrl;
}

export function isPrivateAddress(address: string): boolean {
    const parts = address.split('.').map(Number);
    if (parts.length === 4 && parts.every((p) => Number.isInteger(p))) {
        return (
            parts[0] === 10 ||
            (parts[0] === 172 && parts[1] >= 16 && parts[1] <= 31) ||
            (parts[0] === 192 && parts[1] === 168) ||
            (parts[0] === 169 && parts[1] === 254) ||
            parts[0] === 127 ||
            parts[0] === 0
        );
    }
    if (address.includes(':')) {
        const mapped = mappedIPv4(address);
        if (mapped !== null) {
            return isPrivateAddress(mapped);
        }
        // Not exhaustive: loopback, unique-local and link-local
        const lower = address.toLowerCase();
        return lower === '::1' || lower === '::' || lower.startsWith('fc') || lower.startsWith('fd') || lower.startsWith('fe80');
    }
    return false;
}

// ::ffff:a.b.c.d, or its hex spelling ::ffff:hhhh:hhhh as the URL parser writes it
const MAPPED_IPV4 = /^(?:::|(?:0{1,4}:){5})ffff:(?:(\d{1,3}(?:\.\d{1,3}){3})|([0-9a-f]{1,4}):([0-9a-f]{1,4}))$/;

function mappedIPv4(address: string): string | null {
    const match = MAPPED_IPV4.exec(address.toLowerCase());
    if (!match) {
        return null;
    }
    const [, dotted, high, low] = match;
    if (dotted) {
        return dotted;
    }
    const hi = parseInt(high, 16);
    const lo = parseInt(low, 16);
    return [hi >> 8, hi & 0xff, lo >> 8, lo & 0xff].join('.');
}

export async function loadItemImage(url: string): Promise<Image | null> {
    try {
        const validatedUrl = await validateUrl(url);

        const response = await axios.get<ArrayBuffer>(validatedUrl, {
            responseType: 'arraybuffer',
            timeout: IMAGE_TIMEOUT_MS,
            maxContentLength: MAX_IMAGE_SIZE_BYTES,
            maxRedirects: 0, // Prevent redirecting to localhost
            headers: {
                'User-Agent': 'QuadrantBoard/1.0 (non-commercial tool)',
                'Accept': 'image/*'
            }
        });
        return await loadImage(Buffer.from(response.data));
    } catch (e) {
        // A URL that fails validation is the user's to fix
        if (e instanceof ClientError) {
            throw e;
        }

        // Network errors and bad image data only cost this marker its picture
        log('warn', 'image_load_failed', { url, error: errorMessage(e) });
        return null;
    }
}

export function resolveCanvasSize(options: Partial<CanvasSize> = {}): CanvasSize {
    const size = {
        width: options.width ?? DEFAULT_CANVAS_SIZE.width,
        height: options.height ?? DEFAULT_CANVAS_SIZE.height,
    };
    for (const [name, value] of Object.entries(size)) {
        if (!Number.isInteger(value) || value < MIN_CANVAS_SIZE || value > MAX_CANVAS_SIZE) {
            throw new ValidationError(`Canvas ${name} must be an integer between ${MIN_CANVAS_SIZE} and ${MAX_CANVAS_SIZE} (got ${value})`);
        }
    }
    return size;
}

/**
 * Draws the board as a PNG: four quadrant fills, the two axes crossing at the
 * middle of their ranges, axis names and side captions, then one marker per
 * item in list order (later items on top).
 */
export async function renderBoard(board: BoardSnapshot, options: RenderOptions = {}): Promise<Buffer> {
    const size = resolveCanvasSize(options);
    const viewport = createViewport(board.axes, size);
    const fetchImage = options.loadImage ?? loadItemImage;

    const canvas = createCanvas(size.width, size.height);
    const ctx = canvas.getContext('2d');

    ctx.fillStyle = BACKGROUND;
    ctx.fillRect(0, 0, size.width, size.height);

    drawQuadrants(ctx, viewport);
    drawAxes(ctx, viewport, board);

    if (board.title) {
        ctx.fillStyle = TEXT_COLOR;
        ctx.font = `bold ${TITLE_FONT_SIZE}px ${FONT_FAMILY}`;
        ctx.textAlign = 'center';
        ctx.textBaseline = 'middle';
        ctx.fillText(board.title, size.width / 2, viewport.plot.top / 2, size.width - 20);
    }

    // Fetch each distinct image once
    const images = new Map<string, Image | null>();
    for (const item of board.items) {
        if (item.imageUrl && !images.has(item.imageUrl)) {
            images.set(item.imageUrl, await fetchImage(item.imageUrl));
        }
    }

    for (const item of board.items) {
        const image = item.imageUrl ? images.get(item.imageUrl) ?? null : null;
        drawItem(ctx, viewport, item, image);
    }

    return canvas.toBuffer('image/png');
}

function drawQuadrants(ctx: SKRSContext2D, viewport: Viewport) {
    const { plot, origin } = viewport;
    const right = plot.left + plot.width;
    const bottom = plot.top + plot.height;

    ctx.fillStyle = QUADRANT_COLORS.topLeft;
    ctx.fillRect(plot.left, plot.top, origin.x - plot.left, origin.y - plot.top);
    ctx.fillStyle = QUADRANT_COLORS.topRight;
    ctx.fillRect(origin.x, plot.top, right - origin.x, origin.y - plot.top);
    ctx.fillStyle = QUADRANT_COLORS.bottomLeft;
    ctx.fillRect(plot.left, origin.y, origin.x - plot.left, bottom - origin.y);
    ctx.fillStyle = QUADRANT_COLORS.bottomRight;
    ctx.fillRect(origin.x, origin.y, right - origin.x, bottom - origin.y);
}

function drawAxes(ctx: SKRSContext2D, viewport: Viewport, board: BoardSnapshot) {
    const { plot, origin, size } = viewport;
    const { x: xAxis, y: yAxis } = board.axes;

    ctx.strokeStyle = AXIS_COLOR;
    ctx.lineWidth = 2;
    ctx.beginPath();
    ctx.moveTo(plot.left, origin.y);
    ctx.lineTo(plot.left + plot.width, origin.y);
    ctx.moveTo(origin.x, plot.top);
    ctx.lineTo(origin.x, plot.top + plot.height);
    ctx.stroke();

    ctx.fillStyle = TEXT_COLOR;
    ctx.font = `${AXIS_FONT_SIZE}px ${FONT_FAMILY}`;
    ctx.textBaseline = 'middle';

    // Side captions sit just inside the plot, at the ends of each axis
    ctx.textAlign = 'left';
    ctx.fillText(xAxis.lowLabel, plot.left + 4, origin.y - AXIS_FONT_SIZE);
    ctx.textAlign = 'right';
    ctx.fillText(xAxis.highLabel, plot.left + plot.width - 4, origin.y - AXIS_FONT_SIZE);
    ctx.textAlign = 'left';
    ctx.fillText(yAxis.highLabel, origin.x + 6, plot.top + AXIS_FONT_SIZE);
    ctx.fillText(yAxis.lowLabel, origin.x + 6, plot.top + plot.height - AXIS_FONT_SIZE);

    // Axis names in the margins
    ctx.font = `bold ${AXIS_FONT_SIZE}px ${FONT_FAMILY}`;
    ctx.textAlign = 'center';
    ctx.fillText(`${xAxis.name} (${xAxis.min} to ${xAxis.max})`, origin.x, size.height - plot.top / 2);

    ctx.save();
    ctx.translate(plot.left / 2, origin.y);
    ctx.rotate(-Math.PI / 2);
    ctx.fillText(`${yAxis.name} (${yAxis.min} to ${yAxis.max})`, 0, 0);
    ctx.restore();
}

function drawItem(ctx: SKRSContext2D, viewport: Viewport, item: Item, image: Image | null) {
    const center = viewport.toPixel(item.position);
    const half = MARKER_SIZE / 2;

    if (image) {
        // Keep aspect ratio inside the marker box
        const scale = Math.min(MARKER_SIZE / image.width, MARKER_SIZE / image.height);
        const w = image.width * scale;
        const h = image.height * scale;
        ctx.drawImage(image, center.x - w / 2, center.y - h / 2, w, h);
    } else {
        ctx.fillStyle = MARKER_FILL;
        ctx.strokeStyle = TEXT_COLOR;
        ctx.lineWidth = 2;
        ctx.beginPath();
        ctx.arc(center.x, center.y, half / 2, 0, Math.PI * 2);
        ctx.fill();
        ctx.stroke();
    }

    drawItemLabel(ctx, viewport, item.label, center, image ? half : half / 2);
}

function drawItemLabel(ctx: SKRSContext2D, viewport: Viewport, text: string, center: Position, markerRadius: number) {
    const { lines, fontSize } = fitText(ctx, text, LABEL_MAX_WIDTH, MARKER_SIZE, 'normal');
    ctx.font = `${fontSize}px ${FONT_FAMILY}`;
    ctx.fillStyle = TEXT_COLOR;
    ctx.textBaseline = 'middle';

    // Flip to the left side when the label would run off the canvas
    const rightEdge = center.x + markerRadius + LABEL_GAP + LABEL_MAX_WIDTH;
    const onLeft = rightEdge > viewport.size.width;
    ctx.textAlign = onLeft ? 'right' : 'left';
    const x = onLeft ? center.x - markerRadius - LABEL_GAP : center.x + markerRadius + LABEL_GAP;

    const lineHeight = fontSize * 1.2;
    let y = center.y - ((lines.length - 1) * lineHeight) / 2;
    for (const line of lines) {
        ctx.fillText(line, x, y);
        y += lineHeight;
    }
}

export function fitText(
    ctx: SKRSContext2D,
    text: string,
    maxWidth: number,
    maxHeight: number,
    fontWeight: 'normal' | 'bold'
): { lines: string[], fontSize: number } {
    if (!text) return { lines: [], fontSize: 12 };

    const startSize = fontWeight === 'bold' ? 18 : 14;
    let brokenFallback: { lines: string[], fontSize: number } | null = null;

    for (let size = startSize; size >= 8; size -= 1) {
        ctx.font = `${fontWeight} ${size}px ${FONT_FAMILY}`;
        const { lines, wasWordBroken } = wrapText(ctx, text, maxWidth);
        if (lines.length * size * 1.2 <= maxHeight) {
            if (!wasWordBroken) return { lines, fontSize: size };
            brokenFallback ??= { lines, fontSize: size };
        }
    }

    if (brokenFallback) return brokenFallback;

    ctx.font = `${fontWeight} 8px ${FONT_FAMILY}`;
    return { lines: wrapText(ctx, text, maxWidth).lines, fontSize: 8 };
}

function wrapText(
    ctx: SKRSContext2D,
    text: string,
    maxWidth: number
): { lines: string[], wasWordBroken: boolean } {
    const width = (t: string) => ctx.measureText(t).width;
    const lines: string[] = [];
    let wasWordBroken = false;
    let current = '';

    // Starts a new line with `word`, splitting it by character if it is too wide on its own
    const startLine = (word: string) => {
        if (width(word) <= maxWidth) {
            current = word;
            return;
        }
        wasWordBroken = true;
        const parts = breakWord(ctx, word, maxWidth);
        lines.push(...parts.slice(0, -1));
        current = parts[parts.length - 1] ?? '';
    };

    for (const word of text.split(' ').filter(Boolean)) {
        if (!current) {
            startLine(word);
        } else if (width(`${current} ${word}`) < maxWidth) {
            current += ` ${word}`;
        } else {
            lines.push(current);
            startLine(word);
        }
    }
    if (current) lines.push(current);
    return { lines, wasWordBroken };
}

function breakWord(ctx: SKRSContext2D, word: string, maxWidth: number): string[] {
    const parts: string[] = [];
    let currentPart = '';

    for (const char of word) {
        if (currentPart && ctx.measureText(currentPart + char).width > maxWidth) {
            parts.push(currentPart);
            currentPart = char;
        } else {
            currentPart += char;
        }
    }
    if (currentPart) parts.push(currentPart);
    return parts;
}

/**
 * Cached PNG of a live board. Any board change drops the cache, so the next
 * {@link render} redraws with the current axes and items.
 */
export class BoardView {
    private cached: { key: string; generation: number; png: Buffer } | null = null;
    private generation = 0;
    private readonly unsubscribe: () => void;

    constructor(private readonly board: Board, private readonly renderOptions: Omit<RenderOptions, 'width' | 'height'> = {}) {
        this.unsubscribe = board.subscribe(() => {
            this.generation++;
        });
    }

    get dirty(): boolean {
        return this.cached === null || this.cached.generation !== this.generation;
    }

    async render(size: Partial<CanvasSize> = {}): Promise<Buffer> {
        const resolved = resolveCanvasSize(size);
        const key = `${resolved.width}x${resolved.height}`;
        if (this.cached && !this.dirty && this.cached.key === key) return this.cached.png;

        const generation = this.generation;
        const png = await renderBoard(this.board.toSnapshot(), { ...this.renderOptions, ...resolved });
        this.cached = { key, generation, png };
        return png;
    }

    dispose(): void {
        this.unsubscribe();
        this.cached = null;
    }
}
