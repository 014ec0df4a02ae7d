import { describe, it, expect, vi, afterEach } from 'vitest';
import { errorMessage, log, setLogLevel } from './logger';

describe('log', () => {
    afterEach(() => {
        setLogLevel('info');
        vi.restoreAllMocks();
    });

    it('should write one JSON line to stderr', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
        log('warn', 'client_error', { tool: 'move_item', error: 'Item not found: a' });
        expect(spy).toHaveBeenCalledWith('{"level":"warn","event":"client_error","tool":"move_item","error":"Item not found: a"}');
    });

    it('should drop messages below the threshold', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
        log('debug', 'stale_drag');
        setLogLevel('debug');
        log('debug', 'stale_drag', { itemId: 'a' });
        expect(spy).toHaveBeenCalledTimes(1);
        expect(spy).toHaveBeenCalledWith('{"level":"debug","event":"stale_drag","itemId":"a"}');
    });
});

describe('errorMessage', () => {
    it('should prefer the error message', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom');
        expect(errorMessage('plain')).toBe('plain');
    });
});
