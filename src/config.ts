import { z } from 'zod';

const ConfigSchema = z.object({
    MCP_TRANSPORT: z.enum(['stdio', 'sse']).default('stdio'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    BOARD_FILE: z.string().min(1).default('data/board.json'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface ServerConfig {
    transport: 'stdio' | 'sse';
    port: number;
    boardFile: string;
    logLevel: 'debug' | 'info' | 'warn' | 'error';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const parsed = ConfigSchema.parse({
        MCP_TRANSPORT: env.MCP_TRANSPORT || undefined,
        PORT: env.PORT || undefined,
        BOARD_FILE: env.BOARD_FILE || undefined,
        LOG_LEVEL: env.LOG_LEVEL || undefined,
    });
    return {
        transport: parsed.MCP_TRANSPORT,
        port: parsed.PORT,
        boardFile: parsed.BOARD_FILE,
        logLevel: parsed.LOG_LEVEL,
    };
}
