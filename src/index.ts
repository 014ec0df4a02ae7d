import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import express from "express";
import cors from "cors";
import morgan from "morgan";
import { z } from "zod";
import { loadConfig, type ServerConfig } from "./config";
import { BoardSession } from "./session";
import { createServer } from "./server";
import { formatZodError } from "./tools";
import { log, setLogLevel } from "./logger";

async function run() {
    let config: ServerConfig;
    try {
        config = loadConfig();
    } catch (error) {
        if (error instanceof z.ZodError) {
            console.error(`Invalid configuration: ${formatZodError(error)}`);
            process.exit(1);
        }
        throw error;
    }
    setLogLevel(config.logLevel);

    const { session, loadError } = await BoardSession.open({ boardFile: config.boardFile });
    if (loadError) {
        // Starting over with an empty board; the broken file stays until the next save
        log("warn", "board_reset", { path: config.boardFile, error: loadError.message });
    }

    const server = createServer(session);

    if (config.transport === "sse") {
        const app = express();
        app.use(cors());
        // stdout is free in SSE mode, but keep every log line on one stream
        app.use(morgan("combined", { stream: process.stderr }));

        let transport: SSEServerTransport | null = null;

        app.get("/sse", async (req, res) => {
            log("info", "sse_connected");
            transport = new SSEServerTransport("/messages", res);
            await server.connect(transport);
        });

        app.post("/messages", async (req, res) => {
            if (transport) {
                await transport.handlePostMessage(req, res);
            } else {
                res.status(400).send("No active connection");
            }
        });

        app.listen(config.port, () => {
            log("info", "server_started", { transport: "sse", url: `http://localhost:${config.port}/sse`, boardFile: config.boardFile });
        });

    } else {
        const transport = new StdioServerTransport();
        await server.connect(transport);
        log("info", "server_started", { transport: "stdio", boardFile: config.boardFile });
    }
}

run().catch((error) => {
    console.error("Fatal error running server:", error);
    process.exit(1);
});
