import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    ListResourcesRequestSchema,
    ReadResourceRequestSchema,
    ListPromptsRequestSchema,
    GetPromptRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { BoardSession } from "./session";
import { TOOLS, callTool } from "./tools";
import { DEFAULT_AXES } from "./types";
import { serializeBoard } from "./persistence";

export const SERVER_NAME = "quadrant-board-mcp";
export const SERVER_VERSION = "1.0.0";

const BOARD_URI = "quadrant://board";
const DEFAULTS_URI = "quadrant://defaults";

export function createServer(session: BoardSession): Server {
    const server = new Server(
        {
            name: SERVER_NAME,
            version: SERVER_VERSION,
        },
        {
            capabilities: {
                tools: {},
                resources: {},
                prompts: {},
            },
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        return callTool(session, request.params.name, request.params.arguments);
    });

    // Resources implementation
    server.setRequestHandler(ListResourcesRequestSchema, async () => {
        return {
            resources: [
                {
                    uri: BOARD_URI,
                    name: "Current Board",
                    mimeType: "application/json",
                    description: "The board being edited, in the same JSON format it is saved in."
                },
                {
                    uri: DEFAULTS_URI,
                    name: "Default Axes",
                    mimeType: "application/json",
                    description: "The axis configuration a new board starts with."
                }
            ]
        };
    });

    server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
        if (request.params.uri === BOARD_URI) {
            return {
                contents: [{
                    uri: request.params.uri,
                    mimeType: "application/json",
                    text: serializeBoard(session.board)
                }]
            };
        }
        if (request.params.uri === DEFAULTS_URI) {
            return {
                contents: [{
                    uri: request.params.uri,
                    mimeType: "application/json",
                    text: JSON.stringify(DEFAULT_AXES, null, 2)
                }]
            };
        }

        throw new Error(`Resource not found: ${request.params.uri}`);
    });

    // Prompts implementation
    server.setRequestHandler(ListPromptsRequestSchema, async () => {
        return {
            prompts: [
                {
                    name: "rank-items",
                    description: "Place a set of things on a quadrant board ranked by two criteria",
                    arguments: [
                        { name: "xCriterion", description: "What the X axis measures", required: true },
                        { name: "yCriterion", description: "What the Y axis measures", required: true },
                        { name: "items", description: "Comma-separated things to rank", required: false }
                    ]
                }
            ]
        };
    });

    server.setRequestHandler(GetPromptRequestSchema, async (request) => {
        if (request.params.name === "rank-items") {
            const args = request.params.arguments ?? {};
            const xCriterion = args.xCriterion || "X";
            const yCriterion = args.yCriterion || "Y";
            const items = args.items ? `\nThings to rank: ${args.items}` : "";
            return {
                messages: [
                    {
                        role: "user",
                        content: {
                            type: "text",
                            text: `Rank these on a quadrant board. Use configure_axis to name the X axis "${xCriterion}" and the Y axis "${yCriterion}", then add_item each one at (x, y) within the axis ranges and finish with render_board.${items}`
                        }
                    }
                ]
            };
        }
        throw new Error("Prompt not found");
    });

    return server;
}
