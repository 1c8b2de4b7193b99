/**
 * peon-ping MCP Server
 * Exposes the trainer over stdio so the assistant can log reps and read progress
 * on the user's behalf
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { TrainerCommands, formatError } from './commands.js';

export type ToolResult = {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
};

function text(value: string): ToolResult {
    return { content: [{ type: 'text', text: value }] };
}

function failure(error: unknown): ToolResult {
    return { content: [{ type: 'text', text: formatError(error) }], isError: true };
}

/**
 * Tool handlers, independent of the transport
 */
export function createTrainerToolHandlers(commands: TrainerCommands) {
    return {
        status: async (): Promise<ToolResult> => {
            try {
                return text(await commands.status());
            } catch (error) {
                return failure(error);
            }
        },
        log: async ({ count, exercise }: { count: number; exercise: string }): Promise<ToolResult> => {
            try {
                return text(await commands.log(count, exercise));
            } catch (error) {
                return failure(error);
            }
        },
        goal: async ({ value, exercise }: { value: number; exercise?: string }): Promise<ToolResult> => {
            try {
                return text(await commands.goal(exercise, value));
            } catch (error) {
                return failure(error);
            }
        },
        toggle: async ({ enabled }: { enabled: boolean }): Promise<ToolResult> => {
            try {
                return text(await commands.setEnabled(enabled));
            } catch (error) {
                return failure(error);
            }
        }
    };
}

export function createMcpServer(commands: TrainerCommands): McpServer {
    const server = new McpServer({
        name: 'peon-ping',
        version: '1.0.0'
    });
    const handlers = createTrainerToolHandlers(commands);

    // ==================== TOOL: trainer_status ====================
    server.tool(
        'trainer_status',
        "Show today's exercise reps against the daily goals.",
        {},
        handlers.status
    );

    // ==================== TOOL: trainer_log ====================
    server.tool(
        'trainer_log',
        'Log completed reps of a configured exercise. Returns the new daily total.',
        {
            count: z.number().int().nonnegative().describe('Number of reps completed'),
            exercise: z.string().describe('Configured exercise name, e.g. "pushups"')
        },
        handlers.log
    );

    // ==================== TOOL: trainer_goal ====================
    server.tool(
        'trainer_goal',
        'Set the daily goal of one exercise, or of every exercise when none is named.',
        {
            value: z.number().int().nonnegative().describe('Daily rep goal'),
            exercise: z.string().optional().describe('Exercise to change. Omit to set all goals.')
        },
        handlers.goal
    );

    // ==================== TOOL: trainer_toggle ====================
    server.tool(
        'trainer_toggle',
        'Turn trainer reminders on or off.',
        {
            enabled: z.boolean().describe('true to enable reminders, false to disable')
        },
        handlers.toggle
    );

    return server;
}

/**
 * Serve the trainer tools on stdin/stdout until the client disconnects
 */
export async function startMcpServer(commands: TrainerCommands): Promise<void> {
    const server = createMcpServer(commands);
    const transport = new StdioServerTransport();
    await server.connect(transport);

    // Log to stderr so it doesn't interfere with MCP protocol
    console.error('[peon-ping] MCP server started');
}
