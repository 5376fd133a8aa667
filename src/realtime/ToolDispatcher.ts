/**
 * Tool-call dispatcher
 *
 * Maps function names the model may call to local capabilities. A call always
 * produces an output string: the tool's result, or an error message the model can
 * read when the call could not be served.
 */

import { z } from 'zod';
import {
    MalformedToolArgumentsError,
    RealtimeError,
    ToolExecutionError,
    UnknownToolNameError,
} from '../errors.js';
import { ToolDefinition } from '../types.js';

export interface PendingToolCall {
    callId: string;
    name: string;
    arguments: string;
}

export interface RealtimeTool {
    readonly definition: ToolDefinition;
    /** Validate already-decoded JSON arguments and run the tool */
    invoke(args: unknown, callId: string): Promise<string>;
}

export type ToolCallResult =
    | { ok: true; output: string }
    | { ok: false; output: string; error: RealtimeError };

/**
 * Build a tool whose arguments are checked against a zod schema before the handler runs
 */
export function defineTool<T>(
    definition: ToolDefinition,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    handler: (args: T) => Promise<string>,
): RealtimeTool {
    return {
        definition,
        async invoke(args: unknown, callId: string): Promise<string> {
            const parsed = schema.safeParse(args);
            if (!parsed.success) {
                const issue = parsed.error.issues[0];
                const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
                throw new MalformedToolArgumentsError(definition.name, callId, `${where}${issue?.message ?? 'invalid arguments'}`);
            }
            return handler(parsed.data);
        },
    };
}

export class ToolDispatcher {
    private tools: Map<string, RealtimeTool> = new Map();

    constructor(tools: RealtimeTool[] = []) {
        for (const tool of tools) {
            this.register(tool);
        }
    }

    register(tool: RealtimeTool): void {
        if (this.tools.has(tool.definition.name)) {
            throw new Error(`Tool "${tool.definition.name}" is already registered`);
        }
        this.tools.set(tool.definition.name, tool);
    }

    get definitions(): ToolDefinition[] {
        return [...this.tools.values()].map(tool => tool.definition);
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    async dispatch(call: PendingToolCall): Promise<ToolCallResult> {
        const tool = this.tools.get(call.name);
        if (!tool) {
            return this.failure(new UnknownToolNameError(call.name, call.callId));
        }

        let args: unknown;
        try {
            args = call.arguments.trim() === '' ? {} : JSON.parse(call.arguments);
        } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            return this.failure(new MalformedToolArgumentsError(call.name, call.callId, detail));
        }

        try {
            const output = await tool.invoke(args, call.callId);
            return { ok: true, output };
        } catch (error) {
            if (error instanceof RealtimeError) {
                return this.failure(error);
            }
            return this.failure(new ToolExecutionError(call.name, call.callId, error));
        }
    }

    private failure(error: RealtimeError): ToolCallResult {
        return { ok: false, output: `Error: ${error.message}`, error };
    }
}
