/**
 * Document lookup tool
 *
 * Lets the model search the PDF index mid-conversation.
 */

import { z } from 'zod';
import { RealtimeTool, defineTool } from '../realtime/ToolDispatcher.js';
import { IRetriever } from '../types.js';

const lookupArguments = z.object({
    query: z.string().min(1, 'query must not be empty'),
});

export function createLookupTool(
    retriever: IRetriever,
    name: string = 'lookup',
    description: string = 'Search the indexed documents and return the passages most relevant to the query.',
): RealtimeTool {
    return defineTool(
        {
            type: 'function',
            name,
            description,
            parameters: {
                type: 'object',
                properties: {
                    query: {
                        type: 'string',
                        description: 'What to look up, phrased as a short search query',
                    },
                },
                required: ['query'],
            },
        },
        lookupArguments,
        ({ query }) => retriever.lookup(query),
    );
}
