import type { Context } from 'hono';
import type { ParsedBodyEnv } from '@src/lib/middleware/body-parser.js';
import { negotiated } from '@src/lib/negotiation/index.js';

export interface MessageRequest {
    message: string;
}

export interface MessageCreated {
    message: string;
    length: number;
    receivedAs: string;
}

/**
 * Body parser for POST /messages
 */
export function parseMessageRequest(value: unknown): MessageRequest {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new TypeError('Request body must be an object');
    }
    if (!('message' in value) || typeof value.message !== 'string') {
        throw new TypeError('Request body must contain a string "message"');
    }
    return { message: value.message };
}

/**
 * POST /messages - Accept a message in any registered format
 *
 * Answers 201 in the format the caller accepts, which need not be the format
 * the body was sent in.
 */
export default function (context: Context<ParsedBodyEnv<MessageRequest>>) {
    const { message } = context.get('parsedBody');
    const created: MessageCreated = {
        message,
        length: message.length,
        receivedAs: context.get('requestFormat').mediaType,
    };

    return negotiated(created, { status: 201 });
}
