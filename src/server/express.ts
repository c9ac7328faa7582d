import { randomUUID } from 'node:crypto';

import cors from 'cors';
import type { ErrorRequestHandler, Express, Request, Response } from 'express';
import express from 'express';

import { ProtocolError } from '../errors.js';
import { toErrorResponse } from '../shared/message.js';
import type { MessageExtraInfo } from '../types.js';
import { ErrorCode, isJSONRPCRequest, Method, SESSION_ID_HEADER } from '../types.js';
import type { HttpServerConfigInput } from './config.js';
import { parseHttpServerConfig } from './config.js';
import type { HttpReply } from './http.js';
import { HttpServerTransport } from './http.js';
import type { Server } from './server.js';
import { SSEServerTransport } from './sse.js';

function bodyParserErrorType(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string') {
        return error.type;
    }
    return undefined;
}

// Ensure body parsing failures return JSON-RPC-shaped errors (instead of HTML).
const jsonBodyErrorHandler: ErrorRequestHandler = (error, _req, res, next) => {
    if (res.headersSent) return next(error);

    const type = bodyParserErrorType(error);
    if (type === 'entity.too.large') {
        res.status(413).json({
            jsonrpc: '2.0',
            error: { code: ErrorCode.ConnectionClosed, message: 'Payload too large' },
            id: null
        });
        return;
    }
    if (type === 'entity.parse.failed') {
        res.status(400).json(toErrorResponse(null, ProtocolError.parseError('Parse error: Invalid JSON')));
        return;
    }

    next(error);
};

function extraFor(req: Request): MessageExtraInfo {
    return { requestInfo: { headers: req.headers } };
}

function rejectSession(res: Response, status: 400 | 404, message: string): void {
    res.status(status).json(toErrorResponse(null, ProtocolError.invalidRequest(message)));
}

function writeReply(res: Response, reply: HttpReply): void {
    if (reply.status === 202) {
        res.status(202).end();
        return;
    }
    res.status(reply.status).json(reply.body);
}

/**
 * Mounts both HTTP transports of `server` on a new express application.
 *
 * - `POST {mcpPath}` / `DELETE {mcpPath}`: single-shot; the session id travels in the `Mcp-Session-Id` header
 * - `GET {ssePath}` + `POST {messagesPath}?sessionId=…`: event stream
 *
 * A session id is issued on the handshake and required afterwards. A missing id
 * is answered with `400`, an unknown one with `404`.
 *
 * @example
 * ```typescript
 * const app = createServerApp(server, loadHttpServerConfig());
 * app.listen(3000);
 * ```
 */
export function createServerApp(server: Server, input: HttpServerConfigInput = {}): Express {
    const config = parseHttpServerConfig(input);
    const httpTransports = new Map<string, HttpServerTransport>();
    const sseTransports = new Map<string, SSEServerTransport>();

    const app = express();

    // Allow CORS for the configured origins, expose the Mcp-Session-Id header
    app.use(
        cors({
            origin: config.allowedOrigins.includes('*') ? '*' : config.allowedOrigins,
            exposedHeaders: ['Mcp-Session-Id']
        })
    );

    // Parse JSON request bodies (explicit limit to reduce DoS risk).
    app.use(express.json({ limit: config.maxBodyBytes }));
    app.use(jsonBodyErrorHandler);

    app.post(config.mcpPath, async (req, res) => {
        const sessionId = req.get(SESSION_ID_HEADER);
        if (sessionId === undefined) {
            if (!isJSONRPCRequest(req.body) || req.body.method !== Method.Initialize) {
                rejectSession(res, 400, 'Bad Request: No valid session ID provided');
                return;
            }
            const transport = new HttpServerTransport({ sessionId: randomUUID() });
            transport.onclose = () => {
                httpTransports.delete(transport.sessionId);
            };
            httpTransports.set(transport.sessionId, transport);
            await server.connect(transport);

            const reply = await transport.handlePost(req.body, extraFor(req));
            res.setHeader('Mcp-Session-Id', transport.sessionId);
            writeReply(res, reply);
            return;
        }

        const transport = httpTransports.get(sessionId);
        if (!transport) {
            rejectSession(res, 404, 'Session not found');
            return;
        }
        writeReply(res, await transport.handlePost(req.body, extraFor(req)));
    });

    app.delete(config.mcpPath, async (req, res) => {
        const sessionId = req.get(SESSION_ID_HEADER);
        if (sessionId === undefined) {
            rejectSession(res, 400, 'Bad Request: No valid session ID provided');
            return;
        }
        const session = server.getSession(sessionId);
        if (!session || !httpTransports.has(sessionId)) {
            rejectSession(res, 404, 'Session not found');
            return;
        }
        await session.close();
        res.status(200).end();
    });

    app.get(config.ssePath, async (_req, res) => {
        const transport = new SSEServerTransport(config.messagesPath, res, {
            queueCapacity: config.queueCapacity,
            sendTimeoutMs: config.sendTimeoutMs
        });
        transport.onclose = () => {
            sseTransports.delete(transport.sessionId);
        };
        sseTransports.set(transport.sessionId, transport);
        await server.connect(transport);
    });

    app.post(config.messagesPath, (req, res) => {
        const sessionId = req.query.sessionId;
        if (typeof sessionId !== 'string' || sessionId === '') {
            rejectSession(res, 400, 'Bad Request: No valid session ID provided');
            return;
        }
        const transport = sseTransports.get(sessionId);
        if (!transport) {
            rejectSession(res, 404, 'Session not found');
            return;
        }
        const reply = transport.handlePostMessage(req.body, extraFor(req));
        if (reply.status === 202) {
            res.status(202).end();
            return;
        }
        res.status(reply.status).json(reply.body);
    });

    return app;
}
