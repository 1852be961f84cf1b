/**
 * HTTP API Server for the speech radio
 *
 * Provides HTTP endpoints for:
 * - The live MP3 stream
 * - Speech synthesis requests and job status
 * - Stored speech listing and replay
 * - Voice registry management
 * - Health checks
 */

import http from 'http';
import { logger } from '../core/logging.js';
import { ValidationError, errorMessage } from '../core/exceptions.js';
import type { RadioService } from '../services/radio.js';

// Import route handlers
import { handleHealthRoutes } from './routes/health.js';
import { handleStreamRoutes } from './routes/stream.js';
import { handleSpeechRoutes } from './routes/speech.js';
import { handleVoiceRoutes } from './routes/voices.js';

const MAX_BODY_BYTES = 64 * 1024;

const CORS_HEADERS = {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
};

/**
 * Parse JSON body from request
 */
export async function parseJsonBody(req: http.IncomingMessage): Promise<unknown> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        let size = 0;
        req.on('data', (chunk: Buffer) => {
            size += chunk.length;
            if (size > MAX_BODY_BYTES) {
                reject(new ValidationError('Request body too large'));
                req.destroy();
                return;
            }
            chunks.push(chunk);
        });
        req.on('end', () => {
            const body = Buffer.concat(chunks).toString('utf-8');
            try {
                resolve(body ? JSON.parse(body) : {});
            } catch {
                reject(new ValidationError('Invalid JSON body'));
            }
        });
        req.on('error', reject);
    });
}

/**
 * Send JSON response
 */
export function sendJson(res: http.ServerResponse, data: unknown, statusCode: number = 200): void {
    res.writeHead(statusCode, {
        'Content-Type': 'application/json',
        ...CORS_HEADERS,
    });
    res.end(JSON.stringify(data));
}

/**
 * Send error response
 */
export function sendError(res: http.ServerResponse, message: string, statusCode: number = 400): void {
    sendJson(res, { error: message, status: 'error' }, statusCode);
}

/**
 * Decode a path segment; malformed escapes are a client error
 */
export function decodeParam(value: string): string {
    try {
        return decodeURIComponent(value);
    } catch {
        throw new ValidationError(`Malformed path parameter: ${value}`);
    }
}

/**
 * Everything route handlers are allowed to touch
 */
export interface ApiDependencies {
    radio: RadioService;
    /** Bounded wait on a new synthesis job before answering */
    jobWaitMs: number;
    startedAt?: number;
}

/**
 * Request context passed to route handlers
 */
export interface RequestContext {
    req: http.IncomingMessage;
    res: http.ServerResponse;
    method: string;
    pathname: string;
    query: Record<string, string>;
    deps: ApiDependencies;
}

/**
 * Route table order matters: first match wins
 */
async function route(ctx: RequestContext): Promise<void> {
    const { pathname, res } = ctx;

    if (pathname === '/' || pathname === '/health' || pathname === '/ready' || pathname === '/metrics') {
        await handleHealthRoutes(ctx);
    } else if (pathname === '/stream') {
        await handleStreamRoutes(ctx);
    } else if (pathname === '/say' || pathname.startsWith('/say/') || pathname === '/songs' || pathname.startsWith('/play/')) {
        await handleSpeechRoutes(ctx);
    } else if (pathname === '/voices' || pathname === '/voice' || pathname.startsWith('/use/')) {
        await handleVoiceRoutes(ctx);
    } else {
        sendError(res, 'Not Found', 404);
    }
}

/**
 * Create the API server (not yet listening)
 */
export function createApiServer(deps: ApiDependencies): http.Server {
    const server = http.createServer(async (req, res) => {
        const startTime = Date.now();

        // Handle CORS preflight
        if (req.method === 'OPTIONS') {
            res.writeHead(204, CORS_HEADERS);
            res.end();
            return;
        }

        const url = new URL(req.url || '/', 'http://localhost');
        const ctx: RequestContext = {
            req,
            res,
            method: req.method || 'GET',
            pathname: url.pathname,
            query: Object.fromEntries(url.searchParams.entries()),
            deps,
        };

        try {
            await route(ctx);
        } catch (error) {
            if (res.headersSent) {
                logger.error('API error after response started', error);
                res.destroy();
            } else if (error instanceof ValidationError) {
                sendError(res, error.message, 400);
            } else {
                logger.error('API request error', error);
                sendError(res, errorMessage(error) || 'Internal Server Error', 500);
            }
        }

        const latencyMs = Date.now() - startTime;
        logger.debug(`${ctx.method} ${ctx.pathname} - ${res.statusCode} (${latencyMs}ms)`);
    });

    server.on('error', (err: Error) => {
        logger.error('Server error:', err);
    });

    return server;
}

/**
 * Start listening and print the endpoint table
 */
export function startApiServer(deps: ApiDependencies, port: number, host: string = '0.0.0.0'): Promise<http.Server> {
    const server = createApiServer(deps);
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
            server.off('error', reject);
            logger.info(`API server started on http://${host}:${port}`);
            logger.info('');
            logger.info('═══════════════════════════════════════════════════════════════');
            logger.info('                    AVAILABLE API ENDPOINTS                    ');
            logger.info('═══════════════════════════════════════════════════════════════');

            logger.info('');
            logger.info('📍 Health & Status');
            logger.info('  GET  /health                              - Health check');
            logger.info('  GET  /ready                               - Readiness check');
            logger.info('  GET  /metrics                             - Prometheus metrics');

            logger.info('');
            logger.info('📻 Broadcast');
            logger.info('  GET  /stream                              - Live MP3 stream');
            logger.info('  GET  /songs                               - Stored speech files');
            logger.info('  POST /play/:name                          - Replay a stored speech file');

            logger.info('');
            logger.info('🗣️  Speech');
            logger.info('  POST /say                                 - Queue text for synthesis');
            logger.info('  GET  /say/:id                             - Synthesis job status');

            logger.info('');
            logger.info('🎙️  Voices');
            logger.info('  GET  /voices                              - Voice registry');
            logger.info('  POST /voice                               - Register a voice');
            logger.info('  POST /use/:name                           - Make a voice the default');

            logger.info('');
            logger.info('═══════════════════════════════════════════════════════════════');
            resolve(server);
        });
    });
}
