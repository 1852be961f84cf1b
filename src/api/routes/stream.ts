/**
 * Stream Routes
 *
 * Endpoints:
 * - GET /stream - Continuous audio/mpeg stream joining at the live edge
 */

import { RequestContext, sendError } from '../server.js';
import { getLogger } from '../../core/logging.js';

const logger = getLogger('api.stream');

export async function handleStreamRoutes(ctx: RequestContext): Promise<void> {
    const { req, res, method, deps } = ctx;

    if (method !== 'GET') {
        sendError(res, 'Method Not Allowed', 405);
        return;
    }

    if (!deps.radio.isRunning) {
        sendError(res, 'Broadcast is not running', 503);
        return;
    }

    // Long-lived response
    req.setTimeout(0);
    req.socket.setKeepAlive(true);

    res.writeHead(200, {
        'Content-Type': 'audio/mpeg',
        'Cache-Control': 'no-cache, no-store, must-revalidate',
        'Pragma': 'no-cache',
        'Expires': '0',
        'Connection': 'keep-alive',
        'Access-Control-Allow-Origin': '*',
    });
    res.flushHeaders();

    const { session, done } = deps.radio.attachListener(res);
    logger.debug('Stream opened', { sessionId: session.id, remote: req.socket.remoteAddress });

    // The session owns the response from here
    void done.then(() => {
        logger.debug('Stream closed', { sessionId: session.id, bytesSent: session.getStats().bytesSent });
    });
}
