/**
 * Voice Routes
 *
 * Endpoints:
 * - GET /voices - Full voice registry
 * - POST /voice - Register or replace a voice ({ name, value })
 * - POST /use/:name - Make a registered voice the default
 */

import { z } from 'zod';
import { RequestContext, decodeParam, parseJsonBody, sendError, sendJson } from '../server.js';
import { ValidationError } from '../../core/exceptions.js';

const registerVoiceSchema = z.object({
    name: z.string({ required_error: 'name is required' }),
    value: z.string({ required_error: 'value is required' }),
});

export async function handleVoiceRoutes(ctx: RequestContext): Promise<void> {
    const { pathname, method, res, req, deps } = ctx;
    const voices = deps.radio.voices;

    if (pathname === '/voices') {
        if (method !== 'GET') {
            sendError(res, 'Method Not Allowed', 405);
            return;
        }
        sendJson(res, voices.all());
        return;
    }

    if (pathname === '/voice') {
        if (method !== 'POST') {
            sendError(res, 'Method Not Allowed', 405);
            return;
        }
        const parsed = registerVoiceSchema.safeParse(await parseJsonBody(req));
        if (!parsed.success) {
            throw new ValidationError(parsed.error.errors.map((e) => e.message).join('; '));
        }
        const updated = await voices.register(parsed.data.name, parsed.data.value);
        sendJson(res, { status: 'ok', voices: updated });
        return;
    }

    if (pathname.startsWith('/use/')) {
        if (method !== 'POST' && method !== 'GET') {
            sendError(res, 'Method Not Allowed', 405);
            return;
        }
        const name = decodeParam(pathname.slice('/use/'.length));
        if (voices.get(name) === undefined) {
            sendError(res, `Unknown voice: ${name}`, 404);
            return;
        }
        const updated = await voices.use(name);
        sendJson(res, { status: 'ok', voice: updated.default, voices: updated });
        return;
    }

    sendError(res, 'Not Found', 404);
}
