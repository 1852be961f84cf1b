/**
 * Speech Routes
 *
 * Endpoints:
 * - POST /say - Queue text for synthesis (waits briefly for the result)
 * - GET /say/:id - Synthesis job status
 * - GET /songs - Retained speech files, newest first
 * - POST /play/:name - Put a retained speech file on air
 */

import { z } from 'zod';
import path from 'path';
import { RequestContext, decodeParam, parseJsonBody, sendError, sendJson } from '../server.js';
import { ValidationError } from '../../core/exceptions.js';
import { getLogger } from '../../core/logging.js';

const logger = getLogger('api.speech');

const sayRequestSchema = z.object({
    text: z.string().optional(),
    voice: z.string().optional(),
    voiceId: z.string().optional(),
});

export async function handleSpeechRoutes(ctx: RequestContext): Promise<void> {
    const { pathname, method, res, req, deps } = ctx;
    const { radio } = deps;

    // POST /say
    if (pathname === '/say') {
        if (method !== 'POST') {
            sendError(res, 'Method Not Allowed', 405);
            return;
        }

        const parsed = sayRequestSchema.safeParse(await parseJsonBody(req));
        if (!parsed.success) {
            throw new ValidationError(parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; '));
        }
        const { text, voice, voiceId } = parsed.data;

        const job = radio.queue.enqueue(text ?? '', voice ?? voiceId);
        await job.wait(deps.jobWaitMs);

        if (job.status === 'failed') {
            sendJson(res, { status: 'error', error: job.error, job: job.toJSON() }, 500);
        } else if (job.status === 'completed' && job.resultPath) {
            sendJson(res, {
                status: 'ok',
                audio_path: path.basename(job.resultPath),
                job: job.toJSON(),
            });
        } else {
            sendJson(res, { status: 'queued', job: job.toJSON() }, 202);
        }
        return;
    }

    // GET /say/:id
    if (pathname.startsWith('/say/')) {
        if (method !== 'GET') {
            sendError(res, 'Method Not Allowed', 405);
            return;
        }
        const job = radio.queue.get(decodeParam(pathname.slice('/say/'.length)));
        if (!job) {
            sendError(res, 'Job not found', 404);
            return;
        }
        sendJson(res, job.toJSON());
        return;
    }

    // GET /songs
    if (pathname === '/songs') {
        if (method !== 'GET') {
            sendError(res, 'Method Not Allowed', 405);
            return;
        }
        const files = await radio.store.list();
        sendJson(res, {
            songs: files.map((file) => file.name),
            files: files.map(({ name, createdAt, size }) => ({ name, createdAt, size })),
        });
        return;
    }

    // POST /play/:name
    if (pathname.startsWith('/play/')) {
        if (method !== 'POST' && method !== 'GET') {
            sendError(res, 'Method Not Allowed', 405);
            return;
        }
        const name = decodeParam(pathname.slice('/play/'.length));
        const snapshot = await radio.play(name);
        if (!snapshot) {
            sendError(res, `File not found: ${name}`, 404);
            return;
        }
        logger.info(`Replaying ${name}`, { generation: snapshot.generation });
        sendJson(res, { status: 'ok', message: `Now playing: ${name}`, generation: snapshot.generation });
        return;
    }

    sendError(res, 'Not Found', 404);
}
