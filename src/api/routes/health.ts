/**
 * Health Routes
 * 
 * Endpoints:
 * - GET / - Root info
 * - GET /health - Liveness check
 * - GET /ready - Readiness check (engine running, background file present)
 * - GET /metrics - Prometheus metrics
 */

import fs from 'fs';
import { RequestContext, sendJson, sendError } from '../server.js';
import { config } from '../../core/config.js';

const moduleStartTime = Date.now();

export async function handleHealthRoutes(ctx: RequestContext): Promise<void> {
    const { pathname, method, res, deps } = ctx;
    const startTime = deps.startedAt ?? moduleStartTime;

    if (method !== 'GET') {
        sendError(res, 'Method Not Allowed', 405);
        return;
    }
    
    if (pathname === '/') {
        sendJson(res, {
            service: 'speech-radio',
            version: '1.0.0',
            status: 'running',
            environment: config.isDevelopment ? 'development' : 'production',
            stream: '/stream',
            documentation: '/health',
        });
        return;
    }
    
    if (pathname === '/health') {
        sendJson(res, {
            status: 'healthy',
            timestamp: new Date().toISOString(),
        });
        return;
    }
    
    if (pathname === '/ready') {
        const status = deps.radio.status();
        const backgroundPresent = fs.existsSync(deps.radio.selector.backgroundPath);
        const checks: Record<string, string> = {
            service: status.running ? 'running' : 'stopped',
            transcoder: status.pipeline.running ? 'running' : 'stopped',
            background: backgroundPresent ? 'present' : 'missing',
            source: status.source.kind,
        };
        const isHealthy = status.running && status.pipeline.running && backgroundPresent;
        
        sendJson(res, {
            status: isHealthy ? 'healthy' : 'unhealthy',
            timestamp: new Date().toISOString(),
            uptime: Math.floor((Date.now() - startTime) / 1000),
            checks,
            listeners: status.listeners,
        }, isHealthy ? 200 : 503);
        return;
    }
    
    if (pathname === '/metrics') {
        const uptime = Math.floor((Date.now() - startTime) / 1000);
        const status = deps.radio.status();
        const metrics = [
            '# HELP radio_uptime_seconds Service uptime in seconds',
            '# TYPE radio_uptime_seconds gauge',
            `radio_uptime_seconds ${uptime}`,
            '# HELP radio_listeners Connected listeners',
            '# TYPE radio_listeners gauge',
            `radio_listeners ${status.listeners}`,
            '# HELP radio_chunks_total Chunks appended to the broadcast buffer',
            '# TYPE radio_chunks_total counter',
            `radio_chunks_total ${status.nextSequence}`,
            '# HELP radio_transcoder_restarts_total Transcoder runs started',
            '# TYPE radio_transcoder_restarts_total counter',
            `radio_transcoder_restarts_total ${status.pipeline.restarts}`,
            '# HELP radio_transcoder_failures_total Transcoder runs that failed',
            '# TYPE radio_transcoder_failures_total counter',
            `radio_transcoder_failures_total ${status.pipeline.failures}`,
            '# HELP radio_speech_abandoned_total Speech sources dropped after failed transcodes',
            '# TYPE radio_speech_abandoned_total counter',
            `radio_speech_abandoned_total ${status.pipeline.abandoned}`,
            '# HELP radio_synthesis_pending Queued synthesis jobs',
            '# TYPE radio_synthesis_pending gauge',
            `radio_synthesis_pending ${status.jobs.pending}`,
            '# HELP radio_synthesis_processed_total Synthesis jobs processed',
            '# TYPE radio_synthesis_processed_total counter',
            `radio_synthesis_processed_total ${status.jobs.processed}`,
            '# HELP radio_synthesis_failed_total Synthesis jobs failed',
            '# TYPE radio_synthesis_failed_total counter',
            `radio_synthesis_failed_total ${status.jobs.failed}`,
        ];
        
        res.writeHead(200, { 'Content-Type': 'text/plain' });
        res.end(metrics.join('\n') + '\n');
        return;
    }
}
