/**
 * Centralized configuration management.
 *
 * Single source of truth for all configuration values,
 * loaded from environment variables with sensible defaults.
 *
 * Usage:
 *   import { config } from './core/config.js';
 *   const capacity = config.broadcast.bufferCapacity;
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import path from 'path';
import fs from 'fs';
import { projectRoot, resolveFromRoot } from './paths.js';

// Load environment variables from .env file
const envFile = path.join(projectRoot, '.env');

if (fs.existsSync(envFile)) {
  dotenv.config({ path: envFile, override: true });
} else {
  dotenv.config({ override: true });
}

/**
 * Sarvam AI text-to-speech configuration schema
 */
const sarvamConfigSchema = z.object({
  apiKey: z.string().optional(),
  ttsModel: z.string().default('bulbul:v2'),
  ttsSpeaker: z.string().default('anushka'),
  ttsPace: z.number().min(0.5).max(2.0).default(1.0),
  language: z.string().default('en-IN'),
});

/**
 * OpenAI speech configuration schema
 */
const openaiConfigSchema = z.object({
  apiKey: z.string().optional(),
  ttsModel: z.string().default('tts-1'),
  ttsVoice: z.string().default('alloy'),
});

/**
 * Speech synthesis and storage schema
 */
const speechConfigSchema = z.object({
  provider: z.enum(['sarvam', 'openai']).default('sarvam'),
  outputDir: z.string().min(1),
  retention: z.number().int().min(1).default(5),
  voicesFile: z.string().min(1),
  jobWaitMs: z.number().int().min(0).default(500),
});

/**
 * Broadcast engine schema (transcoder + ring buffer)
 */
const broadcastConfigSchema = z.object({
  backgroundAudioPath: z.string().min(1, 'BACKGROUND_AUDIO_PATH is required'),
  ffmpegPath: z.string().min(1).default('ffmpeg'),
  bitrate: z.string().regex(/^\d+k$/, 'STREAM_BITRATE must look like 128k').default('128k'),
  sampleRate: z.number().int().positive().default(44100),
  channels: z.number().int().min(1).max(2).default(2),
  chunkSize: z.number().int().positive().default(4096),
  bufferCapacity: z.number().int().min(2).default(256),
  restartBackoffMs: z.number().int().min(0).default(1000),
  killGraceMs: z.number().int().min(0).default(2000),
  listenerWaitMs: z.number().int().positive().default(1000),
});

/**
 * Main application configuration schema
 */
const appConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(5002),
  sarvam: sarvamConfigSchema,
  openai: openaiConfigSchema,
  speech: speechConfigSchema,
  broadcast: broadcastConfigSchema,
  isDevelopment: z.boolean(),
  logLevel: z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR']).default('INFO'),
});

const fromRoot = (value: string): string => resolveFromRoot(value);

/**
 * Parse and validate configuration from environment variables
 */
function loadConfig() {
  try {
    const rawConfig = {
      port: parseInt(process.env.PORT || '5002', 10),
      sarvam: {
        apiKey: process.env.SARVAM_API_KEY || undefined,
        ttsModel: process.env.SARVAM_TTS_MODEL || 'bulbul:v2',
        ttsSpeaker: process.env.SARVAM_TTS_SPEAKER || 'anushka',
        ttsPace: parseFloat(process.env.SARVAM_TTS_PACE || '1.0'),
        language: process.env.SARVAM_LANGUAGE || 'en-IN',
      },
      openai: {
        apiKey: process.env.OPENAI_API_KEY || undefined,
        ttsModel: process.env.OPENAI_TTS_MODEL || 'tts-1',
        ttsVoice: process.env.OPENAI_TTS_VOICE || 'alloy',
      },
      speech: {
        provider: process.env.TTS_PROVIDER || 'sarvam',
        outputDir: fromRoot(process.env.SPEECH_OUTPUT_DIR || 'tts'),
        retention: parseInt(process.env.SPEECH_RETENTION || '5', 10),
        voicesFile: fromRoot(process.env.VOICES_FILE || 'voices.json'),
        jobWaitMs: parseInt(process.env.JOB_WAIT_MS || '500', 10),
      },
      broadcast: {
        backgroundAudioPath: fromRoot(process.env.BACKGROUND_AUDIO_PATH || 'assets/background.mp3'),
        ffmpegPath: process.env.FFMPEG_PATH || 'ffmpeg',
        bitrate: process.env.STREAM_BITRATE || '128k',
        sampleRate: parseInt(process.env.STREAM_SAMPLE_RATE || '44100', 10),
        channels: parseInt(process.env.STREAM_CHANNELS || '2', 10),
        chunkSize: parseInt(process.env.CHUNK_SIZE || '4096', 10),
        bufferCapacity: parseInt(process.env.BUFFER_CAPACITY || '256', 10),
        restartBackoffMs: parseInt(process.env.RESTART_BACKOFF_MS || '1000', 10),
        killGraceMs: parseInt(process.env.KILL_GRACE_MS || '2000', 10),
        listenerWaitMs: parseInt(process.env.LISTENER_WAIT_MS || '1000', 10),
      },
      isDevelopment: process.env.NODE_ENV !== 'production',
      logLevel: (process.env.LOG_LEVEL || 'INFO').toUpperCase(),
    };

    return appConfigSchema.parse(rawConfig);
  } catch (error: unknown) {
    if (error instanceof z.ZodError) {
      console.error('\n' + '='.repeat(60));
      console.error('❌ Configuration validation failed!');
      console.error('='.repeat(60));
      error.errors.forEach((err: z.ZodIssue) => {
        console.error(`  ${err.path.join('.')}: ${err.message}`);
      });
      console.error('='.repeat(60) + '\n');
      throw new Error('Invalid configuration. Please check your environment variables.');
    }
    throw error;
  }
}

/**
 * Validated application configuration
 */
export const config = loadConfig();

/**
 * Type exports for configuration
 */
export type SarvamConfig = z.infer<typeof sarvamConfigSchema>;
export type OpenAIConfig = z.infer<typeof openaiConfigSchema>;
export type SpeechConfig = z.infer<typeof speechConfigSchema>;
export type BroadcastConfig = z.infer<typeof broadcastConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;
