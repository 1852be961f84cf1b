/**
 * Sarvam AI Text-to-Speech engine
 *
 * Calls the REST synthesis endpoint and returns a WAV file for the
 * transcoder to pick up.
 */

import axios, { type AxiosInstance } from 'axios';
import { getLogger } from '../core/logging.js';
import { SynthesisError } from '../core/exceptions.js';
import type { SynthesisEngine } from './types.js';

const logger = getLogger('sarvam.tts');

const SARVAM_TTS_URL = 'https://api.sarvam.ai/text-to-speech';
const SAMPLE_RATE = 22050;
const MAX_INPUT_CHARS = 1500;

/**
 * Normalize text for Sarvam TTS API
 * Replaces Unicode characters that Sarvam doesn't support with ASCII equivalents
 */
export function normalizeTextForTTS(text: string): string {
  return text
    // Curly apostrophes/single quotes to straight apostrophe
    .replace(/[\u2018\u2019\u201A\u201B\u2032\u2035]/g, "'")
    // Curly double quotes to straight double quotes
    .replace(/[\u201C\u201D\u201E\u201F\u2033\u2036]/g, '"')
    // Various dashes to hyphen
    .replace(/[\u2013\u2014\u2015]/g, '-')
    // Ellipsis to three dots
    .replace(/\u2026/g, '...')
    // Non-breaking space to regular space
    .replace(/\u00A0/g, ' ')
    // Remove zero-width characters
    .replace(/[\u200B\u200C\u200D\uFEFF]/g, '')
    .trim();
}

export type SarvamTTSLanguage =
  | 'bn-IN' | 'en-IN' | 'gu-IN' | 'hi-IN' | 'kn-IN'
  | 'ml-IN' | 'mr-IN' | 'od-IN' | 'pa-IN' | 'ta-IN' | 'te-IN';

export const SARVAM_SPEAKERS = [
  'anushka',  // Female voice (default for v2)
  'manisha',  // Female voice
  'vidya',    // Female voice
  'arya',     // Female voice
  'abhilash', // Male voice
  'karun',    // Male voice
  'hitesh',   // Male voice
] as const;

export type SarvamTTSSpeaker = (typeof SARVAM_SPEAKERS)[number];

export interface SarvamTTSOptions {
  apiKey: string;
  languageCode: SarvamTTSLanguage | string;
  speaker?: SarvamTTSSpeaker | string;
  model?: string;
  pace?: number;   // 0.5 to 2.0
  timeoutMs?: number;
  /** Injected HTTP client (tests) */
  http?: AxiosInstance;
}

interface SarvamTTSResponse {
  request_id?: string;
  audios: string[];
}

function isSarvamResponse(data: unknown): data is SarvamTTSResponse {
  return (
    typeof data === 'object' &&
    data !== null &&
    'audios' in data &&
    Array.isArray(data.audios) &&
    data.audios.every((audio: unknown) => typeof audio === 'string')
  );
}

export class SarvamTTS implements SynthesisEngine {
  readonly name = 'sarvam';
  readonly audioExtension = 'wav';
  readonly defaultVoice: string;

  private readonly apiKey: string;
  private readonly languageCode: string;
  private readonly model: string;
  private readonly pace: number;
  private readonly http: AxiosInstance;

  constructor(options: SarvamTTSOptions) {
    this.apiKey = options.apiKey;
    this.languageCode = options.languageCode;
    this.defaultVoice = options.speaker || 'anushka';
    this.model = options.model || 'bulbul:v2';
    this.pace = options.pace ?? 1.0;
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 30_000 });

    logger.info(`SarvamTTS initialized: model=${this.model}, speaker=${this.defaultVoice}, language=${this.languageCode}`);
  }

  async synthesize(text: string, voiceId: string, signal?: AbortSignal): Promise<Buffer> {
    const input = normalizeTextForTTS(text);
    if (!input) {
      throw new SynthesisError('Cannot synthesize empty text', { provider: this.name });
    }
    if (input.length > MAX_INPUT_CHARS) {
      throw new SynthesisError(`Text exceeds ${MAX_INPUT_CHARS} characters`, { provider: this.name });
    }

    const startTime = Date.now();
    try {
      const response = await this.http.post<unknown>(
        SARVAM_TTS_URL,
        {
          inputs: [input],
          target_language_code: this.languageCode,
          speaker: voiceId,
          model: this.model,
          pace: this.pace,
          speech_sample_rate: SAMPLE_RATE,
          enable_preprocessing: true,
        },
        {
          headers: {
            'api-subscription-key': this.apiKey,
            'Content-Type': 'application/json',
          },
          signal,
        },
      );

      if (!isSarvamResponse(response.data) || response.data.audios.length === 0) {
        throw new SynthesisError('Sarvam returned no audio', { provider: this.name, statusCode: response.status });
      }

      const audio = Buffer.concat(response.data.audios.map((b64) => Buffer.from(b64, 'base64')));
      logger.debug('Sarvam synthesis complete', {
        requestId: response.data.request_id,
        bytes: audio.length,
        latencyMs: Date.now() - startTime,
      });
      return audio;
    } catch (error) {
      if (error instanceof SynthesisError) throw error;
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const detail = describeSarvamError(error.response?.data) ?? error.message;
        throw new SynthesisError(`Sarvam TTS request failed: ${detail}`, {
          provider: this.name,
          statusCode: status,
          cause: error,
        });
      }
      throw new SynthesisError('Sarvam TTS request failed', { provider: this.name, cause: error });
    }
  }
}

function describeSarvamError(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null || !('error' in data)) return undefined;
  const { error } = data;
  if (typeof error === 'string') return error;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return undefined;
}
