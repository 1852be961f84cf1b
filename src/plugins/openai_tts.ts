/**
 * OpenAI speech engine
 *
 * Uses the audio/speech endpoint and returns an MP3 file.
 */

import OpenAI from 'openai';
import { getLogger } from '../core/logging.js';
import { SynthesisError } from '../core/exceptions.js';
import type { SynthesisEngine } from './types.js';

const logger = getLogger('openai.tts');

/** Character limit of the speech endpoint */
const MAX_INPUT_CHARS = 4096;

export const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
export type OpenAIVoice = (typeof OPENAI_VOICES)[number];

export function isOpenAIVoice(voice: string): voice is OpenAIVoice {
  return (OPENAI_VOICES as readonly string[]).includes(voice);
}

export interface OpenAITTSOptions {
  apiKey: string;
  model?: string;
  voice?: string;
  timeoutMs?: number;
  /** Injected client (tests) */
  client?: OpenAI;
}

export class OpenAITTS implements SynthesisEngine {
  readonly name = 'openai';
  readonly audioExtension = 'mp3';
  readonly voices = OPENAI_VOICES;
  readonly defaultVoice: string;

  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAITTSOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs ?? 30_000 });
    this.model = options.model || 'tts-1';
    this.defaultVoice = options.voice || 'alloy';

    logger.info(`OpenAITTS initialized: model=${this.model}, voice=${this.defaultVoice}`);
  }

  async synthesize(text: string, voiceId: string, signal?: AbortSignal): Promise<Buffer> {
    const input = text.trim();
    if (!input) {
      throw new SynthesisError('Cannot synthesize empty text', { provider: this.name });
    }
    if (input.length > MAX_INPUT_CHARS) {
      throw new SynthesisError(`Text exceeds ${MAX_INPUT_CHARS} characters`, { provider: this.name });
    }
    if (!isOpenAIVoice(voiceId)) {
      throw new SynthesisError(`Voice not recognized by OpenAI: ${voiceId}`, { provider: this.name });
    }

    const startTime = Date.now();
    try {
      const response = await this.client.audio.speech.create(
        { model: this.model, voice: voiceId, input, response_format: 'mp3' },
        { signal },
      );
      const audio = Buffer.from(await response.arrayBuffer());
      logger.debug('OpenAI synthesis complete', { bytes: audio.length, latencyMs: Date.now() - startTime });
      return audio;
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        throw new SynthesisError(`OpenAI TTS request failed: ${error.message}`, {
          provider: this.name,
          statusCode: error.status,
          cause: error,
        });
      }
      throw new SynthesisError('OpenAI TTS request failed', { provider: this.name, cause: error });
    }
  }
}
