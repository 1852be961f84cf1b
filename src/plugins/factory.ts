/**
 * Plugin Factory
 *
 * Creates the speech synthesis engine based on configuration.
 * Enables provider swapping without modifying the synthesis worker.
 *
 * Usage:
 * ```typescript
 * const engine = createSynthesisEngine({
 *   provider: 'sarvam',
 *   sarvam: { apiKey: process.env.SARVAM_API_KEY, language: 'en-IN' },
 * });
 * ```
 *
 * @module plugins/factory
 */

import { SarvamTTS, SARVAM_SPEAKERS } from './sarvam_tts.js';
import { OpenAITTS, OPENAI_VOICES } from './openai_tts.js';
import { logger } from '../core/logging.js';
import { ConfigurationError } from '../core/exceptions.js';
import type { SpeechConfig, SarvamConfig, OpenAIConfig } from '../core/config.js';
import type { EngineFactoryConfig, SynthesisEngine, TTSConfig, TTSProvider } from './types.js';

// ============================================
// DEFAULT CONFIGURATIONS
// ============================================

const DEFAULT_SARVAM_CONFIG: Partial<TTSConfig> = {
  model: 'bulbul:v2',
  speaker: 'anushka',
  language: 'en-IN',
  pace: 1.0,
};

const DEFAULT_OPENAI_CONFIG: Partial<TTSConfig> = {
  model: 'tts-1',
  speaker: 'alloy',
};

/**
 * Voice ids each provider is known to offer
 */
export const ENGINE_VOICES: Record<TTSProvider, readonly string[]> = {
  sarvam: SARVAM_SPEAKERS,
  openai: OPENAI_VOICES,
};

// ============================================
// FACTORY FUNCTIONS
// ============================================

/**
 * Create the TTS engine for the configured provider
 */
export function createSynthesisEngine(factoryConfig: EngineFactoryConfig): SynthesisEngine {
  switch (factoryConfig.provider) {
    case 'sarvam': {
      const ttsConfig: Partial<TTSConfig> = { ...DEFAULT_SARVAM_CONFIG, ...factoryConfig.sarvam };
      if (!ttsConfig.apiKey) throw new ConfigurationError('SARVAM_API_KEY is required for the sarvam TTS provider');
      logger.info('Creating TTS engine', { provider: 'sarvam', speaker: ttsConfig.speaker, model: ttsConfig.model });
      return new SarvamTTS({
        apiKey: ttsConfig.apiKey,
        languageCode: ttsConfig.language ?? 'en-IN',
        speaker: ttsConfig.speaker,
        model: ttsConfig.model,
        pace: ttsConfig.pace,
        timeoutMs: ttsConfig.timeoutMs,
      });
    }

    case 'openai': {
      const ttsConfig: Partial<TTSConfig> = { ...DEFAULT_OPENAI_CONFIG, ...factoryConfig.openai };
      if (!ttsConfig.apiKey) throw new ConfigurationError('OPENAI_API_KEY is required for the openai TTS provider');
      logger.info('Creating TTS engine', { provider: 'openai', voice: ttsConfig.speaker, model: ttsConfig.model });
      return new OpenAITTS({
        apiKey: ttsConfig.apiKey,
        model: ttsConfig.model,
        voice: ttsConfig.speaker,
        timeoutMs: ttsConfig.timeoutMs,
      });
    }

    default: {
      const unsupported: never = factoryConfig.provider;
      throw new ConfigurationError(`Unsupported TTS provider: ${String(unsupported)}`);
    }
  }
}

/**
 * Create the engine from the validated application config
 */
export function createSynthesisEngineFromConfig(
  speech: Pick<SpeechConfig, 'provider'>,
  sarvam: SarvamConfig,
  openai: OpenAIConfig,
): SynthesisEngine {
  return createSynthesisEngine({
    provider: speech.provider,
    sarvam: {
      apiKey: sarvam.apiKey,
      language: sarvam.language,
      speaker: sarvam.ttsSpeaker,
      model: sarvam.ttsModel,
      pace: sarvam.ttsPace,
    },
    openai: {
      apiKey: openai.apiKey,
      model: openai.ttsModel,
      speaker: openai.ttsVoice,
    },
  });
}
