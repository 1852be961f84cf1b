/**
 * Plugin Type Definitions
 *
 * Defines the text-to-speech engine contract so providers can be
 * swapped via the factory without touching the synthesis worker.
 *
 * @module plugins/types
 */

// ============================================
// ENGINE CONTRACT
// ============================================

/**
 * An opaque speech synthesis capability: text + voice in, audio file bytes out.
 * Implementations throw `SynthesisError` on failure (unknown voice,
 * service/network failure, empty text).
 */
export interface SynthesisEngine {
  /** Provider label used in logs */
  readonly name: string;
  /** Voice used when the registry offers none */
  readonly defaultVoice: string;
  /** File extension of the produced audio, without the dot */
  readonly audioExtension: string;
  /** Voice ids the provider accepts; absent when it takes any id */
  readonly voices?: readonly string[];

  synthesize(text: string, voiceId: string, signal?: AbortSignal): Promise<Buffer>;
}

// ============================================
// PROVIDER TYPES
// ============================================

/**
 * Available TTS providers
 * - 'sarvam': Sarvam AI REST text-to-speech (WAV)
 * - 'openai': OpenAI speech endpoint (MP3)
 */
export type TTSProvider = 'sarvam' | 'openai';

/**
 * Text-to-Speech plugin configuration
 */
export interface TTSConfig {
  /** API key for the provider */
  apiKey?: string;
  /** Language code (e.g., 'en-IN', 'hi-IN'); ignored by providers without one */
  language?: string;
  /** Default voice/speaker identifier */
  speaker?: string;
  /** Model identifier */
  model?: string;
  /** Speech pace (0.5 to 2.0) */
  pace?: number;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Factory configuration for creating the engine
 */
export interface EngineFactoryConfig {
  provider: TTSProvider;
  sarvam?: TTSConfig;
  openai?: TTSConfig;
}
