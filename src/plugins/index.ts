/**
 * Plugins Module
 *
 * Exports the speech synthesis engines and the factory that picks one.
 *
 * @module plugins
 */

// Plugin implementations
export { SarvamTTS, SARVAM_SPEAKERS, normalizeTextForTTS } from './sarvam_tts.js';
export type { SarvamTTSOptions, SarvamTTSLanguage, SarvamTTSSpeaker } from './sarvam_tts.js';

export { OpenAITTS, OPENAI_VOICES, isOpenAIVoice } from './openai_tts.js';
export type { OpenAITTSOptions, OpenAIVoice } from './openai_tts.js';

// Factory
export { createSynthesisEngine, createSynthesisEngineFromConfig, ENGINE_VOICES } from './factory.js';

// Types
export type { SynthesisEngine, TTSProvider, TTSConfig, EngineFactoryConfig } from './types.js';
