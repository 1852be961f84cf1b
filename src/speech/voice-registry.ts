/**
 * Voice Registry
 *
 * Persisted mapping from logical voice names to engine voice identifiers.
 * Every write rewrites the whole JSON document atomically.
 *
 * Resolution precedence (one code path, see `resolve`):
 *   1. a supplied, registered name  -> its identifier
 *   2. no name supplied             -> the registry `default` entry
 *   3. no usable registry default   -> the engine's default voice
 * A supplied name that is not registered is a ValidationError.
 *
 * @module speech/voice-registry
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { getLogger } from '../core/logging.js';
import { ConfigurationError, ValidationError } from '../core/exceptions.js';
import { isNotFound, writeFileAtomic } from '../utils/atomic-file.js';
import type { VoiceMap } from './types.js';

const logger = getLogger('speech.voices');

export const DEFAULT_VOICE_NAME = 'default';

const voiceNameSchema = z
  .string()
  .trim()
  .min(1, 'Voice name is required')
  .max(64, 'Voice name is too long')
  .regex(/^[\w.-]+$/, 'Voice name may only contain letters, digits, "_", "-" and "."');

const voiceIdSchema = z.string().trim().min(1, 'Voice identifier is required').max(128);

const voiceDocumentSchema = z
  .record(z.string(), voiceIdSchema)
  .refine((doc) => typeof doc[DEFAULT_VOICE_NAME] === 'string', {
    message: `Voice document must contain a "${DEFAULT_VOICE_NAME}" entry`,
  });

export interface ResolvedVoice {
  /** Name the caller asked for, if any */
  name?: string;
  voiceId: string;
  tier: 'named' | 'registry-default' | 'engine-default';
}

export class VoiceRegistry {
  private voices: Record<string, string> = {};
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly engineDefaultVoice: string,
    private readonly supportedVoices?: readonly string[],
  ) {}

  /**
   * Load the document; a missing file is created with just `default`.
   */
  async load(): Promise<VoiceMap> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!isNotFound(error)) throw error;
      logger.info(`Voice document not found, creating ${this.filePath}`);
      this.voices = { [DEFAULT_VOICE_NAME]: this.engineDefaultVoice };
      await this.persist(this.voices);
      return this.all();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new ConfigurationError(`Voice document is not valid JSON: ${this.filePath}`);
    }

    const result = voiceDocumentSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
      throw new ConfigurationError(`Invalid voice document ${this.filePath}: ${issues}`);
    }
    this.voices = result.data;
    logger.info(`Loaded ${Object.keys(this.voices).length} voices`);
    for (const name of this.unsupported()) {
      logger.warning(`Voice "${name}" (${this.voices[name]}) is not offered by the configured engine; synthesis with it will fail`);
    }
    return this.all();
  }

  all(): VoiceMap {
    return {
      ...this.voices,
      [DEFAULT_VOICE_NAME]: this.voices[DEFAULT_VOICE_NAME] ?? this.engineDefaultVoice,
    };
  }

  /**
   * Names whose voice id the engine does not offer. Always empty for
   * engines that take any id.
   */
  unsupported(): string[] {
    const supported = this.supportedVoices;
    if (!supported) return [];
    return Object.entries(this.voices)
      .filter(([, voiceId]) => !supported.includes(voiceId))
      .map(([name]) => name);
  }

  get(name: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(this.voices, name) ? this.voices[name] : undefined;
  }

  resolve(name?: string): ResolvedVoice {
    const requested = name?.trim();
    if (requested) {
      const voiceId = this.get(requested);
      if (voiceId === undefined) {
        throw new ValidationError(`Unknown voice: ${requested}`, 'voice');
      }
      return { name: requested, voiceId, tier: 'named' };
    }

    const registryDefault = this.get(DEFAULT_VOICE_NAME);
    if (registryDefault) {
      return { voiceId: registryDefault, tier: 'registry-default' };
    }
    return { voiceId: this.engineDefaultVoice, tier: 'engine-default' };
  }

  /**
   * Add or replace a voice and persist the whole document.
   */
  async register(name: string, voiceId: string): Promise<VoiceMap> {
    const parsedName = voiceNameSchema.safeParse(name);
    if (!parsedName.success) {
      throw new ValidationError(parsedName.error.errors[0]?.message ?? 'Invalid voice name', 'name');
    }
    const parsedId = voiceIdSchema.safeParse(voiceId);
    if (!parsedId.success) {
      throw new ValidationError(parsedId.error.errors[0]?.message ?? 'Invalid voice identifier', 'value');
    }

    return this.update((voices) => ({ ...voices, [parsedName.data]: parsedId.data }));
  }

  /**
   * Point `default` at an existing voice.
   */
  async use(name: string): Promise<VoiceMap> {
    const voiceId = this.get(name);
    if (voiceId === undefined) {
      throw new ValidationError(`Unknown voice: ${name}`, 'name');
    }
    logger.info(`Default voice is now ${name} (${voiceId})`);
    return this.update((voices) => ({ ...voices, [DEFAULT_VOICE_NAME]: voiceId }));
  }

  private update(change: (voices: Record<string, string>) => Record<string, string>): Promise<VoiceMap> {
    const next = this.writeChain.then(async () => {
      const voices = change(this.voices);
      await this.persist(voices);
      this.voices = voices;
      return this.all();
    });
    this.writeChain = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private async persist(voices: Record<string, string>): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFileAtomic(this.filePath, JSON.stringify(voices, null, 2) + '\n');
  }
}
