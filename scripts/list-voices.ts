/**
 * Voice Listing Script
 *
 * Prints every voice id the TTS providers offer, as a voices.json-shaped
 * map per provider, or writes one provider's map to a file.
 *
 * Usage:
 *   npx tsx scripts/list-voices.ts
 *   npx tsx scripts/list-voices.ts openai all_voices.json
 */

import fs from 'fs';
import { ENGINE_VOICES } from '../src/plugins/factory.js';
import type { TTSProvider } from '../src/plugins/types.js';

function isProvider(value: string): value is TTSProvider {
  return Object.prototype.hasOwnProperty.call(ENGINE_VOICES, value);
}

function voiceMap(voices: readonly string[]): Record<string, string> {
  return Object.fromEntries(voices.map((voice) => [voice, voice]));
}

const [provider, outFile] = process.argv.slice(2);

if (provider === undefined) {
  for (const [name, voices] of Object.entries(ENGINE_VOICES)) {
    console.log(`\n🎙️  ${name} (${voices.length} voices)`);
    console.log(JSON.stringify(voiceMap(voices), null, 2));
  }
  process.exit(0);
}

if (!isProvider(provider)) {
  console.error(`❌ Unknown provider "${provider}". Expected one of: ${Object.keys(ENGINE_VOICES).join(', ')}`);
  process.exit(1);
}

const document = JSON.stringify(voiceMap(ENGINE_VOICES[provider]), null, 2);
if (outFile) {
  fs.writeFileSync(outFile, `${document}\n`, 'utf-8');
  console.log(`✅ Wrote ${ENGINE_VOICES[provider].length} ${provider} voices to ${outFile}`);
} else {
  console.log(document);
}
