/**
 * Environment Validation Script
 * 
 * Checks the TTS provider credentials, the background track, the speech
 * directories and FFmpeg before the radio goes on air.
 * 
 * Usage:
 *   npx tsx scripts/validate-environment.ts
 */

import dotenv from 'dotenv';
import { execFileSync } from 'child_process';
import fs from 'fs';
import path from 'path';
import { projectRoot, resolveFromRoot } from '../src/core/paths.js';

const envFile = path.join(projectRoot, '.env');
dotenv.config(fs.existsSync(envFile) ? { path: envFile, override: true } : { override: true });

type CheckStatus = 'pass' | 'fail' | 'warn';

interface CheckResult {
  name: string;
  status: CheckStatus;
  message: string;
  required: boolean;
}

interface ValidationResult {
  category: string;
  checks: CheckResult[];
}

const results: ValidationResult[] = [];

function printChecks(checks: CheckResult[], width: number): void {
  checks.forEach(check => {
    const icon = check.status === 'pass' ? '✅' : check.status === 'fail' ? '❌' : '⚠️';
    const required = check.required ? '[REQUIRED]' : '[OPTIONAL]';
    console.log(`${icon} ${check.name.padEnd(width)} ${required.padEnd(12)} ${check.message}`);
  });
}

const fromRoot = (value: string): string => resolveFromRoot(value);

// ============================================
// 1. ENVIRONMENT VARIABLES VALIDATION
// ============================================

console.log('\n🔍 Validating Environment Variables...\n');

const provider = process.env.TTS_PROVIDER || 'sarvam';

const envChecks: Array<{ name: string; required: boolean; validate: (value: string | undefined) => { status: CheckStatus; message: string } }> = [
  {
    name: 'TTS_PROVIDER',
    required: false,
    validate: (value) => {
      const selected = value || 'sarvam';
      if (selected !== 'sarvam' && selected !== 'openai') {
        return { status: 'fail', message: `Unsupported provider "${selected}" (sarvam | openai)` };
      }
      return { status: 'pass', message: `✅ ${selected}` };
    },
  },
  {
    name: 'SARVAM_API_KEY',
    required: provider === 'sarvam',
    validate: (value) => {
      if (!value) {
        return provider === 'sarvam'
          ? { status: 'fail', message: 'Missing - Required for Sarvam TTS' }
          : { status: 'warn', message: 'Not set - only needed with TTS_PROVIDER=sarvam' };
      }
      return { status: 'pass', message: '✅ Configured' };
    },
  },
  {
    name: 'OPENAI_API_KEY',
    required: provider === 'openai',
    validate: (value) => {
      if (!value) {
        return provider === 'openai'
          ? { status: 'fail', message: 'Missing - Required for OpenAI TTS' }
          : { status: 'warn', message: 'Not set - only needed with TTS_PROVIDER=openai' };
      }
      return { status: 'pass', message: '✅ Configured' };
    },
  },
  {
    name: 'STREAM_BITRATE',
    required: false,
    validate: (value) => {
      const bitrate = value || '128k';
      if (!/^\d+k$/.test(bitrate)) return { status: 'fail', message: 'Must look like 128k' };
      return { status: 'pass', message: `✅ ${bitrate}` };
    },
  },
  {
    name: 'PORT',
    required: false,
    validate: (value) => {
      const port = parseInt(value || '5002', 10);
      if (isNaN(port) || port < 1 || port > 65535) {
        return { status: 'fail', message: 'Invalid port number' };
      }
      return { status: 'pass', message: `✅ Port ${port}` };
    },
  },
];

const envResults: ValidationResult = {
  category: 'Environment Variables',
  checks: envChecks.map(check => ({
    name: check.name,
    required: check.required,
    ...check.validate(process.env[check.name]),
  })),
};

results.push(envResults);
printChecks(envResults.checks, 30);

// ============================================
// 2. FILE SYSTEM CHECKS
// ============================================

console.log('\n🔍 Validating File System...\n');

const backgroundPath = fromRoot(process.env.BACKGROUND_AUDIO_PATH || 'assets/background.mp3');
const speechDir = fromRoot(process.env.SPEECH_OUTPUT_DIR || 'tts');
const voicesFile = fromRoot(process.env.VOICES_FILE || 'voices.json');

function checkBackground(): CheckResult {
  const name = 'Background audio';
  if (!fs.existsSync(backgroundPath)) {
    return { name, status: 'fail', message: `Missing - ${backgroundPath}`, required: true };
  }
  if (!fs.statSync(backgroundPath).isFile()) {
    return { name, status: 'fail', message: `Not a file - ${backgroundPath}`, required: true };
  }
  return { name, status: 'pass', message: `✅ ${backgroundPath}`, required: true };
}

function checkWritableDir(name: string, dir: string): CheckResult {
  // Created on startup when missing; only the parent must be writable then
  const target = fs.existsSync(dir) ? dir : path.dirname(dir);
  try {
    fs.accessSync(target, fs.constants.W_OK);
    return { name, status: 'pass', message: `✅ ${dir}`, required: true };
  } catch {
    return { name, status: 'fail', message: `Not writable - ${target}`, required: true };
  }
}

function checkVoices(): CheckResult {
  const name = 'Voice registry';
  if (!fs.existsSync(voicesFile)) {
    return { name, status: 'warn', message: `Not found - will be created at ${voicesFile}`, required: false };
  }
  try {
    const doc: unknown = JSON.parse(fs.readFileSync(voicesFile, 'utf-8'));
    if (typeof doc !== 'object' || doc === null || !('default' in doc) || typeof doc.default !== 'string') {
      return { name, status: 'fail', message: 'Missing a string "default" entry', required: true };
    }
    return { name, status: 'pass', message: `✅ ${Object.keys(doc).length} voices`, required: true };
  } catch {
    return { name, status: 'fail', message: 'Not valid JSON', required: true };
  }
}

const fileResults: ValidationResult = {
  category: 'File System',
  checks: [
    checkBackground(),
    checkWritableDir('Speech output directory', speechDir),
    checkWritableDir('Voice registry directory', path.dirname(voicesFile)),
    checkVoices(),
  ],
};

results.push(fileResults);
printChecks(fileResults.checks, 40);

// ============================================
// 3. SYSTEM DEPENDENCIES
// ============================================

console.log('\n🔍 Validating System Dependencies...\n');

function checkCommand(cmd: string, versionFlag: string): boolean {
  try {
    execFileSync(cmd, [versionFlag], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

const depChecks = [
  {
    name: 'FFmpeg',
    required: true,
    command: process.env.FFMPEG_PATH || 'ffmpeg',
    versionFlag: '-version',
    message: 'Transcoder for the live stream',
  },
];

const depResults: ValidationResult = {
  category: 'System Dependencies',
  checks: depChecks.map(check => {
    const exists = checkCommand(check.command, check.versionFlag);
    return {
      name: check.name,
      status: exists ? 'pass' : (check.required ? 'fail' : 'warn'),
      message: exists ? `✅ ${check.message}` : `Not found (${check.command}) - ${check.message}`,
      required: check.required,
    };
  }),
};

results.push(depResults);
printChecks(depResults.checks, 20);

// ============================================
// SUMMARY
// ============================================

console.log('\n' + '='.repeat(80));
console.log('📊 VALIDATION SUMMARY');
console.log('='.repeat(80) + '\n');

const allChecks = results.flatMap(result => result.checks);
const passedChecks = allChecks.filter(check => check.status === 'pass').length;
const failedChecks = allChecks.filter(check => check.status === 'fail');
const warnChecks = allChecks.filter(check => check.status === 'warn');
const criticalFailures = failedChecks.filter(check => check.required);

console.log(`Total Checks: ${allChecks.length}`);
console.log(`✅ Passed: ${passedChecks}`);
console.log(`❌ Failed: ${failedChecks.length} (${criticalFailures.length} critical)`);
console.log(`⚠️  Warnings: ${warnChecks.length}`);

console.log('\n' + '='.repeat(80));

if (criticalFailures.length > 0) {
  console.log('❌ VALIDATION FAILED - Critical issues found!');
  console.log('\nCritical failures:');
  criticalFailures.forEach(check => console.log(`  ❌ ${check.name}: ${check.message}`));
  console.log('\n⚠️  Fix critical issues before starting the radio!\n');
  process.exit(1);
} else if (warnChecks.length > 0) {
  console.log('⚠️  VALIDATION PASSED WITH WARNINGS');
  console.log('\nOptional improvements:');
  warnChecks.forEach(check => console.log(`  ⚠️  ${check.name}: ${check.message}`));
  console.log('\n✅ Radio can start.\n');
  process.exit(0);
} else {
  console.log('✅ ALL CHECKS PASSED!');
  console.log('\n🚀 Environment is ready. You can start the radio with:');
  console.log('   npm run dev    (development)');
  console.log('   npm start      (production)\n');
  process.exit(0);
}
