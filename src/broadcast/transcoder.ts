/**
 * FFmpeg transcoder process
 *
 * Turns any audio file into a real-time paced, constant-bitrate MP3 byte
 * stream on stdout.
 *
 * @module broadcast/transcoder
 */

import { spawn } from 'child_process';
import { getLogger } from '../core/logging.js';
import type { TranscoderExit, TranscoderFactory, TranscoderOptions, TranscoderProcess } from './types.js';

const logger = getLogger('broadcast.ffmpeg');

export function buildFfmpegArgs(inputPath: string, options: TranscoderOptions): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-re',
    '-i', inputPath,
    '-vn',
    '-acodec', 'libmp3lame',
    '-b:a', options.bitrate,
    '-ar', String(options.sampleRate),
    '-ac', String(options.channels),
    '-f', 'mp3',
    'pipe:1',
  ];
}

/**
 * Spawn ffmpeg for one input file.
 */
export function spawnFfmpeg(inputPath: string, options: TranscoderOptions): TranscoderProcess {
  const args = buildFfmpegArgs(inputPath, options);
  const ffmpeg = spawn(options.ffmpegPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });

  const exited = new Promise<TranscoderExit>((resolve) => {
    let settled = false;
    ffmpeg.once('error', (error: Error) => {
      logger.error('Failed to spawn FFmpeg', { error: error.message });
      if (!settled) {
        settled = true;
        resolve({ code: null, signal: null, error });
      }
    });
    ffmpeg.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (!settled) {
        settled = true;
        resolve({ code, signal });
      }
    });
  });

  ffmpeg.stderr.on('data', (data: Buffer) => {
    const msg = data.toString().trim();
    if (msg) {
      logger.warning('FFmpeg stderr', { pid: ffmpeg.pid, message: msg });
    }
  });

  return {
    pid: ffmpeg.pid,
    stdout: ffmpeg.stdout,
    exited,
    kill: (signal: NodeJS.Signals) => ffmpeg.kill(signal),
  };
}

export function createFfmpegFactory(options: TranscoderOptions): TranscoderFactory {
  return (inputPath: string) => spawnFfmpeg(inputPath, options);
}
