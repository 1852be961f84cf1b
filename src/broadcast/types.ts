/**
 * Broadcast Type Definitions
 *
 * @module broadcast/types
 */

import type { Readable } from 'stream';

// ============================================
// SOURCES
// ============================================

/**
 * What should currently be feeding the transcoder.
 * Exactly two states; there is no "paused" or "empty" source.
 */
export type BroadcastSource =
  | { kind: 'background'; path: string }
  | { kind: 'speech'; path: string };

/**
 * Source plus the generation it was published under.
 * The generation increases on every change, so two snapshots with
 * the same path but different generations are different sources.
 */
export interface SourceSnapshot {
  source: BroadcastSource;
  generation: number;
}

// ============================================
// BUFFER READS
// ============================================

export type BufferRead =
  | {
      status: 'chunk';
      /** Sequence number of the returned chunk */
      sequence: number;
      chunk: Buffer;
      /** Cursor value for the next read */
      nextSequence: number;
      /** Cursor was outside the retained window and jumped to the live edge */
      discontinuity: boolean;
    }
  | {
      status: 'timeout';
      nextSequence: number;
      discontinuity: boolean;
    }
  | {
      status: 'closed';
      nextSequence: number;
      discontinuity: boolean;
    };

// ============================================
// TRANSCODER PROCESS
// ============================================

export interface TranscoderExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started at all */
  error?: Error;
}

/**
 * The parts of a child process the pipeline depends on.
 * `ChildProcess` satisfies this through `spawnFfmpeg`; tests provide fakes.
 */
export interface TranscoderProcess {
  readonly pid?: number;
  readonly stdout: Readable;
  /** Resolves once, when the process has exited (or failed to start) */
  readonly exited: Promise<TranscoderExit>;
  kill(signal: NodeJS.Signals): boolean;
}

export type TranscoderFactory = (inputPath: string) => TranscoderProcess;

export interface TranscoderOptions {
  ffmpegPath: string;
  bitrate: string;
  sampleRate: number;
  channels: number;
}

// ============================================
// STATUS
// ============================================

export interface PipelineStats {
  running: boolean;
  restarts: number;
  failures: number;
  /** Speech sources given up on after failing */
  abandoned: number;
  switches: number;
  drains: number;
  chunksProduced: number;
  activePid?: number;
}

export interface BroadcastStatus {
  source: BroadcastSource;
  generation: number;
  liveEdge: number;
  nextSequence: number;
  listeners: number;
  pipeline: PipelineStats;
}
