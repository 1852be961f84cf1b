/**
 * Speech Type Definitions
 *
 * @module speech/types
 */

/**
 * A published speech file on disk
 */
export interface SpeechOutputFile {
  /** Basename, e.g. speech-1760870400000-0001.mp3 */
  name: string;
  path: string;
  /** Modification time in epoch ms; recency ordering key */
  createdAt: number;
  size: number;
}

export type JobStatus = 'queued' | 'synthesizing' | 'completed' | 'failed';

/**
 * Serializable view of a synthesis job (API responses, logs)
 */
export interface SynthesisJobView {
  id: string;
  status: JobStatus;
  text: string;
  voiceName?: string;
  voiceId: string;
  resultPath?: string;
  completed: boolean;
  error?: string;
  createdAt: number;
  completedAt?: number;
}

/**
 * Logical voice name -> engine voice identifier. `default` is mandatory.
 */
export type VoiceMap = Record<string, string> & { default: string };
