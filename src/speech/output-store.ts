/**
 * Speech Output Store
 *
 * Directory of synthesized speech files with a bounded retention policy.
 * Files are published atomically and named from their creation time.
 *
 * @module speech/output-store
 */

import fs from 'fs/promises';
import path from 'path';
import { getLogger } from '../core/logging.js';
import { isNotFound, isTempFile, publishAtomically, removeIfExists } from '../utils/atomic-file.js';
import type { SpeechOutputFile } from './types.js';

const logger = getLogger('speech.store');

const FILE_PREFIX = 'speech-';
const AUDIO_EXTENSIONS = new Set(['.mp3', '.wav', '.ogg', '.opus', '.aac', '.flac', '.m4a']);

export interface SpeechOutputStoreOptions {
  directory: string;
  /** Maximum number of speech files kept on disk */
  maxFiles: number;
}

export type TempWriter = (tempPath: string) => Promise<void>;

export class SpeechOutputStore {
  readonly directory: string;
  readonly maxFiles: number;
  private counter = 0;

  constructor(options: SpeechOutputStoreOptions) {
    if (!Number.isInteger(options.maxFiles) || options.maxFiles < 1) {
      throw new RangeError(`maxFiles must be a positive integer, got ${options.maxFiles}`);
    }
    this.directory = path.resolve(options.directory);
    this.maxFiles = options.maxFiles;
  }

  async init(): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
  }

  /**
   * `speech-<epoch ms>-<counter>.<ext>`; lexical order equals creation order
   */
  nextFileName(extension: string, now: number = Date.now()): string {
    this.counter = (this.counter + 1) % 10_000;
    const ext = extension.startsWith('.') ? extension : `.${extension}`;
    const stamp = String(now).padStart(13, '0');
    return `${FILE_PREFIX}${stamp}-${String(this.counter).padStart(4, '0')}${ext}`;
  }

  /**
   * Publish a new speech file, then apply retention.
   *
   * @returns final path of the published file
   */
  async commit(writer: TempWriter, extension: string = 'mp3'): Promise<string> {
    await this.init();
    const target = path.join(this.directory, this.nextFileName(extension));
    await publishAtomically(target, writer);
    logger.info(`Published speech file ${path.basename(target)}`);
    await this.enforceRetention();
    return target;
  }

  /**
   * Current speech files, most recent first.
   */
  async list(): Promise<SpeechOutputFile[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const files: SpeechOutputFile[] = [];
    for (const name of names) {
      if (!isSpeechFileName(name)) continue;
      const filePath = path.join(this.directory, name);
      try {
        const stat = await fs.stat(filePath);
        if (stat.isFile()) {
          files.push({ name, path: filePath, createdAt: stat.mtimeMs, size: stat.size });
        }
      } catch (error) {
        // Removed between readdir and stat
        if (!isNotFound(error)) throw error;
      }
    }

    return files.sort((a, b) => b.createdAt - a.createdAt || (a.name < b.name ? 1 : a.name > b.name ? -1 : 0));
  }

  /**
   * Map a listed basename back to its path; undefined for anything else.
   */
  async resolve(name: string): Promise<string | undefined> {
    if (path.basename(name) !== name || !isSpeechFileName(name)) {
      return undefined;
    }
    const files = await this.list();
    return files.find((file) => file.name === name)?.path;
  }

  /**
   * Delete the oldest files beyond `maxFiles`. Files that are already gone
   * are not an error.
   *
   * @returns paths that were removed
   */
  async enforceRetention(): Promise<string[]> {
    const files = await this.list();
    const expired = files.slice(this.maxFiles);
    const removed: string[] = [];
    for (const file of expired) {
      if (await removeIfExists(file.path)) {
        removed.push(file.path);
        logger.debug(`Retention removed ${file.name}`);
      }
    }
    return removed;
  }
}

export function isSpeechFileName(name: string): boolean {
  return (
    name.startsWith(FILE_PREFIX) &&
    !isTempFile(name) &&
    AUDIO_EXTENSIONS.has(path.extname(name).toLowerCase())
  );
}
