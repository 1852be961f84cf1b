/**
 * Source Selector
 *
 * Owns the single "what should be playing" state. Speech preempts
 * unconditionally; a drained speech source reverts to background unless
 * something newer has already replaced it.
 *
 * @module broadcast/source-selector
 */

import { EventEmitter } from 'events';
import fs from 'fs';
import { getLogger } from '../core/logging.js';
import { ConfigurationError } from '../core/exceptions.js';
import type { BroadcastSource, SourceSnapshot } from './types.js';

const logger = getLogger('broadcast.source');

/**
 * Source Selector events
 */
export interface SourceSelectorEvents {
  change: (snapshot: SourceSnapshot, previous: SourceSnapshot) => void;
}

export class SourceSelector extends EventEmitter {
  private readonly background: BroadcastSource;
  private snapshot: SourceSnapshot;

  constructor(backgroundPath: string) {
    super();
    this.background = { kind: 'background', path: backgroundPath };
    this.snapshot = { source: this.background, generation: 0 };
  }

  get backgroundPath(): string {
    return this.background.path;
  }

  get generation(): number {
    return this.snapshot.generation;
  }

  current(): SourceSnapshot {
    return this.snapshot;
  }

  /**
   * Fail startup when the background track is missing. There is no
   * runtime state for "nothing to play".
   */
  assertBackgroundAvailable(): void {
    let stat: fs.Stats;
    try {
      stat = fs.statSync(this.background.path);
    } catch {
      throw new ConfigurationError(`Background audio file not found: ${this.background.path}`);
    }
    if (!stat.isFile()) {
      throw new ConfigurationError(`Background audio path is not a file: ${this.background.path}`);
    }
  }

  /**
   * Switch to the newest speech file, abandoning whatever is playing
   * (including another speech file).
   */
  preempt(path: string): SourceSnapshot {
    logger.info(`Preempting broadcast with speech: ${path}`);
    return this.set({ kind: 'speech', path });
  }

  /**
   * The pipeline reached end of input on `drained`. Revert to background
   * only if that snapshot is still current.
   *
   * @returns true when the source was reverted
   */
  markDrained(drained: SourceSnapshot): boolean {
    if (drained.source.kind !== 'speech') {
      return false;
    }
    if (drained.generation !== this.snapshot.generation) {
      logger.debug('Drained speech was already superseded', { path: drained.source.path });
      return false;
    }
    logger.info(`Speech drained, reverting to background: ${drained.source.path}`);
    this.set(this.background);
    return true;
  }

  private set(source: BroadcastSource): SourceSnapshot {
    const previous = this.snapshot;
    this.snapshot = { source, generation: previous.generation + 1 };
    this.emit('change', this.snapshot, previous);
    return this.snapshot;
  }
}
