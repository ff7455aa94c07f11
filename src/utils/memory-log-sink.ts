/**
 * In-process LogSink that keeps entries in an array
 */

import type { ChangeEntry } from '../types/audit.js';
import type { LogSink } from '../types/sources.js';

export class MemoryLogSink implements LogSink {
  private entries: ChangeEntry[] = [];

  append(entry: ChangeEntry): boolean {
    this.entries.push(entry);
    return true;
  }

  /**
   * Entries in append order
   */
  getEntries(): readonly ChangeEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}
