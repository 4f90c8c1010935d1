/**
 * 会话日志 - 只追加，保留最近 50 条
 */

import { SESSION_LOG_SIZE, type SessionLogDocument, type SessionLogEntry } from '@lexiloop/shared';
import { RingBuffer } from '../common/ring-buffer';

export class SessionLog {
  private readonly entries: RingBuffer<SessionLogEntry>;

  constructor(entries: Iterable<SessionLogEntry> = []) {
    this.entries = RingBuffer.from(entries, SESSION_LOG_SIZE);
  }

  get size(): number {
    return this.entries.size;
  }

  append(entry: SessionLogEntry): void {
    this.entries.push(entry);
  }

  latest(): SessionLogEntry | undefined {
    return this.entries.last();
  }

  /** 最近 n 条，按时间先后排列 */
  recent(n: number): SessionLogEntry[] {
    return this.entries.latest(n);
  }

  toArray(): SessionLogEntry[] {
    return this.entries.toArray();
  }

  toDocument(): SessionLogDocument {
    return this.entries.toArray().map((entry) => structuredClone(entry));
  }
}
