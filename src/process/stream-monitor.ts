import type { Readable } from 'node:stream';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import type { StreamListener, StreamMonitor } from './types.js';

/**
 * Reads a child's stdout or stderr as UTF-8 text, keeps what it has read
 * (while buffered) and fans each chunk out to the registered listeners.
 */
export class OutputStreamMonitor implements StreamMonitor {
  private readonly listeners: StreamListener[] = [];
  private contents = '';
  private buffered = true;
  private closed = false;

  constructor(stream: Readable | null, private readonly name: 'stdout' | 'stderr' = 'stdout') {
    if (!stream) {
      this.closed = true;
      return;
    }
    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => this.append(chunk));
    stream.on('close', () => {
      this.closed = true;
    });
    stream.on('error', (err: Error) => {
      logger.warn({ stream: this.name, err }, 'Error reading process stream');
    });
  }

  addListener(listener: StreamListener): void {
    if (!this.listeners.includes(listener)) this.listeners.push(listener);
  }

  removeListener(listener: StreamListener): void {
    const idx = this.listeners.indexOf(listener);
    if (idx !== -1) this.listeners.splice(idx, 1);
  }

  getContents(): string {
    return this.contents;
  }

  flushContents(): void {
    this.contents = '';
  }

  setBuffered(buffered: boolean): void {
    this.buffered = buffered;
    if (!buffered) this.contents = '';
  }

  isBuffered(): boolean {
    return this.buffered;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Record a chunk and hand it to every listener registered right now. */
  append(text: string): void {
    if (text.length === 0) return;
    if (this.buffered) this.contents += text;
    // Copy so listeners that remove themselves do not skip their neighbours
    for (const listener of [...this.listeners]) {
      try {
        listener(text, this);
      } catch (err) {
        logger.warn({ stream: this.name, err }, `Stream listener failed: ${errorMessage(err)}`);
      }
    }
  }
}
