/**
 * Append-only file sink
 *
 * Lines are queued and flushed by a single in-flight append so ordering is
 * preserved without blocking the caller. When the queue is full, or an append
 * fails, lines are dropped and counted; the count is written after the next
 * successful append.
 */

import path from 'node:path';

import type { FileAPI, FileSink, FileSinkConfig, InitMessage, LogLevel } from '../types';

/**
 * Create a file sink
 *
 * @param fileApi - File API (node:fs/promises in production)
 * @param config - Target path and queue size
 * @param clock - Millisecond clock used for timestamps
 * @returns File sink instance
 */
export function createFileSink(
  fileApi: FileAPI,
  config: FileSinkConfig,
  clock: () => number = Date.now
): FileSink {
  const queue: string[] = [];
  let dropped = 0;
  let flushing: Promise<void> | null = null;
  let ready = false;

  async function initialize(): Promise<InitMessage> {
    await fileApi.mkdir(path.dirname(config.path), { recursive: true });
    ready = true;
    if (queue.length > 0 && flushing === null) {
      flushing = flush();
    }
    return { success: true, message: 'File sink writing to ' + config.path };
  }

  function write(_level: LogLevel, formattedMessage: string): void {
    if (queue.length >= config.bufferSize) {
      dropped++;
      return;
    }
    queue.push(new Date(clock()).toISOString() + ' ' + formattedMessage + '\n');
    if (ready && flushing === null) {
      flushing = flush();
    }
  }

  async function flush(): Promise<void> {
    try {
      while (queue.length > 0) {
        const lines = queue.splice(0, queue.length);
        try {
          await fileApi.appendFile(config.path, lines.join(''));
        } catch {
          // Counted and reported with the next successful append
          dropped += lines.length;
          return;
        }
        if (dropped > 0) {
          const note = new Date(clock()).toISOString() + ' [file-sink] dropped ' + dropped + ' line(s)\n';
          dropped = 0;
          await fileApi.appendFile(config.path, note).catch(function() { dropped++; });
        }
      }
    } finally {
      flushing = null;
    }
  }

  async function close(): Promise<void> {
    if (flushing !== null) {
      await flushing;
    }
    if (ready && queue.length > 0) {
      flushing = flush();
      await flushing;
    }
    ready = false;
  }

  function getBufferSize(): number {
    return queue.length;
  }

  return {
    write: write,
    initialize: initialize,
    close: close,
    getBufferSize: getBufferSize
  };
}
