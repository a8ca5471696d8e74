/**
 * Unit tests for file sink
 */

import { createFileSink } from './file-sink';
import type { FileAPI } from '../types';

const FIXED_TIME = Date.UTC(2026, 4, 6, 7, 8, 9);

function clock(): number {
  return FIXED_TIME;
}

describe('createFileSink', () => {
  let appended: string[];
  let fileApi: FileAPI;

  beforeEach(() => {
    appended = [];
    fileApi = {
      mkdir: vi.fn(async () => undefined),
      appendFile: vi.fn(async (_path: string, data: string) => {
        appended.push(data);
      })
    };
  });

  test('should create the parent directory on initialize', async () => {
    const sink = createFileSink(fileApi, { path: '/var/log/intime/overlay.log', bufferSize: 10 }, clock);

    const result = await sink.initialize();

    expect(fileApi.mkdir).toHaveBeenCalledWith('/var/log/intime', { recursive: true });
    expect(result).toEqual({ success: true, message: 'File sink writing to /var/log/intime/overlay.log' });
  });

  test('should resolve the directory of a relative log path', async () => {
    await createFileSink(fileApi, { path: 'logs/overlay.log', bufferSize: 10 }, clock).initialize();
    await createFileSink(fileApi, { path: 'overlay.log', bufferSize: 10 }, clock).initialize();

    expect(fileApi.mkdir).toHaveBeenNthCalledWith(1, 'logs', { recursive: true });
    expect(fileApi.mkdir).toHaveBeenNthCalledWith(2, '.', { recursive: true });
  });

  test('should append timestamped lines in order', async () => {
    const sink = createFileSink(fileApi, { path: '/tmp/a.log', bufferSize: 10 }, clock);
    await sink.initialize();

    sink.write(1, 'first');
    sink.write(2, 'second');
    await sink.close();

    expect(appended.join('')).toBe(
      '2026-05-06T07:08:09.000Z first\n' +
      '2026-05-06T07:08:09.000Z second\n'
    );
  });

  test('should hold lines written before initialize', async () => {
    const sink = createFileSink(fileApi, { path: '/tmp/a.log', bufferSize: 10 }, clock);

    sink.write(1, 'early');
    expect(sink.getBufferSize()).toBe(1);

    await sink.initialize();
    await sink.close();

    expect(appended.join('')).toBe('2026-05-06T07:08:09.000Z early\n');
  });

  test('should drop lines beyond the buffer and report the count', async () => {
    const sink = createFileSink(fileApi, { path: '/tmp/a.log', bufferSize: 1 }, clock);

    sink.write(1, 'kept');
    sink.write(1, 'dropped');
    await sink.initialize();
    await sink.close();

    expect(appended).toEqual([
      '2026-05-06T07:08:09.000Z kept\n',
      '2026-05-06T07:08:09.000Z [file-sink] dropped 1 line(s)\n'
    ]);
  });
});
