/**
 * Control channel: Unix socket command server
 *
 * Reads one line per connection (newline or end of input), hands it to
 * the command handler and writes the reply followed by a newline before
 * closing. Reading is bounded in time and size so a slow client cannot
 * hold the server.
 */

import { chmod, unlink } from 'node:fs/promises';
import net from 'node:net';

import { SocketBindError } from '$types/errors';
import type { Logger } from '@logging';
import { formatError } from './protocol';
import type { CommandHandler, ControlChannel, ControlChannelConfig } from './types';

function hasCode(err: unknown, ...codes: string[]): boolean {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && codes.includes(err.code);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Check whether a process accepts connections on a socket path
 */
export function isSocketAlive(socketPath: string): Promise<boolean> {
  return new Promise(function(resolve) {
    const peer = net.connect(socketPath);
    peer.once('connect', function() {
      peer.destroy();
      resolve(true);
    });
    peer.once('error', function(err) {
      peer.destroy();
      // Anything other than "nobody there" is treated as held
      resolve(!hasCode(err, 'ECONNREFUSED', 'ENOENT'));
    });
  });
}

/**
 * Create a control channel
 *
 * @param config - Socket path, permissions and read limits
 * @param handler - Command handler producing reply lines
 * @param logger - Logger
 * @returns Control channel; call `start()` to bind
 */
export function createControlChannel(
  config: ControlChannelConfig,
  handler: CommandHandler,
  logger: Logger
): ControlChannel {
  const { socketPath } = config;
  const connections = new Set<net.Socket>();
  const server = net.createServer({ allowHalfOpen: true }, handleConnection);
  let listening = false;

  // ═══════════════════════════════════════════════════════════════
  // CONNECTIONS
  // ═══════════════════════════════════════════════════════════════

  function handleConnection(socket: net.Socket): void {
    let state: 'reading' | 'handling' | 'closed' = 'reading';
    let buffer = '';

    connections.add(socket);
    socket.setEncoding('utf8');

    const timer = setTimeout(function() {
      logger.warning('[Control] Read timed out');
      send(formatError('read_timeout'));
    }, config.readTimeoutMs);

    function send(reply: string): void {
      clearTimeout(timer);
      if (state === 'closed' || socket.destroyed) {
        return;
      }
      state = 'closed';
      socket.end(reply + '\n');
    }

    function respondTo(line: string): void {
      clearTimeout(timer);
      if (Buffer.byteLength(line, 'utf8') > config.maxCommandBytes) {
        send(formatError('command_too_long'));
        return;
      }
      state = 'handling';
      void handler(line).then(send, function(err: unknown) {
        logger.critical(`[Control] Handler failed: ${errorMessage(err)}`);
        send(formatError('internal_error'));
      });
    }

    socket.on('data', function(chunk: Buffer | string) {
      if (state !== 'reading') {
        return;
      }
      buffer += typeof chunk === 'string' ? chunk : chunk.toString('utf8');
      const newline = buffer.indexOf('\n');
      if (newline >= 0) {
        respondTo(buffer.slice(0, newline));
      } else if (Buffer.byteLength(buffer, 'utf8') > config.maxCommandBytes) {
        send(formatError('command_too_long'));
      }
    });

    socket.on('end', function() {
      if (state === 'reading') {
        respondTo(buffer);
      }
    });

    socket.on('error', function(err) {
      logger.debug(`[Control] Connection error: ${errorMessage(err)}`);
      state = 'closed';
      clearTimeout(timer);
    });

    socket.on('close', function() {
      clearTimeout(timer);
      connections.delete(socket);
    });
  }

  server.on('error', function(err) {
    if (listening) {
      logger.critical(`[Control] Server error: ${errorMessage(err)}`);
    }
  });

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  function listen(): Promise<void> {
    return new Promise(function(resolve, reject) {
      function onError(err: Error): void {
        reject(err);
      }
      server.once('error', onError);
      server.listen(socketPath, function() {
        server.off('error', onError);
        resolve();
      });
    });
  }

  async function bind(): Promise<void> {
    try {
      await listen();
      return;
    } catch (err) {
      if (!hasCode(err, 'EADDRINUSE')) {
        throw new SocketBindError(socketPath, `Cannot bind ${socketPath}: ${errorMessage(err)}`);
      }
    }

    if (await isSocketAlive(socketPath)) {
      throw new SocketBindError(socketPath, `Another process is listening on ${socketPath}`);
    }

    logger.warning(`[Control] Removing stale socket ${socketPath}`);
    try {
      await unlink(socketPath);
      await listen();
    } catch (err) {
      throw new SocketBindError(socketPath, `Cannot bind ${socketPath}: ${errorMessage(err)}`);
    }
  }

  async function start(): Promise<void> {
    await bind();
    listening = true;
    try {
      await chmod(socketPath, config.socketMode);
    } catch (err) {
      logger.warning(`[Control] Could not set permissions on ${socketPath}: ${errorMessage(err)}`);
    }
    logger.info(`[Control] Listening on ${socketPath}`);
  }

  async function stop(): Promise<void> {
    if (!listening) {
      return;
    }
    listening = false;

    for (const socket of connections) {
      socket.destroy();
    }
    await new Promise<void>(function(resolve) {
      server.close(function() { resolve(); });
    });

    try {
      await unlink(socketPath);
    } catch (err) {
      if (!hasCode(err, 'ENOENT')) {
        logger.warning(`[Control] Could not remove ${socketPath}: ${errorMessage(err)}`);
      }
    }
    logger.info('[Control] Stopped');
  }

  function isListening(): boolean {
    return listening;
  }

  return {
    start,
    stop,
    isListening
  };
}
