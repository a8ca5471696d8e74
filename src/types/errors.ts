/**
 * Global error types for the overlay control plane
 */

/**
 * Base class for every error raised by this project
 */
export class IntimeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IntimeError';
  }
}

/**
 * Malformed command or payload received on the control channel
 * `reason` is the machine-readable token sent back as `ERROR:<reason>`
 */
export class ProtocolError extends IntimeError {
  readonly reason: string;

  constructor(reason: string, message?: string) {
    super(message || reason);
    this.name = 'ProtocolError';
    this.reason = reason;
  }
}

/**
 * Command name not present in the routing table
 */
export class UnknownCommandError extends ProtocolError {
  readonly command: string;

  constructor(command: string) {
    super('unknown_command', `Unknown command '${command}'`);
    this.name = 'UnknownCommandError';
    this.command = command;
  }
}

/**
 * Screen sampler could not produce a color
 * Non-fatal: degrades adaptive color only
 */
export class SamplerUnavailableError extends IntimeError {
  constructor(message: string) {
    super(message);
    this.name = 'SamplerUnavailableError';
  }
}

/**
 * Control socket could not be bound
 * Fatal at startup unless a stale socket file was reclaimed
 */
export class SocketBindError extends IntimeError {
  readonly socketPath: string;

  constructor(socketPath: string, message: string) {
    super(message);
    this.name = 'SocketBindError';
    this.socketPath = socketPath;
  }
}

/**
 * Countdown/deadline duration could not be parsed or is not positive
 */
export class InvalidDurationError extends IntimeError {
  readonly input: string;

  constructor(input: string, message?: string) {
    super(message || `Invalid duration '${input}'. Use a format like '30m', '1h', '1h30m45s'`);
    this.name = 'InvalidDurationError';
    this.input = input;
  }
}

/**
 * Settings document failed validation
 */
export class ValidationError extends IntimeError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
