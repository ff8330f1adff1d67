/**
 * Error types raised by the splitter.
 *
 * ConfigurationError is fatal at startup. DecodeError and WriteError are
 * recovered per datagram / per message and only ever logged.
 */

export class SplitterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SplitterError';
  }
}

/**
 * Missing or invalid configuration. The process must not bind any socket.
 */
export class ConfigurationError extends SplitterError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A datagram whose payload is not valid UTF-8.
 */
export class DecodeError extends SplitterError {
  constructor(
    public readonly port: number,
    public readonly byteLength: number,
    options?: { cause?: unknown }
  ) {
    super(`Received ${byteLength} bytes on port ${port} that could not be decoded as UTF-8`, options);
    this.name = 'DecodeError';
  }
}

/**
 * Failure appending to (or creating) a bucket file.
 */
export class WriteError extends SplitterError {
  constructor(
    public readonly filePath: string,
    cause: unknown
  ) {
    super(`Failed to write ${filePath}: ${describeError(cause)}`, { cause });
    this.name = 'WriteError';
  }
}

/**
 * Message text for an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Coerce an unknown thrown value into an Error for logging.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * True when `error` carries a Node.js system error code such as ENOENT.
 * Checks the shape rather than the prototype, since errors raised by Node's
 * own modules may come from another realm.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
