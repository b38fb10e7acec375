/**
 * Error types raised by the CDP client
 *
 * `terminal` marks errors after which the session is unusable: the
 * connection has been torn down or no browser target exists.
 */

export class BrowserSessionError extends Error {
  public readonly terminal: boolean;

  constructor(message: string, options: { terminal?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BrowserSessionError';
    this.terminal = options.terminal ?? false;
  }
}

/**
 * Discovery found no target, even after asking the browser to create one
 */
export class NoTargetAvailableError extends BrowserSessionError {
  constructor(message: string) {
    super(message, { terminal: true });
    this.name = 'NoTargetAvailableError';
  }
}

/**
 * Transport-level fault: socket closed, errored, or went silent.
 * The dispatcher answers this with one reconnect before escalating.
 */
export class ConnectionFailureError extends BrowserSessionError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConnectionFailureError';
  }
}

/**
 * A command failed after the reconnect-and-resend attempt
 */
export class CommandFailureError extends BrowserSessionError {
  public readonly method: string;

  constructor(method: string, message: string, cause?: unknown) {
    super(message, { terminal: true, cause });
    this.name = 'CommandFailureError';
    this.method = method;
  }
}

export class NavigationError extends BrowserSessionError {
  public readonly url: string;

  constructor(url: string, message: string) {
    super(message);
    this.name = 'NavigationError';
    this.url = url;
  }
}

/**
 * A second command was issued while one was still awaiting its response
 */
export class ConcurrentCommandError extends BrowserSessionError {
  constructor(method: string, pendingMethod: string) {
    super(`Cannot send ${method} while ${pendingMethod} is in flight; serialize calls on one session`);
    this.name = 'ConcurrentCommandError';
  }
}

export function isTerminalSessionError(error: unknown): boolean {
  return error instanceof BrowserSessionError && error.terminal;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
