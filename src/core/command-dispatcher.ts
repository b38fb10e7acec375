/**
 * Command Dispatcher
 *
 * Sends one CDP command and returns its correlated response. Owns the
 * only retry policy in the client: on a transport failure, reconnect and
 * resend, up to `maxReconnects` times (one by default); after that the
 * connection is closed and CommandFailureError is thrown.
 *
 * Not reentrant. Callers sharing a dispatcher must serialize their calls.
 */

import { logger } from '../utils/logger.js';
import { commandFailureMessage } from '../utils/error-messages.js';
import {
  CommandFailureError,
  ConcurrentCommandError,
  ConnectionFailureError,
  errorMessage,
} from './cdp-errors.js';
import type { CdpConnection } from './cdp-connection.js';
import type { CdpParams, CdpResponse, ConnectionState } from '../types/cdp.js';

const log = logger.dispatcher;

export interface ReconnectPolicy {
  /** Reconnect-and-resend attempts after the first transport failure */
  maxReconnects: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = { maxReconnects: 1 };

/**
 * The capability the page driver depends on
 */
export interface CommandSender {
  send(method: string, params?: CdpParams): Promise<CdpResponse>;
  close(): Promise<void>;
  readonly state: ConnectionState;
}

export class CommandDispatcher implements CommandSender {
  private inFlight: string | null = null;

  constructor(
    private readonly connection: CdpConnection,
    private readonly policy: ReconnectPolicy = DEFAULT_RECONNECT_POLICY
  ) {}

  get state(): ConnectionState {
    return this.connection.state;
  }

  async send(method: string, params: CdpParams = {}): Promise<CdpResponse> {
    if (this.inFlight) {
      throw new ConcurrentCommandError(method, this.inFlight);
    }
    this.inFlight = method;
    try {
      return await this.sendWithReconnect(method, params);
    } finally {
      this.inFlight = null;
    }
  }

  async close(): Promise<void> {
    await this.connection.close();
  }

  private async sendWithReconnect(method: string, params: CdpParams): Promise<CdpResponse> {
    let reconnects = 0;

    // Lazy first connect, outside the reconnect budget. A discovery failure
    // here is not a transport failure and propagates as-is. A socket that
    // dropped since the last command surfaces from exchange() below and
    // counts as the first transport failure.
    await this.connection.open();

    for (;;) {
      try {
        return await this.connection.exchange(method, params);
      } catch (error) {
        if (!(error instanceof ConnectionFailureError)) {
          throw error;
        }
        if (reconnects >= this.policy.maxReconnects) {
          await this.connection.close();
          throw new CommandFailureError(method, commandFailureMessage(method, error.message), error);
        }

        reconnects++;
        log.warn('Transport failure, reconnecting', { method, attempt: reconnects, error: error.message });

        try {
          await this.connection.reopen();
        } catch (reconnectError) {
          await this.connection.close();
          throw new CommandFailureError(
            method,
            commandFailureMessage(method, `reconnect failed: ${errorMessage(reconnectError)}`),
            reconnectError
          );
        }
      }
    }
  }
}
