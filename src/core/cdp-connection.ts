/**
 * CDP Connection
 *
 * Explicit state machine around one target connection:
 *
 *   disconnected --open()--> connected --failure--> reconnecting --reopen()--> connected
 *        ^                                               |
 *        +------------------- close() / failed reopen ---+
 *
 * Every (re)connect creates a new epoch object holding the transport and a
 * message-id counter starting at 1. Ids are unique within an epoch; an
 * epoch is never reused after it is replaced.
 */

import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { discoverTarget, type DiscoveredTarget } from './target-discovery.js';
import { openWebSocketTransport, type CdpTransport, type TransportFactory } from './cdp-transport.js';
import { ConnectionFailureError, errorMessage } from './cdp-errors.js';
import type { CdpCommand, CdpParams, CdpResponse, ConnectionState } from '../types/cdp.js';

const log = logger.connection;

/**
 * Domains enabled on every fresh epoch
 */
export const REQUIRED_DOMAINS = ['Page.enable', 'DOM.enable', 'Runtime.enable'] as const;

export interface CdpConnectionOptions {
  /** Resolves the debugger URL; called on every (re)connect */
  discover: () => Promise<DiscoveredTarget>;
  transportFactory?: TransportFactory;
  responseTimeoutMs?: number;
}

interface ConnectionEpoch {
  readonly number: number;
  readonly endpoint: string;
  readonly transport: CdpTransport;
  nextId: number;
}

/**
 * Build connection options that discover targets on a host/port
 */
export function discoveryFor(host: string, port: number): CdpConnectionOptions['discover'] {
  return () => discoverTarget({ host, port });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseResponse(frame: string): CdpResponse | null {
  let message: unknown;
  try {
    message = JSON.parse(frame);
  } catch {
    log.debug('Dropping unparsable frame', { length: frame.length });
    return null;
  }
  if (!isRecord(message)) {
    return null;
  }
  const { id, result, error } = message;
  if (typeof id !== 'number') {
    return null;
  }

  const response: CdpResponse = { id };
  if (isRecord(result)) {
    response.result = result;
  }
  if (isRecord(error)) {
    response.error = {
      code: typeof error.code === 'number' ? error.code : -1,
      message: typeof error.message === 'string' ? error.message : 'Unknown protocol error',
      ...(typeof error.data === 'string' ? { data: error.data } : {}),
    };
  }
  return response;
}

export class CdpConnection {
  private epoch: ConnectionEpoch | null = null;
  private epochCount = 0;
  private _state: ConnectionState = 'disconnected';
  private readonly transportFactory: TransportFactory;
  private readonly responseTimeoutMs: number;

  constructor(private readonly options: CdpConnectionOptions) {
    this.transportFactory = options.transportFactory ?? openWebSocketTransport;
    this.responseTimeoutMs = options.responseTimeoutMs ?? TIMEOUTS.COMMAND_RESPONSE;
  }

  get state(): ConnectionState {
    return this._state;
  }

  /** Debugger URL of the current epoch, if connected */
  get endpoint(): string | null {
    return this.epoch?.endpoint ?? null;
  }

  /** Number of epochs opened so far */
  get epochs(): number {
    return this.epochCount;
  }

  /**
   * Connect when disconnected; otherwise a no-op. A connected epoch whose
   * transport has dropped is left in place: the next exchange fails with
   * ConnectionFailureError and the dispatcher's reconnect policy decides.
   */
  async open(): Promise<void> {
    if (this._state !== 'disconnected') {
      return;
    }
    await this.dropEpoch();
    try {
      await this.startEpoch();
    } catch (error) {
      this._state = 'disconnected';
      throw error;
    }
  }

  /**
   * Discard the current epoch and connect afresh
   */
  async reopen(): Promise<void> {
    this._state = 'reconnecting';
    await this.dropEpoch();
    try {
      await this.startEpoch();
    } catch (error) {
      this._state = 'disconnected';
      throw error;
    }
  }

  /**
   * One request/response round trip on the current epoch, no retries.
   * Frames whose id does not match (including events) are dropped.
   */
  async exchange(method: string, params: CdpParams = {}): Promise<CdpResponse> {
    const epoch = this.epoch;
    if (!epoch) {
      throw new ConnectionFailureError(`Not connected; cannot send ${method}`);
    }

    const command: CdpCommand = { id: epoch.nextId++, method, params };
    await epoch.transport.send(JSON.stringify(command));

    for (;;) {
      const frame = await epoch.transport.receive(this.responseTimeoutMs);
      const response = parseResponse(frame);
      if (response && response.id === command.id) {
        return response;
      }
    }
  }

  async close(): Promise<void> {
    await this.dropEpoch();
    this._state = 'disconnected';
  }

  private async startEpoch(): Promise<void> {
    const { webSocketDebuggerUrl } = await this.options.discover();
    const transport = await this.transportFactory(webSocketDebuggerUrl);

    this.epochCount++;
    this.epoch = {
      number: this.epochCount,
      endpoint: webSocketDebuggerUrl,
      transport,
      nextId: 1,
    };

    try {
      for (const method of REQUIRED_DOMAINS) {
        const response = await this.exchange(method);
        if (response.error) {
          log.warn('Failed to enable domain', { method, error: response.error.message });
        }
      }
    } catch (error) {
      await this.dropEpoch();
      throw error;
    }

    this._state = 'connected';
    log.info('Connected to target', { epoch: this.epochCount });
  }

  private async dropEpoch(): Promise<void> {
    const epoch = this.epoch;
    this.epoch = null;
    if (!epoch) {
      return;
    }
    try {
      await epoch.transport.close();
    } catch (error) {
      log.debug('Error closing transport', { epoch: epoch.number, error: errorMessage(error) });
    }
  }
}
