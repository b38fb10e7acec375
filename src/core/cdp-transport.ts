/**
 * CDP Transport
 *
 * Duplex text channel to one target's debugger endpoint. The connection
 * layer only depends on the CdpTransport interface, so tests substitute
 * an in-process fake.
 */

import WebSocket from 'ws';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { ConnectionFailureError, errorMessage } from './cdp-errors.js';

const log = logger.create('CdpTransport');

export interface CdpTransport {
  readonly isOpen: boolean;
  send(text: string): Promise<void>;
  /**
   * Next inbound text frame, in arrival order. Rejects with
   * ConnectionFailureError on timeout or once the socket is gone.
   */
  receive(timeoutMs: number): Promise<string>;
  close(): Promise<void>;
}

export type TransportFactory = (url: string) => Promise<CdpTransport>;

interface Waiter {
  resolve: (frame: string) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * CdpTransport backed by a `ws` socket
 */
export class WebSocketTransport implements CdpTransport {
  private readonly inbox: string[] = [];
  private waiter: Waiter | null = null;
  private failure: ConnectionFailureError | null = null;

  private constructor(private readonly ws: WebSocket, private readonly url: string) {
    ws.on('message', (data: WebSocket.RawData) => {
      this.deliver(data.toString());
    });

    ws.on('close', (code: number, reason: Buffer) => {
      log.debug('WebSocket closed', { code, reason: reason.toString() });
      this.fail(new ConnectionFailureError(`CDP socket closed (code ${code})`));
    });

    ws.on('error', (error: Error) => {
      log.warn('WebSocket error', { error: error.message });
      this.fail(new ConnectionFailureError(`CDP socket error: ${error.message}`, error));
    });
  }

  /**
   * Open a socket and resolve once the handshake completes
   */
  static open(url: string, handshakeTimeoutMs: number = TIMEOUTS.HANDSHAKE): Promise<WebSocketTransport> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url, {
        handshakeTimeout: handshakeTimeoutMs,
        perMessageDeflate: false,
      });

      const onError = (error: Error) => {
        ws.off('open', onOpen);
        reject(new ConnectionFailureError(`Failed to connect to ${url}: ${error.message}`, error));
      };
      const onOpen = () => {
        ws.off('error', onError);
        resolve(new WebSocketTransport(ws, url));
      };

      ws.once('open', onOpen);
      ws.once('error', onError);
    });
  }

  get isOpen(): boolean {
    return this.failure === null && this.ws.readyState === WebSocket.OPEN;
  }

  send(text: string): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(this.failure ?? new ConnectionFailureError(`CDP socket to ${this.url} is not open`));
    }
    return new Promise((resolve, reject) => {
      this.ws.send(text, (error?: Error) => {
        if (error) {
          reject(new ConnectionFailureError(`CDP write failed: ${error.message}`, error));
        } else {
          resolve();
        }
      });
    });
  }

  receive(timeoutMs: number): Promise<string> {
    const queued = this.inbox.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new ConnectionFailureError(`No CDP message within ${timeoutMs}ms`));
      }, timeoutMs);
      this.waiter = { resolve, reject, timer };
    });
  }

  async close(): Promise<void> {
    this.fail(new ConnectionFailureError('CDP socket closed by client'));
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      try {
        this.ws.close();
      } catch (error) {
        log.debug('Error while closing socket', { error: errorMessage(error) });
      }
    }
  }

  private deliver(frame: string): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(frame);
      return;
    }
    this.inbox.push(frame);
  }

  private fail(error: ConnectionFailureError): void {
    if (!this.failure) {
      this.failure = error;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.reject(this.failure);
    }
  }
}

export const openWebSocketTransport: TransportFactory = (url) => WebSocketTransport.open(url);
