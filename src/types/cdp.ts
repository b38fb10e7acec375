/**
 * Chrome DevTools Protocol wire types
 *
 * Only the parts of the protocol the client actually reads are modelled.
 */

/**
 * A debuggable browsing context listed by the discovery endpoint (`/json`)
 */
export interface CdpTarget {
  id?: string;
  type: string;
  title?: string;
  url?: string;
  webSocketDebuggerUrl?: string;
}

export type CdpParams = Record<string, unknown>;

/**
 * Outbound command frame
 */
export interface CdpCommand {
  id: number;
  method: string;
  params: CdpParams;
}

export interface CdpProtocolError {
  code: number;
  message: string;
  data?: string;
}

/**
 * Correlated response frame. Exactly one of `result` / `error` is set
 * by a conforming browser.
 */
export interface CdpResponse {
  id: number;
  result?: Record<string, unknown>;
  error?: CdpProtocolError;
}

/**
 * Connection lifecycle states
 */
export type ConnectionState = 'disconnected' | 'connected' | 'reconnecting';

/**
 * `Runtime.RemoteObject` as returned by `Runtime.evaluate`
 */
export interface RemoteObject {
  type: string;
  subtype?: string;
  value?: unknown;
  description?: string;
  unserializableValue?: string;
}

/**
 * Tagged outcome of a script evaluation.
 *
 * - `value`: the result came back by value (primitives exactly, JSON values as sent)
 * - `opaque`: the browser could only describe the result
 * - `none`: nothing usable (protocol error, page exception, undefined, session failure)
 */
export type EvaluationResult =
  | { kind: 'value'; value: unknown }
  | { kind: 'opaque'; description: string }
  | { kind: 'none'; reason: string };

export type ScreenshotFormat = 'jpeg' | 'png' | 'webp';

export interface ScreenshotOptions {
  /** Write the decoded image here and return the path instead of the payload */
  path?: string;
  /** JPEG quality, 0-100 (ignored for other formats) */
  quality?: number;
  format?: ScreenshotFormat;
}

export interface WaitForSelectorOptions {
  timeoutMs?: number;
  intervalMs?: number;
  signal?: AbortSignal;
}
