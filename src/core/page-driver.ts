/**
 * Page Driver - interaction primitives over raw CDP commands
 *
 * Node ids are handles into the live document and go stale on every
 * navigation, so nothing here caches them: each selector operation fetches
 * the document root again and queries under it.
 *
 * Primitives that cannot do what was asked (missing element, no box model,
 * unusable evaluation result) return false / null / a `none` result instead
 * of throwing.
 */

import { writeFile } from 'node:fs/promises';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { sleep } from '../utils/delay.js';
import { navigationFailureMessage } from '../utils/error-messages.js';
import { BrowserSessionError, NavigationError, errorMessage } from './cdp-errors.js';
import type { CommandSender } from './command-dispatcher.js';
import type {
  EvaluationResult,
  RemoteObject,
  ScreenshotOptions,
  WaitForSelectorOptions,
} from '../types/cdp.js';

const log = logger.page;

/** CDP modifier bits */
const MODIFIER_CTRL = 2;
const MODIFIER_META = 4;

export interface PageDriverOptions {
  /** Fixed delay after Page.navigate */
  navigationSettleMs?: number;
  /** Modifier used for the select-all chord in fill() */
  selectAllModifier?: number;
}

export interface Point {
  x: number;
  y: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRemoteObject(value: unknown): RemoteObject | null {
  if (!isRecord(value) || typeof value.type !== 'string') {
    return null;
  }
  return {
    type: value.type,
    subtype: typeof value.subtype === 'string' ? value.subtype : undefined,
    value: value.value,
    description: typeof value.description === 'string' ? value.description : undefined,
    unserializableValue: typeof value.unserializableValue === 'string' ? value.unserializableValue : undefined,
  };
}

/**
 * Classify a Runtime.evaluate result object
 */
export function classifyRemoteObject(remote: RemoteObject): EvaluationResult {
  if (remote.type === 'undefined') {
    return { kind: 'none', reason: 'undefined' };
  }
  if (remote.type === 'object' && remote.subtype === 'null') {
    return { kind: 'value', value: null };
  }
  if (remote.value !== undefined) {
    return { kind: 'value', value: remote.value };
  }
  // NaN, Infinity, -0, bigint: the browser can only send a textual form
  const description = remote.unserializableValue ?? remote.description;
  if (description !== undefined) {
    return { kind: 'opaque', description };
  }
  return { kind: 'none', reason: `no value for result of type ${remote.type}` };
}

/**
 * Centre of a box-model content quad [x1,y1, x2,y2, x3,y3, x4,y4]
 */
export function quadCenter(quad: number[]): Point | null {
  if (quad.length < 8 || quad.some((n) => typeof n !== 'number' || Number.isNaN(n))) {
    return null;
  }
  return {
    x: (quad[0] + quad[4]) / 2,
    y: (quad[1] + quad[5]) / 2,
  };
}

export class PageDriver {
  private readonly navigationSettleMs: number;
  private readonly selectAllModifier: number;

  constructor(private readonly commands: CommandSender, options: PageDriverOptions = {}) {
    this.navigationSettleMs = options.navigationSettleMs ?? TIMEOUTS.NAVIGATION_SETTLE;
    this.selectAllModifier =
      options.selectAllModifier ?? (process.platform === 'darwin' ? MODIFIER_META : MODIFIER_CTRL);
  }

  /**
   * Navigate and wait a fixed settle delay. Not event-driven: follow with
   * waitForSelector when readiness matters.
   */
  async navigate(url: string): Promise<void> {
    log.debug('Navigating', { url });
    const response = await this.commands.send('Page.navigate', { url });

    if (response.error) {
      throw new NavigationError(url, navigationFailureMessage(url, response.error.message));
    }
    const errorText = response.result?.errorText;
    if (typeof errorText === 'string' && errorText.length > 0) {
      throw new NavigationError(url, navigationFailureMessage(url, errorText));
    }

    await sleep(this.navigationSettleMs);
  }

  /**
   * Resolve a selector against a freshly fetched document root
   */
  async querySelector(selector: string): Promise<number | null> {
    const doc = await this.commands.send('DOM.getDocument');
    const root = doc.result?.root;
    const rootId = isRecord(root) ? root.nodeId : undefined;
    if (typeof rootId !== 'number') {
      return null;
    }

    const found = await this.commands.send('DOM.querySelector', { nodeId: rootId, selector });
    const nodeId = found.result?.nodeId;
    if (found.error || typeof nodeId !== 'number' || nodeId === 0) {
      return null;
    }
    return nodeId;
  }

  /**
   * Click the centre of the element's content box. Returns false when the
   * selector matches nothing or the node has no layout (hidden, detached).
   * Does not scroll the element into view.
   */
  async click(selector: string): Promise<boolean> {
    const nodeId = await this.querySelector(selector);
    if (nodeId === null) {
      log.debug('Click target not found', { selector });
      return false;
    }

    const box = await this.commands.send('DOM.getBoxModel', { nodeId });
    const model = box.result?.model;
    const content: unknown = isRecord(model) ? model.content : undefined;
    if (box.error || !Array.isArray(content)) {
      log.debug('Click target has no box model', { selector });
      return false;
    }

    const center = quadCenter(content.filter((n): n is number => typeof n === 'number'));
    if (!center) {
      return false;
    }

    const mouse = { x: center.x, y: center.y, button: 'left', clickCount: 1 };
    await this.commands.send('Input.dispatchMouseEvent', { type: 'mousePressed', ...mouse });
    await this.commands.send('Input.dispatchMouseEvent', { type: 'mouseReleased', ...mouse });
    return true;
  }

  /**
   * One `char` key event per character. Printable characters only.
   */
  async typeText(text: string): Promise<void> {
    for (const ch of text) {
      await this.commands.send('Input.dispatchKeyEvent', { type: 'char', text: ch });
    }
  }

  /**
   * Focus the field by clicking it, select its contents, then type over
   * them. Nothing is typed when the click fails.
   */
  async fill(selector: string, text: string): Promise<boolean> {
    if (!(await this.click(selector))) {
      return false;
    }
    await this.commands.send('Input.dispatchKeyEvent', {
      type: 'keyDown',
      key: 'a',
      modifiers: this.selectAllModifier,
    });
    await this.typeText(text);
    return true;
  }

  /**
   * Dispatch a keyDown for `key`. No keyUp follows.
   */
  async keyPress(key: string): Promise<void> {
    // TODO: follow with a keyUp once callers are checked against keydown-only handling
    await this.commands.send('Input.dispatchKeyEvent', { type: 'keyDown', key });
  }

  /**
   * Evaluate an expression with returnByValue. Never throws.
   */
  async evaluate(expression: string): Promise<EvaluationResult> {
    try {
      const response = await this.commands.send('Runtime.evaluate', {
        expression,
        returnByValue: true,
      });
      if (response.error) {
        return { kind: 'none', reason: response.error.message };
      }
      const details = response.result?.exceptionDetails;
      if (details) {
        const text = isRecord(details) && typeof details.text === 'string' ? details.text : 'exception';
        return { kind: 'none', reason: `script threw: ${text}` };
      }

      const remote = toRemoteObject(response.result?.result);
      if (!remote) {
        return { kind: 'none', reason: 'malformed evaluation result' };
      }
      return classifyRemoteObject(remote);
    } catch (error) {
      log.debug('Evaluation failed', { error: errorMessage(error) });
      return { kind: 'none', reason: errorMessage(error) };
    }
  }

  /**
   * evaluate() unwrapped: the by-value result, or null for anything else
   */
  async evaluateValue(expression: string): Promise<unknown> {
    const result = await this.evaluate(expression);
    return result.kind === 'value' ? result.value : null;
  }

  /**
   * Poll for a selector until it matches, the deadline passes, or the
   * signal aborts.
   */
  async waitForSelector(selector: string, options: WaitForSelectorOptions = {}): Promise<boolean> {
    const timeoutMs = options.timeoutMs ?? TIMEOUTS.SELECTOR_WAIT;
    const intervalMs = options.intervalMs ?? TIMEOUTS.SELECTOR_POLL_INTERVAL;
    const deadline = Date.now() + timeoutMs;

    while (!options.signal?.aborted) {
      if ((await this.querySelector(selector)) !== null) {
        return true;
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        break;
      }
      await sleep(Math.min(intervalMs, remaining), options.signal);
    }

    log.debug('Selector wait ended without a match', { selector, timeoutMs });
    return false;
  }

  /**
   * Capture the viewport. With `path`, writes the decoded image there and
   * returns the path; otherwise returns the base64 payload.
   */
  async screenshot(options: ScreenshotOptions = {}): Promise<string> {
    const format = options.format ?? 'jpeg';
    const params: Record<string, unknown> = { format };
    if (format === 'jpeg') {
      params.quality = options.quality ?? 80;
    }

    const response = await this.commands.send('Page.captureScreenshot', params);
    const data = response.result?.data;
    if (response.error || typeof data !== 'string') {
      throw new BrowserSessionError(`Screenshot failed: ${response.error?.message ?? 'no image data returned'}`);
    }

    if (options.path) {
      await writeFile(options.path, Buffer.from(data, 'base64'));
      return options.path;
    }
    return data;
  }

  /**
   * Scroll the window to nudge lazy-loaded content
   */
  async scrollBy(deltaY: number): Promise<void> {
    await this.evaluate(`window.scrollBy(0, ${Math.trunc(deltaY)});`);
  }

  async close(): Promise<void> {
    await this.commands.close();
  }
}
