/**
 * Tests for PageDriver primitives against the in-process fake browser
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CdpConnection } from '../../src/core/cdp-connection.js';
import { CommandDispatcher } from '../../src/core/command-dispatcher.js';
import { PageDriver, classifyRemoteObject, quadCenter } from '../../src/core/page-driver.js';
import { BrowserSessionError, NavigationError } from '../../src/core/cdp-errors.js';
import { FakeBrowser, fakeDiscovery } from '../helpers/fake-browser.js';
import type { CdpCommand } from '../../src/types/cdp.js';

const BOX = { model: { content: [10, 20, 110, 20, 110, 60, 10, 60] } };

function createDriver(browser: FakeBrowser): PageDriver {
  const connection = new CdpConnection({ discover: fakeDiscovery(), transportFactory: browser.factory });
  return new PageDriver(new CommandDispatcher(connection), {
    navigationSettleMs: 0,
    selectAllModifier: 2,
  });
}

function sentFor(browser: FakeBrowser, method: string): CdpCommand[] {
  return browser.log.filter((c) => c.method === method);
}

describe('quadCenter', () => {
  it('should average the first and third corners', () => {
    expect(quadCenter([10, 20, 110, 20, 110, 60, 10, 60])).toEqual({ x: 60, y: 40 });
  });

  it('should reject short or invalid quads', () => {
    expect(quadCenter([1, 2, 3])).toBeNull();
    expect(quadCenter([0, 0, 0, 0, NaN, 0, 0, 0])).toBeNull();
  });
});

describe('classifyRemoteObject', () => {
  it('should tag primitives and objects as values', () => {
    expect(classifyRemoteObject({ type: 'string', value: 'hello' })).toEqual({ kind: 'value', value: 'hello' });
    expect(classifyRemoteObject({ type: 'number', value: 0 })).toEqual({ kind: 'value', value: 0 });
    expect(classifyRemoteObject({ type: 'object', value: [1, 2] })).toEqual({ kind: 'value', value: [1, 2] });
  });

  it('should tag null as a value', () => {
    expect(classifyRemoteObject({ type: 'object', subtype: 'null' })).toEqual({ kind: 'value', value: null });
  });

  it('should tag undefined as none', () => {
    expect(classifyRemoteObject({ type: 'undefined' })).toEqual({ kind: 'none', reason: 'undefined' });
  });

  it('should tag unserializable numbers as opaque', () => {
    expect(classifyRemoteObject({ type: 'number', unserializableValue: 'NaN', description: 'NaN' })).toEqual({
      kind: 'opaque',
      description: 'NaN',
    });
  });

  it('should fall back to the description for non-serializable objects', () => {
    expect(classifyRemoteObject({ type: 'function', description: 'function f() {}' })).toEqual({
      kind: 'opaque',
      description: 'function f() {}',
    });
  });
});

describe('PageDriver', () => {
  let browser: FakeBrowser;
  let driver: PageDriver;

  beforeEach(() => {
    browser = new FakeBrowser();
    browser.on('DOM.getDocument', () => ({ result: { root: { nodeId: 1 } } }));
    browser.on('DOM.querySelector', () => ({ result: { nodeId: 0 } }));
    driver = createDriver(browser);
  });

  describe('navigate', () => {
    it('should send Page.navigate with the url', async () => {
      browser.on('Page.navigate', () => ({ result: { frameId: 'main' } }));

      await driver.navigate('https://example.test/a');

      expect(sentFor(browser, 'Page.navigate')[0].params).toEqual({ url: 'https://example.test/a' });
    });

    it('should throw NavigationError when the browser reports errorText', async () => {
      browser.on('Page.navigate', () => ({ result: { frameId: 'main', errorText: 'net::ERR_NAME_NOT_RESOLVED' } }));

      const error = await driver.navigate('https://missing.test/').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NavigationError);
      expect(error).toMatchObject({
        url: 'https://missing.test/',
        message: 'Navigation to https://missing.test/ failed: net::ERR_NAME_NOT_RESOLVED',
      });
    });

    it('should throw NavigationError on a protocol error', async () => {
      browser.on('Page.navigate', () => ({ error: { code: -32000, message: 'Cannot navigate to invalid URL' } }));

      await expect(driver.navigate('not a url')).rejects.toBeInstanceOf(NavigationError);
    });
  });

  describe('querySelector', () => {
    it('should return null when nothing matches', async () => {
      expect(await driver.querySelector('#missing')).toBeNull();
    });

    it('should query under a freshly fetched root every time', async () => {
      browser.on('DOM.querySelector', () => ({ result: { nodeId: 7 } }));

      expect(await driver.querySelector('#a')).toBe(7);
      expect(await driver.querySelector('#b')).toBe(7);

      expect(browser.commands()).toEqual([
        'DOM.getDocument',
        'DOM.querySelector',
        'DOM.getDocument',
        'DOM.querySelector',
      ]);
      expect(sentFor(browser, 'DOM.querySelector')[1].params).toEqual({ nodeId: 1, selector: '#b' });
    });

    it('should return null on a protocol error', async () => {
      browser.on('DOM.querySelector', () => ({ error: { code: -32000, message: 'Could not find node' } }));

      expect(await driver.querySelector('::bad')).toBeNull();
    });
  });

  describe('click', () => {
    it('should return false without mouse events when the element is missing', async () => {
      expect(await driver.click('#missing')).toBe(false);
      expect(sentFor(browser, 'Input.dispatchMouseEvent')).toHaveLength(0);
    });

    it('should return false when the element has no box model', async () => {
      browser.on('DOM.querySelector', () => ({ result: { nodeId: 5 } }));
      browser.on('DOM.getBoxModel', () => ({ error: { code: -32000, message: 'Could not compute box model.' } }));

      expect(await driver.click('#hidden')).toBe(false);
      expect(sentFor(browser, 'Input.dispatchMouseEvent')).toHaveLength(0);
    });

    it('should press and release at the centre of the content box', async () => {
      browser.on('DOM.querySelector', () => ({ result: { nodeId: 5 } }));
      browser.on('DOM.getBoxModel', () => ({ result: BOX }));

      expect(await driver.click('#button')).toBe(true);

      expect(sentFor(browser, 'Input.dispatchMouseEvent').map((c) => c.params)).toEqual([
        { type: 'mousePressed', x: 60, y: 40, button: 'left', clickCount: 1 },
        { type: 'mouseReleased', x: 60, y: 40, button: 'left', clickCount: 1 },
      ]);
    });
  });

  describe('fill', () => {
    it('should type nothing when the click fails', async () => {
      expect(await driver.fill('#missing', 'hi')).toBe(false);
      expect(sentFor(browser, 'Input.dispatchKeyEvent')).toHaveLength(0);
    });

    it('should select all and then type each character', async () => {
      browser.on('DOM.querySelector', () => ({ result: { nodeId: 5 } }));
      browser.on('DOM.getBoxModel', () => ({ result: BOX }));

      expect(await driver.fill('#field', 'hi')).toBe(true);

      expect(sentFor(browser, 'Input.dispatchKeyEvent').map((c) => c.params)).toEqual([
        { type: 'keyDown', key: 'a', modifiers: 2 },
        { type: 'char', text: 'h' },
        { type: 'char', text: 'i' },
      ]);
    });
  });

  describe('keyPress', () => {
    it('should dispatch a single keyDown', async () => {
      await driver.keyPress('Enter');

      expect(sentFor(browser, 'Input.dispatchKeyEvent').map((c) => c.params)).toEqual([
        { type: 'keyDown', key: 'Enter' },
      ]);
    });
  });

  describe('evaluate', () => {
    it('should request the result by value', async () => {
      browser.on('Runtime.evaluate', () => ({ result: { result: { type: 'number', value: 42 } } }));

      expect(await driver.evaluate('6 * 7')).toEqual({ kind: 'value', value: 42 });
      expect(sentFor(browser, 'Runtime.evaluate')[0].params).toEqual({ expression: '6 * 7', returnByValue: true });
    });

    it('should report a thrown script as none', async () => {
      browser.on('Runtime.evaluate', () => ({
        result: {
          result: { type: 'object', subtype: 'error', description: 'ReferenceError: nope is not defined' },
          exceptionDetails: { text: 'Uncaught' },
        },
      }));

      expect(await driver.evaluate('nope')).toEqual({ kind: 'none', reason: 'script threw: Uncaught' });
    });

    it('should report a protocol error as none', async () => {
      browser.on('Runtime.evaluate', () => ({ error: { code: -32000, message: 'Execution context was destroyed.' } }));

      expect(await driver.evaluate('1')).toEqual({ kind: 'none', reason: 'Execution context was destroyed.' });
    });

    it('should report a malformed result as none', async () => {
      browser.on('Runtime.evaluate', () => ({ result: {} }));

      expect(await driver.evaluate('1')).toEqual({ kind: 'none', reason: 'malformed evaluation result' });
    });

    it('should not throw when the command fails terminally', async () => {
      browser.failOn('Runtime.evaluate', 2);

      const result = await driver.evaluate('1');

      expect(result.kind).toBe('none');
      expect(result.kind === 'none' ? result.reason : '').toContain('Runtime.evaluate');
    });

    it('should unwrap values through evaluateValue', async () => {
      browser.on('Runtime.evaluate', () => ({ result: { result: { type: 'undefined' } } }));
      expect(await driver.evaluateValue('void 0')).toBeNull();

      browser.on('Runtime.evaluate', () => ({ result: { result: { type: 'string', value: 'Title' } } }));
      expect(await driver.evaluateValue('document.title')).toBe('Title');
    });
  });

  describe('scrollBy', () => {
    it('should scroll the window vertically', async () => {
      await driver.scrollBy(800);

      expect(sentFor(browser, 'Runtime.evaluate')[0].params).toEqual({
        expression: 'window.scrollBy(0, 800);',
        returnByValue: true,
      });
    });
  });

  describe('waitForSelector', () => {
    it('should resolve true once the selector appears', async () => {
      let polls = 0;
      browser.on('DOM.querySelector', () => {
        polls++;
        return { result: { nodeId: polls >= 3 ? 9 : 0 } };
      });

      expect(await driver.waitForSelector('.ready', { timeoutMs: 1000, intervalMs: 1 })).toBe(true);
      expect(polls).toBe(3);
    });

    it('should resolve false after the timeout', async () => {
      expect(await driver.waitForSelector('.never', { timeoutMs: 30, intervalMs: 10 })).toBe(false);
    });

    it('should stop polling once the signal aborts', async () => {
      const controller = new AbortController();
      controller.abort();

      expect(await driver.waitForSelector('.never', { timeoutMs: 1000, signal: controller.signal })).toBe(false);
      expect(sentFor(browser, 'DOM.querySelector')).toHaveLength(0);
    });
  });

  describe('screenshot', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'page-driver-'));
      browser.on('Page.captureScreenshot', () => ({
        result: { data: Buffer.from('fake-image').toString('base64') },
      }));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should return base64 data and default to jpeg at quality 80', async () => {
      const data = await driver.screenshot();

      expect(data).toBe(Buffer.from('fake-image').toString('base64'));
      expect(sentFor(browser, 'Page.captureScreenshot')[0].params).toEqual({ format: 'jpeg', quality: 80 });
    });

    it('should omit quality for png', async () => {
      await driver.screenshot({ format: 'png', quality: 50 });

      expect(sentFor(browser, 'Page.captureScreenshot')[0].params).toEqual({ format: 'png' });
    });

    it('should write the decoded image when a path is given', async () => {
      const path = join(dir, 'shot.jpg');

      expect(await driver.screenshot({ path })).toBe(path);
      expect((await readFile(path)).toString()).toBe('fake-image');
    });

    it('should throw when the browser returns no image', async () => {
      browser.on('Page.captureScreenshot', () => ({ error: { code: -32000, message: 'Unable to capture' } }));

      await expect(driver.screenshot()).rejects.toBeInstanceOf(BrowserSessionError);
    });
  });
});
