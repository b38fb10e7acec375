/**
 * Tests for the structured logger
 *
 * Tests cover:
 * - Secret redaction
 * - Component loggers and child context
 * - Log levels
 * - Error serialization
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

describe('Logger', () => {
  let logOutput: string[];
  let originalStderr: typeof process.stderr.write;

  beforeEach(() => {
    // Fresh module so configureLogger() starts from defaults
    vi.resetModules();

    logOutput = [];
    originalStderr = process.stderr.write;
    process.stderr.write = ((chunk: string | Uint8Array) => {
      logOutput.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString());
      return true;
    }) as typeof process.stderr.write;
  });

  afterEach(() => {
    process.stderr.write = originalStderr;
  });

  function lines(): Array<Record<string, unknown>> {
    return logOutput
      .join('')
      .split('\n')
      .filter(Boolean)
      .map((line): Record<string, unknown> => JSON.parse(line));
  }

  describe('Secret Redaction', () => {
    it('should redact cookie headers', async () => {
      const { logger, configureLogger } = await import('../../src/utils/logger.js');
      configureLogger({ level: 'debug', prettyPrint: false });

      logger.page.info('Request made', {
        headers: {
          cookie: 'li_at=test-cookie-value',
          'content-type': 'application/json',
        },
      });

      const output = logOutput.join('');
      expect(output).toContain('[REDACTED]');
      expect(output).not.toContain('test-cookie-value');
      expect(output).toContain('application/json');
    });

    it('should redact nested password and token fields', async () => {
      const { logger, configureLogger } = await import('../../src/utils/logger.js');
      configureLogger({ level: 'debug', prettyPrint: false });

      logger.search.warn('Login attempt', {
        user: { email: 'user@example.test', password: 'test-password' },
        session: { token: 'test-token', expiresIn: 3600 },
      });

      const [entry] = lines();
      expect(entry.user).toEqual({ email: 'user@example.test', password: '[REDACTED]' });
      expect(entry.session).toEqual({ token: '[REDACTED]', expiresIn: 3600 });
    });

    it('should redact the debugger endpoint', async () => {
      const { logger, configureLogger } = await import('../../src/utils/logger.js');
      configureLogger({ level: 'debug', prettyPrint: false });

      logger.connection.info('Connected to target', {
        endpoint: 'ws://127.0.0.1:9222/devtools/page/TEST',
        target: { type: 'page', webSocketDebuggerUrl: 'ws://127.0.0.1:9222/devtools/page/TEST' },
      });

      const [entry] = lines();
      expect(entry.endpoint).toBe('[REDACTED]');
      expect(entry.target).toEqual({ type: 'page', webSocketDebuggerUrl: '[REDACTED]' });
    });
  });

  describe('Component Loggers', () => {
    it('should include the component and service in log output', async () => {
      const { logger, configureLogger } = await import('../../src/utils/logger.js');
      configureLogger({ level: 'info', prettyPrint: false });

      logger.search.info('Test message', { page: 2 });

      const [entry] = lines();
      expect(entry).toMatchObject({
        level: 'info',
        service: 'cdp-people-search',
        component: 'CandidateSearch',
        page: 2,
        msg: 'Test message',
      });
    });

    it('should carry child context', async () => {
      const { logger, configureLogger } = await import('../../src/utils/logger.js');
      configureLogger({ level: 'debug', prettyPrint: false });

      logger.dispatcher.child({ method: 'Page.navigate' }).debug('Sending');

      const [entry] = lines();
      expect(entry).toMatchObject({ component: 'CommandDispatcher', method: 'Page.navigate', msg: 'Sending' });
    });

    it('should record durations with timed()', async () => {
      const { logger, configureLogger } = await import('../../src/utils/logger.js');
      configureLogger({ level: 'info', prettyPrint: false });

      logger.search.timed('Search complete', Date.now() - 25);

      const [entry] = lines();
      expect(entry.durationMs).toBeGreaterThanOrEqual(25);
    });
  });

  describe('Log Levels', () => {
    it('should respect log level configuration', async () => {
      const { logger, configureLogger } = await import('../../src/utils/logger.js');
      configureLogger({ level: 'warn', prettyPrint: false });

      logger.page.debug('Debug message');
      logger.page.info('Info message');
      logger.page.warn('Warn message');
      logger.page.error('Error message');

      expect(lines().map((entry) => entry.msg)).toEqual(['Warn message', 'Error message']);
    });

    it('should emit nothing when silent', async () => {
      const { logger, configureLogger } = await import('../../src/utils/logger.js');
      configureLogger({ level: 'silent', prettyPrint: false });

      logger.page.error('Error message');

      expect(logOutput).toEqual([]);
    });
  });

  describe('Error Logging', () => {
    it('should serialize Error objects under err', async () => {
      const { logger, configureLogger } = await import('../../src/utils/logger.js');
      configureLogger({ level: 'error', prettyPrint: false });

      logger.search.error('Search failed', { error: new Error('Test error') });

      const [entry] = lines();
      expect(entry.msg).toBe('Search failed');
      expect(entry.err).toMatchObject({ message: 'Test error', name: 'Error' });
      expect(entry.error).toBeUndefined();
    });

    it('should stringify non-Error values', async () => {
      const { logger, configureLogger } = await import('../../src/utils/logger.js');
      configureLogger({ level: 'error', prettyPrint: false });

      logger.search.error('Search failed', { error: 'plain failure' });

      const [entry] = lines();
      expect(entry.err).toMatchObject({ message: 'plain failure' });
    });
  });
});
