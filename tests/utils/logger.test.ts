import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { logger } from '../../src/utils/logger.js';

function spyConsole() {
  return {
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    debug: vi.spyOn(console, 'debug').mockImplementation(() => {}),
  };
}

describe('logger', () => {
  let spies: ReturnType<typeof spyConsole>;

  const line = (index = 0): string => String(spies.error.mock.calls[index]?.[0]);

  beforeEach(() => {
    spies = spyConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.LOG_LEVEL;
  });

  describe('basic logging', () => {
    it('writes info messages to stderr', () => {
      logger.info('Test message');
      expect(spies.error).toHaveBeenCalledTimes(1);
      expect(line()).toContain('[INFO] Test message');
      expect(spies.log).not.toHaveBeenCalled();
    });

    it('should log warn messages', () => {
      logger.warn('Warning message');
      expect(spies.warn).toHaveBeenCalledTimes(1);
      expect(String(spies.warn.mock.calls[0]?.[0])).toContain('[WARN] Warning message');
    });

    it('should log error messages', () => {
      logger.error('Error message');
      expect(spies.error).toHaveBeenCalledTimes(1);
      expect(line()).toContain('[ERROR] Error message');
    });

    it('should not log debug messages by default', () => {
      logger.debug('Debug message');
      expect(spies.error).not.toHaveBeenCalled();
      expect(spies.debug).not.toHaveBeenCalled();
    });

    it('writes debug messages to stderr when LOG_LEVEL=debug', () => {
      process.env.LOG_LEVEL = 'debug';
      logger.debug('Debug message');
      expect(spies.error).toHaveBeenCalledTimes(1);
      expect(line()).toContain('[DEBUG] Debug message');
    });

    it('suppresses info and warn when LOG_LEVEL=error', () => {
      process.env.LOG_LEVEL = 'error';
      logger.info('quiet');
      logger.warn('quiet');
      logger.error('loud');
      expect(spies.warn).not.toHaveBeenCalled();
      expect(spies.error).toHaveBeenCalledTimes(1);
      expect(line()).toContain('[ERROR] loud');
    });
  });

  describe('context logging', () => {
    it('should include context in log message', () => {
      logger.info('Test message', { stage: 'preview', count: 3 });
      expect(line()).toContain('{"stage":"preview","count":3}');
    });

    it('should format error objects', () => {
      logger.error('Something failed', new Error('Test error'));
      expect(line()).toContain('"errorName":"Error"');
      expect(line()).toContain('"errorMessage":"Test error"');
      expect(line()).toContain('"errorStack"');
    });

    it('should handle non-Error error values', () => {
      logger.error('Something failed', 'string error');
      expect(line()).toContain('"errorValue":"string error"');
    });
  });

  describe('request context', () => {
    it('should include requestId and tool in logs within context', async () => {
      await logger.withRequestContext({ toolName: 'etp_message' }, async () => {
        logger.info('Test message');
      });

      expect(line()).toContain('"requestId":"req-');
      expect(line()).toContain('"tool":"etp_message"');
    });

    it('should include custom requestId and sessionId when provided', async () => {
      await logger.withRequestContext(
        { requestId: 'custom-req-123', toolName: 'etp_message', sessionId: 'session-456' },
        async () => {
          logger.info('Test message');
        }
      );

      expect(line()).toContain('"requestId":"custom-req-123"');
      expect(line()).toContain('"sessionId":"session-456"');
    });

    it('should return the result of the wrapped function', async () => {
      const result = await logger.withRequestContext({}, async () => 'test result');
      expect(result).toBe('test result');
    });

    it('should propagate errors from wrapped function', async () => {
      await expect(
        logger.withRequestContext({}, async () => {
          throw new Error('Test error');
        })
      ).rejects.toThrow('Test error');
    });

    it('should provide access to requestId via getRequestId', async () => {
      let capturedRequestId: string | undefined;

      await logger.withRequestContext({ requestId: 'test-req-id' }, async () => {
        capturedRequestId = logger.getRequestId();
      });

      expect(capturedRequestId).toBe('test-req-id');
    });

    it('should return undefined outside context', () => {
      expect(logger.getRequestId()).toBeUndefined();
      expect(logger.getElapsedMs()).toBeUndefined();
    });

    it('should track elapsed time', async () => {
      let elapsedMs: number | undefined;

      await logger.withRequestContext({}, async () => {
        await new Promise((resolve) => setTimeout(resolve, 20));
        elapsedMs = logger.getElapsedMs();
      });

      expect(elapsedMs).toBeGreaterThanOrEqual(15);
    });

    it('adds the session id and stage once they are known', async () => {
      await logger.withRequestContext({ toolName: 'etp_message' }, async () => {
        logger.updateContext({ sessionId: 'etp-added-later', stage: 'collect_need' });
        logger.info('After update');
      });

      expect(line()).toContain('"sessionId":"etp-added-later"');
      expect(line()).toContain('"stage":"collect_need"');
    });

    it('ignores updateContext outside a request context', () => {
      logger.updateContext({ sessionId: 'nowhere' });
      logger.info('No context');
      expect(line()).not.toContain('nowhere');
      expect(line()).not.toContain('requestId');
    });

    it('should handle nested request contexts', async () => {
      await logger.withRequestContext({ requestId: 'outer-req', toolName: 'outer_tool' }, async () => {
        await logger.withRequestContext({ requestId: 'inner-req', toolName: 'inner_tool' }, async () => {
          logger.info('Inner message');
        });
        logger.info('Outer message');
      });

      expect(line(0)).toContain('"requestId":"inner-req"');
      expect(line(0)).toContain('"tool":"inner_tool"');
      expect(line(1)).toContain('"requestId":"outer-req"');
      expect(line(1)).toContain('"tool":"outer_tool"');
    });
  });

  describe('format', () => {
    it('should include ISO timestamp', () => {
      logger.info('Test message');
      expect(line()).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[INFO\]/);
    });

    it('should generate request IDs with correct format', async () => {
      const ids = new Set<string>();
      for (let i = 0; i < 10; i++) {
        await logger.withRequestContext({}, async () => {
          const id = logger.getRequestId();
          if (id) ids.add(id);
        });
      }
      expect(ids.size).toBe(10);
      for (const id of ids) {
        expect(id).toMatch(/^req-[A-Za-z0-9_-]{8}$/);
      }
    });
  });
});
