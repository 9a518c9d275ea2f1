import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { logger, formatMessage } from './logger.js';

describe('logger', () => {
  const originalLevel = process.env.LOG_LEVEL;
  let stderr: MockInstance<typeof console.error>;

  beforeEach(() => {
    stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    stderr.mockRestore();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  describe('formatMessage', () => {
    it('prefixes timestamp and padded level', () => {
      expect(formatMessage('info', 'Server started')).toMatch(
        /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[INFO \] Server started$/
      );
    });

    it('appends data as JSON', () => {
      expect(formatMessage('error', 'Request failed', { status: 500 })).toMatch(
        / \[ERROR\] Request failed \{"status":500\}$/
      );
    });

    it('omits an empty data object', () => {
      expect(formatMessage('warn', 'Slow response', {})).toMatch(/ \[WARN \] Slow response$/);
    });
  });

  describe('LOG_LEVEL filtering', () => {
    it('drops messages below the configured level', () => {
      process.env.LOG_LEVEL = 'warn';

      logger.debug('debug message');
      logger.info('info message');

      expect(stderr).not.toHaveBeenCalled();
    });

    it('emits messages at or above the configured level', () => {
      process.env.LOG_LEVEL = 'warn';

      logger.warn('warn message');
      logger.error('error message');

      expect(stderr).toHaveBeenCalledTimes(2);
    });

    it('falls back to info for unknown levels', () => {
      process.env.LOG_LEVEL = 'chatty';

      logger.debug('hidden');
      logger.info('shown');

      expect(stderr).toHaveBeenCalledTimes(1);
      expect(String(stderr.mock.calls[0][0])).toMatch(/\[INFO \] shown$/);
    });
  });
});
