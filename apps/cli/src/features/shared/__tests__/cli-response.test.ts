import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from '../cli-response.js';
import { ExitCodes } from '../exit-codes.js';

describe('cli-response', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    vi.stubEnv('NODE_ENV', 'test');
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllEnvs();
  });

  describe('createSuccessResponse', () => {
    it('should create a success response with data', () => {
      expect(createSuccessResponse('parse', { instrumentCount: 3 })).toEqual({
        success: true,
        command: 'parse',
        timestamp: '2024-01-01T00:00:00.000Z',
        data: { instrumentCount: 3 },
      });
    });

    it('should attach metadata when given', () => {
      const response = createSuccessResponse('fetch', { documents: [] }, { duration_ms: 100 });

      expect(response.metadata).toEqual({ duration_ms: 100 });
    });
  });

  describe('createErrorResponse', () => {
    it('should carry code and message without a stack outside development', () => {
      expect(createErrorResponse('install', new Error('no input'), 'NOT_FOUND')).toEqual({
        success: false,
        command: 'install',
        timestamp: '2024-01-01T00:00:00.000Z',
        error: { code: 'NOT_FOUND', message: 'no input' },
      });
    });

    it('should include the stack in development', () => {
      vi.stubEnv('NODE_ENV', 'development');

      const response = createErrorResponse('install', new Error('no input'), 'NOT_FOUND');

      expect(response.error?.stack).toContain('no input');
    });
  });

  describe('exitCodeToErrorCode', () => {
    it('should name every exit code except success', () => {
      expect(exitCodeToErrorCode(ExitCodes.INVALID_ARGS)).toBe('INVALID_ARGS');
      expect(exitCodeToErrorCode(ExitCodes.NETWORK_ERROR)).toBe('NETWORK_ERROR');
      expect(exitCodeToErrorCode(ExitCodes.VALIDATION_ERROR)).toBe('VALIDATION_ERROR');
      expect(exitCodeToErrorCode(ExitCodes.CONFIG_ERROR)).toBe('CONFIG_ERROR');
      expect(exitCodeToErrorCode(ExitCodes.SUCCESS)).toBe('UNKNOWN_ERROR');
    });
  });
});
