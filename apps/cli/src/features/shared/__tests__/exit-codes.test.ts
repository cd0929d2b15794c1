import { HttpError, RateLimitError, ResponseValidationError } from '@refdata/http';
import { DocumentParseError, DocumentValidationError, FormatError } from '@refdata/instruments';
import { describe, expect, it } from 'vitest';

import { ConfigError, ExitCodes, exitCodeForError } from '../exit-codes.js';

describe('exit-codes', () => {
  describe('ExitCodes', () => {
    it('should define SUCCESS as 0', () => {
      expect(ExitCodes.SUCCESS).toBe(0);
    });

    it('should have unique exit codes', () => {
      const codes = Object.values(ExitCodes);
      expect(codes.length).toBe(new Set(codes).size);
    });
  });

  describe('exitCodeForError', () => {
    it('should map configuration errors', () => {
      expect(exitCodeForError(new ConfigError('missing'))).toBe(ExitCodes.CONFIG_ERROR);
    });

    it('should map HTTP failures', () => {
      expect(exitCodeForError(new HttpError('http request failed: 503', 503, ''))).toBe(ExitCodes.NETWORK_ERROR);
      expect(exitCodeForError(new RateLimitError('binance rate limit exceeded', 2000))).toBe(ExitCodes.RATE_LIMIT);
    });

    it('should map document and format errors to validation', () => {
      expect(exitCodeForError(new FormatError('bad date', 'BTCUSD_24'))).toBe(ExitCodes.VALIDATION_ERROR);
      expect(exitCodeForError(new DocumentValidationError('invalid', 'a.json', []))).toBe(ExitCodes.VALIDATION_ERROR);
      expect(exitCodeForError(new DocumentParseError("failed to parse JSON document 'a.json'", 'a.json'))).toBe(
        ExitCodes.VALIDATION_ERROR
      );
      expect(exitCodeForError(new ResponseValidationError('invalid', 'binance', '/x', []))).toBe(
        ExitCodes.VALIDATION_ERROR
      );
    });

    it('should map missing files, directly or as a cause', () => {
      const missing = Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });

      expect(exitCodeForError(missing)).toBe(ExitCodes.NOT_FOUND);
      expect(exitCodeForError(new Error("failed to read 'x'", { cause: missing }))).toBe(ExitCodes.NOT_FOUND);
    });

    it('should fall back to a general error', () => {
      expect(exitCodeForError(new Error('boom'))).toBe(ExitCodes.GENERAL_ERROR);
    });
  });
});
