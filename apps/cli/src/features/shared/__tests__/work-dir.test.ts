import { SPOT_SEGMENT, USD_FUTURES_SEGMENT } from '@refdata/instruments';
import { describe, expect, it } from 'vitest';

import { ConfigError } from '../exit-codes.js';
import { assetsCsvPath, generatedFiles, resolveInstallHome, segmentDocumentPath } from '../work-dir.js';

describe('work-dir', () => {
  it('should place segment documents and the CSV in the working directory', () => {
    expect(segmentDocumentPath('tmp', SPOT_SEGMENT)).toBe('tmp/binance_exchange-info.json');
    expect(segmentDocumentPath('tmp', USD_FUTURES_SEGMENT)).toBe('tmp/binance_usdfut_exchange-info.json');
    expect(assetsCsvPath('tmp')).toBe('tmp/binance_assets.csv');
  });

  it('should list every generated file', () => {
    expect(generatedFiles('tmp')).toEqual([
      'tmp/binance_exchange-info.json',
      'tmp/binance_usdfut_exchange-info.json',
      'tmp/binance_coinfut_exchange-info.json',
      'tmp/binance_assets.csv',
    ]);
  });

  describe('resolveInstallHome', () => {
    it('should prefer the option over the environment', () => {
      expect(resolveInstallHome('/opt/a', { REFDATA_HOME: '/opt/b' })._unsafeUnwrap()).toBe('/opt/a');
      expect(resolveInstallHome(undefined, { REFDATA_HOME: '/opt/b' })._unsafeUnwrap()).toBe('/opt/b');
    });

    it('should fail with a configuration error when neither is set', () => {
      const error = resolveInstallHome(undefined, {})._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(ConfigError);
      expect(error.message).toBe('install root not set: pass --home or set REFDATA_HOME');
    });
  });
});
