import type { z } from 'zod';

import type { ParseCommandOptionsSchema } from '../shared/schemas.js';
import { assetsCsvPath } from '../shared/work-dir.js';

export type ParseCommandOptions = z.infer<typeof ParseCommandOptionsSchema>;

export interface ParseHandlerParams {
  /** Directory holding the exchange documents */
  dir: string;
  outputPath: string;
  delimiter: string;
}

export function buildParseParamsFromFlags(options: ParseCommandOptions): ParseHandlerParams {
  return {
    dir: options.dir,
    outputPath: options.output ?? assetsCsvPath(options.dir),
    delimiter: options.delimiter,
  };
}
