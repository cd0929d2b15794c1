import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

/** Directory holding the raw exchange documents and the generated CSV */
export const WorkDirSchema = z.object({
  dir: z.string().min(1, '--dir must not be empty').default('tmp'),
});

export const InstallDateSchema = z.string().regex(/^\d{8}$/, '--date must be YYYYMMDD');

export const HomeOptionSchema = z.object({
  home: z.string().min(1, '--home must not be empty').optional(),
});

/**
 * Fetch command options
 */
export const FetchCommandOptionsSchema = WorkDirSchema.extend(JsonFlagSchema.shape);

/**
 * Parse command options
 */
export const ParseCommandOptionsSchema = WorkDirSchema.extend({
  output: z.string().min(1, '--output must not be empty').optional(),
  delimiter: z.string().length(1, '--delimiter must be a single character').default(','),
}).extend(JsonFlagSchema.shape);

/**
 * Install command options
 */
export const InstallCommandOptionsSchema = z
  .object({
    input: z.string().min(1, '--input must not be empty').default('tmp/binance_assets.csv'),
    date: InstallDateSchema.optional(),
  })
  .extend(HomeOptionSchema.shape)
  .extend(JsonFlagSchema.shape);

/**
 * Generate command options
 */
export const GenerateCommandOptionsSchema = WorkDirSchema.extend(HomeOptionSchema.shape).extend(JsonFlagSchema.shape);
