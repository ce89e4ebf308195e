/**
 * Configuration schema for `.tagcase.yaml`.
 */
import { z } from 'zod';
import { isConvention } from '../conventions/converters.js';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/**
 * Tag key → convention identifier. An empty identifier disables the key;
 * anything else must be a known convention.
 */
export const RulesSchema = z
  .record(z.string(), z.string())
  .superRefine((rules, ctx) => {
    for (const [key, convention] of Object.entries(rules)) {
      if (convention !== '' && !isConvention(convention)) {
        ctx.addIssue({
          code: 'custom',
          path: [key],
          message: `unsupported case: ${convention}`,
        });
      }
    }
  });

/** File scanning patterns. */
export const FileScanPatternsSchema = z.object({
  include: z.array(z.string()).default(['**/*.go']),
  exclude: z.array(z.string()).default([
    '**/vendor/**',
    '**/node_modules/**',
    '**/testdata/**',
  ]),
});

export const ConfigSchema = z.object({
  rules: z.preprocess((val) => val ?? {}, RulesSchema),
  use_field_name: z.boolean().default(false),
  files: withDefaults(FileScanPatternsSchema),
  /** Files parsed and checked at the same time */
  concurrency: z.number().int().min(1).max(64).default(8),
});

export type Rules = z.infer<typeof RulesSchema>;
export type FileScanPatterns = z.infer<typeof FileScanPatternsSchema>;
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Rules written by `tagcase init`.
 */
export const DEFAULT_RULES: Readonly<Rules> = Object.freeze({
  json: 'camel',
  yaml: 'camel',
  xml: 'camel',
  toml: 'camel',
  bson: 'camel',
  avro: 'snake',
  mapstructure: 'kebab',
});
