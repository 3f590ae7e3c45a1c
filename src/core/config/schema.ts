/**
 * @arch depsum.core.domain.schema
 */
import { z } from 'zod';
import { LOG_LEVEL_NAMES } from '../../utils/logger.js';

/** Log verbosity for the CLI. */
export const LogLevelSchema = z.enum(LOG_LEVEL_NAMES);

/** Project configuration (.depsum.yaml). */
export const ConfigSchema = z.object({
  /** Checksum manifest, relative to the project root */
  go_sum: z.string().min(1).default('go.sum'),
  /** Bazel dependency file rewritten in place, relative to the project root */
  deps_bzl: z.string().min(1).default('deps.bzl'),
  /** Exit non-zero when a go_repository record has no manifest entry */
  fail_on_missing: z.boolean().default(false),
  log_level: LogLevelSchema.default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
