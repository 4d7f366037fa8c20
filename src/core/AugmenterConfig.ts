/**
 * Augmenter configuration. Loaded once at cold start from the environment and
 * passed by reference into the pipeline; nothing reads process.env afterwards.
 */

import { z } from 'zod';
import type { CustomAttribute } from '../transform/summaryMetric.ts';
import type { AugmentationRule } from '../transform/augment.ts';

export const DEFAULT_FUNCTION_LABEL_KEY = 'FunctionName';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LogLevelSchema = z.enum(LOG_LEVELS);

export interface AugmenterConfig {
  readonly targetFunctions: readonly string[];
  readonly functionLabelKey: string;
  readonly attributeKey: string | undefined;
  readonly attributeValue: string | undefined;
  readonly logLevel: LogLevel;
  /** Settings that were ignored, to be logged once a logger exists. */
  readonly warnings: readonly string[];
}

/** Empty strings count as unset, matching how Lambda consoles clear variables. */
const presentString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v === '' ? undefined : v));

const EnvSchema = z.object({
  TARGET_FUNCTION_NAMES: z
    .string()
    .optional()
    .transform((raw) =>
      (raw ?? '')
        .split(',')
        .map((name) => name.trim())
        .filter((name) => name.length > 0)
    ),
  FUNCTION_NAME_LABEL_KEY: presentString.transform((v) => v?.trim() || DEFAULT_FUNCTION_LABEL_KEY),
  ATTRIBUTE_KEY: presentString,
  ATTRIBUTE_VALUE: presentString,
  LOG_LEVEL: presentString.transform((v) => v?.trim().toLowerCase() || undefined),
});

/**
 * Read configuration from environment variables:
 *  - TARGET_FUNCTION_NAMES   comma-separated function names
 *  - ATTRIBUTE_KEY / ATTRIBUTE_VALUE   custom attribute stamped on every summary
 *  - FUNCTION_NAME_LABEL_KEY   defaults to "FunctionName"
 *  - LOG_LEVEL   pino level, case-insensitive; unknown levels fall back to "info"
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AugmenterConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const errors = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${errors.join(', ')}`);
  }
  const e = parsed.data;

  const warnings: string[] = [];
  let logLevel: LogLevel = 'info';
  if (e.LOG_LEVEL !== undefined) {
    const level = LogLevelSchema.safeParse(e.LOG_LEVEL);
    if (level.success) {
      logLevel = level.data;
    } else {
      warnings.push(`LOG_LEVEL "${env.LOG_LEVEL ?? ''}" is not a known level, using "info"`);
    }
  }

  return Object.freeze({
    targetFunctions: Object.freeze([...e.TARGET_FUNCTION_NAMES]),
    functionLabelKey: e.FUNCTION_NAME_LABEL_KEY,
    attributeKey: e.ATTRIBUTE_KEY,
    attributeValue: e.ATTRIBUTE_VALUE,
    logLevel,
    warnings: Object.freeze(warnings),
  });
}

export interface AugmentationInput {
  targetFunctions: Iterable<string>;
  functionLabelKey: string;
  attributes: readonly CustomAttribute[];
}

/**
 * Either a complete rule, or the "configuration incomplete" mode in which
 * records are decoded and re-encoded without augmentation.
 */
export type AugmentationSettings =
  | { status: 'enabled'; rule: AugmentationRule }
  | { status: 'incomplete'; missing: string[] };

export function resolveAugmentation(input: AugmentationInput): AugmentationSettings {
  const targetFunctions = new Set([...input.targetFunctions].filter((name) => name.length > 0));
  const attributes = input.attributes.filter(([key, value]) => key.length > 0 && value.length > 0);

  const missing: string[] = [];
  if (targetFunctions.size === 0) missing.push('targetFunctions');
  if (input.functionLabelKey.length === 0) missing.push('functionLabelKey');
  if (attributes.length === 0) missing.push('attributes');
  if (missing.length > 0) {
    return { status: 'incomplete', missing };
  }

  return {
    status: 'enabled',
    rule: {
      targetFunctions,
      functionLabelKey: input.functionLabelKey,
      attributes,
    },
  };
}
