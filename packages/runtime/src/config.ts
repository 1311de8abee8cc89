import type { BoundaryLogger } from './logger';
import { silentLogger } from './logger';

/**
 * Configuration for JSONable boundaries.
 */
export interface JsonableConfig {
  /**
   * Whether `@Validated()` round-trips and checks arguments.
   * Captured when a consumer is decorated; changing it afterwards has no
   * effect on consumers that are already wrapped. Defaults to true.
   */
  validation?: boolean;

  /**
   * Reject iterables longer than this while canonicalizing.
   * Unset by default: iterables are materialized eagerly and an infinite
   * one never finishes.
   */
  maxIterableLength?: number;

  /** Schema validator settings. */
  ajv?: {
    /** Report every mismatch instead of the first one (default: true). */
    allErrors?: boolean;
    /** Check `format` keywords such as "date-time" (default: true). */
    formats?: boolean;
  };

  /** Logger for decoration and rejection events (default: silent). */
  logger?: BoundaryLogger;
}

/** A config with every default filled in. */
export interface ResolvedJsonableConfig {
  validation: boolean;
  maxIterableLength: number | undefined;
  ajv: {
    allErrors: boolean;
    formats: boolean;
  };
  logger: BoundaryLogger;
}

/**
 * Type-safe config helper.
 *
 * @example
 * ```ts
 * import { defineConfig, Validated } from "@jsonable/runtime";
 *
 * export const boundaries = defineConfig({
 *   validation: process.env.NODE_ENV !== "production",
 *   maxIterableLength: 10_000,
 * });
 *
 * const checked = Validated(boundaries);
 * ```
 */
export function defineConfig(config: JsonableConfig): JsonableConfig {
  return config;
}

export function resolveConfig(config: JsonableConfig = {}): ResolvedJsonableConfig {
  return {
    validation: config.validation ?? true,
    maxIterableLength: config.maxIterableLength,
    ajv: {
      allErrors: config.ajv?.allErrors ?? true,
      formats: config.ajv?.formats ?? true,
    },
    logger: config.logger ?? silentLogger,
  };
}

const DISABLED_VALUES = new Set(['0', 'false', 'off', 'no']);

/**
 * Read boundary settings from environment variables:
 * - `JSONABLE_VALIDATE`: "0", "false", "off" or "no" disable validation.
 * - `JSONABLE_MAX_ITERABLE_LENGTH`: positive integer iterable limit.
 *
 * Read once, typically at module load before any consumer is decorated.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): JsonableConfig {
  const config: JsonableConfig = {};

  const validate = env.JSONABLE_VALIDATE?.trim().toLowerCase();
  if (validate) {
    config.validation = !DISABLED_VALUES.has(validate);
  }

  const limit = env.JSONABLE_MAX_ITERABLE_LENGTH?.trim();
  if (limit) {
    const parsed = Number(limit);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      throw new RangeError(
        `JSONABLE_MAX_ITERABLE_LENGTH must be a positive integer, received "${limit}"`,
      );
    }
    config.maxIterableLength = parsed;
  }

  return config;
}
