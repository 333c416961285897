/**
 * Environment configuration.
 *
 * The API key stays optional here: its absence is reported when the client is
 * first constructed, which startup does eagerly.
 */

import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';
import { ServerConfig, ConfigurationError } from '../types/index.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export const DEFAULT_SERVER_NAME = 'YNAB Budget Tools';

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const flagValue = z.preprocess(
  blankToUndefined,
  z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value) => (value === undefined ? true : !['0', 'false', 'no', 'off'].includes(value))),
);

const envSchema = z.object({
  YNAB_API_KEY: optionalString,
  DEFAULT_BUDGET_ID: optionalString,
  MCP_SERVER_NAME: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_SERVER_NAME)),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .toLowerCase()
      .default('info')
      .refine(isLogLevel, { message: `LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}` }),
  ),
  MCP_MINIFY_OUTPUT: flagValue,
  MCP_PRETTY_SPACES: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(10).default(2)),
});

/**
 * Builds the ServerConfig from environment variables.
 *
 * @throws ConfigurationError when a variable is present but malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(fromZodError(result.error).toString());
  }

  const parsed = result.data;
  return {
    apiKey: parsed.YNAB_API_KEY,
    defaultBudgetId: parsed.DEFAULT_BUDGET_ID,
    serverName: parsed.MCP_SERVER_NAME,
    logLevel: parsed.LOG_LEVEL,
    minifyOutput: parsed.MCP_MINIFY_OUTPUT,
    prettySpaces: parsed.MCP_PRETTY_SPACES,
  };
}

export type { ServerConfig } from '../types/index.js';
