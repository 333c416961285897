/**
 * Shared types and error classes
 */

import type { LogLevel } from '../server/logger.js';

export interface ServerConfig {
  apiKey?: string | undefined;
  defaultBudgetId?: string | undefined;
  serverName: string;
  logLevel: LogLevel;
  minifyOutput: boolean;
  prettySpaces: number;
}

export interface CliOptions {
  logging: boolean;
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export {
  ErrorHandler,
  ValidationError,
  describeError,
  withToolErrorHandling,
  type ErrorPayload,
} from '../server/errorHandler.js';
