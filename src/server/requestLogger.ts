/**
 * Debug logging of tool invocations, switched on with `--logging`.
 */

import type { ToolHandler, ToolMiddleware } from './toolRegistry.js';

export const MAX_LOGGED_STRING_LENGTH = 50;
const TRUNCATED_STRING_LENGTH = MAX_LOGGED_STRING_LENGTH - 3;

export interface RequestLoggerConfig {
  enabled: boolean;
  sink?: (line: string) => void;
}

/**
 * Renders one argument value. Strings are quoted and long ones cut to fit.
 */
export function formatArgumentValue(value: unknown): string {
  if (typeof value === 'string') {
    const shown =
      value.length > MAX_LOGGED_STRING_LENGTH
        ? `${value.slice(0, TRUNCATED_STRING_LENGTH)}...`
        : value;
    return JSON.stringify(shown);
  }

  if (value === undefined) {
    return 'undefined';
  }

  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function formatToolCall(toolName: string, args: Record<string, unknown>): string {
  const rendered = Object.entries(args)
    .map(([key, value]) => `${key}=${formatArgumentValue(value)}`)
    .join(', ');
  return `TOOL_CALL: ${toolName}(${rendered})`;
}

/**
 * The arguments as the handler sees them, with every declared parameter present.
 * Optional parameters the caller left out are shown as `null`.
 */
export function resolveLoggedArguments(
  parameterNames: readonly string[],
  input: Record<string, unknown>,
): Record<string, unknown> {
  const resolved: Record<string, unknown> = {};
  for (const name of parameterNames) {
    resolved[name] = input[name] ?? null;
  }
  for (const [name, value] of Object.entries(input)) {
    if (!(name in resolved)) {
      resolved[name] = value;
    }
  }
  return resolved;
}

export class RequestLogger {
  private readonly enabled: boolean;
  private readonly sink: (line: string) => void;

  constructor(config: RequestLoggerConfig) {
    this.enabled = config.enabled;
    this.sink =
      config.sink ??
      ((line) => {
        console.error(line);
      });
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  logToolCall(toolName: string, args: Record<string, unknown>): void {
    if (!this.enabled) return;
    this.sink(formatToolCall(toolName, args));
  }
}

/**
 * Wraps each tool handler so the call is logged before it runs. With logging
 * disabled the handler is returned as is.
 */
export function createCallLoggingMiddleware(requestLogger: RequestLogger): ToolMiddleware {
  return <TInput extends Record<string, unknown>>(
    next: ToolHandler<TInput>,
  ): ToolHandler<TInput> => {
    if (!requestLogger.isEnabled()) {
      return next;
    }

    return async (payload) => {
      requestLogger.logToolCall(
        payload.context.name,
        resolveLoggedArguments(payload.context.parameterNames, payload.input),
      );
      return next(payload);
    };
  };
}
