import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { createLogger, type Logger } from './logger.js';

/**
 * Response formatter contract for dependency injection in error handling
 */
interface ErrorResponseFormatter {
  format(value: unknown): string;
}

/**
 * Body of every failed tool call
 */
export interface ErrorPayload {
  error: string;
}

export class ValidationError extends Error {
  public readonly details?: string | undefined;

  constructor(message: string, details?: string | undefined) {
    super(details ? `${message}: ${details}` : message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * The ynab client rejects with the parsed response body, `{ error: { id, name, detail } }`,
 * rather than an Error instance.
 */
function describeYnabApiError(error: unknown): string | null {
  if (!isRecord(error) || !isRecord(error['error'])) {
    return null;
  }

  const payload = error['error'];
  const id = typeof payload['id'] === 'string' ? payload['id'] : undefined;
  const name = typeof payload['name'] === 'string' ? payload['name'] : undefined;
  const detail = typeof payload['detail'] === 'string' ? payload['detail'] : undefined;

  if (!id && !name && !detail) {
    return null;
  }

  const label = [id, name].filter(Boolean).join(' ');
  if (label && detail) {
    return `${label}: ${detail}`;
  }
  return label || detail || null;
}

/**
 * Renders any thrown value as the string placed in `{ "error": ... }`.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }

  if (typeof error === 'string') {
    return error;
  }

  const ynabMessage = describeYnabApiError(error);
  if (ynabMessage) {
    return ynabMessage;
  }

  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Centralized error handling for all tools. Failures become a normal tool result
 * carrying `{ "error": "<message>" }` and are logged to stderr.
 */
export class ErrorHandler {
  private static defaultInstance: ErrorHandler | undefined;

  constructor(
    private readonly formatter: ErrorResponseFormatter,
    private readonly logger: Logger = createLogger(),
  ) {}

  /**
   * Replaces the instance used by `withToolErrorHandling`
   */
  static setDefault(handler: ErrorHandler): void {
    ErrorHandler.defaultInstance = handler;
  }

  static getDefault(): ErrorHandler {
    if (!ErrorHandler.defaultInstance) {
      ErrorHandler.defaultInstance = new ErrorHandler({
        format: (value: unknown) => JSON.stringify(value),
      });
    }
    return ErrorHandler.defaultInstance;
  }

  handleError(error: unknown, context: string): CallToolResult {
    const message = describeError(error);

    if (error instanceof ValidationError) {
      this.logger.warn(`Rejected ${context}: ${message}`);
    } else {
      this.logger.error(`Error ${context}: ${message}`);
    }

    return this.toResult({ error: message });
  }

  createValidationError(message: string, details?: string): CallToolResult {
    return this.handleError(new ValidationError(message, details), 'validating parameters');
  }

  async withErrorHandling<T>(
    operation: () => Promise<T>,
    context: string,
  ): Promise<T | CallToolResult> {
    try {
      return await operation();
    } catch (error) {
      return this.handleError(error, context);
    }
  }

  private toResult(payload: ErrorPayload): CallToolResult {
    let text: string;
    try {
      text = this.formatter.format(payload);
    } catch {
      text = JSON.stringify(payload);
    }

    return {
      content: [
        {
          type: 'text',
          text,
        },
      ],
    };
  }
}

export function createErrorHandler(formatter: ErrorResponseFormatter, logger?: Logger): ErrorHandler {
  return new ErrorHandler(formatter, logger);
}

/**
 * Utility function for wrapping tool operations with error handling
 */
export async function withToolErrorHandling<T>(
  operation: () => Promise<T>,
  toolName: string,
  operationName: string,
): Promise<T | CallToolResult> {
  return ErrorHandler.getDefault().withErrorHandling(
    operation,
    `executing ${toolName} - ${operationName}`,
  );
}
