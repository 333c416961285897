import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export interface ResponseFormatterOptions {
  minify?: boolean;
  prettySpaces?: number;
}

/**
 * JSON encoder for tool payloads. Minified by default.
 */
class ResponseFormatter {
  private minify = true;
  private prettySpaces = 2;

  configure(options?: ResponseFormatterOptions): void {
    if (!options) return;
    if (typeof options.minify === 'boolean') this.minify = options.minify;
    if (typeof options.prettySpaces === 'number' && options.prettySpaces >= 0) {
      this.prettySpaces = options.prettySpaces;
    }
  }

  format(value: unknown): string {
    if (this.minify) return JSON.stringify(value);
    return JSON.stringify(value, null, this.prettySpaces);
  }
}

export const responseFormatter = new ResponseFormatter();

/**
 * Wraps a success payload as the single text item of a tool result.
 */
export function jsonResult(value: unknown): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: responseFormatter.format(value),
      },
    ],
  };
}
