import { parseArgs } from 'util';
import type { CliOptions } from '../types/index.js';

/**
 * Parses process arguments. `--logging` is the only flag; anything else throws.
 */
export function parseCliOptions(argv: string[] = process.argv.slice(2)): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      logging: { type: 'boolean', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return { logging: values.logging === true };
}
