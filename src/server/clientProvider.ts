import * as ynab from 'ynab';
import { ConfigurationError } from '../types/index.js';
import { createLogger, type Logger } from './logger.js';

export type YnabApiFactory = (apiKey: string) => ynab.API;

export const MISSING_API_KEY_MESSAGE = 'YNAB_API_KEY environment variable is not set';

/**
 * Owns the single YNAB API handle for the process. The handle is built on first
 * use and shared by every tool call afterwards.
 */
export class YnabClientProvider {
  private client: ynab.API | undefined;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly factory: YnabApiFactory = (key) => new ynab.API(key),
    private readonly logger: Logger = createLogger(),
  ) {}

  /**
   * @throws ConfigurationError when no API key is configured
   */
  getClient(): ynab.API {
    if (this.client === undefined) {
      if (!this.apiKey) {
        throw new ConfigurationError(MISSING_API_KEY_MESSAGE);
      }
      this.client = this.factory(this.apiKey);
      this.logger.info('YNAB API client initialized');
    }
    return this.client;
  }

  /**
   * Runs one operation against the shared handle.
   */
  async withClient<T>(operation: (api: ynab.API) => Promise<T>): Promise<T> {
    return operation(this.getClient());
  }

  isInitialized(): boolean {
    return this.client !== undefined;
  }
}
