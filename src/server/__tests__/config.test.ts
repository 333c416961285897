import { describe, it, expect } from 'vitest';
import { loadConfig, DEFAULT_SERVER_NAME } from '../config.js';
import { ConfigurationError } from '../../types/index.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      apiKey: undefined,
      defaultBudgetId: undefined,
      serverName: DEFAULT_SERVER_NAME,
      logLevel: 'info',
      minifyOutput: true,
      prettySpaces: 2,
    });
  });

  it('reads and trims every variable', () => {
    const config = loadConfig({
      YNAB_API_KEY: '  test-api-key  ',
      DEFAULT_BUDGET_ID: 'budget-123',
      MCP_SERVER_NAME: 'My Budget',
      LOG_LEVEL: 'DEBUG',
      MCP_MINIFY_OUTPUT: 'false',
      MCP_PRETTY_SPACES: '4',
    });

    expect(config).toEqual({
      apiKey: 'test-api-key',
      defaultBudgetId: 'budget-123',
      serverName: 'My Budget',
      logLevel: 'debug',
      minifyOutput: false,
      prettySpaces: 4,
    });
  });

  it('treats blank values as absent', () => {
    const config = loadConfig({ YNAB_API_KEY: '   ', DEFAULT_BUDGET_ID: '', MCP_SERVER_NAME: ' ' });
    expect(config.apiKey).toBeUndefined();
    expect(config.defaultBudgetId).toBeUndefined();
    expect(config.serverName).toBe(DEFAULT_SERVER_NAME);
  });

  it('does not fail when the API key is missing', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'warn' })).not.toThrow();
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL must be one of/);
  });

  it('rejects a non-numeric indent', () => {
    expect(() => loadConfig({ MCP_PRETTY_SPACES: 'wide' })).toThrow(ConfigurationError);
  });
});
