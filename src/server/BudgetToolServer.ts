import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import fs from 'fs';
import { fileURLToPath } from 'url';
import * as ynab from 'ynab';
import { ConfigurationError, ErrorHandler, ServerConfig } from '../types/index.js';
import { createErrorHandler } from './errorHandler.js';
import { BudgetResolver } from './budgetResolver.js';
import { YnabClientProvider } from './clientProvider.js';
import { createLogger, type Logger } from './logger.js';
import { RequestLogger, createCallLoggingMiddleware } from './requestLogger.js';
import { responseFormatter } from './responseFormatter.js';
import { ToolRegistry, type ToolDefinition, type ToolExecutionPayload } from './toolRegistry.js';
import {
  handleGetBudgets,
  handleGetBudgetById,
  handleGetBudgetSettings,
  GetBudgetsSchema,
  GetBudgetSchema,
  GetBudgetSettingsSchema,
  type GetBudgetsParams,
} from '../tools/budgetTools.js';
import {
  handleGetAccounts,
  handleGetAccountById,
  handleCreateAccount,
  handleGetAccountBalance,
  GetAccountsSchema,
  GetAccountSchema,
  CreateAccountSchema,
} from '../tools/accountTools.js';
import {
  handleGetCategories,
  handleGetCategoryById,
  handleGetMonthCategory,
  handleUpdateCategory,
  handleUpdateMonthCategory,
  handleGetCategoryBalance,
  GetCategoriesSchema,
  GetCategorySchema,
  GetMonthCategorySchema,
  UpdateCategorySchema,
  UpdateMonthCategorySchema,
  GetCategoryBalanceSchema,
} from '../tools/categoryTools.js';
import {
  handleGetPayees,
  handleGetPayeeById,
  handleUpdatePayee,
  handleGetPayeeLocations,
  handleGetPayeeLocationById,
  handleGetPayeeLocationsByPayee,
  handleSearchPayees,
  GetPayeesSchema,
  GetPayeeSchema,
  UpdatePayeeSchema,
  GetPayeeLocationsSchema,
  GetPayeeLocationSchema,
  SearchPayeesSchema,
} from '../tools/payeeTools.js';
import {
  handleGetTransactions,
  handleGetTransactionById,
  handleCreateTransaction,
  handleUpdateTransaction,
  handleDeleteTransaction,
  handleImportTransactions,
  GetTransactionsSchema,
  GetTransactionSchema,
  CreateTransactionSchema,
  UpdateTransactionSchema,
  ImportTransactionsSchema,
} from '../tools/transactionTools.js';
import { handleGetUser, handleVerifyApiKey, NoInputSchema } from '../tools/userTools.js';

export interface BudgetToolServerOptions {
  config: ServerConfig;
  /** Log every tool call to stderr (`--logging`) */
  logging?: boolean;
  clientProvider?: YnabClientProvider;
  logger?: Logger;
  callLogSink?: (line: string) => void;
  exitOnError?: boolean;
}

type BudgetScopedHandler<TInput extends { budget_id: string }> = (
  ynabAPI: ynab.API,
  params: TInput,
) => Promise<CallToolResult>;

/**
 * MCP server exposing YNAB operations as tools over stdio
 */
export class BudgetToolServer {
  private readonly server: Server;
  private readonly config: ServerConfig;
  private readonly logger: Logger;
  private readonly exitOnError: boolean;
  private readonly serverVersion: string;
  private readonly budgetResolver: BudgetResolver;
  private readonly clientProvider: YnabClientProvider;
  private readonly requestLogger: RequestLogger;
  private readonly toolRegistry: ToolRegistry;

  constructor(options: BudgetToolServerOptions) {
    this.config = options.config;
    this.exitOnError = options.exitOnError ?? true;
    this.logger = options.logger ?? createLogger(this.config.logLevel);

    this.serverVersion = this.readPackageVersion() ?? '0.0.0';

    this.server = new Server(
      {
        name: this.config.serverName,
        version: this.serverVersion,
      },
      {
        capabilities: {
          tools: {},
        },
      },
    );

    responseFormatter.configure({
      minify: this.config.minifyOutput,
      prettySpaces: this.config.prettySpaces,
    });

    const errorHandler = createErrorHandler(responseFormatter, this.logger);
    ErrorHandler.setDefault(errorHandler);

    this.budgetResolver = new BudgetResolver(this.config.defaultBudgetId);
    this.clientProvider =
      options.clientProvider ?? new YnabClientProvider(this.config.apiKey, undefined, this.logger);
    this.requestLogger = new RequestLogger({
      enabled: options.logging ?? false,
      ...(options.callLogSink ? { sink: options.callLogSink } : {}),
    });

    this.toolRegistry = new ToolRegistry({
      errorHandler,
      middleware: [createCallLoggingMiddleware(this.requestLogger)],
    });

    this.setupToolRegistry();
    this.setupHandlers();
  }

  /**
   * Sets up MCP server request handlers
   */
  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: this.toolRegistry.listTools(),
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      return this.handleCallTool(request.params.name, request.params.arguments);
    });
  }

  private setupToolRegistry(): void {
    const register = <TInput extends Record<string, unknown>>(
      definition: ToolDefinition<TInput>,
    ): void => {
      this.toolRegistry.register(definition);
    };

    const adapt =
      <TInput extends Record<string, unknown>>(
        handler: (ynabAPI: ynab.API, params: TInput) => Promise<CallToolResult>,
      ) =>
      async ({ input }: ToolExecutionPayload<TInput>): Promise<CallToolResult> =>
        this.clientProvider.withClient((ynabAPI) => handler(ynabAPI, input));

    const adaptWithBudget =
      <TInput extends Record<string, unknown> & { budget_id: string }>(
        handler: BudgetScopedHandler<TInput>,
      ) =>
      async ({ input }: ToolExecutionPayload<TInput>): Promise<CallToolResult> =>
        this.clientProvider.withClient((ynabAPI) =>
          handler(ynabAPI, { ...input, budget_id: this.budgetResolver.resolve(input.budget_id) }),
        );

    const adaptNoInput =
      (handler: (ynabAPI: ynab.API) => Promise<CallToolResult>) =>
      async (_payload: ToolExecutionPayload<Record<string, unknown>>): Promise<CallToolResult> =>
        this.clientProvider.withClient(handler);

    // Budgets
    register({
      name: 'get_budgets',
      description:
        "List all budgets with their currency and date formats, the account's default budget and the configured default.",
      inputSchema: GetBudgetsSchema,
      handler: adapt((ynabAPI: ynab.API, params: GetBudgetsParams) =>
        handleGetBudgets(ynabAPI, params, this.budgetResolver.getDefaultBudgetId()),
      ),
    });

    register({
      name: 'get_budget_by_id',
      description:
        'Get a full budget: accounts, category groups with their categories, payees and months.',
      inputSchema: GetBudgetSchema,
      handler: adaptWithBudget(handleGetBudgetById),
    });

    register({
      name: 'get_budget_settings',
      description: 'Get the date and currency format settings of a budget.',
      inputSchema: GetBudgetSettingsSchema,
      handler: adaptWithBudget(handleGetBudgetSettings),
    });

    // Accounts
    register({
      name: 'get_accounts',
      description: 'List accounts in a budget. Closed and deleted accounts are omitted unless requested.',
      inputSchema: GetAccountsSchema,
      handler: adaptWithBudget(handleGetAccounts),
    });

    register({
      name: 'get_account_by_id',
      description: 'Get a single account by ID.',
      inputSchema: GetAccountSchema,
      handler: adaptWithBudget(handleGetAccountById),
    });

    register({
      name: 'create_account',
      description: 'Create an account with a starting balance in milliunits.',
      inputSchema: CreateAccountSchema,
      handler: adaptWithBudget(handleCreateAccount),
    });

    register({
      name: 'get_account_balance',
      description: 'Get the working, cleared and uncleared balance of an account.',
      inputSchema: GetAccountSchema,
      handler: adaptWithBudget(handleGetAccountBalance),
    });

    // Categories
    register({
      name: 'get_categories',
      description: 'List categories grouped by category group.',
      inputSchema: GetCategoriesSchema,
      handler: adaptWithBudget(handleGetCategories),
    });

    register({
      name: 'get_category_by_id',
      description: 'Get a category for the current month.',
      inputSchema: GetCategorySchema,
      handler: adaptWithBudget(handleGetCategoryById),
    });

    register({
      name: 'get_month_category',
      description: 'Get a category for a specific budget month.',
      inputSchema: GetMonthCategorySchema,
      handler: adaptWithBudget(handleGetMonthCategory),
    });

    register({
      name: 'update_category',
      description: 'Update the name, note or hidden flag of a category. Omitted fields are left as they are.',
      inputSchema: UpdateCategorySchema,
      handler: adaptWithBudget(handleUpdateCategory),
    });

    register({
      name: 'update_month_category',
      description: 'Set the amount budgeted to a category for a month, in milliunits.',
      inputSchema: UpdateMonthCategorySchema,
      handler: adaptWithBudget(handleUpdateMonthCategory),
    });

    register({
      name: 'get_category_balance',
      description: 'Get the budgeted, activity and available amounts of a category, optionally for a month.',
      inputSchema: GetCategoryBalanceSchema,
      handler: adaptWithBudget(handleGetCategoryBalance),
    });

    // Payees
    register({
      name: 'get_payees',
      description: 'List payees in a budget.',
      inputSchema: GetPayeesSchema,
      handler: adaptWithBudget(handleGetPayees),
    });

    register({
      name: 'get_payee_by_id',
      description: 'Get a single payee by ID.',
      inputSchema: GetPayeeSchema,
      handler: adaptWithBudget(handleGetPayeeById),
    });

    register({
      name: 'update_payee',
      description: 'Rename a payee.',
      inputSchema: UpdatePayeeSchema,
      handler: adaptWithBudget(handleUpdatePayee),
    });

    register({
      name: 'get_payee_locations',
      description: 'List the GPS locations recorded for payees in a budget.',
      inputSchema: GetPayeeLocationsSchema,
      handler: adaptWithBudget(handleGetPayeeLocations),
    });

    register({
      name: 'get_payee_location_by_id',
      description: 'Get a single payee location by ID.',
      inputSchema: GetPayeeLocationSchema,
      handler: adaptWithBudget(handleGetPayeeLocationById),
    });

    register({
      name: 'get_payee_locations_by_payee',
      description: 'List the locations recorded for one payee.',
      inputSchema: GetPayeeSchema,
      handler: adaptWithBudget(handleGetPayeeLocationsByPayee),
    });

    register({
      name: 'search_payees',
      description: 'Find payees whose name contains the search term, ignoring case.',
      inputSchema: SearchPayeesSchema,
      handler: adaptWithBudget(handleSearchPayees),
    });

    // Transactions
    register({
      name: 'get_transactions',
      description:
        'List transactions, optionally since a date or limited to uncategorized or unapproved ones.',
      inputSchema: GetTransactionsSchema,
      handler: adaptWithBudget(handleGetTransactions),
    });

    register({
      name: 'get_transaction_by_id',
      description: 'Get a single transaction by ID, including split lines.',
      inputSchema: GetTransactionSchema,
      handler: adaptWithBudget(handleGetTransactionById),
    });

    register({
      name: 'create_transaction',
      description: 'Create a transaction. Amount is in milliunits, negative for outflows.',
      inputSchema: CreateTransactionSchema,
      handler: adaptWithBudget(handleCreateTransaction),
    });

    register({
      name: 'update_transaction',
      description: 'Update fields of a transaction. Omitted fields are left as they are.',
      inputSchema: UpdateTransactionSchema,
      handler: adaptWithBudget(handleUpdateTransaction),
    });

    register({
      name: 'delete_transaction',
      description: 'Delete a transaction.',
      inputSchema: GetTransactionSchema,
      handler: adaptWithBudget(handleDeleteTransaction),
    });

    register({
      name: 'import_transactions',
      description: 'Import pending transactions from linked accounts.',
      inputSchema: ImportTransactionsSchema,
      handler: adaptWithBudget(handleImportTransactions),
    });

    // User
    register({
      name: 'get_user',
      description: 'Get the authenticated YNAB user.',
      inputSchema: NoInputSchema,
      handler: adaptNoInput(handleGetUser),
    });

    register({
      name: 'verify_api_key',
      description: 'Check that the configured YNAB API key is accepted.',
      inputSchema: NoInputSchema,
      handler: adaptNoInput(handleVerifyApiKey),
    });

    this.logger.debug(`Registered ${this.toolRegistry.getToolNames().length} tools`);
  }

  async handleCallTool(
    name: string,
    args: Record<string, unknown> | undefined,
  ): Promise<CallToolResult> {
    return this.toolRegistry.executeTool({ name, arguments: args });
  }

  listTools(): Tool[] {
    return this.toolRegistry.listTools();
  }

  /**
   * Builds the YNAB client, then serves over stdio. A missing API key stops
   * startup before the transport is opened.
   */
  async run(): Promise<void> {
    try {
      this.clientProvider.getClient();

      const transport = new StdioServerTransport();
      await this.server.connect(transport);

      this.logger.info(
        `${this.config.serverName} ${this.serverVersion} started (call logging ${
          this.requestLogger.isEnabled() ? 'enabled' : 'disabled'
        })`,
      );
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error(`Server startup failed: ${error.message}`);
        if (this.exitOnError) {
          process.exit(1);
        }
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  /**
   * Try to read the package version for accurate server metadata
   */
  private readPackageVersion(): string | null {
    try {
      const packagePath = fileURLToPath(new URL('../../package.json', import.meta.url));
      const pkg: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
      return null;
    } catch {
      return null;
    }
  }
}
