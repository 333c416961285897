import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  z,
  ZodArray,
  ZodBoolean,
  ZodDefault,
  ZodEffects,
  ZodEnum,
  ZodNullable,
  ZodNumber,
  ZodObject,
  ZodOptional,
  ZodString,
  ZodTypeAny,
  ZodUnion,
} from 'zod';

export interface ErrorHandlerContract {
  handleError(error: unknown, context: string): CallToolResult;
  createValidationError(message: string, details?: string): CallToolResult;
}

export interface ToolExecutionContext {
  name: string;
  rawArguments: Record<string, unknown>;
  /** Every parameter the tool's schema declares, in declaration order */
  parameterNames: readonly string[];
}

export interface ToolExecutionPayload<TInput extends Record<string, unknown>> {
  input: TInput;
  context: ToolExecutionContext;
}

export type ToolHandler<TInput extends Record<string, unknown>> = (
  payload: ToolExecutionPayload<TInput>,
) => Promise<CallToolResult>;

/**
 * Wraps a tool handler. Middleware is applied once, when the tool is registered.
 */
export type ToolMiddleware = <TInput extends Record<string, unknown>>(
  next: ToolHandler<TInput>,
) => ToolHandler<TInput>;

export interface ToolDefinition<TInput extends Record<string, unknown> = Record<string, unknown>> {
  name: string;
  description: string;
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  handler: ToolHandler<TInput>;
}

interface RegisteredTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Tool['inputSchema'];
  execute(rawArguments: Record<string, unknown>): Promise<CallToolResult>;
}

export interface ToolExecutionOptions {
  name: string;
  arguments?: Record<string, unknown> | undefined;
}

export interface ToolRegistryDependencies {
  errorHandler: ErrorHandlerContract;
  middleware?: ToolMiddleware[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(private readonly deps: ToolRegistryDependencies) {}

  register<TInput extends Record<string, unknown>>(definition: ToolDefinition<TInput>): void {
    this.assertValidDefinition(definition);

    if (this.tools.has(definition.name)) {
      throw new Error(`Tool '${definition.name}' is already registered`);
    }

    const parameterNames = Object.keys(
      definition.inputSchema instanceof ZodObject ? definition.inputSchema.shape : {},
    );
    const handler = (this.deps.middleware ?? []).reduceRight(
      (next, middleware) => middleware(next),
      definition.handler,
    );

    this.tools.set(definition.name, {
      name: definition.name,
      description: definition.description,
      inputSchema: this.toInputSchema(definition.inputSchema),
      execute: async (rawArguments) => {
        const parsed = definition.inputSchema.safeParse(rawArguments);
        if (!parsed.success) {
          return this.deps.errorHandler.createValidationError(
            `Invalid parameters for ${definition.name}`,
            formatZodIssues(parsed.error),
          );
        }

        try {
          return await handler({
            input: parsed.data,
            context: { name: definition.name, rawArguments, parameterNames },
          });
        } catch (handlerError) {
          return this.deps.errorHandler.handleError(handlerError, `executing ${definition.name}`);
        }
      },
    });
  }

  listTools(): Tool[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));
  }

  getToolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  async executeTool(options: ToolExecutionOptions): Promise<CallToolResult> {
    const tool = this.tools.get(options.name);
    if (!tool) {
      return this.deps.errorHandler.createValidationError(`Unknown tool: ${options.name}`);
    }

    return tool.execute(options.arguments ?? {});
  }

  private assertValidDefinition<TInput extends Record<string, unknown>>(
    definition: ToolDefinition<TInput>,
  ): void {
    if (!definition.name) {
      throw new Error('Tool definition requires a non-empty name');
    }

    if (!definition.description) {
      throw new Error(`Tool '${definition.name}' requires a description`);
    }

    if (!(definition.inputSchema instanceof ZodObject)) {
      throw new Error(`Tool '${definition.name}' requires a Zod object schema`);
    }
  }

  private toInputSchema(schema: ZodTypeAny): Tool['inputSchema'] {
    const json = this.convertZodTypeToJsonSchema(schema);
    const properties = json['properties'];
    const required = json['required'];

    return {
      type: 'object',
      ...(isRecord(properties) ? { properties } : {}),
      ...(Array.isArray(required) && required.length > 0 ? { required } : {}),
      additionalProperties: false,
    };
  }

  private convertZodTypeToJsonSchema(type: ZodTypeAny): Record<string, unknown> {
    const converted = this.convertWithoutDescription(type);
    if (type.description && converted['description'] === undefined) {
      converted['description'] = type.description;
    }
    return converted;
  }

  private convertWithoutDescription(type: ZodTypeAny): Record<string, unknown> {
    if (type instanceof ZodObject) {
      const properties: Record<string, unknown> = {};
      const required: string[] = [];

      for (const [key, value] of Object.entries<ZodTypeAny>(type.shape)) {
        const { schema: propertySchema, optional, defaultValue } = this.unwrapOptional(value);
        const property = this.convertZodTypeToJsonSchema(propertySchema);
        if (value.description && property['description'] === undefined) {
          property['description'] = value.description;
        }
        if (defaultValue !== undefined) {
          property['default'] = defaultValue;
        }
        properties[key] = property;
        if (!optional) {
          required.push(key);
        }
      }

      return { type: 'object', properties, required };
    }

    if (type instanceof ZodArray) {
      return {
        type: 'array',
        items: this.convertZodTypeToJsonSchema(type.element),
      };
    }

    if (type instanceof ZodString) {
      return { type: 'string' };
    }

    if (type instanceof ZodNumber) {
      return { type: type.isInt ? 'integer' : 'number' };
    }

    if (type instanceof ZodBoolean) {
      return { type: 'boolean' };
    }

    if (type instanceof ZodEnum) {
      return {
        type: 'string',
        enum: [...type.options],
      };
    }

    if (type instanceof ZodUnion) {
      return {
        anyOf: type.options.map((option: ZodTypeAny) => this.convertZodTypeToJsonSchema(option)),
      };
    }

    if (type instanceof ZodEffects) {
      return this.convertZodTypeToJsonSchema(type.innerType());
    }

    if (type instanceof ZodDefault) {
      return this.convertZodTypeToJsonSchema(type.removeDefault());
    }

    if (type instanceof ZodNullable) {
      return {
        anyOf: [this.convertZodTypeToJsonSchema(type.unwrap()), { type: 'null' }],
      };
    }

    if (type instanceof ZodOptional) {
      return this.convertZodTypeToJsonSchema(type.unwrap());
    }

    return {};
  }

  private unwrapOptional(value: ZodTypeAny): {
    schema: ZodTypeAny;
    optional: boolean;
    defaultValue?: unknown;
  } {
    if (value instanceof ZodOptional) {
      const inner = this.unwrapOptional(value.unwrap());
      return { ...inner, optional: true };
    }

    if (value instanceof ZodDefault) {
      const inner = this.unwrapOptional(value.removeDefault());
      return { ...inner, optional: true, defaultValue: value._def.defaultValue() };
    }

    return { schema: value, optional: false };
  }
}
