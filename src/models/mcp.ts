/**
 * Model adapter that calls a tool on a remote Model Context Protocol server.
 *
 * The adapter requires `warmup()`: it connects once, checks that the server
 * exposes the configured tool, and only then accepts predictions. Every call
 * opens its own session; `predictBatch` runs up to `maxConcurrency` calls at
 * once and returns responses in input order.
 */

import pLimit from 'p-limit';
import { z } from 'zod';
import { parseParams } from '../config/params.js';
import { ConfigurationError, EvalError, ModelInvocationError, NotReadyError } from '../errors.js';
import { type Logger, silentLogger } from '../logger.js';
import { createModelResponse, type Example, type ModelResponse } from '../types.js';
import { ModelAdapter } from './base.js';
import { connectSseSession, type SessionFactory, type ToolSession } from './mcp-session.js';

const DEFAULT_MAX_CONCURRENCY = 4;

const authObjectSchema = z
  .object({
    type: z.string().optional(),
    scheme: z.string().optional(),
    kind: z.string().optional(),
    name: z.string().optional(),
    token: z.union([z.string(), z.object({ env: z.string() })]).optional(),
    value: z.union([z.string(), z.object({ env: z.string() })]).optional(),
    token_env: z.string().optional(),
    value_env: z.string().optional(),
    env: z.string().optional(),
  })
  .strict();

export const mcpOptionsSchema = z.object({
  endpoint: z.string().url(),
  /** Name of the tool that plays the model. */
  modelId: z.string().min(1),
  /** A bearer token, or a structured auth block. */
  auth: z.union([z.string(), authObjectSchema]).optional(),
  instruction: z.string().optional(),
  headers: z.record(z.string(), z.string()).optional(),
  transport: z.literal('sse').optional(),
  /** Per-call timeout in seconds. */
  requestTimeout: z.number().positive().optional(),
  batchSize: z.number().int().positive().optional(),
  maxConcurrency: z.number().int().positive().optional(),
  name: z.string().nullish(),
});

export type McpOptions = z.input<typeof mcpOptionsSchema>;
type McpAuth = z.infer<typeof authObjectSchema>;

const contentBlockSchema = z.object({ type: z.string() }).passthrough();

const toolResultSchema = z
  .object({
    content: z.array(contentBlockSchema).default([]),
    structuredContent: z.record(z.string(), z.unknown()).optional(),
    isError: z.boolean().optional(),
  })
  .passthrough();

type ToolResult = z.infer<typeof toolResultSchema>;

export interface McpDependencies {
  sessionFactory?: SessionFactory;
  logger?: Logger;
  env?: Record<string, string | undefined>;
}

export class McpModelAdapter extends ModelAdapter {
  readonly endpoint: string;
  readonly modelId: string;
  readonly instruction: string | null;
  readonly requestTimeout: number | null;
  readonly maxConcurrency: number;

  private readonly headers: Record<string, string>;
  private readonly sessionFactory: SessionFactory;
  private readonly logger: Logger;
  private serverInfo: Record<string, unknown> | null = null;

  constructor(opts: McpOptions, deps: McpDependencies = {}) {
    super({ name: opts.name, batchSize: opts.batchSize });
    if (!opts.endpoint) {
      throw new ConfigurationError("'endpoint' must be provided for the MCP adapter");
    }
    if (!opts.modelId) {
      throw new ConfigurationError("'modelId' must be provided for the MCP adapter");
    }

    this.endpoint = opts.endpoint;
    this.modelId = opts.modelId;
    this.instruction = opts.instruction ?? null;
    this.requestTimeout = opts.requestTimeout ?? null;
    this.maxConcurrency = opts.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
    this.sessionFactory = deps.sessionFactory ?? connectSseSession;
    this.logger = deps.logger ?? silentLogger;
    this.headers = buildHeaders(opts.auth, opts.headers, deps.env ?? process.env);
  }

  static fromParams(params: Record<string, unknown>, deps?: McpDependencies): McpModelAdapter {
    return new McpModelAdapter(parseParams(mcpOptionsSchema, params, 'mcp'), deps);
  }

  protected async prepare(): Promise<void> {
    const tools = await this.withSession(null, (session) => session.listTools());
    const available = new Set(tools.tools.map((tool) => tool.name));
    if (!available.has(this.modelId)) {
      throw new ModelInvocationError(
        `MCP server at ${this.endpoint} does not expose tool '${this.modelId}'`,
      );
    }
    this.logger.debug(`MCP tool '${this.modelId}' is available at ${this.endpoint}`);
  }

  async predict(example: Example): Promise<ModelResponse> {
    if (!this.ready) {
      throw new NotReadyError(this.name);
    }

    const raw = await this.withSession(example.uid, (session) =>
      session.callTool(
        { name: this.modelId, arguments: this.formatArguments(example) },
        { timeoutMs: this.requestTimeout === null ? undefined : this.requestTimeout * 1000 },
      ),
    );

    const parsed = toolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ModelInvocationError(
        `MCP tool '${this.modelId}' returned a malformed result for example ${example.uid}`,
        { uid: example.uid, cause: parsed.error },
      );
    }

    const result = parsed.data;
    if (result.isError) {
      const message = this.formatErrorMessage(result);
      this.logger.error(message);
      throw new ModelInvocationError(message, { uid: example.uid });
    }

    return createModelResponse({
      uid: example.uid,
      output: extractOutput(result),
      metadata: this.buildMetadata(result, example.uid),
    });
  }

  async predictBatch(examples: readonly Example[]): Promise<ModelResponse[]> {
    if (!this.ready) {
      throw new NotReadyError(this.name);
    }
    const limit = pLimit(this.maxConcurrency);
    let failed = false;
    // Calls still queued after a failure are skipped; those in flight are joined.
    const outcomes = await Promise.allSettled(
      examples.map((example) =>
        limit(async () => {
          if (failed) return null;
          try {
            return await this.predict(example);
          } catch (e) {
            failed = true;
            throw e;
          }
        }),
      ),
    );

    const responses: ModelResponse[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
      if (outcome.value !== null) {
        responses.push(outcome.value);
      }
    }
    return responses;
  }

  formatArguments(example: Example): Record<string, unknown> {
    const metadata: Record<string, unknown> = { uid: example.uid };
    if (Object.keys(example.metadata).length > 0) {
      metadata.example = toJsonValue(example.metadata);
    }

    return {
      model: this.modelId,
      messages: [{ role: 'user', content: { type: 'text', text: this.renderText(example) } }],
      input: toJsonValue(example.inputs),
      metadata,
    };
  }

  private renderText(example: Example): string {
    const raw = example.inputs.text;
    const text = typeof raw === 'string' ? raw : JSON.stringify(toJsonValue(example.inputs));
    return this.instruction ? `${this.instruction.trim()}\n\n${text}` : text;
  }

  private buildMetadata(result: ToolResult, uid: string): Record<string, unknown> {
    const metadata: Record<string, unknown> = {
      tool: this.modelId,
      content: result.content,
    };
    if (result.structuredContent !== undefined) {
      metadata.structured = result.structuredContent;
    }
    if (this.serverInfo !== null) {
      metadata.server_info = this.serverInfo;
    }
    metadata.example_uid = uid;
    return metadata;
  }

  private formatErrorMessage(result: ToolResult): string {
    const fragments = textBlocks(result);
    let detail = fragments.length > 0 ? fragments.join('\n') : '(no error message provided)';
    if (result.structuredContent) {
      detail = `${detail}\nStructured payload: ${JSON.stringify(result.structuredContent)}`;
    }
    return `MCP tool '${this.modelId}' returned an error response: ${detail}`;
  }

  private async withSession<T>(
    uid: string | null,
    fn: (session: ToolSession) => Promise<T>,
  ): Promise<T> {
    let session: ToolSession;
    try {
      session = await this.sessionFactory({ endpoint: this.endpoint, headers: this.headers });
    } catch (e) {
      throw this.wrapFailure(e, uid, 'connect to');
    }

    try {
      this.serverInfo = session.serverInfo();
      return await fn(session);
    } catch (e) {
      throw this.wrapFailure(e, uid, 'call');
    } finally {
      await this.closeSession(session);
    }
  }

  private async closeSession(session: ToolSession): Promise<void> {
    try {
      await session.close();
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      this.logger.warn(`Failed to close MCP session at ${this.endpoint}: ${reason}`);
    }
  }

  private wrapFailure(e: unknown, uid: string | null, action: string): EvalError {
    if (e instanceof EvalError) return e;
    const error = e instanceof Error ? e : new Error(String(e));
    const target = uid === null ? '' : ` for example ${uid}`;
    const message = `Failed to ${action} MCP server at ${this.endpoint}${target}: ${error.message}`;
    this.logger.error(message);
    return new ModelInvocationError(message, { uid, cause: error });
  }
}

function textBlocks(result: ToolResult): string[] {
  const texts: string[] = [];
  for (const block of result.content) {
    if (block.type === 'text' && typeof block.text === 'string') {
      texts.push(block.text);
    }
  }
  return texts;
}

function extractOutput(result: ToolResult): unknown {
  const texts = textBlocks(result);
  if (texts.length > 0) return texts.join('\n');
  if (result.structuredContent !== undefined) return result.structuredContent;
  return '';
}

function toJsonValue(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value ?? null));
}

function buildHeaders(
  auth: McpOptions['auth'],
  headers: Record<string, string> | undefined,
  env: Record<string, string | undefined>,
): Record<string, string> {
  const resolved: Record<string, string> = { ...(headers ?? {}) };
  if (auth === undefined) return resolved;

  if (typeof auth === 'string') {
    resolved.Authorization = `Bearer ${auth}`;
    return resolved;
  }

  const scheme = (auth.type ?? auth.scheme ?? auth.kind ?? 'bearer').toLowerCase();
  if (scheme === 'bearer') {
    resolved.Authorization = `Bearer ${extractSecret(auth, 'token', [], env)}`;
    return resolved;
  }
  if (scheme === 'header' || scheme === 'api_key') {
    if (!auth.name) {
      throw new ConfigurationError(`Auth configuration for '${scheme}' requires a 'name'`);
    }
    resolved[auth.name] = extractSecret(auth, 'value', ['token'], env);
    return resolved;
  }
  throw new ConfigurationError(`Unsupported auth scheme '${scheme}' for MCP adapter`);
}

function extractSecret(
  auth: McpAuth,
  primary: 'token' | 'value',
  fallbacks: readonly ('token' | 'value')[],
  env: Record<string, string | undefined>,
): string {
  for (const key of [primary, ...fallbacks]) {
    const direct = auth[key];
    if (typeof direct === 'string') return direct;
    if (direct !== undefined) return readEnv(direct.env, env);

    const envKey = key === 'token' ? auth.token_env : auth.value_env;
    if (envKey !== undefined) return readEnv(envKey, env);
  }
  if (auth.env !== undefined) return readEnv(auth.env, env);
  throw new ConfigurationError(`No value provided for '${primary}' in auth configuration`);
}

function readEnv(name: string, env: Record<string, string | undefined>): string {
  const value = env[name];
  if (value === undefined) {
    throw new ConfigurationError(`Environment variable '${name}' is required for MCP auth`);
  }
  return value;
}
