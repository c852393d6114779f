// This module implements the MCP JSON-RPC dispatcher and its streamable HTTP transport.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { PetStore } from '../types/domain.js';
import {
  JSON_RPC_INTERNAL_ERROR,
  JSON_RPC_INVALID_PARAMS,
  JSON_RPC_INVALID_REQUEST,
  JSON_RPC_METHOD_NOT_FOUND,
  JSON_RPC_PARSE_ERROR,
  type JsonRpcError,
  type JsonRpcId,
  type JsonRpcResponse
} from '../types/mcp.js';
import { AppError, describeFirstIssue, normalizeError } from '../utils/errors.js';
import { errorForLog, shapeForLog } from '../utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import { MCP_LOG_LEVELS, isMcpLogLevel, type McpLogLevelState } from './log-level.js';
import { getPrompt, listPrompts } from './prompts.js';
import { listResources, readResource } from './resources.js';
import { createMcpSession, type McpSession, type McpSessionStore } from './session.js';
import { buildToolList } from './tool-schemas.js';
import { executeTool } from './tools.js';

export const MCP_SESSION_HEADER = 'mcp-session-id';

export const SUPPORTED_METHODS = [
  'initialize',
  'initialized',
  'notifications/initialized',
  'ping',
  'tools/list',
  'tools/call',
  'resources/list',
  'resources/read',
  'prompts/list',
  'prompts/get',
  'logging/setLevel'
] as const;

function isSupportedMethod(method: string): boolean {
  return SUPPORTED_METHODS.some((name) => name === method);
}

export interface McpDispatcherDeps {
  store: PetStore;
  logLevel: McpLogLevelState;
  strictSession: boolean;
  logger: FastifyBaseLogger;
}

export interface McpRouteDeps {
  store: PetStore;
  logLevel: McpLogLevelState;
  strictSession: boolean;
  sessions: McpSessionStore;
}

const initializeParamsSchema = z.object({
  protocolVersion: z.string().optional(),
  capabilities: z.record(z.unknown()).optional(),
  clientInfo: z
    .object({
      name: z.string(),
      version: z.string()
    })
    .optional()
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonRpcId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || typeof value === 'number';
}

// This helper creates a canonical JSON-RPC error payload.
export function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  const error: JsonRpcError = { code, message };
  if (data !== undefined) {
    error.data = data;
  }

  return {
    jsonrpc: '2.0',
    id,
    error
  };
}

// This helper maps application errors onto the JSON-RPC code space; anything unrecognized is an internal error.
export function mapAppErrorToRpc(error: AppError): JsonRpcError {
  switch (error.code) {
    case 'invalid_params':
    case 'validation_error':
    case 'resource_not_found':
    case 'prompt_not_found':
      return error.details === undefined
        ? { code: JSON_RPC_INVALID_PARAMS, message: error.message }
        : { code: JSON_RPC_INVALID_PARAMS, message: error.message, data: error.details };
    case 'method_not_found':
      return { code: JSON_RPC_METHOD_NOT_FOUND, message: error.message };
    case 'session_not_initialized':
      return { code: JSON_RPC_INVALID_REQUEST, message: error.message };
    default:
      return { code: JSON_RPC_INTERNAL_ERROR, message: `Internal error: ${error.message}` };
  }
}

function requireStringParam(params: Record<string, unknown>, key: string, method: string): string {
  const value = params[key];
  if (typeof value !== 'string') {
    throw new AppError(400, 'invalid_params', `${method} requires params.${key} as string.`);
  }
  return value;
}

// One dispatcher serves one HTTP request against one session; it never throws to the transport.
export class McpDispatcher {
  private readonly deps: McpDispatcherDeps;
  private readonly session: McpSession;

  public constructor(deps: McpDispatcherDeps, session: McpSession) {
    this.deps = deps;
    this.session = session;
  }

  public async handle(payload: unknown): Promise<JsonRpcResponse | null> {
    if (!isRecord(payload)) {
      this.deps.logger.warn({ event: 'mcp_rpc_invalid_envelope' }, 'mcp_rpc_invalid_envelope');
      return rpcError(null, JSON_RPC_INVALID_REQUEST, 'Invalid JSON-RPC request object.');
    }

    const method = payload.method;
    const requestId = isJsonRpcId(payload.id) ? payload.id : null;
    const hasValidId = payload.id === undefined || isJsonRpcId(payload.id);
    if (payload.jsonrpc !== '2.0' || typeof method !== 'string' || !hasValidId) {
      this.deps.logger.warn(
        { event: 'mcp_rpc_invalid_envelope', rpcRequestId: requestId },
        'mcp_rpc_invalid_envelope'
      );
      return rpcError(requestId, JSON_RPC_INVALID_REQUEST, 'Invalid JSON-RPC request object.');
    }

    const isNotification = payload.id === undefined;
    const rpcTraceId = randomUUID();
    const startedAt = Date.now();

    this.deps.logger.info(
      {
        event: 'mcp_rpc_request_received',
        rpcTraceId,
        rpcRequestId: requestId,
        method,
        sessionId: this.session.id,
        notification: isNotification
      },
      'mcp_rpc_request_received'
    );

    let response: JsonRpcResponse;
    try {
      if (!isSupportedMethod(method)) {
        throw new AppError(404, 'method_not_found', `Method not found: ${method}`);
      }

      const params = payload.params === undefined || payload.params === null ? {} : payload.params;
      if (!isRecord(params)) {
        throw new AppError(400, 'invalid_params', 'params must be an object when present.');
      }

      const result = await this.dispatch(method, params, rpcTraceId);
      response = { jsonrpc: '2.0', id: requestId, result };
    } catch (error) {
      const appError = normalizeError(error);
      const mapped = mapAppErrorToRpc(appError);

      this.deps.logger.error(
        {
          event: 'mcp_rpc_request_failed',
          rpcTraceId,
          rpcRequestId: requestId,
          method,
          code: appError.code,
          rpcCode: mapped.code,
          details: shapeForLog(appError.details),
          error: errorForLog(error),
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_failed'
      );

      response = rpcError(requestId, mapped.code, mapped.message, mapped.data);
    }

    this.deps.logger.info(
      {
        event: 'mcp_rpc_request_completed',
        rpcTraceId,
        rpcRequestId: requestId,
        method,
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_completed'
    );

    return isNotification ? null : response;
  }

  private requireInitialized(method: string, rpcTraceId: string): void {
    if (this.session.initialized) {
      return;
    }

    if (this.deps.strictSession) {
      throw new AppError(400, 'session_not_initialized', 'Session not initialized');
    }

    this.deps.logger.warn(
      {
        event: 'mcp_session_not_initialized',
        rpcTraceId,
        method,
        sessionId: this.session.id
      },
      'mcp_session_not_initialized'
    );
  }

  private async dispatch(method: string, params: Record<string, unknown>, rpcTraceId: string): Promise<unknown> {
    switch (method) {
      case 'initialize':
        return this.initialize(params);

      case 'initialized':
      case 'notifications/initialized':
        this.session.initialized = true;
        return {};

      case 'ping':
        return {};

      case 'tools/list':
        return { tools: buildToolList() };

      case 'tools/call': {
        this.requireInitialized(method, rpcTraceId);
        const name = requireStringParam(params, 'name', method);

        this.deps.logger.info(
          {
            event: 'mcp_tool_call_requested',
            rpcTraceId,
            toolName: name,
            arguments: shapeForLog(params.arguments ?? {})
          },
          'mcp_tool_call_requested'
        );

        return executeTool(name, params.arguments, {
          store: this.deps.store,
          logger: this.deps.logger
        });
      }

      case 'resources/list':
        return { resources: listResources() };

      case 'resources/read':
        this.requireInitialized(method, rpcTraceId);
        return readResource(requireStringParam(params, 'uri', method));

      case 'prompts/list':
        return { prompts: listPrompts() };

      case 'prompts/get': {
        this.requireInitialized(method, rpcTraceId);
        const name = requireStringParam(params, 'name', method);
        const args = params.arguments ?? {};
        if (!isRecord(args)) {
          throw new AppError(400, 'invalid_params', 'prompts/get requires params.arguments as object.');
        }
        return getPrompt(name, args);
      }

      case 'logging/setLevel': {
        const level = params.level;
        if (!isMcpLogLevel(level)) {
          throw new AppError(
            400,
            'invalid_params',
            `Invalid log level: ${String(level)}. Expected one of: ${MCP_LOG_LEVELS.join(', ')}.`
          );
        }

        this.deps.logLevel.setLevel(level);
        this.deps.logger.info({ event: 'mcp_log_level_changed', rpcTraceId, level }, 'mcp_log_level_changed');
        return {};
      }

      default:
        throw new AppError(404, 'method_not_found', `Method not found: ${method}`);
    }
  }

  private initialize(params: Record<string, unknown>): Record<string, unknown> {
    const parsed = initializeParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new AppError(
        400,
        'invalid_params',
        `Invalid initialize parameters: ${describeFirstIssue(parsed.error)}`,
        parsed.error.flatten()
      );
    }

    this.session.protocolVersion = parsed.data.protocolVersion ?? null;
    this.session.clientInfo = parsed.data.clientInfo ?? null;
    this.session.clientCapabilities = parsed.data.capabilities ?? {};

    return {
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: {
        tools: { listChanged: false },
        resources: { subscribe: false, listChanged: false },
        prompts: { listChanged: false },
        logging: {}
      },
      serverInfo: {
        name: MCP_SERVER_NAME,
        version: MCP_SERVER_VERSION
      }
    };
  }
}

function readSessionHeader(request: FastifyRequest): string | null {
  const value = request.headers[MCP_SESSION_HEADER];
  if (typeof value !== 'string' || value.trim().length === 0) {
    return null;
  }
  return value.trim();
}

function containsInitialize(payload: unknown): boolean {
  const items = Array.isArray(payload) ? payload : [payload];
  return items.some((item) => isRecord(item) && item.method === 'initialize');
}

// This helper decodes the raw body; undefined means nothing was sent and a thrown SyntaxError means malformed JSON.
function decodeBody(body: unknown): unknown {
  if (typeof body !== 'string') {
    return body;
  }

  if (body.trim().length === 0) {
    return undefined;
  }

  return JSON.parse(body);
}

// This function registers the streamable HTTP MCP routes inside their own encapsulated scope.
export function registerMcpRoutes(fastify: FastifyInstance, deps: McpRouteDeps): void {
  void fastify.register(async (scope) => {
    // Raw bodies let the handler answer malformed JSON with a JSON-RPC parse error instead of the HTTP error envelope.
    scope.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
      done(null, body);
    });

    scope.get('/mcp', async (request, reply) => {
      request.log.info({ event: 'mcp_transport_discovery' }, 'mcp_transport_discovery');

      reply.send({
        name: MCP_SERVER_NAME,
        transport: 'streamable-http',
        endpoint: '/mcp',
        methods: SUPPORTED_METHODS,
        tools: buildToolList().map((tool) => tool.name),
        resources: listResources().map((resource) => resource.uri),
        prompts: listPrompts().map((prompt) => prompt.name),
        logging: {
          currentLevel: deps.logLevel.getLevel(),
          supportedLevels: MCP_LOG_LEVELS
        }
      });
    });

    scope.post('/mcp', async (request: FastifyRequest, reply: FastifyReply) => {
      const requestLogger = request.log.child({ component: 'mcp' });

      let payload: unknown;
      try {
        payload = decodeBody(request.body);
      } catch (error) {
        requestLogger.warn({ event: 'mcp_post_parse_error', error: errorForLog(error) }, 'mcp_post_parse_error');
        const reason = error instanceof Error ? error.message : String(error);
        reply.code(400).send(rpcError(null, JSON_RPC_PARSE_ERROR, `Parse error: ${reason}`));
        return;
      }

      if (payload === undefined || payload === null || (Array.isArray(payload) && payload.length === 0)) {
        requestLogger.warn({ event: 'mcp_post_missing_payload' }, 'mcp_post_missing_payload');
        reply.code(400).send(rpcError(null, JSON_RPC_INVALID_REQUEST, 'Missing JSON-RPC request payload.'));
        return;
      }

      if (!Array.isArray(payload) && !isRecord(payload)) {
        requestLogger.warn({ event: 'mcp_post_invalid_request_object' }, 'mcp_post_invalid_request_object');
        reply.code(400).send(rpcError(null, JSON_RPC_INVALID_REQUEST, 'Invalid JSON-RPC request object.'));
        return;
      }

      const sessionId = readSessionHeader(request);
      let session: McpSession;
      if (sessionId) {
        const existing = deps.sessions.get(sessionId);
        if (!existing) {
          requestLogger.warn({ event: 'mcp_session_unknown', sessionId }, 'mcp_session_unknown');
          reply.code(404).send(rpcError(null, JSON_RPC_INVALID_REQUEST, `Unknown MCP session: ${sessionId}`));
          return;
        }
        session = existing;
        reply.header(MCP_SESSION_HEADER, session.id);
      } else if (containsInitialize(payload)) {
        session = deps.sessions.create();
        reply.header(MCP_SESSION_HEADER, session.id);
        requestLogger.info({ event: 'mcp_session_created', sessionId: session.id }, 'mcp_session_created');
      } else {
        // Header-less requests run statelessly; the session is discarded with the response.
        session = createMcpSession();
      }

      const dispatcher = new McpDispatcher(
        {
          store: deps.store,
          logLevel: deps.logLevel,
          strictSession: deps.strictSession,
          logger: requestLogger.child({ sessionId: session.id })
        },
        session
      );

      if (Array.isArray(payload)) {
        requestLogger.info({ event: 'mcp_post_batch_received', batchSize: payload.length }, 'mcp_post_batch_received');

        const responses: JsonRpcResponse[] = [];
        for (const item of payload) {
          const response = await dispatcher.handle(item);
          if (response) {
            responses.push(response);
          }
        }

        if (responses.length === 0) {
          reply.code(202).send();
          return;
        }

        reply.send(responses);
        return;
      }

      const response = await dispatcher.handle(payload);
      if (!response) {
        reply.code(202).send();
        return;
      }

      reply.send(response);
    });

    scope.delete('/mcp', async (request, reply) => {
      const sessionId = readSessionHeader(request);
      if (!sessionId) {
        reply.code(400).send(rpcError(null, JSON_RPC_INVALID_REQUEST, 'Missing Mcp-Session-Id header.'));
        return;
      }

      if (!deps.sessions.delete(sessionId)) {
        request.log.warn({ event: 'mcp_session_unknown', sessionId }, 'mcp_session_unknown');
        reply.code(404).send(rpcError(null, JSON_RPC_INVALID_REQUEST, `Unknown MCP session: ${sessionId}`));
        return;
      }

      request.log.info({ event: 'mcp_session_closed', sessionId }, 'mcp_session_closed');
      reply.code(204).send();
    });

    // This route keeps SSE transport disabled because this service uses Streamable HTTP.
    scope.get('/mcp/sse', async (request, reply) => {
      request.log.info({ event: 'mcp_sse_disabled_requested' }, 'mcp_sse_disabled_requested');

      reply.code(410).send({
        error: 'sse_disabled',
        message: 'SSE transport is disabled. Use Streamable HTTP at /mcp.'
      });
    });
  });
}
