// This module wires all HTTP routes, middleware behavior, and lifecycle resources.

import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import { loadConfig, type AppConfig } from './config/app-config.js';
import { SqliteStore } from './db/database.js';
import { seedSamplePets } from './db/seed.js';
import { PETS_ROUTE_PREFIX, registerPetRoutes } from './http/pets.js';
import { McpLogLevelState, fromPinoLevel, toPinoLevel } from './mcp/log-level.js';
import { registerMcpRoutes } from './mcp/protocol.js';
import { McpSessionStore } from './mcp/session.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_DESCRIPTION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, shapeForLog } from './utils/logger.js';

export interface ServerResources {
  app: FastifyInstance;
  store: SqliteStore;
  logLevel: McpLogLevelState;
  sessions: McpSessionStore;
}

// This helper picks the request headers worth logging for transport diagnostics.
function buildRequestHeaderSnapshot(request: FastifyRequest): unknown {
  const headers = request.headers;
  return shapeForLog({
    host: headers.host ?? null,
    'x-forwarded-for': headers['x-forwarded-for'] ?? null,
    'user-agent': headers['user-agent'] ?? null,
    accept: headers.accept ?? null,
    'content-type': headers['content-type'] ?? null,
    'mcp-session-id': headers['mcp-session-id'] ?? null
  });
}

// This function builds and configures the full HTTP application.
export function createServer(config: AppConfig = loadConfig()): ServerResources {
  const app = Fastify({
    logger: buildLoggerOptions(config.logLevel),
    bodyLimit: 1024 * 1024,
    trustProxy: true
  });

  const store = new SqliteStore(config.dbPath);
  const sessions = new McpSessionStore({ idleTtlMs: config.sessionIdleTtlMs });
  const logLevel = new McpLogLevelState(fromPinoLevel(config.logLevel), (level) => {
    app.log.level = toPinoLevel(level);
  });

  if (config.seedSamplePets) {
    const seeded = seedSamplePets(store);
    app.log.info(
      {
        event: 'sample_pets_seeded',
        created: seeded.map((pet) => pet.name)
      },
      'sample_pets_seeded'
    );
  }

  const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

  // This hook enriches request logs with consistent route and request-id metadata.
  app.addHook('onRequest', async (request) => {
    requestStartTimes.set(request, process.hrtime.bigint());

    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        contentLength: request.headers['content-length'] ?? null
      },
      'http_request_start'
    );

    request.log.debug(
      {
        event: 'http_request_headers',
        requestId: request.id,
        headers: buildRequestHeaderSnapshot(request),
        query: shapeForLog(request.query ?? null)
      },
      'http_request_headers'
    );
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  // This hook emits explicit timeout events to simplify debugging of stalled requests.
  app.addHook('onTimeout', async (request) => {
    request.log.warn(
      {
        event: 'http_request_timeout',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_request_timeout'
    );
  });

  // This endpoint exposes a lightweight liveness signal.
  app.get('/health', async () => {
    app.log.debug({ event: 'health_check' }, 'health_check');

    return {
      ok: true,
      status: 'alive',
      ts: new Date().toISOString()
    };
  });

  app.get('/version', async () => ({
    ok: true,
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
    protocolVersion: MCP_PROTOCOL_VERSION
  }));

  app.get('/', async () => ({
    ok: true,
    service: MCP_SERVER_NAME,
    description: MCP_SERVER_DESCRIPTION,
    version: MCP_SERVER_VERSION,
    restEndpoint: PETS_ROUTE_PREFIX,
    mcpEndpoint: '/mcp'
  }));

  registerPetRoutes(app, store);
  registerMcpRoutes(app, {
    store,
    logLevel,
    strictSession: config.strictSession,
    sessions
  });

  // This handler maps internal exceptions into structured JSON errors.
  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);
    const status = normalized.statusCode;
    const logEntry = {
      event: 'http_request_failed',
      requestId: request.id,
      code: normalized.code,
      details: shapeForLog(normalized.details),
      error: errorForLog(error)
    };

    if (status >= 500) {
      request.log.error(logEntry, 'http_request_failed');
    } else {
      request.log.warn(logEntry, 'http_request_failed');
    }

    reply.status(status).send({
      ok: false,
      error: {
        code: normalized.code,
        message: normalized.message,
        details: normalized.details
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return {
    app,
    store,
    logLevel,
    sessions
  };
}
