import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { v4 as uuidv4 } from 'uuid';
import { AppConfig, loadConfig } from './config.js';
import { ItemService } from './domain/services/ItemService.js';
import { InMemoryItemRepository } from './infrastructure/repositories/InMemoryItemRepository.js';
import { DomainError } from './domain/errors/index.js';
import { CreateItemRequest, UpdateItemRequest } from './domain/models.js';

export interface BuildAppOptions {
  config?: AppConfig;
  itemService?: ItemService;
}

interface HttpClientError extends Error {
  statusCode: number;
  code?: string;
}

function isSchemaValidationError(error: unknown): error is Error & { validation: unknown[] } {
  return (
    error instanceof Error &&
    'validation' in error &&
    Array.isArray(error.validation)
  );
}

// errors fastify raises itself for bad requests (malformed JSON, wrong content type...)
function isClientError(error: unknown): error is HttpClientError {
  return (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  );
}

const itemIdParams = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'string', pattern: '^-?[0-9]+$' },
  },
} as const;

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();

  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
    requestIdHeader: 'x-request-id',
    genReqId: () => uuidv4(),
    ajv: {
      // bodies are type-checked, not coerced: "9.99" is not a price
      customOptions: { coerceTypes: false },
    },
  });

  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: config.apiTitle,
        description: config.apiDescription,
        version: config.apiVersion,
      },
      servers: [
        {
          url: config.apiBaseUrl,
          description: config.nodeEnv === 'production' ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'items', description: 'Item management operations' },
      ],
      components: {
        schemas: {
          Item: {
            type: 'object',
            required: ['id', 'name', 'description', 'price', 'quantity'],
            properties: {
              id: { type: 'integer', example: 1 },
              name: { type: 'string', example: 'Widget' },
              description: { type: 'string', nullable: true, example: 'A small widget' },
              price: { type: 'number', example: 9.99 },
              quantity: { type: 'integer', example: 0 },
            },
          },
          Error: {
            type: 'object',
            properties: {
              error: {
                type: 'object',
                properties: {
                  code: { type: 'string' },
                  message: { type: 'string' },
                  statusCode: { type: 'integer' },
                },
              },
              timestamp: { type: 'string', format: 'date-time' },
            },
          },
        },
      },
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });

  await app.register(cors, {
    origin: config.corsOrigin,
  });

  // JSON bodies only; anything else is a 415
  app.removeContentTypeParser('text/plain');

  app.addHook('onRequest', async (request, reply) => {
    reply.header('x-request-id', request.id);
  });

  // dependency injection
  let itemService = options.itemService;
  if (!itemService) {
    const repository = new InMemoryItemRepository();
    itemService = new ItemService(repository);

    // the store lives exactly as long as this app instance
    app.addHook('onClose', async (instance) => {
      instance.log.info({ items: repository.getItemCount() }, 'releasing item store');
      repository.clearAllItems();
    });
  }
  const items = itemService;

  app.get('/', {
    schema: {
      description: 'Welcome message and endpoint directory',
    },
  }, async () => {
    return {
      message: 'Welcome to the Item Store API',
      endpoints: {
        'GET /items': 'Get all items',
        'GET /items/{id}': 'Get item by ID',
        'POST /items': 'Create new item',
        'PUT /items/{id}': 'Update item',
        'DELETE /items/{id}': 'Delete item',
      },
    };
  });

  app.get('/health', {
    schema: {
      tags: ['health'],
      description: 'Health check endpoint for load balancers and monitoring',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            timestamp: { type: 'string', format: 'date-time' },
          },
        },
      },
    },
  }, async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // === Item Routes ===

  app.get('/items', {
    schema: {
      tags: ['items'],
      description: 'List all items with their count',
    },
  }, async () => {
    return items.listItems();
  });

  app.get<{
    Params: { id: string };
  }>('/items/:id', {
    schema: {
      tags: ['items'],
      description: 'Retrieve an item by ID',
      params: itemIdParams,
    },
  }, async (request) => {
    return items.getItem(Number(request.params.id));
  });

  app.post<{
    Body: CreateItemRequest;
  }>('/items', {
    schema: {
      tags: ['items'],
      description: 'Create a new item',
      body: {
        type: 'object',
        required: ['name', 'price'],
        properties: {
          name: { type: 'string', minLength: 1 },
          description: { type: ['string', 'null'], default: null },
          price: { type: 'number' },
          quantity: { type: 'integer', default: 0 },
        },
      },
    },
  }, async (request, reply) => {
    const item = await items.createItem(request.body);
    request.log.info({ itemId: item.id }, 'item created');

    return reply.code(201).send({
      message: 'Item created successfully',
      item,
    });
  });

  // only the fields present in the body are overwritten
  app.put<{
    Params: { id: string };
    Body: UpdateItemRequest;
  }>('/items/:id', {
    schema: {
      tags: ['items'],
      description: 'Update any subset of an item\'s fields',
      params: itemIdParams,
      body: {
        type: 'object',
        properties: {
          name: { type: 'string', minLength: 1 },
          description: { type: ['string', 'null'] },
          price: { type: 'number' },
          quantity: { type: 'integer' },
        },
      },
    },
  }, async (request, reply) => {
    const item = await items.updateItem(Number(request.params.id), request.body);
    request.log.info({ itemId: item.id }, 'item updated');

    return reply.code(200).send({
      message: 'Item updated successfully',
      item,
    });
  });

  app.delete<{
    Params: { id: string };
  }>('/items/:id', {
    schema: {
      tags: ['items'],
      description: 'Delete an item',
      params: itemIdParams,
    },
  }, async (request, reply) => {
    const item = await items.deleteItem(Number(request.params.id));
    request.log.info({ itemId: item.id }, 'item deleted');

    return reply.code(200).send({
      message: 'Item deleted successfully',
      item,
    });
  });

  // ============================================================================
  // Error Handler
  // ============================================================================

  app.setNotFoundHandler((request, reply) => {
    return reply.code(404).send({
      error: {
        code: 'ROUTE_NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found.`,
        statusCode: 404,
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.setErrorHandler((error, request, reply) => {
    // Domain errors already have status codes
    if (error instanceof DomainError) {
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          statusCode: error.statusCode,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Fastify schema validation errors
    if (isSchemaValidationError(error)) {
      return reply.code(422).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          details: error.validation,
          statusCode: 422,
        },
        timestamp: new Date().toISOString(),
      });
    }

    if (isClientError(error)) {
      return reply.code(error.statusCode).send({
        error: {
          code: error.code ?? 'BAD_REQUEST',
          message: error.message,
          statusCode: error.statusCode,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Log unexpected stuff
    request.log.error({ err: error }, 'unhandled error');

    // Catch-all for other errors
    return reply.code(500).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred',
        statusCode: 500,
      },
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}

async function start(): Promise<void> {
  const config = loadConfig();
  const app = await buildApp({ config });

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Health check: http://${config.host}:${config.port}/health`);
    app.log.info(`API docs: http://${config.host}:${config.port}/docs`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }

  // Handle shutdown gracefully
  const shutdown = async (signal: string): Promise<void> => {
    app.log.info(`${signal} received, shutting down...`);
    try {
      await app.close();
      app.log.info('Server closed successfully');
      process.exit(0);
    } catch (err) {
      app.log.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void shutdown(signal);
    });
  }
}

// Start if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((err: unknown) => {
    console.error('Failed to start server:', err);
    process.exit(1);
  });
}
