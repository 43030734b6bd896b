/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors } from '../infra/plugins/cors.js';
import {
  makeHealthRoutes,
  makeReferenceDataHealthChecker,
  type HealthChecker,
} from '../modules/health/index.js';
import {
  makeCurrencyTimeRebaser,
  makePopulationResolver,
} from '../modules/normalization/index.js';
import {
  makeProgrammeCostingRoutes,
  type ModuleTemplates,
} from '../modules/programme-costing/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { ReferenceDataStore } from '../modules/reference-data/index.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  /** Reference snapshot shared read-only by every request */
  store: ReferenceDataStore;
  templates: ModuleTemplates;
  /** Extra readiness checks on top of the reference data check */
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;
  const { config, store, templates } = deps;

  const app = fastifyLib({
    ...fastifyOptions,
    ajv: {
      customOptions: {
        // Module configurations are a union of closed objects; stripping
        // properties while trying one branch would corrupt the others
        removeAdditional: false,
      },
    },
  });

  await registerCors(app, config);

  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: [makeReferenceDataHealthChecker(store), ...(deps.healthCheckers ?? [])],
    })
  );

  await app.register(
    makeProgrammeCostingRoutes({
      store,
      templates,
      rebaser: makeCurrencyTimeRebaser(store, {
        deflatorCountry: config.costing.deflatorCountry,
      }),
      population: makePopulationResolver(store),
    })
  );

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Handle validation errors
    if (error.validation != null) {
      request.log.warn({ err: error }, 'Request validation failed');
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      request.log.warn({ err: error }, 'Request error');
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Request error');
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
