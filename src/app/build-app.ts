/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { createLogger } from '../infra/logger/index.js';
import { registerCors } from '../infra/plugins/index.js';
import {
  makeHealthRoutes,
  makeMetricSourceHealthChecker,
  type HealthChecker,
} from '../modules/health/index.js';
import { makePerformanceRoutes, type MetricSource } from '../modules/performance/index.js';
import {
  makeReportRoutes,
  type ReportStore,
  type TextGenerator,
} from '../modules/report/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { Logger } from 'pino';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  metricSource: MetricSource;
  /** Report routes are registered only when both report adapters are given */
  textGenerator?: TextGenerator;
  reportStore?: ReportStore;
  /** Defaults to a single metrics API checker */
  healthCheckers?: HealthChecker[];
  /** Logger handed to use cases; created from config when omitted */
  logger?: Logger;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (deps.config === undefined || deps.metricSource === undefined) {
    throw new Error('Missing required dependencies: config, metricSource');
  }

  const { config, metricSource, textGenerator, reportStore } = deps;
  const logger =
    deps.logger ?? createLogger({ level: config.logger.level, pretty: config.logger.pretty });
  const healthCheckers = deps.healthCheckers ?? [makeMetricSourceHealthChecker(metricSource)];

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);

  // Registered before the routes so every plugin context inherits it
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: 'Request validation failed',
        details: error.validation,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Register health routes
  await app.register(makeHealthRoutes({ version, checkers: healthCheckers }));

  const useCaseDeps = {
    metricSource,
    logger,
    fetchConcurrency: config.metrics.fetchConcurrency,
  };

  await app.register(makePerformanceRoutes(useCaseDeps));

  if (textGenerator !== undefined && reportStore !== undefined) {
    await app.register(
      makeReportRoutes({
        ...useCaseDeps,
        textGenerator,
        reportStore,
        reportMaxTokens: config.report.maxTokens,
      })
    );
  } else {
    logger.warn('Report adapters not configured - report routes disabled');
  }

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
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
