/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig, type AppConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import { makeNregsMetricSource } from './modules/performance/index.js';
import {
  makeFsReportStore,
  makeOpenAITextGenerator,
  type TextGenerator,
} from './modules/report/index.js';

import type { Logger } from 'pino';

const getVersion = (): string => process.env['APP_VERSION'] ?? '0.1.0';

/**
 * Creates the text generator if an OpenAI key is configured.
 * Returns undefined if report generation is not configured.
 */
const createTextGenerator = (config: AppConfig, logger: Logger): TextGenerator | undefined => {
  if (config.report.openaiApiKey === undefined || config.report.openaiApiKey === '') {
    logger.warn('OPENAI_API_KEY not configured - report generation disabled');
    return undefined;
  }

  return makeOpenAITextGenerator({
    apiKey: config.report.openaiApiKey,
    model: config.report.model,
    defaultMaxTokens: config.report.maxTokens,
    logger,
  });
};

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info(
    { config: { server: config.server, metricsBaseUrl: config.metrics.baseUrl } },
    'Starting API server'
  );

  const metricSource = makeNregsMetricSource({
    baseUrl: config.metrics.baseUrl,
    apiKey: config.metrics.apiKey,
    timeoutMs: config.metrics.timeoutMs,
    logger,
  });
  const textGenerator = createTextGenerator(config, logger);

  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          },
        }),
      },
      disableRequestLogging: false,
    },
    deps: {
      config,
      metricSource,
      logger,
      ...(textGenerator !== undefined && {
        textGenerator,
        reportStore: makeFsReportStore({ outputDir: config.report.outputDir, logger }),
      }),
    },
    version: getVersion(),
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
