/**
 * Unit tests for app factory
 */

import { ok } from 'neverthrow';
import { describe, expect, it, beforeEach, afterEach } from 'vitest';

import { buildApp, createApp } from '@/app/build-app.js';

import { makeTestConfig, makeTestLogger } from '../fixtures/builders.js';
import {
  makeFakeMetricSource,
  makeFakeTextGenerator,
  makeInMemoryReportStore,
} from '../fixtures/fakes.js';

const makeDeps = () => ({
  config: makeTestConfig(),
  logger: makeTestLogger(),
  metricSource: makeFakeMetricSource(),
  healthCheckers: [],
});

describe('App Factory', () => {
  describe('buildApp', () => {
    it('creates a Fastify instance', async () => {
      const app = await buildApp({ fastifyOptions: { logger: false }, deps: makeDeps() });

      expect(app).toBeDefined();
      expect(app.server).toBeDefined();

      await app.close();
    });

    it('accepts custom logger', async () => {
      const app = await buildApp({
        fastifyOptions: { logger: { level: 'silent' } },
        deps: makeDeps(),
      });

      expect(app.log.level).toBe('silent');

      await app.close();
    });

    it('fails without a metric source', async () => {
      await expect(
        buildApp({ fastifyOptions: { logger: false }, deps: { config: makeTestConfig() } })
      ).rejects.toThrow('Missing required dependencies: config, metricSource');
    });

    it('registers health and performance routes', async () => {
      const app = await buildApp({ fastifyOptions: { logger: false }, deps: makeDeps() });
      await app.ready();

      expect(app.hasRoute({ method: 'GET', url: '/health/live' })).toBe(true);
      expect(app.hasRoute({ method: 'GET', url: '/health/ready' })).toBe(true);
      expect(app.hasRoute({ method: 'GET', url: '/api/v1/performance/summary' })).toBe(true);
      expect(app.hasRoute({ method: 'GET', url: '/api/v1/performance/units' })).toBe(true);
      expect(app.hasRoute({ method: 'POST', url: '/api/v1/reports' })).toBe(false);

      await app.close();
    });

    it('registers report routes when both report adapters are given', async () => {
      const app = await buildApp({
        fastifyOptions: { logger: false },
        deps: {
          ...makeDeps(),
          textGenerator: makeFakeTextGenerator(() => ok('text')),
          reportStore: makeInMemoryReportStore(),
        },
      });
      await app.ready();

      expect(app.hasRoute({ method: 'POST', url: '/api/v1/reports' })).toBe(true);

      await app.close();
    });
  });

  describe('createApp', () => {
    it('returns a ready app instance', async () => {
      const app = await createApp({ fastifyOptions: { logger: false }, deps: makeDeps() });

      const response = await app.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);

      await app.close();
    });
  });

  describe('Error Handling', () => {
    let app: Awaited<ReturnType<typeof createApp>>;

    beforeEach(async () => {
      app = await createApp({ fastifyOptions: { logger: false }, deps: makeDeps() });
    });

    afterEach(async () => {
      await app.close();
    });

    it('returns 404 for unknown routes', async () => {
      const response = await app.inject({ method: 'GET', url: '/unknown-route' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        ok: false,
        error: 'NotFoundError',
        message: 'Route GET /unknown-route not found',
      });
    });

    it('returns 404 with correct method in message', async () => {
      const response = await app.inject({ method: 'POST', url: '/does-not-exist' });

      expect(response.statusCode).toBe(404);
      expect(response.json().message).toBe('Route POST /does-not-exist not found');
    });
  });
});
