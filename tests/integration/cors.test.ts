/**
 * Integration tests for CORS plugin
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';

import { makeTestConfig, makeTestLogger } from '../fixtures/builders.js';
import { makeFakeMetricSource } from '../fixtures/fakes.js';

import type { FastifyInstance } from 'fastify';

const startApp = (options: { isDevelopment: boolean; allowedOrigins?: string }) =>
  createApp({
    fastifyOptions: { logger: false },
    deps: {
      metricSource: makeFakeMetricSource(),
      logger: makeTestLogger(),
      healthCheckers: [],
      config: makeTestConfig({
        server: {
          isDevelopment: options.isDevelopment,
          isProduction: !options.isDevelopment,
          isTest: false,
          port: 3000,
          host: '0.0.0.0',
        },
        cors: { allowedOrigins: options.allowedOrigins },
      }),
    },
  });

describe('CORS Plugin', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  describe('Development Mode', () => {
    it('allows localhost origins', async () => {
      app = await startApp({ isDevelopment: true });

      const response = await app.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin: 'http://localhost:5173' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['access-control-allow-origin']).toBe('http://localhost:5173');
    });

    it('still blocks other origins', async () => {
      app = await startApp({ isDevelopment: true });

      const response = await app.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin: 'https://example.com' },
      });

      expect(response.statusCode).toBe(500);
    });
  });

  describe('Production Mode - ALLOWED_ORIGINS', () => {
    it('allows every listed origin', async () => {
      app = await startApp({
        isDevelopment: false,
        allowedOrigins: 'https://dashboard.example.com, https://reports.example.com',
      });

      for (const origin of ['https://dashboard.example.com', 'https://reports.example.com']) {
        const response = await app.inject({
          method: 'GET',
          url: '/health/live',
          headers: { origin },
        });

        expect(response.statusCode).toBe(200);
        expect(response.headers['access-control-allow-origin']).toBe(origin);
      }
    });

    it('blocks origins not in ALLOWED_ORIGINS', async () => {
      app = await startApp({
        isDevelopment: false,
        allowedOrigins: 'https://dashboard.example.com',
      });

      const response = await app.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin: 'https://malicious.example.com' },
      });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({
        ok: false,
        error: 'InternalServerError',
        message: 'An unexpected error occurred',
      });
    });

    it('blocks localhost outside development', async () => {
      app = await startApp({ isDevelopment: false });

      const response = await app.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin: 'http://localhost:5173' },
      });

      expect(response.statusCode).toBe(500);
    });
  });

  describe('Server-to-Server Requests', () => {
    it('allows requests without origin header', async () => {
      app = await startApp({
        isDevelopment: false,
        allowedOrigins: 'https://dashboard.example.com',
      });

      const response = await app.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['access-control-allow-origin']).toBeUndefined();
    });
  });

  describe('Preflight Requests', () => {
    it('answers OPTIONS for an allowed origin', async () => {
      app = await startApp({
        isDevelopment: false,
        allowedOrigins: 'https://dashboard.example.com',
      });

      const response = await app.inject({
        method: 'OPTIONS',
        url: '/api/v1/performance/summary',
        headers: {
          origin: 'https://dashboard.example.com',
          'access-control-request-method': 'GET',
        },
      });

      expect(response.statusCode).toBe(204);
      expect(response.headers['access-control-allow-methods']).toBe('GET, POST, OPTIONS');
    });
  });
});
