/**
 * CORS plugin for Fastify
 * Configures Cross-Origin Resource Sharing with environment-based allowed origins
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/**
 * Parses the comma-separated ALLOWED_ORIGINS value into a set
 */
export function getAllowedOriginsSet(config: AppConfig): Set<string> {
  const raw = config.cors.allowedOrigins ?? '';
  return new Set(
    raw
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
  );
}

export function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }

    return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
  } catch {
    return false;
  }
}

/**
 * Register CORS plugin with Fastify
 */
export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = getAllowedOriginsSet(config);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Server-to-server and same-origin requests carry no Origin header
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      // Dashboards served from a developer machine
      if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      cb(new Error('CORS origin not allowed'), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['content-type', 'accept', 'x-requested-with'],
  });
}
