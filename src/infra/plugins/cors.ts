/**
 * CORS plugin for Fastify
 * Allowed origins come from ALLOWED_ORIGINS; localhost is always accepted in development
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

export function parseAllowedOrigins(raw: string | undefined): Set<string> {
  if (raw === undefined || raw === '') {
    return new Set();
  }

  return new Set(
    raw
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== '')
  );
}

export function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }

    // Compare hostnames, not string prefixes
    return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
  } catch {
    return false;
  }
}

/**
 * Register CORS plugin with Fastify
 */
export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = parseAllowedOrigins(config.cors.allowedOrigins);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Server-to-server or same-origin requests carry no Origin header
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      cb(null, false);
    },
    methods: ['GET', 'OPTIONS'],
    allowedHeaders: ['content-type', 'accept'],
  });
}
