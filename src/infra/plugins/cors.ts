/**
 * CORS plugin for Fastify
 * Read endpoints are public dashboards' data source; origins come from configuration.
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

export interface CorsOptions {
  cors: AppConfig['cors'];
  isDevelopment: boolean;
}

/**
 * Get the set of allowed origins from configuration
 */
export function getAllowedOriginsSet(config: AppConfig['cors']): Set<string> {
  const set = new Set<string>();

  // Parse comma-separated ALLOWED_ORIGINS
  if (config.allowedOrigins !== undefined && config.allowedOrigins !== '') {
    config.allowedOrigins
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
      .forEach((u) => set.add(u));
  }

  if (config.clientBaseUrl !== undefined && config.clientBaseUrl !== '') {
    set.add(config.clientBaseUrl.trim());
  }

  return set;
}

export function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }

    // Match hostnames exactly (avoid `startsWith('http://localhost')` pitfalls)
    return (
      url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]'
    );
  } catch {
    return false;
  }
}

/**
 * Register CORS plugin with Fastify
 */
export async function registerCors(fastify: FastifyInstance, options: CorsOptions): Promise<void> {
  const allowedOrigins = getAllowedOriginsSet(options.cors);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Server-to-server or same-origin requests
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      // Localhost variants are only accepted in development
      if (options.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      cb(null, false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['content-type', 'x-requested-with', 'accept'],
    exposedHeaders: ['content-length'],
  });
}
