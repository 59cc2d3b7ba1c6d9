/**
 * Security Headers Plugin
 *
 * HTTP security headers via @fastify/helmet. The server only answers JSON
 * (webhook, leaderboard, health), so the policy allows nothing to load.
 */

import helmet from '@fastify/helmet';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

const CSP_DIRECTIVES = {
  defaultSrc: ["'none'"],
  frameAncestors: ["'none'"],
  formAction: ["'none'"],
  baseUri: ["'none'"],
};

/**
 * 1 year max-age with subdomains included.
 */
const HSTS_CONFIG = {
  maxAge: 31536000,
  includeSubDomains: true,
  preload: false,
};

// ─────────────────────────────────────────────────────────────────────────────
// Plugin
// ─────────────────────────────────────────────────────────────────────────────

export async function registerSecurityHeaders(
  fastify: FastifyInstance,
  config: AppConfig
): Promise<void> {
  const { isProduction } = config.server;

  await fastify.register(helmet, {
    contentSecurityPolicy: { directives: CSP_DIRECTIVES },
    dnsPrefetchControl: { allow: false },
    frameguard: { action: 'deny' },
    hsts: isProduction ? HSTS_CONFIG : false,
    permittedCrossDomainPolicies: { permittedPolicies: 'none' },
    referrerPolicy: { policy: 'no-referrer' },
    // Deprecated header; CSP covers it
    xssFilter: false,
    hidePoweredBy: true,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: 'same-origin' },
  });

  fastify.log.debug({ hsts: isProduction }, 'Security headers plugin registered');
}
