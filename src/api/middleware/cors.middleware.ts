/**
 * CORS middleware - Only allows requests from whitelisted domains
 */

import cors from 'cors';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';

const corsLogger = logger.child({ middleware: 'cors' });

/**
 * Any localhost entry allows every localhost port; `https://example.com`
 * also allows its subdomains.
 */
export function isOriginAllowed(origin: string, allowedOrigins: readonly string[]): boolean {
  return allowedOrigins.some((allowed) => {
    if (allowed.startsWith('http://localhost')) {
      return origin.startsWith('http://localhost');
    }
    return origin === allowed || origin.endsWith(allowed.replace('https://', '.'));
  });
}

export const corsMiddleware = cors({
  origin: (origin, callback) => {
    // Allow requests with no origin (like curl or server-to-server calls)
    if (!origin) {
      callback(null, true);
      return;
    }

    if (isOriginAllowed(origin, config.allowedOrigins)) {
      callback(null, true);
    } else {
      corsLogger.warn({ origin }, 'Blocked request from unauthorized origin');
      callback(new Error('Not allowed by CORS'));
    }
  },
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type'],
  maxAge: 86400, // 24 hours
});
