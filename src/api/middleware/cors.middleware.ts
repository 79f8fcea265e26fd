/**
 * CORS middleware - Only allows requests from whitelisted origins
 */

import cors from 'cors';
import { config } from '../../config/index.js';
import { AdvisorError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const corsLogger = logger.child({ middleware: 'cors' });

/**
 * `http://localhost` entries admit any local port; other entries match
 * exactly or as a parent domain.
 */
export function isOriginAllowed(origin: string, allowedOrigins: readonly string[]): boolean {
  return allowedOrigins.some((allowed) => {
    if (allowed === '*') return true;
    if (allowed.startsWith('http://localhost')) {
      return origin.startsWith('http://localhost');
    }
    return origin === allowed || origin.endsWith(allowed.replace('https://', '.'));
  });
}

export function createCorsMiddleware(allowedOrigins: readonly string[] = config.allowedOrigins) {
  return cors({
    origin: (origin, callback) => {
      // No origin: curl, server-to-server
      if (!origin || isOriginAllowed(origin, allowedOrigins)) {
        callback(null, true);
        return;
      }

      corsLogger.warn({ origin }, 'Blocked request from unauthorized origin');
      callback(new AdvisorError('Not allowed by CORS', 'CORS_REJECTED', 403, { origin }));
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    maxAge: 86400, // 24 hours
  });
}
