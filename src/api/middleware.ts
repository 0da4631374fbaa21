import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import { logger } from '../utils/logger.js';
import type { User } from '../db/types/user.types.js';
import type { AuthService } from '../services/auth/index.js';
import { UnauthorizedError, toApiError } from './errors.js';

/**
 * Extended Request type with the acting user, set by requireAuth
 */
export interface AuthenticatedRequest extends Request {
  user?: User;
}

/**
 * Extract a Bearer token from the Authorization header
 */
export function getBearerToken(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return undefined;
  }
  const token = authHeader.substring(7).trim();
  return token.length > 0 ? token : undefined;
}

/**
 * Acting user of a request that passed requireAuth
 *
 * @throws UnauthorizedError when the route was mounted without requireAuth
 */
export function getAuthenticatedUser(req: AuthenticatedRequest): User {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}

/**
 * Resolve the Bearer access token into `req.user`
 */
export function createRequireAuth(authService: AuthService): RequestHandler {
  return async (req: AuthenticatedRequest, _res: Response, next: NextFunction) => {
    try {
      const token = getBearerToken(req);
      if (!token) {
        throw new UnauthorizedError();
      }
      req.user = await authService.resolveIdentity(token);
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Per-user rate limiter for authenticated routes
 *
 * Mount after requireAuth so the key is the user id; falls back to the
 * client IP otherwise.
 */
export function createUserRateLimiter(requestsPerMinute: number): RequestHandler {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: requestsPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: AuthenticatedRequest) =>
      req.user ? `user:${req.user.id}` : `ip:${req.ip ?? 'unknown'}`,
    handler: (_req, res) => {
      res.status(429).json({
        error: 'RATE_LIMITED',
        message: 'Too many requests, please try again later',
      });
    },
  });
}

/**
 * CORS headers for the configured origins
 */
export function createCorsMiddleware(allowedOrigins: readonly string[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    if (origin && (allowedOrigins.includes(origin) || allowedOrigins.includes('*'))) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Access-Control-Allow-Credentials', 'true');
      res.setHeader('Vary', 'Origin');
    }
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, PATCH, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-Request-ID');
    res.setHeader('Access-Control-Max-Age', '86400'); // 24 hours

    // Handle preflight requests
    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  };
}

/**
 * Global error handler middleware
 */
export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  const apiError = toApiError(err);

  if (apiError.statusCode >= 500) {
    logger.error(
      {
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
        path: req.path,
        method: req.method,
      },
      'Request error'
    );
  } else {
    logger.debug(
      { status: apiError.statusCode, code: apiError.errorCode, path: req.path },
      apiError.message
    );
  }

  if (apiError.statusCode === 401) {
    res.setHeader('WWW-Authenticate', 'Bearer');
  }

  res.status(apiError.statusCode).json(apiError.toJSON());
};

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'NOT_FOUND', message: 'Not Found' });
}

/**
 * Request ID middleware for tracing
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.length > 0 ? header : randomUUID();
  res.setHeader('X-Request-ID', requestId);
  next();
}
