/**
 * Auth Routes
 *
 * Endpoints:
 * - POST  /api/auth/signup                 - Create account, send confirmation email
 * - POST  /api/auth/login                  - Email + password → token pair
 * - GET   /api/auth/refresh_token          - Rotate tokens (Bearer refresh token)
 * - GET   /api/auth/confirmed_email/:token - Confirm email from the emailed link
 * - POST  /api/auth/request_email          - Re-send confirmation email
 * - PATCH /api/auth/avatar                 - Upload a new avatar (raw image body)
 */

import express, { Router, type Request, type Response, type NextFunction } from 'express';
import type { AuthService, UserService } from '../../services/auth/index.js';
import { userToPublic } from '../../db/types/user.types.js';
import { IMAGE_CONFIG } from '../../utils/image.js';
import { BadRequestError, UnauthorizedError } from '../errors.js';
import {
  getAuthenticatedUser,
  getBearerToken,
  type AuthenticatedRequest,
} from '../middleware.js';
import { loginSchema, requestEmailSchema, signupSchema } from '../schemas.js';

export interface AuthRouterDeps {
  authService: AuthService;
  userService: UserService;
  requireAuth: express.RequestHandler;
}

/**
 * Public base URL of this API as seen by the client, ending in "/"
 */
function getBaseUrl(req: Request): string {
  return `${req.protocol}://${req.get('host') ?? 'localhost'}/`;
}

/**
 * Media type without parameters ("image/png; charset=x" → "image/png")
 */
function getMediaType(req: Request): string | undefined {
  const contentType = req.headers['content-type'];
  return contentType?.split(';')[0]?.trim().toLowerCase();
}

// =============================================================================
// Route Factory
// =============================================================================

export function createAuthRouter(deps: AuthRouterDeps): Router {
  const router = Router();
  const { authService, userService, requireAuth } = deps;

  /**
   * POST /signup
   */
  router.post('/signup', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = signupSchema.parse(req.body);
      const user = await authService.signup(body, getBaseUrl(req));

      res.status(201).json({
        user: userToPublic(user),
        detail: 'User successfully created',
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /login
   *
   * Accepts JSON or an OAuth2 password form; `username` holds the email.
   */
  router.post('/login', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { username, password } = loginSchema.parse(req.body);
      const tokens = await authService.login(username, password);
      res.json(tokens);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /refresh_token
   */
  router.get('/refresh_token', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const token = getBearerToken(req);
      if (!token) {
        throw new UnauthorizedError();
      }

      const tokens = await authService.refresh(token);
      res.json(tokens);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /confirmed_email/:token
   */
  router.get(
    '/confirmed_email/:token',
    async (req: Request<{ token: string }>, res: Response, next: NextFunction) => {
      try {
        const result = await authService.confirmEmail(req.params.token);
        res.json(result);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /request_email
   */
  router.post('/request_email', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { email } = requestEmailSchema.parse(req.body);
      const result = await authService.requestConfirmationEmail(email, getBaseUrl(req));
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * PATCH /avatar
   */
  router.patch(
    '/avatar',
    requireAuth,
    express.raw({ type: 'image/*', limit: IMAGE_CONFIG.maxUploadSize }),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const user = getAuthenticatedUser(req);

        const body: unknown = req.body;
        if (!Buffer.isBuffer(body)) {
          throw new BadRequestError('Expected an image request body', {
            allowed: IMAGE_CONFIG.allowedMimeTypes,
          });
        }

        const updated = await userService.updateAvatar(user, body, getMediaType(req));
        res.json(userToPublic(updated));
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
