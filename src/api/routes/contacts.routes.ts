/**
 * Contact Routes
 *
 * All routes require a Bearer access token and are rate limited per user.
 * Contacts of other users answer 404, never 403.
 */

import { Router, type RequestHandler, type Response, type NextFunction } from 'express';
import type { ContactService } from '../../services/contacts/index.js';
import { NotFoundError } from '../errors.js';
import { getAuthenticatedUser, type AuthenticatedRequest } from '../middleware.js';
import { contactIdParamsSchema, contactSchema, fieldSearchParamsSchema } from '../schemas.js';

export interface ContactsRouterDeps {
  contactService: ContactService;
  requireAuth: RequestHandler;
  rateLimiter: RequestHandler;
}

export function createContactsRouter(deps: ContactsRouterDeps): Router {
  const router = Router();
  const { contactService } = deps;

  router.use(deps.requireAuth, deps.rateLimiter);

  // Fixed paths first so they are not captured by /:contactId

  /**
   * GET /all
   */
  router.get('/all', (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      res.json(contactService.list(getAuthenticatedUser(req)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /bday - birthdays in the next 7 days
   */
  router.get('/bday', (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      res.json(contactService.upcomingBirthdays(getAuthenticatedUser(req)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /:contactId
   */
  router.get('/:contactId', (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const { contactId } = contactIdParamsSchema.parse(req.params);
      res.json(contactService.get(getAuthenticatedUser(req), contactId));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /:fieldName/:fieldValue - exact match on one field
   */
  router.get(
    '/:fieldName/:fieldValue',
    (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const { fieldName, fieldValue } = fieldSearchParamsSchema.parse(req.params);
        const contacts = contactService.findByField(
          getAuthenticatedUser(req),
          fieldName,
          fieldValue
        );

        if (contacts.length === 0) {
          throw new NotFoundError();
        }
        res.json(contacts);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /
   */
  router.post('/', (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const body = contactSchema.parse(req.body);
      const contact = contactService.create(getAuthenticatedUser(req), body);
      res.status(201).json(contact);
    } catch (error) {
      next(error);
    }
  });

  /**
   * PUT /:contactId - full replace
   */
  router.put('/:contactId', (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const { contactId } = contactIdParamsSchema.parse(req.params);
      const body = contactSchema.parse(req.body);
      res.json(contactService.update(getAuthenticatedUser(req), contactId, body));
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /:contactId
   */
  router.delete('/:contactId', (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const { contactId } = contactIdParamsSchema.parse(req.params);
      res.json(contactService.delete(getAuthenticatedUser(req), contactId));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
