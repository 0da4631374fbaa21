import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  ApiError,
  BadRequestError,
  InvalidTokenError,
  NotFoundError,
  toApiError,
} from '../../../src/api/errors.js';
import { ImageProcessingError } from '../../../src/utils/image.js';
import { AvatarStorageError } from '../../../src/packages/adapters/avatar/S3AvatarStorage.js';

describe('API errors', () => {
  it('serializes code, message and details', () => {
    expect(new NotFoundError('Contact', 7).toJSON()).toEqual({
      error: 'NOT_FOUND',
      message: "Contact '7' not found",
      details: { resource: 'Contact', id: 7 },
    });
    expect(new NotFoundError().toJSON()).toEqual({ error: 'NOT_FOUND', message: 'Not Found' });
  });

  it('gives invalid tokens one fixed message', () => {
    const error = new InvalidTokenError();
    expect(error.statusCode).toBe(401);
    expect(error.message).toBe('Could not validate credentials');
  });

  describe('toApiError', () => {
    it('passes ApiErrors through', () => {
      const error = new BadRequestError('Invalid field name');
      expect(toApiError(error)).toBe(error);
    });

    it('collects zod issues per field', () => {
      const result = z.object({ email: z.string().email() }).safeParse({ email: 'nope' });
      if (result.success) {
        throw new Error('expected a validation failure');
      }

      const apiError = toApiError(result.error);
      expect(apiError.statusCode).toBe(400);
      expect(apiError.toJSON()).toEqual({
        error: 'BAD_REQUEST',
        message: 'Validation failed',
        details: { fields: { email: ['Invalid email'] } },
      });
    });

    it('maps image errors to 400', () => {
      const apiError = toApiError(new ImageProcessingError('Image body is empty', 'EMPTY'));
      expect(apiError.statusCode).toBe(400);
      expect(apiError.details).toEqual({ reason: 'EMPTY' });
    });

    it('maps avatar upload failures to 503', () => {
      const apiError = toApiError(
        new AvatarStorageError('Failed to upload avatars/1.webp', new Error('timeout'))
      );
      expect(apiError.toJSON()).toEqual({
        error: 'SERVICE_UNAVAILABLE',
        message: 'Avatar storage unavailable',
      });
    });

    it('does not treat an error named like an upload failure as one', () => {
      const lookalike = new Error('upload failed');
      lookalike.name = 'AvatarStorageError';
      expect(toApiError(lookalike).statusCode).toBe(500);
    });

    it('maps driver errors to 503', () => {
      const driverError = new Error('database is locked');
      driverError.name = 'SqliteError';
      expect(toApiError(driverError).statusCode).toBe(503);
      expect(toApiError(driverError).errorCode).toBe('PERSISTENCE_ERROR');
    });

    it('maps body parser failures to their status', () => {
      const syntax = Object.assign(new Error('Unexpected token'), { status: 400 });
      const tooLarge = Object.assign(new Error('request entity too large'), { status: 413 });

      expect(toApiError(syntax).toJSON()).toEqual({
        error: 'BAD_REQUEST',
        message: 'Malformed request body',
      });
      expect(toApiError(tooLarge).statusCode).toBe(413);
    });

    it('hides anything else behind a 500', () => {
      const apiError = toApiError(new Error('secret internals'));
      expect(apiError).toBeInstanceOf(ApiError);
      expect(apiError.statusCode).toBe(500);
      expect(apiError.message).toBe('An unexpected error occurred');
    });
  });
});
