/**
 * Request Validation Schemas
 *
 * Zod schemas for request bodies and path parameters. Parsing failures are
 * turned into 400 responses with per-field messages by the error handler.
 */

import { z } from 'zod';

// =============================================================================
// Auth
// =============================================================================

export const signupSchema = z.object({
  username: z.string().min(6).max(12),
  email: z.string().email(),
  password: z.string().min(6).max(20),
});

/**
 * OAuth2 password form: `username` carries the email address
 */
export const loginSchema = z.object({
  username: z.string().min(1, 'Email required'),
  password: z.string().min(1, 'Password required'),
});

export const requestEmailSchema = z.object({
  email: z.string().email(),
});

// =============================================================================
// Contacts
// =============================================================================

export const contactSchema = z.object({
  firstName: z.string().trim().min(1).max(50),
  lastName: z.string().trim().min(1).max(50),
  email: z.string().email(),
  phone: z.string().min(12).max(13),
  birthDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Wrong date format. Following format works: YYYY-MM-DD'),
});

export const contactIdParamsSchema = z.object({
  contactId: z.coerce.number().int().positive(),
});

export const fieldSearchParamsSchema = z.object({
  fieldName: z.string().min(1),
  fieldValue: z.string(),
});
