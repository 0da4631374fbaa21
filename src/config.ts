import { z } from 'zod';

/**
 * Comma-separated origin list: "http://a,http://b"
 */
const originListSchema = z
  .string()
  .transform((val) => val.split(',').map((origin) => origin.trim()).filter(Boolean))
  .pipe(z.array(z.string().url()));

/**
 * Empty strings from .env files count as unset
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim().length > 0 ? val.trim() : undefined));

/**
 * Configuration schema with Zod validation
 */
const configSchema = z.object({
  api: z.object({
    port: z.coerce.number().int().min(1).max(65535).default(3000),
    host: z.string().default('0.0.0.0'),
    corsOrigins: originListSchema.default('http://localhost:3000'),
    // Requests per minute per user on the contact routes
    contactsRateLimit: z.coerce.number().int().min(1).default(10),
  }),

  database: z.object({
    path: z.string().min(1).default('./data/contacts.db'),
  }),

  tokens: z.object({
    secretKey: z.string().min(16, 'JWT_SECRET_KEY must be at least 16 characters'),
    accessTokenTtlMinutes: z.coerce.number().int().min(1).default(15),
    refreshTokenTtlDays: z.coerce.number().int().min(1).default(7),
    emailTokenTtlDays: z.coerce.number().int().min(1).default(7),
  }),

  // argon2id cost parameters (memoryCost in KiB)
  hashing: z.object({
    memoryCost: z.coerce.number().int().min(1024).default(65536),
    timeCost: z.coerce.number().int().min(1).default(3),
    parallelism: z.coerce.number().int().min(1).max(16).default(4),
  }),

  avatars: z.object({
    bucket: optionalString,
    region: z.string().default('us-east-1'),
    publicBaseUrl: optionalString.pipe(z.string().url().optional()),
    keyPrefix: z.string().default('avatars'),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

export type TokenConfig = AppConfig['tokens'];
export type HashingConfig = AppConfig['hashing'];

/**
 * Thrown when environment variables fail validation
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: Array<{ path: string; message: string }>
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build and validate the application configuration from environment variables.
 *
 * Called once at process start; the result is passed explicitly to every
 * service that needs it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    api: {
      port: env.PORT,
      host: env.HOST,
      corsOrigins: env.CORS_ORIGINS,
      contactsRateLimit: env.CONTACTS_RATE_LIMIT_PER_MINUTE,
    },
    database: {
      path: env.DATABASE_PATH,
    },
    tokens: {
      secretKey: env.JWT_SECRET_KEY,
      accessTokenTtlMinutes: env.ACCESS_TOKEN_TTL_MINUTES,
      refreshTokenTtlDays: env.REFRESH_TOKEN_TTL_DAYS,
      emailTokenTtlDays: env.EMAIL_TOKEN_TTL_DAYS,
    },
    hashing: {
      memoryCost: env.ARGON2_MEMORY_COST,
      timeCost: env.ARGON2_TIME_COST,
      parallelism: env.ARGON2_PARALLELISM,
    },
    avatars: {
      bucket: env.AVATAR_BUCKET,
      region: env.AVATAR_REGION,
      publicBaseUrl: env.AVATAR_PUBLIC_BASE_URL,
      keyPrefix: env.AVATAR_KEY_PREFIX,
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError('Configuration validation failed', issues);
  }

  return Object.freeze(result.data);
}

