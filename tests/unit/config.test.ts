import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../../src/config.js';

const base = { JWT_SECRET_KEY: 'test-secret-0123456789' };

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(base);

    expect(config.api).toEqual({
      port: 3000,
      host: '0.0.0.0',
      corsOrigins: ['http://localhost:3000'],
      contactsRateLimit: 10,
    });
    expect(config.database.path).toBe('./data/contacts.db');
    expect(config.tokens).toEqual({
      secretKey: 'test-secret-0123456789',
      accessTokenTtlMinutes: 15,
      refreshTokenTtlDays: 7,
      emailTokenTtlDays: 7,
    });
    expect(config.hashing).toEqual({ memoryCost: 65536, timeCost: 3, parallelism: 4 });
    expect(config.avatars).toEqual({
      bucket: undefined,
      region: 'us-east-1',
      publicBaseUrl: undefined,
      keyPrefix: 'avatars',
    });
  });

  it('coerces numbers and splits origin lists', () => {
    const config = loadConfig({
      ...base,
      PORT: '8080',
      ACCESS_TOKEN_TTL_MINUTES: '5',
      CORS_ORIGINS: 'http://a.test, http://b.test',
    });

    expect(config.api.port).toBe(8080);
    expect(config.tokens.accessTokenTtlMinutes).toBe(5);
    expect(config.api.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('treats blank avatar settings as unset', () => {
    const config = loadConfig({ ...base, AVATAR_BUCKET: '  ', AVATAR_PUBLIC_BASE_URL: '' });

    expect(config.avatars.bucket).toBeUndefined();
    expect(config.avatars.publicBaseUrl).toBeUndefined();
  });

  it('requires a signing secret of at least 16 characters', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);

    try {
      loadConfig({ JWT_SECRET_KEY: 'short' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toEqual([
          {
            path: 'tokens.secretKey',
            message: 'JWT_SECRET_KEY must be at least 16 characters',
          },
        ]);
      }
    }
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig(base))).toBe(true);
  });
});
