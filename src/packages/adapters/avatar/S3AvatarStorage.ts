/**
 * S3 Avatar Storage
 *
 * Stores processed avatars at `{keyPrefix}/{userId}.webp`. The key is stable
 * per user so a new upload overwrites the previous one; the returned URL
 * carries a `v` query parameter that changes on every upload to bust caches.
 *
 * @module packages/adapters/avatar/S3AvatarStorage
 */

import { S3Client, PutObjectCommand, type S3ClientConfig } from '@aws-sdk/client-s3';

import type { IAvatarStorage } from '../../core/ports/index.js';
import type { ProcessedImage } from '../../../utils/image.js';
import { logger } from '../../../utils/logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * The part of S3Client this adapter uses
 */
export interface AvatarObjectClient {
  send(command: PutObjectCommand): Promise<unknown>;
}

export interface S3AvatarStorageConfig {
  /** S3 bucket name */
  bucket: string;
  /** Public URL the bucket (or its CDN) is served from */
  publicBaseUrl: string;
  /** AWS region */
  region?: string;
  /** Custom S3 client (for testing) */
  client?: AvatarObjectClient;
  /** Clock for the cache-busting version */
  now?: () => Date;
}

/**
 * Error thrown when the upload fails
 */
export class AvatarStorageError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'AvatarStorageError';
  }
}

// =============================================================================
// Adapter
// =============================================================================

export class S3AvatarStorage implements IAvatarStorage {
  private readonly client: AvatarObjectClient;
  private readonly bucket: string;
  private readonly publicBaseUrl: string;
  private readonly now: () => Date;

  constructor(config: S3AvatarStorageConfig) {
    this.bucket = config.bucket;
    this.publicBaseUrl = config.publicBaseUrl.replace(/\/+$/, '');
    this.now = config.now ?? (() => new Date());

    // Use provided client or create new one
    if (config.client) {
      this.client = config.client;
    } else {
      const s3Config: S3ClientConfig = {};
      if (config.region) {
        s3Config.region = config.region;
      }
      this.client = new S3Client(s3Config);
    }
  }

  async upload(key: string, image: ProcessedImage): Promise<string> {
    const objectKey = `${key}.${image.extension}`;

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: objectKey,
          Body: image.buffer,
          ContentType: image.mimeType,
          CacheControl: 'public, max-age=31536000',
        })
      );
    } catch (error) {
      logger.error({ error, bucket: this.bucket, key: objectKey }, 'Avatar upload failed');
      throw new AvatarStorageError(`Failed to upload ${objectKey}`, error);
    }

    const version = Math.floor(this.now().getTime() / 1000);
    logger.debug({ key: objectKey, version }, 'Avatar uploaded');

    return `${this.publicBaseUrl}/${objectKey}?v=${version}`;
  }
}
