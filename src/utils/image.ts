import sharp from 'sharp';
import { logger } from './logger.js';

/**
 * Image Processing Utilities
 *
 * Normalizes uploaded avatars before they are handed to the avatar host.
 */

/**
 * Image processing configuration
 */
export const IMAGE_CONFIG = {
  /** Avatar edge length in pixels (square) */
  avatarSize: 250,
  /** Maximum accepted upload size in bytes (5MB) */
  maxUploadSize: 5 * 1024 * 1024,
  /** WebP quality (0-100) */
  webpQuality: 80,
  /** Allowed input MIME types */
  allowedMimeTypes: ['image/jpeg', 'image/png', 'image/gif', 'image/webp'] as const,
} as const;

type AllowedMimeType = (typeof IMAGE_CONFIG.allowedMimeTypes)[number];

/**
 * Result of image processing
 */
export interface ProcessedImage {
  buffer: Buffer;
  mimeType: 'image/webp';
  extension: 'webp';
  width: number;
  height: number;
}

/**
 * Image processing error
 */
export class ImageProcessingError extends Error {
  constructor(
    message: string,
    public readonly code: 'INVALID_FORMAT' | 'TOO_LARGE' | 'EMPTY' | 'PROCESSING_FAILED'
  ) {
    super(message);
    this.name = 'ImageProcessingError';
  }
}

/**
 * Check if MIME type is allowed
 */
export function isAllowedMimeType(mimeType: string): mimeType is AllowedMimeType {
  return IMAGE_CONFIG.allowedMimeTypes.some((allowed) => allowed === mimeType);
}

/**
 * Resize an uploaded image to a square WebP avatar (centered cover crop)
 */
export async function processAvatar(input: Buffer, mimeType?: string): Promise<ProcessedImage> {
  if (input.length === 0) {
    throw new ImageProcessingError('Image body is empty', 'EMPTY');
  }

  if (input.length > IMAGE_CONFIG.maxUploadSize) {
    throw new ImageProcessingError(
      `Image exceeds ${IMAGE_CONFIG.maxUploadSize} bytes`,
      'TOO_LARGE'
    );
  }

  if (mimeType && !isAllowedMimeType(mimeType)) {
    throw new ImageProcessingError(
      `Unsupported image format: ${mimeType}. Allowed: ${IMAGE_CONFIG.allowedMimeTypes.join(', ')}`,
      'INVALID_FORMAT'
    );
  }

  let buffer: Buffer;
  try {
    buffer = await sharp(input)
      .resize(IMAGE_CONFIG.avatarSize, IMAGE_CONFIG.avatarSize, {
        fit: 'cover',
        position: 'centre',
      })
      .webp({ quality: IMAGE_CONFIG.webpQuality })
      .toBuffer();
  } catch (error) {
    logger.debug({ error }, 'Avatar processing failed');
    throw new ImageProcessingError('Could not read image data', 'PROCESSING_FAILED');
  }

  return {
    buffer,
    mimeType: 'image/webp',
    extension: 'webp',
    width: IMAGE_CONFIG.avatarSize,
    height: IMAGE_CONFIG.avatarSize,
  };
}
