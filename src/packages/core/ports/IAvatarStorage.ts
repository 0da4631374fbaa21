/**
 * Avatar Storage Interface
 *
 * Hosts processed avatar images and hands back the URL to display.
 *
 * @module packages/core/ports/IAvatarStorage
 */

import type { ProcessedImage } from '../../../utils/image.js';

export interface IAvatarStorage {
  /**
   * Store an image under a stable per-user key, replacing any previous one
   *
   * @param key - Object key without extension, e.g. "avatars/42"
   * @returns Public URL of the stored image
   */
  upload(key: string, image: ProcessedImage): Promise<string>;
}
