import fs from 'fs-extra';
import path from 'path';
import { CryptoUtils, InputError, MediaReference } from '@veriframe/core';

const MIME_BY_EXTENSION: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.m4v': 'video/mp4',
  '.mov': 'video/quicktime',
  '.webm': 'video/webm',
  '.avi': 'video/x-msvideo',
  '.wav': 'audio/wav',
  '.mp3': 'audio/mpeg',
  '.ogg': 'audio/ogg',
  '.flac': 'audio/flac',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif'
};

export const DEFAULT_STORE_DIR = '.veriframe/jobs';

export function mimeFromPath(file: string): string | undefined {
  return MIME_BY_EXTENSION[path.extname(file).toLowerCase()];
}

/**
 * Describe a local file the way an upload service would: size, MIME type
 * and digest. The media id is the digest, so the same bytes map to the same
 * media across runs.
 */
export async function describeMediaFile(file: string, mimeType?: string): Promise<MediaReference> {
  if (!(await fs.pathExists(file))) {
    throw new InputError(`File not found: ${file}`);
  }
  const resolvedMime = mimeType ?? mimeFromPath(file);
  if (!resolvedMime) {
    throw new InputError(`Cannot tell the media type of ${path.basename(file)}; pass --mime`);
  }

  const content = await fs.readFile(file);
  const contentHash = CryptoUtils.hashContent(content);
  return {
    id: `media-${contentHash.slice(0, 16)}`,
    filename: path.basename(file),
    storagePath: path.resolve(file),
    sizeBytes: content.length,
    mimeType: resolvedMime,
    contentHash
  };
}
